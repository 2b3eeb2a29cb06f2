/**
 * @file Runtime Settings
 *
 * Resolves interpreter settings with deterministic precedence
 * (environment > YAML config file > defaults) and validates the merged
 * result with zod. Validation failures name the offending field.
 *
 * @module
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { home_expand } from '../shell/paths.js';
import { errorMessage_get } from '../shell/errors.js';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const SettingsSchema = z.object({
    historyFile:    z.string().min(1),
    historyLimit:   z.number().int().positive(),
    processLimit:   z.number().int().positive(),
    cpuSampleMs:    z.number().int().nonnegative(),
    color:          z.boolean(),
    logLevel:       LogLevelSchema,
    persistHistory: z.boolean()
});

export type ShellSettings = z.infer<typeof SettingsSchema>;

/** Config files may set any subset of fields, and nothing else. */
const FileSettingsSchema = SettingsSchema.partial().strict();

type PartialSettings = Partial<Record<keyof ShellSettings, unknown>>;

export type SettingSource = 'env' | 'file' | 'default';

export interface SettingsLoadOptions {
    /** Explicit config file; must exist when given. */
    configPath?: string;
    env?: Record<string, string | undefined>;
    home?: string;
}

export interface LoadedSettings {
    settings: ShellSettings;
    /** Config file that contributed, if any. */
    file: string | null;
    sources: Record<keyof ShellSettings, SettingSource>;
}

export const CONFIG_FILE_NAME: string = '.conchrc.yaml';

/**
 * Configuration that cannot be read or does not validate.
 */
export class SettingsError extends Error {
    constructor(message: string, public readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'SettingsError';
    }
}

/**
 * Built-in defaults for a given home directory.
 */
export function settingsDefaults_get(home: string): ShellSettings {
    return {
        historyFile: path.join(home, '.conch_history'),
        historyLimit: 1000,
        processLimit: 20,
        cpuSampleMs: 500,
        color: true,
        logLevel: 'warn',
        persistHistory: true
    };
}

/**
 * Load, merge and validate settings.
 *
 * @throws SettingsError for an unreadable file, malformed YAML or invalid values.
 */
export function settings_load(options: SettingsLoadOptions = {}): LoadedSettings {
    const env: Record<string, string | undefined> = options.env ?? process.env;
    const home: string = options.home ?? os.homedir();
    const defaults: ShellSettings = settingsDefaults_get(home);

    const file: string | null = configFile_locate(options.configPath ?? env['CONCH_CONFIG'], home);
    const fromFile: PartialSettings = file ? configFile_read(file) : {};
    const fromEnv: PartialSettings = envSettings_resolve(env);

    const merged: Record<string, unknown> = { ...defaults, ...fromFile, ...fromEnv };
    if (typeof merged['historyFile'] === 'string') {
        merged['historyFile'] = home_expand(merged['historyFile'], home);
    }

    const parsed = SettingsSchema.safeParse(merged);
    if (!parsed.success) {
        throw new SettingsError('invalid settings', issues_format(parsed.error));
    }

    const source_of = (key: keyof ShellSettings): SettingSource =>
        key in fromEnv ? 'env' : key in fromFile ? 'file' : 'default';

    return {
        settings: parsed.data,
        file,
        sources: {
            historyFile: source_of('historyFile'),
            historyLimit: source_of('historyLimit'),
            processLimit: source_of('processLimit'),
            cpuSampleMs: source_of('cpuSampleMs'),
            color: source_of('color'),
            logLevel: source_of('logLevel'),
            persistHistory: source_of('persistHistory')
        }
    };
}

/**
 * One-line summary of where each setting came from, for debug logging.
 */
export function settingsSources_describe(loaded: LoadedSettings): string {
    const parts: string[] = Object.entries(loaded.sources).map(
        ([key, source]: [string, SettingSource]): string => `${key}=${source}`
    );
    return `setting sources: ${parts.join(' ')}`;
}

/**
 * Pick the config file: an explicit path (must exist), else the default
 * file in the home directory when present.
 */
function configFile_locate(explicit: string | undefined, home: string): string | null {
    if (explicit) {
        const resolved: string = path.resolve(home_expand(explicit, home));
        if (!fs.existsSync(resolved)) {
            throw new SettingsError(`config file not found: ${resolved}`);
        }
        return resolved;
    }
    const fallback: string = path.join(home, CONFIG_FILE_NAME);
    return fs.existsSync(fallback) ? fallback : null;
}

function configFile_read(file: string): PartialSettings {
    let raw: unknown;
    try {
        raw = yaml.load(fs.readFileSync(file, 'utf-8'));
    } catch (error: unknown) {
        throw new SettingsError(`cannot read config file ${file}: ${errorMessage_get(error)}`);
    }
    // An empty document parses to undefined.
    if (raw === undefined || raw === null) return {};

    const parsed = FileSettingsSchema.safeParse(raw);
    if (!parsed.success) {
        throw new SettingsError(`invalid config file ${file}`, issues_format(parsed.error));
    }
    return parsed.data;
}

/**
 * Read `CONCH_*` overrides. Values are converted but not validated here;
 * a value that does not convert is passed through so zod names the field.
 */
function envSettings_resolve(env: Record<string, string | undefined>): PartialSettings {
    const out: PartialSettings = {};
    const historyFile: string | undefined = env['CONCH_HISTORY_FILE'];
    if (historyFile) out.historyFile = historyFile;

    const numeric: Array<[keyof ShellSettings, string]> = [
        ['historyLimit', 'CONCH_HISTORY_LIMIT'],
        ['processLimit', 'CONCH_PROCESS_LIMIT'],
        ['cpuSampleMs', 'CONCH_CPU_SAMPLE_MS']
    ];
    for (const [key, name] of numeric) {
        const raw: string | undefined = env[name];
        if (raw === undefined || raw === '') continue;
        const value: number = Number(raw);
        out[key] = Number.isFinite(value) ? value : raw;
    }

    const color: string | undefined = env['CONCH_COLOR'];
    if (color !== undefined && color !== '') {
        out.color = flag_parse(color);
    } else if (env['NO_COLOR']) {
        out.color = false;
    }

    const logLevel: string | undefined = env['CONCH_LOG_LEVEL'];
    if (logLevel) out.logLevel = logLevel.toLowerCase();

    return out;
}

function flag_parse(raw: string): boolean | string {
    const normalized: string = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return raw;
}

function issues_format(error: z.ZodError): string[] {
    return error.issues.map((issue: z.ZodIssue): string => {
        const where: string = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${where}: ${issue.message}`;
    });
}
