#!/usr/bin/env node
/**
 * @file conch CLI Entry Point
 *
 * Usage:
 *   conch                     interactive session
 *   conch -c "mkdir a && ls"  run one line and exit with its status
 *   conch < script.txt        run lines from a file or pipe
 *
 * Options:
 *   --config FILE   settings file (default ~/.conchrc.yaml when present)
 *   --no-history    neither load nor save persisted history
 *
 * @module
 */

import fs from 'fs';
import { Chalk } from 'chalk';
import { settings_load, settingsSources_describe, SettingsError, type LoadedSettings, type ShellSettings } from '../config/settings.js';
import { Logger } from '../logging/logger.js';
import { HistoryStore } from '../history/HistoryStore.js';
import { Session } from '../shell/Session.js';
import { Shell } from '../shell/Shell.js';
import type { ShellOutcome } from '../shell/types.js';
import { errorMessage_get } from '../shell/errors.js';
import { statsCapability_detect } from '../stats/OsStatsProvider.js';
import { ReadlineSource, ScriptSource, type LineSource } from './LineSource.js';
import { repl_run } from './Repl.js';
import { cliArgs_parse, USAGE, type CliParseResult } from './args.js';

async function main(args: string[]): Promise<number> {
    const parsed: CliParseResult = cliArgs_parse(args);
    if (!parsed.ok) {
        console.error(`${parsed.error}\n${USAGE}`);
        return 2;
    }
    if (parsed.options.help) {
        console.log(USAGE);
        return 0;
    }

    let loaded: LoadedSettings;
    try {
        loaded = settings_load({ configPath: parsed.options.configPath });
    } catch (error: unknown) {
        if (error instanceof SettingsError) {
            console.error(new Chalk().red(`conch: ${error.message}`));
            return 2;
        }
        throw error;
    }

    const settings: ShellSettings = loaded.settings;
    const logger: Logger = new Logger({ level: settings.logLevel, color: settings.color });
    if (loaded.file) logger.debug(`settings loaded from ${loaded.file}`);
    logger.debug(settingsSources_describe(loaded));

    const oneShot: boolean = parsed.options.command !== null;
    const store: HistoryStore | null = settings.persistHistory && !parsed.options.noHistory && !oneShot
        ? new HistoryStore(settings.historyFile, settings.historyLimit)
        : null;

    let history: string[] = [];
    if (store) {
        try {
            history = store.load();
        } catch (error: unknown) {
            logger.warn(`could not load history from ${store.file}: ${errorMessage_get(error)}`);
        }
    }

    const session: Session = new Session({ history });
    const shell: Shell = new Shell({
        session,
        stats: statsCapability_detect({ sampleMs: settings.cpuSampleMs }),
        logger,
        historyLimit: settings.historyLimit,
        processLimit: settings.processLimit
    });

    if (parsed.options.command !== null) {
        const outcome: ShellOutcome = await shell.command_execute(parsed.options.command);
        if (outcome.output) console.log(outcome.output.replace(/\n$/, ''));
        return outcome.kind === 'terminate' ? 0 : outcome.exitCode;
    }

    const interactive: boolean = process.stdin.isTTY === true;
    const source: LineSource = interactive
        ? new ReadlineSource({
            completion: { builtins: (): string[] => shell.builtins_list(), cwd: (): string => session.cwd_get() },
            history,
            historySize: settings.historyLimit
        })
        : ScriptSource.text_parse(fs.readFileSync(0, 'utf-8'));

    return repl_run(shell, source, { store, logger, color: settings.color, interactive });
}

main(process.argv.slice(2))
    .then((code: number): void => {
        process.exitCode = code;
    })
    .catch((error: unknown): void => {
        console.error(`Fatal error: ${errorMessage_get(error)}`);
        process.exit(1);
    });
