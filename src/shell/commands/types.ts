import type { Shell } from '../Shell.js';
import type { ShellOutcome } from '../types.js';
import type { StatsCapability } from '../../stats/types.js';
import type { Translator } from '../../translate/translator.js';

/**
 * Async builtin command handler signature.
 *
 * @param args - Tokens after the command name.
 * @param shell - Active shell (session state and re-entry for `nlp`).
 * @returns A result, or the terminate outcome for `exit`/`quit`.
 */
export type BuiltinHandler = (args: string[], shell: Shell) => Promise<ShellOutcome>;

/**
 * Shared dependency bag injected into builtin factories.
 */
export interface BuiltinDeps {
    listCommands: () => string[];
    usageOf: (name: string) => string | undefined;
    stats: StatsCapability;
    translate: Translator;
    historyLimit: number;
    processLimit: number;
}

/**
 * Declarative builtin descriptor consumed by the command registry.
 */
export interface BuiltinCommand {
    name: string;
    /** One-line usage shown by `help <name>`. */
    usage: string;
    /**
     * Create a callable builtin handler bound to shared dependencies.
     */
    create: (deps: BuiltinDeps) => BuiltinHandler;
}
