/**
 * @file conch REPL
 *
 * Drives the read/execute/print loop: asks a LineSource for lines, hands
 * them to the Shell, prints whatever comes back, and persists history when
 * the session ends (by `exit`/`quit` or end of input).
 *
 * @module
 */

import os from 'os';
import path from 'path';
import { Chalk, type ChalkInstance } from 'chalk';
import type { Shell } from '../shell/Shell.js';
import type { ShellOutcome } from '../shell/types.js';
import type { HistoryStore } from '../history/HistoryStore.js';
import type { LineSource } from './LineSource.js';
import { logger_silent, type Logger } from '../logging/logger.js';
import { errorMessage_get } from '../shell/errors.js';

export interface ReplOptions {
    /** Persistence target; null disables saving. */
    store?: HistoryStore | null;
    logger?: Logger;
    color?: boolean;
    /** Print banner and goodbye lines. */
    interactive?: boolean;
    write?: (text: string) => void;
}

/**
 * Prompt text: the working directory's basename followed by `$ `.
 */
export function prompt_render(cwd: string, chalk: ChalkInstance): string {
    const name: string = path.basename(cwd) || cwd;
    return `${chalk.cyan(name)}$ `;
}

export function banner_render(chalk: ChalkInstance): string {
    return `${chalk.bold('conch')} ${chalk.dim(`(${os.type()} ${os.release()})`)} - type 'help' for commands`;
}

/**
 * Save session history, reporting failure as a warning.
 *
 * @returns Whether the history was written.
 */
export function history_persist(shell: Shell, store: HistoryStore | null, log: Logger): boolean {
    if (!store) return false;
    try {
        store.save(shell.session.history_get());
        return true;
    } catch (error: unknown) {
        log.warn(`could not save history to ${store.file}: ${errorMessage_get(error)}`);
        return false;
    }
}

/**
 * Run the loop until termination or end of input.
 *
 * @returns Status of the last evaluated line (0 when the session was ended by `exit`/`quit`).
 */
export async function repl_run(shell: Shell, source: LineSource, options: ReplOptions = {}): Promise<number> {
    const chalk: ChalkInstance = new Chalk({ level: options.color === false ? 0 : 1 });
    const write: (text: string) => void = options.write ?? ((text: string): void => console.log(text));
    const log: Logger = (options.logger ?? logger_silent()).child('repl');
    const store: HistoryStore | null = options.store ?? null;
    const interactive: boolean = options.interactive ?? false;

    if (interactive) write(banner_render(chalk));

    let status: number = 0;
    try {
        for (;;) {
            const line: string | null = await source.line_read(prompt_render(shell.session.cwd_get(), chalk));
            if (line === null) {
                if (interactive) write('\nReceived EOF. Exiting.');
                break;
            }

            const outcome: ShellOutcome = await shell.command_execute(line);
            if (outcome.kind === 'terminate') {
                if (outcome.output) write(outcome.output);
                status = 0;
                if (interactive) write(store ? 'Exiting conch. History saved.' : 'Exiting conch.');
                break;
            }

            status = outcome.exitCode;
            if (outcome.output) write(outcome.output.replace(/\n$/, ''));
        }
    } finally {
        history_persist(shell, store, log);
        source.close();
    }
    return status;
}
