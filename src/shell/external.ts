/**
 * @file External Process Invoker
 *
 * Runs a non-builtin command as a child process in the session's working
 * directory. The program is executed directly (never through a shell) and the
 * call blocks until it exits; there is no timeout and no partial streaming.
 *
 * @module
 */

import { spawnSync, type SpawnSyncReturns } from 'child_process';
import os from 'os';
import { errorMessage_get } from './errors.js';
import { EXIT_NOT_FOUND, type ShellResult } from './types.js';

/** Captured output ceiling per stream. */
const OUTPUT_MAX_BYTES: number = 64 * 1024 * 1024;

/**
 * Extract the errno-style `code` from an unknown thrown value.
 */
export function errnoCode_get(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Conventional `128 + n` status for a child killed by a signal.
 */
function signal_exitCode(signal: NodeJS.Signals): number {
    const entry = Object.entries(os.constants.signals).find(([name]: [string, unknown]): boolean => name === signal);
    return entry && typeof entry[1] === 'number' ? 128 + entry[1] : 1;
}

/**
 * Join captured streams: stdout, then stderr after a line break when present.
 */
export function streams_join(stdout: string, stderr: string): string {
    return stderr ? `${stdout}\n${stderr}` : stdout;
}

/**
 * Run a tokenized command as an external program.
 *
 * @param tokens - Program name followed by its arguments (non-empty).
 * @param cwd - Working directory for the child.
 * @returns The child's exit status and combined output; 127 when the program
 *          cannot be found, 1 for any other spawn failure.
 */
export function external_run(tokens: string[], cwd: string): ShellResult {
    const [program, ...args] = tokens;
    if (!program) {
        return { exitCode: EXIT_NOT_FOUND, output: `${program}: command not found` };
    }

    let child: SpawnSyncReturns<string>;
    try {
        child = spawnSync(program, args, {
            cwd,
            encoding: 'utf-8',
            stdio: ['inherit', 'pipe', 'pipe'],
            maxBuffer: OUTPUT_MAX_BYTES,
            windowsHide: true
        });
    } catch (error: unknown) {
        // Argument validation (e.g. an embedded NUL byte) throws before spawning.
        return { exitCode: 1, output: `Error running external command: ${errorMessage_get(error)}` };
    }

    if (child.error) {
        if (errnoCode_get(child.error) === 'ENOENT') {
            return { exitCode: EXIT_NOT_FOUND, output: `${program}: command not found` };
        }
        return { exitCode: 1, output: `Error running external command: ${child.error.message}` };
    }

    const output: string = streams_join(child.stdout ?? '', child.stderr ?? '');
    if (child.status !== null) {
        return { exitCode: child.status, output };
    }
    return { exitCode: child.signal ? signal_exitCode(child.signal) : 1, output };
}
