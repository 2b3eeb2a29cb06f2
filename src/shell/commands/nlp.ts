/**
 * `nlp` builtin implementation.
 *
 * Translates plain English into a command line and runs it through the
 * engine as if it had been typed.
 *
 * @example
 * nlp create a folder called drafts and move notes.txt into it
 */

import { result_make } from '../types.js';
import type { ShellOutcome } from '../types.js';
import type { BuiltinCommand } from './types.js';

export const command: BuiltinCommand = {
    name: 'nlp',
    usage: 'nlp TEXT...',
    create: ({ translate }) => async (args, shell) => {
        const line: string = translate(args.join(' '));
        if (!line) {
            return result_make(1, 'Could not interpret natural language command.');
        }

        const outcome: ShellOutcome = await shell.command_execute(line);
        if (outcome.kind === 'terminate') return outcome;
        return result_make(outcome.exitCode, outcome.output || `Executed: ${line}`);
    }
};
