/**
 * `help` builtin implementation.
 *
 * Without operands lists every builtin name; `help NAME...` prints the usage
 * line of each named builtin.
 */

import { result_make } from '../types.js';
import type { BuiltinCommand } from './types.js';

export const command: BuiltinCommand = {
    name: 'help',
    usage: 'help [COMMAND ...]',
    create: ({ listCommands, usageOf }) => async (args) => {
        if (args.length === 0) {
            const names: string[] = listCommands().slice().sort();
            return result_make(0, [
                'conch built-in commands:',
                names.join(' '),
                '',
                'You can also run system commands.'
            ].join('\n'));
        }

        const lines: string[] = [];
        for (const topic of args) {
            const usage: string | undefined = usageOf(topic);
            if (!usage) {
                return result_make(1, `help: no help topics match '${topic}'`);
            }
            lines.push(usage);
        }
        return result_make(0, lines.join('\n'));
    }
};
