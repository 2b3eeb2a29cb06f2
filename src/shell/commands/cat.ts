/**
 * `cat` builtin implementation.
 *
 * Concatenates files in operand order, separated by a line break. A file
 * that cannot be read contributes an inline error line instead of its
 * content; the status stays 0.
 */

import fs from 'fs';
import { result_make } from '../types.js';
import { BuiltinError } from '../errors.js';
import type { BuiltinCommand } from './types.js';
import { fsError_describe } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'cat',
    usage: 'cat FILE...',
    create: () => async (args, shell) => {
        if (args.length === 0) throw new BuiltinError('missing operand');

        const parts: string[] = [];
        for (const file of args) {
            try {
                parts.push(await fs.promises.readFile(shell.path_resolve(file), 'utf-8'));
            } catch (error: unknown) {
                parts.push(`cat: ${file}: ${fsError_describe(error)}`);
            }
        }
        return result_make(0, parts.join('\n'));
    }
};
