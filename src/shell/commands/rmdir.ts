/**
 * `rmdir` builtin implementation. Removes empty directories only.
 */

import fs from 'fs';
import { result_make } from '../types.js';
import { BuiltinError } from '../errors.js';
import type { BuiltinCommand } from './types.js';
import { fsError_describe } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'rmdir',
    usage: 'rmdir DIRECTORY...',
    create: () => async (args, shell) => {
        if (args.length === 0) throw new BuiltinError('missing operand');

        const failures: string[] = [];
        for (const dir of args) {
            try {
                await fs.promises.rmdir(shell.path_resolve(dir));
            } catch (error: unknown) {
                failures.push(`rmdir: failed to remove '${dir}': ${fsError_describe(error)}`);
            }
        }
        return result_make(failures.length > 0 ? 1 : 0, failures.join('\n'));
    }
};
