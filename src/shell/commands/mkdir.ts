/**
 * `mkdir` builtin implementation.
 *
 * Missing parents are created. An operand that already exists is reported as
 * `File exists`; each operand is attempted regardless of earlier failures.
 */

import fs from 'fs';
import { result_make } from '../types.js';
import { BuiltinError } from '../errors.js';
import type { BuiltinCommand } from './types.js';
import { fsError_describe, lstat_try } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'mkdir',
    usage: 'mkdir DIRECTORY...',
    create: () => async (args, shell) => {
        if (args.length === 0) throw new BuiltinError('missing operand');

        const failures: string[] = [];
        for (const dir of args) {
            const resolved: string = shell.path_resolve(dir);
            try {
                if (await lstat_try(resolved)) {
                    failures.push(`mkdir: cannot create directory '${dir}': File exists`);
                    continue;
                }
                await fs.promises.mkdir(resolved, { recursive: true });
            } catch (error: unknown) {
                failures.push(`mkdir: cannot create directory '${dir}': ${fsError_describe(error)}`);
            }
        }
        return result_make(failures.length > 0 ? 1 : 0, failures.join('\n'));
    }
};
