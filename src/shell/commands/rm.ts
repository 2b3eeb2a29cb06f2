/**
 * `rm` builtin implementation.
 *
 * Removes files and symlinks only; directories are refused with
 * `Is a directory` (there is no recursive mode). Each target is attempted
 * independently and the status is 1 if any of them failed.
 */

import fs from 'fs';
import { result_make } from '../types.js';
import { BuiltinError } from '../errors.js';
import type { BuiltinCommand } from './types.js';
import { fsError_describe, lstat_try } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'rm',
    usage: 'rm FILE...',
    create: () => async (args, shell) => {
        if (args.length === 0) throw new BuiltinError('missing operand');

        const failures: string[] = [];
        for (const target of args) {
            const resolved: string = shell.path_resolve(target);
            try {
                const stats: fs.Stats | null = await lstat_try(resolved);
                if (!stats) {
                    failures.push(`rm: cannot remove '${target}': No such file or directory`);
                } else if (stats.isDirectory()) {
                    failures.push(`rm: cannot remove '${target}': Is a directory`);
                } else {
                    await fs.promises.unlink(resolved);
                }
            } catch (error: unknown) {
                failures.push(`rm: cannot remove '${target}': ${fsError_describe(error)}`);
            }
        }
        return result_make(failures.length > 0 ? 1 : 0, failures.join('\n'));
    }
};
