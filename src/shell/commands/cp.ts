/**
 * `cp` builtin implementation.
 *
 * `cp SRC DEST` copies to DEST; `cp SRC... DIR` copies each source into DIR
 * keeping its basename. Directory sources are copied recursively and never
 * merged into an existing directory of the same name. With several sources
 * DEST must already be a directory, checked before anything is copied.
 */

import fs from 'fs';
import path from 'path';
import { result_make } from '../types.js';
import { BuiltinError } from '../errors.js';
import type { BuiltinCommand } from './types.js';
import { fsError_describe, isDirectory_check, lstat_try } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'cp',
    usage: 'cp SOURCE DEST | cp SOURCE... DIRECTORY',
    create: () => async (args, shell) => {
        if (args.length < 2) throw new BuiltinError('missing file operand');

        const sources: string[] = args.slice(0, -1);
        const destArg: string = args[args.length - 1];
        const dest: string = shell.path_resolve(destArg);
        const destIsDir: boolean = await isDirectory_check(dest);

        if (sources.length > 1 && !destIsDir) {
            return result_make(1, `cp: target '${destArg}' is not a directory`);
        }

        const failures: string[] = [];
        for (const source of sources) {
            const from: string = shell.path_resolve(source);
            const to: string = destIsDir ? path.join(dest, path.basename(from)) : dest;
            const failure: string | null = await node_copy(source, destArg, from, to);
            if (failure) failures.push(failure);
        }
        return result_make(failures.length > 0 ? 1 : 0, failures.join('\n'));
    }
};

/**
 * Copy one source, returning an error line or null on success.
 */
async function node_copy(source: string, destArg: string, from: string, to: string): Promise<string | null> {
    let stats: fs.Stats;
    try {
        stats = await fs.promises.stat(from);
    } catch (error: unknown) {
        return `cp: cannot stat '${source}': ${fsError_describe(error)}`;
    }
    if (from === to) {
        return `cp: '${source}' and '${destArg}' are the same file`;
    }

    try {
        if (stats.isDirectory()) {
            if (await lstat_try(to)) {
                return `cp: cannot copy '${source}': File exists`;
            }
            await fs.promises.cp(from, to, { recursive: true, errorOnExist: true, force: false, preserveTimestamps: true });
        } else {
            await fs.promises.cp(from, to, { preserveTimestamps: true });
        }
        return null;
    } catch (error: unknown) {
        return `cp: cannot copy '${source}': ${fsError_describe(error)}`;
    }
}
