/**
 * `mv` builtin implementation.
 *
 * `mv SRC DEST` renames; `mv SRC... DIR` moves each source into DIR keeping
 * its basename. With several sources DEST must already be a directory, and
 * that is checked before anything moves. Per-source failures are collected.
 */

import fs from 'fs';
import path from 'path';
import { result_make } from '../types.js';
import { BuiltinError } from '../errors.js';
import { errnoCode_get } from '../external.js';
import type { BuiltinCommand } from './types.js';
import { fsError_describe, isDirectory_check } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'mv',
    usage: 'mv SOURCE DEST | mv SOURCE... DIRECTORY',
    create: () => async (args, shell) => {
        if (args.length < 2) throw new BuiltinError('missing file operand');

        const sources: string[] = args.slice(0, -1);
        const destArg: string = args[args.length - 1];
        const dest: string = shell.path_resolve(destArg);
        const destIsDir: boolean = await isDirectory_check(dest);

        if (sources.length > 1 && !destIsDir) {
            return result_make(1, `mv: target '${destArg}' is not a directory`);
        }

        const failures: string[] = [];
        for (const source of sources) {
            const from: string = shell.path_resolve(source);
            const to: string = destIsDir ? path.join(dest, path.basename(from)) : dest;
            try {
                await node_move(from, to);
            } catch (error: unknown) {
                failures.push(`mv: cannot move '${source}' to '${destArg}': ${fsError_describe(error)}`);
            }
        }
        return result_make(failures.length > 0 ? 1 : 0, failures.join('\n'));
    }
};

/**
 * Rename, falling back to copy-and-delete across filesystems.
 */
async function node_move(from: string, to: string): Promise<void> {
    try {
        await fs.promises.rename(from, to);
    } catch (error: unknown) {
        if (errnoCode_get(error) !== 'EXDEV') throw error;
        await fs.promises.cp(from, to, { recursive: true, preserveTimestamps: true });
        await fs.promises.rm(from, { recursive: true });
    }
}
