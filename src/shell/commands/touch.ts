/**
 * `touch` builtin implementation.
 *
 * Creates each file if absent, otherwise bumps its access and modification
 * times. Unlike `rm` and `mkdir`, the first failing operand stops the call:
 * later operands are not attempted.
 */

import fs from 'fs';
import { result_make } from '../types.js';
import { BuiltinError } from '../errors.js';
import type { BuiltinCommand } from './types.js';
import { errnoCode_get } from '../external.js';
import { fsError_describe } from './_shared.js';

export const command: BuiltinCommand = {
    name: 'touch',
    usage: 'touch FILE...',
    create: () => async (args, shell) => {
        if (args.length === 0) throw new BuiltinError('missing operand');

        for (const file of args) {
            const resolved: string = shell.path_resolve(file);
            try {
                await node_touch(resolved);
            } catch (error: unknown) {
                return result_make(1, `touch: cannot touch '${file}': ${fsError_describe(error)}`);
            }
        }
        return result_make(0, '');
    }
};

/**
 * Bump timestamps of an existing path (file or directory), creating an
 * empty file only when nothing exists there.
 */
async function node_touch(resolved: string): Promise<void> {
    const now: Date = new Date();
    try {
        await fs.promises.utimes(resolved, now, now);
    } catch (error: unknown) {
        if (errnoCode_get(error) !== 'ENOENT') throw error;
        const handle = await fs.promises.open(resolved, 'a');
        await handle.close();
    }
}
