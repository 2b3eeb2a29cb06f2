/**
 * `cd` builtin implementation.
 *
 * With no operand changes to the home directory. The target must be an
 * existing directory; on failure the working directory is left unchanged.
 */

import { result_make } from '../types.js';
import type { BuiltinCommand } from './types.js';

export const command: BuiltinCommand = {
    name: 'cd',
    usage: 'cd [DIR]',
    create: () => async (args, shell) => {
        const target: string = shell.path_resolve(args[0] ?? shell.session.home_get());
        try {
            shell.session.cwd_set(target);
        } catch {
            return result_make(1, `cd: no such directory: ${target}`);
        }
        return result_make(0, '');
    }
};
