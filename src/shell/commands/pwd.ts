/**
 * `pwd` builtin implementation.
 */

import { result_make } from '../types.js';
import type { BuiltinCommand } from './types.js';

export const command: BuiltinCommand = {
    name: 'pwd',
    usage: 'pwd',
    create: () => async (_args, shell) => result_make(0, shell.session.cwd_get())
};
