/**
 * `echo` builtin implementation. Joins its arguments with single spaces.
 */

import { result_make } from '../types.js';
import type { BuiltinCommand } from './types.js';

export const command: BuiltinCommand = {
    name: 'echo',
    usage: 'echo [ARG ...]',
    create: () => async (args) => result_make(0, args.join(' '))
};
