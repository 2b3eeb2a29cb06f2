/**
 * `clear` / `cls` builtins. Output is the ANSI clear-screen sequence; the
 * terminal that prints it does the clearing.
 */

import { result_make } from '../types.js';
import type { BuiltinCommand, BuiltinHandler } from './types.js';

export const CLEAR_SEQUENCE: string = '\x1b[2J\x1b[H';

const clearScreen: BuiltinHandler = async () => result_make(0, CLEAR_SEQUENCE);

export const command: BuiltinCommand = {
    name: 'clear',
    usage: 'clear',
    create: () => clearScreen
};

export const clsCommand: BuiltinCommand = {
    name: 'cls',
    usage: 'cls',
    create: () => clearScreen
};
