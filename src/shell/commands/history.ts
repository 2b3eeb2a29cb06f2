/**
 * `history` builtin implementation.
 *
 * Renders the most recent entries (up to the configured limit), numbered
 * from 1 within that window, oldest first.
 */

import { result_make } from '../types.js';
import type { BuiltinCommand } from './types.js';

export const command: BuiltinCommand = {
    name: 'history',
    usage: 'history',
    create: ({ historyLimit }) => async (_args, shell) => {
        const lines: string[] = shell.session.history_window(historyLimit).map(
            (entry: string, index: number): string => `${index + 1}  ${entry}`
        );
        return result_make(0, lines.join('\n'));
    }
};
