/**
 * `mem` builtin: total, available and used memory.
 */

import { result_make } from '../types.js';
import type { BuiltinCommand } from './types.js';
import { memory_render, statsFailure_result, statsUnavailable_result } from './_stats.js';

export const command: BuiltinCommand = {
    name: 'mem',
    usage: 'mem',
    create: ({ stats }) => async () => {
        if (!stats.available) return statsUnavailable_result('mem', stats.reason);
        try {
            return result_make(0, memory_render(stats.provider.memory_sample()));
        } catch (error: unknown) {
            return statsFailure_result('mem', error);
        }
    }
};
