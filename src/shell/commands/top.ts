/**
 * `top` builtin: one snapshot of the process table followed by memory usage.
 */

import { result_make } from '../types.js';
import type { BuiltinCommand } from './types.js';
import { memory_render, processes_render, statsFailure_result, statsUnavailable_result } from './_stats.js';

export const command: BuiltinCommand = {
    name: 'top',
    usage: 'top',
    create: ({ stats, processLimit }) => async () => {
        if (!stats.available) return statsUnavailable_result('top', stats.reason);
        try {
            const processes: string = processes_render(stats.provider.processes_list(processLimit));
            return result_make(0, `${processes}\n\n${memory_render(stats.provider.memory_sample())}`);
        } catch (error: unknown) {
            return statsFailure_result('top', error);
        }
    }
};
