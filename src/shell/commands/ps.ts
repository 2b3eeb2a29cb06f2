/**
 * `ps` builtin: processes ranked by CPU, capped at the configured count.
 */

import { result_make } from '../types.js';
import type { BuiltinCommand } from './types.js';
import { processes_render, statsFailure_result, statsUnavailable_result } from './_stats.js';

export const command: BuiltinCommand = {
    name: 'ps',
    usage: 'ps',
    create: ({ stats, processLimit }) => async () => {
        if (!stats.available) return statsUnavailable_result('ps', stats.reason);
        try {
            return result_make(0, processes_render(stats.provider.processes_list(processLimit)));
        } catch (error: unknown) {
            return statsFailure_result('ps', error);
        }
    }
};
