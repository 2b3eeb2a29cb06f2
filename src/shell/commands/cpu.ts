/**
 * `cpu` builtin: overall CPU utilisation and logical core count.
 */

import { result_make } from '../types.js';
import type { BuiltinCommand } from './types.js';
import { cpu_render, statsFailure_result, statsUnavailable_result } from './_stats.js';

export const command: BuiltinCommand = {
    name: 'cpu',
    usage: 'cpu',
    create: ({ stats }) => async () => {
        if (!stats.available) return statsUnavailable_result('cpu', stats.reason);
        try {
            return result_make(0, cpu_render(await stats.provider.cpu_sample()));
        } catch (error: unknown) {
            return statsFailure_result('cpu', error);
        }
    }
};
