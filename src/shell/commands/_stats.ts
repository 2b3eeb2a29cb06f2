/**
 * Rendering shared by the system statistics builtins (`cpu`, `mem`, `ps`,
 * `top`).
 */

import { result_make, type ShellOutcome } from '../types.js';
import type { CpuSample, MemorySample, ProcessSample } from '../../stats/types.js';
import { errorMessage_get } from './_shared.js';

export function statsUnavailable_result(name: string, reason: string): ShellOutcome {
    return result_make(1, `${name}: system statistics unavailable (${reason})`);
}

/**
 * Same as `statsUnavailable_result`, for a provider call that threw.
 */
export function statsFailure_result(name: string, error: unknown): ShellOutcome {
    return statsUnavailable_result(name, errorMessage_get(error));
}

export function cpu_render(sample: CpuSample): string {
    return `CPU percent: ${sample.percent}%\nCores: ${sample.cores}`;
}

export function memory_render(sample: MemorySample): string {
    return [
        `Total: ${sample.total} bytes`,
        `Available: ${sample.available} bytes`,
        `Used%: ${sample.usedPercent}%`
    ].join('\n');
}

export function processes_render(samples: ProcessSample[]): string {
    const lines: string[] = ['PID\tUSER\tCPU%\tNAME'];
    for (const p of samples) {
        lines.push(`${p.pid}\t${p.user}\t${p.cpuPercent}\t${p.name}`);
    }
    return lines.join('\n');
}
