/**
 * @file Stats Capability Types
 *
 * System resource introspection is optional. Builtins receive a
 * `StatsCapability` and must degrade to an explanatory message when it is
 * the unavailable variant.
 *
 * @module
 */

export interface CpuSample {
    percent: number;
    cores: number;
}

export interface MemorySample {
    total: number;
    available: number;
    usedPercent: number;
}

export interface ProcessSample {
    pid: number;
    user: string;
    cpuPercent: number;
    name: string;
}

export interface StatsProvider {
    cpu_sample(): Promise<CpuSample>;
    memory_sample(): MemorySample;
    /**
     * Processes ranked by CPU percent, highest first.
     *
     * @param limit - Maximum number of entries returned.
     */
    processes_list(limit: number): ProcessSample[];
}

export type StatsCapability =
    | { available: true; provider: StatsProvider }
    | { available: false; reason: string };

export function statsUnavailable_make(reason: string): StatsCapability {
    return { available: false, reason };
}
