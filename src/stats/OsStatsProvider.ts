/**
 * @file OS-backed Stats Provider
 *
 * CPU and memory figures come from the `os` module; the process snapshot
 * comes from `ps`, executed directly like any other external program.
 *
 * @module
 */

import { spawnSync, type SpawnSyncReturns } from 'child_process';
import os from 'os';
import { setTimeout as sleep_ms } from 'timers/promises';
import type { CpuSample, MemorySample, ProcessSample, StatsCapability, StatsProvider } from './types.js';

/** Runs `ps` and returns its stdout; injectable for tests. */
export type PsRunner = () => string;

export interface OsStatsOptions {
    /** Interval between the two CPU time snapshots. */
    sampleMs: number;
    psRunner?: PsRunner;
}

interface CpuTimes {
    idle: number;
    total: number;
}

function round_1(value: number): number {
    return Math.round(value * 10) / 10;
}

function cpuTimes_read(): CpuTimes {
    let idle: number = 0;
    let total: number = 0;
    for (const cpu of os.cpus()) {
        const t = cpu.times;
        idle += t.idle;
        total += t.user + t.nice + t.sys + t.idle + t.irq;
    }
    return { idle, total };
}

/**
 * Default `ps` invocation: one process per line, no header.
 */
export function ps_run(): string {
    const child: SpawnSyncReturns<string> = spawnSync('ps', ['-eo', 'pid=,user=,pcpu=,comm='], {
        encoding: 'utf-8',
        windowsHide: true
    });
    if (child.error) {
        throw new Error(`process listing requires ps: ${child.error.message}`);
    }
    if (child.status !== 0) {
        throw new Error(`ps exited with status ${String(child.status)}: ${child.stderr.trim()}`);
    }
    return child.stdout;
}

/**
 * Parse `ps -eo pid=,user=,pcpu=,comm=` output. Command names may contain
 * spaces, so everything after the third column is the name.
 */
export function psOutput_parse(stdout: string): ProcessSample[] {
    const samples: ProcessSample[] = [];
    for (const line of stdout.split('\n')) {
        const fields: string[] = line.trim().split(/\s+/);
        if (fields.length < 4) continue;
        const pid: number = Number.parseInt(fields[0], 10);
        const cpuPercent: number = Number.parseFloat(fields[2]);
        if (!Number.isFinite(pid) || !Number.isFinite(cpuPercent)) continue;
        samples.push({ pid, user: fields[1], cpuPercent, name: fields.slice(3).join(' ') });
    }
    return samples;
}

export class OsStatsProvider implements StatsProvider {
    private readonly sampleMs: number;
    private readonly psRunner: PsRunner;

    constructor(options: OsStatsOptions) {
        this.sampleMs = options.sampleMs;
        this.psRunner = options.psRunner ?? ps_run;
    }

    public async cpu_sample(): Promise<CpuSample> {
        const before: CpuTimes = cpuTimes_read();
        await sleep_ms(this.sampleMs);
        const after: CpuTimes = cpuTimes_read();

        const totalDelta: number = after.total - before.total;
        const idleDelta: number = after.idle - before.idle;
        const percent: number = totalDelta > 0 ? round_1(100 * (1 - idleDelta / totalDelta)) : 0;
        return { percent, cores: os.cpus().length };
    }

    public memory_sample(): MemorySample {
        const total: number = os.totalmem();
        const available: number = os.freemem();
        return { total, available, usedPercent: round_1(((total - available) / total) * 100) };
    }

    public processes_list(limit: number): ProcessSample[] {
        return psOutput_parse(this.psRunner())
            .sort((a: ProcessSample, b: ProcessSample): number => b.cpuPercent - a.cpuPercent)
            .slice(0, limit);
    }
}

/**
 * Probe the host and wrap an `OsStatsProvider` as a capability.
 */
export function statsCapability_detect(options: OsStatsOptions): StatsCapability {
    if (os.cpus().length === 0) {
        return { available: false, reason: 'the operating system reports no CPU information' };
    }
    return { available: true, provider: new OsStatsProvider(options) };
}
