/**
 * @file Session State
 *
 * Owns the working directory and the command history of one interpreter run.
 *
 * The working directory always names an existing, readable directory: every
 * mutation goes through `cwd_set`, which validates and canonicalizes before
 * committing, so a failed change leaves the previous value in place.
 *
 * History is append-only while the session lives. Loading and saving it is
 * the job of a persistence collaborator (see `history/HistoryStore`).
 *
 * @module
 */

import fs from 'fs';
import os from 'os';

export interface SessionOptions {
    cwd?: string;
    home?: string;
    history?: string[];
}

/**
 * Whether a path names a directory the process can enter and list.
 */
export function directory_check(target: string): boolean {
    try {
        if (!fs.statSync(target).isDirectory()) return false;
        fs.accessSync(target, fs.constants.R_OK | fs.constants.X_OK);
        return true;
    } catch {
        return false;
    }
}

export class Session {
    private workingDirectory: string;
    private readonly homeDirectory: string;
    private readonly entries: string[];

    constructor(options: SessionOptions = {}) {
        this.homeDirectory = options.home ?? os.homedir();
        this.entries = [...(options.history ?? [])];
        this.workingDirectory = '';
        this.cwd_set(options.cwd ?? process.cwd());
    }

    /**
     * Current working directory (absolute, canonical).
     */
    public cwd_get(): string {
        return this.workingDirectory;
    }

    /**
     * Change the working directory.
     *
     * @param target - Absolute path of the new directory.
     * @throws Error when the target is not an existing readable directory.
     */
    public cwd_set(target: string): void {
        if (!directory_check(target)) {
            throw new Error(`no such directory: ${target}`);
        }
        this.workingDirectory = fs.realpathSync(target);
    }

    /**
     * Home directory used for `~` expansion and bare `cd`.
     */
    public home_get(): string {
        return this.homeDirectory;
    }

    /**
     * Record one raw input line, newest last.
     */
    public history_append(line: string): void {
        this.entries.push(line);
    }

    /**
     * Snapshot of the full history.
     */
    public history_get(): string[] {
        return [...this.entries];
    }

    /**
     * The most recent `limit` entries, oldest first.
     */
    public history_window(limit: number): string[] {
        return this.entries.slice(Math.max(0, this.entries.length - limit));
    }
}
