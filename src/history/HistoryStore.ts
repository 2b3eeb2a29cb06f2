/**
 * @file History Persistence
 *
 * Saves and restores session history as newline-delimited raw lines,
 * keeping only the most recent entries.
 *
 * @module
 */

import fs from 'fs';
import path from 'path';
import { errnoCode_get } from '../shell/external.js';

export class HistoryStore {
    constructor(
        public readonly file: string,
        private readonly limit: number = 1000
    ) {}

    /**
     * Read persisted entries, oldest first. A missing file is an empty history.
     *
     * @throws Error for any read failure other than a missing file.
     */
    public load(): string[] {
        let content: string;
        try {
            content = fs.readFileSync(this.file, 'utf-8');
        } catch (error: unknown) {
            if (errnoCode_get(error) === 'ENOENT') return [];
            throw error;
        }
        const lines: string[] = content.split('\n');
        if (lines[lines.length - 1] === '') lines.pop();
        return lines.slice(Math.max(0, lines.length - this.limit));
    }

    /**
     * Write the newest `limit` entries, one per line.
     */
    public save(entries: string[]): void {
        const kept: string[] = entries.slice(Math.max(0, entries.length - this.limit));
        fs.mkdirSync(path.dirname(this.file), { recursive: true });
        fs.writeFileSync(this.file, kept.map((entry: string): string => `${entry}\n`).join(''), 'utf-8');
    }
}
