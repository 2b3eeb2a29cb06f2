import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { HistoryStore } from './HistoryStore.js';

describe('HistoryStore', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'conch-history-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should treat a missing file as empty history', () => {
        expect(new HistoryStore(path.join(dir, 'none')).load()).toEqual([]);
    });

    it('should save one entry per line and read them back', () => {
        const store: HistoryStore = new HistoryStore(path.join(dir, 'nested', 'history'));
        store.save(['ls', 'echo "a b"', 'cd ..']);

        expect(fs.readFileSync(store.file, 'utf-8')).toBe('ls\necho "a b"\ncd ..\n');
        expect(store.load()).toEqual(['ls', 'echo "a b"', 'cd ..']);
    });

    it('should keep only the newest entries on save', () => {
        const store: HistoryStore = new HistoryStore(path.join(dir, 'history'), 2);
        store.save(['a', 'b', 'c']);
        expect(fs.readFileSync(store.file, 'utf-8')).toBe('b\nc\n');
    });

    it('should keep only the newest entries on load', () => {
        const file: string = path.join(dir, 'history');
        fs.writeFileSync(file, '1\n2\n3\n4\n5\n');
        expect(new HistoryStore(file, 3).load()).toEqual(['3', '4', '5']);
    });

    it('should surface read failures other than a missing file', () => {
        expect(() => new HistoryStore(dir).load()).toThrow();
    });
});
