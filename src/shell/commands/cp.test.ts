import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Shell } from '../Shell.js';
import { Session } from '../Session.js';
import type { ShellOutcome } from '../types.js';

describe('Builtin: cp', () => {
    let work: string;
    let shell: Shell;

    function at(relative: string): string {
        return path.join(work, relative);
    }

    beforeEach(() => {
        work = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'conch-cp-')));
        shell = new Shell({ session: new Session({ cwd: work, home: work }) });
        fs.writeFileSync(at('a.txt'), 'alpha');
        fs.mkdirSync(at('tree'));
        fs.writeFileSync(at('tree/inner.txt'), 'inner');
    });

    afterEach(() => {
        fs.rmSync(work, { recursive: true, force: true });
    });

    it('should copy a file to a new name', async () => {
        const result: ShellOutcome = await shell.command_execute('cp a.txt b.txt');
        expect(result).toEqual({ kind: 'result', exitCode: 0, output: '' });
        expect(fs.readFileSync(at('b.txt'), 'utf-8')).toBe('alpha');
        expect(fs.readFileSync(at('a.txt'), 'utf-8')).toBe('alpha');
    });

    it('should copy into an existing directory', async () => {
        fs.mkdirSync(at('dest'));
        expect(await shell.command_execute('cp a.txt tree dest')).toEqual({ kind: 'result', exitCode: 0, output: '' });
        expect(fs.readFileSync(at('dest/a.txt'), 'utf-8')).toBe('alpha');
        expect(fs.readFileSync(at('dest/tree/inner.txt'), 'utf-8')).toBe('inner');
    });

    it('should copy a directory tree to a new path', async () => {
        expect(await shell.command_execute('cp tree copy')).toEqual({ kind: 'result', exitCode: 0, output: '' });
        expect(fs.readFileSync(at('copy/inner.txt'), 'utf-8')).toBe('inner');
    });

    it('should not merge a directory into an existing one of the same name', async () => {
        fs.mkdirSync(at('dest/tree'), { recursive: true });

        expect(await shell.command_execute('cp tree dest')).toEqual({
            kind: 'result',
            exitCode: 1,
            output: "cp: cannot copy 'tree': File exists"
        });
        expect(fs.readdirSync(at('dest/tree'))).toEqual([]);
    });

    it('should not copy a directory over an existing file', async () => {
        fs.writeFileSync(at('taken'), 'x');
        expect(await shell.command_execute('cp tree taken')).toEqual({
            kind: 'result',
            exitCode: 1,
            output: "cp: cannot copy 'tree': File exists"
        });
        expect(fs.readFileSync(at('taken'), 'utf-8')).toBe('x');
    });

    it('should keep modification times', async () => {
        const past: Date = new Date('2001-02-03T04:05:06Z');
        fs.utimesSync(at('a.txt'), past, past);
        await shell.command_execute('cp a.txt b.txt');
        expect(fs.statSync(at('b.txt')).mtimeMs).toBe(fs.statSync(at('a.txt')).mtimeMs);
    });

    it('should refuse several sources with a non-directory target', async () => {
        expect(await shell.command_execute('cp a.txt tree nope')).toEqual({
            kind: 'result',
            exitCode: 1,
            output: "cp: target 'nope' is not a directory"
        });
        expect(fs.existsSync(at('nope'))).toBe(false);
    });

    it('should report a missing source', async () => {
        expect(await shell.command_execute('cp missing.txt out.txt')).toEqual({
            kind: 'result',
            exitCode: 1,
            output: "cp: cannot stat 'missing.txt': No such file or directory"
        });
    });

    it('should refuse to copy a file onto itself', async () => {
        expect(await shell.command_execute('cp a.txt a.txt')).toEqual({
            kind: 'result',
            exitCode: 1,
            output: "cp: 'a.txt' and 'a.txt' are the same file"
        });
    });
});
