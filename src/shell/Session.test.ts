import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Session, directory_check } from './Session.js';

describe('Session', (): void => {
    let root: string;

    beforeEach((): void => {
        root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'conch-session-')));
    });

    afterEach((): void => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it('starts in the given directory', (): void => {
        const session: Session = new Session({ cwd: root, home: root });
        expect(session.cwd_get()).toBe(root);
        expect(session.home_get()).toBe(root);
    });

    it('refuses a missing directory at construction', (): void => {
        expect(() => new Session({ cwd: path.join(root, 'missing') })).toThrow('no such directory');
    });

    it('leaves the working directory unchanged on a failed change', (): void => {
        const session: Session = new Session({ cwd: root });
        fs.writeFileSync(path.join(root, 'file.txt'), 'x');

        expect(() => session.cwd_set(path.join(root, 'missing'))).toThrow(`no such directory: ${path.join(root, 'missing')}`);
        expect(() => session.cwd_set(path.join(root, 'file.txt'))).toThrow('no such directory');
        expect(session.cwd_get()).toBe(root);
    });

    it('canonicalizes through symlinks', (): void => {
        fs.mkdirSync(path.join(root, 'real'));
        fs.symlinkSync(path.join(root, 'real'), path.join(root, 'alias'));
        const session: Session = new Session({ cwd: root });

        session.cwd_set(path.join(root, 'alias'));
        expect(session.cwd_get()).toBe(path.join(root, 'real'));
    });

    it('appends history newest last and copies on read', (): void => {
        const seed: string[] = ['old'];
        const session: Session = new Session({ cwd: root, history: seed });
        session.history_append('ls');
        session.history_append('pwd');
        seed.push('mutated');

        const snapshot: string[] = session.history_get();
        snapshot.push('also mutated');

        expect(session.history_get()).toEqual(['old', 'ls', 'pwd']);
    });

    it('returns the most recent window oldest first', (): void => {
        const session: Session = new Session({ cwd: root, history: ['a', 'b', 'c', 'd'] });
        expect(session.history_window(2)).toEqual(['c', 'd']);
        expect(session.history_window(10)).toEqual(['a', 'b', 'c', 'd']);
    });
});

describe('directory_check', (): void => {
    it('is false for files and missing paths', (): void => {
        const file: string = path.join(os.tmpdir(), `conch-check-${process.pid}.txt`);
        fs.writeFileSync(file, '');
        try {
            expect(directory_check(file)).toBe(false);
            expect(directory_check(`${file}.missing`)).toBe(false);
            expect(directory_check(os.tmpdir())).toBe(true);
        } finally {
            fs.rmSync(file, { force: true });
        }
    });
});
