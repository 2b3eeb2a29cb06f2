import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Chalk } from 'chalk';
import { Shell } from '../shell/Shell.js';
import { Session } from '../shell/Session.js';
import { HistoryStore } from '../history/HistoryStore.js';
import { Logger } from '../logging/logger.js';
import { ScriptSource } from './LineSource.js';
import { prompt_render, repl_run } from './Repl.js';

describe('repl_run', () => {
    let root: string;
    let shell: Shell;
    let writes: string[];
    const write = (text: string): void => {
        writes.push(text);
    };

    beforeEach(() => {
        root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'conch-repl-')));
        shell = new Shell({ session: new Session({ cwd: root, home: root }) });
        writes = [];
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it('should stop at exit without reading further lines', async () => {
        const source: ScriptSource = new ScriptSource(['mkdir a', 'cd a', 'pwd', 'exit', 'echo never']);
        const status: number = await repl_run(shell, source, { write, color: false });

        expect(status).toBe(0);
        expect(writes).toEqual([path.join(root, 'a')]);
        expect(shell.session.history_get()).toEqual(['mkdir a', 'cd a', 'pwd', 'exit']);
    });

    it('should announce end of input and save history when interactive', async () => {
        const store: HistoryStore = new HistoryStore(path.join(root, 'history'));
        const status: number = await repl_run(shell, new ScriptSource(['echo hi']), { write, store, color: false, interactive: true });

        expect(status).toBe(0);
        expect(writes).toHaveLength(3);
        expect(writes[0]).toContain("type 'help' for commands");
        expect(writes.slice(1)).toEqual(['hi', '\nReceived EOF. Exiting.']);
        expect(fs.readFileSync(store.file, 'utf-8')).toBe('echo hi\n');
    });

    it('should say goodbye on exit when interactive', async () => {
        const store: HistoryStore = new HistoryStore(path.join(root, 'history'));
        await repl_run(shell, new ScriptSource(['quit']), { write, store, color: false, interactive: true });
        expect(writes[writes.length - 1]).toBe('Exiting conch. History saved.');
        expect(store.load()).toEqual(['quit']);
    });

    it('should return the status of the last line', async () => {
        const status: number = await repl_run(shell, new ScriptSource(['echo ok', 'doesnotexist123']), { write, color: false });
        expect(status).toBe(127);
        expect(writes).toEqual(['ok', 'doesnotexist123: command not found']);
    });

    it('should strip one trailing newline from output', async () => {
        fs.writeFileSync(path.join(root, 'x'), 'x\n');
        await repl_run(shell, new ScriptSource(['cat x']), { write, color: false });
        expect(writes).toEqual(['x']);
    });

    it('should warn instead of failing when history cannot be saved', async () => {
        const lines: string[] = [];
        const logger: Logger = new Logger({ color: false, sink: (line: string): void => { lines.push(line); } });
        const status: number = await repl_run(shell, new ScriptSource(['echo hi']), {
            write,
            color: false,
            logger,
            store: new HistoryStore(root)
        });

        expect(status).toBe(0);
        expect(lines).toHaveLength(1);
        expect(lines[0].startsWith(`WARN  [conch:repl] could not save history to ${root}: `)).toBe(true);
    });
});

describe('prompt_render', () => {
    const plain = new Chalk({ level: 0 });

    it('should show the basename of the working directory', () => {
        expect(prompt_render('/home/dev/project', plain)).toBe('project$ ');
    });

    it('should show / at the root', () => {
        expect(prompt_render('/', plain)).toBe('/$ ');
    });
});
