/**
 * @file Line Sources
 *
 * Where the REPL gets its input. The interactive source wraps readline
 * (history navigation, tab completion, Ctrl-C handling); the script source
 * replays a fixed list of lines, for piped input and tests.
 *
 * @module
 */

import * as readline from 'readline';
import fs from 'fs';

export interface LineSource {
    /**
     * Next raw line, or null once input has ended.
     */
    line_read(prompt: string): Promise<string | null>;
    close(): void;
}

/** Candidate names for completion, evaluated on each Tab press. */
export interface CompletionContext {
    builtins: () => string[];
    cwd: () => string;
}

/**
 * Complete the last word of a line.
 *
 * Builtin names are offered in command position only; entries of the
 * working directory are offered everywhere.
 *
 * @returns Sorted unique candidates and the word being completed.
 */
export function completions_resolve(line: string, builtins: string[], entries: string[]): [string[], string] {
    const words: string[] = line.split(/\s+/);
    const last: string = words[words.length - 1] ?? '';
    const commandPosition: boolean = words.length === 1;

    const pool: string[] = commandPosition ? [...builtins, ...entries] : entries;
    const hits: string[] = [...new Set(pool.filter((name: string): boolean => name.startsWith(last)))].sort();
    return [hits, last];
}

function entries_list(dir: string): string[] {
    try {
        return fs.readdirSync(dir);
    } catch {
        return [];
    }
}

export interface ReadlineSourceOptions {
    completion: CompletionContext;
    /** Seed entries, oldest first. */
    history: string[];
    historySize: number;
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
}

export class ReadlineSource implements LineSource {
    private readonly rl: readline.Interface;
    private closed: boolean = false;
    private pending: ((line: string | null) => void) | null = null;

    constructor(options: ReadlineSourceOptions) {
        const output: NodeJS.WritableStream = options.output ?? process.stdout;
        this.rl = readline.createInterface({
            input: options.input ?? process.stdin,
            output,
            completer: (line: string): [string[], string] =>
                completions_resolve(line, options.completion.builtins(), entries_list(options.completion.cwd())),
            // readline keeps history newest first
            history: [...options.history].reverse(),
            historySize: options.historySize
        });

        this.rl.on('close', (): void => {
            this.closed = true;
            const resolve = this.pending;
            this.pending = null;
            resolve?.(null);
        });

        this.rl.on('SIGINT', (): void => {
            this.rl.write(null, { ctrl: true, name: 'u' });
            output.write('^C\n');
            this.rl.prompt();
        });
    }

    public line_read(prompt: string): Promise<string | null> {
        if (this.closed) return Promise.resolve(null);
        return new Promise<string | null>((resolve: (line: string | null) => void): void => {
            this.pending = resolve;
            this.rl.question(prompt, (answer: string): void => {
                this.pending = null;
                resolve(answer);
            });
        });
    }

    public close(): void {
        if (!this.closed) this.rl.close();
    }
}

export class ScriptSource implements LineSource {
    private index: number = 0;
    private readonly lines: string[];

    constructor(lines: string[]) {
        this.lines = lines.map((line: string): string => line.replace(/\r$/, ''));
    }

    /**
     * Split a whole script into lines; a trailing newline does not add an
     * empty final line.
     */
    public static text_parse(text: string): ScriptSource {
        const lines: string[] = text.split('\n');
        if (lines[lines.length - 1] === '') lines.pop();
        return new ScriptSource(lines);
    }

    public async line_read(_prompt: string): Promise<string | null> {
        if (this.index >= this.lines.length) return null;
        return this.lines[this.index++];
    }

    public close(): void {
        this.index = this.lines.length;
    }
}
