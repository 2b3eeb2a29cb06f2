/**
 * @file Diagnostic Logger
 *
 * Leveled logger for interpreter diagnostics. Lines go to a sink (stderr by
 * default) and never into command output.
 *
 * @module
 */

import { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Destination for rendered log lines. */
export type LogSink = (line: string) => void;

export interface LoggerOptions {
    level?: LogLevel;
    color?: boolean;
    scope?: string;
    sink?: LogSink;
}

const RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

type EmitLevel = Exclude<LogLevel, 'silent'>;

export class Logger {
    private readonly level: LogLevel;
    private readonly color: boolean;
    private readonly scope: string;
    private readonly sink: LogSink;
    private readonly chalk: ChalkInstance;

    constructor(options: LoggerOptions = {}) {
        this.level = options.level ?? 'warn';
        this.color = options.color ?? true;
        this.scope = options.scope ?? 'conch';
        this.sink = options.sink ?? ((line: string): void => console.error(line));
        this.chalk = new Chalk({ level: this.color ? 1 : 0 });
    }

    /**
     * Derive a logger that shares level and sink under a sub-scope.
     */
    public child(scope: string): Logger {
        return new Logger({
            level: this.level,
            color: this.color,
            scope: `${this.scope}:${scope}`,
            sink: this.sink
        });
    }

    public enabled(level: EmitLevel): boolean {
        return RANK[level] >= RANK[this.level];
    }

    public debug(message: string): void { this.emit('debug', message); }
    public info(message: string): void { this.emit('info', message); }
    public warn(message: string): void { this.emit('warn', message); }
    public error(message: string): void { this.emit('error', message); }

    private emit(level: EmitLevel, message: string): void {
        if (!this.enabled(level)) return;
        const tag: string = `${level.toUpperCase().padEnd(5)} [${this.scope}]`;
        this.sink(`${this.tone(level, tag)} ${message}`);
    }

    private tone(level: EmitLevel, text: string): string {
        switch (level) {
            case 'error': return this.chalk.red(text);
            case 'warn':  return this.chalk.yellow(text);
            case 'info':  return this.chalk.white(text);
            case 'debug': return this.chalk.dim(text);
        }
    }
}

/**
 * Logger that drops everything; the default for embedded engines and tests.
 */
export function logger_silent(): Logger {
    return new Logger({ level: 'silent', color: false, sink: (): void => undefined });
}
