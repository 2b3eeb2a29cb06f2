/**
 * @file Shell: Command Execution Engine
 *
 * Evaluates one input line against a Session: splits it into a chain,
 * tokenizes each link, and dispatches to a builtin or to an external
 * program. The embedding code owns the read/print loop; the Shell never
 * reads stdin or writes a prompt.
 *
 * Every path ends in a ShellOutcome. Parse errors, builtin failures and
 * spawn failures become non-zero results; `exit`/`quit` produce the
 * terminate variant, which callers must handle explicitly.
 *
 * All methods follow the RPN naming convention: <subject>_<verb>.
 *
 * @module
 */

import { Session } from './Session.js';
import { chain_split } from './chain.js';
import { tokens_parse } from './tokenizer.js';
import { ParseError, errorMessage_get } from './errors.js';
import { external_run } from './external.js';
import { path_resolve } from './paths.js';
import { registry_create, usage_get, type BuiltinRegistry } from './commands/index.js';
import type { BuiltinHandler } from './commands/types.js';
import { result_make, type ChainLink, type ShellOutcome, type ShellResult } from './types.js';
import { statsUnavailable_make, type StatsCapability } from '../stats/types.js';
import { nl_translate, type Translator } from '../translate/translator.js';
import { logger_silent, type Logger } from '../logging/logger.js';

export interface ShellOptions {
    session?: Session;
    /** Defaults to the unavailable variant. */
    stats?: StatsCapability;
    translate?: Translator;
    logger?: Logger;
    /** Window rendered by `history`. */
    historyLimit?: number;
    /** Row cap for `ps` and `top`. */
    processLimit?: number;
}

export class Shell {
    public readonly session: Session;
    private readonly registry: BuiltinRegistry;
    private readonly log: Logger;

    constructor(options: ShellOptions = {}) {
        this.session = options.session ?? new Session();
        this.log = (options.logger ?? logger_silent()).child('engine');
        this.registry = registry_create({
            listCommands: (): string[] => this.builtins_list(),
            usageOf: usage_get,
            stats: options.stats ?? statsUnavailable_make('no stats provider configured'),
            translate: options.translate ?? nl_translate,
            historyLimit: options.historyLimit ?? 1000,
            processLimit: options.processLimit ?? 20
        });
    }

    /**
     * Whether a command name is handled by a builtin.
     */
    public isBuiltin(name: string): boolean {
        return this.registry.has(name);
    }

    /**
     * All registered builtin names, in registration order.
     */
    public builtins_list(): string[] {
        return [...this.registry.keys()];
    }

    /**
     * Resolve a user-supplied path against the session working directory.
     */
    public path_resolve(input: string): string {
        return path_resolve(input, this.session.cwd_get(), this.session.home_get());
    }

    // ─── Command Execution ──────────────────────────────────────

    /**
     * Execute one raw input line.
     *
     * Blank input is a no-op and is not recorded; anything else is appended
     * to history before evaluation.
     */
    public async command_execute(line: string): Promise<ShellOutcome> {
        if (!line.trim()) return result_make(0, '');
        this.session.history_append(line);
        return this.chain_execute(chain_split(line));
    }

    /**
     * Evaluate chain links left to right.
     *
     * A link joined by `and` is skipped, along with everything after it, when
     * the previous link failed. The last produced outcome is returned.
     */
    public async chain_execute(links: ChainLink[]): Promise<ShellOutcome> {
        let last: ShellOutcome = result_make(0, '');
        for (const link of links) {
            if (link.joiner === 'and' && last.kind === 'result' && last.exitCode !== 0) {
                this.log.debug(`short-circuit at '${link.text}' (status ${last.exitCode})`);
                break;
            }
            last = await this.link_execute(link.text);
            if (last.kind === 'terminate') return last;
        }
        return last;
    }

    /**
     * Tokenize and dispatch a single sub-command.
     */
    public async link_execute(text: string): Promise<ShellOutcome> {
        let tokens: string[];
        try {
            tokens = tokens_parse(text);
        } catch (error: unknown) {
            if (error instanceof ParseError) {
                return result_make(1, `Error parsing command: ${error.message}`);
            }
            throw error;
        }
        if (tokens.length === 0) return result_make(0, '');
        return this.tokens_dispatch(tokens);
    }

    private async tokens_dispatch(tokens: string[]): Promise<ShellOutcome> {
        const [name, ...args] = tokens;
        const handler: BuiltinHandler | undefined = this.registry.get(name);

        if (handler) {
            this.log.debug(`builtin ${name} [${args.join(', ')}]`);
            try {
                return await handler(args, this);
            } catch (error: unknown) {
                this.log.debug(`builtin ${name} failed: ${errorMessage_get(error)}`);
                return result_make(1, `Error executing builtin '${name}': ${errorMessage_get(error)}`);
            }
        }

        this.log.debug(`external ${name} in ${this.session.cwd_get()}`);
        const result: ShellResult = external_run(tokens, this.session.cwd_get());
        if (result.exitCode !== 0) {
            this.log.info(`${name} exited with status ${result.exitCode}`);
        }
        return { kind: 'result', ...result };
    }
}
