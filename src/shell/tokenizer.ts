/**
 * @file Tokenizer
 *
 * POSIX-style word splitting for one sub-command:
 * - whitespace separates tokens outside quotes;
 * - `'...'` is literal;
 * - `"..."` groups, with `\` escaping only `$`, `` ` ``, `"`, `\` and newline;
 * - an unquoted `\` escapes the next character (`\<newline>` is a continuation).
 *
 * No variable expansion, globbing or operator recognition happens here.
 *
 * @module
 */

import { ParseError } from './errors.js';

const WHITESPACE: ReadonlySet<string> = new Set([' ', '\t', '\r', '\n']);
const DOUBLE_QUOTE_ESCAPABLE: ReadonlySet<string> = new Set(['$', '`', '"', '\\', '\n']);

type TokenizerState = 'plain' | 'single' | 'double';

/**
 * Split sub-command text into tokens.
 *
 * @param text - One chain link's text.
 * @returns Tokens in order; the first is the command name. Empty for blank input.
 * @throws ParseError on an unterminated quote or a trailing backslash.
 */
export function tokens_parse(text: string): string[] {
    const tokens: string[] = [];
    let state: TokenizerState = 'plain';
    let current: string = '';
    // A quoted empty string ("") still produces a token.
    let inToken: boolean = false;

    for (let i = 0; i < text.length; i++) {
        const ch: string = text[i];

        if (state === 'single') {
            if (ch === "'") {
                state = 'plain';
            } else {
                current += ch;
            }
            continue;
        }

        if (state === 'double') {
            if (ch === '"') {
                state = 'plain';
            } else if (ch === '\\') {
                const next: string | undefined = text[i + 1];
                if (next === undefined) {
                    throw new ParseError('No closing quotation');
                }
                if (DOUBLE_QUOTE_ESCAPABLE.has(next)) {
                    if (next !== '\n') current += next;
                    i++;
                } else {
                    current += ch;
                }
            } else {
                current += ch;
            }
            continue;
        }

        if (WHITESPACE.has(ch)) {
            if (inToken) {
                tokens.push(current);
                current = '';
                inToken = false;
            }
            continue;
        }

        if (ch === '\\') {
            const next: string | undefined = text[i + 1];
            if (next === undefined) {
                throw new ParseError('No escaped character');
            }
            i++;
            if (next === '\n') continue;
            current += next;
            inToken = true;
            continue;
        }

        inToken = true;
        if (ch === "'") {
            state = 'single';
        } else if (ch === '"') {
            state = 'double';
        } else {
            current += ch;
        }
    }

    if (state !== 'plain') {
        throw new ParseError('No closing quotation');
    }
    if (inToken) {
        tokens.push(current);
    }
    return tokens;
}
