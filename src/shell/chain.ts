/**
 * @file Chain Splitter
 *
 * Splits one input line into ordered chain links joined by `;` (sequence)
 * and `&&` (and). The scan is character-level so operators need no
 * surrounding whitespace (`mkdir a&&cd a`).
 *
 * Operators inside single or double quotes, or escaped with a backslash, do
 * not split: `echo "a;b"` is one link.
 *
 * @module
 */

import type { ChainLink, Joiner } from './types.js';

type Quote = '"' | "'";

/**
 * Split a raw line into chain links.
 *
 * Empty or whitespace-only segments are dropped. When an empty segment sits
 * between two operators the stricter joiner (`and`) is kept for the next link.
 *
 * @param line - Raw input line.
 * @returns Links in evaluation order; the first has a null joiner.
 */
export function chain_split(line: string): ChainLink[] {
    const links: ChainLink[] = [];
    let current: string = '';
    let pending: Joiner | null = null;
    let quote: Quote | null = null;
    let escaped: boolean = false;

    const link_close = (next: Joiner | null): void => {
        const text: string = current.trim();
        current = '';
        if (text) {
            links.push({ text, joiner: links.length === 0 ? null : pending });
            pending = next;
        } else if (next !== null && (pending === null || next === 'and')) {
            pending = next;
        }
    };

    for (let i = 0; i < line.length; i++) {
        const ch: string = line[i];

        if (escaped) {
            current += ch;
            escaped = false;
            continue;
        }
        if (ch === '\\' && quote !== "'") {
            escaped = true;
            current += ch;
            continue;
        }
        if (quote) {
            if (ch === quote) quote = null;
            current += ch;
            continue;
        }
        if (ch === '"' || ch === "'") {
            quote = ch;
            current += ch;
            continue;
        }
        if (ch === ';') {
            link_close('sequence');
            continue;
        }
        if (ch === '&' && line[i + 1] === '&') {
            link_close('and');
            i++;
            continue;
        }
        current += ch;
    }
    link_close(null);

    return links;
}
