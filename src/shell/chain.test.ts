import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { chain_split } from './chain.js';
import type { ChainLink } from './types.js';

describe('chain_split', (): void => {
    it('returns a single trimmed link when there are no operators', (): void => {
        expect(chain_split('  ls -la  ')).toEqual([{ text: 'ls -la', joiner: null }]);
    });

    it('records && against the link it precedes', (): void => {
        expect(chain_split('mkdir a && mv x a')).toEqual([
            { text: 'mkdir a', joiner: null },
            { text: 'mv x a', joiner: 'and' }
        ]);
    });

    it('splits on ; as sequence', (): void => {
        expect(chain_split('touch f1 ; touch f2')).toEqual([
            { text: 'touch f1', joiner: null },
            { text: 'touch f2', joiner: 'sequence' }
        ]);
    });

    it('needs no whitespace around operators', (): void => {
        expect(chain_split('a&&b;c')).toEqual([
            { text: 'a', joiner: null },
            { text: 'b', joiner: 'and' },
            { text: 'c', joiner: 'sequence' }
        ]);
    });

    it('has one more link than operators between non-empty segments', (): void => {
        const links: ChainLink[] = chain_split('a ; b && c ; d');
        expect(links.map((l: ChainLink): string => l.text)).toEqual(['a', 'b', 'c', 'd']);
        expect(links.map((l: ChainLink): string | null => l.joiner)).toEqual([null, 'sequence', 'and', 'sequence']);
    });

    it('does not split inside quotes', (): void => {
        expect(chain_split(`echo "a;b" && echo 'c&&d'`)).toEqual([
            { text: 'echo "a;b"', joiner: null },
            { text: `echo 'c&&d'`, joiner: 'and' }
        ]);
    });

    it('does not split on an escaped semicolon', (): void => {
        expect(chain_split('echo a\\;b')).toEqual([{ text: 'echo a\\;b', joiner: null }]);
    });

    it('keeps a single & as text', (): void => {
        expect(chain_split('a & b')).toEqual([{ text: 'a & b', joiner: null }]);
    });

    it('drops empty links', (): void => {
        expect(chain_split(';; a ;')).toEqual([{ text: 'a', joiner: null }]);
        expect(chain_split('')).toEqual([]);
        expect(chain_split('   ')).toEqual([]);
    });

    it('keeps the stricter joiner across an empty link', (): void => {
        expect(chain_split('a && ; b')).toEqual([
            { text: 'a', joiner: null },
            { text: 'b', joiner: 'and' }
        ]);
        expect(chain_split('a ; && b')).toEqual([
            { text: 'a', joiner: null },
            { text: 'b', joiner: 'and' }
        ]);
    });

    it('treats any operator-free line as exactly one link', (): void => {
        fc.assert(
            fc.property(
                fc.string().filter((s: string): boolean => !s.includes(';') && !s.includes('&&') && s.trim() !== ''),
                (line: string): void => {
                    expect(chain_split(line)).toEqual([{ text: line.trim(), joiner: null }]);
                }
            )
        );
    });
});
