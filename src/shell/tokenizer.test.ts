import { describe, it, expect } from 'vitest';
import { tokens_parse } from './tokenizer.js';
import { ParseError } from './errors.js';

describe('tokens_parse', (): void => {
    it('groups double-quoted words', (): void => {
        expect(tokens_parse('echo "a b" c')).toEqual(['echo', 'a b', 'c']);
    });

    it('splits on runs of spaces and tabs', (): void => {
        expect(tokens_parse('  ls \t -la   /tmp ')).toEqual(['ls', '-la', '/tmp']);
    });

    it('joins adjacent quoted and bare parts', (): void => {
        expect(tokens_parse(`echo 'it''s' pre"fix"`)).toEqual(['echo', 'its', 'prefix']);
    });

    it('keeps backslashes literal inside single quotes', (): void => {
        expect(tokens_parse(`printf 'a\\nb'`)).toEqual(['printf', 'a\\nb']);
    });

    it('honors escapes inside double quotes', (): void => {
        expect(tokens_parse('echo "say \\"hi\\""')).toEqual(['echo', 'say "hi"']);
        expect(tokens_parse('echo "x\\y"')).toEqual(['echo', 'x\\y']);
    });

    it('escapes the next character outside quotes', (): void => {
        expect(tokens_parse('cat my\\ file.txt')).toEqual(['cat', 'my file.txt']);
    });

    it('treats backslash-newline as a continuation', (): void => {
        expect(tokens_parse('a \\\n b')).toEqual(['a', 'b']);
    });

    it('produces an empty token for an empty quoted string', (): void => {
        expect(tokens_parse('"" x')).toEqual(['', 'x']);
    });

    it('returns no tokens for blank input', (): void => {
        expect(tokens_parse('   ')).toEqual([]);
    });

    it('rejects an unterminated double quote', (): void => {
        expect(() => tokens_parse('echo "oops')).toThrow(ParseError);
        expect(() => tokens_parse('echo "oops')).toThrow('No closing quotation');
    });

    it('rejects an unterminated single quote', (): void => {
        expect(() => tokens_parse(`echo 'oops`)).toThrow('No closing quotation');
    });

    it('rejects a trailing backslash', (): void => {
        expect(() => tokens_parse('echo \\')).toThrow('No escaped character');
    });
});
