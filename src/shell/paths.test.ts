import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import path from 'path';
import { home_expand, path_resolve } from './paths.js';

const HOME: string = '/home/dev';
const CWD: string = '/home/dev/work';

describe('path_resolve', (): void => {
    it('joins relative paths to the working directory', (): void => {
        expect(path_resolve('docs', CWD, HOME)).toBe('/home/dev/work/docs');
    });

    it('collapses dot segments', (): void => {
        expect(path_resolve('../x', CWD, HOME)).toBe('/home/dev/x');
        expect(path_resolve('/etc/./conf/../passwd', CWD, HOME)).toBe('/etc/passwd');
    });

    it('expands a leading tilde', (): void => {
        expect(path_resolve('~', CWD, HOME)).toBe('/home/dev');
        expect(path_resolve('~/notes/../a', CWD, HOME)).toBe('/home/dev/a');
    });

    it('leaves ~user forms as relative names', (): void => {
        expect(path_resolve('~bob/x', CWD, HOME)).toBe('/home/dev/work/~bob/x');
    });

    it('drops trailing separators', (): void => {
        expect(path_resolve('dir/', CWD, HOME)).toBe('/home/dev/work/dir');
    });

    it('resolves the empty string to the working directory', (): void => {
        expect(path_resolve('', CWD, HOME)).toBe(CWD);
    });

    it('always yields an absolute path without dot segments', (): void => {
        const segment = fc.constantFrom('a', 'b', '.', '..', '~', 'c.txt');
        fc.assert(
            fc.property(fc.array(segment, { minLength: 1, maxLength: 8 }), fc.boolean(), (parts: string[], absolute: boolean): void => {
                const input: string = (absolute ? '/' : '') + parts.join('/');
                const resolved: string = path_resolve(input, CWD, HOME);
                expect(path.isAbsolute(resolved)).toBe(true);
                const segments: string[] = resolved.split('/').slice(1);
                expect(segments.includes('.') || segments.includes('..')).toBe(false);
            })
        );
    });
});

describe('home_expand', (): void => {
    it('only rewrites ~ and ~/', (): void => {
        expect(home_expand('~', HOME)).toBe(HOME);
        expect(home_expand('~/a', HOME)).toBe('/home/dev/a');
        expect(home_expand('a/~', HOME)).toBe('a/~');
    });
});
