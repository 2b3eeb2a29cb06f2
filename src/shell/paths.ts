/**
 * @file Path Resolver
 *
 * Turns a user-supplied path plus the session working directory into a
 * normalized absolute path. Pure: never touches the filesystem.
 *
 * @module
 */

import path from 'path';

/**
 * Expand a leading `~` or `~/` to the home directory.
 *
 * `~user` forms are left untouched.
 */
export function home_expand(input: string, home: string): string {
    if (input === '~') return home;
    if (input.startsWith('~/')) return path.join(home, input.slice(2));
    return input;
}

/**
 * Resolve a path string against a working directory.
 *
 * @param input - Path as typed by the user (absolute, relative or `~`-prefixed).
 * @param cwd - Absolute working directory of the session.
 * @param home - Absolute home directory used for `~` expansion.
 * @returns Absolute path with `.` and `..` segments collapsed.
 */
export function path_resolve(input: string, cwd: string, home: string): string {
    return path.resolve(cwd, home_expand(input, home));
}
