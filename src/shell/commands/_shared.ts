/**
 * Shared helpers for builtin command modules.
 *
 * Kept small so each builtin stays self-contained while sharing the way
 * filesystem failures are worded.
 */

import fs from 'fs';
import { errnoCode_get } from '../external.js';
import { errorMessage_get } from '../errors.js';

const ERRNO_TEXT: Record<string, string> = {
    ENOENT: 'No such file or directory',
    EEXIST: 'File exists',
    EISDIR: 'Is a directory',
    ENOTDIR: 'Not a directory',
    ENOTEMPTY: 'Directory not empty',
    EACCES: 'Permission denied',
    EPERM: 'Operation not permitted',
    EBUSY: 'Device or resource busy',
    EXDEV: 'Invalid cross-device link',
    EINVAL: 'Invalid argument',
    ELOOP: 'Too many levels of symbolic links',
    ENAMETOOLONG: 'File name too long',
    EROFS: 'Read-only file system',
    ENOSPC: 'No space left on device',
    ERR_FS_CP_EEXIST: 'File exists',
    ERR_FS_CP_EINVAL: 'cannot copy a directory into itself'
};

export { errorMessage_get };

/**
 * Describe a filesystem failure the way coreutils would (`No such file or
 * directory`), falling back to the raw message for unmapped codes.
 */
export function fsError_describe(error: unknown): string {
    const code: string | undefined = errnoCode_get(error);
    return (code && ERRNO_TEXT[code]) || errorMessage_get(error);
}

/**
 * `lstat` that reports absence as null instead of throwing.
 */
export async function lstat_try(target: string): Promise<fs.Stats | null> {
    try {
        return await fs.promises.lstat(target);
    } catch (error: unknown) {
        if (errnoCode_get(error) === 'ENOENT') return null;
        throw error;
    }
}

/**
 * Whether a path currently names a directory (following symlinks).
 */
export async function isDirectory_check(target: string): Promise<boolean> {
    try {
        return (await fs.promises.stat(target)).isDirectory();
    } catch {
        return false;
    }
}
