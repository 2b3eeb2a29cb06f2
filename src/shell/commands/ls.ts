/**
 * `ls` builtin implementation.
 *
 * Lists entries sorted by name, directories marked with a trailing `/`.
 * An entry that cannot be inspected gets its own error line; the rest of the
 * listing is still produced. With several operands each directory is printed
 * under a `name:` header.
 */

import fs from 'fs';
import path from 'path';
import { result_make } from '../types.js';
import type { BuiltinCommand } from './types.js';
import { fsError_describe } from './_shared.js';

interface Listing {
    ok: boolean;
    isDirectory: boolean;
    text: string;
}

export const command: BuiltinCommand = {
    name: 'ls',
    usage: 'ls [PATH ...]',
    create: () => async (args, shell) => {
        const targets: string[] = args.length > 0 ? args : ['.'];
        const sections: string[] = [];
        let failed: boolean = false;

        for (const target of targets) {
            const listing: Listing = await listing_render(target, shell.path_resolve(target));
            if (!listing.ok) failed = true;
            sections.push(targets.length > 1 && listing.isDirectory ? `${target}:\n${listing.text}` : listing.text);
        }

        return result_make(failed ? 1 : 0, sections.join(targets.length > 1 ? '\n\n' : '\n'));
    }
};

/**
 * Render one operand: a directory's sorted entries, or a file's own name.
 */
async function listing_render(target: string, resolved: string): Promise<Listing> {
    let stats: fs.Stats;
    try {
        stats = await fs.promises.stat(resolved);
    } catch (error: unknown) {
        return { ok: false, isDirectory: false, text: `ls: cannot access '${target}': ${fsError_describe(error)}` };
    }
    if (!stats.isDirectory()) {
        return { ok: true, isDirectory: false, text: target };
    }

    let names: string[];
    try {
        names = await fs.promises.readdir(resolved);
    } catch (error: unknown) {
        return { ok: false, isDirectory: true, text: `ls: cannot open directory '${target}': ${fsError_describe(error)}` };
    }

    const lines: string[] = [];
    for (const name of names.sort()) {
        try {
            const entry: fs.Stats = await fs.promises.stat(path.join(resolved, name));
            lines.push(entry.isDirectory() ? `${name}/` : name);
        } catch (error: unknown) {
            lines.push(`ls: cannot access '${name}': ${fsError_describe(error)}`);
        }
    }
    return { ok: true, isDirectory: true, text: lines.join('\n') };
}
