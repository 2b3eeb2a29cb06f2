import type { BuiltinCommand, BuiltinDeps, BuiltinHandler } from './types.js';
import { command as ls } from './ls.js';
import { command as pwd } from './pwd.js';
import { command as cd } from './cd.js';
import { command as mkdir } from './mkdir.js';
import { command as rm } from './rm.js';
import { command as rmdir } from './rmdir.js';
import { command as cat } from './cat.js';
import { command as echo } from './echo.js';
import { command as touch } from './touch.js';
import { command as mv } from './mv.js';
import { command as cp } from './cp.js';
import { command as history } from './history.js';
import { command as help } from './help.js';
import { command as exit, quitCommand as quit } from './exit.js';
import { command as clear, clsCommand as cls } from './clear.js';
import { command as cpu } from './cpu.js';
import { command as mem } from './mem.js';
import { command as ps } from './ps.js';
import { command as top } from './top.js';
import { command as nlp } from './nlp.js';

/** The closed set of builtins, fixed at build time. */
export const COMMANDS: readonly BuiltinCommand[] = [
    ls,
    pwd,
    cd,
    mkdir,
    rm,
    rmdir,
    cat,
    echo,
    touch,
    mv,
    cp,
    history,
    help,
    exit,
    quit,
    clear,
    cls,
    cpu,
    mem,
    ps,
    top,
    nlp
];

export type BuiltinRegistry = ReadonlyMap<string, BuiltinHandler>;

/**
 * Build the builtin handler registry for shell dispatch.
 *
 * @param deps - Shared dependencies injected into each builtin factory.
 * @returns Command-name keyed handler registry.
 * @throws Error if two builtins share a name.
 */
export function registry_create(deps: BuiltinDeps): BuiltinRegistry {
    const registry: Map<string, BuiltinHandler> = new Map();
    for (const command of COMMANDS) {
        if (registry.has(command.name)) {
            throw new Error(`duplicate builtin name: ${command.name}`);
        }
        registry.set(command.name, command.create(deps));
    }
    return registry;
}

/**
 * Usage line of a builtin, if it exists.
 */
export function usage_get(name: string): string | undefined {
    return COMMANDS.find((command: BuiltinCommand): boolean => command.name === name)?.usage;
}
