/**
 * @file Shell Type Definitions
 *
 * Result and chain shapes shared by the engine, the builtins and the
 * embedding REPL.
 *
 * @module
 */

/**
 * Operator joining two chain links.
 *
 * - `sequence` (`;`): always run the next link.
 * - `and` (`&&`): run the next link only if the previous one succeeded.
 */
export type Joiner = 'sequence' | 'and';

/**
 * One sub-command of an input line, paired with the joiner that preceded it.
 * The first link of a chain has no preceding joiner.
 */
export interface ChainLink {
    text: string;
    joiner: Joiner | null;
}

/**
 * Status code plus combined textual output of one evaluation.
 */
export interface ShellResult {
    exitCode: number;
    output: string;
}

/**
 * Outcome of evaluating a line, a chain link or a builtin.
 *
 * `terminate` is produced only by `exit`/`quit` and must be handled
 * explicitly by every caller up to the embedding loop.
 */
export type ShellOutcome =
    | ({ kind: 'result' } & ShellResult)
    | { kind: 'terminate'; output: string };

/** Exit status reserved for "command not found" on external dispatch. */
export const EXIT_NOT_FOUND: number = 127;

/**
 * Build a normal result outcome.
 */
export function result_make(exitCode: number, output: string): ShellOutcome {
    return { kind: 'result', exitCode, output };
}
