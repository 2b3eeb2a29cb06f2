/**
 * @file Shell Error Types
 *
 * Failures that cross a module boundary inside the engine. Each is caught and
 * turned into a non-zero ShellResult before it can reach the embedding loop.
 *
 * @module
 */

/**
 * Malformed quoting or escaping in a sub-command.
 */
export class ParseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ParseError';
    }
}

/**
 * Usage or operand failure raised inside a builtin's own logic.
 * Dispatch reports it as `Error executing builtin '<name>': <message>`.
 */
export class BuiltinError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'BuiltinError';
    }
}

/**
 * Convert unknown thrown values into display-safe messages.
 */
export function errorMessage_get(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
