/**
 * `exit` / `quit` builtins. Both end the session through the terminate
 * outcome; saving history is left to the embedding loop.
 */

import type { BuiltinCommand, BuiltinHandler } from './types.js';

const terminate: BuiltinHandler = async () => ({ kind: 'terminate', output: '' });

export const command: BuiltinCommand = {
    name: 'exit',
    usage: 'exit',
    create: () => terminate
};

export const quitCommand: BuiltinCommand = {
    name: 'quit',
    usage: 'quit',
    create: () => terminate
};
