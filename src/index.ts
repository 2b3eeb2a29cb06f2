/**
 * @file conch public API
 *
 * Embedding entry points: construct a Shell (optionally around your own
 * Session and capabilities) and call `command_execute` per line.
 *
 * @module
 */

export { Shell, type ShellOptions } from './shell/Shell.js';
export { Session, directory_check, type SessionOptions } from './shell/Session.js';
export { chain_split } from './shell/chain.js';
export { tokens_parse } from './shell/tokenizer.js';
export { path_resolve, home_expand } from './shell/paths.js';
export { external_run } from './shell/external.js';
export { ParseError, BuiltinError } from './shell/errors.js';
export { COMMANDS, registry_create, type BuiltinRegistry } from './shell/commands/index.js';
export type { BuiltinCommand, BuiltinDeps, BuiltinHandler } from './shell/commands/types.js';
export { EXIT_NOT_FOUND, result_make, type ChainLink, type Joiner, type ShellOutcome, type ShellResult } from './shell/types.js';
export { OsStatsProvider, statsCapability_detect } from './stats/OsStatsProvider.js';
export { statsUnavailable_make, type StatsCapability, type StatsProvider } from './stats/types.js';
export { nl_translate, type Translator } from './translate/translator.js';
export { HistoryStore } from './history/HistoryStore.js';
export { settings_load, settingsSources_describe, SettingsError, type ShellSettings } from './config/settings.js';
export { Logger, logger_silent, type LogLevel } from './logging/logger.js';
export { repl_run } from './cli/Repl.js';
export { ReadlineSource, ScriptSource, type LineSource } from './cli/LineSource.js';
