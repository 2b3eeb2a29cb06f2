/**
 * @file conch CLI arguments
 *
 * @module
 */

export const USAGE: string = 'usage: conch [--config FILE] [--no-history] [-c LINE]';

export interface CliOptions {
    configPath?: string;
    noHistory: boolean;
    command: string | null;
    help: boolean;
}

export type CliParseResult =
    | { ok: true; options: CliOptions }
    | { ok: false; error: string };

/**
 * Parse command-line arguments.
 */
export function cliArgs_parse(args: string[]): CliParseResult {
    const options: CliOptions = { noHistory: false, command: null, help: false };
    for (let i = 0; i < args.length; i++) {
        const arg: string = args[i];
        if (arg === '--config' || arg === '-c') {
            const value: string | undefined = args[i + 1];
            if (value === undefined) {
                return { ok: false, error: `conch: option requires an argument -- '${arg}'` };
            }
            if (arg === '--config') options.configPath = value;
            else options.command = value;
            i++;
        } else if (arg === '--no-history') {
            options.noHistory = true;
        } else if (arg === '-h' || arg === '--help') {
            options.help = true;
        } else {
            return { ok: false, error: `conch: unrecognized argument '${arg}'` };
        }
    }
    return { ok: true, options };
}
