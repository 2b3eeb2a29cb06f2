/**
 * @file Natural-language Translator
 *
 * Maps a handful of plain-English phrasings onto shell command lines.
 * A fixed pattern list. The result is fed back into the engine as if typed;
 * an empty string means "could not interpret".
 *
 * @module
 */

/** Text in, command line (or empty string) out. */
export type Translator = (text: string) => string;

const NAME: string = '[\\w\\-.]+';

const CREATE_FOLDER: RegExp = new RegExp(`create (?:a )?(?:folder|directory) called (\\w[\\w\\-.]*)`);
const MOVE_INTO: RegExp = new RegExp(`move (${NAME}) into`);
const MOVE_TO: RegExp = new RegExp(`move (${NAME}) to ([\\w\\-/.]+)`);
const DELETE: RegExp = new RegExp(`delete (?:file )?(${NAME})`);

/**
 * Translate natural language into a command line.
 *
 * @example
 * nl_translate('Create a folder called test and move notes.txt into it');
 * // 'mkdir test && mv notes.txt test'
 */
export const nl_translate: Translator = (text: string): string => {
    const normalized: string = text.trim().toLowerCase();

    const folder: RegExpExecArray | null = CREATE_FOLDER.exec(normalized);
    if (folder) {
        const name: string = folder[1];
        const moved: RegExpExecArray | null = MOVE_INTO.exec(normalized);
        return moved ? `mkdir ${name} && mv ${moved[1]} ${name}` : `mkdir ${name}`;
    }

    const move: RegExpExecArray | null = MOVE_TO.exec(normalized);
    if (move) {
        return `mv ${move[1]} ${move[2]}`;
    }

    const remove: RegExpExecArray | null = DELETE.exec(normalized);
    if (remove) {
        return `rm ${remove[1]}`;
    }

    return '';
};
