/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

/** Input that quits the client, wherever it appears in a line. */
export const QUIT_KEY = 'Q';

/** Shown when a line is typed before the server sent a validation schema. */
export const NO_SCHEMA_MESSAGE = 'no validation schema received from the server';

/**
 * Verdict on a line typed by the user:
 *  - `quit`: the line contains the quit key
 *  - `valid`: the line may be sent to the server
 *  - `invalid`: the line does not match the schema; `message` is the server's error text
 *  - `unconfigured`: no schema has been received yet
 *  - `ignored`: the game is over and the line is not the quit key
 */
export type Validation =
    | { readonly kind: 'quit' }
    | { readonly kind: 'valid' }
    | { readonly kind: 'invalid'; readonly message: string }
    | { readonly kind: 'unconfigured'; readonly message: string }
    | { readonly kind: 'ignored' };

/**
 * Checks user input against the schema the server sent.
 *
 * While the game runs, a line is valid iff the whole line matches the
 * schema. Once the game is over, only the quit key is accepted.
 */
export class TextValidator {

    private schema: RegExp | undefined;
    private errorText = '';
    private over = false;

    /**
     * Apply a setting sent by the server.
     *
     * @param category `validation_schema` to set the regular expression lines must
     *        fully match, `validation_error` to set the text shown when they do not
     * @param value the setting
     * @throws SyntaxError if a schema is not a valid regular expression
     */
    public configure(category: 'validation_schema' | 'validation_error', value: string): void {
        if (category === 'validation_schema') {
            this.schema = new RegExp(`^(?:${value})$`);
        } else {
            this.errorText = value;
        }
    }

    /** Only accept the quit key from now on. */
    public endGame(): void {
        this.over = true;
    }

    /** @returns true iff endGame() was called */
    public get gameOver(): boolean {
        return this.over;
    }

    /**
     * @param input a line typed by the user, upper-cased
     * @returns the verdict on `input`
     */
    public check(input: string): Validation {
        if (input.includes(QUIT_KEY)) {
            return { kind: 'quit' };
        }
        if (this.over) {
            return { kind: 'ignored' };
        }
        if (this.schema === undefined) {
            return { kind: 'unconfigured', message: NO_SCHEMA_MESSAGE };
        }
        return this.schema.test(input) ? { kind: 'valid' } : { kind: 'invalid', message: this.errorText };
    }
}
