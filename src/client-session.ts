/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import type { ServerMessage } from './protocol.js';
import { TextValidator } from './text-validator.js';

/** What the client loop reacts to. */
export type ClientEvent =
    | { readonly kind: 'input'; readonly line: string }
    | { readonly kind: 'server'; readonly message: ServerMessage }
    | { readonly kind: 'closed'; readonly reason: string }
    | { readonly kind: 'error'; readonly message: string };

/** What the client does about one event. */
export interface Reaction {
    /** lines to show the user */
    readonly print: readonly string[];
    /** command line to send to the server, if any */
    readonly send: string | undefined;
    /** true iff the client should disconnect and exit */
    readonly stop: boolean;
}

/**
 * Client side of one game: decides what to show, send and when to stop,
 * given the user's lines and the server's messages in the order they arrive.
 */
export class ClientSession {

    private readonly validator = new TextValidator();

    // Abstraction function:
    //   AF(validator) = a client session checking input against the schema
    //     held by validator, over once validator.gameOver
    // Representation invariant:
    //   true
    // Safety from rep exposure:
    //   validator is private and never returned

    /** @returns true iff the server ended the game */
    public get gameOver(): boolean {
        return this.validator.gameOver;
    }

    /**
     * @param event next event
     * @returns what to do about it
     */
    public handle(event: ClientEvent): Reaction {
        switch (event.kind) {
        case 'server': {
            const [ category, payload ] = event.message;
            if (category === 'display') {
                return reaction([ payload ?? '' ]);
            }
            if (category === 'end') {
                this.validator.endGame();
            } else {
                this.validator.configure(category, payload ?? '');
            }
            return reaction([]);
        }
        case 'closed':
            // the server closes every connection once the game is over
            return reaction(this.gameOver ? [] : [ event.reason ], undefined, true);
        case 'error':
            return reaction([ event.message ], undefined, true);
        case 'input': {
            const verdict = this.validator.check(event.line);
            switch (verdict.kind) {
            case 'quit':
                return reaction([], undefined, true);
            case 'valid':
                return reaction([], event.line);
            case 'invalid':
            case 'unconfigured':
                return reaction([ verdict.message ]);
            case 'ignored':
                return reaction([]);
            }
        }
        }
    }
}

function reaction(print: readonly string[], send: string | undefined = undefined, stop = false): Reaction {
    return { print, send, stop };
}
