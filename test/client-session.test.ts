/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import { ClientSession } from '../src/client-session.js';

/**
 * Tests for the client's reactions to input and server messages.
 */
describe('ClientSession', function() {

    // Testing strategy
    //   server messages: display, schema and error text, end
    //   input: valid, invalid, before any schema, quit key, after end
    //   connection closed: during the game, after end
    //   input closed

    function playing(): ClientSession {
        const session = new ClientSession();
        session.handle({ kind: 'server', message: [ 'validation_schema', '[NSEO]+' ] });
        session.handle({ kind: 'server', message: [ 'validation_error', 'This input is not valid!' ] });
        return session;
    }

    it('shows displayed text', function() {
        assert.deepStrictEqual(new ClientSession().handle({ kind: 'server', message: [ 'display', 'It is your turn.' ] }),
            { print: [ 'It is your turn.' ], send: undefined, stop: false });
    });

    it('sends valid lines and reports invalid ones', function() {
        const session = playing();
        assert.deepStrictEqual(session.handle({ kind: 'input', line: 'NE' }), { print: [], send: 'NE', stop: false });
        assert.deepStrictEqual(session.handle({ kind: 'input', line: 'X' }),
            { print: [ 'This input is not valid!' ], send: undefined, stop: false });
    });

    it('sends nothing before a schema arrives', function() {
        assert.deepStrictEqual(new ClientSession().handle({ kind: 'input', line: 'N' }),
            { print: [ 'no validation schema received from the server' ], send: undefined, stop: false });
    });

    it('stops on the quit key', function() {
        assert.deepStrictEqual(playing().handle({ kind: 'input', line: 'Q' }), { print: [], send: undefined, stop: true });
    });

    it('reports a connection closed during the game', function() {
        assert.deepStrictEqual(playing().handle({ kind: 'closed', reason: 'connection closed by peer' }),
            { print: [ 'connection closed by peer' ], send: undefined, stop: true });
    });

    it('stops quietly when the server closes after the end of the game', function() {
        const session = playing();
        assert.deepStrictEqual(session.handle({ kind: 'server', message: [ 'end', null ] }), { print: [], send: undefined, stop: false });
        assert(session.gameOver);
        assert.deepStrictEqual(session.handle({ kind: 'input', line: 'N' }), { print: [], send: undefined, stop: false });
        assert.deepStrictEqual(session.handle({ kind: 'closed', reason: 'connection closed by peer' }),
            { print: [], send: undefined, stop: true });
    });

    it('stops when input closes', function() {
        assert.deepStrictEqual(playing().handle({ kind: 'error', message: 'input closed' }),
            { print: [ 'input closed' ], send: undefined, stop: true });
    });
});
