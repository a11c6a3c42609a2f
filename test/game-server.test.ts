/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import { GameServer } from '../src/game-server.js';
import { Maze } from '../src/maze.js';
import { ServerMessageSchema, type ServerMessage } from '../src/protocol.js';
import { Connection, ConnectionClosedError } from '../src/transport.js';

/**
 * Tests for the game server, over loopback connections.
 */
describe('GameServer', function() {

    // Testing strategy
    //   lobby: player welcomed, player refused because the maze is full
    //   game: started by a player, won by a move, ended by a departure
    //   status: before and after the game

    this.timeout(5000);

    // starts (2,1), (3,1) and (2,0); the first player starts next to the exit
    const SMALL = 'OO OO\nOU  O\nOOOOO';
    const first = (): number => 0;

    /** @returns messages received up to and including the first one `until` accepts */
    async function receiveUntil(connection: Connection, until: (message: ServerMessage) => boolean): Promise<ServerMessage[]> {
        const messages: ServerMessage[] = [];
        for (;;) {
            const message = ServerMessageSchema.parse(await connection.receive());
            messages.push(message);
            if (until(message)) {
                return messages;
            }
        }
    }

    const displaying = (text: string) => ([ category, payload ]: ServerMessage): boolean => category === 'display' && payload === text;

    it('welcomes players, plays a game and stops', async function() {
        const server = new GameServer(new Maze(SMALL, { name: 'test', random: first }), 0);
        await server.start();
        assert.deepStrictEqual(server.status, { name: 'test', phase: 'lobby', players: [], capacity: 3, open: true });
        const game = server.run();

        const alice = await Connection.connect('localhost', server.port);
        assert.deepStrictEqual(await receiveUntil(alice, displaying('Enter C to start:')), [
            [ 'display', '' ],
            [ 'display', 'Welcome, Player 1.' ],
            [ 'display', 'You are playing in the maze \'test\'.' ],
            [ 'display', 'OO OO\nOU  O\nOOOOO\n' ],
            [ 'validation_schema', '[C]' ],
            [ 'validation_error', 'Input error.' ],
            [ 'display', 'Enter C to start:' ],
        ]);
        const bob = await Connection.connect('localhost', server.port);
        await receiveUntil(bob, displaying('Enter C to start:'));
        assert.deepStrictEqual(server.status.players, [ 'Player 1', 'Player 2' ]);

        alice.send([ 'command', 'C' ]);
        const started = await receiveUntil(alice, displaying('It is your turn.'));
        assert.deepStrictEqual(started[0], [ 'validation_schema', '((([NSEO])([0-9]*))|(([MP])([NSEO])))+' ]);
        assert(started.some(displaying('OO OO\nOUXxO\nOOOOO\n')));
        await receiveUntil(bob, displaying('It is Player 1\'s turn.'));
        assert.strictEqual(server.status.phase, 'playing');
        assert.strictEqual(server.status.open, false);

        // Player 1 starts next to the exit
        alice.send([ 'command', 'O' ]);
        const won = await receiveUntil(alice, ([ category ]) => category === 'end');
        assert.deepStrictEqual(won.slice(-2), [ [ 'display', 'You won the game!' ], [ 'end', null ] ]);
        const lost = await receiveUntil(bob, ([ category ]) => category === 'end');
        assert.deepStrictEqual(lost.slice(-2), [ [ 'display', 'Player 1 won the game!' ], [ 'end', null ] ]);

        const winner = await game;
        assert.strictEqual(winner?.name, 'Player 1');
        assert.strictEqual(server.status.phase, 'finished');
        await assert.rejects(alice.receive(), ConnectionClosedError);
        await assert.rejects(bob.receive(), ConnectionClosedError);
    });

    it('refuses players once the maze is full and ends when everybody left', async function() {
        // a single start, at (2,1)
        const server = new GameServer(new Maze('OOOO\nOU O\nOOOO', { name: 'tiny', random: first }), 0);
        await server.start();
        const game = server.run();

        const alice = await Connection.connect('localhost', server.port);
        await receiveUntil(alice, displaying('Enter C to start:'));
        assert.strictEqual(server.status.open, false);

        const bob = await Connection.connect('localhost', server.port);
        await assert.rejects(bob.receive(), ConnectionClosedError);

        alice.send([ 'command', 'C' ]);
        await receiveUntil(alice, displaying('It is your turn.'));
        alice.close();

        assert.strictEqual(await game, null);
        assert.strictEqual(server.status.phase, 'finished');
        assert.deepStrictEqual(server.status.players, []);
    });

    it('ignores commands before the game starts', async function() {
        const server = new GameServer(new Maze(SMALL, { name: 'test', random: first }), 0);
        await server.start();
        const game = server.run();

        const alice = await Connection.connect('localhost', server.port);
        await receiveUntil(alice, displaying('Enter C to start:'));
        alice.send([ 'command', 'N' ]);
        alice.send([ 'command', 'c' ]);
        const started = await receiveUntil(alice, displaying('It is your turn.'));
        assert.deepStrictEqual(started[2], [ 'display', 'The game begins! You are 1 players.' ]);

        alice.close();
        assert.strictEqual(await game, null);
    });
});
