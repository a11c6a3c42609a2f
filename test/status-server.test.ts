/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import request from 'supertest';
import type { ServerStatus } from '../src/game-server.js';
import { StatusServer } from '../src/status-server.js';

/**
 * Tests for the HTTP status endpoint.
 */
describe('StatusServer', function() {

    // Testing strategy
    //   GET /status: before and after the status changes
    //   GET /health
    //   start(), port, stop()

    let status: ServerStatus = { name: 'crossroads', phase: 'lobby', players: [ 'Player 1' ], capacity: 4, open: true };

    it('reports the current status', async function() {
        const server = new StatusServer(() => status, 0);
        const response = await request(server.app).get('/status').expect(200);
        assert.deepStrictEqual(response.body, { name: 'crossroads', phase: 'lobby', players: [ 'Player 1' ], capacity: 4, open: true });
        assert.strictEqual(response.headers['access-control-allow-origin'], '*');

        status = { ...status, phase: 'playing', open: false };
        const later = await request(server.app).get('/status').expect(200);
        assert.strictEqual(later.body.phase, 'playing');
        assert.strictEqual(later.body.open, false);
    });

    it('answers health checks', async function() {
        const server = new StatusServer(() => status, 0);
        const response = await request(server.app).get('/health').expect(200);
        assert.strictEqual(response.text, 'ok');
    });

    it('listens at a free port', async function() {
        const server = new StatusServer(() => status, 0);
        await server.start();
        assert(server.port > 0);
        server.stop();
        assert.throws(() => server.port);
    });
});
