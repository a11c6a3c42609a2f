/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import net from 'node:net';
import {
    Connection, ConnectionClosedError, decodePayload, encodeFrame, MalformedPayloadError,
    MAX_PAYLOAD_LENGTH, PayloadTooLargeError, splitFrames,
} from '../src/transport.js';
import '../src/promise-resolvers.js';

/**
 * Tests for message framing and connections.
 */
describe('transport', function() {

    // Testing strategy
    //   encodeFrame(): small message, message too large
    //   splitFrames(): no complete frame, several frames, frame split in the middle
    //   decodePayload(): JSON, not JSON
    //   Connection: messages both ways, frame arriving in pieces, peer closing

    this.timeout(5000);

    it('prefixes payloads with their length', function() {
        const frame = encodeFrame([ 'display', 'hi' ]);
        assert.deepStrictEqual([...frame.subarray(0, 3)], [ 0, 0, 16 ]);
        assert.strictEqual(frame.subarray(3).toString(), '["display","hi"]');
    });

    it('rejects messages too large for a frame', function() {
        assert.throws(() => encodeFrame('a'.repeat(MAX_PAYLOAD_LENGTH)), PayloadTooLargeError);
    });

    it('splits complete frames off a stream', function() {
        const first = encodeFrame([ 'command', 'N' ]);
        const second = encodeFrame([ 'command', 'S2' ]);
        const stream = Buffer.concat([ first, second ]);

        const whole = splitFrames(stream);
        assert.deepStrictEqual(whole.payloads.map(payload => payload.toString()), [ '["command","N"]', '["command","S2"]' ]);
        assert.strictEqual(whole.rest.length, 0);

        const cut = splitFrames(stream.subarray(0, first.length + 5));
        assert.deepStrictEqual(cut.payloads.map(payload => payload.toString()), [ '["command","N"]' ]);
        assert.strictEqual(cut.rest.length, 5);

        assert.strictEqual(splitFrames(Buffer.from([ 0, 0 ])).payloads.length, 0);
    });

    it('decodes JSON payloads only', function() {
        assert.deepStrictEqual(decodePayload(Buffer.from('["end",null]')), [ 'end', null ]);
        assert.throws(() => decodePayload(Buffer.from('{oops')), MalformedPayloadError);
    });

    describe('Connection', function() {

        let server: net.Server;
        let accepted: Promise<net.Socket>;
        let port: number;

        beforeEach(async function() {
            const { promise, resolve } = Promise.withResolvers<net.Socket>();
            accepted = promise;
            server = net.createServer(socket => resolve(socket));
            await new Promise<void>(resolve => server.listen(0, 'localhost', resolve));
            const address = server.address();
            assert(address !== null && typeof address !== 'string');
            port = address.port;
        });

        afterEach(async function() {
            await new Promise<void>(resolve => server.close(() => resolve()));
        });

        it('carries messages both ways', async function() {
            const client = await Connection.connect('localhost', port);
            const peer = new Connection(await accepted);

            client.send([ 'command', 'N3' ]);
            assert.deepStrictEqual(await peer.receive(), [ 'command', 'N3' ]);
            peer.send([ 'display', 'It is your turn.' ]);
            peer.send([ 'end', null ]);
            assert.deepStrictEqual(await client.receive(), [ 'display', 'It is your turn.' ]);
            assert.deepStrictEqual(await client.receive(), [ 'end', null ]);

            client.close();
            peer.close();
        });

        it('reassembles frames that arrive in pieces', async function() {
            const client = await Connection.connect('localhost', port);
            const socket = await accepted;
            const frame = encodeFrame([ 'command', 'PS' ]);
            socket.write(frame.subarray(0, 2));
            await new Promise<void>(resolve => setTimeout(resolve, 20));
            socket.write(frame.subarray(2));
            assert.deepStrictEqual(await client.receive(), [ 'command', 'PS' ]);
            client.close();
            socket.destroy();
        });

        it('reports a closed peer after the last message', async function() {
            const client = await Connection.connect('localhost', port);
            const peer = new Connection(await accepted);
            peer.send([ 'end', null ]);
            peer.close();
            assert.deepStrictEqual(await client.receive(), [ 'end', null ]);
            await assert.rejects(client.receive(), ConnectionClosedError);
            assert(client.closed);
            assert.throws(() => client.send([ 'command', 'N' ]), ConnectionClosedError);
        });

        it('reports payloads that are not JSON', async function() {
            const client = await Connection.connect('localhost', port);
            const socket = await accepted;
            socket.write(Buffer.from([ 0, 0, 3, 0x7b, 0x7b, 0x7b ]));
            await assert.rejects(client.receive(), MalformedPayloadError);
            client.close();
            socket.destroy();
        });

        it('fails to connect to a closed port', async function() {
            const closed = port;
            await new Promise<void>(resolve => server.close(() => resolve()));
            server = net.createServer();
            await new Promise<void>(resolve => server.listen(0, 'localhost', resolve));
            await assert.rejects(Connection.connect('localhost', closed), ConnectionClosedError);
        });
    });
});
