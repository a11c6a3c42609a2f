/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import net from 'node:net';
import './promise-resolvers.js';
import type { Deferred } from './promise-resolvers.js';

/*
 * Message framing over a stream socket: every message is a 3-byte big-endian
 * payload length followed by the payload, the message as UTF-8 JSON.
 */

/** Bytes in a frame header. */
export const HEADER_LENGTH = 3;

/** Largest payload a frame can carry, in bytes. */
export const MAX_PAYLOAD_LENGTH = 2 ** (8 * HEADER_LENGTH) - 1;

/** The peer closed the connection, or the socket failed. */
export class ConnectionClosedError extends Error {
    public override readonly name = 'ConnectionClosedError';
}

/** A frame whose payload is not JSON. */
export class MalformedPayloadError extends Error {
    public override readonly name = 'MalformedPayloadError';
}

/** A message too large to fit in a frame. */
export class PayloadTooLargeError extends Error {
    public override readonly name = 'PayloadTooLargeError';
}

/**
 * @param message value to send; must be serializable to JSON
 * @returns header and payload of the frame carrying `message`
 * @throws PayloadTooLargeError if the payload exceeds MAX_PAYLOAD_LENGTH bytes
 */
export function encodeFrame(message: unknown): Buffer {
    const payload = Buffer.from(JSON.stringify(message), 'utf8');
    if (payload.length > MAX_PAYLOAD_LENGTH) {
        throw new PayloadTooLargeError(`payload of ${payload.length} bytes exceeds ${MAX_PAYLOAD_LENGTH} bytes`);
    }
    const header = Buffer.alloc(HEADER_LENGTH);
    header.writeUIntBE(payload.length, 0, HEADER_LENGTH);
    return Buffer.concat([ header, payload ]);
}

/**
 * Split complete frames off the front of a byte stream.
 *
 * @param buffer bytes received so far
 * @returns payloads of the complete frames at the front of `buffer`, and the bytes after them
 */
export function splitFrames(buffer: Buffer): { payloads: Buffer[]; rest: Buffer } {
    const payloads: Buffer[] = [];
    let offset = 0;
    while (buffer.length - offset >= HEADER_LENGTH) {
        const length = buffer.readUIntBE(offset, HEADER_LENGTH);
        const end = offset + HEADER_LENGTH + length;
        if (buffer.length < end) {
            break;
        }
        payloads.push(buffer.subarray(offset + HEADER_LENGTH, end));
        offset = end;
    }
    return { payloads, rest: buffer.subarray(offset) };
}

/**
 * @param payload frame payload
 * @returns the message it carries
 * @throws MalformedPayloadError if `payload` is not JSON
 */
export function decodePayload(payload: Buffer): unknown {
    try {
        const message: unknown = JSON.parse(payload.toString('utf8'));
        return message;
    } catch (err) {
        throw new MalformedPayloadError(`malformed payload: ${err}`);
    }
}

/**
 * A framed, message-oriented connection over a socket.
 *
 * Messages are received in the order they were sent. receive() may be
 * awaited by one caller at a time.
 */
export class Connection {

    private buffered: Buffer = Buffer.alloc(0);
    private readonly payloads: Buffer[] = [];
    private waiter: Deferred<Buffer> | undefined;
    private failure: ConnectionClosedError | undefined;

    // Abstraction function:
    //   AF(socket, buffered, payloads, waiter, failure) = a connection to the
    //     peer of socket, whose received and unread messages are payloads
    //     followed by the partial frame in buffered; closed iff failure is defined
    // Representation invariant:
    //   - waiter is defined only if payloads is empty and failure is undefined
    //   - buffered never holds a complete frame
    // Safety from rep exposure:
    //   all fields are private; receive() returns freshly decoded messages

    /**
     * Wrap a connected socket. The connection takes over the socket's
     * `data`, `end`, `close` and `error` events.
     *
     * @param socket connected socket
     */
    public constructor(private readonly socket: net.Socket) {
        socket.on('data', (chunk: Buffer) => this.onData(chunk));
        socket.on('end', () => this.fail(new ConnectionClosedError('connection closed by peer')));
        socket.on('close', () => this.fail(new ConnectionClosedError('connection closed')));
        socket.on('error', (err: Error) => this.fail(new ConnectionClosedError(`connection failed: ${err.message}`)));
    }

    /**
     * Open a connection to a server.
     *
     * @param host server host name or address
     * @param port server port
     * @returns (a promise for) the open connection
     * @throws ConnectionClosedError if the connection cannot be opened
     */
    public static connect(host: string, port: number): Promise<Connection> {
        const { promise, resolve, reject } = Promise.withResolvers<Connection>();
        const socket = net.connect(port, host);
        const refuse = (err: Error): void => reject(new ConnectionClosedError(`cannot connect to ${host}:${port}: ${err.message}`));
        socket.once('error', refuse);
        socket.once('connect', () => {
            socket.off('error', refuse);
            resolve(new Connection(socket));
        });
        return promise;
    }

    private checkRep(): void {
        assert(this.waiter === undefined || (this.payloads.length === 0 && this.failure === undefined));
    }

    private onData(chunk: Buffer): void {
        const { payloads, rest } = splitFrames(Buffer.concat([ this.buffered, chunk ]));
        this.buffered = rest;
        for (const payload of payloads) {
            const waiter = this.waiter;
            if (waiter !== undefined) {
                this.waiter = undefined;
                waiter.resolve(payload);
            } else {
                this.payloads.push(payload);
            }
        }
        this.checkRep();
    }

    private fail(failure: ConnectionClosedError): void {
        this.failure ??= failure;
        const waiter = this.waiter;
        this.waiter = undefined;
        waiter?.reject(this.failure);
        this.checkRep();
    }

    /** @returns true iff the connection is closed; messages already received can still be read */
    public get closed(): boolean {
        return this.failure !== undefined;
    }

    /**
     * Wait for the next message.
     *
     * @returns (a promise for) the next message from the peer
     * @throws ConnectionClosedError if the connection is closed and every received message has been read
     * @throws MalformedPayloadError if the next frame does not carry JSON; the frame is dropped
     */
    public async receive(): Promise<unknown> {
        assert(this.waiter === undefined, 'receive() is already waiting');
        let payload = this.payloads.shift();
        if (payload === undefined) {
            if (this.failure !== undefined) {
                throw this.failure;
            }
            this.waiter = Promise.withResolvers<Buffer>();
            this.checkRep();
            payload = await this.waiter.promise;
        }
        return decodePayload(payload);
    }

    /**
     * Send a message.
     *
     * @param message value to send; must be serializable to JSON
     * @throws ConnectionClosedError if the connection is closed
     * @throws PayloadTooLargeError if the message does not fit in a frame
     */
    public send(message: unknown): void {
        if (this.failure !== undefined || this.socket.destroyed) {
            throw this.failure ?? new ConnectionClosedError('connection closed');
        }
        this.socket.write(encodeFrame(message));
    }

    /**
     * Close the connection once pending messages have been sent,
     * without waiting for the peer to close its side.
     */
    public close(): void {
        this.socket.end(() => this.socket.destroy());
    }

    /** @returns "address:port" of the peer, for logs */
    public get peer(): string {
        return `${this.socket.remoteAddress ?? 'unknown'}:${this.socket.remotePort ?? 0}`;
    }
}
