/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import process from 'node:process';
import readline from 'node:readline';
import { MessageBus } from './bus.js';
import { ClientSession, type ClientEvent } from './client-session.js';
import { clientConfig } from './config.js';
import { ServerMessageSchema } from './protocol.js';
import { QUIT_KEY } from './text-validator.js';
import { Connection, ConnectionClosedError } from './transport.js';

/**
 * Connect to a maze server and play from the terminal.
 *
 * Command-line usage:
 *     npm run client [HOST] [PORT]
 * where HOST defaults to localhost and PORT to 12800.
 *
 * Lines typed by the user and messages from the server both go through
 * one bus; this loop is the only code that prints or sends. Once the game
 * is over, the server closing the connection ends the client quietly.
 *
 * @throws Error if the arguments are invalid or the server cannot be reached
 */
async function main(): Promise<void> {
    const config = clientConfig(process.argv.slice(2));
    console.log(`connecting to ${config.host}:${config.port}...`);
    const connection = await Connection.connect(config.host, config.port);
    console.log('connected');

    const bus = new MessageBus<ClientEvent>();
    const input = readline.createInterface({ input: process.stdin });
    input.on('line', line => bus.push({ kind: 'input', line: line.toUpperCase() }));
    input.on('close', () => bus.push({ kind: 'error', message: 'input closed' }));
    receiveAll(connection, bus).catch((err: unknown) => bus.push(
        err instanceof ConnectionClosedError
            ? { kind: 'closed', reason: err.message }
            : { kind: 'error', message: `${err}` }
    ));

    const session = new ClientSession();
    console.log(`Type ${QUIT_KEY} to quit`);
    for (;;) {
        const reaction = session.handle(await bus.pop());
        for (const line of reaction.print) {
            console.log(line);
        }
        if (reaction.send !== undefined && !connection.closed) {
            connection.send([ 'command', reaction.send ]);
        }
        if (reaction.stop) {
            break;
        }
    }

    input.close();
    connection.close();
}

// forward server messages to the bus until the connection closes
async function receiveAll(connection: Connection, bus: MessageBus<ClientEvent>): Promise<void> {
    for (;;) {
        const parsed = ServerMessageSchema.safeParse(await connection.receive());
        if (parsed.success) {
            bus.push({ kind: 'server', message: parsed.data });
        } else {
            console.error(`ignored invalid message from the server: ${parsed.error.message}`);
        }
    }
}

await main();
