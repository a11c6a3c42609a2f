/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import net from 'node:net';
import { MessageBus } from './bus.js';
import { ConnectionListener } from './listener.js';
import { quiet, type DebugLog } from './config.js';
import type { Maze, Phase } from './maze.js';
import type { ClientId, Player } from './player.js';
import type { Envelope, OutboundCategory } from './protocol.js';
import { Connection, ConnectionClosedError } from './transport.js';
import './promise-resolvers.js';

/** Command line that starts the game from the lobby. */
export const START_KEY = 'C';

/** What the server tells about itself, e.g. to the status endpoint. */
export interface ServerStatus {
    readonly name: string;
    readonly phase: Phase;
    /** names of the players, the next one to play first */
    readonly players: readonly string[];
    /** largest number of players the maze takes */
    readonly capacity: number;
    /** true iff a new player would be welcomed */
    readonly open: boolean;
}

/**
 * TCP server that plays one maze game.
 *
 * Every accepted connection gets a listener, which forwards the client's
 * messages onto a bus. run() is the only consumer of the bus and the only
 * code that touches the maze: it plays the game one envelope at a time and
 * sends what the maze produces to the clients.
 */
export class GameServer {

    private readonly acceptor: net.Server;
    private readonly bus: MessageBus<Envelope> = new MessageBus();
    private readonly connections: Map<ClientId, Connection> = new Map();
    private accepted = 0;
    private published: ServerStatus;

    /**
     * Make a new game server for a maze. The server owns the maze from now on.
     *
     * @param maze maze to play, in the lobby phase
     * @param requestedPort port to listen at, 0 for any free port
     * @param host interface to listen on
     * @param debug where commands and dropped messages are traced
     */
    public constructor(
        private readonly maze: Maze,
        private readonly requestedPort: number,
        private readonly host: string = 'localhost',
        private readonly debug: DebugLog = quiet
    ) {
        this.published = this.snapshot();
        this.acceptor = net.createServer(socket => this.accept(socket));
    }

    private snapshot(): ServerStatus {
        return Object.freeze({
            name: this.maze.name,
            phase: this.maze.phase,
            players: Object.freeze(this.maze.players().map(player => player.name)),
            capacity: this.maze.starts.length,
            open: this.maze.isOpen(),
        });
    }

    private accept(socket: net.Socket): void {
        if (!this.published.open) {
            console.log(`refused connection from ${socket.remoteAddress}:${socket.remotePort}`);
            socket.destroy();
            return;
        }
        const index = ++this.accepted;
        const clientId = `client-${index}`;
        const connection = new Connection(socket);
        this.connections.set(clientId, connection);
        console.log(`${clientId} connected from ${connection.peer}`);
        const listener = new ConnectionListener(clientId, `Player ${index}`, connection, this.bus, this.debug);
        listener.run().catch((err: unknown) => console.error(`${clientId} listener failed: ${err}`));
    }

    /**
     * Start listening.
     *
     * @returns (a promise that) resolves when the server is listening
     * @throws Error if the server cannot listen at the requested port
     */
    public start(): Promise<void> {
        const { promise, resolve, reject } = Promise.withResolvers<void>();
        this.acceptor.once('error', reject);
        this.acceptor.listen(this.requestedPort, this.host, () => {
            this.acceptor.off('error', reject);
            console.log(`maze '${this.maze.name}' now listening at ${this.host}:${this.port}`);
            resolve();
        });
        return promise;
    }

    /**
     * @returns the actual port the server is listening at. Requires that
     *          start() has already been called and completed.
     */
    public get port(): number {
        const address = this.acceptor.address() ?? 'not connected';
        if (typeof(address) === 'string') {
            throw new Error('server is not listening at a port');
        }
        return address.port;
    }

    /** Status as of the last envelope handled. */
    public get status(): ServerStatus {
        return this.published;
    }

    /**
     * Play the game: welcome players until one of them starts the game, play
     * it until it is finished, then tell every player who won and stop the
     * server.
     *
     * @returns (a promise for) the winner, or null if there is none
     */
    public async run(): Promise<Player | null> {
        while (this.maze.phase === 'lobby') {
            this.inLobby(await this.bus.pop());
            this.flush();
            this.published = this.snapshot();
        }
        console.log(`game started with ${this.maze.players().length} players`);
        while (this.maze.phase === 'playing') {
            this.inGame(await this.bus.pop());
            this.flush();
            this.published = this.snapshot();
        }
        this.maze.finish();
        this.flush();
        const winner = this.maze.winner;
        console.log(winner === null ? 'game over, nobody won' : `game over, ${winner.name} won`);
        await this.stop();
        this.published = this.snapshot();
        return winner;
    }

    private inLobby(envelope: Envelope): void {
        switch (envelope.category) {
        case 'new_player': {
            const player = this.maze.welcome(envelope.sender, envelope.payload);
            this.flush();
            if (player === null) {
                this.refuse(envelope.sender, 'The maze is full.');
                return;
            }
            console.log(`${player.name} joined the lobby`);
            this.send(envelope.sender, 'validation_schema', `[${START_KEY}]`);
            this.send(envelope.sender, 'validation_error', 'Input error.');
            this.send(envelope.sender, 'display', `Enter ${START_KEY} to start:`);
            return;
        }
        case 'left':
            this.depart(envelope.sender);
            return;
        case 'command':
            if (this.maze.player(envelope.sender) !== undefined && envelope.payload.trim().toUpperCase() === START_KEY) {
                this.maze.begin();
            }
            return;
        }
    }

    private inGame(envelope: Envelope): void {
        switch (envelope.category) {
        case 'new_player':
            this.refuse(envelope.sender, 'The game has already started.');
            return;
        case 'left':
            this.depart(envelope.sender);
            return;
        case 'command':
            if (this.maze.player(envelope.sender) !== undefined) {
                this.debug(`${envelope.sender}: ${envelope.payload}`);
                this.maze.queueCommands(envelope.sender, envelope.payload);
                this.maze.applyTurn();
            }
            return;
        }
    }

    private refuse(clientId: ClientId, reason: string): void {
        console.log(`${clientId} refused: ${reason}`);
        this.send(clientId, 'display', reason);
        this.send(clientId, 'end', null);
        this.connections.get(clientId)?.close();
    }

    private depart(clientId: ClientId): void {
        const player = this.maze.player(clientId);
        if (player !== undefined) {
            console.log(`${player.name} left`);
            this.maze.leave(clientId);
        }
        this.connections.get(clientId)?.close();
        this.connections.delete(clientId);
    }

    // send every datagram the maze produced to its recipient
    private flush(): void {
        for (const { recipient, category, payload } of this.maze.drainDatagrams()) {
            this.send(recipient, category, payload);
        }
    }

    private send(clientId: ClientId, category: OutboundCategory, payload: string | null): void {
        const connection = this.connections.get(clientId);
        if (connection === undefined) {
            return;
        }
        try {
            connection.send([ category, payload ]);
        } catch (err) {
            if (!(err instanceof ConnectionClosedError)) {
                throw err;
            }
            // its listener reports the departure
            this.debug(`dropped ${category} for ${clientId}: ${err.message}`);
        }
    }

    /**
     * Stop accepting connections and close every connection.
     *
     * @returns (a promise that) resolves once the server is closed
     */
    public stop(): Promise<void> {
        const { promise, resolve } = Promise.withResolvers<void>();
        this.acceptor.close(() => resolve());
        for (const connection of this.connections.values()) {
            connection.close();
        }
        this.connections.clear();
        return promise;
    }
}
