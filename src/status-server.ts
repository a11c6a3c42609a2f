/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import { Server } from 'node:http';
import express, { Application, Request, Response, NextFunction } from 'express';
import { StatusCodes } from 'http-status-codes';
import type { ServerStatus } from './game-server.js';
import './promise-resolvers.js';

/**
 * HTTP server reporting the state of a game server.
 *
 * It never touches the maze: it serves the status the game server last
 * published.
 */
export class StatusServer {

    public readonly app: Application;
    private server: Server | undefined;

    /**
     * Make a new status server that listens for connections on port.
     *
     * @param status returns the status to report
     * @param requestedPort server port number, 0 for any free port
     * @param host interface to listen on
     */
    public constructor(
        private readonly status: () => ServerStatus,
        private readonly requestedPort: number,
        private readonly host: string = 'localhost'
    ) {
        this.app = express();
        this.app.use((request: Request, response: Response, next: NextFunction) => {
            // allow requests from web pages hosted anywhere
            response.set('Access-Control-Allow-Origin', '*');
            next();
        });

        /*
         * GET /status
         *
         * Response is JSON { name, phase, players, capacity, open }:
         * the maze's name, the game phase, the names of the players, the
         * number of start positions, and whether a new player would be welcomed.
         */
        this.app.get('/status', (request: Request, response: Response) => {
            response
            .status(StatusCodes.OK) // 200
            .json(this.status());
        });

        /*
         * GET /health
         *
         * Response is the text "ok" while the server runs.
         */
        this.app.get('/health', (request: Request, response: Response) => {
            response
            .status(StatusCodes.OK) // 200
            .type('text')
            .send('ok');
        });
    }

    /**
     * Start this server.
     *
     * @returns (a promise that) resolves when the server is listening
     */
    public start(): Promise<void> {
        const { promise, resolve } = Promise.withResolvers<void>();
        const server = this.app.listen(this.requestedPort, this.host);
        this.server = server;
        server.on('listening', () => {
            console.log(`status now available at http://${this.host}:${this.port}/status`);
            resolve();
        });
        return promise;
    }

    /**
     * @returns the actual port that server is listening at. (May be different
     *          than the requestedPort used in the constructor, since if
     *          requestedPort = 0 then an arbitrary available port is chosen.)
     *          Requires that start() has already been called and completed.
     */
    public get port(): number {
        const address = this.server?.address() ?? 'not connected';
        if (typeof(address) === 'string') {
            throw new Error('server is not listening at a port');
        }
        return address.port;
    }

    /**
     * Stop this server. Once stopped, this server cannot be restarted.
     */
    public stop(): void {
        this.server?.close();
        console.log('status server stopped');
    }
}
