/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import process from 'node:process';
import { debugLog, serverConfig } from './config.js';
import { GameServer } from './game-server.js';
import { Maze } from './maze.js';
import { StatusServer } from './status-server.js';

/**
 * Start a maze server using the given arguments, play one game, then exit.
 *
 * Command-line usage:
 *     npm start PORT MAPFILE
 * where:
 *
 *   - PORT is an integer that specifies the server's listening port number,
 *     0 specifies that a random unused port will be automatically chosen,
 *     and `-` the default port 12800.
 *   - MAPFILE is the path to a valid map file, which will be loaded as
 *     the maze to play.
 *
 * For example, to start a server on the default port with the maze in
 * `maps/crossroads.txt`:
 *     npm start - maps/crossroads.txt
 *
 * Set STATUS_PORT to also serve the game's status over HTTP, and DEBUG_MAZE
 * to trace commands and turns.
 *
 * @throws Error if an error occurs parsing a file or starting a server
 */
async function main(): Promise<void> {
    const config = serverConfig(process.argv.slice(2), process.env);

    const debug = debugLog(process.env);

    const maze = await Maze.parseFromFile(config.mapFile, { debug });
    const server = new GameServer(maze, config.port, config.host, debug);
    await server.start();

    let status: StatusServer | undefined;
    if (config.statusPort !== undefined) {
        status = new StatusServer(() => server.status, config.statusPort, config.host);
        await status.start();
    }

    try {
        await server.run();
    } finally {
        status?.stop();
    }
}

await main();
