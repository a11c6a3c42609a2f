/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import { MessageBus } from './bus.js';
import { debugLog } from './config.js';
import { Maze } from './maze.js';
import type { Envelope } from './protocol.js';
import './promise-resolvers.js';

/**
 * Simulate a game without a network: bots push random command lines onto a
 * bus at random times, and a single consumer plays them on a maze until the
 * game is over.
 *
 * Environment: MAP (map file), PLAYERS, TRIES (command lines per bot),
 * MIN_DELAY and MAX_DELAY (milliseconds between command lines),
 * SIM_VERBOSE=1 to print every message sent to the players,
 * DEBUG_MAZE to trace every turn.
 *
 * @throws Error if an error occurs reading or parsing the map
 */
async function simulationMain(): Promise<void> {
    const filename = process.env['MAP'] ?? 'maps/crossroads.txt';
    const maze = await Maze.parseFromFile(filename, { debug: debugLog(process.env) });
    const players = process.env['PLAYERS'] ? Number(process.env['PLAYERS']) : Math.min(4, maze.starts.length);
    const tries = process.env['TRIES'] ? Number(process.env['TRIES']) : 100;
    const minDelayMilliseconds = process.env['MIN_DELAY'] ? Number(process.env['MIN_DELAY']) : 0.1;
    const maxDelayMilliseconds = process.env['MAX_DELAY'] ? Number(process.env['MAX_DELAY']) : 2;
    const verbose = process.env['SIM_VERBOSE'] === '1';
    if (!(players >= 1)) { throw new Error('PLAYERS must be at least 1'); }

    const bus = new MessageBus<Envelope>();
    let over = false;

    // per-bot statistics collected during the run
    const stats: Map<string, { lines: number; commands: number; rejected: number }> = new Map();

    // start up the bots as concurrent asynchronous function calls
    const botPromises: Array<Promise<void>> = [];
    for (let ii = 0; ii < players; ++ii) {
        botPromises.push(bot(ii));
    }

    // the only code that touches the maze
    let announced = 0;
    while (maze.phase !== 'finished') {
        const envelope = await bus.pop();
        switch (envelope.category) {
        case 'new_player':
            maze.welcome(envelope.sender, envelope.payload);
            if (++announced === players) {
                maze.begin();
            }
            break;
        case 'command':
            if (maze.phase === 'playing' && maze.player(envelope.sender) !== undefined) {
                const commands = maze.queueCommands(envelope.sender, envelope.payload);
                const botStats = stats.get(envelope.sender);
                if (botStats) botStats.commands += commands.length;
                maze.applyTurn();
            }
            break;
        case 'left':
            if (maze.player(envelope.sender) !== undefined) {
                maze.leave(envelope.sender);
            }
            break;
        }
        report(maze);
    }
    over = true;
    maze.finish();
    report(maze);
    await Promise.all(botPromises);

    console.log(`simulation finished: players=${players}, tries=${tries}, winner=${maze.winner?.name ?? 'nobody'}`);
    for (const [ clientId, botStats ] of stats) {
        console.log(`${clientId} lines=${botStats.lines} commands=${botStats.commands} rejected=${botStats.rejected}`);
    }

    /** @param botNumber bot to simulate */
    async function bot(botNumber: number): Promise<void> {
        const clientId = `bot-${botNumber}`;
        stats.set(clientId, { lines: 0, commands: 0, rejected: 0 });
        bus.push({ sender: clientId, category: 'new_player', payload: `Bot ${botNumber}` });
        for (let jj = 0; jj < tries && !over; ++jj) {
            await timeout(randomDelay(minDelayMilliseconds, maxDelayMilliseconds));
            if (over) break;
            const botStats = stats.get(clientId);
            if (botStats) botStats.lines++;
            bus.push({ sender: clientId, category: 'command', payload: randomCommandLine() });
        }
        if (!over) {
            bus.push({ sender: clientId, category: 'left', payload: null });
        }
    }

    // print or count what the maze sent since the last call
    function report(game: Maze): void {
        for (const { recipient, category, payload } of game.drainDatagrams()) {
            if (category === 'display' && (payload?.startsWith('you cannot') || payload?.startsWith('a player already'))) {
                const botStats = stats.get(recipient);
                if (botStats) botStats.rejected++;
            }
            if (verbose) {
                console.log(`${recipient} <- ${category}: ${payload ?? ''}`);
            }
        }
    }
}

/**
 * @returns a random valid command line, e.g. "N3", "E" or "PS"
 */
function randomCommandLine(): string {
    const directions = [ 'N', 'S', 'E', 'O' ];
    const direction = directions[randomInt(directions.length)] ?? 'N';
    if (randomInt(4) === 0) {
        return (randomInt(2) === 0 ? 'M' : 'P') + direction;
    }
    const repeat = randomInt(4);
    return direction + (repeat > 1 ? repeat : '');
}

/**
 * Random positive integer generator
 *
 * @param max a positive integer which is the upper bound of the generated number
 * @returns a random integer >= 0 and < max
 */
function randomInt(max: number): number {
    return Math.floor(Math.random() * max);
}

/**
 * Return a random floating-point delay between min (inclusive) and max (inclusive).
 *
 * @param min lower bound (inclusive). Precondition: min is a finite number and min <= max.
 * @param max upper bound (inclusive). Precondition: max is a finite number and max >= min.
 * @returns a number x such that min <= x <= max. Distribution is uniform on [min,max).
 */
function randomDelay(min: number, max: number): number {
    return min + Math.random() * (max - min);
}

/**
 * @param milliseconds duration to wait
 * @returns a promise that fulfills no less than `milliseconds` after timeout() was called
 */
async function timeout(milliseconds: number): Promise<void> {
    const { promise, resolve } = Promise.withResolvers<void>();
    setTimeout(resolve, milliseconds);
    return promise;
}

await simulationMain();
