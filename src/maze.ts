/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import { hasCapability, standardElements, type ElementRegistry } from './element.js';
import { standardControls, type ControlRegistry } from './controls.js';
import { standardRules, takeSnapshot, type RuleEngine } from './rules.js';
import { boundingBox, Grid, translate, type Coordinates } from './grid.js';
import { Player, type ClientId } from './player.js';
import { renderBoard } from './render.js';
import { loadMap } from './map-file.js';
import { MAX_COMMAND_LENGTH, type Datagram, type OutboundCategory } from './protocol.js';
import { quiet, type DebugLog } from './config.js';

/** Lifecycle of a maze; it only moves forward. */
export type Phase = 'lobby' | 'playing' | 'finished';

/** Collaborators of a maze; every one has a standard default. */
export interface MazeOptions {
    /** shown to players when they join */
    readonly name?: string;
    readonly elements?: ElementRegistry;
    readonly controls?: ControlRegistry;
    readonly rules?: RuleEngine;
    /** uniform random number in [0,1), used for start positions and play order */
    readonly random?: () => number;
    /** where turns are traced; nowhere by default */
    readonly debug?: DebugLog;
}

/**
 * Multiplayer maze game ADT.
 *
 * A maze is read from text, one row per line, one element per character. It
 * welcomes players while in the `lobby` phase, as long as it has more start
 * positions than players. Once begun, players take turns: each turn plays the
 * oldest queued command of the player at the head of the turn order, checked
 * against the rules. The first player to step on a winning cell wins; a game
 * also ends when at most one player is left.
 *
 * A maze never talks to the network. Each operation queues the messages it
 * produces for clients, and drainDatagrams() hands them to the caller.
 *
 * Not safe for concurrent use: one caller must own a maze.
 */
export class Maze {

    public readonly name: string;

    private readonly elements: ElementRegistry;
    private readonly controls: ControlRegistry;
    private readonly rules: RuleEngine;
    private readonly random: () => number;
    private readonly debug: DebugLog;

    private readonly grid: Grid;
    private readonly exitPositions: Coordinates[] = [];
    private readonly startPositions: Coordinates[] = [];
    private readonly unknown: Set<string> = new Set();

    // players by client, in joining order
    private readonly roster: Map<ClientId, Player> = new Map();
    // the same players; the head plays next
    private turnOrder: Player[] = [];
    private currentPhase: Phase = 'lobby';
    private champion: Player | undefined;
    private readonly outbox: Datagram[] = [];

    // Abstraction function:
    //   AF(grid, exitPositions, startPositions, roster, turnOrder, currentPhase, champion, outbox) =
    //     a maze whose cell at p is grid.at(p), won by reaching any of exitPositions,
    //     where new players may still join iff currentPhase is 'lobby' and
    //     roster.size < startPositions.length, whose players are roster.values(),
    //     turnOrder[0] playing next; once finished, champion is the winner if any;
    //     outbox holds the messages produced and not yet drained.
    // Representation invariant:
    //   - turnOrder and roster.values() hold the same players, each exactly once
    //   - roster.get(c).clientId === c
    //   - in 'lobby', roster.size <= startPositions.length and every start
    //     position holds a startable element
    //   - in 'playing', no two players share a position
    //   - champion is undefined unless currentPhase is 'finished'
    // Safety from rep exposure:
    //   - all fields are private; getters return copies of arrays and sets
    //   - players() and player() return Player objects, whose position is only
    //     reassigned by this maze and whose command queue is private

    /**
     * Make a new maze by parsing text.
     *
     * Each character is read through the element registry; characters it does
     * not know read as the default element and are recorded in unknownSymbols.
     * Winning cells are the exits. Start positions are then ranked by distance
     * to the nearest exit.
     *
     * @param text maze, one row per line
     * @param options collaborators; omitted ones use the standard elements, controls and rules
     */
    public constructor(text: string, options: MazeOptions = {}) {
        this.name = options.name ?? '';
        this.elements = options.elements ?? standardElements();
        this.controls = options.controls ?? standardControls();
        this.rules = options.rules ?? standardRules();
        this.random = options.random ?? Math.random;
        this.debug = options.debug ?? quiet;
        this.grid = new Grid(this.elements.defaultElement);

        text.split(/\r\n|\r|\n/).forEach((line, y) => {
            [...line].forEach((character, x) => {
                if (!this.elements.isKnown(character)) {
                    this.unknown.add(character.toUpperCase());
                }
                const element = this.elements.resolve(character);
                if (hasCapability(element, 'winning')) {
                    this.exitPositions.push([ x, y ]);
                }
                if (hasCapability(element, 'decoded')) {
                    this.grid.set([ x, y ], element);
                }
            });
        });
        this.rankStartPositions();
        this.checkRep();
    }

    /**
     * Make a new maze from a map file.
     *
     * @param filename path to a map file
     * @param options collaborators; the maze is named after the file unless options.name is given
     * @returns a new maze
     * @throws Error if the file cannot be read or is not a playable map
     */
    public static async parseFromFile(filename: string, options: MazeOptions = {}): Promise<Maze> {
        const map = await loadMap(filename, options.elements ?? standardElements());
        return new Maze(map.text, { name: map.name, ...options });
    }

    // Breadth-first search from the exits, over the move directions, inside
    // the grid's bounding box. Stepping onto a traversable cell costs 1,
    // going through a cell that transforms into a traversable one costs 2.
    // Startable cells are ranked by distance; cells at equal distance are
    // shuffled.
    private rankStartPositions(): void {
        const [ min, max ] = boundingBox(this.grid.positions());
        const inside = ([ x, y ]: Coordinates): boolean => min[0] <= x && x <= max[0] && min[1] <= y && y <= max[1];
        const directions = this.controls.directions();

        // reached.get("x,y") = [position, distance]
        const reached: Map<string, [Coordinates, number]> = new Map();
        for (const exit of this.exitPositions) {
            reached.set(`${exit[0]},${exit[1]}`, [ exit, 0 ]);
        }

        for (let distance = 0; [...reached.values()].some(([ , d ]) => d >= distance); ++distance) {
            const band: Coordinates[] = [];
            const frontier = [...reached.values()].filter(([ , d ]) => d === distance);
            for (const [ position ] of frontier) {
                for (const direction of directions) {
                    const neighbour = translate(position, direction);
                    const key = `${neighbour[0]},${neighbour[1]}`;
                    if (!inside(neighbour) || reached.has(key)) {
                        continue;
                    }
                    const element = this.grid.at(neighbour);
                    if (hasCapability(element, 'startable')) {
                        reached.set(key, [ neighbour, distance + 1 ]);
                        band.push(neighbour);
                    } else if (hasCapability(element, 'traversable')) {
                        reached.set(key, [ neighbour, distance + 1 ]);
                    } else if (hasCapability(element, 'transformable')) {
                        const transformed = this.elements.transformed(element);
                        if (transformed !== undefined && hasCapability(transformed, 'traversable')) {
                            reached.set(key, [ neighbour, distance + 2 ]);
                        }
                    }
                }
            }
            this.startPositions.push(...this.shuffle(band));
        }
    }

    private checkRep(): void {
        assert.strictEqual(this.turnOrder.length, this.roster.size);
        for (const player of this.turnOrder) {
            assert(this.roster.get(player.clientId) === player);
        }
        if (this.currentPhase === 'lobby') {
            assert(this.roster.size <= this.startPositions.length);
            for (const start of this.startPositions) {
                assert(hasCapability(this.grid.at(start), 'startable'));
            }
        } else if (this.currentPhase === 'playing') {
            const occupied = new Set(this.turnOrder.map(player => `${player.position[0]},${player.position[1]}`));
            assert.strictEqual(occupied.size, this.turnOrder.length);
        }
        assert(this.champion === undefined || this.currentPhase === 'finished');
    }

    public get phase(): Phase {
        return this.currentPhase;
    }

    /** The winner, once the game is finished; null if there is none (yet). */
    public get winner(): Player | null {
        return this.champion ?? null;
    }

    /** @returns positions of the winning cells, in map order */
    public get exits(): Coordinates[] {
        return [...this.exitPositions];
    }

    /** @returns start positions, nearest to an exit first */
    public get starts(): Coordinates[] {
        return [...this.startPositions];
    }

    /** @returns map characters that no element is registered for */
    public get unknownSymbols(): Set<string> {
        return new Set(this.unknown);
    }

    /** @returns the players, the next one to play first */
    public players(): Player[] {
        return [...this.turnOrder];
    }

    /**
     * @param clientId a client
     * @returns the player of that client, or undefined
     */
    public player(clientId: ClientId): Player | undefined {
        return this.roster.get(clientId);
    }

    /**
     * @returns true iff one more player could join: the game has not begun
     *          and there are more start positions than players
     */
    public isOpen(): boolean {
        return this.currentPhase === 'lobby' && this.roster.size < this.startPositions.length;
    }

    /**
     * Add a player, if the game has not begun and a start position is left.
     *
     * @param clientId client the player plays from; requires no player of this client
     * @param name display name
     * @returns the new player, or null if the maze is not open
     */
    public addPlayer(clientId: ClientId, name: string): Player | null {
        if (!this.isOpen() || this.roster.has(clientId)) {
            return null;
        }
        const player = new Player(clientId, name);
        this.roster.set(clientId, player);
        this.turnOrder.push(player);
        this.checkRep();
        return player;
    }

    /**
     * Remove a player. If the game has begun and at most one player is left,
     * the game is finished; the remaining player, if any, wins unless the game
     * already has a winner.
     *
     * @param clientId client of a player of this maze
     * @throws Error if no player plays from `clientId`
     */
    public removePlayer(clientId: ClientId): void {
        const player = this.roster.get(clientId);
        if (player === undefined) {
            throw new Error(`no player for client '${clientId}'`);
        }
        this.roster.delete(clientId);
        this.turnOrder = this.turnOrder.filter(other => other !== player);
        if (this.currentPhase !== 'lobby' && this.turnOrder.length <= 1) {
            this.currentPhase = 'finished';
            this.champion ??= this.turnOrder[0];
        }
        this.checkRep();
    }

    /**
     * Add a player and greet them with the maze's name and board.
     *
     * @param clientId client the player plays from
     * @param name display name
     * @returns the new player, or null if the maze is not open (nothing is sent then)
     */
    public welcome(clientId: ClientId, name: string): Player | null {
        const player = this.addPlayer(clientId, name);
        if (player !== null) {
            this.send(player, 'display', '');
            this.send(player, 'display', `Welcome, ${name}.`);
            this.send(player, 'display', `You are playing in the maze '${this.name}'.`);
            this.send(player, 'display', this.render());
        }
        return player;
    }

    /**
     * Remove a player. Once the game has begun, tell the others who left and
     * show them the board and whose turn it is.
     *
     * @param clientId client of a player of this maze
     * @throws Error if no player plays from `clientId`
     */
    public leave(clientId: ClientId): void {
        const player = this.roster.get(clientId);
        this.removePlayer(clientId);
        if (player !== undefined && this.currentPhase !== 'lobby') {
            for (const other of this.roster.values()) {
                this.send(other, 'display', `${player.name} left the game.`);
            }
            this.announceBoard();
            this.announceTurn();
        }
    }

    /**
     * Begin the game: close the lobby, place the players and decide the play order.
     *
     * Players get consecutive start positions from a random index, so they
     * are spread evenly over the distances to the exits. The players are
     * shuffled twice; the second shuffle gives the play order and the order
     * positions are handed out in. Every player is then sent the command
     * syntax, the controls, the board and whose turn it is.
     *
     * @throws Error if the game has already begun
     */
    public begin(): void {
        if (this.currentPhase !== 'lobby') {
            throw new Error(`cannot begin a game in phase '${this.currentPhase}'`);
        }
        this.currentPhase = 'playing';

        let index = Math.floor(this.random() * (this.startPositions.length - this.turnOrder.length + 1));
        this.turnOrder = this.shuffle(this.shuffle(this.turnOrder));
        for (const player of this.turnOrder) {
            const start = this.startPositions[index++];
            assert(start !== undefined, 'more players than start positions');
            player.position = start;
        }

        for (const player of this.roster.values()) {
            this.send(player, 'validation_schema', this.controls.validationPattern());
            this.send(player, 'validation_error', 'This input is not valid!');
            this.send(player, 'display', `The game begins! You are ${this.turnOrder.length} players.`);
            for (const description of this.controls.descriptions()) {
                this.send(player, 'display', description);
            }
        }
        this.announceBoard();
        this.announceTurn();
        this.checkRep();
    }

    /**
     * Queue the commands of a command line after the player's waiting ones,
     * and echo them back if any command is waiting.
     *
     * @param clientId client of a player of this maze
     * @param input command line; characters that form no command are ignored,
     *        and a line longer than MAX_COMMAND_LENGTH forms no command at all
     * @returns the commands extracted from `input`
     * @throws Error if no player plays from `clientId`
     */
    public queueCommands(clientId: ClientId, input: string): string[] {
        const player = this.roster.get(clientId);
        if (player === undefined) {
            throw new Error(`no player for client '${clientId}'`);
        }
        const commands = input.length > MAX_COMMAND_LENGTH ? [] : this.controls.extract(input);
        player.enqueue(commands);
        if (player.pendingCommands().length > 0) {
            this.send(player, 'display', `Commands: ${commands.join(' ')}`);
        }
        return commands;
    }

    /**
     * Play turns until the player at the head of the turn order has no
     * command waiting, or the game is finished.
     *
     * A command that breaks a rule is dropped, its reason is sent to its
     * player only, and that player keeps the turn. Any other command is
     * applied: a move changes the player's position, a transformation
     * replaces the target cell by the element it becomes (or clears it when
     * that element is not stored in grids). The player then goes to the back
     * of the turn order and everybody gets the board and whose turn it is.
     * A move onto a winning cell is applied and finishes the game.
     */
    public applyTurn(): void {
        while (this.currentPhase === 'playing') {
            const player = this.turnOrder.shift();
            if (player === undefined) {
                break;
            }
            const command = player.nextCommand();
            if (command === undefined) {
                this.turnOrder.unshift(player);
                break;
            }
            const decoded = this.controls.decode(command);
            assert(decoded !== undefined, `undecodable command '${command}'`);

            const snapshot = takeSnapshot(decoded, this.grid, player, this.turnOrder);
            const outcome = this.rules.checkAll(snapshot);
            if (outcome.kind === 'violation') {
                this.debug(`${player.name} ${command}: ${outcome.reason}`);
                this.send(player, 'display', outcome.reason);
                this.turnOrder.unshift(player);
                continue;
            }
            if (outcome.kind === 'won') {
                this.currentPhase = 'finished';
                this.champion = player;
            }

            if (snapshot.family !== undefined) {
                const transformed = this.elements.transformed(snapshot.element);
                if (transformed !== undefined && hasCapability(transformed, 'decoded')) {
                    this.grid.set(snapshot.target, transformed);
                } else {
                    this.grid.delete(snapshot.target);
                }
            } else {
                player.position = snapshot.target;
            }
            this.debug(`${player.name} ${command}: now at (${player.position[0]},${player.position[1]})`);

            this.turnOrder.push(player);
            this.announceBoard();
            this.announceTurn();
        }
        this.checkRep();
    }

    /**
     * End the game, if not already finished, and tell every player who won,
     * followed by an `end` message.
     */
    public finish(): void {
        this.currentPhase = 'finished';
        for (const player of this.roster.values()) {
            if (this.champion === player) {
                this.send(player, 'display', 'You won the game!');
            } else if (this.champion !== undefined) {
                this.send(player, 'display', `${this.champion.name} won the game!`);
            }
            this.send(player, 'end', null);
        }
        this.checkRep();
    }

    /**
     * @returns the messages produced since the last call, oldest first;
     *          they are removed from this maze
     */
    public drainDatagrams(): Datagram[] {
        return this.outbox.splice(0, this.outbox.length);
    }

    /**
     * Draw the board. Players are only drawn once the game has begun, and
     * only on a board drawn for one of them.
     *
     * @param viewer player the board is drawn for, whose position is
     *        marked apart from the other players'
     * @returns the board as text, one line per row
     */
    public render(viewer?: Player): string {
        const positions = this.grid.positions();
        if (this.currentPhase === 'lobby' || viewer === undefined) {
            return renderBoard(this.grid, boundingBox(positions), undefined, []);
        }
        positions.push(...this.turnOrder.map(player => player.position));
        const opponents = this.turnOrder.filter(player => player !== viewer).map(player => player.position);
        return renderBoard(this.grid, boundingBox(positions), viewer.position, opponents);
    }

    private announceBoard(): void {
        for (const player of this.roster.values()) {
            this.send(player, 'display', this.render(player));
            this.send(player, 'display', '');
        }
    }

    private announceTurn(): void {
        const next = this.turnOrder[0];
        if (this.currentPhase === 'finished' || next === undefined) {
            return;
        }
        for (const player of this.roster.values()) {
            this.send(player, 'display', player === next ? 'It is your turn.' : `It is ${next.name}'s turn.`);
        }
    }

    private send(player: Player, category: OutboundCategory, payload: string | null): void {
        this.outbox.push({ recipient: player.clientId, category, payload });
    }

    // Fisher-Yates, on a copy
    private shuffle<T>(items: readonly T[]): T[] {
        const shuffled = [...items];
        for (let ii = shuffled.length - 1; ii > 0; --ii) {
            const jj = Math.floor(this.random() * (ii + 1));
            const item = shuffled[ii];
            const other = shuffled[jj];
            if (item !== undefined && other !== undefined) {
                shuffled[ii] = other;
                shuffled[jj] = item;
            }
        }
        return shuffled;
    }
}
