/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import type { Coordinates } from './grid.js';

/** Opaque token routing messages back to a client connection. */
export type ClientId = string;

/**
 * A player in a maze: where they stand, and the commands they typed that
 * have not been played yet.
 */
export class Player {

    public position: Coordinates = [ 0, 0 ];

    // FIFO of atomic commands waiting for this player's turns
    private readonly commands: string[] = [];

    /**
     * @param clientId connection this player plays from
     * @param name display name
     */
    public constructor(
        public readonly clientId: ClientId,
        public readonly name: string
    ) {}

    /**
     * Queue commands after the ones already waiting.
     */
    public enqueue(commands: Iterable<string>): void {
        this.commands.push(...commands);
    }

    /**
     * @returns the oldest waiting command, removed from the queue,
     *          or undefined if none is waiting
     */
    public nextCommand(): string | undefined {
        return this.commands.shift();
    }

    /** @returns the waiting commands, oldest first */
    public pendingCommands(): string[] {
        return [...this.commands];
    }
}
