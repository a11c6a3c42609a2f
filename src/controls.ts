/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import { PIERCE, WALL_UP, type TransformFamily } from './element.js';
import type { Vector } from './grid.js';

/** Largest repeat count honored after a move key; matches the usage line shown to players. */
export const DEFAULT_MAX_REPEAT = 99;

interface MoveControl {
    readonly kind: 'move';
    readonly key: string;
    readonly direction: Vector;
    readonly description: string;
}

interface TransformControl {
    readonly kind: 'transform';
    readonly key: string;
    readonly family: TransformFamily;
    readonly description: string;
}

type Control = MoveControl | TransformControl;

/** What an atomic command asks for: a step in `direction`, or transforming the cell in `direction`. */
export interface DecodedCommand {
    readonly direction: Vector;
    readonly family: TransformFamily | undefined;
}

/**
 * The keys players type, and the parser that turns a line of them into
 * atomic commands.
 *
 * A line is a sequence of `MOVE_KEY DIGITS?` (a move, repeated DIGITS times,
 * once if DIGITS is absent) and `TRANSFORM_KEY MOVE_KEY` (transform the
 * neighbouring cell in that direction). Keys are registered at startup, so the
 * grammar is only known once every control is registered.
 */
export class ControlRegistry {

    // controls in registration order, keyed by their single-character key
    private readonly controls: Map<string, Control> = new Map();

    // Abstraction function:
    //   AF(controls, maxRepeat) = the control keys controls.keys(), where a move
    //     key steps by its direction and a transform key applies its family,
    //     and a move is repeated at most maxRepeat times per occurrence.
    // Representation invariant:
    //   - every key is a single character and is controls.get(key).key
    //   - maxRepeat is a nonnegative integer
    // Safety from rep exposure:
    //   - controls is private; Control objects are frozen

    /**
     * @param maxRepeat largest repeat count honored after a move key;
     *        requires a nonnegative integer
     */
    public constructor(private readonly maxRepeat: number = DEFAULT_MAX_REPEAT) {
        this.checkRep();
    }

    private checkRep(): void {
        assert(Number.isInteger(this.maxRepeat) && this.maxRepeat >= 0);
        for (const [ key, control ] of this.controls) {
            assert.strictEqual(key.length, 1);
            assert.strictEqual(control.key, key);
        }
    }

    /**
     * Register a move key.
     *
     * @param key single character
     * @param direction unit displacement of one step
     * @param description short explanation shown to players
     * @returns this registry
     * @throws Error if `key` is not a single character or is already registered
     */
    public addMove(key: string, direction: Vector, description: string): this {
        const control: MoveControl = { kind: 'move', key, direction, description };
        this.add(Object.freeze(control));
        return this;
    }

    /**
     * Register a transform key.
     *
     * @param key single character
     * @param family transformation applied to the targeted cell
     * @param description short explanation shown to players
     * @returns this registry
     * @throws Error if `key` is not a single character or is already registered
     */
    public addTransform(key: string, family: TransformFamily, description: string): this {
        const control: TransformControl = { kind: 'transform', key, family, description };
        this.add(Object.freeze(control));
        return this;
    }

    private add(control: Control): void {
        if (control.key.length !== 1) {
            throw new Error(`control key '${control.key}' must be a single character`);
        }
        if (this.controls.has(control.key)) {
            throw new Error(`control key '${control.key}' is already registered`);
        }
        this.controls.set(control.key, control);
        this.checkRep();
    }

    private moves(): MoveControl[] {
        return [...this.controls.values()].filter((control): control is MoveControl => control.kind === 'move');
    }

    private transforms(): TransformControl[] {
        return [...this.controls.values()].filter((control): control is TransformControl => control.kind === 'transform');
    }

    /** @returns the directions of the move keys, in registration order */
    public directions(): Vector[] {
        return this.moves().map(move => move.direction);
    }

    /** @returns one help line per control, e.g. "N - Move north - Usage: N[0-99]" */
    public descriptions(): string[] {
        const moveKeys = this.moves().map(move => move.key).join('');
        return [...this.controls.values()].map(control => control.kind === 'move'
            ? `${control.key} - ${control.description} - Usage: ${control.key}[0-${this.maxRepeat}]`
            : `${control.key} - ${control.description} - Usage: ${control.key}<${moveKeys}>`);
    }

    /**
     * @returns regular expression a whole command line must match,
     *          `((MOVE)|(TRANSFORM))+` where MOVE is `([move keys])([0-9]*)`
     *          and TRANSFORM is `([transform keys])([move keys])`
     */
    public validationPattern(): string {
        return `((${this.movePattern()})|(${this.transformPattern()}))+`;
    }

    private movePattern(): string {
        return `([${characterClass(this.moves())}])([0-9]*)`;
    }

    private transformPattern(): string {
        return `([${characterClass(this.transforms())}])([${characterClass(this.moves())}])`;
    }

    /**
     * Split a command line into atomic commands. Characters that start no
     * command are dropped; rejecting malformed lines is up to whoever checks
     * them against validationPattern().
     *
     * @param input command line, e.g. "N3MEO"
     * @returns atomic commands in order, e.g. ["N", "N", "N", "ME", "O"]
     */
    public extract(input: string): string[] {
        const extraction = new RegExp(`(?:${this.movePattern()})|(?:${this.transformPattern()})`, 'g');
        const commands: string[] = [];
        for (const [ , move, repeat, transform, direction ] of input.matchAll(extraction)) {
            if (move !== undefined) {
                const count = repeat ? Math.min(parseInt(repeat, 10), this.maxRepeat) : 1;
                for (let ii = 0; ii < count; ++ii) {
                    commands.push(move);
                }
            } else if (transform !== undefined && direction !== undefined) {
                commands.push(transform + direction);
            }
        }
        return commands;
    }

    /**
     * @param command an atomic command produced by extract()
     * @returns the direction and optional transformation it stands for,
     *          or undefined if it is not made of registered keys
     */
    public decode(command: string): DecodedCommand | undefined {
        const move = this.controls.get(command.slice(-1));
        if (move?.kind !== 'move') {
            return undefined;
        }
        if (command.length === 1) {
            return { direction: move.direction, family: undefined };
        }
        const transform = this.controls.get(command.slice(0, -1));
        if (transform?.kind !== 'transform') {
            return undefined;
        }
        return { direction: move.direction, family: transform.family };
    }
}

function characterClass(controls: readonly Control[]): string {
    return controls.map(control => control.key.replace(/[\\\]^-]/g, '\\$&')).join('');
}

/**
 * @returns the standard controls: N, S, E, O (west) moves and the
 *          M (wall up) and P (pierce) transformations
 */
export function standardControls(maxRepeat: number = DEFAULT_MAX_REPEAT): ControlRegistry {
    return new ControlRegistry(maxRepeat)
        .addMove('N', [ 0, -1 ], 'Move north')
        .addMove('S', [ 0, 1 ], 'Move south')
        .addMove('E', [ 1, 0 ], 'Move east')
        .addMove('O', [ -1, 0 ], 'Move west')
        .addTransform('M', WALL_UP, 'Wall up a door')
        .addTransform('P', PIERCE, 'Pierce a wall');
}
