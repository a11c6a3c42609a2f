/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import type { Element } from './element.js';

/** Integer (x, y) position; x grows eastward, y grows southward. */
export type Coordinates = readonly [x: number, y: number];

/** Displacement between two positions. */
export type Vector = readonly [dx: number, dy: number];

/** Inclusive bounding box: [min corner, max corner]. */
export type Bounds = readonly [min: Coordinates, max: Coordinates];

/**
 * @param position a position
 * @param direction a displacement
 * @returns position + direction
 */
export function translate(position: Coordinates, direction: Vector): Coordinates {
    return [ position[0] + direction[0], position[1] + direction[1] ];
}

/**
 * @returns true iff a and b denote the same position
 */
export function samePosition(a: Coordinates, b: Coordinates): boolean {
    return a[0] === b[0] && a[1] === b[1];
}

/**
 * @param positions positions to enclose
 * @returns the smallest box containing every position, or [(0,0),(0,0)] if there is none
 */
export function boundingBox(positions: Iterable<Coordinates>): Bounds {
    let min: [number, number] | undefined;
    let max: [number, number] = [ 0, 0 ];
    for (const [ x, y ] of positions) {
        if (min === undefined) {
            min = [ x, y ];
            max = [ x, y ];
        } else {
            min = [ Math.min(min[0], x), Math.min(min[1], y) ];
            max = [ Math.max(max[0], x), Math.max(max[1], y) ];
        }
    }
    return [ min ?? [ 0, 0 ], max ];
}

function key(position: Coordinates): string {
    return `${position[0]},${position[1]}`;
}

/**
 * Mutable sparse grid of elements. A position the grid does not define holds
 * the fallback element given at construction.
 */
export class Grid {

    // cells.get("x,y") = [position, element] for every defined position
    private readonly cells: Map<string, [Coordinates, Element]> = new Map();

    /**
     * @param fallback element of every undefined position
     */
    public constructor(public readonly fallback: Element) {}

    /**
     * @param position a position
     * @returns the element at `position`, or the fallback element
     */
    public at(position: Coordinates): Element {
        return this.cells.get(key(position))?.[1] ?? this.fallback;
    }

    /** @returns true iff `position` is defined */
    public has(position: Coordinates): boolean {
        return this.cells.has(key(position));
    }

    /**
     * Define the element at `position`.
     */
    public set(position: Coordinates, element: Element): void {
        this.cells.set(key(position), [ [ position[0], position[1] ], element ]);
    }

    /**
     * Undefine `position`, so that it holds the fallback element.
     * @returns true iff `position` was defined
     */
    public delete(position: Coordinates): boolean {
        return this.cells.delete(key(position));
    }

    /** @returns the defined positions, in definition order */
    public positions(): Coordinates[] {
        return [...this.cells.values()].map(([ position ]) => position);
    }

    /** @returns [position, element] for every defined position, in definition order */
    public entries(): Array<[Coordinates, Element]> {
        return [...this.cells.values()].map(([ position, element ]) => [ position, element ]);
    }

    public get size(): number {
        return this.cells.size;
    }
}
