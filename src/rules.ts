/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import { hasCapability, type Element, type TransformFamily } from './element.js';
import { samePosition, translate, type Coordinates, type Grid } from './grid.js';
import type { DecodedCommand } from './controls.js';
import type { Player } from './player.js';

/**
 * Read-only view of the maze built for checking one atomic command.
 */
export interface Snapshot {
    /** position the command targets: the mover's position plus the command's direction */
    readonly target: Coordinates;
    /** element at `target` */
    readonly element: Element;
    /** requested transformation, or undefined for a move */
    readonly family: TransformFamily | undefined;
    readonly opponents: readonly Coordinates[];
}

/**
 * Result of checking a command:
 *  - `ok`: the command may be applied
 *  - `violation`: the command breaks a rule, and `reason` tells the player which
 *  - `won`: the command wins the game
 */
export type RuleOutcome =
    | { readonly kind: 'ok' }
    | { readonly kind: 'violation'; readonly reason: string }
    | { readonly kind: 'won' };

/** A pure check of a snapshot. */
export type Rule = (snapshot: Snapshot) => RuleOutcome;

/** Which commands a rule applies to. */
export type RuleSet = 'movement' | 'transform';

const OK: RuleOutcome = Object.freeze({ kind: 'ok' });

/**
 * Build the snapshot for checking `command` played by `mover`.
 *
 * @param command decoded atomic command
 * @param grid maze grid
 * @param mover player about to play
 * @param opponents every other player
 * @returns a fresh snapshot; it shares no mutable state with the grid or players
 */
export function takeSnapshot(command: DecodedCommand, grid: Grid, mover: Player, opponents: Iterable<Player>): Snapshot {
    const target = translate(mover.position, command.direction);
    return {
        target,
        element: grid.at(target),
        family: command.family,
        opponents: [...opponents].map(opponent => opponent.position),
    };
}

/**
 * Ordered, extensible sets of rules, one for moves and one for transformations.
 */
export class RuleEngine {

    private readonly sets: Record<RuleSet, Rule[]> = { movement: [], transform: [] };

    /**
     * Add a rule after the rules already in `set`.
     *
     * @param set rule set the rule belongs to
     * @param rule the rule
     * @returns this engine
     */
    public register(set: RuleSet, rule: Rule): this {
        this.sets[set].push(rule);
        return this;
    }

    /**
     * Check a snapshot against the transform rules if it carries a
     * transformation, else against the movement rules. Rules run in
     * registration order and the first outcome other than `ok` is returned.
     *
     * @param snapshot command to check
     * @returns the first `violation` or `won` outcome, or `ok` if every rule passed
     */
    public checkAll(snapshot: Snapshot): RuleOutcome {
        const rules = snapshot.family === undefined ? this.sets.movement : this.sets.transform;
        for (const rule of rules) {
            const outcome = rule(snapshot);
            if (outcome.kind !== 'ok') {
                return outcome;
            }
        }
        return OK;
    }
}

/** A player can only step onto a traversable element. */
export const crossObstacle: Rule = snapshot => hasCapability(snapshot.element, 'traversable')
    ? OK
    : { kind: 'violation', reason: `you cannot cross ${snapshot.element.description}!` };

/** Two players never share a position, and nobody transforms the cell another player stands on. */
export const meetOpponent: Rule = snapshot => snapshot.opponents.some(position => samePosition(position, snapshot.target))
    ? { kind: 'violation', reason: `a player already occupies ${snapshot.element.description}!` }
    : OK;

/** Stepping onto a winning element wins. */
export const reachExit: Rule = snapshot => hasCapability(snapshot.element, 'winning')
    ? { kind: 'won' }
    : OK;

/** A transformation only applies to elements of its family. */
export const transformObstacle: Rule = snapshot => snapshot.family === undefined || snapshot.element.family?.name === snapshot.family.name
    ? OK
    : { kind: 'violation', reason: `you cannot ${snapshot.family.verb} ${snapshot.element.description}!` };

/**
 * @returns an engine with the standard rules: for moves, crossObstacle,
 *          meetOpponent, then reachExit; for transformations, meetOpponent then
 *          transformObstacle
 */
export function standardRules(): RuleEngine {
    return new RuleEngine()
        .register('movement', crossObstacle)
        .register('movement', meetOpponent)
        .register('movement', reachExit)
        .register('transform', meetOpponent)
        .register('transform', transformObstacle);
}
