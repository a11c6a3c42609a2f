/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';

/**
 * A named trait of a maze cell.
 *
 *  - `decodable`: recognized when reading a map
 *  - `decoded`: stored in the grid (absent cells fall back to the default element)
 *  - `traversable`: a player may stand on it
 *  - `winning`: reaching it wins the game
 *  - `transformable`: a player may turn it into another element
 *  - `startable`: a player may begin the game on it
 *  - `default`: the element of every coordinate the grid does not define
 */
export type Capability =
    | 'decodable'
    | 'decoded'
    | 'traversable'
    | 'winning'
    | 'transformable'
    | 'startable'
    | 'default';

/**
 * A family of transformations, e.g. "wall up" turns a door into a wall.
 * An element belongs to at most one family; a transform command names a family
 * and only applies to elements of that family.
 */
export interface TransformFamily {
    readonly name: string;
    /** verb shown to players, as in "you cannot <verb> the wall!" */
    readonly verb: string;
    /** name of the element a cell of this family becomes */
    readonly into: string;
}

/**
 * Immutable cell type. Elements are interned by their registry: there is
 * exactly one Element object per name, so they compare by reference.
 */
export interface Element {
    readonly name: string;
    readonly display: string;
    readonly mapSymbol: string | undefined;
    readonly description: string;
    readonly capabilities: ReadonlySet<Capability>;
    readonly family: TransformFamily | undefined;
}

/** Input of {@link ElementRegistry.build}. */
export interface ElementDefinition {
    name: string;
    display: string;
    mapSymbol?: string;
    description: string;
    capabilities: Capability[];
    family?: TransformFamily;
}

/**
 * Registry of the elements a maze is built from.
 *
 * Built once, by an explicit ordered registration step, then never mutated.
 */
export class ElementRegistry {

    private readonly byName: Map<string, Element> = new Map();
    private readonly bySymbol: Map<string, Element> = new Map();
    private readonly byCapability: Map<Capability, Element[]> = new Map();
    private readonly fallback: Element;

    // Abstraction function:
    //   AF(byName, bySymbol, byCapability, fallback) = the set of elements
    //     byName.values(), where the element read for map character s is
    //     bySymbol.get(s) if present and fallback otherwise.
    // Representation invariant:
    //   - fallback is in byName and is the only element with 'default'
    //   - bySymbol.get(s).mapSymbol === s for every s
    //   - byCapability.get(c) lists exactly the elements having c, in registration order
    //   - every family.into names an element of byName
    // Safety from rep exposure:
    //   - maps are private; Elements and their capability sets are frozen
    //   - withCapability() returns a fresh array

    private constructor(definitions: readonly ElementDefinition[]) {
        let fallback: Element | undefined;
        for (const definition of definitions) {
            const element = intern(definition);
            if (this.byName.has(element.name)) {
                throw new Error(`element '${element.name}' is registered twice`);
            }
            this.byName.set(element.name, element);
            if (element.mapSymbol !== undefined) {
                if (this.bySymbol.has(element.mapSymbol)) {
                    throw new Error(`map symbol '${element.mapSymbol}' is registered twice`);
                }
                this.bySymbol.set(element.mapSymbol, element);
            }
            for (const capability of element.capabilities) {
                const list = this.byCapability.get(capability) ?? [];
                list.push(element);
                this.byCapability.set(capability, list);
            }
            if (element.capabilities.has('default')) {
                if (fallback !== undefined) {
                    throw new Error(`both '${fallback.name}' and '${element.name}' are default elements`);
                }
                fallback = element;
            }
        }
        if (fallback === undefined) {
            throw new Error('no default element registered');
        }
        this.fallback = fallback;
        for (const element of this.byName.values()) {
            if (element.family !== undefined && !this.byName.has(element.family.into)) {
                throw new Error(`'${element.name}' transforms into unknown element '${element.family.into}'`);
            }
        }
        this.checkRep();
    }

    /**
     * Register the given elements, in order.
     *
     * @param definitions element definitions; exactly one must carry the `default` capability
     * @returns a registry of those elements
     * @throws Error if there is not exactly one default element, if a name or map symbol
     *         is used twice, or if a transform family names an unknown element
     */
    public static build(definitions: readonly ElementDefinition[]): ElementRegistry {
        return new ElementRegistry(definitions);
    }

    private checkRep(): void {
        assert(this.byName.get(this.fallback.name) === this.fallback);
        assert.strictEqual(this.byCapability.get('default')?.length, 1);
        for (const [symbol, element] of this.bySymbol) {
            assert.strictEqual(element.mapSymbol, symbol);
        }
    }

    /** The element of every coordinate a grid does not define. */
    public get defaultElement(): Element {
        return this.fallback;
    }

    /**
     * @param symbol a map character; letters are matched case-insensitively
     * @returns the element registered for `symbol`, or the default element
     */
    public resolve(symbol: string): Element {
        return this.bySymbol.get(symbol.toUpperCase()) ?? this.fallback;
    }

    /**
     * @param symbol a map character
     * @returns true iff an element is registered for `symbol`
     */
    public isKnown(symbol: string): boolean {
        return this.bySymbol.has(symbol.toUpperCase());
    }

    /**
     * @param name element name
     * @returns the element with that name, or undefined
     */
    public named(name: string): Element | undefined {
        return this.byName.get(name);
    }

    /**
     * @param element a transformable element of this registry
     * @returns the element it becomes once transformed, or undefined if it has no family
     */
    public transformed(element: Element): Element | undefined {
        return element.family === undefined ? undefined : this.byName.get(element.family.into);
    }

    /**
     * @param capability a capability
     * @returns the registered elements having it, in registration order
     */
    public withCapability(capability: Capability): Element[] {
        return [...(this.byCapability.get(capability) ?? [])];
    }

    /** @returns map symbols recognized when reading a map */
    public knownSymbols(): Set<string> {
        return new Set(this.bySymbol.keys());
    }

    /** @returns map symbols of the winning elements; a playable map has at least one */
    public winningSymbols(): Set<string> {
        const symbols = new Set<string>();
        for (const element of this.byCapability.get('winning') ?? []) {
            if (element.mapSymbol !== undefined) symbols.add(element.mapSymbol);
        }
        return symbols;
    }
}

/**
 * @param element an element
 * @param capability a capability
 * @returns true iff `element` has `capability`
 */
export function hasCapability(element: Element, capability: Capability): boolean {
    return element.capabilities.has(capability);
}

// complete the capability set with the capabilities the given ones imply
function intern(definition: ElementDefinition): Element {
    const capabilities = new Set<Capability>(definition.capabilities);
    if (capabilities.has('winning') || capabilities.has('startable')) capabilities.add('traversable');
    if (capabilities.has('winning') || capabilities.has('decoded')) capabilities.add('decodable');
    if (definition.mapSymbol !== undefined) capabilities.add('decodable');
    if (definition.family !== undefined) capabilities.add('transformable');
    if (capabilities.has('transformable') && definition.family === undefined) {
        throw new Error(`transformable element '${definition.name}' has no transform family`);
    }
    if (capabilities.has('decodable') && definition.mapSymbol === undefined) {
        throw new Error(`decodable element '${definition.name}' has no map symbol`);
    }
    return Object.freeze({
        name: definition.name,
        display: definition.display,
        mapSymbol: definition.mapSymbol?.toUpperCase(),
        description: definition.description,
        capabilities: Object.freeze(capabilities),
        family: definition.family,
    });
}

/** Turns a door into a wall. */
export const WALL_UP: TransformFamily = Object.freeze({ name: 'wall-up', verb: 'wall up', into: 'wall' });

/** Turns a wall into a door. */
export const PIERCE: TransformFamily = Object.freeze({ name: 'pierce', verb: 'pierce', into: 'door' });

/** Display symbol of the player a board is drawn for. */
export const PLAYER_SYMBOL = 'X';

/** Display symbol of the other players. */
export const OPPONENT_SYMBOL = 'x';

/**
 * @returns a registry of the standard maze elements:
 *   door `.`, wall `O`, exit `U`, and the default ground ` `
 */
export function standardElements(): ElementRegistry {
    return ElementRegistry.build([
        { name: 'door', display: '.', mapSymbol: '.', description: 'the door', capabilities: [ 'decoded', 'traversable' ], family: WALL_UP },
        { name: 'wall', display: 'O', mapSymbol: 'O', description: 'the wall', capabilities: [ 'decoded' ], family: PIERCE },
        { name: 'exit', display: 'U', mapSymbol: 'U', description: 'the exit', capabilities: [ 'decoded', 'winning' ] },
        { name: 'ground', display: ' ', mapSymbol: ' ', description: 'the ground', capabilities: [ 'default', 'startable' ] },
    ]);
}
