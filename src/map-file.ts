/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { ElementRegistry } from './element.js';

/** A map read from disk. */
export interface MapFile {
    /** file name without directory or extension */
    readonly name: string;
    readonly text: string;
}

/**
 * Check that a map can be played with the given elements.
 *
 * @param text map, one row per line
 * @param elements elements the map is read with
 * @returns problems found, empty if the map is playable
 */
export function checkMap(text: string, elements: ElementRegistry): string[] {
    const problems: string[] = [];
    const characters = text.split(/\r\n|\r|\n/).join('');
    const unknown = new Set<string>();
    for (const character of characters) {
        if (!elements.isKnown(character)) unknown.add(character);
    }
    if (unknown.size > 0) {
        problems.push(`unknown symbols: ${[...unknown].map(symbol => `'${symbol}'`).join(', ')}`);
    }
    const winning = [...elements.winningSymbols()];
    if (!winning.some(symbol => characters.toUpperCase().includes(symbol))) {
        problems.push(`no exit: a map needs one of ${winning.map(symbol => `'${symbol}'`).join(', ')}`);
    }
    return problems;
}

/**
 * Read a map file.
 *
 * @param filename path to a map file
 * @param elements elements the map is read with
 * @returns the map's name and text
 * @throws Error if the file cannot be read or the map is not playable
 */
export async function loadMap(filename: string, elements: ElementRegistry): Promise<MapFile> {
    const text = (await fs.promises.readFile(filename)).toString();
    const problems = checkMap(text, elements);
    if (problems.length > 0) {
        throw new Error(`invalid map ${filename}: ${problems.join('; ')}`);
    }
    return { name: path.basename(filename, path.extname(filename)), text };
}
