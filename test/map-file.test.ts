/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { standardElements } from '../src/element.js';
import { checkMap, loadMap } from '../src/map-file.js';

/**
 * Tests for reading map files.
 */
describe('map files', function() {

    // Testing strategy
    //   checkMap(): playable, unknown symbols, no exit, lower-case symbols
    //   loadMap(): shipped maps, invalid map, missing file

    const elements = standardElements();

    it('accepts playable maps', function() {
        assert.deepStrictEqual(checkMap('OOO\nOU.\n', elements), []);
        assert.deepStrictEqual(checkMap('oou', elements), []);
    });

    it('reports unknown symbols and missing exits', function() {
        assert.deepStrictEqual(checkMap('OZ\nO#', elements), [
            'unknown symbols: \'Z\', \'#\'',
            'no exit: a map needs one of \'U\'',
        ]);
    });

    it('loads the shipped maps', async function() {
        for (const file of [ 'maps/crossroads.txt', 'maps/corridor.txt' ]) {
            const map = await loadMap(file, elements);
            assert.strictEqual(map.name, path.basename(file, '.txt'));
            assert(map.text.includes('U'));
        }
    });

    it('rejects invalid and missing files', async function() {
        const directory = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'maze-'));
        const invalid = path.join(directory, 'invalid.txt');
        await fs.promises.writeFile(invalid, 'OOO\nO O\n');
        await assert.rejects(loadMap(invalid, elements), /no exit/);
        await assert.rejects(loadMap(path.join(directory, 'missing.txt'), elements));
        await fs.promises.rm(directory, { recursive: true });
    });
});
