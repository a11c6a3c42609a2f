/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import { standardElements } from '../src/element.js';
import { boundingBox, Grid, samePosition, translate } from '../src/grid.js';
import { renderBoard } from '../src/render.js';

/**
 * Tests for grids and board drawing.
 */
describe('Grid', function() {

    // Testing strategy
    //   at(): defined position, undefined position, deleted position
    //   boundingBox(): no positions, one, several with negative coordinates
    //   renderBoard(): with and without viewer, opponents, undefined cells

    const elements = standardElements();
    const wall = elements.resolve('O');
    const exit = elements.resolve('U');

    it('falls back on undefined positions', function() {
        const grid = new Grid(elements.defaultElement);
        grid.set([ 1, 2 ], wall);
        assert.strictEqual(grid.at([ 1, 2 ]), wall);
        assert.strictEqual(grid.at([ 2, 1 ]), elements.defaultElement);
        assert(grid.has([ 1, 2 ]));
        assert.strictEqual(grid.size, 1);

        assert(grid.delete([ 1, 2 ]));
        assert(!grid.delete([ 1, 2 ]));
        assert.strictEqual(grid.at([ 1, 2 ]), elements.defaultElement);
        assert.deepStrictEqual(grid.entries(), []);
    });

    it('keeps positions in definition order', function() {
        const grid = new Grid(elements.defaultElement);
        grid.set([ 3, 0 ], exit);
        grid.set([ 0, 0 ], wall);
        grid.set([ 3, 0 ], wall);
        assert.deepStrictEqual(grid.positions(), [ [ 3, 0 ], [ 0, 0 ] ]);
        assert.deepStrictEqual(grid.entries().map(([ , element ]) => element.name), [ 'wall', 'wall' ]);
    });

    it('computes bounding boxes', function() {
        assert.deepStrictEqual(boundingBox([]), [ [ 0, 0 ], [ 0, 0 ] ]);
        assert.deepStrictEqual(boundingBox([ [ 2, 3 ] ]), [ [ 2, 3 ], [ 2, 3 ] ]);
        assert.deepStrictEqual(boundingBox([ [ 2, 3 ], [ -1, 5 ], [ 0, -2 ] ]), [ [ -1, -2 ], [ 2, 5 ] ]);
    });

    it('translates positions', function() {
        assert.deepStrictEqual(translate([ 2, 3 ], [ -1, 0 ]), [ 1, 3 ]);
        assert(samePosition(translate([ 0, 0 ], [ 0, -1 ]), [ 0, -1 ]));
        assert(!samePosition([ 0, 1 ], [ 1, 0 ]));
    });

    it('draws boards with players', function() {
        const grid = new Grid(elements.defaultElement);
        grid.set([ 0, 0 ], wall);
        grid.set([ 1, 0 ], exit);
        grid.set([ 2, 0 ], wall);
        assert.strictEqual(renderBoard(grid, [ [ 0, 0 ], [ 2, 1 ] ], [ 0, 1 ], [ [ 2, 1 ] ]), 'OUO\nX x\n');
        assert.strictEqual(renderBoard(grid, [ [ 0, 0 ], [ 2, 1 ] ], undefined, []), 'OUO\n   \n');
        assert.strictEqual(renderBoard(grid, [ [ 1, -1 ], [ 1, 0 ] ], undefined, []), ' \nU\n');
    });
});
