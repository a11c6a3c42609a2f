/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import { OPPONENT_SYMBOL, PLAYER_SYMBOL } from './element.js';
import { samePosition, type Bounds, type Coordinates, type Grid } from './grid.js';

/**
 * Draw a board as text, one line per row of `bounds`, each line ending with a newline.
 *
 * @param grid elements of the maze
 * @param bounds inclusive box to draw
 * @param viewer position drawn as the player's own symbol, if any
 * @param opponents positions drawn as opponents
 * @returns the board, e.g. "OUO\nX x\n"
 */
export function renderBoard(grid: Grid, bounds: Bounds, viewer: Coordinates | undefined, opponents: readonly Coordinates[]): string {
    const [ min, max ] = bounds;
    const lines: string[] = [];
    for (let y = min[1]; y <= max[1]; ++y) {
        let line = '';
        for (let x = min[0]; x <= max[0]; ++x) {
            const position: Coordinates = [ x, y ];
            if (viewer !== undefined && samePosition(viewer, position)) {
                line += PLAYER_SYMBOL;
            } else if (opponents.some(opponent => samePosition(opponent, position))) {
                line += OPPONENT_SYMBOL;
            } else {
                line += grid.at(position).display;
            }
        }
        lines.push(line + '\n');
    }
    return lines.join('');
}
