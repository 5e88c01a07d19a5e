/**
 * Find the start cell in a grid.
 */

import type { Grid } from '../core/types.js';
import { isStart } from '../core/types.js';
import { Coordinate } from '../core/position.js';
import { MazeError } from '../core/errors.js';

/**
 * Scan rows in order, then columns in order, for the first Start cell.
 *
 * @throws MazeError (NO_START_FOUND) if the grid has no start cell
 */
export function locateStart(grid: Grid): Coordinate {
  for (let rowIdx = 0; rowIdx < grid.rows; rowIdx++) {
    const row = grid.cells[rowIdx];
    for (let colIdx = 0; colIdx < row.length; colIdx++) {
      if (isStart(row[colIdx])) {
        return new Coordinate(rowIdx, colIdx);
      }
    }
  }
  throw new MazeError('NO_START_FOUND', `No start cell in ${grid.rows}x${grid.cols} grid`);
}
