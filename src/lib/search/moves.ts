/**
 * Exit detection and move validation for the path search.
 */

import { DELTAS, type Direction } from '../core/direction.js';
import { Coordinate } from '../core/position.js';
import type { Grid } from '../core/types.js';
import { getCell, isOpen } from '../core/types.js';

/**
 * A coordinate is an exit when it lies on the outer boundary of the grid.
 * The start cell counts too, so a start on the border is its own exit.
 */
export function isExit(grid: Grid, pos: Coordinate): boolean {
  return (
    pos.row === 0 ||
    pos.row === grid.rows - 1 ||
    pos.col === 0 ||
    pos.col === grid.cols - 1
  );
}

/**
 * The coordinate one step away in the given direction. May be out of bounds.
 */
export function neighbor(pos: Coordinate, direction: Direction): Coordinate {
  const [dr, dc] = DELTAS[direction];
  return new Coordinate(pos.row + dr, pos.col + dc);
}

/**
 * Whether a step in the given direction is legal: the target must be inside the
 * grid and still Open. Start and Visited cells are never targets, which keeps
 * every path simple.
 */
export function canMove(grid: Grid, pos: Coordinate, direction: Direction): boolean {
  const target = neighbor(pos, direction);
  const cell = getCell(grid, target.row, target.col);
  return cell !== undefined && isOpen(cell);
}
