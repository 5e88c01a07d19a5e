/**
 * Exhaustive path enumeration.
 */

import { EXPLORATION_ORDER } from '../core/direction.js';
import type { Coordinate } from '../core/position.js';
import type { Grid } from '../core/types.js';
import { Visited } from '../core/types.js';
import { MazeError } from '../core/errors.js';
import { setCell } from '../utils/immutable.js';
import { canMove, isExit, neighbor } from './moves.js';

/**
 * Ordered coordinates from the start (inclusive) to an exit (inclusive).
 */
export type Path = ReadonlyArray<Coordinate>;

/**
 * One pending branch of the search.
 */
interface State {
  readonly grid: Grid;
  readonly position: Coordinate;
  readonly steps: ReadonlyArray<Coordinate>;
}

/**
 * Enumerate every simple path from start to any boundary cell.
 *
 * Depth-first over an explicit decision stack, so search depth is not limited by
 * the call stack. Each branch sees its own grid snapshot: stepping off a cell
 * derives a new grid with that cell marked Visited, and snapshots are never
 * mutated, so sibling branches never see each other's marks.
 *
 * Directions are tried in EXPLORATION_ORDER and paths are returned in the order
 * a recursive search trying the same order would find them. Dead ends yield
 * nothing; a start on the boundary yields the single path [start].
 *
 * @param grid - The maze, before any search marks
 * @param start - Starting coordinate (usually from locateStart)
 * @param maxVisits - Maximum number of search states to expand
 * @returns All paths, in discovery order (may be empty)
 * @throws MazeError (SEARCH_ABORTED) if more than maxVisits states are expanded
 *
 * @example
 * ```typescript
 * const grid = parseMaze('xxx\n*00\nxxx');
 * enumeratePaths(grid, locateStart(grid));
 * // [[(1,0)]] - the start is already on the boundary
 * ```
 */
export function enumeratePaths(
  grid: Grid,
  start: Coordinate,
  maxVisits: number = Infinity
): Path[] {
  const paths: Path[] = [];
  const decisionStack: State[] = [{ grid, position: start, steps: [] }];
  let visits = 0;

  while (decisionStack.length > 0) {
    const state = decisionStack.pop();
    if (!state) break;

    visits++;
    if (visits > maxVisits) {
      throw new MazeError(
        'SEARCH_ABORTED',
        `Exceeded maximum of ${maxVisits} visits after finding ${paths.length} paths`
      );
    }

    const steps = [...state.steps, state.position];

    if (isExit(state.grid, state.position)) {
      paths.push(steps);
      continue;
    }

    // Shared by all children; never mutated after this point
    const marked = setCell(state.grid, state.position, Visited());

    // Push in reverse so the first direction is expanded first
    for (let i = EXPLORATION_ORDER.length - 1; i >= 0; i--) {
      const direction = EXPLORATION_ORDER[i];
      if (canMove(state.grid, state.position, direction)) {
        decisionStack.push({
          grid: marked,
          position: neighbor(state.position, direction),
          steps,
        });
      }
    }
  }

  return paths;
}
