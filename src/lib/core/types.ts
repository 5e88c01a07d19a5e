/**
 * Core data structures for maze grids.
 */

import { MazeError } from './errors.js';

// =============================================================================
// Cell Types
// =============================================================================

/**
 * A wall. Never traversable.
 */
export interface Blocked {
  readonly type: 'blocked';
}

/**
 * A floor cell that has not been stepped on yet.
 */
export interface Open {
  readonly type: 'open';
}

/**
 * The start marker. Only distinguished when locating the start;
 * it is never a legal move target.
 */
export interface Start {
  readonly type: 'start';
}

/**
 * A cell already walked by the current search branch.
 */
export interface Visited {
  readonly type: 'visited';
}

/**
 * Union type for all cell variants.
 */
export type Cell = Blocked | Open | Start | Visited;

// =============================================================================
// Factory Functions
// =============================================================================

const BLOCKED: Blocked = Object.freeze({ type: 'blocked' });
const OPEN: Open = Object.freeze({ type: 'open' });
const START: Start = Object.freeze({ type: 'start' });
const VISITED: Visited = Object.freeze({ type: 'visited' });

export function Blocked(): Blocked {
  return BLOCKED;
}

export function Open(): Open {
  return OPEN;
}

export function Start(): Start {
  return START;
}

export function Visited(): Visited {
  return VISITED;
}

// =============================================================================
// Type Guards
// =============================================================================

export function isBlocked(cell: Cell): cell is Blocked {
  return cell.type === 'blocked';
}

export function isOpen(cell: Cell): cell is Open {
  return cell.type === 'open';
}

export function isStart(cell: Cell): cell is Start {
  return cell.type === 'start';
}

export function isVisited(cell: Cell): cell is Visited {
  return cell.type === 'visited';
}

// =============================================================================
// Grid Structure
// =============================================================================

/**
 * A rectangular 2D grid of cells.
 * Grids are immutable - updates go through setCell, which returns a new grid.
 */
export interface Grid {
  readonly cells: ReadonlyArray<ReadonlyArray<Cell>>;
  readonly rows: number;
  readonly cols: number;
}

/**
 * Create a new Grid from a 2D array of cells.
 *
 * @param cells - 2D array of cells (must be rectangular and non-empty)
 * @returns Frozen Grid object
 * @throws MazeError (MALFORMED_MAZE) if the cells array is not a non-empty rectangle
 */
export function createGrid(cells: Cell[][]): Grid {
  if (cells.length === 0) {
    throw new MazeError('MALFORMED_MAZE', 'Grid must have at least one row');
  }

  const rows = cells.length;
  const cols = cells[0].length;

  if (cols === 0) {
    throw new MazeError('MALFORMED_MAZE', 'Grid must have at least one column');
  }

  for (let i = 0; i < rows; i++) {
    if (cells[i].length !== cols) {
      throw new MazeError(
        'MALFORMED_MAZE',
        `Inconsistent row length at row ${i}: expected ${cols}, got ${cells[i].length}`
      );
    }
  }

  const frozenCells = Object.freeze(cells.map(row => Object.freeze(row)));

  return Object.freeze({
    cells: frozenCells,
    rows,
    cols,
  });
}

/**
 * Get a cell from a grid at the given row and column.
 *
 * @returns The cell, or undefined if position is out of bounds
 */
export function getCell(grid: Grid, row: number, col: number): Cell | undefined {
  if (row < 0 || row >= grid.rows || col < 0 || col >= grid.cols) {
    return undefined;
  }
  return grid.cells[row][col];
}
