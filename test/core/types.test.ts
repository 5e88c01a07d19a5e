/**
 * Tests for basic grid data structures.
 */

import { describe, it, expect } from 'vitest';
import {
  Blocked,
  Open,
  Start,
  Visited,
  createGrid,
  getCell,
  isBlocked,
  isOpen,
  isStart,
  isVisited,
} from '../../src/lib/core/types.js';
import { Coordinate } from '../../src/lib/core/position.js';
import { catchMazeError } from '../helpers.js';

describe('TestGridStructures', () => {
  it('test_cell_creation', () => {
    expect(Blocked().type).toBe('blocked');
    expect(Open().type).toBe('open');
    expect(Start().type).toBe('start');
    expect(Visited().type).toBe('visited');
  });

  it('test_cell_guards', () => {
    expect(isBlocked(Blocked())).toBe(true);
    expect(isOpen(Open())).toBe(true);
    expect(isOpen(Start())).toBe(false);
    expect(isStart(Start())).toBe(true);
    expect(isVisited(Visited())).toBe(true);
    expect(isVisited(Open())).toBe(false);
  });

  it('test_grid_dimensions', () => {
    const grid = createGrid([
      [Blocked(), Open(), Start()],
      [Open(), Open(), Blocked()],
    ]);
    expect(grid.rows).toBe(2);
    expect(grid.cols).toBe(3);
    expect(Object.isFrozen(grid)).toBe(true);
    expect(Object.isFrozen(grid.cells[0])).toBe(true);
  });

  it('test_get_cell_bounds', () => {
    const grid = createGrid([[Start(), Open()]]);
    expect(getCell(grid, 0, 0)).toBe(Start());
    expect(getCell(grid, 0, 1)).toBe(Open());
    expect(getCell(grid, 0, 2)).toBeUndefined();
    expect(getCell(grid, -1, 0)).toBeUndefined();
    expect(getCell(grid, 1, 0)).toBeUndefined();
  });

  it('test_grid_rejects_empty', () => {
    expect(catchMazeError(() => createGrid([])).reason).toBe('MALFORMED_MAZE');
    expect(catchMazeError(() => createGrid([[]])).reason).toBe('MALFORMED_MAZE');
  });

  it('test_grid_rejects_ragged_rows', () => {
    const error = catchMazeError(() => createGrid([[Open(), Open()], [Open()]]));
    expect(error.reason).toBe('MALFORMED_MAZE');
    expect(error.details).toBe('Inconsistent row length at row 1: expected 2, got 1');
  });
});

describe('TestCoordinate', () => {
  it('test_coordinate_key_and_equality', () => {
    const a = new Coordinate(2, 3);
    expect(a.toKey()).toBe('2,3');
    expect(a.toString()).toBe('(2,3)');
    expect(a.equals(new Coordinate(2, 3))).toBe(true);
    expect(a.equals(new Coordinate(3, 2))).toBe(false);
  });
});
