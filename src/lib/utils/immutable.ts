/**
 * Utilities for working with immutable grid data.
 */

import type { Cell, Grid } from '../core/types.js';
import type { Coordinate } from '../core/position.js';

/**
 * Get the cell at a given coordinate.
 *
 * @returns The cell at the given coordinate
 * @throws Error if the coordinate is outside the grid
 */
export function getCellAt(grid: Grid, pos: Coordinate): Cell {
  if (pos.row < 0 || pos.row >= grid.rows || pos.col < 0 || pos.col >= grid.cols) {
    throw new Error(`Position out of bounds: ${pos} in ${grid.rows}x${grid.cols} grid`);
  }
  return grid.cells[pos.row][pos.col];
}

/**
 * Set a cell at the given coordinate, returning a new Grid.
 * The original grid is unchanged; rows other than the target row are shared.
 *
 * @param grid - The grid to update
 * @param position - The coordinate to update
 * @param newCell - The new cell value
 * @returns A new Grid with the updated cell
 * @throws Error if the coordinate is outside the grid
 */
export function setCell(grid: Grid, position: Coordinate, newCell: Cell): Grid {
  getCellAt(grid, position);

  const newCells = grid.cells.map((row, rowIndex) => {
    if (rowIndex !== position.row) {
      return row; // Reuse unchanged rows
    }
    return Object.freeze(
      row.map((cell, colIndex) => (colIndex === position.col ? newCell : cell))
    );
  });

  return Object.freeze({
    cells: Object.freeze(newCells),
    rows: grid.rows,
    cols: grid.cols,
  });
}
