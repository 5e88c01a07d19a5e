/**
 * Parse mazes from their text format.
 */

import { Cell, Blocked, Open, Start, Grid, createGrid } from '../core/types.js';
import { MazeError } from '../core/errors.js';

/**
 * Symbols used by the text format.
 */
export const SYMBOLS = Object.freeze({
  blocked: 'x',
  open: '0',
  start: '*',
  visited: '.',
});

/**
 * Parse a maze from its text format.
 *
 * Format:
 * - One row per line; surrounding whitespace of the whole text is trimmed
 * - Each character is one cell:
 *   * 'x': Blocked
 *   * '0': Open
 *   * '*': Start (exactly one per maze)
 * - All rows must have the same length
 *
 * Example:
 *     xxx
 *     *00
 *     xxx
 *     Creates a 3x3 grid with the start at (1, 0).
 *
 * @param text - The maze text
 * @returns Parsed Grid
 * @throws MazeError (MALFORMED_MAZE) with diagnostic details if parsing fails
 */
export function parseMaze(text: string): Grid {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new MazeError('MALFORMED_MAZE', 'Maze text is empty');
  }

  const rowStrings = trimmed.split(/\r?\n/);
  const rows: Cell[][] = [];
  let startCount = 0;

  for (let rowIdx = 0; rowIdx < rowStrings.length; rowIdx++) {
    const rowStr = rowStrings[rowIdx];
    const cells: Cell[] = [];

    for (let colIdx = 0; colIdx < rowStr.length; colIdx++) {
      const char = rowStr[colIdx];

      if (char === SYMBOLS.blocked) {
        cells.push(Blocked());
      } else if (char === SYMBOLS.open) {
        cells.push(Open());
      } else if (char === SYMBOLS.start) {
        startCount++;
        cells.push(Start());
      } else {
        const errorMsg =
          `Invalid cell character: '${char}'\n` +
          `  Row ${rowIdx}: "${rowStr}"\n` +
          `  Position: column ${colIdx}\n` +
          `  Valid symbols:\n` +
          `    - '${SYMBOLS.blocked}': Blocked cell\n` +
          `    - '${SYMBOLS.open}': Open cell\n` +
          `    - '${SYMBOLS.start}': Start cell`;
        throw new MazeError('MALFORMED_MAZE', errorMsg);
      }
    }

    rows.push(cells);
  }

  // Validate all rows have same length
  const cols = rows[0].length;
  const mismatched: [number, number][] = [];

  for (let i = 0; i < rows.length; i++) {
    if (rows[i].length !== cols) {
      mismatched.push([i, rows[i].length]);
    }
  }

  if (mismatched.length > 0) {
    let errorMsg =
      `Inconsistent row lengths\n` +
      `  Expected: ${cols} columns (from row 0)\n` +
      `  Mismatched rows:\n`;

    for (const [rowIdx, actualCols] of mismatched) {
      errorMsg += `    Row ${rowIdx}: ${actualCols} columns - "${rowStrings[rowIdx]}"\n`;
    }
    errorMsg += `  All rows must have the same number of cells`;
    throw new MazeError('MALFORMED_MAZE', errorMsg);
  }

  if (startCount !== 1) {
    throw new MazeError(
      'MALFORMED_MAZE',
      `Expected exactly one start marker '${SYMBOLS.start}', found ${startCount}`
    );
  }

  return createGrid(rows);
}

/**
 * Export a grid to the text format (inverse of parseMaze).
 * Visited cells, which only exist on search snapshots, are written as '.'.
 *
 * @example
 * exportMaze(parseMaze('xxx\n*00\nxxx')) // 'xxx\n*00\nxxx'
 */
export function exportMaze(grid: Grid): string {
  return grid.cells
    .map(row =>
      row
        .map(cell => {
          switch (cell.type) {
            case 'blocked':
              return SYMBOLS.blocked;
            case 'open':
              return SYMBOLS.open;
            case 'start':
              return SYMBOLS.start;
            case 'visited':
              return SYMBOLS.visited;
          }
        })
        .join('')
    )
    .join('\n');
}
