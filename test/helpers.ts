/**
 * Shared test helpers.
 */

import { isMazeError, type MazeError } from '../src/lib/core/errors.js';
import type { Path } from '../src/lib/search/enumerate.js';

export const SAMPLE_MAZE = [
  'xxxxxx',
  '0x000x',
  'x*0x0x',
  'xxxx00',
  '00000x',
  'xxxx0x',
].join('\n');

/**
 * Run fn and return the MazeError it throws.
 */
export function catchMazeError(fn: () => unknown): MazeError {
  try {
    fn();
  } catch (e) {
    if (isMazeError(e)) {
      return e;
    }
    throw e;
  }
  throw new Error('Expected a MazeError to be thrown');
}

/**
 * Paths as plain [row, col] pairs for readable assertions.
 */
export function toPairs(paths: ReadonlyArray<Path>): number[][][] {
  return paths.map(path => path.map(pos => [pos.row, pos.col]));
}
