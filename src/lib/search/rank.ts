/**
 * Order enumerated paths by length.
 */

import { MazeError } from '../core/errors.js';
import type { Path } from './enumerate.js';

/**
 * Paths sorted by ascending length, with the extremes picked out.
 */
export interface RankedPaths {
  readonly paths: ReadonlyArray<Path>;
  readonly shortest: Path;
  readonly longest: Path;
}

/**
 * Stable-sort paths by number of coordinates. Equal-length paths keep the order
 * the search emitted them in. Neither the input array nor the paths are modified.
 *
 * @throws MazeError (EMPTY_PATH_SET) if there are no paths
 */
export function rankPaths(paths: ReadonlyArray<Path>): RankedPaths {
  if (paths.length === 0) {
    throw new MazeError('EMPTY_PATH_SET', 'The search found no way out of the maze');
  }

  // Array.prototype.sort is stable
  const sorted = [...paths].sort((a, b) => a.length - b.length);

  return Object.freeze({
    paths: Object.freeze(sorted),
    shortest: sorted[0],
    longest: sorted[sorted.length - 1],
  });
}
