/**
 * Structured result of solving a maze.
 */

import type { Coordinate } from '../core/position.js';
import type { Grid } from '../core/types.js';
import { enumeratePaths, type Path } from '../search/enumerate.js';
import { locateStart } from '../search/locate.js';
import { rankPaths } from '../search/rank.js';

/**
 * One path as reported: its length and its coordinates from start to exit.
 */
export interface PathSummary {
  readonly length: number;
  readonly steps: Path;
}

export interface MazeReport {
  readonly start: Coordinate;
  readonly pathCount: number;
  readonly shortest: PathSummary;
  readonly longest: PathSummary;
}

function summarize(path: Path): PathSummary {
  return Object.freeze({ length: path.length, steps: path });
}

/**
 * Locate the start, enumerate every path out and rank them.
 *
 * @param grid - Parsed maze
 * @param maxVisits - Visit budget passed to enumeratePaths
 * @throws MazeError (NO_START_FOUND, EMPTY_PATH_SET or SEARCH_ABORTED)
 */
export function buildReport(grid: Grid, maxVisits: number = Infinity): MazeReport {
  const start = locateStart(grid);
  const ranked = rankPaths(enumeratePaths(grid, start, maxVisits));

  return Object.freeze({
    start,
    pathCount: ranked.paths.length,
    shortest: summarize(ranked.shortest),
    longest: summarize(ranked.longest),
  });
}
