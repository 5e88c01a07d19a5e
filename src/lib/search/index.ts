/**
 * Path search - locate the start, enumerate every way out, rank by length.
 */

export { locateStart } from './locate.js';
export { isExit, canMove, neighbor } from './moves.js';
export { enumeratePaths } from './enumerate.js';
export type { Path } from './enumerate.js';
export { rankPaths } from './rank.js';
export type { RankedPaths } from './rank.js';
