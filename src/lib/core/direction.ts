/**
 * Cardinal directions for grid traversal.
 */
export enum Direction {
  N = 'N', // Up (decreasing row)
  S = 'S', // Down (increasing row)
  E = 'E', // Right (increasing col)
  W = 'W', // Left (decreasing col)
}

/**
 * Order in which the path search tries directions: right, up, left, down.
 * Changing it changes the emission order of paths, and so the tie order of
 * equal-length paths after ranking.
 */
export const EXPLORATION_ORDER: ReadonlyArray<Direction> = Object.freeze([
  Direction.E,
  Direction.N,
  Direction.W,
  Direction.S,
]);

/**
 * Row/column delta for one step in each direction.
 */
export const DELTAS: Readonly<Record<Direction, readonly [number, number]>> = {
  [Direction.N]: [-1, 0],
  [Direction.S]: [1, 0],
  [Direction.E]: [0, 1],
  [Direction.W]: [0, -1],
};
