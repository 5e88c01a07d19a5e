/**
 * Failure information for maze parsing and search.
 */

/**
 * Reasons why a maze run can fail.
 *
 * - MALFORMED_MAZE: unequal rows, unknown symbol, or not exactly one start marker
 * - NO_START_FOUND: the grid holds no start cell
 * - EMPTY_PATH_SET: the search finished without reaching any exit
 * - SEARCH_ABORTED: the search exceeded its visit budget
 */
export type MazeErrorReason =
  | 'MALFORMED_MAZE'
  | 'NO_START_FOUND'
  | 'EMPTY_PATH_SET'
  | 'SEARCH_ABORTED';

/**
 * A terminal failure of a maze run.
 */
export class MazeError extends Error {
  constructor(
    public readonly reason: MazeErrorReason,
    public readonly details?: string
  ) {
    super(details ? `${reason}: ${details}` : reason);
    this.name = 'MazeError';
  }
}

/**
 * Type guard to check if a value is a MazeError.
 */
export function isMazeError(value: unknown): value is MazeError {
  return value instanceof MazeError;
}
