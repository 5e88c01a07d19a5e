/**
 * Maze path search library.
 *
 * Pipeline: parseMaze -> locateStart -> enumeratePaths -> rankPaths -> buildReport.
 */

export {
  type Cell,
  type Grid,
  Blocked,
  Open,
  Start,
  Visited,
  isBlocked,
  isOpen,
  isStart,
  isVisited,
  createGrid,
  getCell,
} from './core/types.js';
export { Coordinate } from './core/position.js';
export { Direction, EXPLORATION_ORDER, DELTAS } from './core/direction.js';
export { MazeError, isMazeError, type MazeErrorReason } from './core/errors.js';
export { getCellAt, setCell } from './utils/immutable.js';
export { parseMaze, exportMaze, SYMBOLS } from './parser/parser.js';
export {
  locateStart,
  isExit,
  canMove,
  neighbor,
  enumeratePaths,
  rankPaths,
  type Path,
  type RankedPaths,
} from './search/index.js';
export { buildReport, type MazeReport, type PathSummary } from './report/report.js';
