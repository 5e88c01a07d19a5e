/**
 * Text rendering of maze reports.
 */

import type { Path } from '../lib/search/enumerate.js';
import type { MazeReport } from '../lib/report/report.js';

/**
 * Render a path as "(r,c) -> (r,c) -> ...".
 */
export function formatPath(path: Path): string {
  return path.map(pos => pos.toString()).join(' -> ');
}

export function formatReport(report: MazeReport): string[] {
  return [
    `The maze has ${report.pathCount} paths.`,
    `The shortest path in the maze is: ${report.shortest.length} steps long.`,
    `The path is ${formatPath(report.shortest.steps)}`,
    `The longest path in the maze is: ${report.longest.length} steps long.`,
    `The path is ${formatPath(report.longest.steps)}`,
  ];
}
