/**
 * Tests for buildReport.
 */

import { describe, it, expect } from 'vitest';
import { buildReport } from '../../src/lib/report/report.js';
import { parseMaze } from '../../src/lib/parser/parser.js';
import { Open, createGrid } from '../../src/lib/core/types.js';
import { catchMazeError, SAMPLE_MAZE, toPairs } from '../helpers.js';

describe('buildReport', () => {
  it('reports count, shortest and longest for the sample maze', () => {
    const report = buildReport(parseMaze(SAMPLE_MAZE));

    expect(report.start.toKey()).toBe('2,1');
    expect(report.pathCount).toBe(3);
    expect(report.shortest.length).toBe(8);
    expect(report.longest.length).toBe(12);
    expect(toPairs([report.shortest.steps, report.longest.steps])).toEqual([
      [[2, 1], [2, 2], [1, 2], [1, 3], [1, 4], [2, 4], [3, 4], [3, 5]],
      [[2, 1], [2, 2], [1, 2], [1, 3], [1, 4], [2, 4], [3, 4], [4, 4], [4, 3], [4, 2], [4, 1], [4, 0]],
    ]);
  });

  it('reports a single length-1 path for a start on the edge of a one-row maze', () => {
    const report = buildReport(parseMaze('*00'));

    expect(report.pathCount).toBe(1);
    expect(report.shortest.length).toBe(1);
    expect(report.longest.length).toBe(1);
    expect(toPairs([report.shortest.steps])).toEqual([[[0, 0]]]);
  });

  it('fails with EMPTY_PATH_SET for an enclosed start', () => {
    const error = catchMazeError(() => buildReport(parseMaze('xxx\nx*x\nxxx')));
    expect(error.reason).toBe('EMPTY_PATH_SET');
  });

  it('fails with NO_START_FOUND for a grid without a start', () => {
    const error = catchMazeError(() => buildReport(createGrid([[Open(), Open()]])));
    expect(error.reason).toBe('NO_START_FOUND');
  });

  it('passes the visit budget to the search', () => {
    const error = catchMazeError(() => buildReport(parseMaze(SAMPLE_MAZE), 5));
    expect(error.reason).toBe('SEARCH_ABORTED');
  });
});
