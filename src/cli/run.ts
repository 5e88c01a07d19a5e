/**
 * Composition root for the maze-paths command.
 */

import { readFileSync } from 'node:fs';
import { parseMaze } from '../lib/parser/parser.js';
import { buildReport } from '../lib/report/report.js';
import { isMazeError } from '../lib/core/errors.js';
import { ConfigError, loadConfig } from './config.js';
import { formatReport } from './format.js';

/**
 * Where progress and failures are written. `console` satisfies it.
 */
export interface Logger {
  log(message: string): void;
  error(message: string): void;
}

function readMaze(mazeFile: string): string {
  try {
    return readFileSync(mazeFile, 'utf8');
  } catch (e) {
    throw new ConfigError(
      `Cannot read maze file ${mazeFile}: ${e instanceof Error ? e.message : String(e)}`
    );
  }
}

/**
 * Load config and maze, solve, and print the report.
 *
 * @param configPath - Path of the JSON5 config file (may not exist)
 * @param logger - Output sink, defaults to console
 * @returns Process exit code: 0 on success, 1 on a maze or config failure
 */
export function run(configPath: string, logger: Logger = console): number {
  try {
    const config = loadConfig(configPath);
    logger.log(`📂 Loading maze from ${config.mazeFile}`);

    const grid = parseMaze(readMaze(config.mazeFile));
    logger.log(`🔍 Searching ${grid.rows}x${grid.cols} maze`);

    const report = buildReport(grid, config.maxVisits);
    for (const line of formatReport(report)) {
      logger.log(line);
    }
    return 0;
  } catch (error) {
    if (isMazeError(error) || error instanceof ConfigError) {
      logger.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }
}
