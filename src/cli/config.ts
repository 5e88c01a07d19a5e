/**
 * Configuration for the maze-paths command.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import JSON5 from 'json5';

/**
 * Name of the optional config file looked up in the working directory.
 */
export const DEFAULT_CONFIG_FILE = 'maze.config.json5';

export interface MazeConfig {
  /** Absolute path of the maze text file */
  readonly mazeFile: string;
  /** Visit budget for the search (Infinity = unbounded) */
  readonly maxVisits: number;
}

/**
 * Raised for unreadable or invalid configuration and input files.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse config text (JSON5).
 *
 * Recognized keys:
 * - mazeFile: path of the maze, relative to baseDir (default "maze.txt")
 * - maxVisits: positive integer or Infinity (default Infinity)
 *
 * @param text - JSON5 text (supports unquoted keys, trailing commas, comments)
 * @param baseDir - Directory relative paths are resolved against
 * @throws ConfigError if the text is not a JSON5 object or a field has the wrong type
 */
export function parseConfig(text: string, baseDir: string): MazeConfig {
  let raw: unknown;
  try {
    raw = JSON5.parse(text);
  } catch (e) {
    throw new ConfigError(`Invalid config JSON5: ${e instanceof Error ? e.message : String(e)}`);
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('Invalid config: expected an object');
  }

  let mazeFile = 'maze.txt';
  if ('mazeFile' in raw && raw.mazeFile !== undefined) {
    if (typeof raw.mazeFile !== 'string' || !raw.mazeFile) {
      throw new ConfigError('Invalid config: mazeFile must be a non-empty string');
    }
    mazeFile = raw.mazeFile;
  }

  let maxVisits = Infinity;
  if ('maxVisits' in raw && raw.maxVisits !== undefined) {
    const value = raw.maxVisits;
    if (
      typeof value !== 'number' ||
      !(value === Infinity || (Number.isInteger(value) && value > 0))
    ) {
      throw new ConfigError('Invalid config: maxVisits must be a positive integer or Infinity');
    }
    maxVisits = value;
  }

  return Object.freeze({
    mazeFile: resolve(baseDir, mazeFile),
    maxVisits,
  });
}

/**
 * Load config from a file. A missing file means defaults, resolved against the
 * file's directory.
 */
export function loadConfig(configPath: string): MazeConfig {
  const baseDir = dirname(resolve(configPath));
  if (!existsSync(configPath)) {
    return parseConfig('{}', baseDir);
  }
  return parseConfig(readFileSync(configPath, 'utf8'), baseDir);
}
