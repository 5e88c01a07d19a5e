#!/usr/bin/env node
/**
 * Main entry point for the maze-paths command.
 */

import { DEFAULT_CONFIG_FILE } from './cli/config.js';
import { run } from './cli/run.js';

process.exitCode = run(DEFAULT_CONFIG_FILE);
