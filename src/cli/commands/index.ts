/**
 * CLI Commands Registry
 *
 * Available commands:
 * - run: Search, enrich and publish courts
 * - status: Show stored counts
 * - queries: List the search catalog
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerRunCommand } from './run.js';
import { registerStatusCommand } from './status.js';
import { registerQueriesCommand } from './queries.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerStatusCommand(program);
  registerQueriesCommand(program);
}
