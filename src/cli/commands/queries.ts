/**
 * Queries Command
 *
 * Lists the search catalog with completion marks from the checkpoint.
 *
 * @module cli/commands/queries
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../config/index.js';
import { buildQueryCatalog } from '../../catalog/queries.js';
import { loadPipelineState } from '../../storage/courts.js';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { resolvePaths, type DirectoryOptions } from './options.js';

export interface QueriesCommandOptions extends DirectoryOptions {
  /** Only list queries that have not run yet */
  pending?: boolean;
}

export interface QueryStatus {
  query: string;
  completed: boolean;
}

/**
 * Handle the queries command.
 */
export async function handleQueries(
  options: QueriesCommandOptions,
  base: BaseCommand,
  env: NodeJS.ProcessEnv = process.env
): Promise<QueryStatus[]> {
  const paths = resolvePaths(options, loadConfig(env));
  const { queryLog } = await loadPipelineState(paths, base);

  const statuses = buildQueryCatalog()
    .map((query) => ({ query, completed: queryLog.has(query) }))
    .filter((status) => !options.pending || !status.completed);

  for (const status of statuses) {
    const mark = status.completed ? chalk.green('[x]') : chalk.dim('[ ]');
    base.info(`${mark} ${status.query}`);
  }

  return statuses;
}

export function registerQueriesCommand(program: Command): void {
  program
    .command('queries')
    .description('List search queries and whether they have run')
    .option('-p, --pending', 'Only show queries that have not run')
    .option('--data-dir <path>', 'Override the data directory')
    .option('--docs-dir <path>', 'Override the published docs directory')
    .action(async (options: QueriesCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);

      try {
        await handleQueries(options, base);
      } catch (error) {
        if (error instanceof Error) {
          base.fatal(error.message, error);
        }
        throw error;
      }
    });
}
