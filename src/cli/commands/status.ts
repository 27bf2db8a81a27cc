/**
 * Status Command
 *
 * Reports what is stored locally without calling the API.
 *
 * @module cli/commands/status
 */

import { Command } from 'commander';
import { loadConfig } from '../../config/index.js';
import { buildQueryCatalog } from '../../catalog/queries.js';
import { loadPipelineState, countCourts } from '../../storage/courts.js';
import type { CourtTotals } from '../../pipeline/types.js';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { createSpinner } from '../formatters/progress.js';
import { formatTotals } from '../formatters/run-summary.js';
import { resolvePaths, type DirectoryOptions } from './options.js';

/**
 * Options for the status command.
 */
export interface StatusCommandOptions extends DirectoryOptions {
  /** Print machine-readable JSON */
  json?: boolean;
}

export interface StatusReport {
  totals: CourtTotals;
  completedQueries: number;
  pendingQueries: number;
  legacyQueriesAssumed: boolean;
}

/**
 * Handle the status command.
 */
export async function handleStatus(
  options: StatusCommandOptions,
  base: BaseCommand,
  env: NodeJS.ProcessEnv = process.env
): Promise<StatusReport> {
  const paths = resolvePaths(options, loadConfig(env));
  const spinner = createSpinner(`Reading ${paths.courtsFile}`, { silent: base.isQuiet() || options.json });

  let report: StatusReport;
  try {
    const state = await loadPipelineState(paths, base);
    const catalog = buildQueryCatalog();
    report = {
      totals: countCourts(state.courts),
      completedQueries: catalog.filter((query) => state.queryLog.has(query)).length,
      pendingQueries: catalog.filter((query) => !state.queryLog.has(query)).length,
      legacyQueriesAssumed: state.legacyQueriesAssumed,
    };
    spinner.succeed(`Loaded ${report.totals.total} courts`);
  } catch (error) {
    spinner.fail('Could not read stored courts');
    throw error;
  }

  if (options.json) {
    base.json(report);
    return report;
  }

  base.section('Courts');
  for (const line of formatTotals(report.totals)) {
    base.info(line);
  }
  base.section('Queries');
  base.keyValue('Complete', report.completedQueries);
  base.keyValue('Pending', report.pendingQueries);

  return report;
}

/**
 * Register the status command.
 */
export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show stored court and query counts')
    .option('--json', 'Print JSON')
    .option('--data-dir <path>', 'Override the data directory')
    .option('--docs-dir <path>', 'Override the published docs directory')
    .action(async (options: StatusCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);

      try {
        await handleStatus(options, base);
      } catch (error) {
        if (error instanceof Error) {
          base.fatal(error.message, error);
        }
        throw error;
      }
    });
}
