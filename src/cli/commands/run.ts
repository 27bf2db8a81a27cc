/**
 * Run Command
 *
 * Executes the full pipeline: search pending queries, enrich courts,
 * add Street View links and publish courts.json.
 *
 * @module cli/commands/run
 */

import { Command } from 'commander';
import { loadConfig, requireApiKey, ConfigError } from '../../config/index.js';
import { PlacesClient } from '../../places/client.js';
import type { RetryPolicy, SleepFn } from '../../places/http.js';
import { runPipeline } from '../../pipeline/runner.js';
import type { RunSummary } from '../../pipeline/types.js';
import { getBaseCommand, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { SpinnerPhaseReporter } from '../formatters/progress.js';
import { formatRunSummary } from '../formatters/run-summary.js';
import { parseCount, resolvePaths, type DirectoryOptions } from './options.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the run command.
 */
export interface RunCommandOptions extends DirectoryOptions {
  /** Maximum courts to enrich this run */
  maxEnrich?: number;
  /** commander inverts --no-photos to photos: false */
  photos?: boolean;
  /** Only enrich courts already stored */
  skipSearch?: boolean;
}

/**
 * Test seams for the run handler.
 */
export interface RunDependencies {
  env?: NodeJS.ProcessEnv;
  fetchImpl?: typeof fetch;
  sleep?: SleepFn;
  retryPolicy?: RetryPolicy;
}

// ============================================================================
// Handler
// ============================================================================

/**
 * Handle the run command.
 *
 * @throws ConfigError before any network call when the API key is unusable
 */
export async function handleRun(
  options: RunCommandOptions,
  base: BaseCommand,
  deps: RunDependencies = {}
): Promise<RunSummary> {
  const config = loadConfig(deps.env ?? process.env);
  const apiKey = requireApiKey(config);
  const paths = resolvePaths(options, config);

  base.debug(`Data directory: ${paths.dataDir}`);
  base.debug(`Docs directory: ${paths.docsDir}`);

  const client = new PlacesClient({
    apiKey,
    logger: base,
    fetchImpl: deps.fetchImpl,
    sleep: deps.sleep,
    retryPolicy: deps.retryPolicy,
  });

  const summary = await runPipeline({
    client,
    paths,
    maxEnrich: options.maxEnrich ?? config.maxEnrich,
    photos: options.photos !== false,
    skipSearch: options.skipSearch,
    logger: base,
    phases: new SpinnerPhaseReporter({ silent: base.isQuiet() }),
    sleep: deps.sleep,
  });

  base.blank();
  for (const line of formatRunSummary(summary)) {
    base.info(line);
  }
  base.blank();
  base.success(`Saved ${summary.totals.total} courts to ${summary.outputFiles.slice(0, 2).join(' and ')}`);

  return summary;
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the run command.
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Search, enrich and publish pickleball courts')
    .option('--max-enrich <count>', 'Maximum courts to enrich this run', parseCount)
    .option('--no-photos', 'Do not download court photos')
    .option('--skip-search', 'Only enrich courts that are already stored')
    .option('--data-dir <path>', 'Override the data directory')
    .option('--docs-dir <path>', 'Override the published docs directory')
    .action(async (options: RunCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);

      try {
        await handleRun(options, base);
      } catch (error) {
        if (error instanceof ConfigError) {
          base.fatal(error.message, EXIT_CODES.API_ERROR);
        }
        if (error instanceof Error) {
          base.fatal(error.message, error);
        }
        throw error;
      }
    });
}
