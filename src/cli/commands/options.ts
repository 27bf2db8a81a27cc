/**
 * Shared command options
 *
 * @module cli/commands/options
 */

import { InvalidArgumentError } from 'commander';
import type { Config } from '../../config/index.js';
import { resolveOutputPaths, type OutputPaths } from '../../storage/paths.js';

/**
 * Directory overrides accepted by every command.
 */
export interface DirectoryOptions {
  /** Override the data directory (COURTS_DATA_DIR) */
  dataDir?: string;
  /** Override the published docs directory (COURTS_DOCS_DIR) */
  docsDir?: string;
}

/**
 * Commander argument parser for non-negative integers.
 */
export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

/**
 * Resolve output paths from flags, falling back to configuration.
 */
export function resolvePaths(options: DirectoryOptions, config: Config): OutputPaths {
  return resolveOutputPaths(options.dataDir ?? config.dataDir, options.docsDir ?? config.docsDir);
}
