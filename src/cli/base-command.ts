/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 *
 * BaseCommand also satisfies the pipeline Logger interface, so stages log
 * through the same verbosity and colour settings as the CLI.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** API, network or credential error */
  API_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * @example
 * ```typescript
 * const base = getBaseCommand(cmd.parent ?? cmd);
 * base.info('Searching...');
 * base.success('Saved 412 courts');
 * ```
 */
export class BaseCommand implements Logger {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;

    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message without exiting.
   */
  error(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`Error: ${message}`), ...args);
  }

  /**
   * Log an error and exit with the given code.
   */
  fatal(message: string, errorOrCode?: Error | ExitCode): never {
    this.error(message);

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      process.exit(EXIT_CODES.ERROR);
    }
    process.exit(errorOrCode ?? EXIT_CODES.ERROR);
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print a section header.
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      console.log(chalk.dim('='.repeat(title.length)));
    }
  }

  /**
   * Print data as formatted JSON.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Print a key-value pair.
   */
  keyValue(key: string, value: string | number): void {
    if (!this.options.quiet) {
      console.log(`${chalk.dim(key + ':')} ${value}`);
    }
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isQuiet(): boolean {
    return this.options.quiet === true;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Get the base command stored on a commander Command by the preAction hook.
 * Falls back to a default instance (used in tests).
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> }): BaseCommand {
  const base = cmd.opts()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand({});
  }
  return base;
}
