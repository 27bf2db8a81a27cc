/**
 * Progress Formatters
 *
 * Spinner wrapper for the load and save phases of a run.
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora from 'ora';
import chalk from 'chalk';
import type { PhaseReporter } from '../../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Render nothing (quiet mode) */
  silent?: boolean;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Loading courts...');
 * spinner.start();
 * await load();
 * spinner.succeed('Loaded 412 courts');
 * ```
 */
export class ProgressSpinner {
  private readonly spinner: ora.Ora;
  private startTime = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    const isTTY = process.stdout.isTTY === true;

    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: isTTY && !options.silent,
      isSilent: options.silent === true,
      stream: process.stdout,
    });
  }

  start(): this {
    this.startTime = Date.now();
    this.spinner.start();
    return this;
  }

  /**
   * Stop spinner with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }
}

/**
 * Create and start a spinner.
 */
export function createSpinner(text: string, options: SpinnerOptions = {}): ProgressSpinner {
  return new ProgressSpinner(text, options).start();
}

/**
 * Shows each pipeline phase as its own spinner.
 */
export class SpinnerPhaseReporter implements PhaseReporter {
  private readonly options: SpinnerOptions;
  private current: ProgressSpinner | undefined;

  constructor(options: SpinnerOptions = {}) {
    this.options = options;
  }

  start(text: string): void {
    this.current?.stop();
    this.current = createSpinner(text, this.options);
  }

  succeed(text: string): void {
    this.current?.succeed(text);
    this.current = undefined;
  }

  fail(text: string): void {
    this.current?.fail(text);
    this.current = undefined;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Format a duration in milliseconds for display.
 *
 * @example
 * formatDuration(850);    // "850ms"
 * formatDuration(1500);   // "1.5s"
 * formatDuration(125000); // "2m 5s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}
