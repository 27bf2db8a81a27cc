/**
 * Run Summary Formatters
 *
 * Plain-text blocks printed at the end of `courts run` and by `courts status`.
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import type { CourtTotals, RunSummary } from '../../pipeline/types.js';

/**
 * Format court totals, one line per count.
 */
export function formatTotals(totals: CourtTotals): string[] {
  return [
    `${chalk.dim('Courts:')} ${totals.total}`,
    `${chalk.dim('Enriched:')} ${totals.enriched}`,
    `${chalk.dim('With photos:')} ${totals.withPhotos}`,
    `${chalk.dim('With Street View:')} ${totals.withStreetView}`,
  ];
}

/**
 * Format API call counts, e.g. "textSearch 75, details 120, photo 98 (293 total)".
 */
export function formatApiCalls(calls: Record<string, number>): string {
  const entries = Object.entries(calls);
  const total = entries.reduce((sum, [, count]) => sum + count, 0);
  if (entries.length === 0) {
    return 'none';
  }
  return `${entries.map(([name, count]) => `${name} ${count}`).join(', ')} (${total} total)`;
}

/**
 * Format the summary of a pipeline run.
 */
export function formatRunSummary(summary: RunSummary): string[] {
  const lines: string[] = [chalk.bold('Run Summary'), chalk.dim('='.repeat(11))];

  if (summary.search) {
    const s = summary.search;
    lines.push(
      `${chalk.dim('Search:')} ${s.queriesRun} queries run, ${s.queriesFailed} failed, ` +
        `${s.pagesFetched} pages, ${s.newCourts} new courts`
    );
  } else {
    lines.push(`${chalk.dim('Search:')} skipped`);
  }

  if (summary.enrichment) {
    const e = summary.enrichment;
    lines.push(
      `${chalk.dim('Enrichment:')} ${e.enriched}/${e.attempted} enriched, ${e.photosSaved} photos, ` +
        `${e.failed} failed, ${e.remaining} remaining`
    );
  }

  lines.push(`${chalk.dim('Street View links added:')} ${summary.streetViewUrlsAdded}`);
  lines.push(
    `${chalk.dim('Queries:')} ${summary.completedQueries} complete, ${summary.pendingQueries} pending`
  );
  if (summary.legacyQueriesAssumed) {
    lines.push(chalk.yellow('Legacy queries were assumed complete (no checkpoint was found)'));
  }
  lines.push(`${chalk.dim('API calls:')} ${formatApiCalls(summary.apiCalls)}`);
  lines.push('', ...formatTotals(summary.totals));

  return lines;
}
