/**
 * Pipeline Type Definitions
 *
 * Contracts shared by the pipeline stages and the runner.
 *
 * @module pipeline/types
 */

import type { PlacesClient } from '../places/client.js';
import type { SleepFn } from '../places/http.js';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline stages.
 * Allows stages to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden in production) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

/**
 * Receives start and end notices for the load and save phases of a run.
 * The CLI shows them as spinners.
 */
export interface PhaseReporter {
  start(text: string): void;
  succeed(text: string): void;
  fail(text: string): void;
}

// ============================================================================
// Stage Context
// ============================================================================

/**
 * Runtime context shared by the network-bound stages.
 */
export interface StageContext {
  /** Places API client */
  client: PlacesClient;

  /** Optional logger for stage output */
  logger?: Logger;

  /** Courtesy pause between requests; replaced with a no-op in tests */
  sleep?: SleepFn;
}

// ============================================================================
// Stage Results
// ============================================================================

/**
 * Outcome of the search stage
 */
export interface SearchStageResult {
  /** Queries whose first page succeeded */
  queriesRun: number;
  /** Queries whose first page failed (left pending) */
  queriesFailed: number;
  /** Queries skipped because they were already complete */
  queriesSkipped: number;
  /** Pages fetched across all queries */
  pagesFetched: number;
  /** Courts added to the table */
  newCourts: number;
}

/**
 * Outcome of the enrichment stage
 */
export interface EnrichmentStageResult {
  /** Courts selected for enrichment this run */
  attempted: number;
  /** Courts that are enriched after their details were applied */
  enriched: number;
  /** Courts whose details or photo fetch failed */
  failed: number;
  /** Photos written to disk */
  photosSaved: number;
  /** Un-enriched courts left for a later run */
  remaining: number;
}

/**
 * Counts describing a court table
 */
export interface CourtTotals {
  total: number;
  enriched: number;
  withPhotos: number;
  withStreetView: number;
}

/**
 * Full result of a pipeline run
 */
export interface RunSummary {
  search?: SearchStageResult;
  enrichment?: EnrichmentStageResult;
  streetViewUrlsAdded: number;
  completedQueries: number;
  pendingQueries: number;
  legacyQueriesAssumed: boolean;
  apiCalls: Record<string, number>;
  totals: CourtTotals;
  outputFiles: string[];
}
