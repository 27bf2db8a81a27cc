/**
 * Pipeline Runner
 *
 * Runs the stages in order against the persisted state:
 * load → search → save (phase boundary) → enrich → street view → save.
 *
 * @module pipeline/runner
 */

import type { PlacesClient } from '../places/client.js';
import type { SleepFn } from '../places/http.js';
import { buildQueryCatalog } from '../catalog/queries.js';
import { runSearchStage } from '../stages/search.js';
import { runEnrichmentStage } from '../stages/enrich.js';
import { applyStreetViewUrls } from '../stages/street-view.js';
import {
  loadPipelineState,
  saveCourts,
  saveQueryCheckpoint,
  countCourts,
} from '../storage/courts.js';
import type { OutputPaths } from '../storage/paths.js';
import type { QueryLog } from '../schemas/checkpoint.js';
import type { CourtTable } from '../schemas/court.js';
import type { Logger, PhaseReporter, RunSummary } from './types.js';

export interface PipelineOptions {
  client: PlacesClient;
  paths: OutputPaths;
  /** Maximum courts to enrich this run */
  maxEnrich: number;
  /** Download one photo per newly enriched court */
  photos: boolean;
  /** Queries to run (default: full catalog) */
  queries?: readonly string[];
  /** Skip the search stage and only enrich what is already stored */
  skipSearch?: boolean;
  logger?: Logger;
  /** Notified around loading and saving */
  phases?: PhaseReporter;
  sleep?: SleepFn;
  pageDelayMs?: number;
}

/**
 * Run one phase, reporting its start and outcome.
 */
async function inPhase<T>(
  reporter: PhaseReporter | undefined,
  text: string,
  run: () => Promise<T>,
  done: (result: T) => string
): Promise<T> {
  reporter?.start(text);
  try {
    const result = await run();
    reporter?.succeed(done(result));
    return result;
  } catch (error) {
    reporter?.fail(`${text} failed`);
    throw error;
  }
}

/**
 * Write courts (both copies) and the checkpoint.
 *
 * @returns Paths written
 */
async function saveState(
  courts: CourtTable,
  queryLog: QueryLog,
  paths: OutputPaths
): Promise<string[]> {
  const courtFiles = await saveCourts(courts, paths);
  const checkpointFile = await saveQueryCheckpoint(queryLog, paths);
  return [...courtFiles, checkpointFile];
}

/**
 * Execute the full pipeline once.
 */
export async function runPipeline(options: PipelineOptions): Promise<RunSummary> {
  const { client, paths, logger, phases, sleep } = options;
  const queries = options.queries ?? buildQueryCatalog();

  const state = await inPhase(
    phases,
    `Loading ${paths.courtsFile}`,
    () => loadPipelineState(paths, logger),
    (loaded) => `Loaded ${loaded.courts.size} courts`
  );
  const { courts, queryLog } = state;
  const saved = () => `Saved ${courts.size} courts and ${queryLog.size} completed queries`;
  logger?.info(
    `Loaded ${courts.size} courts (${state.courtSource}) and ${queryLog.size} completed queries`
  );

  const summary: RunSummary = {
    streetViewUrlsAdded: 0,
    completedQueries: 0,
    pendingQueries: 0,
    legacyQueriesAssumed: state.legacyQueriesAssumed,
    apiCalls: {},
    totals: countCourts(courts),
    outputFiles: [],
  };

  // Phase 1: search
  if (options.skipSearch) {
    logger?.info('[search] Skipped');
  } else {
    summary.search = await runSearchStage(courts, queryLog, {
      client,
      logger,
      sleep,
      queries,
      pageDelayMs: options.pageDelayMs,
    });
    await inPhase(phases, 'Saving search results', () => saveState(courts, queryLog, paths), saved);
    logger?.debug(`Checkpoint saved to ${paths.checkpointFile}`);
  }

  // Phase 2: enrichment
  summary.enrichment = await runEnrichmentStage(courts, {
    client,
    logger,
    sleep,
    maxEnrich: options.maxEnrich,
    photosDir: options.photos ? paths.photosDir : undefined,
  });

  // Phase 3: derived fields
  summary.streetViewUrlsAdded = applyStreetViewUrls(courts);
  logger?.info(`Added ${summary.streetViewUrlsAdded} Street View links`);

  // Final save
  summary.outputFiles = await inPhase(
    phases,
    'Saving courts',
    () => saveState(courts, queryLog, paths),
    saved
  );

  summary.completedQueries = queryLog.size;
  summary.pendingQueries = queries.filter((query) => !queryLog.has(query)).length;
  summary.apiCalls = client.getCallCounts();
  summary.totals = countCourts(courts);

  return summary;
}
