/**
 * Court Table and Checkpoint Persistence
 *
 * Loads the court table and the query checkpoint at start-up and writes
 * them back at phase boundaries. Missing files mean empty state.
 *
 * @module storage/courts
 */

import { z } from 'zod';
import { CourtSchema, isEnriched, type Court, type CourtTable } from '../schemas/court.js';
import { QueryCheckpointSchema, QueryLog } from '../schemas/checkpoint.js';
import { LEGACY_QUERIES } from '../catalog/queries.js';
import type { Logger, CourtTotals } from '../pipeline/types.js';
import { atomicWriteJson, readJsonIfExists } from './atomic.js';
import type { OutputPaths } from './paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Where the court table came from
 */
export type CourtSource = 'courts' | 'legacy' | 'none';

export interface PipelineState {
  courts: CourtTable;
  queryLog: QueryLog;
  courtSource: CourtSource;
  /** True when no checkpoint existed and LEGACY_QUERIES were assumed complete */
  legacyQueriesAssumed: boolean;
  /** Records dropped because they did not match the court schema */
  rejectedRecords: number;
}

interface ParsedTable {
  courts: CourtTable;
  rejected: number;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Build a court table from parsed JSON: either an array of courts or an
 * object keyed by place_id (legacy layout). Records that fail validation
 * are counted and skipped; duplicates keep the first occurrence.
 *
 * @throws Error when the value is neither an array nor an object
 */
export function parseCourtTable(data: unknown): ParsedTable {
  let records: unknown[];
  if (Array.isArray(data)) {
    records = data;
  } else if (typeof data === 'object' && data !== null) {
    records = Object.values(data);
  } else {
    throw new Error('Court table must be a JSON array or object');
  }

  const courts: CourtTable = new Map();
  let rejected = 0;

  for (const record of records) {
    const result = CourtSchema.safeParse(record);
    if (!result.success) {
      rejected++;
      continue;
    }
    if (!courts.has(result.data.place_id)) {
      courts.set(result.data.place_id, result.data);
    }
  }

  return { courts, rejected };
}

/**
 * Parse a checkpoint file's contents.
 *
 * @throws Error when the shape is wrong
 */
export function parseQueryCheckpoint(data: unknown): QueryLog {
  const result = QueryCheckpointSchema.safeParse(data);
  if (!result.success) {
    throw new Error(`Invalid query checkpoint: ${formatIssues(result.error)}`);
  }
  return new QueryLog(result.data.completed_queries);
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`).join('; ');
}

// ============================================================================
// Load
// ============================================================================

/**
 * Load the court table and query log.
 *
 * The court table comes from `courts.json`, falling back to the legacy
 * `raw_places.json`. When a table exists but the checkpoint does not, the
 * legacy query list is assumed complete and a warning is logged.
 *
 * @throws Error when a file exists but is not valid JSON or has the wrong shape
 */
export async function loadPipelineState(
  paths: OutputPaths,
  logger?: Logger
): Promise<PipelineState> {
  let courtSource: CourtSource = 'none';
  let table: ParsedTable = { courts: new Map(), rejected: 0 };

  const current = await readJsonIfExists(paths.courtsFile);
  if (current !== undefined) {
    table = parseCourtTable(current);
    courtSource = 'courts';
  } else {
    const legacy = await readJsonIfExists(paths.legacyCourtsFile);
    if (legacy !== undefined) {
      table = parseCourtTable(legacy);
      courtSource = 'legacy';
    }
  }

  if (table.rejected > 0) {
    logger?.warn(`Skipped ${table.rejected} court records that did not match the schema`);
  }

  let queryLog: QueryLog;
  let legacyQueriesAssumed = false;

  const checkpoint = await readJsonIfExists(paths.checkpointFile);
  if (checkpoint !== undefined) {
    queryLog = parseQueryCheckpoint(checkpoint);
  } else if (courtSource !== 'none') {
    queryLog = new QueryLog(LEGACY_QUERIES);
    legacyQueriesAssumed = true;
    logger?.warn(
      `No query checkpoint found; assuming the ${LEGACY_QUERIES.length} original ` +
        `"pickleball courts near <city>" queries already ran. ` +
        `Delete ${paths.courtsFile} or write ${paths.checkpointFile} to change this.`
    );
  } else {
    queryLog = new QueryLog();
  }

  return {
    courts: table.courts,
    queryLog,
    courtSource,
    legacyQueriesAssumed,
    rejectedRecords: table.rejected,
  };
}

// ============================================================================
// Save
// ============================================================================

/**
 * Write the court table to the primary file and its mirror.
 *
 * @returns Paths written
 */
export async function saveCourts(courts: CourtTable, paths: OutputPaths): Promise<string[]> {
  const records: Court[] = [...courts.values()];
  const targets = [paths.courtsFile, paths.docsCourtsFile];
  for (const target of targets) {
    await atomicWriteJson(target, records);
  }
  return targets;
}

/**
 * Write the query checkpoint.
 */
export async function saveQueryCheckpoint(queryLog: QueryLog, paths: OutputPaths): Promise<string> {
  await atomicWriteJson(paths.checkpointFile, queryLog.toCheckpoint());
  return paths.checkpointFile;
}

// ============================================================================
// Totals
// ============================================================================

/**
 * Count courts by enrichment state.
 */
export function countCourts(courts: CourtTable): CourtTotals {
  const totals: CourtTotals = { total: courts.size, enriched: 0, withPhotos: 0, withStreetView: 0 };
  for (const court of courts.values()) {
    if (isEnriched(court)) totals.enriched++;
    if (court.photo !== null) totals.withPhotos++;
    if (court.street_view_url !== null) totals.withStreetView++;
  }
  return totals;
}
