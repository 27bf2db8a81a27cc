/**
 * Enrichment Stage
 *
 * Fetches Place Details for courts that are not yet enriched and, when a
 * photo directory is given, downloads the first photo. The number of
 * courts attempted per run is capped; the rest wait for a later run.
 *
 * @module stages/enrich
 */

import { isEnriched, type Court, type CourtTable } from '../schemas/court.js';
import { mapDetails, applyDetails } from '../places/mapper.js';
import { sleep as defaultSleep } from '../places/http.js';
import { savePhoto } from '../storage/photos.js';
import type { EnrichmentStageResult, StageContext } from '../pipeline/types.js';

/** Log progress (and pause briefly) every N courts */
const PROGRESS_INTERVAL = 50;

/** Pause taken at each progress checkpoint */
const PROGRESS_PAUSE_MS = 200;

export interface EnrichmentStageOptions extends StageContext {
  /** Maximum courts to attempt this run */
  maxEnrich: number;
  /** Directory for photo files; photos are skipped when omitted */
  photosDir?: string;
}

/**
 * Pick the courts to enrich this run: un-enriched, in table order, at most `limit`.
 */
export function selectEnrichmentCandidates(courts: CourtTable, limit: number): Court[] {
  const candidates: Court[] = [];
  if (limit <= 0) {
    return candidates;
  }
  for (const court of courts.values()) {
    if (!isEnriched(court)) {
      candidates.push(court);
      if (candidates.length >= limit) {
        break;
      }
    }
  }
  return candidates;
}

/**
 * Execute the enrichment stage, updating courts in place.
 */
export async function runEnrichmentStage(
  courts: CourtTable,
  options: EnrichmentStageOptions
): Promise<EnrichmentStageResult> {
  const { client, logger, photosDir } = options;
  const sleep = options.sleep ?? defaultSleep;

  const candidates = selectEnrichmentCandidates(courts, options.maxEnrich);
  const result: EnrichmentStageResult = {
    attempted: candidates.length,
    enriched: 0,
    failed: 0,
    photosSaved: 0,
    remaining: 0,
  };

  logger?.info(`[enrich] Enriching ${candidates.length} courts with Place Details`);

  for (const [index, court] of candidates.entries()) {
    try {
      const details = mapDetails(await client.getPlaceDetails(court.place_id));
      applyDetails(court, details);
      if (isEnriched(court)) {
        result.enriched++;
      }

      if (photosDir && court.photo === null && details.photoName) {
        const bytes = await client.fetchPhoto(details.photoName);
        court.photo = await savePhoto(photosDir, court.place_id, bytes);
        result.photosSaved++;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger?.error(`[enrich] Failed to enrich ${court.place_id}: ${message}`);
      result.failed++;
    }

    if ((index + 1) % PROGRESS_INTERVAL === 0) {
      logger?.info(`[enrich]   Enriched ${index + 1}/${candidates.length}`);
      await sleep(PROGRESS_PAUSE_MS);
    }
  }

  for (const court of courts.values()) {
    if (!isEnriched(court)) {
      result.remaining++;
    }
  }

  logger?.info(
    `[enrich] Done: ${result.enriched} enriched, ${result.photosSaved} photos, ` +
      `${result.failed} failed, ${result.remaining} left for later runs`
  );

  return result;
}
