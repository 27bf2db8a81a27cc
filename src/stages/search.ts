/**
 * Search Stage
 *
 * Runs every catalog query that is not yet in the query log, following up
 * to three pages of results, and folds the places into the court table.
 * The first search hit for a place_id wins; later hits never touch it.
 *
 * @module stages/search
 */

import type { CourtTable } from '../schemas/court.js';
import type { QueryLog } from '../schemas/checkpoint.js';
import type { SearchPlace, TextSearchResponse } from '../schemas/places.js';
import { mapPlaceToCourt } from '../places/mapper.js';
import { sleep as defaultSleep } from '../places/http.js';
import type { SearchStageResult, StageContext } from '../pipeline/types.js';

/** Hard cap on pages read per query */
export const MAX_PAGES = 3;

/** Pause between pages of the same query */
export const PAGE_DELAY_MS = 500;

export interface SearchStageOptions extends StageContext {
  /** Queries in catalog order */
  queries: readonly string[];
  maxPages?: number;
  pageDelayMs?: number;
}

/**
 * Insert places that are not yet in the table.
 *
 * @returns Number of courts added
 */
export function mergePlaces(courts: CourtTable, places: readonly SearchPlace[]): number {
  let added = 0;
  for (const place of places) {
    if (!place.id || courts.has(place.id)) {
      continue;
    }
    const court = mapPlaceToCourt(place);
    if (court) {
      courts.set(court.place_id, court);
      added++;
    }
  }
  return added;
}

/**
 * Execute the search stage.
 *
 * A failed first page leaves the query pending for the next run. A failed
 * later page stops that query's pagination; places already gathered stay
 * and the query counts as complete.
 */
export async function runSearchStage(
  courts: CourtTable,
  queryLog: QueryLog,
  options: SearchStageOptions
): Promise<SearchStageResult> {
  const { client, logger, queries } = options;
  const sleep = options.sleep ?? defaultSleep;
  const maxPages = options.maxPages ?? MAX_PAGES;
  const pageDelayMs = options.pageDelayMs ?? PAGE_DELAY_MS;

  const result: SearchStageResult = {
    queriesRun: 0,
    queriesFailed: 0,
    queriesSkipped: 0,
    pagesFetched: 0,
    newCourts: 0,
  };

  const pending = queries.filter((query) => !queryLog.has(query));
  result.queriesSkipped = queries.length - pending.length;

  logger?.info(
    `[search] ${pending.length} pending queries (${result.queriesSkipped} already complete)`
  );

  for (const query of pending) {
    logger?.info(`[search] Searching: ${query}`);

    let page: TextSearchResponse;
    try {
      page = await client.textSearch(query);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger?.error(`[search] ${message}, skipping "${query}"`);
      result.queriesFailed++;
      continue;
    }

    let pagesRead = 1;
    let found = page.places.length;
    let added = mergePlaces(courts, page.places);

    while (page.nextPageToken && pagesRead < maxPages) {
      await sleep(pageDelayMs);
      try {
        page = await client.textSearch(query, page.nextPageToken);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger?.error(`[search] Page ${pagesRead + 1} of "${query}" failed: ${message}`);
        break;
      }
      pagesRead++;
      found += page.places.length;
      added += mergePlaces(courts, page.places);
    }

    queryLog.add(query);
    result.queriesRun++;
    result.pagesFetched += pagesRead;
    result.newCourts += added;

    logger?.info(
      `[search]   ${found} results over ${pagesRead} page(s), ${added} new, ${courts.size} unique total`
    );
  }

  return result;
}
