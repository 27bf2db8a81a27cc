/**
 * Pipeline stage exports
 *
 * @module stages
 */

export {
  runSearchStage,
  mergePlaces,
  MAX_PAGES,
  PAGE_DELAY_MS,
  type SearchStageOptions,
} from './search.js';

export {
  runEnrichmentStage,
  selectEnrichmentCandidates,
  type EnrichmentStageOptions,
} from './enrich.js';

export { applyStreetViewUrls, buildStreetViewUrl, formatCoordinate } from './street-view.js';
