/**
 * Google Places module exports
 *
 * @module places
 */

export {
  PlacesClient,
  SEARCH_PAGE_SIZE,
  PHOTO_MAX_PX,
  type PlacesClientOptions,
  type PlacesEndpoint,
  type PhotoSize,
} from './client.js';

export {
  HttpClient,
  PlacesApiError,
  isPlacesApiError,
  DEFAULT_RETRY_POLICY,
  RATE_LIMIT_DELAY_MS,
  immediateRetryPolicy,
  sleep,
  buildUrl,
  type HttpRequest,
  type HttpMethod,
  type RetryPolicy,
  type SleepFn,
  type HttpClientOptions,
} from './http.js';

export {
  mapPlaceToCourt,
  mapDetails,
  applyDetails,
  parseHours,
  type CourtDetails,
} from './mapper.js';
