/**
 * Google Places API Client
 *
 * Low-level client for the Google Places API (New): Text Search, Place
 * Details and Photo Media. Handles authentication, field masks, response
 * validation and API call tracking for quota accounting.
 *
 * @module places/client
 */

import type { ZodType, ZodTypeDef } from 'zod';
import {
  TextSearchResponseSchema,
  PlaceDetailsResponseSchema,
  type TextSearchResponse,
  type PlaceDetailsResponse,
} from '../schemas/places.js';
import { HttpClient, PlacesApiError, type HttpClientOptions } from './http.js';

// ============================================================================
// Constants
// ============================================================================

const BASE_URL = 'https://places.googleapis.com/v1';

/** Results per Text Search page (API maximum) */
export const SEARCH_PAGE_SIZE = 20;

/**
 * Fields for Text Search (Pro tier).
 * Using Field Masks to minimize quota usage.
 */
const TEXT_SEARCH_FIELDS = [
  'nextPageToken',
  'places.id',
  'places.displayName',
  'places.location',
  'places.formattedAddress',
  'places.types',
].join(',');

/**
 * Fields for Place Details (Enterprise tier).
 */
const DETAILS_FIELDS = [
  'rating',
  'userRatingCount',
  'regularOpeningHours',
  'internationalPhoneNumber',
  'websiteUri',
  'photos',
].join(',');

/** Bounding box for downloaded photos */
export const PHOTO_MAX_PX = 800;

// ============================================================================
// Types
// ============================================================================

export type PlacesEndpoint = 'textSearch' | 'details' | 'photo';

export interface PlacesClientOptions extends HttpClientOptions {
  apiKey: string;
}

export interface PhotoSize {
  maxWidthPx?: number;
  maxHeightPx?: number;
}

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * PlacesClient provides access to the Google Places API (New).
 *
 * @example
 * ```typescript
 * const client = new PlacesClient({ apiKey });
 * const page = await client.textSearch('pickleball courts near Austin, TX');
 * const details = await client.getPlaceDetails(page.places[0].id);
 * ```
 */
export class PlacesClient {
  private readonly apiKey: string;
  private readonly http: HttpClient;
  private readonly callCounts: Record<PlacesEndpoint, number> = {
    textSearch: 0,
    details: 0,
    photo: 0,
  };

  constructor(options: PlacesClientOptions) {
    const { apiKey, ...httpOptions } = options;
    this.apiKey = apiKey;
    this.http = new HttpClient(httpOptions);
  }

  /**
   * Run one page of a Text Search.
   *
   * @param query - Free-text query (e.g., "pickleball courts near Austin, TX")
   * @param pageToken - Token from the previous page, if any
   * @throws PlacesApiError on HTTP errors or an unreadable response
   */
  async textSearch(query: string, pageToken?: string): Promise<TextSearchResponse> {
    const body: Record<string, unknown> = { textQuery: query, pageSize: SEARCH_PAGE_SIZE };
    if (pageToken) {
      body.pageToken = pageToken;
    }

    const page = await this.http.request(
      {
        method: 'POST',
        url: `${BASE_URL}/places:searchText`,
        headers: {
          'Content-Type': 'application/json',
          'X-Goog-Api-Key': this.apiKey,
          'X-Goog-FieldMask': TEXT_SEARCH_FIELDS,
        },
        body,
      },
      (response) => parseJson(response, TextSearchResponseSchema, 'text search')
    );
    this.callCounts.textSearch++;

    return page;
  }

  /**
   * Get detail fields for a place.
   *
   * @throws PlacesApiError on HTTP errors or an unreadable response
   */
  async getPlaceDetails(placeId: string): Promise<PlaceDetailsResponse> {
    const details = await this.http.request(
      {
        method: 'GET',
        url: `${BASE_URL}/places/${encodeURIComponent(placeId)}`,
        headers: {
          'X-Goog-Api-Key': this.apiKey,
          'X-Goog-FieldMask': DETAILS_FIELDS,
        },
      },
      (response) => parseJson(response, PlaceDetailsResponseSchema, 'place details')
    );
    this.callCounts.details++;

    return details;
  }

  /**
   * Download the image bytes for a photo reference.
   *
   * @param photoName - Resource name, e.g. `places/<id>/photos/<ref>`
   */
  async fetchPhoto(photoName: string, size: PhotoSize = {}): Promise<Buffer> {
    const bytes = await this.http.request(
      {
        method: 'GET',
        url: `${BASE_URL}/${photoName}/media`,
        headers: { 'X-Goog-Api-Key': this.apiKey },
        params: {
          maxHeightPx: size.maxHeightPx ?? PHOTO_MAX_PX,
          maxWidthPx: size.maxWidthPx ?? PHOTO_MAX_PX,
        },
      },
      async (response) => Buffer.from(await response.arrayBuffer())
    );
    this.callCounts.photo++;

    return bytes;
  }

  /**
   * Get API calls made so far, per endpoint.
   */
  getCallCounts(): Record<PlacesEndpoint, number> {
    return { ...this.callCounts };
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Read and validate a JSON response body.
 */
async function parseJson<T>(
  response: Response,
  schema: ZodType<T, ZodTypeDef, unknown>,
  label: string
): Promise<T> {
  let data: unknown;
  try {
    data = await response.json();
  } catch {
    throw new PlacesApiError(`Invalid JSON in ${label} response`, 502, 'INVALID_RESPONSE', false);
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new PlacesApiError(
      `Unexpected ${label} response: ${issue.path.join('.')} ${issue.message}`,
      502,
      'INVALID_RESPONSE',
      false
    );
  }
  return result.data;
}

export { PlacesApiError, isPlacesApiError } from './http.js';
