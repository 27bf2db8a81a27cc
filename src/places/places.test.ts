/**
 * Google Places Client Tests
 *
 * Covers:
 * - HttpClient: rate-limit retry, error mapping, timeouts
 * - PlacesClient: request shapes, response validation, call tracking
 * - Mapper: search place → court, details → enrichment fields
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import {
  HttpClient,
  PlacesApiError,
  isPlacesApiError,
  immediateRetryPolicy,
  buildUrl,
  DEFAULT_RETRY_POLICY,
  RATE_LIMIT_DELAY_MS,
} from './http.js';
import { PlacesClient, SEARCH_PAGE_SIZE } from './client.js';
import { mapPlaceToCourt, mapDetails, applyDetails, parseHours } from './mapper.js';
import { createCourt } from '../schemas/court.js';
import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const mockFetch = jest.fn<typeof fetch>();

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function textResponse(text: string, status: number): Response {
  return new Response(text, { status });
}

function createMockLogger(): Logger {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

const noSleep = jest.fn(async (_ms: number) => undefined);

const readStatus = async (response: Response): Promise<number> => response.status;

/**
 * A 200 response whose body never finishes, regardless of abort signals.
 */
function stalledResponse(): Response {
  return new Response(
    new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('{"places": ['));
      },
    }),
    { status: 200 }
  );
}

function createClient(): PlacesClient {
  return new PlacesClient({
    apiKey: 'test-api-key',
    fetchImpl: mockFetch,
    sleep: noSleep,
    retryPolicy: immediateRetryPolicy(),
  });
}

const searchResponse = {
  places: [
    {
      id: 'place-1',
      displayName: { text: 'Sunset Park Courts', languageCode: 'en' },
      formattedAddress: '1 Sunset Way, Austin, TX',
      location: { latitude: 30.25, longitude: -97.75 },
      types: ['park', 'point_of_interest'],
    },
    {
      id: 'place-2',
      displayName: { text: 'Dink Club' },
      location: { latitude: 30.3, longitude: -97.7 },
    },
  ],
  nextPageToken: 'token-2',
};

const detailsResponse = {
  rating: 4.6,
  userRatingCount: 87,
  internationalPhoneNumber: '+1 512-555-0100',
  websiteUri: 'https://dinkclub.example.com',
  regularOpeningHours: {
    weekdayDescriptions: ['Monday: 6:00 AM – 10:00 PM', 'Tuesday: Closed'],
  },
  photos: [{ name: 'places/place-2/photos/ref-a', widthPx: 1200, heightPx: 900 }],
};

beforeEach(() => {
  mockFetch.mockReset();
  noSleep.mockClear();
});

// ============================================================================
// HttpClient Tests
// ============================================================================

describe('HttpClient', () => {
  it('returns the response on success', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ ok: true }));
    const http = new HttpClient({ fetchImpl: mockFetch, sleep: noSleep });

    const status = await http.request({ method: 'GET', url: 'https://api.example.com/x' }, readStatus);

    expect(status).toBe(200);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('retries once after a 429 and succeeds', async () => {
    mockFetch
      .mockResolvedValueOnce(textResponse('slow down', 429))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));
    const logger = createMockLogger();
    const http = new HttpClient({ fetchImpl: mockFetch, sleep: noSleep, logger });

    const status = await http.request({ method: 'GET', url: 'https://api.example.com/x' }, readStatus);

    expect(status).toBe(200);
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(noSleep).toHaveBeenCalledWith(RATE_LIMIT_DELAY_MS);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('throws after a second 429', async () => {
    mockFetch
      .mockResolvedValueOnce(textResponse('slow down', 429))
      .mockResolvedValueOnce(textResponse('still slow', 429));
    const http = new HttpClient({ fetchImpl: mockFetch, sleep: noSleep });

    await expect(
      http.request({ method: 'GET', url: 'https://api.example.com/x' }, readStatus)
    ).rejects.toMatchObject({ statusCode: 429, isRetryable: true, message: 'Quota exceeded: still slow' });
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('does not retry other errors', async () => {
    mockFetch.mockResolvedValueOnce(textResponse('boom', 500));
    const http = new HttpClient({ fetchImpl: mockFetch, sleep: noSleep });

    await expect(
      http.request({ method: 'GET', url: 'https://api.example.com/x' }, readStatus)
    ).rejects.toThrow('Server error (500): boom');
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(noSleep).not.toHaveBeenCalled();
  });

  it('reports authentication failures', async () => {
    mockFetch.mockResolvedValueOnce(textResponse('denied', 403));
    const http = new HttpClient({ fetchImpl: mockFetch, sleep: noSleep });

    await expect(
      http.request({ method: 'GET', url: 'https://api.example.com/x' }, readStatus)
    ).rejects.toThrow('Authentication failed: Invalid or unauthorized API key');
  });

  it('honours a policy with more attempts', async () => {
    mockFetch
      .mockResolvedValueOnce(textResponse('', 429))
      .mockResolvedValueOnce(textResponse('', 429))
      .mockResolvedValueOnce(jsonResponse({}));
    const http = new HttpClient({
      fetchImpl: mockFetch,
      sleep: noSleep,
      retryPolicy: { maxAttempts: 3, delayMs: (retry) => retry * 100 },
    });

    await http.request({ method: 'GET', url: 'https://api.example.com/x' }, readStatus);

    expect(noSleep.mock.calls).toEqual([[100], [200]]);
  });

  it('maps an aborted request to a timeout error', async () => {
    mockFetch.mockImplementationOnce(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const error = new Error('aborted');
            error.name = 'AbortError';
            reject(error);
          });
        })
    );
    const http = new HttpClient({ fetchImpl: mockFetch, timeoutMs: 5 });

    await expect(
      http.request({ method: 'GET', url: 'https://api.example.com/x' }, readStatus)
    ).rejects.toMatchObject({ statusCode: 408, status: 'TIMEOUT' });
  });

  it('times out while the body is still being read', async () => {
    mockFetch.mockResolvedValueOnce(stalledResponse());
    const http = new HttpClient({ fetchImpl: mockFetch, timeoutMs: 20 });

    await expect(
      http.request({ method: 'GET', url: 'https://api.example.com/x' }, (response) => response.text())
    ).rejects.toMatchObject({ statusCode: 408, status: 'TIMEOUT' });
  });

  it('releases the body of a rate-limited response before retrying', async () => {
    const limited = textResponse('slow down', 429);
    const body = limited.body;
    if (!body) {
      throw new Error('expected a response body');
    }
    const cancel = jest.spyOn(body, 'cancel');
    mockFetch.mockResolvedValueOnce(limited).mockResolvedValueOnce(jsonResponse({}));
    const http = new HttpClient({ fetchImpl: mockFetch, sleep: noSleep });

    await http.request({ method: 'GET', url: 'https://api.example.com/x' }, readStatus);

    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('serializes the body and appends params', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}));
    const http = new HttpClient({ fetchImpl: mockFetch });

    await http.request(
      {
        method: 'POST',
        url: 'https://api.example.com/search',
        body: { q: 'courts' },
        params: { page: 2 },
      },
      readStatus
    );

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.example.com/search?page=2');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"q":"courts"}');
  });

  it('uses one retry after five seconds by default', () => {
    expect(DEFAULT_RETRY_POLICY.maxAttempts).toBe(2);
    expect(DEFAULT_RETRY_POLICY.delayMs(1)).toBe(5000);
  });
});

describe('buildUrl', () => {
  it('returns the base when there are no params', () => {
    expect(buildUrl('https://a.example/x')).toBe('https://a.example/x');
  });

  it('joins with & when the base already has a query', () => {
    expect(buildUrl('https://a.example/x?a=1', { b: 'two words' })).toBe(
      'https://a.example/x?a=1&b=two+words'
    );
  });
});

// ============================================================================
// PlacesClient Tests
// ============================================================================

describe('PlacesClient', () => {
  describe('textSearch', () => {
    it('sends the query with field mask and page size', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(searchResponse));

      await createClient().textSearch('pickleball courts near Austin, TX');

      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('https://places.googleapis.com/v1/places:searchText');
      expect(init?.method).toBe('POST');
      expect(init?.headers).toEqual({
        'Content-Type': 'application/json',
        'X-Goog-Api-Key': 'test-api-key',
        'X-Goog-FieldMask':
          'nextPageToken,places.id,places.displayName,places.location,places.formattedAddress,places.types',
      });
      expect(JSON.parse(String(init?.body))).toEqual({
        textQuery: 'pickleball courts near Austin, TX',
        pageSize: SEARCH_PAGE_SIZE,
      });
    });

    it('includes the page token when given', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ places: [] }));

      await createClient().textSearch('q', 'token-2');

      const [, init] = mockFetch.mock.calls[0];
      expect(JSON.parse(String(init?.body))).toEqual({
        textQuery: 'q',
        pageSize: 20,
        pageToken: 'token-2',
      });
    });

    it('returns parsed places and the next page token', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(searchResponse));

      const page = await createClient().textSearch('q');

      expect(page.places).toHaveLength(2);
      expect(page.places[0].id).toBe('place-1');
      expect(page.nextPageToken).toBe('token-2');
    });

    it('treats a missing places array as an empty page', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}));

      const page = await createClient().textSearch('q');

      expect(page.places).toEqual([]);
      expect(page.nextPageToken).toBeUndefined();
    });

    it('rejects a response whose places is not an array', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ places: 'nope' }));

      await expect(createClient().textSearch('q')).rejects.toMatchObject({
        status: 'INVALID_RESPONSE',
      });
    });

    it('gives up on a response body that never completes', async () => {
      mockFetch.mockResolvedValueOnce(stalledResponse());
      const client = new PlacesClient({ apiKey: 'test-api-key', fetchImpl: mockFetch, timeoutMs: 20 });

      await expect(client.textSearch('q')).rejects.toMatchObject({
        statusCode: 408,
        status: 'TIMEOUT',
      });
      expect(client.getCallCounts().textSearch).toBe(0);
    });

    it('rejects a body that is not JSON', async () => {
      mockFetch.mockResolvedValueOnce(new Response('<html>', { status: 200 }));

      await expect(createClient().textSearch('q')).rejects.toThrow(
        'Invalid JSON in text search response'
      );
    });
  });

  describe('getPlaceDetails', () => {
    it('requests the details field mask for the encoded id', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(detailsResponse));

      await createClient().getPlaceDetails('place/2');

      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('https://places.googleapis.com/v1/places/place%2F2');
      expect(init?.method).toBe('GET');
      expect(init?.headers).toEqual({
        'X-Goog-Api-Key': 'test-api-key',
        'X-Goog-FieldMask':
          'rating,userRatingCount,regularOpeningHours,internationalPhoneNumber,websiteUri,photos',
      });
    });

    it('drops malformed optional fields instead of failing', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ rating: 'five', websiteUri: 'https://ok.example.com', photos: 'none' })
      );

      const details = await createClient().getPlaceDetails('place-1');

      expect(details.rating).toBeUndefined();
      expect(details.photos).toBeUndefined();
      expect(details.websiteUri).toBe('https://ok.example.com');
    });
  });

  describe('fetchPhoto', () => {
    it('downloads bytes from the media endpoint', async () => {
      mockFetch.mockResolvedValueOnce(new Response(new Uint8Array([1, 2, 3]), { status: 200 }));

      const bytes = await createClient().fetchPhoto('places/place-2/photos/ref-a');

      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe(
        'https://places.googleapis.com/v1/places/place-2/photos/ref-a/media?maxHeightPx=800&maxWidthPx=800'
      );
      expect(init?.headers).toEqual({ 'X-Goog-Api-Key': 'test-api-key' });
      expect([...bytes]).toEqual([1, 2, 3]);
    });
  });

  describe('call tracking', () => {
    it('counts successful calls per endpoint', async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse(searchResponse))
        .mockResolvedValueOnce(jsonResponse(detailsResponse))
        .mockResolvedValueOnce(jsonResponse(detailsResponse));
      const client = createClient();

      await client.textSearch('q');
      await client.getPlaceDetails('a');
      await client.getPlaceDetails('b');

      expect(client.getCallCounts()).toEqual({ textSearch: 1, details: 2, photo: 0 });
    });

    it('does not count failed calls', async () => {
      mockFetch.mockResolvedValueOnce(textResponse('bad', 400));
      const client = createClient();

      await expect(client.textSearch('q')).rejects.toThrow(PlacesApiError);
      expect(client.getCallCounts()).toEqual({ textSearch: 0, details: 0, photo: 0 });
    });
  });

  it('identifies Places API errors', () => {
    expect(isPlacesApiError(new PlacesApiError('x', 500, 'HTTP_ERROR', true))).toBe(true);
    expect(isPlacesApiError(new Error('x'))).toBe(false);
  });
});

// ============================================================================
// Mapper Tests
// ============================================================================

describe('mapPlaceToCourt', () => {
  it('maps descriptive fields and nulls enrichment fields', () => {
    expect(mapPlaceToCourt(searchResponse.places[0])).toEqual({
      place_id: 'place-1',
      name: 'Sunset Park Courts',
      address: '1 Sunset Way, Austin, TX',
      lat: 30.25,
      lng: -97.75,
      types: ['park', 'point_of_interest'],
      rating: null,
      user_rating_count: null,
      phone: null,
      website: null,
      hours: null,
      photo: null,
      street_view_url: null,
    });
  });

  it('defaults name to Unknown and missing fields to null', () => {
    const court = mapPlaceToCourt({ id: 'place-9' });
    expect(court?.name).toBe('Unknown');
    expect(court?.address).toBeNull();
    expect(court?.lat).toBeNull();
    expect(court?.types).toEqual([]);
  });

  it('returns null without an id', () => {
    expect(mapPlaceToCourt({ displayName: { text: 'No id' } })).toBeNull();
  });

  it('returns null for out-of-range coordinates', () => {
    expect(mapPlaceToCourt({ id: 'x', location: { latitude: 123, longitude: 0 } })).toBeNull();
  });
});

describe('parseHours', () => {
  it('splits weekday descriptions at the first ": "', () => {
    expect(
      parseHours({ weekdayDescriptions: ['Monday: 6:00 AM – 10:00 PM', 'Sunday: Open 24 hours'] })
    ).toEqual({ monday: '6:00 AM – 10:00 PM', sunday: 'Open 24 hours' });
  });

  it('skips lines without a separator', () => {
    expect(parseHours({ weekdayDescriptions: ['Holiday hours vary', 'Friday: Closed'] })).toEqual({
      friday: 'Closed',
    });
  });

  it('returns null when descriptions are missing', () => {
    expect(parseHours(undefined)).toBeNull();
    expect(parseHours({})).toBeNull();
  });
});

describe('mapDetails', () => {
  it('maps every detail field', () => {
    expect(mapDetails(detailsResponse)).toEqual({
      rating: 4.6,
      user_rating_count: 87,
      phone: '+1 512-555-0100',
      website: 'https://dinkclub.example.com',
      hours: { monday: '6:00 AM – 10:00 PM', tuesday: 'Closed' },
      photoName: 'places/place-2/photos/ref-a',
    });
  });

  it('yields null hours when the opening hours key is missing', () => {
    const details = mapDetails({ rating: 4.1 });
    expect(details.hours).toBeNull();
    expect(details.photoName).toBeNull();
  });
});

describe('applyDetails', () => {
  it('never clears a field that is already set', () => {
    const court = createCourt({ place_id: 'p', rating: 4.2, phone: '+1 555' });

    applyDetails(court, {
      rating: null,
      user_rating_count: 10,
      phone: null,
      website: 'https://site.example.com',
      hours: null,
      photoName: null,
    });

    expect(court.rating).toBe(4.2);
    expect(court.phone).toBe('+1 555');
    expect(court.user_rating_count).toBe(10);
    expect(court.website).toBe('https://site.example.com');
  });
});
