/**
 * Google Places API (New) response schemas
 *
 * Only the fields requested through field masks are modelled. Optional
 * fields that arrive malformed parse as absent instead of failing the
 * whole response.
 */

import { z } from 'zod';

const optionalString = z.string().optional().catch(undefined);
const optionalNumber = z.number().optional().catch(undefined);

// ============================================
// Text Search
// ============================================

export const SearchPlaceSchema = z.object({
  id: optionalString,
  displayName: z
    .object({ text: optionalString })
    .optional()
    .catch(undefined),
  formattedAddress: optionalString,
  location: z
    .object({ latitude: optionalNumber, longitude: optionalNumber })
    .optional()
    .catch(undefined),
  types: z.array(z.string()).optional().catch(undefined),
});

export type SearchPlace = z.infer<typeof SearchPlaceSchema>;

export const TextSearchResponseSchema = z.object({
  places: z.array(SearchPlaceSchema).default([]),
  nextPageToken: optionalString,
});

export type TextSearchResponse = z.infer<typeof TextSearchResponseSchema>;

// ============================================
// Place Details
// ============================================

export const PlacePhotoSchema = z.object({
  name: z.string(),
  widthPx: optionalNumber,
  heightPx: optionalNumber,
});

export type PlacePhoto = z.infer<typeof PlacePhotoSchema>;

export const PlaceDetailsResponseSchema = z.object({
  rating: optionalNumber,
  userRatingCount: optionalNumber,
  internationalPhoneNumber: optionalString,
  websiteUri: optionalString,
  regularOpeningHours: z
    .object({
      weekdayDescriptions: z.array(z.string()).optional().catch(undefined),
    })
    .optional()
    .catch(undefined),
  photos: z.array(PlacePhotoSchema).optional().catch(undefined),
});

export type PlaceDetailsResponse = z.infer<typeof PlaceDetailsResponseSchema>;
