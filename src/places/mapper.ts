/**
 * Google Places to Court Mapper
 *
 * Transforms Places API responses into court records and detail patches.
 *
 * @module places/mapper
 */

import { CourtSchema, type Court, type OpeningHours } from '../schemas/court.js';
import type { SearchPlace, PlaceDetailsResponse } from '../schemas/places.js';

/**
 * Enrichment fields taken from a Place Details response.
 */
export interface CourtDetails {
  rating: number | null;
  user_rating_count: number | null;
  phone: string | null;
  website: string | null;
  hours: OpeningHours | null;
  /** Resource name of the first photo, if any */
  photoName: string | null;
}

/**
 * Map a Text Search place to a new court record.
 *
 * @returns The court, or null when the place has no id or unusable fields
 */
export function mapPlaceToCourt(place: SearchPlace): Court | null {
  if (!place.id) {
    return null;
  }

  const result = CourtSchema.safeParse({
    place_id: place.id,
    name: place.displayName?.text || 'Unknown',
    address: place.formattedAddress ?? null,
    lat: place.location?.latitude ?? null,
    lng: place.location?.longitude ?? null,
    types: place.types ?? [],
  });
  return result.success ? result.data : null;
}

/**
 * Convert `regularOpeningHours.weekdayDescriptions` into a weekday map.
 *
 * Each description looks like "Monday: 6:00 AM – 10:00 PM" and becomes
 * `{ monday: "6:00 AM – 10:00 PM" }`. Lines without ": " are dropped.
 *
 * @returns The map, or null when the response has no descriptions
 */
export function parseHours(
  openingHours: PlaceDetailsResponse['regularOpeningHours']
): OpeningHours | null {
  const descriptions = openingHours?.weekdayDescriptions;
  if (!descriptions) {
    return null;
  }

  const hours: OpeningHours = {};
  for (const description of descriptions) {
    const separator = description.indexOf(': ');
    if (separator === -1) {
      continue;
    }
    hours[description.slice(0, separator).toLowerCase()] = description.slice(separator + 2);
  }
  return hours;
}

/**
 * Map a Place Details response to enrichment fields. Absent fields are null.
 */
export function mapDetails(details: PlaceDetailsResponse): CourtDetails {
  return {
    rating: details.rating ?? null,
    user_rating_count: details.userRatingCount ?? null,
    phone: details.internationalPhoneNumber ?? null,
    website: details.websiteUri ?? null,
    hours: parseHours(details.regularOpeningHours),
    photoName: details.photos?.[0]?.name ?? null,
  };
}

/**
 * Apply detail fields to a court in place.
 *
 * Only non-null values are written, so a field that is already known is
 * never cleared by a sparser response.
 */
export function applyDetails(court: Court, details: CourtDetails): void {
  court.rating = details.rating ?? court.rating;
  court.user_rating_count = details.user_rating_count ?? court.user_rating_count;
  court.phone = details.phone ?? court.phone;
  court.website = details.website ?? court.website;
  court.hours = details.hours ?? court.hours;
}
