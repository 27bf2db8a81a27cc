/**
 * Court Schemas - Court records as published in courts.json
 *
 * JSON keys stay snake_case because the static page reads them directly.
 */

import { z } from 'zod';

// ============================================
// Opening Hours Schema
// ============================================

/**
 * Weekday name (lower case) to free-text hours, e.g. `{ monday: "6:00 AM – 10:00 PM" }`.
 */
export const OpeningHoursSchema = z.record(z.string(), z.string());

export type OpeningHours = z.infer<typeof OpeningHoursSchema>;

// ============================================
// Court Schema
// ============================================

/**
 * A single court record. Nullable fields default to null so that older
 * files written before a field existed still parse.
 */
export const CourtSchema = z.object({
  place_id: z.string().min(1),
  name: z.string().default('Unknown'),
  address: z.string().nullable().default(null),
  lat: z.number().min(-90).max(90).nullable().default(null),
  lng: z.number().min(-180).max(180).nullable().default(null),
  types: z.array(z.string()).default([]),

  // Enrichment
  rating: z.number().nullable().default(null),
  user_rating_count: z.number().int().nonnegative().nullable().default(null),
  phone: z.string().nullable().default(null),
  website: z.string().nullable().default(null),
  hours: OpeningHoursSchema.nullable().default(null),
  photo: z.string().nullable().default(null),

  // Derived
  street_view_url: z.string().nullable().default(null),
});

export type Court = z.infer<typeof CourtSchema>;

/**
 * Court table keyed by place_id. Insertion order is table order.
 */
export type CourtTable = Map<string, Court>;

/**
 * Create a court with only descriptive fields set.
 */
export function createCourt(
  fields: Pick<Court, 'place_id'> & Partial<Omit<Court, 'place_id'>>
): Court {
  return CourtSchema.parse(fields);
}

/**
 * A court is enriched once any of rating, phone, website or hours is known.
 */
export function isEnriched(court: Court): boolean {
  return (
    court.rating !== null ||
    court.phone !== null ||
    court.website !== null ||
    court.hours !== null
  );
}
