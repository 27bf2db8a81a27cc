/**
 * Derived-Field Stage
 *
 * Adds a Google Street View link to every court that has coordinates and
 * no link yet. No network access.
 *
 * @module stages/street-view
 */

import type { CourtTable } from '../schemas/court.js';

const STREET_VIEW_BASE = 'https://www.google.com/maps/@?api=1&map_action=pano';

/**
 * Render a coordinate as a decimal literal with at least one fractional
 * digit, so 40 becomes "40.0" and 33.4484 stays "33.4484".
 */
export function formatCoordinate(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Street View panorama URL for a coordinate pair.
 */
export function buildStreetViewUrl(lat: number, lng: number): string {
  return `${STREET_VIEW_BASE}&viewpoint=${formatCoordinate(lat)},${formatCoordinate(lng)}`;
}

/**
 * Set `street_view_url` on courts that lack one.
 *
 * @returns Number of courts updated
 */
export function applyStreetViewUrls(courts: CourtTable): number {
  let updated = 0;
  for (const court of courts.values()) {
    if (court.lat === null || court.lng === null || court.street_view_url !== null) {
      continue;
    }
    court.street_view_url = buildStreetViewUrl(court.lat, court.lng);
    updated++;
  }
  return updated;
}
