/**
 * Photo Storage
 *
 * Court photos live in one directory, named after the sanitized place_id.
 *
 * @module storage/photos
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/** Directory name used in the relative path stored on a court */
export const PHOTOS_DIRNAME = 'photos';

const PHOTO_EXTENSION = '.jpg';

/**
 * Replace every character outside `[A-Za-z0-9_-]` with `_`.
 *
 * Not injective: ids that differ only in replaced characters (`a/b`, `a:b`)
 * share one photo file, and the later download overwrites the earlier one.
 * Places ids use the URL-safe alphabet, so this does not arise for real ids.
 */
export function sanitizePlaceId(placeId: string): string {
  return placeId.replace(/[^A-Za-z0-9_-]/g, '_');
}

/**
 * Relative path recorded on the court, e.g. `photos/ChIJ_abc.jpg`.
 */
export function photoRelativePath(placeId: string): string {
  return `${PHOTOS_DIRNAME}/${sanitizePlaceId(placeId)}${PHOTO_EXTENSION}`;
}

/**
 * Write photo bytes for a place.
 *
 * @param photosDir - Absolute directory for photo files
 * @returns The relative path to record on the court
 */
export async function savePhoto(
  photosDir: string,
  placeId: string,
  bytes: Uint8Array
): Promise<string> {
  const fileName = `${sanitizePlaceId(placeId)}${PHOTO_EXTENSION}`;
  await fs.mkdir(photosDir, { recursive: true });
  await fs.writeFile(path.join(photosDir, fileName), bytes);
  return photoRelativePath(placeId);
}
