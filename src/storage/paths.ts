/**
 * Path Resolution Utilities
 *
 * Directory Structure:
 * ```
 * data/
 * ├── courts.json            # Court table (array)
 * ├── search_progress.json   # Completed search queries
 * └── raw_places.json        # Legacy court table keyed by place_id (read only)
 * docs/
 * ├── courts.json            # Mirror served with the static page
 * └── photos/                # <sanitized place_id>.jpg
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import { PHOTOS_DIRNAME } from './photos.js';

export interface OutputPaths {
  dataDir: string;
  docsDir: string;
  /** Primary court table */
  courtsFile: string;
  /** Mirror of the court table for the static page */
  docsCourtsFile: string;
  /** Query completion checkpoint */
  checkpointFile: string;
  /** Court table written by earlier releases */
  legacyCourtsFile: string;
  photosDir: string;
}

/**
 * Resolve every file the pipeline reads or writes.
 */
export function resolveOutputPaths(dataDir: string, docsDir: string): OutputPaths {
  const data = path.resolve(dataDir);
  const docs = path.resolve(docsDir);

  return {
    dataDir: data,
    docsDir: docs,
    courtsFile: path.join(data, 'courts.json'),
    docsCourtsFile: path.join(docs, 'courts.json'),
    checkpointFile: path.join(data, 'search_progress.json'),
    legacyCourtsFile: path.join(data, 'raw_places.json'),
    photosDir: path.join(docs, PHOTOS_DIRNAME),
  };
}
