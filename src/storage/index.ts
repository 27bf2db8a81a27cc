/**
 * Storage Layer
 *
 * @module storage
 */

export { atomicWriteJson, readJson, readJsonIfExists, fileExists } from './atomic.js';
export { resolveOutputPaths, type OutputPaths } from './paths.js';
export { savePhoto, sanitizePlaceId, photoRelativePath, PHOTOS_DIRNAME } from './photos.js';
export {
  loadPipelineState,
  saveCourts,
  saveQueryCheckpoint,
  parseCourtTable,
  parseQueryCheckpoint,
  countCourts,
  type PipelineState,
  type CourtSource,
} from './courts.js';
