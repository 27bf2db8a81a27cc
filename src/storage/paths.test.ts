/**
 * Path Resolution Tests
 *
 * @module storage/paths.test
 */

import * as path from 'node:path';
import { resolveOutputPaths } from './paths.js';

describe('storage/paths', () => {
  it('lays out the data and docs directories', () => {
    const paths = resolveOutputPaths('/srv/data', '/srv/docs');

    expect(paths).toEqual({
      dataDir: '/srv/data',
      docsDir: '/srv/docs',
      courtsFile: '/srv/data/courts.json',
      docsCourtsFile: '/srv/docs/courts.json',
      checkpointFile: '/srv/data/search_progress.json',
      legacyCourtsFile: '/srv/data/raw_places.json',
      photosDir: '/srv/docs/photos',
    });
  });

  it('resolves relative directories against the working directory', () => {
    const paths = resolveOutputPaths('data', 'docs');

    expect(paths.courtsFile).toBe(path.join(process.cwd(), 'data', 'courts.json'));
    expect(paths.photosDir).toBe(path.join(process.cwd(), 'docs', 'photos'));
  });
});
