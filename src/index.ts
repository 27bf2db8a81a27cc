/**
 * Court Harvest
 *
 * Library entry point. The `courts` CLI lives in `cli/index.ts`.
 *
 * @module court-harvest
 */

export * from './config/index.js';
export * from './schemas/index.js';
export * from './places/index.js';
export * from './catalog/index.js';
export * from './stages/index.js';
export * from './storage/index.js';
export * from './pipeline/index.js';
