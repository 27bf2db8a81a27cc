/**
 * Schema exports
 */

export * from './court.js';
export * from './checkpoint.js';
export * from './places.js';
