/**
 * Content memory: three category partitions gated by the ban line, plus the
 * JSON snapshot used to persist them.
 */

export * from './types.js';
export * from './store.js';
export * from './snapshot.js';
