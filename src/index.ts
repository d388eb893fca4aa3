/**
 * Banline - trainable binary content classifier with a ban-line gated memory.
 */

export * from './errors.js';
export * from './engine/encoder.js';
export * from './engine/network.js';
export * from './engine/random.js';
export * from './memory/index.js';
export * from './classifier/index.js';
export * from './config/index.js';
