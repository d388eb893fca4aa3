export * from './classifier.js';
export * from './training-grounds.js';
