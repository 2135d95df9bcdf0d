/**
 * @fileoverview Signal feature exports
 * @module features/signals
 */

export * from './scorer.js';
export * from './confidence.js';
export * from './validator.js';
export * from './generator.js';
