/**
 * @fileoverview Signal filter feature exports
 * @module features/filters
 */

export * from './types.js';
export * from './tier1.js';
export * from './tier2.js';
export * from './tier3.js';
export * from './orchestrator.js';
export * from './dynamic.js';
