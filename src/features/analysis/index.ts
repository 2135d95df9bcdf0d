/**
 * @fileoverview Market analysis feature exports
 * @module features/analysis
 */

export * from './indicators.js';
export * from './structure.js';
export * from './market-regime.js';
export * from './volume-profile.js';
export * from './liquidity.js';
export * from './divergence.js';
export * from './correlation.js';
