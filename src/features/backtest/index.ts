/**
 * @fileoverview Backtest feature exports
 * @module features/backtest
 */

export * from './engine.js';
export * from './monte-carlo.js';
export * from './walk-forward.js';
export * from './overfitting.js';
export * from './report.js';
export * from './pipeline.js';
