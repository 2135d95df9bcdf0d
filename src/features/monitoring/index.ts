/**
 * @fileoverview Public API for health, metrics and alerts
 * @module features/monitoring
 */

export * from './metrics.js';
export * from './alerts.js';
export * from './health.js';
