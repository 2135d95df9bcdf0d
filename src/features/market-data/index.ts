/**
 * @fileoverview Market data feature exports
 * @module features/market-data
 */

export * from './http-client.js';
export * from './request-queue.js';
export * from './symbols.js';
export * from './exchange-client.js';
export * from './candle-cache.js';
export * from './kline-feed.js';
export * from './historical.js';
