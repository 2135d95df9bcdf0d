/**
 * @fileoverview HTTP surface exports
 * @module features/server
 */

export * from './router.js';
export * from './http-server.js';
export * from './ipc-bridge.js';
export * from './cluster.js';
