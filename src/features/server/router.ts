/**
 * @fileoverview HTTP routes for status, health, metrics and the webhook
 * @module features/server/router
 *
 * Transport-free: the server adapter hands in the method, path and a body
 * reader, and writes back whatever status and JSON body come out.
 */

import { timingSafeEqual } from 'node:crypto';
import { errorMessage } from '../../shared/errors.js';
import { logger } from '../../shared/utils/logger.js';

const log = logger.child('http');

// =============================================================================
// TYPES
// =============================================================================

/**
 * Where the routes read state from. `null` means the component is not up in
 * this process.
 */
export interface ServerBackend {
  health(): Promise<unknown>;
  metrics(): Promise<unknown>;
  webhook(body: unknown): Promise<void>;
}

export interface RouteRequest {
  method: string;
  path: string;
  readBody(): Promise<string>;
}

export interface RouteResponse {
  status: number;
  body: unknown;
}

export interface RouterOptions {
  botName: string;
  version: string;
  webhookSecret: string;
  backend: ServerBackend;
}

const WEBHOOK_PREFIX = '/webhook/';

function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    log.debug(`Undecodable path segment: ${errorMessage(error)}`);
    return null;
  }
}

function secretMatches(given: string | null, expected: string): boolean {
  if (given === null) {
    return false;
  }
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

// =============================================================================
// ROUTER
// =============================================================================

export type Router = (request: RouteRequest) => Promise<RouteResponse>;

export function createRouter(options: RouterOptions): Router {
  const { backend } = options;

  return async (request) => {
    const { method, path } = request;

    if (method === 'GET' && path === '/') {
      return {
        status: 200,
        body: {
          bot: options.botName,
          version: options.version,
          status: 'running',
          auto_trade: false,
          manual_signals: true,
        },
      };
    }

    if (method === 'GET' && path === '/health') {
      const report = await backend.health();
      return { status: 200, body: report ?? { status: 'ok', message: 'Health checker not initialized' } };
    }

    if (method === 'GET' && path === '/metrics') {
      const metrics = await backend.metrics();
      return { status: 200, body: metrics ?? { message: 'Metrics not available' } };
    }

    if (method === 'POST' && path.startsWith(WEBHOOK_PREFIX)) {
      const secret = decodeSegment(path.slice(WEBHOOK_PREFIX.length));
      if (!secretMatches(secret, options.webhookSecret)) {
        log.warn('Webhook rejected: bad secret');
        return { status: 401, body: { detail: 'Unauthorized' } };
      }

      const raw = await request.readBody();
      let payload: unknown;
      try {
        payload = JSON.parse(raw);
      } catch (error) {
        log.warn(`Webhook body is not JSON: ${errorMessage(error)}`);
        return { status: 400, body: { detail: 'Invalid JSON body' } };
      }

      log.info('Webhook received');
      await backend.webhook(payload);
      return { status: 200, body: { status: 'received' } };
    }

    return { status: 404, body: { detail: 'Not Found' } };
  };
}

// =============================================================================
// LOCAL BACKEND
// =============================================================================

export interface LocalBackendSources {
  health?: () => unknown;
  metrics?: () => unknown;
  webhook?: (body: unknown) => Promise<unknown>;
}

/**
 * Backend over components living in this process. Missing components read
 * as `null`; a webhook without a handler is accepted and dropped.
 */
export function localBackend(sources: LocalBackendSources): ServerBackend {
  return {
    health: async () => (sources.health ? sources.health() : null),
    metrics: async () => (sources.metrics ? sources.metrics() : null),
    webhook: async (body) => {
      if (sources.webhook) {
        await sources.webhook(body);
      }
    },
  };
}
