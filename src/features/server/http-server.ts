/**
 * @fileoverview node:http adapter around the router
 * @module features/server/http-server
 */

import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { SentinelError, errorMessage } from '../../shared/errors.js';
import { logger } from '../../shared/utils/logger.js';
import type { Router } from './router.js';

const log = logger.child('server');

// =============================================================================
// TYPES
// =============================================================================

/** The parts of `http.Server` the wrapper drives */
export interface HttpListener {
  requestTimeout: number;
  listen(port: number, host: string, callback: () => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  close(callback: (error?: Error) => void): unknown;
  closeAllConnections(): void;
  address(): AddressInfo | string | null;
}

export type RequestListener = (req: IncomingMessage, res: ServerResponse) => void;

export interface HttpServerOptions {
  host: string;
  port: number;
  requestTimeoutMs: number;
  router: Router;
  /** Webhook bodies above this are refused with 413 */
  maxBodyBytes?: number;
  /** Override for tests */
  createListener?: (handler: RequestListener) => HttpListener;
}

const MAX_BODY_BYTES = 1024 * 1024;

// =============================================================================
// REQUEST PLUMBING
// =============================================================================

/**
 * Collects the body up to `limit` bytes. Past the limit the rest is
 * drained and dropped so the 413 reply can still be written.
 */
function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer | string) => {
      if (tooLarge) return;
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      size += buffer.length;
      if (size > limit) {
        tooLarge = true;
        chunks.length = 0;
        reject(new SentinelError('PAYLOAD_TOO_LARGE', `Request body exceeds ${limit} bytes`));
        return;
      }
      chunks.push(buffer);
    });
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}

function sendJson(res: ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}): void {
  const text = JSON.stringify(body);
  res.writeHead(status, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(text),
    ...headers,
  });
  res.end(text);
}

/**
 * Adapts the router to node's request listener signature.
 */
export function toRequestListener(router: Router, maxBodyBytes = MAX_BODY_BYTES): RequestListener {
  return (req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const method = req.method ?? 'GET';

    void router({ method, path: url.pathname, readBody: () => readBody(req, maxBodyBytes) })
      .then((response) => sendJson(res, response.status, response.body))
      .catch((error: unknown) => {
        if (error instanceof SentinelError && error.code === 'PAYLOAD_TOO_LARGE') {
          log.warn(`${method} ${url.pathname} refused: ${error.message}`);
          sendJson(res, 413, { detail: 'Request body too large' }, { Connection: 'close' });
          return;
        }
        log.error(`${method} ${url.pathname} failed: ${errorMessage(error)}`);
        sendJson(res, 500, { detail: 'Internal Server Error' });
      });
  };
}

// =============================================================================
// SERVER
// =============================================================================

export class SentinelServer {
  private listener: HttpListener | null = null;

  constructor(private readonly options: HttpServerOptions) {}

  get listening(): boolean {
    return this.listener !== null;
  }

  /**
   * Binds the configured address. Resolves with the bound port.
   */
  async start(): Promise<number> {
    if (this.listener) {
      throw new SentinelError('BAD_REQUEST', 'HTTP server is already running');
    }

    const { host, port, requestTimeoutMs, router, maxBodyBytes } = this.options;
    const create = this.options.createListener ?? ((handler: RequestListener) => createServer(handler));
    const listener = create(toRequestListener(router, maxBodyBytes));
    listener.requestTimeout = requestTimeoutMs;

    await new Promise<void>((resolve, reject) => {
      listener.once('error', (error) => {
        reject(new SentinelError('NETWORK_ERROR', `Cannot listen on ${host}:${port}: ${error.message}`, { cause: error }));
      });
      listener.listen(port, host, () => resolve());
    });

    this.listener = listener;
    const address = listener.address();
    const bound = address !== null && typeof address === 'object' ? address.port : port;
    log.info(`HTTP server listening on ${host}:${bound}`);
    return bound;
  }

  async stop(): Promise<void> {
    const listener = this.listener;
    if (!listener) {
      return;
    }
    this.listener = null;
    await new Promise<void>((resolve, reject) => {
      listener.close((error) => (error ? reject(error) : resolve()));
      // close() waits for open sockets, including keep-alive and half-read ones
      listener.closeAllConnections();
    });
    log.info('HTTP server stopped');
  }
}
