/**
 * @fileoverview Request/response bridge between HTTP workers and the primary
 * @module features/server/ipc-bridge
 *
 * The engine lives in the cluster primary; workers only serve HTTP. A worker
 * forwards health, metrics and webhook calls over the IPC channel and waits
 * for the primary's reply.
 */

import { z } from 'zod';
import { SentinelError, errorMessage } from '../../shared/errors.js';
import { logger } from '../../shared/utils/logger.js';
import type { ServerBackend } from './router.js';

const log = logger.child('ipc');

// =============================================================================
// MESSAGES
// =============================================================================

const BRIDGE_TAG = 'candle-sentinel';

const BridgeRequestSchema = z.object({
  bridge: z.literal(BRIDGE_TAG),
  id: z.number().int(),
  kind: z.enum(['health', 'metrics', 'webhook']),
  body: z.unknown().optional(),
});
export type BridgeRequest = z.infer<typeof BridgeRequestSchema>;

const BridgeReplySchema = z.object({
  bridge: z.literal(BRIDGE_TAG),
  id: z.number().int(),
  ok: z.boolean(),
  result: z.unknown().optional(),
  error: z.string().optional(),
});
export type BridgeReply = z.infer<typeof BridgeReplySchema>;

/**
 * One end of an IPC channel: `process` in a worker, a `cluster.Worker` in
 * the primary.
 */
export interface BridgePort {
  send(message: BridgeRequest | BridgeReply): unknown;
  on(event: 'message', listener: (message: unknown) => void): unknown;
}

interface Pending {
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

// =============================================================================
// WORKER SIDE
// =============================================================================

/**
 * Backend that answers by asking the primary.
 */
export class RemoteBackend implements ServerBackend {
  private nextId = 1;
  private readonly pending = new Map<number, Pending>();

  constructor(
    private readonly port: BridgePort,
    private readonly timeoutMs = 10_000
  ) {
    port.on('message', (message) => this.onMessage(message));
  }

  health(): Promise<unknown> {
    return this.request('health');
  }

  metrics(): Promise<unknown> {
    return this.request('metrics');
  }

  async webhook(body: unknown): Promise<void> {
    await this.request('webhook', body);
  }

  get inFlight(): number {
    return this.pending.size;
  }

  private request(kind: BridgeRequest['kind'], body?: unknown): Promise<unknown> {
    const id = this.nextId++;
    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new SentinelError('TIMEOUT', `No reply from primary for ${kind} after ${this.timeoutMs}ms`, { retryable: true }));
      }, this.timeoutMs);
      this.pending.set(id, { resolve, reject, timer });
      this.port.send({ bridge: BRIDGE_TAG, id, kind, body });
    });
  }

  private onMessage(message: unknown): void {
    const parsed = BridgeReplySchema.safeParse(message);
    if (!parsed.success) {
      return;
    }
    const reply = parsed.data;
    const waiting = this.pending.get(reply.id);
    if (!waiting) {
      log.debug(`Late reply ${reply.id} ignored`);
      return;
    }
    this.pending.delete(reply.id);
    clearTimeout(waiting.timer);
    if (reply.ok) {
      waiting.resolve(reply.result ?? null);
    } else {
      waiting.reject(new Error(reply.error ?? 'Primary failed to answer'));
    }
  }
}

// =============================================================================
// PRIMARY SIDE
// =============================================================================

/**
 * Answers a worker's bridge requests from a local backend.
 */
export function serveBridge(port: BridgePort, backend: ServerBackend): void {
  port.on('message', (message) => {
    const parsed = BridgeRequestSchema.safeParse(message);
    if (!parsed.success) {
      return;
    }
    const { id, kind, body } = parsed.data;
    const work =
      kind === 'health' ? backend.health() : kind === 'metrics' ? backend.metrics() : backend.webhook(body).then(() => null);

    void work
      .then((result) => port.send({ bridge: BRIDGE_TAG, id, ok: true, result }))
      .catch((error: unknown) => {
        log.error(`Bridge ${kind} failed: ${errorMessage(error)}`);
        port.send({ bridge: BRIDGE_TAG, id, ok: false, error: errorMessage(error) });
      });
  });
}
