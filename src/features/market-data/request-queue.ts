/**
 * @fileoverview Concurrency-limited queue for exchange requests
 * @module features/market-data/request-queue
 *
 * Caps the number of REST calls in flight. Higher priorities jump the queue;
 * equal priorities run in arrival order.
 */

import { SentinelError } from '../../shared/errors.js';
import { logger } from '../../shared/utils/logger.js';

const log = logger.child('queue');

// =============================================================================
// TYPES
// =============================================================================

/**
 * Request priority levels.
 */
export enum RequestPriority {
  LOW = 0,
  MEDIUM = 1,
  HIGH = 2,
}

interface QueuedRequest {
  id: number;
  priority: RequestPriority;
  start: () => Promise<void>;
  reject: (reason: Error) => void;
  timeoutId: NodeJS.Timeout | undefined;
}

/**
 * Request queue configuration.
 */
export interface RequestQueueConfig {
  maxConcurrent: number;
  /** How long a request may wait before it is rejected; 0 disables */
  queueTimeoutMs: number;
}

// =============================================================================
// REQUEST QUEUE
// =============================================================================

export class RequestQueue {
  private readonly config: RequestQueueConfig;
  private readonly queue: QueuedRequest[] = [];
  private running = 0;
  private nextId = 1;

  constructor(config: Partial<RequestQueueConfig> = {}) {
    this.config = {
      maxConcurrent: config.maxConcurrent ?? 10,
      queueTimeoutMs: config.queueTimeoutMs ?? 0,
    };
  }

  /**
   * Runs `task` once a slot is free and resolves with its result.
   */
  enqueue<R>(task: () => Promise<R>, priority: RequestPriority = RequestPriority.MEDIUM): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      const request: QueuedRequest = {
        id: this.nextId++,
        priority,
        start: () => task().then(resolve, reject),
        reject,
        timeoutId: undefined,
      };

      if (this.config.queueTimeoutMs > 0) {
        request.timeoutId = setTimeout(() => this.handleTimeout(request.id), this.config.queueTimeoutMs);
      }

      this.insertIntoQueue(request);
      this.processQueue();
    });
  }

  private processQueue(): void {
    while (this.running < this.config.maxConcurrent) {
      const request = this.queue.shift();
      if (!request) {
        return;
      }
      this.runRequest(request);
    }
  }

  private runRequest(request: QueuedRequest): void {
    if (request.timeoutId) {
      clearTimeout(request.timeoutId);
      request.timeoutId = undefined;
    }
    this.running++;
    void request.start().finally(() => {
      this.running--;
      this.processQueue();
    });
  }

  private handleTimeout(requestId: number): void {
    const index = this.queue.findIndex((r) => r.id === requestId);
    if (index === -1) {
      return;
    }
    const [request] = this.queue.splice(index, 1);
    log.warn(`Request ${requestId} timed out while queued`);
    request?.reject(new SentinelError('TIMEOUT', 'Request timed out in queue', { retryable: true }));
  }

  private insertIntoQueue(request: QueuedRequest): void {
    const index = this.queue.findIndex((r) => r.priority < request.priority);
    if (index === -1) {
      this.queue.push(request);
    } else {
      this.queue.splice(index, 0, request);
    }
  }

  /**
   * Rejects every queued request. Running ones finish normally.
   */
  clear(): void {
    for (const request of this.queue.splice(0)) {
      if (request.timeoutId) {
        clearTimeout(request.timeoutId);
      }
      request.reject(new SentinelError('NETWORK_ERROR', 'Request queue cleared'));
    }
    log.debug('Queue cleared');
  }

  getStats(): { queued: number; running: number } {
    return { queued: this.queue.length, running: this.running };
  }
}
