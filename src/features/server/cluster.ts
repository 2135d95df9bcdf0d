/**
 * @fileoverview Multi-process HTTP serving with node:cluster
 * @module features/server/cluster
 *
 * The primary forks `server.workers` HTTP workers sharing one port and
 * re-forks any that die while the cluster is running. `server.threads` has
 * no counterpart in node; the event loop serves concurrent requests.
 */

import type { ServerConfig } from '../../config/index.js';
import { logger } from '../../shared/utils/logger.js';
import type { BridgePort } from './ipc-bridge.js';

const log = logger.child('cluster');

// =============================================================================
// TYPES
// =============================================================================

export interface ClusterWorker extends BridgePort {
  readonly id: number;
  readonly process: { readonly pid?: number | undefined };
}

/** The parts of `node:cluster` the supervisor uses */
export interface ClusterApi {
  fork(env?: NodeJS.ProcessEnv): ClusterWorker;
  on(event: 'exit', listener: (worker: ClusterWorker, code: number, signal: string) => void): unknown;
}

export interface SupervisorOptions {
  /** Called for every forked worker, re-forks included */
  onWorker?: (worker: ClusterWorker) => void;
}

// =============================================================================
// SUPERVISOR
// =============================================================================

export class ClusterSupervisor {
  private readonly workers = new Map<number, ClusterWorker>();
  private running = false;
  private restarts = 0;

  constructor(
    private readonly cluster: ClusterApi,
    private readonly config: Pick<ServerConfig, 'workers' | 'threads'>,
    private readonly options: SupervisorOptions = {}
  ) {
    cluster.on('exit', (worker, code, signal) => this.onExit(worker, code, signal));
  }

  get size(): number {
    return this.workers.size;
  }

  get restartCount(): number {
    return this.restarts;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    log.info(`Forking ${this.config.workers} HTTP workers (threads=${this.config.threads} is informational in node)`);
    for (let i = 0; i < this.config.workers; i++) {
      this.fork();
    }
  }

  /**
   * Stops re-forking. Workers exit with the primary.
   */
  stop(): void {
    this.running = false;
  }

  private fork(): void {
    const worker = this.cluster.fork();
    this.workers.set(worker.id, worker);
    log.debug(`Worker ${worker.id} forked (pid ${worker.process.pid ?? '?'})`);
    this.options.onWorker?.(worker);
  }

  private onExit(worker: ClusterWorker, code: number, signal: string): void {
    this.workers.delete(worker.id);
    if (!this.running) {
      log.info(`Worker ${worker.id} exited`);
      return;
    }
    log.warn(`Worker ${worker.id} died (code=${code}, signal=${signal || 'none'}), forking a replacement`);
    this.restarts++;
    this.fork();
  }
}
