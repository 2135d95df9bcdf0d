/**
 * @fileoverview Process wiring for the web and worker modes
 * @module app
 *
 * `createRuntime` assembles notifier, engine, scheduler, orchestrator and
 * alerts for one process. `runWeb` adds the HTTP surface: in a cluster the
 * primary owns the runtime and the forked workers only serve HTTP, asking the
 * primary over IPC. `runWorker` runs the runtime without HTTP.
 */

import cluster from 'node:cluster';
import type { SentinelConfig } from './config/index.js';
import { APP_VERSION, BOT_DISPLAY_NAME } from './shared/constants/index.js';
import { SentinelError, errorMessage } from './shared/errors.js';
import { logger } from './shared/utils/index.js';
import { Orchestrator, SignalEngine, TradingScheduler, type SignalEngineOptions } from './features/engine/index.js';
import { AlertSystem } from './features/monitoring/index.js';
import { TelegramNotifier } from './features/notification/index.js';
import {
  ClusterSupervisor,
  RemoteBackend,
  SentinelServer,
  createRouter,
  localBackend,
  serveBridge,
  type BridgePort,
  type ServerBackend,
} from './features/server/index.js';

const log = logger.child('app');

// =============================================================================
// TYPES
// =============================================================================

/** Notifier calls made by the runtime and everything it wires */
export type RuntimeNotifier = Pick<
  TelegramNotifier,
  | 'sendMessage'
  | 'sendSignal'
  | 'sendDailySummary'
  | 'sendWeeklySummary'
  | 'sendAlert'
  | 'sendStartup'
  | 'sendShutdown'
  | 'sendError'
  | 'stop'
>;

export interface RuntimeOptions {
  notifier?: RuntimeNotifier;
  engine?: SignalEngineOptions;
  now?: () => Date;
}

export interface SentinelRuntime {
  readonly engine: SignalEngine;
  readonly scheduler: TradingScheduler;
  readonly orchestrator: Orchestrator;
  readonly alerts: AlertSystem;
  readonly backend: ServerBackend;
  start(): Promise<void>;
  stop(): Promise<void>;
}

// =============================================================================
// RUNTIME
// =============================================================================

export function createRuntime(config: SentinelConfig, options: RuntimeOptions = {}): SentinelRuntime {
  const now = options.now ?? (() => new Date());
  const notifier = options.notifier ?? new TelegramNotifier(config);
  const engine = new SignalEngine(config, notifier, { now, ...options.engine });
  const scheduler = new TradingScheduler(config, engine, now);
  const orchestrator = new Orchestrator(engine, scheduler, notifier, config, now);
  const alerts = new AlertSystem(notifier, config, now);
  let started = false;

  const webhook = async (body: unknown): Promise<void> => {
    const outcome = await orchestrator.processWebhook(body);
    if (outcome.accepted && outcome.type === 'trade_result') {
      await alerts.checkAndAlert(engine.metrics.getAll());
    }
  };

  return {
    engine,
    scheduler,
    orchestrator,
    alerts,
    backend: localBackend({
      health: () => orchestrator.healthCheck(),
      metrics: () => engine.metrics.getAll(),
      webhook,
    }),

    async start() {
      if (started) {
        return;
      }
      log.info(`Starting ${BOT_DISPLAY_NAME} v${APP_VERSION} (${config.env})`);
      try {
        await engine.start();
      } catch (error) {
        await notifier.sendError(`Engine failed to start: ${errorMessage(error)}`);
        throw error;
      }
      scheduler.start();
      started = true;
      await notifier.sendStartup();
      log.success('Bot started');
    },

    async stop() {
      if (!started) {
        await notifier.stop();
        return;
      }
      started = false;
      scheduler.stop();
      await engine.stop();
      await notifier.sendShutdown();
      await notifier.stop();
      log.info('Bot stopped');
    },
  };
}

// =============================================================================
// SHUTDOWN
// =============================================================================

function onShutdownSignal(task: () => Promise<void>): void {
  let shuttingDown = false;
  const handler = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info(`${signal} received, shutting down`);
    task()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
  };
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
}

// =============================================================================
// MODES
// =============================================================================

function createServer(config: SentinelConfig, backend: ServerBackend): SentinelServer {
  const { host, port, requestTimeoutMs, webhookSecret } = config.server;
  const router = createRouter({ botName: BOT_DISPLAY_NAME, version: APP_VERSION, webhookSecret, backend });
  return new SentinelServer({ host, port, requestTimeoutMs, router });
}

/** The IPC channel to the primary, as seen from a forked worker */
function primaryPort(): BridgePort {
  if (!process.send) {
    throw new SentinelError('BAD_REQUEST', 'No IPC channel to the cluster primary');
  }
  return {
    send: (message) => process.send?.(message),
    on: (event, listener) => process.on(event, listener),
  };
}

/**
 * Starts the HTTP surface. With one worker everything runs in this process.
 */
export async function runWeb(config: SentinelConfig): Promise<void> {
  if (cluster.isWorker) {
    const server = createServer(config, new RemoteBackend(primaryPort(), config.server.requestTimeoutMs));
    await server.start();
    onShutdownSignal(() => server.stop());
    return;
  }

  const runtime = createRuntime(config);

  if (config.server.workers <= 1) {
    const server = createServer(config, runtime.backend);
    await server.start();
    onShutdownSignal(async () => {
      await server.stop();
      await runtime.stop();
    });
    await runtime.start();
    return;
  }

  const supervisor = new ClusterSupervisor(cluster, config.server, {
    onWorker: (worker) => serveBridge(worker, runtime.backend),
  });
  supervisor.start();
  onShutdownSignal(async () => {
    supervisor.stop();
    await runtime.stop();
  });
  await runtime.start();
}

/**
 * Runs engine and scheduler without HTTP.
 */
export async function runWorker(config: SentinelConfig): Promise<void> {
  const runtime = createRuntime(config);
  onShutdownSignal(() => runtime.stop());
  await runtime.start();
}
