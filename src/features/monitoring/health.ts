/**
 * @fileoverview Component health checks
 * @module features/monitoring/health
 *
 * Probes the engine, scheduler, WebSocket feed and cache, and reports process
 * memory. Any probe error marks the bot degraded; a run of more than five
 * failed probes without a clean check marks it critical.
 */

import * as os from 'node:os';
import { MS_IN_HOUR, MS_IN_MINUTE } from '../../shared/constants/index.js';
import { errorMessage } from '../../shared/errors.js';
import { logger } from '../../shared/utils/logger.js';
import { formatDuration } from '../../shared/utils/time.js';
import type { CacheSizeStats } from '../market-data/candle-cache.js';
import type { FeedStatus } from '../market-data/kline-feed.js';
import type { EngineStatus } from '../engine/engine.js';
import type { SessionInfo } from '../engine/scheduler.js';

const log = logger.child('health');

// =============================================================================
// TYPES
// =============================================================================

export type HealthStatus = 'healthy' | 'degraded' | 'critical';
export type ComponentState = 'ok' | 'warning' | 'error';

/** Probes read on every check */
export interface HealthSources {
  engineStatus(): EngineStatus;
  sessionInfo(): SessionInfo;
  feedStatus(): FeedStatus;
  cacheSize(): CacheSizeStats;
}

export interface MemoryReading {
  rssBytes: number;
  heapUsedBytes: number;
  totalBytes: number;
}

export interface MemoryReport {
  rss_mb: number;
  heap_used_mb: number;
  /** RSS as a percent of system memory */
  percent: number;
}

export interface HealthReport {
  status: HealthStatus;
  /** ISO-8601 */
  timestamp: string;
  uptime: string;
  components: Record<string, ComponentState>;
  market?: EngineStatus;
  session?: SessionInfo;
  cache?: CacheSizeStats;
  memory: MemoryReport;
  system: {
    node_version: string;
    platform: string;
    cpu_count: number;
    memory_total_gb: number;
    pid: number;
  };
  warnings: string[];
  errors: string[];
}

export interface HealthHistoryEntry {
  timestamp: string;
  status: HealthStatus;
  errors: number;
  warnings: number;
}

export interface HealthCheckerOptions {
  now?: () => Date;
  memory?: () => MemoryReading;
}

const HISTORY_LIMIT = 100;
const MAX_CONSECUTIVE_FAILURES = 5;
const HIGH_MEMORY_PCT = 80;
const MB = 1024 ** 2;
const GB = 1024 ** 3;

const COMPONENT_EMOJI: Record<ComponentState, string> = { ok: '✅', warning: '⚠️', error: '❌' };

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function processMemory(): MemoryReading {
  const usage = process.memoryUsage();
  return { rssBytes: usage.rss, heapUsedBytes: usage.heapUsed, totalBytes: os.totalmem() };
}

// =============================================================================
// HEALTH CHECKER
// =============================================================================

export class HealthChecker {
  private readonly now: () => Date;
  private readonly memory: () => MemoryReading;
  private readonly startedAt: number;
  private readonly entries: HealthHistoryEntry[] = [];
  private failures = 0;

  constructor(
    private readonly sources: HealthSources,
    options: HealthCheckerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.memory = options.memory ?? processMemory;
    this.startedAt = this.now().getTime();
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  check(): HealthReport {
    const at = this.now();
    const components: Record<string, ComponentState> = {};
    const warnings: string[] = [];
    const errors: string[] = [];
    const report: HealthReport = {
      status: 'healthy',
      timestamp: at.toISOString(),
      uptime: this.uptime(),
      components,
      memory: this.memoryReport(),
      system: {
        node_version: process.version,
        platform: `${os.platform()}-${os.release()}`,
        cpu_count: os.cpus().length,
        memory_total_gb: round2(os.totalmem() / GB),
        pid: process.pid,
      },
      warnings,
      errors,
    };

    try {
      report.market = this.sources.engineStatus();
      components.engine = 'ok';
    } catch (error) {
      components.engine = 'error';
      errors.push(`Engine error: ${errorMessage(error)}`);
    }

    try {
      report.session = this.sources.sessionInfo();
      components.scheduler = 'ok';
    } catch (error) {
      components.scheduler = 'error';
      errors.push(`Scheduler error: ${errorMessage(error)}`);
    }

    try {
      const feed = this.sources.feedStatus();
      components.websocket = feed.connected ? 'ok' : 'warning';
      if (!feed.connected) {
        warnings.push('WebSocket disconnected');
      }
    } catch (error) {
      components.websocket = 'error';
      errors.push(`WebSocket error: ${errorMessage(error)}`);
    }

    try {
      report.cache = this.sources.cacheSize();
      components.cache = 'ok';
    } catch (error) {
      components.cache = 'warning';
      warnings.push(`Cache issue: ${errorMessage(error)}`);
    }

    if (report.memory.percent > HIGH_MEMORY_PCT) {
      warnings.push(`High memory usage: ${report.memory.percent}%`);
    }

    this.failures = errors.length > 0 ? this.failures + errors.length : 0;
    if (errors.length > 0) {
      report.status = 'degraded';
    }
    if (this.failures > MAX_CONSECUTIVE_FAILURES) {
      report.status = 'critical';
      log.error(`Health critical: ${this.failures} consecutive failures`);
    }

    this.entries.push({ timestamp: report.timestamp, status: report.status, errors: errors.length, warnings: warnings.length });
    if (this.entries.length > HISTORY_LIMIT) {
      this.entries.shift();
    }
    return report;
  }

  /** Quick probe: the engine answers its status call */
  isHealthy(): boolean {
    try {
      this.sources.engineStatus();
      return true;
    } catch (error) {
      log.warn(`Engine status failed: ${errorMessage(error)}`);
      return false;
    }
  }

  uptime(): string {
    return formatDuration(Math.floor((this.now().getTime() - this.startedAt) / MS_IN_MINUTE));
  }

  summary(): string {
    const health = this.check();
    const lines = [`🤖 Bot Health: ${health.status.toUpperCase()}`, `⏱️ Uptime: ${health.uptime}`, '📊 Components:'];
    for (const [name, state] of Object.entries(health.components)) {
      lines.push(`  ${COMPONENT_EMOJI[state]} ${name}`);
    }
    if (health.warnings.length > 0) {
      lines.push('', `⚠️ Warnings (${health.warnings.length}):`, ...health.warnings.slice(0, 3).map((w) => `  • ${w}`));
    }
    if (health.errors.length > 0) {
      lines.push('', `❌ Errors (${health.errors.length}):`, ...health.errors.slice(0, 3).map((e) => `  • ${e}`));
    }
    lines.push('', `💾 Memory: ${health.memory.rss_mb}MB (${health.memory.percent.toFixed(1)}%)`);
    return lines.join('\n');
  }

  history(hours = 24): HealthHistoryEntry[] {
    const cutoff = this.now().getTime() - hours * MS_IN_HOUR;
    return this.entries.filter((entry) => Date.parse(entry.timestamp) > cutoff);
  }

  private memoryReport(): MemoryReport {
    const { rssBytes, heapUsedBytes, totalBytes } = this.memory();
    return {
      rss_mb: round2(rssBytes / MB),
      heap_used_mb: round2(heapUsedBytes / MB),
      percent: totalBytes > 0 ? round2((rssBytes / totalBytes) * 100) : 0,
    };
  }
}
