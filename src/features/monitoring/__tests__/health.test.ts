/**
 * @fileoverview Unit tests for component health checks
 */

import { describe, it, expect } from 'vitest';
import type { CacheSizeStats } from '../../market-data/candle-cache.js';
import type { EngineStatus } from '../../engine/engine.js';
import type { SessionInfo } from '../../engine/scheduler.js';
import { HealthChecker, type HealthSources, type MemoryReading } from '../health.js';

const MB = 1024 ** 2;

const ENGINE: EngineStatus = {
  market_type: 'trending',
  btc_regime: 'bull',
  btc_confidence: 40,
  btc_data_ready: true,
  btc_candles: 100,
  daily_signals: 1,
  daily_limit: 5,
  active_trades: 0,
  day_locked: false,
  paused: false,
};

const SESSION: SessionInfo = {
  current_session: 'london',
  hour: 14,
  is_trading_time: true,
  next_session: { name: 'ny', start: '18:00', end: '22:00', in: 4 },
  time_ist: '14:00',
};

const CACHE: CacheSizeStats = { ohlcvKeys: 20, totalCandles: 2000, orderbooks: 0, tickers: 0, hits: 5, misses: 0, hitRate: 100 };

function sources(overrides: Partial<HealthSources> = {}): HealthSources {
  return {
    engineStatus: () => ENGINE,
    sessionInfo: () => SESSION,
    feedStatus: () => ({ connected: true, reconnectAttempts: 0, streams: 20, lastMessageAt: 1 }),
    cacheSize: () => CACHE,
    ...overrides,
  };
}

function setup(overrides: Partial<HealthSources> = {}, memory: MemoryReading = { rssBytes: 100 * MB, heapUsedBytes: 50 * MB, totalBytes: 1000 * MB }) {
  let current = new Date('2024-03-05T09:30:00Z');
  const checker = new HealthChecker(sources(overrides), { now: () => current, memory: () => memory });
  const advanceMinutes = (minutes: number) => {
    current = new Date(current.getTime() + minutes * 60_000);
  };
  return { checker, advanceMinutes };
}

const failing = (message: string) => () => {
  throw new Error(message);
};

describe('HealthChecker.check', () => {
  it('reports a healthy bot', () => {
    const report = setup().checker.check();

    expect(report).toMatchObject({
      status: 'healthy',
      timestamp: '2024-03-05T09:30:00.000Z',
      uptime: '0m',
      components: { engine: 'ok', scheduler: 'ok', websocket: 'ok', cache: 'ok' },
      market: ENGINE,
      session: SESSION,
      cache: CACHE,
      memory: { rss_mb: 100, heap_used_mb: 50, percent: 10 },
      warnings: [],
      errors: [],
    });
  });

  it('degrades on a component error', () => {
    const { checker } = setup({ engineStatus: failing('engine down') });

    const report = checker.check();

    expect(report.status).toBe('degraded');
    expect(report.components.engine).toBe('error');
    expect(report.errors).toEqual(['Engine error: engine down']);
    expect(report.market).toBeUndefined();
    expect(checker.consecutiveFailures).toBe(1);
  });

  it('turns critical past five consecutive failures and recovers on a clean check', () => {
    let broken = true;
    const { checker } = setup({
      sessionInfo: () => {
        if (broken) throw new Error('clock');
        return SESSION;
      },
    });

    const statuses = Array.from({ length: 6 }, () => checker.check().status);
    expect(statuses).toEqual(['degraded', 'degraded', 'degraded', 'degraded', 'degraded', 'critical']);

    broken = false;
    expect(checker.check().status).toBe('healthy');
    expect(checker.consecutiveFailures).toBe(0);
  });

  it('warns about a dropped feed, a cache issue and high memory without degrading', () => {
    const { checker } = setup(
      {
        feedStatus: () => ({ connected: false, reconnectAttempts: 2, streams: 20, lastMessageAt: null }),
        cacheSize: failing('locked'),
      },
      { rssBytes: 900 * MB, heapUsedBytes: 300 * MB, totalBytes: 1000 * MB }
    );

    const report = checker.check();

    expect(report.status).toBe('healthy');
    expect(report.components).toMatchObject({ websocket: 'warning', cache: 'warning' });
    expect(report.warnings).toEqual(['WebSocket disconnected', 'Cache issue: locked', 'High memory usage: 90%']);
  });
});

describe('HealthChecker history and summary', () => {
  it('keeps a history window and tracks uptime', () => {
    const { checker, advanceMinutes } = setup();
    checker.check();
    advanceMinutes(90);
    checker.check();

    expect(checker.history(1)).toHaveLength(1);
    expect(checker.history()).toHaveLength(2);
    expect(checker.uptime()).toBe('1h 30m');
  });

  it('renders a readable summary', () => {
    const lines = setup({ engineStatus: failing('engine down') }).checker.summary().split('\n');

    expect(lines.slice(0, 7)).toEqual([
      '🤖 Bot Health: DEGRADED',
      '⏱️ Uptime: 0m',
      '📊 Components:',
      '  ❌ engine',
      '  ✅ scheduler',
      '  ✅ websocket',
      '  ✅ cache',
    ]);
    expect(lines).toContain('  • Engine error: engine down');
    expect(lines[lines.length - 1]).toBe('💾 Memory: 100MB (10.0%)');
  });

  it('answers the quick probe', () => {
    expect(setup().checker.isHealthy()).toBe(true);
    expect(setup({ engineStatus: failing('x') }).checker.isHealthy()).toBe(false);
  });
});
