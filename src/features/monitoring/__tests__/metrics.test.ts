/**
 * @fileoverview Unit tests for performance metrics
 */

import { describe, it, expect } from 'vitest';
import { MetricsCollector, maxDrawdown, profitFactor, sharpeRatio, winRate, type TradeRecord } from '../metrics.js';

function clock(iso: string) {
  let current = new Date(iso);
  return {
    now: () => current,
    set: (next: string) => {
      current = new Date(next);
    },
  };
}

const record = (pnlPct: number): TradeRecord => ({ symbol: 'ETH/USDT', pnlPct, timestamp: '2024-03-06T00:00:00Z' });

describe('trade statistics', () => {
  it('computes win rate and profit factor', () => {
    expect(winRate([])).toBe(0);
    expect(winRate([record(1), record(-1), record(0), record(2)])).toBe(50);
    expect(profitFactor([record(1.5), record(-0.5)])).toBe(3);
    expect(profitFactor([record(1.5), record(0.5)])).toBe(2);
  });

  it('annualises the Sharpe ratio over three trades a day', () => {
    expect(sharpeRatio([1])).toBe(0);
    expect(sharpeRatio([1, 1])).toBe(0);
    expect(sharpeRatio([1, -1, 2])).toBeCloseTo(12);
  });

  it('measures drawdown from the running peak', () => {
    expect(maxDrawdown([2, -1, -0.5, 1])).toBeCloseTo(75);
    expect(maxDrawdown([-1, -1])).toBe(0);
  });
});

describe('MetricsCollector', () => {
  function populated() {
    // Wednesday 15:00 IST
    const c = clock('2024-03-06T09:30:00Z');
    const metrics = new MetricsCollector(c.now);

    c.set('2024-02-28T09:30:00Z');
    metrics.recordTrade({ symbol: 'BTC/USDT', pnlPct: 1, rrRatio: 2 });
    c.set('2024-03-04T09:30:00Z');
    metrics.recordTrade({ symbol: 'ETH/USDT', pnlPct: -0.5 });
    c.set('2024-03-06T05:00:00Z');
    metrics.recordTrade({ symbol: 'SOL/USDT', pnlPct: 0.75, rrRatio: 1.5 });
    c.set('2024-03-06T10:00:00Z');
    return { metrics, clock: c };
  }

  it('splits trades into IST periods', () => {
    const { metrics } = populated();

    expect(metrics.tradesFor()).toHaveLength(3);
    expect(metrics.tradesFor('month')).toHaveLength(2);
    expect(metrics.tradesFor('week')).toHaveLength(2);
    expect(metrics.tradesFor('today').map((t) => t.symbol)).toEqual(['SOL/USDT']);
  });

  it('summarises every figure served on /metrics', () => {
    const report = populated().metrics.getAll();

    expect(report.summary).toEqual({
      totalSignals: 0,
      totalTrades: 3,
      winningTrades: 2,
      losingTrades: 1,
      consecutiveLosses: 0,
      totalPnl: 1.25,
      winRate: 66.67,
      avgRr: 1.17,
      profitFactor: 3.5,
      sharpeRatio: 14.26,
      maxDrawdown: 50,
    });
    expect(report.today).toEqual({ trades: 1, winRate: 100, pnl: 0.75 });
    expect(report.week).toEqual({ trades: 2, winRate: 50, pnl: 0.25 });
    expect(report.bestTrade?.symbol).toBe('BTC/USDT');
    expect(report.worstTrade?.symbol).toBe('ETH/USDT');
    expect(report.uptime).toBe('30m');
  });

  it('counts trailing losses', () => {
    const { metrics } = populated();
    metrics.recordTrade({ symbol: 'ETH/USDT', pnlPct: -0.2 });
    metrics.recordTrade({ symbol: 'ETH/USDT', pnlPct: 0 });

    expect(metrics.consecutiveLosses()).toBe(2);
  });

  it('keeps the last ten errors in the report', () => {
    const metrics = new MetricsCollector(() => new Date('2024-03-06T09:30:00Z'));
    for (let i = 0; i < 12; i++) {
      metrics.recordError('feed', `error ${i}`);
    }

    const errors = metrics.getAll().recentErrors;
    expect(errors).toHaveLength(10);
    expect(errors[0]?.message).toBe('error 2');
  });

  it('returns empty figures without trades', () => {
    const metrics = new MetricsCollector(() => new Date('2024-03-06T09:30:00Z'));
    const report = metrics.getAll();

    expect(report.bestTrade).toBeNull();
    expect(report.summary).toMatchObject({ totalTrades: 0, winRate: 0, profitFactor: 0, sharpeRatio: 0, maxDrawdown: 0 });
    expect(metrics.takeSnapshot()).toMatchObject({ totalTrades: 0, avgRr: 0 });
  });
});
