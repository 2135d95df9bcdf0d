/**
 * @fileoverview Unit tests for the bar-by-bar backtest
 */

import { describe, it, expect } from 'vitest';
import type { Candle } from '../../../shared/types/index.js';
import {
  BacktestEngine,
  emptyResult,
  equitySharpe,
  maxDrawdown,
  structureStrategy,
  type BacktestStrategy,
} from '../engine.js';

const BAR = 900_000;

/** Flat bars around 100, with a spike to 103 at bar 53 and to 102 at bar 56 */
function series(count = 60): Candle[] {
  return Array.from({ length: count }, (_, i): Candle => {
    const high = i === 53 ? 103 : i === 56 ? 102 : 101;
    return [i * BAR, 100, high, 99, 100, 10];
  });
}

function scriptedStrategy(seen: number[]): BacktestStrategy {
  return (window) => {
    seen.push(window.length);
    const timestamp = window[window.length - 1][0];
    if (window.length === 51) {
      return { direction: 'LONG', entry: 100, stopLoss: 97, takeProfit: 102, timestamp };
    }
    if (window.length === 55) {
      return { direction: 'SHORT', entry: 100, stopLoss: 101.5, takeProfit: 96, timestamp };
    }
    return null;
  };
}

describe('BacktestEngine.run', () => {
  it('returns the empty result below fifty candles', () => {
    const engine = new BacktestEngine();
    expect(engine.run(series(49), 'BTC/USDT')).toEqual(emptyResult(100_000));
  });

  it('simulates exits and resumes after the exit bar', () => {
    const seen: number[] = [];
    const engine = new BacktestEngine({ strategy: scriptedStrategy(seen) });

    const result = engine.run(series(), 'BTC/USDT');

    expect(seen).toEqual([51, 55, 58, 59, 60]);
    expect(result.trades).toHaveLength(2);
    expect(result.trades[0]).toMatchObject({
      direction: 'LONG',
      entryTime: 50 * BAR,
      exitTime: 53 * BAR,
      exit: 102,
      barsHeld: 3,
    });
    expect(result.trades[0]?.pnlUsd).toBeCloseTo(20);
    expect(result.trades[1]).toMatchObject({ direction: 'SHORT', exitTime: 56 * BAR, exit: 101.5, barsHeld: 2 });
    expect(result.trades[1]?.pnlPct).toBeCloseTo(-1.5);
    expect(result.trades[1]?.pnlUsd).toBeCloseTo(-15.003);
    expect(result.equityCurve).toHaveLength(11);
  });

  it('computes the summary statistics', () => {
    const engine = new BacktestEngine({ strategy: scriptedStrategy([]) });

    const result = engine.run(series(), 'BTC/USDT');

    expect(result).toMatchObject({ totalTrades: 2, winningTrades: 1, losingTrades: 1, winRate: 50 });
    expect(result.totalPnl).toBeCloseTo(4.997);
    expect(result.totalPnlPercent).toBeCloseTo(0.004997, 6);
    expect(result.maxDrawdown).toBeCloseTo(15.003);
    expect(result.maxDrawdownPercent).toBeCloseTo(0.015, 6);
    expect(result.profitFactor).toBeCloseTo(1.33307, 4);
    expect(result.sharpeRatio).toBeCloseTo(1.21073, 4);
    expect(result.avgRr).toBeCloseTo(1.75);
    expect(result.avgWin).toBeCloseTo(2);
    expect(result.avgLoss).toBeCloseTo(-1.5);
    expect(result.bestTrade).toBeCloseTo(2);
    expect(result.worstTrade).toBeCloseTo(-1.5);
    expect(Object.keys(result.monthlyStats)).toEqual(['1970-01']);
    expect(result.monthlyStats['1970-01']).toMatchObject({ trades: 2, wins: 1, winRate: 50 });
  });

  it('closes at the last bar when neither level is touched', () => {
    const strategy: BacktestStrategy = (window) =>
      window.length === 51 ? { direction: 'LONG', entry: 100, stopLoss: 90, takeProfit: 110, timestamp: 0 } : null;
    const result = new BacktestEngine({ strategy }).run(series(), 'BTC/USDT');

    expect(result.trades).toEqual([
      { entryTime: 0, exitTime: 59 * BAR, direction: 'LONG', entry: 100, exit: 100, pnlPct: 0, pnlUsd: 0, barsHeld: 9 },
    ]);
    expect(result.losingTrades).toBe(1);
  });

  it('skips signals with fewer than five bars left', () => {
    const strategy: BacktestStrategy = (window) =>
      window.length === 56 ? { direction: 'LONG', entry: 100, stopLoss: 90, takeProfit: 110, timestamp: 0 } : null;
    expect(new BacktestEngine({ strategy }).run(series(), 'BTC/USDT').totalTrades).toBe(0);
  });

  it('filters by inclusive UTC dates', () => {
    const engine = new BacktestEngine({ strategy: scriptedStrategy([]) });
    expect(engine.run(series(), 'BTC/USDT', { startDate: '1970-01-01', endDate: '1970-01-01' }).totalTrades).toBe(2);
    expect(engine.run(series(), 'BTC/USDT', { startDate: '1970-01-02' }).totalTrades).toBe(0);
  });
});

describe('structureStrategy', () => {
  it('stays out of flat markets', () => {
    expect(structureStrategy(series())).toBeNull();
  });

  it('needs the warm-up window', () => {
    expect(structureStrategy(series(30))).toBeNull();
  });
});

describe('equity statistics', () => {
  it('measures drawdown against the running peak', () => {
    expect(maxDrawdown([100, 120, 90, 110, 80])).toEqual({ absolute: 40, percent: 100 * (40 / 120) });
  });

  it('gives zero Sharpe to a flat curve', () => {
    expect(equitySharpe([100, 100, 100])).toBe(0);
  });
});
