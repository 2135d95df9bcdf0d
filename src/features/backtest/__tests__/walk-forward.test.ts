/**
 * @fileoverview Unit tests for walk-forward validation
 */

import { describe, it, expect, vi } from 'vitest';
import type { Candle } from '../../../shared/types/index.js';
import { emptyResult } from '../engine.js';
import { isRobust, WalkForwardAnalyzer } from '../walk-forward.js';

const HOUR = 3_600_000;

/** Ten days of hourly candles from the epoch */
const hourly: Candle[] = Array.from({ length: 240 }, (_, i): Candle => [i * HOUR, 100, 101, 99, 100, 1]);

function runner(testReturn: number) {
  return {
    run: vi.fn((candles: readonly Candle[]) => ({
      ...emptyResult(100_000),
      totalTrades: candles.length,
      winRate: 60,
      sharpeRatio: 1,
      totalPnlPercent: candles.length === 96 ? 3 : testReturn,
    })),
  };
}

describe('WalkForwardAnalyzer.analyze', () => {
  const options = { trainDays: 4, testDays: 2, stepDays: 2 };

  it('slides train and test windows across the data', () => {
    const engine = runner(2);
    const result = new WalkForwardAnalyzer(engine).analyze(hourly, 'BTC/USDT', options);

    expect(result.windows).toHaveLength(2);
    expect(engine.run).toHaveBeenCalledTimes(4);
    expect(result.windows[1]).toEqual({
      window: 2,
      trainStart: '1970-01-03T00:00:00.000Z',
      trainEnd: '1970-01-07T00:00:00.000Z',
      testStart: '1970-01-07T00:00:00.000Z',
      testEnd: '1970-01-09T00:00:00.000Z',
      trainTrades: 96,
      trainWinRate: 60,
      trainReturn: 3,
      trainSharpe: 1,
      testTrades: 48,
      testWinRate: 60,
      testReturn: 2,
      testSharpe: 1,
    });
  });

  it('reports decay and robustness', () => {
    const result = new WalkForwardAnalyzer(runner(2)).analyze(hourly, 'BTC/USDT', options);

    expect(result.statistics).toMatchObject({
      numWindows: 2,
      avgTrainReturn: 3,
      avgTestReturn: 2,
      returnDecay: -1,
      sharpeDecay: 0,
      positiveTestRatio: 100,
      minTestReturn: 2,
    });
    expect(result.isRobust).toBe(true);
  });

  it('is not robust when test windows lose', () => {
    const result = new WalkForwardAnalyzer(runner(-1)).analyze(hourly, 'BTC/USDT', options);
    expect(result.statistics?.positiveTestRatio).toBe(0);
    expect(result.isRobust).toBe(false);
  });

  it('yields no windows for empty or short data', () => {
    const analyzer = new WalkForwardAnalyzer(runner(2));
    expect(analyzer.analyze([], 'BTC/USDT')).toEqual({ windows: [], statistics: null, isRobust: false });
    expect(analyzer.analyze(hourly, 'BTC/USDT').windows).toEqual([]);
  });
});

describe('isRobust', () => {
  const base = {
    numWindows: 3,
    avgTrainReturn: 4,
    avgTestReturn: 2,
    avgTrainSharpe: 1.2,
    avgTestSharpe: 0.8,
    returnDecay: -2,
    sharpeDecay: -0.4,
    positiveTrainRatio: 100,
    positiveTestRatio: 66.7,
    maxTrainReturn: 6,
    maxTestReturn: 4,
    minTrainReturn: 2,
    minTestReturn: -1,
  };

  it('requires every criterion', () => {
    expect(isRobust(base)).toBe(true);
    expect(isRobust({ ...base, avgTestSharpe: 0.5 })).toBe(false);
    expect(isRobust({ ...base, returnDecay: -5 })).toBe(false);
    expect(isRobust({ ...base, positiveTestRatio: 60 })).toBe(false);
    expect(isRobust(null)).toBe(false);
  });
});
