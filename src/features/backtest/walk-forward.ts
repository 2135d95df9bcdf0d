/**
 * @fileoverview Walk-forward validation
 * @module features/backtest/walk-forward
 */

import type { Candle } from '../../shared/types/index.js';
import { logger } from '../../shared/utils/logger.js';
import { mean } from '../../shared/utils/math.js';
import type { BacktestResult } from './engine.js';

const log = logger.child('walk-forward');

// =============================================================================
// TYPES
// =============================================================================

export interface WalkForwardOptions {
  trainDays?: number;
  testDays?: number;
  stepDays?: number;
}

export interface WalkForwardWindow {
  window: number;
  /** ISO-8601 */
  trainStart: string;
  trainEnd: string;
  testStart: string;
  testEnd: string;
  trainTrades: number;
  trainWinRate: number;
  trainReturn: number;
  trainSharpe: number;
  testTrades: number;
  testWinRate: number;
  testReturn: number;
  testSharpe: number;
}

export interface WalkForwardStats {
  numWindows: number;
  avgTrainReturn: number;
  avgTestReturn: number;
  avgTrainSharpe: number;
  avgTestSharpe: number;
  /** Average test return minus average train return */
  returnDecay: number;
  sharpeDecay: number;
  positiveTrainRatio: number;
  positiveTestRatio: number;
  maxTrainReturn: number;
  maxTestReturn: number;
  minTrainReturn: number;
  minTestReturn: number;
}

export interface WalkForwardResult {
  windows: WalkForwardWindow[];
  statistics: WalkForwardStats | null;
  isRobust: boolean;
}

export interface BacktestRunner {
  run(candles: readonly Candle[], symbol: string): BacktestResult;
}

const DAY_MS = 86_400_000;

// =============================================================================
// ANALYZER
// =============================================================================

export class WalkForwardAnalyzer {
  constructor(private readonly engine: BacktestRunner) {}

  /**
   * Slides a train window followed by a test window across the series. A
   * window is only used when its test period ends within the data.
   */
  analyze(candles: readonly Candle[], symbol: string, options: WalkForwardOptions = {}): WalkForwardResult {
    const trainMs = (options.trainDays ?? 60) * DAY_MS;
    const testMs = (options.testDays ?? 30) * DAY_MS;
    const stepMs = (options.stepDays ?? 30) * DAY_MS;
    log.info(`Starting walk-forward: train=${trainMs / DAY_MS}d test=${testMs / DAY_MS}d step=${stepMs / DAY_MS}d`);

    const windows: WalkForwardWindow[] = [];
    const first = candles[0];
    const last = candles[candles.length - 1];
    if (!first || !last) {
      return { windows, statistics: null, isRobust: false };
    }

    for (let start = first[0]; start + trainMs + testMs <= last[0]; start += stepMs) {
      const trainEnd = start + trainMs;
      const testEnd = trainEnd + testMs;
      const train = this.engine.run(between(candles, start, trainEnd), symbol);
      const test = this.engine.run(between(candles, trainEnd, testEnd), symbol);

      windows.push({
        window: windows.length + 1,
        trainStart: new Date(start).toISOString(),
        trainEnd: new Date(trainEnd).toISOString(),
        testStart: new Date(trainEnd).toISOString(),
        testEnd: new Date(testEnd).toISOString(),
        trainTrades: train.totalTrades,
        trainWinRate: train.winRate,
        trainReturn: train.totalPnlPercent,
        trainSharpe: train.sharpeRatio,
        testTrades: test.totalTrades,
        testWinRate: test.winRate,
        testReturn: test.totalPnlPercent,
        testSharpe: test.sharpeRatio,
      });
    }

    const statistics = walkForwardStats(windows);
    return { windows, statistics, isRobust: isRobust(statistics) };
  }
}

function between(candles: readonly Candle[], from: number, to: number): Candle[] {
  return candles.filter((c) => c[0] >= from && c[0] < to);
}

export function walkForwardStats(windows: readonly WalkForwardWindow[]): WalkForwardStats | null {
  if (windows.length === 0) {
    return null;
  }
  const trainReturns = windows.map((w) => w.trainReturn);
  const testReturns = windows.map((w) => w.testReturn);
  const avgTrainSharpe = mean(windows.map((w) => w.trainSharpe));
  const avgTestSharpe = mean(windows.map((w) => w.testSharpe));

  return {
    numWindows: windows.length,
    avgTrainReturn: mean(trainReturns),
    avgTestReturn: mean(testReturns),
    avgTrainSharpe,
    avgTestSharpe,
    returnDecay: mean(testReturns) - mean(trainReturns),
    sharpeDecay: avgTestSharpe - avgTrainSharpe,
    positiveTrainRatio: (trainReturns.filter((r) => r > 0).length / windows.length) * 100,
    positiveTestRatio: (testReturns.filter((r) => r > 0).length / windows.length) * 100,
    maxTrainReturn: Math.max(...trainReturns),
    maxTestReturn: Math.max(...testReturns),
    minTrainReturn: Math.min(...trainReturns),
    minTestReturn: Math.min(...testReturns),
  };
}

/**
 * Robust means profitable out of sample on average and in most windows, with
 * limited decay and a test Sharpe above 0.5.
 */
export function isRobust(stats: WalkForwardStats | null): boolean {
  if (!stats) {
    return false;
  }
  return stats.avgTestReturn > 0 && stats.positiveTestRatio > 60 && stats.returnDecay > -5 && stats.avgTestSharpe > 0.5;
}
