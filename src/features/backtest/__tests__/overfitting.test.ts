/**
 * @fileoverview Unit tests for train / test overfitting checks
 */

import { describe, it, expect } from 'vitest';
import { emptyResult, type BacktestResult, type BacktestTrade } from '../engine.js';
import {
  checkPerformanceDecay,
  checkReturnDistribution,
  checkSharpeDegradation,
  kolmogorovQ,
  ksTwoSample,
  OverfittingDetector,
} from '../overfitting.js';

const trade = (pnlPct: number): BacktestTrade => ({
  entryTime: 0,
  exitTime: 0,
  direction: 'LONG',
  entry: 100,
  exit: 100 + pnlPct,
  pnlPct,
  pnlUsd: pnlPct * 10,
  barsHeld: 1,
});

function sample(overrides: Partial<BacktestResult>): BacktestResult {
  return { ...emptyResult(100_000), ...overrides };
}

describe('checkPerformanceDecay', () => {
  it('flags a large drop in return', () => {
    const result = checkPerformanceDecay(sample({ totalPnlPercent: 10, winRate: 60 }), sample({ totalPnlPercent: 4, winRate: 55 }));
    expect(result).toMatchObject({ overfitting: true, severity: 80 });
    expect(result.values.returnDecay).toBeCloseTo(60);
    expect(result.values.winRateDecay).toBe(5);
  });

  it('notes mild decay without flagging it', () => {
    const result = checkPerformanceDecay(sample({ totalPnlPercent: 10, winRate: 60 }), sample({ totalPnlPercent: 8, winRate: 60 }));
    expect(result).toMatchObject({ overfitting: false, severity: 20 });
  });

  it('ignores return decay when the training return is zero', () => {
    const result = checkPerformanceDecay(sample({ winRate: 50 }), sample({ totalPnlPercent: -3, winRate: 50 }));
    expect(result).toMatchObject({ overfitting: false, severity: 0 });
  });
});

describe('checkSharpeDegradation', () => {
  it('grades the test-to-train Sharpe ratio', () => {
    expect(checkSharpeDegradation(sample({ sharpeRatio: 2 }), sample({ sharpeRatio: 0.5 }))).toMatchObject({
      overfitting: true,
      severity: 90,
    });
    expect(checkSharpeDegradation(sample({ sharpeRatio: 2 }), sample({ sharpeRatio: 0.8 }))).toMatchObject({
      overfitting: true,
      severity: 60,
    });
    expect(checkSharpeDegradation(sample({ sharpeRatio: 2 }), sample({ sharpeRatio: 1.2 }))).toMatchObject({
      overfitting: false,
      severity: 30,
    });
  });

  it('skips a non-positive training Sharpe', () => {
    expect(checkSharpeDegradation(sample({ sharpeRatio: 0 }), sample({ sharpeRatio: 1 }))).toEqual({
      overfitting: false,
      severity: 0,
      message: 'Train Sharpe not positive',
      values: {},
    });
  });
});

describe('ksTwoSample', () => {
  it('finds no gap between identical samples', () => {
    expect(ksTwoSample([1, 2, 3, 4, 5], [5, 4, 3, 2, 1])).toEqual({ statistic: 0, pValue: 1 });
  });

  it('separates disjoint samples', () => {
    const { statistic, pValue } = ksTwoSample([1, 2, 3, 4, 5], [10, 11, 12, 13, 14]);
    expect(statistic).toBe(1);
    expect(pValue).toBeCloseTo(0.00378, 4);
  });

  it('keeps the survival function in range', () => {
    expect(kolmogorovQ(0)).toBe(1);
    expect(kolmogorovQ(3)).toBeCloseTo(0, 6);
  });
});

describe('checkReturnDistribution', () => {
  it('needs five trades on each side', () => {
    const result = checkReturnDistribution(sample({ trades: [trade(1)] }), sample({ trades: [trade(1)] }));
    expect(result.message).toBe('Insufficient trades');
  });

  it('flags different return distributions', () => {
    const result = checkReturnDistribution(
      sample({ trades: [1, 2, 3, 4, 5].map(trade) }),
      sample({ trades: [10, 11, 12, 13, 14].map(trade) })
    );
    expect(result).toMatchObject({ overfitting: true, severity: 70 });
    expect(result.values.trainMean).toBe(3);
    expect(result.values.testMean).toBe(12);
  });
});

describe('OverfittingDetector', () => {
  it('weights failing checks into the confidence', () => {
    const assessment = new OverfittingDetector().detect(
      sample({ totalPnlPercent: 10, winRate: 60, sharpeRatio: 2 }),
      sample({ totalPnlPercent: 4, winRate: 55, sharpeRatio: 0.5 })
    );

    expect(assessment.isOverfitting).toBe(true);
    expect(assessment.confidence).toBeCloseTo(59);
    expect(assessment.methods.correlation?.message).toBe('Insufficient trades');
  });

  it('runs only the requested methods', () => {
    const assessment = new OverfittingDetector().detect(sample({ sharpeRatio: 2 }), sample({ sharpeRatio: 0.5 }), ['sharpe']);

    expect(Object.keys(assessment.methods)).toEqual(['sharpe']);
    expect(assessment.confidence).toBeCloseTo(27);
    expect(assessment.isOverfitting).toBe(false);
  });
});
