/**
 * @fileoverview Train / test overfitting checks
 * @module features/backtest/overfitting
 *
 * Compares an in-sample and an out-of-sample backtest three ways: return and
 * win-rate decay, Sharpe degradation, and a two-sample Kolmogorov–Smirnov
 * test on the trade returns. Each failing check adds its weighted severity
 * to the overall confidence; above 50 counts as overfitting.
 */

import { mean } from '../../shared/utils/math.js';
import type { BacktestResult } from './engine.js';

// =============================================================================
// TYPES
// =============================================================================

export type OverfittingMethod = 'decay' | 'sharpe' | 'correlation';

export interface CheckResult {
  overfitting: boolean;
  severity: number;
  message?: string;
  values: Record<string, number>;
}

export interface OverfittingAssessment {
  isOverfitting: boolean;
  /** 0..100 */
  confidence: number;
  methods: Partial<Record<OverfittingMethod, CheckResult>>;
}

type Sample = Pick<BacktestResult, 'totalPnlPercent' | 'winRate' | 'sharpeRatio' | 'trades'>;

const WEIGHTS: Record<OverfittingMethod, number> = { decay: 0.4, sharpe: 0.3, correlation: 0.3 };
const MIN_TRADES_FOR_KS = 5;

// =============================================================================
// CHECKS
// =============================================================================

export function checkPerformanceDecay(train: Sample, test: Sample): CheckResult {
  const returnDecay =
    train.totalPnlPercent !== 0 ? ((train.totalPnlPercent - test.totalPnlPercent) / Math.abs(train.totalPnlPercent)) * 100 : 0;
  const winRateDecay = train.winRate - test.winRate;

  let severity = 0;
  let overfitting = false;
  if (returnDecay > 50 || winRateDecay > 20) {
    severity = 80;
    overfitting = true;
  } else if (returnDecay > 30 || winRateDecay > 10) {
    severity = 50;
    overfitting = true;
  } else if (returnDecay > 10 || winRateDecay > 5) {
    severity = 20;
  }

  return {
    overfitting,
    severity,
    values: {
      returnDecay,
      winRateDecay,
      trainReturn: train.totalPnlPercent,
      testReturn: test.totalPnlPercent,
      trainWinRate: train.winRate,
      testWinRate: test.winRate,
    },
  };
}

export function checkSharpeDegradation(train: Sample, test: Sample): CheckResult {
  if (train.sharpeRatio <= 0) {
    return { overfitting: false, severity: 0, message: 'Train Sharpe not positive', values: {} };
  }

  const ratio = test.sharpeRatio / train.sharpeRatio;
  let severity = 0;
  if (ratio < 0.3) severity = 90;
  else if (ratio < 0.5) severity = 60;
  else if (ratio < 0.7) severity = 30;

  return {
    overfitting: ratio < 0.5,
    severity,
    values: { sharpeRatio: ratio, trainSharpe: train.sharpeRatio, testSharpe: test.sharpeRatio },
  };
}

export function checkReturnDistribution(train: Sample, test: Sample): CheckResult {
  if (train.trades.length < MIN_TRADES_FOR_KS || test.trades.length < MIN_TRADES_FOR_KS) {
    return { overfitting: false, severity: 0, message: 'Insufficient trades', values: {} };
  }

  const trainReturns = train.trades.map((t) => t.pnlPct);
  const testReturns = test.trades.map((t) => t.pnlPct);
  const { statistic, pValue } = ksTwoSample(trainReturns, testReturns);

  let severity = 0;
  if (pValue < 0.05) severity = 70;
  else if (pValue < 0.1) severity = 40;

  return {
    overfitting: pValue < 0.1,
    severity,
    values: { ksStatistic: statistic, pValue, trainMean: mean(trainReturns), testMean: mean(testReturns) },
  };
}

// =============================================================================
// KOLMOGOROV–SMIRNOV
// =============================================================================

/**
 * Largest gap between the two empirical CDFs, with the asymptotic p-value.
 */
export function ksTwoSample(a: readonly number[], b: readonly number[]): { statistic: number; pValue: number } {
  const x = [...a].sort((p, q) => p - q);
  const y = [...b].sort((p, q) => p - q);
  let i = 0;
  let j = 0;
  let statistic = 0;
  while (i < x.length && j < y.length) {
    const value = Math.min(x[i], y[j]);
    while (i < x.length && x[i] <= value) i++;
    while (j < y.length && y[j] <= value) j++;
    statistic = Math.max(statistic, Math.abs(i / x.length - j / y.length));
  }

  const en = Math.sqrt((x.length * y.length) / (x.length + y.length));
  return { statistic, pValue: kolmogorovQ((en + 0.12 + 0.11 / en) * statistic) };
}

/**
 * Survival function of the Kolmogorov distribution.
 */
export function kolmogorovQ(lambda: number): number {
  if (lambda <= 0) {
    return 1;
  }
  let total = 0;
  let sign = 1;
  for (let k = 1; k <= 100; k++) {
    const term = sign * 2 * Math.exp(-2 * k * k * lambda * lambda);
    total += term;
    if (Math.abs(term) <= 1e-12 || Math.abs(term) <= 1e-10 * Math.abs(total)) {
      return Math.min(1, Math.max(0, total));
    }
    sign = -sign;
  }
  // Series did not converge: lambda is tiny, so the samples are indistinguishable
  return 1;
}

// =============================================================================
// DETECTOR
// =============================================================================

export class OverfittingDetector {
  detect(train: Sample, test: Sample, methods: readonly OverfittingMethod[] = ['decay', 'sharpe', 'correlation']): OverfittingAssessment {
    const results: Partial<Record<OverfittingMethod, CheckResult>> = {};
    let confidence = 0;

    for (const method of methods) {
      const result =
        method === 'decay'
          ? checkPerformanceDecay(train, test)
          : method === 'sharpe'
            ? checkSharpeDegradation(train, test)
            : checkReturnDistribution(train, test);
      results[method] = result;
      if (result.overfitting) {
        confidence += result.severity * WEIGHTS[method];
      }
    }

    return { isOverfitting: confidence > 50, confidence: Math.min(100, confidence), methods: results };
  }
}
