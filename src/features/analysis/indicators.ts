/**
 * @fileoverview Technical indicators over candle arrays
 * @module features/analysis/indicators
 *
 * Every function takes oldest-first data and returns the value for the most
 * recent bar. Short inputs return a neutral value instead of throwing.
 */

import type { Candle } from '../../shared/types/index.js';
import { mean, sum } from '../../shared/utils/math.js';

// =============================================================================
// COLUMN HELPERS
// =============================================================================

export const closes = (candles: readonly Candle[]): number[] => candles.map((c) => c[4]);
export const highs = (candles: readonly Candle[]): number[] => candles.map((c) => c[2]);
export const lows = (candles: readonly Candle[]): number[] => candles.map((c) => c[3]);
export const volumes = (candles: readonly Candle[]): number[] => candles.map((c) => c[5]);

function trueRanges(candles: readonly Candle[]): number[] {
  const ranges: number[] = [];
  for (let i = 1; i < candles.length; i++) {
    const [, , high, low] = candles[i];
    const prevClose = candles[i - 1][4];
    ranges.push(Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose)));
  }
  return ranges;
}

// =============================================================================
// MOVING AVERAGES
// =============================================================================

/**
 * Mean of the last `period` values (or of all of them when shorter).
 */
export function sma(values: readonly number[], period: number): number {
  if (values.length < period) {
    return mean(values);
  }
  return sum(values.slice(-period)) / period;
}

/**
 * EMA seeded with the SMA of the first `period` values.
 */
export function ema(values: readonly number[], period: number): number {
  if (values.length < period) {
    return mean(values);
  }
  const k = 2 / (period + 1);
  let value = sum(values.slice(0, period)) / period;
  for (let i = period; i < values.length; i++) {
    value = values[i] * k + value * (1 - k);
  }
  return value;
}

/**
 * EMA for every bar from index `period - 1` on. Empty when too short.
 */
export function emaSeries(values: readonly number[], period: number): number[] {
  if (values.length < period) {
    return [];
  }
  const k = 2 / (period + 1);
  let value = sum(values.slice(0, period)) / period;
  const series = [value];
  for (let i = period; i < values.length; i++) {
    value = values[i] * k + value * (1 - k);
    series.push(value);
  }
  return series;
}

// =============================================================================
// OSCILLATORS
// =============================================================================

/**
 * Wilder RSI. 50 until there are `period + 1` closes.
 */
export function rsi(values: readonly number[], period = 14): number {
  if (values.length < period + 1) {
    return 50;
  }

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i++) {
    const delta = values[i] - values[i - 1];
    avgGain += Math.max(delta, 0);
    avgLoss += Math.max(-delta, 0);
  }
  avgGain /= period;
  avgLoss /= period;

  for (let i = period + 1; i < values.length; i++) {
    const delta = values[i] - values[i - 1];
    avgGain = (avgGain * (period - 1) + Math.max(delta, 0)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(-delta, 0)) / period;
  }

  if (avgLoss === 0) {
    return 100;
  }
  return 100 - 100 / (1 + avgGain / avgLoss);
}

/**
 * RSI at every bar, computed on growing prefixes. The first `period` entries
 * are 50.
 */
export function rsiSeries(values: readonly number[], period = 14): number[] {
  return values.map((_, i) => rsi(values.slice(0, i + 1), period));
}

export interface MacdResult {
  macd: number;
  signal: number;
  histogram: number;
}

/**
 * MACD line, its EMA signal line and the histogram.
 */
export function macd(values: readonly number[], fast = 12, slow = 26, signal = 9): MacdResult {
  const line = macdLine(values, fast, slow);
  if (values.length < slow + signal || line.length < signal) {
    return { macd: 0, signal: 0, histogram: 0 };
  }
  const last = line[line.length - 1];
  const signalValue = ema(line, signal);
  return { macd: last, signal: signalValue, histogram: last - signalValue };
}

/**
 * MACD line for every bar from index `slow - 1` on.
 */
export function macdLine(values: readonly number[], fast = 12, slow = 26): number[] {
  const fastSeries = emaSeries(values, fast);
  const slowSeries = emaSeries(values, slow);
  // fastSeries starts at index fast-1, slowSeries at slow-1
  const offset = slow - fast;
  return slowSeries.map((slowValue, i) => fastSeries[i + offset] - slowValue);
}

// =============================================================================
// VOLATILITY & TREND STRENGTH
// =============================================================================

/**
 * Wilder ATR. 0 until there are `period + 1` candles.
 */
export function atr(candles: readonly Candle[], period = 14): number {
  if (candles.length < period + 1) {
    return 0;
  }
  const ranges = trueRanges(candles);
  let value = sum(ranges.slice(0, period)) / period;
  for (let i = period; i < ranges.length; i++) {
    value = (value * (period - 1) + ranges[i]) / period;
  }
  return value;
}

/**
 * ATR as a percent of the last close.
 */
export function atrPercent(candles: readonly Candle[], period = 14): number {
  const last = candles[candles.length - 1];
  if (!last || last[4] <= 0) {
    return 0;
  }
  return (atr(candles, period) / last[4]) * 100;
}

/**
 * Directional index over the last `period` bars. 20 until there are
 * `period + 1` candles.
 */
export function adx(candles: readonly Candle[], period = 14): number {
  if (candles.length < period + 1) {
    return 20;
  }

  const plusDm: number[] = [];
  const minusDm: number[] = [];
  for (let i = 1; i < candles.length; i++) {
    const upMove = candles[i][2] - candles[i - 1][2];
    const downMove = candles[i - 1][3] - candles[i][3];
    plusDm.push(upMove > downMove && upMove > 0 ? upMove : 0);
    minusDm.push(downMove > upMove && downMove > 0 ? downMove : 0);
  }

  const avgTr = sum(trueRanges(candles).slice(-period)) / period;
  if (avgTr <= 0) {
    return 0;
  }
  const plusDi = (sum(plusDm.slice(-period)) / avgTr) * 100;
  const minusDi = (sum(minusDm.slice(-period)) / avgTr) * 100;
  const total = plusDi + minusDi;
  return total > 0 ? (Math.abs(plusDi - minusDi) / total) * 100 : 0;
}

export interface BollingerBands {
  upper: number;
  middle: number;
  lower: number;
  /** (upper - lower) / middle */
  width: number;
  /** Position of the last close inside the bands, 0 = lower, 1 = upper */
  percentB: number;
}

export function bollinger(values: readonly number[], period = 20, stdDev = 2): BollingerBands {
  if (values.length < period) {
    const current = values[values.length - 1] ?? 0;
    return { upper: current, middle: current, lower: current, width: 0, percentB: 0.5 };
  }

  const middle = sma(values, period);
  const recent = values.slice(-period);
  const variance = sum(recent.map((x) => (x - middle) ** 2)) / period;
  const std = Math.sqrt(variance);
  const upper = middle + std * stdDev;
  const lower = middle - std * stdDev;
  const current = values[values.length - 1];

  return {
    upper,
    middle,
    lower,
    width: middle > 0 ? (upper - lower) / middle : 0,
    percentB: upper === lower ? 0.5 : (current - lower) / (upper - lower),
  };
}

// =============================================================================
// PRICE LEVELS
// =============================================================================

/**
 * Typical-price VWAP over the whole input.
 */
export function vwap(candles: readonly Candle[]): number {
  const last = candles[candles.length - 1];
  if (!last) {
    return 0;
  }
  let totalVolume = 0;
  let totalPv = 0;
  for (const [, , high, low, close, volume] of candles) {
    totalPv += ((high + low + close) / 3) * volume;
    totalVolume += volume;
  }
  return totalVolume > 0 ? totalPv / totalVolume : last[4];
}

export interface FibonacciLevels {
  level0: number;
  level236: number;
  level382: number;
  level500: number;
  level618: number;
  level786: number;
  level1: number;
}

/**
 * Retracement levels measured down from `high`.
 */
export function fibonacciLevels(high: number, low: number): FibonacciLevels {
  const diff = high - low;
  return {
    level0: high,
    level236: high - diff * 0.236,
    level382: high - diff * 0.382,
    level500: high - diff * 0.5,
    level618: high - diff * 0.618,
    level786: high - diff * 0.786,
    level1: low,
  };
}

export interface PivotPoints {
  pivot: number;
  r1: number;
  r2: number;
  r3: number;
  s1: number;
  s2: number;
  s3: number;
}

/** Classic floor pivots. */
export function pivotPoints(high: number, low: number, close: number): PivotPoints {
  const pivot = (high + low + close) / 3;
  return {
    pivot,
    r1: 2 * pivot - low,
    r2: pivot + (high - low),
    r3: high + 2 * (pivot - low),
    s1: 2 * pivot - high,
    s2: pivot - (high - low),
    s3: low - 2 * (high - pivot),
  };
}

// =============================================================================
// DIVERGENCE (SIMPLE)
// =============================================================================

export interface SimpleDivergence {
  bullish: boolean;
  bearish: boolean;
}

/**
 * Compares the extremes of the last `period` price and indicator values.
 *
 * Bullish: price sets its low on the last bar below the window's first value
 * while the indicator's low came earlier and its last value is above it.
 * Bearish mirrors this on highs.
 */
export function detectSimpleDivergence(prices: readonly number[], indicator: readonly number[], period = 5): SimpleDivergence {
  if (prices.length < period + 1 || indicator.length < period + 1) {
    return { bullish: false, bearish: false };
  }

  const p = prices.slice(-period);
  const ind = indicator.slice(-period);
  const lastIdx = period - 1;

  const priceLow = Math.min(...p);
  const priceHigh = Math.max(...p);
  const indLow = Math.min(...ind);
  const indHigh = Math.max(...ind);

  return {
    bullish: p.indexOf(priceLow) === lastIdx && ind.indexOf(indLow) < lastIdx && priceLow < p[0] && ind[lastIdx] > indLow,
    bearish: p.indexOf(priceHigh) === lastIdx && ind.indexOf(indHigh) < lastIdx && priceHigh > p[0] && ind[lastIdx] < indHigh,
  };
}
