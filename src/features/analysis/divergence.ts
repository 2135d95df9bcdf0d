/**
 * @fileoverview Price / indicator divergence detection
 * @module features/analysis/divergence
 */

import type { Candle } from '../../shared/types/index.js';
import { mean } from '../../shared/utils/math.js';
import { closes, emaSeries, macdLine, rsiSeries, volumes } from './indicators.js';

// =============================================================================
// TYPES
// =============================================================================

export type DivergenceKind = 'BULLISH' | 'BEARISH' | 'BULLISH_HIDDEN' | 'BEARISH_HIDDEN';

export interface DivergenceResult {
  rsi: DivergenceKind | null;
  macd: DivergenceKind | null;
  volume: DivergenceKind | null;
  hidden: DivergenceKind | null;
  strength: 'STRONG' | 'MODERATE' | 'WEAK';
  reason: string;
}

const STRENGTH_WEIGHTS = { rsi: 1, macd: 1, volume: 0.5, hidden: 0.7 } as const;
const SCORE_POINTS = { rsi: 30, macd: 25, volume: 15, hidden: 20 } as const;

const NONE: DivergenceResult = {
  rsi: null,
  macd: null,
  volume: null,
  hidden: null,
  strength: 'WEAK',
  reason: 'Insufficient data',
};

// =============================================================================
// DETECTORS
// =============================================================================

function argMin(values: readonly number[]): number {
  return values.indexOf(Math.min(...values));
}

function argMax(values: readonly number[]): number {
  return values.indexOf(Math.max(...values));
}

/**
 * Regular divergence over the last `lookback` values. Bullish: price sets
 * its window low on the final bar, below the first value, while the
 * indicator bottomed earlier and has since risen off that low. Bearish
 * mirrors this on highs.
 */
export function regularDivergence(prices: readonly number[], indicator: readonly number[], lookback: number): DivergenceKind | null {
  if (prices.length < lookback || indicator.length < lookback) {
    return null;
  }
  const p = prices.slice(-lookback);
  const ind = indicator.slice(-lookback);
  const last = lookback - 1;

  const pLow = argMin(p);
  const iLow = argMin(ind);
  if (pLow === last && p[last] < p[0] && iLow < last && ind[last] > ind[iLow]) {
    return 'BULLISH';
  }

  const pHigh = argMax(p);
  const iHigh = argMax(ind);
  if (pHigh === last && p[last] > p[0] && iHigh < last && ind[last] < ind[iHigh]) {
    return 'BEARISH';
  }
  return null;
}

/**
 * Hidden (continuation) divergence. Bullish: price holds above its earlier
 * low while the indicator prints a fresh low on the final bar. Bearish:
 * price stays under its earlier high while the indicator prints a fresh
 * high.
 */
export function hiddenDivergence(prices: readonly number[], indicator: readonly number[], lookback: number): DivergenceKind | null {
  if (prices.length < lookback || indicator.length < lookback) {
    return null;
  }
  const p = prices.slice(-lookback);
  const ind = indicator.slice(-lookback);
  const last = lookback - 1;

  const pLow = argMin(p);
  if (pLow < last && p[last] > p[pLow] && argMin(ind) === last && ind[last] < ind[0]) {
    return 'BULLISH_HIDDEN';
  }
  const pHigh = argMax(p);
  if (pHigh < last && p[last] < p[pHigh] && argMax(ind) === last && ind[last] > ind[0]) {
    return 'BEARISH_HIDDEN';
  }
  return null;
}

/**
 * Falling price on a volume spike (×1.2) reads bullish; rising price on
 * fading volume (×0.8) bearish.
 */
export function volumeDivergence(prices: readonly number[], vols: readonly number[], lookback: number): DivergenceKind | null {
  if (prices.length < lookback || vols.length < lookback || lookback < 2) {
    return null;
  }
  const p = prices.slice(-lookback);
  const v = vols.slice(-lookback);
  const change = p[p.length - 1] - p[0];
  const average = mean(v.slice(0, -1));
  const current = v[v.length - 1];

  if (change < 0 && current > average * 1.2) {
    return 'BULLISH';
  }
  if (change > 0 && current < average * 0.8) {
    return 'BEARISH';
  }
  return null;
}

/**
 * MACD histogram for every bar where the signal line is defined.
 */
export function macdHistogramSeries(values: readonly number[], fast = 12, slow = 26, signal = 9): number[] {
  const line = macdLine(values, fast, slow);
  const signalLine = emaSeries(line, signal);
  const offset = signal - 1;
  return signalLine.map((s, i) => line[i + offset] - s);
}

// =============================================================================
// COMBINED
// =============================================================================

export function detectDivergences(candles: readonly Candle[], lookback = 20): DivergenceResult {
  if (candles.length < lookback + 5) {
    return NONE;
  }

  const prices = closes(candles);
  const rsiValues = rsiSeries(prices).slice(14);
  const macdValues = macdHistogramSeries(prices);

  const rsi = regularDivergence(prices, rsiValues, lookback);
  const macd = regularDivergence(prices, macdValues, lookback);
  const volume = volumeDivergence(prices, volumes(candles), lookback);
  const hidden = hiddenDivergence(prices, rsiValues, lookback);

  const total =
    (rsi ? STRENGTH_WEIGHTS.rsi : 0) +
    (macd ? STRENGTH_WEIGHTS.macd : 0) +
    (volume ? STRENGTH_WEIGHTS.volume : 0) +
    (hidden ? STRENGTH_WEIGHTS.hidden : 0);

  if (total >= 2) {
    return { rsi, macd, volume, hidden, strength: 'STRONG', reason: 'Multiple divergences detected' };
  }
  if (total >= 1) {
    return { rsi, macd, volume, hidden, strength: 'MODERATE', reason: 'Single divergence detected' };
  }
  return { rsi, macd, volume, hidden, strength: 'WEAK', reason: 'No divergence detected' };
}

/** 0-90 points from the divergences present. */
export function divergenceScore(result: DivergenceResult): number {
  return (
    (result.rsi ? SCORE_POINTS.rsi : 0) +
    (result.macd ? SCORE_POINTS.macd : 0) +
    (result.volume ? SCORE_POINTS.volume : 0) +
    (result.hidden ? SCORE_POINTS.hidden : 0)
  );
}
