/**
 * @fileoverview Market structure: swing points, BOS, CHoCH and S/R levels
 * @module features/analysis/structure
 */

import type { Candle, TradeDirection, TrendStrength } from '../../shared/types/index.js';

// =============================================================================
// TYPES
// =============================================================================

export interface SwingPoint {
  index: number;
  price: number;
}

export interface Swings {
  highs: SwingPoint[];
  lows: SwingPoint[];
}

export interface StructureResult {
  direction: TradeDirection;
  strength: TrendStrength;
  bos: boolean;
  choch: boolean;
  /** Most recent swing high (or the last high when none) */
  swingHigh: number;
  /** Most recent swing low (or the last low when none) */
  swingLow: number;
  reason: string;
}

export interface SupportResistance {
  /** Highest first */
  resistance: number[];
  /** Lowest first */
  support: number[];
}

export interface NearestLevel {
  type: 'support' | 'resistance';
  level: number;
  distancePct: number;
}

/** Fewer candles than this yields the default result */
export const STRUCTURE_MIN_CANDLES = 20;

// =============================================================================
// SWINGS
// =============================================================================

/**
 * Fractal swing points: a bar whose high (low) is strictly above (below)
 * the `left` bars before and the `right` bars after it.
 */
export function findSwings(candles: readonly Candle[], left = 2, right = 2): Swings {
  const highs: SwingPoint[] = [];
  const lows: SwingPoint[] = [];

  for (let i = left; i < candles.length - right; i++) {
    const high = candles[i][2];
    const low = candles[i][3];
    let isHigh = true;
    let isLow = true;

    for (let j = i - left; j <= i + right; j++) {
      if (j === i) {
        continue;
      }
      if (high <= candles[j][2]) {
        isHigh = false;
      }
      if (low >= candles[j][3]) {
        isLow = false;
      }
    }

    if (isHigh) {
      highs.push({ index: i, price: high });
    }
    if (isLow) {
      lows.push({ index: i, price: low });
    }
  }

  return { highs, lows };
}

// =============================================================================
// STRUCTURE DETECTION
// =============================================================================

function detectBos(candles: readonly Candle[], swings: Swings): TradeDirection | null {
  if (swings.highs.length < 2 || swings.lows.length < 2 || candles.length < 2) {
    return null;
  }
  const current = candles[candles.length - 1][4];
  const previous = candles[candles.length - 2][4];
  const lastHigh = swings.highs[swings.highs.length - 1].price;
  const lastLow = swings.lows[swings.lows.length - 1].price;

  if (current > lastHigh && previous <= lastHigh) {
    return 'LONG';
  }
  if (current < lastLow && previous >= lastLow) {
    return 'SHORT';
  }
  return null;
}

/**
 * Three descending swing highs flag a bullish change of character; three
 * ascending swing lows a bearish one.
 */
function detectChoch(swings: Swings): TradeDirection | null {
  if (swings.highs.length < 3 || swings.lows.length < 3) {
    return null;
  }
  const [h1, h2, h3] = swings.highs.slice(-3).map((s) => s.price);
  const [l1, l2, l3] = swings.lows.slice(-3).map((s) => s.price);

  if (h1 > h2 && h2 > h3) {
    return 'LONG';
  }
  if (l1 < l2 && l2 < l3) {
    return 'SHORT';
  }
  return null;
}

export function detectStructure(candles: readonly Candle[]): StructureResult {
  const last = candles[candles.length - 1];
  const fallback: StructureResult = {
    direction: 'LONG',
    strength: 'WEAK',
    bos: false,
    choch: false,
    swingHigh: last ? last[2] : 0,
    swingLow: last ? last[3] : 0,
    reason: 'Insufficient data',
  };

  if (candles.length < STRUCTURE_MIN_CANDLES) {
    return fallback;
  }

  const swings = findSwings(candles);
  const lastSwingHigh = swings.highs[swings.highs.length - 1];
  const lastSwingLow = swings.lows[swings.lows.length - 1];
  if (!lastSwingHigh || !lastSwingLow) {
    return { ...fallback, reason: 'No swing points found' };
  }

  const bos = detectBos(candles, swings);
  const choch = detectChoch(swings);

  let direction: TradeDirection;
  let strength: TrendStrength;
  let reason: string;

  if (choch) {
    direction = choch;
    strength = 'STRONG';
    reason = `CHoCH to ${choch}`;
  } else if (bos) {
    direction = bos;
    strength = 'MODERATE';
    reason = `BOS to ${bos}`;
  } else {
    const recent = candles.slice(-5);
    const rising = recent[recent.length - 1][4] > recent[0][4];
    direction = rising ? 'LONG' : 'SHORT';
    strength = 'WEAK';
    reason = rising ? 'Gradual uptrend' : 'Gradual downtrend';
  }

  return {
    direction,
    strength,
    bos: bos !== null,
    choch: choch !== null,
    swingHigh: lastSwingHigh.price,
    swingLow: lastSwingLow.price,
    reason,
  };
}

// =============================================================================
// SUPPORT / RESISTANCE
// =============================================================================

export function supportResistance(candles: readonly Candle[], count = 3): SupportResistance {
  if (candles.length < STRUCTURE_MIN_CANDLES) {
    return { support: [], resistance: [] };
  }
  const swings = findSwings(candles);
  return {
    resistance: swings.highs.map((s) => s.price).sort((a, b) => b - a).slice(0, count),
    support: swings.lows.map((s) => s.price).sort((a, b) => a - b).slice(0, count),
  };
}

/**
 * Whether `price` is within `thresholdPct` percent of `level`.
 */
export function isNearLevel(price: number, level: number, thresholdPct = 0.5): boolean {
  if (level === 0) {
    return false;
  }
  return (Math.abs(price - level) / level) * 100 <= thresholdPct;
}

/**
 * Closest resistance above or support below `price`.
 */
export function nearestLevel(price: number, levels: SupportResistance): NearestLevel | null {
  let best: NearestLevel | null = null;
  let bestDistance = Infinity;

  for (const level of levels.resistance) {
    if (level > price && level - price < bestDistance) {
      bestDistance = level - price;
      best = { type: 'resistance', level, distancePct: 0 };
    }
  }
  for (const level of levels.support) {
    if (level < price && price - level < bestDistance) {
      bestDistance = price - level;
      best = { type: 'support', level, distancePct: 0 };
    }
  }

  return best ? { ...best, distancePct: (bestDistance / price) * 100 } : null;
}
