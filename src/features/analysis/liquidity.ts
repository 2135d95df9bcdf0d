/**
 * @fileoverview Liquidity patterns from candles and the order book
 * @module features/analysis/liquidity
 *
 * Candle side: stop sweeps through swing levels, wick grabs and order
 * blocks. Book side: spread, depth, imbalance, whale-sized levels and
 * repeated-size (iceberg) hints.
 */

import type { BookLevel, Candle, OrderBook, TradeDirection } from '../../shared/types/index.js';
import { mean, sum } from '../../shared/utils/math.js';
import { findSwings } from './structure.js';

// =============================================================================
// TYPES
// =============================================================================

export interface OrderBlock {
  price: number;
  high: number;
  low: number;
  type: 'BULLISH' | 'BEARISH';
  /** Move size relative to the average move before it */
  strength: number;
}

export interface LiquidityResult {
  sweep: TradeDirection | null;
  grab: TradeDirection | null;
  orderBlock: OrderBlock | null;
  /** Swing highs and lows, ascending */
  levels: number[];
  reason: string;
}

// =============================================================================
// CANDLE PATTERNS
// =============================================================================

/**
 * Distinct swing highs and lows, ascending.
 */
export function liquidityLevels(candles: readonly Candle[]): number[] {
  const { highs, lows } = findSwings(candles);
  const levels = new Set([...highs, ...lows].map((s) => s.price));
  return [...levels].sort((a, b) => a - b);
}

/**
 * The last candle pierced a level and closed back on the side price came
 * from two bars earlier. A sweep above resistance points SHORT; below
 * support, LONG.
 */
export function detectSweep(candles: readonly Candle[], levels: readonly number[]): TradeDirection | null {
  if (candles.length < 3 || levels.length === 0) {
    return null;
  }
  const [, , high, low, close] = candles[candles.length - 1];
  const earlierClose = candles[candles.length - 3][4];

  for (const level of levels) {
    if (level > close && high > level && earlierClose < level) {
      return 'SHORT';
    }
  }
  for (const level of levels) {
    if (level < close && low < level && earlierClose > level) {
      return 'LONG';
    }
  }
  return null;
}

/**
 * A wick longer than half the average range of the previous `lookback`
 * candles, closing against the wick.
 */
export function detectGrab(candles: readonly Candle[], lookback = 5): TradeDirection | null {
  if (candles.length < lookback + 1) {
    return null;
  }
  const [, open, high, low, close] = candles[candles.length - 1];
  const previous = candles.slice(-(lookback + 1), -1);
  const avgSize = mean(previous.map((c) => c[2] - c[3]));

  const upperWick = high - Math.max(open, close);
  if (upperWick > avgSize * 0.5 && close < open) {
    return 'SHORT';
  }
  const lowerWick = Math.min(open, close) - low;
  if (lowerWick > avgSize * 0.5 && close > open) {
    return 'LONG';
  }
  return null;
}

function averageMove(candles: readonly Candle[], beforeIndex: number, period = 10): number {
  const moves: number[] = [];
  for (let i = Math.max(1, beforeIndex - period); i < beforeIndex; i++) {
    moves.push(Math.abs(candles[i][4] - candles[i - 1][4]));
  }
  return mean(moves);
}

/**
 * The most recent candle (within `lookback`) followed by a close-to-close
 * move larger than 1.5× the average move before it.
 */
export function findOrderBlock(candles: readonly Candle[], lookback = 10): OrderBlock | null {
  if (candles.length < lookback + 2) {
    return null;
  }
  for (let i = candles.length - 2; i >= candles.length - lookback; i--) {
    const current = candles[i];
    const next = candles[i + 1];
    const move = Math.abs(next[4] - current[4]);
    const avg = averageMove(candles, i);
    if (move > avg * 1.5) {
      return {
        price: current[4],
        high: current[2],
        low: current[3],
        type: next[4] > current[4] ? 'BULLISH' : 'BEARISH',
        strength: avg > 0 ? move / avg : 1,
      };
    }
  }
  return null;
}

export function detectLiquidity(candles: readonly Candle[], lookback = 20): LiquidityResult {
  if (candles.length < lookback) {
    return { sweep: null, grab: null, orderBlock: null, levels: [], reason: 'Insufficient data' };
  }
  const recent = candles.slice(-lookback);
  const levels = liquidityLevels(recent);
  const sweep = detectSweep(recent, levels);
  const grab = detectGrab(recent);
  const orderBlock = findOrderBlock(recent);

  const reasons: string[] = [];
  if (sweep) reasons.push(`${sweep} sweep`);
  if (grab) reasons.push(`${grab} grab`);
  if (orderBlock) reasons.push('Order block');

  return {
    sweep,
    grab,
    orderBlock,
    levels,
    reason: reasons.length > 0 ? reasons.join(', ') : 'No liquidity patterns',
  };
}

/**
 * Price printed the lowest low (LONG) or highest high (SHORT) of the last
 * ten candles and closed against it.
 */
export function isSweepSetup(candles: readonly Candle[], direction: TradeDirection): boolean {
  if (candles.length < 10) {
    return false;
  }
  const recent = candles.slice(-10);
  const [, open, high, low, close] = recent[recent.length - 1];
  if (direction === 'LONG') {
    return low === Math.min(...recent.map((c) => c[3])) && close > open;
  }
  return high === Math.max(...recent.map((c) => c[2])) && close < open;
}

// =============================================================================
// ORDER BOOK
// =============================================================================

/** Best ask over best bid, in percent. 0 without both sides. */
export function spreadPct(book: OrderBook): number {
  const bid = book.bids[0]?.[0];
  const ask = book.asks[0]?.[0];
  if (bid === undefined || ask === undefined || bid <= 0) {
    return 0;
  }
  return ((ask - bid) / bid) * 100;
}

/** Summed quantity of the top `levels` on each side. */
export function bookDepth(book: OrderBook, levels = 5): { bid: number; ask: number } {
  return {
    bid: sum(book.bids.slice(0, levels).map((l) => l[1])),
    ask: sum(book.asks.slice(0, levels).map((l) => l[1])),
  };
}

/**
 * (bid depth - ask depth) / total, in -1..1. Positive means more resting
 * buy interest.
 */
export function bookImbalance(book: OrderBook, levels = 10): number {
  const depth = bookDepth(book, levels);
  const total = depth.bid + depth.ask;
  return total > 0 ? (depth.bid - depth.ask) / total : 0;
}

/** Levels whose quantity exceeds `threshold`. */
export function whaleLevels(book: OrderBook, threshold = 50000): { bids: BookLevel[]; asks: BookLevel[] } {
  return {
    bids: book.bids.filter((l) => l[1] > threshold),
    asks: book.asks.filter((l) => l[1] > threshold),
  };
}

/**
 * Among the top ten levels, any level from the fourth on within 10% of the
 * first level's size.
 */
export function hasIcebergPattern(levels: readonly BookLevel[]): boolean {
  if (levels.length < 5) {
    return false;
  }
  const sizes = levels.slice(0, 10).map((l) => l[1]);
  const first = sizes[0];
  if (first <= 0) {
    return false;
  }
  for (let i = 3; i < sizes.length; i++) {
    if (Math.abs(sizes[i] - first) / first < 0.1) {
      return true;
    }
  }
  return false;
}
