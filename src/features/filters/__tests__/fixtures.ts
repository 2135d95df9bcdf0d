/**
 * @fileoverview Shared builders for filter tests
 */

import type { BtcRegimeResult, Candle } from '../../../shared/types/index.js';
import type { SymbolData } from '../types.js';

/** Candle closing at `v` with a one-point range either side */
export function vbar(i: number, v: number, volume = 10): Candle {
  return [i, v, v + 1, v - 1, v, volume];
}

export const series = (values: number[]): Candle[] => values.map((v, i) => vbar(i, v));

export const rising = (count: number, start = 100): Candle[] =>
  Array.from({ length: count }, (_, i) => vbar(i, start + i));

export const falling = (count: number, start = 100): Candle[] =>
  Array.from({ length: count }, (_, i) => vbar(i, start - i));

export function symbolData(overrides: Partial<SymbolData> = {}): SymbolData {
  return {
    symbol: 'ETH/USDT',
    ohlcv: {},
    btc: {},
    orderbook: null,
    fundingRate: 0,
    openInterest: 0,
    currentPrice: 100,
    ...overrides,
  };
}

export function regime(overrides: Partial<BtcRegimeResult> = {}): BtcRegimeResult {
  return {
    regime: 'bull',
    confidence: 60,
    direction: 'UP',
    strength: 'MODERATE',
    canTrade: true,
    tradeMode: 'TREND',
    reason: null,
    scores: { ema: 30, structure: 20, momentum: 10, total: 60 },
    adx: 30,
    ...overrides,
  };
}

/** Fixed clock reading the given UTC instant */
export const clockAt = (iso: string) => (): Date => new Date(iso);
