/**
 * @fileoverview Filter inputs and results
 * @module features/filters/types
 */

import type { Tier2FilterName } from '../../config/index.js';
import type { Candle, OrderBook, SignalGrade, Timeframe } from '../../shared/types/index.js';

// =============================================================================
// INPUT
// =============================================================================

/**
 * Everything the filters and the signal generator read for one symbol.
 */
export interface SymbolData {
  symbol: string;
  ohlcv: Partial<Record<Timeframe, Candle[]>>;
  /** BTC candles, used for the correlation bonus */
  btc: Partial<Record<Timeframe, Candle[]>>;
  orderbook: OrderBook | null;
  /** Raw rate, e.g. 0.0001 for 0.01% */
  fundingRate: number;
  openInterest: number;
  currentPrice: number;
}

export function candlesFor(data: SymbolData, timeframe: Timeframe): Candle[] {
  return data.ohlcv[timeframe] ?? [];
}

// =============================================================================
// RESULTS
// =============================================================================

export type Tier1FilterName = 'btc_regime' | 'structure' | 'volume' | 'liquidity' | 'session';

export type Tier3FilterName =
  | 'whale_movement'
  | 'liquidity_grab'
  | 'iceberg_detection'
  | 'news_sentiment'
  | 'correlation_break'
  | 'fibonacci_level';

export interface FilterCheck {
  passed: boolean;
  message: string;
}

export interface ScoredCheck extends FilterCheck {
  score: number;
  weight: number;
}

export interface BonusCheck {
  bonus: number;
  maxBonus: number;
  message: string;
}

export type Tier1Results = Record<Tier1FilterName, FilterCheck>;
export type Tier2Results = Record<Tier2FilterName, ScoredCheck>;
export type Tier3Results = Record<Tier3FilterName, BonusCheck>;

export interface FilterResult {
  passed: boolean;
  tier1: Tier1Results | null;
  tier2: Tier2Results | null;
  tier3: Tier3Results | null;
  /** Tier 2 percentage, plus the tier 3 bonus once reached */
  score: number;
  grade: SignalGrade;
  reason: string;
  /** ISO-8601 */
  timestamp: string;
}
