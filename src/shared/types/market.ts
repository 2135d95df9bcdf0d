/**
 * @fileoverview Market data and regime type definitions
 * @module shared/types/market
 */

import { z } from 'zod';

// =============================================================================
// TIMEFRAMES
// =============================================================================

/**
 * Candle timeframes understood by the exchange client.
 */
export const TimeframeSchema = z.enum(['1m', '5m', '15m', '30m', '1h', '4h', '1d']);
export type Timeframe = z.infer<typeof TimeframeSchema>;

/** Duration of each timeframe in milliseconds. */
export const TIMEFRAME_MS: Record<Timeframe, number> = {
  '1m': 60_000,
  '5m': 300_000,
  '15m': 900_000,
  '30m': 1_800_000,
  '1h': 3_600_000,
  '4h': 14_400_000,
  '1d': 86_400_000,
};

/**
 * Parses a timeframe string, falling back to 15m.
 */
export function parseTimeframe(value: string): Timeframe {
  const parsed = TimeframeSchema.safeParse(value);
  return parsed.success ? parsed.data : '15m';
}

// =============================================================================
// CANDLES & ORDER BOOK
// =============================================================================

/**
 * OHLCV candle: `[openTimeMs, open, high, low, close, volume]`.
 */
export type Candle = [timestamp: number, open: number, high: number, low: number, close: number, volume: number];

export const CandleSchema = z.tuple([z.number(), z.number(), z.number(), z.number(), z.number(), z.number()]);

/** Column indexes into a `Candle`. */
export const C = {
  TIME: 0,
  OPEN: 1,
  HIGH: 2,
  LOW: 3,
  CLOSE: 4,
  VOLUME: 5,
} as const;

/** `[price, quantity]` */
export type BookLevel = [price: number, quantity: number];

export interface OrderBook {
  bids: BookLevel[];
  asks: BookLevel[];
  timestamp: number;
}

export interface Ticker {
  symbol: string;
  last: number;
  bid: number;
  ask: number;
  volume: number;
  /** 24h change in percent */
  changePct: number;
}

export const EMPTY_ORDERBOOK: OrderBook = { bids: [], asks: [], timestamp: 0 };

// =============================================================================
// MARKET TYPE
// =============================================================================

/**
 * Broad market condition derived from BTC volatility and trend strength.
 */
export const MarketTypeSchema = z.enum(['trending', 'choppy', 'high_vol', 'unknown']);
export type MarketType = z.infer<typeof MarketTypeSchema>;

export const MARKET_EMOJI: Record<MarketType, string> = {
  trending: '📈',
  choppy: '〰️',
  high_vol: '⚡',
  unknown: '❓',
};

// =============================================================================
// BTC REGIME
// =============================================================================

export const BtcRegimeSchema = z.enum(['strong_bull', 'bull', 'choppy', 'bear', 'strong_bear', 'unknown']);
export type BtcRegime = z.infer<typeof BtcRegimeSchema>;

export type TrendDirection = 'UP' | 'DOWN' | 'SIDEWAYS';
export type TrendStrength = 'STRONG' | 'MODERATE' | 'WEAK';
/** How the BTC regime lets alts be traded */
export type TradeMode = 'TREND' | 'RANGE' | 'BLOCK';

export const REGIME_EMOJI: Record<BtcRegime, string> = {
  strong_bull: '🚀',
  bull: '📈',
  choppy: '〰️',
  bear: '📉',
  strong_bear: '💥',
  unknown: '❓',
};

/**
 * Trend direction implied by a regime.
 */
export function regimeTrendDirection(regime: BtcRegime): TrendDirection {
  if (regime === 'strong_bull' || regime === 'bull') {
    return 'UP';
  }
  if (regime === 'strong_bear' || regime === 'bear') {
    return 'DOWN';
  }
  return 'SIDEWAYS';
}

/**
 * Full BTC regime assessment.
 */
export interface BtcRegimeResult {
  regime: BtcRegime;
  /** 0-100 */
  confidence: number;
  direction: TrendDirection;
  strength: TrendStrength;
  canTrade: boolean;
  tradeMode: TradeMode;
  /** Why trading is blocked; null when allowed */
  reason: string | null;
  scores: {
    ema: number;
    structure: number;
    momentum: number;
    total: number;
  };
  adx: number;
}

export const UNKNOWN_REGIME: BtcRegimeResult = {
  regime: 'unknown',
  confidence: 0,
  direction: 'SIDEWAYS',
  strength: 'WEAK',
  canTrade: false,
  tradeMode: 'BLOCK',
  reason: 'Insufficient data',
  scores: { ema: 0, structure: 0, momentum: 0, total: 0 },
  adx: 0,
};

// =============================================================================
// SESSIONS
// =============================================================================

export const SessionSchema = z.enum(['asia', 'london', 'ny', 'overlap', 'dead']);
export type Session = z.infer<typeof SessionSchema>;

export const SESSION_EMOJI: Record<Session, string> = {
  asia: '🌏',
  london: '🇬🇧',
  ny: '🗽',
  overlap: '🔄',
  dead: '💤',
};
