/**
 * @fileoverview Market type and BTC regime detection
 * @module features/analysis/market-regime
 *
 * BTC drives the whole alt market, so both the market type (which picks the
 * filter profile) and the regime gate (which decides whether alts may be
 * traded at all) are read from BTC candles only.
 */

import type { BtcRegimeConfig } from '../../config/index.js';
import { BTC_REGIME_MIN_CANDLES } from '../../shared/constants/index.js';
import type {
  BtcRegime,
  BtcRegimeResult,
  Candle,
  MarketType,
  TradeDirection,
  TradeMode,
  TrendDirection,
  TrendStrength,
} from '../../shared/types/index.js';
import { UNKNOWN_REGIME } from '../../shared/types/index.js';
import { clamp } from '../../shared/utils/math.js';
import { logger } from '../../shared/utils/logger.js';
import { adx, atrPercent, closes, ema, rsi } from './indicators.js';
import { findSwings } from './structure.js';

const log = logger.child('regime');

// =============================================================================
// CONSTANTS
// =============================================================================

const HIGH_VOL_ATR_PCT = 3.0;
const TRENDING_ADX = 25;
const MARKET_HISTORY_LIMIT = 10;

/** Timeframe weights for the EMA stack score: 15m, 1h, 4h */
const EMA_TIMEFRAME_WEIGHTS = [0.6, 1.0, 1.4] as const;
const EMA_WINDOW = 30;

const SCORE_WEIGHTS = { ema: 0.4, structure: 0.35, momentum: 0.25 } as const;

// =============================================================================
// COMPONENT SCORES
// =============================================================================

/**
 * +8 / -8 per timeframe for a full bull / bear EMA stack, +3 / -3 when only
 * the fast pair agrees, weighted per timeframe and clamped to ±20.
 */
export function emaStackScore(series: ReadonlyArray<readonly Candle[]>): number {
  let score = 0;
  series.forEach((candles, i) => {
    const weight = EMA_TIMEFRAME_WEIGHTS[i] ?? 1;
    if (candles.length < EMA_WINDOW) {
      return;
    }
    const window = closes(candles.slice(-EMA_WINDOW));
    const fast = ema(window, 9);
    const slow = ema(window, 21);
    const trend = ema(window, 200);

    if (fast > slow && slow > trend) {
      score += 8 * weight;
    } else if (fast < slow && slow < trend) {
      score -= 8 * weight;
    } else if (fast > slow) {
      score += 3 * weight;
    } else if (fast < slow) {
      score -= 3 * weight;
    }
  });
  return clamp(score, -20, 20);
}

/**
 * Higher highs and higher lows on the last 20 4h candles score +15, lower
 * highs and lower lows -15, one of either ±8. Too few swings scores 3.
 */
export function structureScore(candles4h: readonly Candle[]): number {
  if (candles4h.length < 20) {
    return 0;
  }
  const { highs, lows } = findSwings(candles4h.slice(-20));
  if (highs.length < 2 || lows.length < 2) {
    return 3;
  }

  const [h1, h2] = highs.slice(-2).map((s) => s.price);
  const [l1, l2] = lows.slice(-2).map((s) => s.price);
  const hh = h2 > h1;
  const hl = l2 > l1;
  const lh = h2 < h1;
  const ll = l2 < l1;

  if (hh && hl) return 15;
  if (lh && ll) return -15;
  if (hh || hl) return 8;
  if (lh || ll) return -8;
  return 0;
}

/**
 * RSI beyond 60 / 40 scaled to ±8, boosted ×1.2 on rising volume and damped
 * ×0.8 on falling volume, clamped to ±10.
 */
export function momentumScore(candles15m: readonly Candle[]): number {
  if (candles15m.length < 14) {
    return 0;
  }
  const value = rsi(closes(candles15m));
  let score = 0;
  if (value > 60) {
    score = ((value - 60) / 40) * 8;
  } else if (value < 40) {
    score = -((40 - value) / 40) * 8;
  }

  const recent = candles15m.slice(-5).map((c) => c[5]);
  const prior = recent.slice(0, -1);
  const avgVolume = prior.length > 0 ? prior.reduce((a, b) => a + b, 0) / prior.length : recent[0];
  const ratio = avgVolume > 0 ? recent[recent.length - 1] / avgVolume : 1;

  if (ratio > 1.2) {
    score *= 1.2;
  } else if (ratio < 0.8) {
    score *= 0.8;
  }
  return clamp(score, -10, 10);
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

export function adxConfidence(adxValue: number): number {
  if (adxValue > 25) {
    return Math.min(100, Math.trunc(adxValue * 2.5));
  }
  if (adxValue > 20) {
    return Math.min(80, Math.trunc(adxValue * 2.2));
  }
  return Math.min(60, Math.trunc(adxValue * 2));
}

export function classifyRegime(total: number, adxValue: number): { regime: BtcRegime; confidence: number } {
  const base = adxConfidence(adxValue);
  if (total >= 15) return { regime: 'strong_bull', confidence: Math.min(100, base + 15) };
  if (total >= 5) return { regime: 'bull', confidence: base };
  if (total <= -15) return { regime: 'strong_bear', confidence: Math.min(100, base + 15) };
  if (total <= -5) return { regime: 'bear', confidence: base };
  return { regime: 'choppy', confidence: Math.min(70, base) };
}

export function regimeGate(
  regime: BtcRegime,
  confidence: number,
  adxValue: number,
  config: BtcRegimeConfig
): { canTrade: boolean; tradeMode: TradeMode; reason: string | null } {
  if (regime === 'unknown') {
    return { canTrade: false, tradeMode: 'BLOCK', reason: 'Unknown regime' };
  }
  if (confidence < config.hardBlockConfidence) {
    return { canTrade: false, tradeMode: 'BLOCK', reason: `Confidence ${confidence}% too low` };
  }
  if (regime === 'choppy') {
    if (confidence < config.choppyMinConfidence) {
      return { canTrade: false, tradeMode: 'BLOCK', reason: `Choppy + low confidence ${confidence}%` };
    }
    if (adxValue < config.choppyAdxMin) {
      return { canTrade: false, tradeMode: 'BLOCK', reason: `Choppy + weak ADX ${adxValue.toFixed(1)}` };
    }
    return { canTrade: true, tradeMode: 'RANGE', reason: null };
  }
  if (confidence < config.trendMinConfidence) {
    return { canTrade: false, tradeMode: 'BLOCK', reason: `Trend + low confidence ${confidence}%` };
  }
  if (adxValue < config.trendAdxMin) {
    return { canTrade: false, tradeMode: 'BLOCK', reason: `Trend + weak ADX ${adxValue.toFixed(1)}` };
  }
  return { canTrade: true, tradeMode: 'TREND', reason: null };
}

// =============================================================================
// DETECTOR
// =============================================================================

export class MarketRegimeDetector {
  private readonly history: MarketType[] = [];
  private lastMarket: MarketType = 'unknown';

  constructor(private readonly config: BtcRegimeConfig) {}

  /**
   * HIGH_VOL when the 1h ATR exceeds 3% of price, TRENDING when the 15m
   * ADX exceeds 25, otherwise CHOPPY.
   */
  detectMarketType(btc15m: readonly Candle[], btc1h: readonly Candle[]): MarketType {
    if (btc15m.length < BTC_REGIME_MIN_CANDLES) {
      return 'unknown';
    }

    const adxValue = adx(btc15m);
    const atrPct = btc1h.length < 14 ? 1.0 : atrPercent(btc1h);

    let market: MarketType;
    if (atrPct > HIGH_VOL_ATR_PCT) {
      market = 'high_vol';
      log.debug(`HIGH_VOL detected: ATR ${atrPct.toFixed(1)}%`);
    } else if (adxValue > TRENDING_ADX) {
      market = 'trending';
      log.debug(`TRENDING detected: ADX ${adxValue.toFixed(1)}`);
    } else {
      market = 'choppy';
      log.debug(`CHOPPY detected: ADX ${adxValue.toFixed(1)}`);
    }

    this.history.push(market);
    if (this.history.length > MARKET_HISTORY_LIMIT) {
      this.history.shift();
    }
    this.lastMarket = market;
    return market;
  }

  detectBtcRegime(btc15m: readonly Candle[], btc1h: readonly Candle[], btc4h: readonly Candle[]): BtcRegimeResult {
    if (btc15m.length < BTC_REGIME_MIN_CANDLES) {
      return UNKNOWN_REGIME;
    }

    const emaScore = emaStackScore([btc15m, btc1h, btc4h]);
    const structure = structureScore(btc4h);
    const momentum = momentumScore(btc15m);
    const adxValue = adx(btc15m);
    const total = emaScore * SCORE_WEIGHTS.ema + structure * SCORE_WEIGHTS.structure + momentum * SCORE_WEIGHTS.momentum;

    const { regime, confidence } = classifyRegime(total, adxValue);
    const gate = regimeGate(regime, confidence, adxValue, this.config);

    let direction: TrendDirection = 'SIDEWAYS';
    let strength: TrendStrength = 'WEAK';
    if (total > 3 || total < -3) {
      direction = total > 3 ? 'UP' : 'DOWN';
      strength = Math.abs(total) > 15 ? 'STRONG' : 'MODERATE';
    }

    return {
      regime,
      confidence,
      direction,
      strength,
      ...gate,
      scores: { ema: emaScore, structure, momentum, total },
      adx: adxValue,
    };
  }

  /**
   * Regime confidence for a trade direction: full when aligned with BTC,
   * halved against it and cut further against a strong or moderate trend.
   */
  confidenceForDirection(direction: TradeDirection, regime: BtcRegimeResult): number {
    if (!regime.canTrade) {
      return 0;
    }
    if ((direction === 'LONG' && regime.direction === 'UP') || (direction === 'SHORT' && regime.direction === 'DOWN')) {
      return regime.confidence;
    }
    let base = Math.floor(regime.confidence / 2);
    if (regime.strength === 'STRONG') {
      base = Math.floor(base / 2);
    } else if (regime.strength === 'MODERATE') {
      base = Math.trunc(base * 0.7);
    }
    return base;
  }

  get last(): MarketType {
    return this.lastMarket;
  }

  recentMarkets(): MarketType[] {
    return [...this.history];
  }
}
