/**
 * @fileoverview Tier 2 filters: weighted quality scoring
 * @module features/filters/tier2
 *
 * Nine checks each award points up to their weight. Points are written
 * against the default weights and scaled when config overrides a weight.
 */

import {
  Tier2WeightsSchema,
  type AtrConfig,
  type Tier2FilterName,
  type Tier2Weights,
} from '../../config/index.js';
import type { MarketType, TradeDirection } from '../../shared/types/index.js';
import { sum } from '../../shared/utils/math.js';
import { logger } from '../../shared/utils/logger.js';
import { detectDivergences } from '../analysis/divergence.js';
import { atrPercent, closes, ema, vwap } from '../analysis/indicators.js';
import { nearestLevel, supportResistance } from '../analysis/structure.js';
import { valueAreaPosition, volumeProfile } from '../analysis/volume-profile.js';
import { candlesFor, type ScoredCheck, type SymbolData, type Tier2Results } from './types.js';

const log = logger.child('tier2');

const DEFAULT_WEIGHTS: Tier2Weights = Tier2WeightsSchema.parse({});

/** Percentage a market needs to pass */
export const TIER2_THRESHOLDS: Record<MarketType, number> = {
  trending: 60,
  choppy: 55,
  high_vol: 65,
  unknown: 60,
};

interface RawCheck {
  passed: boolean;
  points: number;
  message: string;
}

const raw = (passed: boolean, points: number, message: string): RawCheck => ({ passed, points, message });

export interface Tier2Outcome {
  passed: boolean;
  /** Percent of the summed weights */
  score: number;
  threshold: number;
  results: Tier2Results;
}

export class Tier2Filters {
  private readonly weights: Tier2Weights;

  constructor(
    weights: Partial<Tier2Weights>,
    private readonly atr: Pick<AtrConfig, 'minPct' | 'maxPct'>
  ) {
    this.weights = { ...DEFAULT_WEIGHTS, ...weights };
  }

  evaluateAll(direction: TradeDirection | null, marketType: MarketType, data: SymbolData): Tier2Outcome {
    const results: Tier2Results = {
      mtf_confirmation: this.scored('mtf_confirmation', this.checkMtf(data, direction)),
      volume_profile: this.scored('volume_profile', this.checkVolumeProfile(data)),
      funding_rate: this.scored('funding_rate', this.checkFunding(data, direction)),
      open_interest: this.scored('open_interest', this.checkOpenInterest(data)),
      rsi_divergence: this.scored('rsi_divergence', this.checkRsiDivergence(data, direction)),
      ema_stack: this.scored('ema_stack', this.checkEmaStack(data, direction)),
      atr_percent: this.scored('atr_percent', this.checkAtrPercent(data)),
      vwap_position: this.scored('vwap_position', this.checkVwap(data, direction)),
      support_resistance: this.scored('support_resistance', this.checkSupportResistance(data, direction)),
    };

    const total = sum(Object.values(results).map((r) => r.score));
    const maxScore = sum(Object.values(this.weights));
    const score = maxScore > 0 ? (total / maxScore) * 100 : 0;
    const threshold = TIER2_THRESHOLDS[marketType];
    const passed = score >= threshold;

    log.debug(`Tier2 score: ${score.toFixed(1)}% ${passed ? '>=' : '<'} ${threshold}%`);
    return { passed, score, threshold, results };
  }

  private scored(name: Tier2FilterName, check: RawCheck): ScoredCheck {
    const weight = this.weights[name];
    const base = DEFAULT_WEIGHTS[name];
    return {
      passed: check.passed,
      score: base > 0 ? (check.points * weight) / base : 0,
      weight,
      message: check.message,
    };
  }

  // ===========================================================================
  // CHECKS
  // ===========================================================================

  /**
   * 15m and 1h trend, each read as last close against the close four bars
   * back.
   */
  private checkMtf(data: SymbolData, direction: TradeDirection | null): RawCheck {
    const m15 = candlesFor(data, '15m');
    const h1 = candlesFor(data, '1h');
    if (m15.length < 10 || h1.length < 10) {
      return raw(false, 0, 'Insufficient data');
    }
    const trend15 = m15[m15.length - 1][4] > m15[m15.length - 5][4] ? 1 : -1;
    const trend1h = h1[h1.length - 1][4] > h1[h1.length - 5][4] ? 1 : -1;

    if (trend15 !== trend1h) {
      return raw(false, 5, 'TF conflict');
    }
    if (!direction) {
      return raw(true, 20, 'All TF aligned');
    }
    const wanted = direction === 'LONG' ? 1 : -1;
    return trend15 === wanted
      ? raw(true, 20, 'All TF aligned with direction')
      : raw(true, 15, 'TF aligned but opposite direction');
  }

  private checkVolumeProfile(data: SymbolData): RawCheck {
    const candles = candlesFor(data, '15m');
    if (candles.length < 20) {
      return raw(false, 0, 'Insufficient data');
    }
    const price = candles[candles.length - 1][4];
    const profile = volumeProfile(candles);
    const position = valueAreaPosition(price, profile);

    if (position === 'IN_VA') {
      return raw(true, 15, `Price in value area (POC: ${profile.poc.toFixed(2)})`);
    }
    return position === 'BELOW_VA'
      ? raw(true, 10, 'Price below VA, near support')
      : raw(true, 10, 'Price above VA, near resistance');
  }

  /**
   * Crowded funding on the trade's side scores nothing.
   */
  private checkFunding(data: SymbolData, direction: TradeDirection | null): RawCheck {
    const pct = data.fundingRate * 100;
    const label = `${pct.toFixed(3)}%`;
    if (Math.abs(pct) > 0.01) {
      if (direction === 'LONG' && pct > 0) {
        return raw(false, 0, `High positive funding (${label})`);
      }
      if (direction === 'SHORT' && pct < 0) {
        return raw(false, 0, `High negative funding (${label})`);
      }
      return raw(true, 10, `Funding supports trade (${label})`);
    }
    return raw(true, 10, `Funding neutral (${label})`);
  }

  private checkOpenInterest(data: SymbolData): RawCheck {
    return data.openInterest > 0 ? raw(true, 10, 'OI positive') : raw(true, 5, 'OI data unavailable');
  }

  private checkRsiDivergence(data: SymbolData, direction: TradeDirection | null): RawCheck {
    const candles = candlesFor(data, '15m');
    if (candles.length < 20) {
      return raw(false, 0, 'Insufficient data');
    }
    const { rsi } = detectDivergences(candles);
    if (direction === 'LONG' && rsi === 'BULLISH') {
      return raw(true, 15, 'Bullish RSI divergence');
    }
    if (direction === 'SHORT' && rsi === 'BEARISH') {
      return raw(true, 15, 'Bearish RSI divergence');
    }
    if (rsi) {
      return raw(true, 10, `RSI divergence: ${rsi}`);
    }
    return raw(false, 5, 'No RSI divergence');
  }

  /**
   * EMA 9 / 21 / 200 over the last 50 1h closes.
   */
  private checkEmaStack(data: SymbolData, direction: TradeDirection | null): RawCheck {
    const candles = candlesFor(data, '1h');
    if (candles.length < 50) {
      return raw(false, 0, 'Insufficient data');
    }
    const values = closes(candles.slice(-50));
    const fast = ema(values, 9);
    const slow = ema(values, 21);
    const trend = ema(values, 200);
    const bullish = fast > slow && slow > trend;
    const bearish = fast < slow && slow < trend;

    if (direction === 'LONG' && bullish) return raw(true, 10, 'Bullish EMA stack');
    if (direction === 'SHORT' && bearish) return raw(true, 10, 'Bearish EMA stack');
    if (bullish) return raw(true, 7, 'Bullish stack (opposite direction)');
    if (bearish) return raw(true, 7, 'Bearish stack (opposite direction)');
    return raw(false, 3, 'No clear EMA stack');
  }

  private checkAtrPercent(data: SymbolData): RawCheck {
    const candles = candlesFor(data, '15m');
    if (candles.length < 14) {
      return raw(false, 0, 'Insufficient data');
    }
    const pct = atrPercent(candles);
    if (pct >= this.atr.minPct && pct <= this.atr.maxPct) {
      return raw(true, 10, `ATR ${pct.toFixed(2)}% in range`);
    }
    return pct < this.atr.minPct
      ? raw(false, 5, `ATR too low: ${pct.toFixed(2)}%`)
      : raw(false, 5, `ATR too high: ${pct.toFixed(2)}%`);
  }

  private checkVwap(data: SymbolData, direction: TradeDirection | null): RawCheck {
    const candles = candlesFor(data, '15m');
    if (candles.length < 20) {
      return raw(false, 0, 'Insufficient data');
    }
    const level = vwap(candles);
    const current = candles[candles.length - 1][4];
    if (level <= 0) {
      return raw(false, 1, 'Price away from VWAP');
    }

    if (direction === 'LONG' && current > level) {
      return raw(true, 5, `Price above VWAP (${((current / level - 1) * 100).toFixed(2)}%)`);
    }
    if (direction === 'SHORT' && current < level) {
      return raw(true, 5, `Price below VWAP (${((level / current - 1) * 100).toFixed(2)}%)`);
    }
    if (Math.abs(current - level) / level < 0.01) {
      return raw(true, 3, 'Price near VWAP');
    }
    return raw(false, 1, 'Price away from VWAP');
  }

  private checkSupportResistance(data: SymbolData, direction: TradeDirection | null): RawCheck {
    const candles = candlesFor(data, '1h');
    if (candles.length < 20) {
      return raw(false, 0, 'Insufficient data');
    }
    const current = candles[candles.length - 1][4];
    const nearest = nearestLevel(current, supportResistance(candles));
    if (!nearest) {
      return raw(false, 1, 'No clear S/R levels');
    }
    const distance = `${nearest.distancePct.toFixed(2)}%`;
    if (direction === 'LONG' && nearest.type === 'support') {
      return raw(true, 5, `Near support (${distance})`);
    }
    if (direction === 'SHORT' && nearest.type === 'resistance') {
      return raw(true, 5, `Near resistance (${distance})`);
    }
    return raw(true, 3, `Near ${nearest.type} (${distance})`);
  }
}
