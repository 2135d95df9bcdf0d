/**
 * @fileoverview Builds a trade signal from filtered market data
 * @module features/signals/generator
 */

import type { MarketProfile, SentinelConfig } from '../../config/index.js';
import type { BtcRegimeResult, Candle, MarketType, Signal, TradeDirection } from '../../shared/types/index.js';
import { round } from '../../shared/utils/math.js';
import { logger } from '../../shared/utils/logger.js';
import { atr } from '../analysis/indicators.js';
import { detectStructure, type StructureResult } from '../analysis/structure.js';
import { candlesFor, type FilterResult, type SymbolData } from '../filters/types.js';
import { ConfidenceCalculator } from './confidence.js';
import { SignalScorer } from './scorer.js';
import { SignalValidator } from './validator.js';

const log = logger.child('signals');

const FIB_RATIOS = { fib_236: 0.236, fib_382: 0.382, fib_500: 0.5, fib_618: 0.618, fib_786: 0.786 } as const;

export interface RiskLevels {
  stopLoss: number;
  takeProfit: number;
  rrRatio: number;
  atr: number;
  atrPct: number;
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Recent range, nearest levels either side of price and retracements over
 * the last 20 candles.
 */
export function priceLevels(candles: readonly Candle[], price: number): Record<string, number> {
  const recent = candles.slice(-20);
  const highs = recent.map((c) => c[2]);
  const lows = recent.map((c) => c[3]);
  const high = Math.max(...highs);
  const low = Math.min(...lows);
  const diff = high - low;

  const levels: Record<string, number> = { recent_high: high, recent_low: low };

  const above = highs.filter((h) => h > price);
  if (above.length > 0) {
    levels.nearest_resistance = Math.min(...above);
  }
  const below = lows.filter((l) => l < price);
  if (below.length > 0) {
    levels.nearest_support = Math.max(...below);
  }

  for (const [name, ratio] of Object.entries(FIB_RATIOS)) {
    levels[name] = high - diff * ratio;
  }
  return levels;
}

/**
 * ATR-based stop and target. The unknown market uses trending multipliers.
 */
export function riskLevels(
  candles: readonly Candle[],
  direction: TradeDirection,
  price: number,
  profile: Pick<MarketProfile, 'slMult' | 'tpMult'>
): RiskLevels | null {
  const range = atr(candles);
  if (range <= 0 || price <= 0) {
    return null;
  }
  const sign = direction === 'LONG' ? 1 : -1;
  const stopLoss = price - sign * range * profile.slMult;
  const takeProfit = price + sign * range * profile.tpMult;
  const rrRatio = Math.abs(takeProfit - price) / Math.abs(price - stopLoss);

  return {
    stopLoss: round(stopLoss, 2),
    takeProfit: round(takeProfit, 2),
    rrRatio: round(rrRatio, 2),
    atr: round(range, 2),
    atrPct: round((range / price) * 100, 2),
  };
}

function titleCase(name: string): string {
  return name
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Structure, the two best passed tier 2 checks and up to two bonuses.
 */
export function keyFactors(filterResult: FilterResult, structure: StructureResult): string[] {
  const factors = [`Structure: ${structure.strength}`];

  if (filterResult.tier2) {
    Object.entries(filterResult.tier2)
      .filter(([, r]) => r.passed)
      .sort(([, a], [, b]) => b.score - a.score)
      .slice(0, 2)
      .forEach(([name]) => factors.push(titleCase(name)));
  }

  if (filterResult.tier3) {
    const bonuses = Object.entries(filterResult.tier3)
      .filter(([, r]) => r.bonus > 0)
      .map(([name]) => name);
    if (bonuses.length > 0) {
      factors.push(`+${bonuses.slice(0, 2).join(', ')}`);
    }
  }
  return factors.slice(0, 4);
}

function countPassed(filterResult: FilterResult): number {
  const tier1 = filterResult.tier1 ? Object.values(filterResult.tier1).filter((r) => r.passed).length : 0;
  const tier2 = filterResult.tier2 ? Object.values(filterResult.tier2).filter((r) => r.passed).length : 0;
  return tier1 + tier2;
}

// =============================================================================
// GENERATOR
// =============================================================================

export class SignalGenerator {
  readonly scorer = new SignalScorer();
  readonly confidence = new ConfidenceCalculator();
  readonly validator: SignalValidator;

  constructor(
    private readonly config: Pick<SentinelConfig, 'marketConfigs' | 'filters'>,
    private readonly now: () => Date = () => new Date()
  ) {
    this.validator = new SignalValidator(config.filters.minRr, now);
  }

  /**
   * Returns a validated signal, or null when the 15m data cannot produce
   * one.
   */
  generate(
    symbol: string,
    data: SymbolData,
    filterResult: FilterResult,
    marketType: MarketType,
    btcRegime: BtcRegimeResult | null
  ): Signal | null {
    const candles = candlesFor(data, '15m');
    const last = candles[candles.length - 1];
    if (!last) {
      log.warn(`No 15m data for ${symbol}`);
      return null;
    }
    const price = last[4];

    const structure = detectStructure(candles);
    const direction = structure.direction;

    const scored = this.scorer.calculate(filterResult, structure, marketType);
    const confidence = this.confidence.calculate(scored.score, scored.grade, marketType, btcRegime);

    const profile = this.profileFor(marketType);
    const risk = riskLevels(candles, direction, price, profile);
    if (!risk) {
      log.warn(`Could not calculate risk levels for ${symbol}`);
      return null;
    }

    const signal: Signal = {
      symbol,
      direction,
      entry: price,
      stopLoss: risk.stopLoss,
      takeProfit: risk.takeProfit,
      rrRatio: risk.rrRatio,
      score: scored.score,
      grade: scored.grade,
      confidence,
      marketType,
      btcRegime: btcRegime?.regime ?? 'unknown',
      structureStrength: structure.strength,
      filtersPassed: countPassed(filterResult),
      timestamp: this.now().toISOString(),
      levels: priceLevels(candles, price),
      keyFactors: keyFactors(filterResult, structure),
      positionSize: null,
      filterSummary: filterResult.reason,
    };

    const { valid, errors } = this.validator.validate(signal);
    if (!valid) {
      log.debug(`Signal validation failed for ${symbol}: ${errors.join(', ')}`);
      return null;
    }
    return signal;
  }

  private profileFor(marketType: MarketType): MarketProfile {
    return marketType === 'unknown' ? this.config.marketConfigs.trending : this.config.marketConfigs[marketType];
  }
}
