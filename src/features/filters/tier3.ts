/**
 * @fileoverview Tier 3 filters: bonus points
 * @module features/filters/tier3
 */

import { BTC_SYMBOL } from '../../shared/constants/index.js';
import type { OrderBook, TradeDirection } from '../../shared/types/index.js';
import { sum } from '../../shared/utils/math.js';
import { logger } from '../../shared/utils/logger.js';
import { CorrelationAnalyzer } from '../analysis/correlation.js';
import { closes } from '../analysis/indicators.js';
import { detectLiquidity, hasIcebergPattern, whaleLevels } from '../analysis/liquidity.js';
import { candlesFor, type BonusCheck, type SymbolData, type Tier3FilterName, type Tier3Results } from './types.js';

const log = logger.child('tier3');

export const TIER3_MAX_BONUS: Record<Tier3FilterName, number> = {
  whale_movement: 5,
  liquidity_grab: 8,
  iceberg_detection: 5,
  news_sentiment: 3,
  correlation_break: 4,
  fibonacci_level: 2,
};

const WHALE_SIZE = 50_000;
const FIB_RATIOS = [0.236, 0.382, 0.5, 0.618, 0.786] as const;

type Bonus = Omit<BonusCheck, 'maxBonus'>;

const bonus = (points: number, message: string): Bonus => ({ bonus: points, message });

export class Tier3Filters {
  private readonly correlation = new CorrelationAnalyzer();

  evaluateAll(symbol: string, direction: TradeDirection | null, data: SymbolData): { bonus: number; results: Tier3Results } {
    const checks: Record<Tier3FilterName, Bonus> = {
      whale_movement: this.checkWhales(data.orderbook),
      liquidity_grab: this.checkLiquidityGrab(data, direction),
      iceberg_detection: this.checkIceberg(data.orderbook),
      news_sentiment: bonus(0, 'News sentiment check disabled'),
      correlation_break: this.checkCorrelationBreak(symbol, data),
      fibonacci_level: this.checkFibonacci(data, direction),
    };

    const results: Tier3Results = {
      whale_movement: { ...checks.whale_movement, maxBonus: TIER3_MAX_BONUS.whale_movement },
      liquidity_grab: { ...checks.liquidity_grab, maxBonus: TIER3_MAX_BONUS.liquidity_grab },
      iceberg_detection: { ...checks.iceberg_detection, maxBonus: TIER3_MAX_BONUS.iceberg_detection },
      news_sentiment: { ...checks.news_sentiment, maxBonus: TIER3_MAX_BONUS.news_sentiment },
      correlation_break: { ...checks.correlation_break, maxBonus: TIER3_MAX_BONUS.correlation_break },
      fibonacci_level: { ...checks.fibonacci_level, maxBonus: TIER3_MAX_BONUS.fibonacci_level },
    };

    const total = sum(Object.values(results).map((r) => r.bonus));
    log.debug(`Tier3 bonus points: ${total}`);
    return { bonus: total, results };
  }

  private checkWhales(book: OrderBook | null): Bonus {
    if (!book) {
      return bonus(0, 'No orderbook data');
    }
    if (book.bids.length === 0 || book.asks.length === 0) {
      return bonus(0, 'Insufficient orderbook data');
    }
    const whales = whaleLevels(book, WHALE_SIZE);
    const bids = whales.bids.length;
    const asks = whales.asks.length;
    if (bids > 0 && asks === 0) return bonus(5, `Whale accumulation detected (${bids} large bids)`);
    if (asks > 0 && bids === 0) return bonus(5, `Whale distribution detected (${asks} large asks)`);
    if (bids > 0 && asks > 0) return bonus(3, 'Whale activity on both sides');
    return bonus(0, 'No significant whale movement');
  }

  private checkLiquidityGrab(data: SymbolData, direction: TradeDirection | null): Bonus {
    const candles = candlesFor(data, '5m');
    if (candles.length < 10) {
      return bonus(0, 'Insufficient data');
    }
    const { grab } = detectLiquidity(candles, 10);
    if (grab && grab === direction) {
      return bonus(8, `Liquidity grab detected (${grab === 'LONG' ? 'bullish' : 'bearish'})`);
    }
    if (grab) {
      return bonus(5, `Liquidity grab: ${grab}`);
    }
    return bonus(0, 'No liquidity grab');
  }

  private checkIceberg(book: OrderBook | null): Bonus {
    if (!book) {
      return bonus(0, 'No orderbook data');
    }
    const bid = hasIcebergPattern(book.bids);
    const ask = hasIcebergPattern(book.asks);
    if (bid && !ask) return bonus(5, 'Iceberg buy orders detected');
    if (ask && !bid) return bonus(5, 'Iceberg sell orders detected');
    if (bid && ask) return bonus(3, 'Iceberg orders on both sides');
    return bonus(0, 'No iceberg orders detected');
  }

  /**
   * A pair moving apart from BTC over the last 20 hourly closes. Weak
   * correlation while diverging scores the full bonus.
   */
  private checkCorrelationBreak(symbol: string, data: SymbolData): Bonus {
    if (symbol === BTC_SYMBOL) {
      return bonus(0, 'Reference pair');
    }
    const own = closes(candlesFor(data, '1h').slice(-50));
    const btc = closes((data.btc['1h'] ?? []).slice(-50));
    if (own.length === 0 || btc.length === 0) {
      return bonus(0, 'Insufficient correlation data');
    }

    const result = this.correlation.analyze(symbol, { [BTC_SYMBOL]: btc, [symbol]: own }, 20);
    const r = result.btc.toFixed(2);
    if (!result.isDiverging) {
      return bonus(0, `Normal correlation (r=${r})`);
    }
    return result.btc < 0.3 ? bonus(4, `Breaking correlation with BTC (r=${r})`) : bonus(2, 'Correlation breaking');
  }

  /**
   * Price within 2% of the 4h swing range from a retracement level. Deep
   * levels favour longs, shallow ones shorts.
   */
  private checkFibonacci(data: SymbolData, direction: TradeDirection | null): Bonus {
    const candles = candlesFor(data, '4h');
    if (candles.length < 20) {
      return bonus(0, 'Insufficient data');
    }
    const recent = candles.slice(-20);
    const high = Math.max(...recent.map((c) => c[2]));
    const low = Math.min(...recent.map((c) => c[3]));
    const current = candles[candles.length - 1][4];
    const diff = high - low;
    const threshold = diff * 0.02;

    for (const ratio of FIB_RATIOS) {
      const price = high - diff * ratio;
      if (Math.abs(current - price) < threshold) {
        const label = `${(ratio * 100).toFixed(1)}%`;
        if (direction === 'LONG' && ratio >= 0.5) return bonus(2, `At Fibonacci ${label} support`);
        if (direction === 'SHORT' && ratio <= 0.382) return bonus(2, `At Fibonacci ${label} resistance`);
        return bonus(1, `At Fibonacci ${label}`);
      }
    }
    return bonus(0, 'Not at Fibonacci level');
  }
}
