/**
 * @fileoverview Tier 1 filters: mandatory gates
 * @module features/filters/tier1
 *
 * Every check must pass before a symbol is scored. A missing order book is
 * tolerated; everything else fails closed.
 */

import type { SessionsConfig } from '../../config/index.js';
import type { BtcRegimeResult, OrderBook, TradeDirection } from '../../shared/types/index.js';
import { mean } from '../../shared/utils/math.js';
import { istHour, isAvoidTime, sessionForHour } from '../../shared/utils/time.js';
import { bookDepth, spreadPct } from '../analysis/liquidity.js';
import { detectStructure, STRUCTURE_MIN_CANDLES } from '../analysis/structure.js';
import { candlesFor, type FilterCheck, type SymbolData, type Tier1Results } from './types.js';

const MIN_REGIME_CONFIDENCE = 20;
const MIN_VOLUME_RATIO = 0.7;
const MAX_SPREAD_PCT = 0.1;
const MIN_BOOK_DEPTH = 10_000;

const pass = (message: string): FilterCheck => ({ passed: true, message });
const fail = (message: string): FilterCheck => ({ passed: false, message });

const pad2 = (n: number): string => n.toString().padStart(2, '0');

export class Tier1Filters {
  constructor(
    private readonly sessions: SessionsConfig,
    private readonly now: () => Date = () => new Date()
  ) {}

  evaluateAll(
    direction: TradeDirection | null,
    btcRegime: BtcRegimeResult | null,
    data: SymbolData
  ): { passed: boolean; results: Tier1Results } {
    const results: Tier1Results = {
      btc_regime: this.checkBtcRegime(btcRegime, direction),
      structure: this.checkStructure(data),
      volume: this.checkVolume(data),
      liquidity: this.checkLiquidity(data.orderbook),
      session: this.checkSession(),
    };
    return { passed: Object.values(results).every((r) => r.passed), results };
  }

  checkBtcRegime(regime: BtcRegimeResult | null, direction: TradeDirection | null): FilterCheck {
    if (!regime) {
      return fail('BTC regime data not available');
    }
    if (!regime.canTrade) {
      return fail(`BTC regime blocks: ${regime.reason ?? 'unknown'}`);
    }
    if (direction === 'LONG' && regime.direction === 'DOWN') {
      return fail('BTC DOWN but trying LONG');
    }
    if (direction === 'SHORT' && regime.direction === 'UP') {
      return fail('BTC UP but trying SHORT');
    }
    if (regime.confidence < MIN_REGIME_CONFIDENCE) {
      return fail(`BTC confidence too low: ${regime.confidence}%`);
    }
    return pass(`BTC ${regime.regime} (${regime.confidence}%, ${regime.direction})`);
  }

  checkStructure(data: SymbolData): FilterCheck {
    const candles = candlesFor(data, '15m');
    if (candles.length < STRUCTURE_MIN_CANDLES) {
      return fail('Insufficient data for structure (need 20 candles)');
    }
    const structure = detectStructure(candles);
    if (structure.strength === 'WEAK' && !structure.bos) {
      return fail(`Structure too weak: ${structure.reason}`);
    }
    return pass(`Structure: ${structure.direction} (${structure.strength})`);
  }

  /**
   * Last 15m volume against the mean of the four before it.
   */
  checkVolume(data: SymbolData): FilterCheck {
    const candles = candlesFor(data, '15m');
    if (candles.length < 20) {
      return fail('Insufficient data for volume check (need 20 candles)');
    }
    const recent = candles.slice(-5).map((c) => c[5]);
    const average = mean(recent.slice(0, -1));
    const ratio = average > 0 ? recent[recent.length - 1] / average : 0;

    if (ratio < MIN_VOLUME_RATIO) {
      return fail(`Volume too low: ${ratio.toFixed(1)}x average`);
    }
    return pass(`Volume: ${ratio.toFixed(1)}x average`);
  }

  checkLiquidity(book: OrderBook | null): FilterCheck {
    if (!book || book.bids.length === 0 || book.asks.length === 0) {
      return pass('No orderbook data - allowing');
    }
    const spread = spreadPct(book);
    if (spread > MAX_SPREAD_PCT) {
      return fail(`Spread too wide: ${spread.toFixed(3)}%`);
    }
    const depth = bookDepth(book, 5);
    if (depth.bid < MIN_BOOK_DEPTH || depth.ask < MIN_BOOK_DEPTH) {
      return fail(`Insufficient depth: Bid $${Math.round(depth.bid)}, Ask $${Math.round(depth.ask)}`);
    }
    return pass(`Spread: ${spread.toFixed(3)}%, Depth: $${Math.round(depth.bid + depth.ask)}`);
  }

  checkSession(): FilterCheck {
    const hour = istHour(this.now());
    const avoid = this.sessions.avoid.find((w) => isAvoidTime(hour, [w]));
    if (avoid) {
      return fail(`Avoid time: ${avoid.label} (${pad2(hour)}:00 IST)`);
    }
    const session = sessionForHour(hour, this.sessions.hours);
    if (!session || session === 'dead') {
      return fail(`Dead zone - no trading (${pad2(hour)}:00 IST)`);
    }
    return pass(`Active session: ${session.toUpperCase()} (${pad2(hour)}:00 IST)`);
  }
}
