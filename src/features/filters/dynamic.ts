/**
 * @fileoverview Threshold adjustment by market, performance and time of day
 * @module features/filters/dynamic
 */

import type { SentinelConfig } from '../../config/index.js';
import type { MarketType } from '../../shared/types/index.js';
import { clamp } from '../../shared/utils/math.js';
import { istDateString, istHour } from '../../shared/utils/time.js';
import { logger } from '../../shared/utils/logger.js';

const log = logger.child('dynamic-filter');

const HISTORY_LIMIT = 100;

export interface Thresholds {
  tier2MinScore: number;
  minSignalScore: number;
  maxSignals: number;
}

type Adjustment = Partial<Thresholds>;

export interface TradeRecord {
  /** ISO-8601 */
  timestamp: string;
  pnlPct: number;
  consecutiveLosses: number;
  dailyPnlPct: number;
}

export interface DynamicFilterStatus {
  consecutiveLosses: number;
  dailyTrades: number;
  dailyPnlPct: number;
  thresholds: Thresholds;
  shouldTrade: boolean;
}

const MARKET_ADJUSTMENTS: Record<MarketType, Adjustment> = {
  trending: { tier2MinScore: -5, minSignalScore: -5, maxSignals: 1 },
  choppy: { tier2MinScore: 0, minSignalScore: 0, maxSignals: -1 },
  high_vol: { tier2MinScore: 10, minSignalScore: 10, maxSignals: -2 },
  unknown: {},
};

function apply(thresholds: Thresholds, adjustment: Adjustment): Thresholds {
  return {
    tier2MinScore: thresholds.tier2MinScore + (adjustment.tier2MinScore ?? 0),
    minSignalScore: thresholds.minSignalScore + (adjustment.minSignalScore ?? 0),
    maxSignals: thresholds.maxSignals + (adjustment.maxSignals ?? 0),
  };
}

/**
 * Keeps the per-key value furthest from zero in the stricter direction.
 */
function strictest(a: Adjustment, b: Adjustment): Adjustment {
  const out: Adjustment = { ...a };
  if (b.tier2MinScore !== undefined) out.tier2MinScore = Math.max(a.tier2MinScore ?? 0, b.tier2MinScore);
  if (b.minSignalScore !== undefined) out.minSignalScore = Math.max(a.minSignalScore ?? 0, b.minSignalScore);
  if (b.maxSignals !== undefined) out.maxSignals = Math.min(a.maxSignals ?? 0, b.maxSignals);
  return out;
}

export class DynamicFilter {
  private readonly base: Thresholds;
  private readonly dailyTargetPct: number;
  private readonly maxConsecutiveLosses: number;
  private current: Thresholds;
  private history: TradeRecord[] = [];
  private consecutiveLosses = 0;
  private dailyTrades = 0;
  private dailyPnlPct = 0;
  private day: string;

  constructor(
    config: Pick<SentinelConfig, 'filters' | 'signalLimits' | 'risk'>,
    private readonly now: () => Date = () => new Date()
  ) {
    this.base = {
      tier2MinScore: config.filters.minTier2Score,
      minSignalScore: config.filters.minSignalScore,
      maxSignals: config.signalLimits.default,
    };
    this.current = { ...this.base };
    this.dailyTargetPct =
      config.risk.accountSize > 0 ? (config.risk.dailyProfitTarget / config.risk.accountSize) * 100 : Infinity;
    this.maxConsecutiveLosses = config.risk.maxConsecutiveLosses;
    this.day = istDateString(this.now());
  }

  /**
   * Recomputes thresholds for the market and stores them as current.
   */
  update(marketType: MarketType): Thresholds {
    this.checkDailyReset();

    let thresholds = apply(this.base, MARKET_ADJUSTMENTS[marketType]);
    thresholds = apply(thresholds, this.performanceAdjustment());
    thresholds = apply(thresholds, this.timeAdjustment());

    this.current = {
      tier2MinScore: clamp(thresholds.tier2MinScore, 40, 80),
      minSignalScore: clamp(thresholds.minSignalScore, 50, 85),
      maxSignals: clamp(thresholds.maxSignals, 1, 8),
    };
    return { ...this.current };
  }

  recordTradeResult(pnlPct: number): void {
    this.checkDailyReset();
    this.dailyTrades++;
    this.dailyPnlPct += pnlPct;
    this.consecutiveLosses = pnlPct < 0 ? this.consecutiveLosses + 1 : 0;

    this.history.push({
      timestamp: this.now().toISOString(),
      pnlPct,
      consecutiveLosses: this.consecutiveLosses,
      dailyPnlPct: this.dailyPnlPct,
    });
    if (this.history.length > HISTORY_LIMIT) {
      this.history = this.history.slice(-HISTORY_LIMIT);
    }
  }

  shouldTrade(marketType: MarketType): boolean {
    const thresholds = this.update(marketType);

    if (this.dailyTrades >= thresholds.maxSignals) {
      log.debug(`Max signals reached: ${this.dailyTrades}/${thresholds.maxSignals}`);
      return false;
    }
    if (this.dailyPnlPct >= this.dailyTargetPct) {
      log.info(`Daily profit target reached: ${this.dailyPnlPct.toFixed(2)}%`);
      return false;
    }
    if (this.consecutiveLosses >= this.maxConsecutiveLosses) {
      log.warn(`Max consecutive losses reached: ${this.consecutiveLosses}`);
      return false;
    }
    return true;
  }

  thresholds(): Thresholds {
    return { ...this.current };
  }

  recentTrades(): readonly TradeRecord[] {
    return this.history;
  }

  status(): DynamicFilterStatus {
    const shouldTrade = this.shouldTrade('unknown');
    return {
      consecutiveLosses: this.consecutiveLosses,
      dailyTrades: this.dailyTrades,
      dailyPnlPct: this.dailyPnlPct,
      thresholds: this.thresholds(),
      shouldTrade,
    };
  }

  // ===========================================================================
  // ADJUSTMENTS
  // ===========================================================================

  private performanceAdjustment(): Adjustment {
    let adjustment: Adjustment = {};
    if (this.consecutiveLosses >= 2) {
      adjustment = { tier2MinScore: 10, minSignalScore: 15, maxSignals: -2 };
    } else if (this.consecutiveLosses === 1) {
      adjustment = { tier2MinScore: 5, minSignalScore: 5, maxSignals: -1 };
    }
    if (this.dailyTrades >= 3) {
      adjustment = strictest(adjustment, { tier2MinScore: 5, minSignalScore: 5 });
    }
    return adjustment;
  }

  private timeAdjustment(): Adjustment {
    const hour = istHour(this.now());
    if (hour >= 20 && hour <= 22) return { tier2MinScore: -5, maxSignals: 1 };
    if (hour >= 7 && hour <= 10) return { tier2MinScore: 5, maxSignals: -1 };
    if (hour >= 11 && hour <= 13) return { tier2MinScore: 10, maxSignals: -2 };
    return {};
  }

  private checkDailyReset(): void {
    const today = istDateString(this.now());
    if (today !== this.day) {
      this.day = today;
      this.dailyTrades = 0;
      this.dailyPnlPct = 0;
      this.consecutiveLosses = 0;
      log.info('Daily filter counters reset');
    }
  }
}
