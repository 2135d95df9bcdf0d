/**
 * @fileoverview Signal and trade performance metrics
 * @module features/monitoring/metrics
 *
 * Keeps bounded in-memory histories of signals, trade results and errors
 * and derives the figures served on `/metrics`. P&L values are percentages.
 * Period boundaries (today, week, month) follow the IST calendar; weeks
 * start on Monday.
 */

import type { Signal, SignalGrade, TradeDirection } from '../../shared/types/index.js';
import { mean, round, stdev } from '../../shared/utils/math.js';
import { formatDuration, istDateString, istDayStart, istWeekday } from '../../shared/utils/time.js';
import { MS_IN_DAY, MS_IN_MINUTE } from '../../shared/constants/index.js';

// =============================================================================
// TYPES
// =============================================================================

export type MetricsPeriod = 'today' | 'week' | 'month';

export interface SignalRecord {
  /** ISO-8601 */
  timestamp: string;
  symbol: string;
  direction: TradeDirection;
  score: number;
  grade: SignalGrade;
  confidence: number;
}

export interface TradeMetricInput {
  symbol: string;
  pnlPct: number;
  direction?: TradeDirection;
  entry?: number;
  exit?: number;
  pnlUsd?: number;
  rrRatio?: number;
  reason?: string;
}

export interface TradeRecord extends TradeMetricInput {
  /** ISO-8601 */
  timestamp: string;
}

export interface ErrorRecord {
  /** ISO-8601 */
  timestamp: string;
  type: string;
  message: string;
}

export interface PerformanceSnapshot {
  timestamp: string;
  totalSignals: number;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  totalPnl: number;
  winRate: number;
  avgRr: number;
  profitFactor: number;
}

export interface PeriodMetrics {
  trades: number;
  winRate: number;
  pnl: number;
}

export interface MetricsReport {
  summary: {
    totalSignals: number;
    totalTrades: number;
    winningTrades: number;
    losingTrades: number;
    /** Losses at the end of the trade history */
    consecutiveLosses: number;
    totalPnl: number;
    winRate: number;
    avgRr: number;
    profitFactor: number;
    sharpeRatio: number;
    maxDrawdown: number;
  };
  today: PeriodMetrics;
  week: PeriodMetrics;
  month: PeriodMetrics;
  bestTrade: TradeRecord | null;
  worstTrade: TradeRecord | null;
  recentErrors: ErrorRecord[];
  uptime: string;
}

// =============================================================================
// CONSTANTS
// =============================================================================

const SIGNAL_HISTORY = 1000;
const TRADE_HISTORY = 1000;
const ERROR_HISTORY = 100;
const SNAPSHOT_HISTORY = 100;

/** Three trades a day over 252 trading days */
export const TRADES_PER_YEAR = 3 * 252;

function keepLast<T>(items: T[], limit: number): void {
  if (items.length > limit) {
    items.splice(0, items.length - limit);
  }
}

// =============================================================================
// PURE STATISTICS
// =============================================================================

export function winRate(trades: readonly TradeRecord[]): number {
  if (trades.length === 0) {
    return 0;
  }
  return (trades.filter((t) => t.pnlPct > 0).length / trades.length) * 100;
}

export function profitFactor(trades: readonly TradeRecord[]): number {
  let grossProfit = 0;
  let grossLoss = 0;
  for (const { pnlPct } of trades) {
    if (pnlPct > 0) grossProfit += pnlPct;
    else if (pnlPct < 0) grossLoss -= pnlPct;
  }
  return grossLoss > 0 ? grossProfit / grossLoss : grossProfit;
}

/**
 * Annualised Sharpe ratio of per-trade returns. Zero below two trades or
 * with no variance.
 */
export function sharpeRatio(returns: readonly number[]): number {
  if (returns.length < 2) {
    return 0;
  }
  const sd = stdev(returns, 1);
  if (sd === 0) {
    return 0;
  }
  return (mean(returns) / sd) * Math.sqrt(TRADES_PER_YEAR);
}

/**
 * Largest fall of cumulative P&L from its running peak, as a percent of that
 * peak. Only positive peaks count.
 */
export function maxDrawdown(returns: readonly number[]): number {
  let cumulative = 0;
  let peak = 0;
  let worst = 0;
  for (const r of returns) {
    cumulative += r;
    peak = Math.max(peak, cumulative);
    if (peak > 0) {
      worst = Math.max(worst, (peak - cumulative) / peak);
    }
  }
  return worst * 100;
}

// =============================================================================
// METRICS COLLECTOR
// =============================================================================

export class MetricsCollector {
  private readonly startedAt: number;
  private readonly signals: SignalRecord[] = [];
  private readonly trades: TradeRecord[] = [];
  private readonly errors: ErrorRecord[] = [];
  private readonly snapshots: PerformanceSnapshot[] = [];
  private totalSignals = 0;
  private totalTrades = 0;
  private winningTrades = 0;
  private losingTrades = 0;
  private totalPnl = 0;

  constructor(private readonly now: () => Date = () => new Date()) {
    this.startedAt = now().getTime();
  }

  recordSignal(signal: Signal): void {
    this.signals.push({
      timestamp: this.now().toISOString(),
      symbol: signal.symbol,
      direction: signal.direction,
      score: signal.score,
      grade: signal.grade,
      confidence: signal.confidence,
    });
    keepLast(this.signals, SIGNAL_HISTORY);
    this.totalSignals++;
  }

  recordTrade(trade: TradeMetricInput): void {
    this.trades.push({ ...trade, timestamp: this.now().toISOString() });
    keepLast(this.trades, TRADE_HISTORY);

    this.totalTrades++;
    this.totalPnl += trade.pnlPct;
    if (trade.pnlPct > 0) {
      this.winningTrades++;
    } else {
      this.losingTrades++;
    }
  }

  recordError(type: string, message: string): void {
    this.errors.push({ timestamp: this.now().toISOString(), type, message });
    keepLast(this.errors, ERROR_HISTORY);
  }

  takeSnapshot(): PerformanceSnapshot {
    const snapshot: PerformanceSnapshot = {
      timestamp: this.now().toISOString(),
      totalSignals: this.totalSignals,
      totalTrades: this.totalTrades,
      winningTrades: this.winningTrades,
      losingTrades: this.losingTrades,
      totalPnl: this.totalPnl,
      winRate: winRate(this.trades),
      avgRr: this.avgRr(),
      profitFactor: profitFactor(this.trades),
    };
    this.snapshots.push(snapshot);
    keepLast(this.snapshots, SNAPSHOT_HISTORY);
    return snapshot;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  recentSignals(limit = 20): SignalRecord[] {
    return this.signals.slice(-limit);
  }

  snapshotHistory(): readonly PerformanceSnapshot[] {
    return this.snapshots;
  }

  /**
   * Trades recorded since the start of the IST period; all trades without
   * a period.
   */
  tradesFor(period?: MetricsPeriod): TradeRecord[] {
    if (!period) {
      return [...this.trades];
    }
    const start = this.periodStart(period);
    return this.trades.filter((t) => Date.parse(t.timestamp) >= start);
  }

  avgRr(period?: MetricsPeriod): number {
    const trades = this.tradesFor(period);
    return trades.length === 0 ? 0 : mean(trades.map((t) => t.rrRatio ?? 0));
  }

  consecutiveLosses(): number {
    let count = 0;
    for (let i = this.trades.length - 1; i >= 0; i--) {
      const trade = this.trades[i];
      if (!trade || trade.pnlPct > 0) break;
      count++;
    }
    return count;
  }

  bestTrade(): TradeRecord | null {
    return this.trades.reduce<TradeRecord | null>((best, t) => (best === null || t.pnlPct > best.pnlPct ? t : best), null);
  }

  worstTrade(): TradeRecord | null {
    return this.trades.reduce<TradeRecord | null>((worst, t) => (worst === null || t.pnlPct < worst.pnlPct ? t : worst), null);
  }

  uptime(): string {
    return formatDuration(Math.floor((this.now().getTime() - this.startedAt) / MS_IN_MINUTE));
  }

  getAll(): MetricsReport {
    const returns = this.trades.map((t) => t.pnlPct);
    return {
      summary: {
        totalSignals: this.totalSignals,
        totalTrades: this.totalTrades,
        winningTrades: this.winningTrades,
        losingTrades: this.losingTrades,
        consecutiveLosses: this.consecutiveLosses(),
        totalPnl: round(this.totalPnl),
        winRate: round(winRate(this.trades)),
        avgRr: round(this.avgRr()),
        profitFactor: round(profitFactor(this.trades)),
        sharpeRatio: round(sharpeRatio(returns)),
        maxDrawdown: round(maxDrawdown(returns)),
      },
      today: this.periodMetrics('today'),
      week: this.periodMetrics('week'),
      month: this.periodMetrics('month'),
      bestTrade: this.bestTrade(),
      worstTrade: this.worstTrade(),
      recentErrors: this.errors.slice(-10),
      uptime: this.uptime(),
    };
  }

  private periodMetrics(period: MetricsPeriod): PeriodMetrics {
    const trades = this.tradesFor(period);
    return {
      trades: trades.length,
      winRate: round(winRate(trades)),
      pnl: round(trades.reduce((total, t) => total + t.pnlPct, 0)),
    };
  }

  private periodStart(period: MetricsPeriod): number {
    const now = this.now();
    const today = istDayStart(now);
    switch (period) {
      case 'today':
        return today;
      case 'week':
        // Monday is day 1
        return today - ((istWeekday(now) + 6) % 7) * MS_IN_DAY;
      case 'month': {
        const dayOfMonth = Number(istDateString(now).slice(8));
        return today - (dayOfMonth - 1) * MS_IN_DAY;
      }
    }
  }
}
