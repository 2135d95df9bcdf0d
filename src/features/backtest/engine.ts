/**
 * @fileoverview Bar-by-bar historical backtest
 * @module features/backtest/engine
 *
 * Walks a candle series from bar 50 onwards. Each bar asks the strategy for a
 * signal; a signal is simulated on the following bars until take profit or
 * stop loss is touched (take profit is checked first), or the series ends.
 * The next signal is looked for after the exit bar.
 */

import { atr } from '../analysis/indicators.js';
import { detectStructure } from '../analysis/structure.js';
import { parseDate } from '../market-data/historical.js';
import type { Candle, TradeDirection } from '../../shared/types/index.js';
import { logger } from '../../shared/utils/logger.js';
import { mean, stdev } from '../../shared/utils/math.js';

const log = logger.child('backtest');

// =============================================================================
// TYPES
// =============================================================================

export interface BacktestSignal {
  direction: TradeDirection;
  entry: number;
  stopLoss: number;
  takeProfit: number;
  timestamp: number;
}

/**
 * Produces a signal from the candles up to and including the current bar.
 */
export type BacktestStrategy = (candles: readonly Candle[]) => BacktestSignal | null;

export interface BacktestTrade {
  entryTime: number;
  exitTime: number;
  direction: TradeDirection;
  entry: number;
  exit: number;
  pnlPct: number;
  pnlUsd: number;
  barsHeld: number;
}

export interface MonthlyStats {
  trades: number;
  wins: number;
  pnl: number;
  winRate: number;
}

export interface BacktestResult {
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRate: number;
  totalPnl: number;
  totalPnlPercent: number;
  maxDrawdown: number;
  maxDrawdownPercent: number;
  profitFactor: number;
  sharpeRatio: number;
  /** Mean absolute trade return, in percent */
  avgRr: number;
  avgWin: number;
  avgLoss: number;
  bestTrade: number;
  worstTrade: number;
  trades: BacktestTrade[];
  equityCurve: number[];
  /** Keyed by `YYYY-MM` of the exit time (UTC) */
  monthlyStats: Record<string, MonthlyStats>;
}

/** Inclusive `YYYY-MM-DD` bounds, UTC */
export interface BacktestRange {
  startDate?: string;
  endDate?: string;
}

export interface BacktestEngineOptions {
  initialCapital?: number;
  /** Fraction of capital committed per trade */
  positionFraction?: number;
  strategy?: BacktestStrategy;
}

export const WARMUP_BARS = 50;
/** A signal needs at least this many bars after it to be simulated */
const MIN_FUTURE_BARS = 5;
const STOP_ATR_MULTIPLIER = 1.5;
const TARGET_ATR_MULTIPLIER = 3.0;
const ANNUALIZATION_DAYS = 365;
const DAY_MS = 86_400_000;

// =============================================================================
// DEFAULT STRATEGY
// =============================================================================

/**
 * Trades in the direction of any non-WEAK market structure, with the stop at
 * 1.5 ATR and the target at 3 ATR from the last close.
 */
export const structureStrategy: BacktestStrategy = (candles) => {
  const last = candles[candles.length - 1];
  if (!last || candles.length < WARMUP_BARS) {
    return null;
  }

  const structure = detectStructure(candles);
  if (structure.strength === 'WEAK') {
    return null;
  }

  const range = atr(candles);
  if (range <= 0) {
    return null;
  }

  const entry = last[4];
  const sign = structure.direction === 'LONG' ? 1 : -1;
  return {
    direction: structure.direction,
    entry,
    stopLoss: entry - sign * range * STOP_ATR_MULTIPLIER,
    takeProfit: entry + sign * range * TARGET_ATR_MULTIPLIER,
    timestamp: last[0],
  };
};

export function emptyResult(initialCapital: number): BacktestResult {
  return {
    totalTrades: 0,
    winningTrades: 0,
    losingTrades: 0,
    winRate: 0,
    totalPnl: 0,
    totalPnlPercent: 0,
    maxDrawdown: 0,
    maxDrawdownPercent: 0,
    profitFactor: 0,
    sharpeRatio: 0,
    avgRr: 0,
    avgWin: 0,
    avgLoss: 0,
    bestTrade: 0,
    worstTrade: 0,
    trades: [],
    equityCurve: [initialCapital],
    monthlyStats: {},
  };
}

// =============================================================================
// ENGINE
// =============================================================================

interface SimulatedExit {
  index: number;
  price: number;
}

export class BacktestEngine {
  readonly initialCapital: number;
  private readonly positionFraction: number;
  private readonly strategy: BacktestStrategy;

  constructor(options: BacktestEngineOptions = {}) {
    this.initialCapital = options.initialCapital ?? 100_000;
    this.positionFraction = options.positionFraction ?? 0.01;
    this.strategy = options.strategy ?? structureStrategy;
  }

  run(candles: readonly Candle[], symbol: string, range: BacktestRange = {}): BacktestResult {
    const series = filterRange(candles, range);
    if (series.length < WARMUP_BARS) {
      log.warn(`Insufficient data for backtest: ${series.length} candles`);
      return emptyResult(this.initialCapital);
    }

    const first = series[0];
    const last = series[series.length - 1];
    log.info(`Running ${symbol} backtest on ${series.length} candles from ${isoDay(first[0])} to ${isoDay(last[0])}`);

    const trades: BacktestTrade[] = [];
    const equityCurve = [this.initialCapital];
    let capital = this.initialCapital;

    let i = WARMUP_BARS;
    while (i < series.length) {
      const signal = this.strategy(series.slice(0, i + 1));
      const exit = signal ? simulateExit(signal, series, i) : null;
      if (!signal || !exit) {
        equityCurve.push(capital);
        i++;
        continue;
      }

      for (let bar = i; bar < exit.index; bar++) {
        equityCurve.push(capital);
      }

      const move = signal.direction === 'LONG' ? exit.price - signal.entry : signal.entry - exit.price;
      const pnlPct = (move / signal.entry) * 100;
      const pnlUsd = capital * this.positionFraction * (pnlPct / 100);
      trades.push({
        entryTime: signal.timestamp,
        exitTime: series[exit.index][0],
        direction: signal.direction,
        entry: signal.entry,
        exit: exit.price,
        pnlPct,
        pnlUsd,
        barsHeld: exit.index - i,
      });

      capital += pnlUsd;
      equityCurve.push(capital);
      i = exit.index + 1;
    }

    const result = this.statistics(trades, equityCurve);
    log.info(
      `Backtest complete: ${result.totalTrades} trades, ${result.winRate.toFixed(1)}% win rate, ${signed(result.totalPnlPercent)}% return`
    );
    return result;
  }

  private statistics(trades: BacktestTrade[], equityCurve: number[]): BacktestResult {
    if (trades.length === 0) {
      return { ...emptyResult(this.initialCapital), equityCurve };
    }

    const pnls = trades.map((t) => t.pnlPct);
    const wins = pnls.filter((p) => p > 0);
    const losses = pnls.filter((p) => p < 0);
    const totalPnl = trades.reduce((acc, t) => acc + t.pnlUsd, 0);

    const grossProfit = trades.reduce((acc, t) => (t.pnlUsd > 0 ? acc + t.pnlUsd : acc), 0);
    const grossLoss = Math.abs(trades.reduce((acc, t) => (t.pnlUsd < 0 ? acc + t.pnlUsd : acc), 0));

    const { absolute, percent } = maxDrawdown(equityCurve);

    return {
      totalTrades: trades.length,
      winningTrades: wins.length,
      losingTrades: trades.length - wins.length,
      winRate: (wins.length / trades.length) * 100,
      totalPnl,
      totalPnlPercent: (totalPnl / this.initialCapital) * 100,
      maxDrawdown: absolute,
      maxDrawdownPercent: percent,
      profitFactor: grossLoss > 0 ? grossProfit / grossLoss : grossProfit,
      sharpeRatio: equitySharpe(equityCurve),
      avgRr: mean(pnls.map(Math.abs)),
      avgWin: mean(wins),
      avgLoss: mean(losses),
      bestTrade: Math.max(...pnls),
      worstTrade: Math.min(...pnls),
      trades,
      equityCurve,
      monthlyStats: monthlyStats(trades),
    };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function filterRange(candles: readonly Candle[], range: BacktestRange): Candle[] {
  const from = range.startDate !== undefined ? parseDate(range.startDate) : -Infinity;
  const to = range.endDate !== undefined ? parseDate(range.endDate) + DAY_MS - 1 : Infinity;
  return candles.filter((c) => c[0] >= from && c[0] <= to);
}

function simulateExit(signal: BacktestSignal, series: readonly Candle[], signalIndex: number): SimulatedExit | null {
  if (series.length - signalIndex - 1 < MIN_FUTURE_BARS) {
    return null;
  }

  for (let index = signalIndex + 1; index < series.length; index++) {
    const [, , high, low] = series[index];
    if (signal.direction === 'LONG') {
      if (high >= signal.takeProfit) return { index, price: signal.takeProfit };
      if (low <= signal.stopLoss) return { index, price: signal.stopLoss };
    } else {
      if (low <= signal.takeProfit) return { index, price: signal.takeProfit };
      if (high >= signal.stopLoss) return { index, price: signal.stopLoss };
    }
  }

  const index = series.length - 1;
  return { index, price: series[index][4] };
}

/**
 * Largest peak-to-trough fall, with its size relative to that peak.
 */
export function maxDrawdown(equity: readonly number[]): { absolute: number; percent: number } {
  let peak = equity[0] ?? 0;
  let absolute = 0;
  let percent = 0;
  for (const value of equity) {
    peak = Math.max(peak, value);
    const drop = peak - value;
    if (drop > absolute) {
      absolute = drop;
      percent = peak > 0 ? (drop / peak) * 100 : 0;
    }
  }
  return { absolute, percent };
}

/**
 * Annualised Sharpe of bar-to-bar equity returns.
 */
export function equitySharpe(equity: readonly number[]): number {
  const returns: number[] = [];
  for (let i = 1; i < equity.length; i++) {
    returns.push((equity[i] - equity[i - 1]) / equity[i - 1]);
  }
  const sd = stdev(returns);
  return returns.length > 1 && sd > 0 ? (mean(returns) / sd) * Math.sqrt(ANNUALIZATION_DAYS) : 0;
}

function monthlyStats(trades: readonly BacktestTrade[]): Record<string, MonthlyStats> {
  const months: Record<string, MonthlyStats> = {};
  for (const trade of trades) {
    const key = new Date(trade.exitTime).toISOString().slice(0, 7);
    const month = months[key] ?? { trades: 0, wins: 0, pnl: 0, winRate: 0 };
    month.trades += 1;
    month.pnl += trade.pnlUsd;
    if (trade.pnlPct > 0) month.wins += 1;
    month.winRate = (month.wins / month.trades) * 100;
    months[key] = month;
  }
  return months;
}

function isoDay(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

function signed(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}`;
}
