/**
 * @fileoverview Monte Carlo risk simulation over backtest trades
 * @module features/backtest/monte-carlo
 *
 * Two modes: a parametric run drawing normal returns with the trades' mean
 * and standard deviation, and a bootstrap that resamples the actual returns
 * with replacement. Both need at least ten trades.
 */

import { logger } from '../../shared/utils/logger.js';
import { mean, percentile, stdev } from '../../shared/utils/math.js';

const log = logger.child('monte-carlo');

// =============================================================================
// TYPES
// =============================================================================

/** Uniform source in [0, 1) */
export type Rng = () => number;

/** Anything carrying a percent return */
export interface TradeReturn {
  pnlPct: number;
}

export interface SimulationPath {
  finalReturn: number;
  maxDrawdown: number;
  sharpe: number;
}

export interface MonteCarloResult {
  numSimulations: number;
  confidenceLevel: number;
  meanReturn: number;
  medianReturn: number;
  stdReturn: number;
  maxReturn: number;
  minReturn: number;
  /** Final return at the `1 - confidenceLevel` quantile */
  var: number;
  /** Mean of the final returns at or below VaR */
  cvar: number;
  probProfit: number;
  probLoss: number;
  meanDrawdown: number;
  maxDrawdown95: number;
  meanSharpe: number;
  sharpe95: number;
}

export interface BootstrapResult {
  numSimulations: number;
  meanReturn: number;
  medianReturn: number;
  stdReturn: number;
  percentile5: number;
  percentile25: number;
  percentile75: number;
  percentile95: number;
  probProfit: number;
}

export const MIN_TRADES = 10;
const TRADING_DAYS = 252;

// =============================================================================
// RANDOM DRAWS
// =============================================================================

/**
 * Standard normal draws by the Box–Muller transform.
 */
export function gaussian(rng: Rng): () => number {
  return () => {
    const u1 = 1 - rng();
    const u2 = rng();
    return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  };
}

/**
 * VaR as the `(1 - confidence)` order statistic of the outcomes, and CVaR as
 * the mean of the outcomes at or below it.
 */
export function valueAtRisk(outcomes: readonly number[], confidence: number): { var: number; cvar: number } {
  if (outcomes.length === 0) {
    return { var: 0, cvar: 0 };
  }
  const sorted = [...outcomes].sort((a, b) => a - b);
  const index = Math.floor((1 - confidence) * sorted.length);
  const threshold = sorted[Math.min(index, sorted.length - 1)];
  return { var: threshold, cvar: mean(sorted.filter((r) => r <= threshold)) };
}

function pathSharpe(returns: readonly number[]): number {
  const sd = stdev(returns);
  return sd > 0 ? (mean(returns) / sd) * Math.sqrt(TRADING_DAYS) : 0;
}

/**
 * Compounds percent returns and measures the path's deepest fall.
 */
export function compoundPath(returns: readonly number[]): SimulationPath {
  let growth = 1;
  let peak = 0;
  let maxDrawdown = 0;
  for (const r of returns) {
    growth *= 1 + r / 100;
    const cumulative = growth - 1;
    peak = Math.max(peak, cumulative);
    maxDrawdown = Math.max(maxDrawdown, ((peak - cumulative) / (1 + peak)) * 100);
  }
  return { finalReturn: (growth - 1) * 100, maxDrawdown, sharpe: pathSharpe(returns) };
}

// =============================================================================
// SIMULATOR
// =============================================================================

export class MonteCarloSimulator {
  private lastPaths: SimulationPath[] = [];

  constructor(private readonly rng: Rng = Math.random) {}

  get paths(): readonly SimulationPath[] {
    return this.lastPaths;
  }

  simulate(trades: readonly TradeReturn[], numSimulations = 1000, confidenceLevel = 0.95): MonteCarloResult | null {
    if (trades.length < MIN_TRADES) {
      log.warn(`Insufficient trades for Monte Carlo simulation: ${trades.length}`);
      return null;
    }

    const returns = trades.map((t) => t.pnlPct);
    const mu = mean(returns);
    const sigma = stdev(returns);
    const normal = gaussian(this.rng);

    const paths: SimulationPath[] = [];
    for (let s = 0; s < numSimulations; s++) {
      const draws = returns.map(() => mu + sigma * normal());
      paths.push(compoundPath(draws));
    }
    this.lastPaths = paths;

    const finals = paths.map((p) => p.finalReturn);
    const drawdowns = paths.map((p) => p.maxDrawdown);
    const sharpes = paths.map((p) => p.sharpe);
    const risk = valueAtRisk(finals, confidenceLevel);

    return {
      numSimulations,
      confidenceLevel,
      meanReturn: mean(finals),
      medianReturn: percentile(finals, 50),
      stdReturn: stdev(finals),
      maxReturn: Math.max(...finals),
      minReturn: Math.min(...finals),
      var: risk.var,
      cvar: risk.cvar,
      probProfit: (finals.filter((r) => r > 0).length / numSimulations) * 100,
      probLoss: (finals.filter((r) => r < 0).length / numSimulations) * 100,
      meanDrawdown: mean(drawdowns),
      maxDrawdown95: percentile(drawdowns, 95),
      meanSharpe: mean(sharpes),
      sharpe95: percentile(sharpes, 95),
    };
  }

  /**
   * Resamples the trade returns with replacement; each path's return is the
   * plain sum of its sample.
   */
  bootstrap(trades: readonly TradeReturn[], numSimulations = 1000, sampleSize?: number): BootstrapResult | null {
    if (trades.length < MIN_TRADES) {
      log.warn(`Insufficient trades for bootstrap: ${trades.length}`);
      return null;
    }

    const returns = trades.map((t) => t.pnlPct);
    const size = sampleSize ?? returns.length;
    const finals: number[] = [];
    for (let s = 0; s < numSimulations; s++) {
      let total = 0;
      for (let k = 0; k < size; k++) {
        total += returns[Math.floor(this.rng() * returns.length)];
      }
      finals.push(total);
    }

    return {
      numSimulations,
      meanReturn: mean(finals),
      medianReturn: percentile(finals, 50),
      stdReturn: stdev(finals),
      percentile5: percentile(finals, 5),
      percentile25: percentile(finals, 25),
      percentile75: percentile(finals, 75),
      percentile95: percentile(finals, 95),
      probProfit: (finals.filter((r) => r > 0).length / numSimulations) * 100,
    };
  }
}
