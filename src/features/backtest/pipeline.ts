/**
 * @fileoverview One backtest run with its optional analyses
 * @module features/backtest/pipeline
 */

import type { Candle } from '../../shared/types/index.js';
import { splitForBacktest } from '../market-data/historical.js';
import { BacktestEngine, type BacktestRange, type BacktestResult } from './engine.js';
import { MIN_TRADES, MonteCarloSimulator, type Rng } from './monte-carlo.js';
import { OverfittingDetector } from './overfitting.js';
import {
  backtestSummary,
  bootstrapSummary,
  monteCarloSummary,
  monthlyTable,
  overfittingSummary,
  walkForwardSummary,
} from './report.js';
import { WalkForwardAnalyzer, type WalkForwardOptions, type WalkForwardResult } from './walk-forward.js';

export interface PipelineOptions {
  symbol: string;
  range?: BacktestRange;
  /** Number of simulations; omitted or 0 skips Monte Carlo */
  monteCarlo?: number;
  walkForward?: WalkForwardOptions;
  overfitting?: boolean;
  engine?: BacktestEngine;
  rng?: Rng;
}

export interface PipelineOutput {
  result: BacktestResult;
  walkForward: WalkForwardResult | null;
  /** Report sections in print order */
  sections: string[];
}

export function runBacktestPipeline(candles: readonly Candle[], options: PipelineOptions): PipelineOutput {
  const engine = options.engine ?? new BacktestEngine();
  const result = engine.run(candles, options.symbol, options.range);
  const sections = [backtestSummary(result)];
  if (Object.keys(result.monthlyStats).length > 0) {
    sections.push(monthlyTable(result));
  }

  if (options.monteCarlo) {
    if (result.trades.length < MIN_TRADES) {
      sections.push(`Monte Carlo skipped: ${result.trades.length} trades, need ${MIN_TRADES}`);
    } else {
      const simulator = new MonteCarloSimulator(options.rng);
      const simulated = simulator.simulate(result.trades, options.monteCarlo);
      if (simulated) {
        sections.push(monteCarloSummary(simulated));
      }
      const resampled = simulator.bootstrap(result.trades, options.monteCarlo);
      if (resampled) {
        sections.push(bootstrapSummary(resampled));
      }
    }
  }

  let walkForward: WalkForwardResult | null = null;
  if (options.walkForward) {
    walkForward = new WalkForwardAnalyzer(engine).analyze(candles, options.symbol, options.walkForward);
    sections.push(walkForwardSummary(walkForward));
  }

  if (options.overfitting) {
    const split = splitForBacktest(candles);
    const train = engine.run(split.train, options.symbol);
    const test = engine.run(split.test, options.symbol);
    sections.push(overfittingSummary(new OverfittingDetector().detect(train, test)));
  }

  return { result, walkForward, sections };
}
