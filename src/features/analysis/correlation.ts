/**
 * @fileoverview Return correlations between pairs
 * @module features/analysis/correlation
 */

import { BTC_SYMBOL } from '../../shared/constants/index.js';
import { clamp, mean, round } from '../../shared/utils/math.js';

// =============================================================================
// TYPES
// =============================================================================

export type Sector = 'MAJOR' | 'LAYER1' | 'MEME' | 'ORACLE' | 'DEFI' | 'OTHER';

export interface CorrelationResult {
  btc: number;
  eth: number;
  market: number;
  sector: number;
  /** Change over the window differs from BTC's by more than 5 points */
  isDiverging: boolean;
  strength: 'STRONG' | 'MODERATE' | 'WEAK' | 'UNKNOWN';
  reason: string;
}

/** Close series keyed by unified symbol */
export type PriceSeries = Record<string, readonly number[]>;

const ETH_SYMBOL = 'ETH/USDT';
const UNDEFINED_CORRELATION = 0.5;
const DIVERGENCE_THRESHOLD = 0.05;

const SECTOR_KEYWORDS: ReadonlyArray<[string, Sector]> = [
  ['btc', 'MAJOR'],
  ['eth', 'MAJOR'],
  ['sol', 'LAYER1'],
  ['ada', 'LAYER1'],
  ['doge', 'MEME'],
  ['shib', 'MEME'],
  ['link', 'ORACLE'],
  ['uni', 'DEFI'],
  ['aave', 'DEFI'],
];

// =============================================================================
// MATH
// =============================================================================

/** Simple returns; steps from a non-positive price are skipped. */
export function returns(prices: readonly number[]): number[] {
  const output: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    if (prices[i - 1] > 0) {
      output.push((prices[i] - prices[i - 1]) / prices[i - 1]);
    }
  }
  return output;
}

/**
 * Pearson correlation. 0.5 for mismatched lengths, fewer than two points or
 * a flat series.
 */
export function pearson(x: readonly number[], y: readonly number[]): number {
  if (x.length !== y.length || x.length < 2) {
    return UNDEFINED_CORRELATION;
  }
  const mx = mean(x);
  const my = mean(y);
  let cov = 0;
  let vx = 0;
  let vy = 0;
  for (let i = 0; i < x.length; i++) {
    const dx = x[i] - mx;
    const dy = y[i] - my;
    cov += dx * dy;
    vx += dx * dx;
    vy += dy * dy;
  }
  if (vx === 0 || vy === 0) {
    return UNDEFINED_CORRELATION;
  }
  return clamp(cov / Math.sqrt(vx * vy), -1, 1);
}

/** Element-wise mean of equal-length series. */
function averageSeries(series: readonly number[][]): number[] {
  const length = Math.min(...series.map((s) => s.length));
  return Array.from({ length }, (_, i) => mean(series.map((s) => s[i])));
}

export function sectorOf(symbol: string): Sector {
  const lower = symbol.toLowerCase();
  for (const [keyword, sector] of SECTOR_KEYWORDS) {
    if (lower.includes(keyword)) {
      return sector;
    }
  }
  return 'OTHER';
}

/**
 * Regression beta of `symbol1` returns on `symbol2` returns, 1 when it
 * cannot be computed.
 */
export function hedgeRatio(symbol1: string, symbol2: string, prices: PriceSeries, lookback = 50): number {
  const p1 = prices[symbol1]?.slice(-lookback);
  const p2 = prices[symbol2]?.slice(-lookback);
  if (!p1 || !p2 || p1.length !== p2.length || p1.length < 20) {
    return 1;
  }
  const r1 = returns(p1);
  const r2 = returns(p2);
  if (r1.length !== r2.length) {
    return 1;
  }
  const m1 = mean(r1);
  const m2 = mean(r2);
  let cov = 0;
  let variance = 0;
  for (let i = 0; i < r1.length; i++) {
    cov += (r1[i] - m1) * (r2[i] - m2);
    variance += (r2[i] - m2) ** 2;
  }
  return variance === 0 ? 1 : cov / variance;
}

// =============================================================================
// ANALYZER
// =============================================================================

interface CorrelationSample {
  btc: number;
  market: number;
}

export class CorrelationAnalyzer {
  private readonly history = new Map<string, CorrelationSample[]>();

  constructor(private readonly historySize = 50) {}

  analyze(symbol: string, prices: PriceSeries, lookback = 20): CorrelationResult {
    const symbolPrices = prices[symbol];
    if (!symbolPrices) {
      return this.undetermined('UNKNOWN', 'Insufficient data');
    }
    const btcPrices = prices[BTC_SYMBOL] ?? [];
    if (symbolPrices.length < lookback || btcPrices.length < lookback) {
      return this.undetermined('WEAK', 'Insufficient history');
    }

    const own = returns(symbolPrices.slice(-lookback));
    const btc = pearson(own, returns(btcPrices.slice(-lookback)));
    const eth = pearson(own, returns((prices[ETH_SYMBOL] ?? []).slice(-lookback)));

    const others = Object.entries(prices)
      .filter(([pair, series]) => pair !== BTC_SYMBOL && pair !== ETH_SYMBOL && series.length >= lookback)
      .map(([, series]) => returns(series.slice(-lookback)));
    const market = others.length > 0 ? pearson(own, averageSeries(others)) : UNDEFINED_CORRELATION;

    const sector = sectorOf(symbol);
    const peers = Object.entries(prices)
      .filter(([pair, series]) => pair !== symbol && sectorOf(pair) === sector && series.length >= lookback)
      .map(([, series]) => returns(series.slice(-lookback)));
    const sectorCorr = peers.length > 0 ? pearson(own, averageSeries(peers)) : UNDEFINED_CORRELATION;

    const isDiverging = this.isDiverging(symbolPrices, btcPrices, lookback);

    let strength: CorrelationResult['strength'];
    let reason: string;
    if (Math.abs(btc) > 0.7) {
      strength = 'STRONG';
      reason = 'High BTC correlation';
    } else if (Math.abs(btc) > 0.4) {
      strength = 'MODERATE';
      reason = 'Moderate BTC correlation';
    } else {
      strength = 'WEAK';
      reason = 'Low BTC correlation';
    }

    const samples = this.history.get(symbol) ?? [];
    samples.push({ btc, market });
    if (samples.length > this.historySize) {
      samples.shift();
    }
    this.history.set(symbol, samples);

    return {
      btc: round(btc, 3),
      eth: round(eth, 3),
      market: round(market, 3),
      sector: round(sectorCorr, 3),
      isDiverging,
      strength,
      reason,
    };
  }

  /**
   * Other symbols ranked by absolute return correlation with `symbol`.
   */
  bestCorrelatedPairs(symbol: string, prices: PriceSeries, topN = 3): Array<[string, number]> {
    const own = prices[symbol];
    if (!own) {
      return [];
    }
    const ownReturns = returns(own.slice(-20));
    return Object.entries(prices)
      .filter(([pair]) => pair !== symbol)
      .map(([pair, series]): [string, number] => [pair, Math.abs(pearson(ownReturns, returns(series.slice(-20))))])
      .sort((a, b) => b[1] - a[1])
      .slice(0, topN);
  }

  recentSamples(symbol: string): number {
    return this.history.get(symbol)?.length ?? 0;
  }

  private isDiverging(symbolPrices: readonly number[], btcPrices: readonly number[], lookback: number): boolean {
    const s0 = symbolPrices[symbolPrices.length - lookback];
    const b0 = btcPrices[btcPrices.length - lookback];
    if (s0 <= 0 || b0 <= 0) {
      return false;
    }
    const symbolChange = (symbolPrices[symbolPrices.length - 1] - s0) / s0;
    const btcChange = (btcPrices[btcPrices.length - 1] - b0) / b0;
    return Math.abs(symbolChange - btcChange) > DIVERGENCE_THRESHOLD;
  }

  private undetermined(strength: CorrelationResult['strength'], reason: string): CorrelationResult {
    const u = UNDEFINED_CORRELATION;
    return { btc: u, eth: u, market: u, sector: u, isDiverging: false, strength, reason };
  }
}
