/**
 * @fileoverview Position sizing from account risk and stop distance
 * @module features/risk/position-sizing
 *
 * The base position risks `riskPerTrade` percent of the account over the
 * stop distance. It is then scaled for volatility, market sentiment and
 * market type, capped at `maxPositionPct` of the account and blocked below
 * `minPositionSize`.
 */

import type { SentinelConfig } from '../../config/index.js';
import type { MarketType, PositionSize, SizedPosition } from '../../shared/types/index.js';
import { round, sum } from '../../shared/utils/math.js';

export interface SizingRequest {
  accountSize: number;
  entry: number;
  stopLoss: number;
  atrPct?: number;
  /** Fear & greed index, 0-100 */
  fearIndex?: number;
  marketType?: MarketType;
  /** Overrides the configured risk per trade */
  riskPct?: number;
}

export interface ScaledEntry {
  entry: number;
  positionUsd: number;
  contracts: number;
}

export type ScaledEntryPlan =
  | { blocked: false; entries: ScaledEntry[]; totalPositionUsd: number; totalRiskUsd: number; avgEntry: number }
  | { blocked: true; reason: string };

export interface PyramidAddition {
  addPrice: number;
  addSizeUsd: number;
  addContracts: number;
  newAvgEntry: number;
  newTotalSize: number;
  newTotalContracts: number;
}

export const MARKET_SIZE_MULTIPLIER: Record<MarketType, number> = {
  trending: 1.0,
  choppy: 0.8,
  high_vol: 0.5,
  unknown: 0.9,
};

const MIN_STOP_PCT = 0.1;
const MAX_STOP_PCT = 5.0;

const blocked = (reason: string): PositionSize => ({ blocked: true, reason });

export class PositionSizer {
  constructor(private readonly config: Pick<SentinelConfig, 'risk' | 'atr'>) {}

  calculate(request: SizingRequest): PositionSize {
    const { accountSize, entry, stopLoss } = request;
    const atrPct = request.atrPct ?? 1.0;
    const fearIndex = request.fearIndex ?? 50;
    const marketType = request.marketType ?? 'unknown';

    if (accountSize <= 0) {
      return blocked('Invalid account size');
    }
    if (entry <= 0 || stopLoss <= 0) {
      return blocked('Invalid price levels');
    }
    if (entry === stopLoss) {
      return blocked('Entry equals stop loss');
    }

    const stopDistancePct = (Math.abs(entry - stopLoss) / entry) * 100;
    if (stopDistancePct < MIN_STOP_PCT) {
      return blocked(`Stop too tight: ${stopDistancePct.toFixed(2)}%`);
    }
    if (stopDistancePct > MAX_STOP_PCT) {
      return blocked(`Stop too wide: ${stopDistancePct.toFixed(2)}%`);
    }

    const riskPct = request.riskPct ?? this.config.risk.riskPerTrade;
    const riskUsd = accountSize * (riskPct / 100);

    let positionUsd = riskUsd / (stopDistancePct / 100);
    positionUsd *= this.atrMultiplier(atrPct);
    positionUsd *= fearMultiplier(fearIndex);
    positionUsd *= MARKET_SIZE_MULTIPLIER[marketType];

    const maxPosition = accountSize * (this.config.risk.maxPositionPct / 100);
    positionUsd = Math.min(positionUsd, maxPosition);

    if (positionUsd < this.config.risk.minPositionSize) {
      return blocked(`Position too small: $${positionUsd.toFixed(2)}`);
    }

    return {
      blocked: false,
      positionUsd: round(positionUsd, 2),
      contracts: round(positionUsd / entry, 4),
      riskUsd: round(riskUsd, 2),
      riskPct,
      stopDistancePct: round(stopDistancePct, 2),
      atrPct: round(atrPct, 2),
      fearIndex,
      entry,
      stopLoss,
      leverage: positionUsd / accountSize,
      maxPosition,
    };
  }

  /**
   * Spreads `count` entries evenly from `entryMin` to `entryMax`, each
   * risking an equal share of the per-trade risk.
   */
  calculateScaledEntry(
    accountSize: number,
    entryMin: number,
    entryMax: number,
    stopLoss: number,
    count = 3
  ): ScaledEntryPlan {
    const n = Math.max(1, Math.floor(count));
    const step = n > 1 ? (entryMax - entryMin) / (n - 1) : 0;
    const riskPct = this.config.risk.riskPerTrade / n;

    const entries: ScaledEntry[] = [];
    let totalRiskUsd = 0;
    for (let i = 0; i < n; i++) {
      const entry = entryMin + step * i;
      const position = this.calculate({ accountSize, entry, stopLoss, riskPct });
      if (!position.blocked) {
        entries.push({ entry, positionUsd: position.positionUsd, contracts: position.contracts });
        totalRiskUsd += position.riskUsd;
      }
    }

    if (entries.length === 0) {
      return { blocked: true, reason: 'No valid entries' };
    }

    const totalPositionUsd = sum(entries.map((e) => e.positionUsd));
    return {
      blocked: false,
      entries,
      totalPositionUsd,
      totalRiskUsd,
      avgEntry: sum(entries.map((e) => e.entry * e.positionUsd)) / totalPositionUsd,
    };
  }

  /**
   * Adds `addSizePct` of the base position at `addPrice`, keeping the base
   * stop.
   */
  calculatePyramid(base: PositionSize, addPrice: number, addSizePct = 0.5): PyramidAddition | null {
    if (base.blocked || addPrice <= 0) {
      return null;
    }
    return pyramid(base, addPrice, addSizePct);
  }

  private atrMultiplier(atrPct: number): number {
    if (atrPct > this.config.atr.maxPct) return 0;
    if (atrPct > 2.5) return 0.5;
    if (atrPct < 0.5) return 0.7;
    return 1;
  }
}

export function fearMultiplier(fearIndex: number): number {
  if (fearIndex < 20) return 0.5;
  if (fearIndex < 40) return 0.8;
  if (fearIndex > 75) return 0.3;
  if (fearIndex > 60) return 0.7;
  return 1;
}

function pyramid(base: SizedPosition, addPrice: number, addSizePct: number): PyramidAddition {
  const addSizeUsd = base.positionUsd * addSizePct;
  const addContracts = addSizeUsd / addPrice;
  const newTotalSize = base.positionUsd + addSizeUsd;
  return {
    addPrice,
    addSizeUsd,
    addContracts,
    newAvgEntry: (base.entry * base.positionUsd + addPrice * addSizeUsd) / newTotalSize,
    newTotalSize,
    newTotalContracts: base.contracts + addContracts,
  };
}
