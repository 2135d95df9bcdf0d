/**
 * @fileoverview Volume-at-price profile
 * @module features/analysis/volume-profile
 *
 * Spreads each candle's volume over the price bins its range overlaps, then
 * derives the point of control and the 70% value area.
 */

import type { Candle } from '../../shared/types/index.js';
import { mean, sum } from '../../shared/utils/math.js';

// =============================================================================
// TYPES
// =============================================================================

export interface VolumeNode {
  /** Bin midpoint */
  price: number;
  low: number;
  high: number;
  volume: number;
  buyVolume: number;
  sellVolume: number;
  /** Candles that touched the bin */
  touches: number;
}

export interface VolumeProfile {
  poc: number;
  vah: number;
  val: number;
  /** Lowest bin first */
  nodes: VolumeNode[];
  isExpanding: boolean;
  /** Percent of volume on bullish candles */
  buyRatio: number;
  sellRatio: number;
}

export type ValueAreaPosition = 'IN_VA' | 'BELOW_VA' | 'ABOVE_VA';

export interface ImbalanceZone {
  price: number;
  type: 'buy_imbalance' | 'sell_imbalance';
  /** Percent of the bin's volume on the dominant side */
  strength: number;
  volume: number;
}

export interface VolumeProfileOptions {
  bins?: number;
  periods?: number;
  valueAreaPct?: number;
}

// =============================================================================
// PROFILE
// =============================================================================

export function volumeProfile(candles: readonly Candle[], options: VolumeProfileOptions = {}): VolumeProfile {
  const { bins: binCount = 20, periods = 50, valueAreaPct = 0.7 } = options;
  const recent = candles.slice(-periods);

  if (recent.length === 0) {
    return { poc: 0, vah: 0, val: 0, nodes: [], isExpanding: false, buyRatio: 50, sellRatio: 50 };
  }

  const minPrice = Math.min(...recent.map((c) => c[3]));
  let maxPrice = Math.max(...recent.map((c) => c[2]));
  if (maxPrice <= minPrice) {
    maxPrice = minPrice + 1;
  }
  const binSize = (maxPrice - minPrice) / binCount;

  const nodes: VolumeNode[] = Array.from({ length: binCount }, (_, i) => {
    const low = minPrice + i * binSize;
    return { price: low + binSize / 2, low, high: low + binSize, volume: 0, buyVolume: 0, sellVolume: 0, touches: 0 };
  });

  let totalBuy = 0;
  let totalSell = 0;

  for (const [, open, high, low, close, volume] of recent) {
    const range = high - low;
    if (range <= 0) {
      continue;
    }
    const bullish = close > open;
    for (const node of nodes) {
      const overlap = Math.min(high, node.high) - Math.max(low, node.low);
      if (overlap <= 0) {
        continue;
      }
      const share = volume * (overlap / range);
      node.volume += share;
      node.touches++;
      if (bullish) {
        node.buyVolume += share;
        totalBuy += share;
      } else {
        node.sellVolume += share;
        totalSell += share;
      }
    }
  }

  const byVolume = [...nodes].sort((a, b) => b.volume - a.volume);
  const poc = byVolume[0].price;

  const target = sum(nodes.map((n) => n.volume)) * valueAreaPct;
  const valueArea: VolumeNode[] = [];
  let accumulated = 0;
  for (const node of byVolume) {
    if (accumulated >= target) {
      break;
    }
    valueArea.push(node);
    accumulated += node.volume;
  }

  const vah = valueArea.length > 0 ? Math.max(...valueArea.map((n) => n.high)) : maxPrice;
  const val = valueArea.length > 0 ? Math.min(...valueArea.map((n) => n.low)) : minPrice;

  const volumesRecent = recent.slice(-10).map((c) => c[5]);
  const volumesOlder = recent.slice(-20, -10).map((c) => c[5]);
  const isExpanding = mean(volumesRecent) > mean(volumesOlder) * 1.2;

  const totalSided = totalBuy + totalSell;
  return {
    poc,
    vah,
    val,
    nodes,
    isExpanding,
    buyRatio: totalSided > 0 ? (totalBuy / totalSided) * 100 : 50,
    sellRatio: totalSided > 0 ? (totalSell / totalSided) * 100 : 50,
  };
}

// =============================================================================
// QUERIES
// =============================================================================

export function valueAreaPosition(price: number, profile: VolumeProfile): ValueAreaPosition {
  if (price < profile.val) {
    return 'BELOW_VA';
  }
  if (price > profile.vah) {
    return 'ABOVE_VA';
  }
  return 'IN_VA';
}

/**
 * Nodes holding at least `thresholdPct` percent of the busiest node's volume.
 */
export function highVolumeNodes(profile: VolumeProfile, thresholdPct = 70): Array<{ price: number; volume: number; volumePct: number }> {
  const max = Math.max(0, ...profile.nodes.map((n) => n.volume));
  if (max === 0) {
    return [];
  }
  return profile.nodes
    .filter((n) => n.volume >= max * (thresholdPct / 100))
    .map((n) => ({ price: n.price, volume: n.volume, volumePct: (n.volume / max) * 100 }));
}

export function imbalanceZones(profile: VolumeProfile, thresholdPct = 60): ImbalanceZone[] {
  const zones: ImbalanceZone[] = [];
  for (const node of profile.nodes) {
    const total = node.buyVolume + node.sellVolume;
    if (total === 0) {
      continue;
    }
    const buyPct = (node.buyVolume / total) * 100;
    const sellPct = (node.sellVolume / total) * 100;
    if (buyPct >= thresholdPct) {
      zones.push({ price: node.price, type: 'buy_imbalance', strength: buyPct, volume: node.volume });
    } else if (sellPct >= thresholdPct) {
      zones.push({ price: node.price, type: 'sell_imbalance', strength: sellPct, volume: node.volume });
    }
  }
  return zones;
}

/**
 * Signed volume over the last `period` candles: bullish candles add, bearish
 * subtract, dojis are ignored.
 */
export function volumeDelta(candles: readonly Candle[], period = 10): number {
  let delta = 0;
  for (const [, open, , , close, volume] of candles.slice(-period)) {
    if (close > open) {
      delta += volume;
    } else if (close < open) {
      delta -= volume;
    }
  }
  return delta;
}
