/**
 * @fileoverview In-memory market data cache
 * @module features/market-data/candle-cache
 *
 * Holds the most recent candles per symbol and timeframe plus the latest
 * order book and ticker per symbol. Both the REST seeding and the WebSocket
 * feed write here; the engine reads from it on every candle close.
 */

import type { Candle, OrderBook, Ticker } from '../../shared/types/index.js';
import { logger } from '../../shared/utils/logger.js';

const log = logger.child('cache');

// =============================================================================
// TYPES
// =============================================================================

interface Stamped<T> {
  value: T;
  updatedAt: number;
}

export interface CacheSizeStats {
  ohlcvKeys: number;
  totalCandles: number;
  orderbooks: number;
  tickers: number;
  hits: number;
  misses: number;
  /** Percent */
  hitRate: number;
}

// =============================================================================
// CANDLE CACHE
// =============================================================================

export class CandleCache {
  private readonly candles = new Map<string, Candle[]>();
  private readonly lastUpdate = new Map<string, number>();
  private readonly orderbooks = new Map<string, Stamped<OrderBook>>();
  private readonly tickers = new Map<string, Stamped<Ticker>>();
  private hits = 0;
  private misses = 0;

  constructor(
    readonly maxCandles = 100,
    private readonly now: () => number = Date.now
  ) {}

  static key(symbol: string, timeframe: string): string {
    return `ohlcv:${symbol}:${timeframe}`;
  }

  // ---------------------------------------------------------------------------
  // OHLCV
  // ---------------------------------------------------------------------------

  /**
   * Replaces the series, keeping the newest `maxCandles`.
   */
  set(symbol: string, timeframe: string, candles: readonly Candle[]): void {
    const key = CandleCache.key(symbol, timeframe);
    this.candles.set(key, candles.slice(-this.maxCandles));
    this.lastUpdate.set(key, this.now());
    log.debug(`SET ${key}: ${Math.min(candles.length, this.maxCandles)} candles`);
  }

  /**
   * Returns a copy of the series, optionally only the last `limit` candles.
   */
  get(symbol: string, timeframe: string, limit?: number): Candle[] {
    const series = this.candles.get(CandleCache.key(symbol, timeframe));
    if (!series || series.length === 0) {
      this.misses++;
      return [];
    }
    this.hits++;
    return limit !== undefined && limit > 0 ? series.slice(-limit) : series.slice();
  }

  /**
   * Replaces the last candle when the open time matches, otherwise appends.
   */
  update(symbol: string, timeframe: string, candle: Candle): void {
    const key = CandleCache.key(symbol, timeframe);
    const series = this.candles.get(key) ?? [];
    const last = series[series.length - 1];

    if (last && last[0] === candle[0]) {
      series[series.length - 1] = candle;
    } else {
      series.push(candle);
      if (series.length > this.maxCandles) {
        series.splice(0, series.length - this.maxCandles);
      }
    }

    this.candles.set(key, series);
    this.lastUpdate.set(key, this.now());
  }

  count(symbol: string, timeframe: string): number {
    return this.candles.get(CandleCache.key(symbol, timeframe))?.length ?? 0;
  }

  // ---------------------------------------------------------------------------
  // Order book and ticker
  // ---------------------------------------------------------------------------

  setOrderbook(symbol: string, orderbook: OrderBook): void {
    this.orderbooks.set(symbol, { value: orderbook, updatedAt: this.now() });
  }

  getOrderbook(symbol: string): OrderBook | undefined {
    return this.orderbooks.get(symbol)?.value;
  }

  setTicker(symbol: string, ticker: Ticker): void {
    this.tickers.set(symbol, { value: ticker, updatedAt: this.now() });
  }

  getTicker(symbol: string): Ticker | undefined {
    return this.tickers.get(symbol)?.value;
  }

  // ---------------------------------------------------------------------------
  // Metadata
  // ---------------------------------------------------------------------------

  getLastUpdate(symbol: string, timeframe: string): number | undefined {
    return this.lastUpdate.get(CandleCache.key(symbol, timeframe));
  }

  isStale(symbol: string, timeframe: string, maxAgeMs = 60000): boolean {
    const last = this.getLastUpdate(symbol, timeframe);
    return last === undefined || this.now() - last > maxAgeMs;
  }

  /**
   * Clears one series, every series of a symbol, or everything.
   */
  clear(symbol?: string, timeframe?: string): void {
    if (symbol !== undefined && timeframe !== undefined) {
      const key = CandleCache.key(symbol, timeframe);
      this.candles.delete(key);
      this.lastUpdate.delete(key);
      return;
    }

    if (symbol !== undefined) {
      const prefix = `ohlcv:${symbol}:`;
      for (const key of [...this.candles.keys()]) {
        if (key.startsWith(prefix)) {
          this.candles.delete(key);
          this.lastUpdate.delete(key);
        }
      }
      this.orderbooks.delete(symbol);
      this.tickers.delete(symbol);
      return;
    }

    this.candles.clear();
    this.lastUpdate.clear();
    this.orderbooks.clear();
    this.tickers.clear();
    this.hits = 0;
    this.misses = 0;
    log.info('Cleared all cache');
  }

  size(): CacheSizeStats {
    let totalCandles = 0;
    for (const series of this.candles.values()) {
      totalCandles += series.length;
    }
    const lookups = this.hits + this.misses;
    return {
      ohlcvKeys: this.candles.size,
      totalCandles,
      orderbooks: this.orderbooks.size,
      tickers: this.tickers.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? (this.hits / lookups) * 100 : 0,
    };
  }
}
