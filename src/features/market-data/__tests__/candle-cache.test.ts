/**
 * @fileoverview Tests for the candle cache
 */

import { describe, it, expect } from 'vitest';
import type { Candle, OrderBook } from '../../../shared/types/index.js';
import { CandleCache } from '../candle-cache.js';

function candle(t: number, close = 100): Candle {
  return [t, close, close + 1, close - 1, close, 10];
}

describe('CandleCache', () => {
  it('keeps only the newest maxCandles on set', () => {
    const cache = new CandleCache(3);
    cache.set('BTC/USDT', '15m', [candle(1), candle(2), candle(3), candle(4)]);

    expect(cache.get('BTC/USDT', '15m').map((c) => c[0])).toEqual([2, 3, 4]);
    expect(cache.get('BTC/USDT', '15m', 2).map((c) => c[0])).toEqual([3, 4]);
  });

  it('replaces the forming candle and appends new ones', () => {
    const cache = new CandleCache(3);
    cache.set('ETH/USDT', '5m', [candle(1), candle(2)]);

    cache.update('ETH/USDT', '5m', candle(2, 105));
    expect(cache.get('ETH/USDT', '5m')).toEqual([candle(1), candle(2, 105)]);

    cache.update('ETH/USDT', '5m', candle(3));
    cache.update('ETH/USDT', '5m', candle(4));
    expect(cache.get('ETH/USDT', '5m').map((c) => c[0])).toEqual([2, 3, 4]);
  });

  it('returns copies', () => {
    const cache = new CandleCache();
    cache.set('BTC/USDT', '1h', [candle(1)]);
    cache.get('BTC/USDT', '1h').push(candle(2));

    expect(cache.count('BTC/USDT', '1h')).toBe(1);
  });

  it('tracks staleness with the injected clock', () => {
    let now = 1_000_000;
    const cache = new CandleCache(100, () => now);

    expect(cache.isStale('BTC/USDT', '15m')).toBe(true);
    cache.set('BTC/USDT', '15m', [candle(1)]);
    now += 60_000;
    expect(cache.isStale('BTC/USDT', '15m')).toBe(false);
    now += 1;
    expect(cache.isStale('BTC/USDT', '15m')).toBe(true);
    expect(cache.isStale('BTC/USDT', '15m', 120_000)).toBe(false);
  });

  it('stores order books and tickers per symbol', () => {
    const cache = new CandleCache();
    const book: OrderBook = { bids: [[99, 1]], asks: [[101, 2]], timestamp: 5 };
    cache.setOrderbook('BTC/USDT', book);
    cache.setTicker('BTC/USDT', { symbol: 'BTC/USDT', last: 100, bid: 99, ask: 101, volume: 5, changePct: 1 });

    expect(cache.getOrderbook('BTC/USDT')).toEqual(book);
    expect(cache.getTicker('BTC/USDT')?.last).toBe(100);
    expect(cache.getOrderbook('ETH/USDT')).toBeUndefined();
  });

  it('clears by series, by symbol and entirely', () => {
    const cache = new CandleCache();
    cache.set('BTC/USDT', '15m', [candle(1)]);
    cache.set('BTC/USDT', '1h', [candle(1)]);
    cache.set('ETH/USDT', '15m', [candle(1), candle(2)]);
    cache.setTicker('BTC/USDT', { symbol: 'BTC/USDT', last: 1, bid: 1, ask: 1, volume: 1, changePct: 0 });

    cache.clear('BTC/USDT', '1h');
    expect(cache.size()).toMatchObject({ ohlcvKeys: 2, totalCandles: 3, tickers: 1 });

    cache.clear('BTC/USDT');
    expect(cache.size()).toMatchObject({ ohlcvKeys: 1, totalCandles: 2, tickers: 0 });

    cache.clear();
    expect(cache.size()).toEqual({
      ohlcvKeys: 0,
      totalCandles: 0,
      orderbooks: 0,
      tickers: 0,
      hits: 0,
      misses: 0,
      hitRate: 0,
    });
  });

  it('reports hit rate', () => {
    const cache = new CandleCache();
    cache.set('BTC/USDT', '15m', [candle(1)]);
    cache.get('BTC/USDT', '15m');
    cache.get('BTC/USDT', '15m');
    cache.get('BTC/USDT', '15m');
    cache.get('SOL/USDT', '15m');

    expect(cache.size()).toMatchObject({ hits: 3, misses: 1, hitRate: 75 });
  });
});
