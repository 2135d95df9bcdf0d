/**
 * @fileoverview Tests for the exchange REST client against a fake fetch
 */

import { describe, it, expect, vi } from 'vitest';
import { ExchangeConfigSchema } from '../../../config/index.js';
import { RetryExecutor } from '../../../shared/utils/retry.js';
import { ExchangeClient } from '../exchange-client.js';
import { HttpClient, type FetchLike } from '../http-client.js';

const FEAR_GREED_URL = 'https://fng.test/fng/';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function createClient(fetchFn: FetchLike): ExchangeClient {
  return new ExchangeClient({
    exchange: ExchangeConfigSchema.parse({}),
    fearGreedUrl: FEAR_GREED_URL,
    http: new HttpClient({ fetchFn }),
    retry: new RetryExecutor({ maxRetries: 1 }, { sleep: () => Promise.resolve() }),
  });
}

describe('ExchangeClient', () => {
  describe('fetchOhlcv', () => {
    it('maps symbols and parses string prices', async () => {
      const fetchFn = vi.fn<FetchLike>().mockResolvedValue(
        jsonResponse([
          [1000, '1', '2', '0.5', '1.5', '10', 1899, '15'],
          [2000, '1.5', '2.5', '1', '2', '12', 2899, '24'],
        ])
      );
      const client = createClient(fetchFn);

      const candles = await client.fetchOhlcv('BTC/USDT', '15m', 2);

      expect(candles).toEqual([
        [1000, 1, 2, 0.5, 1.5, 10],
        [2000, 1.5, 2.5, 1, 2, 12],
      ]);
      expect(fetchFn.mock.calls[0][0]).toBe('https://fapi.binance.com/fapi/v1/klines?symbol=BTCUSDT&interval=15m&limit=2');
    });

    it('retries and falls back to an empty list', async () => {
      const fetchFn = vi.fn<FetchLike>().mockImplementation(() => Promise.resolve(jsonResponse({ msg: 'down' }, 503)));
      const client = createClient(fetchFn);

      await expect(client.fetchOhlcv('ETH/USDT', '1h')).resolves.toEqual([]);
      expect(fetchFn).toHaveBeenCalledTimes(2);
    });

    it('does not retry client errors', async () => {
      const fetchFn = vi.fn<FetchLike>().mockImplementation(() => Promise.resolve(jsonResponse({ msg: 'bad symbol' }, 400)));
      const client = createClient(fetchFn);

      await expect(client.fetchOhlcv('NOPE/USDT', '1h')).resolves.toEqual([]);
      expect(fetchFn).toHaveBeenCalledTimes(1);
    });
  });

  it('fetchMultiple keys results by symbol', async () => {
    const fetchFn: FetchLike = (url) =>
      Promise.resolve(jsonResponse(url.includes('BTCUSDT') ? [[1, 1, 1, 1, 1, 1]] : [[2, 2, 2, 2, 2, 2]]));
    const client = createClient(fetchFn);

    await expect(client.fetchMultiple(['BTC/USDT', 'ETH/USDT'], '5m', 1)).resolves.toEqual({
      'BTC/USDT': [[1, 1, 1, 1, 1, 1]],
      'ETH/USDT': [[2, 2, 2, 2, 2, 2]],
    });
  });

  it('fetchHistorical trims the range and stops on a short page', async () => {
    const fetchFn = vi.fn<FetchLike>().mockResolvedValue(
      jsonResponse([
        [1000, 1, 1, 1, 1, 1],
        [2000, 1, 1, 1, 1, 1],
        [6000, 1, 1, 1, 1, 1],
      ])
    );
    const client = createClient(fetchFn);

    const candles = await client.fetchHistorical('BTC/USDT', '1m', 1000, 5000);

    expect(candles.map((c) => c[0])).toEqual([1000, 2000]);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][0]).toContain('startTime=1000&endTime=5000');
  });

  it('fetchOrderbook converts levels to numbers', async () => {
    const client = createClient(() =>
      Promise.resolve(jsonResponse({ bids: [['100.5', '2']], asks: [['101', '3']], T: 1234 }))
    );

    await expect(client.fetchOrderbook('BTC/USDT', 5)).resolves.toEqual({
      bids: [[100.5, 2]],
      asks: [[101, 3]],
      timestamp: 1234,
    });
  });

  it('fetchTicker combines the 24h and book tickers', async () => {
    const fetchFn: FetchLike = (url) =>
      Promise.resolve(
        url.includes('/ticker/24hr')
          ? jsonResponse({ symbol: 'BTCUSDT', lastPrice: '65000', priceChangePercent: '-1.25', volume: '1200' })
          : jsonResponse({ bidPrice: '64999.5', askPrice: '65000.5' })
      );
    const client = createClient(fetchFn);

    await expect(client.fetchTicker('BTC/USDT')).resolves.toEqual({
      symbol: 'BTC/USDT',
      last: 65000,
      bid: 64999.5,
      ask: 65000.5,
      volume: 1200,
      changePct: -1.25,
    });
  });

  it('reads funding rate and open interest', async () => {
    const fetchFn: FetchLike = (url) =>
      Promise.resolve(
        url.includes('premiumIndex') ? jsonResponse({ lastFundingRate: '0.0001' }) : jsonResponse({ openInterest: '5300.5' })
      );
    const client = createClient(fetchFn);

    await expect(client.fetchFundingRate('BTC/USDT')).resolves.toBe(0.0001);
    await expect(client.fetchOpenInterest('BTC/USDT')).resolves.toBe(5300.5);
  });

  describe('fetchFearGreed', () => {
    it('reads the first value', async () => {
      const fetchFn = vi.fn<FetchLike>().mockResolvedValue(jsonResponse({ data: [{ value: '72' }] }));
      const client = createClient(fetchFn);

      await expect(client.fetchFearGreed()).resolves.toBe(72);
      expect(fetchFn.mock.calls[0][0]).toBe(FEAR_GREED_URL);
    });

    it('defaults to 50 when unavailable', async () => {
      const client = createClient(() => Promise.reject(new TypeError('fetch failed')));
      await expect(client.fetchFearGreed()).resolves.toBe(50);
    });
  });
});
