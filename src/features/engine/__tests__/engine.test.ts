/**
 * @fileoverview Unit tests for the live signal engine
 */

import { describe, it, expect, vi } from 'vitest';
import { createConfig } from '../../../config/index.js';
import { createEngineStore } from '../../../shared/store/index.js';
import type { Candle, OrderBook, Signal } from '../../../shared/types/index.js';
import type { FilterResult } from '../../filters/types.js';
import type { MarketDataSource } from '../../market-data/exchange-client.js';
import type { SocketFactory } from '../../market-data/kline-feed.js';
import { RiskManager } from '../../risk/risk-manager.js';
import { SignalEngine, btcRetryDelayMs, type SignalEngineOptions } from '../engine.js';

const NOW = new Date('2024-03-05T09:30:00Z');
const BOOK: OrderBook = { bids: [[99, 5]], asks: [[101, 5]], timestamp: 1 };

const rising = (count: number, start = 100): Candle[] =>
  Array.from({ length: count }, (_, i): Candle => [i * 900_000, start + i, start + i + 1, start + i - 1, start + i, 10]);

function fakeSource(candles: Candle[] = rising(60)) {
  return {
    fetchOhlcv: vi.fn(async (_symbol: string, _timeframe: string, _limit?: number) => candles),
    fetchOrderbook: vi.fn(async (_symbol: string) => BOOK),
    fetchTicker: vi.fn(async (symbol: string) => ({ symbol, last: 100, bid: 99, ask: 101, volume: 1, changePct: 0 })),
    fetchFundingRate: vi.fn(async (_symbol: string) => 0.0001),
    fetchOpenInterest: vi.fn(async (_symbol: string) => 5000),
    fetchFearGreed: vi.fn(async () => 50),
  } satisfies MarketDataSource;
}

const socketFactory: SocketFactory = () => ({ on: () => undefined, ping: () => undefined, close: () => undefined });

function setup(options: SignalEngineOptions = {}) {
  const source = fakeSource();
  const sleep = vi.fn(async (_ms: number) => undefined);
  const notifier = { sendSignal: vi.fn(async (_signal: Signal) => true) };
  const engine = new SignalEngine(createConfig({}), notifier, {
    source,
    socketFactory,
    sleep,
    now: () => NOW,
    ...options,
  });
  return { engine, source, sleep, notifier };
}

describe('btcRetryDelayMs', () => {
  it('grows by five seconds per attempt up to thirty', () => {
    expect(btcRetryDelayMs(0)).toBe(5000);
    expect(btcRetryDelayMs(4)).toBe(25000);
    expect(btcRetryDelayMs(5)).toBe(30000);
    expect(btcRetryDelayMs(9)).toBe(30000);
  });
});

describe('SignalEngine.canProcess', () => {
  it('waits for BTC data', () => {
    const { engine } = setup();
    expect(engine.canProcess('ETH/USDT')).toEqual({ allowed: false, reason: 'BTC data not ready' });
  });

  it('stops at the daily limit for the market type', () => {
    const { engine } = setup({ store: createEngineStore({ btcDataReady: true, dailySignals: 4 }) });
    expect(engine.canProcess('ETH/USDT')).toEqual({ allowed: false, reason: 'Daily signal limit reached (4/4)' });
  });

  it('applies the per-symbol cooldown', () => {
    const store = createEngineStore({
      btcDataReady: true,
      lastSignalTime: { 'ETH/USDT': NOW.getTime() - 5 * 60_000 },
    });
    const { engine } = setup({ store });

    expect(engine.canProcess('ETH/USDT')).toEqual({ allowed: false, reason: 'Cooldown (5.0/15 min)' });
    expect(engine.canProcess('SOL/USDT')).toEqual({ allowed: true, reason: 'OK' });
  });

  it('defers to the risk manager', () => {
    const riskManager = new RiskManager(createConfig({}), () => NOW);
    riskManager.approveTrade({
      symbol: 'BTC/USDT',
      direction: 'LONG',
      entry: 100,
      stopLoss: 98,
      takeProfit: 106,
      marketType: 'trending',
    });
    const { engine } = setup({ store: createEngineStore({ btcDataReady: true }), riskManager });

    expect(engine.canProcess('ETH/USDT')).toEqual({
      allowed: false,
      reason: 'Risk manager: Max concurrent trades: 1',
    });
  });

  it('respects the dynamic filter after a losing streak', () => {
    const { engine } = setup({ store: createEngineStore({ btcDataReady: true }) });
    engine.dynamicFilter.recordTradeResult(-1);
    engine.dynamicFilter.recordTradeResult(-1);

    expect(engine.canProcess('ETH/USDT')).toEqual({ allowed: false, reason: 'Dynamic filter paused trading' });
  });
});

describe('SignalEngine.dailyLimit', () => {
  it('reads the limit for the market type', () => {
    const { engine } = setup();
    expect(engine.dailyLimit()).toBe(4);

    engine.setMarketType('trending');
    expect(engine.dailyLimit()).toBe(5);

    engine.setMarketType('high_vol');
    expect(engine.dailyLimit()).toBe(2);
  });
});

describe('SignalEngine BTC loading', () => {
  it('retries until enough 15m candles arrive', async () => {
    const { engine, source, sleep } = setup();
    source.fetchOhlcv.mockResolvedValueOnce(rising(20));

    await expect(engine.forceFetchBtcData(3)).resolves.toBe(true);

    expect(sleep.mock.calls).toEqual([[5000]]);
    expect(engine.status()).toMatchObject({ btc_data_ready: true, btc_candles: 60 });
  });

  it('gives up after the last attempt', async () => {
    const { engine, source, sleep } = setup();
    source.fetchOhlcv.mockResolvedValue(rising(10));

    await expect(engine.forceFetchBtcData(3)).resolves.toBe(false);

    expect(sleep.mock.calls).toEqual([[5000], [10000]]);
    expect(engine.btcDataReady).toBe(false);
  });
});

describe('SignalEngine.seedCache', () => {
  it('loads BTC and every other pair on every timeframe', async () => {
    const { engine, source } = setup();
    source.fetchOhlcv.mockResolvedValue(rising(3));

    await engine.seedCache();

    expect(source.fetchOhlcv).toHaveBeenCalledTimes(17);
    expect(source.fetchOhlcv).toHaveBeenCalledWith('BTC/USDT', '15m', 100);
    expect(source.fetchOhlcv).toHaveBeenCalledWith('ETH/USDT', '4h', 100);
    expect(engine.cache.size().ohlcvKeys).toBe(17);
  });
});

describe('SignalEngine.gatherData', () => {
  it('returns null without 15m candles', async () => {
    const { engine } = setup();
    await expect(engine.gatherData('ETH/USDT')).resolves.toBeNull();
  });

  it('combines cached candles with live derivatives data', async () => {
    const { engine } = setup();
    await engine.fetchBtcOnce();
    engine.cache.set('ETH/USDT', '15m', rising(5, 2000));

    const data = await engine.gatherData('ETH/USDT');

    expect(data).toMatchObject({
      symbol: 'ETH/USDT',
      fundingRate: 0.0001,
      openInterest: 5000,
      orderbook: BOOK,
      currentPrice: 2004,
    });
    expect(data?.ohlcv['15m']).toHaveLength(5);
    expect(data?.ohlcv['1h']).toEqual([]);
    expect(data?.btc['1h']).toHaveLength(60);
  });
});

describe('SignalEngine.onCandleClose', () => {
  it('ignores other timeframes', async () => {
    const { engine, source } = setup({ store: createEngineStore({ btcDataReady: true }) });

    await engine.onCandleClose('ETH/USDT', '5m', rising(5));

    expect(source.fetchFundingRate).not.toHaveBeenCalled();
  });

  it('marks BTC ready from the feed and skips evaluation while paused', async () => {
    const { engine, source } = setup({ store: createEngineStore({ paused: true }) });

    await engine.onCandleClose('BTC/USDT', '15m', rising(50));

    expect(engine.status()).toMatchObject({ btc_data_ready: true, btc_candles: 50 });
    expect(engine.cache.get('BTC/USDT', '15m')).toHaveLength(50);
    expect(source.fetchFundingRate).not.toHaveBeenCalled();
  });

  it('does not evaluate before BTC is ready', async () => {
    const { engine, source } = setup();

    await engine.onCandleClose('ETH/USDT', '15m', rising(60));

    expect(source.fetchFundingRate).not.toHaveBeenCalled();
  });
});

const PASSED: FilterResult = {
  passed: true,
  tier1: null,
  tier2: null,
  tier3: null,
  score: 75,
  grade: 'B+',
  reason: 'All tiers passed',
  timestamp: NOW.toISOString(),
};

function makeSignal(symbol: string, overrides: Partial<Signal> = {}): Signal {
  return {
    symbol,
    direction: 'LONG',
    entry: 100,
    stopLoss: 98,
    takeProfit: 105,
    rrRatio: 2.5,
    score: 70,
    grade: 'B+',
    confidence: 70,
    marketType: 'unknown',
    btcRegime: 'unknown',
    structureStrength: 'MODERATE',
    filtersPassed: 8,
    timestamp: NOW.toISOString(),
    levels: {},
    keyFactors: [],
    positionSize: null,
    filterSummary: '8/10 filters passed',
    ...overrides,
  };
}

/** Engine with BTC loaded, an unknown market and filters that pass */
async function readyEngine(options: SignalEngineOptions = {}) {
  const context = setup(options);
  await context.engine.fetchBtcOnce();
  context.engine.setMarketType('unknown');
  context.engine.dynamicFilter.update('unknown');
  const filters = vi.spyOn(context.engine.filters, 'evaluate').mockReturnValue(PASSED);
  const generate = vi.spyOn(context.engine.generator, 'generate').mockImplementation((symbol) => makeSignal(symbol));
  return { ...context, filters, generate };
}

describe('SignalEngine.evaluate', () => {
  it('sizes, records and sends a signal that clears every stage', async () => {
    const { engine, notifier } = await readyEngine();
    engine.cache.set('ETH/USDT', '15m', rising(60, 2000));

    const signal = await engine.evaluate('ETH/USDT');

    expect(signal?.positionSize).toMatchObject({ blocked: false, positionUsd: 30000, entry: 100, stopLoss: 98 });
    expect(engine.store.getState().dailySignals).toBe(1);
    expect(engine.store.getState().lastSignalTime).toEqual({ 'ETH/USDT': NOW.getTime() });
    expect(engine.metrics.getAll().summary.totalSignals).toBe(1);
    expect(notifier.sendSignal).toHaveBeenCalledTimes(1);
    expect(notifier.sendSignal).toHaveBeenCalledWith(signal);
  });

  it('stops when the filters fail', async () => {
    const { engine, notifier, filters, generate } = await readyEngine();
    filters.mockReturnValue({ ...PASSED, passed: false, reason: 'Tier1 filters failed' });
    engine.cache.set('ETH/USDT', '15m', rising(60, 2000));

    await expect(engine.evaluate('ETH/USDT')).resolves.toBeNull();

    expect(generate).not.toHaveBeenCalled();
    expect(notifier.sendSignal).not.toHaveBeenCalled();
  });

  it('stops when no signal can be generated', async () => {
    const { engine, notifier, generate } = await readyEngine();
    generate.mockReturnValue(null);
    engine.cache.set('ETH/USDT', '15m', rising(60, 2000));

    await expect(engine.evaluate('ETH/USDT')).resolves.toBeNull();

    expect(notifier.sendSignal).not.toHaveBeenCalled();
  });

  it('rejects a score below the dynamic minimum', async () => {
    const { engine, notifier, generate } = await readyEngine();
    generate.mockImplementation((symbol) => makeSignal(symbol, { score: 55 }));
    engine.cache.set('ETH/USDT', '15m', rising(60, 2000));

    expect(engine.dynamicFilter.thresholds().minSignalScore).toBe(60);
    await expect(engine.evaluate('ETH/USDT')).resolves.toBeNull();

    expect(engine.store.getState().dailySignals).toBe(0);
    expect(notifier.sendSignal).not.toHaveBeenCalled();
  });

  it('drops a signal the position sizer blocks', async () => {
    const { engine, notifier, generate } = await readyEngine();
    generate.mockImplementation((symbol) => makeSignal(symbol, { stopLoss: 100 }));
    engine.cache.set('ETH/USDT', '15m', rising(60, 2000));

    await expect(engine.evaluate('ETH/USDT')).resolves.toBeNull();

    expect(engine.store.getState().dailySignals).toBe(0);
    expect(engine.store.getState().lastSignalTime).toEqual({});
    expect(notifier.sendSignal).not.toHaveBeenCalled();
  });
});

describe('SignalEngine simultaneous candle closes', () => {
  it('never sends past the daily limit', async () => {
    const { engine, notifier } = await readyEngine({ store: createEngineStore({ dailySignals: 3 }) });
    expect(engine.dailyLimit()).toBe(4);

    await Promise.all(
      ['ETH/USDT', 'SOL/USDT', 'XRP/USDT'].map((symbol) => engine.onCandleClose(symbol, '15m', rising(60, 2000)))
    );

    expect(engine.store.getState().dailySignals).toBe(4);
    expect(notifier.sendSignal).toHaveBeenCalledTimes(1);
  });

  it('sends once per symbol within the cooldown', async () => {
    const { engine, notifier } = await readyEngine();

    await Promise.all([
      engine.onCandleClose('ETH/USDT', '15m', rising(60, 2000)),
      engine.onCandleClose('ETH/USDT', '15m', rising(60, 2000)),
    ]);

    expect(engine.store.getState().dailySignals).toBe(1);
    expect(notifier.sendSignal).toHaveBeenCalledTimes(1);
  });
});

describe('SignalEngine results and status', () => {
  it('feeds a reported trade result to risk, filters and metrics', () => {
    const { engine } = setup();

    engine.onTradeResult('ETH/USDT', -0.5);

    expect(engine.riskManager.status().consecutiveLosses).toBe(1);
    expect(engine.dynamicFilter.recentTrades()).toHaveLength(1);
    expect(engine.metrics.getAll().summary).toMatchObject({ totalTrades: 1, losingTrades: 1, totalPnl: -0.5 });
  });

  it('resets the daily counters', () => {
    const { engine } = setup({ store: createEngineStore({ dailySignals: 3, lastSignalTime: { 'ETH/USDT': 1 } }) });

    engine.resetDaily();

    expect(engine.store.getState()).toMatchObject({ dailySignals: 0, lastSignalTime: {} });
  });

  it('reports status in the wire shape', () => {
    const { engine } = setup();

    expect(engine.status()).toEqual({
      market_type: 'unknown',
      btc_regime: 'unknown',
      btc_confidence: 0,
      btc_data_ready: false,
      btc_candles: 0,
      daily_signals: 0,
      daily_limit: 4,
      active_trades: 0,
      day_locked: false,
      paused: false,
    });
  });
});
