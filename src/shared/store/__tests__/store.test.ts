/**
 * @fileoverview Unit tests for the engine state store
 */

import { describe, it, expect, vi } from 'vitest';
import type { Signal } from '../../types/index.js';
import { UNKNOWN_REGIME } from '../../types/index.js';
import { createEngineStore, RECENT_SIGNALS_LIMIT } from '../index.js';

function signal(symbol: string): Signal {
  return {
    symbol,
    direction: 'SHORT',
    entry: 100,
    stopLoss: 102,
    takeProfit: 95,
    rrRatio: 2.5,
    score: 70,
    grade: 'B+',
    confidence: 70,
    marketType: 'choppy',
    btcRegime: 'choppy',
    structureStrength: 'MODERATE',
    filtersPassed: 8,
    timestamp: '2024-03-05T09:30:00.000Z',
    levels: {},
    keyFactors: [],
    positionSize: null,
    filterSummary: '8/10 filters passed',
  };
}

describe('createEngineStore', () => {
  it('starts idle with an unknown market', () => {
    const state = createEngineStore().getState();

    expect(state.marketType).toBe('unknown');
    expect(state.btcRegime).toEqual(UNKNOWN_REGIME);
    expect(state.btcDataReady).toBe(false);
    expect(state.dailySignals).toBe(0);
    expect(state.running).toBe(false);
    expect(state.paused).toBe(false);
  });

  it('accepts initial overrides', () => {
    expect(createEngineStore({ marketType: 'trending', dailySignals: 3 }).getState()).toMatchObject({
      marketType: 'trending',
      dailySignals: 3,
    });
  });

  it('counts signals and remembers the last time per symbol', () => {
    const store = createEngineStore();

    store.getState().recordSignal(signal('ETH/USDT'), 1000);
    store.getState().recordSignal(signal('SOL/USDT'), 2000);
    store.getState().recordSignal(signal('ETH/USDT'), 3000);

    const state = store.getState();
    expect(state.dailySignals).toBe(3);
    expect(state.lastSignalTime).toEqual({ 'ETH/USDT': 3000, 'SOL/USDT': 2000 });
    expect(state.recentSignals.map((s) => s.symbol)).toEqual(['ETH/USDT', 'SOL/USDT', 'ETH/USDT']);
  });

  it('keeps only the most recent signals', () => {
    const store = createEngineStore();
    for (let i = 0; i < RECENT_SIGNALS_LIMIT + 5; i++) {
      store.getState().recordSignal(signal(`S${i}/USDT`), i);
    }

    const recent = store.getState().recentSignals;
    expect(recent).toHaveLength(RECENT_SIGNALS_LIMIT);
    expect(recent[0].symbol).toBe('S5/USDT');
  });

  it('clears the daily counters but keeps history on reset', () => {
    const store = createEngineStore();
    store.getState().recordSignal(signal('ETH/USDT'), 1000);

    store.getState().resetDaily();

    expect(store.getState().dailySignals).toBe(0);
    expect(store.getState().lastSignalTime).toEqual({});
    expect(store.getState().recentSignals).toHaveLength(1);
  });

  it('notifies selector subscribers only on change', () => {
    const store = createEngineStore();
    const listener = vi.fn();
    store.subscribe((s) => s.marketType, listener);

    store.getState().setMarketType('choppy');
    store.getState().setBtcData(50, true);
    store.getState().setMarketType('choppy');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith('choppy', 'unknown');
  });
});
