/**
 * @fileoverview Live engine state held in a Zustand vanilla store
 * @module shared/store
 *
 * The engine writes market type, BTC regime and signal counters here; the
 * scheduler, health checker and HTTP surface read or subscribe to them.
 */

import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import type { BtcRegimeResult, MarketType, Signal } from '../types/index.js';
import { UNKNOWN_REGIME } from '../types/index.js';

/** Recent signals kept for status output */
export const RECENT_SIGNALS_LIMIT = 50;

// =============================================================================
// STATE INTERFACE
// =============================================================================

export interface EngineState {
  // -------------------------------------------------------------------------
  // Market
  // -------------------------------------------------------------------------

  marketType: MarketType;
  btcRegime: BtcRegimeResult;
  btcDataReady: boolean;
  btcCandles: number;

  // -------------------------------------------------------------------------
  // Signals
  // -------------------------------------------------------------------------

  dailySignals: number;
  /** Epoch ms of the last signal per symbol */
  lastSignalTime: Record<string, number>;
  recentSignals: Signal[];

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  running: boolean;
  /** Set by an emergency stop; evaluation is skipped while true */
  paused: boolean;

  // -------------------------------------------------------------------------
  // Actions
  // -------------------------------------------------------------------------

  setMarketType: (marketType: MarketType) => void;
  setBtcRegime: (regime: BtcRegimeResult) => void;
  setBtcData: (candles: number, ready: boolean) => void;
  recordSignal: (signal: Signal, at: number) => void;
  setRunning: (running: boolean) => void;
  setPaused: (paused: boolean) => void;
  resetDaily: () => void;
}

type EngineData = Omit<
  EngineState,
  'setMarketType' | 'setBtcRegime' | 'setBtcData' | 'recordSignal' | 'setRunning' | 'setPaused' | 'resetDaily'
>;

// =============================================================================
// INITIAL STATE
// =============================================================================

function initialState(): EngineData {
  return {
    marketType: 'unknown',
    btcRegime: UNKNOWN_REGIME,
    btcDataReady: false,
    btcCandles: 0,
    dailySignals: 0,
    lastSignalTime: {},
    recentSignals: [],
    running: false,
    paused: false,
  };
}

// =============================================================================
// STORE FACTORY
// =============================================================================

/**
 * Creates an engine store. Each engine owns one, so tests get a fresh copy.
 *
 * @example
 * ```typescript
 * const store = createEngineStore();
 * store.subscribe((s) => s.marketType, (type) => log.info(`Market: ${type}`));
 * store.getState().setMarketType('trending');
 * ```
 */
export function createEngineStore(overrides: Partial<EngineData> = {}) {
  return createStore<EngineState>()(
    subscribeWithSelector((set) => ({
      ...initialState(),
      ...overrides,

      setMarketType: (marketType) => set({ marketType }),

      setBtcRegime: (btcRegime) => set({ btcRegime }),

      setBtcData: (btcCandles, btcDataReady) => set({ btcCandles, btcDataReady }),

      recordSignal: (signal, at) =>
        set((state) => ({
          dailySignals: state.dailySignals + 1,
          lastSignalTime: { ...state.lastSignalTime, [signal.symbol]: at },
          recentSignals: [...state.recentSignals, signal].slice(-RECENT_SIGNALS_LIMIT),
        })),

      setRunning: (running) => set({ running }),

      setPaused: (paused) => set({ paused }),

      resetDaily: () => set({ dailySignals: 0, lastSignalTime: {} }),
    }))
  );
}

export type EngineStore = ReturnType<typeof createEngineStore>;
