/**
 * @fileoverview Unit tests for tier 2 weighted scoring
 */

import { describe, it, expect } from 'vitest';
import type { Candle } from '../../../shared/types/index.js';
import { Tier2Filters, TIER2_THRESHOLDS } from '../tier2.js';
import { falling, rising, symbolData } from './fixtures.js';

const ATR = { minPct: 0.4, maxPct: 3.0 };

describe('Tier2Filters', () => {
  const filters = new Tier2Filters({}, ATR);

  it('scores only funding and open interest without candles', () => {
    const outcome = filters.evaluateAll(null, 'trending', symbolData());

    expect(outcome.score).toBeCloseTo(15);
    expect(outcome.passed).toBe(false);
    expect(outcome.threshold).toBe(60);
    expect(outcome.results.funding_rate).toEqual({
      passed: true,
      score: 10,
      weight: 10,
      message: 'Funding neutral (0.000%)',
    });
    expect(outcome.results.open_interest.message).toBe('OI data unavailable');
    expect(outcome.results.mtf_confirmation.message).toBe('Insufficient data');
  });

  it('uses a per-market threshold', () => {
    expect(TIER2_THRESHOLDS).toEqual({ trending: 60, choppy: 55, high_vol: 65, unknown: 60 });
    expect(filters.evaluateAll(null, 'high_vol', symbolData()).threshold).toBe(65);
  });

  it('scales points by configured weights', () => {
    const weighted = new Tier2Filters({ funding_rate: 20 }, ATR);
    const outcome = weighted.evaluateAll(null, 'trending', symbolData());

    expect(outcome.results.funding_rate.score).toBe(20);
    expect(outcome.results.funding_rate.weight).toBe(20);
    expect(outcome.score).toBeCloseTo(22.727, 3);
  });

  describe('funding', () => {
    it('penalises crowded funding on the trade side', () => {
      const long = filters.evaluateAll('LONG', 'trending', symbolData({ fundingRate: 0.0005 }));
      expect(long.results.funding_rate).toMatchObject({ passed: false, score: 0, message: 'High positive funding (0.050%)' });

      const short = filters.evaluateAll('SHORT', 'trending', symbolData({ fundingRate: -0.0005 }));
      expect(short.results.funding_rate.message).toBe('High negative funding (-0.050%)');
    });

    it('rewards funding paid by the other side', () => {
      const short = filters.evaluateAll('SHORT', 'trending', symbolData({ fundingRate: 0.0005 }));
      expect(short.results.funding_rate).toMatchObject({ passed: true, score: 10, message: 'Funding supports trade (0.050%)' });
    });
  });

  it('credits open interest when present', () => {
    const outcome = filters.evaluateAll(null, 'trending', symbolData({ openInterest: 1000 }));
    expect(outcome.results.open_interest).toMatchObject({ score: 10, message: 'OI positive' });
  });

  describe('multi-timeframe', () => {
    const aligned = symbolData({ ohlcv: { '15m': rising(20), '1h': rising(20) } });

    it('gives full points when both timeframes agree with the trade', () => {
      expect(filters.evaluateAll('LONG', 'trending', aligned).results.mtf_confirmation).toMatchObject({
        passed: true,
        score: 20,
        message: 'All TF aligned with direction',
      });
      expect(filters.evaluateAll(null, 'trending', aligned).results.mtf_confirmation.message).toBe('All TF aligned');
    });

    it('gives partial points against the trade', () => {
      expect(filters.evaluateAll('SHORT', 'trending', aligned).results.mtf_confirmation).toMatchObject({
        passed: true,
        score: 15,
        message: 'TF aligned but opposite direction',
      });
    });

    it('fails a timeframe conflict', () => {
      const conflict = symbolData({ ohlcv: { '15m': rising(20), '1h': falling(20) } });
      expect(filters.evaluateAll('LONG', 'trending', conflict).results.mtf_confirmation).toMatchObject({
        passed: false,
        score: 5,
        message: 'TF conflict',
      });
    });
  });

  describe('EMA stack', () => {
    it('matches the stack to the trade', () => {
      const up = symbolData({ ohlcv: { '1h': rising(50) } });
      expect(filters.evaluateAll('LONG', 'trending', up).results.ema_stack).toMatchObject({
        score: 10,
        message: 'Bullish EMA stack',
      });
      expect(filters.evaluateAll('SHORT', 'trending', up).results.ema_stack).toMatchObject({
        score: 7,
        message: 'Bullish stack (opposite direction)',
      });

      const down = symbolData({ ohlcv: { '1h': falling(50, 200) } });
      expect(filters.evaluateAll('SHORT', 'trending', down).results.ema_stack.message).toBe('Bearish EMA stack');
    });
  });

  describe('ATR percent', () => {
    it('accepts volatility inside the band', () => {
      const outcome = filters.evaluateAll(null, 'trending', symbolData({ ohlcv: { '15m': rising(20) } }));
      // ATR 2 on a 119 close
      expect(outcome.results.atr_percent).toMatchObject({ passed: true, score: 10, message: 'ATR 1.68% in range' });
    });

    it('rejects a dead market', () => {
      const flat: Candle[] = Array.from({ length: 20 }, (_, i) => [i, 100, 100.1, 99.9, 100, 10]);
      const outcome = filters.evaluateAll(null, 'trending', symbolData({ ohlcv: { '15m': flat } }));
      expect(outcome.results.atr_percent).toMatchObject({ passed: false, score: 5, message: 'ATR too low: 0.20%' });
    });
  });

  describe('VWAP', () => {
    const data = symbolData({ ohlcv: { '15m': rising(20) } });

    it('rewards price on the trade side of VWAP', () => {
      // VWAP 109.5 against a 119 close
      expect(filters.evaluateAll('LONG', 'trending', data).results.vwap_position).toMatchObject({
        passed: true,
        score: 5,
        message: 'Price above VWAP (8.68%)',
      });
    });

    it('fails price far on the wrong side', () => {
      expect(filters.evaluateAll('SHORT', 'trending', data).results.vwap_position).toMatchObject({
        passed: false,
        score: 1,
        message: 'Price away from VWAP',
      });
    });
  });
});
