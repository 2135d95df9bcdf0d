/**
 * @fileoverview Unit tests for the filter orchestrator
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConfig } from '../../../config/index.js';
import { FilterOrchestrator } from '../orchestrator.js';
import { Tier2Filters } from '../tier2.js';
import { Tier3Filters } from '../tier3.js';
import type { FilterResult, ScoredCheck, Tier2Results } from '../types.js';
import { clockAt, regime, series, symbolData } from './fixtures.js';

const config = createConfig();
const LONDON = clockAt('2024-03-05T08:30:00Z');
const ZIGZAG = [5, 6, 7, 6, 5, 6, 8, 6, 5, 6, 7, 6, 5, 4, 5, 6, 7, 8];

/** Data that clears every tier 1 gate during the London session */
const tier1Ready = () => symbolData({ ohlcv: { '15m': series([...ZIGZAG, 7, 10]) } });

describe('FilterOrchestrator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('stops at tier 1', () => {
    const orchestrator = new FilterOrchestrator(config, { now: LONDON });
    const result = orchestrator.evaluate('ETH/USDT', 'LONG', 'trending', null, symbolData());

    expect(result).toMatchObject({
      passed: false,
      tier2: null,
      tier3: null,
      score: 0,
      grade: 'D',
      reason: 'Tier1 filters failed',
      timestamp: '2024-03-05T08:30:00.000Z',
    });
    expect(result.tier1?.btc_regime.passed).toBe(false);
  });

  it('stops at tier 2 with grade C', () => {
    const orchestrator = new FilterOrchestrator(config, { now: LONDON });
    const result = orchestrator.evaluate('ETH/USDT', 'LONG', 'trending', regime(), tier1Ready());

    expect(result.passed).toBe(false);
    expect(result.grade).toBe('C');
    expect(result.reason).toMatch(/^Tier2 score too low: \d+(\.\d)?%$/);
    expect(result.tier2).not.toBeNull();
    expect(result.tier3).toBeNull();
  });

  describe('final grading', () => {
    const tier2Results = new Tier2Filters({}, config.atr).evaluateAll(null, 'trending', symbolData()).results;
    const tier3Results = new Tier3Filters().evaluateAll('ETH/USDT', null, symbolData()).results;

    function stubTiers(tier2Score: number, bonus: number): void {
      vi.spyOn(Tier2Filters.prototype, 'evaluateAll').mockReturnValue({
        passed: true,
        score: tier2Score,
        threshold: 60,
        results: tier2Results,
      });
      vi.spyOn(Tier3Filters.prototype, 'evaluateAll').mockReturnValue({ bonus, results: tier3Results });
    }

    it('adds the bonus and passes a tradeable grade', () => {
      stubTiers(72.5, 8);
      const orchestrator = new FilterOrchestrator(config, { now: LONDON });
      const result = orchestrator.evaluate('ETH/USDT', 'LONG', 'trending', regime(), tier1Ready());

      expect(result).toMatchObject({
        passed: true,
        score: 80.5,
        grade: 'A',
        reason: 'All filters passed. Score: 80.5% (A)',
      });
      expect(orchestrator.stats()).toMatchObject({
        totalEvaluations: 1,
        tier1Passed: 1,
        tier2Passed: 1,
        signalsGenerated: 1,
        tier1SuccessRate: 100,
        tier2SuccessRate: 100,
        signalRate: 100,
      });
    });

    it('caps the score at 100', () => {
      stubTiers(95, 20);
      const orchestrator = new FilterOrchestrator(config, { now: LONDON });
      const result = orchestrator.evaluate('ETH/USDT', 'LONG', 'trending', regime(), tier1Ready());
      expect(result.score).toBe(100);
      expect(result.grade).toBe('A+');
    });

    it('rejects a grade that cannot trade', () => {
      stubTiers(55, 0);
      const orchestrator = new FilterOrchestrator(config, { now: LONDON });
      const result = orchestrator.evaluate('ETH/USDT', 'LONG', 'trending', regime(), tier1Ready());

      expect(result.passed).toBe(false);
      expect(result.reason).toBe('Final grade too low: C');
      expect(orchestrator.stats().signalsGenerated).toBe(0);
    });
  });

  describe('summary', () => {
    const orchestrator = new FilterOrchestrator(config, { now: LONDON });
    const check = (passed: boolean, score: number): ScoredCheck => ({ passed, score, weight: 20, message: '' });
    const gate = { passed: true, message: '' };

    const tier2: Tier2Results = {
      mtf_confirmation: check(true, 20),
      volume_profile: check(true, 12),
      funding_rate: check(true, 10),
      open_interest: check(true, 5),
      rsi_divergence: check(true, 15),
      ema_stack: check(false, 19),
      atr_percent: check(true, 10),
      vwap_position: check(true, 3),
      support_resistance: check(true, 3),
    };

    const result: FilterResult = {
      passed: true,
      tier1: { btc_regime: gate, structure: gate, volume: gate, liquidity: gate, session: gate },
      tier2,
      tier3: {
        whale_movement: { bonus: 5, maxBonus: 5, message: '' },
        liquidity_grab: { bonus: 8, maxBonus: 8, message: '' },
        iceberg_detection: { bonus: 0, maxBonus: 5, message: '' },
        news_sentiment: { bonus: 0, maxBonus: 3, message: '' },
        correlation_break: { bonus: 0, maxBonus: 4, message: '' },
        fibonacci_level: { bonus: 0, maxBonus: 2, message: '' },
      },
      score: 80.5,
      grade: 'A',
      reason: 'All filters passed. Score: 80.5% (A)',
      timestamp: '2024-03-05T08:30:00.000Z',
    };

    it('lists the strongest passed tier 2 checks and the bonus', () => {
      expect(orchestrator.summary(result)).toBe(
        [
          '✅ Score: 80.5% | Grade: A',
          'Tier1: 5/5 passed',
          'Key factors: mtf confirmation, rsi divergence, volume profile',
          'Bonus: +13',
        ].join('\n')
      );
    });

    it('shows only the reason on failure', () => {
      expect(orchestrator.summary({ ...result, passed: false, reason: 'Tier1 filters failed' })).toBe(
        '❌ Tier1 filters failed'
      );
    });
  });

  it('reports zero rates before any evaluation', () => {
    expect(new FilterOrchestrator(config).stats()).toEqual({
      totalEvaluations: 0,
      tier1Passed: 0,
      tier2Passed: 0,
      signalsGenerated: 0,
      lastEvaluation: null,
      tier1SuccessRate: 0,
      tier2SuccessRate: 0,
      signalRate: 0,
    });
  });
});
