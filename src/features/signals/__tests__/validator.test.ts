/**
 * @fileoverview Unit tests for signal validation
 */

import { describe, it, expect } from 'vitest';
import { SignalValidator } from '../validator.js';

const NOW = new Date('2024-03-05T08:30:00Z');
const validator = new SignalValidator(1.5, () => NOW);

const base = {
  symbol: 'ETH/USDT',
  direction: 'LONG',
  entry: 100,
  stopLoss: 97,
  takeProfit: 106,
  rrRatio: 2,
  score: 70,
  confidence: 70,
  timestamp: '2024-03-05T08:29:00.000Z',
};

describe('SignalValidator', () => {
  it('accepts a consistent signal', () => {
    expect(validator.validate(base)).toEqual({ valid: true, errors: [] });
  });

  it('reports missing required fields', () => {
    expect(validator.validate({ symbol: 'ETH/USDT', direction: 'LONG', entry: 100 })).toEqual({
      valid: false,
      errors: ['Missing required field: stopLoss', 'Missing required field: takeProfit'],
    });
  });

  it('requires stop and target more than 1% from entry', () => {
    expect(validator.validate({ ...base, stopLoss: 99.5 }).errors).toEqual(['Failed validation: stop_loss_different']);
    expect(validator.validate({ ...base, takeProfit: 100.5 }).errors).toEqual([
      'Failed validation: take_profit_different',
    ]);
  });

  it('bounds the reward ratio', () => {
    expect(validator.validate({ ...base, rrRatio: 1.2 }).errors).toEqual(['Failed validation: rr_reasonable']);
    expect(validator.validate({ ...base, rrRatio: 12 }).errors).toEqual(['Failed validation: rr_reasonable']);
  });

  it('rejects out-of-range score and confidence', () => {
    expect(validator.validate({ ...base, score: 120, confidence: -1 }).errors).toEqual([
      'Failed validation: score_valid',
      'Failed validation: confidence_valid',
    ]);
  });

  it('rejects stale or missing timestamps', () => {
    expect(validator.validate({ ...base, timestamp: '2024-03-05T08:20:00.000Z' }).errors).toEqual([
      'Failed validation: timestamp_recent',
    ]);
    expect(validator.validate({ ...base, timestamp: undefined }).errors).toEqual(['Failed validation: timestamp_recent']);
  });

  it('rejects an unknown direction', () => {
    expect(validator.validate({ ...base, direction: 'UP' }).errors).toEqual(['Invalid direction: UP']);
  });

  describe('validateForSymbol', () => {
    it('enforces the cooldown', () => {
      const fiveMinutesAgo = NOW.getTime() - 5 * 60_000;
      expect(validator.validateForSymbol('ETH/USDT', { 'ETH/USDT': fiveMinutesAgo }, 15)).toEqual({
        ok: false,
        reason: 'Cooldown: 5.0/15 minutes',
      });
    });

    it('allows a symbol after the cooldown or without history', () => {
      const earlier = NOW.getTime() - 20 * 60_000;
      expect(validator.validateForSymbol('ETH/USDT', { 'ETH/USDT': earlier }, 15).ok).toBe(true);
      expect(validator.validateForSymbol('SOL/USDT', {}, 15)).toEqual({ ok: true, reason: 'OK' });
    });
  });

  describe('quality', () => {
    it('rates a clean signal excellent', () => {
      expect(validator.quality({ rrRatio: 3, score: 85, confidence: 85, structureStrength: 'STRONG' })).toEqual({
        overall: 'EXCELLENT',
        checks: { rr: 'EXCELLENT', score: 'EXCELLENT', confidence: 'HIGH', structure: 'STRONG' },
        warnings: [],
      });
    });

    it('collects warnings', () => {
      const quality = validator.quality({ rrRatio: 1.2, score: 50, confidence: 40, structureStrength: 'WEAK' });
      expect(quality.overall).toBe('POOR');
      expect(quality.warnings).toEqual(['Low RR ratio', 'Low score', 'Low confidence', 'Weak structure']);

      const fair = validator.quality({ rrRatio: 1.6, score: 65, confidence: 50, structureStrength: 'MODERATE' });
      expect(fair.overall).toBe('GOOD');
      expect(fair.checks).toEqual({ rr: 'ACCEPTABLE', score: 'ACCEPTABLE', confidence: 'LOW', structure: 'MODERATE' });
    });
  });
});
