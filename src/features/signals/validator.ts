/**
 * @fileoverview Consistency checks run on a signal before it is sent
 * @module features/signals/validator
 */

import { z } from 'zod';
import { MAX_SIGNAL_AGE_SECONDS, MS_IN_MINUTE, MS_IN_SECOND } from '../../shared/constants/index.js';
import { TradeDirectionSchema } from '../../shared/types/index.js';
import type { Signal, TrendStrength } from '../../shared/types/index.js';

// =============================================================================
// SCHEMA
// =============================================================================

const SignalShapeSchema = z.object({
  symbol: z.string(),
  direction: z.string(),
  entry: z.number(),
  stopLoss: z.number(),
  takeProfit: z.number(),
  rrRatio: z.number().default(0),
  score: z.number().default(0),
  confidence: z.number().default(0),
  timestamp: z.string().optional(),
});

type SignalShape = z.infer<typeof SignalShapeSchema>;

const REQUIRED_FIELDS = new Set(['symbol', 'direction', 'entry', 'stopLoss', 'takeProfit']);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export type QualityRating = 'EXCELLENT' | 'GOOD' | 'ACCEPTABLE' | 'POOR';

export interface SignalQuality {
  overall: 'EXCELLENT' | 'GOOD' | 'POOR';
  checks: {
    rr: QualityRating;
    score: QualityRating;
    confidence: 'HIGH' | 'MEDIUM' | 'LOW';
    structure: TrendStrength;
  };
  warnings: string[];
}

// =============================================================================
// VALIDATOR
// =============================================================================

export class SignalValidator {
  private readonly rules: ReadonlyArray<[name: string, check: (s: SignalShape) => boolean]>;

  constructor(
    private readonly minRr: number,
    private readonly now: () => Date = () => new Date()
  ) {
    this.rules = [
      ['price_positive', (s) => s.entry > 0],
      ['stop_loss_different', (s) => this.farFromEntry(s.entry, s.stopLoss)],
      ['take_profit_different', (s) => this.farFromEntry(s.entry, s.takeProfit)],
      ['rr_reasonable', (s) => s.rrRatio >= this.minRr && s.rrRatio <= 10],
      ['score_valid', (s) => s.score >= 0 && s.score <= 100],
      ['confidence_valid', (s) => s.confidence >= 0 && s.confidence <= 100],
      ['timestamp_recent', (s) => this.isRecent(s.timestamp)],
    ];
  }

  validate(input: unknown): ValidationResult {
    const parsed = SignalShapeSchema.safeParse(input);
    if (!parsed.success) {
      const errors = parsed.error.issues.map((issue) => {
        const field = issue.path.join('.');
        const missing = issue.code === 'invalid_type' && issue.received === 'undefined' && REQUIRED_FIELDS.has(field);
        return missing ? `Missing required field: ${field}` : `Invalid field: ${field}`;
      });
      return { valid: false, errors };
    }

    const signal = parsed.data;
    const errors = this.rules.filter(([, check]) => !check(signal)).map(([name]) => `Failed validation: ${name}`);
    if (!TradeDirectionSchema.safeParse(signal.direction).success) {
      errors.push(`Invalid direction: ${signal.direction}`);
    }
    return { valid: errors.length === 0, errors };
  }

  /**
   * Rejects a symbol still inside its cooldown after the last signal.
   */
  validateForSymbol(
    symbol: string,
    lastSignalTime: Readonly<Record<string, number>>,
    cooldownMinutes: number
  ): { ok: boolean; reason: string } {
    const last = lastSignalTime[symbol];
    if (last !== undefined) {
      const elapsed = (this.now().getTime() - last) / MS_IN_MINUTE;
      if (elapsed < cooldownMinutes) {
        return { ok: false, reason: `Cooldown: ${elapsed.toFixed(1)}/${cooldownMinutes} minutes` };
      }
    }
    return { ok: true, reason: 'OK' };
  }

  quality(signal: Pick<Signal, 'rrRatio' | 'score' | 'confidence' | 'structureStrength'>): SignalQuality {
    const warnings: string[] = [];

    let rr: QualityRating;
    if (signal.rrRatio >= 3) rr = 'EXCELLENT';
    else if (signal.rrRatio >= 2) rr = 'GOOD';
    else if (signal.rrRatio >= 1.5) rr = 'ACCEPTABLE';
    else {
      rr = 'POOR';
      warnings.push('Low RR ratio');
    }

    let score: QualityRating;
    if (signal.score >= 80) score = 'EXCELLENT';
    else if (signal.score >= 70) score = 'GOOD';
    else if (signal.score >= 60) score = 'ACCEPTABLE';
    else {
      score = 'POOR';
      warnings.push('Low score');
    }

    let confidence: SignalQuality['checks']['confidence'];
    if (signal.confidence >= 80) confidence = 'HIGH';
    else if (signal.confidence >= 60) confidence = 'MEDIUM';
    else {
      confidence = 'LOW';
      warnings.push('Low confidence');
    }

    if (signal.structureStrength === 'WEAK') {
      warnings.push('Weak structure');
    }

    const overall = warnings.length === 0 ? 'EXCELLENT' : warnings.length <= 2 ? 'GOOD' : 'POOR';
    return { overall, checks: { rr, score, confidence, structure: signal.structureStrength }, warnings };
  }

  // SL and TP must sit more than 1% of entry away from it
  private farFromEntry(entry: number, price: number): boolean {
    if (entry === 0 || price === 0) {
      return false;
    }
    return Math.abs(entry - price) > 0.01 * entry;
  }

  private isRecent(timestamp: string | undefined): boolean {
    if (!timestamp) {
      return false;
    }
    const at = Date.parse(timestamp);
    if (Number.isNaN(at)) {
      return false;
    }
    return (this.now().getTime() - at) / MS_IN_SECOND < MAX_SIGNAL_AGE_SECONDS;
  }
}
