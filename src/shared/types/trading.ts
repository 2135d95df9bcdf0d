/**
 * @fileoverview Signal, grade and position type definitions
 * @module shared/types/trading
 */

import { z } from 'zod';
import type { BtcRegime, MarketType, TrendStrength } from './market.js';

// =============================================================================
// DIRECTION
// =============================================================================

export const TradeDirectionSchema = z.enum(['LONG', 'SHORT']);
export type TradeDirection = z.infer<typeof TradeDirectionSchema>;

export const DIRECTION_EMOJI: Record<TradeDirection, string> = {
  LONG: '🟢',
  SHORT: '🔴',
};

export function oppositeDirection(direction: TradeDirection): TradeDirection {
  return direction === 'LONG' ? 'SHORT' : 'LONG';
}

// =============================================================================
// GRADES
// =============================================================================

export const SignalGradeSchema = z.enum(['A+', 'A', 'B+', 'B', 'C', 'D']);
export type SignalGrade = z.infer<typeof SignalGradeSchema>;

export const GRADE_EMOJI: Record<SignalGrade, string> = {
  'A+': '🏆',
  A: '🌟',
  'B+': '⭐',
  B: '✨',
  C: '⚠️',
  D: '❌',
};

/** Lowest score that earns each grade. */
export const GRADE_MIN_SCORE: Record<SignalGrade, number> = {
  'A+': 90,
  A: 80,
  'B+': 70,
  B: 60,
  C: 50,
  D: 0,
};

const TRADEABLE_GRADES: ReadonlySet<SignalGrade> = new Set<SignalGrade>(['A+', 'A', 'B+', 'B']);

/**
 * Maps a 0-100 score to a grade.
 */
export function gradeFromScore(score: number): SignalGrade {
  if (score >= 90) return 'A+';
  if (score >= 80) return 'A';
  if (score >= 70) return 'B+';
  if (score >= 60) return 'B';
  if (score >= 50) return 'C';
  return 'D';
}

export function gradeCanTrade(grade: SignalGrade): boolean {
  return TRADEABLE_GRADES.has(grade);
}

// =============================================================================
// POSITION SIZE
// =============================================================================

/**
 * Result of sizing a position. `blocked` results carry only a reason.
 */
export type PositionSize =
  | {
      blocked: false;
      positionUsd: number;
      contracts: number;
      riskUsd: number;
      riskPct: number;
      stopDistancePct: number;
      atrPct: number;
      fearIndex: number;
      entry: number;
      stopLoss: number;
      leverage: number;
      maxPosition: number;
    }
  | { blocked: true; reason: string };

export type SizedPosition = Extract<PositionSize, { blocked: false }>;

// =============================================================================
// SIGNAL
// =============================================================================

/**
 * A trade idea sent to the chat for manual execution.
 */
export interface Signal {
  symbol: string;
  direction: TradeDirection;
  entry: number;
  stopLoss: number;
  takeProfit: number;
  rrRatio: number;
  score: number;
  grade: SignalGrade;
  confidence: number;
  marketType: MarketType;
  btcRegime: BtcRegime;
  structureStrength: TrendStrength;
  filtersPassed: number;
  /** ISO-8601 creation time */
  timestamp: string;
  levels: Record<string, number>;
  keyFactors: string[];
  positionSize: PositionSize | null;
  filterSummary: string;
}

// =============================================================================
// WEBHOOK PAYLOADS
// =============================================================================

export const TradeResultPayloadSchema = z.object({
  type: z.literal('trade_result'),
  symbol: z.string().min(1),
  pnl_pct: z.number().default(0),
});

export const ManualSignalPayloadSchema = z.object({
  type: z.literal('manual_signal'),
  symbol: z.string().min(1),
  direction: TradeDirectionSchema,
  entry: z.number().positive(),
  stop_loss: z.number().positive(),
  take_profit: z.number().positive(),
  rr_ratio: z.number().optional(),
  score: z.number().min(0).max(100).optional(),
  grade: SignalGradeSchema.optional(),
  confidence: z.number().min(0).max(100).optional(),
});

export const ConfigUpdatePayloadSchema = z.object({
  type: z.literal('config_update'),
  changes: z.record(z.unknown()).optional(),
});

/**
 * Payloads accepted on the webhook endpoint.
 */
export const WebhookPayloadSchema = z.discriminatedUnion('type', [
  TradeResultPayloadSchema,
  ManualSignalPayloadSchema,
  ConfigUpdatePayloadSchema,
]);

export type TradeResultPayload = z.infer<typeof TradeResultPayloadSchema>;
export type ManualSignalPayload = z.infer<typeof ManualSignalPayloadSchema>;
export type ConfigUpdatePayload = z.infer<typeof ConfigUpdatePayloadSchema>;
export type WebhookPayload = z.infer<typeof WebhookPayloadSchema>;
