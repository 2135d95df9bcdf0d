/**
 * @fileoverview Signal confidence percentage
 * @module features/signals/confidence
 */

import type { BtcRegimeResult, MarketType, SignalGrade } from '../../shared/types/index.js';
import { clamp } from '../../shared/utils/math.js';

const BASE_CONFIDENCE: Record<SignalGrade, number> = { 'A+': 95, A: 85, 'B+': 75, B: 65, C: 50, D: 30 };

const TYPICAL_SCORE: Record<SignalGrade, number> = { 'A+': 95, A: 85, 'B+': 75, B: 65, C: 55, D: 45 };

const MARKET_ADJUSTMENT: Record<MarketType, number> = {
  trending: 5,
  choppy: -10,
  high_vol: -15,
  unknown: -5,
};

export type ConfidenceLevel = 'EXTREME_HIGH' | 'VERY_HIGH' | 'HIGH' | 'MODERATE' | 'LOW' | 'VERY_LOW';

function btcAdjustment(regime: BtcRegimeResult | null): number {
  if (!regime) return -10;
  if (regime.strength === 'STRONG' && regime.canTrade) return 10;
  if (regime.strength === 'MODERATE') return 5;
  if (!regime.canTrade) return -20;
  return -5;
}

export class ConfidenceCalculator {
  /**
   * Grade base, adjusted for market and BTC, plus up to 10 points for a
   * score above the grade's typical value.
   */
  calculate(score: number, grade: SignalGrade, marketType: MarketType, btcRegime: BtcRegimeResult | null): number {
    let confidence = BASE_CONFIDENCE[grade] + MARKET_ADJUSTMENT[marketType] + btcAdjustment(btcRegime);

    const typical = TYPICAL_SCORE[grade];
    if (score > typical) {
      confidence += Math.min(10, Math.floor((score - typical) / 2));
    }
    return clamp(confidence, 0, 100);
  }

  level(confidence: number): ConfidenceLevel {
    if (confidence >= 90) return 'EXTREME_HIGH';
    if (confidence >= 80) return 'VERY_HIGH';
    if (confidence >= 70) return 'HIGH';
    if (confidence >= 60) return 'MODERATE';
    if (confidence >= 50) return 'LOW';
    return 'VERY_LOW';
  }

  sizeMultiplier(confidence: number): number {
    if (confidence >= 90) return 1.0;
    if (confidence >= 80) return 0.9;
    if (confidence >= 70) return 0.8;
    if (confidence >= 60) return 0.6;
    if (confidence >= 50) return 0.4;
    return 0.2;
  }

  shouldAlert(confidence: number, grade: SignalGrade): boolean {
    if (grade === 'A+' || grade === 'A') return true;
    if (grade === 'B+') return confidence >= 70;
    if (grade === 'B') return confidence >= 80;
    return false;
  }
}
