/**
 * @fileoverview Final signal score and grade
 * @module features/signals/scorer
 *
 * The filter score carries most of the weight, with structure quality and
 * the tier 3 bonus on top. The market type then scales the result.
 */

import type { MarketType, SignalGrade, TrendStrength } from '../../shared/types/index.js';
import { gradeFromScore } from '../../shared/types/index.js';
import { round, sum } from '../../shared/utils/math.js';
import type { StructureResult } from '../analysis/structure.js';
import type { FilterResult } from '../filters/types.js';

const WEIGHTS = { filter: 0.7, structure: 0.2, bonus: 0.1 } as const;

const STRUCTURE_POINTS: Record<TrendStrength, number> = { STRONG: 90, MODERATE: 70, WEAK: 50 };

export const MARKET_MODIFIERS: Record<MarketType, number> = {
  trending: 1.0,
  choppy: 0.9,
  high_vol: 0.8,
  unknown: 0.85,
};

const STRENGTH_RANK: Record<TrendStrength, number> = { STRONG: 3, MODERATE: 2, WEAK: 1 };

export interface GradeRequirements {
  minScore: number;
  minRr: number;
  structureRequired: TrendStrength;
  description: string;
}

export const GRADE_REQUIREMENTS: Record<SignalGrade, GradeRequirements> = {
  'A+': { minScore: 90, minRr: 2.5, structureRequired: 'STRONG', description: 'Exceptional signal - must trade' },
  A: { minScore: 80, minRr: 2.0, structureRequired: 'STRONG', description: 'Strong signal - should trade' },
  'B+': { minScore: 70, minRr: 1.8, structureRequired: 'MODERATE', description: 'Good signal - consider trading' },
  B: { minScore: 60, minRr: 1.5, structureRequired: 'MODERATE', description: 'Decent signal - could trade' },
  C: { minScore: 50, minRr: 1.2, structureRequired: 'WEAK', description: 'Weak signal - avoid' },
  D: { minScore: 0, minRr: 1.0, structureRequired: 'WEAK', description: 'Poor signal - do not trade' },
};

export interface ScoreResult {
  score: number;
  grade: SignalGrade;
  components: {
    filterScore: number;
    structureScore: number;
    bonusPoints: number;
  };
  /** Before the market modifier */
  weightedScore: number;
}

export function structureScore(structure: Pick<StructureResult, 'strength' | 'bos' | 'choch'>): number {
  let points = STRUCTURE_POINTS[structure.strength];
  if (structure.bos) points += 10;
  if (structure.choch) points += 15;
  return Math.min(100, points);
}

export class SignalScorer {
  calculate(filterResult: FilterResult, structure: StructureResult, marketType: MarketType): ScoreResult {
    const filterScore = filterResult.score;
    const bonusPoints = filterResult.tier3 ? sum(Object.values(filterResult.tier3).map((r) => r.bonus)) : 0;
    const structurePoints = structureScore(structure);

    const weighted =
      filterScore * WEIGHTS.filter + structurePoints * WEIGHTS.structure + bonusPoints * WEIGHTS.bonus;
    const score = round(weighted * MARKET_MODIFIERS[marketType], 1);

    return {
      score,
      grade: gradeFromScore(score),
      components: {
        filterScore: round(filterScore, 1),
        structureScore: structurePoints,
        bonusPoints,
      },
      weightedScore: round(weighted, 1),
    };
  }

  requirements(grade: SignalGrade): GradeRequirements {
    return GRADE_REQUIREMENTS[grade];
  }

  /**
   * Checks a scored setup against the minimum score and the requirements of
   * the grade it earned.
   */
  isTradeable(
    score: number,
    rrRatio: number,
    strength: TrendStrength,
    minSignalScore: number
  ): { tradeable: boolean; reason: string } {
    const grade = gradeFromScore(score);
    const reqs = GRADE_REQUIREMENTS[grade];

    if (score < minSignalScore) {
      return { tradeable: false, reason: `Score too low: ${score} < ${minSignalScore}` };
    }
    if (rrRatio < reqs.minRr) {
      return { tradeable: false, reason: `RR too low: ${rrRatio} < ${reqs.minRr}` };
    }
    if (STRENGTH_RANK[strength] < STRENGTH_RANK[reqs.structureRequired]) {
      return { tradeable: false, reason: `Structure too weak: ${strength} < ${reqs.structureRequired}` };
    }
    return { tradeable: true, reason: `Tradeable: ${grade}` };
  }
}
