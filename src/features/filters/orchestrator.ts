/**
 * @fileoverview Runs the three filter tiers and grades the outcome
 * @module features/filters/orchestrator
 */

import type { SentinelConfig } from '../../config/index.js';
import type { BtcRegimeResult, MarketType, TradeDirection } from '../../shared/types/index.js';
import { gradeCanTrade, gradeFromScore } from '../../shared/types/index.js';
import { round, sum } from '../../shared/utils/math.js';
import { logger } from '../../shared/utils/logger.js';
import { Tier1Filters } from './tier1.js';
import { Tier2Filters } from './tier2.js';
import { Tier3Filters } from './tier3.js';
import type { FilterResult, SymbolData } from './types.js';

const log = logger.child('filters');

export interface FilterStats {
  totalEvaluations: number;
  tier1Passed: number;
  tier2Passed: number;
  signalsGenerated: number;
  /** ISO-8601 time of the last evaluation */
  lastEvaluation: string | null;
}

export interface FilterStatsReport extends FilterStats {
  tier1SuccessRate: number;
  tier2SuccessRate: number;
  signalRate: number;
}

export interface FilterOrchestratorOptions {
  now?: () => Date;
}

export class FilterOrchestrator {
  private readonly tier1: Tier1Filters;
  private readonly tier2: Tier2Filters;
  private readonly tier3 = new Tier3Filters();
  private readonly now: () => Date;
  private readonly counters: FilterStats = {
    totalEvaluations: 0,
    tier1Passed: 0,
    tier2Passed: 0,
    signalsGenerated: 0,
    lastEvaluation: null,
  };

  constructor(config: Pick<SentinelConfig, 'sessions' | 'filters' | 'atr'>, options: FilterOrchestratorOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.tier1 = new Tier1Filters(config.sessions, this.now);
    this.tier2 = new Tier2Filters(config.filters.tier2Weights, config.atr);
  }

  evaluate(
    symbol: string,
    direction: TradeDirection | null,
    marketType: MarketType,
    btcRegime: BtcRegimeResult | null,
    data: SymbolData
  ): FilterResult {
    const timestamp = this.now().toISOString();
    this.counters.totalEvaluations++;
    this.counters.lastEvaluation = timestamp;

    const tier1 = this.tier1.evaluateAll(direction, btcRegime, data);
    if (!tier1.passed) {
      log.debug(`Tier1 failed for ${symbol}`);
      return {
        passed: false,
        tier1: tier1.results,
        tier2: null,
        tier3: null,
        score: 0,
        grade: 'D',
        reason: 'Tier1 filters failed',
        timestamp,
      };
    }
    this.counters.tier1Passed++;

    const tier2 = this.tier2.evaluateAll(direction, marketType, data);
    const tier2Score = round(tier2.score, 1);
    if (!tier2.passed) {
      log.debug(`Tier2 failed for ${symbol}: ${tier2Score}%`);
      return {
        passed: false,
        tier1: tier1.results,
        tier2: tier2.results,
        tier3: null,
        score: tier2Score,
        grade: 'C',
        reason: `Tier2 score too low: ${tier2Score}%`,
        timestamp,
      };
    }
    this.counters.tier2Passed++;

    const tier3 = this.tier3.evaluateAll(symbol, direction, data);
    const score = Math.min(100, round(tier2Score + tier3.bonus, 1));
    const grade = gradeFromScore(score);
    const passed = gradeCanTrade(grade);
    if (passed) {
      this.counters.signalsGenerated++;
    }

    return {
      passed,
      tier1: tier1.results,
      tier2: tier2.results,
      tier3: tier3.results,
      score,
      grade,
      reason: passed ? `All filters passed. Score: ${score}% (${grade})` : `Final grade too low: ${grade}`,
      timestamp,
    };
  }

  /**
   * Short multi-line description for the signal message.
   */
  summary(result: FilterResult): string {
    if (!result.passed) {
      return `❌ ${result.reason}`;
    }

    const lines = [`✅ Score: ${result.score}% | Grade: ${result.grade}`];

    if (result.tier1) {
      const passed = Object.values(result.tier1).filter((r) => r.passed).length;
      lines.push(`Tier1: ${passed}/5 passed`);
    }

    if (result.tier2) {
      const top = Object.entries(result.tier2)
        .filter(([, r]) => r.passed)
        .sort(([, a], [, b]) => b.score - a.score)
        .slice(0, 3)
        .map(([name]) => name.replace(/_/g, ' '));
      if (top.length > 0) {
        lines.push(`Key factors: ${top.join(', ')}`);
      }
    }

    if (result.tier3) {
      const bonus = sum(Object.values(result.tier3).map((r) => r.bonus));
      if (bonus > 0) {
        lines.push(`Bonus: +${bonus}`);
      }
    }

    return lines.join('\n');
  }

  stats(): FilterStatsReport {
    const c = this.counters;
    return {
      ...c,
      tier1SuccessRate: c.totalEvaluations > 0 ? (c.tier1Passed / c.totalEvaluations) * 100 : 0,
      tier2SuccessRate: c.tier1Passed > 0 ? (c.tier2Passed / c.tier1Passed) * 100 : 0,
      signalRate: c.totalEvaluations > 0 ? (c.signalsGenerated / c.totalEvaluations) * 100 : 0,
    };
  }
}
