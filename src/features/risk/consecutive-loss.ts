/**
 * @fileoverview Loss streak tracking with a cooling period
 * @module features/risk/consecutive-loss
 */

import { MS_IN_MINUTE } from '../../shared/constants/index.js';
import { round } from '../../shared/utils/math.js';
import { formatIst } from '../../shared/utils/time.js';
import { logger } from '../../shared/utils/logger.js';

const log = logger.child('loss-streak');

const HISTORY_LIMIT = 20;

export interface TradeOutcome {
  pnlPct: number;
  /** ISO-8601 */
  timestamp: string;
}

export interface LossTrackerStatus {
  consecutiveLosses: number;
  maxAllowed: number;
  inCooling: boolean;
  coolingRemainingMinutes: number;
  shouldStop: boolean;
  sizeMultiplier: number;
  lossStreakStart: string | null;
  recentResults: TradeOutcome[];
}

export class ConsecutiveLossTracker {
  private losses = 0;
  private coolingUntil: Date | null = null;
  private streakStart: Date | null = null;
  private results: TradeOutcome[] = [];

  constructor(
    private readonly maxConsecutive: number,
    private readonly coolingMinutes: number,
    private readonly now: () => Date = () => new Date()
  ) {}

  get consecutiveLosses(): number {
    return this.losses;
  }

  update(pnlPct: number): void {
    const now = this.now();
    this.results.push({ pnlPct, timestamp: now.toISOString() });
    if (this.results.length > HISTORY_LIMIT) {
      this.results = this.results.slice(-HISTORY_LIMIT);
    }

    if (pnlPct < 0) {
      this.losses++;
      if (this.losses === 1) {
        this.streakStart = now;
      }
      log.warn(`Consecutive loss #${this.losses}`);
      if (this.losses >= this.maxConsecutive) {
        this.coolingUntil = new Date(now.getTime() + this.coolingMinutes * MS_IN_MINUTE);
        log.warn(`Cooling activated until ${formatIst(this.coolingUntil)}`);
      }
      return;
    }

    if (this.losses > 0) {
      log.info(`Loss streak ended after ${this.losses} losses`);
    }
    this.losses = 0;
    this.streakStart = null;
  }

  shouldStop(): boolean {
    return this.coolingRemainingMs() > 0 || this.losses >= this.maxConsecutive;
  }

  sizeMultiplier(): number {
    if (this.losses === 0) return 1;
    if (this.losses === 1) return 0.7;
    return 0;
  }

  status(): LossTrackerStatus {
    const remaining = this.coolingRemainingMs() / MS_IN_MINUTE;
    return {
      consecutiveLosses: this.losses,
      maxAllowed: this.maxConsecutive,
      inCooling: remaining > 0,
      coolingRemainingMinutes: round(remaining, 1),
      shouldStop: this.shouldStop(),
      sizeMultiplier: this.sizeMultiplier(),
      lossStreakStart: this.streakStart ? this.streakStart.toISOString() : null,
      recentResults: this.results.slice(-5),
    };
  }

  reset(): void {
    this.losses = 0;
    this.coolingUntil = null;
    this.streakStart = null;
    log.info('Consecutive loss tracker reset');
  }

  private coolingRemainingMs(): number {
    if (!this.coolingUntil) {
      return 0;
    }
    return Math.max(0, this.coolingUntil.getTime() - this.now().getTime());
  }
}
