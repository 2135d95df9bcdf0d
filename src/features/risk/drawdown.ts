/**
 * @fileoverview Drawdown tracking on a cumulative P&L balance
 * @module features/risk/drawdown
 *
 * The balance is the running sum of closed-trade P&L percentages. Drawdown is
 * measured from the highest balance seen, so nothing registers until the
 * balance has first gone positive.
 */

import { round } from '../../shared/utils/math.js';
import { logger } from '../../shared/utils/logger.js';

const log = logger.child('drawdown');

export type DrawdownLevel = 'CRITICAL' | 'HIGH' | 'MODERATE' | 'LOW' | 'NONE';

export const DRAWDOWN_SIZE_MULTIPLIER: Record<DrawdownLevel, number> = {
  CRITICAL: 0,
  HIGH: 0.3,
  MODERATE: 0.6,
  LOW: 0.8,
  NONE: 1,
};

export interface DrawdownStatus {
  currentDrawdown: number;
  dailyDrawdown: number;
  maxDrawdownReached: boolean;
  peak: number;
  currentBalance: number;
  maxAllowed: number;
  level: DrawdownLevel;
}

export class DrawdownController {
  private readonly maxAllowed: number;
  private peak = 0;
  private balance = 0;
  private drawdown = 0;
  private dailyDrawdown = 0;
  private dailyStartBalance = 0;
  private maxReached = false;

  /**
   * @param maxDrawdownPct - limit in percent, sign ignored
   */
  constructor(maxDrawdownPct: number) {
    this.maxAllowed = Math.abs(maxDrawdownPct);
  }

  get currentBalance(): number {
    return this.balance;
  }

  get currentDrawdown(): number {
    return this.drawdown;
  }

  update(pnlPct: number): void {
    this.balance += pnlPct;
    if (this.balance > this.peak) {
      this.peak = this.balance;
    }

    this.drawdown = this.peak > 0 ? ((this.peak - this.balance) / this.peak) * 100 : 0;
    if (this.drawdown >= this.maxAllowed) {
      this.maxReached = true;
      log.warn(`Max drawdown reached: ${this.drawdown.toFixed(2)}%`);
    }

    if (this.dailyStartBalance > 0) {
      this.dailyDrawdown = ((this.dailyStartBalance - this.balance) / this.dailyStartBalance) * 100;
    }
  }

  isMaxDrawdownReached(): boolean {
    return this.maxReached;
  }

  resetDaily(startBalance: number): void {
    this.dailyStartBalance = startBalance;
    this.dailyDrawdown = 0;
    log.info(`Daily drawdown reset. Starting balance: ${startBalance.toFixed(2)}%`);
  }

  resetAll(): void {
    this.peak = 0;
    this.balance = 0;
    this.drawdown = 0;
    this.dailyDrawdown = 0;
    this.maxReached = false;
    log.info('All drawdown tracking reset');
  }

  level(): DrawdownLevel {
    const dd = this.drawdown;
    if (dd >= this.maxAllowed) return 'CRITICAL';
    if (dd >= this.maxAllowed * 0.7) return 'HIGH';
    if (dd >= this.maxAllowed * 0.4) return 'MODERATE';
    if (dd > 0) return 'LOW';
    return 'NONE';
  }

  shouldReduceSize(): boolean {
    const level = this.level();
    return level === 'HIGH' || level === 'MODERATE';
  }

  sizeMultiplier(): number {
    return DRAWDOWN_SIZE_MULTIPLIER[this.level()];
  }

  status(): DrawdownStatus {
    return {
      currentDrawdown: round(this.drawdown, 2),
      dailyDrawdown: round(this.dailyDrawdown, 2),
      maxDrawdownReached: this.maxReached,
      peak: round(this.peak, 2),
      currentBalance: round(this.balance, 2),
      maxAllowed: this.maxAllowed,
      level: this.level(),
    };
  }
}
