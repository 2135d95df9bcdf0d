/**
 * @fileoverview Stops trading for the day once a daily limit is hit
 * @module features/risk/daily-lock
 */

import type { SentinelConfig } from '../../config/index.js';
import { round } from '../../shared/utils/math.js';
import { istDateString } from '../../shared/utils/time.js';
import { logger } from '../../shared/utils/logger.js';

const log = logger.child('daily-lock');

export interface DailyLockStatus {
  /** IST calendar date, YYYY-MM-DD */
  date: string;
  dailyPnl: number;
  dailyTrades: number;
  wins: number;
  losses: number;
  winRate: number;
  isLocked: boolean;
  lockReason: string | null;
  lockTime: string | null;
  /** Profit target as a percent of the account */
  profitTargetPct: number;
  maxLossPct: number;
  maxTrades: number;
}

export class DailyLock {
  private readonly profitTargetPct: number;
  private readonly maxLossPct: number;
  private readonly maxTrades: number;
  private day: string;
  private dailyPnl = 0;
  private dailyTrades = 0;
  private wins = 0;
  private losses = 0;
  private lockReason: string | null = null;
  private lockTime: Date | null = null;

  constructor(
    config: Pick<SentinelConfig, 'risk' | 'signalLimits'>,
    private readonly now: () => Date = () => new Date()
  ) {
    const { accountSize, dailyProfitTarget, maxDailyDrawdownPct } = config.risk;
    this.profitTargetPct = accountSize > 0 ? (dailyProfitTarget / accountSize) * 100 : Infinity;
    this.maxLossPct = Math.abs(maxDailyDrawdownPct);
    this.maxTrades = config.signalLimits.default;
    this.day = istDateString(this.now());
  }

  get isLocked(): boolean {
    return this.lockReason !== null;
  }

  get reason(): string | null {
    return this.lockReason;
  }

  update(pnlPct: number): void {
    this.checkDate();
    this.dailyPnl += pnlPct;
    this.dailyTrades++;
    if (pnlPct > 0) {
      this.wins++;
    } else {
      this.losses++;
    }
    this.checkLock();
  }

  canTrade(): boolean {
    this.checkDate();
    return !this.isLocked;
  }

  reset(): void {
    this.dailyPnl = 0;
    this.dailyTrades = 0;
    this.wins = 0;
    this.losses = 0;
    this.lockReason = null;
    this.lockTime = null;
    log.info('Daily lock reset');
  }

  status(): DailyLockStatus {
    return {
      date: this.day,
      dailyPnl: round(this.dailyPnl, 2),
      dailyTrades: this.dailyTrades,
      wins: this.wins,
      losses: this.losses,
      winRate: this.dailyTrades > 0 ? round((this.wins / this.dailyTrades) * 100, 2) : 0,
      isLocked: this.isLocked,
      lockReason: this.lockReason,
      lockTime: this.lockTime ? this.lockTime.toISOString() : null,
      profitTargetPct: this.profitTargetPct,
      maxLossPct: this.maxLossPct,
      maxTrades: this.maxTrades,
    };
  }

  summary(): string {
    const s = this.status();
    const sign = s.dailyPnl >= 0 ? '+' : '';
    const lines = [
      '📊 Daily Summary:',
      `   P&L: ${sign}${s.dailyPnl.toFixed(2)}%`,
      `   Trades: ${s.dailyTrades} (W:${s.wins} L:${s.losses})`,
      `   Win Rate: ${s.winRate}%`,
    ];
    if (s.lockReason) {
      lines.push(`   🔒 LOCKED: ${s.lockReason}`);
    }
    return lines.join('\n');
  }

  private checkLock(): void {
    if (this.dailyPnl >= this.profitTargetPct) {
      this.lock(`Profit target reached: +${this.dailyPnl.toFixed(2)}%`);
      log.info(`Daily lock activated: ${this.lockReason ?? ''}`);
    } else if (this.dailyPnl <= -this.maxLossPct) {
      this.lock(`Max loss reached: ${this.dailyPnl.toFixed(2)}%`);
      log.warn(`Daily lock activated: ${this.lockReason ?? ''}`);
    } else if (this.dailyTrades >= this.maxTrades) {
      this.lock(`Max trades reached: ${this.dailyTrades}`);
      log.info(`Daily lock activated: ${this.lockReason ?? ''}`);
    }
  }

  private lock(reason: string): void {
    this.lockReason = reason;
    this.lockTime = this.now();
  }

  private checkDate(): void {
    const today = istDateString(this.now());
    if (today !== this.day) {
      log.info(`Daily lock rollover: ${this.day} -> ${today}`);
      this.reset();
      this.day = today;
    }
  }
}
