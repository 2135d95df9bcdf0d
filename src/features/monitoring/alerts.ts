/**
 * @fileoverview Threshold alerts on collected metrics
 * @module features/monitoring/alerts
 */

import type { SentinelConfig } from '../../config/index.js';
import type { AlertLevel } from '../notification/formatter.js';
import { MS_IN_HOUR } from '../../shared/constants/index.js';
import { formatIst } from '../../shared/utils/time.js';
import { logger } from '../../shared/utils/logger.js';
import type { MetricsReport } from './metrics.js';

const log = logger.child('alerts');

const HISTORY_LIMIT = 100;
const SUPPRESS_MS = MS_IN_HOUR;

/** Low win rate is only reported past this many trades */
const WIN_RATE_MIN_TRADES = 10;
const LOW_WIN_RATE = 40;

export interface AlertSink {
  sendAlert(message: string, level?: AlertLevel): Promise<boolean>;
}

export interface AlertThresholds {
  consecutiveLosses: number;
  /** Percent, positive */
  drawdown: number;
  /** Percent of the account */
  profitTarget: number;
}

export interface AlertRecord {
  /** ISO-8601 */
  timestamp: string;
  level: AlertLevel;
  title: string;
  message: string;
}

export interface AlertStats {
  totalAlerts: number;
  byLevel: Record<AlertLevel, number>;
  /** `[level:title, count]`, most frequent first, at most five */
  mostFrequent: Array<[string, number]>;
}

export class AlertSystem {
  readonly thresholds: AlertThresholds;
  private readonly history: AlertRecord[] = [];
  private readonly lastSent = new Map<string, number>();
  private readonly counts = new Map<string, number>();

  constructor(
    private readonly sink: AlertSink,
    config: Pick<SentinelConfig, 'risk'>,
    private readonly now: () => Date = () => new Date()
  ) {
    const { risk } = config;
    this.thresholds = {
      consecutiveLosses: risk.maxConsecutiveLosses,
      drawdown: Math.abs(risk.maxDailyDrawdownPct),
      profitTarget: risk.accountSize > 0 ? (risk.dailyProfitTarget / risk.accountSize) * 100 : Infinity,
    };
  }

  /**
   * Sends every alert the metrics call for. Returns the alerts actually sent.
   */
  async checkAndAlert(metrics: MetricsReport): Promise<AlertRecord[]> {
    const { summary, today } = metrics;
    const sent: AlertRecord[] = [];
    const raise = async (level: AlertLevel, title: string, message: string) => {
      const record = await this.send(level, title, message);
      if (record) sent.push(record);
    };

    if (summary.consecutiveLosses >= this.thresholds.consecutiveLosses) {
      await raise('WARNING', `${summary.consecutiveLosses} consecutive losses`, 'Cooling period activated. Take a break.');
    }
    if (summary.maxDrawdown >= this.thresholds.drawdown) {
      await raise('CRITICAL', `Max drawdown reached: ${summary.maxDrawdown.toFixed(1)}%`, 'Trading stopped for the day.');
    }
    if (today.pnl >= this.thresholds.profitTarget) {
      await raise('SUCCESS', `Daily target achieved! +${today.pnl.toFixed(1)}%`, 'Great work! Consider stopping for the day.');
    }
    if (summary.winRate < LOW_WIN_RATE && summary.totalTrades > WIN_RATE_MIN_TRADES) {
      await raise('WARNING', `Low win rate: ${summary.winRate.toFixed(1)}%`, 'Review your strategy or take a break.');
    }
    return sent;
  }

  /**
   * Sends one alert unless the same level and title went out within the
   * last hour.
   */
  async send(level: AlertLevel, title: string, message: string): Promise<AlertRecord | null> {
    const key = `${level}:${title}`;
    const at = this.now();
    const previous = this.lastSent.get(key);
    if (previous !== undefined && at.getTime() - previous < SUPPRESS_MS) {
      log.debug(`Alert suppressed: ${key}`);
      return null;
    }

    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
    await this.sink.sendAlert(`${title}\n\n${message}\n\n⏰ ${formatIst(at)}`, level);

    const record: AlertRecord = { timestamp: at.toISOString(), level, title, message };
    this.history.push(record);
    if (this.history.length > HISTORY_LIMIT) {
      this.history.shift();
    }
    this.lastSent.set(key, at.getTime());
    return record;
  }

  recent(hours = 24): AlertRecord[] {
    const cutoff = this.now().getTime() - hours * MS_IN_HOUR;
    return this.history.filter((a) => Date.parse(a.timestamp) > cutoff);
  }

  stats(): AlertStats {
    const byLevel: Record<AlertLevel, number> = { INFO: 0, WARNING: 0, CRITICAL: 0, SUCCESS: 0, ERROR: 0 };
    for (const alert of this.history) {
      byLevel[alert.level]++;
    }
    const mostFrequent = [...this.counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, 5);
    return { totalAlerts: this.history.length, byLevel, mostFrequent };
  }
}
