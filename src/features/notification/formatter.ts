/**
 * @fileoverview Telegram HTML formatting for signals, summaries and alerts
 * @module features/notification/formatter
 */

import type { SentinelConfig } from '../../config/index.js';
import type { BtcRegime, MarketType, Signal } from '../../shared/types/index.js';
import { DIRECTION_EMOJI, MARKET_EMOJI } from '../../shared/types/index.js';
import { BOT_DISPLAY_NAME } from '../../shared/constants/index.js';
import { formatIst } from '../../shared/utils/time.js';
import { escapeHtml, money, signed } from './templates.js';

export type AlertLevel = 'INFO' | 'WARNING' | 'CRITICAL' | 'SUCCESS' | 'ERROR';

export const ALERT_EMOJI: Record<AlertLevel, string> = {
  INFO: 'ℹ️',
  WARNING: '⚠️',
  CRITICAL: '🚨',
  SUCCESS: '✅',
  ERROR: '❌',
};

/** P&L figures are percentages of the account */
export interface DailySummaryStats {
  totalTrades: number;
  wins: number;
  losses: number;
  totalPnl: number;
  bestTrade: number;
  worstTrade: number;
}

export interface WeeklySummaryStats {
  totalTrades: number;
  winRate: number;
  totalPnl: number;
  profitFactor: number;
  bestDay?: string;
  worstDay?: string;
}

export interface HealthDigest {
  status: string;
  marketType: MarketType;
  btcRegime: BtcRegime;
  dailySignals: number;
  dailyLimit: number;
  consecutiveLosses: number;
  /** Component name to whether it is working */
  components: Record<string, boolean>;
}

export class MessageFormatter {
  private readonly dailyTargetPct: number;

  constructor(
    private readonly config: Pick<SentinelConfig, 'risk'>,
    private readonly now: () => Date = () => new Date()
  ) {
    const { accountSize, dailyProfitTarget } = config.risk;
    this.dailyTargetPct = accountSize > 0 ? (dailyProfitTarget / accountSize) * 100 : 0;
  }

  formatSignal(signal: Signal): string {
    const emoji = DIRECTION_EMOJI[signal.direction];
    const trend = signal.direction === 'LONG' ? '🚀 UPTREND' : '📉 DOWNTREND';

    const lines = [
      `${emoji} <b>${BOT_DISPLAY_NAME} SIGNAL</b> ${emoji}`,
      '',
      `<b>Symbol:</b> ${escapeHtml(signal.symbol)}`,
      `<b>Direction:</b> ${trend}`,
      `<b>Grade:</b> ${signal.grade} (Score: ${signal.score})`,
      `<b>Confidence:</b> ${signal.confidence}%`,
      '',
      `<b>Entry:</b> $${money(signal.entry, 2)}`,
      `<b>Stop Loss:</b> $${money(signal.stopLoss, 2)}`,
      `<b>Take Profit:</b> $${money(signal.takeProfit, 2)}`,
      `<b>R:R Ratio:</b> ${signal.rrRatio.toFixed(2)}`,
    ];
    if (signal.positionSize && !signal.positionSize.blocked) {
      lines.push(`💰 Size: $${money(signal.positionSize.positionUsd)}`);
    }

    lines.push(
      '',
      `<b>Market:</b> ${MARKET_EMOJI[signal.marketType]} ${signal.marketType.toUpperCase()}`,
      `<b>Structure:</b> ${signal.structureStrength}`
    );
    for (const factor of signal.keyFactors.slice(0, 3)) {
      lines.push(`• ${escapeHtml(factor)}`);
    }

    const support = signal.levels['nearest_support'];
    const resistance = signal.levels['nearest_resistance'];
    if (support !== undefined && support > 0) {
      lines.push(`📊 Support: ${support.toFixed(2)}`);
    }
    if (resistance !== undefined && resistance > 0) {
      lines.push(`📊 Resistance: ${resistance.toFixed(2)}`);
    }

    const created = new Date(signal.timestamp);
    const time = Number.isNaN(created.getTime()) ? this.now() : created;
    lines.push('', `⏰ ${formatIst(time)}`, '', '⚠️ <i>Manual trade only - Auto trade OFF</i>');
    return lines.join('\n');
  }

  formatDailySummary(stats: DailySummaryStats): string {
    const pnl = stats.totalPnl;
    let mood: string;
    let target: string;
    if (pnl >= this.dailyTargetPct) {
      mood = '🥳🎉🍾';
      target = '★ TARGET ACHIEVED! ★';
    } else if (pnl > 0) {
      mood = '😊';
      target = `${(this.dailyTargetPct - pnl).toFixed(2)}% to target`;
    } else if (pnl === 0) {
      mood = '😐';
      target = 'Break even day';
    } else {
      mood = '😔';
      target = `Loss: ${Math.abs(pnl).toFixed(2)}%`;
    }

    const winRate = stats.totalTrades > 0 ? (stats.wins / stats.totalTrades) * 100 : 0;

    return [
      `${mood} <b>Daily Summary</b> ${mood}`,
      '',
      '📊 <b>Trades</b>',
      `• Total: ${stats.totalTrades}`,
      `• Wins: ${stats.wins}`,
      `• Losses: ${stats.losses}`,
      `• Win Rate: ${winRate.toFixed(1)}%`,
      '',
      '💰 <b>P&amp;L</b>',
      `• Net: ${signed(pnl)}%`,
      `• Best: ${signed(stats.bestTrade, 1)}%`,
      `• Worst: ${signed(stats.worstTrade, 1)}%`,
      '',
      `🎯 ${target}`,
      `⚡ Risk per trade: ${this.config.risk.riskPerTrade}%`,
      '',
      '<i>Tomorrow is a new day!</i>',
    ].join('\n');
  }

  formatWeeklySummary(stats: WeeklySummaryStats): string {
    return [
      '📊 <b>Weekly Performance</b>',
      '',
      `Trades: ${stats.totalTrades}`,
      `Win Rate: ${stats.winRate.toFixed(1)}%`,
      `Total P&amp;L: ${signed(stats.totalPnl)}%`,
      `Profit Factor: ${stats.profitFactor.toFixed(2)}`,
      '',
      `Best Day: ${stats.bestDay ?? 'N/A'}`,
      `Worst Day: ${stats.worstDay ?? 'N/A'}`,
      '',
      `🎯 Next week target: ₹${money(this.config.risk.weeklyProfitTarget)}`,
    ].join('\n');
  }

  formatHealthStatus(health: HealthDigest): string {
    const lines = [
      `${health.status === 'healthy' ? '✅' : '⚠️'} <b>Bot Health</b>`,
      '',
      `Market: ${health.marketType}`,
      `BTC Regime: ${health.btcRegime}`,
      '',
      '📊 <b>Today</b>',
      `Signals: ${health.dailySignals}/${health.dailyLimit}`,
      `Consecutive Losses: ${health.consecutiveLosses}`,
      '',
      '⚙️ <b>Components</b>',
    ];
    for (const [name, ok] of Object.entries(health.components)) {
      lines.push(`${ok ? '✅' : '❌'} ${escapeHtml(name)}`);
    }
    lines.push('', `⏰ ${formatIst(this.now())}`);
    return lines.join('\n');
  }

  formatSimple(text: string, emoji = '📢'): string {
    return `${emoji} ${escapeHtml(text)}`;
  }

  formatError(error: string): string {
    return `🚨 <b>Error</b>\n<code>${escapeHtml(error)}</code>`;
  }

  formatAlert(message: string, level: AlertLevel = 'INFO'): string {
    return `${ALERT_EMOJI[level]} <b>${level}</b>\n${escapeHtml(message)}`;
  }
}
