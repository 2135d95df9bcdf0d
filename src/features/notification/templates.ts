/**
 * @fileoverview Fixed chat messages for routine notifications
 * @module features/notification/templates
 *
 * All messages use Telegram HTML. Dynamic text passes through `escapeHtml`.
 */

import type { RiskConfig } from '../../config/index.js';
import { APP_VERSION, BOT_DISPLAY_NAME } from '../../shared/constants/index.js';
import type { MarketType, Session } from '../../shared/types/index.js';
import { MARKET_EMOJI } from '../../shared/types/index.js';
import { formatIst, istLongDate, type SessionHours } from '../../shared/utils/time.js';

// =============================================================================
// HELPERS
// =============================================================================

const HTML_ESCAPES: Record<string, string> = { '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;' };

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"]/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Groups thousands, e.g. `money(1234.5, 2)` is `1,234.50`.
 */
export function money(value: number, decimals = 0): string {
  return value.toLocaleString('en-US', { minimumFractionDigits: decimals, maximumFractionDigits: decimals });
}

export function signed(value: number, decimals = 2): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(decimals)}`;
}

export const TRADING_QUOTES: readonly string[] = [
  'The trend is your friend until it ends.',
  'Cut losses short, let profits run.',
  'Plan your trade, trade your plan.',
  "Don't confuse brains with a bull market.",
  'Patience is waiting with an active goal.',
  'Discipline beats prediction.',
  "Risk comes from not knowing what you're doing.",
  'The market transfers money from the impatient to the patient.',
];

export type PositionAction = 'PARTIAL_EXIT' | 'BREAK_EVEN' | 'SL_HIT' | 'TP_HIT';

// =============================================================================
// LIFECYCLE
// =============================================================================

export function startupMessage(risk: RiskConfig, now: Date = new Date()): string {
  return [
    `🚀 <b>${BOT_DISPLAY_NAME} v${APP_VERSION}</b> 🚀`,
    '',
    '✅ Bot started successfully',
    `📅 ${istLongDate(now)}`,
    `⏰ ${formatIst(now)}`,
    '',
    '📊 <b>Configuration</b>',
    `• Account Size: ₹${money(risk.accountSize)}`,
    `• Risk/Trade: ${risk.riskPerTrade}%`,
    `• Max Leverage: ${risk.maxLeverage}x`,
    `• Daily Target: ₹${money(risk.dailyProfitTarget)}`,
    '',
    '🎯 <i>Manual signals only - Auto trade OFF</i>',
  ].join('\n');
}

export function shutdownMessage(): string {
  return [
    `🛑 <b>${BOT_DISPLAY_NAME} Shutting Down</b>`,
    '',
    'Bot is going offline.',
    'All active positions should be closed manually.',
    '',
    '<i>See you next time!</i>',
  ].join('\n');
}

// =============================================================================
// TRADES
// =============================================================================

export function tradeWin(symbol: string, pnlPct: number, pnlUsd: number): string {
  return [
    '✅ <b>WINNING TRADE</b> ✅',
    '',
    `Symbol: ${escapeHtml(symbol)}`,
    `P&amp;L: +${pnlPct.toFixed(2)}% ($${pnlUsd.toFixed(2)})`,
    '',
    '🎯 Target achieved!',
  ].join('\n');
}

export function tradeLoss(symbol: string, pnlPct: number, pnlUsd: number): string {
  return [
    '❌ <b>LOSS</b> ❌',
    '',
    `Symbol: ${escapeHtml(symbol)}`,
    `P&amp;L: ${pnlPct.toFixed(2)}% ($${pnlUsd.toFixed(2)})`,
    '',
    '💪 Next trade will be better!',
  ].join('\n');
}

export function positionUpdate(currentR: number, action: PositionAction, detail: string): string {
  const text = escapeHtml(detail);
  switch (action) {
    case 'PARTIAL_EXIT':
      return `${currentR > 0 ? '🟢' : '🔴'} <b>Partial Exit</b>\n${text}`;
    case 'BREAK_EVEN':
      return `🛡️ <b>Break Even</b>\n${text}`;
    case 'SL_HIT':
      return `❌ <b>Stop Loss</b>\n${text}`;
    case 'TP_HIT':
      return `✅ <b>Take Profit</b>\n${text}`;
  }
}

// =============================================================================
// LIMITS
// =============================================================================

export function dailyTargetHit(pnl: number, target: number): string {
  return [
    '🎉 <b>DAILY TARGET ACHIEVED!</b> 🎉',
    '',
    `Profit: ₹${money(pnl, 2)}`,
    `Target: ₹${money(target)}`,
    '',
    '🏆 Excellent work!',
  ].join('\n');
}

export function dailyLossLimit(pnlPct: number, limitPct: number): string {
  return [
    '⚠️ <b>DAILY LOSS LIMIT REACHED</b>',
    '',
    `Loss: ${pnlPct.toFixed(2)}%`,
    `Limit: ${limitPct}%`,
    '',
    '🛑 Trading stopped for today.',
    'Tomorrow is a new day!',
  ].join('\n');
}

export function consecutiveLosses(count: number, cooldownMinutes: number): string {
  return [
    `⚠️ <b>${count} Consecutive Losses</b>`,
    '',
    'Taking a break to reset.',
    `Cooling period: ${cooldownMinutes} minutes.`,
    '',
    '🧘 <i>Stay disciplined!</i>',
  ].join('\n');
}

// =============================================================================
// MARKET & REVIEWS
// =============================================================================

export function marketUpdate(marketType: MarketType, btcRegime: string, confidence: number): string {
  return [
    `${MARKET_EMOJI[marketType]} <b>Market Update</b>`,
    '',
    `Market: ${marketType.toUpperCase()}`,
    `BTC Regime: ${escapeHtml(btcRegime)}`,
    `Confidence: ${confidence}%`,
    '',
    '🔄 Adjusting strategy accordingly...',
  ].join('\n');
}

export function weeklyReview(wins: number, losses: number, pnl: number, winRate: number): string {
  return [
    '📊 <b>Weekly Review</b>',
    '',
    `Trades: ${wins + losses}`,
    `Wins: ${wins}`,
    `Losses: ${losses}`,
    `Win Rate: ${winRate.toFixed(1)}%`,
    `Total P&amp;L: ₹${money(pnl, 2)}`,
    '',
    '📈 <i>Keep improving!</i>',
  ].join('\n');
}

export function milestone(name: string, value: number): string {
  return ['🏆 <b>MILESTONE ACHIEVED!</b>', '', `${escapeHtml(name)}: ${value}`, '', '🎉 Congratulations!'].join('\n');
}

export function errorAlert(errorType: string, message: string): string {
  return [
    '🚨 <b>ERROR ALERT</b>',
    '',
    `Type: ${escapeHtml(errorType)}`,
    `Message: ${escapeHtml(message)}`,
    '',
    '🔧 Check logs for details.',
  ].join('\n');
}

export function connectionStatus(status: 'connected' | 'disconnected', exchange: string): string {
  return [
    `${status === 'connected' ? '✅' : '❌'} <b>Connection Status</b>`,
    '',
    `Exchange: ${escapeHtml(exchange)}`,
    `Status: ${status.toUpperCase()}`,
  ].join('\n');
}

export function quoteOfTheDay(random: () => number = Math.random): string {
  const index = Math.min(TRADING_QUOTES.length - 1, Math.floor(random() * TRADING_QUOTES.length));
  return `💭 <i>${escapeHtml(TRADING_QUOTES[index] ?? '')}</i>`;
}

// =============================================================================
// SESSIONS
// =============================================================================

const SESSION_NOTES: Record<Exclude<Session, 'dead'>, [title: string, ...notes: string[]]> = {
  asia: ['🌏 Asia session started', '📊 Low volatility expected', '🎯 Range trades preferred'],
  london: ['🇬🇧 London session started', '📈 High volatility expected', '🎯 Trend trades preferred'],
  ny: ['🗽 NY session started', '⚡ Highest volatility expected', '⚠️ Tight stops recommended'],
  overlap: ['🔄 London+NY Overlap', '🔥 Extreme volatility expected', '🎯 Best for breakout trades'],
};

export function sessionStarted(session: Exclude<Session, 'dead'>): string {
  const [title, ...notes] = SESSION_NOTES[session];
  return [`<b>${title}</b>`, ...notes].join('\n');
}

export function morningUpdate(risk: RiskConfig, hours: SessionHours, now: Date = new Date()): string {
  const window = (name: Session) => `${hours[name][0]}:00-${hours[name][1]}:00 IST`;
  return [
    '🌅 <b>Good Morning!</b>',
    `📅 ${istLongDate(now)}`,
    '',
    "Today's trading sessions:",
    `• Asia: ${window('asia')}`,
    `• London: ${window('london')}`,
    `• NY: ${window('ny')}`,
    `• Overlap: ${window('overlap')}`,
    '',
    `🎯 Daily target: ₹${money(risk.dailyProfitTarget)}`,
    `⚡ Risk per trade: ${risk.riskPerTrade}%`,
    '',
    '<i>Trade smart, protect capital!</i>',
  ].join('\n');
}
