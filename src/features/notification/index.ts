/**
 * @fileoverview Public API for chat notifications
 * @module features/notification
 */

export * as templates from './templates.js';
export { escapeHtml, money, signed, type PositionAction } from './templates.js';
export {
  MessageFormatter,
  ALERT_EMOJI,
  type AlertLevel,
  type DailySummaryStats,
  type WeeklySummaryStats,
  type HealthDigest,
} from './formatter.js';
export {
  TelegramNotifier,
  HIGH_CONFIDENCE_ALERT,
  type ParseMode,
  type NotifierStatus,
  type TelegramNotifierOptions,
} from './telegram.js';
