/**
 * @fileoverview Public API for shared utilities
 * @module shared/utils
 */

// Logger
export { logger, Logger, LogLevel, parseLogLevel, type LogLevelName } from './logger.js';

// Retry
export {
  RetryExecutor,
  withRetry,
  DEFAULT_RETRY_CONFIG,
  type RetryConfig,
  type RetryResult,
  type RetryRuntime,
} from './retry.js';

// Numbers
export { round, sum, mean, stdev, clamp, percentile, lastN } from './math.js';

// IST time and sessions
export {
  istHour,
  istMinute,
  istDateString,
  istDayStart,
  istWeekday,
  istLongDate,
  formatIst,
  tsLabel,
  msUntilIst,
  sessionForHour,
  currentSession,
  isAvoidTime,
  isSleepTime,
  nextSession,
  formatDuration,
  DEFAULT_SESSION_HOURS,
  DEFAULT_AVOID_TIMES,
  type HourWindow,
  type SessionHours,
  type AvoidWindow,
  type NextSession,
} from './time.js';

// Profit after deductions
export {
  calculateIndianProfit,
  ProfitCalculator,
  TDS_RATE,
  GST_RATE,
  BROKERAGE_RATE,
  type IndianProfit,
  type ProfitTradeResult,
  type DailyProfitSummary,
} from './profit.js';
