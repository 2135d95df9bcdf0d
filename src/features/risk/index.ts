/**
 * @fileoverview Public API for risk management
 * @module features/risk
 */

export {
  PositionSizer,
  MARKET_SIZE_MULTIPLIER,
  fearMultiplier,
  type SizingRequest,
  type ScaledEntry,
  type ScaledEntryPlan,
  type PyramidAddition,
} from './position-sizing.js';
export { DailyLock, type DailyLockStatus } from './daily-lock.js';
export { DrawdownController, DRAWDOWN_SIZE_MULTIPLIER, type DrawdownLevel, type DrawdownStatus } from './drawdown.js';
export { ConsecutiveLossTracker, type LossTrackerStatus, type TradeOutcome } from './consecutive-loss.js';
export {
  TradeLogger,
  TradeLogEntrySchema,
  TRADE_CSV_HEADERS,
  csvField,
  toCsvRow,
  type TradeLogEntry,
  type LoggedTrade,
  type DailyTradeStats,
  type AllTimeTradeStats,
} from './trade-logger.js';
export {
  RiskManager,
  type RiskDecision,
  type TradeRequest,
  type ActiveTrade,
  type ClosedTrade,
  type TradeAction,
  type TradeUpdate,
  type RiskStatus,
} from './risk-manager.js';
