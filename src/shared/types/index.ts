/**
 * @fileoverview Public API for shared types
 * @module shared/types
 */

// Market data and regime
export {
  TimeframeSchema,
  TIMEFRAME_MS,
  parseTimeframe,
  CandleSchema,
  C,
  EMPTY_ORDERBOOK,
  MarketTypeSchema,
  MARKET_EMOJI,
  BtcRegimeSchema,
  REGIME_EMOJI,
  regimeTrendDirection,
  UNKNOWN_REGIME,
  SessionSchema,
  SESSION_EMOJI,
  type Timeframe,
  type Candle,
  type BookLevel,
  type OrderBook,
  type Ticker,
  type MarketType,
  type BtcRegime,
  type BtcRegimeResult,
  type TrendDirection,
  type TrendStrength,
  type TradeMode,
  type Session,
} from './market.js';

// Signals, grades, positions and webhooks
export {
  TradeDirectionSchema,
  DIRECTION_EMOJI,
  oppositeDirection,
  SignalGradeSchema,
  GRADE_EMOJI,
  GRADE_MIN_SCORE,
  gradeFromScore,
  gradeCanTrade,
  TradeResultPayloadSchema,
  ManualSignalPayloadSchema,
  ConfigUpdatePayloadSchema,
  WebhookPayloadSchema,
  type TradeDirection,
  type SignalGrade,
  type PositionSize,
  type SizedPosition,
  type Signal,
  type TradeResultPayload,
  type ManualSignalPayload,
  type ConfigUpdatePayload,
  type WebhookPayload,
} from './trading.js';
