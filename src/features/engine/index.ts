/**
 * @fileoverview Public API for the live signal engine
 * @module features/engine
 */

export {
  SignalEngine,
  btcRetryDelayMs,
  type EngineNotifier,
  type EngineDecision,
  type EngineStatus,
  type SignalEngineOptions,
} from './engine.js';
export {
  TradingScheduler,
  type TaskName,
  type TaskCallback,
  type SessionCallback,
  type ScheduledEngine,
  type ScheduledTask,
  type SessionInfo,
  type TradingSession,
} from './scheduler.js';
export {
  Orchestrator,
  dailyStats,
  weeklyStats,
  type OrchestratorNotifier,
  type OrchestratorStats,
  type WebhookOutcome,
} from './orchestrator.js';
