/**
 * @fileoverview Wires the engine, scheduler and notifier together
 * @module features/engine/orchestrator
 *
 * Owns the session-start reactions, the scheduled chat digests, webhook
 * handling and the emergency stop.
 */

import type { SentinelConfig } from '../../config/index.js';
import { errorMessage } from '../../shared/errors.js';
import {
  gradeFromScore,
  WebhookPayloadSchema,
  type ManualSignalPayload,
  type Signal,
  type WebhookPayload,
} from '../../shared/types/index.js';
import { logger } from '../../shared/utils/logger.js';
import { istDateString, istLongDate, tsLabel } from '../../shared/utils/time.js';
import { HealthChecker, type HealthReport } from '../monitoring/health.js';
import type { TradeRecord } from '../monitoring/metrics.js';
import { profitFactor, winRate } from '../monitoring/metrics.js';
import type { DailySummaryStats, WeeklySummaryStats } from '../notification/formatter.js';
import { morningUpdate, sessionStarted } from '../notification/templates.js';
import type { EngineStatus, SignalEngine } from './engine.js';
import type { SessionInfo, TradingScheduler, TradingSession } from './scheduler.js';

const log = logger.child('orchestrator');

// =============================================================================
// TYPES
// =============================================================================

/** The notifier calls the orchestrator makes */
export interface OrchestratorNotifier {
  sendMessage(text: string): Promise<boolean>;
  sendSignal(signal: Signal): Promise<boolean>;
  sendDailySummary(stats: DailySummaryStats): Promise<boolean>;
  sendWeeklySummary(stats: WeeklySummaryStats): Promise<boolean>;
}

export type WebhookOutcome =
  | { accepted: true; type: WebhookPayload['type'] }
  | { accepted: false; error: string };

export interface OrchestratorStats {
  componentStatus: Record<string, boolean>;
  uptime: string;
  engineStatus: EngineStatus;
  sessionInfo: SessionInfo;
}

/** Score given to a manual signal that does not carry one */
const MANUAL_SIGNAL_SCORE = 70;

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class Orchestrator {
  readonly health: HealthChecker;
  private readonly componentStatus: Record<string, boolean> = {
    engine: true,
    scheduler: true,
    websocket: true,
    cache: true,
    risk_manager: true,
  };

  constructor(
    private readonly engine: SignalEngine,
    private readonly scheduler: TradingScheduler,
    private readonly notifier: OrchestratorNotifier,
    private readonly config: Pick<SentinelConfig, 'risk' | 'sessions'>,
    private readonly now: () => Date = () => new Date()
  ) {
    this.health = new HealthChecker(
      {
        engineStatus: () => engine.status(),
        sessionInfo: () => scheduler.sessionInfo(),
        feedStatus: () => engine.feed.status(),
        cacheSize: () => engine.cache.size(),
      },
      { now }
    );
    this.registerCallbacks();
    log.info('Orchestrator initialized');
  }

  private registerCallbacks(): void {
    this.scheduler.onSession('asia', (session) => this.onAsiaSession(session));
    this.scheduler.onSession('london', (session) => this.onLondonSession(session));
    this.scheduler.onSession('ny', (session) => this.announceSession(session));
    this.scheduler.onSession('overlap', (session) => this.announceSession(session));
    this.scheduler.on('morning_update', () => this.sendMorningUpdate());
    this.scheduler.on('daily_summary', () => this.sendDailySummary());
    this.scheduler.on('weekly_summary', () => this.sendWeeklySummary());
  }

  // ===========================================================================
  // SESSIONS AND DIGESTS
  // ===========================================================================

  async onAsiaSession(session: TradingSession): Promise<void> {
    log.info('Asia session started - low volatility expected');
    this.engine.setMarketType('choppy');
    await this.announceSession(session);
  }

  async onLondonSession(session: TradingSession): Promise<void> {
    log.info('London session started - high volatility expected');
    await this.engine.updateRegime();
    await this.announceSession(session);
  }

  async announceSession(session: TradingSession): Promise<void> {
    await this.notifier.sendMessage(sessionStarted(session));
  }

  async sendMorningUpdate(): Promise<void> {
    await this.notifier.sendMessage(morningUpdate(this.config.risk, this.config.sessions.hours, this.now()));
  }

  async sendDailySummary(): Promise<void> {
    await this.notifier.sendDailySummary(dailyStats(this.engine.metrics.tradesFor('today')));
  }

  async sendWeeklySummary(): Promise<void> {
    await this.notifier.sendWeeklySummary(weeklyStats(this.engine.metrics.tradesFor('week')));
  }

  // ===========================================================================
  // WEBHOOK
  // ===========================================================================

  /**
   * Validates and applies a webhook body. Invalid payloads are reported, not
   * thrown.
   */
  async processWebhook(body: unknown): Promise<WebhookOutcome> {
    const parsed = WebhookPayloadSchema.safeParse(body);
    if (!parsed.success) {
      const error = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
      log.warn(`Rejected webhook: ${error}`);
      return { accepted: false, error };
    }

    const payload = parsed.data;
    log.info(`Processing webhook: ${payload.type}`);
    switch (payload.type) {
      case 'trade_result':
        this.engine.onTradeResult(payload.symbol, payload.pnl_pct);
        break;
      case 'manual_signal':
        await this.notifier.sendSignal(this.manualSignal(payload));
        log.info(`Manual signal processed: ${payload.symbol}`);
        break;
      case 'config_update':
        log.warn('Config update received - restart required to apply it');
        await this.notifier.sendMessage('⚙️ Configuration update received\n🔄 Restart the bot to apply it');
        break;
    }
    return { accepted: true, type: payload.type };
  }

  manualSignal(payload: ManualSignalPayload): Signal {
    const { marketType, btcRegime } = this.engine.store.getState();
    const risk = Math.abs(payload.entry - payload.stop_loss);
    const rrRatio = payload.rr_ratio ?? (risk > 0 ? Math.abs(payload.take_profit - payload.entry) / risk : 0);
    const score = payload.score ?? MANUAL_SIGNAL_SCORE;
    return {
      symbol: payload.symbol,
      direction: payload.direction,
      entry: payload.entry,
      stopLoss: payload.stop_loss,
      takeProfit: payload.take_profit,
      rrRatio,
      score,
      grade: payload.grade ?? gradeFromScore(score),
      confidence: payload.confidence ?? score,
      marketType,
      btcRegime: btcRegime.regime,
      structureStrength: 'MODERATE',
      filtersPassed: 0,
      timestamp: this.now().toISOString(),
      levels: {},
      keyFactors: ['Manual signal'],
      positionSize: null,
      filterSummary: 'Manual entry',
    };
  }

  // ===========================================================================
  // CONTROL
  // ===========================================================================

  healthCheck(): HealthReport {
    return this.health.check();
  }

  /**
   * Pauses evaluation and stops the scheduler. The process stays up so the
   * HTTP surface can still report status.
   */
  async emergencyStop(reason: string): Promise<void> {
    log.error(`EMERGENCY STOP: ${reason}`);
    this.engine.store.getState().setPaused(true);
    this.scheduler.stop();
    for (const key of Object.keys(this.componentStatus)) {
      this.componentStatus[key] = false;
    }
    await this.notifier.sendMessage(`🚨 EMERGENCY STOP\nReason: ${reason}\nTime: ${tsLabel(this.now())}`);
    log.error('Bot paused - resume required');
  }

  async resume(): Promise<void> {
    log.info('Resuming bot operations...');
    this.engine.store.getState().setPaused(false);
    this.scheduler.start();
    for (const key of Object.keys(this.componentStatus)) {
      this.componentStatus[key] = true;
    }
    await this.notifier.sendMessage('✅ Bot resumed normal operations');
  }

  stats(): OrchestratorStats {
    return {
      componentStatus: { ...this.componentStatus },
      uptime: this.health.uptime(),
      engineStatus: this.engine.status(),
      sessionInfo: this.scheduler.sessionInfo(),
    };
  }
}

// =============================================================================
// DIGEST STATS
// =============================================================================

export function dailyStats(trades: readonly TradeRecord[]): DailySummaryStats {
  const pnls = trades.map((t) => t.pnlPct);
  return {
    totalTrades: trades.length,
    wins: pnls.filter((p) => p > 0).length,
    losses: pnls.filter((p) => p <= 0).length,
    totalPnl: pnls.reduce((sum, p) => sum + p, 0),
    bestTrade: pnls.length > 0 ? Math.max(...pnls) : 0,
    worstTrade: pnls.length > 0 ? Math.min(...pnls) : 0,
  };
}

/**
 * Weekly figures with the best and worst IST weekday by summed P&L.
 */
export function weeklyStats(trades: readonly TradeRecord[]): WeeklySummaryStats {
  const byDay = new Map<string, { label: string; pnl: number }>();
  for (const trade of trades) {
    const at = new Date(trade.timestamp);
    const key = istDateString(at);
    const day = byDay.get(key) ?? { label: istLongDate(at).split(',')[0] ?? key, pnl: 0 };
    day.pnl += trade.pnlPct;
    byDay.set(key, day);
  }

  const days = [...byDay.values()].sort((a, b) => b.pnl - a.pnl);
  const best = days[0];
  const worst = days[days.length - 1];
  const stats: WeeklySummaryStats = {
    totalTrades: trades.length,
    winRate: winRate(trades),
    totalPnl: trades.reduce((sum, t) => sum + t.pnlPct, 0),
    profitFactor: profitFactor(trades),
  };
  if (best) stats.bestDay = best.label;
  if (worst && days.length > 1) stats.worstDay = worst.label;
  return stats;
}
