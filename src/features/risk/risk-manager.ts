/**
 * @fileoverview Trade approval and active trade management
 * @module features/risk/risk-manager
 *
 * Combines the daily lock, drawdown controller and loss tracker into a single
 * gate, sizes approved trades and follows them until they close.
 */

import type { SentinelConfig } from '../../config/index.js';
import type { MarketType, PositionSize, TradeDirection } from '../../shared/types/index.js';
import { MS_IN_MINUTE } from '../../shared/constants/index.js';
import { istDateString } from '../../shared/utils/time.js';
import { logger } from '../../shared/utils/logger.js';
import { ConsecutiveLossTracker } from './consecutive-loss.js';
import { DailyLock, type DailyLockStatus } from './daily-lock.js';
import { DrawdownController, type DrawdownStatus } from './drawdown.js';
import { PositionSizer, type SizingRequest } from './position-sizing.js';

const log = logger.child('risk');

export interface RiskDecision {
  allowed: boolean;
  reason: string;
}

export interface TradeRequest {
  symbol: string;
  direction: TradeDirection;
  entry: number;
  stopLoss: number;
  takeProfit: number;
  /** Defaults to the configured account size */
  accountSize?: number;
  atrPct?: number;
  fearIndex?: number;
  marketType?: MarketType;
}

export interface ActiveTrade {
  symbol: string;
  direction: TradeDirection;
  entry: number;
  /** Current stop; moves to entry at break-even */
  stopLoss: number;
  /** Stop at approval, used to measure R */
  initialStopLoss: number;
  takeProfit: number;
  positionUsd: number;
  contracts: number;
  riskUsd: number;
  /** ISO-8601 */
  openedAt: string;
  maxHoldingMinutes: number;
  partialExitDone: boolean;
  breakEvenTriggered: boolean;
}

export interface ClosedTrade extends ActiveTrade {
  exitPrice: number;
  /** ISO-8601 */
  closedAt: string;
  pnlPct: number;
  pnlUsd: number;
  reason: string;
}

export type TradeAction = 'PARTIAL_EXIT' | 'BREAK_EVEN' | 'SL_HIT' | 'TP_HIT';

export interface TradeUpdate {
  symbol: string;
  currentPrice: number;
  /** Profit in multiples of the initial stop distance */
  currentR: number;
  action: TradeAction | null;
  message: string;
}

export interface RiskStatus {
  activeTrades: number;
  activeSymbols: string[];
  drawdown: DrawdownStatus;
  consecutiveLosses: number;
  dailyLock: DailyLockStatus;
  totalTradesToday: number;
  /** Combined drawdown and loss-streak size multiplier */
  sizeMultiplier: number;
}

const CHOPPY_MAX_HOLD_MINUTES = 60;
const DEFAULT_MAX_HOLD_MINUTES = 90;

export class RiskManager {
  readonly sizer: PositionSizer;
  readonly drawdown: DrawdownController;
  readonly dailyLock: DailyLock;
  readonly lossTracker: ConsecutiveLossTracker;

  private readonly active = new Map<string, ActiveTrade>();
  private readonly history: ClosedTrade[] = [];

  constructor(
    private readonly config: Pick<SentinelConfig, 'risk' | 'atr' | 'signalLimits'>,
    private readonly now: () => Date = () => new Date()
  ) {
    this.sizer = new PositionSizer(config);
    this.drawdown = new DrawdownController(config.risk.maxDailyDrawdownPct);
    this.dailyLock = new DailyLock(config, now);
    this.lossTracker = new ConsecutiveLossTracker(config.risk.maxConsecutiveLosses, config.risk.cooldownMinutes, now);
    log.info('RiskManager initialized');
  }

  canTrade(symbol: string): RiskDecision {
    if (!this.dailyLock.canTrade()) {
      return { allowed: false, reason: `Daily lock active: ${this.dailyLock.reason ?? 'locked'}` };
    }
    if (this.drawdown.isMaxDrawdownReached()) {
      return { allowed: false, reason: `Max drawdown reached: ${this.drawdown.currentDrawdown.toFixed(2)}%` };
    }
    if (this.lossTracker.shouldStop()) {
      return { allowed: false, reason: `Max consecutive losses: ${this.lossTracker.consecutiveLosses}` };
    }
    if (this.active.size >= this.config.risk.maxConcurrent) {
      return { allowed: false, reason: `Max concurrent trades: ${this.config.risk.maxConcurrent}` };
    }
    if (this.active.has(symbol)) {
      return { allowed: false, reason: `Active trade exists for ${symbol}` };
    }
    return { allowed: true, reason: 'OK' };
  }

  calculatePosition(request: SizingRequest): PositionSize {
    return this.sizer.calculate(request);
  }

  /**
   * Sizes and records a trade. Returns null when the gate or the sizer
   * refuses it.
   */
  approveTrade(request: TradeRequest): ActiveTrade | null {
    const decision = this.canTrade(request.symbol);
    if (!decision.allowed) {
      log.debug(`Trade rejected: ${decision.reason}`);
      return null;
    }

    const marketType = request.marketType ?? 'unknown';
    const position = this.sizer.calculate({
      accountSize: request.accountSize ?? this.config.risk.accountSize,
      entry: request.entry,
      stopLoss: request.stopLoss,
      atrPct: request.atrPct,
      fearIndex: request.fearIndex,
      marketType,
    });
    if (position.blocked) {
      log.debug(`Position sizing blocked: ${position.reason}`);
      return null;
    }

    const trade: ActiveTrade = {
      symbol: request.symbol,
      direction: request.direction,
      entry: request.entry,
      stopLoss: request.stopLoss,
      initialStopLoss: request.stopLoss,
      takeProfit: request.takeProfit,
      positionUsd: position.positionUsd,
      contracts: position.contracts,
      riskUsd: position.riskUsd,
      openedAt: this.now().toISOString(),
      maxHoldingMinutes: marketType === 'choppy' ? CHOPPY_MAX_HOLD_MINUTES : DEFAULT_MAX_HOLD_MINUTES,
      partialExitDone: false,
      breakEvenTriggered: false,
    };
    this.active.set(trade.symbol, trade);

    log.info(
      `Trade approved: ${trade.symbol} ${trade.direction} @ ${trade.entry} | ` +
        `Size: $${trade.positionUsd.toFixed(2)} | Risk: $${trade.riskUsd.toFixed(2)}`
    );
    return trade;
  }

  activeTrade(symbol: string): ActiveTrade | undefined {
    return this.active.get(symbol);
  }

  activeTrades(): ActiveTrade[] {
    return [...this.active.values()];
  }

  /**
   * Checks an active trade against a new price. When several events fire on
   * the same price the last one checked (TP, then SL, then break-even) wins.
   */
  updateTrade(symbol: string, currentPrice: number): TradeUpdate | null {
    const trade = this.active.get(symbol);
    if (!trade) {
      return null;
    }

    const long = trade.direction === 'LONG';
    const rDistance = long ? trade.entry - trade.initialStopLoss : trade.initialStopLoss - trade.entry;
    const move = long ? currentPrice - trade.entry : trade.entry - currentPrice;
    const currentR = rDistance > 0 ? move / rDistance : 0;

    const update: TradeUpdate = { symbol, currentPrice, currentR, action: null, message: '' };

    if (currentR >= this.config.risk.partialExitAtR && !trade.partialExitDone) {
      trade.partialExitDone = true;
      update.action = 'PARTIAL_EXIT';
      update.message = `Partial exit at ${currentR.toFixed(2)}R`;
    }

    if (currentR >= this.config.risk.breakEvenAtR && !trade.breakEvenTriggered) {
      trade.breakEvenTriggered = true;
      trade.stopLoss = trade.entry;
      update.action = 'BREAK_EVEN';
      update.message = `SL moved to entry at ${currentR.toFixed(2)}R`;
    }

    if (long ? currentPrice <= trade.stopLoss : currentPrice >= trade.stopLoss) {
      update.action = 'SL_HIT';
      update.message = `Stop loss hit at ${currentPrice}`;
    }

    if (long ? currentPrice >= trade.takeProfit : currentPrice <= trade.takeProfit) {
      update.action = 'TP_HIT';
      update.message = `Take profit hit at ${currentPrice}`;
    }

    return update;
  }

  /**
   * Closes an active trade and feeds its P&L to every tracker.
   */
  closeTrade(symbol: string, exitPrice: number, reason: string): ClosedTrade | null {
    const trade = this.active.get(symbol);
    if (!trade) {
      return null;
    }
    this.active.delete(symbol);

    const pnlPct =
      trade.direction === 'LONG'
        ? ((exitPrice - trade.entry) / trade.entry) * 100
        : ((trade.entry - exitPrice) / trade.entry) * 100;

    const closed: ClosedTrade = {
      ...trade,
      exitPrice,
      closedAt: this.now().toISOString(),
      pnlPct,
      pnlUsd: trade.positionUsd * (pnlPct / 100),
      reason,
    };
    this.history.push(closed);

    this.drawdown.update(pnlPct);
    this.lossTracker.update(pnlPct);
    this.dailyLock.update(pnlPct);

    if (pnlPct > 0) {
      log.success(`✅ Trade closed: ${symbol} @ ${pnlPct.toFixed(2)}% | Reason: ${reason}`);
    } else {
      log.warn(`❌ Trade closed: ${symbol} @ ${pnlPct.toFixed(2)}% | Reason: ${reason}`);
    }
    return closed;
  }

  /**
   * Applies a result reported from outside, such as a manual trade. Closes
   * the matching active trade when there is one; otherwise only the trackers
   * see it.
   */
  recordResult(symbol: string, pnlPct: number): void {
    const trade = this.active.get(symbol);
    if (trade) {
      const move = trade.entry * (pnlPct / 100);
      this.closeTrade(symbol, trade.direction === 'LONG' ? trade.entry + move : trade.entry - move, 'reported');
      return;
    }
    this.drawdown.update(pnlPct);
    this.lossTracker.update(pnlPct);
    this.dailyLock.update(pnlPct);
  }

  /**
   * Symbols held longer than their maximum holding time.
   */
  checkTimeouts(): string[] {
    const now = this.now().getTime();
    return this.activeTrades()
      .filter((t) => (now - Date.parse(t.openedAt)) / MS_IN_MINUTE > t.maxHoldingMinutes)
      .map((t) => t.symbol);
  }

  closedTrades(): readonly ClosedTrade[] {
    return this.history;
  }

  resetDaily(): void {
    this.drawdown.resetDaily(this.drawdown.currentBalance);
    this.lossTracker.reset();
    this.dailyLock.reset();
    log.info('RiskManager daily reset');
  }

  status(): RiskStatus {
    const today = istDateString(this.now());
    return {
      activeTrades: this.active.size,
      activeSymbols: [...this.active.keys()],
      drawdown: this.drawdown.status(),
      consecutiveLosses: this.lossTracker.consecutiveLosses,
      dailyLock: this.dailyLock.status(),
      totalTradesToday: this.history.filter((t) => istDateString(new Date(t.closedAt)) === today).length,
      sizeMultiplier: this.drawdown.sizeMultiplier() * this.lossTracker.sizeMultiplier(),
    };
  }
}
