/**
 * @fileoverview Net profit after Indian exchange deductions
 * @module shared/utils/profit
 *
 * TDS is withheld at 1% of a positive gross profit. GST is charged at 18%,
 * on gross profit in the quick estimate and on brokerage in the full
 * calculator.
 */

import type { TradeDirection } from '../types/index.js';
import { logger } from './logger.js';
import { round } from './math.js';

const log = logger.child('profit');

export const TDS_RATE = 1.0;
export const GST_RATE = 18.0;
export const BROKERAGE_RATE = 0.1;

export interface IndianProfit {
  gross: number;
  tds: number;
  gst: number;
  netPnl: number;
}

function grossPnl(entry: number, exit: number, qty: number, side: TradeDirection): number {
  return side === 'LONG' ? (exit - entry) * qty : (entry - exit) * qty;
}

/**
 * Quick estimate used in chat messages. Losses carry no deductions.
 */
export function calculateIndianProfit(entry: number, exit: number, qty: number, side: TradeDirection): IndianProfit {
  const gross = grossPnl(entry, exit, qty, side);
  if (gross <= 0) {
    return { gross, tds: 0, gst: 0, netPnl: gross };
  }

  const tds = gross * (TDS_RATE / 100);
  const gst = gross * (GST_RATE / 100);
  return {
    gross: round(gross, 2),
    tds: round(tds, 2),
    gst: round(gst, 2),
    netPnl: round(gross - tds - gst, 2),
  };
}

// =============================================================================
// PROFIT CALCULATOR
// =============================================================================

export interface ProfitTradeResult {
  symbol: string;
  direction: TradeDirection;
  entry: number;
  exit: number;
  quantity: number;
  grossPnl: number;
  tds: number;
  gst: number;
  brokerage: number;
  netPnl: number;
  pnlPercent: number;
}

export interface DailyProfitSummary {
  totalTrades: number;
  wins: number;
  losses: number;
  winRate: number;
  grossPnl: number;
  netPnl: number;
  totalTds: number;
  totalGst: number;
  totalBrokerage: number;
  targetAchieved: boolean;
}

/**
 * Running net P&L for the day including brokerage, TDS and GST.
 */
export class ProfitCalculator {
  private readonly trades: ProfitTradeResult[] = [];
  private dailyNet = 0;

  constructor(
    private readonly dailyProfitTarget: number,
    private readonly brokerageRate: number = BROKERAGE_RATE
  ) {}

  calculate(entry: number, exit: number, qty: number, side: TradeDirection, symbol: string): ProfitTradeResult {
    const gross = grossPnl(entry, exit, qty, side);
    const pnlPercent = side === 'LONG' ? ((exit - entry) / entry) * 100 : ((entry - exit) / entry) * 100;

    const brokerage = entry * qty * (this.brokerageRate / 100);
    const tds = gross > 0 ? gross * (TDS_RATE / 100) : 0;
    const gst = brokerage * (GST_RATE / 100);
    const net = gross - brokerage - tds - gst;

    const result: ProfitTradeResult = {
      symbol,
      direction: side,
      entry,
      exit,
      quantity: qty,
      grossPnl: round(gross, 2),
      tds: round(tds, 2),
      gst: round(gst, 2),
      brokerage: round(brokerage, 2),
      netPnl: round(net, 2),
      pnlPercent: round(pnlPercent, 2),
    };

    this.trades.push(result);
    this.dailyNet += net;
    log.info(`${symbol} ${side} | Gross: ₹${gross.toFixed(2)} | Net: ₹${net.toFixed(2)}`);

    return result;
  }

  get dailyPnl(): number {
    return this.dailyNet;
  }

  dailySummary(): DailyProfitSummary {
    const total = this.trades.length;
    const totals = this.trades.reduce(
      (acc, t) => ({
        gross: acc.gross + t.grossPnl,
        net: acc.net + t.netPnl,
        tds: acc.tds + t.tds,
        gst: acc.gst + t.gst,
        brokerage: acc.brokerage + t.brokerage,
      }),
      { gross: 0, net: 0, tds: 0, gst: 0, brokerage: 0 }
    );
    const wins = this.trades.filter((t) => t.netPnl > 0).length;
    const losses = this.trades.filter((t) => t.netPnl < 0).length;

    return {
      totalTrades: total,
      wins,
      losses,
      winRate: total > 0 ? round((wins / total) * 100, 2) : 0,
      grossPnl: round(totals.gross, 2),
      netPnl: round(totals.net, 2),
      totalTds: round(totals.tds, 2),
      totalGst: round(totals.gst, 2),
      totalBrokerage: round(totals.brokerage, 2),
      targetAchieved: total > 0 && totals.net >= this.dailyProfitTarget,
    };
  }

  resetDaily(): void {
    this.trades.length = 0;
    this.dailyNet = 0;
  }
}
