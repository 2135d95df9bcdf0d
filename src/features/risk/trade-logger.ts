/**
 * @fileoverview Closed-trade journal in CSV and JSON files
 * @module features/risk/trade-logger
 *
 * Each IST day gets `trades_YYYY-MM-DD.csv` and `trades_YYYY-MM-DD.json`
 * under the log directory. The CSV gains its header when the file is first
 * created; the JSON file holds one array rewritten on every trade.
 */

import { access, appendFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { SentinelError } from '../../shared/errors.js';
import { mean, sum } from '../../shared/utils/math.js';
import { istDateString } from '../../shared/utils/time.js';
import { logger } from '../../shared/utils/logger.js';

const log = logger.child('trade-log');

export const TRADE_CSV_HEADERS = [
  'timestamp',
  'symbol',
  'direction',
  'entry',
  'exit',
  'stop_loss',
  'take_profit',
  'position_usd',
  'pnl_pct',
  'pnl_usd',
  'rr_ratio',
  'market_type',
  'grade',
  'filters_passed',
  'score',
  'reason',
] as const;

export const TradeLogEntrySchema = z.object({
  /** ISO-8601; filled in when missing */
  timestamp: z.string().optional(),
  symbol: z.string(),
  direction: z.string(),
  entry: z.number(),
  exit: z.number().optional(),
  stopLoss: z.number().optional(),
  takeProfit: z.number().optional(),
  positionUsd: z.number().optional(),
  pnlPct: z.number(),
  pnlUsd: z.number().optional(),
  rrRatio: z.number().optional(),
  marketType: z.string().optional(),
  grade: z.string().optional(),
  filtersPassed: z.number().optional(),
  score: z.number().optional(),
  reason: z.string().optional(),
});
export type TradeLogEntry = z.infer<typeof TradeLogEntrySchema>;
export type LoggedTrade = TradeLogEntry & { timestamp: string };

export interface DailyTradeStats {
  totalTrades: number;
  wins: number;
  losses: number;
  winRate: number;
  totalPnl: number;
  avgRr: number;
  bestTrade: number;
  worstTrade: number;
}

export interface AllTimeTradeStats {
  totalTrades: number;
  totalDays: number;
  avgTradesPerDay: number;
  wins: number;
  losses: number;
  winRate: number;
  totalPnl: number;
  profitFactor: number;
  avgRr: number;
}

// =============================================================================
// CSV
// =============================================================================

/**
 * Quotes a field containing a comma, quote or line break.
 */
export function csvField(value: string | number | undefined): string {
  if (value === undefined) {
    return '';
  }
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsvRow(trade: LoggedTrade): string {
  return [
    trade.timestamp,
    trade.symbol,
    trade.direction,
    trade.entry,
    trade.exit,
    trade.stopLoss,
    trade.takeProfit,
    trade.positionUsd,
    trade.pnlPct,
    trade.pnlUsd,
    trade.rrRatio,
    trade.marketType,
    trade.grade,
    trade.filtersPassed,
    trade.score,
    trade.reason,
  ]
    .map(csvField)
    .join(',');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// =============================================================================
// LOGGER
// =============================================================================

export class TradeLogger {
  private readonly trades: LoggedTrade[] = [];

  constructor(
    private readonly logDir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  csvFile(date: Date = this.now()): string {
    return path.join(this.logDir, `trades_${istDateString(date)}.csv`);
  }

  jsonFile(date: Date = this.now()): string {
    return path.join(this.logDir, `trades_${istDateString(date)}.json`);
  }

  /**
   * Records a trade in memory and appends it to today's files.
   *
   * @throws SentinelError STORAGE_ERROR when a file cannot be written
   */
  async logTrade(entry: TradeLogEntry): Promise<LoggedTrade> {
    const trade: LoggedTrade = { ...entry, timestamp: entry.timestamp ?? this.now().toISOString() };
    this.trades.push(trade);

    try {
      await mkdir(this.logDir, { recursive: true });
      await this.writeCsv(trade);
      await this.writeJson(trade);
    } catch (error) {
      throw new SentinelError('STORAGE_ERROR', `Failed to log trade for ${trade.symbol}`, {
        cause: error,
        context: { logDir: this.logDir },
      });
    }

    log.debug(`Trade logged: ${trade.symbol} @ ${trade.pnlPct.toFixed(2)}%`);
    return trade;
  }

  all(): readonly LoggedTrade[] {
    return this.trades;
  }

  tradesToday(): LoggedTrade[] {
    const today = istDateString(this.now());
    return this.trades.filter((t) => istDateString(new Date(t.timestamp)) === today);
  }

  statsToday(): DailyTradeStats {
    const trades = this.tradesToday();
    if (trades.length === 0) {
      return { totalTrades: 0, wins: 0, losses: 0, winRate: 0, totalPnl: 0, avgRr: 0, bestTrade: 0, worstTrade: 0 };
    }

    const pnls = trades.map((t) => t.pnlPct);
    const wins = pnls.filter((p) => p > 0).length;
    return {
      totalTrades: trades.length,
      wins,
      losses: trades.length - wins,
      winRate: (wins / trades.length) * 100,
      totalPnl: sum(pnls),
      avgRr: mean(trades.map((t) => t.rrRatio ?? 0)),
      bestTrade: Math.max(...pnls),
      worstTrade: Math.min(...pnls),
    };
  }

  allStats(): AllTimeTradeStats {
    const trades = this.trades;
    if (trades.length === 0) {
      return {
        totalTrades: 0,
        totalDays: 0,
        avgTradesPerDay: 0,
        wins: 0,
        losses: 0,
        winRate: 0,
        totalPnl: 0,
        profitFactor: 0,
        avgRr: 0,
      };
    }

    const days = new Set(trades.map((t) => istDateString(new Date(t.timestamp))));
    const pnls = trades.map((t) => t.pnlPct);
    const gains = pnls.filter((p) => p > 0);
    const grossProfit = sum(gains);
    const grossLoss = Math.abs(sum(pnls.filter((p) => p <= 0)));

    return {
      totalTrades: trades.length,
      totalDays: days.size,
      avgTradesPerDay: trades.length / days.size,
      wins: gains.length,
      losses: trades.length - gains.length,
      winRate: (gains.length / trades.length) * 100,
      totalPnl: sum(pnls),
      profitFactor: grossLoss > 0 ? grossProfit / grossLoss : grossProfit,
      avgRr: mean(trades.map((t) => t.rrRatio ?? 0)),
    };
  }

  private async writeCsv(trade: LoggedTrade): Promise<void> {
    const file = this.csvFile(new Date(trade.timestamp));
    let exists = true;
    try {
      await access(file);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
      exists = false;
    }
    const header = exists ? '' : `${TRADE_CSV_HEADERS.join(',')}\n`;
    await appendFile(file, `${header}${toCsvRow(trade)}\n`, 'utf-8');
  }

  private async writeJson(trade: LoggedTrade): Promise<void> {
    const file = this.jsonFile(new Date(trade.timestamp));
    const existing = await this.readJson(file);
    existing.push(trade);
    await writeFile(file, JSON.stringify(existing, null, 2), 'utf-8');
  }

  /**
   * Reads a day's JSON journal. A missing file starts a new array; an
   * unreadable one is replaced, with a warning.
   */
  private async readJson(file: string): Promise<LoggedTrade[]> {
    let text: string;
    try {
      text = await readFile(file, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      log.warn(`Replacing unreadable trade journal ${file}`, error);
      return [];
    }
    const parsed = z.array(TradeLogEntrySchema.extend({ timestamp: z.string() })).safeParse(body);
    if (!parsed.success) {
      log.warn(`Replacing malformed trade journal ${file}`);
      return [];
    }
    return parsed.data;
  }
}
