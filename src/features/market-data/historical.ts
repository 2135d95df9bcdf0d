/**
 * @fileoverview Historical candles for backtesting
 * @module features/market-data/historical
 *
 * Fetches date ranges from the exchange, stores them as JSON files under the
 * data directory and splits series into train / validation / test slices.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { SentinelError } from '../../shared/errors.js';
import type { Candle, Timeframe } from '../../shared/types/index.js';
import { TIMEFRAME_MS } from '../../shared/types/index.js';
import { logger } from '../../shared/utils/logger.js';
import type { ExchangeClient } from './exchange-client.js';

const log = logger.child('historical');

// =============================================================================
// FILE FORMAT
// =============================================================================

const TupleCandleSchema = z.tuple([z.number(), z.number(), z.number(), z.number(), z.number(), z.number()]);

const ObjectCandleSchema = z
  .object({
    timestamp: z.number(),
    open: z.number(),
    high: z.number(),
    low: z.number(),
    close: z.number(),
    volume: z.number(),
  })
  .transform((c): Candle => [c.timestamp, c.open, c.high, c.low, c.close, c.volume]);

/** Files hold either `[t, o, h, l, c, v]` rows or `{ timestamp, open, ... }` objects */
const CandleFileSchema = z.array(z.union([TupleCandleSchema, ObjectCandleSchema]));

export interface BacktestSplit {
  train: Candle[];
  validation: Candle[];
  test: Candle[];
}

/**
 * Parses `YYYY-MM-DD` as UTC midnight.
 */
export function parseDate(value: string): number {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    throw new SentinelError('BAD_REQUEST', `Invalid date "${value}", expected YYYY-MM-DD`);
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

// =============================================================================
// RESAMPLING
// =============================================================================

/**
 * Aggregates candles into a coarser timeframe. Buckets are aligned to
 * multiples of the target duration since the epoch.
 */
export function resample(candles: readonly Candle[], fromTf: Timeframe, toTf: Timeframe): Candle[] {
  const fromMs = TIMEFRAME_MS[fromTf];
  const toMs = TIMEFRAME_MS[toTf];
  if (toMs < fromMs) {
    throw new SentinelError('BAD_REQUEST', `Cannot resample ${fromTf} down to ${toTf}`);
  }
  if (toMs === fromMs) {
    return candles.slice();
  }

  const output: Candle[] = [];
  let current: Candle | undefined;

  for (const [t, o, h, l, c, v] of candles) {
    const bucket = Math.floor(t / toMs) * toMs;
    if (current && current[0] === bucket) {
      current = [bucket, current[1], Math.max(current[2], h), Math.min(current[3], l), c, current[5] + v];
      output[output.length - 1] = current;
    } else {
      current = [bucket, o, h, l, c, v];
      output.push(current);
    }
  }

  return output;
}

/**
 * Splits a series into consecutive train, validation and test slices.
 */
export function splitForBacktest(candles: readonly Candle[], trainRatio = 0.7, validationRatio = 0.15): BacktestSplit {
  const total = candles.length;
  const trainEnd = Math.floor(total * trainRatio);
  const validationEnd = Math.floor(total * (trainRatio + validationRatio));
  return {
    train: candles.slice(0, trainEnd),
    validation: candles.slice(trainEnd, validationEnd),
    test: candles.slice(validationEnd),
  };
}

// =============================================================================
// HISTORICAL DATA
// =============================================================================

export class HistoricalData {
  constructor(
    readonly dataDir: string,
    private readonly client?: Pick<ExchangeClient, 'fetchHistorical'>
  ) {}

  /**
   * Fetches `[startDate, endDate]` (inclusive days, UTC). `endDate` defaults
   * to now.
   */
  async fetchForBacktest(symbol: string, timeframe: Timeframe, startDate: string, endDate?: string, now: number = Date.now()): Promise<Candle[]> {
    if (!this.client) {
      throw new SentinelError('BAD_REQUEST', 'HistoricalData has no exchange client');
    }
    const since = parseDate(startDate);
    const until = endDate !== undefined ? parseDate(endDate) + 86_400_000 - 1 : now;

    const days = Math.floor((until - since) / 86_400_000);
    log.info(`Fetching ${days} days of ${symbol} ${timeframe} data...`);

    const candles = await this.client.fetchHistorical(symbol, timeframe, since, until);
    if (candles.length === 0) {
      log.error(`No data fetched for ${symbol}`);
    }
    return candles;
  }

  /**
   * Fetches several symbols one after another; a failed symbol yields `[]`.
   */
  async fetchMultipleSymbols(symbols: string[], timeframe: Timeframe, startDate: string, endDate?: string): Promise<Record<string, Candle[]>> {
    const results: Record<string, Candle[]> = {};
    for (const symbol of symbols) {
      try {
        results[symbol] = await this.fetchForBacktest(symbol, timeframe, startDate, endDate);
      } catch (error) {
        log.error(`Failed to fetch ${symbol}: ${error instanceof Error ? error.message : String(error)}`);
        results[symbol] = [];
      }
    }
    return results;
  }

  fileFor(filename: string): string {
    return path.join(this.dataDir, filename);
  }

  async save(filename: string, candles: readonly Candle[]): Promise<string> {
    const target = this.fileFor(filename);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, JSON.stringify(candles), 'utf-8');
    log.info(`Saved ${candles.length} candles to ${target}`);
    return target;
  }

  /**
   * Loads a candle file. Missing files yield `[]`; malformed ones throw.
   */
  async load(filename: string): Promise<Candle[]> {
    const target = this.fileFor(filename);
    let text: string;
    try {
      text = await readFile(target, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        log.error(`File not found: ${target}`);
        return [];
      }
      throw error;
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new SentinelError('INVALID_RESPONSE', `Invalid JSON in ${target}`, { cause: error });
    }

    const parsed = CandleFileSchema.safeParse(body);
    if (!parsed.success) {
      throw new SentinelError('INVALID_RESPONSE', `Invalid candle file ${target}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    const candles = parsed.data.map(([t, o, h, l, c, v]): Candle => [t, o, h, l, c, v]);
    log.info(`Loaded ${candles.length} rows from ${target}`);
    return candles;
  }
}
