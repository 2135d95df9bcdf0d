/**
 * @fileoverview Binance USD-M futures REST client
 * @module features/market-data/exchange-client
 *
 * Market data only: klines, depth, tickers, funding and open interest, plus
 * the alternative.me fear & greed index. Every fetcher retries transient
 * failures and falls back to an empty default so one bad call never stops a
 * scan.
 */

import { z } from 'zod';
import type { ExchangeConfig } from '../../config/index.js';
import { DEFAULT_FEAR_INDEX } from '../../shared/constants/index.js';
import { errorMessage, SentinelError } from '../../shared/errors.js';
import type { Candle, OrderBook, Ticker, Timeframe } from '../../shared/types/index.js';
import { logger } from '../../shared/utils/logger.js';
import { RetryExecutor } from '../../shared/utils/retry.js';
import { HttpClient } from './http-client.js';
import { RequestPriority, RequestQueue } from './request-queue.js';
import { toExchangeSymbol } from './symbols.js';

const log = logger.child('exchange');

/** Binance caps klines at 1500; 1000 keeps request weight low */
export const HISTORY_PAGE_SIZE = 1000;

// =============================================================================
// RESPONSE SCHEMAS
// =============================================================================

const KlineRowSchema = z
  .tuple([z.number(), z.coerce.number(), z.coerce.number(), z.coerce.number(), z.coerce.number(), z.coerce.number()])
  .rest(z.unknown());
const KlinesSchema = z.array(KlineRowSchema);

const BookLevelSchema = z.tuple([z.coerce.number(), z.coerce.number()]).rest(z.unknown());
const DepthSchema = z.object({
  bids: z.array(BookLevelSchema),
  asks: z.array(BookLevelSchema),
  T: z.number().optional(),
  E: z.number().optional(),
});

const Ticker24hSchema = z.object({
  symbol: z.string(),
  lastPrice: z.coerce.number(),
  priceChangePercent: z.coerce.number(),
  volume: z.coerce.number(),
});

const BookTickerSchema = z.object({
  bidPrice: z.coerce.number(),
  askPrice: z.coerce.number(),
});

const PremiumIndexSchema = z.object({
  lastFundingRate: z.coerce.number(),
});

const OpenInterestSchema = z.object({
  openInterest: z.coerce.number(),
});

const FearGreedSchema = z.object({
  data: z.array(z.object({ value: z.coerce.number() })).min(1),
});

function parseWith<S extends z.ZodTypeAny>(schema: S, body: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new SentinelError('INVALID_RESPONSE', `Unexpected ${what} payload: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}

// =============================================================================
// MARKET DATA SOURCE
// =============================================================================

/**
 * What the engine needs from an exchange. Implemented by `ExchangeClient`;
 * tests supply in-memory fakes.
 */
export interface MarketDataSource {
  fetchOhlcv(symbol: string, timeframe: Timeframe, limit?: number): Promise<Candle[]>;
  fetchOrderbook(symbol: string, limit?: number): Promise<OrderBook>;
  fetchTicker(symbol: string): Promise<Ticker>;
  fetchFundingRate(symbol: string): Promise<number>;
  fetchOpenInterest(symbol: string): Promise<number>;
  fetchFearGreed(): Promise<number>;
}

export interface ExchangeClientOptions {
  exchange: ExchangeConfig;
  fearGreedUrl: string;
  http?: HttpClient;
  retry?: RetryExecutor;
}

// =============================================================================
// EXCHANGE CLIENT
// =============================================================================

export class ExchangeClient implements MarketDataSource {
  private readonly baseUrl: string;
  private readonly fearGreedUrl: string;
  private readonly http: HttpClient;
  private readonly retry: RetryExecutor;
  private readonly queue: RequestQueue;

  constructor(options: ExchangeClientOptions) {
    const { exchange } = options;
    this.baseUrl = exchange.restBaseUrl.replace(/\/$/, '');
    this.fearGreedUrl = options.fearGreedUrl;
    this.http =
      options.http ??
      new HttpClient({
        timeoutMs: exchange.timeoutMs,
        defaultHeaders: exchange.apiKey ? { 'X-MBX-APIKEY': exchange.apiKey } : {},
      });
    this.retry = options.retry ?? new RetryExecutor();
    this.queue = new RequestQueue({ maxConcurrent: exchange.maxConcurrent });
  }

  // ---------------------------------------------------------------------------
  // Plumbing
  // ---------------------------------------------------------------------------

  private get(path: string, query: Record<string, string | number | undefined>, priority?: RequestPriority): Promise<unknown> {
    return this.queue.enqueue(() => this.http.getJson(`${this.baseUrl}${path}`, { query }), priority);
  }

  /**
   * Runs a fetch with retries; on final failure logs and returns `fallback`.
   */
  private async withFallback<T>(name: string, fallback: T, operation: () => Promise<T>): Promise<T> {
    const result = await this.retry.execute(operation, name);
    if (result.success) {
      return result.value;
    }
    log.warn(`${name} failed: ${result.error.message}`);
    return fallback;
  }

  // ---------------------------------------------------------------------------
  // Candles
  // ---------------------------------------------------------------------------

  /**
   * Fetches candles oldest-first. Empty on failure.
   */
  fetchOhlcv(symbol: string, timeframe: Timeframe, limit = 100, since?: number, until?: number): Promise<Candle[]> {
    return this.withFallback<Candle[]>(`klines ${symbol} ${timeframe}`, [], () => this.requestKlines(symbol, timeframe, limit, since, until));
  }

  private async requestKlines(symbol: string, timeframe: Timeframe, limit: number, since?: number, until?: number): Promise<Candle[]> {
    const body = await this.get('/fapi/v1/klines', {
      symbol: toExchangeSymbol(symbol),
      interval: timeframe,
      limit,
      startTime: since,
      endTime: until,
    });
    return parseWith(KlinesSchema, body, 'klines').map(
      ([t, o, h, l, c, v]): Candle => [t, o, h, l, c, v]
    );
  }

  /**
   * Fetches the same timeframe for several symbols concurrently.
   */
  async fetchMultiple(symbols: string[], timeframe: Timeframe, limit = 100): Promise<Record<string, Candle[]>> {
    const results = await Promise.all(symbols.map((symbol) => this.fetchOhlcv(symbol, timeframe, limit)));
    const output: Record<string, Candle[]> = {};
    symbols.forEach((symbol, i) => {
      output[symbol] = results[i] ?? [];
    });
    return output;
  }

  /**
   * Pages through history from `since` (inclusive) to `until`.
   */
  async fetchHistorical(symbol: string, timeframe: Timeframe, since: number, until: number = Date.now()): Promise<Candle[]> {
    const all: Candle[] = [];
    let cursor = since;

    while (cursor < until) {
      const page = await this.fetchOhlcv(symbol, timeframe, HISTORY_PAGE_SIZE, cursor, until);
      if (page.length === 0) {
        break;
      }
      all.push(...page);
      const last = page[page.length - 1];
      if (page.length < HISTORY_PAGE_SIZE || !last) {
        break;
      }
      cursor = last[0] + 1;
    }

    log.info(`Fetched ${all.length} candles for ${symbol} ${timeframe}`);
    return all.filter((c) => c[0] >= since && c[0] <= until);
  }

  // ---------------------------------------------------------------------------
  // Order book and tickers
  // ---------------------------------------------------------------------------

  fetchOrderbook(symbol: string, limit = 20): Promise<OrderBook> {
    return this.withFallback<OrderBook>(`depth ${symbol}`, { bids: [], asks: [], timestamp: 0 }, async () => {
      const body = await this.get('/fapi/v1/depth', { symbol: toExchangeSymbol(symbol), limit }, RequestPriority.HIGH);
      const depth = parseWith(DepthSchema, body, 'depth');
      return {
        bids: depth.bids.slice(0, limit).map(([p, q]): [number, number] => [p, q]),
        asks: depth.asks.slice(0, limit).map(([p, q]): [number, number] => [p, q]),
        timestamp: depth.T ?? depth.E ?? Date.now(),
      };
    });
  }

  fetchTicker(symbol: string): Promise<Ticker> {
    const empty: Ticker = { symbol, last: 0, bid: 0, ask: 0, volume: 0, changePct: 0 };
    return this.withFallback(`ticker ${symbol}`, empty, async () => {
      const query = { symbol: toExchangeSymbol(symbol) };
      const [dayBody, bookBody] = await Promise.all([
        this.get('/fapi/v1/ticker/24hr', query),
        this.get('/fapi/v1/ticker/bookTicker', query),
      ]);
      const day = parseWith(Ticker24hSchema, dayBody, 'ticker');
      const book = parseWith(BookTickerSchema, bookBody, 'book ticker');
      return {
        symbol,
        last: day.lastPrice,
        bid: book.bidPrice,
        ask: book.askPrice,
        volume: day.volume,
        changePct: day.priceChangePercent,
      };
    });
  }

  // ---------------------------------------------------------------------------
  // Derivatives data
  // ---------------------------------------------------------------------------

  fetchFundingRate(symbol: string): Promise<number> {
    return this.withFallback(`funding ${symbol}`, 0, async () => {
      const body = await this.get('/fapi/v1/premiumIndex', { symbol: toExchangeSymbol(symbol) }, RequestPriority.LOW);
      return parseWith(PremiumIndexSchema, body, 'premium index').lastFundingRate;
    });
  }

  fetchOpenInterest(symbol: string): Promise<number> {
    return this.withFallback(`open interest ${symbol}`, 0, async () => {
      const body = await this.get('/fapi/v1/openInterest', { symbol: toExchangeSymbol(symbol) }, RequestPriority.LOW);
      return parseWith(OpenInterestSchema, body, 'open interest').openInterest;
    });
  }

  // ---------------------------------------------------------------------------
  // Sentiment
  // ---------------------------------------------------------------------------

  /**
   * Fear & greed index (0-100), 50 when unavailable.
   */
  async fetchFearGreed(): Promise<number> {
    try {
      const body = await this.http.getJson(this.fearGreedUrl);
      const value = parseWith(FearGreedSchema, body, 'fear & greed').data[0]?.value;
      return value === undefined ? DEFAULT_FEAR_INDEX : Math.round(value);
    } catch (error) {
      log.warn(`Fear & Greed fetch error: ${errorMessage(error)}`);
      return DEFAULT_FEAR_INDEX;
    }
  }

  queueStats(): { queued: number; running: number } {
    return this.queue.getStats();
  }

  close(): void {
    this.queue.clear();
  }
}
