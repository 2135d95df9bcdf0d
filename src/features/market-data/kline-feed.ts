/**
 * @fileoverview Combined-stream kline WebSocket feed
 * @module features/market-data/kline-feed
 *
 * Subscribes to `<symbol>@kline_<tf>` for every pair and timeframe on one
 * combined-stream connection. Every message updates the cache; a closed
 * candle also fires `onCandleClose` with the cached series.
 */

import WebSocket, { type RawData } from 'ws';
import { z } from 'zod';
import type { WebSocketConfig } from '../../config/index.js';
import { errorMessage } from '../../shared/errors.js';
import type { Candle, Timeframe } from '../../shared/types/index.js';
import { TimeframeSchema } from '../../shared/types/index.js';
import { logger } from '../../shared/utils/logger.js';
import type { CandleCache } from './candle-cache.js';
import { fromExchangeSymbol, klineStreamName } from './symbols.js';

const log = logger.child('ws');

// =============================================================================
// TYPES
// =============================================================================

/**
 * The part of a `ws` WebSocket the feed uses.
 */
export interface FeedSocket {
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: RawData) => void): unknown;
  on(event: 'close', listener: (code: number) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  ping(): void;
  close(): void;
}

export type SocketFactory = (url: string) => FeedSocket;

export type CandleCloseHandler = (symbol: string, timeframe: Timeframe, candles: Candle[]) => Promise<void> | void;

export interface ParsedKline {
  symbol: string;
  timeframe: Timeframe;
  candle: Candle;
  isClosed: boolean;
}

export interface FeedStatus {
  connected: boolean;
  reconnectAttempts: number;
  streams: number;
  lastMessageAt: number | null;
}

export interface KlineFeedOptions {
  baseUrl: string;
  symbols: string[];
  timeframes: Timeframe[];
  cache: CandleCache;
  config: WebSocketConfig;
  onCandleClose?: CandleCloseHandler;
  socketFactory?: SocketFactory;
  now?: () => number;
}

// =============================================================================
// MESSAGE PARSING
// =============================================================================

const KlineEventSchema = z.object({
  s: z.string(),
  k: z.object({
    t: z.number(),
    i: z.string(),
    o: z.coerce.number(),
    h: z.coerce.number(),
    l: z.coerce.number(),
    c: z.coerce.number(),
    v: z.coerce.number(),
    x: z.boolean().default(false),
  }),
});

const CombinedMessageSchema = z.object({
  stream: z.string(),
  data: z.unknown(),
});

/**
 * Parses a kline event (the `data` of a combined-stream message).
 * Returns null for anything else.
 */
export function parseKline(data: unknown): ParsedKline | null {
  const parsed = KlineEventSchema.safeParse(data);
  if (!parsed.success) {
    return null;
  }
  const { s, k } = parsed.data;
  const timeframe = TimeframeSchema.safeParse(k.i);
  if (!timeframe.success) {
    return null;
  }
  return {
    symbol: fromExchangeSymbol(s),
    timeframe: timeframe.data,
    candle: [k.t, k.o, k.h, k.l, k.c, k.v],
    isClosed: k.x,
  };
}

// =============================================================================
// KLINE FEED
// =============================================================================

export class KlineFeed {
  private readonly options: KlineFeedOptions;
  private readonly socketFactory: SocketFactory;
  private readonly now: () => number;
  private socket: FeedSocket | undefined;
  private pingTimer: NodeJS.Timeout | undefined;
  private reconnectTimer: NodeJS.Timeout | undefined;
  private connected = false;
  private stopped = true;
  private reconnectAttempts = 0;
  private lastMessageAt: number | null = null;

  constructor(options: KlineFeedOptions) {
    this.options = options;
    this.socketFactory = options.socketFactory ?? ((url) => new WebSocket(url));
    this.now = options.now ?? Date.now;
  }

  streams(): string[] {
    const { symbols, timeframes } = this.options;
    return symbols.flatMap((symbol) => timeframes.map((tf) => klineStreamName(symbol, tf)));
  }

  url(): string {
    return `${this.options.baseUrl.replace(/\/$/, '')}/stream?streams=${this.streams().join('/')}`;
  }

  start(): void {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;
    this.reconnectAttempts = 0;
    this.connect();
  }

  stop(): void {
    this.stopped = true;
    this.clearTimers();
    this.socket?.close();
    this.socket = undefined;
    this.connected = false;
    log.info('WebSocket feed stopped');
  }

  isConnected(): boolean {
    return this.connected;
  }

  status(): FeedStatus {
    return {
      connected: this.connected,
      reconnectAttempts: this.reconnectAttempts,
      streams: this.streams().length,
      lastMessageAt: this.lastMessageAt,
    };
  }

  // ---------------------------------------------------------------------------
  // Connection lifecycle
  // ---------------------------------------------------------------------------

  private connect(): void {
    const streams = this.streams();
    log.info(`Connecting to WebSocket: ${streams.length} streams`);

    const socket = this.socketFactory(this.url());
    this.socket = socket;

    socket.on('open', () => {
      this.connected = true;
      this.reconnectAttempts = 0;
      log.success('WebSocket connected');
      this.pingTimer = setInterval(() => socket.ping(), this.options.config.pingIntervalMs);
    });

    socket.on('message', (data) => {
      void this.handleMessage(data.toString());
    });

    socket.on('error', (error) => {
      log.warn(`WebSocket error: ${error.message}`);
    });

    socket.on('close', (code) => {
      this.connected = false;
      if (this.pingTimer) {
        clearInterval(this.pingTimer);
        this.pingTimer = undefined;
      }
      if (!this.stopped) {
        log.warn(`WebSocket closed (${code})`);
        this.scheduleReconnect();
      }
    });
  }

  private scheduleReconnect(): void {
    const { maxRetries, reconnectDelayMs } = this.options.config;
    this.reconnectAttempts++;

    if (this.reconnectAttempts > maxRetries) {
      log.error(`Max retries (${maxRetries}) reached; feed stopped`);
      this.stopped = true;
      return;
    }

    const wait = reconnectDelayMs * Math.pow(2, this.reconnectAttempts - 1);
    log.warn(`Reconnecting in ${wait}ms (attempt ${this.reconnectAttempts}/${maxRetries})`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      if (!this.stopped) {
        this.connect();
      }
    }, wait);
  }

  private clearTimers(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = undefined;
    }
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
  }

  // ---------------------------------------------------------------------------
  // Messages
  // ---------------------------------------------------------------------------

  /**
   * Applies one raw message to the cache and fires the close callback.
   */
  async handleMessage(raw: string): Promise<void> {
    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch {
      log.debug('Invalid JSON received');
      return;
    }
    this.lastMessageAt = this.now();

    const envelope = CombinedMessageSchema.safeParse(body);
    const kline = parseKline(envelope.success ? envelope.data.data : body);
    if (!kline) {
      return;
    }

    const { symbol, timeframe, candle, isClosed } = kline;
    this.options.cache.update(symbol, timeframe, candle);

    if (isClosed && this.options.onCandleClose) {
      try {
        await this.options.onCandleClose(symbol, timeframe, this.options.cache.get(symbol, timeframe));
      } catch (error) {
        log.error(`Candle close handler failed for ${symbol} ${timeframe}: ${errorMessage(error)}`);
      }
    }
  }
}
