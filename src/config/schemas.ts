/**
 * @fileoverview Configuration schemas for the signal desk
 * @module config/schemas
 */

import { z } from 'zod';
import { TimeframeSchema } from '../shared/types/index.js';

// =============================================================================
// CONNECTIVITY
// =============================================================================

export const TelegramConfigSchema = z.object({
  botToken: z.string().default(''),
  chatId: z.string().default(''),
  apiBaseUrl: z.string().url().default('https://api.telegram.org'),
  /** Minimum gap between two sends */
  minIntervalMs: z.number().int().nonnegative().default(1000),
});
export type TelegramConfig = z.infer<typeof TelegramConfigSchema>;

export const ExchangeConfigSchema = z.object({
  restBaseUrl: z.string().url().default('https://fapi.binance.com'),
  wsBaseUrl: z.string().url().default('wss://fstream.binance.com'),
  apiKey: z.string().optional(),
  apiSecret: z.string().optional(),
  timeoutMs: z.number().int().positive().default(10000),
  /** Concurrent REST requests */
  maxConcurrent: z.number().int().positive().default(10),
});
export type ExchangeConfig = z.infer<typeof ExchangeConfigSchema>;

export const WebSocketConfigSchema = z.object({
  reconnectDelayMs: z.number().int().nonnegative().default(5000),
  maxRetries: z.number().int().nonnegative().default(10),
  pingIntervalMs: z.number().int().positive().default(20000),
});
export type WebSocketConfig = z.infer<typeof WebSocketConfigSchema>;

export const ServerConfigSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(1).max(65535).default(8080),
  workers: z.number().int().positive().default(2),
  /** Accepted for parity with thread-based servers; only logged */
  threads: z.number().int().positive().default(2),
  requestTimeoutMs: z.number().int().positive().default(120000),
  webhookSecret: z.string().default('default-secret-change-this'),
});
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

// =============================================================================
// RISK
// =============================================================================

export const RiskConfigSchema = z.object({
  accountSize: z.number().default(100000),
  /** Percent of the account risked per trade */
  riskPerTrade: z.number().default(1.0),
  maxLeverage: z.number().int().default(15),
  maxPositionPct: z.number().positive().default(30),
  minPositionSize: z.number().nonnegative().default(10),
  maxConcurrent: z.number().int().positive().default(1),
  /** Negative percent, e.g. -2 */
  maxDailyDrawdownPct: z.number().default(-2.0),
  maxConsecutiveLosses: z.number().int().positive().default(2),
  breakEvenAtR: z.number().positive().default(0.5),
  partialExitAtR: z.number().positive().default(1.0),
  cooldownMinutes: z.number().nonnegative().default(15),
  dailyProfitTarget: z.number().default(500),
  weeklyProfitTarget: z.number().default(2500),
  monthlyProfitTarget: z.number().default(10000),
});
export type RiskConfig = z.infer<typeof RiskConfigSchema>;

export const SignalLimitsSchema = z.object({
  default: z.number().int().positive().default(4),
  trending: z.number().int().positive().default(5),
  choppy: z.number().int().positive().default(3),
  high_vol: z.number().int().positive().default(2),
  after_2_losses: z.number().int().positive().default(1),
});
export type SignalLimits = z.infer<typeof SignalLimitsSchema>;

export const AtrConfigSchema = z.object({
  period: z.number().int().positive().default(14),
  slMult: z.number().positive().default(1.5),
  tpMult: z.number().positive().default(3.0),
  minPct: z.number().nonnegative().default(0.4),
  maxPct: z.number().positive().default(3.0),
});
export type AtrConfig = z.infer<typeof AtrConfigSchema>;

// =============================================================================
// FILTERS & MARKET
// =============================================================================

export const Tier2WeightsSchema = z.object({
  mtf_confirmation: z.number().nonnegative().default(20),
  volume_profile: z.number().nonnegative().default(15),
  funding_rate: z.number().nonnegative().default(10),
  open_interest: z.number().nonnegative().default(10),
  rsi_divergence: z.number().nonnegative().default(15),
  ema_stack: z.number().nonnegative().default(10),
  atr_percent: z.number().nonnegative().default(10),
  vwap_position: z.number().nonnegative().default(5),
  support_resistance: z.number().nonnegative().default(5),
});
export type Tier2Weights = z.infer<typeof Tier2WeightsSchema>;
export type Tier2FilterName = keyof Tier2Weights;

export const FilterConfigSchema = z.object({
  minTier2Score: z.number().default(60),
  minSignalScore: z.number().default(60),
  strongSignalScore: z.number().default(75),
  minRr: z.number().positive().default(1.5),
  tier2Weights: Tier2WeightsSchema.default({}),
});
export type FilterConfig = z.infer<typeof FilterConfigSchema>;

export const MarketProfileSchema = z.object({
  minScore: z.number(),
  minFilters: z.number().int(),
  minRr: z.number(),
  maxSignals: z.number().int(),
  positionSize: z.number(),
  slMult: z.number(),
  tpMult: z.number(),
});
export type MarketProfile = z.infer<typeof MarketProfileSchema>;

export const MarketConfigsSchema = z.object({
  trending: MarketProfileSchema.default({
    minScore: 65, minFilters: 3, minRr: 2.0, maxSignals: 5, positionSize: 1.0, slMult: 1.5, tpMult: 3.0,
  }),
  choppy: MarketProfileSchema.default({
    minScore: 60, minFilters: 2, minRr: 1.5, maxSignals: 3, positionSize: 0.8, slMult: 1.2, tpMult: 1.8,
  }),
  high_vol: MarketProfileSchema.default({
    minScore: 75, minFilters: 4, minRr: 2.5, maxSignals: 2, positionSize: 0.5, slMult: 1.0, tpMult: 2.5,
  }),
});
export type MarketConfigs = z.infer<typeof MarketConfigsSchema>;

export const BtcRegimeConfigSchema = z.object({
  hardBlockConfidence: z.number().default(8),
  choppyMinConfidence: z.number().default(15),
  trendMinConfidence: z.number().default(20),
  choppyAdxMin: z.number().default(18),
  trendAdxMin: z.number().default(20),
});
export type BtcRegimeConfig = z.infer<typeof BtcRegimeConfigSchema>;

export const IndicatorConfigSchema = z.object({
  rsiPeriod: z.number().int().positive().default(14),
  rsiOversold: z.number().default(30),
  rsiOverbought: z.number().default(70),
  emaFast: z.number().int().positive().default(9),
  emaSlow: z.number().int().positive().default(21),
  emaTrend: z.number().int().positive().default(200),
  bbPeriod: z.number().int().positive().default(20),
  bbStd: z.number().positive().default(2),
  volumeMaPeriod: z.number().int().positive().default(20),
});
export type IndicatorConfig = z.infer<typeof IndicatorConfigSchema>;

// =============================================================================
// SESSIONS
// =============================================================================

const HourWindowSchema = z.tuple([z.number().int().min(0).max(24), z.number().int().min(0).max(24)]);

export const SessionsConfigSchema = z.object({
  hours: z
    .object({
      asia: HourWindowSchema.default([7, 11]),
      london: HourWindowSchema.default([13, 17]),
      ny: HourWindowSchema.default([18, 22]),
      overlap: HourWindowSchema.default([22, 24]),
      dead: HourWindowSchema.default([0, 6]),
    })
    .default({}),
  avoid: z
    .array(z.object({ start: z.number().int(), end: z.number().int(), label: z.string() }))
    .default([
      { start: 10, end: 11, label: 'Lunch' },
      { start: 23, end: 1, label: 'Dead Zone' },
    ]),
});
export type SessionsConfig = z.infer<typeof SessionsConfigSchema>;

// =============================================================================
// ROOT
// =============================================================================

export const EnvironmentSchema = z.enum(['development', 'production']);
export type Environment = z.infer<typeof EnvironmentSchema>;

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Complete application configuration.
 */
export const SentinelConfigSchema = z.object({
  env: EnvironmentSchema.default('development'),
  logLevel: LogLevelSchema.default('info'),
  telegram: TelegramConfigSchema.default({}),
  exchange: ExchangeConfigSchema.default({}),
  websocket: WebSocketConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  tradingPairs: z.array(z.string().regex(/^[A-Z0-9]+\/[A-Z0-9]+$/)).min(1).default([
    'BTC/USDT',
    'ETH/USDT',
    'DOGE/USDT',
    'SOL/USDT',
    'RENDER/USDT',
  ]),
  timeframes: z.array(TimeframeSchema).min(1).default(['5m', '15m', '1h', '4h']),
  primaryTimeframe: TimeframeSchema.default('15m'),
  risk: RiskConfigSchema.default({}),
  signalLimits: SignalLimitsSchema.default({}),
  atr: AtrConfigSchema.default({}),
  filters: FilterConfigSchema.default({}),
  marketConfigs: MarketConfigsSchema.default({}),
  btcRegime: BtcRegimeConfigSchema.default({}),
  indicators: IndicatorConfigSchema.default({}),
  sessions: SessionsConfigSchema.default({}),
  fearGreedUrl: z.string().url().default('https://api.alternative.me/fng/?limit=1'),
  /** Candles kept per symbol and timeframe */
  cacheSize: z.number().int().positive().default(100),
  tradeLogDir: z.string().default('trade_logs'),
  dataDir: z.string().default('data'),
});
export type SentinelConfig = z.infer<typeof SentinelConfigSchema>;
/** Loose input accepted before defaults are applied */
export type SentinelConfigInput = z.input<typeof SentinelConfigSchema>;
