/**
 * @fileoverview Public API for configuration
 * @module config
 */

import { SentinelConfigSchema, type SentinelConfig, type SentinelConfigInput } from './schemas.js';

export {
  // Schemas
  SentinelConfigSchema,
  TelegramConfigSchema,
  ExchangeConfigSchema,
  WebSocketConfigSchema,
  ServerConfigSchema,
  RiskConfigSchema,
  SignalLimitsSchema,
  AtrConfigSchema,
  FilterConfigSchema,
  Tier2WeightsSchema,
  MarketConfigsSchema,
  BtcRegimeConfigSchema,
  IndicatorConfigSchema,
  SessionsConfigSchema,
  // Types
  type SentinelConfig,
  type SentinelConfigInput,
  type TelegramConfig,
  type ExchangeConfig,
  type WebSocketConfig,
  type ServerConfig,
  type RiskConfig,
  type SignalLimits,
  type AtrConfig,
  type FilterConfig,
  type Tier2Weights,
  type Tier2FilterName,
  type MarketProfile,
  type MarketConfigs,
  type BtcRegimeConfig,
  type IndicatorConfig,
  type SessionsConfig,
  type Environment,
} from './schemas.js';

export {
  CONFIG_FILE_NAME,
  loadConfigFile,
  readEnvOverrides,
  deepMerge,
  loadConfig,
  collectConfigIssues,
  validateConfig,
  hasTelegramCredentials,
  type LoadConfigOptions,
} from './loader.js';

/**
 * Fully defaulted config, optionally overridden. Used by tests and the
 * backtest command, which need no environment.
 */
export function createConfig(input: SentinelConfigInput = {}): SentinelConfig {
  return SentinelConfigSchema.parse(input);
}
