/**
 * @fileoverview Configuration loader with file discovery and merging
 * @module config/loader
 *
 * Configuration is loaded from multiple sources with the following precedence:
 * 1. Environment variables (highest)
 * 2. sentinel.config.yaml in the working directory (or --config)
 * 3. Default values (lowest)
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/utils/logger.js';
import { SentinelConfigSchema, type SentinelConfig } from './schemas.js';

const log = logger.child('config');

// =============================================================================
// CONSTANTS
// =============================================================================

export const CONFIG_FILE_NAME = 'sentinel.config.yaml';

/** Placeholder values shipped in example env files */
const PLACEHOLDERS = new Set([
  'your_bot_token_here',
  'your_chat_id_here',
  'your_binance_api_key',
  'your_binance_secret',
]);

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// =============================================================================
// FILE READING
// =============================================================================

/**
 * Reads a file, or returns undefined when it does not exist.
 */
function safeReadFile(filePath: string): string | undefined {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

/**
 * Parses YAML into an object. Non-object documents yield `{}`.
 */
function safeParseYaml(content: string | undefined, source: string): PlainObject {
  if (content === undefined) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${source}`, [error instanceof Error ? error.message : String(error)]);
  }
  return isPlainObject(parsed) ? parsed : {};
}

/**
 * Loads the YAML config file. A missing default file is fine; a missing
 * explicit `--config` path is not.
 */
export function loadConfigFile(configPath?: string, cwd: string = process.cwd()): PlainObject {
  const resolved = configPath ? path.resolve(cwd, configPath) : path.join(cwd, CONFIG_FILE_NAME);
  const content = safeReadFile(resolved);

  if (content === undefined && configPath) {
    throw new ConfigError(`Config file not found: ${resolved}`);
  }
  if (content !== undefined) {
    log.debug(`Loaded config file ${resolved}`);
  }
  return safeParseYaml(content, resolved);
}

// =============================================================================
// ENVIRONMENT VARIABLES
// =============================================================================

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

function numeric(value: string | undefined): number | undefined {
  const text = nonEmpty(value);
  return text === undefined ? undefined : Number(text);
}

function setPath(target: PlainObject, keys: string[], value: unknown): void {
  if (value === undefined) {
    return;
  }
  let cursor = target;
  for (const key of keys.slice(0, -1)) {
    const next = cursor[key];
    if (isPlainObject(next)) {
      cursor = next;
    } else {
      const created: PlainObject = {};
      cursor[key] = created;
      cursor = created;
    }
  }
  const last = keys[keys.length - 1];
  if (last !== undefined) {
    cursor[last] = value;
  }
}

/**
 * Maps recognised environment variables onto the config shape.
 * Non-numeric numbers pass through as NaN and fail validation.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): PlainObject {
  const overrides: PlainObject = {};
  setPath(overrides, ['env'], nonEmpty(env['ENVIRONMENT']));
  setPath(overrides, ['logLevel'], nonEmpty(env['LOG_LEVEL'])?.toLowerCase().replace(/^warning$/, 'warn'));
  setPath(overrides, ['telegram', 'botToken'], nonEmpty(env['TELEGRAM_BOT_TOKEN']));
  setPath(overrides, ['telegram', 'chatId'], nonEmpty(env['TELEGRAM_CHAT_ID']));
  setPath(overrides, ['exchange', 'apiKey'], nonEmpty(env['BINANCE_API_KEY']));
  setPath(overrides, ['exchange', 'apiSecret'], nonEmpty(env['BINANCE_SECRET']));
  setPath(overrides, ['risk', 'accountSize'], numeric(env['ACCOUNT_SIZE']));
  setPath(overrides, ['risk', 'riskPerTrade'], numeric(env['RISK_PER_TRADE']));
  setPath(overrides, ['risk', 'maxLeverage'], numeric(env['MAX_LEVERAGE']));
  setPath(overrides, ['server', 'port'], numeric(env['PORT']));
  setPath(overrides, ['server', 'webhookSecret'], nonEmpty(env['WEBHOOK_SECRET']));
  return overrides;
}

// =============================================================================
// MERGING
// =============================================================================

/**
 * Recursively merges plain objects. Arrays and scalars from `override` replace
 * those in `base`.
 */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return result;
}

// =============================================================================
// CONFIG LOADING
// =============================================================================

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Loads, merges and schema-checks configuration. Range checks that depend on
 * the environment are left to `validateConfig`.
 */
export function loadConfig(options: LoadConfigOptions = {}): SentinelConfig {
  const fileConfig = loadConfigFile(options.configPath, options.cwd);
  const merged = deepMerge(fileConfig, readEnvOverrides(options.env));

  const result = SentinelConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError('Configuration is invalid', issues);
  }
  return result.data;
}

// =============================================================================
// VALIDATION
// =============================================================================

function isMissing(value: string | undefined): boolean {
  return value === undefined || value === '' || PLACEHOLDERS.has(value);
}

/**
 * Collects every problem with a loaded config.
 */
export function collectConfigIssues(config: SentinelConfig): string[] {
  const issues: string[] = [];
  const production = config.env === 'production';

  if (production) {
    if (isMissing(config.telegram.botToken)) issues.push('Invalid TELEGRAM_BOT_TOKEN');
    if (isMissing(config.telegram.chatId)) issues.push('Invalid TELEGRAM_CHAT_ID');
    if (isMissing(config.exchange.apiKey)) issues.push('BINANCE_API_KEY required in production');
    if (isMissing(config.exchange.apiSecret)) issues.push('BINANCE_SECRET required in production');
  }

  const { risk, filters } = config;
  if (risk.accountSize <= 0) {
    issues.push('ACCOUNT_SIZE must be positive');
  }
  if (risk.riskPerTrade <= 0 || risk.riskPerTrade > 5) {
    issues.push('RISK_PER_TRADE must be between 0 and 5');
  }
  if (risk.maxLeverage < 1 || risk.maxLeverage > 20) {
    issues.push('MAX_LEVERAGE must be between 1 and 20');
  }
  if (filters.minTier2Score < 0 || filters.minTier2Score > 100) {
    issues.push('MIN_TIER2_SCORE must be between 0 and 100');
  }
  if (filters.minSignalScore < 0 || filters.minSignalScore > 100) {
    issues.push('MIN_SIGNAL_SCORE must be between 0 and 100');
  }
  return issues;
}

/**
 * Throws `ConfigError` listing every issue, if any.
 */
export function validateConfig(config: SentinelConfig): SentinelConfig {
  const issues = collectConfigIssues(config);
  if (issues.length > 0) {
    throw new ConfigError(`Configuration invalid: ${issues.join('; ')}`, issues);
  }
  log.debug('All configuration checks passed');
  return config;
}

/**
 * Whether Telegram credentials are usable for sending.
 */
export function hasTelegramCredentials(config: Pick<SentinelConfig, 'telegram'>): boolean {
  return !isMissing(config.telegram.botToken) && !isMissing(config.telegram.chatId);
}
