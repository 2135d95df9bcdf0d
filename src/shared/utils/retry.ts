/**
 * @fileoverview Retry logic with exponential backoff
 * @module shared/utils/retry
 *
 * Used by the exchange client and the Telegram notifier to ride out
 * transient network failures and rate limits.
 */

import { SentinelError, toSentinelError, type SentinelErrorCode } from '../errors.js';
import { logger } from './logger.js';

const log = logger.child('retry');

// =============================================================================
// RETRY CONFIGURATION
// =============================================================================

/**
 * Retry configuration.
 */
export interface RetryConfig {
  /** Maximum number of retries after the first attempt */
  maxRetries: number;
  /** Delay before the first retry, doubled for each one after */
  baseDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Jitter factor (0-1) */
  jitterFactor: number;
  /** Error codes that may be retried */
  retryableErrors: ReadonlySet<SentinelErrorCode>;
}

/**
 * Default retry configuration for exchange and Telegram calls.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.25,
  retryableErrors: new Set<SentinelErrorCode>([
    'NETWORK_ERROR',
    'TIMEOUT',
    'RATE_LIMITED',
    'EXCHANGE_ERROR',
  ]),
};

/**
 * Outcome of a retried operation.
 */
export type RetryResult<T> =
  | { success: true; value: T; attempts: number }
  | { success: false; error: SentinelError; attempts: number };

/**
 * Hooks that tests replace to avoid real timers and randomness.
 */
export interface RetryRuntime {
  sleep: (ms: number) => Promise<void>;
  random: () => number;
}

const defaultRuntime: RetryRuntime = {
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  random: Math.random,
};

// =============================================================================
// RETRY EXECUTOR
// =============================================================================

/**
 * Executes operations with retry and backoff.
 *
 * @example
 * ```typescript
 * const retry = new RetryExecutor({ maxRetries: 2 });
 * const candles = await retry.run(() => client.klines('BTCUSDT', '15m'), 'klines');
 * ```
 */
export class RetryExecutor {
  readonly config: RetryConfig;
  private readonly runtime: RetryRuntime;

  constructor(config: Partial<RetryConfig> = {}, runtime: Partial<RetryRuntime> = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.runtime = { ...defaultRuntime, ...runtime };
  }

  /**
   * Runs `operation`, retrying retryable failures. Never throws.
   */
  async execute<T>(operation: () => Promise<T>, operationName: string): Promise<RetryResult<T>> {
    const maxAttempts = this.config.maxRetries + 1;
    let lastError: SentinelError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const value = await operation();
        if (attempt > 1) {
          log.info(`${operationName} succeeded on attempt ${attempt}/${maxAttempts}`);
        }
        return { success: true, value, attempts: attempt };
      } catch (error) {
        lastError = toSentinelError(error);

        if (attempt >= maxAttempts || !this.shouldRetry(lastError)) {
          log.warn(`${operationName} failed after ${attempt} attempt(s): ${lastError.message}`);
          return { success: false, error: lastError, attempts: attempt };
        }

        const delay = this.calculateDelay(attempt, lastError);
        log.debug(`Retrying ${operationName} in ${delay}ms (attempt ${attempt + 1}/${maxAttempts})`);
        await this.runtime.sleep(delay);
      }
    }

    // Unreachable with maxAttempts >= 1, kept for the type checker
    return {
      success: false,
      error: lastError ?? new SentinelError('EXCHANGE_ERROR', `${operationName} failed`),
      attempts: maxAttempts,
    };
  }

  /**
   * Like `execute` but rethrows the final error.
   */
  async run<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    const result = await this.execute(operation, operationName);
    if (result.success) {
      return result.value;
    }
    throw result.error;
  }

  shouldRetry(error: SentinelError): boolean {
    if (!error.retryable || error.severity === 'critical') {
      return false;
    }
    return this.config.retryableErrors.has(error.code);
  }

  /**
   * Delay before the retry following `attempt` (1-based).
   */
  calculateDelay(attempt: number, error?: SentinelError): number {
    if (error?.retryAfterMs !== undefined) {
      return Math.min(error.retryAfterMs, this.config.maxDelayMs);
    }

    let delay = Math.min(this.config.baseDelayMs * Math.pow(2, attempt - 1), this.config.maxDelayMs);

    if (this.config.jitterFactor > 0) {
      const jitter = delay * this.config.jitterFactor * (this.runtime.random() * 2 - 1);
      delay = Math.max(0, delay + jitter);
    }

    return Math.round(delay);
  }
}

// =============================================================================
// CONVENIENCE
// =============================================================================

/**
 * Runs `operation` under a one-off `RetryExecutor` and rethrows the final
 * error.
 */
export function withRetry<T>(
  operation: () => Promise<T>,
  operationName: string,
  config: Partial<RetryConfig> = {},
  runtime: Partial<RetryRuntime> = {}
): Promise<T> {
  return new RetryExecutor(config, runtime).run(operation, operationName);
}
