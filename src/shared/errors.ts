/**
 * @fileoverview Error taxonomy shared by every feature
 * @module shared/errors
 *
 * Exchange, Telegram and config failures are normalised into a single
 * `SentinelError` carrying a code, a severity and whether a retry may help.
 */

// =============================================================================
// ERROR TYPES
// =============================================================================

/**
 * Error codes used across the application.
 */
export type SentinelErrorCode =
  | 'NETWORK_ERROR'
  | 'TIMEOUT'
  | 'RATE_LIMITED'
  | 'EXCHANGE_ERROR'
  | 'INVALID_RESPONSE'
  | 'CONFIG_INVALID'
  | 'NOTIFY_FAILED'
  | 'UNAUTHORIZED'
  | 'BAD_REQUEST'
  | 'PAYLOAD_TOO_LARGE'
  | 'STORAGE_ERROR';

/**
 * Error severity levels.
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface SentinelErrorOptions {
  retryable?: boolean;
  retryAfterMs?: number;
  severity?: ErrorSeverity;
  cause?: unknown;
  context?: Record<string, unknown>;
}

/**
 * Base application error.
 */
export class SentinelError extends Error {
  readonly code: SentinelErrorCode;
  readonly retryable: boolean;
  readonly retryAfterMs: number | undefined;
  readonly severity: ErrorSeverity;
  readonly context: Record<string, unknown>;

  constructor(code: SentinelErrorCode, message: string, options: SentinelErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'SentinelError';
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.severity = options.severity ?? 'medium';
    this.context = options.context ?? {};
  }
}

/**
 * Invalid or incomplete configuration. Never retryable.
 */
export class ConfigError extends SentinelError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIG_INVALID', message, { severity: 'critical', context: { issues } });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Failure talking to the exchange REST or WebSocket API.
 */
export class ExchangeError extends SentinelError {
  constructor(code: SentinelErrorCode, message: string, options: SentinelErrorOptions = {}) {
    super(code, message, options);
    this.name = 'ExchangeError';
  }
}

/**
 * Failure delivering a notification.
 */
export class NotificationError extends SentinelError {
  constructor(message: string, options: SentinelErrorOptions = {}) {
    super('NOTIFY_FAILED', message, { severity: 'low', ...options });
    this.name = 'NotificationError';
  }
}

// =============================================================================
// ERROR MAPPING
// =============================================================================

/**
 * Maps an HTTP status (and response body) to a `SentinelError`.
 */
export function mapHttpError(status: number, body: string, url?: string): SentinelError {
  const context: Record<string, unknown> = { status, body: body.slice(0, 200) };
  if (url !== undefined) {
    context['url'] = url;
  }

  // 418 is the exchange's "IP banned after repeated 429s"
  if (status === 429 || status === 418) {
    return new ExchangeError('RATE_LIMITED', `Rate limited (HTTP ${status})`, {
      retryable: true,
      retryAfterMs: 60000,
      severity: 'medium',
      context,
    });
  }

  if (status === 401 || status === 403) {
    return new ExchangeError('UNAUTHORIZED', `Unauthorized (HTTP ${status})`, {
      retryable: false,
      severity: 'high',
      context,
    });
  }

  if (status >= 500) {
    return new ExchangeError('EXCHANGE_ERROR', `Server error (HTTP ${status})`, {
      retryable: true,
      severity: 'medium',
      context,
    });
  }

  return new ExchangeError('EXCHANGE_ERROR', `Request failed (HTTP ${status})`, {
    retryable: false,
    severity: 'medium',
    context,
  });
}

/**
 * Normalises any thrown value into a `SentinelError`.
 */
export function toSentinelError(error: unknown): SentinelError {
  if (error instanceof SentinelError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new SentinelError('TIMEOUT', 'Request timed out', { retryable: true, cause: error });
    }
    // fetch rejects with TypeError on DNS / connection failures
    if (error instanceof TypeError) {
      return new SentinelError('NETWORK_ERROR', error.message, { retryable: true, cause: error });
    }
    return new SentinelError('EXCHANGE_ERROR', error.message, { retryable: false, cause: error });
  }

  return new SentinelError('EXCHANGE_ERROR', String(error), { retryable: false });
}

/**
 * Extracts a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
