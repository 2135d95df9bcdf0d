/**
 * @fileoverview Fetch-based HTTP client with timeouts and error mapping
 * @module features/market-data/http-client
 *
 * Used for the exchange REST API, the fear & greed index and the Telegram
 * Bot API. Non-2xx responses and transport failures surface as
 * `SentinelError`s so callers can hand them to the retry executor.
 */

import { mapHttpError, SentinelError, toSentinelError } from '../../shared/errors.js';
import { logger } from '../../shared/utils/logger.js';

const log = logger.child('http');

// =============================================================================
// TYPES
// =============================================================================

/** Subset of the global `fetch` signature the client relies on */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * HTTP client configuration.
 */
export interface HttpClientConfig {
  /** Default request timeout in milliseconds */
  timeoutMs?: number;
  /** Headers sent with every request */
  defaultHeaders?: Record<string, string>;
  /** Replaces the global fetch, mainly for tests */
  fetchFn?: FetchLike;
}

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  query?: QueryParams;
  timeoutMs?: number;
}

// =============================================================================
// URL HELPERS
// =============================================================================

/**
 * Appends defined query parameters to a URL.
 */
export function buildUrl(url: string, query: QueryParams = {}): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      params.append(key, String(value));
    }
  }
  const qs = params.toString();
  if (qs === '') {
    return url;
  }
  return `${url}${url.includes('?') ? '&' : '?'}${qs}`;
}

/**
 * Hides Telegram bot tokens in URLs written to the log.
 */
export function redactUrl(url: string): string {
  return url.replace(/\/bot[^/]+\//, '/bot***/');
}

// =============================================================================
// HTTP CLIENT
// =============================================================================

/**
 * HTTP client with per-request timeouts.
 *
 * @example
 * ```typescript
 * const http = new HttpClient({ timeoutMs: 10000 });
 * const body = await http.getJson('https://fapi.binance.com/fapi/v1/depth', {
 *   query: { symbol: 'BTCUSDT', limit: 20 },
 * });
 * ```
 */
export class HttpClient {
  private readonly timeoutMs: number;
  private readonly defaultHeaders: Record<string, string>;
  private readonly fetchFn: FetchLike;

  constructor(config: HttpClientConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.defaultHeaders = config.defaultHeaders ?? {};
    this.fetchFn = config.fetchFn ?? ((input, init) => fetch(input, init));
  }

  /**
   * Sends a request and returns the raw response. Transport failures and
   * timeouts are normalised; HTTP status is not checked.
   */
  async fetch(url: string, options: HttpRequestOptions = {}): Promise<Response> {
    const { timeoutMs = this.timeoutMs, query, headers, method = 'GET', body } = options;
    const target = buildUrl(url, query);

    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), timeoutMs);

    try {
      const init: RequestInit = {
        method,
        headers: { ...this.defaultHeaders, ...headers },
        signal: abortController.signal,
      };
      if (body !== undefined) {
        init.body = body;
      }
      const response = await this.fetchFn(target, init);
      log.debug(`${method} ${redactUrl(target)} -> ${response.status}`);
      return response;
    } catch (error) {
      const mapped = toSentinelError(error);
      log.debug(`${method} ${redactUrl(target)} failed: ${mapped.message}`);
      throw mapped;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * GETs a URL and parses the JSON body. Non-2xx statuses throw.
   */
  async getJson(url: string, options: Omit<HttpRequestOptions, 'method' | 'body'> = {}): Promise<unknown> {
    const response = await this.fetch(url, { ...options, method: 'GET' });
    return this.readJson(response, url);
  }

  /**
   * POSTs a JSON body and parses the JSON reply. Non-2xx statuses throw.
   */
  async postJson(url: string, payload: unknown, options: Omit<HttpRequestOptions, 'method' | 'body'> = {}): Promise<unknown> {
    const response = await this.fetch(url, {
      ...options,
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...options.headers },
      body: JSON.stringify(payload),
    });
    return this.readJson(response, url);
  }

  private async readJson(response: Response, url: string): Promise<unknown> {
    const text = await response.text();
    if (!response.ok) {
      throw mapHttpError(response.status, text, redactUrl(url));
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new SentinelError('INVALID_RESPONSE', `Invalid JSON from ${redactUrl(url)}`, { cause: error });
    }
  }
}
