/**
 * @fileoverview Unit tests for error mapping
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, SentinelError, errorMessage, mapHttpError, toSentinelError } from '../errors.js';

describe('mapHttpError', () => {
  it('treats 429 and 418 as retryable rate limits', () => {
    for (const status of [429, 418]) {
      const error = mapHttpError(status, 'slow down');
      expect(error).toMatchObject({ code: 'RATE_LIMITED', retryable: true, retryAfterMs: 60000 });
      expect(error.message).toBe(`Rate limited (HTTP ${status})`);
    }
  });

  it('does not retry auth failures', () => {
    expect(mapHttpError(401, '')).toMatchObject({ code: 'UNAUTHORIZED', retryable: false, severity: 'high' });
  });

  it('retries server errors but not other client errors', () => {
    expect(mapHttpError(503, '')).toMatchObject({ code: 'EXCHANGE_ERROR', retryable: true });
    expect(mapHttpError(400, '')).toMatchObject({ code: 'EXCHANGE_ERROR', retryable: false });
  });

  it('keeps a truncated body and the url in the context', () => {
    const error = mapHttpError(400, 'x'.repeat(300), '/fapi/v1/klines');
    expect(error.context).toEqual({ status: 400, body: 'x'.repeat(200), url: '/fapi/v1/klines' });
  });
});

describe('toSentinelError', () => {
  it('passes sentinel errors through', () => {
    const original = new SentinelError('TIMEOUT', 'late');
    expect(toSentinelError(original)).toBe(original);
  });

  it('classifies aborts and fetch transport failures as retryable', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    expect(toSentinelError(abort)).toMatchObject({ code: 'TIMEOUT', retryable: true });
    expect(toSentinelError(new TypeError('fetch failed'))).toMatchObject({ code: 'NETWORK_ERROR', retryable: true });
  });

  it('wraps anything else as a non-retryable exchange error', () => {
    expect(toSentinelError('boom')).toMatchObject({ code: 'EXCHANGE_ERROR', message: 'boom', retryable: false });
  });
});

describe('ConfigError', () => {
  it('is critical and carries its issues', () => {
    const error = new ConfigError('Configuration invalid', ['PORT must be positive']);
    expect(error).toMatchObject({ code: 'CONFIG_INVALID', severity: 'critical', issues: ['PORT must be positive'] });
    expect(errorMessage(error)).toBe('Configuration invalid');
    expect(errorMessage(42)).toBe('42');
  });
});
