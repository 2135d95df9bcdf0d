/**
 * @fileoverview Property-based tests for indicator ranges
 * @module features/analysis/__tests__/indicator-bounds.property.test
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { bollinger, rsi } from '../indicators.js';
import { pearson } from '../correlation.js';

const price = fc.double({ min: 1, max: 100_000, noNaN: true });

describe('Indicator bounds - Property Tests', () => {
  it('keeps RSI within 0..100', () => {
    fc.assert(
      fc.property(fc.array(price, { minLength: 0, maxLength: 80 }), (values) => {
        const value = rsi(values);
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(100);
      })
    );
  });

  it('orders the Bollinger bands', () => {
    fc.assert(
      fc.property(fc.array(price, { minLength: 1, maxLength: 60 }), (values) => {
        const bands = bollinger(values);
        expect(bands.lower).toBeLessThanOrEqual(bands.middle);
        expect(bands.middle).toBeLessThanOrEqual(bands.upper);
      })
    );
  });

  it('keeps correlation within -1..1', () => {
    fc.assert(
      fc.property(fc.array(fc.tuple(price, price), { minLength: 0, maxLength: 40 }), (pairs) => {
        const value = pearson(
          pairs.map(([x]) => x),
          pairs.map(([, y]) => y)
        );
        expect(Math.abs(value)).toBeLessThanOrEqual(1);
      })
    );
  });
});
