/**
 * @fileoverview Small numeric helpers shared by analysis, risk and backtests
 * @module shared/utils/math
 */

/**
 * Rounds half away from zero to `decimals` places.
 */
export function round(value: number, decimals = 2): number {
  const factor = Math.pow(10, decimals);
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) {
    total += v;
  }
  return total;
}

/** Arithmetic mean, 0 for an empty list. */
export function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

/**
 * Standard deviation. `ddof` 0 is the population form, 1 the sample form.
 */
export function stdev(values: readonly number[], ddof = 0): number {
  const n = values.length;
  if (n - ddof <= 0) {
    return 0;
  }
  const m = mean(values);
  let acc = 0;
  for (const v of values) {
    acc += (v - m) * (v - m);
  }
  return Math.sqrt(acc / (n - ddof));
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Linear-interpolated percentile over unsorted values, `p` in 0..100.
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const lo = sorted[lower] ?? 0;
  const hi = sorted[upper] ?? lo;
  return lo + (hi - lo) * (rank - lower);
}

/** The last `n` items (all of them when fewer). */
export function lastN<T>(values: readonly T[], n: number): T[] {
  return n <= 0 ? [] : values.slice(-n);
}
