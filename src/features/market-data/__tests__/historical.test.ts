/**
 * @fileoverview Tests for historical data storage, splitting and resampling
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, vi } from 'vitest';
import type { Candle } from '../../../shared/types/index.js';
import { HistoricalData, parseDate, resample, splitForBacktest } from '../historical.js';

async function tempDir(): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), 'sentinel-hist-'));
  registerTestCleanup(() => rm(dir, { recursive: true, force: true }));
  return dir;
}

describe('resample', () => {
  it('aggregates 15m candles into hourly buckets', () => {
    const q = 900_000;
    const candles: Candle[] = [
      [0, 10, 12, 9, 11, 1],
      [q, 11, 15, 10, 14, 2],
      [2 * q, 14, 14, 8, 9, 3],
      [3 * q, 9, 10, 9, 10, 4],
      [4 * q, 10, 11, 10, 11, 5],
    ];

    expect(resample(candles, '15m', '1h')).toEqual([
      [0, 10, 15, 8, 10, 10],
      [3_600_000, 10, 11, 10, 11, 5],
    ]);
  });

  it('refuses to go finer', () => {
    expect(() => resample([], '1h', '15m')).toThrow('Cannot resample 1h down to 15m');
  });
});

describe('splitForBacktest', () => {
  it('splits 70/15/15 in order', () => {
    const candles: Candle[] = Array.from({ length: 10 }, (_, i): Candle => [i, 1, 1, 1, 1, 1]);
    const split = splitForBacktest(candles);

    expect(split.train.map((c) => c[0])).toEqual([0, 1, 2, 3, 4, 5, 6]);
    expect(split.validation.map((c) => c[0])).toEqual([7]);
    expect(split.test.map((c) => c[0])).toEqual([8, 9]);
  });
});

describe('parseDate', () => {
  it('parses UTC dates', () => {
    expect(parseDate('2024-03-05')).toBe(Date.UTC(2024, 2, 5));
    expect(() => parseDate('05/03/2024')).toThrow('Invalid date');
  });
});

describe('HistoricalData', () => {
  it('saves and loads candle files', async () => {
    const history = new HistoricalData(await tempDir());
    const candles: Candle[] = [[1000, 1, 2, 0.5, 1.5, 10]];

    await history.save('btc_15m.json', candles);

    await expect(history.load('btc_15m.json')).resolves.toEqual(candles);
  });

  it('loads object-shaped rows', async () => {
    const dir = await tempDir();
    await writeFile(
      path.join(dir, 'eth.json'),
      JSON.stringify([{ timestamp: 5, open: 1, high: 2, low: 0.5, close: 1.5, volume: 3 }])
    );

    await expect(new HistoricalData(dir).load('eth.json')).resolves.toEqual([[5, 1, 2, 0.5, 1.5, 3]]);
  });

  it('returns an empty list for missing files', async () => {
    await expect(new HistoricalData(await tempDir()).load('missing.json')).resolves.toEqual([]);
  });

  it('rejects malformed files', async () => {
    const dir = await tempDir();
    await writeFile(path.join(dir, 'bad.json'), JSON.stringify([{ open: 1 }]));

    await expect(new HistoricalData(dir).load('bad.json')).rejects.toMatchObject({ code: 'INVALID_RESPONSE' });
  });

  it('fetches whole days for a date range', async () => {
    const fetchHistorical = vi.fn().mockResolvedValue([]);
    const history = new HistoricalData('unused', { fetchHistorical });

    await history.fetchForBacktest('BTC/USDT', '1h', '2024-01-01', '2024-01-02');

    expect(fetchHistorical).toHaveBeenCalledWith('BTC/USDT', '1h', Date.UTC(2024, 0, 1), Date.UTC(2024, 0, 3) - 1);
  });

  it('maps failed symbols to empty lists', async () => {
    const fetchHistorical = vi
      .fn()
      .mockResolvedValueOnce([[1, 1, 1, 1, 1, 1]])
      .mockRejectedValueOnce(new Error('down'));
    const history = new HistoricalData('unused', { fetchHistorical });

    await expect(history.fetchMultipleSymbols(['BTC/USDT', 'ETH/USDT'], '1h', '2024-01-01', '2024-01-02')).resolves.toEqual({
      'BTC/USDT': [[1, 1, 1, 1, 1, 1]],
      'ETH/USDT': [],
    });
  });
});
