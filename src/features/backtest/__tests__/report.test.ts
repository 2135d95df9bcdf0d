/**
 * @fileoverview Tests for backtest text summaries and report files
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { describe, it, expect } from 'vitest';
import { emptyResult, type BacktestResult } from '../engine.js';
import {
  backtestSummary,
  monthlyTable,
  signedPct,
  tradesCsv,
  usd,
  walkForwardSummary,
  writeReports,
} from '../report.js';

async function tempDir(): Promise<string> {
  const dir = await mkdtemp(path.join(tmpdir(), 'sentinel-report-'));
  registerTestCleanup(() => rm(dir, { recursive: true, force: true }));
  return dir;
}

const RESULT: BacktestResult = {
  ...emptyResult(100_000),
  totalTrades: 2,
  winningTrades: 1,
  losingTrades: 1,
  winRate: 50,
  totalPnl: 5,
  totalPnlPercent: 0.004,
  profitFactor: 1.25,
  avgWin: 2,
  avgLoss: -1.5,
  bestTrade: 2,
  worstTrade: -1.5,
  trades: [
    { entryTime: 0, exitTime: 2_700_000, direction: 'LONG', entry: 100, exit: 102, pnlPct: 2, pnlUsd: 20, barsHeld: 3 },
    { entryTime: 3_600_000, exitTime: 5_400_000, direction: 'SHORT', entry: 100, exit: 101.5, pnlPct: -1.5, pnlUsd: -15, barsHeld: 2 },
  ],
  monthlyStats: { '1970-01': { trades: 2, wins: 1, pnl: 5, winRate: 50 } },
};

describe('number formatting', () => {
  it('formats dollars with separators and sign', () => {
    expect(usd(1234.5)).toBe('$1,234.50');
    expect(usd(-15)).toBe('-$15.00');
  });

  it('signs percentages', () => {
    expect(signedPct(0)).toBe('+0.00%');
    expect(signedPct(-1.5)).toBe('-1.50%');
  });
});

describe('backtestSummary', () => {
  it('lists the headline figures', () => {
    const lines = backtestSummary(RESULT).split('\n');

    expect(lines[1]).toBe('BACKTEST RESULTS');
    expect(lines).toContain('Win Rate: 50.00%');
    expect(lines).toContain('  Total P&L: $5.00');
    expect(lines).toContain('  Total Return: +0.00%');
    expect(lines).toContain('  Profit Factor: 1.25');
    expect(lines).toContain('  Avg Loss: -1.50%');
  });
});

describe('monthlyTable', () => {
  it('aligns one row per month', () => {
    expect(monthlyTable(RESULT).split('\n')).toEqual([
      'Month      Trades   Wins     Win Rate   P&L',
      '-'.repeat(60),
      '1970-01    2        1        50.0       $5.00',
    ]);
  });

  it('is empty without trades', () => {
    expect(monthlyTable(emptyResult(100_000))).toBe('');
  });
});

describe('walkForwardSummary', () => {
  it('handles a run without windows', () => {
    expect(walkForwardSummary({ windows: [], statistics: null, isRobust: false })).toBe('No walk-forward results');
  });
});

describe('writeReports', () => {
  it('writes the requested formats under a descriptive name', async () => {
    const dir = await tempDir();
    const meta = { symbol: 'BTC/USDT', timeframe: '15m', startDate: '2024-01-01', endDate: '2024-01-31' };

    const written = await writeReports(RESULT, meta, dir, ['csv', 'json'], new Date('2024-03-05T09:30:00Z'));

    expect(written).toEqual({
      csv: path.join(dir, 'BTCUSDT_15m_2024-01-01_to_2024-01-31_20240305T093000.csv'),
      json: path.join(dir, 'BTCUSDT_15m_2024-01-01_to_2024-01-31_20240305T093000.json'),
    });
    expect(await readFile(written.csv ?? '', 'utf-8')).toBe(tradesCsv(RESULT));
    const json: unknown = JSON.parse(await readFile(written.json ?? '', 'utf-8'));
    expect(json).toMatchObject({ metadata: { symbol: 'BTC/USDT', generatedAt: '2024-03-05T09:30:00.000Z' } });
  });

  it('renders trades as CSV rows', () => {
    expect(tradesCsv(RESULT).split('\n')).toEqual([
      'entry_time,exit_time,direction,entry,exit,pnl_pct,pnl_usd,bars_held',
      '1970-01-01T00:00:00.000Z,1970-01-01T00:45:00.000Z,LONG,100,102,2,20,3',
      '1970-01-01T01:00:00.000Z,1970-01-01T01:30:00.000Z,SHORT,100,101.5,-1.5,-15,2',
      '',
    ]);
  });
});
