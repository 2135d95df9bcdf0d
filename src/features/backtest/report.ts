/**
 * @fileoverview Plain-text and file reports for backtest runs
 * @module features/backtest/report
 */

import { mkdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { SentinelError } from '../../shared/errors.js';
import { logger } from '../../shared/utils/logger.js';
import type { BacktestResult } from './engine.js';
import type { BootstrapResult, MonteCarloResult } from './monte-carlo.js';
import type { OverfittingAssessment } from './overfitting.js';
import type { WalkForwardResult } from './walk-forward.js';

const log = logger.child('report');

const RULE = '='.repeat(60);

export interface ReportMeta {
  symbol: string;
  timeframe: string;
  startDate: string;
  endDate: string;
}

export type ReportFormat = 'txt' | 'json' | 'csv';

// =============================================================================
// NUMBER FORMATTING
// =============================================================================

export function usd(value: number): string {
  const text = Math.abs(value).toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
  return value < 0 ? `-$${text}` : `$${text}`;
}

export function signedPct(value: number, digits = 2): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(digits)}%`;
}

// =============================================================================
// TEXT SUMMARIES
// =============================================================================

export function backtestSummary(result: BacktestResult): string {
  return [
    RULE,
    'BACKTEST RESULTS',
    RULE,
    `Total Trades: ${result.totalTrades}`,
    `Winning Trades: ${result.winningTrades}`,
    `Losing Trades: ${result.losingTrades}`,
    `Win Rate: ${result.winRate.toFixed(2)}%`,
    '',
    'Profit & Loss:',
    `  Total P&L: ${usd(result.totalPnl)}`,
    `  Total Return: ${signedPct(result.totalPnlPercent)}`,
    `  Profit Factor: ${result.profitFactor.toFixed(2)}`,
    `  Sharpe Ratio: ${result.sharpeRatio.toFixed(2)}`,
    '',
    'Risk Metrics:',
    `  Max Drawdown: ${usd(result.maxDrawdown)}`,
    `  Max Drawdown %: ${result.maxDrawdownPercent.toFixed(2)}%`,
    `  Avg RR: ${result.avgRr.toFixed(2)}`,
    '',
    'Trade Stats:',
    `  Avg Win: ${signedPct(result.avgWin)}`,
    `  Avg Loss: ${signedPct(result.avgLoss)}`,
    `  Best Trade: ${signedPct(result.bestTrade)}`,
    `  Worst Trade: ${signedPct(result.worstTrade)}`,
    RULE,
  ].join('\n');
}

export function monthlyTable(result: BacktestResult): string {
  const rows = Object.entries(result.monthlyStats).sort(([a], [b]) => a.localeCompare(b));
  if (rows.length === 0) {
    return '';
  }
  const header = `${'Month'.padEnd(10)} ${'Trades'.padEnd(8)} ${'Wins'.padEnd(8)} ${'Win Rate'.padEnd(10)} P&L`;
  const lines = rows.map(
    ([month, s]) =>
      `${month.padEnd(10)} ${String(s.trades).padEnd(8)} ${String(s.wins).padEnd(8)} ${s.winRate.toFixed(1).padEnd(10)} ${usd(s.pnl)}`
  );
  return [header, '-'.repeat(60), ...lines].join('\n');
}

export function monteCarloSummary(result: MonteCarloResult): string {
  const level = `${(result.confidenceLevel * 100).toFixed(0)}%`;
  return [
    RULE,
    'MONTE CARLO SIMULATION RESULTS',
    RULE,
    `Simulations: ${result.numSimulations}`,
    `Confidence Level: ${level}`,
    '',
    'Return Distribution:',
    `  Mean: ${signedPct(result.meanReturn)}`,
    `  Median: ${signedPct(result.medianReturn)}`,
    `  Std Dev: ${result.stdReturn.toFixed(2)}%`,
    `  Best: ${signedPct(result.maxReturn)}`,
    `  Worst: ${signedPct(result.minReturn)}`,
    '',
    'Risk Metrics:',
    `  VaR (${level}): ${signedPct(result.var)}`,
    `  CVaR: ${signedPct(result.cvar)}`,
    `  Prob Profit: ${result.probProfit.toFixed(1)}%`,
    `  Prob Loss: ${result.probLoss.toFixed(1)}%`,
    '',
    'Drawdown:',
    `  Mean Max DD: ${result.meanDrawdown.toFixed(2)}%`,
    `  95% Max DD: ${result.maxDrawdown95.toFixed(2)}%`,
    RULE,
  ].join('\n');
}

export function bootstrapSummary(result: BootstrapResult): string {
  return [
    'Bootstrap Resampling:',
    `  Mean: ${signedPct(result.meanReturn)}`,
    `  5th-95th: ${signedPct(result.percentile5)} to ${signedPct(result.percentile95)}`,
    `  Prob Profit: ${result.probProfit.toFixed(1)}%`,
  ].join('\n');
}

export function walkForwardSummary(result: WalkForwardResult): string {
  const stats = result.statistics;
  if (!stats) {
    return 'No walk-forward results';
  }
  return [
    RULE,
    'WALK-FORWARD ANALYSIS RESULTS',
    RULE,
    `Windows Analyzed: ${stats.numWindows}`,
    '',
    'Training Performance:',
    `  Avg Return: ${stats.avgTrainReturn.toFixed(2)}%`,
    `  Avg Sharpe: ${stats.avgTrainSharpe.toFixed(2)}`,
    `  Profitable Windows: ${stats.positiveTrainRatio.toFixed(1)}%`,
    '',
    'Testing Performance:',
    `  Avg Return: ${stats.avgTestReturn.toFixed(2)}%`,
    `  Avg Sharpe: ${stats.avgTestSharpe.toFixed(2)}`,
    `  Profitable Windows: ${stats.positiveTestRatio.toFixed(1)}%`,
    '',
    'Robustness Metrics:',
    `  Return Decay: ${signedPct(stats.returnDecay)}`,
    `  Sharpe Decay: ${stats.sharpeDecay >= 0 ? '+' : ''}${stats.sharpeDecay.toFixed(2)}`,
    '',
    `Strategy Robust: ${result.isRobust ? '✅ YES' : '❌ NO'}`,
    RULE,
  ].join('\n');
}

export function overfittingSummary(assessment: OverfittingAssessment): string {
  const lines = [
    RULE,
    'OVERFITTING DETECTION RESULTS',
    RULE,
    `Overfitting Detected: ${assessment.isOverfitting ? '⚠️ YES' : '✅ NO'}`,
    `Confidence: ${assessment.confidence.toFixed(1)}%`,
  ];
  for (const [method, check] of Object.entries(assessment.methods)) {
    lines.push('', `  ${method.toUpperCase()}:`);
    for (const [key, value] of Object.entries(check.values)) {
      lines.push(`    ${key}: ${value.toFixed(3)}`);
    }
    if (check.message) {
      lines.push(`    ${check.message}`);
    }
    lines.push(`    Verdict: ${check.overfitting ? '⚠️ OVERFITTING' : '✅ OK'}`);
  }
  lines.push(RULE);
  return lines.join('\n');
}

// =============================================================================
// FILES
// =============================================================================

const CSV_HEADER = 'entry_time,exit_time,direction,entry,exit,pnl_pct,pnl_usd,bars_held';

export function tradesCsv(result: BacktestResult): string {
  const rows = result.trades.map((t) =>
    [
      new Date(t.entryTime).toISOString(),
      new Date(t.exitTime).toISOString(),
      t.direction,
      t.entry,
      t.exit,
      t.pnlPct,
      t.pnlUsd,
      t.barsHeld,
    ].join(',')
  );
  return [CSV_HEADER, ...rows].join('\n') + '\n';
}

function textReport(result: BacktestResult, meta: ReportMeta, generatedAt: Date): string {
  const monthly = monthlyTable(result);
  return [
    `Symbol: ${meta.symbol}`,
    `Timeframe: ${meta.timeframe}`,
    `Period: ${meta.startDate} to ${meta.endDate}`,
    `Generated: ${generatedAt.toISOString()}`,
    '',
    backtestSummary(result),
    ...(monthly ? ['', 'MONTHLY PERFORMANCE', monthly] : []),
    '',
  ].join('\n');
}

/**
 * Writes the requested report files and returns their paths by format.
 */
export async function writeReports(
  result: BacktestResult,
  meta: ReportMeta,
  outputDir: string,
  formats: readonly ReportFormat[] = ['txt', 'json', 'csv'],
  generatedAt: Date = new Date()
): Promise<Partial<Record<ReportFormat, string>>> {
  const stamp = generatedAt.toISOString().replace(/[-:]/g, '').slice(0, 15);
  const base = `${meta.symbol.replace('/', '')}_${meta.timeframe}_${meta.startDate}_to_${meta.endDate}_${stamp}`;
  const written: Partial<Record<ReportFormat, string>> = {};

  try {
    await mkdir(outputDir, { recursive: true });
    for (const format of formats) {
      const target = path.join(outputDir, `${base}.${format}`);
      const body =
        format === 'txt'
          ? textReport(result, meta, generatedAt)
          : format === 'json'
            ? JSON.stringify({ metadata: { ...meta, generatedAt: generatedAt.toISOString() }, result }, null, 2)
            : tradesCsv(result);
      await writeFile(target, body, 'utf-8');
      written[format] = target;
    }
  } catch (error) {
    throw new SentinelError('STORAGE_ERROR', `Failed to write backtest reports to ${outputDir}`, { cause: error });
  }

  log.info(`Reports generated: ${Object.values(written).join(', ')}`);
  return written;
}
