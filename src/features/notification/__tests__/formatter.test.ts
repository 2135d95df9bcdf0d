/**
 * @fileoverview Unit tests for signal and summary formatting
 */

import { describe, it, expect } from 'vitest';
import { createConfig } from '../../../config/index.js';
import type { Signal } from '../../../shared/types/index.js';
import { MessageFormatter } from '../formatter.js';

const NOW = new Date('2024-03-05T09:30:00Z');

function signal(overrides: Partial<Signal> = {}): Signal {
  return {
    symbol: 'ETH/USDT',
    direction: 'LONG',
    entry: 3000,
    stopLoss: 2950,
    takeProfit: 3125,
    rrRatio: 2.5,
    score: 82,
    grade: 'A',
    confidence: 85,
    marketType: 'trending',
    btcRegime: 'bull',
    structureStrength: 'STRONG',
    filtersPassed: 10,
    timestamp: NOW.toISOString(),
    levels: { nearest_support: 2940.5, nearest_resistance: 0 },
    keyFactors: ['EMA stack bullish', 'Volume spike', 'BTC aligned', 'Funding neutral'],
    positionSize: {
      blocked: false,
      positionUsd: 30000,
      contracts: 10,
      riskUsd: 500,
      riskPct: 1,
      stopDistancePct: 1.67,
      atrPct: 1,
      fearIndex: 50,
      entry: 3000,
      stopLoss: 2950,
      leverage: 0.3,
      maxPosition: 30000,
    },
    filterSummary: '10/10 filters passed',
    ...overrides,
  };
}

const formatter = () => new MessageFormatter(createConfig({}), () => NOW);

describe('MessageFormatter.formatSignal', () => {
  it('renders the full signal card', () => {
    expect(formatter().formatSignal(signal())).toBe(
      [
        '🟢 <b>CANDLE SENTINEL SIGNAL</b> 🟢',
        '',
        '<b>Symbol:</b> ETH/USDT',
        '<b>Direction:</b> 🚀 UPTREND',
        '<b>Grade:</b> A (Score: 82)',
        '<b>Confidence:</b> 85%',
        '',
        '<b>Entry:</b> $3,000.00',
        '<b>Stop Loss:</b> $2,950.00',
        '<b>Take Profit:</b> $3,125.00',
        '<b>R:R Ratio:</b> 2.50',
        '💰 Size: $30,000',
        '',
        '<b>Market:</b> 📈 TRENDING',
        '<b>Structure:</b> STRONG',
        '• EMA stack bullish',
        '• Volume spike',
        '• BTC aligned',
        '📊 Support: 2940.50',
        '',
        '⏰ 15:00 IST',
        '',
        '⚠️ <i>Manual trade only - Auto trade OFF</i>',
      ].join('\n')
    );
  });

  it('omits the size line for blocked sizing', () => {
    const lines = formatter()
      .formatSignal(signal({ direction: 'SHORT', positionSize: { blocked: true, reason: 'Stop too wide: 6.00%' } }))
      .split('\n');

    expect(lines[0]).toBe('🔴 <b>CANDLE SENTINEL SIGNAL</b> 🔴');
    expect(lines).toContain('<b>Direction:</b> 📉 DOWNTREND');
    expect(lines.some((line) => line.startsWith('💰'))).toBe(false);
  });
});

describe('MessageFormatter.formatDailySummary', () => {
  const base = { totalTrades: 4, wins: 3, losses: 1, bestTrade: 0.5, worstTrade: -0.4 };

  it('celebrates reaching the daily target', () => {
    const lines = formatter().formatDailySummary({ ...base, totalPnl: 0.75 }).split('\n');

    expect(lines[0]).toBe('🥳🎉🍾 <b>Daily Summary</b> 🥳🎉🍾');
    expect(lines).toContain('• Win Rate: 75.0%');
    expect(lines).toContain('• Net: +0.75%');
    expect(lines).toContain('• Best: +0.5%');
    expect(lines).toContain('• Worst: -0.4%');
    expect(lines).toContain('🎯 ★ TARGET ACHIEVED! ★');
  });

  it('shows the remaining distance, a break even day or the loss', () => {
    expect(formatter().formatDailySummary({ ...base, totalPnl: 0.2 })).toContain('🎯 0.30% to target');
    expect(formatter().formatDailySummary({ ...base, totalPnl: 0 })).toContain('🎯 Break even day');
    expect(formatter().formatDailySummary({ ...base, totalPnl: -0.6 })).toContain('🎯 Loss: 0.60%');
  });

  it('handles a day without trades', () => {
    const text = formatter().formatDailySummary({ ...base, totalTrades: 0, wins: 0, losses: 0, totalPnl: 0 });
    expect(text).toContain('• Win Rate: 0.0%');
  });
});

describe('MessageFormatter other formats', () => {
  it('formats the weekly summary with fallbacks', () => {
    const lines = formatter()
      .formatWeeklySummary({ totalTrades: 12, winRate: 58.333, totalPnl: 3.1, profitFactor: 1.8, bestDay: 'Monday' })
      .split('\n');

    expect(lines).toContain('Win Rate: 58.3%');
    expect(lines).toContain('Total P&amp;L: +3.10%');
    expect(lines).toContain('Best Day: Monday');
    expect(lines).toContain('Worst Day: N/A');
    expect(lines).toContain('🎯 Next week target: ₹2,500');
  });

  it('lists component health', () => {
    const lines = formatter()
      .formatHealthStatus({
        status: 'degraded',
        marketType: 'choppy',
        btcRegime: 'bear',
        dailySignals: 2,
        dailyLimit: 5,
        consecutiveLosses: 1,
        components: { exchange: false, telegram: true },
      })
      .split('\n');

    expect(lines[0]).toBe('⚠️ <b>Bot Health</b>');
    expect(lines).toContain('Signals: 2/5');
    expect(lines).toContain('❌ exchange');
    expect(lines).toContain('✅ telegram');
    expect(lines[lines.length - 1]).toBe('⏰ 15:00 IST');
  });

  it('escapes alerts and errors', () => {
    expect(formatter().formatAlert('Feed <down>', 'WARNING')).toBe('⚠️ <b>WARNING</b>\nFeed &lt;down&gt;');
    expect(formatter().formatError('x & y')).toBe('🚨 <b>Error</b>\n<code>x &amp; y</code>');
    expect(formatter().formatSimple('ready')).toBe('📢 ready');
  });
});
