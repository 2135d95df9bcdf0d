/**
 * @fileoverview Tests for profit after deductions
 */

import { describe, it, expect } from 'vitest';
import { calculateIndianProfit, ProfitCalculator } from '../profit.js';

describe('calculateIndianProfit', () => {
  it('deducts TDS and GST from a gross profit', () => {
    expect(calculateIndianProfit(100, 110, 2, 'LONG')).toEqual({
      gross: 20,
      tds: 0.2,
      gst: 3.6,
      netPnl: 16.2,
    });
  });

  it('measures SHORT profit from entry down', () => {
    expect(calculateIndianProfit(110, 100, 1, 'SHORT').gross).toBe(10);
  });

  it('applies no deductions to a loss', () => {
    expect(calculateIndianProfit(100, 110, 2, 'SHORT')).toEqual({ gross: -20, tds: 0, gst: 0, netPnl: -20 });
  });
});

describe('ProfitCalculator', () => {
  it('charges brokerage and GST on brokerage', () => {
    const calc = new ProfitCalculator(500);
    const result = calc.calculate(100, 110, 10, 'LONG', 'BTC/USDT');

    expect(result).toMatchObject({
      grossPnl: 100,
      brokerage: 1,
      tds: 1,
      gst: 0.18,
      netPnl: 97.82,
      pnlPercent: 10,
    });
  });

  it('summarises the day and resets', () => {
    const calc = new ProfitCalculator(500);
    calc.calculate(100, 110, 10, 'LONG', 'BTC/USDT');
    calc.calculate(100, 105, 10, 'SHORT', 'ETH/USDT');

    const summary = calc.dailySummary();
    expect(summary.totalTrades).toBe(2);
    expect(summary.wins).toBe(1);
    expect(summary.losses).toBe(1);
    expect(summary.winRate).toBe(50);
    expect(summary.targetAchieved).toBe(false);

    calc.resetDaily();
    expect(calc.dailySummary().totalTrades).toBe(0);
    expect(calc.dailyPnl).toBe(0);
  });
});
