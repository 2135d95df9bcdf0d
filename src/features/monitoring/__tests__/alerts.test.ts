/**
 * @fileoverview Unit tests for threshold alerts
 */

import { describe, it, expect, vi } from 'vitest';
import { createConfig } from '../../../config/index.js';
import type { AlertLevel } from '../../notification/formatter.js';
import { AlertSystem } from '../alerts.js';
import type { MetricsReport } from '../metrics.js';

function report(summary: Partial<MetricsReport['summary']> = {}, todayPnl = 0): MetricsReport {
  const period = { trades: 0, winRate: 0, pnl: 0 };
  return {
    summary: {
      totalSignals: 0,
      totalTrades: 0,
      winningTrades: 0,
      losingTrades: 0,
      consecutiveLosses: 0,
      totalPnl: 0,
      winRate: 0,
      avgRr: 0,
      profitFactor: 0,
      sharpeRatio: 0,
      maxDrawdown: 0,
      ...summary,
    },
    today: { ...period, pnl: todayPnl },
    week: period,
    month: period,
    bestTrade: null,
    worstTrade: null,
    recentErrors: [],
    uptime: '0m',
  };
}

function setup() {
  let current = new Date('2024-03-05T09:30:00Z');
  const sink = { sendAlert: vi.fn(async (_message: string, _level?: AlertLevel) => true) };
  const alerts = new AlertSystem(sink, createConfig({}), () => current);
  const advanceMinutes = (minutes: number) => {
    current = new Date(current.getTime() + minutes * 60_000);
  };
  return { alerts, sink, advanceMinutes };
}

describe('AlertSystem.checkAndAlert', () => {
  it('derives thresholds from the risk settings', () => {
    expect(setup().alerts.thresholds).toEqual({ consecutiveLosses: 2, drawdown: 2, profitTarget: 0.5 });
  });

  it('warns about a losing streak', async () => {
    const { alerts, sink } = setup();

    const sent = await alerts.checkAndAlert(report({ consecutiveLosses: 2 }));

    expect(sent.map((a) => a.title)).toEqual(['2 consecutive losses']);
    expect(sink.sendAlert).toHaveBeenCalledWith(
      '2 consecutive losses\n\nCooling period activated. Take a break.\n\n⏰ 15:00 IST',
      'WARNING'
    );
  });

  it('raises drawdown, target and win rate alerts', async () => {
    const { alerts, sink } = setup();

    await alerts.checkAndAlert(report({ maxDrawdown: 2.5, winRate: 35, totalTrades: 11 }, 0.6));

    expect(sink.sendAlert.mock.calls.map(([message, level]) => [message.split('\n')[0], level])).toEqual([
      ['Max drawdown reached: 2.5%', 'CRITICAL'],
      ['Daily target achieved! +0.6%', 'SUCCESS'],
      ['Low win rate: 35.0%', 'WARNING'],
    ]);
  });

  it('needs more than ten trades before judging the win rate', async () => {
    const { alerts, sink } = setup();
    await alerts.checkAndAlert(report({ winRate: 20, totalTrades: 10 }));
    expect(sink.sendAlert).not.toHaveBeenCalled();
  });

  it('suppresses a repeat within the hour', async () => {
    const { alerts, sink, advanceMinutes } = setup();
    const streak = report({ consecutiveLosses: 3 });

    await alerts.checkAndAlert(streak);
    advanceMinutes(30);
    await expect(alerts.checkAndAlert(streak)).resolves.toEqual([]);
    advanceMinutes(31);
    await alerts.checkAndAlert(streak);

    expect(sink.sendAlert).toHaveBeenCalledTimes(2);
  });
});

describe('AlertSystem history', () => {
  it('counts alerts by level and frequency', async () => {
    const { alerts, advanceMinutes } = setup();
    await alerts.send('WARNING', 'Feed lag', 'Slow');
    advanceMinutes(61);
    await alerts.send('WARNING', 'Feed lag', 'Slow');
    await alerts.send('ERROR', 'Exchange down', '503');

    const stats = alerts.stats();
    expect(stats.totalAlerts).toBe(3);
    expect(stats.byLevel).toEqual({ INFO: 0, WARNING: 2, CRITICAL: 0, SUCCESS: 0, ERROR: 1 });
    expect(stats.mostFrequent[0]).toEqual(['WARNING:Feed lag', 2]);
  });

  it('lists alerts from the recent window', async () => {
    const { alerts, advanceMinutes } = setup();
    await alerts.send('INFO', 'Old', 'x');
    advanceMinutes(3 * 60);
    await alerts.send('INFO', 'New', 'y');

    expect(alerts.recent(2).map((a) => a.title)).toEqual(['New']);
    expect(alerts.recent().map((a) => a.title)).toEqual(['Old', 'New']);
  });
});
