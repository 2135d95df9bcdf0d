import { describe, it, expect } from 'vitest';
import type { Candle } from '../../../shared/types/index.js';
import { BacktestEngine, type BacktestStrategy } from '../engine.js';
import { runBacktestPipeline } from '../pipeline.js';

const BAR = 900_000;

function flat(count: number): Candle[] {
  return Array.from({ length: count }, (_, i): Candle => [i * BAR, 100, 101, 99, 100, 10]);
}

/** Long on every bar, target inside the next bar's range */
const everyBar: BacktestStrategy = (window) => {
  const last = window[window.length - 1];
  return { direction: 'LONG', entry: last[4], stopLoss: 99.5, takeProfit: 100.5, timestamp: last[0] };
};

describe('runBacktestPipeline', () => {
  it('notes a Monte Carlo run that lacks trades', () => {
    const oneTrade: BacktestStrategy = (window) => (window.length === 51 ? everyBar(window) : null);
    const engine = new BacktestEngine({ strategy: oneTrade });

    const output = runBacktestPipeline(flat(60), {
      symbol: 'ETH/USDT',
      engine,
      monteCarlo: 100,
      walkForward: { trainDays: 1, testDays: 1, stepDays: 1 },
    });

    expect(output.result.totalTrades).toBe(1);
    expect(output.sections).toHaveLength(4);
    expect(output.sections[0].split('\n')[1]).toBe('BACKTEST RESULTS');
    expect(output.sections[1].split('\n')[2]).toBe('1970-01    1        1        100.0      $5.00');
    expect(output.sections[2]).toBe('Monte Carlo skipped: 1 trades, need 10');
    expect(output.sections[3]).toBe('No walk-forward results');
    expect(output.walkForward?.windows).toEqual([]);
  });

  it('adds simulation and bootstrap sections with enough trades', () => {
    const engine = new BacktestEngine({ strategy: everyBar });

    const output = runBacktestPipeline(flat(80), { symbol: 'ETH/USDT', engine, monteCarlo: 20, rng: () => 0.5 });

    expect(output.result.totalTrades).toBeGreaterThanOrEqual(10);
    expect(output.sections).toHaveLength(4);
    expect(output.sections[2].split('\n')[1]).toBe('MONTE CARLO SIMULATION RESULTS');
    expect(output.sections[3].split('\n')[0]).toBe('Bootstrap Resampling:');
    expect(output.walkForward).toBeNull();
  });
});
