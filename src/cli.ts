#!/usr/bin/env node
/**
 * @fileoverview CLI entry point for candle-sentinel
 * @module cli
 *
 * Sets up Commander.js for the process modes, the backtest runner and the
 * config check.
 */

import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { Command, InvalidArgumentError } from 'commander';
import { runWeb, runWorker } from './app.js';
import { collectConfigIssues, loadConfig, validateConfig, type SentinelConfig } from './config/index.js';
import { runBacktestPipeline, writeReports } from './features/backtest/index.js';
import { HistoricalData } from './features/market-data/index.js';
import { APP_NAME, APP_VERSION } from './shared/constants/index.js';
import { ConfigError, errorMessage } from './shared/errors.js';
import { TimeframeSchema } from './shared/types/index.js';
import { logger, LogLevel, parseLogLevel } from './shared/utils/index.js';

// Load .env file from current directory
loadEnv();

const DESCRIPTION = 'Multi-timeframe crypto futures signal desk with Telegram alerts';

interface GlobalOptions {
  verbose?: boolean;
  config?: string;
}

interface BacktestOptions {
  symbol?: string;
  timeframe: string;
  start?: string;
  end?: string;
  monteCarlo?: number | true;
  walkForward?: boolean;
  overfitting?: boolean;
  report?: string;
}

// =============================================================================
// HELPERS
// =============================================================================

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function configure(options: GlobalOptions): SentinelConfig {
  const config = loadConfig({ configPath: options.config });
  logger.setLevel(options.verbose === true ? LogLevel.DEBUG : parseLogLevel(config.logLevel));
  return validateConfig(config);
}

function fail(error: unknown): never {
  if (error instanceof ConfigError) {
    logger.error(error.message);
    for (const issue of error.issues) {
      logger.error(`  - ${issue}`);
    }
  } else {
    logger.error(errorMessage(error));
  }
  process.exit(1);
}

/** `BTCUSDT_15m.json` → `BTC/USDT` */
function symbolFromFile(file: string): string {
  const stem = path.basename(file).split(/[_.]/)[0]?.toUpperCase() ?? '';
  const quote = ['USDT', 'USDC', 'BUSD'].find((q) => stem.endsWith(q) && stem.length > q.length);
  return quote ? `${stem.slice(0, -quote.length)}/${quote}` : stem;
}

// =============================================================================
// CLI SETUP
// =============================================================================

const program = new Command();

program
  .name(APP_NAME)
  .description(DESCRIPTION)
  .version(APP_VERSION, '-v, --version', 'Display version number')
  .option('--verbose', 'Enable debug logging')
  .option('-c, --config <path>', 'Path to the YAML config file');

// =============================================================================
// PROCESS MODES
// =============================================================================

program
  .command('web', { isDefault: true })
  .description('Run the engine with the HTTP surface (cluster of server.workers)')
  .action(async (): Promise<void> => {
    await runWeb(configure(program.opts<GlobalOptions>())).catch(fail);
  });

program
  .command('worker')
  .description('Run the engine and scheduler without HTTP')
  .action(async (): Promise<void> => {
    await runWorker(configure(program.opts<GlobalOptions>())).catch(fail);
  });

// =============================================================================
// BACKTEST
// =============================================================================

program
  .command('backtest <file>')
  .description('Backtest on a JSON candle file')
  .option('-s, --symbol <symbol>', 'Symbol label (derived from the file name by default)')
  .option('-t, --timeframe <tf>', 'Timeframe of the candles', '15m')
  .option('--start <date>', 'First day, YYYY-MM-DD')
  .option('--end <date>', 'Last day, YYYY-MM-DD')
  .option('--monte-carlo [runs]', 'Run a Monte Carlo simulation', positiveInt)
  .option('--walk-forward', 'Run walk-forward analysis')
  .option('--overfitting', 'Compare the train and test splits for overfitting')
  .option('-r, --report <dir>', 'Write txt, json and csv reports to a directory')
  .action(async (file: string, options: BacktestOptions): Promise<void> => {
    const global = program.opts<GlobalOptions>();
    logger.setLevel(global.verbose === true ? LogLevel.DEBUG : LogLevel.INFO);

    try {
      const timeframe = TimeframeSchema.parse(options.timeframe);
      const candles = await new HistoricalData(path.dirname(file)).load(path.basename(file));
      if (candles.length === 0) {
        logger.error(`No candles in ${file}`);
        process.exit(1);
      }

      const symbol = options.symbol ?? symbolFromFile(file);
      const output = runBacktestPipeline(candles, {
        symbol,
        range: { startDate: options.start, endDate: options.end },
        monteCarlo: options.monteCarlo === undefined ? 0 : options.monteCarlo === true ? 1000 : options.monteCarlo,
        walkForward: options.walkForward === true ? {} : undefined,
        overfitting: options.overfitting === true,
      });
      process.stdout.write(`${output.sections.join('\n\n')}\n`);

      if (options.report !== undefined) {
        const day = (timestamp: number) => new Date(timestamp).toISOString().slice(0, 10);
        await writeReports(output.result, {
          symbol,
          timeframe,
          startDate: options.start ?? day(candles[0][0]),
          endDate: options.end ?? day(candles[candles.length - 1][0]),
        }, options.report);
      }
    } catch (error) {
      fail(error);
    }
  });

// =============================================================================
// CHECK CONFIG
// =============================================================================

program
  .command('check-config')
  .description('Load and validate configuration, listing every problem')
  .action((): void => {
    const global = program.opts<GlobalOptions>();
    let config: SentinelConfig;
    try {
      config = loadConfig({ configPath: global.config });
    } catch (error) {
      fail(error);
    }

    const issues = collectConfigIssues(config);
    if (issues.length > 0) {
      logger.error(`Configuration has ${issues.length} problem(s):`);
      for (const issue of issues) {
        logger.error(`  - ${issue}`);
      }
      process.exit(1);
    }
    logger.success(
      `Configuration OK (${config.env}): ${config.tradingPairs.length} pairs, ${config.server.workers} workers on ${config.server.host}:${config.server.port}`
    );
  });

// =============================================================================
// PARSE & RUN
// =============================================================================

program.parseAsync().catch(fail);
