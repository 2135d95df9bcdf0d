/**
 * @fileoverview Application constants
 * @module shared/constants
 */

/** Application name */
export const APP_NAME = 'candle-sentinel';

/** Display name used in notifications and the HTTP root */
export const BOT_DISPLAY_NAME = 'CANDLE SENTINEL';

/** Application version */
export const APP_VERSION = '0.1.0';

/** Symbol whose regime gates every other pair */
export const BTC_SYMBOL = 'BTC/USDT';

/** Timeframe whose candle close triggers evaluation */
export const PRIMARY_TIMEFRAME = '15m';

/** IST offset from UTC in minutes (+05:30) */
export const IST_OFFSET_MINUTES = 330;

/** Minimum candles per timeframe before analysis is meaningful */
export const MIN_CANDLES: Readonly<Record<string, number>> = {
  '5m': 50,
  '15m': 50,
  '1h': 30,
  '4h': 20,
};

/** BTC 15m candles needed before the regime is trusted */
export const BTC_READY_CANDLES = 50;

/** BTC 15m candles needed to run regime detection at all */
export const BTC_REGIME_MIN_CANDLES = 30;

/** Defaults used when a market datum cannot be fetched */
export const DEFAULT_FEAR_INDEX = 50;

/** Signals older than this are rejected by the validator (seconds) */
export const MAX_SIGNAL_AGE_SECONDS = 300;

/** Reasons reported when a symbol is skipped */
export const SKIP_REASONS = {
  noData: 'Insufficient data for analysis',
  btcBlock: 'BTC regime blocking trade',
  structureBlock: 'Structure not confirmed',
  riskBlock: 'Risk manager blocked trade',
  filterBlock: 'Filters not passed',
  sessionBlock: 'Not in active session',
} as const;

/** Milliseconds per unit */
export const MS_IN_SECOND = 1000;
export const MS_IN_MINUTE = 60 * MS_IN_SECOND;
export const MS_IN_HOUR = 60 * MS_IN_MINUTE;
export const MS_IN_DAY = 24 * MS_IN_HOUR;
