/**
 * @fileoverview Conversions between unified and exchange symbol formats
 * @module features/market-data/symbols
 */

const QUOTE_ASSETS = ['USDT', 'USDC', 'BUSD'];

/** `BTC/USDT` -> `BTCUSDT` */
export function toExchangeSymbol(symbol: string): string {
  return symbol.replace('/', '').toUpperCase();
}

/** `BTCUSDT` -> `BTC/USDT`; unknown quotes are returned unchanged. */
export function fromExchangeSymbol(raw: string): string {
  const upper = raw.toUpperCase();
  for (const quote of QUOTE_ASSETS) {
    if (upper.endsWith(quote) && upper.length > quote.length) {
      return `${upper.slice(0, -quote.length)}/${quote}`;
    }
  }
  return upper;
}

/** `BTC/USDT`, `15m` -> `btcusdt@kline_15m` */
export function klineStreamName(symbol: string, timeframe: string): string {
  return `${toExchangeSymbol(symbol).toLowerCase()}@kline_${timeframe}`;
}

/** `BTC/USDT` -> `BTC` */
export function baseAsset(symbol: string): string {
  return symbol.split('/')[0] ?? symbol;
}
