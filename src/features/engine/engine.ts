/**
 * @fileoverview Signal engine: market data in, graded signals out
 * @module features/engine/engine
 *
 * Seeds the candle cache over REST, keeps a BTC series for regime
 * detection and evaluates every pair when its primary-timeframe candle
 * closes on the WebSocket feed. A symbol is evaluated only after BTC data is
 * ready and while the daily limit, the per-symbol cooldown, the risk manager
 * and the dynamic filter all allow it.
 */

import type { SentinelConfig } from '../../config/index.js';
import { BTC_READY_CANDLES, BTC_REGIME_MIN_CANDLES, BTC_SYMBOL, MS_IN_MINUTE, MS_IN_SECOND } from '../../shared/constants/index.js';
import { errorMessage } from '../../shared/errors.js';
import { createEngineStore, type EngineStore } from '../../shared/store/index.js';
import type { BtcRegime, Candle, MarketType, Signal, Timeframe } from '../../shared/types/index.js';
import { logger } from '../../shared/utils/logger.js';
import { atrPercent } from '../analysis/indicators.js';
import { MarketRegimeDetector } from '../analysis/market-regime.js';
import { DynamicFilter } from '../filters/dynamic.js';
import { FilterOrchestrator } from '../filters/orchestrator.js';
import type { SymbolData } from '../filters/types.js';
import { CandleCache } from '../market-data/candle-cache.js';
import { ExchangeClient, type MarketDataSource } from '../market-data/exchange-client.js';
import { KlineFeed, type SocketFactory } from '../market-data/kline-feed.js';
import { MetricsCollector } from '../monitoring/metrics.js';
import { RiskManager } from '../risk/risk-manager.js';
import { SignalGenerator } from '../signals/generator.js';

const log = logger.child('engine');

// =============================================================================
// TYPES
// =============================================================================

export interface EngineNotifier {
  sendSignal(signal: Signal): Promise<boolean>;
}

export interface EngineDecision {
  allowed: boolean;
  reason: string;
}

/** Wire shape served under `market` on `/health` */
export interface EngineStatus {
  market_type: MarketType;
  btc_regime: BtcRegime;
  btc_confidence: number;
  btc_data_ready: boolean;
  btc_candles: number;
  daily_signals: number;
  daily_limit: number;
  active_trades: number;
  day_locked: boolean;
  paused: boolean;
}

export interface SignalEngineOptions {
  source?: MarketDataSource;
  cache?: CandleCache;
  store?: EngineStore;
  riskManager?: RiskManager;
  metrics?: MetricsCollector;
  socketFactory?: SocketFactory;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

type BtcTimeframe = '15m' | '1h' | '4h';

const BTC_FETCH_LIMITS: Record<BtcTimeframe, number> = { '15m': 100, '1h': 50, '4h': 50 };

const BTC_FETCH_ATTEMPTS = 10;
const BTC_BACKGROUND_INTERVAL_MS = 30 * MS_IN_SECOND;

function isBtcTimeframe(timeframe: Timeframe): timeframe is BtcTimeframe {
  return timeframe === '15m' || timeframe === '1h' || timeframe === '4h';
}

/** Wait before BTC fetch attempt `attempt + 1` (0-based) */
export function btcRetryDelayMs(attempt: number): number {
  return Math.min(30, 5 * (attempt + 1)) * MS_IN_SECOND;
}

// =============================================================================
// SIGNAL ENGINE
// =============================================================================

export class SignalEngine {
  readonly cache: CandleCache;
  readonly store: EngineStore;
  readonly riskManager: RiskManager;
  readonly metrics: MetricsCollector;
  readonly regimeDetector: MarketRegimeDetector;
  readonly filters: FilterOrchestrator;
  readonly dynamicFilter: DynamicFilter;
  readonly generator: SignalGenerator;
  readonly feed: KlineFeed;

  private readonly source: MarketDataSource;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly btc: Record<BtcTimeframe, Candle[]> = { '15m': [], '1h': [], '4h': [] };
  private btcTimer: NodeJS.Timeout | undefined;

  constructor(
    private readonly config: SentinelConfig,
    private readonly notifier: EngineNotifier,
    options: SignalEngineOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.source = options.source ?? new ExchangeClient({ exchange: config.exchange, fearGreedUrl: config.fearGreedUrl });
    this.cache = options.cache ?? new CandleCache(config.cacheSize);
    this.store = options.store ?? createEngineStore();
    this.riskManager = options.riskManager ?? new RiskManager(config, this.now);
    this.metrics = options.metrics ?? new MetricsCollector(this.now);

    this.regimeDetector = new MarketRegimeDetector(config.btcRegime);
    this.filters = new FilterOrchestrator(config, { now: this.now });
    this.dynamicFilter = new DynamicFilter(config, this.now);
    this.generator = new SignalGenerator(config, this.now);

    this.feed = new KlineFeed({
      baseUrl: config.exchange.wsBaseUrl,
      symbols: config.tradingPairs,
      timeframes: config.timeframes,
      cache: this.cache,
      config: config.websocket,
      onCandleClose: (symbol, timeframe, candles) => this.onCandleClose(symbol, timeframe, candles),
      socketFactory: options.socketFactory,
    });

    log.info('Engine initialized');
  }

  get btcDataReady(): boolean {
    return this.store.getState().btcDataReady;
  }

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  async start(): Promise<void> {
    log.info('Starting engine...');

    await this.seedCache();

    if (await this.forceFetchBtcData()) {
      log.success('BTC data loaded');
    } else {
      log.error('BTC data failed to load, retrying in the background');
      this.startBackgroundBtcFetcher();
    }

    this.feed.start();
    await this.updateRegime();

    this.store.getState().setRunning(true);
    log.success('Engine started');
  }

  async stop(): Promise<void> {
    log.info('Stopping engine...');
    this.stopBackgroundBtcFetcher();
    this.feed.stop();
    if (this.source instanceof ExchangeClient) {
      this.source.close();
    }
    this.store.getState().setRunning(false);
    log.info('Engine stopped');
  }

  /**
   * Fills the cache from REST: BTC on the primary timeframe, then every
   * other pair on every configured timeframe.
   */
  async seedCache(): Promise<void> {
    const primary = this.config.primaryTimeframe;
    const btcCandles = await this.source.fetchOhlcv(BTC_SYMBOL, primary, BTC_FETCH_LIMITS['15m']);
    if (btcCandles.length > 0) {
      this.cache.set(BTC_SYMBOL, primary, btcCandles);
      log.info(`Seeded ${BTC_SYMBOL}: ${btcCandles.length} candles`);
    } else {
      log.warn(`${BTC_SYMBOL} seed returned no candles`);
    }

    for (const symbol of this.config.tradingPairs) {
      if (symbol === BTC_SYMBOL) continue;
      for (const timeframe of this.config.timeframes) {
        const candles = await this.source.fetchOhlcv(symbol, timeframe, this.config.cacheSize);
        if (candles.length > 0) {
          this.cache.set(symbol, timeframe, candles);
          log.debug(`Seeded ${symbol} ${timeframe}: ${candles.length} candles`);
        } else {
          log.warn(`Failed to seed ${symbol} ${timeframe}`);
        }
      }
    }
    log.info('Cache seeding complete');
  }

  // ===========================================================================
  // BTC DATA
  // ===========================================================================

  /**
   * Tries to load the BTC series, waiting longer between each attempt.
   */
  async forceFetchBtcData(attempts = BTC_FETCH_ATTEMPTS): Promise<boolean> {
    for (let attempt = 0; attempt < attempts; attempt++) {
      log.info(`BTC data fetch attempt ${attempt + 1}/${attempts}`);
      if (await this.fetchBtcOnce()) {
        return true;
      }
      if (attempt < attempts - 1) {
        const wait = btcRetryDelayMs(attempt);
        log.info(`Waiting ${wait / MS_IN_SECOND}s before next attempt`);
        await this.sleep(wait);
      }
    }
    return false;
  }

  /**
   * One BTC load. Ready once the 15m series has enough candles.
   */
  async fetchBtcOnce(): Promise<boolean> {
    try {
      const btc15m = await this.source.fetchOhlcv(BTC_SYMBOL, '15m', BTC_FETCH_LIMITS['15m']);
      if (btc15m.length < BTC_READY_CANDLES) {
        log.warn(`Insufficient BTC data: ${btc15m.length}/${BTC_READY_CANDLES} candles`);
        return false;
      }
      this.btc['15m'] = btc15m;
      this.btc['1h'] = await this.source.fetchOhlcv(BTC_SYMBOL, '1h', BTC_FETCH_LIMITS['1h']);
      this.btc['4h'] = await this.source.fetchOhlcv(BTC_SYMBOL, '4h', BTC_FETCH_LIMITS['4h']);
      this.store.getState().setBtcData(btc15m.length, true);
      log.info(`BTC data ready: ${btc15m.length} candles`);

      await this.updateRegime();
      return true;
    } catch (error) {
      log.error(`BTC fetch failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private startBackgroundBtcFetcher(): void {
    if (this.btcTimer) return;
    this.btcTimer = setInterval(() => {
      log.info('Background BTC fetcher running');
      void this.fetchBtcOnce().then((ready) => {
        if (ready) {
          log.success('Background BTC fetcher succeeded');
          this.stopBackgroundBtcFetcher();
        }
      });
    }, BTC_BACKGROUND_INTERVAL_MS);
  }

  private stopBackgroundBtcFetcher(): void {
    if (this.btcTimer) {
      clearInterval(this.btcTimer);
      this.btcTimer = undefined;
    }
  }

  /**
   * Re-detects the market type and the BTC regime from the BTC series.
   */
  async updateRegime(): Promise<void> {
    if (!this.btcDataReady) {
      log.warn('BTC data not ready, skipping regime update');
      return;
    }
    const { '15m': btc15m, '1h': btc1h, '4h': btc4h } = this.btc;
    if (btc15m.length < BTC_REGIME_MIN_CANDLES) {
      log.warn(`Insufficient BTC data for regime: ${btc15m.length}/${BTC_REGIME_MIN_CANDLES}`);
      return;
    }

    try {
      const marketType = this.regimeDetector.detectMarketType(btc15m, btc1h);
      const regime = this.regimeDetector.detectBtcRegime(btc15m, btc1h, btc4h);
      const state = this.store.getState();
      state.setMarketType(marketType);
      state.setBtcRegime(regime);
      this.dynamicFilter.update(marketType);
      log.info(`Market: ${marketType} | BTC: ${regime.regime} | Conf: ${regime.confidence}%`);
    } catch (error) {
      log.error(`Regime update failed: ${errorMessage(error)}`);
      this.metrics.recordError('regime', errorMessage(error));
    }
  }

  // ===========================================================================
  // CANDLE CLOSE
  // ===========================================================================

  async onCandleClose(symbol: string, timeframe: Timeframe, candles: Candle[]): Promise<void> {
    try {
      if (symbol === BTC_SYMBOL && isBtcTimeframe(timeframe)) {
        await this.updateBtcSeries(timeframe, candles);
      }
      if (timeframe !== this.config.primaryTimeframe) {
        return;
      }

      const last = candles[candles.length - 1];
      log.info(`Candle closed: ${symbol} @ ${last ? last[4].toFixed(2) : 'n/a'}`);
      this.cache.set(symbol, timeframe, candles);

      if (this.store.getState().paused) {
        log.debug(`${symbol}: engine paused`);
        return;
      }
      const decision = this.canProcess(symbol);
      if (!decision.allowed) {
        log.info(`${symbol}: ${decision.reason}`);
        return;
      }

      await this.evaluate(symbol);
    } catch (error) {
      log.error(`Error processing candle close for ${symbol}: ${errorMessage(error)}`);
      this.metrics.recordError('candle_close', errorMessage(error));
    }
  }

  private async updateBtcSeries(timeframe: BtcTimeframe, candles: Candle[]): Promise<void> {
    this.btc[timeframe] = candles;
    if (timeframe !== '15m') {
      return;
    }
    const wasReady = this.btcDataReady;
    const ready = wasReady || candles.length >= BTC_READY_CANDLES;
    this.store.getState().setBtcData(candles.length, ready);
    if (ready && !wasReady) {
      log.success('BTC data now ready from WebSocket');
      await this.updateRegime();
    }
  }

  /**
   * Gates checked before a symbol is evaluated, in order.
   */
  canProcess(symbol: string): EngineDecision {
    const state = this.store.getState();
    if (!state.btcDataReady) {
      return { allowed: false, reason: 'BTC data not ready' };
    }

    const limit = this.dailyLimit();
    if (state.dailySignals >= limit) {
      return { allowed: false, reason: `Daily signal limit reached (${state.dailySignals}/${limit})` };
    }

    const lastSignal = state.lastSignalTime[symbol];
    if (lastSignal !== undefined) {
      const elapsed = (this.now().getTime() - lastSignal) / MS_IN_MINUTE;
      const cooldown = this.config.risk.cooldownMinutes;
      if (elapsed < cooldown) {
        return { allowed: false, reason: `Cooldown (${elapsed.toFixed(1)}/${cooldown} min)` };
      }
    }

    const risk = this.riskManager.canTrade(symbol);
    if (!risk.allowed) {
      return { allowed: false, reason: `Risk manager: ${risk.reason}` };
    }

    if (!this.dynamicFilter.shouldTrade(state.marketType)) {
      return { allowed: false, reason: 'Dynamic filter paused trading' };
    }
    return { allowed: true, reason: 'OK' };
  }

  dailyLimit(): number {
    const limits = this.config.signalLimits;
    const marketType = this.store.getState().marketType;
    return marketType === 'unknown' ? limits.default : limits[marketType];
  }

  // ===========================================================================
  // EVALUATION
  // ===========================================================================

  /**
   * Runs filters, signal generation and sizing for one symbol. Sends and
   * returns the signal, or null when any stage rejects it.
   */
  async evaluate(symbol: string): Promise<Signal | null> {
    log.info(`Checking ${symbol} for signal...`);
    const data = await this.gatherData(symbol);
    if (!data) {
      return null;
    }

    const { marketType, btcRegime } = this.store.getState();
    const filterResult = this.filters.evaluate(symbol, null, marketType, btcRegime, data);
    if (!filterResult.passed) {
      log.info(`${symbol}: filters failed - ${filterResult.reason}`);
      return null;
    }
    log.info(`${symbol}: filters passed with score ${filterResult.score}%`);

    const signal = this.generator.generate(symbol, data, filterResult, marketType, btcRegime);
    if (!signal) {
      log.info(`${symbol}: signal generation failed`);
      return null;
    }

    const minScore = this.dynamicFilter.thresholds().minSignalScore;
    if (signal.score < minScore) {
      log.info(`${symbol}: score ${signal.score} below dynamic minimum ${minScore}`);
      return null;
    }

    const fearIndex = await this.source.fetchFearGreed();
    const position = this.riskManager.calculatePosition({
      accountSize: this.config.risk.accountSize,
      entry: signal.entry,
      stopLoss: signal.stopLoss,
      atrPct: atrPercent(data.ohlcv['15m'] ?? []),
      fearIndex,
      marketType,
    });
    if (position.blocked) {
      log.warn(`${symbol}: position sizing blocked - ${position.reason}`);
      return null;
    }

    // Concurrent closes all pass the gates before any of them records, so
    // check again with nothing awaited between the check and the record.
    const gate = this.canProcess(symbol);
    if (!gate.allowed) {
      log.info(`${symbol}: signal dropped - ${gate.reason}`);
      return null;
    }

    const sized: Signal = { ...signal, positionSize: position };
    this.store.getState().recordSignal(sized, this.now().getTime());
    this.metrics.recordSignal(sized);
    await this.notifier.sendSignal(sized);

    log.success(
      `SIGNAL: ${symbol} ${sized.direction} @ ${sized.entry.toFixed(2)} | Score: ${sized.score} | Grade: ${sized.grade}`
    );
    return sized;
  }

  /**
   * Collects cached candles and live derivatives data for one symbol.
   */
  async gatherData(symbol: string): Promise<SymbolData | null> {
    const primary = this.cache.get(symbol, '15m');
    const last = primary[primary.length - 1];
    if (!last) {
      log.warn(`No 15m data for ${symbol}`);
      return null;
    }
    if (this.btc['15m'].length < BTC_REGIME_MIN_CANDLES) {
      log.warn(`Insufficient BTC data: ${this.btc['15m'].length}/${BTC_REGIME_MIN_CANDLES}`);
      return null;
    }

    const [fundingRate, openInterest, orderbook] = await Promise.all([
      this.source.fetchFundingRate(symbol),
      this.source.fetchOpenInterest(symbol),
      this.source.fetchOrderbook(symbol),
    ]);

    const ohlcv: SymbolData['ohlcv'] = {};
    for (const timeframe of this.config.timeframes) {
      ohlcv[timeframe] = this.cache.get(symbol, timeframe);
    }

    return {
      symbol,
      ohlcv,
      btc: { ...this.btc },
      orderbook,
      fundingRate,
      openInterest,
      currentPrice: last[4],
    };
  }

  // ===========================================================================
  // RESULTS, RESETS, STATUS
  // ===========================================================================

  /**
   * Applies a manual trade result reported through the webhook.
   */
  onTradeResult(symbol: string, pnlPct: number): void {
    this.riskManager.recordResult(symbol, pnlPct);
    this.dynamicFilter.recordTradeResult(pnlPct);
    this.metrics.recordTrade({ symbol, pnlPct });
    log.info(`Trade result recorded: ${symbol} @ ${pnlPct.toFixed(2)}%`);
  }

  resetDaily(): void {
    this.store.getState().resetDaily();
    this.riskManager.resetDaily();
    log.info('Daily counters reset');
  }

  setMarketType(marketType: MarketType): void {
    this.store.getState().setMarketType(marketType);
  }

  status(): EngineStatus {
    const state = this.store.getState();
    return {
      market_type: state.marketType,
      btc_regime: state.btcRegime.regime,
      btc_confidence: state.btcRegime.confidence,
      btc_data_ready: state.btcDataReady,
      btc_candles: this.btc['15m'].length,
      daily_signals: state.dailySignals,
      daily_limit: this.dailyLimit(),
      active_trades: this.riskManager.activeTrades().length,
      day_locked: this.riskManager.dailyLock.isLocked,
      paused: state.paused,
    };
  }
}
