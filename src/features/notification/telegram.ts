/**
 * @fileoverview Telegram Bot API notifier with a throttled send queue
 * @module features/notification/telegram
 *
 * Messages are queued and sent one at a time, at least
 * `telegram.minIntervalMs` apart. Send failures are logged and reported as
 * `false`; they never reach the caller as exceptions. Without credentials the
 * notifier only logs.
 */

import { z } from 'zod';
import type { SentinelConfig } from '../../config/index.js';
import { hasTelegramCredentials } from '../../config/index.js';
import { NotificationError } from '../../shared/errors.js';
import type { Signal } from '../../shared/types/index.js';
import { logger } from '../../shared/utils/logger.js';
import { RetryExecutor } from '../../shared/utils/retry.js';
import { HttpClient } from '../market-data/http-client.js';
import { MessageFormatter, type AlertLevel, type DailySummaryStats, type HealthDigest, type WeeklySummaryStats } from './formatter.js';
import { escapeHtml, shutdownMessage, startupMessage } from './templates.js';

const log = logger.child('telegram');

export type ParseMode = 'HTML' | 'Markdown';

const TelegramReplySchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

interface OutgoingMessage {
  text: string;
  parseMode: ParseMode;
  resolve: (sent: boolean) => void;
}

export interface TelegramNotifierOptions {
  http?: HttpClient;
  retry?: RetryExecutor;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface NotifierStatus {
  enabled: boolean;
  queueSize: number;
  workerRunning: boolean;
  sent: number;
  failed: number;
  /** ISO-8601 time of the last send attempt */
  lastMessage: string | null;
  /** First three characters only */
  chatId: string;
}

export const HIGH_CONFIDENCE_ALERT = 80;

const preview = (text: string) => text.replace(/\s+/g, ' ').slice(0, 50);

export class TelegramNotifier {
  readonly formatter: MessageFormatter;

  private readonly http: HttpClient;
  private readonly retry: RetryExecutor;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly queue: OutgoingMessage[] = [];
  private worker: Promise<void> | null = null;
  private lastSentAt: number | null = null;
  private sent = 0;
  private failed = 0;
  private stopped = false;

  constructor(
    private readonly config: Pick<SentinelConfig, 'telegram' | 'risk'>,
    options: TelegramNotifierOptions = {}
  ) {
    this.http = options.http ?? new HttpClient({ timeoutMs: 10000 });
    this.retry = options.retry ?? new RetryExecutor({ maxRetries: 2 });
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.formatter = new MessageFormatter(config, this.now);

    if (this.enabled) {
      log.info(`Telegram notifier initialized for chat ${this.maskedChatId()}`);
    } else {
      log.warn('Telegram credentials missing, messages will only be logged');
    }
  }

  get enabled(): boolean {
    return hasTelegramCredentials(this.config);
  }

  /**
   * Queues a message. Resolves once it is sent (`true`) or given up on.
   */
  sendMessage(text: string, parseMode: ParseMode = 'HTML'): Promise<boolean> {
    if (this.stopped) {
      log.warn(`Notifier stopped, dropping message: ${preview(text)}`);
      return Promise.resolve(false);
    }
    log.debug(`Queueing message: ${preview(text)}`);
    return new Promise<boolean>((resolve) => {
      this.queue.push({ text, parseMode, resolve });
      this.drain();
    });
  }

  /**
   * Waits for every queued message to be handled.
   */
  async flush(): Promise<void> {
    while (this.worker) {
      await this.worker;
    }
  }

  /**
   * Sends what is queued, then refuses new messages.
   */
  async stop(): Promise<void> {
    await this.flush();
    this.stopped = true;
    log.info('Telegram notifier stopped');
  }

  // ===========================================================================
  // MESSAGE KINDS
  // ===========================================================================

  async sendSignal(signal: Signal): Promise<boolean> {
    const sent = await this.sendMessage(this.formatter.formatSignal(signal));
    if (signal.confidence >= HIGH_CONFIDENCE_ALERT) {
      await this.sendAlert(`🔥 HIGH CONFIDENCE SIGNAL: ${signal.symbol} ${signal.direction}`);
    }
    return sent;
  }

  sendStartup(): Promise<boolean> {
    return this.sendMessage(startupMessage(this.config.risk, this.now()));
  }

  sendShutdown(): Promise<boolean> {
    return this.sendMessage(shutdownMessage());
  }

  sendDailySummary(stats: DailySummaryStats): Promise<boolean> {
    return this.sendMessage(this.formatter.formatDailySummary(stats));
  }

  sendWeeklySummary(stats: WeeklySummaryStats): Promise<boolean> {
    return this.sendMessage(this.formatter.formatWeeklySummary(stats));
  }

  sendAlert(message: string, level: AlertLevel = 'INFO'): Promise<boolean> {
    return this.sendMessage(this.formatter.formatAlert(message, level));
  }

  sendError(error: string, trace?: string): Promise<boolean> {
    let text = `🚨 <b>ERROR</b>\n${escapeHtml(error)}`;
    if (trace) {
      text += `\n<pre>${escapeHtml(trace.slice(0, 500))}</pre>`;
    }
    return this.sendMessage(text);
  }

  sendHealthStatus(health: HealthDigest): Promise<boolean> {
    return this.sendMessage(this.formatter.formatHealthStatus(health));
  }

  sendTest(): Promise<boolean> {
    return this.sendMessage('🧪 Test message from the signal desk');
  }

  status(): NotifierStatus {
    return {
      enabled: this.enabled,
      queueSize: this.queue.length,
      workerRunning: this.worker !== null,
      sent: this.sent,
      failed: this.failed,
      lastMessage: this.lastSentAt === null ? null : new Date(this.lastSentAt).toISOString(),
      chatId: this.maskedChatId(),
    };
  }

  // ===========================================================================
  // QUEUE WORKER
  // ===========================================================================

  private drain(): void {
    if (this.worker) {
      return;
    }
    this.worker = this.work().finally(() => {
      this.worker = null;
      if (this.queue.length > 0) {
        this.drain();
      }
    });
  }

  private async work(): Promise<void> {
    for (let next = this.queue.shift(); next; next = this.queue.shift()) {
      await this.throttle();
      next.resolve(await this.deliver(next.text, next.parseMode));
    }
  }

  private async throttle(): Promise<void> {
    if (this.lastSentAt === null) {
      return;
    }
    const wait = this.config.telegram.minIntervalMs - (this.now().getTime() - this.lastSentAt);
    if (wait > 0) {
      await this.sleep(wait);
    }
  }

  private async deliver(text: string, parseMode: ParseMode): Promise<boolean> {
    if (!this.enabled) {
      log.info(`[telegram disabled] ${preview(text)}`);
      return false;
    }

    const result = await this.retry.execute(() => this.post(text, parseMode), 'telegram.sendMessage');
    this.lastSentAt = this.now().getTime();

    if (result.success) {
      this.sent++;
      log.debug(`Telegram message sent: ${preview(text)}`);
      return true;
    }
    this.failed++;
    log.error(`Telegram send failed after ${result.attempts} attempt(s): ${result.error.message}`);
    return false;
  }

  private async post(text: string, parseMode: ParseMode): Promise<void> {
    const { apiBaseUrl, botToken, chatId } = this.config.telegram;
    const body = await this.http.postJson(`${apiBaseUrl}/bot${botToken}/sendMessage`, {
      chat_id: chatId,
      text,
      parse_mode: parseMode,
      disable_web_page_preview: true,
    });

    const reply = TelegramReplySchema.safeParse(body);
    if (!reply.success) {
      throw new NotificationError('Unexpected Telegram reply');
    }
    if (!reply.data.ok) {
      throw new NotificationError(`Telegram rejected message: ${reply.data.description ?? 'unknown reason'}`);
    }
  }

  private maskedChatId(): string {
    return `${this.config.telegram.chatId.slice(0, 3)}...`;
  }
}
