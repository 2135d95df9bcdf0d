/**
 * @fileoverview IST wall-clock task scheduler
 * @module features/engine/scheduler
 *
 * Fires the daily reset, the regime refresh, session opens and the chat
 * digests at fixed IST times. Every task re-arms itself for its next
 * occurrence after it runs.
 */

import type { SentinelConfig } from '../../config/index.js';
import { MS_IN_DAY } from '../../shared/constants/index.js';
import { errorMessage } from '../../shared/errors.js';
import type { Session } from '../../shared/types/index.js';
import { logger } from '../../shared/utils/logger.js';
import {
  currentSession,
  formatIst,
  isAvoidTime,
  istHour,
  istWeekday,
  msUntilIst,
  nextSession,
  type NextSession,
} from '../../shared/utils/time.js';

const log = logger.child('scheduler');

// =============================================================================
// TYPES
// =============================================================================

export type TradingSession = Exclude<Session, 'dead'>;

export type TaskName =
  | 'daily_reset'
  | 'regime_update'
  | 'morning_update'
  | 'daily_summary'
  | 'weekly_summary'
  | `${TradingSession}_start`;

export type TaskCallback = () => Promise<void> | void;
export type SessionCallback = (session: TradingSession) => Promise<void> | void;

/** The engine operations the scheduler drives */
export interface ScheduledEngine {
  resetDaily(): void;
  updateRegime(): Promise<void>;
}

export interface ScheduledTask {
  name: TaskName;
  /** IST `HH:MM` */
  time: string;
  /** IST day of week, 0 = Sunday; daily when absent */
  weekday?: number;
  session?: TradingSession;
}

export interface SessionInfo {
  current_session: Session | null;
  hour: number;
  is_trading_time: boolean;
  next_session: NextSession;
  /** IST `HH:MM` */
  time_ist: string;
}

const TRADING_SESSIONS: TradingSession[] = ['asia', 'london', 'ny', 'overlap'];

const FRIDAY = 5;

function hourLabel(hour: number): string {
  return `${String(hour % 24).padStart(2, '0')}:00`;
}

// =============================================================================
// SCHEDULER
// =============================================================================

export class TradingScheduler {
  readonly tasks: readonly ScheduledTask[];

  private readonly callbacks = new Map<TaskName, TaskCallback[]>();
  private readonly timers = new Map<TaskName, NodeJS.Timeout>();
  private running = false;

  constructor(
    private readonly config: Pick<SentinelConfig, 'sessions'>,
    private readonly engine: ScheduledEngine,
    private readonly now: () => Date = () => new Date()
  ) {
    const { hours } = config.sessions;
    this.tasks = [
      { name: 'daily_reset', time: '00:00' },
      { name: 'regime_update', time: '01:00' },
      ...TRADING_SESSIONS.map((session): ScheduledTask => ({
        name: `${session}_start`,
        time: hourLabel(hours[session][0]),
        session,
      })),
      { name: 'morning_update', time: '09:30' },
      { name: 'daily_summary', time: '23:55' },
      { name: 'weekly_summary', time: '20:00', weekday: FRIDAY },
    ];
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    for (const task of this.tasks) {
      this.arm(task);
    }
    log.info(`Scheduler started with ${this.tasks.length} tasks`);
  }

  stop(): void {
    this.running = false;
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    log.info('Scheduler stopped');
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  on(name: TaskName, callback: TaskCallback): void {
    const list = this.callbacks.get(name) ?? [];
    list.push(callback);
    this.callbacks.set(name, list);
  }

  onSession(session: TradingSession, callback: SessionCallback): void {
    this.on(`${session}_start`, () => callback(session));
    log.debug(`Callback registered for ${session}`);
  }

  // ---------------------------------------------------------------------------
  // Execution
  // ---------------------------------------------------------------------------

  /**
   * Milliseconds from now until the task's next occurrence.
   */
  delayFor(task: ScheduledTask): number {
    const now = this.now();
    let delay = msUntilIst(task.time, now);
    if (task.weekday !== undefined) {
      const fireDay = istWeekday(new Date(now.getTime() + delay));
      delay += ((task.weekday - fireDay + 7) % 7) * MS_IN_DAY;
    }
    return delay;
  }

  /**
   * Runs a task's own action, then its registered callbacks. Failures are
   * logged per step so one bad callback does not stop the rest.
   */
  async runTask(name: TaskName): Promise<void> {
    log.info(`Executing scheduled task: ${name}`);
    try {
      if (name === 'daily_reset') {
        this.engine.resetDaily();
      } else if (name === 'regime_update') {
        await this.engine.updateRegime();
      }
    } catch (error) {
      log.error(`Scheduled task ${name} error: ${errorMessage(error)}`);
    }

    for (const callback of this.callbacks.get(name) ?? []) {
      try {
        await callback();
      } catch (error) {
        log.error(`Callback for ${name} failed: ${errorMessage(error)}`);
      }
    }
  }

  private arm(task: ScheduledTask): void {
    const delay = this.delayFor(task);
    const timer = setTimeout(() => {
      this.timers.delete(task.name);
      void this.runTask(task.name).finally(() => {
        if (this.running) {
          this.arm(task);
        }
      });
    }, delay);
    this.timers.set(task.name, timer);
  }

  // ---------------------------------------------------------------------------
  // Session queries
  // ---------------------------------------------------------------------------

  /** Inside a trading session and outside every avoid window */
  isTradingTime(date: Date = this.now()): boolean {
    const session = currentSession(date, this.config.sessions.hours);
    if (!session || session === 'dead') {
      return false;
    }
    return !isAvoidTime(istHour(date), this.config.sessions.avoid);
  }

  sessionInfo(): SessionInfo {
    const date = this.now();
    const hour = istHour(date);
    return {
      current_session: currentSession(date, this.config.sessions.hours),
      hour,
      is_trading_time: this.isTradingTime(date),
      next_session: nextSession(hour, this.config.sessions.hours),
      time_ist: formatIst(date).slice(0, 5),
    };
  }
}
