/**
 * @fileoverview IST clock helpers and trading-session lookup
 * @module shared/utils/time
 *
 * India Standard Time has a fixed +05:30 offset and no daylight saving, so
 * conversion is a plain shift followed by the UTC getters.
 */

import { IST_OFFSET_MINUTES, MS_IN_MINUTE } from '../constants/index.js';
import type { Session } from '../types/index.js';

// =============================================================================
// TYPES
// =============================================================================

/** `[startHour, endHour)` in IST */
export type HourWindow = [start: number, end: number];

export type SessionHours = Record<Session, HourWindow>;

export interface AvoidWindow {
  start: number;
  end: number;
  label: string;
}

export interface NextSession {
  name: Session;
  start: string;
  end: string;
  /** Whole hours until the session opens */
  in: number;
}

export const DEFAULT_SESSION_HOURS: SessionHours = {
  asia: [7, 11],
  london: [13, 17],
  ny: [18, 22],
  overlap: [22, 24],
  dead: [0, 6],
};

export const DEFAULT_AVOID_TIMES: AvoidWindow[] = [
  { start: 10, end: 11, label: 'Lunch' },
  { start: 23, end: 1, label: 'Dead Zone' },
];

const SESSION_ORDER: Session[] = ['asia', 'london', 'ny', 'overlap', 'dead'];

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const LONG_MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];
const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

// =============================================================================
// IST CONVERSION
// =============================================================================

/**
 * Returns a Date whose UTC fields read as IST wall-clock time.
 */
function shiftToIst(date: Date): Date {
  return new Date(date.getTime() + IST_OFFSET_MINUTES * MS_IN_MINUTE);
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

export function istHour(date: Date = new Date()): number {
  return shiftToIst(date).getUTCHours();
}

export function istMinute(date: Date = new Date()): number {
  return shiftToIst(date).getUTCMinutes();
}

/**
 * IST calendar date as `YYYY-MM-DD`.
 */
export function istDateString(date: Date = new Date()): string {
  const ist = shiftToIst(date);
  return `${ist.getUTCFullYear()}-${pad2(ist.getUTCMonth() + 1)}-${pad2(ist.getUTCDate())}`;
}

/**
 * Epoch ms of the IST midnight that opens `date`'s IST day.
 */
export function istDayStart(date: Date = new Date()): number {
  const ist = shiftToIst(date);
  return Date.UTC(ist.getUTCFullYear(), ist.getUTCMonth(), ist.getUTCDate()) - IST_OFFSET_MINUTES * MS_IN_MINUTE;
}

/** IST day of week, 0 = Sunday */
export function istWeekday(date: Date = new Date()): number {
  return shiftToIst(date).getUTCDay();
}

/**
 * e.g. `Tuesday, 05 March 2024`
 */
export function istLongDate(date: Date = new Date()): string {
  const ist = shiftToIst(date);
  const weekday = WEEKDAYS[ist.getUTCDay()] ?? '';
  const month = LONG_MONTHS[ist.getUTCMonth()] ?? '';
  return `${weekday}, ${pad2(ist.getUTCDate())} ${month} ${ist.getUTCFullYear()}`;
}

/**
 * IST wall-clock time as `HH:MM IST`.
 */
export function formatIst(date: Date = new Date()): string {
  const ist = shiftToIst(date);
  return `${pad2(ist.getUTCHours())}:${pad2(ist.getUTCMinutes())} IST`;
}

/**
 * Human readable stamp for chat messages, e.g. `05 Mar 2024, 14:30 IST`.
 */
export function tsLabel(date: Date = new Date()): string {
  const ist = shiftToIst(date);
  const month = MONTHS[ist.getUTCMonth()] ?? '';
  return `${pad2(ist.getUTCDate())} ${month} ${ist.getUTCFullYear()}, ${formatIst(date)}`;
}

/**
 * Milliseconds from `now` until the next IST wall-clock `HH:MM`.
 * A target equal to `now` is scheduled for tomorrow.
 */
export function msUntilIst(time: string, now: Date = new Date()): number {
  const [hourText, minuteText] = time.split(':');
  const hour = Number(hourText);
  const minute = Number(minuteText ?? '0');

  const ist = shiftToIst(now);
  const target = Date.UTC(ist.getUTCFullYear(), ist.getUTCMonth(), ist.getUTCDate(), hour, minute, 0, 0);
  let wait = target - ist.getTime();
  if (wait <= 0) {
    wait += 24 * 60 * MS_IN_MINUTE;
  }
  return wait;
}

// =============================================================================
// SESSIONS
// =============================================================================

/**
 * First session whose `[start, end)` window contains the IST hour, or null
 * for the gaps between sessions.
 */
export function sessionForHour(hour: number, sessions: SessionHours = DEFAULT_SESSION_HOURS): Session | null {
  for (const name of SESSION_ORDER) {
    const [start, end] = sessions[name];
    if (start <= hour && hour < end) {
      return name;
    }
  }
  return null;
}

export function currentSession(date: Date = new Date(), sessions: SessionHours = DEFAULT_SESSION_HOURS): Session | null {
  return sessionForHour(istHour(date), sessions);
}

/**
 * Whether the IST hour falls inside an avoid window. A window whose start is
 * after its end wraps past midnight.
 */
export function isAvoidTime(hour: number, windows: AvoidWindow[] = DEFAULT_AVOID_TIMES): boolean {
  return windows.some(({ start, end }) =>
    start <= end ? start <= hour && hour < end : hour >= start || hour < end
  );
}

/** IST 01:00-07:00, when no signals are sent. */
export function isSleepTime(date: Date = new Date()): boolean {
  const hour = istHour(date);
  return hour >= 1 && hour < 7;
}

/**
 * The next session to open after `hour`, wrapping to tomorrow's first one.
 */
export function nextSession(hour: number, sessions: SessionHours = DEFAULT_SESSION_HOURS): NextSession {
  const ordered = SESSION_ORDER.map((name) => ({ name, start: sessions[name][0], end: sessions[name][1] })).sort(
    (a, b) => a.start - b.start
  );

  const upcoming = ordered.find((s) => s.start > hour);
  const target = upcoming ?? ordered[0];
  if (!target) {
    throw new RangeError('No sessions configured');
  }

  return {
    name: target.name,
    start: `${target.start}:00`,
    end: `${target.end}:00`,
    in: upcoming ? target.start - hour : 24 - hour + target.start,
  };
}

// =============================================================================
// FORMATTING
// =============================================================================

/**
 * Formats minutes as `45m`, `2h` or `1h 30m`.
 */
export function formatDuration(minutes: number): string {
  if (minutes < 60) {
    return `${minutes}m`;
  }
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return mins === 0 ? `${hours}h` : `${hours}h ${mins}m`;
}

