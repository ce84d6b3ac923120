/**
 * Trading calendar: weekday sessions minus a configured holiday list, in the
 * exchange's own time zone.
 *
 * A session counts as completed once the exchange-local clock reaches the
 * close-of-day cutoff.
 */

import {
  addDaysToDateKey,
  currentZonedDateString,
  weekdayOfDateKey,
  zonedDateTimeParts,
  zonedLocalToUtcMs,
  type ZonedDateTimeParts,
} from '../lib/dateUtils.js';

const MAX_SCAN_DAYS = 30;

interface TradingCalendarOptions {
  /** IANA zone of the exchange, e.g. "Asia/Kolkata". */
  timeZone: string;
  /** Exchange-local close-of-day cutoff, "HH:MM". */
  cutoffTime: string;
  /** YYYY-MM-DD keys of full-day closures. */
  holidays?: Iterable<string>;
}

function parseCutoff(cutoffTime: string): { hour: number; minute: number } {
  const match = String(cutoffTime || '').match(/^(\d{1,2}):(\d{2})$/);
  if (!match) throw new Error(`Invalid cutoff time: ${cutoffTime}`);
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

class TradingCalendar {
  readonly timeZone: string;
  readonly cutoffTime: string;
  private readonly cutoff: { hour: number; minute: number };
  private readonly holidays: Set<string>;

  constructor(options: TradingCalendarOptions) {
    this.timeZone = options.timeZone;
    this.cutoffTime = options.cutoffTime;
    this.cutoff = parseCutoff(options.cutoffTime);
    this.holidays = new Set(options.holidays || []);
  }

  localParts(nowUtc: Date): ZonedDateTimeParts {
    return zonedDateTimeParts(nowUtc, this.timeZone);
  }

  localDate(nowUtc: Date): string {
    return currentZonedDateString(nowUtc, this.timeZone);
  }

  isTradingDay(dateKey: string): boolean {
    const weekday = weekdayOfDateKey(dateKey);
    if (!Number.isFinite(weekday)) return false;
    if (weekday === 0 || weekday === 6) return false;
    return !this.holidays.has(dateKey);
  }

  /** Most recent trading day strictly before `dateKey`. */
  previousTradingDay(dateKey: string): string {
    let cursor = addDaysToDateKey(dateKey, -1);
    for (let i = 0; i < MAX_SCAN_DAYS; i++) {
      if (this.isTradingDay(cursor)) return cursor;
      cursor = addDaysToDateKey(cursor, -1);
    }
    throw new Error(`No trading day within ${MAX_SCAN_DAYS} days before ${dateKey}`);
  }

  /** First trading day strictly after `dateKey`. */
  nextTradingDay(dateKey: string): string {
    let cursor = addDaysToDateKey(dateKey, 1);
    for (let i = 0; i < MAX_SCAN_DAYS; i++) {
      if (this.isTradingDay(cursor)) return cursor;
      cursor = addDaysToDateKey(cursor, 1);
    }
    throw new Error(`No trading day within ${MAX_SCAN_DAYS} days after ${dateKey}`);
  }

  /** True when the exchange-local wall clock is at or past the cutoff. */
  isPastCutoff(nowUtc: Date): boolean {
    const parts = this.localParts(nowUtc);
    const minutes = parts.hour * 60 + parts.minute;
    return minutes >= this.cutoff.hour * 60 + this.cutoff.minute;
  }

  /**
   * The trading date whose close is the newest one available: today when today
   * trades and the cutoff has passed, otherwise the previous trading day.
   */
  latestCompletedSession(nowUtc: Date): string {
    const today = this.localDate(nowUtc);
    if (this.isTradingDay(today) && this.isPastCutoff(nowUtc)) return today;
    return this.previousTradingDay(today);
  }

  /** UTC epoch ms of `dateKey` at the cutoff plus `offsetMinutes`, exchange-local. */
  cutoffUtcMs(dateKey: string, offsetMinutes = 0): number {
    const [year, month, day] = dateKey.split('-').map(Number);
    return zonedLocalToUtcMs(this.timeZone, year, month, day, this.cutoff.hour, this.cutoff.minute + offsetMinutes);
  }
}

export { TradingCalendar };
export type { TradingCalendarOptions };
