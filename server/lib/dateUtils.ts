/**
 * Shared date/time utility functions used across backend modules.
 * All functions are pure.
 *
 * Date keys are exchange-local `YYYY-MM-DD` strings, so lexical order is
 * chronological order.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

const WEEKDAY_INDEX: Record<string, number> = {
  Sun: 0,
  Mon: 1,
  Tue: 2,
  Wed: 3,
  Thu: 4,
  Fri: 5,
  Sat: 6,
};

const MONTH_INDEX: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

interface ZonedDateTimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  weekday: number;
}

function isDateKey(value: string): boolean {
  return Number.isFinite(parseDateKeyToUtcMs(value));
}

function maxDateKey(a: string | null | undefined, b: string | null | undefined): string | null {
  const aVal = String(a || '').trim();
  const bVal = String(b || '').trim();
  if (!aVal) return bVal || null;
  if (!bVal) return aVal;
  return aVal >= bVal ? aVal : bVal;
}

function parseDateKeyToUtcMs(dateKey: string): number {
  const value = String(dateKey || '').trim();
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return NaN;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1 || day > 31) return NaN;
  const ms = Date.UTC(year, month - 1, day, 0, 0, 0, 0);
  // Reject rollovers such as 2025-02-30.
  if (new Date(ms).getUTCDate() !== day) return NaN;
  return ms;
}

function addDaysToDateKey(dateKey: string, days: number): string {
  const baseMs = parseDateKeyToUtcMs(dateKey);
  if (!Number.isFinite(baseMs)) return '';
  return new Date(baseMs + Math.trunc(days) * DAY_MS).toISOString().slice(0, 10);
}

function dateKeyDaysAgo(dateKey: string, days: number): string {
  return addDaysToDateKey(dateKey, -Math.max(0, Number(days) || 0));
}

function weekdayOfDateKey(dateKey: string): number {
  const ms = parseDateKeyToUtcMs(dateKey);
  if (!Number.isFinite(ms)) return NaN;
  return new Date(ms).getUTCDay();
}

function dateKeyFromYmdParts(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function zonedDateTimeParts(nowUtc: Date, timeZone: string): ZonedDateTimeParts {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hour12: false,
    weekday: 'short',
  }).formatToParts(nowUtc);
  const map: Record<string, string> = {};
  for (const part of parts) {
    map[part.type] = part.value;
  }
  return {
    year: Number(map.year || 0),
    month: Number(map.month || 0),
    day: Number(map.day || 0),
    // Some ICU builds render midnight as "24".
    hour: Number(map.hour || 0) % 24,
    minute: Number(map.minute || 0),
    weekday: Number(WEEKDAY_INDEX[map.weekday] ?? NaN),
  };
}

function currentZonedDateString(nowUtc: Date, timeZone: string): string {
  const parts = zonedDateTimeParts(nowUtc, timeZone);
  return dateKeyFromYmdParts(parts.year, parts.month, parts.day);
}

/** Converts a wall-clock time in `timeZone` to UTC epoch ms. */
function zonedLocalToUtcMs(
  timeZone: string,
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
): number {
  const wallAsUtc = Date.UTC(year, month - 1, day, hour, minute, 0);
  let guess = wallAsUtc;
  // Two passes settle the offset across a DST boundary.
  for (let i = 0; i < 2; i++) {
    const parts = zonedDateTimeParts(new Date(guess), timeZone);
    const observed = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, 0);
    guess += wallAsUtc - observed;
  }
  return guess;
}

/** `YYYY-MM-DD` → `DD-MM-YYYY`, the form the history endpoint takes. */
function dateKeyToDmy(dateKey: string): string {
  const [year, month, day] = dateKey.split('-');
  return `${day}-${month}-${year}`;
}

/**
 * Normalises an upstream date string to a date key. Accepts `YYYY-MM-DD`,
 * ISO timestamps, `DD-Mon-YYYY` and `DD-MM-YYYY`. Returns null when unparseable.
 */
function normalizeUpstreamDate(raw: string): string | null {
  const value = String(raw || '').trim();
  const iso = value.match(/^(\d{4}-\d{2}-\d{2})/);
  if (iso) return isDateKey(iso[1]) ? iso[1] : null;
  const named = value.match(/^(\d{1,2})-([A-Za-z]{3})-(\d{4})$/);
  if (named) {
    const month = MONTH_INDEX[named[2].toLowerCase()];
    if (!month) return null;
    const key = dateKeyFromYmdParts(Number(named[3]), month, Number(named[1]));
    return isDateKey(key) ? key : null;
  }
  const dmy = value.match(/^(\d{1,2})-(\d{1,2})-(\d{4})$/);
  if (dmy) {
    const key = dateKeyFromYmdParts(Number(dmy[3]), Number(dmy[2]), Number(dmy[1]));
    return isDateKey(key) ? key : null;
  }
  return null;
}

export type { ZonedDateTimeParts };
export {
  isDateKey,
  maxDateKey,
  parseDateKeyToUtcMs,
  addDaysToDateKey,
  dateKeyDaysAgo,
  weekdayOfDateKey,
  dateKeyFromYmdParts,
  zonedDateTimeParts,
  currentZonedDateString,
  zonedLocalToUtcMs,
  dateKeyToDmy,
  normalizeUpstreamDate,
};
