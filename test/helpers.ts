import { newDb } from 'pg-mem';
import { Kysely, PostgresDialect, type PostgresPool } from 'kysely';
import { createDb, type DbHandle } from '../server/db.js';
import { up as createSchema } from '../server/db/migrations/001_initial.js';
import { buildRequestAbortError, FetchExhaustedError } from '../server/lib/errors.js';
import type { PriceBar } from '../server/services/historyStore.js';
import type { Fetcher, FetchMissingOptions } from '../server/services/marketDataClient.js';
import { TradingCalendar } from '../server/services/tradingCalendar.js';

/** Fresh in-process Postgres emulation with the schema applied. */
export async function createTestDb(): Promise<DbHandle> {
  const { Pool } = newDb().adapters.createPg();
  const pool: PostgresPool = new Pool();
  await createSchema(new Kysely<unknown>({ dialect: new PostgresDialect({ pool }) }));
  return createDb({ pool });
}

export function createTestCalendar(holidays: string[] = []): TradingCalendar {
  return new TradingCalendar({ timeZone: 'Asia/Kolkata', cutoffTime: '15:30', holidays });
}

/** Mutable wall clock shared by every store under test. */
export class VirtualClock {
  private ms: number;

  constructor(iso: string) {
    this.ms = Date.parse(iso);
  }

  readonly now = (): Date => new Date(this.ms);

  readonly nowMs = (): number => this.ms;

  advance(ms: number): void {
    this.ms += ms;
  }

  set(iso: string): void {
    this.ms = Date.parse(iso);
  }
}

/** `count` trading days ending at (and including) `endDate`. */
export function tradingDaysEndingAt(calendar: TradingCalendar, endDate: string, count: number): string[] {
  const days = [endDate];
  while (days.length < count) {
    days.unshift(calendar.previousTradingDay(days[0]));
  }
  return days;
}

/** `count` trading days strictly after `afterDate`. */
export function tradingDaysAfter(calendar: TradingCalendar, afterDate: string, count: number): string[] {
  const days: string[] = [];
  let cursor = afterDate;
  while (days.length < count) {
    cursor = calendar.nextTradingDay(cursor);
    days.push(cursor);
  }
  return days;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Deterministic wavy closes; `seed` shifts level and phase per instrument. */
export function barsForDates(dates: readonly string[], seed = 1, offset = 0): PriceBar[] {
  return dates.map((date, index) => {
    const i = index + offset;
    const close = round2(100 * seed + 8 * Math.sin((i + seed) / 9) + i * 0.1);
    return {
      date,
      open: round2(close - 0.5),
      high: round2(close + 1),
      low: round2(close - 1.5),
      close,
      volume: 1000 + i,
    };
  });
}

export interface FetchCall {
  instrument: string;
  since: string | null;
}

/**
 * In-process market data. Serves bars after `since` up to the session the
 * supplied calendar considers complete at the supplied clock.
 */
export class FakeFetcher implements Fetcher {
  readonly calls: FetchCall[] = [];
  readonly series: Map<string, PriceBar[]>;
  private readonly failuresLeft = new Map<string, number>();
  beforeFetch: ((instrument: string, signal: AbortSignal | null) => Promise<void> | void) | null = null;

  constructor(
    series: Map<string, PriceBar[]>,
    private readonly latestSession: () => string,
  ) {
    this.series = series;
  }

  /** The next `times` fetches for `instrument` fail; Infinity fails forever. */
  failTimes(instrument: string, times: number): void {
    this.failuresLeft.set(instrument, times);
  }

  callsFor(instrument: string): FetchCall[] {
    return this.calls.filter((call) => call.instrument === instrument);
  }

  async fetchMissing(instrument: string, sinceDate: string | null, options: FetchMissingOptions = {}): Promise<PriceBar[]> {
    const signal = options.signal || null;
    this.calls.push({ instrument, since: sinceDate });
    if (this.beforeFetch) await this.beforeFetch(instrument, signal);
    if (signal && signal.aborted) {
      throw buildRequestAbortError(`${instrument} history request aborted`);
    }
    const left = this.failuresLeft.get(instrument) ?? 0;
    if (left > 0) {
      this.failuresLeft.set(instrument, left - 1);
      throw new FetchExhaustedError(instrument, 3, new Error('upstream unavailable'));
    }
    const latest = this.latestSession();
    return (this.series.get(instrument) ?? []).filter(
      (bar) => (sinceDate === null || bar.date > sinceDate) && bar.date <= latest,
    );
  }
}

/** Relative comparison: |actual - expected| <= tolerance * |expected|. */
export function approxEqual(actual: number | null, expected: number, tolerance = 1e-6): boolean {
  return actual !== null && Math.abs(actual - expected) <= tolerance * Math.abs(expected);
}
