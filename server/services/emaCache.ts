import type { Kysely, Selectable } from 'kysely';
import type { Database, EmaCacheEntries } from '../db/types.js';
import { InsufficientHistoryError } from '../lib/errors.js';
import { distancePct, emaFromScratch, foldEmaSeries, positionOf, type EmaPosition } from './ema.js';
import { assertStrictlyAfter, type HistoryStore, type PriceBar } from './historyStore.js';

export type EmaEntryState = 'ready' | 'warming_up';

export interface EmaCacheEntry {
  instrument: string;
  period: number;
  lastClose: number;
  /** Null while fewer than `period` bars have been seen. */
  emaValue: number | null;
  lastBarDate: string;
  lastUpdateTimestamp: string;
  dataPointCount: number;
}

export interface EmaView extends EmaCacheEntry {
  state: EmaEntryState;
  distancePct: number | null;
  position: EmaPosition | null;
}

function toEntry(row: Selectable<EmaCacheEntries>): EmaCacheEntry {
  return {
    instrument: row.instrument,
    period: Number(row.period),
    lastClose: Number(row.last_close),
    emaValue: row.ema_value === null ? null : Number(row.ema_value),
    lastBarDate: row.last_bar_date,
    lastUpdateTimestamp: row.last_update_timestamp,
    dataPointCount: Number(row.data_point_count),
  };
}

export function toEmaView(entry: EmaCacheEntry): EmaView {
  if (entry.emaValue === null) {
    return { ...entry, state: 'warming_up', distancePct: null, position: null };
  }
  return {
    ...entry,
    state: 'ready',
    distancePct: distancePct(entry.lastClose, entry.emaValue),
    position: positionOf(entry.lastClose, entry.emaValue),
  };
}

interface EmaCacheOptions {
  period: number;
  now?: () => Date;
}

/**
 * Instrument → latest EMA entry. Updates fold only the bars after the
 * entry's anchor; a missing, warming or differently-configured entry is
 * rebuilt from the full history.
 */
export class EmaCache {
  readonly period: number;
  private readonly now: () => Date;

  constructor(
    private readonly db: Kysely<Database>,
    private readonly history: HistoryStore,
    options: EmaCacheOptions,
  ) {
    this.period = options.period;
    this.now = options.now || (() => new Date());
  }

  /** The stored entry when it can be folded forward with the configured period. */
  private isUsable(entry: EmaCacheEntry | null): entry is EmaCacheEntry & { emaValue: number } {
    return entry !== null && entry.emaValue !== null && entry.period === this.period;
  }

  async update(instrument: string, newBars: readonly PriceBar[]): Promise<EmaCacheEntry> {
    const existing = await this.snapshot(instrument);
    const timestamp = this.now().toISOString();

    if (this.isUsable(existing)) {
      assertStrictlyAfter(instrument, existing.lastBarDate, newBars);
      if (newBars.length === 0) {
        const touched = { ...existing, lastUpdateTimestamp: timestamp };
        await this.write(touched);
        return touched;
      }
      const last = newBars[newBars.length - 1];
      const next: EmaCacheEntry = {
        instrument,
        period: this.period,
        lastClose: last.close,
        emaValue: foldEmaSeries(
          existing.emaValue,
          newBars.map((bar) => bar.close),
          this.period,
        ),
        lastBarDate: last.date,
        lastUpdateTimestamp: timestamp,
        dataPointCount: existing.dataPointCount + newBars.length,
      };
      await this.write(next);
      return next;
    }

    return this.rebuild(instrument, timestamp);
  }

  /** Recomputes the entry from the complete stored history. */
  async rebuild(instrument: string, timestamp = this.now().toISOString()): Promise<EmaCacheEntry> {
    const bars = await this.history.readAll(instrument);
    if (bars.length === 0) {
      throw new InsufficientHistoryError(instrument, 0, this.period);
    }
    const closes = bars.map((bar) => bar.close);
    const last = bars[bars.length - 1];
    const entry: EmaCacheEntry = {
      instrument,
      period: this.period,
      lastClose: last.close,
      emaValue: emaFromScratch(closes, this.period),
      lastBarDate: last.date,
      lastUpdateTimestamp: timestamp,
      dataPointCount: bars.length,
    };
    await this.write(entry);
    if (entry.emaValue === null) {
      throw new InsufficientHistoryError(instrument, bars.length, this.period);
    }
    return entry;
  }

  async snapshot(instrument: string): Promise<EmaCacheEntry | null> {
    const row = await this.db
      .selectFrom('ema_cache_entries')
      .selectAll()
      .where('instrument', '=', instrument)
      .executeTakeFirst();
    return row ? toEntry(row) : null;
  }

  async snapshotAll(): Promise<Map<string, EmaCacheEntry>> {
    const rows = await this.db.selectFrom('ema_cache_entries').selectAll().orderBy('instrument', 'asc').execute();
    return new Map(rows.map((row) => [row.instrument, toEntry(row)]));
  }

  private async write(entry: EmaCacheEntry): Promise<void> {
    const values = {
      period: entry.period,
      last_close: entry.lastClose,
      ema_value: entry.emaValue,
      last_bar_date: entry.lastBarDate,
      last_update_timestamp: entry.lastUpdateTimestamp,
      data_point_count: entry.dataPointCount,
    };
    await this.db
      .insertInto('ema_cache_entries')
      .values({ instrument: entry.instrument, ...values })
      .onConflict((oc) => oc.column('instrument').doUpdateSet(values))
      .execute();
  }
}
