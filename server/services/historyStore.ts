import type { Kysely, Selectable } from 'kysely';
import type { Database, PriceBars } from '../db/types.js';
import { OutOfOrderBarError } from '../lib/errors.js';

/** One daily bar; `date` is an exchange-local YYYY-MM-DD key. */
export interface PriceBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface AppendResult {
  appended: number;
  lastDate: string | null;
}

const INSERT_CHUNK_SIZE = 500;

function toPriceBar(row: Selectable<PriceBars>): PriceBar {
  return {
    date: row.bar_date,
    open: Number(row.open),
    high: Number(row.high),
    low: Number(row.low),
    close: Number(row.close),
    volume: Number(row.volume),
  };
}

/**
 * Throws OutOfOrderBarError unless every bar is strictly after `lastDate` and
 * the batch itself is strictly increasing.
 */
export function assertStrictlyAfter(instrument: string, lastDate: string | null, bars: readonly PriceBar[]): void {
  let previous = lastDate;
  for (const bar of bars) {
    if (previous !== null && bar.date <= previous) {
      throw new OutOfOrderBarError(instrument, bar.date, previous);
    }
    previous = bar.date;
  }
}

/**
 * Append-only per-instrument daily series. Each append is one committed
 * transaction; a rejected batch leaves the series untouched.
 */
export class HistoryStore {
  constructor(private readonly db: Kysely<Database>) {}

  async append(instrument: string, bars: readonly PriceBar[]): Promise<AppendResult> {
    if (bars.length === 0) {
      return { appended: 0, lastDate: await this.lastDate(instrument) };
    }
    return this.db.transaction().execute(async (trx) => {
      const row = await trx
        .selectFrom('price_bars')
        .select((eb) => eb.fn.max<string | null>('bar_date').as('last_date'))
        .where('instrument', '=', instrument)
        .executeTakeFirst();
      const currentLast = row?.last_date ?? null;
      assertStrictlyAfter(instrument, currentLast, bars);

      for (let i = 0; i < bars.length; i += INSERT_CHUNK_SIZE) {
        const chunk = bars.slice(i, i + INSERT_CHUNK_SIZE);
        await trx
          .insertInto('price_bars')
          .values(
            chunk.map((bar) => ({
              instrument,
              bar_date: bar.date,
              open: bar.open,
              high: bar.high,
              low: bar.low,
              close: bar.close,
              volume: bar.volume,
            })),
          )
          .execute();
      }
      return { appended: bars.length, lastDate: bars[bars.length - 1].date };
    });
  }

  /** Inclusive on both ends; empty when nothing is in range. */
  async readRange(instrument: string, fromDate: string, toDate: string): Promise<PriceBar[]> {
    const rows = await this.db
      .selectFrom('price_bars')
      .selectAll()
      .where('instrument', '=', instrument)
      .where('bar_date', '>=', fromDate)
      .where('bar_date', '<=', toDate)
      .orderBy('bar_date', 'asc')
      .execute();
    return rows.map(toPriceBar);
  }

  /** Bars strictly after `afterDate`, or the whole series when it is null. */
  async readAfter(instrument: string, afterDate: string | null): Promise<PriceBar[]> {
    let query = this.db.selectFrom('price_bars').selectAll().where('instrument', '=', instrument);
    if (afterDate !== null) {
      query = query.where('bar_date', '>', afterDate);
    }
    const rows = await query.orderBy('bar_date', 'asc').execute();
    return rows.map(toPriceBar);
  }

  readAll(instrument: string): Promise<PriceBar[]> {
    return this.readAfter(instrument, null);
  }

  async count(instrument: string): Promise<number> {
    const row = await this.db
      .selectFrom('price_bars')
      .select((eb) => eb.fn.countAll().as('bar_count'))
      .where('instrument', '=', instrument)
      .executeTakeFirst();
    return Number(row?.bar_count ?? 0);
  }

  async lastDate(instrument: string): Promise<string | null> {
    const row = await this.db
      .selectFrom('price_bars')
      .select((eb) => eb.fn.max<string | null>('bar_date').as('last_date'))
      .where('instrument', '=', instrument)
      .executeTakeFirst();
    return row?.last_date ?? null;
  }
}
