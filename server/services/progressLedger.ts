import type { Kysely, Selectable } from 'kysely';
import { v4 as uuidv4 } from 'uuid';
import type { Database, LedgerEntries, LedgerStatus, UpdateRuns } from '../db/types.js';
import { LedgerWriteError } from '../lib/errors.js';

export type { LedgerStatus } from '../db/types.js';

export interface LedgerEntry {
  runId: string;
  instrument: string;
  status: LedgerStatus;
  attemptCount: number;
  lastError: string | null;
  updatedAt: string;
}

export interface LedgerRun {
  runId: string;
  tradeDate: string;
  status: UpdateRuns['status'];
  totalInstruments: number;
  startedAt: string;
  finishedAt: string | null;
}

export type LedgerCounts = Record<LedgerStatus, number>;

const INSERT_CHUNK_SIZE = 500;
const MAX_ERROR_LENGTH = 500;

function toEntry(row: Selectable<LedgerEntries>): LedgerEntry {
  return {
    runId: row.run_id,
    instrument: row.instrument,
    status: row.status,
    attemptCount: Number(row.attempt_count),
    lastError: row.last_error,
    updatedAt: row.updated_at,
  };
}

function toRun(row: Selectable<UpdateRuns>): LedgerRun {
  return {
    runId: row.run_id,
    tradeDate: row.trade_date,
    status: row.status,
    totalInstruments: Number(row.total_instruments),
    startedAt: row.started_at,
    finishedAt: row.finished_at,
  };
}

interface ProgressLedgerOptions {
  /** Completed runs kept by pruneCompletedRuns. */
  retentionRuns?: number;
  now?: () => Date;
  newRunId?: () => string;
}

/**
 * Durable per-run, per-instrument progress. Every storage failure is
 * rethrown as LedgerWriteError.
 */
export class ProgressLedger {
  private readonly retentionRuns: number;
  private readonly now: () => Date;
  private readonly newRunId: () => string;

  constructor(
    private readonly db: Kysely<Database>,
    options: ProgressLedgerOptions = {},
  ) {
    this.retentionRuns = Math.max(1, options.retentionRuns ?? 30);
    this.now = options.now || (() => new Date());
    this.newRunId = options.newRunId || uuidv4;
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof LedgerWriteError) throw err;
      throw new LedgerWriteError(operation, err);
    }
  }

  async beginRun(instruments: readonly string[], tradeDate: string): Promise<string> {
    const runId = this.newRunId();
    const timestamp = this.now().toISOString();
    await this.guard('beginRun', () =>
      this.db.transaction().execute(async (trx) => {
        await trx
          .insertInto('update_runs')
          .values({
            run_id: runId,
            trade_date: tradeDate,
            status: 'running',
            total_instruments: instruments.length,
            started_at: timestamp,
            finished_at: null,
          })
          .execute();
        for (let i = 0; i < instruments.length; i += INSERT_CHUNK_SIZE) {
          const chunk = instruments.slice(i, i + INSERT_CHUNK_SIZE);
          await trx
            .insertInto('ledger_entries')
            .values(
              chunk.map((instrument) => ({
                run_id: runId,
                instrument,
                status: 'pending' as const,
                attempt_count: 0,
                last_error: null,
                updated_at: timestamp,
              })),
            )
            .execute();
        }
      }),
    );
    return runId;
  }

  /**
   * Moves an instrument to `status`. `in_progress` counts an attempt; `done`
   * clears the last error.
   */
  async mark(runId: string, instrument: string, status: LedgerStatus, error?: string | null): Promise<void> {
    const timestamp = this.now().toISOString();
    const result = await this.guard('mark', () => {
      let update = this.db
        .updateTable('ledger_entries')
        .set({ status, updated_at: timestamp })
        .where('run_id', '=', runId)
        .where('instrument', '=', instrument);
      if (status === 'in_progress') {
        update = update.set((eb) => ({ attempt_count: eb('attempt_count', '+', 1) }));
      } else if (status === 'done') {
        update = update.set({ last_error: null });
      } else if (status === 'failed') {
        update = update.set({ last_error: error ? error.slice(0, MAX_ERROR_LENGTH) : null });
      }
      return update.executeTakeFirst();
    });
    if (Number(result.numUpdatedRows) !== 1) {
      throw new LedgerWriteError('mark', new Error(`No ledger entry for ${instrument} in run ${runId}`));
    }
  }

  async entry(runId: string, instrument: string): Promise<LedgerEntry | null> {
    const row = await this.guard('entry', () =>
      this.db
        .selectFrom('ledger_entries')
        .selectAll()
        .where('run_id', '=', runId)
        .where('instrument', '=', instrument)
        .executeTakeFirst(),
    );
    return row ? toEntry(row) : null;
  }

  async entries(runId: string): Promise<LedgerEntry[]> {
    const rows = await this.guard('entries', () =>
      this.db
        .selectFrom('ledger_entries')
        .selectAll()
        .where('run_id', '=', runId)
        .orderBy('instrument', 'asc')
        .execute(),
    );
    return rows.map(toEntry);
  }

  async counts(runId: string): Promise<LedgerCounts> {
    const rows = await this.guard('counts', () =>
      this.db
        .selectFrom('ledger_entries')
        .select((eb) => ['status', eb.fn.countAll().as('entry_count')])
        .where('run_id', '=', runId)
        .groupBy('status')
        .execute(),
    );
    const counts: LedgerCounts = { pending: 0, in_progress: 0, done: 0, failed: 0 };
    for (const row of rows) {
      counts[row.status] = Number(row.entry_count);
    }
    return counts;
  }

  /** True when no entry is pending or in progress. */
  async isComplete(runId: string): Promise<boolean> {
    const counts = await this.counts(runId);
    return counts.pending === 0 && counts.in_progress === 0;
  }

  async pendingOrFailed(runId: string): Promise<string[]> {
    const rows = await this.guard('pendingOrFailed', () =>
      this.db
        .selectFrom('ledger_entries')
        .select('instrument')
        .where('run_id', '=', runId)
        .where('status', 'in', ['pending', 'failed'])
        .orderBy('instrument', 'asc')
        .execute(),
    );
    return rows.map((row) => row.instrument);
  }

  /**
   * Resets entries left `in_progress` by an interrupted process back to
   * `pending` and returns every instrument that is not yet `done`.
   */
  async recover(runId: string): Promise<string[]> {
    const timestamp = this.now().toISOString();
    await this.guard('recover', () =>
      this.db
        .updateTable('ledger_entries')
        .set({ status: 'pending', updated_at: timestamp })
        .where('run_id', '=', runId)
        .where('status', '=', 'in_progress')
        .execute(),
    );
    const rows = await this.guard('recover', () =>
      this.db
        .selectFrom('ledger_entries')
        .select('instrument')
        .where('run_id', '=', runId)
        .where('status', '!=', 'done')
        .orderBy('instrument', 'asc')
        .execute(),
    );
    return rows.map((row) => row.instrument);
  }

  async findOpenRun(): Promise<LedgerRun | null> {
    const row = await this.guard('findOpenRun', () =>
      this.db
        .selectFrom('update_runs')
        .selectAll()
        .where('status', '=', 'running')
        .orderBy('started_at', 'desc')
        .executeTakeFirst(),
    );
    return row ? toRun(row) : null;
  }

  async latestRun(): Promise<LedgerRun | null> {
    const row = await this.guard('latestRun', () =>
      this.db.selectFrom('update_runs').selectAll().orderBy('started_at', 'desc').executeTakeFirst(),
    );
    return row ? toRun(row) : null;
  }

  async completeRun(runId: string): Promise<void> {
    await this.closeRun(runId, 'completed');
  }

  async abandonRun(runId: string): Promise<void> {
    await this.closeRun(runId, 'abandoned');
  }

  private async closeRun(runId: string, status: 'completed' | 'abandoned'): Promise<void> {
    const timestamp = this.now().toISOString();
    await this.guard(status === 'completed' ? 'completeRun' : 'abandonRun', () =>
      this.db
        .updateTable('update_runs')
        .set({ status, finished_at: timestamp })
        .where('run_id', '=', runId)
        .execute(),
    );
  }

  /** Deletes closed runs beyond the retention count, newest kept. Returns how many went. */
  async pruneCompletedRuns(): Promise<number> {
    return this.guard('pruneCompletedRuns', () =>
      this.db.transaction().execute(async (trx) => {
        const closed = await trx
          .selectFrom('update_runs')
          .select('run_id')
          .where('status', '!=', 'running')
          .orderBy('started_at', 'desc')
          .execute();
        const runIds = closed.slice(this.retentionRuns).map((row) => row.run_id);
        if (runIds.length === 0) return 0;
        await trx.deleteFrom('ledger_entries').where('run_id', 'in', runIds).execute();
        await trx.deleteFrom('update_runs').where('run_id', 'in', runIds).execute();
        return runIds.length;
      }),
    );
  }
}
