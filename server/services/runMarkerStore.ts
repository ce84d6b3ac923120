import type { Kysely } from 'kysely';
import type { Database } from '../db/types.js';

const MARKER_ID = 1;

export interface RunMarkerState {
  lastSuccessDate: string | null;
  cutoffTime: string;
  lockOwner: string | null;
  lockExpiresAt: string | null;
  updatedAt: string;
}

interface RunMarkerStoreOptions {
  cutoffTime: string;
  now?: () => Date;
}

/**
 * The single process-wide marker row: the last finalized trade date and the
 * cross-process run lock.
 */
export class RunMarkerStore {
  private readonly cutoffTime: string;
  private readonly now: () => Date;
  private ensured = false;

  constructor(
    private readonly db: Kysely<Database>,
    options: RunMarkerStoreOptions,
  ) {
    this.cutoffTime = options.cutoffTime;
    this.now = options.now || (() => new Date());
  }

  private async ensureRow(): Promise<void> {
    if (this.ensured) return;
    await this.db
      .insertInto('run_marker')
      .values({
        id: MARKER_ID,
        last_success_date: null,
        cutoff_time: this.cutoffTime,
        lock_owner: null,
        lock_expires_at: null,
        updated_at: this.now().toISOString(),
      })
      .onConflict((oc) => oc.column('id').doUpdateSet({ cutoff_time: this.cutoffTime }))
      .execute();
    this.ensured = true;
  }

  async read(): Promise<RunMarkerState> {
    await this.ensureRow();
    const row = await this.db
      .selectFrom('run_marker')
      .selectAll()
      .where('id', '=', MARKER_ID)
      .executeTakeFirstOrThrow();
    return {
      lastSuccessDate: row.last_success_date,
      cutoffTime: row.cutoff_time,
      lockOwner: row.lock_owner,
      lockExpiresAt: row.lock_expires_at,
      updatedAt: row.updated_at,
    };
  }

  /**
   * Moves `last_success_date` to `tradeDate` unless it already is at or past
   * it. Returns whether the marker moved.
   */
  async advance(tradeDate: string): Promise<boolean> {
    await this.ensureRow();
    const result = await this.db
      .updateTable('run_marker')
      .set({ last_success_date: tradeDate, updated_at: this.now().toISOString() })
      .where('id', '=', MARKER_ID)
      .where((eb) => eb.or([eb('last_success_date', 'is', null), eb('last_success_date', '<', tradeDate)]))
      .executeTakeFirst();
    return Number(result.numUpdatedRows) === 1;
  }

  /**
   * Takes the run lock for `owner` when it is free or expired. A conditional
   * UPDATE on the single row, so two processes cannot both succeed.
   */
  async tryAcquireLock(owner: string, ttlMs: number): Promise<boolean> {
    await this.ensureRow();
    const nowDate = this.now();
    const nowIso = nowDate.toISOString();
    const result = await this.db
      .updateTable('run_marker')
      .set({
        lock_owner: owner,
        lock_expires_at: new Date(nowDate.getTime() + ttlMs).toISOString(),
        updated_at: nowIso,
      })
      .where('id', '=', MARKER_ID)
      .where((eb) =>
        eb.or([eb('lock_owner', 'is', null), eb('lock_owner', '=', owner), eb('lock_expires_at', '<', nowIso)]),
      )
      .executeTakeFirst();
    return Number(result.numUpdatedRows) === 1;
  }

  /** Extends the lock while `owner` still holds it. */
  async renewLock(owner: string, ttlMs: number): Promise<boolean> {
    const nowDate = this.now();
    const result = await this.db
      .updateTable('run_marker')
      .set({
        lock_expires_at: new Date(nowDate.getTime() + ttlMs).toISOString(),
        updated_at: nowDate.toISOString(),
      })
      .where('id', '=', MARKER_ID)
      .where('lock_owner', '=', owner)
      .executeTakeFirst();
    return Number(result.numUpdatedRows) === 1;
  }

  async releaseLock(owner: string): Promise<void> {
    await this.db
      .updateTable('run_marker')
      .set({ lock_owner: null, lock_expires_at: null, updated_at: this.now().toISOString() })
      .where('id', '=', MARKER_ID)
      .where('lock_owner', '=', owner)
      .execute();
  }
}
