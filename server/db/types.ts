import type { ColumnType } from 'kysely';

/** ISO-8601 UTC timestamp stored as text; compared lexically. */
export type IsoTimestamp = ColumnType<string, string, string>;

export type LedgerStatus = 'pending' | 'in_progress' | 'done' | 'failed';

export type RunStatus = 'running' | 'completed' | 'abandoned';

export interface PriceBars {
  instrument: string;
  bar_date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface EmaCacheEntries {
  instrument: string;
  period: number;
  last_close: number;
  ema_value: number | null;
  last_bar_date: string;
  last_update_timestamp: IsoTimestamp;
  data_point_count: number;
}

export interface UpdateRuns {
  run_id: string;
  trade_date: string;
  status: RunStatus;
  total_instruments: number;
  started_at: IsoTimestamp;
  finished_at: IsoTimestamp | null;
}

export interface LedgerEntries {
  run_id: string;
  instrument: string;
  status: LedgerStatus;
  attempt_count: number;
  last_error: string | null;
  updated_at: IsoTimestamp;
}

export interface RunMarker {
  id: number;
  last_success_date: string | null;
  cutoff_time: string;
  lock_owner: string | null;
  lock_expires_at: IsoTimestamp | null;
  updated_at: IsoTimestamp;
}

export interface Database {
  price_bars: PriceBars;
  ema_cache_entries: EmaCacheEntries;
  update_runs: UpdateRuns;
  ledger_entries: LedgerEntries;
  run_marker: RunMarker;
}
