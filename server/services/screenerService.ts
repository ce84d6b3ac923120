import { toEmaView, type EmaCache, type EmaEntryState, type EmaView } from './emaCache.js';
import type { EmaPosition } from './ema.js';
import type { RunMarkerStore } from './runMarkerStore.js';

export type SnapshotSortField = 'instrument' | 'distance_pct' | 'last_close' | 'ema_value';
export type SnapshotPositionFilter = EmaPosition | 'warming_up';

export interface SnapshotFilters {
  /** Keep ready rows whose |distance_pct| is within this many percent. */
  bandPct?: number;
  position?: SnapshotPositionFilter;
  /** Case-insensitive symbol substring. */
  search?: string;
  sort?: SnapshotSortField;
  order?: 'asc' | 'desc';
}

export interface SnapshotRow {
  row_number: number;
  instrument: string;
  last_close: number;
  ema_value: number | null;
  distance_pct: number | null;
  position: EmaPosition | null;
  state: EmaEntryState;
  last_bar_date: string;
  data_point_count: number;
  last_update_timestamp: string;
}

export interface SnapshotSummary {
  total: number;
  ready: number;
  above: number;
  below: number;
  warming_up: number;
  above_pct: number;
  avg_distance_pct: number | null;
  band_pct: number | null;
  matched: number;
  last_success_date: string | null;
}

export interface Snapshot {
  rows: SnapshotRow[];
  summary: SnapshotSummary;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function sortValue(view: EmaView, field: SnapshotSortField): string | number | null {
  switch (field) {
    case 'instrument':
      return view.instrument;
    case 'distance_pct':
      return view.distancePct;
    case 'last_close':
      return view.lastClose;
    case 'ema_value':
      return view.emaValue;
  }
}

function compareViews(a: EmaView, b: EmaView, field: SnapshotSortField, direction: 1 | -1): number {
  const av = sortValue(a, field);
  const bv = sortValue(b, field);
  // Rows without a value sort last in either direction.
  if (av === null && bv !== null) return 1;
  if (bv === null && av !== null) return -1;
  if (av !== null && bv !== null && av !== bv) {
    return (av < bv ? -1 : 1) * direction;
  }
  return a.instrument < b.instrument ? -1 : a.instrument > b.instrument ? 1 : 0;
}

function matchesFilters(view: EmaView, filters: SnapshotFilters): boolean {
  if (filters.search) {
    const needle = filters.search.trim().toUpperCase();
    if (needle && !view.instrument.includes(needle)) return false;
  }
  if (filters.position) {
    if (filters.position === 'warming_up') {
      if (view.state !== 'warming_up') return false;
    } else if (view.position !== filters.position) {
      return false;
    }
  }
  if (filters.bandPct !== undefined) {
    if (view.distancePct === null || Math.abs(view.distancePct) > filters.bandPct) return false;
  }
  return true;
}

function toRow(view: EmaView, index: number): SnapshotRow {
  return {
    row_number: index + 1,
    instrument: view.instrument,
    last_close: view.lastClose,
    ema_value: view.emaValue,
    distance_pct: view.distancePct,
    position: view.position,
    state: view.state,
    last_bar_date: view.lastBarDate,
    data_point_count: view.dataPointCount,
    last_update_timestamp: view.lastUpdateTimestamp,
  };
}

/** Read-only screening view over the EMA cache. Never fetches. */
export class ScreenerService {
  constructor(
    private readonly emaCache: EmaCache,
    private readonly marker: RunMarkerStore,
  ) {}

  async getSnapshotAll(filters: SnapshotFilters = {}): Promise<Snapshot> {
    const [entries, markerState] = await Promise.all([this.emaCache.snapshotAll(), this.marker.read()]);
    const views = [...entries.values()].map(toEmaView);

    let above = 0;
    let below = 0;
    let distanceSum = 0;
    for (const view of views) {
      if (view.state !== 'ready' || view.distancePct === null) continue;
      if (view.position === 'above') above += 1;
      else below += 1;
      distanceSum += view.distancePct;
    }
    const ready = above + below;

    const field = filters.sort || 'instrument';
    const direction = filters.order === 'desc' ? -1 : 1;
    const rows = views
      .filter((view) => matchesFilters(view, filters))
      .sort((a, b) => compareViews(a, b, field, direction))
      .map(toRow);

    return {
      rows,
      summary: {
        total: views.length,
        ready,
        above,
        below,
        warming_up: views.length - ready,
        above_pct: ready > 0 ? round((above / ready) * 100, 1) : 0,
        avg_distance_pct: ready > 0 ? round(distanceSum / ready, 2) : null,
        band_pct: filters.bandPct ?? null,
        matched: rows.length,
        last_success_date: markerState.lastSuccessDate,
      },
    };
  }
}
