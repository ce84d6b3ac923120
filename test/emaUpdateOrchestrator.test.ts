import test from 'node:test';
import assert from 'node:assert/strict';

import { EmaUpdateOrchestrator } from '../server/orchestrators/emaUpdateOrchestrator.js';
import { InstrumentRegistry } from '../server/services/instrumentRegistry.js';
import { HistoryStore, type PriceBar } from '../server/services/historyStore.js';
import { EmaCache } from '../server/services/emaCache.js';
import { ProgressLedger } from '../server/services/progressLedger.js';
import { RunMarkerStore } from '../server/services/runMarkerStore.js';
import { emaFromScratch } from '../server/services/ema.js';
import { LedgerWriteError } from '../server/lib/errors.js';
import type { LedgerStatus } from '../server/db/types.js';
import type { DbHandle } from '../server/db.js';
import {
  FakeFetcher,
  VirtualClock,
  approxEqual,
  barsForDates,
  createTestCalendar,
  createTestDb,
  tradingDaysAfter,
  tradingDaysEndingAt,
} from './helpers.js';

const calendar = createTestCalendar();
// 16:00 IST on Wednesday 2025-08-13, after the 15:30 cutoff.
const AFTER_CUTOFF = '2025-08-13T10:30:00Z';

interface HarnessOptions {
  instruments: string[];
  series: Map<string, PriceBar[]>;
  nowIso?: string;
  maxInstrumentAttempts?: number;
  ownerId?: string;
  ledgerFactory?: (handle: DbHandle, clock: VirtualClock) => ProgressLedger;
}

async function createHarness(options: HarnessOptions) {
  const handle = await createTestDb();
  const clock = new VirtualClock(options.nowIso ?? AFTER_CUTOFF);
  const history = new HistoryStore(handle.db);
  const emaCache = new EmaCache(handle.db, history, { period: 200, now: clock.now });
  const ledger = options.ledgerFactory
    ? options.ledgerFactory(handle, clock)
    : new ProgressLedger(handle.db, { now: clock.now });
  const marker = new RunMarkerStore(handle.db, { cutoffTime: '15:30', now: clock.now });
  const fetcher = new FakeFetcher(options.series, () => calendar.latestCompletedSession(clock.now()));
  const registry = new InstrumentRegistry(options.instruments);
  const build = (overrides: { ledger?: ProgressLedger; marker?: RunMarkerStore; ownerId?: string } = {}) =>
    new EmaUpdateOrchestrator({
      registry,
      history,
      fetcher,
      emaCache,
      ledger: overrides.ledger ?? ledger,
      marker: overrides.marker ?? marker,
      calendar,
      now: clock.now,
      maxInstrumentAttempts: options.maxInstrumentAttempts ?? 3,
      lockTtlMs: 60_000,
      ownerId: overrides.ownerId ?? options.ownerId ?? 'test-owner',
    });
  return { handle, clock, history, emaCache, ledger, marker, fetcher, registry, orchestrator: build(), build };
}

function seriesFor(instruments: Record<string, number>, endDate = '2025-08-13'): Map<string, PriceBar[]> {
  const series = new Map<string, PriceBar[]>();
  let seed = 1;
  for (const [instrument, count] of Object.entries(instruments)) {
    series.set(instrument, barsForDates(tradingDaysEndingAt(calendar, endDate, count), seed));
    seed += 1;
  }
  return series;
}

function closesUpTo(series: Map<string, PriceBar[]>, instrument: string, lastDate: string): number[] {
  return (series.get(instrument) ?? []).filter((bar) => bar.date <= lastDate).map((bar) => bar.close);
}

async function statusOf(ledger: ProgressLedger, runId: string | null, instrument: string): Promise<LedgerStatus | null> {
  assert.ok(runId);
  const entry = await ledger.entry(runId, instrument);
  return entry ? entry.status : null;
}

test('a first run fetches full history, builds the cache and advances the marker', async () => {
  const series = seriesFor({ ALPHA: 260, BRAVO: 230, WARM: 150 });
  const h = await createHarness({ instruments: ['ALPHA', 'BRAVO', 'WARM'], series });

  const summary = await h.orchestrator.runUpdate();

  assert.equal(summary.outcome, 'completed');
  assert.equal(summary.tradeDate, '2025-08-13');
  assert.equal(summary.resumed, false);
  assert.equal(summary.total, 3);
  assert.equal(summary.processed, 3);
  assert.equal(summary.done, 3);
  assert.equal(summary.failed, 0);
  assert.equal(summary.warmingUp, 1);
  assert.deepEqual(
    h.fetcher.calls.map((call) => call.since),
    [null, null, null],
  );

  const alpha = await h.emaCache.snapshot('ALPHA');
  const expected = emaFromScratch(closesUpTo(series, 'ALPHA', '2025-08-13'), 200);
  assert.ok(alpha && expected !== null);
  assert.ok(approxEqual(alpha.emaValue, expected));
  assert.equal(alpha.dataPointCount, 260);
  assert.equal(alpha.lastBarDate, '2025-08-13');

  const warm = await h.emaCache.snapshot('WARM');
  assert.equal(warm?.emaValue, null);
  assert.equal(warm?.dataPointCount, 150);

  assert.equal((await h.marker.read()).lastSuccessDate, '2025-08-13');
  assert.equal((await h.marker.read()).lockOwner, null);
  assert.equal((await h.ledger.latestRun())?.status, 'completed');
  await h.handle.close();
});

test('the next day fetches only the missing bar and matches a full recompute', async () => {
  const series = seriesFor({ ALPHA: 260 }, '2025-08-14');
  const h = await createHarness({ instruments: ['ALPHA'], series });

  await h.orchestrator.runUpdate();
  assert.equal(await h.history.count('ALPHA'), 259);

  h.clock.set('2025-08-14T10:30:00Z');
  const summary = await h.orchestrator.runUpdate();

  assert.equal(summary.outcome, 'completed');
  assert.deepEqual(h.fetcher.callsFor('ALPHA'), [
    { instrument: 'ALPHA', since: null },
    { instrument: 'ALPHA', since: '2025-08-13' },
  ]);
  const entry = await h.emaCache.snapshot('ALPHA');
  const expected = emaFromScratch(closesUpTo(series, 'ALPHA', '2025-08-14'), 200);
  assert.ok(entry && expected !== null);
  assert.ok(approxEqual(entry.emaValue, expected), `incremental ${entry.emaValue} vs full ${expected}`);
  assert.equal(entry.dataPointCount, 260);
  assert.equal(entry.lastBarDate, '2025-08-14');
  assert.equal((await h.marker.read()).lastSuccessDate, '2025-08-14');
  await h.handle.close();
});

test('an instrument warming up at 150 bars is ready at 200 with the simple average', async () => {
  const series = seriesFor({ WARM: 150 });
  const h = await createHarness({ instruments: ['WARM'], series });

  const first = await h.orchestrator.runUpdate();
  assert.equal(first.outcome, 'completed');
  assert.equal(first.warmingUp, 1);
  assert.equal((await h.emaCache.snapshot('WARM'))?.emaValue, null);

  const later = tradingDaysAfter(calendar, '2025-08-13', 50);
  const existing = series.get('WARM') ?? [];
  series.set('WARM', [...existing, ...barsForDates(later, 1, 150)]);
  h.clock.set(`${later[49]}T10:30:00Z`);

  const second = await h.orchestrator.runUpdate();
  assert.equal(second.outcome, 'completed');
  assert.equal(second.warmingUp, 0);
  const entry = await h.emaCache.snapshot('WARM');
  const closes = (series.get('WARM') ?? []).map((bar) => bar.close);
  const mean = closes.reduce((sum, value) => sum + value, 0) / closes.length;
  assert.equal(entry?.dataPointCount, 200);
  assert.equal(entry?.emaValue, mean);
  await h.handle.close();
});

test('before the cutoff nothing is fetched', async () => {
  const h = await createHarness({
    instruments: ['ALPHA'],
    series: seriesFor({ ALPHA: 210 }),
    nowIso: '2025-08-13T09:00:00Z',
  });
  const result = await h.orchestrator.triggerUpdate();
  assert.deepEqual(result, { started: false, reason: 'before_cutoff', tradeDate: '2025-08-12' });
  assert.equal(h.fetcher.calls.length, 0);
  assert.equal(await h.ledger.latestRun(), null);
  await h.handle.close();
});

test('a second trigger on the same day does not start another run', async () => {
  const h = await createHarness({ instruments: ['ALPHA'], series: seriesFor({ ALPHA: 210 }) });
  await h.orchestrator.runUpdate();
  const runId = (await h.ledger.latestRun())?.runId;

  h.clock.advance(60 * 60 * 1000);
  const again = await h.orchestrator.runUpdate();
  assert.equal(again.outcome, 'skipped');
  assert.equal(again.reason, 'up_to_date');
  assert.equal(h.fetcher.calls.length, 1);
  assert.equal((await h.ledger.latestRun())?.runId, runId);
  await h.handle.close();
});

test('a failing instrument is retried, recorded and does not block the marker', async () => {
  const h = await createHarness({ instruments: ['ALPHA', 'BRAVO', 'GAMMA'], series: seriesFor({ ALPHA: 210, BRAVO: 210 }) });
  h.fetcher.failTimes('GAMMA', Infinity);

  const summary = await h.orchestrator.runUpdate();

  assert.equal(summary.outcome, 'completed-with-errors');
  assert.equal(summary.done, 2);
  assert.equal(summary.failed, 1);
  assert.equal(h.fetcher.callsFor('GAMMA').length, 3);
  const gamma = await h.ledger.entry(summary.runId ?? '', 'GAMMA');
  assert.equal(gamma?.status, 'failed');
  assert.equal(gamma?.attemptCount, 3);
  assert.equal(gamma?.lastError, 'GAMMA: fetch failed after 3 attempt(s): upstream unavailable');
  assert.equal((await h.marker.read()).lastSuccessDate, '2025-08-13');
  assert.equal(await h.emaCache.snapshot('GAMMA'), null);
  await h.handle.close();
});

test('an instrument with no data at all is failed rather than done', async () => {
  const h = await createHarness({ instruments: ['ALPHA', 'EMPTY'], series: seriesFor({ ALPHA: 210 }) });
  const summary = await h.orchestrator.runUpdate();
  assert.equal(summary.outcome, 'completed-with-errors');
  assert.equal(await statusOf(h.ledger, summary.runId, 'EMPTY'), 'failed');
  assert.equal(h.fetcher.callsFor('EMPTY').length, 3);
  await h.handle.close();
});

test('a transient failure recovers in a retry pass', async () => {
  const h = await createHarness({ instruments: ['ALPHA', 'BRAVO'], series: seriesFor({ ALPHA: 210, BRAVO: 210 }) });
  h.fetcher.failTimes('ALPHA', 1);

  const summary = await h.orchestrator.runUpdate();

  assert.equal(summary.outcome, 'completed');
  assert.equal(summary.done, 2);
  const alpha = await h.ledger.entry(summary.runId ?? '', 'ALPHA');
  assert.equal(alpha?.status, 'done');
  assert.equal(alpha?.attemptCount, 2);
  assert.equal(alpha?.lastError, null);
  await h.handle.close();
});

test('a stopped run resumes without refetching finished instruments', async () => {
  const series = seriesFor({ ALPHA: 210, BRAVO: 210, CHARLIE: 210 });
  const h = await createHarness({ instruments: ['ALPHA', 'BRAVO', 'CHARLIE'], series });
  h.fetcher.beforeFetch = (instrument) => {
    if (instrument === 'BRAVO') h.orchestrator.requestStop();
  };

  const stopped = await h.orchestrator.runUpdate();
  assert.equal(stopped.outcome, 'stopped');
  assert.equal(stopped.processed, 1);
  assert.equal(await statusOf(h.ledger, stopped.runId, 'ALPHA'), 'done');
  assert.equal(await statusOf(h.ledger, stopped.runId, 'BRAVO'), 'pending');
  assert.equal(await statusOf(h.ledger, stopped.runId, 'CHARLIE'), 'pending');
  assert.equal((await h.marker.read()).lastSuccessDate, null);
  assert.equal((await h.marker.read()).lockOwner, null);
  assert.equal(h.orchestrator.runState.getStatus().last_outcome, 'stopped');

  h.fetcher.beforeFetch = null;
  h.clock.advance(60_000);
  const resumed = await h.orchestrator.runUpdate();

  assert.equal(resumed.outcome, 'completed');
  assert.equal(resumed.resumed, true);
  assert.equal(resumed.runId, stopped.runId);
  assert.equal(resumed.processed, 2);
  assert.equal(resumed.done, 3);
  assert.equal(h.fetcher.callsFor('ALPHA').length, 1);
  assert.equal(await h.history.count('ALPHA'), 210);
  assert.equal(await h.history.count('BRAVO'), 210);
  assert.equal((await h.marker.read()).lastSuccessDate, '2025-08-13');

  // The resumed cache matches one built by a run that was never stopped.
  const straight = await createHarness({ instruments: ['ALPHA', 'BRAVO', 'CHARLIE'], series });
  assert.equal((await straight.orchestrator.runUpdate()).outcome, 'completed');
  for (const instrument of ['ALPHA', 'BRAVO', 'CHARLIE']) {
    const resumedEntry = await h.emaCache.snapshot(instrument);
    const straightEntry = await straight.emaCache.snapshot(instrument);
    assert.ok(resumedEntry && straightEntry);
    assert.equal(resumedEntry.emaValue, straightEntry.emaValue);
    assert.equal(resumedEntry.lastBarDate, straightEntry.lastBarDate);
    assert.equal(resumedEntry.dataPointCount, straightEntry.dataPointCount);
  }
  await straight.handle.close();
  await h.handle.close();
});

test('an interrupted in-progress entry is picked up again on resume', async () => {
  const series = seriesFor({ ALPHA: 210, BRAVO: 210 });
  const h = await createHarness({ instruments: ['ALPHA', 'BRAVO'], series });
  // A previous process crashed while BRAVO was in flight.
  const runId = await h.ledger.beginRun(['ALPHA', 'BRAVO'], '2025-08-13');
  await h.ledger.mark(runId, 'ALPHA', 'in_progress');
  await h.ledger.mark(runId, 'ALPHA', 'done');
  await h.ledger.mark(runId, 'BRAVO', 'in_progress');
  h.clock.advance(1000);

  const summary = await h.orchestrator.runUpdate();
  assert.equal(summary.runId, runId);
  assert.equal(summary.resumed, true);
  assert.equal(summary.outcome, 'completed');
  assert.deepEqual(
    h.fetcher.calls.map((call) => call.instrument),
    ['BRAVO'],
  );
  const bravo = await h.ledger.entry(runId, 'BRAVO');
  assert.equal(bravo?.attemptCount, 2);
  await h.handle.close();
});

test('an open run for an older trade date is abandoned', async () => {
  const h = await createHarness({ instruments: ['ALPHA'], series: seriesFor({ ALPHA: 210 }) });
  const oldRun = await h.ledger.beginRun(['ALPHA'], '2025-08-12');
  h.clock.advance(1000);

  const summary = await h.orchestrator.runUpdate();
  assert.notEqual(summary.runId, oldRun);
  assert.equal(summary.resumed, false);
  assert.equal(summary.outcome, 'completed');
  assert.equal(await h.ledger.findOpenRun(), null);
  await h.handle.close();
});

test('a concurrent trigger is rejected while a run is active', async () => {
  const h = await createHarness({ instruments: ['ALPHA'], series: seriesFor({ ALPHA: 210 }) });
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  h.fetcher.beforeFetch = () => gate;

  const first = await h.orchestrator.triggerUpdate();
  assert.deepEqual(first, { started: true, reason: 'started', tradeDate: '2025-08-13' });

  const second = await h.orchestrator.triggerUpdate();
  assert.deepEqual(second, { started: false, reason: 'already_running', tradeDate: '2025-08-13' });

  const status = await h.orchestrator.getStatus();
  assert.equal(status.running, true);
  assert.equal(status.run_state, 'running');

  release();
  await h.orchestrator.waitForIdle();
  assert.equal(h.fetcher.calls.length, 1);
  assert.equal((await h.marker.read()).lastSuccessDate, '2025-08-13');
  await h.handle.close();
});

test('a lock held by another process blocks the run until it expires', async () => {
  const h = await createHarness({ instruments: ['ALPHA'], series: seriesFor({ ALPHA: 210 }) });
  assert.equal(await h.marker.tryAcquireLock('other-process', 60_000), true);

  const blocked = await h.orchestrator.runUpdate();
  assert.equal(blocked.outcome, 'skipped');
  assert.equal(blocked.reason, 'locked');
  assert.equal(h.fetcher.calls.length, 0);
  assert.equal((await h.marker.read()).lockOwner, 'other-process');

  h.clock.advance(60_001);
  const summary = await h.orchestrator.runUpdate();
  assert.equal(summary.outcome, 'completed');
  await h.handle.close();
});

test('an empty universe is skipped', async () => {
  const h = await createHarness({ instruments: [], series: new Map() });
  const summary = await h.orchestrator.runUpdate();
  assert.equal(summary.outcome, 'skipped');
  assert.equal(summary.reason, 'empty_universe');
  await h.handle.close();
});

class FailingLedger extends ProgressLedger {
  async mark(runId: string, instrument: string, status: LedgerStatus, error?: string | null): Promise<void> {
    if (instrument === 'BRAVO' && status === 'done') {
      throw new LedgerWriteError('mark', new Error('disk full'));
    }
    return super.mark(runId, instrument, status, error);
  }
}

test('a ledger write failure halts the run and a later run finishes the work', async () => {
  const series = seriesFor({ ALPHA: 210, BRAVO: 210, CHARLIE: 210 });
  const h = await createHarness({
    instruments: ['ALPHA', 'BRAVO', 'CHARLIE'],
    series,
    ledgerFactory: (handle, clock) => new FailingLedger(handle.db, { now: clock.now }),
  });

  await assert.rejects(h.orchestrator.runUpdate(), LedgerWriteError);
  const marker = await h.marker.read();
  assert.equal(marker.lastSuccessDate, null);
  assert.equal(marker.lockOwner, null);
  const failedStatus = h.orchestrator.runState.getStatus();
  assert.equal(failedStatus.last_outcome, 'failed');
  assert.equal(failedStatus.last_error, 'Progress ledger mark failed: disk full');
  assert.equal(h.fetcher.callsFor('CHARLIE').length, 0);

  h.clock.advance(60_000);
  const healthy = h.build({ ledger: new ProgressLedger(h.handle.db, { now: h.clock.now }) });
  const summary = await healthy.runUpdate();
  assert.equal(summary.outcome, 'completed');
  assert.equal(summary.resumed, true);
  assert.equal(summary.done, 3);
  // BRAVO's bars were stored before the failure; nothing is fetched twice.
  assert.deepEqual(h.fetcher.callsFor('BRAVO'), [
    { instrument: 'BRAVO', since: null },
    { instrument: 'BRAVO', since: '2025-08-13' },
  ]);
  assert.equal(await h.history.count('BRAVO'), 210);
  assert.equal((await h.marker.read()).lastSuccessDate, '2025-08-13');
  await h.handle.close();
});

test('getStatus reports the finished run', async () => {
  const h = await createHarness({ instruments: ['ALPHA', 'BRAVO'], series: seriesFor({ ALPHA: 210, BRAVO: 210 }) });
  const summary = await h.orchestrator.runUpdate();
  const status = await h.orchestrator.getStatus();

  assert.equal(status.running, false);
  assert.equal(status.run_state, 'idle');
  assert.equal(status.last_success_date, '2025-08-13');
  assert.equal(status.run_id, summary.runId);
  assert.equal(status.run_status, 'completed');
  assert.equal(status.trade_date, '2025-08-13');
  assert.equal(status.pending_count, 0);
  assert.equal(status.failed_count, 0);
  assert.equal(status.processed, 2);
  assert.equal(status.total, 2);
  assert.equal(status.last_outcome, 'completed');
  await h.handle.close();
});

/** Runs `beforeLock` once, right before the lock is requested. */
class InterleavingMarker extends RunMarkerStore {
  beforeLock: (() => Promise<unknown>) | null = null;

  async tryAcquireLock(owner: string, ttlMs: number): Promise<boolean> {
    const hook = this.beforeLock;
    this.beforeLock = null;
    if (hook) await hook();
    return super.tryAcquireLock(owner, ttlMs);
  }
}

test('a day finalized by another process while waiting for the lock is not run again', async () => {
  const h = await createHarness({ instruments: ['ALPHA'], series: seriesFor({ ALPHA: 210 }) });
  const racingMarker = new InterleavingMarker(h.handle.db, { cutoffTime: '15:30', now: h.clock.now });
  const other = h.build({ marker: racingMarker, ownerId: 'other-owner' });
  racingMarker.beforeLock = () => h.orchestrator.runUpdate();

  const summary = await other.runUpdate();

  assert.equal(summary.outcome, 'skipped');
  assert.equal(summary.reason, 'up_to_date');
  assert.equal(summary.tradeDate, '2025-08-13');
  assert.equal(h.fetcher.callsFor('ALPHA').length, 1);
  const runs = await h.handle.db.selectFrom('update_runs').select(['trade_date', 'status']).execute();
  assert.deepEqual(runs, [{ trade_date: '2025-08-13', status: 'completed' }]);
  const marker = await h.marker.read();
  assert.equal(marker.lastSuccessDate, '2025-08-13');
  assert.equal(marker.lockOwner, null);
  await h.handle.close();
});
