import { v4 as uuidv4 } from 'uuid';
import { maxDateKey } from '../lib/dateUtils.js';
import {
  ConcurrentRunRejectedError,
  InsufficientHistoryError,
  errorMessage,
  isAbortError,
  isLedgerWriteError,
} from '../lib/errors.js';
import { RunState, runRetryPasses, type InstrumentWorkerSettled, type RunOutcome, type RunPhase } from '../lib/RunState.js';
import { moduleLogger } from '../logger.js';
import { instrumentOutcomesTotal, lastSuccessfulUpdateGauge, updateRunsTotal } from '../metrics.js';
import type { EmaCache } from '../services/emaCache.js';
import type { HistoryStore } from '../services/historyStore.js';
import type { InstrumentRegistry } from '../services/instrumentRegistry.js';
import type { Fetcher } from '../services/marketDataClient.js';
import type { ProgressLedger } from '../services/progressLedger.js';
import type { RunMarkerStore } from '../services/runMarkerStore.js';
import type { TradingCalendar } from '../services/tradingCalendar.js';

const log = moduleLogger('emaUpdate');

export type TriggerReason = 'started' | 'already_running' | 'before_cutoff' | 'up_to_date' | 'locked' | 'empty_universe';

export interface TriggerResult {
  started: boolean;
  reason: TriggerReason;
  tradeDate: string | null;
}

export type StalenessCheck =
  | { stale: true; reason: 'stale'; tradeDate: string; lastSuccessDate: string | null }
  | { stale: false; reason: 'before_cutoff' | 'up_to_date'; tradeDate: string; lastSuccessDate: string | null };

export interface RunSummary {
  outcome: 'skipped' | RunOutcome;
  reason: TriggerReason;
  runId: string | null;
  tradeDate: string | null;
  resumed: boolean;
  total: number;
  /** Instruments handled by this invocation, retries not double counted. */
  processed: number;
  done: number;
  failed: number;
  warmingUp: number;
}

export interface UpdateStatus {
  run_state: RunPhase;
  running: boolean;
  stop_requested: boolean;
  last_success_date: string | null;
  run_id: string | null;
  run_status: string | null;
  trade_date: string | null;
  pending_count: number;
  failed_count: number;
  processed: number;
  total: number;
  started_at: string | null;
  finished_at: string | null;
  last_outcome: RunOutcome | null;
  last_error: string | null;
}

export interface EmaUpdateOrchestratorDeps {
  registry: InstrumentRegistry;
  history: HistoryStore;
  fetcher: Fetcher;
  emaCache: EmaCache;
  ledger: ProgressLedger;
  marker: RunMarkerStore;
  calendar: TradingCalendar;
  runState?: RunState;
  now?: () => Date;
  maxInstrumentAttempts?: number;
  lockTtlMs?: number;
  /** Identity written into the cross-process run lock. */
  ownerId?: string;
}

interface InstrumentSettled extends InstrumentWorkerSettled {
  warmingUp?: boolean;
  fetched?: number;
}

interface RunContext {
  runId: string;
  tradeDate: string;
  signal: AbortSignal;
}

function skipped(reason: TriggerReason, tradeDate: string | null = null): RunSummary {
  return { outcome: 'skipped', reason, runId: null, tradeDate, resumed: false, total: 0, processed: 0, done: 0, failed: 0, warmingUp: 0 };
}

/**
 * Drives one update run: staleness check, run lock, ledger open/resume,
 * sequential per-instrument fetch → append → fold, retry passes, finalize.
 */
export class EmaUpdateOrchestrator {
  private readonly deps: EmaUpdateOrchestratorDeps;
  readonly runState: RunState;
  private readonly now: () => Date;
  private readonly maxInstrumentAttempts: number;
  private readonly lockTtlMs: number;
  private readonly ownerId: string;
  private idle: Promise<void> = Promise.resolve();

  constructor(deps: EmaUpdateOrchestratorDeps) {
    this.deps = deps;
    this.now = deps.now || (() => new Date());
    this.runState = deps.runState || new RunState('ema-update', { now: this.now });
    this.maxInstrumentAttempts = Math.max(1, Math.floor(deps.maxInstrumentAttempts ?? 3));
    this.lockTtlMs = Math.max(1, deps.lockTtlMs ?? 10 * 60 * 1000);
    this.ownerId = deps.ownerId || `pid-${process.pid}-${uuidv4()}`;
  }

  async checkStaleness(): Promise<StalenessCheck> {
    const nowDate = this.now();
    const marker = await this.deps.marker.read();
    const tradeDate = this.deps.calendar.latestCompletedSession(nowDate);
    const lastSuccessDate = marker.lastSuccessDate;
    if (!this.deps.calendar.isPastCutoff(nowDate)) {
      return { stale: false, reason: 'before_cutoff', tradeDate, lastSuccessDate };
    }
    if (lastSuccessDate !== null && lastSuccessDate >= tradeDate) {
      return { stale: false, reason: 'up_to_date', tradeDate, lastSuccessDate };
    }
    return { stale: true, reason: 'stale', tradeDate, lastSuccessDate };
  }

  /**
   * Starts a run in the background when none is active and the data is stale.
   * Resolves as soon as the decision is made; later failures are logged.
   */
  triggerUpdate(): Promise<TriggerResult> {
    return new Promise<TriggerResult>((resolve, reject) => {
      let decided = false;
      const decide = (result: TriggerResult) => {
        if (decided) return;
        decided = true;
        resolve(result);
      };
      const run = this.runUpdate({ onStarted: decide });
      const settled = run.then(
        (summary) => {
          decide({ started: summary.outcome !== 'skipped', reason: summary.reason, tradeDate: summary.tradeDate });
        },
        (err: unknown) => {
          if (!decided) {
            decided = true;
            reject(err);
            return;
          }
          log.error({ err: errorMessage(err) }, 'Background update run failed');
        },
      );
      // A rejected trigger settles at once; keep waiting on any run still active.
      this.idle = Promise.all([this.idle, settled]).then(() => undefined);
    });
  }

  /** Resolves once every triggered background run has settled. */
  waitForIdle(): Promise<void> {
    return this.idle;
  }

  requestStop(): boolean {
    return this.runState.requestStop();
  }

  async runUpdate(options: { onStarted?: (result: TriggerResult) => void } = {}): Promise<RunSummary> {
    let abortController: AbortController;
    try {
      abortController = this.runState.tryBegin();
    } catch (err) {
      if (err instanceof ConcurrentRunRejectedError) {
        log.info('Update trigger ignored: a run is already active');
        return skipped('already_running', this.runState.getStatus().trade_date);
      }
      throw err;
    }

    let lockHeld = false;
    try {
      const staleness = await this.checkStaleness();
      if (!staleness.stale) {
        log.info({ reason: staleness.reason, tradeDate: staleness.tradeDate }, 'No update needed');
        return skipped(staleness.reason, staleness.tradeDate);
      }
      const { tradeDate } = staleness;
      const universe = this.deps.registry.instruments();
      if (universe.length === 0) {
        log.warn('Instrument universe is empty, nothing to update');
        return skipped('empty_universe', tradeDate);
      }

      lockHeld = await this.deps.marker.tryAcquireLock(this.ownerId, this.lockTtlMs);
      if (!lockHeld) {
        log.warn({ tradeDate }, 'Update run lock is held by another process');
        return skipped('locked', tradeDate);
      }
      // Another process may have finalized the day between the check and the lock.
      const recheck = await this.checkStaleness();
      if (!recheck.stale) {
        log.info({ reason: recheck.reason, tradeDate: recheck.tradeDate }, 'Update finished elsewhere before the lock was taken');
        return skipped(recheck.reason, recheck.tradeDate);
      }

      this.runState.setPhase('running');
      const { runId, queue, resumed } = await this.openRun(universe, tradeDate);
      this.runState.setRun({ runId, tradeDate, total: universe.length });
      options.onStarted?.({ started: true, reason: 'started', tradeDate });
      log.info({ runId, tradeDate, queued: queue.length, total: universe.length, resumed }, 'Update run started');

      return await this.executeRun({ runId, tradeDate, signal: abortController.signal }, queue, universe.length, resumed);
    } catch (err) {
      this.runState.finish('failed', err);
      updateRunsTotal.inc({ outcome: 'failed' });
      log.error({ err: errorMessage(err) }, 'Update run failed');
      throw err;
    } finally {
      if (lockHeld) {
        try {
          await this.deps.marker.releaseLock(this.ownerId);
        } catch (err) {
          log.error({ err: errorMessage(err) }, 'Failed to release update run lock');
        }
      }
      this.runState.cleanup(abortController);
    }
  }

  private async openRun(
    universe: readonly string[],
    tradeDate: string,
  ): Promise<{ runId: string; queue: string[]; resumed: boolean }> {
    const { ledger } = this.deps;
    const open = await ledger.findOpenRun();
    if (open && open.tradeDate === tradeDate) {
      const queue = await ledger.recover(open.runId);
      return { runId: open.runId, queue, resumed: true };
    }
    if (open) {
      log.info({ runId: open.runId, tradeDate: open.tradeDate }, 'Abandoning open run for an older trade date');
      await ledger.abandonRun(open.runId);
    }
    const runId = await ledger.beginRun(universe, tradeDate);
    return { runId, queue: [...universe], resumed: false };
  }

  private async executeRun(ctx: RunContext, queue: string[], total: number, resumed: boolean): Promise<RunSummary> {
    const { ledger, marker } = this.deps;
    const summary: RunSummary = {
      outcome: 'completed',
      reason: 'started',
      runId: ctx.runId,
      tradeDate: ctx.tradeDate,
      resumed,
      total,
      processed: 0,
      done: 0,
      failed: 0,
      warmingUp: 0,
    };
    const alreadySettled = total - queue.length;
    const failedInMainPass: string[] = [];
    const pushProgress = () => {
      this.runState.updateProgress(alreadySettled + summary.processed, failedInMainPass.length);
    };

    for (const instrument of queue) {
      if (this.runState.shouldStop) break;
      const settled = await this.processInstrument(ctx, instrument);
      if (!settled.skipped) {
        summary.processed += 1;
        if (settled.error !== undefined) failedInMainPass.push(instrument);
        if (settled.warmingUp) summary.warmingUp += 1;
      }
      pushProgress();
      await this.renewLock();
    }

    if (failedInMainPass.length > 0 && !this.runState.shouldStop) {
      log.info({ count: failedInMainPass.length }, 'Retrying failed instrument(s)');
      let recovered = 0;
      const stillFailed = await runRetryPasses<InstrumentSettled>({
        failedInstruments: failedInMainPass,
        maxPasses: this.maxInstrumentAttempts - 1,
        worker: async (instrument) => {
          const settled = await this.processInstrument(ctx, instrument);
          await this.renewLock();
          return settled;
        },
        onRecovered: (settled) => {
          recovered += 1;
          if (settled.warmingUp) summary.warmingUp += 1;
        },
        shouldStop: () => this.runState.shouldStop,
      });
      log.info({ recovered, stillFailed: stillFailed.length }, 'Retry passes finished');
    }

    const entries = await ledger.entries(ctx.runId);
    const counts = { done: 0, failed: 0, unfinished: 0 };
    for (const entry of entries) {
      if (entry.status === 'done') counts.done += 1;
      if (entry.status === 'failed') counts.failed += 1;
      if (
        entry.status === 'pending' ||
        entry.status === 'in_progress' ||
        (entry.status === 'failed' && entry.attemptCount < this.maxInstrumentAttempts)
      ) {
        counts.unfinished += 1;
      }
    }
    summary.done = counts.done;
    summary.failed = counts.failed;
    this.runState.updateProgress(counts.done + counts.failed, counts.failed);

    // Every instrument is done or out of attempts, unless a stop cut the run short.
    if (counts.unfinished > 0) {
      summary.outcome = 'stopped';
      this.runState.finish('stopped');
      updateRunsTotal.inc({ outcome: 'stopped' });
      log.info(
        { runId: ctx.runId, done: counts.done, unfinished: counts.unfinished },
        'Update run stopped, ledger left open for resume',
      );
      return summary;
    }

    this.runState.setPhase('finalizing');
    await ledger.completeRun(ctx.runId);
    await marker.advance(ctx.tradeDate);
    const pruned = await ledger.pruneCompletedRuns();
    lastSuccessfulUpdateGauge.set(this.now().getTime() / 1000);

    summary.outcome = counts.failed > 0 ? 'completed-with-errors' : 'completed';
    this.runState.finish(summary.outcome);
    updateRunsTotal.inc({ outcome: summary.outcome });
    log.info(
      { runId: ctx.runId, tradeDate: ctx.tradeDate, done: counts.done, failed: counts.failed, warmingUp: summary.warmingUp, pruned },
      'Update run finalized',
    );
    return summary;
  }

  private async renewLock(): Promise<void> {
    const renewed = await this.deps.marker.renewLock(this.ownerId, this.lockTtlMs);
    if (!renewed) {
      throw new Error('Update run lock was lost to another process');
    }
  }

  /**
   * Worker for one instrument. Instrument-level failures are recorded in the
   * ledger and returned; ledger failures propagate and halt the run.
   */
  private async processInstrument(ctx: RunContext, instrument: string): Promise<InstrumentSettled> {
    const { ledger, history, fetcher, emaCache } = this.deps;
    const entry = await ledger.entry(ctx.runId, instrument);
    if (!entry || entry.status === 'done') return { instrument, skipped: true };
    if (entry.status === 'failed' && entry.attemptCount >= this.maxInstrumentAttempts) {
      return { instrument, skipped: true };
    }

    await ledger.mark(ctx.runId, instrument, 'in_progress');
    let fetched = 0;
    try {
      const [historyLast, cached] = await Promise.all([history.lastDate(instrument), emaCache.snapshot(instrument)]);
      const since = maxDateKey(historyLast, cached ? cached.lastBarDate : null);
      const bars = await fetcher.fetchMissing(instrument, since, { signal: ctx.signal });
      fetched = bars.length;
      if (bars.length > 0) {
        await history.append(instrument, bars);
      }
      // Fold everything the cache has not seen, including bars appended by an
      // earlier attempt that crashed before folding.
      const unfolded = await history.readAfter(instrument, cached ? cached.lastBarDate : null);
      let warmingUp = false;
      try {
        await emaCache.update(instrument, unfolded);
      } catch (err) {
        if (!(err instanceof InsufficientHistoryError) || err.available === 0) throw err;
        warmingUp = true;
      }
      await ledger.mark(ctx.runId, instrument, 'done');
      instrumentOutcomesTotal.inc({ status: warmingUp ? 'warming_up' : 'done' });
      return { instrument, warmingUp, fetched };
    } catch (err) {
      if (ctx.signal.aborted && isAbortError(err)) {
        await ledger.mark(ctx.runId, instrument, 'pending');
        return { instrument, skipped: true };
      }
      if (isLedgerWriteError(err)) throw err;
      const message = errorMessage(err);
      await ledger.mark(ctx.runId, instrument, 'failed', message);
      instrumentOutcomesTotal.inc({ status: 'failed' });
      log.warn({ instrument, fetched, err: message }, 'Instrument update failed');
      return { instrument, error: err, fetched };
    }
  }

  async getStatus(): Promise<UpdateStatus> {
    const { ledger, marker } = this.deps;
    const state = this.runState.getStatus();
    const markerState = await marker.read();
    const latest = await ledger.latestRun();
    const runId = state.run_id || (latest ? latest.runId : null);
    const counts = runId ? await ledger.counts(runId) : null;
    const runStatus = latest && latest.runId === runId ? latest.status : state.running ? 'running' : null;
    const total = counts ? counts.pending + counts.in_progress + counts.done + counts.failed : 0;
    return {
      run_state: state.run_state,
      running: state.running,
      stop_requested: state.stop_requested,
      last_success_date: markerState.lastSuccessDate,
      run_id: runId,
      run_status: runStatus,
      trade_date: state.trade_date || (latest ? latest.tradeDate : null),
      pending_count: counts ? counts.pending + counts.in_progress : 0,
      failed_count: counts ? counts.failed : 0,
      processed: counts ? counts.done + counts.failed : 0,
      total,
      started_at: state.started_at,
      finished_at: state.finished_at,
      last_outcome: state.last_outcome,
      last_error: state.last_error,
    };
  }
}
