/**
 * RunState: in-process state of the EMA update job.
 *
 * All mutable fields are private. The orchestrator interacts through the
 * public API (tryBegin, setPhase, setRun, updateProgress, finish, cleanup).
 * `tryBegin` is synchronous, so two triggers arriving in the same tick cannot
 * both obtain the run token.
 */

import { ConcurrentRunRejectedError } from './errors.js';

type RunPhase = 'idle' | 'checking_staleness' | 'running' | 'finalizing';

type RunOutcome = 'completed' | 'completed-with-errors' | 'stopped' | 'failed';

interface RunStatusSnapshot {
  run_state: RunPhase;
  running: boolean;
  stop_requested: boolean;
  run_id: string | null;
  trade_date: string | null;
  processed: number;
  failed: number;
  total: number;
  started_at: string | null;
  finished_at: string | null;
  last_outcome: RunOutcome | null;
  last_error: string | null;
}

/**
 * Shape returned by every worker used with runRetryPasses.
 *
 * Workers must handle their own exceptions and return the error in the `error`
 * field rather than throwing, so the instrument can be tracked for retry.
 */
interface InstrumentWorkerSettled {
  instrument: string;
  error?: unknown;
  skipped?: boolean;
}

class RunState {
  readonly name: string;

  private _phase: RunPhase = 'idle';
  private _stopRequested = false;
  private _abortController: AbortController | null = null;
  private _runId: string | null = null;
  private _tradeDate: string | null = null;
  private _processed = 0;
  private _failed = 0;
  private _total = 0;
  private _startedAt: string | null = null;
  private _finishedAt: string | null = null;
  private _lastOutcome: RunOutcome | null = null;
  private _lastError: string | null = null;
  private readonly _now: () => Date;

  constructor(name: string, options: { now?: () => Date } = {}) {
    this.name = name;
    this._now = options.now || (() => new Date());
  }

  /** True while a job owns this state object. */
  get isRunning(): boolean {
    return this._abortController !== null;
  }

  get isStopping(): boolean {
    return this._stopRequested;
  }

  /** True if stop was requested OR the AbortController signal was aborted. */
  get shouldStop(): boolean {
    return this._stopRequested || Boolean(this._abortController?.signal.aborted);
  }

  get signal(): AbortSignal | null {
    return this._abortController?.signal || null;
  }

  get phase(): RunPhase {
    return this._phase;
  }

  /**
   * Take the run token. Throws ConcurrentRunRejectedError when another job
   * already holds it.
   */
  tryBegin(): AbortController {
    if (this._abortController) {
      throw new ConcurrentRunRejectedError(`${this.name} is already running`);
    }
    this._abortController = new AbortController();
    this._stopRequested = false;
    this._phase = 'checking_staleness';
    this._runId = null;
    this._tradeDate = null;
    this._processed = 0;
    this._failed = 0;
    this._total = 0;
    this._startedAt = this._now().toISOString();
    this._finishedAt = null;
    this._lastError = null;
    return this._abortController;
  }

  setPhase(phase: RunPhase): void {
    this._phase = phase;
  }

  setRun(fields: { runId: string; tradeDate: string; total: number }): void {
    this._runId = fields.runId;
    this._tradeDate = fields.tradeDate;
    this._total = fields.total;
  }

  updateProgress(processed: number, failed: number): void {
    this._processed = processed;
    this._failed = failed;
  }

  /**
   * Signal the running job to stop. Aborts the AbortController and sets the
   * isStopping flag. Returns false if not currently running.
   */
  requestStop(): boolean {
    if (!this._abortController) return false;
    this._stopRequested = true;
    if (!this._abortController.signal.aborted) {
      this._abortController.abort();
    }
    return true;
  }

  /** Record the terminal outcome of the current job. */
  finish(outcome: RunOutcome, error?: unknown): void {
    this._lastOutcome = outcome;
    this._lastError = error === undefined ? null : error instanceof Error ? error.message : String(error);
    this._finishedAt = this._now().toISOString();
  }

  /**
   * Release the run token if `abortRef` is the one handed out by tryBegin.
   * Always call this in a finally block.
   */
  cleanup(abortRef: AbortController): void {
    if (this._abortController !== abortRef) return;
    this._abortController = null;
    this._stopRequested = false;
    this._phase = 'idle';
  }

  getStatus(): RunStatusSnapshot {
    return {
      run_state: this._phase,
      running: this.isRunning,
      stop_requested: this._stopRequested,
      run_id: this._runId,
      trade_date: this._tradeDate,
      processed: this._processed,
      failed: this._failed,
      total: this._total,
      started_at: this._startedAt,
      finished_at: this._finishedAt,
      last_outcome: this._lastOutcome,
      last_error: this._lastError,
    };
  }
}

interface RunRetryPassesOptions<TSettled extends InstrumentWorkerSettled> {
  failedInstruments: string[];
  maxPasses: number;
  /** The same worker used in the main pass. Must never throw. */
  worker: (instrument: string) => Promise<TSettled>;
  onRecovered?: (settled: TSettled) => void;
  onStillFailed?: (settled: TSettled) => void;
  shouldStop?: () => boolean;
}

/**
 * Retry failed instruments sequentially, pass by pass, until none remain,
 * `maxPasses` is reached or a stop is requested.
 * Returns the instruments that still failed after the last pass.
 */
async function runRetryPasses<TSettled extends InstrumentWorkerSettled>({
  failedInstruments,
  maxPasses,
  worker,
  onRecovered,
  onStillFailed,
  shouldStop,
}: RunRetryPassesOptions<TSettled>): Promise<string[]> {
  let stillFailed = [...failedInstruments];

  for (let pass = 0; pass < maxPasses; pass++) {
    if (stillFailed.length === 0) break;
    if (shouldStop && shouldStop()) break;

    const retryBatch = stillFailed;
    stillFailed = [];
    for (const instrument of retryBatch) {
      if (shouldStop && shouldStop()) {
        stillFailed.push(instrument);
        continue;
      }
      const settled = await worker(instrument);
      if (settled.skipped) continue;
      if (settled.error !== undefined) {
        stillFailed.push(settled.instrument);
        if (onStillFailed) onStillFailed(settled);
      } else if (onRecovered) {
        onRecovered(settled);
      }
    }
  }

  return stillFailed;
}

export { RunState, runRetryPasses };
export type { RunPhase, RunOutcome, RunStatusSnapshot, InstrumentWorkerSettled, RunRetryPassesOptions };
