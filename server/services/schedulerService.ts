import type { TriggerResult } from '../orchestrators/emaUpdateOrchestrator.js';
import { moduleLogger } from '../logger.js';
import { isAbortError } from '../lib/errors.js';
import { sleepWithAbort } from './marketDataClient.js';
import type { TradingCalendar } from './tradingCalendar.js';

const log = moduleLogger('scheduler');

const STEP_MAX_ATTEMPTS = 3; // Initial attempt + 2 retries
const STEP_RETRY_DELAY_MS = 20_000;

/** Trigger outcomes that need no retry. Only a foreign lock is worth waiting out. */
function isSettledTrigger(result: TriggerResult): boolean {
  return result.started || result.reason !== 'locked';
}

interface StepRunOptions {
  retryDelayMs?: number;
  shouldContinue?: () => boolean;
  /** Aborting cancels a pending retry wait. */
  signal?: AbortSignal | null;
}

/** Returns true when the step settled within its attempts. */
export async function runStepWithRetries(
  label: string,
  step: () => Promise<TriggerResult>,
  options: StepRunOptions = {},
): Promise<boolean> {
  const retryDelayMs = Math.max(0, Number(options.retryDelayMs ?? STEP_RETRY_DELAY_MS));
  for (let attempt = 1; attempt <= STEP_MAX_ATTEMPTS; attempt += 1) {
    if (options.shouldContinue && !options.shouldContinue()) return false;
    try {
      const result = await step();
      if (isSettledTrigger(result)) {
        log.info(`${label} settled with reason=${result.reason} (attempt ${attempt}/${STEP_MAX_ATTEMPTS})`);
        return true;
      }
      log.warn(`${label} returned reason=${result.reason} (attempt ${attempt}/${STEP_MAX_ATTEMPTS})`);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`${label} failed (attempt ${attempt}/${STEP_MAX_ATTEMPTS}): ${message}`);
    }

    if (attempt < STEP_MAX_ATTEMPTS && retryDelayMs > 0) {
      try {
        await sleepWithAbort(retryDelayMs, options.signal);
      } catch (err: unknown) {
        if (!isAbortError(err)) throw err;
        log.info(`${label} retry cancelled`);
        return false;
      }
    }
  }
  log.error(`${label} exhausted retries; waiting for the next scheduled run`);
  return false;
}

/**
 * Next exchange-local `cutoff + delayMinutes` on a trading day, strictly
 * after `nowUtc`.
 */
export function getNextUpdateUtcMs(nowUtc: Date, calendar: TradingCalendar, delayMinutes: number): number {
  let candidate = calendar.localDate(nowUtc);
  if (!calendar.isTradingDay(candidate) || nowUtc.getTime() >= calendar.cutoffUtcMs(candidate, delayMinutes)) {
    candidate = calendar.nextTradingDay(candidate);
  }
  return calendar.cutoffUtcMs(candidate, delayMinutes);
}

export interface UpdateSchedulerDeps {
  trigger: () => Promise<TriggerResult>;
  calendar: TradingCalendar;
  delayMinutes: number;
  enabled: boolean;
  retryDelayMs?: number;
  now?: () => Date;
}

export interface SchedulerState {
  enabled: boolean;
  nextRunUtc: string | null;
}

/** Daily timer that fires the update trigger shortly after the cutoff. */
export class UpdateScheduler {
  private readonly deps: UpdateSchedulerDeps;
  private readonly now: () => Date;
  private enabled: boolean;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private nextRunUtcMs: number | null = null;
  private readonly retryAbort = new AbortController();

  constructor(deps: UpdateSchedulerDeps) {
    this.deps = deps;
    this.now = deps.now || (() => new Date());
    this.enabled = deps.enabled;
  }

  start(): void {
    if (!this.enabled) {
      log.info('Scheduler disabled by configuration');
      return;
    }
    this.scheduleNext();
  }

  stop(): void {
    this.enabled = false;
    this.retryAbort.abort();
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.nextRunUtcMs = null;
  }

  /** One trigger with retries, used at startup to catch up a missed day. */
  runCatchUp(): Promise<boolean> {
    return runStepWithRetries('Startup catch-up update', this.deps.trigger, {
      retryDelayMs: this.deps.retryDelayMs,
      shouldContinue: () => this.enabled,
      signal: this.retryAbort.signal,
    });
  }

  getState(): SchedulerState {
    return {
      enabled: this.enabled,
      nextRunUtc: this.nextRunUtcMs ? new Date(this.nextRunUtcMs).toISOString() : null,
    };
  }

  private scheduleNext(): void {
    if (this.timer) clearTimeout(this.timer);
    const nowDate = this.now();
    const nextRunMs = getNextUpdateUtcMs(nowDate, this.deps.calendar, this.deps.delayMinutes);
    this.nextRunUtcMs = nextRunMs;
    const delayMs = Math.max(1000, nextRunMs - nowDate.getTime());

    const timer = setTimeout(async () => {
      try {
        await runStepWithRetries('Scheduled EMA update', this.deps.trigger, {
          retryDelayMs: this.deps.retryDelayMs,
          shouldContinue: () => this.enabled,
          signal: this.retryAbort.signal,
        });
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        log.error(`Scheduled update crashed: ${message}`);
      } finally {
        this.nextRunUtcMs = null;
        if (this.enabled) {
          this.scheduleNext();
        }
      }
    }, delayMs);

    this.timer = timer;
    timer.unref();
    log.info(`Next EMA update scheduled in ${Math.round(delayMs / 1000)}s`);
  }
}
