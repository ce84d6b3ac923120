import { HistoryResponseSchema, validateApiResponse, type HistoryResponse } from '../lib/apiSchemas.js';
import { addDaysToDateKey, dateKeyDaysAgo, dateKeyToDmy, normalizeUpstreamDate } from '../lib/dateUtils.js';
import {
  FetchExhaustedError,
  TransientFetchError,
  buildRequestAbortError,
  buildTaskTimeoutError,
  errorMessage,
} from '../lib/errors.js';
import { moduleLogger } from '../logger.js';
import { marketDataRequestsTotal, marketDataSessionRefreshesTotal } from '../metrics.js';
import type { PriceBar } from './historyStore.js';
import type { TradingCalendar } from './tradingCalendar.js';

const log = moduleLogger('marketData');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FetchMissingOptions {
  signal?: AbortSignal | null;
}

/** Anything that can supply the bars an instrument is missing. */
export interface Fetcher {
  fetchMissing(instrument: string, sinceDate: string | null, options?: FetchMissingOptions): Promise<PriceBar[]>;
}

export type SleepFn = (ms: number, signal?: AbortSignal | null) => Promise<void>;

export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal | null },
) => Promise<Response>;

interface RawResponse {
  status: number;
  ok: boolean;
  text: string;
}

// ---------------------------------------------------------------------------
// Abort / timeout helpers
// ---------------------------------------------------------------------------

export function sleepWithAbort(ms: number, signal?: AbortSignal | null): Promise<void> {
  const waitMs = Math.max(0, Math.ceil(Number(ms) || 0));
  return new Promise((resolve, reject) => {
    let settled = false;
    const done = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (signal) {
        signal.removeEventListener('abort', onAbort);
      }
      fn();
    };
    const onAbort = () => done(() => reject(buildRequestAbortError('Aborted while waiting')));
    const timer = setTimeout(() => done(resolve), waitMs);
    if (signal) {
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

export function linkAbortSignalToController(parentSignal: AbortSignal | null, controller: AbortController): () => void {
  if (!parentSignal) return () => {};
  const forwardAbort = () => {
    if (!controller.signal.aborted) controller.abort();
  };
  if (parentSignal.aborted) {
    forwardAbort();
    return () => {};
  }
  parentSignal.addEventListener('abort', forwardAbort);
  return () => {
    parentSignal.removeEventListener('abort', forwardAbort);
  };
}

export async function runWithAbortAndTimeout<T>(
  task: (signal: AbortSignal | null) => Promise<T>,
  options: { label?: string; signal?: AbortSignal | null; timeoutMs?: number } = {},
): Promise<T> {
  const label = String(options.label || 'Task').trim() || 'Task';
  const parentSignal = options.signal || null;
  const timeoutMs = Math.max(0, Math.floor(Number(options.timeoutMs) || 0));
  if (parentSignal && parentSignal.aborted) {
    throw buildRequestAbortError(`${label} aborted`);
  }
  if (timeoutMs <= 0) {
    return task(parentSignal);
  }

  const controller = new AbortController();
  const unlinkAbort = linkAbortSignalToController(parentSignal, controller);

  let timeoutTimer: ReturnType<typeof setTimeout> | null = null;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutTimer = setTimeout(() => {
      // Settle the race before the aborted task rejects on its own.
      reject(buildTaskTimeoutError(label, timeoutMs));
      if (!controller.signal.aborted) controller.abort();
    }, timeoutMs);
    timeoutTimer.unref();
  });

  try {
    return await Promise.race([task(controller.signal), timeoutPromise]);
  } finally {
    if (timeoutTimer) clearTimeout(timeoutTimer);
    unlinkAbort();
  }
}

/** Exponential backoff capped at one minute: base × 2^(attempt−1). */
export function getRetryBackoffMs(attempt: number, baseMs: number): number {
  const safeAttempt = Math.max(1, Math.floor(Number(attempt) || 1));
  return Math.min(60_000, Math.max(0, baseMs) * 2 ** (safeAttempt - 1));
}

// ---------------------------------------------------------------------------
// Rate gate
// ---------------------------------------------------------------------------

/**
 * Enforces a minimum delay between consecutive outbound calls. Callers queue
 * in arrival order; the gate is shared by every call of a client.
 */
export class RateGate {
  private lastCallAt: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly minIntervalMs: number,
    private readonly deps: { now?: () => number; sleep?: SleepFn } = {},
  ) {}

  private now(): number {
    return this.deps.now ? this.deps.now() : Date.now();
  }

  acquire(signal?: AbortSignal | null): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot(signal || null));
    // A failed turn is reported to its own caller; the queue keeps moving.
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  private async waitForSlot(signal: AbortSignal | null): Promise<void> {
    const sleep = this.deps.sleep || sleepWithAbort;
    while (true) {
      if (signal && signal.aborted) {
        throw buildRequestAbortError('Request aborted while waiting for a rate-limit slot');
      }
      const now = this.now();
      const waitMs = this.lastCallAt === null ? 0 : this.lastCallAt + this.minIntervalMs - now;
      if (waitMs <= 0) {
        this.lastCallAt = now;
        return;
      }
      await sleep(waitMs, signal);
    }
  }
}

// ---------------------------------------------------------------------------
// Row normalisation
// ---------------------------------------------------------------------------

/**
 * Converts validated upstream rows into bars strictly after `sinceDate` and
 * no later than `latestDate`, de-duplicated by date and sorted ascending.
 */
export function normalizeHistoryRows(
  payload: HistoryResponse,
  sinceDate: string | null,
  latestDate: string,
): PriceBar[] {
  const byDate = new Map<string, PriceBar>();
  for (const row of payload.data) {
    if (row.CH_SERIES !== undefined && row.CH_SERIES.trim().toUpperCase() !== 'EQ') continue;
    const date = normalizeUpstreamDate(row.CH_TIMESTAMP);
    if (!date) continue;
    if (sinceDate !== null && date <= sinceDate) continue;
    if (date > latestDate) continue;
    const open = row.CH_OPENING_PRICE;
    const close = row.CH_CLOSING_PRICE;
    if (!(close > 0) || !(open > 0)) continue;
    byDate.set(date, {
      date,
      open,
      high: Math.max(row.CH_TRADE_HIGH_PRICE, open, close),
      low: Math.min(row.CH_TRADE_LOW_PRICE, open, close),
      close,
      volume: row.CH_TOT_TRADED_QTY ?? 0,
    });
  }
  return [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

const BROWSER_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'application/json, text/plain, */*',
  'Accept-Language': 'en-US,en;q=0.9',
};

export interface MarketDataClientOptions {
  baseUrl: string;
  historyPath: string;
  calendar: TradingCalendar;
  minIntervalMs: number;
  sessionRefreshCalls: number;
  maxAttempts: number;
  retryBaseMs: number;
  timeoutMs: number;
  lookbackDays: number;
  fetchImpl?: FetchLike;
  now?: () => Date;
  sleep?: SleepFn;
  rateGate?: RateGate;
}

/**
 * Daily-history client for the exchange's public equity endpoint. Every
 * outbound call goes through one RateGate; the cookie session is warmed up
 * on first use, after `sessionRefreshCalls` data calls and after a 401/403.
 */
export class MarketDataClient implements Fetcher {
  private readonly options: MarketDataClientOptions;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;
  private readonly sleep: SleepFn;
  private readonly gate: RateGate;
  private sessionReady = false;
  private cookieHeader = '';
  private callsSinceRefresh = 0;

  constructor(options: MarketDataClientOptions) {
    this.options = options;
    this.fetchImpl = options.fetchImpl || ((url, init) => fetch(url, init));
    this.now = options.now || (() => new Date());
    this.sleep = options.sleep || sleepWithAbort;
    this.gate =
      options.rateGate ||
      new RateGate(options.minIntervalMs, { now: () => this.now().getTime(), sleep: this.sleep });
  }

  async fetchMissing(instrument: string, sinceDate: string | null, options: FetchMissingOptions = {}): Promise<PriceBar[]> {
    const signal = options.signal || null;
    const latest = this.options.calendar.latestCompletedSession(this.now());
    if (sinceDate !== null && sinceDate >= latest) return [];

    const fromDate = sinceDate !== null ? addDaysToDateKey(sinceDate, 1) : dateKeyDaysAgo(latest, this.options.lookbackDays);
    const maxAttempts = Math.max(1, this.options.maxAttempts);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const payload = await this.requestHistory(instrument, fromDate, latest, signal);
        marketDataRequestsTotal.inc({ result: 'ok' });
        return normalizeHistoryRows(payload, sinceDate, latest);
      } catch (err) {
        if (signal && signal.aborted) {
          marketDataRequestsTotal.inc({ result: 'aborted' });
          throw buildRequestAbortError(`${instrument} history request aborted`);
        }
        marketDataRequestsTotal.inc({ result: 'error' });
        lastError = err;
        if (attempt >= maxAttempts) break;
        const backoffMs = getRetryBackoffMs(attempt, this.options.retryBaseMs);
        log.warn(
          { instrument, attempt, maxAttempts, backoffMs, err: errorMessage(err) },
          'History request failed, retrying',
        );
        await this.sleep(backoffMs, signal);
      }
    }

    throw new FetchExhaustedError(instrument, maxAttempts, lastError);
  }

  private async send(url: string, label: string, signal: AbortSignal | null, referer?: string): Promise<RawResponse> {
    await this.gate.acquire(signal);
    const headers: Record<string, string> = { ...BROWSER_HEADERS };
    if (this.cookieHeader) headers.Cookie = this.cookieHeader;
    if (referer) headers.Referer = referer;
    try {
      return await runWithAbortAndTimeout(
        async (taskSignal) => {
          const response = await this.fetchImpl(url, { headers, signal: taskSignal });
          const setCookies = response.headers.getSetCookie();
          if (setCookies.length > 0) {
            this.cookieHeader = setCookies.map((cookie) => cookie.split(';')[0]).join('; ');
          }
          return { status: response.status, ok: response.ok, text: await response.text() };
        },
        { label, signal, timeoutMs: this.options.timeoutMs },
      );
    } catch (err) {
      if (signal && signal.aborted) throw err;
      if (err instanceof TransientFetchError) throw err;
      const status = err instanceof Error && 'httpStatus' in err ? Number(err.httpStatus) : undefined;
      throw new TransientFetchError(`${label} failed: ${errorMessage(err)}`, {
        cause: err,
        httpStatus: Number.isFinite(status) ? status : undefined,
      });
    }
  }

  private homeUrl(): string {
    return new URL('/', this.options.baseUrl).toString();
  }

  private async ensureSession(signal: AbortSignal | null): Promise<void> {
    if (this.sessionReady && this.callsSinceRefresh < this.options.sessionRefreshCalls) return;
    this.sessionReady = false;
    this.cookieHeader = '';
    marketDataSessionRefreshesTotal.inc();
    log.debug('Refreshing market-data session');
    const response = await this.send(this.homeUrl(), 'Session warm-up', signal);
    if (!response.ok) {
      throw new TransientFetchError(`Session warm-up failed (${response.status})`, { httpStatus: response.status });
    }
    this.sessionReady = true;
    this.callsSinceRefresh = 0;
  }

  private async requestHistory(
    instrument: string,
    fromDate: string,
    toDate: string,
    signal: AbortSignal | null,
  ): Promise<HistoryResponse> {
    await this.ensureSession(signal);
    const url = new URL(this.options.historyPath, this.options.baseUrl);
    url.searchParams.set('symbol', instrument);
    url.searchParams.set('series', '["EQ"]');
    url.searchParams.set('from', dateKeyToDmy(fromDate));
    url.searchParams.set('to', dateKeyToDmy(toDate));

    const label = `${instrument} history`;
    this.callsSinceRefresh += 1;
    const response = await this.send(url.toString(), label, signal, this.homeUrl());

    if (response.status === 401 || response.status === 403) {
      this.sessionReady = false;
      throw new TransientFetchError(`${label} rejected (${response.status}), session will be refreshed`, {
        httpStatus: response.status,
      });
    }
    if (!response.ok) {
      throw new TransientFetchError(
        `${label} request failed (${response.status}): ${response.text.trim().slice(0, 180) || 'empty body'}`,
        { httpStatus: response.status },
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.text);
    } catch (err) {
      throw new TransientFetchError(`${label} returned a non-JSON body`, { cause: err });
    }
    const validated = validateApiResponse(HistoryResponseSchema, payload, label);
    if (!validated) {
      throw new TransientFetchError(`${label} returned an unexpected payload shape`);
    }
    return validated;
  }
}
