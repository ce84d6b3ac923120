/**
 * Error classes and pure error-classification predicates.
 *
 * Kept in lib/ so stores, the market-data client and the orchestrator can all
 * depend on them without a lib → services dependency cycle.
 */

export type ErrorCode =
  | 'TRANSIENT_FETCH'
  | 'FETCH_EXHAUSTED'
  | 'OUT_OF_ORDER_BAR'
  | 'INSUFFICIENT_HISTORY'
  | 'CONCURRENT_RUN_REJECTED'
  | 'LEDGER_WRITE'
  | 'REQUEST_ABORTED'
  | 'TASK_TIMEOUT';

export class ScreenerError extends Error {
  readonly code: ErrorCode;
  httpStatus?: number;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown; httpStatus?: number }) {
    super(message, options && options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    if (options?.httpStatus !== undefined) this.httpStatus = options.httpStatus;
  }
}

/** A single outbound call failed in a way worth retrying. */
export class TransientFetchError extends ScreenerError {
  constructor(message: string, options?: { cause?: unknown; httpStatus?: number }) {
    super('TRANSIENT_FETCH', message, options);
  }
}

export class FetchExhaustedError extends ScreenerError {
  readonly instrument: string;
  readonly attempts: number;

  constructor(instrument: string, attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('FETCH_EXHAUSTED', `${instrument}: fetch failed after ${attempts} attempt(s): ${reason}`, { cause });
    this.instrument = instrument;
    this.attempts = attempts;
  }
}

export class OutOfOrderBarError extends ScreenerError {
  readonly instrument: string;
  readonly barDate: string;
  readonly lastDate: string | null;

  constructor(instrument: string, barDate: string, lastDate: string | null) {
    super(
      'OUT_OF_ORDER_BAR',
      `${instrument}: bar ${barDate} is not strictly after ${lastDate ?? 'the previous bar in the batch'}`,
    );
    this.instrument = instrument;
    this.barDate = barDate;
    this.lastDate = lastDate;
  }
}

export class InsufficientHistoryError extends ScreenerError {
  readonly instrument: string;
  readonly available: number;
  readonly required: number;

  constructor(instrument: string, available: number, required: number) {
    super('INSUFFICIENT_HISTORY', `${instrument}: ${available} of ${required} bars available, EMA still warming up`);
    this.instrument = instrument;
    this.available = available;
    this.required = required;
  }
}

export class ConcurrentRunRejectedError extends ScreenerError {
  constructor(message = 'An update run is already active') {
    super('CONCURRENT_RUN_REJECTED', message, { httpStatus: 409 });
  }
}

export class LedgerWriteError extends ScreenerError {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('LEDGER_WRITE', `Progress ledger ${operation} failed: ${reason}`, { cause });
  }
}

export function buildRequestAbortError(message?: string): ScreenerError {
  const err = new ScreenerError('REQUEST_ABORTED', message || 'Request aborted', { httpStatus: 499 });
  err.name = 'AbortError';
  return err;
}

export function buildTaskTimeoutError(message: string, timeoutMs: number): ScreenerError {
  return new ScreenerError('TASK_TIMEOUT', `${message || 'Task'} timed out after ${timeoutMs}ms`, {
    httpStatus: 504,
  });
}

function readField(err: object, key: string): unknown {
  return Reflect.get(err, key);
}

/**
 * Returns true if `err` represents a request-abort signal: an AbortError by
 * name, an HTTP 499 status, or an error message containing "aborted" /
 * "aborterror" (case-insensitive).
 */
export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const name = String(readField(err, 'name') || '');
  const message = String(readField(err, 'message') || '');
  return name === 'AbortError' || Number(readField(err, 'httpStatus')) === 499 || /aborted|aborterror/i.test(message);
}

export function isTaskTimeoutError(err: unknown): boolean {
  return err instanceof ScreenerError && err.code === 'TASK_TIMEOUT';
}

export function isLedgerWriteError(err: unknown): err is LedgerWriteError {
  return err instanceof LedgerWriteError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
