import 'dotenv/config';

function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const numeric = Number(raw);
  return Number.isFinite(numeric) ? numeric : fallback;
}

function envFlag(name: string, defaultValue: boolean): boolean {
  const raw = String(process.env[name] ?? '').trim().toLowerCase();
  if (!raw) return defaultValue;
  return raw !== 'false' && raw !== '0' && raw !== 'no' && raw !== 'off';
}

// --- Server ---
export const PORT = Math.max(1, Number(process.env.PORT) || 3000);
export const HOST = String(process.env.HOST || '0.0.0.0').trim();
export const IS_PRODUCTION = String(process.env.NODE_ENV || '').toLowerCase() === 'production';
/** Shared secret for POST /api/update. Empty means the trigger is open. */
export const UPDATE_TRIGGER_SECRET = String(process.env.UPDATE_TRIGGER_SECRET || '').trim();

// --- Storage ---
export const DATABASE_URL = String(process.env.DATABASE_URL || '').trim();
export const DB_SSL_REJECT_UNAUTHORIZED =
  String(process.env.DB_SSL_REJECT_UNAUTHORIZED || (IS_PRODUCTION ? 'true' : 'false')).toLowerCase() !== 'false';
export const INSTRUMENTS_FILE = String(process.env.INSTRUMENTS_FILE || 'data/instruments.csv').trim();
export const LEDGER_RETENTION_RUNS = Math.max(1, Math.floor(Number(process.env.LEDGER_RETENTION_RUNS) || 30));

// --- Exchange calendar ---
export const EXCHANGE_TIMEZONE = String(process.env.EXCHANGE_TIMEZONE || 'Asia/Kolkata').trim();
export const MARKET_CLOSE_CUTOFF = String(process.env.MARKET_CLOSE_CUTOFF || '15:30').trim();
export const MARKET_HOLIDAYS = String(process.env.MARKET_HOLIDAYS || '')
  .split(',')
  .map((item) => item.trim())
  .filter(Boolean);

// --- EMA ---
export const EMA_PERIOD = Math.max(2, Math.floor(Number(process.env.EMA_PERIOD) || 200));

// --- Market data source ---
export const MARKET_DATA_BASE_URL = String(process.env.MARKET_DATA_BASE_URL || 'https://www.nseindia.com').trim();
export const MARKET_DATA_HISTORY_PATH = String(
  process.env.MARKET_DATA_HISTORY_PATH || '/api/historical/cm/equity',
).trim();
/** Minimum delay between any two outbound market-data calls, shared by the whole run. */
export const FETCH_MIN_INTERVAL_MS = Math.max(0, envNumber('FETCH_MIN_INTERVAL_MS', 3_000));
export const FETCH_SESSION_REFRESH_CALLS = Math.max(1, Math.floor(Number(process.env.FETCH_SESSION_REFRESH_CALLS) || 15));
export const FETCH_MAX_ATTEMPTS = Math.max(1, Math.floor(Number(process.env.FETCH_MAX_ATTEMPTS) || 3));
export const FETCH_RETRY_BASE_MS = Math.max(0, envNumber('FETCH_RETRY_BASE_MS', 6_000));
export const FETCH_TIMEOUT_MS = Math.max(1_000, Number(process.env.FETCH_TIMEOUT_MS) || 15_000);
export const HISTORY_LOOKBACK_DAYS = Math.max(30, Math.floor(Number(process.env.HISTORY_LOOKBACK_DAYS) || 400));

// --- Update runs ---
export const RUN_MAX_INSTRUMENT_ATTEMPTS = Math.max(1, Math.floor(Number(process.env.RUN_MAX_INSTRUMENT_ATTEMPTS) || 3));
export const RUN_LOCK_TTL_MS = Math.max(30_000, Number(process.env.RUN_LOCK_TTL_MS) || 10 * 60 * 1000);

// --- Scheduler ---
export const SCHEDULER_ENABLED = envFlag('SCHEDULER_ENABLED', true);
export const SCHEDULER_DELAY_MINUTES = Math.max(0, Math.floor(envNumber('SCHEDULER_DELAY_MINUTES', 5)));
export const UPDATE_ON_STARTUP = envFlag('UPDATE_ON_STARTUP', true);

// --- Startup validation ---
export function validateStartupEnvironment() {
  const errors: string[] = [];
  const warnings: string[] = [];
  const warnIfInvalidPositiveNumber = (name: string) => {
    const raw = process.env[name];
    if (raw === undefined || raw === null || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric <= 0) {
      warnings.push(`${name} should be a positive number (received: ${String(raw)})`);
    }
  };
  const warnIfInvalidNonNegativeNumber = (name: string) => {
    const raw = process.env[name];
    if (raw === undefined || raw === null || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric < 0) {
      warnings.push(`${name} should be a non-negative number (received: ${String(raw)})`);
    }
  };

  if (!/^([01]\d|2[0-3]):[0-5]\d$/.test(MARKET_CLOSE_CUTOFF)) {
    errors.push(`MARKET_CLOSE_CUTOFF must be HH:MM (received: ${MARKET_CLOSE_CUTOFF})`);
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: EXCHANGE_TIMEZONE });
  } catch {
    errors.push(`EXCHANGE_TIMEZONE is not a valid IANA time zone (received: ${EXCHANGE_TIMEZONE})`);
  }
  const badHolidays = MARKET_HOLIDAYS.filter((value) => !/^\d{4}-\d{2}-\d{2}$/.test(value));
  if (badHolidays.length > 0) {
    errors.push(`MARKET_HOLIDAYS contains invalid dates: ${badHolidays.join(', ')}`);
  }
  if (!DATABASE_URL) {
    errors.push('DATABASE_URL is required');
  }
  if (!UPDATE_TRIGGER_SECRET && IS_PRODUCTION) {
    warnings.push('UPDATE_TRIGGER_SECRET is not set; POST /api/update is unprotected');
  }

  const positiveNumericEnvNames = [
    'EMA_PERIOD',
    'FETCH_SESSION_REFRESH_CALLS',
    'FETCH_MAX_ATTEMPTS',
    'FETCH_TIMEOUT_MS',
    'HISTORY_LOOKBACK_DAYS',
    'RUN_MAX_INSTRUMENT_ATTEMPTS',
    'RUN_LOCK_TTL_MS',
    'LEDGER_RETENTION_RUNS',
  ];
  positiveNumericEnvNames.forEach(warnIfInvalidPositiveNumber);
  const nonNegativeNumericEnvNames = ['FETCH_MIN_INTERVAL_MS', 'FETCH_RETRY_BASE_MS', 'SCHEDULER_DELAY_MINUTES'];
  nonNegativeNumericEnvNames.forEach(warnIfInvalidNonNegativeNumber);

  if (warnings.length > 0) {
    for (const warning of warnings) {
      console.warn(`[startup-env] ${warning}`);
    }
  }
  if (errors.length > 0) {
    for (const error of errors) {
      console.error(`[startup-env] ${error}`);
    }
    throw new Error('Startup environment validation failed');
  }
}
