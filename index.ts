import 'dotenv/config';
import logger from './server/logger.js';
import {
  PORT,
  HOST,
  DATABASE_URL,
  DB_SSL_REJECT_UNAUTHORIZED,
  INSTRUMENTS_FILE,
  LEDGER_RETENTION_RUNS,
  EXCHANGE_TIMEZONE,
  MARKET_CLOSE_CUTOFF,
  MARKET_HOLIDAYS,
  EMA_PERIOD,
  MARKET_DATA_BASE_URL,
  MARKET_DATA_HISTORY_PATH,
  FETCH_MIN_INTERVAL_MS,
  FETCH_SESSION_REFRESH_CALLS,
  FETCH_MAX_ATTEMPTS,
  FETCH_RETRY_BASE_MS,
  FETCH_TIMEOUT_MS,
  HISTORY_LOOKBACK_DAYS,
  RUN_MAX_INSTRUMENT_ATTEMPTS,
  RUN_LOCK_TTL_MS,
  SCHEDULER_ENABLED,
  SCHEDULER_DELAY_MINUTES,
  UPDATE_ON_STARTUP,
  UPDATE_TRIGGER_SECRET,
  validateStartupEnvironment,
} from './server/config.js';
import { createDb, type DbHandle } from './server/db.js';
import { runMigrations } from './server/db/migrate.js';
import { registerDefaultMetrics, metricsRegistry } from './server/metrics.js';
import { buildApp } from './server/app.js';
import { TradingCalendar } from './server/services/tradingCalendar.js';
import { loadInstrumentRegistry } from './server/services/instrumentRegistry.js';
import { HistoryStore } from './server/services/historyStore.js';
import { EmaCache } from './server/services/emaCache.js';
import { ProgressLedger } from './server/services/progressLedger.js';
import { RunMarkerStore } from './server/services/runMarkerStore.js';
import { MarketDataClient } from './server/services/marketDataClient.js';
import { ScreenerService } from './server/services/screenerService.js';
import { UpdateScheduler } from './server/services/schedulerService.js';
import { buildHealthPayload, buildReadyPayload } from './server/services/healthService.js';
import { EmaUpdateOrchestrator } from './server/orchestrators/emaUpdateOrchestrator.js';
import type { FastifyInstance } from 'fastify';

const startedAtMs = Date.now();
let isShuttingDown = false;
let dbHandle: DbHandle | null = null;
let server: FastifyInstance | null = null;
let scheduler: UpdateScheduler | null = null;
let orchestrator: EmaUpdateOrchestrator | null = null;

async function startServer(): Promise<void> {
  validateStartupEnvironment();
  registerDefaultMetrics();

  const handle = createDb({
    databaseUrl: DATABASE_URL,
    sslRejectUnauthorized: DB_SSL_REJECT_UNAUTHORIZED,
  });
  dbHandle = handle;
  await runMigrations(handle.db);
  logger.info('Database ready');

  const calendar = new TradingCalendar({
    timeZone: EXCHANGE_TIMEZONE,
    cutoffTime: MARKET_CLOSE_CUTOFF,
    holidays: MARKET_HOLIDAYS,
  });
  const registry = await loadInstrumentRegistry(INSTRUMENTS_FILE);
  const history = new HistoryStore(handle.db);
  const emaCache = new EmaCache(handle.db, history, { period: EMA_PERIOD });
  const ledger = new ProgressLedger(handle.db, { retentionRuns: LEDGER_RETENTION_RUNS });
  const marker = new RunMarkerStore(handle.db, { cutoffTime: MARKET_CLOSE_CUTOFF });
  const fetcher = new MarketDataClient({
    baseUrl: MARKET_DATA_BASE_URL,
    historyPath: MARKET_DATA_HISTORY_PATH,
    calendar,
    minIntervalMs: FETCH_MIN_INTERVAL_MS,
    sessionRefreshCalls: FETCH_SESSION_REFRESH_CALLS,
    maxAttempts: FETCH_MAX_ATTEMPTS,
    retryBaseMs: FETCH_RETRY_BASE_MS,
    timeoutMs: FETCH_TIMEOUT_MS,
    lookbackDays: HISTORY_LOOKBACK_DAYS,
  });

  const updates = new EmaUpdateOrchestrator({
    registry,
    history,
    fetcher,
    emaCache,
    ledger,
    marker,
    calendar,
    maxInstrumentAttempts: RUN_MAX_INSTRUMENT_ATTEMPTS,
    lockTtlMs: RUN_LOCK_TTL_MS,
  });
  orchestrator = updates;
  const screener = new ScreenerService(emaCache, marker);

  const updateScheduler = new UpdateScheduler({
    trigger: () => updates.triggerUpdate(),
    calendar,
    delayMinutes: SCHEDULER_DELAY_MINUTES,
    enabled: SCHEDULER_ENABLED,
  });
  scheduler = updateScheduler;

  const app = buildApp({
    screener,
    orchestrator: updates,
    updateSecret: UPDATE_TRIGGER_SECRET,
    getSchedulerState: () => updateScheduler.getState(),
    getHealthPayload: () =>
      buildHealthPayload({
        isShuttingDown,
        nowIso: new Date().toISOString(),
        uptimeSeconds: Math.floor((Date.now() - startedAtMs) / 1000),
      }),
    getReadyPayload: async () => {
      const markerState = await marker.read();
      return buildReadyPayload({
        ping: () => handle.ping(),
        isShuttingDown,
        updateRunning: updates.runState.isRunning,
        expectedTradeDate: calendar.latestCompletedSession(new Date()),
        lastSuccessDate: markerState.lastSuccessDate,
        instrumentCount: registry.size,
      });
    },
    getMetricsPayload: async () => ({
      contentType: metricsRegistry.contentType,
      body: await metricsRegistry.metrics(),
    }),
  });
  server = app;

  await app.listen({ port: PORT, host: HOST });
  logger.info(`Server running on port ${PORT}`);

  updateScheduler.start();
  if (UPDATE_ON_STARTUP) {
    updateScheduler.runCatchUp().catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`Startup catch-up failed: ${message}`);
    });
  }
}

async function shutdownServer(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info(`Received ${signal}; shutting down gracefully...`);

  if (scheduler) scheduler.stop();
  // Stop the in-flight run; its ledger stays open and resumes on next start.
  if (orchestrator) orchestrator.requestStop();

  const forceExitTimer = setTimeout(() => {
    logger.error('Graceful shutdown timed out; forcing exit');
    process.exit(1);
  }, 15000);
  forceExitTimer.unref();

  try {
    if (server) await server.close();
    if (orchestrator) await orchestrator.waitForIdle();
    logger.info('HTTP server closed; closing database...');
    if (dbHandle) await dbHandle.close();
    logger.info('Shutdown complete');
    clearTimeout(forceExitTimer);
    process.exit(0);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`Graceful shutdown failed: ${message}`);
    clearTimeout(forceExitTimer);
    process.exit(1);
  }
}

process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled promise rejection');
});
process.on('uncaughtException', (err) => {
  logger.error({ err }, 'Uncaught exception');
  void shutdownServer('uncaughtException');
});
process.on('SIGINT', () => {
  void shutdownServer('SIGINT');
});
process.on('SIGTERM', () => {
  void shutdownServer('SIGTERM');
});

startServer().catch((err: unknown) => {
  logger.error({ err }, 'Fatal: startup failed, exiting.');
  process.exit(1);
});
