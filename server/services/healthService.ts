async function checkDatabaseReady(ping: (() => Promise<void>) | null): Promise<{ ok: boolean | null; error?: string }> {
  if (!ping) return { ok: null };
  try {
    await ping();
    return { ok: true };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: message };
  }
}

interface HealthPayloadOptions {
  isShuttingDown: boolean;
  nowIso: string;
  uptimeSeconds: number;
}

function buildHealthPayload(options: HealthPayloadOptions) {
  const { isShuttingDown, nowIso, uptimeSeconds } = options;
  return {
    status: 'ok',
    timestamp: nowIso,
    uptimeSeconds,
    shuttingDown: isShuttingDown,
  };
}

interface ReadyPayloadOptions {
  ping: () => Promise<void>;
  isShuttingDown: boolean;
  updateRunning: boolean;
  /** Session the cache should reflect right now. */
  expectedTradeDate: string | null;
  lastSuccessDate: string | null;
  instrumentCount: number;
}

async function buildReadyPayload(options: ReadyPayloadOptions) {
  const { ping, isShuttingDown, updateRunning, expectedTradeDate, lastSuccessDate, instrumentCount } = options;

  const primaryDb = await checkDatabaseReady(ping);
  const ready = !isShuttingDown && primaryDb.ok === true;

  // Degraded: serving, but the cache lags the last completed session.
  const warnings: string[] = [];
  if (expectedTradeDate && (!lastSuccessDate || lastSuccessDate < expectedTradeDate) && !updateRunning) {
    warnings.push(`EMA cache is stale: last success ${lastSuccessDate || 'never'}, expected ${expectedTradeDate}`);
  }
  if (instrumentCount === 0) warnings.push('instrument universe is empty');

  const degraded = warnings.length > 0;
  const statusCode = !ready ? 503 : 200;

  return {
    statusCode,
    body: {
      ready,
      degraded,
      shuttingDown: isShuttingDown,
      primaryDb: primaryDb.ok,
      updateRunning,
      lastSuccessDate,
      expectedTradeDate,
      instrumentCount,
      warnings: degraded ? warnings : undefined,
      errors: {
        primaryDb: primaryDb.error || null,
      },
    },
  };
}

export { checkDatabaseReady, buildHealthPayload, buildReadyPayload };
