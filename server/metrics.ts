import client from 'prom-client';

let defaultMetricsRegistered = false;

/** Process metrics (memory, CPU, event loop). Called once from the bootstrap. */
export function registerDefaultMetrics(): void {
  if (defaultMetricsRegistered) return;
  defaultMetricsRegistered = true;
  client.collectDefaultMetrics({
    labels: { app: 'ema-screener' },
  });
}

export const updateRunsTotal = new client.Counter({
  name: 'ema_update_runs_total',
  help: 'Update runs by final outcome',
  labelNames: ['outcome'],
});

export const instrumentOutcomesTotal = new client.Counter({
  name: 'ema_instrument_outcomes_total',
  help: 'Per-instrument processing outcomes within update runs',
  labelNames: ['status'],
});

export const marketDataRequestsTotal = new client.Counter({
  name: 'market_data_requests_total',
  help: 'Outbound market-data history requests by result',
  labelNames: ['result'],
});

export const marketDataSessionRefreshesTotal = new client.Counter({
  name: 'market_data_session_refreshes_total',
  help: 'Session warm-ups performed against the market-data source',
});

export const lastSuccessfulUpdateGauge = new client.Gauge({
  name: 'ema_last_successful_update_timestamp_seconds',
  help: 'Unix time of the last finalized update run',
});

export const httpRequestDurationSeconds = new client.Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
});

export const metricsRegistry = client.register;
