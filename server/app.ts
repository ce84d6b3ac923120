import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import { registerScreenerRoutes, type ScreenerRoutesOptions } from './routes/screenerRoutes.js';
import { registerHealthRoutes } from './routes/healthRoutes.js';
import { createRequestId, shouldLogRequestPath } from './middleware.js';
import { httpRequestDurationSeconds } from './metrics.js';
import { moduleLogger } from './logger.js';

const log = moduleLogger('http');

export interface AppDeps extends Omit<ScreenerRoutesOptions, 'app'> {
  getHealthPayload: () => Record<string, unknown>;
  getReadyPayload: () => Promise<{ statusCode: number; body: Record<string, unknown> }>;
  getMetricsPayload: () => Promise<{ contentType: string; body: string }>;
}

export function buildApp(deps: AppDeps): FastifyInstance {
  const app = Fastify({
    logger: false,
    genReqId: () => createRequestId(),
  });
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.addHook('onResponse', async (request, reply) => {
    const route = request.routeOptions.url || 'unmatched';
    const durationMs = reply.elapsedTime;
    httpRequestDurationSeconds.observe(
      { method: request.method, route, status_code: String(reply.statusCode) },
      durationMs / 1000,
    );
    if (shouldLogRequestPath(request.url.split('?')[0])) {
      log.info(
        { reqId: request.id, method: request.method, path: request.url, status: reply.statusCode, durationMs: Math.round(durationMs) },
        'request completed',
      );
    }
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.validation || error.code === 'FST_ERR_VALIDATION') {
      return reply.code(400).send({ error: 'Invalid request', details: error.message });
    }
    log.error({ err: error, reqId: request.id, path: request.url }, 'Unhandled route error');
    const statusCode = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
    return reply.code(statusCode).send({ error: statusCode === 500 ? 'Internal server error' : error.message });
  });

  registerScreenerRoutes({
    app,
    screener: deps.screener,
    orchestrator: deps.orchestrator,
    updateSecret: deps.updateSecret,
    getSchedulerState: deps.getSchedulerState,
  });
  registerHealthRoutes({
    app,
    getHealthPayload: deps.getHealthPayload,
    getReadyPayload: deps.getReadyPayload,
    getMetricsPayload: deps.getMetricsPayload,
  });

  return app;
}
