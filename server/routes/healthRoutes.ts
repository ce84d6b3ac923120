import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { moduleLogger } from '../logger.js';

const log = moduleLogger('health');

interface HealthRoutesOptions {
  app: FastifyInstance;
  getHealthPayload: () => Record<string, unknown>;
  getReadyPayload: () => Promise<{ statusCode: number; body: Record<string, unknown> }>;
  getMetricsPayload: () => Promise<{ contentType: string; body: string }>;
}

function registerHealthRoutes(options: HealthRoutesOptions): void {
  const { app, getHealthPayload, getReadyPayload, getMetricsPayload } = options;

  if (!app) {
    throw new Error('registerHealthRoutes requires app');
  }

  app.get('/healthz', (_req: FastifyRequest, res: FastifyReply) => {
    return res.code(200).send(getHealthPayload());
  });

  app.get('/readyz', async (_req: FastifyRequest, res: FastifyReply) => {
    try {
      const readyPayload = await getReadyPayload();
      return res.code(readyPayload.statusCode).send(readyPayload.body);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Ready check failed: ${message}`);
      return res.code(503).send({
        ready: false,
        error: 'Ready check failed',
      });
    }
  });

  app.get('/metrics', async (_req: FastifyRequest, res: FastifyReply) => {
    const metrics = await getMetricsPayload();
    return res.code(200).header('content-type', metrics.contentType).send(metrics.body);
  });
}

export { registerHealthRoutes };
