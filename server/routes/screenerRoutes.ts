import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import type { EmaUpdateOrchestrator } from '../orchestrators/emaUpdateOrchestrator.js';
import type { ScreenerService } from '../services/screenerService.js';
import type { SchedulerState } from '../services/schedulerService.js';
import { rejectUnauthorized } from '../routeGuards.js';
import { moduleLogger } from '../logger.js';

const log = moduleLogger('screenerRoutes');

export interface ScreenerRoutesOptions {
  app: FastifyInstance;
  screener: Pick<ScreenerService, 'getSnapshotAll'>;
  orchestrator: Pick<EmaUpdateOrchestrator, 'triggerUpdate' | 'requestStop' | 'getStatus'>;
  updateSecret?: string;
  getSchedulerState?: () => SchedulerState;
}

const emaDataQuerySchema = z.object({
  band_pct: z.coerce.number().min(0).max(1000).optional(),
  position: z.enum(['above', 'below', 'warming_up']).optional(),
  search: z.string().trim().max(40).optional(),
  sort: z.enum(['instrument', 'distance_pct', 'last_close', 'ema_value']).optional(),
  order: z.enum(['asc', 'desc']).optional(),
});

const secretQuerySchema = z.object({
  secret: z.string().optional(),
});

export function registerScreenerRoutes(options: ScreenerRoutesOptions): void {
  const { app, screener, orchestrator, updateSecret, getSchedulerState } = options;
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.get(
    '/api/ema-data',
    {
      schema: {
        querystring: emaDataQuerySchema,
      },
    },
    async (request, reply) => {
      const q = request.query;
      const snapshot = await screener.getSnapshotAll({
        bandPct: q.band_pct,
        position: q.position,
        search: q.search,
        sort: q.sort,
        order: q.order,
      });
      return reply.send(snapshot);
    },
  );

  typedApp.get('/api/status', async (_request, reply) => {
    const status = await orchestrator.getStatus();
    const scheduler = getSchedulerState ? getSchedulerState() : { enabled: false, nextRunUtc: null };
    return reply.send({ ...status, scheduler });
  });

  typedApp.post(
    '/api/update',
    {
      schema: {
        querystring: secretQuerySchema,
      },
    },
    async (request, reply) => {
      if (rejectUnauthorized(request, reply, request.query.secret, updateSecret)) return reply;
      const result = await orchestrator.triggerUpdate();
      log.info(`Manual update trigger: started=${result.started} reason=${result.reason}`);
      const statusCode = result.started ? 202 : result.reason === 'already_running' ? 409 : 200;
      return reply.code(statusCode).send({
        started: result.started,
        reason: result.reason,
        trade_date: result.tradeDate,
      });
    },
  );

  typedApp.post(
    '/api/update/stop',
    {
      schema: {
        querystring: secretQuerySchema,
      },
    },
    async (request, reply) => {
      if (rejectUnauthorized(request, reply, request.query.secret, updateSecret)) return reply;
      const stopRequested = orchestrator.requestStop();
      return reply.code(stopRequested ? 202 : 200).send({ stop_requested: stopRequested });
    },
  );
}
