import fastify, {
  type FastifyBaseLogger,
  type FastifyInstance,
  type RawReplyDefaultExpression,
  type RawRequestDefaultExpression,
  type RawServerDefault
} from 'fastify';

import type { ServiceConfig } from './config/serviceConfig';
import { mapErrorToResponse } from './errors';
import { registerDatasetRoutes } from './routes/datasets';
import { registerHealthRoutes } from './routes/health';
import { registerJobRoutes } from './routes/jobs';
import { createRuntime, type IngestRuntime, type RuntimeOverrides } from './runtime';
import type { AppContext } from './types';

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
  runtime: IngestRuntime;
}

export const createApp = async (config: ServiceConfig, overrides: RuntimeOverrides = {}): Promise<CreateAppResult> => {
  const runtime = createRuntime(config, overrides);
  const app = fastify<
    RawServerDefault,
    RawRequestDefaultExpression<RawServerDefault>,
    RawReplyDefaultExpression<RawServerDefault>,
    FastifyBaseLogger
  >({ logger: runtime.logger });

  const ctx: AppContext = {
    config,
    dispatcher: runtime.dispatcher,
    scanner: runtime.scanner,
    readiness: runtime.readiness,
    metrics: runtime.metrics
  };
  ctx.metrics.readinessGauge.set({ component: 'provider' }, 0);

  registerHealthRoutes(app, ctx);
  registerJobRoutes(app, ctx);
  registerDatasetRoutes(app, ctx);

  app.setErrorHandler((error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    reply.status(mapped.statusCode).send({ code: mapped.code, message: mapped.message, details: mapped.details });
  });

  app.addHook('onClose', async () => {
    runtime.close();
    await runtime.pool.onIdle();
  });

  return { app, ctx, runtime };
};
