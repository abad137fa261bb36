import type { FastifyInstance } from 'fastify';

import type { AppContext } from '../types';

export const registerHealthRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    const provider = await ctx.readiness.isReady();
    ctx.metrics.readinessGauge.set({ component: 'provider' }, provider ? 1 : 0);
    const components: Record<string, boolean> = { provider };

    if (!provider) {
      return reply.status(503).send({ status: 'not_ready', components });
    }
    return { status: 'ready', components };
  });

  if (ctx.config.metricsEnabled) {
    app.get('/metrics', async (request, reply) => {
      reply.header('Content-Type', ctx.metrics.register.contentType);
      return ctx.metrics.register.metrics();
    });
  }
};
