import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import type { AppContext } from '../types';

const submitBodySchema = z.object({
  request: z.unknown(),
  mode: z.enum(['async', 'sync']).default('async')
});

const jobParamsSchema = z.object({
  submissionId: z.string().trim().min(1)
});

export const registerJobRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.get('/jobs', async () => ({ submissions: ctx.dispatcher.list() }));

  app.post('/jobs', async (request, reply) => {
    const body = submitBodySchema.parse(request.body ?? {});
    const submission = await ctx.dispatcher.submit(body.request, { mode: body.mode });
    const snapshot = ctx.dispatcher.poll(submission.id);
    return reply.status(body.mode === 'sync' ? 200 : 202).send(snapshot);
  });

  app.get('/jobs/:submissionId', async (request) => {
    const { submissionId } = jobParamsSchema.parse(request.params);
    return ctx.dispatcher.poll(submissionId);
  });

  app.delete('/jobs/:submissionId', async (request) => {
    const { submissionId } = jobParamsSchema.parse(request.params);
    return ctx.dispatcher.cancel(submissionId);
  });
};
