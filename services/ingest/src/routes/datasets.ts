import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import { tableToRecords } from '../datasets/table';
import type { AppContext } from '../types';

const queryBodySchema = z.object({
  request: z.unknown(),
  onMissing: z.enum(['fail', 'skip']).default('fail'),
  limit: z.number().int().positive().optional()
});

export const registerDatasetRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.post('/datasets/query', async (request) => {
    const body = queryBodySchema.parse(request.body ?? {});
    const result = await ctx.scanner.retrieve(body.request, { onMissing: body.onMissing });
    const rows = tableToRecords(result.table);

    return {
      kind: result.kind,
      rowCount: result.table.rowCount,
      schema: result.table.schema,
      partitions: result.partitions,
      missing: result.missing,
      rows: body.limit === undefined ? rows : rows.slice(0, body.limit)
    };
  });
};
