import fp from 'fastify-plugin';
import { z } from 'zod';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { createApiKeyGuard, errorBody } from './auth.js';

export interface AdminRoutesOptions {
  apiKey: string;
}

const replayQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(10_000).default(100),
});

/**
 * Operational tooling.
 *
 * GET  /admin/delivery              — circuit state, dead letter size, totals, queue
 * POST /admin/dead-letters/replay   — re-deliver up to `limit` dead letter entries
 *
 * Replay is never triggered automatically.
 */
async function adminRoutes(fastify: FastifyInstance, opts: AdminRoutesOptions): Promise<void> {
  const guard = createApiKeyGuard(opts.apiKey);

  fastify.get(
    '/admin/delivery',
    { preHandler: guard },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { coordinator, queue } = fastify.delivery;
      return reply.status(200).send({ ...coordinator.status(), queue: queue.stats() });
    },
  );

  fastify.post(
    '/admin/dead-letters/replay',
    { preHandler: guard },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = replayQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send(errorBody('ValidationError', 'limit must be an integer between 1 and 10000'));
      }

      request.log.info({ limit: parsed.data.limit }, 'Dead letter replay requested');
      const report = await fastify.delivery.coordinator.replay(parsed.data.limit);
      return reply.status(200).send(report);
    },
  );
}

export default fp(adminRoutes, {
  name: 'admin-routes',
  dependencies: ['delivery'],
  fastify: '5.x',
});
