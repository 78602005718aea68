import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ZodError } from 'zod';
import {
  eventBatchSchema,
  installEventSchema,
  purchaseEventSchema,
  toEventRecord,
} from '../../application/index.js';
import type { Batch } from '../../domain/index.js';
import { createApiKeyGuard, errorBody } from './auth.js';

export interface EventRoutesOptions {
  apiKey: string;
  maxBatchSize: number;
}

/**
 * Registers the event ingestion routes.
 *
 * POST /events/install   — single install event
 * POST /events/purchase  — single purchase event
 * POST /events/batch     — tagged events, at most `maxBatchSize`
 *
 * Accepted events are handed to the delivery queue and answered with 202:
 * the response says the relay took responsibility, not that the sink
 * has the data yet.
 */
async function eventRoutes(fastify: FastifyInstance, opts: EventRoutesOptions): Promise<void> {
  const guard = createApiKeyGuard(opts.apiKey);
  const batchSchema = eventBatchSchema(opts.maxBatchSize);

  /** Hands a batch to the queue; 503 when the queue refuses it. */
  function accept(reply: FastifyReply, batch: Batch, body: Record<string, unknown>) {
    if (!fastify.delivery.queue.push(batch)) {
      fastify.log.warn({ event_ids: batch.map((r) => r.event_id) }, 'Delivery queue full, refusing events');
      return reply.status(503).send(errorBody('QueueFull', 'Delivery queue is full, retry later'));
    }
    return reply.status(202).send({ success: true, ...body, timestamp: new Date().toISOString() });
  }

  fastify.post(
    '/events/install',
    { preHandler: guard },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = installEventSchema.safeParse(request.body);
      if (!parsed.success) return reply.status(400).send(validationError(parsed.error));

      const record = toEventRecord(parsed.data);
      request.log.info({ event_id: record.event_id }, 'Install event received');
      return accept(reply, [record], { event_id: record.event_id, message: 'Install event received' });
    },
  );

  fastify.post(
    '/events/purchase',
    { preHandler: guard },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = purchaseEventSchema.safeParse(request.body);
      if (!parsed.success) return reply.status(400).send(validationError(parsed.error));

      const record = toEventRecord(parsed.data);
      request.log.info({ event_id: record.event_id }, 'Purchase event received');
      return accept(reply, [record], { event_id: record.event_id, message: 'Purchase event received' });
    },
  );

  /**
   * Batch ingestion. The full array is validated up-front; any invalid
   * item rejects the whole request.
   */
  fastify.post(
    '/events/batch',
    { preHandler: guard },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = batchSchema.safeParse(request.body);
      if (!parsed.success) return reply.status(400).send(validationError(parsed.error));

      const batch = parsed.data.map(toEventRecord);
      request.log.info({ count: batch.length }, 'Event batch received');
      return accept(reply, batch, { count: batch.length, event_ids: batch.map((r) => r.event_id) });
    },
  );
}

function validationError(error: ZodError) {
  return {
    ...errorBody('ValidationError', 'Validation failed'),
    issues: error.issues,
  };
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['delivery'],
  fastify: '5.x',
});
