import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

export const APP_VERSION = '1.0.0';

/**
 * GET /        — service banner
 * GET /health  — sink reachability and delivery health
 *
 * Health always answers 200; `status` is "degraded" when the sink check
 * fails or the circuit breaker is not closed.
 */
async function systemRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get('/', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({ message: 'Event Relay', version: APP_VERSION });
  });

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const { sink, coordinator } = fastify.delivery;
    const sinkHealthy = await sink.healthCheck();
    const status = coordinator.status();

    return reply.status(200).send({
      status: sinkHealthy && status.circuit.state === 'closed' ? 'healthy' : 'degraded',
      sink: { name: sink.name, healthy: sinkHealthy },
      circuit: status.circuit.state,
      dead_letters: status.deadLetters.size,
      version: APP_VERSION,
      timestamp: new Date().toISOString(),
    });
  });
}

export default fp(systemRoutes, {
  name: 'system-routes',
  dependencies: ['delivery'],
  fastify: '5.x',
});
