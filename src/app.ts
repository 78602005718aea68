import Fastify from 'fastify';
import type { FastifyError, FastifyInstance, FastifyServerOptions } from 'fastify';
import { deliveryPlugin, redisPlugin } from './infrastructure/index.js';
import type { AppConfig, DeliveryPluginOptions } from './infrastructure/index.js';
import { adminRoutes, eventRoutes, systemRoutes } from './interfaces/http/index.js';
import { errorBody } from './interfaces/http/auth.js';

export interface BuildAppOptions {
  config: AppConfig;
  /** Defaults to a pino logger at `config.server.logLevel`. */
  logger?: FastifyServerOptions['logger'];
  /** Overrides for the delivery core (sink, clock, randomness, sleep). */
  delivery?: Omit<DeliveryPluginOptions, 'config'>;
}

/**
 * Builds the Fastify application without listening.
 *
 * Order:
 * 1) Error envelope
 * 2) Infrastructure plugins (Redis only when the Redis sink is in use)
 * 3) Delivery core
 * 4) HTTP routes
 */
export async function buildApp(opts: BuildAppOptions): Promise<FastifyInstance> {
  const { config } = opts;

  const fastify = Fastify({
    logger: opts.logger ?? { level: config.server.logLevel },
  });

  fastify.setErrorHandler<FastifyError>((err, request, reply) => {
    const statusCode = err.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err }, 'Request failed');
      return reply.status(statusCode).send(errorBody('InternalServerError', 'Internal server error'));
    }
    return reply.status(statusCode).send(errorBody(err.code, err.message));
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  const sinkOverride = opts.delivery?.sink;
  if (config.delivery.sink.kind === 'redis' && !sinkOverride) {
    await fastify.register(redisPlugin, { url: config.redisUrl });
  }

  await fastify.register(deliveryPlugin, { ...opts.delivery, config: config.delivery });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(systemRoutes);
  await fastify.register(eventRoutes, {
    apiKey: config.apiKey,
    maxBatchSize: config.delivery.maxBatchSize,
  });
  await fastify.register(adminRoutes, { apiKey: config.apiKey });

  return fastify;
}
