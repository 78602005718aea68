import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { DeliveryConfig } from '../config/app-config.js';
import type { DeliverySink } from '../sink/types.js';
import { createSink } from '../sink/create-sink.js';
import { CircuitBreaker } from '../../application/circuit-breaker.js';
import { DeadLetterBuffer } from '../../application/dead-letter-buffer.js';
import { DeliveryCoordinator } from '../../application/delivery-coordinator.js';
import type { Sleeper } from '../../application/delivery-coordinator.js';
import { DeliveryQueue } from '../../application/delivery-queue.js';
import { RetryPolicy } from '../../application/retry-policy.js';
import type { RandomSource } from '../../application/retry-policy.js';

export interface DeliveryPluginOptions {
  config: DeliveryConfig;
  /** Overrides the configured sink (tests, embedding). */
  sink?: DeliverySink;
  random?: RandomSource;
  sleep?: Sleeper;
  nowFn?: () => number;
}

export interface DeliveryServices {
  sink: DeliverySink;
  coordinator: DeliveryCoordinator;
  queue: DeliveryQueue;
}

/**
 * Fastify plugin that assembles the delivery core.
 *
 * Decorates `fastify.delivery`. On close the queue is drained: in-flight
 * submissions are cancelled into the dead letter buffer, and whatever is
 * left in the buffer is logged, as it does not outlive the process.
 */
async function deliveryPlugin(fastify: FastifyInstance, opts: DeliveryPluginOptions): Promise<void> {
  const { config } = opts;
  const log = fastify.log.child({ module: 'delivery' });

  const sink = opts.sink ?? createSink(
    config.sink,
    log,
    fastify.hasDecorator('redis') ? fastify.redis : undefined,
  );

  const circuitBreaker = new CircuitBreaker({
    ...config.circuit,
    nowFn: opts.nowFn,
    log,
  });

  const deadLetters = new DeadLetterBuffer({
    ...config.deadLetter,
    nowFn: opts.nowFn,
    log,
  });

  const coordinator = new DeliveryCoordinator({
    sink,
    retryPolicy: new RetryPolicy({ ...config.retry, random: opts.random }),
    circuitBreaker,
    deadLetters,
    log,
    maxBatchSize: config.maxBatchSize,
    sinkTimeoutMs: config.sink.timeoutMs,
    sleep: opts.sleep,
  });

  const queue = new DeliveryQueue({
    handler: coordinator,
    log,
    ...config.queue,
  });

  fastify.decorate('delivery', { sink, coordinator, queue });

  fastify.addHook('onClose', async () => {
    await queue.close();
    const remaining = deadLetters.size();
    if (remaining > 0) {
      log.error({ deadLetters: remaining }, 'Shutting down with undelivered dead letter entries');
    }
  });
}

export default fp(deliveryPlugin, {
  name: 'delivery',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    delivery: DeliveryServices;
  }
}
