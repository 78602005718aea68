import { pino } from 'pino';
import { buildApp } from './app.js';
import { loadConfig } from './infrastructure/index.js';

/**
 * Bootstrap the relay.
 *
 * Configuration errors are fatal: the process exits before listening.
 * SIGINT / SIGTERM close Fastify, which drains the delivery queue.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const fastify = await buildApp({ config });

  let closing = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (closing) return;
    closing = true;
    fastify.log.info({ signal }, 'Shutting down...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });
}

main().catch((err: unknown) => {
  pino().fatal({ err }, 'Fatal: failed to start server');
  process.exit(1);
});
