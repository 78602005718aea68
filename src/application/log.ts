import type { BaseLogger } from 'pino';

/** Logging surface used by the delivery core. Satisfied by pino loggers and `fastify.log`. */
export type Log = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;
