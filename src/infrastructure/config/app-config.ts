import { z } from 'zod';
import { SINK_KINDS } from '../sink/types.js';
import type { SinkKind } from '../sink/types.js';

/**
 * Application configuration, read from environment variables.
 */
export interface AppConfig {
  server: { host: string; port: number; logLevel: string };
  apiKey: string;
  redisUrl: string;
  delivery: DeliveryConfig;
}

export interface DeliveryConfig {
  sink: { kind: SinkKind; streamKey: string; maxLen: number | undefined; timeoutMs: number };
  maxBatchSize: number;
  retry: { maxAttempts: number; baseDelayMs: number; maxDelayMs: number; jitter: number };
  circuit: { failureThreshold: number; cooldownMs: number };
  deadLetter: { capacity: number; maxReplayAttempts: number };
  queue: { concurrency: number; capacity: number };
}

const int = (min: number) => z.coerce.number().int().min(min);

const envSchema = z
  .object({
    HOST: z.string().min(1).default('0.0.0.0'),
    PORT: int(0).max(65535).default(8000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    API_KEY: z.string().min(1, 'API_KEY must be set'),
    REDIS_URL: z.string().url().default('redis://localhost:6379'),

    DELIVERY_SINK: z.enum(SINK_KINDS).default('mock'),
    SINK_STREAM_KEY: z.string().min(1).default('app_events'),
    SINK_STREAM_MAXLEN: int(1).optional(),
    SINK_TIMEOUT_MS: int(1).default(10_000),

    MAX_BATCH_SIZE: int(1).default(500),

    RETRY_MAX_ATTEMPTS: int(1).default(3),
    RETRY_BASE_DELAY_MS: int(0).default(100),
    RETRY_MAX_DELAY_MS: int(0).default(5000),
    RETRY_JITTER: z.coerce.number().min(0).lt(1).default(0.2),

    CIRCUIT_FAILURE_THRESHOLD: int(1).default(5),
    CIRCUIT_COOLDOWN_MS: int(0).default(30_000),

    DEAD_LETTER_CAPACITY: int(1).default(10_000),
    DEAD_LETTER_MAX_REPLAYS: int(1).default(3),

    QUEUE_CONCURRENCY: int(1).default(8),
    QUEUE_CAPACITY: int(1).default(1000),
  })
  .refine((env) => env.RETRY_BASE_DELAY_MS <= env.RETRY_MAX_DELAY_MS, {
    message: 'RETRY_BASE_DELAY_MS must not exceed RETRY_MAX_DELAY_MS',
    path: ['RETRY_BASE_DELAY_MS'],
  });

/**
 * Parses and validates the environment. Empty strings count as unset.
 *
 * @throws ZodError when a variable is missing or malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') cleaned[key] = value;
  }

  const e = envSchema.parse(cleaned);

  return {
    server: { host: e.HOST, port: e.PORT, logLevel: e.LOG_LEVEL },
    apiKey: e.API_KEY,
    redisUrl: e.REDIS_URL,
    delivery: {
      sink: {
        kind: e.DELIVERY_SINK,
        streamKey: e.SINK_STREAM_KEY,
        maxLen: e.SINK_STREAM_MAXLEN,
        timeoutMs: e.SINK_TIMEOUT_MS,
      },
      maxBatchSize: e.MAX_BATCH_SIZE,
      retry: {
        maxAttempts: e.RETRY_MAX_ATTEMPTS,
        baseDelayMs: e.RETRY_BASE_DELAY_MS,
        maxDelayMs: e.RETRY_MAX_DELAY_MS,
        jitter: e.RETRY_JITTER,
      },
      circuit: {
        failureThreshold: e.CIRCUIT_FAILURE_THRESHOLD,
        cooldownMs: e.CIRCUIT_COOLDOWN_MS,
      },
      deadLetter: {
        capacity: e.DEAD_LETTER_CAPACITY,
        maxReplayAttempts: e.DEAD_LETTER_MAX_REPLAYS,
      },
      queue: {
        concurrency: e.QUEUE_CONCURRENCY,
        capacity: e.QUEUE_CAPACITY,
      },
    },
  };
}
