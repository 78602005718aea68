import type { Redis } from 'ioredis';
import type { Log } from '../../application/log.js';
import { MockSink } from './mock-sink.js';
import { RedisStreamSink } from './redis-stream-sink.js';
import type { DeliverySink, SinkKind } from './types.js';

export interface SinkSettings {
  kind: SinkKind;
  streamKey: string;
  maxLen?: number | undefined;
}

/**
 * Builds the configured sink. Nothing here reads the environment.
 */
export function createSink(
  settings: SinkSettings,
  log: Log,
  redis?: Redis,
): DeliverySink {
  switch (settings.kind) {
    case 'mock':
      log.info('Using in-memory mock sink');
      return new MockSink();

    case 'redis':
      if (!redis) {
        throw new Error('Redis sink selected but no Redis connection was provided');
      }
      log.info({ stream: settings.streamKey }, 'Using Redis Stream sink');
      return new RedisStreamSink({
        redis,
        streamKey: settings.streamKey,
        maxLen: settings.maxLen,
        log,
      });
  }
}
