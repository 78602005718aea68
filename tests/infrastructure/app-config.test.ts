import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from '../../src/infrastructure/config/app-config.js';

describe('loadConfig', () => {
  it('applies defaults for everything but the API key', () => {
    const config = loadConfig({ API_KEY: 'test-secret' });

    expect(config).toEqual({
      server: { host: '0.0.0.0', port: 8000, logLevel: 'info' },
      apiKey: 'test-secret',
      redisUrl: 'redis://localhost:6379',
      delivery: {
        sink: { kind: 'mock', streamKey: 'app_events', maxLen: undefined, timeoutMs: 10_000 },
        maxBatchSize: 500,
        retry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 5000, jitter: 0.2 },
        circuit: { failureThreshold: 5, cooldownMs: 30_000 },
        deadLetter: { capacity: 10_000, maxReplayAttempts: 3 },
        queue: { concurrency: 8, capacity: 1000 },
      },
    });
  });

  it('coerces numeric overrides', () => {
    const config = loadConfig({
      API_KEY: 'test-secret',
      PORT: '9000',
      DELIVERY_SINK: 'redis',
      SINK_STREAM_MAXLEN: '50000',
      RETRY_MAX_ATTEMPTS: '5',
      RETRY_JITTER: '0',
      CIRCUIT_COOLDOWN_MS: '0',
    });

    expect(config.server.port).toBe(9000);
    expect(config.delivery.sink).toMatchObject({ kind: 'redis', maxLen: 50_000 });
    expect(config.delivery.retry).toMatchObject({ maxAttempts: 5, jitter: 0 });
    expect(config.delivery.circuit.cooldownMs).toBe(0);
  });

  it('treats empty strings as unset', () => {
    expect(loadConfig({ API_KEY: 'test-secret', PORT: '' }).server.port).toBe(8000);
  });

  it('requires an API key', () => {
    expect(() => loadConfig({})).toThrow(ZodError);
    expect(() => loadConfig({ API_KEY: '' })).toThrow(ZodError);
  });

  it.each([
    ['DELIVERY_SINK', 'firehose'],
    ['RETRY_MAX_ATTEMPTS', '0'],
    ['RETRY_JITTER', '1'],
    ['MAX_BATCH_SIZE', 'many'],
    ['PORT', '70000'],
  ])('rejects %s=%s', (key, value) => {
    expect(() => loadConfig({ API_KEY: 'test-secret', [key]: value })).toThrow(ZodError);
  });

  it('rejects a base delay above the max delay', () => {
    expect(() =>
      loadConfig({ API_KEY: 'test-secret', RETRY_BASE_DELAY_MS: '6000', RETRY_MAX_DELAY_MS: '5000' }),
    ).toThrow('RETRY_BASE_DELAY_MS must not exceed RETRY_MAX_DELAY_MS');
  });
});
