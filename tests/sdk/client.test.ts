import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { EventRelayClient } from '../../src/sdk/client.js';
import { createInstallEvent, createPurchaseEvent } from '../../src/sdk/events.js';
import { fakeLogger } from '../helpers.js';

const fetchMock = vi.fn();
vi.stubGlobal('fetch', fetchMock);

function respond(status: number, body: unknown = {}) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 202 ? 'Accepted' : 'Error',
    json: () => Promise.resolve(body),
  };
}

const context = {
  user_id: 'user-1',
  game_id: 'game-1',
  platform: 'android',
  app_version: '1.0.0',
  session_id: 'session-1',
};

const ids = { idFn: () => 'evt-1' };

let log: ReturnType<typeof fakeLogger>;
let client: EventRelayClient;

beforeEach(() => {
  fetchMock.mockReset();
  log = fakeLogger();
  client = new EventRelayClient({ baseUrl: 'https://relay.test/', apiKey: 'test-secret', log });
});

afterAll(() => {
  vi.unstubAllGlobals();
});

describe('EventRelayClient', () => {
  it('strips the trailing slash from the base URL', () => {
    expect(client.baseUrl).toBe('https://relay.test');
  });

  it('posts an install event with bearer auth', async () => {
    fetchMock.mockResolvedValue(respond(202));
    const event = createInstallEvent(context, ids);

    await expect(client.sendInstallEvent(event)).resolves.toBe(true);

    expect(fetchMock).toHaveBeenCalledWith(
      'https://relay.test/events/install',
      expect.objectContaining({
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
        body: JSON.stringify(event),
      }),
    );
    expect(log.info).toHaveBeenCalledWith({ event_ids: ['evt-1'] }, 'Events sent');
  });

  it('posts purchases and batches to their routes', async () => {
    fetchMock.mockResolvedValue(respond(202));
    const purchase = createPurchaseEvent(
      { ...context, product_id: 'coins_100', product_name: '100 Coins', price: 0.99, currency: 'USD' },
      ids,
    );

    await expect(client.sendPurchaseEvent(purchase)).resolves.toBe(true);
    await expect(client.sendBatch([purchase])).resolves.toBe(true);

    expect(fetchMock.mock.calls.map((c) => c[0])).toEqual([
      'https://relay.test/events/purchase',
      'https://relay.test/events/batch',
    ]);
  });

  it('also treats 200 as accepted', async () => {
    fetchMock.mockResolvedValue(respond(200));
    await expect(client.sendInstallEvent(createInstallEvent(context))).resolves.toBe(true);
  });

  it('returns false and logs when the relay refuses the events', async () => {
    fetchMock.mockResolvedValue(respond(503));

    await expect(client.sendInstallEvent(createInstallEvent(context, ids))).resolves.toBe(false);
    expect(log.error).toHaveBeenCalledWith(
      { status: 503, path: '/events/install', event_ids: ['evt-1'] },
      'Event relay refused events',
    );
  });

  it('returns false when the request fails', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(client.sendInstallEvent(createInstallEvent(context, ids))).resolves.toBe(false);
    expect(log.error).toHaveBeenCalledWith(
      { err: expect.any(TypeError), path: '/events/install', event_ids: ['evt-1'] },
      'Event relay request failed',
    );
  });

  it('healthCheck() reflects reachability', async () => {
    fetchMock.mockResolvedValueOnce(respond(200));
    await expect(client.healthCheck()).resolves.toBe(true);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://relay.test/health');

    fetchMock.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    await expect(client.healthCheck()).resolves.toBe(false);
  });

  it('getHealth() parses the report', async () => {
    const report = {
      status: 'degraded',
      sink: { name: 'redis', healthy: false },
      circuit: 'open',
      dead_letters: 4,
      version: '1.0.0',
      timestamp: '2026-10-19T12:00:00.000Z',
    };
    fetchMock.mockResolvedValue(respond(200, report));

    await expect(client.getHealth()).resolves.toEqual(report);
  });

  it('getHealth() throws on a non-OK response', async () => {
    fetchMock.mockResolvedValue(respond(500));
    await expect(client.getHealth()).rejects.toThrow('API 500: Error');
  });
});
