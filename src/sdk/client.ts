/* ------------------------------------------------------------------ */
/*  Producer-side client for the relay's ingestion routes.             */
/*                                                                     */
/*  Sending never throws: a refused or failed request is logged and    */
/*  reported as `false`, so game code can fire and forget.             */
/* ------------------------------------------------------------------ */

import type { Log } from '../application/log.js';
import type { EventPayload, InstallEventPayload, PurchaseEventPayload } from './events.js';
import { healthResponseSchema } from './types.js';
import type { HealthResponse } from './types.js';

export interface EventRelayClientOptions {
  baseUrl: string;
  apiKey: string;
  /** Per-request timeout. */
  timeoutMs?: number;
  log?: Log;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export class EventRelayClient {
  readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly log: Log | undefined;

  constructor(opts: EventRelayClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.apiKey = opts.apiKey;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = opts.log;
  }

  sendInstallEvent(event: InstallEventPayload): Promise<boolean> {
    return this.send('/events/install', event, [event.event_id]);
  }

  sendPurchaseEvent(event: PurchaseEventPayload): Promise<boolean> {
    return this.send('/events/purchase', event, [event.event_id]);
  }

  sendBatch(events: readonly EventPayload[]): Promise<boolean> {
    return this.send('/events/batch', events, events.map((e) => e.event_id));
  }

  /** True when the relay answers its health route at all, degraded or not. */
  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/health`, { signal: AbortSignal.timeout(this.timeoutMs) });
      return res.ok;
    } catch (err: unknown) {
      this.log?.warn({ err }, 'Event relay health check failed');
      return false;
    }
  }

  /** Full health report. Throws on a non-OK response or an unexpected body. */
  async getHealth(): Promise<HealthResponse> {
    const res = await fetch(`${this.baseUrl}/health`, { signal: AbortSignal.timeout(this.timeoutMs) });
    if (!res.ok) {
      throw new Error(`API ${res.status}: ${res.statusText}`);
    }
    return healthResponseSchema.parse(await res.json());
  }

  private async send(path: string, body: unknown, eventIds: string[]): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      // 202 from this relay; 200 from older ingestion endpoints.
      if (res.status === 202 || res.status === 200) {
        this.log?.info({ event_ids: eventIds }, 'Events sent');
        return true;
      }

      this.log?.error({ status: res.status, path, event_ids: eventIds }, 'Event relay refused events');
      return false;
    } catch (err: unknown) {
      this.log?.error({ err, path, event_ids: eventIds }, 'Event relay request failed');
      return false;
    }
  }
}
