import type { Log } from './log.js';
import type { Batch, SubmissionOutcome } from '../domain/index.js';
import type { HandleOptions } from './delivery-coordinator.js';

/** The part of the coordinator the queue drives. */
export interface SubmissionHandler {
  handle(batch: Batch, options?: HandleOptions): Promise<SubmissionOutcome>;
}

export interface DeliveryQueueOptions {
  handler: SubmissionHandler;
  log: Log;
  concurrency: number;
  /** Pending (not yet started) submissions accepted before push() refuses. */
  capacity: number;
}

export interface DeliveryQueueStats {
  pending: number;
  active: number;
  accepted: number;
  refused: number;
  closed: boolean;
}

/**
 * Background dispatch between the request path and the coordinator.
 *
 * The request handler only learns whether the batch was accepted for
 * delivery; the outcome of the delivery itself is logged here.
 */
export class DeliveryQueue {
  private readonly handler: SubmissionHandler;
  private readonly log: Log;
  private readonly concurrency: number;
  private readonly capacity: number;

  private readonly pending: Batch[] = [];
  private readonly controller = new AbortController();
  private readonly idleWaiters: Array<() => void> = [];
  private active = 0;
  private accepted = 0;
  private refused = 0;
  private closed = false;

  constructor(opts: DeliveryQueueOptions) {
    if (!Number.isInteger(opts.concurrency) || opts.concurrency < 1) {
      throw new Error('DeliveryQueue requires concurrency >= 1');
    }
    if (!Number.isInteger(opts.capacity) || opts.capacity < 1) {
      throw new Error('DeliveryQueue requires capacity >= 1');
    }
    this.handler = opts.handler;
    this.log = opts.log;
    this.concurrency = opts.concurrency;
    this.capacity = opts.capacity;
  }

  /** Returns false when closed or full; the caller decides how to report it. */
  push(batch: Batch): boolean {
    if (this.closed || this.pending.length >= this.capacity) {
      this.refused++;
      return false;
    }
    this.pending.push(batch);
    this.accepted++;
    this.pump();
    return true;
  }

  stats(): DeliveryQueueStats {
    return {
      pending: this.pending.length,
      active: this.active,
      accepted: this.accepted,
      refused: this.refused,
      closed: this.closed,
    };
  }

  /** Resolves once nothing is pending or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Stops accepting work and cancels in-flight submissions. Their
   * undelivered sub-batches end up in the dead letter buffer.
   */
  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.controller.abort();
      this.pump();
    }
    await this.onIdle();
  }

  private pump(): void {
    while (this.active < this.concurrency) {
      const batch = this.pending.shift();
      if (!batch) break;
      this.active++;
      void this.run(batch).finally(() => {
        this.active--;
        this.pump();
        this.notifyIdle();
      });
    }
    this.notifyIdle();
  }

  private async run(batch: Batch): Promise<void> {
    const eventIds = batch.map((r) => r.event_id);
    try {
      const outcome = await this.handler.handle(batch, { signal: this.controller.signal });
      const fields = { event_ids: eventIds, attempts: outcome.attempts, lastError: outcome.lastError };

      switch (outcome.status) {
        case 'delivered':
          this.log.debug(fields, 'Events delivered');
          break;
        case 'deferred':
          this.log.warn(fields, 'Events deferred to dead letter buffer');
          break;
        case 'rejected':
          this.log.error(fields, 'Events rejected by sink');
          break;
      }
    } catch (err: unknown) {
      this.log.error({ err, event_ids: eventIds }, 'Delivery task failed');
    }
  }

  private isIdle(): boolean {
    return this.active === 0 && this.pending.length === 0;
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    for (const resolve of this.idleWaiters.splice(0)) resolve();
  }
}
