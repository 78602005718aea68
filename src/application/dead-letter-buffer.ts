import { randomUUID } from 'node:crypto';
import type { Log } from './log.js';
import type { Batch, DeadLetterEntry, DeliveryFailure } from '../domain/index.js';

export type DeadLetterBufferOptions = Readonly<{
  capacity: number;
  /** Failed replays an entry may accumulate before it is dropped. */
  maxReplayAttempts: number;
  log: Log;
  nowFn?: () => number;
  /** Called for every entry evicted to make room. This is data loss. */
  onOverflow?: (evicted: DeadLetterEntry) => void;
  /** Called for every entry dropped after exhausting its replays. */
  onDrop?: (dropped: DeadLetterEntry) => void;
}>;

/**
 * Handle on one entry taken out for replay.
 * Exactly one of the settle methods must be called.
 */
export interface ReplayLease {
  readonly entry: Readonly<DeadLetterEntry>;
  /** Re-delivery succeeded — forget the entry. */
  ack(): void;
  /** Re-delivery failed with a retryable error — counts towards the replay cap. */
  nack(reason: DeliveryFailure): void;
  /** Payload was refused permanently — forget the entry. */
  discard(reason: DeliveryFailure): void;
  /** Put the entry back untouched (e.g. the circuit is open). */
  release(): void;
}

/**
 * Bounded FIFO holding sub-batches that could not be delivered.
 *
 * Capacity bounds queued and leased entries together. Leased entries are
 * never evicted; when one is returned to a full buffer the oldest queued
 * entries are evicted instead. Re-queued entries return to the front in
 * their original enqueue order.
 */
export class DeadLetterBuffer {
  private readonly capacity: number;
  private readonly maxReplayAttempts: number;
  private readonly log: Log;
  private readonly nowFn: () => number;
  private readonly onOverflow: DeadLetterBufferOptions['onOverflow'];
  private readonly onDrop: DeadLetterBufferOptions['onDrop'];

  private readonly queue: DeadLetterEntry[] = [];
  private readonly leased = new Map<string, DeadLetterEntry>();
  private nextSeq = 1;
  private overflowed = 0;
  private dropped = 0;

  constructor(opts: DeadLetterBufferOptions) {
    if (!Number.isInteger(opts.capacity) || opts.capacity < 1) {
      throw new Error('DeadLetterBuffer requires capacity >= 1');
    }
    if (!Number.isInteger(opts.maxReplayAttempts) || opts.maxReplayAttempts < 1) {
      throw new Error('DeadLetterBuffer requires maxReplayAttempts >= 1');
    }
    this.capacity = opts.capacity;
    this.maxReplayAttempts = opts.maxReplayAttempts;
    this.log = opts.log;
    this.nowFn = opts.nowFn ?? (() => Date.now());
    this.onOverflow = opts.onOverflow;
    this.onDrop = opts.onDrop;
  }

  enqueue(records: Batch, reason: DeliveryFailure): DeadLetterEntry {
    while (this.size() >= this.capacity && this.queue.length > 0) {
      this.evictOldest();
    }

    const entry: DeadLetterEntry = {
      id: randomUUID(),
      seq: this.nextSeq++,
      records,
      reason,
      enqueuedAt: new Date(this.nowFn()).toISOString(),
      retryCount: 0,
    };
    this.queue.push(entry);

    this.log.debug(
      { entry_id: entry.id, records: records.length, reason: reason.kind, size: this.size() },
      'Dead letter entry enqueued',
    );
    return entry;
  }

  /**
   * Lazily leases up to `limit` entries from the front.
   *
   * Each step takes the oldest entry not yet leased by this pass, so an
   * entry returned to the front is not retried twice in one pass, and
   * calling `replay` again restarts from wherever the buffer stands.
   */
  *replay(limit: number): Generator<ReplayLease, void, undefined> {
    const seen = new Set<string>();
    let taken = 0;
    while (taken < limit) {
      const idx = this.queue.findIndex((e) => !seen.has(e.id));
      if (idx === -1) return;
      const [entry] = this.queue.splice(idx, 1);
      if (!entry) return;
      seen.add(entry.id);
      this.leased.set(entry.id, entry);
      taken++;
      yield this.lease(entry);
    }
  }

  /** Queued plus leased entries. */
  size(): number {
    return this.queue.length + this.leased.size;
  }

  get overflowCount(): number {
    return this.overflowed;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  /** Read-only snapshot of queued entries, oldest first. */
  peek(limit = this.queue.length): readonly Readonly<DeadLetterEntry>[] {
    return this.queue.slice(0, limit);
  }

  clear(): number {
    const removed = this.queue.length;
    this.queue.length = 0;
    return removed;
  }

  private lease(entry: DeadLetterEntry): ReplayLease {
    let settled = false;
    const settle = (): boolean => {
      if (settled) return false;
      settled = true;
      this.leased.delete(entry.id);
      return true;
    };

    return {
      entry,
      ack: () => {
        if (!settle()) return;
        this.log.debug({ entry_id: entry.id }, 'Dead letter entry replayed');
      },
      discard: (reason) => {
        if (!settle()) return;
        this.log.error(
          { entry_id: entry.id, event_ids: entry.records.map((r) => r.event_id), reason },
          'Dead letter entry rejected by sink, discarded',
        );
      },
      release: () => {
        if (!settle()) return;
        this.reinsert(entry);
      },
      nack: (reason) => {
        if (!settle()) return;
        entry.retryCount++;
        if (entry.retryCount >= this.maxReplayAttempts) {
          this.dropped++;
          this.log.error(
            {
              entry_id: entry.id,
              event_ids: entry.records.map((r) => r.event_id),
              retryCount: entry.retryCount,
              reason,
            },
            'Dead letter entry exhausted replay attempts, dropped',
          );
          this.onDrop?.(entry);
          return;
        }
        this.reinsert(entry);
      },
    };
  }

  /**
   * Insert at the front, keeping enqueue order among returned entries.
   * Entries enqueued while this one was leased may have filled the buffer;
   * the oldest queued entries make room.
   */
  private reinsert(entry: DeadLetterEntry): void {
    const idx = this.queue.findIndex((e) => e.seq > entry.seq);
    if (idx === -1) {
      this.queue.push(entry);
    } else {
      this.queue.splice(idx, 0, entry);
    }
    while (this.size() > this.capacity && this.queue.length > 0) {
      this.evictOldest();
    }
  }

  private evictOldest(): void {
    const evicted = this.queue.shift();
    if (!evicted) return;
    this.overflowed++;
    this.log.error(
      {
        entry_id: evicted.id,
        event_ids: evicted.records.map((r) => r.event_id),
        capacity: this.capacity,
        overflowCount: this.overflowed,
      },
      'Dead letter buffer overflow: oldest entry evicted',
    );
    this.onOverflow?.(evicted);
  }
}
