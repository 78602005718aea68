import { describe, it, expect, vi } from 'vitest';
import { DeadLetterBuffer } from '../../src/application/dead-letter-buffer.js';
import type { DeliveryFailure } from '../../src/domain/index.js';
import { fakeLogger, ids, makeBatch } from '../helpers.js';

const REASON: DeliveryFailure = { kind: 'transient', message: 'connection reset' };

function buffer(capacity = 10, maxReplayAttempts = 3) {
  const log = fakeLogger();
  const onOverflow = vi.fn();
  const onDrop = vi.fn();
  const dlq = new DeadLetterBuffer({
    capacity,
    maxReplayAttempts,
    log,
    nowFn: () => Date.UTC(2026, 0, 1),
    onOverflow,
    onDrop,
  });
  return { dlq, log, onOverflow, onDrop };
}

describe('DeadLetterBuffer — enqueue', () => {
  it('stores entries with metadata', () => {
    const { dlq } = buffer();
    const records = makeBatch(2, 'a');
    const entry = dlq.enqueue(records, REASON);

    expect(entry.records).toBe(records);
    expect(entry.reason).toEqual(REASON);
    expect(entry.retryCount).toBe(0);
    expect(entry.enqueuedAt).toBe('2026-01-01T00:00:00.000Z');
    expect(dlq.size()).toBe(1);
  });

  it('evicts the oldest entry when full and reports it', () => {
    const { dlq, log, onOverflow } = buffer(2);
    const first = dlq.enqueue(makeBatch(1, 'a'), REASON);
    dlq.enqueue(makeBatch(1, 'b'), REASON);
    dlq.enqueue(makeBatch(1, 'c'), REASON);

    expect(dlq.size()).toBe(2);
    expect(dlq.overflowCount).toBe(1);
    expect(onOverflow).toHaveBeenCalledWith(first);
    expect(dlq.peek().map((e) => ids(e.records))).toEqual([['b-1'], ['c-1']]);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ entry_id: first.id, event_ids: ['a-1'], capacity: 2, overflowCount: 1 }),
      'Dead letter buffer overflow: oldest entry evicted',
    );
  });

  it('rejects invalid options', () => {
    const log = fakeLogger();
    expect(() => new DeadLetterBuffer({ capacity: 0, maxReplayAttempts: 1, log })).toThrow('capacity');
    expect(() => new DeadLetterBuffer({ capacity: 1, maxReplayAttempts: 0, log })).toThrow('maxReplayAttempts');
  });
});

describe('DeadLetterBuffer — replay', () => {
  it('leases entries oldest first, up to the limit', () => {
    const { dlq } = buffer();
    dlq.enqueue(makeBatch(1, 'a'), REASON);
    dlq.enqueue(makeBatch(1, 'b'), REASON);
    dlq.enqueue(makeBatch(1, 'c'), REASON);

    const leased = [...dlq.replay(2)];
    expect(leased.map((l) => ids(l.entry.records))).toEqual([['a-1'], ['b-1']]);
    // leased entries still count
    expect(dlq.size()).toBe(3);
    expect(dlq.peek().length).toBe(1);
  });

  it('yields nothing for an empty buffer', () => {
    const { dlq } = buffer();
    expect([...dlq.replay(5)]).toEqual([]);
  });

  it('ack removes the entry', () => {
    const { dlq } = buffer();
    dlq.enqueue(makeBatch(1, 'a'), REASON);
    for (const lease of dlq.replay(10)) lease.ack();
    expect(dlq.size()).toBe(0);
  });

  it('discard removes the entry and logs it', () => {
    const { dlq, log } = buffer();
    const entry = dlq.enqueue(makeBatch(1, 'a'), REASON);
    const permanent: DeliveryFailure = { kind: 'permanent', message: 'WRONGTYPE' };
    for (const lease of dlq.replay(10)) lease.discard(permanent);

    expect(dlq.size()).toBe(0);
    expect(log.error).toHaveBeenCalledWith(
      { entry_id: entry.id, event_ids: ['a-1'], reason: permanent },
      'Dead letter entry rejected by sink, discarded',
    );
  });

  it('nack returns the entry to its original position and bumps retryCount', () => {
    const { dlq } = buffer();
    dlq.enqueue(makeBatch(1, 'a'), REASON);
    dlq.enqueue(makeBatch(1, 'b'), REASON);

    const gen = dlq.replay(1);
    const first = gen.next();
    if (first.done) throw new Error('expected a lease');
    dlq.enqueue(makeBatch(1, 'c'), REASON);
    first.value.nack(REASON);

    expect(dlq.peek().map((e) => ids(e.records))).toEqual([['a-1'], ['b-1'], ['c-1']]);
    expect(dlq.peek()[0]?.retryCount).toBe(1);
  });

  it('does not lease a nacked entry twice in the same pass', () => {
    const { dlq } = buffer();
    dlq.enqueue(makeBatch(1, 'a'), REASON);
    dlq.enqueue(makeBatch(1, 'b'), REASON);

    const seen: string[][] = [];
    for (const lease of dlq.replay(10)) {
      seen.push(ids(lease.entry.records));
      lease.nack(REASON);
    }
    expect(seen).toEqual([['a-1'], ['b-1']]);
    expect(dlq.size()).toBe(2);
  });

  it('drops an entry once it exhausts its replay attempts', () => {
    const { dlq, onDrop, log } = buffer(10, 2);
    const entry = dlq.enqueue(makeBatch(1, 'a'), REASON);

    for (const lease of dlq.replay(1)) lease.nack(REASON);
    expect(dlq.size()).toBe(1);
    for (const lease of dlq.replay(1)) lease.nack(REASON);

    expect(dlq.size()).toBe(0);
    expect(dlq.droppedCount).toBe(1);
    expect(onDrop).toHaveBeenCalledWith(entry);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ entry_id: entry.id, retryCount: 2 }),
      'Dead letter entry exhausted replay attempts, dropped',
    );
  });

  it('release puts the entry back untouched', () => {
    const { dlq } = buffer();
    dlq.enqueue(makeBatch(1, 'a'), REASON);
    for (const lease of dlq.replay(1)) lease.release();

    expect(dlq.peek()[0]?.retryCount).toBe(0);
    expect(dlq.size()).toBe(1);
  });

  it('ignores a second settle on the same lease', () => {
    const { dlq } = buffer();
    dlq.enqueue(makeBatch(1, 'a'), REASON);
    for (const lease of dlq.replay(1)) {
      lease.ack();
      lease.release();
      lease.nack(REASON);
    }
    expect(dlq.size()).toBe(0);
  });

  it('counts leased entries against capacity', () => {
    const { dlq, onOverflow } = buffer(2);
    dlq.enqueue(makeBatch(1, 'a'), REASON);
    const b = dlq.enqueue(makeBatch(1, 'b'), REASON);
    const lease = dlq.replay(1).next();
    if (lease.done) throw new Error('expected a lease');

    dlq.enqueue(makeBatch(1, 'c'), REASON);
    expect(onOverflow).toHaveBeenCalledWith(b);

    lease.value.nack(REASON);
    expect(dlq.size()).toBe(2);
    expect(dlq.peek().map((e) => ids(e.records))).toEqual([['a-1'], ['c-1']]);
  });

  it('never evicts a leased entry, and trims once it is returned', () => {
    const { dlq } = buffer(1);
    dlq.enqueue(makeBatch(1, 'a'), REASON);
    const lease = dlq.replay(1).next();
    if (lease.done) throw new Error('expected a lease');

    dlq.enqueue(makeBatch(1, 'b'), REASON);
    expect(dlq.overflowCount).toBe(0);
    expect(dlq.size()).toBe(2);

    lease.value.nack(REASON);
    expect(dlq.size()).toBe(1);
    expect(dlq.overflowCount).toBe(1);
    expect(dlq.peek().map((e) => ids(e.records))).toEqual([['b-1']]);
  });
});

describe('DeadLetterBuffer — clear', () => {
  it('removes queued entries and returns the count', () => {
    const { dlq } = buffer();
    dlq.enqueue(makeBatch(1, 'a'), REASON);
    dlq.enqueue(makeBatch(1, 'b'), REASON);
    expect(dlq.clear()).toBe(2);
    expect(dlq.size()).toBe(0);
  });
});
