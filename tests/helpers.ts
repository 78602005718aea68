import { vi } from 'vitest';
import type { Batch, EventRecord, SinkResult } from '../src/domain/index.js';
import type { DeliverySink } from '../src/infrastructure/sink/types.js';

let counter = 0;

/**
 * Factory for test records with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeRecord(overrides: Partial<EventRecord> = {}): EventRecord {
  counter++;
  return {
    event_id: overrides.event_id ?? `test-${counter}`,
    event_type: overrides.event_type ?? 'install',
    fields: overrides.fields ?? { user_id: 'user-1', platform: 'ios' },
  };
}

/** `count` records with ids `${prefix}-1` … `${prefix}-${count}`. */
export function makeBatch(count: number, prefix = 'evt'): EventRecord[] {
  return Array.from({ length: count }, (_, i) => makeRecord({ event_id: `${prefix}-${i + 1}` }));
}

export function ids(batch: Batch): string[] {
  return batch.map((r) => r.event_id);
}

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Sink whose calls stay pending until the test settles them.
 * Once `autoResolve` is set, pending and future calls succeed immediately.
 */
export class ControlledSink implements DeliverySink {
  readonly name = 'controlled';
  readonly calls: Batch[] = [];
  private readonly pending: Array<(result: SinkResult) => void> = [];
  private autoResolve = false;

  submit(batch: Batch): Promise<SinkResult> {
    this.calls.push(batch);
    if (this.autoResolve) return Promise.resolve({ ok: true });
    return new Promise((resolve) => this.pending.push(resolve));
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /** Settles the oldest pending call. */
  settle(result: SinkResult): void {
    const resolve = this.pending.shift();
    if (!resolve) throw new Error('no pending sink call');
    resolve(result);
  }

  releaseAll(): void {
    this.autoResolve = true;
    for (const resolve of this.pending.splice(0)) resolve({ ok: true });
  }
}

export const TRANSIENT: SinkResult = { ok: false, error: { kind: 'transient', message: 'connection reset' } };
