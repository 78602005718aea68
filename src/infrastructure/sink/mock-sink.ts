import type { Batch, EventRecord, SinkErrorKind, SinkResult } from '../../domain/index.js';
import type { DeliverySink } from './types.js';

/** Decides whether call number `call` (1-based) fails, and how. */
export type FailurePredicate = (batch: Batch, call: number) => SinkErrorKind | null;

export interface MockSinkOptions {
  /** Fail the first N calls with `failureKind`. */
  failFirst?: number;
  failureKind?: SinkErrorKind;
  /** Consulted after `failFirst`; return null to accept the call. */
  shouldFail?: FailurePredicate;
  latencyMs?: number;
  healthy?: boolean;
}

/**
 * In-memory sink for tests and local development.
 *
 * Every invocation is appended to `calls`; accepted records to `delivered`.
 */
export class MockSink implements DeliverySink {
  readonly name = 'mock';
  readonly calls: Batch[] = [];
  readonly delivered: EventRecord[] = [];

  private readonly failFirst: number;
  private readonly failureKind: SinkErrorKind;
  private readonly shouldFail: FailurePredicate | undefined;
  private readonly latencyMs: number;
  private healthy: boolean;

  constructor(opts: MockSinkOptions = {}) {
    this.failFirst = opts.failFirst ?? 0;
    this.failureKind = opts.failureKind ?? 'transient';
    this.shouldFail = opts.shouldFail;
    this.latencyMs = opts.latencyMs ?? 0;
    this.healthy = opts.healthy ?? true;
  }

  async submit(batch: Batch): Promise<SinkResult> {
    this.calls.push(batch);
    const call = this.calls.length;

    if (this.latencyMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, this.latencyMs));
    }

    const kind = call <= this.failFirst ? this.failureKind : this.shouldFail?.(batch, call) ?? null;
    if (kind !== null) {
      return { ok: false, error: { kind, message: `mock sink: injected ${kind} failure on call ${call}` } };
    }

    this.delivered.push(...batch);
    return { ok: true };
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }

  setHealthy(healthy: boolean): void {
    this.healthy = healthy;
  }

  get callCount(): number {
    return this.calls.length;
  }

  reset(): void {
    this.calls.length = 0;
    this.delivered.length = 0;
  }
}
