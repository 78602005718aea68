import type { Batch } from './event.js';

/** Sink-side failure classes. */
export type SinkErrorKind = 'throttled' | 'transient' | 'permanent';

export interface SinkError {
  readonly kind: SinkErrorKind;
  readonly message: string;
}

/** Result of a single sink call. The ack carries no data. */
export type SinkResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: SinkError };

/** Local short-circuits — never produced by a sink. */
export type LocalFailure =
  | { readonly kind: 'circuit_open'; readonly message: string }
  | { readonly kind: 'cancelled'; readonly message: string };

export type DeliveryFailure = SinkError | LocalFailure;

export type SubmissionStatus = 'delivered' | 'deferred' | 'rejected';

/**
 * Outcome of one `handle` call.
 *
 * `attempts` counts sink invocations across all sub-batches.
 */
export interface SubmissionOutcome {
  readonly status: SubmissionStatus;
  readonly attempts: number;
  readonly batches: number;
  readonly lastError: DeliveryFailure | null;
}

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface DeadLetterEntry {
  readonly id: string;
  /** Monotonic enqueue order; used to keep replay order stable. */
  readonly seq: number;
  readonly records: Batch;
  readonly reason: DeliveryFailure;
  readonly enqueuedAt: string; // ISO-8601
  retryCount: number;
}

export function isRetryable(kind: SinkErrorKind): boolean {
  return kind !== 'permanent';
}
