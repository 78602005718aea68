import type { Log } from './log.js';
import type {
  Batch,
  DeliveryFailure,
  SinkError,
  SinkResult,
  SubmissionOutcome,
  SubmissionStatus,
} from '../domain/index.js';
import type { DeliverySink } from '../infrastructure/sink/types.js';
import type { CircuitBreaker, CircuitMetrics } from './circuit-breaker.js';
import type { DeadLetterBuffer } from './dead-letter-buffer.js';
import type { RetryPolicy } from './retry-policy.js';

/** Waits `ms`; resolves false if `signal` aborted the wait. */
export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<boolean>;

export interface DeliveryCoordinatorDeps {
  sink: DeliverySink;
  retryPolicy: RetryPolicy;
  circuitBreaker: CircuitBreaker;
  deadLetters: DeadLetterBuffer;
  log: Log;
  maxBatchSize: number;
  sinkTimeoutMs: number;
  sleep?: Sleeper;
}

export interface HandleOptions {
  /** Aborting stops further retries; unsent work is dead-lettered. */
  signal?: AbortSignal | undefined;
}

export interface ReplayReport {
  attempted: number;
  delivered: number;
  requeued: number;
  dropped: number;
  remaining: number;
}

export interface DeliveryStatus {
  sink: string;
  circuit: CircuitMetrics;
  deadLetters: { size: number; overflowCount: number; droppedCount: number };
  totals: Record<SubmissionStatus, number> & { submissions: number; sinkCalls: number };
}

type PartResult =
  | { status: 'delivered'; attempts: number; lastError: SinkError | null }
  | { status: 'deferred' | 'rejected'; attempts: number; lastError: DeliveryFailure };

const CIRCUIT_OPEN: DeliveryFailure = { kind: 'circuit_open', message: 'circuit breaker is open' };
const CANCELLED: DeliveryFailure = { kind: 'cancelled', message: 'submission cancelled before delivery' };

export const sleep: Sleeper = (ms, signal) => {
  if (signal?.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

/**
 * Splits a batch into consecutive sub-batches of at most `size` records.
 * Concatenating the result gives back the input unchanged.
 */
export function splitBatch(batch: Batch, size: number): Batch[] {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error('splitBatch requires size >= 1');
  }
  const parts: Batch[] = [];
  for (let i = 0; i < batch.length; i += size) {
    parts.push(batch.slice(i, i + size));
  }
  return parts;
}

/**
 * Delivers one submission end-to-end.
 *
 * Per sub-batch:
 * 1. Circuit breaker gate — open → deferred, sink untouched.
 * 2. Sink call bounded by `sinkTimeoutMs`; every result reported to the breaker.
 * 3. Retry policy decides between backoff and giving up.
 * 4. Retryable exhaustion → deferred + dead letter; permanent → rejected.
 *
 * Failures are returned as outcomes; `handle` does not throw for them.
 */
export class DeliveryCoordinator {
  private readonly sink: DeliverySink;
  private readonly retryPolicy: RetryPolicy;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly deadLetters: DeadLetterBuffer;
  private readonly log: Log;
  private readonly maxBatchSize: number;
  private readonly sinkTimeoutMs: number;
  private readonly sleep: Sleeper;

  private readonly totals = {
    submissions: 0,
    delivered: 0,
    deferred: 0,
    rejected: 0,
    sinkCalls: 0,
  };

  constructor(deps: DeliveryCoordinatorDeps) {
    if (!Number.isInteger(deps.maxBatchSize) || deps.maxBatchSize < 1) {
      throw new Error('DeliveryCoordinator requires maxBatchSize >= 1');
    }
    this.sink = deps.sink;
    this.retryPolicy = deps.retryPolicy;
    this.circuitBreaker = deps.circuitBreaker;
    this.deadLetters = deps.deadLetters;
    this.log = deps.log;
    this.maxBatchSize = deps.maxBatchSize;
    this.sinkTimeoutMs = deps.sinkTimeoutMs;
    this.sleep = deps.sleep ?? sleep;
  }

  async handle(batch: Batch, options: HandleOptions = {}): Promise<SubmissionOutcome> {
    const { signal } = options;
    const parts = splitBatch(batch, this.maxBatchSize);
    this.totals.submissions++;

    let attempts = 0;
    let lastError: DeliveryFailure | null = null;
    let deferred = false;
    let rejected = false;

    for (const part of parts) {
      const result: PartResult = signal?.aborted
        ? { status: 'deferred', attempts: 0, lastError: CANCELLED }
        : await this.deliver(part, signal);

      attempts += result.attempts;
      if (result.lastError) lastError = result.lastError;

      if (result.status === 'deferred') {
        deferred = true;
        this.deadLetters.enqueue(part, result.lastError);
      } else if (result.status === 'rejected') {
        rejected = true;
        this.log.error(
          { event_ids: part.map((r) => r.event_id), error: result.lastError },
          'Sub-batch rejected by sink',
        );
      }
    }

    const status: SubmissionStatus = rejected ? 'rejected' : deferred ? 'deferred' : 'delivered';
    this.totals[status]++;

    return { status, attempts, batches: parts.length, lastError };
  }

  /**
   * Re-delivers up to `limit` dead-letter entries, oldest first.
   *
   * Entries are not dead-lettered again: failures go back to the buffer
   * through the lease. Stops early if the circuit rejects a replay.
   */
  async replay(limit: number, options: HandleOptions = {}): Promise<ReplayReport> {
    const { signal } = options;
    const report: ReplayReport = { attempted: 0, delivered: 0, requeued: 0, dropped: 0, remaining: 0 };

    for (const lease of this.deadLetters.replay(limit)) {
      if (signal?.aborted) {
        lease.release();
        break;
      }

      const result = await this.deliver(lease.entry.records, signal);

      if (result.status === 'deferred' && result.lastError.kind === 'circuit_open') {
        lease.release();
        this.log.warn({ entry_id: lease.entry.id }, 'Replay stopped: circuit breaker is open');
        break;
      }

      report.attempted++;
      if (result.status === 'delivered') {
        lease.ack();
        report.delivered++;
      } else if (result.status === 'rejected') {
        lease.discard(result.lastError);
        report.dropped++;
      } else {
        const droppedBefore = this.deadLetters.droppedCount;
        lease.nack(result.lastError);
        if (this.deadLetters.droppedCount > droppedBefore) {
          report.dropped++;
        } else {
          report.requeued++;
        }
      }
    }

    report.remaining = this.deadLetters.size();
    this.log.info(report, 'Dead letter replay finished');
    return report;
  }

  status(): DeliveryStatus {
    return {
      sink: this.sink.name,
      circuit: this.circuitBreaker.getMetrics(),
      deadLetters: {
        size: this.deadLetters.size(),
        overflowCount: this.deadLetters.overflowCount,
        droppedCount: this.deadLetters.droppedCount,
      },
      totals: { ...this.totals },
    };
  }

  private async deliver(records: Batch, signal: AbortSignal | undefined): Promise<PartResult> {
    const permit = this.circuitBreaker.tryAcquire();
    if (!permit.allowed) {
      this.log.debug({ records: records.length }, 'Circuit open, deferring sub-batch');
      return { status: 'deferred', attempts: 0, lastError: CIRCUIT_OPEN };
    }

    let lastError: SinkError | null = null;

    for (let attempt = 1; ; attempt++) {
      const probe = permit.probe && attempt === 1;

      // An in-flight call is always awaited and reported, even if cancelled meanwhile.
      const result = await this.callSink(records);
      this.totals.sinkCalls++;

      if (result.ok) {
        this.circuitBreaker.recordSuccess(probe);
        return { status: 'delivered', attempts: attempt, lastError };
      }

      const error = result.error;
      lastError = error;
      this.circuitBreaker.recordFailure(error.kind, probe);

      if (error.kind === 'permanent') {
        return { status: 'rejected', attempts: attempt, lastError: error };
      }

      if (probe) {
        this.log.warn({ kind: error.kind, message: error.message }, 'Circuit probe failed');
        return { status: 'deferred', attempts: attempt, lastError: error };
      }

      const decision = this.retryPolicy.decide(attempt, error.kind);
      if (decision.action === 'give_up') {
        this.log.warn(
          { attempts: attempt, kind: error.kind, message: error.message, records: records.length },
          'Retries exhausted, deferring sub-batch',
        );
        return { status: 'deferred', attempts: attempt, lastError: error };
      }

      this.log.warn(
        { attempt, kind: error.kind, message: error.message, delayMs: decision.delayMs },
        'Sink call failed, retrying',
      );

      const waited = signal?.aborted ? false : await this.sleep(decision.delayMs, signal);
      if (!waited) {
        this.log.info({ attempts: attempt }, 'Submission cancelled during backoff');
        return { status: 'deferred', attempts: attempt, lastError: error };
      }
    }
  }

  private async callSink(records: Batch): Promise<SinkResult> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    let timedOut = false;

    const timeout = new Promise<SinkResult>((resolve) => {
      timer = setTimeout(() => {
        timedOut = true;
        resolve({
          ok: false,
          error: { kind: 'transient', message: `sink call timed out after ${this.sinkTimeoutMs}ms` },
        });
      }, this.sinkTimeoutMs);
    });

    const call = this.submitToSink(records).then((result) => {
      // The timeout was already counted as a failure; a late ack still proves the sink is alive.
      if (timedOut && result.ok) {
        this.log.debug({ records: records.length }, 'Sink acknowledged after timeout');
        this.circuitBreaker.recordSuccess(false);
      }
      return result;
    });

    try {
      return await Promise.race([call, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Adapters report failures as values; anything thrown is treated as transient. */
  private async submitToSink(records: Batch): Promise<SinkResult> {
    try {
      return await this.sink.submit(records);
    } catch (err: unknown) {
      this.log.error({ err }, 'Sink adapter threw instead of returning a result');
      return {
        ok: false,
        error: { kind: 'transient', message: err instanceof Error ? err.message : String(err) },
      };
    }
  }
}
