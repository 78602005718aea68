import type { Log } from './log.js';
import type { CircuitState, SinkErrorKind } from '../domain/index.js';

export type CircuitBreakerOptions = Readonly<{
  /** Consecutive throttled/transient failures that open the circuit. */
  failureThreshold: number;
  /** Time spent open before a probe is allowed. */
  cooldownMs: number;
  nowFn?: () => number; // epoch ms
  log?: Log;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
}>;

/**
 * Gate decision. `probe` is true for the single call allowed while
 * half-open; its result alone decides the next transition.
 */
export type CircuitPermit =
  | { readonly allowed: true; readonly probe: boolean }
  | { readonly allowed: false };

export interface CircuitMetrics {
  state: CircuitState;
  consecutiveFailures: number;
  totalSuccesses: number;
  totalFailures: number;
  rejected: number;
  openedAt: string | null;
  stateChangedAt: string;
}

/**
 * Circuit breaker over the delivery sink.
 *
 * ```
 *   closed ──(threshold consecutive failures)──> open
 *   open ──(cooldown elapsed, first caller claims probe)──> half_open
 *   half_open ──(probe ok)──> closed
 *   half_open ──(probe failed)──> open
 * ```
 *
 * All methods are synchronous: on Node's event loop a claim made in
 * `tryAcquire()` cannot interleave with another caller's claim, so exactly
 * one submission performs the half-open probe.
 *
 * Permanent failures are payload faults and never affect health.
 */
export class CircuitBreaker {
  private readonly failureThreshold: number;
  private readonly cooldownMs: number;
  private readonly nowFn: () => number;
  private readonly log: Log | undefined;
  private readonly onStateChange: CircuitBreakerOptions['onStateChange'];

  private state: CircuitState = 'closed';
  private consecutiveFailures = 0;
  private totalSuccesses = 0;
  private totalFailures = 0;
  private rejected = 0;
  private openedAtMs: number | null = null;
  private stateChangedAtMs: number;
  private probeInFlight = false;

  constructor(opts: CircuitBreakerOptions) {
    if (!Number.isInteger(opts.failureThreshold) || opts.failureThreshold < 1) {
      throw new Error('CircuitBreaker requires failureThreshold >= 1');
    }
    if (opts.cooldownMs < 0) {
      throw new Error('CircuitBreaker requires cooldownMs >= 0');
    }
    this.failureThreshold = opts.failureThreshold;
    this.cooldownMs = opts.cooldownMs;
    this.nowFn = opts.nowFn ?? (() => Date.now());
    this.log = opts.log;
    this.onStateChange = opts.onStateChange;
    this.stateChangedAtMs = this.nowFn();
  }

  /** Current state. Pure read; the open → half_open move happens in `tryAcquire`. */
  getState(): CircuitState {
    return this.state;
  }

  /**
   * Ask to call the sink.
   *
   * Rejections do not consume anything; callers defer the work instead.
   */
  tryAcquire(): CircuitPermit {
    switch (this.state) {
      case 'closed':
        return { allowed: true, probe: false };

      case 'open': {
        const openedAt = this.openedAtMs ?? this.stateChangedAtMs;
        if (this.nowFn() - openedAt < this.cooldownMs) {
          this.rejected++;
          return { allowed: false };
        }
        this.transition('half_open');
        this.probeInFlight = true;
        return { allowed: true, probe: true };
      }

      case 'half_open':
        if (this.probeInFlight) {
          this.rejected++;
          return { allowed: false };
        }
        this.probeInFlight = true;
        return { allowed: true, probe: true };
    }
  }

  recordSuccess(probe: boolean): void {
    this.totalSuccesses++;

    if (this.state === 'half_open') {
      if (!probe) return;
      this.probeInFlight = false;
      this.consecutiveFailures = 0;
      this.transition('closed');
      return;
    }

    this.consecutiveFailures = 0;
  }

  recordFailure(kind: SinkErrorKind, probe: boolean): void {
    if (kind === 'permanent') {
      // Payload fault: frees the probe slot, says nothing about sink health.
      if (probe) this.probeInFlight = false;
      return;
    }

    this.totalFailures++;

    if (this.state === 'half_open') {
      if (!probe) return;
      this.probeInFlight = false;
      this.open();
      return;
    }

    this.consecutiveFailures++;
    if (this.state === 'closed' && this.consecutiveFailures >= this.failureThreshold) {
      this.open();
    }
  }

  getMetrics(): CircuitMetrics {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      totalSuccesses: this.totalSuccesses,
      totalFailures: this.totalFailures,
      rejected: this.rejected,
      openedAt: this.openedAtMs === null ? null : new Date(this.openedAtMs).toISOString(),
      stateChangedAt: new Date(this.stateChangedAtMs).toISOString(),
    };
  }

  /** Administrative reset to closed. */
  reset(): void {
    this.consecutiveFailures = 0;
    this.probeInFlight = false;
    this.openedAtMs = null;
    if (this.state !== 'closed') this.transition('closed');
  }

  private open(): void {
    this.openedAtMs = this.nowFn();
    this.transition('open');
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    if (from === to) return;

    this.state = to;
    this.stateChangedAtMs = this.nowFn();
    if (to === 'closed') this.openedAtMs = null;

    const fields = { from, to, consecutiveFailures: this.consecutiveFailures };
    if (to === 'open') {
      this.log?.warn(fields, 'Circuit breaker opened');
    } else {
      this.log?.info(fields, 'Circuit breaker state changed');
    }
    this.onStateChange?.(from, to);
  }
}
