import { isRetryable } from '../domain/index.js';
import type { SinkErrorKind } from '../domain/index.js';

export type RetryDecision =
  | { readonly action: 'retry'; readonly delayMs: number }
  | { readonly action: 'give_up' };

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export type RetryPolicyOptions = Readonly<{
  /** Total sink calls allowed per sub-batch (first attempt included). */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Uniform jitter fraction, e.g. 0.2 for ±20%. */
  jitter: number;
  random?: RandomSource;
}>;

/**
 * Exponential backoff with jitter.
 *
 * delay = min(base * 2^(attempt-1), maxDelay) * (1 + u * jitter),
 * with u uniform in [-1, 1).
 */
export class RetryPolicy {
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly jitter: number;
  private readonly random: RandomSource;

  constructor(opts: RetryPolicyOptions) {
    if (!Number.isInteger(opts.maxAttempts) || opts.maxAttempts < 1) {
      throw new Error('RetryPolicy requires maxAttempts >= 1');
    }
    if (opts.baseDelayMs < 0 || opts.maxDelayMs < opts.baseDelayMs) {
      throw new Error('RetryPolicy requires 0 <= baseDelayMs <= maxDelayMs');
    }
    if (opts.jitter < 0 || opts.jitter >= 1) {
      throw new Error('RetryPolicy requires 0 <= jitter < 1');
    }
    this.maxAttempts = opts.maxAttempts;
    this.baseDelayMs = opts.baseDelayMs;
    this.maxDelayMs = opts.maxDelayMs;
    this.jitter = opts.jitter;
    this.random = opts.random ?? Math.random;
  }

  /**
   * Decide what to do after attempt number `attempt` (1-based) failed
   * with an error of class `kind`.
   */
  decide(attempt: number, kind: SinkErrorKind): RetryDecision {
    if (!isRetryable(kind)) return { action: 'give_up' };
    if (attempt >= this.maxAttempts) return { action: 'give_up' };
    return { action: 'retry', delayMs: this.delayFor(attempt) };
  }

  /** Backoff before the attempt following `attempt`. */
  delayFor(attempt: number): number {
    const exponent = Math.max(attempt - 1, 0);
    const capped = Math.min(this.baseDelayMs * 2 ** exponent, this.maxDelayMs);
    const u = this.random() * 2 - 1;
    return Math.max(0, Math.round(capped * (1 + u * this.jitter)));
  }

  /** Upper bound of any single wait produced by this policy. */
  get maxWaitMs(): number {
    return Math.ceil(this.maxDelayMs * (1 + this.jitter));
  }
}

/**
 * Deterministic PRNG (mulberry32) for reproducible backoff sequences.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
