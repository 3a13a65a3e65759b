/**
 * Exponential backoff with symmetric jitter, expressed as a cockatiel backoff
 * so any cockatiel backoff (constant, exponential, iterable) can stand in for
 * it on a retry policy.
 */

import type { IBackoff, IBackoffFactory } from "cockatiel";

/**
 * What a backoff sees when asked for the wait after a failed attempt
 */
export interface RetryBackoffContext {
  /** The 1-based attempt that just failed */
  readonly attempt: number;
  /** The error that attempt produced */
  readonly error: unknown;
}

export type RetryBackoff = IBackoffFactory<RetryBackoffContext>;

export interface DelayOptions {
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
  /** Fraction of the capped delay to spread around it, in [0, 1] */
  readonly jitterFactor: number;
}

/**
 * Delay before the attempt following `attempt`:
 * `min(initial * multiplier^(attempt-1), max)` scaled by a uniform factor in
 * `[1 - jitter, 1 + jitter]`, never negative.
 *
 * @param random - Source of uniform draws in [0, 1)
 */
export function computeDelay(
  attempt: number,
  options: DelayOptions,
  random: () => number = Math.random,
): number {
  if (options.initialDelayMs === 0) {
    return 0;
  }

  const raw =
    options.initialDelayMs * Math.pow(options.backoffMultiplier, attempt - 1);
  const capped = Math.min(raw, options.maxDelayMs);
  const jitter = 1 + (random() * 2 - 1) * options.jitterFactor;

  return Math.max(0, capped * jitter);
}

class JitteredBackoffStep implements IBackoff<RetryBackoffContext> {
  readonly duration: number;

  constructor(
    private readonly factory: JitteredExponentialBackoff,
    attempt: number,
  ) {
    this.duration = factory.delayFor(attempt);
  }

  next(context: RetryBackoffContext): IBackoff<RetryBackoffContext> {
    return this.factory.next(context);
  }
}

/**
 * Default retry backoff. Each step's duration depends only on the failed
 * attempt number and one random draw.
 *
 * @example
 * ```typescript
 * const backoff = new JitteredExponentialBackoff({
 *   initialDelayMs: 100,
 *   maxDelayMs: 5_000,
 *   backoffMultiplier: 2,
 *   jitterFactor: 0.1,
 * });
 * backoff.next({ attempt: 3, error }).duration; // ~400ms ± 10%
 * ```
 */
export class JitteredExponentialBackoff implements RetryBackoff {
  constructor(
    readonly options: DelayOptions,
    private readonly random: () => number = Math.random,
  ) {}

  delayFor(attempt: number): number {
    return computeDelay(attempt, this.options, this.random);
  }

  next(context: RetryBackoffContext): IBackoff<RetryBackoffContext> {
    return new JitteredBackoffStep(this, context.attempt);
  }
}
