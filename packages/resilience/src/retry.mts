/**
 * Result-aware retry policy with exponential backoff and jitter.
 *
 * A policy is immutable configuration. Each execution owns its attempt counter
 * and last error, so one policy can be shared across concurrent callers.
 */

import { Result } from "@bulwark/functional";

import type { BaseLogger } from "@bulwark/logger";
import type { IBackoff } from "cockatiel";

import type { RetryBackoff, RetryBackoffContext } from "./backoff.mjs";
import type { CircuitBreaker } from "./circuit-breaker.mjs";
import type {
  CircuitBreakerError,
  ErrorMapper,
  RetryExhaustedError,
  RetryExhaustedReason,
  RetryFailure,
  RetryInterruptedError,
} from "./types.mjs";

import { JitteredExponentialBackoff } from "./backoff.mjs";
import { toCount, toRange } from "./config.mjs";
import { resilienceLogger } from "./logger.mjs";
import {
  createRetryExhaustedError,
  createRetryInterruptedError,
} from "./types.mjs";
import {
  captureAsync,
  describeError,
  maxTimerDelayMs,
  sleep,
  toTimerDelay,
} from "./utils.mjs";

/**
 * Decides whether the error of a failed attempt is worth another attempt.
 * Exceptions thrown here are programmer errors and propagate to the caller.
 */
export type RetryPredicate = (error: unknown, attempt: number) => boolean;

export interface RetryAttemptContext {
  /** 1-based attempt number */
  readonly attempt: number;
  /** The caller's signal, when the execution was given one */
  readonly signal?: AbortSignal;
}

export type RetryOperation<T> = (
  context: RetryAttemptContext,
) => T | PromiseLike<T>;

export interface RetryExecuteOptions {
  /** Aborting ends the retry loop with a `retry-interrupted` error */
  readonly signal?: AbortSignal;
}

/**
 * Retry configuration options
 */
export interface RetryConfig {
  readonly name?: string;
  /** Total attempts including the first one */
  readonly maxAttempts?: number;
  /** Delay after the first failed attempt (in ms), at most 2^31 - 1 */
  readonly initialDelayMs?: number;
  /** Cap applied before jitter (in ms) */
  readonly maxDelayMs?: number;
  /** Growth factor per attempt, at least 1 */
  readonly backoffMultiplier?: number;
  /** Symmetric jitter as a fraction of the delay, in [0, 1] */
  readonly jitterFactor?: number;
  /** Defaults to retrying every error */
  readonly shouldRetry?: RetryPredicate;
  /** Replaces the jittered exponential backoff built from the fields above */
  readonly backoff?: RetryBackoff;
  readonly logger?: BaseLogger;
}

export type ResolvedRetryConfig = Readonly<
  Required<Omit<RetryConfig, "shouldRetry" | "backoff" | "logger">>
>;

type RetryAttempt<T, E> = (
  context: RetryAttemptContext,
) => Promise<Result<T, E>>;

const defaultConfig: ResolvedRetryConfig = {
  name: "retry-policy",
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

const retryAll: RetryPredicate = () => true;

const isErrorMapper = <F,>(
  value: ErrorMapper<RetryFailure, F> | RetryExecuteOptions | undefined,
): value is ErrorMapper<RetryFailure, F> => typeof value === "function";

export function resolveRetryConfig(
  config: RetryConfig = {},
): ResolvedRetryConfig {
  return Object.freeze({
    name: config.name ?? defaultConfig.name,
    maxAttempts: toCount(config.maxAttempts, defaultConfig.maxAttempts),
    initialDelayMs: toRange(
      config.initialDelayMs,
      defaultConfig.initialDelayMs,
      0,
      maxTimerDelayMs,
    ),
    maxDelayMs: toRange(
      config.maxDelayMs,
      defaultConfig.maxDelayMs,
      0,
      maxTimerDelayMs,
    ),
    backoffMultiplier: toRange(
      config.backoffMultiplier,
      defaultConfig.backoffMultiplier,
      1,
      Number.POSITIVE_INFINITY,
    ),
    jitterFactor: toRange(config.jitterFactor, defaultConfig.jitterFactor, 0, 1),
  });
}

export class RetryPolicy {
  readonly name: string;
  readonly config: ResolvedRetryConfig;

  private readonly shouldRetry: RetryPredicate;
  private readonly backoff: RetryBackoff;
  private readonly logger: BaseLogger;

  constructor(config: RetryConfig = {}) {
    this.config = resolveRetryConfig(config);
    this.name = this.config.name;
    this.shouldRetry = config.shouldRetry ?? retryAll;
    this.backoff = config.backoff ?? new JitteredExponentialBackoff(this.config);
    this.logger = config.logger ?? resilienceLogger;
  }

  /**
   * Run `operation` until it succeeds, attempts run out, or the predicate
   * declines an error. The caller awaits each backoff wait; aborting
   * `options.signal` during a wait ends the loop.
   *
   * With `errorMapper`, the retry error is converted before it is returned.
   *
   * @example
   * ```typescript
   * const policy = createRetryPolicy({ maxAttempts: 4, initialDelayMs: 200 });
   * const result = await policy.execute(() => client.fetchRates(), { signal });
   * const mapped = await policy.execute(
   *   () => client.fetchRates(),
   *   (error) => `rates unavailable after ${error.attempts} attempts`,
   * );
   * ```
   */
  execute<T, F>(
    operation: RetryOperation<T>,
    errorMapper: ErrorMapper<RetryFailure, F>,
    options?: RetryExecuteOptions,
  ): Promise<Result<T, F>>;
  execute<T>(
    operation: RetryOperation<T>,
    options?: RetryExecuteOptions,
  ): Promise<Result<T, RetryFailure>>;
  async execute<T, F>(
    operation: RetryOperation<T>,
    mapperOrOptions?: ErrorMapper<RetryFailure, F> | RetryExecuteOptions,
    options: RetryExecuteOptions = {},
  ): Promise<Result<T, RetryFailure | F>> {
    const errorMapper = isErrorMapper(mapperOrOptions)
      ? mapperOrOptions
      : undefined;
    const { signal } = isErrorMapper(mapperOrOptions)
      ? options
      : (mapperOrOptions ?? options);

    const result = await this.run(
      (context) => captureAsync(() => operation(context)),
      signal,
    );
    return errorMapper
      ? Result.mapError<T, RetryFailure, F>(errorMapper)(result)
      : result;
  }

  /**
   * Same attempt and backoff sequence as {@link execute}, driven by timer
   * callbacks: each attempt is dispatched on `setImmediate` and each wait is a
   * `setTimeout` continuation, so nothing awaits between attempts.
   */
  executeAsync<T>(
    operation: RetryOperation<T>,
  ): Promise<Result<T, RetryExhaustedError>> {
    return this.schedule((context) => captureAsync(() => operation(context)));
  }

  executeVoid(
    operation: RetryOperation<void>,
    options: RetryExecuteOptions = {},
  ): Promise<Result<void, RetryFailure>> {
    return this.execute(operation, options);
  }

  /**
   * Wrap `operation` so every call of the returned function is retried by
   * this policy.
   *
   * @example
   * ```typescript
   * const fetchRate = policy.decorate((pair: string) => client.fetchRate(pair));
   * const result = await fetchRate('EUR/USD');
   * ```
   */
  decorate<A extends unknown[], T, F>(
    operation: (...args: A) => T | PromiseLike<T>,
    errorMapper: ErrorMapper<RetryFailure, F>,
  ): (...args: A) => Promise<Result<T, F>>;
  decorate<A extends unknown[], T>(
    operation: (...args: A) => T | PromiseLike<T>,
  ): (...args: A) => Promise<Result<T, RetryFailure>>;
  decorate<A extends unknown[], T, F>(
    operation: (...args: A) => T | PromiseLike<T>,
    errorMapper?: ErrorMapper<RetryFailure, F>,
  ): (...args: A) => Promise<Result<T, RetryFailure | F>> {
    return (...args: A) =>
      errorMapper
        ? this.execute(() => operation(...args), errorMapper)
        : this.execute(() => operation(...args));
  }

  /**
   * Route every attempt through `breaker`. A rejection by an open breaker is a
   * failed attempt like any other: it goes through the predicate and the
   * backoff, and the next attempt asks the breaker again.
   *
   * @example
   * ```typescript
   * const breaker = createCircuitBreaker({ name: 'gateway', failureThreshold: 3 });
   * const result = await createRetryPolicy(retryPresets.network)
   *   .executeWithCircuitBreaker(() => gateway.charge(order), breaker);
   * ```
   */
  executeWithCircuitBreaker<T>(
    operation: RetryOperation<T>,
    breaker: CircuitBreaker,
    options: RetryExecuteOptions = {},
  ): Promise<Result<T, RetryFailure<CircuitBreakerError>>> {
    return this.run(
      (context) => breaker.execute(() => operation(context)),
      options.signal,
    );
  }

  private async run<T, E>(
    runAttempt: RetryAttempt<T, E>,
    signal?: AbortSignal,
  ): Promise<Result<T, RetryFailure<E>>> {
    let backoff: IBackoff<RetryBackoffContext> | undefined;
    let lastError: E | undefined;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        return Result.err(this.interrupted(attempt - 1, lastError, signal.reason));
      }

      const outcome = await runAttempt({ attempt, signal });
      if (outcome.success) {
        this.logRecovery(attempt);
        return Result.ok(outcome.data);
      }

      lastError = outcome.error;
      const stop = this.stopReason(outcome.error, attempt);
      if (stop) {
        return Result.err(this.exhausted(attempt, outcome.error, stop));
      }

      backoff = this.nextBackoff(backoff, { attempt, error: outcome.error });
      const delayMs = toTimerDelay(backoff.duration);
      this.logRetry(attempt, delayMs, outcome.error);

      const waited = await sleep(delayMs, signal);
      if (!waited.success) {
        return Result.err(this.interrupted(attempt, lastError, waited.error));
      }
    }
  }

  private schedule<T, E>(
    runAttempt: RetryAttempt<T, E>,
  ): Promise<Result<T, RetryExhaustedError<E>>> {
    return new Promise((resolve, reject) => {
      let backoff: IBackoff<RetryBackoffContext> | undefined;

      const dispatch = (attempt: number): void => {
        setImmediate(() => {
          runAttempt({ attempt })
            .then((outcome) => {
              if (outcome.success) {
                this.logRecovery(attempt);
                resolve(Result.ok(outcome.data));
                return;
              }

              const stop = this.stopReason(outcome.error, attempt);
              if (stop) {
                resolve(Result.err(this.exhausted(attempt, outcome.error, stop)));
                return;
              }

              backoff = this.nextBackoff(backoff, {
                attempt,
                error: outcome.error,
              });
              const delayMs = toTimerDelay(backoff.duration);
              this.logRetry(attempt, delayMs, outcome.error);
              setTimeout(() => dispatch(attempt + 1), delayMs);
            })
            // only a throwing predicate or backoff lands here
            .catch(reject);
        });
      };

      dispatch(1);
    });
  }

  private stopReason(
    error: unknown,
    attempt: number,
  ): RetryExhaustedReason | undefined {
    if (attempt >= this.config.maxAttempts) {
      return "attempts-exhausted";
    }
    if (!this.shouldRetry(error, attempt)) {
      return "not-retryable";
    }
    return undefined;
  }

  private nextBackoff(
    previous: IBackoff<RetryBackoffContext> | undefined,
    context: RetryBackoffContext,
  ): IBackoff<RetryBackoffContext> {
    return previous ? previous.next(context) : this.backoff.next(context);
  }

  private exhausted<E>(
    attempts: number,
    lastError: E,
    reason: RetryExhaustedReason,
  ): RetryExhaustedError<E> {
    this.logger.error(`Operation ${this.name} failed after ${attempts} attempts`, {
      policy: this.name,
      attempts,
      reason,
      error: describeError(lastError),
    });
    return createRetryExhaustedError(this.name, attempts, lastError, reason);
  }

  private interrupted<E>(
    attempts: number,
    lastError: E | undefined,
    reason: unknown,
  ): RetryInterruptedError<E> {
    this.logger.warn(`Retry interrupted: ${this.name}`, {
      policy: this.name,
      attempts,
    });
    return createRetryInterruptedError(this.name, attempts, lastError, reason);
  }

  private logRetry(attempt: number, delayMs: number, error: unknown): void {
    this.logger.warn(
      `Operation ${this.name} failed on attempt ${attempt}, retrying in ${Math.round(delayMs)}ms`,
      { policy: this.name, attempt, delayMs, error: describeError(error) },
    );
  }

  private logRecovery(attempt: number): void {
    if (attempt > 1) {
      this.logger.info(`Operation ${this.name} succeeded on attempt ${attempt}`, {
        policy: this.name,
        attempt,
      });
    }
  }
}

/**
 * Create a retry policy from configuration.
 *
 * @example
 * ```typescript
 * const policy = createRetryPolicy({
 *   name: 'rates',
 *   maxAttempts: 3,
 *   initialDelayMs: 100,
 *   shouldRetry: (error) => !(error instanceof SyntaxError),
 * });
 * ```
 */
export function createRetryPolicy(config: RetryConfig = {}): RetryPolicy {
  return new RetryPolicy(config);
}
