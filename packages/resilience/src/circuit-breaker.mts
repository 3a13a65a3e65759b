/**
 * Result-aware circuit breaker.
 *
 * A breaker guards one logical operation. It counts consecutive failures while
 * closed, fails fast while open, and after the open wait admits a bounded
 * number of half-open probes to decide whether the operation has recovered.
 *
 * All bookkeeping runs synchronously between awaits, so every admission
 * decision and transition is atomic on the event loop without a lock.
 */

import { Result } from "@bulwark/functional";

import type { BaseLogger } from "@bulwark/logger";

import type {
  CircuitBreakerError,
  CircuitOpenError,
  CircuitState,
  ErrorMapper,
} from "./types.mjs";

import { toCount, toDurationMs } from "./config.mjs";
import { resilienceLogger } from "./logger.mjs";
import {
  createCircuitExecutionError,
  createCircuitOpenError,
  createCircuitTimeoutError,
} from "./types.mjs";
import { captureAsync, captureSync } from "./utils.mjs";

export type CircuitStateListener = (
  from: CircuitState,
  to: CircuitState,
  breakerName: string,
) => void;

/**
 * Circuit breaker configuration
 */
export interface CircuitBreakerConfig {
  /** Used in logs, errors and metrics only */
  readonly name?: string;
  /** Consecutive failures while closed before opening */
  readonly failureThreshold?: number;
  /** Consecutive half-open successes before closing; also caps extra probes */
  readonly successThreshold?: number;
  /** How long to stay open after the last failure (in ms) */
  readonly waitDurationInOpenStateMs?: number;
  /** Calls slower than this count as failures (in ms), measured after they finish */
  readonly callTimeoutMs?: number;
  /** Called on every state transition */
  readonly onStateChange?: CircuitStateListener;
  readonly logger?: BaseLogger;
}

export type ResolvedCircuitBreakerConfig = Readonly<
  Required<Omit<CircuitBreakerConfig, "onStateChange" | "logger">>
>;

export interface CircuitBreakerMetrics {
  readonly name: string;
  readonly state: CircuitState;
  readonly failureCount: number;
  readonly successCount: number;
  /** Absent until the first recorded failure */
  readonly lastFailureTime?: Date;
}

const defaultConfig: ResolvedCircuitBreakerConfig = {
  name: "circuit-breaker",
  failureThreshold: 5,
  successThreshold: 3,
  waitDurationInOpenStateMs: 30_000,
  callTimeoutMs: 1_000,
};

export function resolveCircuitBreakerConfig(
  config: CircuitBreakerConfig = {},
): ResolvedCircuitBreakerConfig {
  return Object.freeze({
    name: config.name ?? defaultConfig.name,
    failureThreshold: toCount(
      config.failureThreshold,
      defaultConfig.failureThreshold,
    ),
    successThreshold: toCount(
      config.successThreshold,
      defaultConfig.successThreshold,
    ),
    waitDurationInOpenStateMs: toDurationMs(
      config.waitDurationInOpenStateMs,
      defaultConfig.waitDurationInOpenStateMs,
    ),
    callTimeoutMs: toDurationMs(
      config.callTimeoutMs,
      defaultConfig.callTimeoutMs,
    ),
  });
}

export class CircuitBreaker {
  readonly name: string;
  readonly config: ResolvedCircuitBreakerConfig;

  private readonly logger: BaseLogger;
  private readonly onStateChange?: CircuitStateListener;

  private state: CircuitState = "closed";
  private failureCount = 0;
  private successCount = 0;
  // epoch ms; 0 until the first failure
  private lastFailureTime = 0;
  private halfOpenCalls = 0;

  constructor(config: CircuitBreakerConfig = {}) {
    this.config = resolveCircuitBreakerConfig(config);
    this.name = this.config.name;
    this.logger = config.logger ?? resilienceLogger;
    this.onStateChange = config.onStateChange;
  }

  /**
   * Execute an operation through the breaker. Sync and async operations are
   * both accepted; a throw or rejection becomes `execution-failure`.
   * With `errorMapper`, breaker errors are converted after the outcome has been
   * recorded.
   *
   * @example
   * ```typescript
   * const result = await breaker.execute(() => inventory.reserve(sku));
   * const mapped = await breaker.execute(
   *   () => inventory.reserve(sku),
   *   (error) => new InventoryUnavailable(error.message),
   * );
   * ```
   */
  execute<T, F>(
    operation: () => T | PromiseLike<T>,
    errorMapper: ErrorMapper<CircuitBreakerError, F>,
  ): Promise<Result<T, F>>;
  execute<T>(
    operation: () => T | PromiseLike<T>,
  ): Promise<Result<T, CircuitBreakerError>>;
  async execute<T, F>(
    operation: () => T | PromiseLike<T>,
    errorMapper?: ErrorMapper<CircuitBreakerError, F>,
  ): Promise<Result<T, CircuitBreakerError | F>> {
    const result = await this.guard(operation);
    return errorMapper
      ? Result.mapError<T, CircuitBreakerError, F>(errorMapper)(result)
      : result;
  }

  /**
   * Execute a synchronous operation through the breaker without yielding to
   * the event loop.
   */
  executeSync<T, F>(
    operation: () => T,
    errorMapper: ErrorMapper<CircuitBreakerError, F>,
  ): Result<T, F>;
  executeSync<T>(operation: () => T): Result<T, CircuitBreakerError>;
  executeSync<T, F>(
    operation: () => T,
    errorMapper?: ErrorMapper<CircuitBreakerError, F>,
  ): Result<T, CircuitBreakerError | F> {
    const result = this.guardSync(operation);
    return errorMapper
      ? Result.mapError<T, CircuitBreakerError, F>(errorMapper)(result)
      : result;
  }

  executeVoid(
    operation: () => void | PromiseLike<void>,
  ): Promise<Result<void, CircuitBreakerError>> {
    return this.execute(operation);
  }

  /**
   * Wrap `operation` so every call of the returned function goes through this
   * breaker.
   *
   * @example
   * ```typescript
   * const reserve = breaker.decorate((sku: string) => inventory.reserve(sku));
   * const result = await reserve('sku-1');
   * ```
   */
  decorate<A extends unknown[], T, F>(
    operation: (...args: A) => T | PromiseLike<T>,
    errorMapper: ErrorMapper<CircuitBreakerError, F>,
  ): (...args: A) => Promise<Result<T, F>>;
  decorate<A extends unknown[], T>(
    operation: (...args: A) => T | PromiseLike<T>,
  ): (...args: A) => Promise<Result<T, CircuitBreakerError>>;
  decorate<A extends unknown[], T, F>(
    operation: (...args: A) => T | PromiseLike<T>,
    errorMapper?: ErrorMapper<CircuitBreakerError, F>,
  ): (...args: A) => Promise<Result<T, CircuitBreakerError | F>> {
    return (...args: A) =>
      errorMapper
        ? this.execute(() => operation(...args), errorMapper)
        : this.execute(() => operation(...args));
  }

  getState(): CircuitState {
    return this.state;
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  getSuccessCount(): number {
    return this.successCount;
  }

  getMetrics(): CircuitBreakerMetrics {
    return {
      name: this.name,
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime:
        this.lastFailureTime > 0 ? new Date(this.lastFailureTime) : undefined,
    };
  }

  /**
   * Force the breaker closed and zero every counter. Meant for operator
   * intervention, not for normal recovery.
   */
  reset(): void {
    this.transitionToClosedState();
  }

  /**
   * Open the breaker now. The open wait starts at the moment of the call.
   */
  transitionToOpenState(): void {
    this.lastFailureTime = Date.now();
    this.successCount = 0;
    this.halfOpenCalls = 0;
    this.transitionTo("open");
    this.logManualTransition("OPEN");
  }

  /**
   * Start a half-open episode now. The next `successThreshold` calls are
   * admitted as probes.
   */
  transitionToHalfOpenState(): void {
    this.successCount = 0;
    this.halfOpenCalls = 0;
    this.transitionTo("half-open");
    this.logManualTransition("HALF_OPEN");
  }

  transitionToClosedState(): void {
    this.failureCount = 0;
    this.successCount = 0;
    this.halfOpenCalls = 0;
    this.transitionTo("closed");
    this.logManualTransition("CLOSED");
  }

  private async guard<T>(
    operation: () => T | PromiseLike<T>,
  ): Promise<Result<T, CircuitBreakerError>> {
    const rejection = this.acquire();
    if (rejection) {
      return Result.err(rejection);
    }

    const startedAt = Date.now();
    const outcome = await captureAsync(operation);
    return this.record(outcome, Date.now() - startedAt);
  }

  private guardSync<T>(operation: () => T): Result<T, CircuitBreakerError> {
    const rejection = this.acquire();
    if (rejection) {
      return Result.err(rejection);
    }

    const startedAt = Date.now();
    const outcome = captureSync(operation);
    return this.record(outcome, Date.now() - startedAt);
  }

  /**
   * Admission decision. Returns the rejection, or undefined when the call may
   * run.
   */
  private acquire(): CircuitOpenError | undefined {
    switch (this.state) {
      case "closed":
        return undefined;

      case "open":
        if (
          Date.now() - this.lastFailureTime >=
          this.config.waitDurationInOpenStateMs
        ) {
          this.halfOpenCalls = 0;
          this.successCount = 0;
          this.transitionTo("half-open");
          return undefined;
        }
        return this.rejection("open");

      case "half-open":
        this.halfOpenCalls += 1;
        return this.halfOpenCalls <= this.config.successThreshold
          ? undefined
          : this.rejection("half-open");
    }
  }

  private record<T>(
    outcome: Result<T, unknown>,
    elapsedMs: number,
  ): Result<T, CircuitBreakerError> {
    if (!outcome.success) {
      this.onFailure();
      return Result.err(createCircuitExecutionError(this.name, outcome.error));
    }

    if (elapsedMs > this.config.callTimeoutMs) {
      this.onFailure();
      return Result.err(
        createCircuitTimeoutError(this.name, elapsedMs, this.config.callTimeoutMs),
      );
    }

    this.onSuccess();
    return Result.ok(outcome.data);
  }

  private onSuccess(): void {
    switch (this.state) {
      case "closed":
        this.failureCount = 0;
        return;

      case "half-open":
        this.successCount += 1;
        if (this.successCount >= this.config.successThreshold) {
          this.failureCount = 0;
          this.successCount = 0;
          this.halfOpenCalls = 0;
          this.transitionTo("closed");
          this.logger.info(
            `Circuit breaker ${this.name} recovered and transitioned to CLOSED`,
            { breaker: this.name },
          );
        }
        return;

      case "open":
        // a call admitted before the breaker opened finished late
        return;
    }
  }

  private onFailure(): void {
    this.lastFailureTime = Date.now();

    switch (this.state) {
      case "half-open":
        this.successCount = 0;
        this.transitionTo("open");
        this.logger.warn(
          `Circuit breaker ${this.name} failed during HALF_OPEN, transitioning back to OPEN`,
          { breaker: this.name },
        );
        return;

      case "closed":
        this.failureCount += 1;
        if (this.failureCount >= this.config.failureThreshold) {
          this.transitionTo("open");
          this.logger.warn(
            `Circuit breaker ${this.name} threshold exceeded (${this.failureCount}), transitioning to OPEN`,
            { breaker: this.name, failureCount: this.failureCount },
          );
        }
        return;

      case "open":
        return;
    }
  }

  private rejection(state: "open" | "half-open"): CircuitOpenError {
    const nextAttempt =
      state === "open"
        ? this.lastFailureTime + this.config.waitDurationInOpenStateMs
        : Date.now();
    return createCircuitOpenError(this.name, state, new Date(nextAttempt));
  }

  private logManualTransition(state: "OPEN" | "HALF_OPEN" | "CLOSED"): void {
    this.logger.info(`Circuit breaker ${this.name} manually moved to ${state}`, {
      breaker: this.name,
    });
  }

  private transitionTo(next: CircuitState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    if (next === "half-open") {
      this.logger.info(
        `Circuit breaker ${this.name} transitioning to HALF_OPEN`,
        { breaker: this.name },
      );
    }
    this.onStateChange?.(previous, next, this.name);
  }
}

/**
 * Create a circuit breaker for one named operation.
 *
 * @example
 * ```typescript
 * const breaker = createCircuitBreaker({
 *   name: 'pricing-api',
 *   failureThreshold: 5,
 *   waitDurationInOpenStateMs: 30_000,
 * });
 *
 * const result = await breaker.execute(() => pricing.quote(sku));
 * if (!result.success && result.error.kind === 'open') {
 *   // fail fast, the service is presumed down
 * }
 * ```
 */
export function createCircuitBreaker(
  config: CircuitBreakerConfig = {},
): CircuitBreaker {
  return new CircuitBreaker(config);
}
