import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { CircuitBreakerConfig } from "../circuit-breaker.mjs";
import type { CircuitBreakerError, CircuitState } from "../types.mjs";

import {
  CircuitBreaker,
  createCircuitBreaker,
  resolveCircuitBreakerConfig,
} from "../circuit-breaker.mjs";
import { isCircuitOpenError } from "../types.mjs";
import {
  createTestLogger,
  deferred,
  expectFailure,
  expectKind,
  failWith,
} from "./helpers.mjs";

const T0 = new Date("2026-03-01T12:00:00.000Z");

describe("CircuitBreaker", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const breakerWith = (config: CircuitBreakerConfig = {}) =>
    createCircuitBreaker({ name: "payments", logger: createTestLogger(), ...config });

  const tripOpen = async (breaker: CircuitBreaker) => {
    for (let i = 0; i < breaker.config.failureThreshold; i++) {
      await breaker.execute(failWith("down"));
    }
  };

  describe("closed state", () => {
    it("should start closed with zeroed metrics", () => {
      const breaker = breakerWith();

      expect(breaker.getMetrics()).toEqual({
        name: "payments",
        state: "closed",
        failureCount: 0,
        successCount: 0,
        lastFailureTime: undefined,
      });
    });

    it("should pass through the operation's value", async () => {
      const breaker = breakerWith();

      const result = await breaker.execute(async () => 42);

      expect(result).toEqual({ success: true, data: 42 });
    });

    it("should wrap a thrown error as execution-failure and keep the cause", async () => {
      const breaker = breakerWith();
      const cause = new Error("socket hang up");

      const result = await breaker.execute(() => Promise.reject(cause));

      const error = expectKind(expectFailure(result), "execution-failure");
      expect(error.message).toBe("Operation failed: payments");
      expect(error.cause).toBe(cause);
      expect(breaker.getFailureCount()).toBe(1);
    });

    it("should reset the failure count on success", async () => {
      const breaker = breakerWith({ failureThreshold: 3 });

      await breaker.execute(failWith("one"));
      await breaker.execute(failWith("two"));
      expect(breaker.getFailureCount()).toBe(2);

      await breaker.execute(() => "ok");

      expect(breaker.getFailureCount()).toBe(0);
      expect(breaker.getState()).toBe("closed");
    });

    it("should open after failureThreshold consecutive failures and stop calling the operation", async () => {
      const breaker = breakerWith({ failureThreshold: 2 });
      const operation = vi.fn(failWith("down"));

      await breaker.execute(operation);
      expect(breaker.getState()).toBe("closed");
      await breaker.execute(operation);
      expect(breaker.getState()).toBe("open");

      const result = await breaker.execute(operation);

      expect(operation).toHaveBeenCalledTimes(2);
      const error = expectFailure(result);
      expect(isCircuitOpenError(error)).toBe(true);
      expect(error.message).toBe("Circuit breaker is OPEN for: payments");
    });

    it("should report when the next probe is allowed", async () => {
      const breaker = breakerWith({
        failureThreshold: 1,
        waitDurationInOpenStateMs: 5_000,
      });
      await tripOpen(breaker);

      vi.advanceTimersByTime(1_200);
      const result = await breaker.execute(() => "unused");

      const error = expectKind(expectFailure(result), "open");
      expect(error.state).toBe("open");
      expect(error.nextAttempt).toEqual(new Date(T0.getTime() + 5_000));
      expect(breaker.getMetrics().lastFailureTime).toEqual(T0);
    });
  });

  describe("open state", () => {
    it("should stay open until the wait duration has elapsed", async () => {
      const breaker = breakerWith({
        failureThreshold: 1,
        waitDurationInOpenStateMs: 1_000,
      });
      await tripOpen(breaker);

      vi.advanceTimersByTime(999);
      const early = await breaker.execute(() => "early");
      expect(early.success).toBe(false);
      expect(breaker.getState()).toBe("open");

      vi.advanceTimersByTime(1);
      let observed: CircuitState | undefined;
      const probe = await breaker.execute(() => {
        observed = breaker.getState();
        return "probe";
      });

      expect(observed).toBe("half-open");
      expect(probe).toEqual({ success: true, data: "probe" });
    });

    it("should not extend the wait when calls are rejected", async () => {
      const breaker = breakerWith({
        failureThreshold: 1,
        successThreshold: 1,
        waitDurationInOpenStateMs: 1_000,
      });
      await tripOpen(breaker);

      vi.advanceTimersByTime(500);
      await breaker.execute(() => "rejected");
      vi.advanceTimersByTime(500);
      const result = await breaker.execute(() => "admitted");

      expect(result).toEqual({ success: true, data: "admitted" });
      expect(breaker.getState()).toBe("closed");
    });
  });

  describe("half-open state", () => {
    it("should close after successThreshold consecutive successes", async () => {
      const breaker = breakerWith({
        failureThreshold: 1,
        successThreshold: 2,
        waitDurationInOpenStateMs: 1_000,
      });
      await tripOpen(breaker);
      vi.advanceTimersByTime(1_000);

      await breaker.execute(() => "first");
      expect(breaker.getState()).toBe("half-open");
      expect(breaker.getSuccessCount()).toBe(1);

      await breaker.execute(() => "second");

      expect(breaker.getState()).toBe("closed");
      expect(breaker.getFailureCount()).toBe(0);
      expect(breaker.getSuccessCount()).toBe(0);
    });

    it("should reopen on a single failure regardless of earlier successes", async () => {
      const breaker = breakerWith({
        failureThreshold: 1,
        successThreshold: 3,
        waitDurationInOpenStateMs: 1_000,
      });
      await tripOpen(breaker);
      vi.advanceTimersByTime(1_000);

      await breaker.execute(() => "one");
      await breaker.execute(() => "two");
      expect(breaker.getSuccessCount()).toBe(2);

      await breaker.execute(failWith("relapse"));

      expect(breaker.getState()).toBe("open");
      expect(breaker.getSuccessCount()).toBe(0);
      expect(breaker.getMetrics().lastFailureTime).toEqual(
        new Date(T0.getTime() + 1_000),
      );

      const rejected = await breaker.execute(() => "too soon");
      expect(rejected.success).toBe(false);
    });

    it("should reject calls beyond the probe slots while probes are in flight", async () => {
      const breaker = breakerWith({
        failureThreshold: 1,
        successThreshold: 2,
        waitDurationInOpenStateMs: 1_000,
      });
      await tripOpen(breaker);
      vi.advanceTimersByTime(1_000);

      const gates = [deferred<string>(), deferred<string>(), deferred<string>()];
      const probes = gates.map((gate) => breaker.execute(() => gate.promise));
      vi.advanceTimersByTime(250);
      const overflow = await breaker.execute(() => "overflow");

      const rejection = expectKind(expectFailure(overflow), "open");
      expect(rejection.state).toBe("half-open");
      expect(rejection.nextAttempt).toEqual(new Date(T0.getTime() + 1_250));

      gates.forEach((gate, index) => gate.resolve(`probe-${index}`));
      const results = await Promise.all(probes);

      expect(results).toEqual([
        { success: true, data: "probe-0" },
        { success: true, data: "probe-1" },
        { success: true, data: "probe-2" },
      ]);
      expect(breaker.getState()).toBe("closed");
    });
  });

  describe("calls that finish after the breaker opened", () => {
    it("should ignore a late success", async () => {
      const breaker = breakerWith({
        failureThreshold: 2,
        waitDurationInOpenStateMs: 1_000,
      });
      const slow = deferred<string>();
      const pending = breaker.execute(() => slow.promise);

      await tripOpen(breaker);
      vi.advanceTimersByTime(300);
      slow.resolve("late");

      expect(await pending).toEqual({ success: true, data: "late" });
      expect(breaker.getMetrics()).toEqual({
        name: "payments",
        state: "open",
        failureCount: 2,
        successCount: 0,
        lastFailureTime: T0,
      });
      const rejection = expectKind(
        expectFailure(await breaker.execute(() => "rejected")),
        "open",
      );
      expect(rejection.nextAttempt).toEqual(new Date(T0.getTime() + 1_000));
    });

    it("should extend the open wait on a late failure", async () => {
      const breaker = breakerWith({
        failureThreshold: 2,
        waitDurationInOpenStateMs: 1_000,
      });
      const slow = deferred<string>();
      const pending = breaker.execute(() => slow.promise);

      await tripOpen(breaker);
      vi.advanceTimersByTime(300);
      slow.reject(new Error("late"));

      expectKind(expectFailure(await pending), "execution-failure");
      expect(breaker.getMetrics()).toEqual({
        name: "payments",
        state: "open",
        failureCount: 2,
        successCount: 0,
        lastFailureTime: new Date(T0.getTime() + 300),
      });

      vi.advanceTimersByTime(700);
      const rejection = expectKind(
        expectFailure(await breaker.execute(() => "rejected")),
        "open",
      );
      expect(rejection.nextAttempt).toEqual(new Date(T0.getTime() + 1_300));

      vi.advanceTimersByTime(300);
      expect(await breaker.execute(() => "probe")).toEqual({
        success: true,
        data: "probe",
      });
      expect(breaker.getState()).toBe("half-open");
    });
  });

  describe("call timeout", () => {
    it("should count a call slower than callTimeoutMs as a failure", () => {
      const breaker = breakerWith({ callTimeoutMs: 100 });

      const result = breaker.executeSync(() => {
        vi.advanceTimersByTime(150);
        return "late";
      });

      const error = expectKind(expectFailure(result), "timeout");
      expect(error.elapsedMs).toBe(150);
      expect(error.timeoutMs).toBe(100);
      expect(error.message).toBe(
        "Operation timed out: payments took 150ms (limit 100ms)",
      );
      expect(breaker.getFailureCount()).toBe(1);
    });

    it("should accept a call that takes exactly callTimeoutMs", () => {
      const breaker = breakerWith({ callTimeoutMs: 100 });

      const result = breaker.executeSync(() => {
        vi.advanceTimersByTime(100);
        return "on time";
      });

      expect(result).toEqual({ success: true, data: "on time" });
    });

    it("should detect slow async operations", async () => {
      const breaker = breakerWith({ callTimeoutMs: 100, failureThreshold: 1 });

      const result = await breaker.execute(async () => {
        vi.advanceTimersByTime(101);
        return "late";
      });

      expectKind(expectFailure(result), "timeout");
      expect(breaker.getState()).toBe("open");
    });
  });

  describe("executeSync / executeVoid", () => {
    it("should run synchronous operations without awaiting", () => {
      const breaker = breakerWith({ failureThreshold: 1 });

      expect(breaker.executeSync(() => "sync")).toEqual({
        success: true,
        data: "sync",
      });

      const failed = breaker.executeSync(failWith("sync failure"));
      expect(failed.success).toBe(false);
      expect(breaker.getState()).toBe("open");
    });

    it("should resolve void operations to an undefined value", async () => {
      const breaker = breakerWith();
      const sideEffect = vi.fn();

      const result = await breaker.executeVoid(() => {
        sideEffect();
      });

      expect(result).toEqual({ success: true, data: undefined });
      expect(sideEffect).toHaveBeenCalledOnce();
    });
  });

  describe("error mapping", () => {
    const describeBreakerError = (error: CircuitBreakerError) =>
      `${error.kind}: ${error.breakerName}`;

    it("should convert breaker errors with the mapper", async () => {
      const breaker = breakerWith({ failureThreshold: 1 });

      const failed = await breaker.execute(failWith("down"), describeBreakerError);
      const rejected = await breaker.execute(() => "unused", describeBreakerError);

      expect(failed).toEqual({
        success: false,
        error: "execution-failure: payments",
      });
      expect(rejected).toEqual({ success: false, error: "open: payments" });
    });

    it("should leave successes untouched", async () => {
      const mapper = vi.fn(describeBreakerError);

      const result = await breakerWith().execute(() => 7, mapper);

      expect(result).toEqual({ success: true, data: 7 });
      expect(mapper).not.toHaveBeenCalled();
    });

    it("should record the outcome before a throwing mapper propagates", async () => {
      const breaker = breakerWith();

      await expect(
        breaker.execute(failWith("down"), () => {
          throw new Error("mapper broke");
        }),
      ).rejects.toThrow("mapper broke");
      expect(breaker.getFailureCount()).toBe(1);
    });

    it("should map synchronous executions", () => {
      const result = breakerWith().executeSync(
        failWith("down"),
        (error) => error.kind,
      );

      expect(result).toEqual({ success: false, error: "execution-failure" });
    });
  });

  describe("decorate", () => {
    it("should guard every call of the wrapped function", async () => {
      const breaker = breakerWith({ failureThreshold: 2 });
      const charge = breaker.decorate((amount: number, currency: string) => {
        if (amount <= 0) {
          throw new Error("declined");
        }
        return `${amount} ${currency}`;
      });

      expect(await charge(10, "EUR")).toEqual({ success: true, data: "10 EUR" });
      await charge(0, "EUR");
      await charge(-1, "EUR");

      expectKind(expectFailure(await charge(10, "EUR")), "open");
      expect(breaker.getState()).toBe("open");
    });

    it("should apply the mapper to each call", async () => {
      const breaker = breakerWith();
      const lookup = breaker.decorate(
        (sku: string) => Promise.reject(new Error(`unknown ${sku}`)),
        (error) => error.message,
      );

      expect(await lookup("sku-1")).toEqual({
        success: false,
        error: "Operation failed: payments",
      });
    });
  });

  describe("manual transitions", () => {
    it("should open immediately and start the wait at the transition", async () => {
      const onStateChange = vi.fn();
      const breaker = breakerWith({
        waitDurationInOpenStateMs: 1_000,
        onStateChange,
      });
      vi.advanceTimersByTime(500);

      breaker.transitionToOpenState();

      expect(breaker.getState()).toBe("open");
      expect(onStateChange).toHaveBeenCalledWith("closed", "open", "payments");
      const rejection = expectKind(
        expectFailure(await breaker.execute(() => "rejected")),
        "open",
      );
      expect(rejection.nextAttempt).toEqual(new Date(T0.getTime() + 1_500));
    });

    it("should start a half-open episode that closes on enough successes", async () => {
      const onStateChange = vi.fn();
      const breaker = breakerWith({ successThreshold: 2, onStateChange });

      breaker.transitionToHalfOpenState();
      await breaker.execute(() => "first");
      expect(breaker.getState()).toBe("half-open");
      await breaker.execute(() => "second");

      expect(onStateChange.mock.calls).toEqual([
        ["closed", "half-open", "payments"],
        ["half-open", "closed", "payments"],
      ]);
    });

    it("should admit successThreshold concurrent probes after a manual half-open", async () => {
      const breaker = breakerWith({ successThreshold: 2 });
      breaker.transitionToHalfOpenState();

      const gates = [deferred<string>(), deferred<string>()];
      const probes = gates.map((gate) => breaker.execute(() => gate.promise));
      const overflow = await breaker.execute(() => "overflow");

      expect(expectKind(expectFailure(overflow), "open").state).toBe("half-open");
      gates.forEach((gate) => gate.resolve("ok"));
      await Promise.all(probes);
      expect(breaker.getState()).toBe("closed");
    });

    it("should close and zero the counters", async () => {
      const logger = createTestLogger();
      const breaker = createCircuitBreaker({
        name: "payments",
        failureThreshold: 1,
        logger,
      });
      await tripOpen(breaker);

      breaker.transitionToClosedState();

      expect(breaker.getState()).toBe("closed");
      expect(breaker.getFailureCount()).toBe(0);
      expect(logger.info).toHaveBeenLastCalledWith(
        "Circuit breaker payments manually moved to CLOSED",
        { breaker: "payments" },
      );
    });
  });

  describe("reset", () => {
    it("should force the breaker closed and zero the counters", async () => {
      const onStateChange = vi.fn();
      const breaker = breakerWith({ failureThreshold: 1, onStateChange });
      await tripOpen(breaker);

      breaker.reset();

      expect(breaker.getState()).toBe("closed");
      expect(breaker.getFailureCount()).toBe(0);
      expect(breaker.getSuccessCount()).toBe(0);
      expect(onStateChange).toHaveBeenLastCalledWith("open", "closed", "payments");
      expect(await breaker.execute(() => "after reset")).toEqual({
        success: true,
        data: "after reset",
      });
    });

    it("should not notify when already closed", () => {
      const onStateChange = vi.fn();
      const breaker = breakerWith({ onStateChange });

      breaker.reset();

      expect(onStateChange).not.toHaveBeenCalled();
    });
  });

  describe("observability", () => {
    it("should report every transition in order", async () => {
      const onStateChange = vi.fn();
      const breaker = breakerWith({
        failureThreshold: 1,
        successThreshold: 1,
        waitDurationInOpenStateMs: 1_000,
        onStateChange,
      });

      await tripOpen(breaker);
      vi.advanceTimersByTime(1_000);
      await breaker.execute(() => "recovered");

      expect(onStateChange.mock.calls).toEqual([
        ["closed", "open", "payments"],
        ["open", "half-open", "payments"],
        ["half-open", "closed", "payments"],
      ]);
    });

    it("should log the transition to open", async () => {
      const logger = createTestLogger();
      const breaker = createCircuitBreaker({
        name: "payments",
        failureThreshold: 2,
        logger,
      });

      await tripOpen(breaker);

      expect(logger.warn).toHaveBeenCalledWith(
        "Circuit breaker payments threshold exceeded (2), transitioning to OPEN",
        { breaker: "payments", failureCount: 2 },
      );
    });

    it("should keep state separate between breakers", async () => {
      const first = breakerWith({ name: "first", failureThreshold: 1 });
      const second = breakerWith({ name: "second", failureThreshold: 1 });

      await tripOpen(first);

      expect(first.getState()).toBe("open");
      expect(second.getState()).toBe("closed");
    });
  });
});

describe("resolveCircuitBreakerConfig", () => {
  it("should apply defaults", () => {
    expect(resolveCircuitBreakerConfig()).toEqual({
      name: "circuit-breaker",
      failureThreshold: 5,
      successThreshold: 3,
      waitDurationInOpenStateMs: 30_000,
      callTimeoutMs: 1_000,
    });
  });

  it("should clamp out-of-range values", () => {
    const config = resolveCircuitBreakerConfig({
      failureThreshold: 0,
      successThreshold: 2.7,
      waitDurationInOpenStateMs: -5,
      callTimeoutMs: Number.NaN,
    });

    expect(config).toEqual({
      name: "circuit-breaker",
      failureThreshold: 1,
      successThreshold: 2,
      waitDurationInOpenStateMs: 0,
      callTimeoutMs: 1_000,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });
});
