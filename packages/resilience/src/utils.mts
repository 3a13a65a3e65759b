/**
 * Boundary helpers: the one place where thrown errors become Result values,
 * and a cancellable wait for the retry loop.
 */

import { Result } from "@bulwark/functional";

/**
 * Runs a possibly-async operation and captures a throw or rejection as
 * `Result.err`. Nothing thrown by `operation` escapes.
 *
 * @internal
 */
export async function captureAsync<T>(
  operation: () => T | PromiseLike<T>,
): Promise<Result<T, unknown>> {
  try {
    return Result.ok(await operation());
  } catch (error) {
    return Result.err(error);
  }
}

/**
 * Synchronous counterpart of {@link captureAsync}.
 *
 * @internal
 */
export function captureSync<T>(operation: () => T): Result<T, unknown> {
  try {
    return Result.ok(operation());
  } catch (error) {
    return Result.err(error);
  }
}

/** Largest delay a Node timer honours; longer ones fire after 1ms */
export const maxTimerDelayMs = 2_147_483_647;

/**
 * Clamps a delay into what `setTimeout` will actually wait.
 *
 * @internal
 */
export const toTimerDelay = (ms: number): number =>
  Number.isNaN(ms) ? 0 : Math.min(Math.max(0, ms), maxTimerDelayMs);

/**
 * Waits `ms` milliseconds on a timer, at most {@link maxTimerDelayMs}. Resolves `Result.err(reason)` as soon as
 * `signal` aborts, including when it was already aborted.
 *
 * @internal
 */
export function sleep(
  ms: number,
  signal?: AbortSignal,
): Promise<Result<void, unknown>> {
  if (signal?.aborted) {
    return Promise.resolve(Result.err(signal.reason));
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(Result.err(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(Result.ok(undefined));
    }, toTimerDelay(ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Best-effort one-line description of an unknown error for log meta.
 *
 * @internal
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}
