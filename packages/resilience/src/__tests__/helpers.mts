import { expect, vi } from "vitest";

import type { Result } from "@bulwark/functional";
import type { BaseLogger } from "@bulwark/logger";

export const createTestLogger = () =>
  ({
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  }) satisfies BaseLogger;

export function deferred<T>() {
  let settle: (value: T) => void = () => undefined;
  let fail: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((resolve, reject) => {
    settle = resolve;
    fail = reject;
  });
  return {
    promise,
    resolve: (value: T) => settle(value),
    reject: (reason: unknown) => fail(reason),
  };
}

export const failWith = (message: string) => () => {
  throw new Error(message);
};

export const networkError = (code: string) =>
  Object.assign(new Error(`connect ${code}`), { code });

/** Asserts a failed result and returns its error */
export function expectFailure<T, E>(result: Result<T, E>): E {
  expect(result.success).toBe(false);
  if (result.success) {
    throw new Error("expected a failed result");
  }
  return result.error;
}

const hasTag = <E extends { readonly tag: string }, Tag extends E["tag"]>(
  error: E,
  tag: Tag,
): error is Extract<E, { readonly tag: Tag }> => error.tag === tag;

const hasKind = <E extends { readonly kind: string }, Kind extends E["kind"]>(
  error: E,
  kind: Kind,
): error is Extract<E, { readonly kind: Kind }> => error.kind === kind;

/** Asserts the error's tag and narrows to that variant */
export function expectTag<
  E extends { readonly tag: string },
  Tag extends E["tag"],
>(error: E, tag: Tag): Extract<E, { readonly tag: Tag }> {
  expect(error.tag).toBe(tag);
  if (!hasTag(error, tag)) {
    throw new Error(`expected a ${tag} error`);
  }
  return error;
}

/** Asserts a circuit breaker error's kind and narrows to that variant */
export function expectKind<
  E extends { readonly kind: string },
  Kind extends E["kind"],
>(error: E, kind: Kind): Extract<E, { readonly kind: Kind }> {
  expect(error.kind).toBe(kind);
  if (!hasKind(error, kind)) {
    throw new Error(`expected a ${kind} error`);
  }
  return error;
}
