/**
 * Normalizers shared by the breaker and retry config resolvers. Missing or
 * non-finite values take the default; out-of-range values are clamped.
 *
 * @internal
 */

export const toCount = (value: number | undefined, fallback: number): number =>
  value === undefined || !Number.isFinite(value)
    ? fallback
    : Math.max(1, Math.floor(value));

export const toDurationMs = (
  value: number | undefined,
  fallback: number,
): number =>
  value === undefined || Number.isNaN(value) ? fallback : Math.max(0, value);

export const toRange = (
  value: number | undefined,
  fallback: number,
  min: number,
  max: number,
): number =>
  value === undefined || Number.isNaN(value)
    ? fallback
    : Math.min(max, Math.max(min, value));
