/**
 * Numeric normalization shared by measure and arrange.
 *
 * Layout never fails on malformed numbers: negative or NaN sizes become 0,
 * a non-finite explicit size means "unset".
 */

export function clampNonNegative(v: number): number {
  return v > 0 ? v : 0;
}

/** Explicit size if set (finite), clamped non-negative; null when unset. */
export function resolveExplicit(v: number): number | null {
  if (!Number.isFinite(v)) return null;
  return clampNonNegative(v);
}

/** Hard clamp into [min, max]; min wins when min > max. NaN bounds are ignored. */
export function clampRange(v: number, min: number, max: number): number {
  const lo = Number.isNaN(min) ? 0 : min;
  const hi = Number.isNaN(max) ? Number.POSITIVE_INFINITY : max;
  return Math.max(lo, Math.min(v, hi));
}

/** Available size for one axis: NaN behaves like 0, +Infinity stays unbounded. */
export function normalizeAvailable(v: number): number {
  return Number.isNaN(v) ? 0 : clampNonNegative(v);
}
