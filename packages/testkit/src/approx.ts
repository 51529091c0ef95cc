import { AssertionError } from "node:assert";

const DEFAULT_EPSILON = 1e-6;

/** Compare two floats within an absolute tolerance. */
export function approxEqual(a: number, b: number, epsilon = DEFAULT_EPSILON): boolean {
  if (Number.isNaN(a) || Number.isNaN(b)) return false;
  if (a === b) return true;
  return Math.abs(a - b) <= epsilon;
}

/** Assert that `actual` is within `epsilon` of `expected`. */
export function assertApprox(
  actual: number,
  expected: number,
  message?: string,
  epsilon = DEFAULT_EPSILON,
): void {
  if (approxEqual(actual, expected, epsilon)) return;
  throw new AssertionError({
    actual,
    expected,
    operator: "approxEqual",
    message: message ?? `expected ${actual} to be within ${epsilon} of ${expected}`,
  });
}
