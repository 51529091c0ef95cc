/**
 * packages/core/src/errors.ts — Core error codes and the error class.
 *
 * Every failure raised by the core is a developer-facing contract violation:
 * stale handles, slot protocol misuse, malformed trees, bad config and
 * reentrant calls from inside an event handler. Soft misses (searches that
 * find nothing) return NONE_HANDLE instead of throwing.
 */

/**
 * Deterministic error codes for all core violations.
 *
 *   - UI_STALE_HANDLE: handle is none, out of range, freed, or its slot is vacated
 *   - UI_SLOT_OCCUPIED: putBack into a slot that was not taken out
 *   - UI_INVALID_TREE: link would create a cycle, or the root would be removed/reparented
 *   - UI_INVALID_CONFIG: UiConfig value failed validation
 *   - UI_REENTRANT_CALL: frame operation invoked from inside an event handler
 *   - UI_USER_CODE_THROW: handleEvent threw something that is not a UiCoreError;
 *     the other hooks propagate what they throw unchanged
 */
export type UiCoreErrorCode =
  | "UI_STALE_HANDLE"
  | "UI_SLOT_OCCUPIED"
  | "UI_INVALID_TREE"
  | "UI_INVALID_CONFIG"
  | "UI_REENTRANT_CALL"
  | "UI_USER_CODE_THROW";

/**
 * Error class for all core contract violations.
 * The `code` property identifies the specific violation.
 */
export class UiCoreError extends Error {
  override readonly name = "UiCoreError";
  readonly code: UiCoreErrorCode;

  constructor(code: UiCoreErrorCode, message?: string, options?: ErrorOptions) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UiCoreError);
    }
  }
}

export function isUiCoreError(value: unknown): value is UiCoreError {
  return value instanceof UiCoreError;
}
