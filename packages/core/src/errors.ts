/**
 * packages/core/src/errors.ts — Error codes for contract violations.
 *
 * Why: Every failure the widget core can observe is a programming error in the
 * embedding application (re-entrant access, a closed action channel, an
 * incomplete style table). These are thrown synchronously and never caught by
 * the core, so they surface at the call that dispatched the event.
 */

/**
 * Deterministic error codes for all runtime violations.
 * These are surfaced as VellumError instances.
 */
export type VellumErrorCode =
  | "VELLUM_REENTRANT_BORROW"
  | "VELLUM_REENTRANT_DISPATCH"
  | "VELLUM_ACTION_CHANNEL_CLOSED"
  | "VELLUM_INVALID_STYLE"
  | "VELLUM_INVALID_CONFIG"
  | "VELLUM_UNKNOWN_ELEMENT";

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class VellumError extends Error {
  override readonly name = "VellumError";
  readonly code: VellumErrorCode;

  constructor(code: VellumErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, VellumError);
    }
  }
}

export function isVellumError(value: unknown, code?: VellumErrorCode): value is VellumError {
  if (!(value instanceof VellumError)) return false;
  return code === undefined || value.code === code;
}
