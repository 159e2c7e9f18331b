/**
 * Type guards for the base error types + code-level discrimination.
 */

import type { ArmadaError } from "./base.js";
import { ExternalError } from "./bases/external-error.js";
import { InternalError } from "./bases/internal-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { PermissionError } from "./bases/permission-error.js";
import { RateLimitError } from "./bases/rate-limit-error.js";
import { TimeoutError } from "./bases/timeout-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ErrorCode } from "./catalog.js";

/** Check if an error is a ValidationError (bad input, config) */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/** Check if an error is a NotFoundError (resource missing) */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/** Check if an error is a PermissionError (auth failure) */
export function isPermissionError(error: unknown): error is PermissionError {
  return error instanceof PermissionError;
}

/** Check if an error is a RateLimitError (capacity or attempt budget) */
export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}

/** Check if an error is a TimeoutError (deadline exceeded) */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

/** Check if an error is an ExternalError (dependency/peer failure) */
export function isExternalError(error: unknown): error is ExternalError {
  return error instanceof ExternalError;
}

/** Check if an error is an InternalError */
export function isInternalError(error: unknown): error is InternalError {
  return error instanceof InternalError;
}

/**
 * Check if an ArmadaError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: ArmadaError,
  code: C,
): error is ArmadaError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (4xx-class).
 * Returns false for anything that is not an ArmadaError.
 */
export function isExpectedError(error: unknown): boolean {
  if (
    error !== null &&
    typeof error === "object" &&
    "isExpected" in error &&
    typeof error.isExpected === "boolean"
  ) {
    return error.isExpected;
  }
  return false;
}
