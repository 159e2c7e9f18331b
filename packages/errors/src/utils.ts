import { ArmadaError } from "./base.js";
import { InternalError } from "./bases/internal-error.js";
import { ERROR_CATALOG, type ErrorCatalogEntry, type ErrorCode } from "./catalog.js";

/**
 * Look up error catalog entry by code
 */
export function getCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}

/**
 * Check if a string is a valid error code
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return code in ERROR_CATALOG;
}

/**
 * Get all error codes in the catalog
 */
export function getAllErrorCodes(): ErrorCode[] {
  return Object.keys(ERROR_CATALOG).filter(isValidErrorCode);
}

/**
 * Get all error codes for a specific domain
 */
export function getErrorCodesByDomain(domain: string): ErrorCode[] {
  return getAllErrorCodes().filter((code) => ERROR_CATALOG[code].domain === domain);
}

/**
 * Wrap an unknown error into an ArmadaError.
 * ArmadaErrors pass through; anything else becomes an InternalError.
 */
export function wrapError(error: unknown, traceId?: string): ArmadaError {
  if (error instanceof ArmadaError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError({
      code: "INTERNAL_ERROR",
      message: error.message,
      metadata: { originalName: error.name },
      traceId,
      cause: error,
    });
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalError({ code: "INTERNAL_ERROR", message, traceId });
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Check if an HTTP status code indicates a client error (4xx)
 */
export function isClientError(status: number): boolean {
  return status >= 400 && status < 500;
}

/**
 * Check if an HTTP status code indicates a server error (5xx)
 */
export function isServerError(status: number): boolean {
  return status >= 500 && status < 600;
}

/**
 * Validate catalog consistency (for tests): UPPER_SNAKE_CASE codes and
 * HTTP statuses within 100-599.
 */
export function validateCatalog(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (const code of getAllErrorCodes()) {
    const entry = ERROR_CATALOG[code];
    if (!/^[A-Z][A-Z0-9_]*$/.test(code)) {
      errors.push(`Code '${code}' is not in UPPER_SNAKE_CASE format`);
    }
    if (entry.httpStatus < 100 || entry.httpStatus >= 600) {
      errors.push(`Code '${code}' has invalid HTTP status ${entry.httpStatus}`);
    }
  }

  return { valid: errors.length === 0, errors };
}
