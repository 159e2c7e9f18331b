/**
 * Construction options shared by the base error types.
 * The code determines httpStatus, domain and isExpected via catalog lookup.
 */

import type { BaseErrorType, CodesForBase, ErrorCode } from "./catalog.js";

/**
 * Structured validation issue (field-level detail)
 */
export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
  value?: unknown;
}

export interface ArmadaErrorOptions<C extends ErrorCode> {
  code: C;
  message: string;
  metadata?: Record<string, string> | undefined;
  traceId?: string | undefined;
  cause?: Error | undefined;
}

export type { BaseErrorType, CodesForBase };

export type ValidationCodes = CodesForBase<"ValidationError">;
export type NotFoundCodes = CodesForBase<"NotFoundError">;
export type PermissionCodes = CodesForBase<"PermissionError">;
export type RateLimitCodes = CodesForBase<"RateLimitError">;
export type TimeoutCodes = CodesForBase<"TimeoutError">;
export type ExternalCodes = CodesForBase<"ExternalError">;
export type InternalCodes = CodesForBase<"InternalError">;
