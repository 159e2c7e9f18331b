import type { ErrorCode, ErrorDomain, HttpStatusCode } from "./catalog.js";

/**
 * JSON shape produced by {@link ArmadaError.toJSON}.
 */
export interface ErrorJSON {
  readonly _tag: string;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly httpStatus: HttpStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Record<string, string> | undefined;
  readonly traceId?: string | undefined;
  readonly cause?: string | undefined;
}

/**
 * Root of the Armada error hierarchy.
 *
 * Concrete classes fill in `code` and the catalog-derived fields; callers
 * branch on `instanceof` for the category or on `.code` for the exact case.
 */
export abstract class ArmadaError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: HttpStatusCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly timestamp: Date;
  readonly metadata: Record<string, string> | undefined;
  readonly traceId: string | undefined;

  constructor(
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date();
    this.metadata = metadata;
    this.traceId = traceId;
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      metadata: this.metadata,
      traceId: this.traceId,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

export function isArmadaError(error: unknown): error is ArmadaError {
  return error instanceof ArmadaError;
}

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
