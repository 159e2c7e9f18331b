import { ArmadaError } from "../base.js";
import {
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorDomain,
  type HttpStatusCode,
} from "../catalog.js";
import type { ArmadaErrorOptions } from "../types.js";

type InternalErrorCode = CodesForBase<"InternalError">;

/**
 * Errors caused by bugs, corrupted state or server misconfiguration (HTTP 500).
 */
export class InternalError<C extends InternalErrorCode = InternalErrorCode> extends ArmadaError {
  readonly _tag = "InternalError" as const;
  override readonly code: C;
  override readonly httpStatus: HttpStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: ArmadaErrorOptions<C>) {
    super(
      options.message,
      options.metadata,
      options.traceId,
      options.cause ? { cause: options.cause } : undefined,
    );
    const entry: ErrorCatalogEntry = ERROR_CATALOG[options.code];
    this.code = options.code;
    this.httpStatus = entry.httpStatus;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
