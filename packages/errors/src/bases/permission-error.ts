import { ArmadaError } from "../base.js";
import {
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorDomain,
  type HttpStatusCode,
} from "../catalog.js";
import type { ArmadaErrorOptions } from "../types.js";

type PermissionErrorCode = CodesForBase<"PermissionError">;

/**
 * Errors caused by missing or rejected credentials (HTTP 401/403).
 */
export class PermissionError<C extends PermissionErrorCode = PermissionErrorCode> extends ArmadaError {
  readonly _tag = "PermissionError" as const;
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
