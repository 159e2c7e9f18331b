import { ArmadaError } from "../base.js";
import {
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorDomain,
  type HttpStatusCode,
} from "../catalog.js";
import type { ArmadaErrorOptions } from "../types.js";

type NotFoundErrorCode = CodesForBase<"NotFoundError">;

/**
 * Errors when a requested resource does not exist (HTTP 404).
 */
export class NotFoundError<C extends NotFoundErrorCode = NotFoundErrorCode> extends ArmadaError {
  readonly _tag = "NotFoundError" as const;
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
