import { ArmadaError } from "../base.js";
import {
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorDomain,
  type HttpStatusCode,
} from "../catalog.js";
import type { ArmadaErrorOptions, ValidationIssue } from "../types.js";

type ValidationCode = CodesForBase<"ValidationError">;

/**
 * Errors caused by invalid input, configuration, or request data.
 * HTTP 400-class. The `.code` field discriminates the specific error.
 */
export class ValidationError<C extends ValidationCode = ValidationCode> extends ArmadaError {
  readonly _tag = "ValidationError" as const;
  override readonly code: C;
  override readonly httpStatus: HttpStatusCode;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  /** Structured validation issues */
  readonly issues: readonly ValidationIssue[];

  constructor(options: ArmadaErrorOptions<C> & { issues?: readonly ValidationIssue[] }) {
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
    this.issues = options.issues ?? [];
  }
}
