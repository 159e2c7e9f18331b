/**
 * @armada/errors
 *
 * Shared error taxonomy for the Armada gateway control plane.
 *
 * Every error carries a `.code` from the catalog. Use `error.code === "XXX"`
 * (or `hasCode`) for fine-grained matching, or `instanceof BaseType` for
 * category matching.
 */

export { ArmadaError, type ErrorJSON, isArmadaError, isError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type HttpStatusCode,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isClientError,
  isServerError,
  isValidErrorCode,
  validateCatalog,
  wrapError,
} from "./utils.js";

// Base types
export {
  ExternalError,
  InternalError,
  NotFoundError,
  PermissionError,
  RateLimitError,
  TimeoutError,
  ValidationError,
} from "./bases/index.js";

export type {
  ArmadaErrorOptions,
  ExternalCodes,
  InternalCodes,
  NotFoundCodes,
  PermissionCodes,
  RateLimitCodes,
  TimeoutCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

export {
  hasCode,
  isExpectedError,
  isExternalError,
  isInternalError,
  isNotFoundError,
  isPermissionError,
  isRateLimitError,
  isTimeoutError,
  isValidationError,
} from "./guards.js";

// Domain errors
export {
  AdapterConfigError,
  GatewayCredentialsMissingError,
  GatewayRequestFailedError,
  GatewayRequestTimeoutError,
  GatewayUnreachableError,
  ProviderNotFoundError,
  UnsupportedAdapterTypeError,
} from "./adapter.js";
export { ControlPlaneConfigError } from "./config.js";
export {
  ConnectionClosedError,
  ConnectionManagerShutDownError,
  EventPayloadTooLargeError,
  GatewayAuthFailedError,
  GatewayCapacityExceededError,
  GatewayNotFoundError,
  GatewayRateLimitedError,
  InvalidEventPayloadError,
  TransportWriteTimeoutError,
} from "./gateway.js";
export { InvalidCiphertextError, InvalidCredentialsError, InvalidKeySizeError } from "./vault.js";

// Wire format
export {
  type ProblemDetails,
  ProblemDetailsSchema,
  toProblemDetails,
  ValidationIssueSchema,
} from "./wire/rfc9457.js";
