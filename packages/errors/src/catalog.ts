/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code used across the Armada control plane maps to an HTTP
 * status, a domain and one of the behavioral base error types.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: INTERNAL, VALIDATION, RESOURCE, CONFIG, GATEWAY, ADAPTER, VAULT
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "PermissionError"
  | "RateLimitError"
  | "TimeoutError"
  | "ExternalError"
  | "InternalError";

interface CatalogEntryShape {
  readonly domain: string;
  readonly httpStatus: number;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly title: string;
  readonly description: string;
}

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    baseType: "InternalError",
    isExpected: false,
    title: "Internal server error",
    description: "An unexpected error occurred",
  },
  INTERNAL_UNAVAILABLE: {
    domain: "internal",
    httpStatus: 503,
    baseType: "ExternalError",
    isExpected: false,
    title: "Service unavailable",
    description: "The service is temporarily unavailable",
  },
  INTERNAL_TIMEOUT: {
    domain: "internal",
    httpStatus: 504,
    baseType: "TimeoutError",
    isExpected: false,
    title: "Request timeout",
    description: "The operation exceeded the deadline",
  },

  // ============================================================================
  // VALIDATION / RESOURCE ERRORS
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    baseType: "ValidationError",
    isExpected: true,
    title: "Validation failed",
    description: "The request input failed validation",
  },
  RESOURCE_NOT_FOUND: {
    domain: "resource",
    httpStatus: 404,
    baseType: "NotFoundError",
    isExpected: true,
    title: "Resource not found",
    description: "The requested resource does not exist",
  },

  // ============================================================================
  // CONFIG ERRORS - Control plane configuration
  // ============================================================================
  CONFIG_INVALID: {
    domain: "config",
    httpStatus: 500,
    baseType: "ValidationError",
    isExpected: false,
    title: "Invalid configuration",
    description: "The control plane configuration failed validation",
  },

  // ============================================================================
  // GATEWAY ERRORS - WebSocket connection registry and event delivery
  // ============================================================================
  GATEWAY_NOT_FOUND: {
    domain: "gateway",
    httpStatus: 404,
    baseType: "NotFoundError",
    isExpected: true,
    title: "Gateway not found",
    description: "No gateway exists with the given identifier",
  },
  GATEWAY_AUTH_FAILED: {
    domain: "gateway",
    httpStatus: 401,
    baseType: "PermissionError",
    isExpected: true,
    title: "Gateway authentication failed",
    description: "The gateway API key is missing or invalid",
  },
  GATEWAY_CAPACITY_EXCEEDED: {
    domain: "gateway",
    httpStatus: 429,
    baseType: "RateLimitError",
    isExpected: true,
    title: "Connection capacity exceeded",
    description: "The control plane has reached its maximum number of gateway connections",
  },
  GATEWAY_RATE_LIMITED: {
    domain: "gateway",
    httpStatus: 429,
    baseType: "RateLimitError",
    isExpected: true,
    title: "Connection rate limit exceeded",
    description: "Too many connection attempts from this address",
  },
  GATEWAY_CONNECTION_CLOSED: {
    domain: "gateway",
    httpStatus: 503,
    baseType: "ExternalError",
    isExpected: true,
    title: "Connection closed",
    description: "The gateway connection has already been closed",
  },
  GATEWAY_MANAGER_SHUT_DOWN: {
    domain: "gateway",
    httpStatus: 503,
    baseType: "ExternalError",
    isExpected: true,
    title: "Connection manager shut down",
    description: "The connection manager no longer accepts registrations",
  },
  GATEWAY_EVENT_PAYLOAD_TOO_LARGE: {
    domain: "gateway",
    httpStatus: 413,
    baseType: "ValidationError",
    isExpected: true,
    title: "Event payload too large",
    description: "The event payload exceeds the maximum broadcast size",
  },
  GATEWAY_EVENT_INVALID: {
    domain: "gateway",
    httpStatus: 400,
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid event",
    description: "The event payload could not be serialized",
  },
  GATEWAY_TRANSPORT_TIMEOUT: {
    domain: "gateway",
    httpStatus: 504,
    baseType: "TimeoutError",
    isExpected: false,
    title: "Transport write timeout",
    description: "A write to the gateway connection did not complete in time",
  },

  // ============================================================================
  // ADAPTER ERRORS - Remote gateway management
  // ============================================================================
  ADAPTER_UNSUPPORTED_TYPE: {
    domain: "adapter",
    httpStatus: 400,
    baseType: "ValidationError",
    isExpected: true,
    title: "Unsupported adapter type",
    description: "No adapter is registered for the requested type",
  },
  ADAPTER_CONFIG_INVALID: {
    domain: "adapter",
    httpStatus: 400,
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid adapter configuration",
    description: "The gateway adapter configuration is missing a required value",
  },
  ADAPTER_CREDENTIALS_MISSING: {
    domain: "adapter",
    httpStatus: 400,
    baseType: "ValidationError",
    isExpected: true,
    title: "Gateway credentials missing",
    description: "The gateway has no stored credentials",
  },
  ADAPTER_PROVIDER_NOT_FOUND: {
    domain: "adapter",
    httpStatus: 404,
    baseType: "NotFoundError",
    isExpected: true,
    title: "Provider not found",
    description: "The provider does not exist on the remote gateway",
  },
  ADAPTER_GATEWAY_UNREACHABLE: {
    domain: "adapter",
    httpStatus: 502,
    baseType: "ExternalError",
    isExpected: false,
    title: "Gateway unreachable",
    description: "The remote gateway control API could not be reached",
  },
  ADAPTER_REQUEST_FAILED: {
    domain: "adapter",
    httpStatus: 502,
    baseType: "ExternalError",
    isExpected: false,
    title: "Gateway request failed",
    description: "The remote gateway control API returned an error",
  },
  ADAPTER_REQUEST_TIMEOUT: {
    domain: "adapter",
    httpStatus: 504,
    baseType: "TimeoutError",
    isExpected: false,
    title: "Gateway request timeout",
    description: "The remote gateway control API did not respond in time",
  },

  // ============================================================================
  // VAULT ERRORS - Credential encryption
  // ============================================================================
  VAULT_INVALID_KEY_SIZE: {
    domain: "vault",
    httpStatus: 500,
    baseType: "ValidationError",
    isExpected: false,
    title: "Invalid encryption key size",
    description: "The encryption key must be 32 bytes for AES-256",
  },
  VAULT_INVALID_CIPHERTEXT: {
    domain: "vault",
    httpStatus: 500,
    baseType: "InternalError",
    isExpected: false,
    title: "Invalid ciphertext",
    description: "The encrypted credentials could not be decrypted",
  },
  VAULT_INVALID_CREDENTIALS: {
    domain: "vault",
    httpStatus: 400,
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid credentials",
    description: "The credential record is missing or malformed",
  },
} as const satisfies Record<string, CatalogEntryShape>;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
