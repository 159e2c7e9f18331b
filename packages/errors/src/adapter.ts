import { ExternalError } from "./bases/external-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { TimeoutError } from "./bases/timeout-error.js";
import { ValidationError } from "./bases/validation-error.js";

/**
 * Thrown by the adapter factory when no constructor is registered for a type.
 */
export class UnsupportedAdapterTypeError extends ValidationError<"ADAPTER_UNSUPPORTED_TYPE"> {
  constructor(public readonly adapterType: string) {
    super({
      code: "ADAPTER_UNSUPPORTED_TYPE",
      message: `unsupported adapter type: ${adapterType}`,
    });
  }
}

/**
 * Thrown when a gateway's adapter configuration lacks a required value.
 * A configuration problem, not a retry case.
 */
export class AdapterConfigError extends ValidationError<"ADAPTER_CONFIG_INVALID"> {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super({
      code: "ADAPTER_CONFIG_INVALID",
      message,
      issues: field ? [{ field, message, code: "missing" }] : [],
    });
  }
}

/**
 * Thrown when a gateway record carries no encrypted credentials.
 */
export class GatewayCredentialsMissingError extends ValidationError<"ADAPTER_CREDENTIALS_MISSING"> {
  constructor(public readonly gatewayId: string) {
    super({
      code: "ADAPTER_CREDENTIALS_MISSING",
      message: "gateway has no credentials stored",
      metadata: { gatewayId },
    });
  }
}

/**
 * The remote gateway reported that a provider does not exist (HTTP 404).
 */
export class ProviderNotFoundError extends NotFoundError<"ADAPTER_PROVIDER_NOT_FOUND"> {
  constructor(public readonly providerId: string) {
    super({
      code: "ADAPTER_PROVIDER_NOT_FOUND",
      message: `provider not found: ${providerId}`,
    });
  }
}

/**
 * Network-level failure talking to a remote gateway control API.
 * The adapter performs no retries; callers decide.
 */
export class GatewayUnreachableError extends ExternalError<"ADAPTER_GATEWAY_UNREACHABLE"> {
  constructor(
    public readonly url: string,
    cause?: Error,
  ) {
    super({
      code: "ADAPTER_GATEWAY_UNREACHABLE",
      message: `gateway endpoint unreachable: ${cause?.message ?? url}`,
      metadata: { url },
      cause,
    });
  }
}

/**
 * The remote gateway answered with an unexpected status or body.
 */
export class GatewayRequestFailedError extends ExternalError<"ADAPTER_REQUEST_FAILED"> {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: Error,
  ) {
    super({
      code: "ADAPTER_REQUEST_FAILED",
      message,
      metadata: statusCode !== undefined ? { statusCode: String(statusCode) } : undefined,
      cause,
    });
  }
}

/**
 * The remote gateway did not answer within the client timeout.
 */
export class GatewayRequestTimeoutError extends TimeoutError<"ADAPTER_REQUEST_TIMEOUT"> {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
  ) {
    super({
      code: "ADAPTER_REQUEST_TIMEOUT",
      message: `request to ${url} timed out after ${timeoutMs}ms`,
    });
  }
}
