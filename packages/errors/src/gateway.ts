import { ExternalError } from "./bases/external-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { PermissionError } from "./bases/permission-error.js";
import { RateLimitError } from "./bases/rate-limit-error.js";
import { TimeoutError } from "./bases/timeout-error.js";
import { ValidationError } from "./bases/validation-error.js";

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/**
 * Thrown when a gateway is not known to the control plane.
 */
export class GatewayNotFoundError extends NotFoundError<"GATEWAY_NOT_FOUND"> {
  constructor(
    public readonly gatewayId: string,
    metadata?: Record<string, string>,
  ) {
    super({
      code: "GATEWAY_NOT_FOUND",
      message: `Gateway '${gatewayId}' not found`,
      metadata,
    });
  }
}

/**
 * Thrown by register() when the global connection ceiling is reached.
 * Existing connections are never evicted to make room.
 */
export class GatewayCapacityExceededError extends RateLimitError<"GATEWAY_CAPACITY_EXCEEDED"> {
  constructor(public readonly maxConnections: number) {
    super({
      code: "GATEWAY_CAPACITY_EXCEEDED",
      message: `maximum connection limit reached (${maxConnections})`,
    });
  }
}

/**
 * Thrown when a source address exceeds its connection attempt budget.
 */
export class GatewayRateLimitedError extends RateLimitError<"GATEWAY_RATE_LIMITED"> {
  constructor(public readonly address: string) {
    super({
      code: "GATEWAY_RATE_LIMITED",
      message: "Connection rate limit exceeded. Please try again later.",
      metadata: { address },
    });
  }
}

/**
 * Thrown when a gateway presents a missing or unknown API key.
 */
export class GatewayAuthFailedError extends PermissionError<"GATEWAY_AUTH_FAILED"> {
  constructor(message: string, cause?: Error) {
    super({ code: "GATEWAY_AUTH_FAILED", message, cause });
  }
}

/**
 * Thrown when registering on a manager that has already been shut down.
 */
export class ConnectionManagerShutDownError extends ExternalError<"GATEWAY_MANAGER_SHUT_DOWN"> {
  constructor() {
    super({
      code: "GATEWAY_MANAGER_SHUT_DOWN",
      message: "connection manager has been shut down",
    });
  }
}

// ---------------------------------------------------------------------------
// Connection / transport
// ---------------------------------------------------------------------------

/**
 * Returned when attempting to send on a closed connection.
 */
export class ConnectionClosedError extends ExternalError<"GATEWAY_CONNECTION_CLOSED"> {
  constructor(public readonly connectionId?: string) {
    super({
      code: "GATEWAY_CONNECTION_CLOSED",
      message: "connection is closed",
      metadata: connectionId ? { connectionId } : undefined,
    });
  }
}

/**
 * Thrown when a transport write is not flushed within the write deadline.
 */
export class TransportWriteTimeoutError extends TimeoutError<"GATEWAY_TRANSPORT_TIMEOUT"> {
  constructor(public readonly timeoutMs: number) {
    super({
      code: "GATEWAY_TRANSPORT_TIMEOUT",
      message: `write did not complete within ${timeoutMs}ms`,
    });
  }
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

/**
 * Thrown when a broadcast payload exceeds the maximum size. Nothing is sent.
 */
export class EventPayloadTooLargeError extends ValidationError<"GATEWAY_EVENT_PAYLOAD_TOO_LARGE"> {
  constructor(
    public readonly size: number,
    public readonly maxSize: number,
  ) {
    super({
      code: "GATEWAY_EVENT_PAYLOAD_TOO_LARGE",
      message: `event payload exceeds maximum size of ${maxSize} bytes`,
      metadata: { size: String(size) },
    });
  }
}

/**
 * Thrown when an event payload cannot be serialized to JSON.
 */
export class InvalidEventPayloadError extends ValidationError<"GATEWAY_EVENT_INVALID"> {
  constructor(eventType: string, cause?: Error) {
    super({
      code: "GATEWAY_EVENT_INVALID",
      message: `failed to marshal payload for '${eventType}': ${cause?.message ?? "not serializable"}`,
      cause,
    });
  }
}
