import { describe, expect, it } from "vitest";
import {
  AdapterConfigError,
  ArmadaError,
  ConnectionClosedError,
  EventPayloadTooLargeError,
  ExternalError,
  GatewayCapacityExceededError,
  GatewayUnreachableError,
  hasCode,
  InternalError,
  InvalidCiphertextError,
  isArmadaError,
  isExpectedError,
  isNotFoundError,
  isRateLimitError,
  isValidationError,
  NotFoundError,
  ProviderNotFoundError,
  RateLimitError,
  UnsupportedAdapterTypeError,
  ValidationError,
  getErrorMessage,
  wrapError,
} from "../../index.js";

describe("ArmadaError base class", () => {
  it("derives catalog fields from the code", () => {
    const error = new InternalError({ code: "INTERNAL_ERROR", message: "Test error" });

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ArmadaError);
    expect(error.message).toBe("Test error");
    expect(error.name).toBe("InternalError");
    expect(error._tag).toBe("InternalError");
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.httpStatus).toBe(500);
    expect(error.domain).toBe("internal");
    expect(error.isExpected).toBe(false);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it("keeps metadata, trace id and cause", () => {
    const cause = new Error("root");
    const error = new ExternalError({
      code: "INTERNAL_UNAVAILABLE",
      message: "down",
      metadata: { key: "value" },
      traceId: "trace-1",
      cause,
    });

    expect(error.metadata).toEqual({ key: "value" });
    expect(error.traceId).toBe("trace-1");
    expect(error.cause).toBe(cause);
  });

  it("serializes to JSON", () => {
    const error = new NotFoundError({ code: "RESOURCE_NOT_FOUND", message: "missing" });
    expect(error.toJSON()).toMatchObject({
      _tag: "NotFoundError",
      name: "NotFoundError",
      code: "RESOURCE_NOT_FOUND",
      message: "missing",
      httpStatus: 404,
      domain: "resource",
      isExpected: true,
    });
  });
});

describe("domain errors", () => {
  it("GatewayCapacityExceededError is a rate-limit error carrying the ceiling", () => {
    const error = new GatewayCapacityExceededError(1);
    expect(error).toBeInstanceOf(RateLimitError);
    expect(error.name).toBe("GatewayCapacityExceededError");
    expect(error.message).toBe("maximum connection limit reached (1)");
    expect(error.maxConnections).toBe(1);
    expect(isRateLimitError(error)).toBe(true);
  });

  it("ProviderNotFoundError is a not-found sentinel", () => {
    const error = new ProviderNotFoundError("prov-1");
    expect(isNotFoundError(error)).toBe(true);
    expect(error.code).toBe("ADAPTER_PROVIDER_NOT_FOUND");
    expect(error.message).toBe("provider not found: prov-1");
  });

  it("UnsupportedAdapterTypeError names the type", () => {
    const error = new UnsupportedAdapterTypeError("unknown");
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe("unsupported adapter type: unknown");
  });

  it("AdapterConfigError records the missing field as an issue", () => {
    const error = new AdapterConfigError("controlPlaneUrl not found", "controlPlaneUrl");
    expect(error.issues).toEqual([
      { field: "controlPlaneUrl", message: "controlPlaneUrl not found", code: "missing" },
    ]);
  });

  it("EventPayloadTooLargeError reports the limit", () => {
    const error = new EventPayloadTooLargeError(2_000_000, 1_048_576);
    expect(isValidationError(error)).toBe(true);
    expect(error.httpStatus).toBe(413);
    expect(error.message).toBe("event payload exceeds maximum size of 1048576 bytes");
  });

  it("InvalidCiphertextError carries no detail", () => {
    const error = new InvalidCiphertextError();
    expect(error.message).toBe("invalid ciphertext");
    expect(error.cause).toBeUndefined();
    expect(error.metadata).toBeUndefined();
  });

  it("GatewayUnreachableError wraps the transport cause", () => {
    const cause = new TypeError("fetch failed");
    const error = new GatewayUnreachableError("http://gw.test", cause);
    expect(error.cause).toBe(cause);
    expect(error.message).toBe("gateway endpoint unreachable: fetch failed");
  });

  it("ConnectionClosedError is expected", () => {
    expect(isExpectedError(new ConnectionClosedError("c-1"))).toBe(true);
  });
});

describe("guards and utils", () => {
  it("hasCode narrows on the code", () => {
    const error = new GatewayCapacityExceededError(5);
    expect(hasCode(error, "GATEWAY_CAPACITY_EXCEEDED")).toBe(true);
    expect(hasCode(error, "GATEWAY_RATE_LIMITED")).toBe(false);
  });

  it("isArmadaError rejects plain errors", () => {
    expect(isArmadaError(new Error("x"))).toBe(false);
    expect(isArmadaError(new InvalidCiphertextError())).toBe(true);
  });

  it("isExpectedError is false for non-errors", () => {
    expect(isExpectedError("nope")).toBe(false);
    expect(isExpectedError(null)).toBe(false);
  });

  it("wrapError passes ArmadaErrors through and wraps the rest", () => {
    const original = new InvalidCiphertextError();
    expect(wrapError(original)).toBe(original);

    const wrapped = wrapError(new RangeError("boom"));
    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped.message).toBe("boom");
    expect(wrapped.metadata).toEqual({ originalName: "RangeError" });

    expect(wrapError(42).message).toBe("An unknown error occurred");
  });

  it("getErrorMessage handles strings and unknowns", () => {
    expect(getErrorMessage(new Error("a"))).toBe("a");
    expect(getErrorMessage("b")).toBe("b");
    expect(getErrorMessage({})).toBe("An unknown error occurred");
  });
});
