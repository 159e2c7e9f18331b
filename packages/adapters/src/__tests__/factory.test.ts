import { createLogger } from "@armada/core";
import { UnsupportedAdapterTypeError } from "@armada/errors";
import { describe, expect, it, vi } from "vitest";
import { AdapterFactory } from "../factory.js";
import { MockAdapter } from "../mock/mock-adapter.js";
import { OnPremiseAdapter } from "../onpremise/onpremise-adapter.js";
import { registerBuiltinAdapters } from "../register-builtin.js";
import { InMemoryGatewayStore } from "../store.js";
import type { AdapterConstructor } from "../types.js";

const logger = createLogger({ level: "silent" });

function builtinFactory(): AdapterFactory {
  const factory = new AdapterFactory(logger);
  registerBuiltinAdapters(factory, {
    store: new InMemoryGatewayStore(),
    encryptionKey: Buffer.alloc(32),
  });
  return factory;
}

describe("AdapterFactory", () => {
  it("fails for an unregistered type", () => {
    const factory = new AdapterFactory(logger);

    expect(() => factory.createAdapter({ type: "cloud", parameters: {} })).toThrow(
      UnsupportedAdapterTypeError,
    );
    expect(() => factory.createAdapter({ type: "cloud", parameters: {} })).toThrow(
      "unsupported adapter type: cloud",
    );
  });

  it("passes the config to the registered constructor", () => {
    const factory = new AdapterFactory(logger);
    const adapter = new MockAdapter({}, logger);
    const constructor = vi.fn<AdapterConstructor>(() => adapter);
    factory.register("custom", constructor);

    const created = factory.createAdapter({ type: "custom", parameters: { region: "eu" } });

    expect(created).toBe(adapter);
    expect(constructor).toHaveBeenCalledWith({ type: "custom", parameters: { region: "eu" } }, expect.anything());
  });

  it("lets the last registration win", () => {
    const factory = new AdapterFactory(logger);
    const first = new MockAdapter({ adapterType: "first" }, logger);
    const second = new MockAdapter({ adapterType: "second" }, logger);
    factory.register("custom", () => first);
    factory.register("custom", () => second);

    expect(factory.createAdapter({ type: "custom", parameters: {} })).toBe(second);
    expect(factory.listSupportedTypes()).toEqual(["custom"]);
  });

  it("lists types in sorted order", () => {
    const factory = new AdapterFactory(logger);
    factory.register("zeta", () => new MockAdapter({}, logger));
    factory.register("alpha", () => new MockAdapter({}, logger));

    expect(factory.listSupportedTypes()).toEqual(["alpha", "zeta"]);
    expect(factory.has("alpha")).toBe(true);
    expect(factory.has("beta")).toBe(false);
  });
});

describe("registerBuiltinAdapters", () => {
  it("registers the on-premise and mock adapters", () => {
    const factory = builtinFactory();

    expect(factory.listSupportedTypes()).toEqual(["mock", "on-premise"]);
    expect(factory.createAdapter({ type: "on-premise", parameters: {} })).toBeInstanceOf(
      OnPremiseAdapter,
    );
  });

  it("reads mock options from the parameters", async () => {
    const factory = builtinFactory();

    const adapter = factory.createAdapter({
      type: "mock",
      parameters: { shouldFail: true, adapterType: "mock-eu", failMessage: "offline", responseTimeMs: 42 },
    });

    expect(adapter.getAdapterType()).toBe("mock-eu");
    await expect(adapter.listProviders("gw-1")).rejects.toThrow("offline: gw-1");
    await expect(adapter.checkHealth("http://gw.test")).resolves.toMatchObject({
      status: "ERROR",
      responseTimeMs: 42,
    });
  });

  it("ignores mock parameters of the wrong type", () => {
    const adapter = builtinFactory().createAdapter({
      type: "mock",
      parameters: { shouldFail: "yes", adapterType: 7 },
    });

    expect(adapter.getAdapterType()).toBe("mock");
  });
});
