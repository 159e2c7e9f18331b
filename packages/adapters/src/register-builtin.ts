import type { Logger } from "@armada/core";
import type { AdapterFactory } from "./factory.js";
import { MOCK_ADAPTER_TYPE, MockAdapter, type MockAdapterOptions } from "./mock/mock-adapter.js";
import { ON_PREMISE_ADAPTER_TYPE, OnPremiseAdapter } from "./onpremise/onpremise-adapter.js";
import type { OnPremiseParameters } from "./onpremise/schemas.js";
import type { GatewayStore } from "./store.js";

export interface BuiltinAdapterDeps {
  readonly store: GatewayStore;
  /** Vault key; the on-premise adapter is registered only when one is given */
  readonly encryptionKey?: Uint8Array | undefined;
  readonly onPremiseDefaults?: Partial<OnPremiseParameters>;
}

/**
 * Register the adapters shipped with the control plane. Call once at
 * startup, before any adapter is created.
 */
export function registerBuiltinAdapters(factory: AdapterFactory, deps: BuiltinAdapterDeps): void {
  const { store, encryptionKey, onPremiseDefaults } = deps;
  if (encryptionKey) {
    factory.register(
      ON_PREMISE_ADAPTER_TYPE,
      (config, logger: Logger) =>
        new OnPremiseAdapter(config, {
          store,
          encryptionKey,
          logger,
          ...(onPremiseDefaults ? { defaults: onPremiseDefaults } : {}),
        }),
    );
  }
  factory.register(
    MOCK_ADAPTER_TYPE,
    (config, logger: Logger) => new MockAdapter(mockOptions(config.parameters), logger),
  );
}

function mockOptions(parameters: Readonly<Record<string, unknown>>): MockAdapterOptions {
  const { shouldFail, adapterType, failMessage, responseTimeMs } = parameters;
  return {
    ...(typeof shouldFail === "boolean" ? { shouldFail } : {}),
    ...(typeof adapterType === "string" ? { adapterType } : {}),
    ...(typeof failMessage === "string" ? { failMessage } : {}),
    ...(typeof responseTimeMs === "number" ? { responseTimeMs } : {}),
  };
}
