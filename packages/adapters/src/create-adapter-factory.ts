import type { ControlPlaneConfig, Logger } from "@armada/core";
import { parseEncryptionKey } from "@armada/vault";
import { AdapterFactory } from "./factory.js";
import { registerBuiltinAdapters } from "./register-builtin.js";
import type { GatewayStore } from "./store.js";

export type AdapterFactoryConfig = Pick<
  ControlPlaneConfig,
  "encryptionKey" | "adapterRequestTimeoutMs" | "healthCheckTimeoutMs"
>;

export interface AdapterFactoryDeps {
  readonly store: GatewayStore;
  readonly logger: Logger;
}

/**
 * Build the adapter factory from control plane configuration. The
 * configured timeouts apply to every on-premise gateway that does not set
 * its own. Without an encryption key only the mock adapter is available.
 *
 * @throws InvalidKeySizeError when the configured key is not 32 bytes
 */
export function createAdapterFactory(
  config: AdapterFactoryConfig,
  deps: AdapterFactoryDeps,
): AdapterFactory {
  const factory = new AdapterFactory(deps.logger);
  const encryptionKey =
    config.encryptionKey !== undefined ? parseEncryptionKey(config.encryptionKey) : undefined;

  if (!encryptionKey) {
    deps.logger.warn("No encryption key configured; on-premise gateways are unavailable");
  }

  registerBuiltinAdapters(factory, {
    store: deps.store,
    encryptionKey,
    onPremiseDefaults: {
      requestTimeoutMs: config.adapterRequestTimeoutMs,
      healthCheckTimeoutMs: config.healthCheckTimeoutMs,
    },
  });
  return factory;
}
