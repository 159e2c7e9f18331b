/**
 * @armada/adapters
 *
 * Gateway adapter capability, the factory that picks an implementation
 * per gateway type, and the built-in on-premise and mock adapters.
 */

export {
  type AdapterFactoryConfig,
  type AdapterFactoryDeps,
  createAdapterFactory,
} from "./create-adapter-factory.js";
export { AdapterFactory } from "./factory.js";
export {
  basicAuth,
  GatewayHttpClient,
  type GatewayHttpClientConfig,
  type GatewayRequestOptions,
  type HttpMethod,
} from "./http-client.js";
export { MOCK_ADAPTER_TYPE, MockAdapter, type MockAdapterOptions } from "./mock/mock-adapter.js";
export {
  ON_PREMISE_ADAPTER_TYPE,
  OnPremiseAdapter,
  type OnPremiseAdapterDeps,
} from "./onpremise/onpremise-adapter.js";
export { type OnPremiseParameters, OnPremiseParametersSchema } from "./onpremise/schemas.js";
export { type BuiltinAdapterDeps, registerBuiltinAdapters } from "./register-builtin.js";
export { type GatewayRecord, type GatewayStore, InMemoryGatewayStore } from "./store.js";
export type {
  AdapterConfig,
  AdapterConstructor,
  GatewayAdapter,
  HealthState,
  HealthStatus,
  PolicyInfo,
  ProviderDeploymentConfig,
  ProviderDeploymentResult,
  ProviderStatus,
} from "./types.js";
