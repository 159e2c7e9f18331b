import type { Logger } from "@armada/core";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Selects and parameterizes an adapter. `type` is the factory key.
 */
export interface AdapterConfig {
  readonly type: string;
  readonly parameters: Readonly<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// Provider vocabulary
// ---------------------------------------------------------------------------

export interface ProviderDeploymentConfig {
  /** Stable provider handle, used for logging */
  readonly handle: string;
  /** Provider definition forwarded verbatim to the gateway */
  readonly configuration: Readonly<Record<string, unknown>>;
}

export interface ProviderDeploymentResult {
  readonly deploymentId: string;
  readonly status: string;
  readonly deployedAt: Date;
}

export interface ProviderStatus {
  readonly id: string;
  readonly name: string;
  readonly kind: string;
  readonly status: string;
  readonly deployedAt?: Date | undefined;
  readonly spec?: Readonly<Record<string, unknown>> | undefined;
}

export type HealthState = "ACTIVE" | "ERROR";

export interface HealthStatus {
  readonly status: HealthState;
  readonly responseTimeMs: number;
  readonly checkedAt: Date;
  readonly errorMessage?: string | undefined;
}

export interface PolicyInfo {
  readonly name: string;
  readonly version: string;
  readonly description: string;
  readonly parameters?: Readonly<Record<string, unknown>> | undefined;
}

// ---------------------------------------------------------------------------
// Adapter capability
// ---------------------------------------------------------------------------

/**
 * Everything the control plane can ask of a gateway type. Implementations
 * are chosen at runtime by {@link AdapterFactory}; callers never branch on
 * the concrete type.
 */
export interface GatewayAdapter {
  /** Throws when the endpoint is unreachable or unhealthy. */
  validateGatewayEndpoint(controlPlaneUrl: string): Promise<void>;
  /** Never throws for an unhealthy endpoint; reports it in the status. */
  checkHealth(controlPlaneUrl: string): Promise<HealthStatus>;
  deployProvider(gatewayId: string, config: ProviderDeploymentConfig): Promise<ProviderDeploymentResult>;
  updateProvider(
    gatewayId: string,
    providerId: string,
    config: ProviderDeploymentConfig,
  ): Promise<ProviderDeploymentResult>;
  undeployProvider(gatewayId: string, providerId: string): Promise<void>;
  getProviderStatus(gatewayId: string, providerId: string): Promise<ProviderStatus>;
  listProviders(gatewayId: string): Promise<readonly ProviderStatus[]>;
  getPolicies(gatewayId: string): Promise<readonly PolicyInfo[]>;
  getAdapterType(): string;
  close(): Promise<void>;
}

export type AdapterConstructor = (config: AdapterConfig, logger: Logger) => GatewayAdapter;
