import type { Logger } from "@armada/core";
import { GatewayRequestFailedError, getErrorMessage, ProviderNotFoundError } from "@armada/errors";
import type {
  GatewayAdapter,
  HealthStatus,
  PolicyInfo,
  ProviderDeploymentConfig,
  ProviderDeploymentResult,
  ProviderStatus,
} from "../types.js";

export const MOCK_ADAPTER_TYPE = "mock";

export interface MockAdapterOptions {
  /** Reported by getAdapterType() (default: "mock") */
  readonly adapterType?: string;
  readonly shouldFail?: boolean;
  readonly failMessage?: string;
  /** Reported by checkHealth() (default: 10) */
  readonly responseTimeMs?: number;
}

const DEFAULT_FAIL_MESSAGE = "mock adapter failure";
const DEFAULT_RESPONSE_TIME_MS = 10;

/**
 * In-memory stand-in for a gateway. Deployed providers are kept per gateway
 * so deploy, status, list and undeploy agree with each other. With
 * `shouldFail` set, every call fails with `"<failMessage>: <subject>"`.
 */
export class MockAdapter implements GatewayAdapter {
  private shouldFail: boolean;
  private readonly adapterType: string;
  private readonly failMessage: string;
  private readonly responseTimeMs: number;
  private readonly providers: Map<string, Map<string, ProviderStatus>> = new Map();
  private readonly logger: Logger;
  private nextId = 0;

  constructor(options: MockAdapterOptions, logger: Logger) {
    this.adapterType = options.adapterType || MOCK_ADAPTER_TYPE;
    this.shouldFail = options.shouldFail ?? false;
    this.failMessage = options.failMessage ?? DEFAULT_FAIL_MESSAGE;
    this.responseTimeMs = options.responseTimeMs ?? DEFAULT_RESPONSE_TIME_MS;
    this.logger = logger.child({ adapter: this.adapterType });
  }

  setShouldFail(shouldFail: boolean): void {
    this.shouldFail = shouldFail;
  }

  getAdapterType(): string {
    return this.adapterType;
  }

  async close(): Promise<void> {
    this.logger.debug("Mock adapter closed");
  }

  async validateGatewayEndpoint(controlPlaneUrl: string): Promise<void> {
    this.failIfConfigured(controlPlaneUrl);
    this.logger.debug({ url: controlPlaneUrl }, "Mock gateway validation successful");
  }

  async checkHealth(controlPlaneUrl: string): Promise<HealthStatus> {
    try {
      await this.validateGatewayEndpoint(controlPlaneUrl);
      return { status: "ACTIVE", responseTimeMs: this.responseTimeMs, checkedAt: new Date() };
    } catch (error) {
      return {
        status: "ERROR",
        responseTimeMs: this.responseTimeMs,
        checkedAt: new Date(),
        errorMessage: getErrorMessage(error),
      };
    }
  }

  async deployProvider(
    gatewayId: string,
    config: ProviderDeploymentConfig,
  ): Promise<ProviderDeploymentResult> {
    this.failIfConfigured(gatewayId);

    const deployedAt = new Date();
    const id = `mock-provider-${++this.nextId}`;
    this.table(gatewayId).set(id, {
      id,
      name: config.handle,
      kind: stringField(config.configuration, "kind"),
      status: "deployed",
      deployedAt,
      spec: config.configuration,
    });
    return { deploymentId: id, status: "deployed", deployedAt };
  }

  async updateProvider(
    gatewayId: string,
    providerId: string,
    config: ProviderDeploymentConfig,
  ): Promise<ProviderDeploymentResult> {
    this.failIfConfigured(gatewayId);

    const existing = this.lookup(gatewayId, providerId);
    const deployedAt = new Date();
    this.table(gatewayId).set(providerId, {
      ...existing,
      name: config.handle,
      kind: stringField(config.configuration, "kind"),
      deployedAt,
      spec: config.configuration,
    });
    return { deploymentId: providerId, status: existing.status, deployedAt };
  }

  async undeployProvider(gatewayId: string, providerId: string): Promise<void> {
    this.failIfConfigured(gatewayId);

    this.lookup(gatewayId, providerId);
    this.table(gatewayId).delete(providerId);
  }

  async getProviderStatus(gatewayId: string, providerId: string): Promise<ProviderStatus> {
    this.failIfConfigured(gatewayId);
    return this.lookup(gatewayId, providerId);
  }

  async listProviders(gatewayId: string): Promise<readonly ProviderStatus[]> {
    this.failIfConfigured(gatewayId);
    return [...(this.providers.get(gatewayId)?.values() ?? [])];
  }

  async getPolicies(gatewayId: string): Promise<readonly PolicyInfo[]> {
    this.failIfConfigured(gatewayId);
    return [];
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private failIfConfigured(subject: string): void {
    if (this.shouldFail) {
      throw new GatewayRequestFailedError(`${this.failMessage}: ${subject}`);
    }
  }

  private table(gatewayId: string): Map<string, ProviderStatus> {
    let table = this.providers.get(gatewayId);
    if (!table) {
      table = new Map();
      this.providers.set(gatewayId, table);
    }
    return table;
  }

  private lookup(gatewayId: string, providerId: string): ProviderStatus {
    const provider = this.providers.get(gatewayId)?.get(providerId);
    if (!provider) {
      throw new ProviderNotFoundError(providerId);
    }
    return provider;
  }
}

function stringField(record: Readonly<Record<string, unknown>>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value : "";
}
