import type { Logger } from "@armada/core";
import {
  AdapterConfigError,
  GatewayCredentialsMissingError,
  GatewayNotFoundError,
  GatewayRequestFailedError,
  getErrorMessage,
} from "@armada/errors";
import { decryptCredentials } from "@armada/vault";
import { GatewayHttpClient } from "../http-client.js";
import type { GatewayStore } from "../store.js";
import type {
  AdapterConfig,
  GatewayAdapter,
  HealthStatus,
  PolicyInfo,
  ProviderDeploymentConfig,
  ProviderDeploymentResult,
  ProviderStatus,
} from "../types.js";
import {
  type OnPremiseParameters,
  OnPremiseParametersSchema,
  PolicyListResponseSchema,
  ProviderDetailResponseSchema,
  ProviderListResponseSchema,
  ProviderMutationResponseSchema,
} from "./schemas.js";

export const ON_PREMISE_ADAPTER_TYPE = "on-premise";

export interface OnPremiseAdapterDeps {
  readonly store: GatewayStore;
  /** 32-byte vault key for stored gateway credentials */
  readonly encryptionKey: Uint8Array;
  readonly logger: Logger;
  /** Timeouts used where the gateway's adapter parameters set none */
  readonly defaults?: Partial<OnPremiseParameters>;
}

/**
 * Adapter for self-hosted gateways exposing the HTTP control API.
 *
 * Every gateway-scoped call loads the gateway record, decrypts its
 * credentials and talks to the gateway's own `controlPlaneUrl`.
 */
export class OnPremiseAdapter implements GatewayAdapter {
  private readonly params: OnPremiseParameters;
  private readonly store: GatewayStore;
  private readonly encryptionKey: Uint8Array;
  private readonly logger: Logger;

  /**
   * @throws AdapterConfigError when a parameter has the wrong type
   */
  constructor(config: AdapterConfig, deps: OnPremiseAdapterDeps) {
    const parsed = OnPremiseParametersSchema.safeParse({ ...deps.defaults, ...config.parameters });
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.join(".") ?? "parameters";
      throw new AdapterConfigError(`invalid on-premise adapter parameter '${field}'`, field);
    }
    this.params = parsed.data;
    this.store = deps.store;
    this.encryptionKey = deps.encryptionKey;
    this.logger = deps.logger.child({ adapter: ON_PREMISE_ADAPTER_TYPE });
  }

  getAdapterType(): string {
    return ON_PREMISE_ADAPTER_TYPE;
  }

  async close(): Promise<void> {}

  // -------------------------------------------------------------------------
  // Endpoint checks
  // -------------------------------------------------------------------------

  async validateGatewayEndpoint(controlPlaneUrl: string): Promise<void> {
    const client = new GatewayHttpClient({
      baseUrl: controlPlaneUrl,
      timeoutMs: this.params.healthCheckTimeoutMs,
    });
    await client.send("/health", { method: "GET", operation: "gateway health check", expect: [200] });
  }

  async checkHealth(controlPlaneUrl: string): Promise<HealthStatus> {
    const start = Date.now();
    try {
      await this.validateGatewayEndpoint(controlPlaneUrl);
      return { status: "ACTIVE", responseTimeMs: Date.now() - start, checkedAt: new Date() };
    } catch (error) {
      this.logger.debug({ err: error, controlPlaneUrl }, "Gateway health check failed");
      return {
        status: "ERROR",
        responseTimeMs: Date.now() - start,
        checkedAt: new Date(),
        errorMessage: getErrorMessage(error),
      };
    }
  }

  // -------------------------------------------------------------------------
  // Providers
  // -------------------------------------------------------------------------

  async deployProvider(
    gatewayId: string,
    config: ProviderDeploymentConfig,
  ): Promise<ProviderDeploymentResult> {
    this.logger.info({ gatewayId, handle: config.handle }, "Deploying provider to gateway");
    const client = await this.clientFor(gatewayId);

    const body = await client.request(
      "/llm-providers",
      { method: "POST", operation: "create provider", expect: [200, 201], body: config.configuration },
      ProviderMutationResponseSchema,
    );
    return { deploymentId: body.id ?? "", status: body.status ?? "", deployedAt: new Date() };
  }

  async updateProvider(
    gatewayId: string,
    providerId: string,
    config: ProviderDeploymentConfig,
  ): Promise<ProviderDeploymentResult> {
    this.logger.info({ gatewayId, providerId }, "Updating provider on gateway");
    const client = await this.clientFor(gatewayId);

    const body = await client.request(
      providerPath(providerId),
      {
        method: "PUT",
        operation: "update provider",
        expect: [200],
        body: config.configuration,
        notFound: providerId,
      },
      ProviderMutationResponseSchema,
    );
    return { deploymentId: body.id ?? "", status: body.status ?? "", deployedAt: new Date() };
  }

  async undeployProvider(gatewayId: string, providerId: string): Promise<void> {
    this.logger.info({ gatewayId, providerId }, "Undeploying provider from gateway");
    const client = await this.clientFor(gatewayId);

    await client.send(providerPath(providerId), {
      method: "DELETE",
      operation: "delete provider",
      expect: [200, 204],
      notFound: providerId,
    });
  }

  async getProviderStatus(gatewayId: string, providerId: string): Promise<ProviderStatus> {
    const client = await this.clientFor(gatewayId);

    const { provider } = await client.request(
      providerPath(providerId),
      { method: "GET", operation: "get provider", expect: [200], notFound: providerId },
      ProviderDetailResponseSchema,
    );
    if (!provider) {
      throw new GatewayRequestFailedError("provider data not found in response", 200);
    }

    return {
      id: provider.id ?? "",
      name: provider.configuration?.metadata?.name ?? "",
      kind: provider.configuration?.kind ?? "",
      status: provider.deploymentStatus ?? "",
      deployedAt: provider.metadata?.deployedAt ?? undefined,
      spec: provider.configuration?.spec ?? undefined,
    };
  }

  async listProviders(gatewayId: string): Promise<readonly ProviderStatus[]> {
    const client = await this.clientFor(gatewayId);

    const { providers } = await client.request(
      "/llm-providers",
      { method: "GET", operation: "list providers", expect: [200] },
      ProviderListResponseSchema,
    );
    return (providers ?? []).map((p) => ({
      id: p.id ?? "",
      name: p.displayName ?? "",
      kind: p.template ?? "",
      status: p.status ?? "",
      deployedAt: p.createdAt ?? undefined,
    }));
  }

  // -------------------------------------------------------------------------
  // Policies
  // -------------------------------------------------------------------------

  async getPolicies(gatewayId: string): Promise<readonly PolicyInfo[]> {
    const client = await this.clientFor(gatewayId);

    const { policies } = await client.request(
      "/policies",
      { method: "GET", operation: "list policies", expect: [200] },
      PolicyListResponseSchema,
    );
    // The list endpoint carries no version.
    return (policies ?? []).map((p) => ({
      name: p.name,
      version: "",
      description: p.description ?? "",
      parameters: p.parameters ?? undefined,
    }));
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  /**
   * Load the gateway, decrypt its credentials and bind a client to its URL.
   */
  private async clientFor(gatewayId: string): Promise<GatewayHttpClient> {
    const record = await this.store.getGateway(gatewayId);
    if (!record) {
      throw new GatewayNotFoundError(gatewayId);
    }
    if (!record.encryptedCredentials || record.encryptedCredentials.length === 0) {
      throw new GatewayCredentialsMissingError(gatewayId);
    }
    const credentials = decryptCredentials(record.encryptedCredentials, this.encryptionKey);

    const controlPlaneUrl = record.adapterConfig["controlPlaneUrl"];
    if (typeof controlPlaneUrl !== "string" || controlPlaneUrl.trim() === "") {
      throw new AdapterConfigError(
        "controlPlaneUrl not found in gateway adapter config",
        "controlPlaneUrl",
      );
    }

    return new GatewayHttpClient({
      baseUrl: controlPlaneUrl,
      timeoutMs: this.params.requestTimeoutMs,
      credentials,
    });
  }
}

function providerPath(providerId: string): string {
  return `/llm-providers/${encodeURIComponent(providerId)}`;
}
