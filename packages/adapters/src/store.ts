/**
 * The slice of a gateway record the adapters read.
 */
export interface GatewayRecord {
  readonly id: string;
  /** Free-form adapter settings; on-premise gateways carry `controlPlaneUrl` */
  readonly adapterConfig: Readonly<Record<string, unknown>>;
  /** Vault blob holding the gateway's control API credentials */
  readonly encryptedCredentials?: Uint8Array | undefined;
}

/**
 * Read access to stored gateways. Backed by the platform database in
 * production.
 */
export interface GatewayStore {
  getGateway(gatewayId: string): Promise<GatewayRecord | undefined>;
}

export class InMemoryGatewayStore implements GatewayStore {
  private readonly records: Map<string, GatewayRecord> = new Map();

  constructor(records: Iterable<GatewayRecord> = []) {
    for (const record of records) {
      this.records.set(record.id, record);
    }
  }

  async getGateway(gatewayId: string): Promise<GatewayRecord | undefined> {
    return this.records.get(gatewayId);
  }

  save(record: GatewayRecord): void {
    this.records.set(record.id, record);
  }

  delete(gatewayId: string): boolean {
    return this.records.delete(gatewayId);
  }
}
