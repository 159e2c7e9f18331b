import { ConnectionClosedError } from "@armada/errors";
import type { Transport } from "../transport/transport.js";
import { DeliveryStats, type DeliveryStatsSnapshot } from "./delivery-stats.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConnectionOptions {
  readonly gatewayId: string;
  readonly connectionId: string;
  readonly transport: Transport;
  /** API key the gateway presented at upgrade time */
  readonly authToken: string;
}

/**
 * Loggable snapshot of a connection. Timestamps are ISO 8601 (RFC 3339).
 */
export interface ConnectionInfo {
  readonly gatewayId: string;
  readonly connectionId: string;
  readonly connectedAt: string;
  readonly lastHeartbeat: string;
  readonly closed: boolean;
}

// ---------------------------------------------------------------------------
// Connection
// ---------------------------------------------------------------------------

/**
 * One live channel to a gateway: identity, lifecycle flag, heartbeat
 * timestamp and delivery counters around an exclusively owned transport.
 *
 * A connection never counts its own sends; the broadcast service does,
 * since only it knows why a send happened.
 */
export class Connection {
  readonly gatewayId: string;
  readonly connectionId: string;
  readonly connectedAt: Date;
  readonly authToken: string;
  readonly transport: Transport;
  readonly deliveryStats = new DeliveryStats();

  private lastHeartbeat: Date;
  private closed = false;

  constructor(options: ConnectionOptions) {
    this.gatewayId = options.gatewayId;
    this.connectionId = options.connectionId;
    this.transport = options.transport;
    this.authToken = options.authToken;
    this.connectedAt = new Date();
    this.lastHeartbeat = this.connectedAt;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Send a message.
   *
   * @throws ConnectionClosedError once the connection is closed
   */
  async send(data: string): Promise<void> {
    if (this.closed) {
      throw new ConnectionClosedError(this.connectionId);
    }
    await this.transport.send(data);
  }

  /**
   * Close the connection. Idempotent: only the first call reaches the
   * transport. The flag flips before the transport is touched, so no send
   * issued after this call can pass the closed check.
   */
  async close(code: number, reason: string): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.transport.close(code, reason);
  }

  updateHeartbeat(): void {
    this.lastHeartbeat = new Date();
  }

  getLastHeartbeat(): Date {
    return this.lastHeartbeat;
  }

  getStats(): DeliveryStatsSnapshot {
    return this.deliveryStats.snapshot();
  }

  getInfo(): ConnectionInfo {
    return {
      gatewayId: this.gatewayId,
      connectionId: this.connectionId,
      connectedAt: this.connectedAt.toISOString(),
      lastHeartbeat: this.lastHeartbeat.toISOString(),
      closed: this.closed,
    };
  }

  toString(): string {
    return `Connection{gatewayId=${this.gatewayId}, connectionId=${this.connectionId}, closed=${this.closed}}`;
  }
}
