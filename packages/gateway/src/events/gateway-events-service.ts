import { randomUUID } from "node:crypto";
import type { Logger } from "@armada/core";
import { EventPayloadTooLargeError, getErrorMessage, InvalidEventPayloadError } from "@armada/errors";
import type { Connection } from "../connection/connection.js";
import type { ConnectionManager } from "../connection/connection-manager.js";
import {
  type AgentDeployedEvent,
  type AgentUndeployedEvent,
  type EventEnvelope,
  type GatewayConfigEvent,
  type GatewayEventType,
  MAX_EVENT_PAYLOAD_SIZE,
} from "./envelope.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BroadcastOptions {
  /** Operator that triggered the event, forwarded on the envelope */
  readonly userId?: string;
}

/**
 * Outcome of one broadcast. Partial failure is reported here and in each
 * connection's delivery stats, never as an error.
 */
export interface BroadcastResult {
  readonly correlationId: string;
  readonly gatewayCount: number;
  readonly sentCount: number;
  readonly failedCount: number;
}

export interface GatewayEventsServiceDeps {
  readonly manager: ConnectionManager;
  readonly logger: Logger;
}

// ---------------------------------------------------------------------------
// GatewayEventsService
// ---------------------------------------------------------------------------

/**
 * Pushes events to live gateway connections.
 *
 * Delivery is at-most-once: a gateway that is offline when an event is
 * broadcast never receives it and is expected to resync on reconnect.
 */
export class GatewayEventsService {
  private readonly manager: ConnectionManager;
  private readonly logger: Logger;

  constructor(deps: GatewayEventsServiceDeps) {
    this.manager = deps.manager;
    this.logger = deps.logger.child({ component: "gateway-events" });
  }

  broadcastAgentDeployed(
    gatewayId: string,
    event: AgentDeployedEvent,
    options?: BroadcastOptions,
  ): Promise<BroadcastResult> {
    return this.broadcastEvent(gatewayId, "agent.deployed", event, options);
  }

  broadcastAgentUndeployed(
    gatewayId: string,
    event: AgentUndeployedEvent,
    options?: BroadcastOptions,
  ): Promise<BroadcastResult> {
    return this.broadcastEvent(gatewayId, "agent.undeployed", event, options);
  }

  broadcastConfigUpdated(
    gatewayId: string,
    event: GatewayConfigEvent,
    options?: BroadcastOptions,
  ): Promise<BroadcastResult> {
    return this.broadcastEvent(gatewayId, "config.updated", event, options);
  }

  /**
   * Send an event to every live connection of one gateway.
   *
   * @throws EventPayloadTooLargeError when the payload exceeds 1 MiB (nothing is sent)
   * @throws InvalidEventPayloadError when the payload cannot be serialized
   */
  async broadcastEvent(
    gatewayId: string,
    eventType: GatewayEventType,
    payload: unknown,
    options: BroadcastOptions = {},
  ): Promise<BroadcastResult> {
    const { envelope, frame } = this.buildFrame(eventType, payload, options);

    const connections = this.manager.getConnections(gatewayId);
    if (connections.length === 0) {
      this.logger.warn({ gatewayId, eventType }, "No active connections for gateway");
      return { correlationId: envelope.correlationId, gatewayCount: 0, sentCount: 0, failedCount: 0 };
    }

    const { sentCount, failedCount } = await this.deliver(connections, frame, envelope);

    this.logger.info(
      { eventType, gatewayId, sentCount, failedCount, correlationId: envelope.correlationId },
      "Event broadcast completed",
    );
    return { correlationId: envelope.correlationId, gatewayCount: 1, sentCount, failedCount };
  }

  /**
   * Send one event to every connection of every known gateway.
   */
  async broadcastToAllGateways(
    eventType: GatewayEventType,
    payload: unknown,
    options: BroadcastOptions = {},
  ): Promise<BroadcastResult> {
    const { envelope, frame } = this.buildFrame(eventType, payload, options);

    const gatewayIds = this.manager.getAllGatewayIds();
    const connections = gatewayIds.flatMap((id) => this.manager.getConnections(id));
    const { sentCount, failedCount } = await this.deliver(connections, frame, envelope);

    this.logger.info(
      {
        eventType,
        totalGateways: gatewayIds.length,
        sentCount,
        failedCount,
        correlationId: envelope.correlationId,
      },
      "Broadcast to all gateways completed",
    );
    return {
      correlationId: envelope.correlationId,
      gatewayCount: gatewayIds.length,
      sentCount,
      failedCount,
    };
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private buildFrame(
    eventType: GatewayEventType,
    payload: unknown,
    options: BroadcastOptions,
  ): { envelope: EventEnvelope; frame: string } {
    let serialized: string | undefined;
    try {
      serialized = JSON.stringify(payload);
    } catch (error) {
      throw new InvalidEventPayloadError(eventType, error instanceof Error ? error : undefined);
    }
    if (serialized === undefined) {
      throw new InvalidEventPayloadError(eventType);
    }

    const size = Buffer.byteLength(serialized, "utf8");
    if (size > MAX_EVENT_PAYLOAD_SIZE) {
      throw new EventPayloadTooLargeError(size, MAX_EVENT_PAYLOAD_SIZE);
    }

    const envelope: EventEnvelope = {
      type: eventType,
      payload,
      timestamp: new Date().toISOString(),
      correlationId: randomUUID(),
      ...(options.userId !== undefined ? { userId: options.userId } : {}),
    };
    return { envelope, frame: JSON.stringify(envelope) };
  }

  private async deliver(
    connections: readonly Connection[],
    frame: string,
    envelope: EventEnvelope,
  ): Promise<{ sentCount: number; failedCount: number }> {
    let sentCount = 0;
    let failedCount = 0;

    await Promise.all(
      connections.map(async (connection) => {
        try {
          await connection.send(frame);
          sentCount++;
          connection.deliveryStats.recordSuccess();
          this.logger.debug(
            {
              type: envelope.type,
              gatewayId: connection.gatewayId,
              connectionId: connection.connectionId,
              correlationId: envelope.correlationId,
            },
            "Event sent successfully",
          );
        } catch (error) {
          failedCount++;
          connection.deliveryStats.recordFailure(`send error: ${getErrorMessage(error)}`);
          this.logger.error(
            {
              err: error,
              gatewayId: connection.gatewayId,
              connectionId: connection.connectionId,
              eventType: envelope.type,
            },
            "Failed to send event to gateway connection",
          );
        }
      }),
    );

    return { sentCount, failedCount };
  }
}
