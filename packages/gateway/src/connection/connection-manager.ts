import { randomUUID } from "node:crypto";
import type { Logger } from "@armada/core";
import { ConnectionManagerShutDownError, GatewayCapacityExceededError } from "@armada/errors";
import { CLOSE_GOING_AWAY, CLOSE_NORMAL, type Transport } from "../transport/transport.js";
import { createEmitter, type Emitter } from "../utils/emitter.js";
import { Connection } from "./connection.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConnectionManagerConfig {
  /** Global ceiling across all gateways */
  readonly maxConnections: number;
  /** Time between heartbeat ticks (ms) */
  readonly heartbeatIntervalMs: number;
  /** Max silence before a connection is reaped (ms) */
  readonly heartbeatTimeoutMs: number;
}

export interface ConnectionManagerDeps {
  readonly logger: Logger;
  /** Connection id generator (default: random UUID) */
  readonly generateId?: () => string;
}

export interface ConnectionManagerStats {
  readonly totalConnections: number;
  readonly totalGateways: number;
  readonly totalEventsSent: number;
  readonly totalFailedEvents: number;
}

export type ConnectionHandler = (connection: Connection) => void;

type ConnectionManagerEvents = {
  "connection.registered": [connection: Connection];
  "connection.unregistered": [connection: Connection];
  "connection.heartbeat_timeout": [connection: Connection];
};

interface HeartbeatTask {
  readonly done: Promise<void>;
  readonly stop: () => void;
}

// ---------------------------------------------------------------------------
// ConnectionManager
// ---------------------------------------------------------------------------

/**
 * In-memory registry of live gateway connections.
 *
 * A gateway may hold several connections at once. Registry mutations run
 * synchronously (no await between reading a gateway's list and storing its
 * replacement), so the connection count always equals the sum of the list
 * sizes. Each connection gets its own heartbeat task; `shutdown()` resolves
 * only after every task has exited.
 */
export class ConnectionManager {
  private connections: Map<string, readonly Connection[]> = new Map();
  private connectionCount = 0;
  private readonly heartbeats: Map<string, HeartbeatTask> = new Map();
  private readonly shutdownController = new AbortController();
  private readonly events: Emitter<ConnectionManagerEvents>;
  private readonly config: ConnectionManagerConfig;
  private readonly logger: Logger;
  private readonly generateId: () => string;

  constructor(config: ConnectionManagerConfig, deps: ConnectionManagerDeps) {
    this.config = config;
    this.logger = deps.logger.child({ component: "connection-manager" });
    this.generateId = deps.generateId ?? randomUUID;
    this.events = createEmitter<ConnectionManagerEvents>((error, event) => {
      this.logger.error({ err: error, event }, "Connection event handler failed");
    });
  }

  /**
   * Register a new connection for a gateway and start its heartbeat.
   *
   * @throws GatewayCapacityExceededError when the global ceiling is reached
   * @throws ConnectionManagerShutDownError after shutdown
   */
  register(gatewayId: string, transport: Transport, authToken: string): Connection {
    if (this.shutdownController.signal.aborted) {
      throw new ConnectionManagerShutDownError();
    }
    if (this.connectionCount >= this.config.maxConnections) {
      throw new GatewayCapacityExceededError(this.config.maxConnections);
    }

    const connection = new Connection({
      gatewayId,
      connectionId: this.generateId(),
      transport,
      authToken,
    });
    transport.onPong(() => connection.updateHeartbeat());

    const existing = this.connections.get(gatewayId) ?? [];
    this.connections.set(gatewayId, [...existing, connection]);
    this.connectionCount++;

    this.logger.info(
      {
        gatewayId,
        connectionId: connection.connectionId,
        totalConnections: this.connectionCount,
      },
      "Gateway connection registered",
    );

    this.startHeartbeat(connection);
    this.events.emit("connection.registered", connection);
    return connection;
  }

  /**
   * Remove one connection and close its transport with a normal closure.
   * Unknown or already removed connections are a no-op.
   */
  async unregister(gatewayId: string, connectionId: string): Promise<void> {
    const connection = this.detach(gatewayId, connectionId);
    if (!connection) return;

    this.heartbeats.get(connectionId)?.stop();

    this.logger.info(
      { gatewayId, connectionId, totalConnections: this.connectionCount },
      "Gateway connection unregistered",
    );
    this.events.emit("connection.unregistered", connection);

    try {
      await connection.close(CLOSE_NORMAL, "normal closure");
    } catch (error) {
      this.logger.warn({ err: error, gatewayId, connectionId }, "Failed to close connection");
    }
  }

  /**
   * Stop heartbeat supervision, close every connection with 1001 and clear
   * the registry. Resolves once every heartbeat task has exited. Further
   * registrations are rejected.
   */
  async shutdown(): Promise<void> {
    if (!this.shutdownController.signal.aborted) {
      this.shutdownController.abort();

      const all = [...this.connections.values()].flat();
      this.connections = new Map();
      this.connectionCount = 0;

      this.logger.info({ totalConnections: all.length }, "Shutting down connection manager");

      await Promise.all(
        all.map(async (connection) => {
          this.events.emit("connection.unregistered", connection);
          try {
            await connection.close(CLOSE_GOING_AWAY, "server shutdown");
          } catch (error) {
            this.logger.warn(
              { err: error, gatewayId: connection.gatewayId, connectionId: connection.connectionId },
              "Failed to close connection during shutdown",
            );
          }
        }),
      );
    }

    await Promise.all([...this.heartbeats.values()].map((task) => task.done));
    this.events.clear();
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /**
   * Snapshot of a gateway's live connections (empty when none).
   */
  getConnections(gatewayId: string): readonly Connection[] {
    return [...(this.connections.get(gatewayId) ?? [])];
  }

  getConnection(gatewayId: string, connectionId: string): Connection | undefined {
    return this.connections.get(gatewayId)?.find((c) => c.connectionId === connectionId);
  }

  getConnectionCount(): number {
    return this.connectionCount;
  }

  getAllGatewayIds(): readonly string[] {
    return [...this.connections.keys()];
  }

  isConnected(gatewayId: string): boolean {
    return this.connections.has(gatewayId);
  }

  hasCapacity(): boolean {
    return !this.shutdownController.signal.aborted && this.connectionCount < this.config.maxConnections;
  }

  getStats(): ConnectionManagerStats {
    let totalEventsSent = 0;
    let totalFailedEvents = 0;
    for (const list of this.connections.values()) {
      for (const connection of list) {
        totalEventsSent += connection.deliveryStats.totalSent;
        totalFailedEvents += connection.deliveryStats.failedDeliveries;
      }
    }
    return {
      totalConnections: this.connectionCount,
      totalGateways: this.connections.size,
      totalEventsSent,
      totalFailedEvents,
    };
  }

  get maxConnections(): number {
    return this.config.maxConnections;
  }

  /** Number of heartbeat tasks still running. */
  get activeHeartbeats(): number {
    return this.heartbeats.size;
  }

  // -------------------------------------------------------------------------
  // Events
  // -------------------------------------------------------------------------

  onRegistered(handler: ConnectionHandler): () => void {
    return this.events.on("connection.registered", handler);
  }

  onUnregistered(handler: ConnectionHandler): () => void {
    return this.events.on("connection.unregistered", handler);
  }

  onHeartbeatTimeout(handler: ConnectionHandler): () => void {
    return this.events.on("connection.heartbeat_timeout", handler);
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private detach(gatewayId: string, connectionId: string): Connection | undefined {
    const list = this.connections.get(gatewayId);
    const connection = list?.find((c) => c.connectionId === connectionId);
    if (!list || !connection) return undefined;

    const remaining = list.filter((c) => c !== connection);
    if (remaining.length === 0) {
      this.connections.delete(gatewayId);
    } else {
      this.connections.set(gatewayId, remaining);
    }
    this.connectionCount--;
    return connection;
  }

  /**
   * One periodic task per connection. Ticks never overlap; the task exits
   * when the connection closes, the tick reaps it, or the manager shuts down.
   */
  private startHeartbeat(connection: Connection): void {
    const signal = this.shutdownController.signal;
    const connectionId = connection.connectionId;
    let inFlight = false;
    let stopped = false;
    let finish: () => void = () => {};

    const done = new Promise<void>((resolve) => {
      finish = () => {
        this.heartbeats.delete(connectionId);
        resolve();
      };
    });

    const stop = (): void => {
      if (stopped) return;
      stopped = true;
      clearInterval(timer);
      signal.removeEventListener("abort", stop);
      // An in-flight tick finishes the task when it settles.
      if (!inFlight) finish();
    };

    const settle = (): void => {
      inFlight = false;
      if (stopped) finish();
    };

    const timer = setInterval(() => {
      if (inFlight || stopped) return;
      inFlight = true;
      this.heartbeatTick(connection).then(
        (keepRunning) => {
          if (!keepRunning) stop();
          settle();
        },
        (error: unknown) => {
          this.logger.error({ err: error, connectionId }, "Heartbeat tick failed");
          stop();
          settle();
        },
      );
    }, this.config.heartbeatIntervalMs);

    signal.addEventListener("abort", stop, { once: true });
    this.heartbeats.set(connectionId, { done, stop });
  }

  /**
   * Returns false when the task should exit.
   */
  private async heartbeatTick(connection: Connection): Promise<boolean> {
    const { gatewayId, connectionId } = connection;

    if (connection.isClosed) {
      // Closed without going through unregister; release its slot.
      await this.unregister(gatewayId, connectionId);
      return false;
    }
    const silentForMs = Date.now() - connection.getLastHeartbeat().getTime();

    if (silentForMs > this.config.heartbeatTimeoutMs) {
      this.logger.warn(
        { gatewayId, connectionId, silentForMs, timeoutMs: this.config.heartbeatTimeoutMs },
        "Heartbeat timeout",
      );
      this.events.emit("connection.heartbeat_timeout", connection);
      await this.unregister(gatewayId, connectionId);
      return false;
    }

    try {
      await connection.transport.sendPing();
      return true;
    } catch (error) {
      this.logger.warn({ err: error, gatewayId, connectionId }, "Failed to send ping");
      await this.unregister(gatewayId, connectionId);
      return false;
    }
  }
}
