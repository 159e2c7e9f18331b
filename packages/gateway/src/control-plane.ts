import {
  type AdapterFactory,
  createAdapterFactory,
  type GatewayStore,
  InMemoryGatewayStore,
} from "@armada/adapters";
import { type ControlPlaneConfig, createLogger, type Logger } from "@armada/core";
import { ConnectionManager } from "./connection/connection-manager.js";
import { GatewayEventsService } from "./events/gateway-events-service.js";
import {
  GatewayServer,
  type GatewayStatusUpdater,
  type GatewayTokenVerifier,
  type WsServerFactory,
} from "./server.js";

export interface ControlPlaneDeps {
  readonly verifier: GatewayTokenVerifier;
  readonly statusUpdater?: GatewayStatusUpdater;
  /** Gateway records the adapters read (default: empty in-memory store) */
  readonly gatewayStore?: GatewayStore;
  /** Root logger (default: pino at the configured level) */
  readonly logger?: Logger;
  readonly wsFactory?: WsServerFactory;
}

/**
 * Wires the connection manager, broadcast service, WebSocket server and
 * gateway adapters from one configuration.
 */
export class ControlPlane {
  readonly config: ControlPlaneConfig;
  readonly logger: Logger;
  readonly manager: ConnectionManager;
  readonly events: GatewayEventsService;
  readonly server: GatewayServer;
  readonly adapters: AdapterFactory;

  /**
   * @throws InvalidKeySizeError when the configured encryption key is not 32 bytes
   */
  constructor(config: ControlPlaneConfig, deps: ControlPlaneDeps) {
    this.config = config;
    this.logger = deps.logger ?? createLogger({ level: config.logLevel, name: "armada" });
    this.manager = new ConnectionManager(
      {
        maxConnections: config.maxConnections,
        heartbeatIntervalMs: config.heartbeatIntervalMs,
        heartbeatTimeoutMs: config.heartbeatTimeoutMs,
      },
      { logger: this.logger },
    );
    this.events = new GatewayEventsService({ manager: this.manager, logger: this.logger });
    this.server = new GatewayServer(
      {
        port: config.port,
        path: config.path,
        connectionRateLimit: config.connectionRateLimit,
        handshakeTimeoutMs: config.handshakeTimeoutMs,
        writeTimeoutMs: config.writeTimeoutMs,
      },
      {
        manager: this.manager,
        verifier: deps.verifier,
        logger: this.logger,
        ...(deps.statusUpdater ? { statusUpdater: deps.statusUpdater } : {}),
        ...(deps.wsFactory ? { wsFactory: deps.wsFactory } : {}),
      },
    );
    this.adapters = createAdapterFactory(config, {
      store: deps.gatewayStore ?? new InMemoryGatewayStore(),
      logger: this.logger,
    });
  }

  async start(): Promise<void> {
    await this.server.start();
  }

  /**
   * Stop accepting connections, then close every live one and wait for
   * heartbeat supervision to finish.
   */
  async stop(): Promise<void> {
    await this.server.stop();
    await this.manager.shutdown();
    this.logger.info("Control plane stopped");
  }
}
