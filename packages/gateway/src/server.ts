import type { IncomingHttpHeaders } from "node:http";
import type { Logger } from "@armada/core";
import {
  GatewayAuthFailedError,
  GatewayCapacityExceededError,
  GatewayRateLimitedError,
  getErrorMessage,
  isNotFoundError,
  isRateLimitError,
  TimeoutError,
} from "@armada/errors";
import type { Connection } from "./connection/connection.js";
import type { ConnectionManager } from "./connection/connection-manager.js";
import type { ConnectionAck, ErrorFrame } from "./events/envelope.js";
import {
  CLOSE_INTERNAL_ERROR,
  CLOSE_POLICY_VIOLATION,
  CLOSE_TRY_AGAIN_LATER,
  isExpectedCloseCode,
} from "./transport/transport.js";
import { type WebSocketLike, WebSocketTransport } from "./transport/ws-transport.js";
import { createEmitter, type Emitter } from "./utils/emitter.js";
import { SlidingWindowRateLimiter } from "./utils/rate-limiter.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GatewayIdentity {
  readonly gatewayId: string;
}

/**
 * Exchanges a gateway API key for the gateway's identity.
 * Rejects with a NotFoundError for unknown keys.
 */
export interface GatewayTokenVerifier {
  verifyToken(apiKey: string): Promise<GatewayIdentity>;
}

/**
 * Records gateway liveness in the gateway store.
 */
export interface GatewayStatusUpdater {
  setGatewayActive(gatewayId: string, active: boolean): Promise<void>;
}

export type MessageHandler = (connection: Connection, data: string) => void | Promise<void>;
export type ConnectHandler = (connection: Connection) => void;
export type DisconnectHandler = (connection: Connection, code: number, reason: string) => void;

export interface GatewayServerConfig {
  readonly port: number;
  /** Upgrade path (default: /ws/gateways/connect) */
  readonly path?: string;
  /** Connection attempts per source address per 60s window */
  readonly connectionRateLimit: number;
  /** Bound on API key verification during the upgrade (ms) */
  readonly handshakeTimeoutMs: number;
  /** Bound on a single frame write (ms) */
  readonly writeTimeoutMs: number;
}

/**
 * The request fields the upgrade checks read.
 */
export interface UpgradeRequest {
  readonly headers: IncomingHttpHeaders;
  readonly socket?: { readonly remoteAddress?: string | undefined } | undefined;
}

export interface WebSocketServerLike {
  on(event: string, handler: (...args: unknown[]) => void): void;
  close(cb?: (err?: Error) => void): void;
}

export type VerifyClient = (
  info: { req: UpgradeRequest },
  callback: (result: boolean, code?: number, message?: string) => void,
) => void;

/**
 * Factory for creating a WebSocket server.
 * Injectable for testing.
 */
export type WsServerFactory = (options: {
  port: number;
  path: string;
  verifyClient: VerifyClient;
}) => WebSocketServerLike;

export interface GatewayServerDeps {
  readonly manager: ConnectionManager;
  readonly verifier: GatewayTokenVerifier;
  readonly logger: Logger;
  readonly statusUpdater?: GatewayStatusUpdater;
  readonly wsFactory?: WsServerFactory;
}

export const DEFAULT_WS_PATH = "/ws/gateways/connect";
export const API_KEY_HEADER = "api-key";
const RATE_LIMIT_WINDOW_MS = 60_000;

type UpgradeVerdict =
  | { readonly ok: true; readonly identity: GatewayIdentity; readonly apiKey: string }
  | { readonly ok: false; readonly status: number; readonly message: string };

// ---------------------------------------------------------------------------
// Server Events
// ---------------------------------------------------------------------------

type GatewayServerEvents = {
  connect: [connection: Connection];
  disconnect: [connection: Connection, code: number, reason: string];
};

// ---------------------------------------------------------------------------
// GatewayServer
// ---------------------------------------------------------------------------

/**
 * WebSocket endpoint gateways dial into.
 *
 * Before the upgrade: per-address rate limit, `api-key` header, capacity
 * check, then key verification. After it: register with the manager, send
 * `connection.ack`, mark the gateway active, and dispatch inbound frames to
 * message handlers behind a per-connection fault boundary.
 */
export class GatewayServer {
  private wss: WebSocketServerLike | undefined;
  private sweepTimer: ReturnType<typeof setInterval> | undefined;
  private readonly verified: WeakMap<object, { identity: GatewayIdentity; apiKey: string }> =
    new WeakMap();
  private readonly messageHandlers: Set<MessageHandler> = new Set();
  private readonly events: Emitter<GatewayServerEvents>;
  private readonly rateLimiter: SlidingWindowRateLimiter;
  private readonly config: GatewayServerConfig;
  private readonly deps: GatewayServerDeps;
  private readonly logger: Logger;

  constructor(config: GatewayServerConfig, deps: GatewayServerDeps) {
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger.child({ component: "gateway-server" });
    this.rateLimiter = new SlidingWindowRateLimiter(config.connectionRateLimit, RATE_LIMIT_WINDOW_MS);
    this.events = createEmitter<GatewayServerEvents>((error, event) => {
      this.logger.error({ err: error, event }, "Server event handler failed");
    });
  }

  /**
   * Start accepting gateway connections.
   */
  async start(): Promise<void> {
    if (this.wss) return;

    const path = this.config.path ?? DEFAULT_WS_PATH;
    const verifyClient: VerifyClient = (info, callback) => {
      this.verifyUpgrade(info.req).then(
        (verdict) => {
          if (verdict.ok) {
            this.verified.set(info.req, { identity: verdict.identity, apiKey: verdict.apiKey });
            callback(true);
          } else {
            callback(false, verdict.status, verdict.message);
          }
        },
        (error: unknown) => {
          this.logger.error({ err: error }, "Upgrade verification failed");
          callback(false, 500, "Internal server error");
        },
      );
    };

    let wss: WebSocketServerLike;
    if (this.deps.wsFactory) {
      wss = this.deps.wsFactory({ port: this.config.port, path, verifyClient });
    } else {
      const { WebSocketServer } = await import("ws");
      wss = new WebSocketServer({ port: this.config.port, path, verifyClient });
    }

    wss.on("connection", (ws: unknown, req: unknown) => {
      if (!isWebSocketLike(ws) || !isUpgradeRequest(req)) {
        this.logger.error("Ignoring connection event with unexpected arguments");
        return;
      }
      this.handleConnection(ws, req);
    });

    try {
      await this.listen(wss);
    } catch (error) {
      this.logger.error({ err: error, port: this.config.port }, "Gateway WebSocket server failed to listen");
      throw error;
    }
    this.wss = wss;

    this.sweepTimer = setInterval(() => {
      this.rateLimiter.sweep();
      this.logger.debug({ trackedAddresses: this.rateLimiter.size }, "Swept connection rate limiter");
    }, RATE_LIMIT_WINDOW_MS);
    this.sweepTimer.unref();

    this.logger.info({ port: this.config.port, path }, "Gateway WebSocket server listening");
  }

  /**
   * Stop accepting connections. Live connections are left to the
   * connection manager's shutdown.
   */
  async stop(): Promise<void> {
    if (this.sweepTimer !== undefined) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }

    const wss = this.wss;
    if (!wss) return;
    this.wss = undefined;

    await new Promise<void>((resolve, reject) => {
      wss.close((err) => {
        this.events.clear();
        this.messageHandlers.clear();
        this.rateLimiter.clear();
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Register an inbound message handler. Returns a disposer function.
   * A handler that throws or rejects closes only its own connection.
   */
  onMessage(handler: MessageHandler): () => void {
    this.messageHandlers.add(handler);
    return () => {
      this.messageHandlers.delete(handler);
    };
  }

  /**
   * Register a connection handler. Returns a disposer function.
   */
  onConnect(handler: ConnectHandler): () => void {
    return this.events.on("connect", handler);
  }

  /**
   * Register a disconnect handler. Returns a disposer function.
   */
  onDisconnect(handler: DisconnectHandler): () => void {
    return this.events.on("disconnect", handler);
  }

  get isListening(): boolean {
    return this.wss !== undefined;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  /**
   * Resolves once the listener is bound; rejects when binding fails. Later
   * listener errors are logged.
   */
  private listen(wss: WebSocketServerLike): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let bound = false;
      wss.on("listening", () => {
        bound = true;
        resolve();
      });
      wss.on("error", (error: unknown) => {
        if (!bound) {
          reject(error);
          return;
        }
        this.logger.error({ err: error }, "Gateway WebSocket server error");
      });
    });
  }

  private async verifyUpgrade(req: UpgradeRequest): Promise<UpgradeVerdict> {
    const address = req.socket?.remoteAddress ?? "unknown";

    if (!this.rateLimiter.allow(address)) {
      const error = new GatewayRateLimitedError(address);
      this.logger.warn({ address }, "Connection rate limit exceeded");
      return { ok: false, status: error.httpStatus, message: error.message };
    }

    const apiKey = headerValue(req.headers[API_KEY_HEADER]);
    if (!apiKey) {
      this.logger.warn({ address }, "Gateway connection attempt without API key");
      return { ok: false, status: 401, message: "API key is required. Provide 'api-key' header." };
    }

    if (!this.deps.manager.hasCapacity()) {
      const error = new GatewayCapacityExceededError(this.deps.manager.maxConnections);
      this.logger.warn({ address }, "Rejecting gateway connection: at capacity");
      return { ok: false, status: error.httpStatus, message: error.message };
    }

    try {
      const identity = await withTimeout(
        this.deps.verifier.verifyToken(apiKey),
        this.config.handshakeTimeoutMs,
      );
      return { ok: true, identity, apiKey };
    } catch (error) {
      const authError = isNotFoundError(error)
        ? new GatewayAuthFailedError("Invalid API key", error)
        : new GatewayAuthFailedError(
            "Authentication failed",
            error instanceof Error ? error : undefined,
          );
      this.logger.warn({ address, err: error }, "Gateway authentication failed");
      return { ok: false, status: authError.httpStatus, message: authError.message };
    }
  }

  private handleConnection(ws: WebSocketLike, req: UpgradeRequest): void {
    const transport = new WebSocketTransport(ws, { writeTimeoutMs: this.config.writeTimeoutMs });
    const verified = this.verified.get(req);
    this.verified.delete(req);

    // The socket closes after an error; the close handler unregisters.
    let connectionId: string | undefined;
    transport.onError((error) => {
      this.logger.warn(
        { err: error, gatewayId: verified?.identity.gatewayId, connectionId },
        "Gateway socket error",
      );
    });

    if (!verified) {
      ws.close(CLOSE_POLICY_VIOLATION, "Unauthenticated");
      return;
    }

    const { identity, apiKey } = verified;

    let connection: Connection;
    try {
      connection = this.deps.manager.register(identity.gatewayId, transport, apiKey);
    } catch (error) {
      // Capacity can run out between verification and registration.
      this.logger.warn(
        { gatewayId: identity.gatewayId, err: error },
        "Failed to register gateway connection",
      );
      const frame: ErrorFrame = { type: "error", message: getErrorMessage(error) };
      ws.send(JSON.stringify(frame));
      ws.close(isRateLimitError(error) ? CLOSE_TRY_AGAIN_LATER : CLOSE_INTERNAL_ERROR, frame.message);
      return;
    }
    connectionId = connection.connectionId;

    transport.onMessage((data) => {
      this.dispatch(connection, data).catch((error: unknown) => {
        this.logger.error({ err: error, connectionId: connection.connectionId }, "Dispatch failed");
      });
    });
    transport.onClose((code, reason) => {
      this.handleClose(connection, code, reason).catch((error: unknown) => {
        this.logger.error({ err: error, connectionId: connection.connectionId }, "Close handling failed");
      });
    });

    this.events.emit("connect", connection);
    this.acknowledge(connection).catch((error: unknown) => {
      this.logger.error({ err: error, connectionId: connection.connectionId }, "Acknowledge failed");
    });
  }

  private async acknowledge(connection: Connection): Promise<void> {
    const { gatewayId, connectionId } = connection;
    const ack: ConnectionAck = {
      type: "connection.ack",
      gatewayId,
      connectionId,
      timestamp: new Date().toISOString(),
    };

    try {
      await connection.send(JSON.stringify(ack));
    } catch (error) {
      this.logger.error({ err: error, gatewayId, connectionId }, "Failed to send connection ack");
      await this.deps.manager.unregister(gatewayId, connectionId);
      return;
    }

    this.logger.info({ gatewayId, connectionId }, "Gateway connected");
    await this.updateStatus(gatewayId, true);
  }

  private async dispatch(connection: Connection, data: string): Promise<void> {
    for (const handler of [...this.messageHandlers]) {
      try {
        await handler(connection, data);
      } catch (error) {
        this.logger.error(
          { err: error, gatewayId: connection.gatewayId, connectionId: connection.connectionId },
          "Message handler failed; closing connection",
        );
        await this.deps.manager.unregister(connection.gatewayId, connection.connectionId);
        return;
      }
    }
  }

  private async handleClose(connection: Connection, code: number, reason: string): Promise<void> {
    const { gatewayId, connectionId } = connection;

    if (isExpectedCloseCode(code)) {
      this.logger.info({ gatewayId, connectionId, code, reason }, "Gateway disconnected");
    } else {
      this.logger.error({ gatewayId, connectionId, code, reason }, "Unexpected WebSocket close");
    }

    await this.deps.manager.unregister(gatewayId, connectionId);
    this.events.emit("disconnect", connection, code, reason);

    if (!this.deps.manager.isConnected(gatewayId)) {
      await this.updateStatus(gatewayId, false);
    }
  }

  private async updateStatus(gatewayId: string, active: boolean): Promise<void> {
    if (!this.deps.statusUpdater) return;
    try {
      await this.deps.statusUpdater.setGatewayActive(gatewayId, active);
    } catch (error) {
      this.logger.warn({ err: error, gatewayId, active }, "Failed to update gateway status");
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function headerValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

function isWebSocketLike(value: unknown): value is WebSocketLike {
  return (
    typeof value === "object" &&
    value !== null &&
    "send" in value &&
    typeof value.send === "function" &&
    "close" in value &&
    typeof value.close === "function" &&
    "on" in value &&
    typeof value.on === "function"
  );
}

function isUpgradeRequest(value: unknown): value is UpgradeRequest {
  return (
    typeof value === "object" &&
    value !== null &&
    "headers" in value &&
    typeof value.headers === "object" &&
    value.headers !== null
  );
}

/**
 * Reject with a TimeoutError if the promise does not settle in time.
 */
function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(
        new TimeoutError({
          code: "INTERNAL_TIMEOUT",
          message: `verification did not complete within ${timeoutMs}ms`,
        }),
      );
    }, timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}
