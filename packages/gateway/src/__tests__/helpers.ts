/**
 * Shared test helpers for @armada/gateway tests.
 *
 * In-memory transport, mock `ws` socket and server, and a harness that
 * drives the server's upgrade checks the way `ws` does.
 */

import { createLogger, type Logger } from "@armada/core";
import { type Mock, vi } from "vitest";
import { ConnectionManager, type ConnectionManagerConfig } from "../connection/connection-manager.js";
import {
  GatewayServer,
  type GatewayServerConfig,
  type GatewayStatusUpdater,
  type GatewayTokenVerifier,
  type UpgradeRequest,
  type VerifyClient,
  type WebSocketServerLike,
  type WsServerFactory,
} from "../server.js";
import type { Transport } from "../transport/transport.js";
import type { WebSocketLike } from "../transport/ws-transport.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

export const silentLogger: Logger = createLogger({ level: "silent" });

export const DEFAULT_MANAGER_CONFIG: ConnectionManagerConfig = {
  maxConnections: 1000,
  heartbeatIntervalMs: 20_000,
  heartbeatTimeoutMs: 30_000,
};

export const DEFAULT_SERVER_CONFIG: GatewayServerConfig = {
  port: 0,
  connectionRateLimit: 10,
  handshakeTimeoutMs: 10_000,
  writeTimeoutMs: 10_000,
};

/**
 * Deterministic connection ids: conn-1, conn-2, ...
 */
export function sequentialIds(prefix = "conn"): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

export function createTestManager(overrides: Partial<ConnectionManagerConfig> = {}): ConnectionManager {
  return new ConnectionManager(
    { ...DEFAULT_MANAGER_CONFIG, ...overrides },
    { logger: silentLogger, generateId: sequentialIds() },
  );
}

/**
 * Resolve pending promise continuations.
 */
export async function flush(): Promise<void> {
  for (let i = 0; i < 50; i++) {
    await Promise.resolve();
  }
}

// ---------------------------------------------------------------------------
// Fake transport
// ---------------------------------------------------------------------------

export class FakeTransport implements Transport {
  readonly sent: string[] = [];
  readonly closeCalls: { code: number; reason: string }[] = [];
  pings = 0;
  sendError: Error | undefined;
  pingError: Error | undefined;

  private pongHandlers: (() => void)[] = [];
  private messageHandlers: ((data: string) => void)[] = [];
  private closeHandlers: ((code: number, reason: string) => void)[] = [];
  private errorHandlers: ((error: Error) => void)[] = [];

  async send(data: string): Promise<void> {
    if (this.sendError) throw this.sendError;
    this.sent.push(data);
  }

  async close(code: number, reason: string): Promise<void> {
    this.closeCalls.push({ code, reason });
  }

  async sendPing(): Promise<void> {
    this.pings++;
    if (this.pingError) throw this.pingError;
  }

  onPong(handler: () => void): void {
    this.pongHandlers = [...this.pongHandlers, handler];
  }

  onMessage(handler: (data: string) => void): void {
    this.messageHandlers = [...this.messageHandlers, handler];
  }

  onClose(handler: (code: number, reason: string) => void): void {
    this.closeHandlers = [...this.closeHandlers, handler];
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandlers = [...this.errorHandlers, handler];
  }

  /** Simulate the peer answering a ping. */
  pong(): void {
    for (const h of this.pongHandlers) h();
  }

  /** Simulate an inbound message. */
  receive(data: string): void {
    for (const h of this.messageHandlers) h(data);
  }

  /** Simulate the channel closing. */
  simulateClose(code = 1000, reason = ""): void {
    for (const h of this.closeHandlers) h(code, reason);
  }

  /** Simulate a channel fault. */
  simulateError(error: Error): void {
    for (const h of this.errorHandlers) h(error);
  }

  sentJson(): unknown[] {
    return this.sent.map((frame): unknown => JSON.parse(frame));
  }
}

// ---------------------------------------------------------------------------
// Mock WebSocket
// ---------------------------------------------------------------------------

export interface MockWs extends WebSocketLike {
  handlers: Map<string, ((...args: unknown[]) => unknown)[]>;
  send: Mock<(data: string, cb?: (err?: Error) => void) => void>;
  ping: Mock<(data?: unknown, mask?: boolean, cb?: (err?: Error) => void) => void>;
  close: Mock<(code?: number, reason?: string) => void>;
  sentFrames: () => unknown[];
}

export function createMockWs(): MockWs {
  const handlers = new Map<string, ((...args: unknown[]) => unknown)[]>();
  const send = vi.fn((_data: string, cb?: (err?: Error) => void) => {
    cb?.();
  });
  return {
    handlers,
    readyState: 1, // OPEN
    send,
    ping: vi.fn((_data?: unknown, _mask?: boolean, cb?: (err?: Error) => void) => {
      cb?.();
    }),
    close: vi.fn<(code?: number, reason?: string) => void>(),
    on(event: string, handler: (...args: unknown[]) => void) {
      const existing = handlers.get(event) ?? [];
      handlers.set(event, [...existing, handler]);
    },
    sentFrames(): unknown[] {
      return send.mock.calls.map((call): unknown => JSON.parse(call[0]));
    },
  };
}

/**
 * Simulate an inbound text frame.
 */
export function sendMessage(ws: MockWs, data: string): void {
  for (const h of ws.handlers.get("message") ?? []) {
    h(Buffer.from(data), false);
  }
}

/**
 * Simulate a socket error event.
 */
export function errorWs(ws: MockWs, error: Error): void {
  for (const h of ws.handlers.get("error") ?? []) {
    h(error);
  }
}

/**
 * Simulate a WebSocket close event.
 */
export function closeWs(ws: MockWs, code = 1000, reason = ""): void {
  for (const h of ws.handlers.get("close") ?? []) {
    h(code, Buffer.from(reason));
  }
}

// ---------------------------------------------------------------------------
// Mock WebSocket Server
// ---------------------------------------------------------------------------

export interface MockWss extends WebSocketServerLike {
  handlers: Map<string, ((...args: unknown[]) => unknown)[]>;
  verifyClient: VerifyClient | undefined;
  closed: boolean;
  /** When set, binding fails with this error instead of emitting "listening". */
  bindError: Error | undefined;
  emit: (event: string, ...args: unknown[]) => void;
  simulateConnection: (ws: WebSocketLike, req: UpgradeRequest) => void;
}

export function createMockWss(): MockWss {
  const handlers = new Map<string, ((...args: unknown[]) => unknown)[]>();
  const wss: MockWss = {
    handlers,
    verifyClient: undefined,
    closed: false,
    bindError: undefined,
    on(event: string, handler: (...args: unknown[]) => void) {
      const existing = handlers.get(event) ?? [];
      handlers.set(event, [...existing, handler]);
    },
    close(cb?: (err?: Error) => void) {
      wss.closed = true;
      cb?.();
    },
    emit(event: string, ...args: unknown[]) {
      for (const h of handlers.get(event) ?? []) {
        h(...args);
      }
    },
    simulateConnection(ws: WebSocketLike, req: UpgradeRequest) {
      wss.emit("connection", ws, req);
    },
  };
  return wss;
}

/**
 * Binding settles on a later microtask, as it does for a real listener.
 */
export function createMockFactory(wss: MockWss): WsServerFactory {
  return vi.fn((options: Parameters<WsServerFactory>[0]) => {
    wss.verifyClient = options.verifyClient;
    void Promise.resolve().then(() => {
      if (wss.bindError) wss.emit("error", wss.bindError);
      else wss.emit("listening");
    });
    return wss;
  });
}

// ---------------------------------------------------------------------------
// Server harness
// ---------------------------------------------------------------------------

export interface UpgradeOutcome {
  readonly result: boolean;
  readonly code: number | undefined;
  readonly message: string | undefined;
}

export interface ServerHarness {
  readonly server: GatewayServer;
  readonly manager: ConnectionManager;
  readonly wss: MockWss;
  readonly verifier: { verifyToken: Mock<GatewayTokenVerifier["verifyToken"]> };
  readonly statusUpdater: { setGatewayActive: Mock<GatewayStatusUpdater["setGatewayActive"]> };
  /** Run the upgrade checks for one attempt. */
  attempt(options?: { apiKey?: string; address?: string; req?: UpgradeRequest }): Promise<UpgradeOutcome>;
  /** Run the upgrade checks and, when accepted, open a mock socket. */
  connect(options?: { apiKey?: string; address?: string }): Promise<{ outcome: UpgradeOutcome; ws: MockWs }>;
}

/**
 * API keys of the form "key-<gatewayId>" verify to that gateway; anything
 * else is rejected by the default verifier.
 */
export async function createServerHarness(
  options: {
    server?: Partial<GatewayServerConfig>;
    manager?: Partial<ConnectionManagerConfig>;
  } = {},
): Promise<ServerHarness> {
  const manager = createTestManager(options.manager);
  const wss = createMockWss();
  const verifier = {
    verifyToken: vi.fn<GatewayTokenVerifier["verifyToken"]>(async (apiKey: string) => {
      if (!apiKey.startsWith("key-")) throw new Error("unexpected key");
      return { gatewayId: apiKey.slice("key-".length) };
    }),
  };
  const statusUpdater = {
    setGatewayActive: vi.fn<GatewayStatusUpdater["setGatewayActive"]>(async () => {}),
  };
  const server = new GatewayServer(
    { ...DEFAULT_SERVER_CONFIG, ...options.server },
    { manager, verifier, statusUpdater, logger: silentLogger, wsFactory: createMockFactory(wss) },
  );
  await server.start();

  const attempt = (
    opts: { apiKey?: string; address?: string; req?: UpgradeRequest } = {},
  ): Promise<UpgradeOutcome> => {
    const req: UpgradeRequest = opts.req ?? {
      headers: opts.apiKey !== undefined ? { "api-key": opts.apiKey } : {},
      socket: { remoteAddress: opts.address ?? "10.0.0.1" },
    };
    return new Promise<UpgradeOutcome>((resolve, reject) => {
      const verifyClient = wss.verifyClient;
      if (!verifyClient) {
        reject(new Error("server not started"));
        return;
      }
      verifyClient({ req }, (result, code, message) => resolve({ result, code, message }));
    });
  };

  const connect = async (
    opts: { apiKey?: string; address?: string } = {},
  ): Promise<{ outcome: UpgradeOutcome; ws: MockWs }> => {
    const req: UpgradeRequest = {
      headers: opts.apiKey !== undefined ? { "api-key": opts.apiKey } : {},
      socket: { remoteAddress: opts.address ?? "10.0.0.1" },
    };
    const outcome = await attempt({ req });
    const ws = createMockWs();
    if (outcome.result) {
      wss.simulateConnection(ws, req);
      await flush();
    }
    return { outcome, ws };
  };

  return { server, manager, wss, verifier, statusUpdater, attempt, connect };
}
