import { ConnectionClosedError, TransportWriteTimeoutError } from "@armada/errors";
import type { Transport } from "./transport.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * The subset of a `ws` WebSocket the transport relies on.
 * Injectable for testing.
 */
export interface WebSocketLike {
  send(data: string, cb?: (err?: Error) => void): void;
  ping(data?: unknown, mask?: boolean, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  on(event: string, handler: (...args: unknown[]) => void): void;
  readyState: number;
}

export interface WebSocketTransportOptions {
  /** Max time for a single write to flush (ms) */
  readonly writeTimeoutMs: number;
}

const OPEN = 1;

// ---------------------------------------------------------------------------
// WebSocketTransport
// ---------------------------------------------------------------------------

/**
 * Transport over a `ws` socket. Writes are bounded by the write timeout;
 * a socket that is not open rejects immediately.
 */
export class WebSocketTransport implements Transport {
  private readonly ws: WebSocketLike;
  private readonly writeTimeoutMs: number;

  constructor(ws: WebSocketLike, options: WebSocketTransportOptions) {
    this.ws = ws;
    this.writeTimeoutMs = options.writeTimeoutMs;
  }

  send(data: string): Promise<void> {
    return this.write((done) => this.ws.send(data, done));
  }

  sendPing(): Promise<void> {
    return this.write((done) => this.ws.ping(undefined, undefined, done));
  }

  async close(code: number, reason: string): Promise<void> {
    this.ws.close(code, reason);
  }

  onPong(handler: () => void): void {
    this.ws.on("pong", () => handler());
  }

  onMessage(handler: (data: string) => void): void {
    this.ws.on("message", (data: unknown) => handler(rawDataToString(data)));
  }

  onClose(handler: (code: number, reason: string) => void): void {
    this.ws.on("close", (code: unknown, reason: unknown) => {
      handler(typeof code === "number" ? code : 1005, rawDataToString(reason ?? ""));
    });
  }

  onError(handler: (error: Error) => void): void {
    this.ws.on("error", (error: unknown) => {
      handler(error instanceof Error ? error : new Error(String(error)));
    });
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private write(op: (done: (err?: Error) => void) => void): Promise<void> {
    if (this.ws.readyState !== OPEN) {
      return Promise.reject(new ConnectionClosedError());
    }

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        reject(new TransportWriteTimeoutError(this.writeTimeoutMs));
      }, this.writeTimeoutMs);

      op((err) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (err) reject(err);
        else resolve();
      });
    });
  }
}

/**
 * Normalize `ws` RawData (Buffer, Buffer[], ArrayBuffer) or a string to text.
 */
export function rawDataToString(data: unknown): string {
  if (typeof data === "string") return data;
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) {
    return Buffer.concat(data.filter((part): part is Buffer => Buffer.isBuffer(part))).toString(
      "utf8",
    );
  }
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return String(data);
}
