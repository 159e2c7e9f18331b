/**
 * A single bidirectional message channel to one gateway.
 *
 * Everything above the transport (connection, manager, broadcast service)
 * is protocol-agnostic; tests substitute an in-memory implementation.
 */
export interface Transport {
  /** Send one text message. Rejects when the write fails or times out. */
  send(data: string): Promise<void>;
  /** Initiate a close handshake with the given code and reason. */
  close(code: number, reason: string): Promise<void>;
  /** Send a keep-alive probe. Rejects when the probe cannot be written. */
  sendPing(): Promise<void>;
  /** Register the keep-alive acknowledgement callback. */
  onPong(handler: () => void): void;
  /** Register the inbound message callback. */
  onMessage(handler: (data: string) => void): void;
  /** Register the callback fired once the channel has closed. */
  onClose(handler: (code: number, reason: string) => void): void;
  /**
   * Register the callback for channel faults (protocol violations, socket
   * errors). A fault is followed by a close.
   */
  onError(handler: (error: Error) => void): void;
}

/** Normal closure */
export const CLOSE_NORMAL = 1000;
/** Endpoint going away (server shutdown) */
export const CLOSE_GOING_AWAY = 1001;
/** Policy violation */
export const CLOSE_POLICY_VIOLATION = 1008;
/** Unexpected condition on the server */
export const CLOSE_INTERNAL_ERROR = 1011;
/** Try again later (capacity) */
export const CLOSE_TRY_AGAIN_LATER = 1013;

/**
 * Close codes that represent an expected disconnect rather than a fault.
 */
export function isExpectedCloseCode(code: number): boolean {
  return code === CLOSE_NORMAL || code === CLOSE_GOING_AWAY;
}
