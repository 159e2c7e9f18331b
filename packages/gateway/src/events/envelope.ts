import { z } from "zod";

// ---------------------------------------------------------------------------
// Event types
// ---------------------------------------------------------------------------

export const GATEWAY_EVENT_TYPES = ["agent.deployed", "agent.undeployed", "config.updated"] as const;

export type GatewayEventType = (typeof GATEWAY_EVENT_TYPES)[number];

/** Largest serialized payload accepted for a broadcast, in bytes (1 MiB). */
export const MAX_EVENT_PAYLOAD_SIZE = 1024 * 1024;

// ---------------------------------------------------------------------------
// Payloads
// ---------------------------------------------------------------------------

export const AgentDeployedEventSchema = z.object({
  agentId: z.string(),
  environment: z.string(),
  revisionId: z.string(),
});

export const AgentUndeployedEventSchema = z.object({
  agentId: z.string(),
  environment: z.string(),
});

export const GatewayConfigEventSchema = z.object({
  configType: z.string(),
  action: z.string(),
});

export type AgentDeployedEvent = z.infer<typeof AgentDeployedEventSchema>;
export type AgentUndeployedEvent = z.infer<typeof AgentUndeployedEventSchema>;
export type GatewayConfigEvent = z.infer<typeof GatewayConfigEventSchema>;

// ---------------------------------------------------------------------------
// Frames
// ---------------------------------------------------------------------------

/**
 * Wrapper around every pushed event. `timestamp` is RFC 3339.
 */
export const EventEnvelopeSchema = z.object({
  type: z.string(),
  payload: z.unknown(),
  timestamp: z.string().datetime({ offset: true }),
  correlationId: z.string().uuid(),
  userId: z.string().optional(),
});

export type EventEnvelope = z.infer<typeof EventEnvelopeSchema>;

/**
 * First frame sent on a freshly registered connection.
 */
export const ConnectionAckSchema = z.object({
  type: z.literal("connection.ack"),
  gatewayId: z.string(),
  connectionId: z.string(),
  timestamp: z.string().datetime({ offset: true }),
});

export type ConnectionAck = z.infer<typeof ConnectionAckSchema>;

/**
 * Sent before the server closes a connection it could not register.
 */
export const ErrorFrameSchema = z.object({
  type: z.literal("error"),
  message: z.string(),
});

export type ErrorFrame = z.infer<typeof ErrorFrameSchema>;
