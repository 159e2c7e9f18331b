/**
 * @armada/gateway
 *
 * Live WebSocket channels to the gateway fleet: connection registry with
 * heartbeat supervision, event broadcast, and the upgrade endpoint.
 */

export { Connection, type ConnectionInfo, type ConnectionOptions } from "./connection/connection.js";
export {
  type ConnectionHandler,
  ConnectionManager,
  type ConnectionManagerConfig,
  type ConnectionManagerDeps,
  type ConnectionManagerStats,
} from "./connection/connection-manager.js";
export { DeliveryStats, type DeliveryStatsSnapshot } from "./connection/delivery-stats.js";
export { ControlPlane, type ControlPlaneDeps } from "./control-plane.js";
export {
  type AgentDeployedEvent,
  AgentDeployedEventSchema,
  type AgentUndeployedEvent,
  AgentUndeployedEventSchema,
  type ConnectionAck,
  ConnectionAckSchema,
  type ErrorFrame,
  ErrorFrameSchema,
  type EventEnvelope,
  EventEnvelopeSchema,
  GATEWAY_EVENT_TYPES,
  type GatewayConfigEvent,
  GatewayConfigEventSchema,
  type GatewayEventType,
  MAX_EVENT_PAYLOAD_SIZE,
} from "./events/envelope.js";
export {
  type BroadcastOptions,
  type BroadcastResult,
  GatewayEventsService,
  type GatewayEventsServiceDeps,
} from "./events/gateway-events-service.js";
export {
  API_KEY_HEADER,
  type ConnectHandler,
  DEFAULT_WS_PATH,
  type DisconnectHandler,
  type GatewayIdentity,
  GatewayServer,
  type GatewayServerConfig,
  type GatewayServerDeps,
  type GatewayStatusUpdater,
  type GatewayTokenVerifier,
  type MessageHandler,
  type UpgradeRequest,
  type VerifyClient,
  type WebSocketServerLike,
  type WsServerFactory,
} from "./server.js";
export {
  CLOSE_GOING_AWAY,
  CLOSE_INTERNAL_ERROR,
  CLOSE_NORMAL,
  CLOSE_POLICY_VIOLATION,
  CLOSE_TRY_AGAIN_LATER,
  isExpectedCloseCode,
  type Transport,
} from "./transport/transport.js";
export {
  rawDataToString,
  type WebSocketLike,
  WebSocketTransport,
  type WebSocketTransportOptions,
} from "./transport/ws-transport.js";
export { createEmitter, type Emitter, type EmitterErrorHandler, type EventMap } from "./utils/emitter.js";
export { SlidingWindowRateLimiter } from "./utils/rate-limiter.js";
