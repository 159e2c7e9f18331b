import { EventPayloadTooLargeError, InvalidEventPayloadError } from "@armada/errors";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { ConnectionManager } from "../connection/connection-manager.js";
import { EventEnvelopeSchema, MAX_EVENT_PAYLOAD_SIZE } from "../events/envelope.js";
import { GatewayEventsService } from "../events/gateway-events-service.js";
import { createTestManager, FakeTransport, silentLogger } from "./helpers.js";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe("GatewayEventsService", () => {
  let manager: ConnectionManager;
  let service: GatewayEventsService;

  beforeEach(() => {
    manager = createTestManager();
    service = new GatewayEventsService({ manager, logger: silentLogger });
  });

  afterEach(async () => {
    await manager.shutdown();
  });

  // -------------------------------------------------------------------------
  // broadcastEvent
  // -------------------------------------------------------------------------

  describe("broadcastEvent()", () => {
    it("succeeds without sending when the gateway is offline", async () => {
      const other = new FakeTransport();
      manager.register("gw-2", other, "k");

      const result = await service.broadcastEvent("gw-1", "config.updated", { a: 1 });

      expect(result.sentCount).toBe(0);
      expect(result.failedCount).toBe(0);
      expect(result.gatewayCount).toBe(0);
      expect(other.sent).toEqual([]);
    });

    it("wraps the payload in an envelope", async () => {
      const transport = new FakeTransport();
      manager.register("gw-1", transport, "k");

      const result = await service.broadcastEvent("gw-1", "agent.deployed", {
        agentId: "agent-1",
        environment: "dev",
        revisionId: "rev-7",
      });

      expect(transport.sent).toHaveLength(1);
      const frame = EventEnvelopeSchema.parse(JSON.parse(transport.sent[0] ?? ""));
      expect(frame.type).toBe("agent.deployed");
      expect(frame.payload).toEqual({ agentId: "agent-1", environment: "dev", revisionId: "rev-7" });
      expect(frame.correlationId).toMatch(UUID);
      expect(frame.correlationId).toBe(result.correlationId);
      expect(frame).not.toHaveProperty("userId");
      expect(result).toMatchObject({ gatewayCount: 1, sentCount: 1, failedCount: 0 });
    });

    it("carries the userId when given", async () => {
      const transport = new FakeTransport();
      manager.register("gw-1", transport, "k");

      await service.broadcastConfigUpdated(
        "gw-1",
        { configType: "llm-provider", action: "update" },
        { userId: "user-1" },
      );

      expect(transport.sentJson()[0]).toMatchObject({
        type: "config.updated",
        payload: { configType: "llm-provider", action: "update" },
        userId: "user-1",
      });
    });

    it("fans out to every connection of the gateway with one correlation id", async () => {
      const a = new FakeTransport();
      const b = new FakeTransport();
      manager.register("gw-1", a, "k");
      manager.register("gw-1", b, "k");

      await service.broadcastAgentUndeployed("gw-1", { agentId: "agent-1", environment: "dev" });

      expect(a.sent).toHaveLength(1);
      expect(a.sent).toEqual(b.sent);
      const stats = manager.getConnections("gw-1").map((c) => c.getStats().totalSent);
      expect(stats).toEqual([1, 1]);
    });

    it("records a failed send in stats and still resolves", async () => {
      const transport = new FakeTransport();
      transport.sendError = new Error("boom");
      const connection = manager.register("gw-1", transport, "k");

      const result = await service.broadcastEvent("gw-1", "config.updated", { action: "x" });

      expect(result).toMatchObject({ sentCount: 0, failedCount: 1 });
      const stats = connection.getStats();
      expect(stats.totalSent).toBe(0);
      expect(stats.failedDeliveries).toBe(1);
      expect(stats.lastFailureReason).toBe("send error: boom");
      expect(stats.lastFailureTime).toBeInstanceOf(Date);
    });

    it("counts a closed connection as a failed delivery", async () => {
      const connection = manager.register("gw-1", new FakeTransport(), "k");
      await connection.close(1000, "bye");

      await service.broadcastEvent("gw-1", "config.updated", {});

      expect(connection.getStats().lastFailureReason).toBe("send error: connection is closed");
    });

    it("rejects an oversized payload before sending anything", async () => {
      const transport = new FakeTransport();
      manager.register("gw-1", transport, "k");
      const payload = { blob: "x".repeat(MAX_EVENT_PAYLOAD_SIZE) };

      await expect(service.broadcastEvent("gw-1", "config.updated", payload)).rejects.toThrow(
        EventPayloadTooLargeError,
      );
      await expect(service.broadcastEvent("gw-offline", "config.updated", payload)).rejects.toThrow(
        "event payload exceeds maximum size of 1048576 bytes",
      );
      expect(transport.sent).toEqual([]);
    });

    it("accepts a payload of exactly the maximum size", async () => {
      const transport = new FakeTransport();
      manager.register("gw-1", transport, "k");
      // JSON string quotes add two bytes.
      const payload = "x".repeat(MAX_EVENT_PAYLOAD_SIZE - 2);

      const result = await service.broadcastEvent("gw-1", "config.updated", payload);

      expect(result.sentCount).toBe(1);
    });

    it("rejects payloads that cannot be serialized", async () => {
      const circular: { self?: unknown } = {};
      circular.self = circular;

      await expect(service.broadcastEvent("gw-1", "config.updated", circular)).rejects.toThrow(
        InvalidEventPayloadError,
      );
      await expect(service.broadcastEvent("gw-1", "config.updated", undefined)).rejects.toThrow(
        InvalidEventPayloadError,
      );
    });
  });

  // -------------------------------------------------------------------------
  // broadcastToAllGateways
  // -------------------------------------------------------------------------

  describe("broadcastToAllGateways()", () => {
    it("sends one envelope to every connection of every gateway", async () => {
      const a1 = new FakeTransport();
      const a2 = new FakeTransport();
      const b = new FakeTransport();
      b.sendError = new Error("reset");
      manager.register("gw-a", a1, "k");
      manager.register("gw-a", a2, "k");
      manager.register("gw-b", b, "k");

      const result = await service.broadcastToAllGateways("config.updated", { action: "reload" });

      expect(result).toMatchObject({ gatewayCount: 2, sentCount: 2, failedCount: 1 });
      expect(a1.sent).toEqual(a2.sent);
      expect(a1.sentJson()[0]).toMatchObject({ correlationId: result.correlationId });
    });

    it("enforces the size ceiling", async () => {
      manager.register("gw-a", new FakeTransport(), "k");

      await expect(
        service.broadcastToAllGateways("config.updated", "x".repeat(MAX_EVENT_PAYLOAD_SIZE)),
      ).rejects.toThrow(EventPayloadTooLargeError);
    });

    it("resolves with zero counts when nothing is connected", async () => {
      const result = await service.broadcastToAllGateways("agent.deployed", {});

      expect(result).toMatchObject({ gatewayCount: 0, sentCount: 0, failedCount: 0 });
    });
  });
});
