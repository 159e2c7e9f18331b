import { describe, expect, it, vi } from "vitest";
import { createEmitter, type EmitterErrorHandler } from "../emitter.js";

type TestEvents = {
  message: [text: string];
  multi: [a: string, b: number];
  empty: [];
};

describe("createEmitter", () => {
  // -------------------------------------------------------------------------
  // on / emit
  // -------------------------------------------------------------------------

  describe("on / emit", () => {
    it("passes every argument to the handler", () => {
      const emitter = createEmitter<TestEvents>(vi.fn());
      const handler = vi.fn();
      emitter.on("multi", handler);

      emitter.emit("multi", "a", 42);

      expect(handler).toHaveBeenCalledWith("a", 42);
    });

    it("supports zero-arg events", () => {
      const emitter = createEmitter<TestEvents>(vi.fn());
      const handler = vi.fn();
      emitter.on("empty", handler);

      emitter.emit("empty");

      expect(handler).toHaveBeenCalledOnce();
    });

    it("calls handlers in registration order", () => {
      const emitter = createEmitter<TestEvents>(vi.fn());
      const order: number[] = [];
      emitter.on("message", () => order.push(1));
      emitter.on("message", () => order.push(2));

      emitter.emit("message", "test");

      expect(order).toEqual([1, 2]);
    });

    it("does nothing for an event without handlers", () => {
      const emitter = createEmitter<TestEvents>(vi.fn());

      expect(() => emitter.emit("message", "nobody")).not.toThrow();
    });
  });

  // -------------------------------------------------------------------------
  // Disposers
  // -------------------------------------------------------------------------

  describe("disposer", () => {
    it("unsubscribes the handler", () => {
      const emitter = createEmitter<TestEvents>(vi.fn());
      const handler = vi.fn();
      const dispose = emitter.on("message", handler);

      dispose();
      emitter.emit("message", "after");

      expect(handler).not.toHaveBeenCalled();
    });

    it("is idempotent", () => {
      const emitter = createEmitter<TestEvents>(vi.fn());
      const disposed = vi.fn();
      const kept = vi.fn();
      const dispose = emitter.on("message", disposed);
      emitter.on("message", kept);

      dispose();
      dispose();
      emitter.emit("message", "x");

      expect(disposed).not.toHaveBeenCalled();
      expect(kept).toHaveBeenCalledOnce();
    });

    it("does not affect an emit already in progress", () => {
      const emitter = createEmitter<TestEvents>(vi.fn());
      const second = vi.fn();
      let disposeSecond: () => void = () => {};
      emitter.on("message", () => disposeSecond());
      disposeSecond = emitter.on("message", second);

      emitter.emit("message", "snapshot");
      emitter.emit("message", "later");

      expect(second).toHaveBeenCalledOnce();
      expect(second).toHaveBeenCalledWith("snapshot");
    });
  });

  // -------------------------------------------------------------------------
  // Error isolation
  // -------------------------------------------------------------------------

  describe("error isolation", () => {
    it("reports a throwing handler and keeps calling the rest", () => {
      const onError = vi.fn();
      const emitter = createEmitter<TestEvents>(onError);
      const failure = new Error("handler broke");
      const after = vi.fn();
      emitter.on("message", () => {
        throw failure;
      });
      emitter.on("message", after);

      emitter.emit("message", "x");

      expect(onError).toHaveBeenCalledWith(failure, "message");
      expect(after).toHaveBeenCalledWith("x");
    });

    it("reports every failing handler of one emit", () => {
      const onError = vi.fn<EmitterErrorHandler>();
      const emitter = createEmitter<TestEvents>(onError);
      emitter.on("empty", () => {
        throw new Error("first");
      });
      emitter.on("empty", () => {
        throw new Error("second");
      });

      emitter.emit("empty");

      expect(onError.mock.calls.map(([error]) => (error instanceof Error ? error.message : ""))).toEqual([
        "first",
        "second",
      ]);
    });
  });

  // -------------------------------------------------------------------------
  // clear
  // -------------------------------------------------------------------------

  describe("clear", () => {
    it("removes handlers for one event", () => {
      const emitter = createEmitter<TestEvents>(vi.fn());
      const message = vi.fn();
      const empty = vi.fn();
      emitter.on("message", message);
      emitter.on("empty", empty);

      emitter.clear("message");
      emitter.emit("message", "x");
      emitter.emit("empty");

      expect(message).not.toHaveBeenCalled();
      expect(empty).toHaveBeenCalledOnce();
    });

    it("removes every handler when called without an event", () => {
      const emitter = createEmitter<TestEvents>(vi.fn());
      const message = vi.fn();
      const empty = vi.fn();
      emitter.on("message", message);
      emitter.on("empty", empty);

      emitter.clear();
      emitter.emit("message", "x");
      emitter.emit("empty");

      expect(message).not.toHaveBeenCalled();
      expect(empty).not.toHaveBeenCalled();
    });
  });
});
