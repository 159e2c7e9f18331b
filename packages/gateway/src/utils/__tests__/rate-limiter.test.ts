import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SlidingWindowRateLimiter } from "../rate-limiter.js";

describe("SlidingWindowRateLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("allows up to the limit inside the window", () => {
    const limiter = new SlidingWindowRateLimiter(3);

    expect([1, 2, 3, 4].map(() => limiter.allow("10.0.0.1"))).toEqual([true, true, true, false]);
  });

  it("tracks keys independently", () => {
    const limiter = new SlidingWindowRateLimiter(1);

    expect(limiter.allow("10.0.0.1")).toBe(true);
    expect(limiter.allow("10.0.0.2")).toBe(true);
    expect(limiter.allow("10.0.0.1")).toBe(false);
  });

  it("defaults to a 60 second window", () => {
    const limiter = new SlidingWindowRateLimiter(1);
    limiter.allow("a");

    vi.advanceTimersByTime(59_999);
    expect(limiter.allow("a")).toBe(false);

    vi.advanceTimersByTime(1);
    expect(limiter.allow("a")).toBe(true);
  });

  it("slides rather than resetting in fixed buckets", () => {
    const limiter = new SlidingWindowRateLimiter(2, 1_000);
    limiter.allow("a");
    vi.advanceTimersByTime(600);
    limiter.allow("a");
    vi.advanceTimersByTime(500);

    // the first attempt has aged out, the second is still inside
    expect(limiter.allow("a")).toBe(true);
    expect(limiter.allow("a")).toBe(false);
  });

  it("does not record rejected attempts", () => {
    const limiter = new SlidingWindowRateLimiter(1, 1_000);
    limiter.allow("a");
    vi.advanceTimersByTime(500);
    expect(limiter.allow("a")).toBe(false);

    vi.advanceTimersByTime(500);

    expect(limiter.allow("a")).toBe(true);
  });

  it("sweep drops keys with no recent attempts", () => {
    const limiter = new SlidingWindowRateLimiter(5, 1_000);
    limiter.allow("old");
    vi.advanceTimersByTime(800);
    limiter.allow("fresh");
    vi.advanceTimersByTime(300);

    limiter.sweep();

    expect(limiter.size).toBe(1);
  });

  it("clear forgets state", () => {
    const limiter = new SlidingWindowRateLimiter(1);
    limiter.allow("a");
    limiter.allow("b");
    expect(limiter.allow("a")).toBe(false);

    limiter.clear();
    expect(limiter.size).toBe(0);
    expect(limiter.allow("b")).toBe(true);
  });
});
