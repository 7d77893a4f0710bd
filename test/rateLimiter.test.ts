import { describe, expect, it } from "vitest";
import { AdaptiveRateLimiter, type TimeSource } from "../src/rag/rateLimiter.js";

class FakeTime implements TimeSource {
  now = 0;
  readonly sleeps: number[] = [];

  nowMs(): number {
    return this.now;
  }

  async sleepMs(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.now += ms;
  }
}

describe("AdaptiveRateLimiter", () => {
  it("lets the per-second budget through without waiting", async () => {
    const time = new FakeTime();
    const limiter = new AdaptiveRateLimiter(2, time);
    await limiter.consume("example.com");
    await limiter.consume("example.com");
    expect(time.sleeps).toEqual([]);
  });

  it("waits for the window to slide once the budget is spent", async () => {
    const time = new FakeTime();
    const limiter = new AdaptiveRateLimiter(2, time);
    await limiter.consume("example.com");
    await limiter.consume("example.com");
    await limiter.consume("example.com");
    expect(time.now).toBe(1000);
    expect(time.sleeps.every((ms) => ms === 50)).toBe(true);
  });

  it("spaces requests out for rates below one per second", async () => {
    const time = new FakeTime();
    const limiter = new AdaptiveRateLimiter(0.5, time);
    await limiter.consume("example.com");
    await limiter.consume("example.com");
    expect(time.now).toBe(2000);
    await limiter.consume("example.com");
    expect(time.now).toBe(4000);
  });

  it("tracks keys independently", async () => {
    const time = new FakeTime();
    const limiter = new AdaptiveRateLimiter(1, time);
    await limiter.consume("a.example");
    await limiter.consume("b.example");
    expect(time.now).toBe(0);
  });

  it("halves the rate on throttling down to the floor", () => {
    const limiter = new AdaptiveRateLimiter(4, new FakeTime());
    limiter.notifyThrottle("k");
    expect(limiter.rateFor("k")).toBe(2);
    limiter.notifyThrottle("k");
    limiter.notifyThrottle("k");
    expect(limiter.rateFor("k")).toBe(1);
  });

  it("recovers one step after the cool-down", async () => {
    const time = new FakeTime();
    const limiter = new AdaptiveRateLimiter(4, time, { recoverAfterMs: 15_000 });
    limiter.notifyThrottle("k");
    time.now = 15_000;
    await limiter.consume("k");
    expect(limiter.rateFor("k")).toBe(3);
  });

  it("rejects a non-positive default rate", () => {
    expect(() => new AdaptiveRateLimiter(0)).toThrow("defaultRps must be > 0");
  });
});
