import { describe, expect, it } from "vitest";

import { ProviderRateLimiter, RateLimiterRegistry } from "@/lib/parcels/resilience/rate-limiter";

function fakeClock() {
  const clock = {
    time: 0,
    sleeps: [] as number[],
    now: () => clock.time,
    sleep: async (ms: number) => {
      clock.sleeps.push(ms);
      clock.time += ms;
    },
  };
  return clock;
}

describe("ProviderRateLimiter", () => {
  it("spends the burst before waiting one interval per call", async () => {
    const clock = fakeClock();
    const limiter = new ProviderRateLimiter("parcels", { minIntervalMs: 300, burst: 2 }, clock);

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(clock.sleeps).toEqual([300, 300]);
    expect(limiter.getStats()).toEqual({ provider: "parcels", acquired: 4, waited: 2, totalWaitMs: 600 });
  });

  it("only waits for the part of the interval that has not elapsed", async () => {
    const clock = fakeClock();
    const limiter = new ProviderRateLimiter("geocode", { minIntervalMs: 100, burst: 1 }, clock);

    await limiter.acquire();
    clock.time += 50;
    await limiter.acquire();

    expect(clock.sleeps).toEqual([50]);
  });

  it("serves callers in call order", async () => {
    const clock = fakeClock();
    const limiter = new ProviderRateLimiter("census", { minIntervalMs: 300, burst: 1 }, clock);
    const order: string[] = [];

    await Promise.all(
      ["first", "second", "third"].map((label) => limiter.schedule(async () => order.push(label)))
    );

    expect(order).toEqual(["first", "second", "third"]);
  });

  it("never waits with a zero interval", async () => {
    const clock = fakeClock();
    const limiter = new ProviderRateLimiter("geocode", { minIntervalMs: 0, burst: 1 }, clock);

    for (let i = 0; i < 5; i++) {
      await limiter.acquire();
    }

    expect(clock.sleeps).toEqual([]);
    expect(limiter.getStats().acquired).toBe(5);
  });
});

describe("RateLimiterRegistry", () => {
  it("keeps one limiter per provider", () => {
    const registry = new RateLimiterRegistry({
      geocode: { minIntervalMs: 100, burst: 1 },
      parcels: { minIntervalMs: 300, burst: 1 },
      census: { minIntervalMs: 300, burst: 1 },
    });

    expect(registry.get("geocode")).toBe(registry.get("geocode"));
    expect(registry.get("geocode")).not.toBe(registry.get("census"));
    expect(registry.getStats().map((stats) => stats.provider)).toEqual(["geocode", "census"]);
  });
});
