import { describe, expect, it, vi } from "vitest";

import { AHEAD_PER_WORKER, runResumableBatch } from "@/lib/parcels/batch/driver";
import { MemoryRowSink } from "@/lib/parcels/storage/memory-sink";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("runResumableBatch", () => {
  it("writes results in input order when later items finish first", async () => {
    const sink = new MemoryRowSink<number>();

    const stats = await runResumableBatch({
      items: [0, 1, 2, 3, 4, 5],
      keyOf: (item) => `k${item}`,
      process: async (item) => {
        await delay((5 - item) * 5);
        return item * 10;
      },
      sink,
      concurrency: 3,
    });

    expect(sink.keys).toEqual(["k0", "k1", "k2", "k3", "k4", "k5"]);
    expect(sink.rows).toEqual([0, 10, 20, 30, 40, 50]);
    expect(stats).toEqual({ total: 6, resumed: 0, skipped: 0, processed: 6 });
  });

  it("stops pulling while a slow first item holds back the writer", async () => {
    const sink = new MemoryRowSink<number>();
    const items = Array.from({ length: 1000 }, (_, index) => index);
    const started: number[] = [];
    let releaseFirst = () => {};
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const run = runResumableBatch({
      items,
      keyOf: (item) => `k${item}`,
      process: async (item) => {
        started.push(item);
        if (item === 0) await firstGate;
        return item;
      },
      sink,
      concurrency: 2,
    });

    await delay(20);
    expect(started).toHaveLength(2 * AHEAD_PER_WORKER);
    expect(sink.rows).toEqual([]);

    releaseFirst();
    const stats = await run;

    expect(stats.processed).toBe(1000);
    expect(sink.rows).toEqual(items);
  });

  it("honors an explicit write-ahead bound", async () => {
    const sink = new MemoryRowSink<number>();
    const started: number[] = [];
    let releaseFirst = () => {};
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const run = runResumableBatch({
      items: [0, 1, 2, 3, 4, 5],
      keyOf: (item) => `k${item}`,
      process: async (item) => {
        started.push(item);
        if (item === 0) await firstGate;
        return item;
      },
      sink,
      concurrency: 2,
      maxAhead: 3,
    });

    await delay(20);
    expect(started).toEqual([0, 1, 2]);

    releaseFirst();
    await run;
    expect(sink.keys).toEqual(["k0", "k1", "k2", "k3", "k4", "k5"]);
  });

  it("skips keys the sink already holds", async () => {
    const sink = new MemoryRowSink<number>(["k1", "k3"]);
    const process = vi.fn(async (item: number) => item);

    const stats = await runResumableBatch({
      items: [0, 1, 2, 3],
      keyOf: (item) => `k${item}`,
      process,
      sink,
    });

    expect(process.mock.calls.map(([item]) => item)).toEqual([0, 2]);
    expect(sink.keys).toEqual(["k0", "k2"]);
    expect(stats).toEqual({ total: 4, resumed: 2, skipped: 0, processed: 2 });
  });

  it("passes complete items through unchanged", async () => {
    const sink = new MemoryRowSink<number>();

    const stats = await runResumableBatch({
      items: [1, 2, 3, 4],
      keyOf: (_item, index) => `row:${index}`,
      isComplete: (item) => item % 2 === 0,
      process: async (item) => -item,
      sink,
    });

    expect(sink.rows).toEqual([-1, 2, -3, 4]);
    expect(sink.keys).toEqual(["row:0", "row:1", "row:2", "row:3"]);
    expect(stats.skipped).toBe(2);
    expect(stats.processed).toBe(2);
  });

  it("reads async iterables", async () => {
    async function* generate() {
      yield "a";
      yield "b";
    }
    const sink = new MemoryRowSink<string>();

    await runResumableBatch({
      items: generate(),
      keyOf: (item) => item,
      process: async (item) => item.toUpperCase(),
      sink,
      concurrency: 4,
    });

    expect(sink.rows).toEqual(["A", "B"]);
  });

  it("stops on a processor fault after writing what came before it", async () => {
    const sink = new MemoryRowSink<number>();

    await expect(
      runResumableBatch({
        items: [1, 2, 3],
        keyOf: (item) => `k${item}`,
        process: async (item) => {
          if (item === 2) throw new Error("disk full");
          return item;
        },
        sink,
      })
    ).rejects.toThrow("disk full");

    expect(sink.keys).toEqual(["k1"]);
  });
});
