/**
 * Resumable Batch Driver
 *
 * input iterator → skip predicates → per-item processor → single writer.
 *
 * Items are processed by a bounded pool of workers but written in input
 * order: finished results wait in a reorder buffer until every earlier
 * item has been written. A worker pulls nothing new while `maxAhead`
 * items are pulled but unwritten, so one slow item holds back at most
 * that many finished results. Items whose key the sink already holds (from a
 * previous, interrupted run) are neither processed nor written again.
 */

export interface BatchSink<T> {
  /** Keys already durable in the destination. */
  completedKeys(): Promise<ReadonlySet<string>>;
  write(key: string, item: T): Promise<void>;
  close(): Promise<void>;
}

export interface ResumableBatchOptions<T> {
  items: Iterable<T> | AsyncIterable<T>;
  keyOf: (item: T, index: number) => string;
  /** Written through unchanged without calling `process`. */
  isComplete?: (item: T) => boolean;
  process: (item: T, index: number, key: string) => Promise<T>;
  sink: BatchSink<T>;
  concurrency?: number;
  /** Pulled but unwritten items allowed at once; defaults to concurrency × AHEAD_PER_WORKER */
  maxAhead?: number;
}

export const AHEAD_PER_WORKER = 4;

export interface BatchDriverStats {
  total: number;
  /** Already in the sink before this run */
  resumed: number;
  /** Passed through by `isComplete` */
  skipped: number;
  processed: number;
}

type Slot<T> = { key: string; item: T } | null;

function isAsyncIterable<T>(items: Iterable<T> | AsyncIterable<T>): items is AsyncIterable<T> {
  return Symbol.asyncIterator in items;
}

function toAsyncIterator<T>(items: Iterable<T> | AsyncIterable<T>): AsyncIterator<T> {
  if (isAsyncIterable(items)) {
    return items[Symbol.asyncIterator]();
  }
  const iterator = items[Symbol.iterator]();
  return {
    next: async () => iterator.next(),
  };
}

export async function runResumableBatch<T>(options: ResumableBatchOptions<T>): Promise<BatchDriverStats> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  const maxAhead = Math.max(concurrency, Math.floor(options.maxAhead ?? concurrency * AHEAD_PER_WORKER));
  const completed = await options.sink.completedKeys();
  const iterator = toAsyncIterator(options.items);

  const stats: BatchDriverStats = { total: 0, resumed: 0, skipped: 0, processed: 0 };
  const ready = new Map<number, Slot<T>>();
  let nextIndex = 0;
  let nextToWrite = 0;
  let stopped = false;
  let waiting: Array<() => void> = [];

  // Pulls and writes are each serialized through a promise chain
  let pulling: Promise<unknown> = Promise.resolve();
  let writing: Promise<void> = Promise.resolve();

  const wake = (): void => {
    const waiters = waiting;
    waiting = [];
    for (const resolve of waiters) resolve();
  };

  const pull = (): Promise<{ index: number; item: T } | undefined> => {
    const next = pulling.then(async () => {
      while (!stopped && nextIndex - nextToWrite >= maxAhead) {
        await new Promise<void>((resolve) => waiting.push(resolve));
      }
      if (stopped) return undefined;

      const result = await iterator.next();
      if (result.done) return undefined;
      return { index: nextIndex++, item: result.value };
    });
    pulling = next;
    return next;
  };

  const drain = async (): Promise<void> => {
    for (let slot = ready.get(nextToWrite); slot !== undefined; slot = ready.get(nextToWrite)) {
      ready.delete(nextToWrite);
      if (slot) {
        await options.sink.write(slot.key, slot.item);
      }
      nextToWrite++;
      wake();
    }
  };

  const worker = async (): Promise<void> => {
    while (!stopped) {
      const next = await pull();
      if (!next) return;

      stats.total++;
      const key = options.keyOf(next.item, next.index);
      let slot: Slot<T>;

      if (completed.has(key)) {
        stats.resumed++;
        slot = null;
      } else if (options.isComplete?.(next.item)) {
        stats.skipped++;
        slot = { key, item: next.item };
      } else {
        slot = { key, item: await options.process(next.item, next.index, key) };
        stats.processed++;
      }

      ready.set(next.index, slot);
      writing = writing.then(drain);
      await writing;
    }
  };

  const results = await Promise.allSettled(
    Array.from({ length: concurrency }, async () => {
      try {
        await worker();
      } catch (error) {
        stopped = true;
        wake();
        throw error;
      }
    })
  );

  const failure = results.find((result): result is PromiseRejectedResult => result.status === "rejected");
  if (failure) {
    throw failure.reason;
  }

  await writing;
  return stats;
}
