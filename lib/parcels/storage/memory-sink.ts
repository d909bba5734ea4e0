/**
 * In-memory sink, for tests and --dry-run style previews.
 */

import type { BatchSink } from "../batch/driver";

export class MemoryRowSink<T> implements BatchSink<T> {
  readonly rows: T[] = [];
  readonly keys: string[] = [];
  closed = false;

  constructor(private readonly durableKeys: Iterable<string> = []) {}

  async completedKeys(): Promise<ReadonlySet<string>> {
    return new Set(this.durableKeys);
  }

  async write(key: string, item: T): Promise<void> {
    this.keys.push(key);
    this.rows.push(item);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
