/**
 * Console Observer
 *
 * Default observer implementation that logs structured JSON
 * to console, one object per line, for log shippers to pick up.
 */

import type { ResolutionObserver, ObserverMetrics } from "./types";

export interface ConsoleObserverOptions {
  /** Only accumulate metrics; print nothing. Used by tests and --json output. */
  silent?: boolean;
}

export class ConsoleObserver implements ResolutionObserver {
  private metrics: ObserverMetrics = {
    counters: {},
    timings: {},
    steps: [],
  };

  constructor(private readonly options: ConsoleObserverOptions = {}) {}

  onRunStart(meta: { runId: string; sourceKey: string; input: unknown }): void {
    this.emit({
      event: "parcel_resolution_run_start",
      runId: meta.runId,
      sourceKey: meta.sourceKey,
      input: meta.input,
    });
  }

  onStepStart(meta: { runId: string; step: string }): void {
    this.emit({
      event: "parcel_resolution_step_start",
      runId: meta.runId,
      step: meta.step,
    });
  }

  onStepEnd(meta: {
    runId: string;
    step: string;
    ok: boolean;
    durationMs: number;
    data?: unknown;
  }): void {
    this.metrics.steps.push({
      runId: meta.runId,
      step: meta.step,
      ok: meta.ok,
      durationMs: meta.durationMs,
      data: meta.data,
    });
    this.timing(`step.${meta.step}`, meta.durationMs);

    this.emit({
      event: "parcel_resolution_step_end",
      runId: meta.runId,
      step: meta.step,
      ok: meta.ok,
      durationMs: meta.durationMs,
      data: meta.data,
    });
  }

  onRunEnd(meta: {
    runId: string;
    ok: boolean;
    durationMs: number;
    status?: string;
    error?: string;
  }): void {
    if (meta.status) {
      this.increment("resolution.status", 1, { status: meta.status });
    }

    this.emit({
      event: "parcel_resolution_run_end",
      runId: meta.runId,
      ok: meta.ok,
      status: meta.status,
      durationMs: meta.durationMs,
      error: meta.error,
    });
  }

  increment(name: string, by = 1, tags?: Record<string, string>): void {
    const key = tags ? `${name}:${JSON.stringify(tags)}` : name;
    this.metrics.counters[key] = (this.metrics.counters[key] || 0) + by;
  }

  timing(name: string, durationMs: number, tags?: Record<string, string>): void {
    const key = tags ? `${name}:${JSON.stringify(tags)}` : name;
    if (!this.metrics.timings[key]) {
      this.metrics.timings[key] = [];
    }
    this.metrics.timings[key].push(durationMs);
  }

  getMetrics(): ObserverMetrics {
    return {
      counters: { ...this.metrics.counters },
      timings: { ...this.metrics.timings },
      steps: [...this.metrics.steps],
    };
  }

  private emit(payload: Record<string, unknown>): void {
    if (this.options.silent) return;
    console.log(JSON.stringify({ ...payload, timestamp: new Date().toISOString() }));
  }
}

/**
 * Create a new console observer instance.
 */
export function createConsoleObserver(options?: ConsoleObserverOptions): ConsoleObserver {
  return new ConsoleObserver(options);
}
