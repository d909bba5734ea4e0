/**
 * Batch Enrichment
 *
 * Drives the location resolver over a sequence of rows:
 *
 * 1. rows that already carry a parcel id pass through unchanged
 * 2. rows failing the jurisdiction filter become OUT_OF_SCOPE, no calls
 * 3. everything else is resolved, retrying retryable ERROR results with
 *    capped exponential backoff, and merged back into the row
 *
 * Every input row produces exactly one output row. A row's failure is
 * recorded on that row and never stops the run.
 */

import { InvalidInputError, toErrorMessage } from "../errors";
import { RetryExecutor, RetryExhaustedError } from "../resilience/retry";
import type { Sleep } from "../resilience/rate-limiter";
import type {
  EnrichedLocation,
  LocationQuery,
  ResolutionStatus,
  RetryConfig,
} from "../types";
import { runResumableBatch, type BatchSink } from "./driver";
import { hasParcelId, type RowPredicate } from "./filters";
import {
  defaultRowKey,
  emptyEnrichment,
  flattenEnrichedLocation,
  mergeEnrichment,
  rowToLocationQuery,
  type BatchRow,
  type EnrichmentColumns,
} from "./rows";

export interface LocationResolving {
  resolve(query: LocationQuery): Promise<EnrichedLocation>;
}

export interface EnrichRowsOptions {
  resolver: LocationResolving;
  sink: BatchSink<BatchRow>;
  retry: RetryConfig;
  concurrency?: number;
  /** Default: non-empty `parcel_apn` */
  alreadyResolved?: RowPredicate;
  /** Default: every row is in scope */
  jurisdictionFilter?: RowPredicate;
  keyOf?: (row: BatchRow, index: number) => string;
  sleep?: Sleep;
}

export interface BatchSummary {
  total: number;
  /** Passed through because they already had a parcel */
  skipped: number;
  /** Already written by an earlier run of the same output */
  resumed: number;
  processed: number;
  /** Extra resolver attempts spent on retryable errors */
  retries: number;
  byStatus: Record<ResolutionStatus, number>;
  durationMs: number;
}

function isRetryableResult(location: EnrichedLocation): boolean {
  return location.resolutionStatus === "ERROR" && location.failure?.retryable === true;
}

export async function enrichRows(
  rows: Iterable<BatchRow> | AsyncIterable<BatchRow>,
  options: EnrichRowsOptions
): Promise<BatchSummary> {
  const startedAt = Date.now();
  const alreadyResolved = options.alreadyResolved ?? hasParcelId();
  const inScope = options.jurisdictionFilter ?? (() => true);
  const retry = new RetryExecutor(options.retry, { sleep: options.sleep });

  const counts: Record<ResolutionStatus, number> = {
    RESOLVED: 0,
    NO_PARCEL: 0,
    NO_GEOCODE: 0,
    OUT_OF_SCOPE: 0,
    ERROR: 0,
  };
  let retries = 0;

  const resolveRow = async (
    row: BatchRow,
    key: string
  ): Promise<{ status: ResolutionStatus; columns: EnrichmentColumns }> => {
    if (!inScope(row)) {
      return { status: "OUT_OF_SCOPE", columns: emptyEnrichment("OUT_OF_SCOPE") };
    }

    const query = rowToLocationQuery(row);
    try {
      const { value, attempts } = await retry.execute(() => options.resolver.resolve(query), {
        shouldRetry: (outcome) => outcome.ok && isRetryableResult(outcome.value),
        onRetry: (attempt) => {
          console.warn(
            `[Batch Enrichment] Row ${key} attempt ${attempt.attemptNumber} failed, retrying in ${attempt.delayMs}ms`
          );
        },
      });
      retries += attempts - 1;

      if (value.failure) {
        console.warn(`[Batch Enrichment] Row ${key} ERROR at ${value.failure.stage}: ${value.failure.message}`);
      }
      return { status: value.resolutionStatus, columns: flattenEnrichedLocation(value) };
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      const stage = cause instanceof InvalidInputError ? "validate" : "unknown";
      console.warn(`[Batch Enrichment] Row ${key} ERROR at ${stage}: ${toErrorMessage(cause)}`);
      return { status: "ERROR", columns: emptyEnrichment("ERROR", toErrorMessage(cause)) };
    }
  };

  const stats = await runResumableBatch<BatchRow>({
    items: rows,
    keyOf: options.keyOf ?? defaultRowKey,
    isComplete: alreadyResolved,
    sink: options.sink,
    concurrency: options.concurrency,
    process: async (row, _index, key) => {
      const { status, columns } = await resolveRow(row, key);
      counts[status]++;
      return mergeEnrichment(row, columns);
    },
  });

  const summary: BatchSummary = {
    total: stats.total,
    skipped: stats.skipped,
    resumed: stats.resumed,
    processed: stats.processed,
    retries,
    byStatus: counts,
    durationMs: Date.now() - startedAt,
  };

  console.log(
    `[Batch Enrichment] ${summary.total} rows: ${summary.processed} processed, ${summary.skipped} skipped, ${summary.resumed} resumed`
  );
  return summary;
}
