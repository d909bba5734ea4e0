#!/usr/bin/env tsx
/**
 * Batch Enrichment
 *
 * Adds parcel and census columns to every row of a CSV file or of the
 * Postgres listings table. Output is written row by row; rerunning the
 * same command after a crash continues where it stopped.
 *
 * Usage:
 *   npm run enrich -- --input=listings.csv [--output=listings.enriched.csv]
 *   npm run enrich -- --listings [--all]
 *   options: --limit=N --dry-run --county=06073 --zips=92037,92109 --concurrency=N
 */

import { config } from "dotenv";
// Load .env.local first, then .env as fallback
config({ path: ".env.local" });
config();

import { closeDb } from "../lib/db";
import { defineResolverConfig, loadResolverConfig, type ResolverConfig } from "../lib/parcels/config";
import type { BatchSink } from "../lib/parcels/batch/driver";
import { enrichRows, type BatchSummary } from "../lib/parcels/batch/enrich";
import { hasParcelId, jurisdictionFilterFromConfig, type RowPredicate } from "../lib/parcels/batch/filters";
import { defaultRowKey, type BatchRow } from "../lib/parcels/batch/rows";
import { countyGeoidSchema } from "../lib/parcels/api/schemas";
import { ConfigError, toErrorMessage } from "../lib/parcels/errors";
import { createConsoleObserver } from "../lib/parcels/observability";
import { RateLimiterRegistry } from "../lib/parcels/resilience/rate-limiter";
import { createLocationResolver } from "../lib/parcels/resolution/resolver";
import { CsvRowSink, readCsvRows } from "../lib/parcels/storage/csv";
import { ListingEnrichmentSink, ListingRepository } from "../lib/parcels/storage/listing-repository";
import { RESOLUTION_STATUSES } from "../lib/parcels/types";

const args = process.argv.slice(2);
const argValue = (name: string): string | undefined => {
  const prefix = `--${name}=`;
  return args.find((a) => a.startsWith(prefix))?.slice(prefix.length);
};

function positiveInt(name: string): number | undefined {
  const raw = argValue(name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`--${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function defaultOutputPath(input: string): string {
  return input.toLowerCase().endsWith(".csv") ? `${input.slice(0, -4)}.enriched.csv` : `${input}.enriched.csv`;
}

function countyArg(): string | undefined {
  const raw = argValue("county");
  if (raw === undefined) return undefined;
  const parsed = countyGeoidSchema.safeParse(raw.trim());
  if (!parsed.success) {
    throw new ConfigError(`--county must be a 5-digit county GEOID, got "${raw}"`);
  }
  return parsed.data;
}

function buildConfig(): ResolverConfig {
  const base = loadResolverConfig();
  const zips = argValue("zips")
    ?.split(",")
    .map((zip) => zip.trim())
    .filter(Boolean);

  return defineResolverConfig(
    {
      targetCountyGeoid: countyArg(),
      allowedZips: zips,
      concurrency: positiveInt("concurrency"),
    },
    base
  );
}

// ============================================================================
// Dry Run
// ============================================================================

function dryRun(rows: BatchRow[], alreadyResolved: RowPredicate, inScope: RowPredicate): void {
  let skipped = 0;
  let outOfScope = 0;
  let toResolve = 0;

  rows.forEach((row, index) => {
    const key = defaultRowKey(row, index);
    if (alreadyResolved(row)) {
      skipped++;
    } else if (!inScope(row)) {
      outOfScope++;
      console.log(`  ${key}: out of scope`);
    } else {
      toResolve++;
      console.log(`  ${key}: would resolve "${row.full_address || row.address || `${row.latitude},${row.longitude}`}"`);
    }
  });

  console.log(`\n[Batch Enrichment] Dry run: ${rows.length} rows`);
  console.log(`  already resolved: ${skipped}`);
  console.log(`  out of scope:     ${outOfScope}`);
  console.log(`  would resolve:    ${toResolve}\n`);
}

function printSummary(summary: BatchSummary): void {
  console.log(`\n=== Batch Summary ===`);
  console.log(`  Total rows:       ${summary.total}`);
  console.log(`  Skipped:          ${summary.skipped}`);
  console.log(`  Resumed:          ${summary.resumed}`);
  console.log(`  Processed:        ${summary.processed}`);
  console.log(`  Retries:          ${summary.retries}`);
  for (const status of RESOLUTION_STATUSES) {
    console.log(`  ${`${status}:`.padEnd(18)}${summary.byStatus[status]}`);
  }
  console.log(`  Duration:         ${(summary.durationMs / 1000).toFixed(1)}s\n`);
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const resolverConfig = buildConfig();
  const limit = positiveInt("limit");
  const includeAll = args.includes("--all");
  const input = argValue("input");
  const useListings = args.includes("--listings");

  if (!input && !useListings) {
    throw new ConfigError("Pass --input=<csv> or --listings");
  }

  const alreadyResolved: RowPredicate = includeAll ? () => false : hasParcelId();
  const inScope = jurisdictionFilterFromConfig(resolverConfig);

  let rows: BatchRow[];
  let sink: BatchSink<BatchRow>;

  if (input) {
    const all = await readCsvRows(input);
    rows = limit ? all.slice(0, limit) : all;
    const output = argValue("output") ?? defaultOutputPath(input);
    sink = new CsvRowSink(output);
    console.log(`[Batch Enrichment] ${rows.length} rows from ${input} → ${output}`);
  } else {
    const repository = new ListingRepository();
    rows = await repository.findListings({ onlyMissing: !includeAll, limit });
    sink = new ListingEnrichmentSink(repository);
    console.log(`[Batch Enrichment] ${rows.length} listings${includeAll ? "" : " without a parcel"}`);
  }

  if (args.includes("--dry-run")) {
    dryRun(rows, alreadyResolved, inScope);
    return;
  }

  const observer = createConsoleObserver({ silent: true });
  const resolver = createLocationResolver(resolverConfig, {
    observer,
    rateLimiters: new RateLimiterRegistry(resolverConfig.rateLimits),
  });

  try {
    const summary = await enrichRows(rows, {
      resolver,
      sink,
      retry: resolverConfig.retry,
      concurrency: resolverConfig.concurrency,
      alreadyResolved,
      jurisdictionFilter: inScope,
    });
    printSummary(summary);
  } finally {
    await sink.close();
  }
}

async function run(): Promise<void> {
  try {
    await main();
  } catch (error) {
    console.error(`[Batch Enrichment] ${error instanceof ConfigError ? error.message : `Fatal error: ${toErrorMessage(error)}`}`);
    process.exitCode = 1;
  } finally {
    await closeDb();
  }
}

run().catch((error) => {
  console.error("[Batch Enrichment] Failed to close the database pool:", toErrorMessage(error));
  process.exit(1);
});
