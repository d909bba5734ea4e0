#!/usr/bin/env tsx
/**
 * Single Location Lookup
 *
 * Resolves one address or coordinate to its parcel and census hierarchy.
 *
 * Usage:
 *   npm run resolve -- --address="2260 Calle Frescota, La Jolla, CA"
 *   npm run resolve -- --lat=32.8453 --lon=-117.2653
 *   npm run resolve -- --lat=32.8453 --lon=-117.2653 --address="2260 CALLE FRESCOTA" --json
 *   npm run resolve -- ... --source=ca-san-diego-parcels
 *   npm run resolve -- --sources
 */

import { config } from "dotenv";
// Load .env.local first, then .env as fallback
config({ path: ".env.local" });
config();

import { defineResolverConfig, loadResolverConfig } from "../lib/parcels/config";
import { ConfigError, InvalidInputError, toErrorMessage } from "../lib/parcels/errors";
import { createConsoleObserver } from "../lib/parcels/observability";
import { listParcelSources, resolveParcelSourceKey } from "../lib/parcels/registry";
import { createLocationResolver } from "../lib/parcels/resolution/resolver";
import type { EnrichedLocation, LocationQuery } from "../lib/parcels/types";
import { formatSanDiegoApn } from "../lib/parcels/utils/parcel-id";

const args = process.argv.slice(2);
const argValue = (name: string): string | undefined => {
  const prefix = `--${name}=`;
  return args.find((a) => a.startsWith(prefix))?.slice(prefix.length);
};
const printJson = args.includes("--json");

function parseQuery(): LocationQuery {
  const latText = argValue("lat");
  const lonText = argValue("lon");
  const address = argValue("address");

  const coordinate =
    latText !== undefined && lonText !== undefined ? { lat: Number(latText), lon: Number(lonText) } : undefined;

  return {
    rawAddress: address,
    coordinate,
    jurisdictionHint: argValue("county"),
  };
}

function printLocation(location: EnrichedLocation): void {
  const parcel = location.bestParcel;
  const h = location.hierarchy;

  console.log(`\nStatus:      ${location.resolutionStatus}`);
  if (location.failure) {
    console.log(`Failure:     ${location.failure.stage}: ${location.failure.message}`);
  }
  if (location.coordinate) {
    console.log(`Coordinate:  ${location.coordinate.lat}, ${location.coordinate.lon}`);
  }
  console.log(`Candidates:  ${location.candidateCount}${location.score !== undefined ? ` (best score ${location.score})` : ""}`);

  if (parcel) {
    const situs = [parcel.situsHouseNumber, parcel.situsPreDirection, parcel.situsStreetName, parcel.situsStreetSuffix]
      .filter(Boolean)
      .join(" ");
    console.log(`\nParcel:      ${formatSanDiegoApn(parcel.parcelId)}`);
    console.log(`Owner:       ${parcel.ownerName ?? "-"}`);
    console.log(`Situs:       ${situs || "-"}, ${parcel.situsCommunity ?? "-"} ${parcel.situsZip ?? ""}`);
    console.log(`Assessed:    ${parcel.assessedTotalValue !== undefined ? `$${parcel.assessedTotalValue.toLocaleString("en-US")}` : "-"}`);
    console.log(`Living area: ${parcel.livingAreaSqft ?? "-"} sqft, ${parcel.beds ?? "-"} bd / ${parcel.baths ?? "-"} ba`);
  }

  console.log(`\nState:       ${h.stateName || "-"} (${h.stateFips || "-"})`);
  console.log(`County:      ${h.countyName || "-"} (${h.countyGeoid || "-"})`);
  console.log(`Subdivision: ${h.countySubdivisionName || "-"}`);
  console.log(`Place:       ${h.placeName || "-"}${h.placeClass !== "none" ? ` [${h.placeClass}]` : ""}`);
  console.log(`Tract:       ${h.tractGeoid || "-"}\n`);
}

function printSources(): void {
  console.log("\nRegistered parcel sources:\n");
  for (const source of listParcelSources()) {
    const { stateFips, countyFips, sourceType, baseUrl } = source.config;
    console.log(`  ${source.key.padEnd(24)} ${source.displayName} (${stateFips}${countyFips}, ${sourceType})`);
    console.log(`  ${"".padEnd(24)} ${baseUrl}`);
  }
  console.log("");
}

async function main(): Promise<void> {
  if (args.includes("--sources")) {
    printSources();
    return;
  }

  const base = loadResolverConfig();
  const resolverConfig = defineResolverConfig(
    { parcelSourceKey: resolveParcelSourceKey(argValue("source") ?? base.parcelSourceKey) },
    base
  );

  const resolver = createLocationResolver(resolverConfig, {
    observer: createConsoleObserver({ silent: printJson }),
  });

  const location = await resolver.resolve(parseQuery());

  if (printJson) {
    console.log(JSON.stringify(location, null, 2));
  } else {
    printLocation(location);
  }

  if (location.resolutionStatus === "ERROR") {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  if (error instanceof ConfigError || error instanceof InvalidInputError) {
    console.error(`[Resolve] ${error.message}`);
    console.error('Usage: npm run resolve -- --address="..." | --lat=.. --lon=.. [--json] [--source=key]');
  } else {
    console.error("[Resolve] Fatal error:", toErrorMessage(error));
  }
  process.exit(1);
});
