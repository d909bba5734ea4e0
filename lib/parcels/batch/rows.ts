/**
 * Tabular Row Mapping
 *
 * Rows are flat string records (CSV or a database row rendered as
 * strings). This module maps a row to a LocationQuery and an
 * EnrichedLocation back into row columns.
 */

import type { Coordinate, EnrichedLocation, LocationQuery, ResolutionStatus } from "../types";

export type BatchRow = Record<string, string>;

// ============================================================================
// Output Columns
// ============================================================================

export const ENRICHMENT_COLUMNS = [
  "latitude",
  "longitude",
  "parcel_apn",
  "parcel_apn_8",
  "parcel_owner",
  "parcel_assessed_total",
  "parcel_assessed_land",
  "parcel_assessed_impr",
  "parcel_sqft_living",
  "parcel_sqft_lot",
  "parcel_acreage",
  "parcel_beds",
  "parcel_baths",
  "parcel_community",
  "parcel_zip",
  "census_state_fips",
  "census_state_name",
  "census_county_fips",
  "census_county_geoid",
  "census_county_name",
  "census_cousub_geoid",
  "census_cousub_name",
  "census_place_geoid",
  "census_place_name",
  "census_place_class",
  "census_tract_geoid",
  "resolution_status",
  "resolution_error",
] as const;

export type EnrichmentColumn = (typeof ENRICHMENT_COLUMNS)[number];

export type EnrichmentColumns = Record<EnrichmentColumn, string>;

/** Always overwritten on merge, even with an empty value. */
const STATUS_COLUMNS: ReadonlySet<EnrichmentColumn> = new Set(["resolution_status", "resolution_error"]);

function formatNumber(value: number | undefined): string {
  return value === undefined ? "" : String(value);
}

export function emptyEnrichment(status: ResolutionStatus, error = ""): EnrichmentColumns {
  return { ...emptyShape(), resolution_status: status, resolution_error: error };
}

function emptyShape(): EnrichmentColumns {
  return {
    latitude: "",
    longitude: "",
    parcel_apn: "",
    parcel_apn_8: "",
    parcel_owner: "",
    parcel_assessed_total: "",
    parcel_assessed_land: "",
    parcel_assessed_impr: "",
    parcel_sqft_living: "",
    parcel_sqft_lot: "",
    parcel_acreage: "",
    parcel_beds: "",
    parcel_baths: "",
    parcel_community: "",
    parcel_zip: "",
    census_state_fips: "",
    census_state_name: "",
    census_county_fips: "",
    census_county_geoid: "",
    census_county_name: "",
    census_cousub_geoid: "",
    census_cousub_name: "",
    census_place_geoid: "",
    census_place_name: "",
    census_place_class: "",
    census_tract_geoid: "",
    resolution_status: "",
    resolution_error: "",
  };
}

/**
 * EnrichedLocation → output columns. An ERROR result carries only the
 * status and message; partial values stay on the EnrichedLocation.
 */
export function flattenEnrichedLocation(location: EnrichedLocation): EnrichmentColumns {
  if (location.resolutionStatus === "ERROR") {
    return emptyEnrichment("ERROR", location.failure?.message ?? "");
  }

  const parcel = location.bestParcel;
  const hierarchy = location.hierarchy;

  return {
    latitude: formatNumber(location.coordinate?.lat),
    longitude: formatNumber(location.coordinate?.lon),
    parcel_apn: parcel?.parcelId ?? "",
    parcel_apn_8: parcel?.alternateParcelId ?? "",
    parcel_owner: parcel?.ownerName ?? "",
    parcel_assessed_total: formatNumber(parcel?.assessedTotalValue),
    parcel_assessed_land: formatNumber(parcel?.assessedLandValue),
    parcel_assessed_impr: formatNumber(parcel?.assessedImprovementValue),
    parcel_sqft_living: formatNumber(parcel?.livingAreaSqft),
    parcel_sqft_lot: formatNumber(parcel?.lotSqft),
    parcel_acreage: formatNumber(parcel?.lotAcreage),
    parcel_beds: formatNumber(parcel?.beds),
    parcel_baths: formatNumber(parcel?.baths),
    parcel_community: parcel?.situsCommunity ?? "",
    parcel_zip: parcel?.situsZip ?? "",
    census_state_fips: hierarchy.stateFips,
    census_state_name: hierarchy.stateName,
    census_county_fips: hierarchy.countyFips,
    census_county_geoid: hierarchy.countyGeoid,
    census_county_name: hierarchy.countyName,
    census_cousub_geoid: hierarchy.countySubdivisionGeoid,
    census_cousub_name: hierarchy.countySubdivisionName,
    census_place_geoid: hierarchy.placeGeoid,
    census_place_name: hierarchy.placeName,
    census_place_class: hierarchy.placeClass === "none" ? "" : hierarchy.placeClass,
    census_tract_geoid: hierarchy.tractGeoid,
    resolution_status: location.resolutionStatus,
    resolution_error: "",
  };
}

/**
 * Write enrichment columns into a copy of the row. Empty values never
 * clear a value the row already had (an input coordinate, or data from
 * an earlier run); the status columns are always replaced.
 */
export function mergeEnrichment(row: BatchRow, enrichment: EnrichmentColumns): BatchRow {
  const merged: BatchRow = { ...row };
  for (const column of ENRICHMENT_COLUMNS) {
    const value = enrichment[column];
    if (value !== "" || STATUS_COLUMNS.has(column) || !merged[column]) {
      merged[column] = value;
    }
  }
  return merged;
}

// ============================================================================
// Input Columns
// ============================================================================

function cell(row: BatchRow, column: string): string {
  return (row[column] ?? "").trim();
}

export const ZIP_COLUMNS = ["zip", "zipcode"] as const;

/** First non-empty ZIP column */
export function rowZip(row: BatchRow, columns: readonly string[] = ZIP_COLUMNS): string {
  for (const column of columns) {
    const value = cell(row, column);
    if (value) return value;
  }
  return "";
}

/**
 * `full_address`, else `address, city, state zip` joined.
 */
export function rowAddress(row: BatchRow): string | undefined {
  const full = cell(row, "full_address");
  if (full) return full;

  const stateZip = [cell(row, "state"), rowZip(row)].filter(Boolean).join(" ");
  const parts = [cell(row, "address"), cell(row, "city"), stateZip].filter(Boolean);
  if (!cell(row, "address")) return undefined;
  return parts.join(", ");
}

export function rowCoordinate(row: BatchRow): Coordinate | undefined {
  const latText = cell(row, "latitude");
  const lonText = cell(row, "longitude");
  if (!latText || !lonText) return undefined;

  const lat = Number(latText);
  const lon = Number(lonText);
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) return undefined;
  return { lat, lon };
}

export function rowToLocationQuery(row: BatchRow): LocationQuery {
  const countyGeoid = cell(row, "county_geoid");
  return {
    rawAddress: rowAddress(row),
    coordinate: rowCoordinate(row),
    jurisdictionHint: /^\d{5}$/.test(countyGeoid) ? countyGeoid : undefined,
  };
}

/**
 * `id` column when present, else the row's position.
 */
export function defaultRowKey(row: BatchRow, index: number): string {
  const id = cell(row, "id");
  return id ? `id:${id}` : `row:${index}`;
}
