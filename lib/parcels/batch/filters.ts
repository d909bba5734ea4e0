/**
 * Row Predicates
 *
 * `alreadyResolved` rows pass through untouched; rows failing the
 * jurisdiction filter are marked OUT_OF_SCOPE without a provider call.
 */

import type { ResolverConfig } from "../config";
import { rowZip, ZIP_COLUMNS, type BatchRow } from "./rows";

export type RowPredicate = (row: BatchRow) => boolean;

export function hasParcelId(column = "parcel_apn"): RowPredicate {
  return (row) => Boolean((row[column] ?? "").trim());
}

/**
 * In scope unless the row already names a different county. Looks at
 * `county_geoid` first, then a census GEOID from an earlier run.
 */
export function countyGeoidFilter(
  targetCountyGeoid: string,
  columns: readonly string[] = ["county_geoid", "census_county_geoid"]
): RowPredicate {
  return (row) => {
    for (const column of columns) {
      const value = (row[column] ?? "").trim();
      if (value) return value === targetCountyGeoid;
    }
    return true;
  };
}

/**
 * In scope when the ZIP (`zip`, else `zipcode`) is in the list. Rows
 * without a ZIP are kept: their county is decided after geocoding.
 */
export function zipAllowListFilter(zips: readonly string[], columns: readonly string[] = ZIP_COLUMNS): RowPredicate {
  const allowed = new Set(zips);
  return (row) => {
    const zip = rowZip(row, columns).slice(0, 5);
    return !zip || allowed.has(zip);
  };
}

export function allOf(...predicates: RowPredicate[]): RowPredicate {
  return (row) => predicates.every((predicate) => predicate(row));
}

export function jurisdictionFilterFromConfig(
  config: Pick<ResolverConfig, "targetCountyGeoid" | "allowedZips">
): RowPredicate {
  const predicates: RowPredicate[] = [];
  if (config.targetCountyGeoid) {
    predicates.push(countyGeoidFilter(config.targetCountyGeoid));
  }
  if (config.allowedZips && config.allowedZips.length > 0) {
    predicates.push(zipAllowListFilter(config.allowedZips));
  }
  return allOf(...predicates);
}
