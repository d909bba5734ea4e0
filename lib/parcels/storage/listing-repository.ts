/**
 * Listing Repository
 *
 * Reads listings as batch rows and writes enrichment results back,
 * one UPDATE per flushed row.
 */

import { asc, eq, isNull, or } from "drizzle-orm";
import { getDb, type Database } from "@/lib/db";
import { listings, type Listing, type NewListing } from "@/lib/db/schema";
import type { BatchSink } from "../batch/driver";
import { ENRICHMENT_COLUMNS, type BatchRow, type EnrichmentColumn } from "../batch/rows";

// ============================================================================
// Column Mapping
// ============================================================================

const INPUT_FIELDS = {
  address: "address",
  city: "city",
  state: "state",
  zip: "zip",
  county_geoid: "countyGeoid",
} as const satisfies Record<string, keyof Listing>;

const ENRICHMENT_FIELDS = {
  latitude: "latitude",
  longitude: "longitude",
  parcel_apn: "parcelApn",
  parcel_apn_8: "parcelApn8",
  parcel_owner: "parcelOwner",
  parcel_assessed_total: "parcelAssessedTotal",
  parcel_assessed_land: "parcelAssessedLand",
  parcel_assessed_impr: "parcelAssessedImpr",
  parcel_sqft_living: "parcelSqftLiving",
  parcel_sqft_lot: "parcelSqftLot",
  parcel_acreage: "parcelAcreage",
  parcel_beds: "parcelBeds",
  parcel_baths: "parcelBaths",
  parcel_community: "parcelCommunity",
  parcel_zip: "parcelZip",
  census_state_fips: "censusStateFips",
  census_state_name: "censusStateName",
  census_county_fips: "censusCountyFips",
  census_county_geoid: "censusCountyGeoid",
  census_county_name: "censusCountyName",
  census_cousub_geoid: "censusCousubGeoid",
  census_cousub_name: "censusCousubName",
  census_place_geoid: "censusPlaceGeoid",
  census_place_name: "censusPlaceName",
  census_place_class: "censusPlaceClass",
  census_tract_geoid: "censusTractGeoid",
  resolution_status: "resolutionStatus",
  resolution_error: "resolutionError",
} as const satisfies Record<EnrichmentColumn, keyof Listing>;

export function listingToRow(listing: Listing): BatchRow {
  const row: BatchRow = { id: listing.id };
  for (const [column, field] of Object.entries(INPUT_FIELDS)) {
    row[column] = listing[field] ?? "";
  }
  for (const column of ENRICHMENT_COLUMNS) {
    row[column] = listing[ENRICHMENT_FIELDS[column]] ?? "";
  }
  return row;
}

export function rowToListingUpdate(row: BatchRow, resolvedAt: Date): Partial<NewListing> {
  const update: Partial<NewListing> = { resolvedAt, updatedAt: resolvedAt };
  for (const column of ENRICHMENT_COLUMNS) {
    const value = (row[column] ?? "").trim();
    update[ENRICHMENT_FIELDS[column]] = value === "" ? null : value;
  }
  return update;
}

// ============================================================================
// Repository
// ============================================================================

export interface FindListingsOptions {
  /** Only listings without a parcel yet */
  onlyMissing?: boolean;
  limit?: number;
}

export class ListingRepository {
  constructor(private readonly db: Database = getDb()) {}

  async findListings(options: FindListingsOptions = {}): Promise<BatchRow[]> {
    const missing = or(isNull(listings.parcelApn), eq(listings.parcelApn, ""));
    const query = this.db
      .select()
      .from(listings)
      .where(options.onlyMissing ? missing : undefined)
      .orderBy(asc(listings.createdAt), asc(listings.id));

    const rows = options.limit ? await query.limit(options.limit) : await query;
    return rows.map(listingToRow);
  }

  async updateEnrichment(id: string, row: BatchRow, resolvedAt = new Date()): Promise<void> {
    await this.db.update(listings).set(rowToListingUpdate(row, resolvedAt)).where(eq(listings.id, id));
  }
}

// ============================================================================
// Sink
// ============================================================================

/**
 * Writes each flushed row back to its listing. Resume comes from the
 * `onlyMissing` query rather than from completed keys.
 */
export class ListingEnrichmentSink implements BatchSink<BatchRow> {
  private updated = 0;

  constructor(private readonly repository: ListingRepository) {}

  async completedKeys(): Promise<ReadonlySet<string>> {
    return new Set();
  }

  async write(key: string, row: BatchRow): Promise<void> {
    const id = (row.id ?? "").trim();
    if (!id) {
      console.warn(`[Listings] Row ${key} has no id; not written`);
      return;
    }
    await this.repository.updateEnrichment(id, row);
    this.updated++;
  }

  async close(): Promise<void> {
    console.log(`[Listings] Updated ${this.updated} listings`);
  }
}
