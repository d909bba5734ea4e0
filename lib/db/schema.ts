/**
 * Listings Database Schema
 *
 * One row per listing address. The enrichment columns mirror the batch
 * row columns (lib/parcels/batch/rows.ts) one to one.
 */

import { pgTable, text, timestamp, numeric, uuid, index } from "drizzle-orm/pg-core";

export const listings = pgTable("listings", {
  id: uuid("id").primaryKey().defaultRandom(),
  address: text("address"),
  city: text("city"),
  state: text("state"),
  zip: text("zip"),
  latitude: numeric("latitude"),
  longitude: numeric("longitude"),
  countyGeoid: text("county_geoid"), // 5-digit, known before resolution

  // Parcel (assessor registry)
  parcelApn: text("parcel_apn"),
  parcelApn8: text("parcel_apn_8"),
  parcelOwner: text("parcel_owner"),
  parcelAssessedTotal: numeric("parcel_assessed_total"),
  parcelAssessedLand: numeric("parcel_assessed_land"),
  parcelAssessedImpr: numeric("parcel_assessed_impr"),
  parcelSqftLiving: numeric("parcel_sqft_living"),
  parcelSqftLot: numeric("parcel_sqft_lot"),
  parcelAcreage: numeric("parcel_acreage"),
  parcelBeds: numeric("parcel_beds"),
  parcelBaths: numeric("parcel_baths"),
  parcelCommunity: text("parcel_community"),
  parcelZip: text("parcel_zip"),

  // Census hierarchy
  censusStateFips: text("census_state_fips"),
  censusStateName: text("census_state_name"),
  censusCountyFips: text("census_county_fips"),
  censusCountyGeoid: text("census_county_geoid"),
  censusCountyName: text("census_county_name"),
  censusCousubGeoid: text("census_cousub_geoid"),
  censusCousubName: text("census_cousub_name"),
  censusPlaceGeoid: text("census_place_geoid"),
  censusPlaceName: text("census_place_name"),
  censusPlaceClass: text("census_place_class"), // "incorporated" | "cdp"
  censusTractGeoid: text("census_tract_geoid"),

  resolutionStatus: text("resolution_status"), // RESOLVED, NO_PARCEL, NO_GEOCODE, OUT_OF_SCOPE, ERROR
  resolutionError: text("resolution_error"),
  resolvedAt: timestamp("resolved_at"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
}, (table) => [
  index("listings_parcel_apn_idx").on(table.parcelApn),
  index("listings_county_geoid_idx").on(table.countyGeoid),
]);

export type Listing = typeof listings.$inferSelect;
export type NewListing = typeof listings.$inferInsert;
