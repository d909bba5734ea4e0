import { describe, expect, it } from "vitest";

import type { Listing } from "@/lib/db/schema";
import { emptyEnrichment } from "@/lib/parcels/batch/rows";
import { listingToRow, rowToListingUpdate } from "@/lib/parcels/storage/listing-repository";

const CREATED = new Date("2026-01-01T00:00:00.000Z");

const LISTING: Listing = {
  id: "5b0c4c1e-0000-4000-8000-000000000001",
  address: "2260 Calle Frescota",
  city: "La Jolla",
  state: "CA",
  zip: "92037",
  latitude: "32.8453",
  longitude: null,
  countyGeoid: "06073",
  parcelApn: null,
  parcelApn8: null,
  parcelOwner: null,
  parcelAssessedTotal: null,
  parcelAssessedLand: null,
  parcelAssessedImpr: null,
  parcelSqftLiving: null,
  parcelSqftLot: null,
  parcelAcreage: null,
  parcelBeds: null,
  parcelBaths: null,
  parcelCommunity: null,
  parcelZip: null,
  censusStateFips: null,
  censusStateName: null,
  censusCountyFips: null,
  censusCountyGeoid: null,
  censusCountyName: null,
  censusCousubGeoid: null,
  censusCousubName: null,
  censusPlaceGeoid: null,
  censusPlaceName: null,
  censusPlaceClass: null,
  censusTractGeoid: null,
  resolutionStatus: null,
  resolutionError: null,
  resolvedAt: null,
  createdAt: CREATED,
  updatedAt: CREATED,
};

describe("listingToRow", () => {
  it("renders a listing as a batch row with empty strings for nulls", () => {
    const row = listingToRow(LISTING);

    expect(row).toMatchObject({
      id: "5b0c4c1e-0000-4000-8000-000000000001",
      address: "2260 Calle Frescota",
      zip: "92037",
      county_geoid: "06073",
      latitude: "32.8453",
      longitude: "",
      parcel_apn: "",
      resolution_status: "",
    });
  });
});

describe("rowToListingUpdate", () => {
  it("maps enrichment columns to listing fields and blanks to null", () => {
    const resolvedAt = new Date("2026-02-01T12:00:00.000Z");
    const row = {
      ...listingToRow(LISTING),
      ...emptyEnrichment("RESOLVED"),
      parcel_apn: "3461213400",
      parcel_baths: "3.5",
      census_place_class: "incorporated",
    };

    const update = rowToListingUpdate(row, resolvedAt);

    expect(update).toMatchObject({
      parcelApn: "3461213400",
      parcelBaths: "3.5",
      censusPlaceClass: "incorporated",
      resolutionStatus: "RESOLVED",
      resolutionError: null,
      latitude: null,
      resolvedAt,
      updatedAt: resolvedAt,
    });
    expect(update).not.toHaveProperty("address");
  });
});
