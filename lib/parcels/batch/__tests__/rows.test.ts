import { describe, expect, it } from "vitest";

import {
  defaultRowKey,
  emptyEnrichment,
  flattenEnrichedLocation,
  mergeEnrichment,
  rowToLocationQuery,
} from "@/lib/parcels/batch/rows";
import {
  allOf,
  countyGeoidFilter,
  hasParcelId,
  jurisdictionFilterFromConfig,
  zipAllowListFilter,
} from "@/lib/parcels/batch/filters";
import { emptyHierarchy } from "@/lib/parcels/types";
import { FRESCOTA_COORDINATE, FRESCOTA_PARCEL, SAN_DIEGO_HIERARCHY } from "@/lib/parcels/__tests__/fixtures";

describe("rowToLocationQuery", () => {
  it("joins address parts and takes a 5-digit county hint", () => {
    const query = rowToLocationQuery({
      id: "1",
      address: " 2260 Calle Frescota ",
      city: "La Jolla",
      state: "CA",
      zip: "92037",
      county_geoid: "06073",
    });

    expect(query).toEqual({
      rawAddress: "2260 Calle Frescota, La Jolla, CA 92037",
      coordinate: undefined,
      jurisdictionHint: "06073",
    });
  });

  it("takes the ZIP from a zipcode column", () => {
    const query = rowToLocationQuery({
      address: "2260 Calle Frescota",
      city: "La Jolla",
      state: "CA",
      zipcode: "92037",
    });

    expect(query.rawAddress).toBe("2260 Calle Frescota, La Jolla, CA 92037");
  });

  it("prefers full_address and parses coordinates", () => {
    const query = rowToLocationQuery({
      full_address: "2260 Calle Frescota, La Jolla, CA",
      address: "ignored",
      latitude: "32.8453",
      longitude: "-117.2653",
      county_geoid: "6073",
    });

    expect(query.rawAddress).toBe("2260 Calle Frescota, La Jolla, CA");
    expect(query.coordinate).toEqual(FRESCOTA_COORDINATE);
    expect(query.jurisdictionHint).toBeUndefined();
  });

  it("has no address without a street line, and no coordinate from junk", () => {
    const query = rowToLocationQuery({ city: "La Jolla", latitude: "north", longitude: "-117.2653" });

    expect(query.rawAddress).toBeUndefined();
    expect(query.coordinate).toBeUndefined();
  });
});

describe("flattenEnrichedLocation", () => {
  it("writes parcel and census columns for a resolved location", () => {
    const columns = flattenEnrichedLocation({
      coordinate: FRESCOTA_COORDINATE,
      bestParcel: FRESCOTA_PARCEL,
      score: 20,
      candidateCount: 2,
      hierarchy: SAN_DIEGO_HIERARCHY,
      resolutionStatus: "RESOLVED",
    });

    expect(columns).toMatchObject({
      latitude: "32.8453",
      longitude: "-117.2653",
      parcel_apn: "3461213400",
      parcel_apn_8: "",
      parcel_assessed_total: "1250000",
      parcel_baths: "3.5",
      parcel_zip: "92037",
      census_county_geoid: "06073",
      census_place_class: "incorporated",
      census_tract_geoid: "06073008305",
      resolution_status: "RESOLVED",
      resolution_error: "",
    });
  });

  it("leaves the place class empty when no place matched", () => {
    const columns = flattenEnrichedLocation({
      coordinate: FRESCOTA_COORDINATE,
      candidateCount: 0,
      hierarchy: emptyHierarchy(),
      resolutionStatus: "NO_PARCEL",
    });

    expect(columns.census_place_class).toBe("");
    expect(columns.parcel_apn).toBe("");
  });

  it("keeps only status and message for an ERROR", () => {
    const columns = flattenEnrichedLocation({
      coordinate: FRESCOTA_COORDINATE,
      candidateCount: 0,
      hierarchy: emptyHierarchy(),
      resolutionStatus: "ERROR",
      failure: { stage: "parcels", message: "parcels responded with status 503", retryable: true },
    });

    expect(columns).toEqual(emptyEnrichment("ERROR", "parcels responded with status 503"));
    expect(columns.latitude).toBe("");
  });
});

describe("mergeEnrichment", () => {
  it("never clears an existing value but always replaces the status", () => {
    const merged = mergeEnrichment(
      { id: "7", latitude: "32.8", parcel_apn: "", resolution_status: "ERROR", resolution_error: "timeout" },
      emptyEnrichment("NO_GEOCODE")
    );

    expect(merged.id).toBe("7");
    expect(merged.latitude).toBe("32.8");
    expect(merged.parcel_apn).toBe("");
    expect(merged.census_tract_geoid).toBe("");
    expect(merged.resolution_status).toBe("NO_GEOCODE");
    expect(merged.resolution_error).toBe("");
  });

  it("does not mutate the input row", () => {
    const row = { id: "7" };
    mergeEnrichment(row, emptyEnrichment("OUT_OF_SCOPE"));

    expect(row).toEqual({ id: "7" });
  });
});

describe("defaultRowKey", () => {
  it("uses the id column, else the position", () => {
    expect(defaultRowKey({ id: " 42 " }, 3)).toBe("id:42");
    expect(defaultRowKey({ id: "" }, 3)).toBe("row:3");
    expect(defaultRowKey({}, 0)).toBe("row:0");
  });
});

describe("row filters", () => {
  it("hasParcelId ignores blank values", () => {
    expect(hasParcelId()({ parcel_apn: "3461213400" })).toBe(true);
    expect(hasParcelId()({ parcel_apn: "  " })).toBe(false);
  });

  it("countyGeoidFilter lets the first non-empty column decide", () => {
    const inSanDiego = countyGeoidFilter("06073");

    expect(inSanDiego({ county_geoid: "06073", census_county_geoid: "06059" })).toBe(true);
    expect(inSanDiego({ county_geoid: "", census_county_geoid: "06059" })).toBe(false);
    expect(inSanDiego({})).toBe(true);
  });

  it("zipAllowListFilter keeps rows without a ZIP", () => {
    const filter = zipAllowListFilter(["92037"]);

    expect(filter({ zip: "92037-4310" })).toBe(true);
    expect(filter({ zip: "90210" })).toBe(false);
    expect(filter({ zip: "" })).toBe(true);
  });

  it("zipAllowListFilter reads zipcode when zip is empty", () => {
    const filter = zipAllowListFilter(["92037"]);

    expect(filter({ zipcode: "92037" })).toBe(true);
    expect(filter({ zipcode: "90210" })).toBe(false);
    expect(filter({ zip: " ", zipcode: "90210" })).toBe(false);
    expect(filter({ zip: "92037", zipcode: "90210" })).toBe(true);
  });

  it("combines county and ZIP rules from config", () => {
    const filter = jurisdictionFilterFromConfig({ targetCountyGeoid: "06073", allowedZips: ["92037"] });

    expect(filter({ county_geoid: "06073", zip: "92037" })).toBe(true);
    expect(filter({ county_geoid: "06073", zip: "92101" })).toBe(false);
    expect(filter({ county_geoid: "06059", zip: "92037" })).toBe(false);
    expect(jurisdictionFilterFromConfig({})({ county_geoid: "36061" })).toBe(true);
    expect(allOf()({})).toBe(true);
  });
});
