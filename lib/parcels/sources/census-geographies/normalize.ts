/**
 * Census Geographies Response Normalization
 *
 * Every geography group is optional and may be an empty list; a missing
 * level leaves its hierarchy fields empty rather than failing the lookup.
 */

import { z } from "zod";
import { emptyHierarchy, type AdministrativeHierarchy, type PlaceClass } from "../../types";
import { coerceText } from "../../utils/coerce";
import { CENSUS_LAYERS } from "./constants";

const geographyFeatureSchema = z.record(z.string(), z.unknown());

export const censusGeographiesResponseSchema = z.object({
  result: z
    .object({
      geographies: z.record(z.string(), z.array(geographyFeatureSchema)).default({}),
    })
    .optional(),
  errors: z.array(z.string()).optional(),
});

export type CensusGeographiesResponse = z.infer<typeof censusGeographiesResponseSchema>;

type GeographyFeature = z.infer<typeof geographyFeatureSchema>;

function firstOf(geographies: Record<string, GeographyFeature[]>, layer: string): GeographyFeature | undefined {
  const features = geographies[layer];
  return features && features.length > 0 ? features[0] : undefined;
}

function text(feature: GeographyFeature | undefined, field: string): string {
  return feature ? coerceText(feature[field]) ?? "" : "";
}

/**
 * Incorporated places win over census designated places.
 */
function pickPlace(geographies: Record<string, GeographyFeature[]>): {
  feature?: GeographyFeature;
  placeClass: PlaceClass;
} {
  const incorporated = firstOf(geographies, CENSUS_LAYERS.incorporatedPlaces);
  if (incorporated) {
    return { feature: incorporated, placeClass: "incorporated" };
  }
  const cdp = firstOf(geographies, CENSUS_LAYERS.censusDesignatedPlaces);
  if (cdp) {
    return { feature: cdp, placeClass: "cdp" };
  }
  return { placeClass: "none" };
}

export function normalizeCensusGeographies(geographies: Record<string, GeographyFeature[]>): AdministrativeHierarchy {
  const state = firstOf(geographies, CENSUS_LAYERS.states);
  const county = firstOf(geographies, CENSUS_LAYERS.counties);
  const countySubdivision = firstOf(geographies, CENSUS_LAYERS.countySubdivisions);
  const tract = firstOf(geographies, CENSUS_LAYERS.tracts);
  const place = pickPlace(geographies);

  return {
    ...emptyHierarchy(),
    stateFips: text(state, "STATE"),
    stateName: text(state, "NAME"),
    countyFips: text(county, "COUNTY"),
    countyGeoid: text(county, "GEOID"),
    countyName: text(county, "NAME"),
    countySubdivisionGeoid: text(countySubdivision, "GEOID"),
    countySubdivisionName: text(countySubdivision, "NAME"),
    placeGeoid: text(place.feature, "GEOID"),
    placeName: text(place.feature, "NAME"),
    placeClass: place.placeClass,
    placeClassFp: text(place.feature, "CLASSFP"),
    tractGeoid: text(tract, "GEOID"),
  };
}
