/**
 * Census Geocoder (geographies/coordinates) Constants
 */

export const CENSUS_GEOGRAPHIES_URL = "https://geocoding.geo.census.gov/geocoder/geographies/coordinates";

export const DEFAULT_CENSUS_BENCHMARK = "Public_AR_Current";
export const DEFAULT_CENSUS_VINTAGE = "Current_Current";

/** Geography group names as they appear in result.geographies */
export const CENSUS_LAYERS = {
  states: "States",
  counties: "Counties",
  countySubdivisions: "County Subdivisions",
  incorporatedPlaces: "Incorporated Places",
  censusDesignatedPlaces: "Census Designated Places",
  tracts: "Census Tracts",
} as const;
