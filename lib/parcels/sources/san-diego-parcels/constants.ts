/**
 * San Diego County Parcel Layer Constants
 */

import type { SourceConfig } from "../../types";
import type { ParcelFieldMap } from "../arcgis/normalize";

export const SAN_DIEGO_PARCELS_SOURCE_KEY = "ca-san-diego-parcels" as const;
export const SAN_DIEGO_STATE_FIPS = "06";
export const SAN_DIEGO_COUNTY_FIPS = "073";

export const SAN_DIEGO_PARCELS_LAYER_URL =
  "https://gis-public.sandiegocounty.gov/arcgis/rest/services/sdep_warehouse/PARCELS_ALL/FeatureServer/0";

export const SAN_DIEGO_PARCELS_CONFIG: SourceConfig = {
  sourceKey: SAN_DIEGO_PARCELS_SOURCE_KEY,
  name: "San Diego County Parcels (PARCELS_ALL)",
  stateFips: SAN_DIEGO_STATE_FIPS,
  countyFips: SAN_DIEGO_COUNTY_FIPS,
  sourceType: "county_gis",
  platformFamily: "arcgis",
  baseUrl: SAN_DIEGO_PARCELS_LAYER_URL,
};

export const SAN_DIEGO_PARCEL_FIELDS: ParcelFieldMap = {
  parcelId: "APN",
  alternateParcelId: "APN_8",
  ownerName: "OWN_NAME1",
  situsHouseNumber: "SITUS_ADDRESS",
  situsPreDirection: "SITUS_PRE_DIR",
  situsStreetName: "SITUS_STREET",
  situsStreetSuffix: "SITUS_SUFFIX",
  situsCommunity: "SITUS_COMMUNITY",
  situsZip: "SITUS_ZIP",
  assessedTotalValue: "ASR_TOTAL",
  assessedLandValue: "ASR_LAND",
  assessedImprovementValue: "ASR_IMPR",
  livingAreaSqft: "TOTAL_LVG_AREA",
  lotSqft: "USABLE_SQ_FEET",
  lotAcreage: "ACREAGE",
  beds: "BEDROOMS",
  baths: "BATHS",
};

export const DEFAULT_PARCELS_TIMEOUT_MS = 30000;
