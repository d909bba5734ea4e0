/**
 * Parcel Resolution Types
 *
 * Core type definitions shared across the location → parcel → census
 * resolution pipeline.
 */

// ============================================================================
// Source Keys
// ============================================================================

export const PARCEL_SOURCE_KEYS = ["ca-san-diego-parcels"] as const;

export type ParcelSourceKey = (typeof PARCEL_SOURCE_KEYS)[number];

export type ProviderKey = "geocode" | "parcels" | "census";

// ============================================================================
// Location Query
// ============================================================================

export interface Coordinate {
  lat: number;
  lon: number;
}

export interface LocationQuery {
  rawAddress?: string;
  coordinate?: Coordinate;
  /** County GEOID known for the row before resolution, e.g. "06073" */
  jurisdictionHint?: string;
}

// ============================================================================
// Geocoding
// ============================================================================

export type GeocodeConfidence = "EXACT" | "APPROXIMATE" | "NONE";

export interface GeocodeResult {
  coordinate?: Coordinate;
  confidence: GeocodeConfidence;
  formattedAddress?: string;
}

// ============================================================================
// Parcel Candidates
// ============================================================================

export interface ParcelCandidate {
  parcelId: string;
  alternateParcelId?: string;
  ownerName?: string;
  situsHouseNumber?: string;
  situsPreDirection?: string;
  situsStreetName?: string;
  situsStreetSuffix?: string;
  situsCommunity?: string;
  situsZip?: string;
  assessedTotalValue?: number;
  assessedLandValue?: number;
  assessedImprovementValue?: number;
  livingAreaSqft?: number;
  lotSqft?: number;
  lotAcreage?: number;
  beds?: number;
  baths?: number;
}

export interface ScoredCandidate {
  candidate: ParcelCandidate;
  score: number;
}

export interface ScoringWeights {
  houseNumber: number;
  streetWord: number;
  streetSuffix: number;
}

// ============================================================================
// Administrative Hierarchy
// ============================================================================

export type PlaceClass = "incorporated" | "cdp" | "none";

export interface AdministrativeHierarchy {
  stateFips: string;
  stateName: string;
  countyFips: string;
  countyGeoid: string;
  countyName: string;
  countySubdivisionGeoid: string;
  countySubdivisionName: string;
  placeGeoid: string;
  placeName: string;
  placeClass: PlaceClass;
  placeClassFp: string;
  tractGeoid: string;
}

export function emptyHierarchy(): AdministrativeHierarchy {
  return {
    stateFips: "",
    stateName: "",
    countyFips: "",
    countyGeoid: "",
    countyName: "",
    countySubdivisionGeoid: "",
    countySubdivisionName: "",
    placeGeoid: "",
    placeName: "",
    placeClass: "none",
    placeClassFp: "",
    tractGeoid: "",
  };
}

// ============================================================================
// Enriched Location
// ============================================================================

export type ResolutionStatus = "RESOLVED" | "NO_PARCEL" | "NO_GEOCODE" | "OUT_OF_SCOPE" | "ERROR";

export const RESOLUTION_STATUSES: readonly ResolutionStatus[] = [
  "RESOLVED",
  "NO_PARCEL",
  "NO_GEOCODE",
  "OUT_OF_SCOPE",
  "ERROR",
];

export type ResolutionStage = "validate" | "geocode" | "parcels" | "disambiguate" | "hierarchy";

export interface ResolutionFailure {
  stage: ResolutionStage;
  message: string;
  retryable: boolean;
}

export interface EnrichedLocation {
  coordinate?: Coordinate;
  geocodeConfidence?: GeocodeConfidence;
  bestParcel?: ParcelCandidate;
  score?: number;
  candidateCount: number;
  hierarchy: AdministrativeHierarchy;
  resolutionStatus: ResolutionStatus;
  failure?: ResolutionFailure;
}

// ============================================================================
// Rate Limit / Retry Config
// ============================================================================

export interface RateLimitConfig {
  /** Minimum spacing between two calls to the same provider */
  minIntervalMs: number;
  burst: number;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

// ============================================================================
// Source Config
// ============================================================================

export interface SourceConfig {
  sourceKey: ParcelSourceKey;
  name: string;
  stateFips: string;
  countyFips: string;
  sourceType: "county_gis" | "statewide";
  platformFamily: "arcgis";
  baseUrl: string;
}
