/**
 * Parcel & Census Location Resolution
 *
 * Main entry point: address or coordinate → parcel → census hierarchy,
 * singly or over a batch of rows.
 */

// Core types
export * from "./types";
export * from "./errors";
export * from "./config";

// Observability
export * from "./observability";

// Adapters
export {
  observeStep,
  type ResolutionContext,
  type GeocodeAdapter,
  type ParcelCandidateSource,
  type ParcelSourceFactory,
  type ParcelSourceFactoryOptions,
  type HierarchyAdapter,
} from "./adapters/types";

// Registry
export * from "./registry";

// Matching
export * from "./matching/disambiguate";

// Resolution
export * from "./resolution/resolver";
export * from "./api/schemas";

// Resilience
export * from "./resilience/rate-limiter";
export * from "./resilience/retry";

// Batch
export * from "./batch/rows";
export * from "./batch/filters";
export * from "./batch/driver";
export * from "./batch/enrich";

// Storage
export * from "./storage/csv";
export * from "./storage/memory-sink";
export * from "./storage/listing-repository";

// Utils
export * from "./utils/parcel-id";

// Sources (importing san-diego-parcels registers it)
export * from "./sources/google-geocoder";
export * from "./sources/arcgis";
export * from "./sources/san-diego-parcels";
export * from "./sources/census-geographies";
