/**
 * Parcel Source Registry
 *
 * Central registry for parcel candidate sources, keyed by source key.
 * Sources register a factory at module load; each call to
 * createParcelSource builds a fresh instance so two configurations
 * (different timeouts, different counties) never share state.
 */

import type { ParcelSourceKey, SourceConfig } from "../types";
import type {
  ParcelCandidateSource,
  ParcelSourceFactory,
  ParcelSourceFactoryOptions,
} from "../adapters/types";

// ============================================================================
// Registry State
// ============================================================================

const sourceFactories = new Map<ParcelSourceKey, ParcelSourceFactory>();

// ============================================================================
// Registration
// ============================================================================

/**
 * Register a source factory for a source key.
 * Called at module initialization time.
 */
export function registerParcelSource(key: ParcelSourceKey, factory: ParcelSourceFactory): void {
  sourceFactories.set(key, factory);
}

// ============================================================================
// Retrieval
// ============================================================================

export function createParcelSource(
  key: ParcelSourceKey,
  options?: ParcelSourceFactoryOptions
): ParcelCandidateSource {
  const factory = sourceFactories.get(key);
  if (!factory) {
    throw new Error(`No parcel source registered for source key: ${key}`);
  }
  return factory(options);
}

/**
 * Check if a source is registered for a key. Narrows arbitrary
 * strings (env vars, CLI flags) to a ParcelSourceKey.
 */
export function hasParcelSource(key: string): key is ParcelSourceKey {
  for (const registered of sourceFactories.keys()) {
    if (registered === key) return true;
  }
  return false;
}

/**
 * List all registered source keys.
 */
export function listRegisteredSources(): ParcelSourceKey[] {
  return Array.from(sourceFactories.keys());
}

/**
 * List all sources with their basic info.
 */
export function listParcelSources(): Array<{
  key: ParcelSourceKey;
  displayName: string;
  config: SourceConfig;
}> {
  return listRegisteredSources().map((key) => {
    const source = createParcelSource(key);
    return { key: source.key, displayName: source.displayName, config: source.config };
  });
}

// ============================================================================
// Default Source Resolution
// ============================================================================

export const DEFAULT_PARCEL_SOURCE_KEY: ParcelSourceKey = "ca-san-diego-parcels";

/**
 * Resolve a source key, using the default if not provided or unknown.
 */
export function resolveParcelSourceKey(key?: string): ParcelSourceKey {
  if (key && hasParcelSource(key)) {
    return key;
  }
  return DEFAULT_PARCEL_SOURCE_KEY;
}
