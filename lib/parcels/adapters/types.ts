/**
 * Provider Adapter Interfaces
 *
 * Defines the contracts for the three external collaborators the
 * resolver composes: geocode → parcel envelope search → census hierarchy.
 * Adapters translate provider payloads into the canonical model and
 * report their own steps to the observer on the context.
 */

import type {
  AdministrativeHierarchy,
  Coordinate,
  GeocodeResult,
  ParcelCandidate,
  ParcelSourceKey,
  SourceConfig,
} from "../types";
import type { ResolutionObserver } from "../observability/types";

// Re-export for convenience
export type { ResolutionObserver };

// ============================================================================
// Resolution Context
// ============================================================================

export interface ResolutionContext {
  runId: string;
  now(): number; // Performance timing (Date.now())
  timestamp(): string; // ISO timestamp
  observer?: ResolutionObserver;
}

// ============================================================================
// Geocode Adapter
// ============================================================================

export interface GeocodeAdapter {
  /** Provider display name, used in logs */
  displayName: string;

  /**
   * Resolve a free-text address to a coordinate.
   * Zero results is a normal outcome (confidence NONE), not an error.
   */
  geocode(address: string, ctx: ResolutionContext): Promise<GeocodeResult>;
}

// ============================================================================
// Spatial Candidate Fetcher
// ============================================================================

export interface ParcelCandidateSource {
  /** Unique source key */
  key: ParcelSourceKey;

  /** Human-readable display name */
  displayName: string;

  /** Source configuration */
  config: SourceConfig;

  /**
   * All parcels whose footprint intersects the envelope
   * [lon-buf, lat-buf, lon+buf, lat+buf], in provider order.
   */
  findCandidates(
    coordinate: Coordinate,
    bufferDegrees: number,
    ctx: ResolutionContext
  ): Promise<ParcelCandidate[]>;
}

export interface ParcelSourceFactoryOptions {
  timeoutMs?: number;
}

export type ParcelSourceFactory = (options?: ParcelSourceFactoryOptions) => ParcelCandidateSource;

// ============================================================================
// Administrative Hierarchy Resolver
// ============================================================================

export interface HierarchyAdapter {
  displayName: string;

  /**
   * Reverse-geography lookup. Throws ExternalServiceError on provider
   * failure; the resolver downgrades that to an empty hierarchy.
   */
  resolveHierarchy(coordinate: Coordinate, ctx: ResolutionContext): Promise<AdministrativeHierarchy>;
}

// ============================================================================
// Step Timing
// ============================================================================

/**
 * Wrap one provider step with observer start/end events.
 */
export async function observeStep<T>(
  ctx: ResolutionContext,
  step: string,
  run: () => Promise<T>,
  describe: (result: T) => Record<string, unknown> = () => ({})
): Promise<T> {
  const stepStart = ctx.now();
  ctx.observer?.onStepStart({ runId: ctx.runId, step });

  try {
    const result = await run();
    ctx.observer?.onStepEnd({
      runId: ctx.runId,
      step,
      ok: true,
      durationMs: ctx.now() - stepStart,
      data: describe(result),
    });
    return result;
  } catch (error) {
    ctx.observer?.onStepEnd({
      runId: ctx.runId,
      step,
      ok: false,
      durationMs: ctx.now() - stepStart,
      data: { error: error instanceof Error ? error.message : String(error) },
    });
    throw error;
  }
}
