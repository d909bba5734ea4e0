/**
 * Location Resolution
 *
 * Composes the three providers into one resolve(query) call:
 *
 *   START ─┬─ coordinate ──────────────────────────┐
 *          └─ address → geocode ─ NONE → NO_GEOCODE│
 *                               └─ coordinate ─────┤
 *   parcels(envelope) → disambiguate → hierarchy → RESOLVED | NO_PARCEL
 *
 * A jurisdiction hint outside the target county short-circuits to
 * OUT_OF_SCOPE before any provider call. A provider fault ends the run
 * as ERROR with whatever was resolved so far. Hierarchy faults are not
 * provider faults here: they degrade to an empty hierarchy.
 *
 * No retries happen at this layer.
 */

import { randomUUID } from "crypto";
import {
  observeStep,
  type GeocodeAdapter,
  type HierarchyAdapter,
  type ParcelCandidateSource,
  type ResolutionContext,
} from "../adapters/types";
import { describeSchemaError, locationQuerySchema, type ValidLocationQuery } from "../api/schemas";
import type { ResolverConfig } from "../config";
import { ExternalServiceError, InvalidInputError, toErrorMessage } from "../errors";
import { selectBest } from "../matching/disambiguate";
import { createConsoleObserver, type ResolutionObserver } from "../observability";
import { createParcelSource } from "../registry";
import { RateLimiterRegistry } from "../resilience/rate-limiter";
import { createCensusHierarchyResolver } from "../sources/census-geographies";
import { createGoogleGeocoder } from "../sources/google-geocoder";
import {
  emptyHierarchy,
  type AdministrativeHierarchy,
  type Coordinate,
  type EnrichedLocation,
  type LocationQuery,
  type ProviderKey,
  type ResolutionFailure,
  type ResolutionStage,
  type ResolutionStatus,
} from "../types";

// Import the San Diego parcel source to auto-register it
import "../sources/san-diego-parcels";

// ============================================================================
// Configuration
// ============================================================================

export interface LocationResolverOptions {
  config: ResolverConfig;
  geocoder: GeocodeAdapter;
  parcelSource: ParcelCandidateSource;
  hierarchy: HierarchyAdapter;
  observer?: ResolutionObserver;
  rateLimiters?: RateLimiterRegistry;
  /** Defaults to comparing jurisdictionHint with config.targetCountyGeoid */
  isOutOfScope?: (query: ValidLocationQuery) => boolean;
  newRunId?: () => string;
  now?: () => number;
}

export function isHintOutOfScope(query: ValidLocationQuery, targetCountyGeoid: string | undefined): boolean {
  return (
    targetCountyGeoid !== undefined &&
    query.jurisdictionHint !== undefined &&
    query.jurisdictionHint !== targetCountyGeoid
  );
}

// ============================================================================
// Resolver
// ============================================================================

interface ResolutionProgress {
  coordinate?: Coordinate;
  geocodeConfidence?: EnrichedLocation["geocodeConfidence"];
  bestParcel?: EnrichedLocation["bestParcel"];
  score?: number;
  candidateCount: number;
  hierarchy: AdministrativeHierarchy;
}

export class LocationResolver {
  private readonly config: ResolverConfig;
  private readonly geocoder: GeocodeAdapter;
  private readonly parcelSource: ParcelCandidateSource;
  private readonly hierarchy: HierarchyAdapter;
  private readonly observer?: ResolutionObserver;
  private readonly rateLimiters?: RateLimiterRegistry;
  private readonly isOutOfScope: (query: ValidLocationQuery) => boolean;
  private readonly newRunId: () => string;
  private readonly now: () => number;

  constructor(options: LocationResolverOptions) {
    this.config = options.config;
    this.geocoder = options.geocoder;
    this.parcelSource = options.parcelSource;
    this.hierarchy = options.hierarchy;
    this.observer = options.observer;
    this.rateLimiters = options.rateLimiters;
    this.isOutOfScope =
      options.isOutOfScope ?? ((query) => isHintOutOfScope(query, options.config.targetCountyGeoid));
    this.newRunId = options.newRunId ?? randomUUID;
    this.now = options.now ?? Date.now;
  }

  /**
   * @throws InvalidInputError when the query has neither an address nor
   *   a valid coordinate. Every other failure is reported in the result.
   */
  async resolve(query: LocationQuery): Promise<EnrichedLocation> {
    const parsed = locationQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new InvalidInputError(describeSchemaError(parsed.error));
    }
    const valid = parsed.data;

    const runId = this.newRunId();
    const runStart = this.now();
    const ctx: ResolutionContext = {
      runId,
      now: this.now,
      timestamp: () => new Date(this.now()).toISOString(),
      observer: this.observer,
    };

    this.observer?.onRunStart({ runId, sourceKey: this.parcelSource.key, input: valid });

    const state: ResolutionProgress = { candidateCount: 0, hierarchy: emptyHierarchy() };
    let stage: ResolutionStage = "validate";

    const finish = (status: ResolutionStatus, failure?: ResolutionFailure): EnrichedLocation => {
      this.observer?.onRunEnd({
        runId,
        ok: status !== "ERROR",
        durationMs: this.now() - runStart,
        status,
        error: failure && `${failure.stage}: ${failure.message}`,
      });
      return { ...state, resolutionStatus: status, ...(failure && { failure }) };
    };

    if (valid.coordinate) {
      state.coordinate = valid.coordinate;
    }

    try {
      if (this.isOutOfScope(valid)) {
        return finish("OUT_OF_SCOPE");
      }

      // ======================================================================
      // GEOCODE (address-first only)
      // ======================================================================
      let coordinate = valid.coordinate;
      if (!coordinate) {
        stage = "geocode";
        const address = valid.rawAddress ?? "";
        const geocoded = await this.limited("geocode", () => this.geocoder.geocode(address, ctx));
        state.geocodeConfidence = geocoded.confidence;

        if (geocoded.confidence === "NONE" || !geocoded.coordinate) {
          return finish("NO_GEOCODE");
        }
        coordinate = geocoded.coordinate;
      }
      state.coordinate = coordinate;

      // ======================================================================
      // PARCELS
      // ======================================================================
      stage = "parcels";
      const point = coordinate;
      const candidates = await this.limited("parcels", () =>
        this.parcelSource.findCandidates(point, this.config.bufferDegrees, ctx)
      );
      state.candidateCount = candidates.length;

      stage = "disambiguate";
      const best = await observeStep(
        ctx,
        "disambiguate",
        async () => selectBest(candidates, valid.rawAddress, this.config.scoring),
        (scored) => ({ parcelId: scored?.candidate.parcelId ?? null, score: scored?.score ?? null })
      );
      if (best) {
        state.bestParcel = best.candidate;
        state.score = best.score;
      }

      // ======================================================================
      // HIERARCHY (never fails the run)
      // ======================================================================
      stage = "hierarchy";
      state.hierarchy = await this.resolveHierarchy(point, ctx);

      return finish(best ? "RESOLVED" : "NO_PARCEL");
    } catch (error) {
      const failure: ResolutionFailure =
        error instanceof ExternalServiceError
          ? { stage: error.stage, message: error.message, retryable: error.retryable }
          : { stage, message: toErrorMessage(error), retryable: false };

      return finish("ERROR", failure);
    }
  }

  private async resolveHierarchy(coordinate: Coordinate, ctx: ResolutionContext): Promise<AdministrativeHierarchy> {
    try {
      return await this.limited("census", () => this.hierarchy.resolveHierarchy(coordinate, ctx));
    } catch (error) {
      console.warn(
        `[Location Resolver] Hierarchy lookup failed for ${coordinate.lat},${coordinate.lon}: ${toErrorMessage(error)}`
      );
      this.observer?.increment("hierarchy.failed");
      return emptyHierarchy();
    }
  }

  private limited<T>(provider: ProviderKey, fn: () => Promise<T>): Promise<T> {
    return this.rateLimiters ? this.rateLimiters.get(provider).schedule(fn) : fn();
  }
}

// ============================================================================
// Factory
// ============================================================================

export interface CreateLocationResolverOptions {
  observer?: ResolutionObserver;
  rateLimiters?: RateLimiterRegistry;
}

/**
 * Wire the production providers from config.
 */
export function createLocationResolver(
  config: ResolverConfig,
  options: CreateLocationResolverOptions = {}
): LocationResolver {
  return new LocationResolver({
    config,
    geocoder: createGoogleGeocoder({
      apiKey: config.geocoder.apiKey,
      baseUrl: config.geocoder.baseUrl,
      timeoutMs: config.requestTimeoutMs,
    }),
    parcelSource: createParcelSource(config.parcelSourceKey, { timeoutMs: config.requestTimeoutMs }),
    hierarchy: createCensusHierarchyResolver({
      baseUrl: config.census.baseUrl,
      benchmark: config.census.benchmark,
      vintage: config.census.vintage,
      timeoutMs: config.requestTimeoutMs,
    }),
    observer: options.observer ?? createConsoleObserver(),
    rateLimiters: options.rateLimiters ?? new RateLimiterRegistry(config.rateLimits),
  });
}
