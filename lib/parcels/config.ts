/**
 * Resolver Configuration
 *
 * One immutable ResolverConfig is built per process (from env, or
 * directly in tests) and handed to the resolver and the batch runner.
 */

import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_SCORING_WEIGHTS } from "./matching/disambiguate";
import {
  CENSUS_GEOGRAPHIES_URL,
  DEFAULT_CENSUS_BENCHMARK,
  DEFAULT_CENSUS_VINTAGE,
} from "./sources/census-geographies/constants";
import { GOOGLE_GEOCODE_URL } from "./sources/google-geocoder/constants";
import {
  PARCEL_SOURCE_KEYS,
  type ParcelSourceKey,
  type ProviderKey,
  type RateLimitConfig,
  type RetryConfig,
  type ScoringWeights,
} from "./types";

// ============================================================================
// Types
// ============================================================================

export interface ResolverConfig {
  readonly parcelSourceKey: ParcelSourceKey;
  /** Envelope half-width in degrees around the coordinate */
  readonly bufferDegrees: number;
  readonly scoring: Readonly<ScoringWeights>;
  readonly requestTimeoutMs: number;
  readonly geocoder: Readonly<{ baseUrl: string; apiKey?: string }>;
  readonly census: Readonly<{ baseUrl: string; benchmark: string; vintage: string }>;
  readonly rateLimits: Readonly<Record<ProviderKey, Readonly<RateLimitConfig>>>;
  readonly retry: Readonly<RetryConfig>;
  /** Batch worker pool size */
  readonly concurrency: number;
  /** County GEOID rows must fall in, e.g. "06073" */
  readonly targetCountyGeoid?: string;
  readonly allowedZips?: readonly string[];
}

export interface ResolverConfigOverrides {
  parcelSourceKey?: ParcelSourceKey;
  bufferDegrees?: number;
  scoring?: Partial<ScoringWeights>;
  requestTimeoutMs?: number;
  geocoder?: Partial<ResolverConfig["geocoder"]>;
  census?: Partial<ResolverConfig["census"]>;
  rateLimits?: Partial<Record<ProviderKey, Partial<RateLimitConfig>>>;
  retry?: Partial<RetryConfig>;
  concurrency?: number;
  targetCountyGeoid?: string;
  allowedZips?: readonly string[];
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_RESOLVER_CONFIG: ResolverConfig = {
  parcelSourceKey: "ca-san-diego-parcels",
  bufferDegrees: 0.0003,
  scoring: DEFAULT_SCORING_WEIGHTS,
  requestTimeoutMs: 30000,
  geocoder: { baseUrl: GOOGLE_GEOCODE_URL },
  census: {
    baseUrl: CENSUS_GEOGRAPHIES_URL,
    benchmark: DEFAULT_CENSUS_BENCHMARK,
    vintage: DEFAULT_CENSUS_VINTAGE,
  },
  rateLimits: {
    geocode: { minIntervalMs: 100, burst: 1 },
    parcels: { minIntervalMs: 300, burst: 1 },
    census: { minIntervalMs: 300, burst: 1 },
  },
  retry: {
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 15000,
    backoffMultiplier: 2,
  },
  concurrency: 1,
};

/**
 * Merge overrides onto the defaults and freeze the result.
 */
export function defineResolverConfig(
  overrides: ResolverConfigOverrides = {},
  base: ResolverConfig = DEFAULT_RESOLVER_CONFIG
): ResolverConfig {
  const rateLimits = overrides.rateLimits ?? {};

  return Object.freeze({
    parcelSourceKey: overrides.parcelSourceKey ?? base.parcelSourceKey,
    bufferDegrees: overrides.bufferDegrees ?? base.bufferDegrees,
    scoring: { ...base.scoring, ...overrides.scoring },
    requestTimeoutMs: overrides.requestTimeoutMs ?? base.requestTimeoutMs,
    geocoder: { ...base.geocoder, ...overrides.geocoder },
    census: { ...base.census, ...overrides.census },
    rateLimits: {
      geocode: { ...base.rateLimits.geocode, ...rateLimits.geocode },
      parcels: { ...base.rateLimits.parcels, ...rateLimits.parcels },
      census: { ...base.rateLimits.census, ...rateLimits.census },
    },
    retry: { ...base.retry, ...overrides.retry },
    concurrency: overrides.concurrency ?? base.concurrency,
    targetCountyGeoid: overrides.targetCountyGeoid ?? base.targetCountyGeoid,
    allowedZips: overrides.allowedZips ?? base.allowedZips,
  });
}

// ============================================================================
// Environment
// ============================================================================

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const optionalInt = (min: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).optional());

const resolverEnvSchema = z.object({
  GOOGLE_GEOCODING_API_KEY: optionalText,
  PARCEL_DEFAULT_SOURCE: z.preprocess(blankToUndefined, z.enum(PARCEL_SOURCE_KEYS).optional()),
  PARCEL_BUFFER_DEGREES: z.preprocess(
    blankToUndefined,
    z.coerce.number().positive().max(0.1).optional()
  ),
  RESOLVER_TIMEOUT_MS: optionalInt(1),
  RESOLVER_CONCURRENCY: optionalInt(1),
  RESOLVER_MAX_ATTEMPTS: optionalInt(1),
  GEOCODE_MIN_INTERVAL_MS: optionalInt(0),
  PARCELS_MIN_INTERVAL_MS: optionalInt(0),
  CENSUS_MIN_INTERVAL_MS: optionalInt(0),
  TARGET_COUNTY_GEOID: z.preprocess(
    blankToUndefined,
    z.string().regex(/^\d{5}$/, "must be a 5-digit county GEOID").optional()
  ),
  TARGET_ZIPS: z.preprocess(
    blankToUndefined,
    z
      .string()
      .transform((value) =>
        value
          .split(",")
          .map((zip) => zip.trim())
          .filter((zip) => zip.length > 0)
      )
      .pipe(z.array(z.string().regex(/^\d{5}$/, "must be a 5-digit ZIP")))
      .optional()
  ),
  CENSUS_BENCHMARK: optionalText,
  CENSUS_VINTAGE: optionalText,
});

export type ResolverEnv = z.infer<typeof resolverEnvSchema>;

/**
 * Build a ResolverConfig from environment variables.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadResolverConfig(env: NodeJS.ProcessEnv = process.env): ResolverConfig {
  const parsed = resolverEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid resolver configuration: ${issues.join("; ")}`, issues);
  }

  const vars = parsed.data;

  // Nested patches only carry keys that were actually set
  return defineResolverConfig({
    parcelSourceKey: vars.PARCEL_DEFAULT_SOURCE,
    bufferDegrees: vars.PARCEL_BUFFER_DEGREES,
    requestTimeoutMs: vars.RESOLVER_TIMEOUT_MS,
    concurrency: vars.RESOLVER_CONCURRENCY,
    geocoder: { ...(vars.GOOGLE_GEOCODING_API_KEY !== undefined && { apiKey: vars.GOOGLE_GEOCODING_API_KEY }) },
    census: {
      ...(vars.CENSUS_BENCHMARK !== undefined && { benchmark: vars.CENSUS_BENCHMARK }),
      ...(vars.CENSUS_VINTAGE !== undefined && { vintage: vars.CENSUS_VINTAGE }),
    },
    rateLimits: {
      geocode: { ...(vars.GEOCODE_MIN_INTERVAL_MS !== undefined && { minIntervalMs: vars.GEOCODE_MIN_INTERVAL_MS }) },
      parcels: { ...(vars.PARCELS_MIN_INTERVAL_MS !== undefined && { minIntervalMs: vars.PARCELS_MIN_INTERVAL_MS }) },
      census: { ...(vars.CENSUS_MIN_INTERVAL_MS !== undefined && { minIntervalMs: vars.CENSUS_MIN_INTERVAL_MS }) },
    },
    retry: { ...(vars.RESOLVER_MAX_ATTEMPTS !== undefined && { maxAttempts: vars.RESOLVER_MAX_ATTEMPTS }) },
    targetCountyGeoid: vars.TARGET_COUNTY_GEOID,
    allowedZips: vars.TARGET_ZIPS,
  });
}
