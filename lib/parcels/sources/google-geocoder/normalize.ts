/**
 * Google Geocoding Response Normalization
 */

import { z } from "zod";
import { ExternalServiceError } from "../../errors";
import type { GeocodeResult } from "../../types";
import { GOOGLE_NON_RETRYABLE_STATUSES } from "./constants";

export const googleGeocodeResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z
    .array(
      z.object({
        formatted_address: z.string().optional(),
        partial_match: z.boolean().optional(),
        geometry: z.object({
          location: z.object({
            lat: z.number(),
            lng: z.number(),
          }),
        }),
      })
    )
    .default([]),
});

export type GoogleGeocodeResponse = z.infer<typeof googleGeocodeResponseSchema>;

/**
 * Map a Google Geocoding payload to a GeocodeResult.
 *
 * OK → first result, EXACT unless Google flags it as a partial match.
 * ZERO_RESULTS (or OK with no results) → NONE.
 * Any other status is a provider fault.
 */
export function normalizeGoogleGeocodeResponse(payload: GoogleGeocodeResponse): GeocodeResult {
  if (payload.status === "ZERO_RESULTS") {
    return { confidence: "NONE" };
  }

  if (payload.status !== "OK") {
    const detail = payload.error_message ? `: ${payload.error_message}` : "";
    throw new ExternalServiceError(`Google geocoding returned ${payload.status}${detail}`, {
      provider: "geocode",
      stage: "geocode",
      retryable: !GOOGLE_NON_RETRYABLE_STATUSES.has(payload.status),
    });
  }

  const [first] = payload.results;
  if (!first) {
    return { confidence: "NONE" };
  }

  return {
    coordinate: {
      lat: first.geometry.location.lat,
      lon: first.geometry.location.lng,
    },
    confidence: first.partial_match ? "APPROXIMATE" : "EXACT",
    formattedAddress: first.formatted_address,
  };
}
