/**
 * Google Geocoding Adapter
 *
 * Address → coordinate. No caching here: repeated calls re-query the
 * provider, callers that need a memo table add it above this layer.
 */

import { observeStep, type GeocodeAdapter, type ResolutionContext } from "../../adapters/types";
import { ExternalServiceError, InvalidInputError } from "../../errors";
import { buildUrl, fetchJson } from "../../http/fetch-json";
import type { GeocodeResult } from "../../types";
import { GOOGLE_GEOCODE_URL } from "./constants";
import { googleGeocodeResponseSchema, normalizeGoogleGeocodeResponse } from "./normalize";

export interface GoogleGeocoderOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs: number;
}

export class GoogleGeocoder implements GeocodeAdapter {
  displayName = "Google Geocoding";

  private readonly baseUrl: string;

  constructor(private readonly options: GoogleGeocoderOptions) {
    this.baseUrl = options.baseUrl ?? GOOGLE_GEOCODE_URL;
  }

  async geocode(address: string, ctx: ResolutionContext): Promise<GeocodeResult> {
    const trimmed = address.trim();
    if (!trimmed) {
      throw new InvalidInputError("Cannot geocode an empty address");
    }

    const apiKey = this.options.apiKey;

    return observeStep(
      ctx,
      "geocode",
      async () => {
        if (!apiKey) {
          throw new ExternalServiceError("GOOGLE_GEOCODING_API_KEY is not set", {
            provider: "geocode",
            stage: "geocode",
            retryable: false,
          });
        }

        const url = buildUrl(this.baseUrl, { address: trimmed, key: apiKey });
        const payload = await fetchJson(url, googleGeocodeResponseSchema, {
          provider: "geocode",
          stage: "geocode",
          timeoutMs: this.options.timeoutMs,
        });
        return normalizeGoogleGeocodeResponse(payload);
      },
      (result) => ({ confidence: result.confidence })
    );
  }
}

export function createGoogleGeocoder(options: GoogleGeocoderOptions): GeocodeAdapter {
  return new GoogleGeocoder(options);
}
