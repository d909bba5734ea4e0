import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ExternalServiceError, InvalidInputError } from "@/lib/parcels/errors";
import { createGoogleGeocoder } from "@/lib/parcels/sources/google-geocoder";
import { jsonResponse, requestedUrl, stubFetch, testContext } from "@/lib/parcels/__tests__/fixtures";

describe("GoogleGeocoder", () => {
  let fetchMock: ReturnType<typeof stubFetch>;
  const geocoder = createGoogleGeocoder({
    apiKey: "test-key",
    baseUrl: "https://geocode.test/json",
    timeoutMs: 1000,
  });

  beforeEach(() => {
    fetchMock = stubFetch();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the first result as an EXACT coordinate", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        status: "OK",
        results: [
          {
            formatted_address: "2260 Calle Frescota, La Jolla, CA 92037, USA",
            geometry: { location: { lat: 32.8453, lng: -117.2653 } },
          },
          { geometry: { location: { lat: 1, lng: 1 } } },
        ],
      })
    );

    const result = await geocoder.geocode(" 2260 Calle Frescota, La Jolla ", testContext());

    expect(result).toEqual({
      coordinate: { lat: 32.8453, lon: -117.2653 },
      confidence: "EXACT",
      formattedAddress: "2260 Calle Frescota, La Jolla, CA 92037, USA",
    });

    const url = requestedUrl(fetchMock);
    expect(url.origin + url.pathname).toBe("https://geocode.test/json");
    expect(url.searchParams.get("address")).toBe("2260 Calle Frescota, La Jolla");
    expect(url.searchParams.get("key")).toBe("test-key");
  });

  it("marks a partial match as APPROXIMATE", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        status: "OK",
        results: [{ partial_match: true, geometry: { location: { lat: 32.8453, lng: -117.2653 } } }],
      })
    );

    const result = await geocoder.geocode("Calle Frescota, La Jolla", testContext());

    expect(result.confidence).toBe("APPROXIMATE");
    expect(result.coordinate).toEqual({ lat: 32.8453, lon: -117.2653 });
  });

  it("treats ZERO_RESULTS as a normal NONE outcome", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: "ZERO_RESULTS", results: [] }));

    await expect(geocoder.geocode("1 Nowhere Rd", testContext())).resolves.toEqual({ confidence: "NONE" });
  });

  it("rejects a denied key as a non-retryable provider error", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ status: "REQUEST_DENIED", error_message: "The provided API key is invalid." })
    );

    const error = await geocoder.geocode("2260 Calle Frescota", testContext()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalServiceError);
    expect(error).toMatchObject({
      message: "Google geocoding returned REQUEST_DENIED: The provided API key is invalid.",
      provider: "geocode",
      stage: "geocode",
      retryable: false,
    });
  });

  it("keeps quota errors retryable", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ status: "OVER_QUERY_LIMIT" }));

    await expect(geocoder.geocode("2260 Calle Frescota", testContext())).rejects.toMatchObject({
      retryable: true,
    });
  });

  it("maps HTTP failures to retryable errors carrying the status", async () => {
    fetchMock.mockResolvedValueOnce(new Response("upstream down", { status: 503 }));

    await expect(geocoder.geocode("2260 Calle Frescota", testContext())).rejects.toMatchObject({
      name: "ExternalServiceError",
      status: 503,
      retryable: true,
      message: "geocode responded with status 503: upstream down",
    });
  });

  it("reports malformed JSON", async () => {
    fetchMock.mockResolvedValueOnce(new Response("<html>", { status: 200 }));

    await expect(geocoder.geocode("2260 Calle Frescota", testContext())).rejects.toThrow(
      "geocode returned malformed JSON"
    );
  });

  it("reports transport failures as retryable", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(geocoder.geocode("2260 Calle Frescota", testContext())).rejects.toMatchObject({
      message: "geocode request failed: fetch failed",
      retryable: true,
    });
  });

  it("rejects an empty address before any request", async () => {
    await expect(geocoder.geocode("   ", testContext())).rejects.toBeInstanceOf(InvalidInputError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("fails without a request when no API key is configured", async () => {
    const keyless = createGoogleGeocoder({ timeoutMs: 1000 });

    await expect(keyless.geocode("2260 Calle Frescota", testContext())).rejects.toMatchObject({
      message: "GOOGLE_GEOCODING_API_KEY is not set",
      retryable: false,
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
