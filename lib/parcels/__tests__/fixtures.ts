/**
 * Shared test doubles: in-process providers and a stubbed fetch.
 */

import { vi, type Mock } from "vitest";

import type {
  GeocodeAdapter,
  HierarchyAdapter,
  ParcelCandidateSource,
  ResolutionContext,
} from "@/lib/parcels/adapters/types";
import { SAN_DIEGO_PARCELS_CONFIG } from "@/lib/parcels/sources/san-diego-parcels/constants";
import type {
  AdministrativeHierarchy,
  Coordinate,
  GeocodeResult,
  ParcelCandidate,
} from "@/lib/parcels/types";

export const FRESCOTA_COORDINATE: Coordinate = { lat: 32.8453, lon: -117.2653 };

export const FRESCOTA_PARCEL: ParcelCandidate = {
  parcelId: "3461213400",
  ownerName: "TESTER FAMILY TRUST",
  situsHouseNumber: "2260",
  situsStreetName: "CALLE FRESCOTA",
  situsCommunity: "LA JOLLA",
  situsZip: "92037",
  assessedTotalValue: 1250000,
  livingAreaSqft: 2140,
  lotAcreage: 0.17,
  beds: 4,
  baths: 3.5,
};

export const NEIGHBOUR_PARCEL: ParcelCandidate = {
  parcelId: "3461213500",
  situsHouseNumber: "2270",
  situsStreetName: "VIA ESTRADA",
};

export const SAN_DIEGO_HIERARCHY: AdministrativeHierarchy = {
  stateFips: "06",
  stateName: "California",
  countyFips: "073",
  countyGeoid: "06073",
  countyName: "San Diego County",
  countySubdivisionGeoid: "0607391750",
  countySubdivisionName: "San Diego",
  placeGeoid: "0666000",
  placeName: "San Diego city",
  placeClass: "incorporated",
  placeClassFp: "C1",
  tractGeoid: "06073008305",
};

export function testContext(): ResolutionContext {
  return {
    runId: "test-run",
    now: () => 0,
    timestamp: () => "2026-01-01T00:00:00.000Z",
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function stubFetch() {
  const fetchMock = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

/** The URL of the nth fetch call. */
export function requestedUrl(fetchMock: ReturnType<typeof stubFetch>, call = 0): URL {
  const input = fetchMock.mock.calls[call]?.[0];
  if (input instanceof Request) return new URL(input.url);
  return new URL(String(input));
}

// ============================================================================
// Fake providers
// ============================================================================

export interface FakeProviders {
  geocoder: GeocodeAdapter & { geocode: Mock<GeocodeAdapter["geocode"]> };
  parcelSource: ParcelCandidateSource & { findCandidates: Mock<ParcelCandidateSource["findCandidates"]> };
  hierarchy: HierarchyAdapter & { resolveHierarchy: Mock<HierarchyAdapter["resolveHierarchy"]> };
}

export function fakeProviders(
  options: {
    geocode?: GeocodeResult;
    candidates?: ParcelCandidate[];
    hierarchy?: AdministrativeHierarchy;
  } = {}
): FakeProviders {
  const geocodeResult: GeocodeResult = options.geocode ?? {
    coordinate: FRESCOTA_COORDINATE,
    confidence: "EXACT",
  };
  const candidates = options.candidates ?? [NEIGHBOUR_PARCEL, FRESCOTA_PARCEL];
  const hierarchy = options.hierarchy ?? SAN_DIEGO_HIERARCHY;

  return {
    geocoder: {
      displayName: "Fake Geocoder",
      geocode: vi.fn<GeocodeAdapter["geocode"]>(async () => geocodeResult),
    },
    parcelSource: {
      key: "ca-san-diego-parcels",
      displayName: "Fake Parcels",
      config: SAN_DIEGO_PARCELS_CONFIG,
      findCandidates: vi.fn<ParcelCandidateSource["findCandidates"]>(async () => candidates),
    },
    hierarchy: {
      displayName: "Fake Census",
      resolveHierarchy: vi.fn<HierarchyAdapter["resolveHierarchy"]>(async () => hierarchy),
    },
  };
}
