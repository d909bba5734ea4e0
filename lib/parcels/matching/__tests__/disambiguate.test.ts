import { describe, expect, it } from "vitest";

import {
  DEFAULT_SCORING_WEIGHTS,
  scoreCandidate,
  selectBest,
  tokenizeAddress,
} from "@/lib/parcels/matching/disambiguate";
import type { ParcelCandidate } from "@/lib/parcels/types";

const frescota: ParcelCandidate = {
  parcelId: "3461213400",
  situsHouseNumber: "2260",
  situsStreetName: "CALLE FRESCOTA",
};

const unrelated: ParcelCandidate = {
  parcelId: "3461213500",
  situsHouseNumber: "2270",
  situsStreetName: "VIA ESTRADA",
  situsStreetSuffix: "CT",
};

describe("tokenizeAddress", () => {
  it("uppercases and splits on whitespace and commas", () => {
    expect([...tokenizeAddress("2260 Calle Frescota, La Jolla,CA  92037")]).toEqual([
      "2260",
      "CALLE",
      "FRESCOTA",
      "LA",
      "JOLLA",
      "CA",
      "92037",
    ]);
  });

  it("returns an empty set for blank input", () => {
    expect(tokenizeAddress("  , ").size).toBe(0);
  });
});

describe("scoreCandidate", () => {
  it("adds house number, each street word and the suffix", () => {
    const candidate: ParcelCandidate = {
      parcelId: "1",
      situsHouseNumber: " 101 ",
      situsStreetName: "main",
      situsStreetSuffix: "st",
    };
    expect(scoreCandidate(candidate, tokenizeAddress("101 Main St"))).toBe(17);
  });

  it("scores every matching street word", () => {
    const candidate: ParcelCandidate = { parcelId: "1", situsStreetName: "VIA DE LA VALLE" };
    expect(scoreCandidate(candidate, tokenizeAddress("Via de la Valle"))).toBe(20);
  });

  it("gives unmatched and missing fields nothing", () => {
    expect(scoreCandidate({ parcelId: "1" }, tokenizeAddress("2260 CALLE FRESCOTA"))).toBe(0);
    expect(scoreCandidate(unrelated, tokenizeAddress("2260 CALLE FRESCOTA"))).toBe(0);
  });

  it("uses the supplied weights", () => {
    const weights = { houseNumber: 1, streetWord: 1, streetSuffix: 1 };
    expect(scoreCandidate(frescota, tokenizeAddress("2260 CALLE FRESCOTA"), weights)).toBe(3);
  });
});

describe("selectBest", () => {
  it("returns undefined without candidates", () => {
    expect(selectBest([], "2260 CALLE FRESCOTA")).toBeUndefined();
  });

  it("returns a lone candidate with score 0", () => {
    expect(selectBest([frescota], "2260 CALLE FRESCOTA")).toEqual({ candidate: frescota, score: 0 });
  });

  it("returns the first candidate with score 0 when there is no address text", () => {
    expect(selectBest([unrelated, frescota], "   ")).toEqual({ candidate: unrelated, score: 0 });
    expect(selectBest([unrelated, frescota], undefined)).toEqual({ candidate: unrelated, score: 0 });
  });

  it("picks the exact situs match over an unrelated neighbour", () => {
    expect(selectBest([unrelated, frescota], "2260 CALLE FRESCOTA")).toEqual({ candidate: frescota, score: 20 });
  });

  it("breaks ties by upstream order", () => {
    const first: ParcelCandidate = { parcelId: "A", situsStreetName: "MAIN" };
    const second: ParcelCandidate = { parcelId: "B", situsStreetName: "MAIN" };

    expect(selectBest([first, second], "500 MAIN")?.candidate.parcelId).toBe("A");
    expect(selectBest([second, first], "500 MAIN")?.candidate.parcelId).toBe("B");
  });

  it("is deterministic across repeated calls", () => {
    const candidates = [unrelated, frescota, { parcelId: "C", situsStreetName: "CALLE" }];
    const results = Array.from({ length: 5 }, () => selectBest(candidates, "2260 CALLE FRESCOTA, LA JOLLA"));

    for (const result of results) {
      expect(result).toEqual({ candidate: frescota, score: 20 });
    }
    expect(DEFAULT_SCORING_WEIGHTS).toEqual({ houseNumber: 10, streetWord: 5, streetSuffix: 2 });
  });
});
