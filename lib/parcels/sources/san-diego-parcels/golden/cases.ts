/**
 * Golden Parcel Test Cases for the San Diego parcel layer
 *
 * Each fixture is a recorded-shape ArcGIS query response; normalization
 * must produce exactly the listed candidates, in order.
 */

import { readFileSync } from "fs";
import type { ParcelCandidate } from "../../../types";

export interface GoldenParcelCase {
  id: string;
  name: string;
  fixturePath: string;
  expect: {
    candidates: ParcelCandidate[];
  };
}

export const sanDiegoParcelGoldenCases: GoldenParcelCase[] = [
  {
    id: "sd-residential-pair",
    name: "Two neighbouring residential parcels",
    fixturePath: "./fixtures/residential-pair.json",
    expect: {
      candidates: [
        {
          parcelId: "3461213400",
          alternateParcelId: "34612134",
          ownerName: "TESTER FAMILY TRUST",
          situsHouseNumber: "2260",
          situsStreetName: "CALLE FRESCOTA",
          situsCommunity: "LA JOLLA",
          situsZip: "92037",
          assessedTotalValue: 1250000,
          assessedLandValue: 900000,
          assessedImprovementValue: 350000,
          livingAreaSqft: 2140,
          lotSqft: 7405,
          lotAcreage: 0.17,
          beds: 4,
          baths: 3.5,
        },
        {
          parcelId: "346-121-35-00",
          ownerName: "EXAMPLE HOLDINGS LLC",
          situsHouseNumber: "2270",
          situsStreetName: "CALLE FRESCOTA",
          situsCommunity: "LA JOLLA",
          situsZip: "92037",
          beds: 0,
        },
      ],
    },
  },
  {
    id: "sd-sparse-features",
    name: "Null attributes, missing APN, duplicate APN",
    fixturePath: "./fixtures/sparse-features.json",
    expect: {
      candidates: [
        {
          parcelId: "1234567800",
          situsHouseNumber: "101",
          situsStreetName: "MAIN",
          situsStreetSuffix: "ST",
          situsZip: "92101",
        },
        { parcelId: "1234567900" },
      ],
    },
  },
  {
    id: "sd-empty-envelope",
    name: "Envelope with no parcels",
    fixturePath: "./fixtures/empty-envelope.json",
    expect: { candidates: [] },
  },
];

export function loadGoldenFixture(testCase: GoldenParcelCase): unknown {
  const content = readFileSync(new URL(testCase.fixturePath, import.meta.url), "utf-8");
  return JSON.parse(content);
}

/**
 * Compare normalized candidates with the expected list, field by field.
 */
export function validateGoldenCase(
  candidates: ParcelCandidate[],
  expected: GoldenParcelCase["expect"]
): { passed: boolean; failures: string[] } {
  const failures: string[] = [];

  if (candidates.length !== expected.candidates.length) {
    failures.push(`candidate count: expected ${expected.candidates.length}, got ${candidates.length}`);
  }

  expected.candidates.forEach((want, index) => {
    const got = candidates[index];
    if (!got) return;

    const keys = new Set([...Object.keys(want), ...Object.keys(got)]);
    for (const key of keys) {
      const wantValue: unknown = Reflect.get(want, key);
      const gotValue: unknown = Reflect.get(got, key);
      if (wantValue !== gotValue) {
        failures.push(`[${index}] ${key}: expected ${JSON.stringify(wantValue)}, got ${JSON.stringify(gotValue)}`);
      }
    }
  });

  return { passed: failures.length === 0, failures };
}
