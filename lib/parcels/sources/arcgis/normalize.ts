/**
 * ArcGIS Feature → ParcelCandidate mapping
 *
 * Parcel layers name their attributes differently per county. A
 * ParcelFieldMap pins provider field names to canonical candidate
 * fields so the rest of the pipeline never sees provider names.
 */

import { z } from "zod";
import type { ParcelCandidate } from "../../types";
import { coerceNumber, coerceText } from "../../utils/coerce";
import { normalizeParcelId } from "../../utils/parcel-id";

// ============================================================================
// Payload Schema
// ============================================================================

export const arcgisQueryResponseSchema = z.object({
  features: z
    .array(
      z.object({
        attributes: z.record(z.string(), z.unknown()).nullable().default({}),
      })
    )
    .optional(),
  exceededTransferLimit: z.boolean().optional(),
  error: z
    .object({
      code: z.number().optional(),
      message: z.string().optional(),
      details: z.array(z.string()).optional(),
    })
    .optional(),
});

export type ArcgisQueryResponse = z.infer<typeof arcgisQueryResponseSchema>;

// ============================================================================
// Field Map
// ============================================================================

type TextField =
  | "alternateParcelId"
  | "ownerName"
  | "situsHouseNumber"
  | "situsPreDirection"
  | "situsStreetName"
  | "situsStreetSuffix"
  | "situsCommunity"
  | "situsZip";

type NumericField =
  | "assessedTotalValue"
  | "assessedLandValue"
  | "assessedImprovementValue"
  | "livingAreaSqft"
  | "lotSqft"
  | "lotAcreage"
  | "beds"
  | "baths";

export type ParcelFieldMap = { parcelId: string } & Partial<Record<TextField | NumericField, string>>;

const TEXT_FIELDS: readonly TextField[] = [
  "alternateParcelId",
  "ownerName",
  "situsHouseNumber",
  "situsPreDirection",
  "situsStreetName",
  "situsStreetSuffix",
  "situsCommunity",
  "situsZip",
];

const NUMERIC_FIELDS: readonly NumericField[] = [
  "assessedTotalValue",
  "assessedLandValue",
  "assessedImprovementValue",
  "livingAreaSqft",
  "lotSqft",
  "lotAcreage",
  "beds",
  "baths",
];

/**
 * Provider field names to request as outFields, in a stable order.
 */
export function outFieldsFor(fieldMap: ParcelFieldMap): string[] {
  const names = [fieldMap.parcelId];
  for (const field of [...TEXT_FIELDS, ...NUMERIC_FIELDS]) {
    const name = fieldMap[field];
    if (name && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

// ============================================================================
// Normalization
// ============================================================================

export function normalizeArcgisParcelAttributes(
  attributes: Record<string, unknown>,
  fieldMap: ParcelFieldMap
): ParcelCandidate | null {
  const rawId = coerceText(attributes[fieldMap.parcelId]);
  const parcelId = rawId ? normalizeParcelId(rawId) : "";
  if (!parcelId) {
    return null;
  }

  const candidate: ParcelCandidate = { parcelId };

  for (const field of TEXT_FIELDS) {
    const name = fieldMap[field];
    if (!name) continue;
    const value = coerceText(attributes[name]);
    if (value !== undefined) {
      candidate[field] = field === "situsZip" ? value.slice(0, 5) : value;
    }
  }

  for (const field of NUMERIC_FIELDS) {
    const name = fieldMap[field];
    if (!name) continue;
    const value = coerceNumber(attributes[name]);
    if (value !== undefined) {
      candidate[field] = value;
    }
  }

  return candidate;
}

/**
 * Map every feature to a candidate, keeping provider order.
 * Features with no parcel id are dropped; a repeated parcel id keeps
 * its first occurrence so ids stay unique within one candidate set.
 */
export function normalizeArcgisParcelFeatures(
  payload: ArcgisQueryResponse,
  fieldMap: ParcelFieldMap
): ParcelCandidate[] {
  const seen = new Set<string>();
  const candidates: ParcelCandidate[] = [];

  for (const feature of payload.features ?? []) {
    const candidate = normalizeArcgisParcelAttributes(feature.attributes ?? {}, fieldMap);
    if (!candidate || seen.has(candidate.parcelId)) continue;
    seen.add(candidate.parcelId);
    candidates.push(candidate);
  }

  return candidates;
}
