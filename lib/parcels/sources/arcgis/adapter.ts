/**
 * ArcGIS Parcel Layer Adapter
 *
 * Envelope-intersects query against a FeatureServer parcel layer.
 * The buffer is a deliberate approximation: one flat attribute query
 * instead of downloading polygons for a point-in-polygon test.
 */

import {
  observeStep,
  type ParcelCandidateSource,
  type ResolutionContext,
} from "../../adapters/types";
import { ExternalServiceError, InvalidInputError } from "../../errors";
import { buildUrl, fetchJson } from "../../http/fetch-json";
import type { Coordinate, ParcelCandidate, ParcelSourceKey, SourceConfig } from "../../types";
import {
  arcgisQueryResponseSchema,
  normalizeArcgisParcelFeatures,
  outFieldsFor,
  type ParcelFieldMap,
} from "./normalize";

export interface Envelope {
  xmin: number;
  ymin: number;
  xmax: number;
  ymax: number;
}

export function buildEnvelope(coordinate: Coordinate, bufferDegrees: number): Envelope {
  if (!Number.isFinite(bufferDegrees) || bufferDegrees <= 0) {
    throw new InvalidInputError(`Buffer must be a positive number of degrees, got ${bufferDegrees}`);
  }
  return {
    xmin: coordinate.lon - bufferDegrees,
    ymin: coordinate.lat - bufferDegrees,
    xmax: coordinate.lon + bufferDegrees,
    ymax: coordinate.lat + bufferDegrees,
  };
}

export interface ArcgisParcelSourceOptions {
  key: ParcelSourceKey;
  displayName: string;
  config: SourceConfig;
  /** FeatureServer layer URL, without the trailing /query */
  layerUrl: string;
  fieldMap: ParcelFieldMap;
  timeoutMs: number;
}

export class ArcgisParcelSource implements ParcelCandidateSource {
  readonly key: ParcelSourceKey;
  readonly displayName: string;
  readonly config: SourceConfig;

  constructor(private readonly options: ArcgisParcelSourceOptions) {
    this.key = options.key;
    this.displayName = options.displayName;
    this.config = options.config;
  }

  async findCandidates(
    coordinate: Coordinate,
    bufferDegrees: number,
    ctx: ResolutionContext
  ): Promise<ParcelCandidate[]> {
    const envelope = buildEnvelope(coordinate, bufferDegrees);

    return observeStep(
      ctx,
      "parcels",
      async () => {
        const url = buildUrl(`${this.options.layerUrl}/query`, {
          geometry: `${envelope.xmin},${envelope.ymin},${envelope.xmax},${envelope.ymax}`,
          geometryType: "esriGeometryEnvelope",
          inSR: "4326",
          spatialRel: "esriSpatialRelIntersects",
          outFields: outFieldsFor(this.options.fieldMap).join(","),
          returnGeometry: "false",
          f: "json",
        });

        const payload = await fetchJson(url, arcgisQueryResponseSchema, {
          provider: "parcels",
          stage: "parcels",
          timeoutMs: this.options.timeoutMs,
        });

        // ArcGIS reports query errors with HTTP 200 and an error body
        if (payload.error) {
          const code = payload.error.code;
          throw new ExternalServiceError(
            `${this.displayName} query failed${code ? ` (${code})` : ""}: ${payload.error.message ?? "unknown ArcGIS error"}`,
            {
              provider: "parcels",
              stage: "parcels",
              status: code,
              retryable: code !== 498 && code !== 499,
            }
          );
        }

        return normalizeArcgisParcelFeatures(payload, this.options.fieldMap);
      },
      (candidates) => ({ candidateCount: candidates.length })
    );
  }
}
