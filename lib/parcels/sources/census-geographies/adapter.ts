/**
 * Census Geographies Adapter
 *
 * Coordinate → state / county / county subdivision / place / tract.
 */

import { observeStep, type HierarchyAdapter, type ResolutionContext } from "../../adapters/types";
import { ExternalServiceError } from "../../errors";
import { buildUrl, fetchJson } from "../../http/fetch-json";
import type { AdministrativeHierarchy, Coordinate } from "../../types";
import {
  CENSUS_GEOGRAPHIES_URL,
  DEFAULT_CENSUS_BENCHMARK,
  DEFAULT_CENSUS_VINTAGE,
} from "./constants";
import { censusGeographiesResponseSchema, normalizeCensusGeographies } from "./normalize";

export interface CensusHierarchyOptions {
  baseUrl?: string;
  benchmark?: string;
  vintage?: string;
  timeoutMs: number;
}

export class CensusHierarchyResolver implements HierarchyAdapter {
  displayName = "Census Geocoder";

  constructor(private readonly options: CensusHierarchyOptions) {}

  async resolveHierarchy(coordinate: Coordinate, ctx: ResolutionContext): Promise<AdministrativeHierarchy> {
    return observeStep(
      ctx,
      "hierarchy",
      async () => {
        const url = buildUrl(this.options.baseUrl ?? CENSUS_GEOGRAPHIES_URL, {
          x: coordinate.lon,
          y: coordinate.lat,
          benchmark: this.options.benchmark ?? DEFAULT_CENSUS_BENCHMARK,
          vintage: this.options.vintage ?? DEFAULT_CENSUS_VINTAGE,
          format: "json",
        });

        const payload = await fetchJson(url, censusGeographiesResponseSchema, {
          provider: "census",
          stage: "hierarchy",
          timeoutMs: this.options.timeoutMs,
        });

        if (!payload.result) {
          throw new ExternalServiceError(
            `Census geocoder returned no result${payload.errors?.length ? `: ${payload.errors.join("; ")}` : ""}`,
            { provider: "census", stage: "hierarchy" }
          );
        }

        return normalizeCensusGeographies(payload.result.geographies);
      },
      (hierarchy) => ({
        countyGeoid: hierarchy.countyGeoid,
        placeClass: hierarchy.placeClass,
        tractGeoid: hierarchy.tractGeoid,
      })
    );
  }
}

export function createCensusHierarchyResolver(options: CensusHierarchyOptions): HierarchyAdapter {
  return new CensusHierarchyResolver(options);
}
