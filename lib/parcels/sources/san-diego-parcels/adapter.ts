/**
 * San Diego County Parcel Source
 */

import type { ParcelCandidateSource, ParcelSourceFactoryOptions } from "../../adapters/types";
import { ArcgisParcelSource } from "../arcgis/adapter";
import {
  DEFAULT_PARCELS_TIMEOUT_MS,
  SAN_DIEGO_PARCELS_CONFIG,
  SAN_DIEGO_PARCELS_LAYER_URL,
  SAN_DIEGO_PARCELS_SOURCE_KEY,
  SAN_DIEGO_PARCEL_FIELDS,
} from "./constants";

export function createSanDiegoParcelSource(
  options: ParcelSourceFactoryOptions & { layerUrl?: string } = {}
): ParcelCandidateSource {
  return new ArcgisParcelSource({
    key: SAN_DIEGO_PARCELS_SOURCE_KEY,
    displayName: "San Diego County Parcels",
    config: SAN_DIEGO_PARCELS_CONFIG,
    layerUrl: options.layerUrl ?? SAN_DIEGO_PARCELS_LAYER_URL,
    fieldMap: SAN_DIEGO_PARCEL_FIELDS,
    timeoutMs: options.timeoutMs ?? DEFAULT_PARCELS_TIMEOUT_MS,
  });
}
