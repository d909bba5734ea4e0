/**
 * San Diego County Parcel Source
 *
 * Re-exports and auto-registration.
 */

export * from "./constants";
export { createSanDiegoParcelSource } from "./adapter";

// Auto-register the source
import { registerParcelSource } from "../../registry";
import { createSanDiegoParcelSource } from "./adapter";
import { SAN_DIEGO_PARCELS_SOURCE_KEY } from "./constants";

registerParcelSource(SAN_DIEGO_PARCELS_SOURCE_KEY, createSanDiegoParcelSource);
