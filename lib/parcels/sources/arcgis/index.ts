export * from "./normalize";
export { ArcgisParcelSource, buildEnvelope, type ArcgisParcelSourceOptions, type Envelope } from "./adapter";
