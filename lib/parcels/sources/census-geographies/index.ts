/**
 * Census Geographies Source
 */

export * from "./constants";
export * from "./normalize";
export {
  CensusHierarchyResolver,
  createCensusHierarchyResolver,
  type CensusHierarchyOptions,
} from "./adapter";
