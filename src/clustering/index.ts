/**
 * Clustering Module
 *
 * Public exports for T'/L'/E' relationship extraction.
 */

export {
  canonicalizeClasses,
  classKey,
  intersect,
  isSubset,
} from "./classes";
export {
  buildFileRecords,
  computeRelationshipSets,
  type EngineOptions,
  type FileRecords,
} from "./engine";
export { composeEvents } from "./events";
export {
  type ClusterExtraction,
  type ExtractOptions,
  extractClusters,
  PAIR_PROGRESS_INTERVAL,
  pairCount,
} from "./extractor";
export { activePaths, buildFileIndex, FileIndex } from "./file-index";
export {
  EARTH_RADIUS_KM,
  haversineKm,
  locationEdge,
  secondsApart,
  timeEdge,
} from "./proximity";
export { collectStatistics } from "./statistics";
export { UnionFind } from "./union-find";
