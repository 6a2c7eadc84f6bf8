/**
 * media-relate
 *
 * Groups media files into potential same-time (T'), same-place (L') and
 * same-event (E') sets from their consolidated metadata.
 */

export * from "./clustering";
export {
  DEFAULT_THRESHOLDS,
  getMetadataPath,
  getOutputPath,
  loadConfig,
  METADATA_FILE,
  OUTPUT_FILE,
} from "./config";
export {
  ClusteringError,
  type ClusteringErrorCode,
  isClusteringError,
} from "./errors";
export * from "./logging";
export * from "./metadata";
export * from "./output";
export { type RunOptions, type RunSummary, runClustering } from "./pipeline";
export * from "./types";
