/**
 * Metadata Module
 *
 * Snapshot loading and canonical timestamp/geotag resolution.
 */

export { loadMetadataDocument } from "./loader";
export {
  firstPresent,
  GEOTAG_SOURCES,
  normalizeGeotag,
  type ResolvedMetadata,
  resolveGeotag,
  resolveMetadata,
  resolveTimestamp,
  TIMESTAMP_SOURCES,
} from "./resolver";
export { parseTimestamp } from "./timestamp";
