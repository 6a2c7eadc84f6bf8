/**
 * Metadata Resolver
 *
 * Picks one canonical timestamp and one canonical geotag per file from the
 * per-source metadata lists. Sources are consulted in a fixed precedence
 * order and only the first entry of each source list counts.
 */

import type {
  FileMetadata,
  Geotag,
  MetadataSource,
  RawGeotag,
  SourceEntry,
} from "@/types";
import { parseTimestamp } from "./timestamp";

export const TIMESTAMP_SOURCES: readonly MetadataSource[] = [
  "exif",
  "ffprobe",
  "json",
  "filename",
  "propagated",
];

export const GEOTAG_SOURCES: readonly MetadataSource[] = [
  "json",
  "exif",
  "propagated",
];

export interface ResolvedMetadata {
  timestamp: Date | null;
  geotag: Geotag | null;
}

/**
 * Return the first non-null value `pick` yields for the leading entry of
 * each source, scanning `sources` in order.
 */
export function firstPresent<T>(
  bundle: FileMetadata,
  sources: readonly MetadataSource[],
  pick: (entry: SourceEntry) => T | null,
): T | null {
  for (const source of sources) {
    const entry = bundle[source]?.[0];
    if (!entry) continue;

    const value = pick(entry);
    if (value !== null) {
      return value;
    }
  }
  return null;
}

export function normalizeGeotag(raw: RawGeotag | null | undefined): Geotag | null {
  if (raw == null) {
    return null;
  }
  if (Array.isArray(raw)) {
    return { latitude: raw[0], longitude: raw[1] };
  }
  return { latitude: raw.latitude, longitude: raw.longitude };
}

export function resolveTimestamp(bundle: FileMetadata): Date | null {
  return firstPresent(bundle, TIMESTAMP_SOURCES, (entry) =>
    parseTimestamp(entry.timestamp),
  );
}

export function resolveGeotag(bundle: FileMetadata): Geotag | null {
  return firstPresent(bundle, GEOTAG_SOURCES, (entry) =>
    normalizeGeotag(entry.geotag),
  );
}

export function resolveMetadata(bundle: FileMetadata): ResolvedMetadata {
  return {
    timestamp: resolveTimestamp(bundle),
    geotag: resolveGeotag(bundle),
  };
}
