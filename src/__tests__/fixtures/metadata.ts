/**
 * Test fixtures for consolidated metadata snapshots
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type {
  FileMetadata,
  FileRecord,
  Geotag,
  MetadataDocument,
  SourceEntry,
} from "@/types";

// Paris, Place de la Concorde
export const BASE_LATITUDE = 48.8656;
export const BASE_LONGITUDE = 2.3212;

// Degrees of latitude per meter on a 6371 km sphere
export const DEGREES_PER_METER = 180 / (Math.PI * 6371 * 1000);

export function entry(
  timestamp: string | null = null,
  geotag: Geotag | null = null,
): SourceEntry {
  return { timestamp, geotag };
}

/** Geotag `meters` north of the base point. */
export function northOfBase(meters: number): Geotag {
  return {
    latitude: BASE_LATITUDE + meters * DEGREES_PER_METER,
    longitude: BASE_LONGITUDE,
  };
}

/** Single-source file metadata the way the EXIF extractor writes it. */
export function exifFile(
  timestamp: string | null,
  geotag: Geotag | null = null,
): FileMetadata {
  return { exif: [entry(timestamp, geotag)] };
}

export function record(
  key: number,
  timestamp: Date | null,
  geotag: Geotag | null = null,
): FileRecord {
  return { key, path: `/photos/IMG_${key}.jpg`, timestamp, geotag };
}

/** Build a snapshot whose paths are /photos/IMG_<n>.jpg in order. */
export function snapshot(files: FileMetadata[]): MetadataDocument {
  const document: MetadataDocument = {};
  files.forEach((file, i) => {
    document[`/photos/IMG_${i}.jpg`] = file;
  });
  return document;
}

const tempDirs: string[] = [];

export function createTempDir(prefix = "media-relate-test-"): string {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export function removeTempDirs(): void {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
}

/** Run `fn` and return what it threw, failing when it returns normally. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}
