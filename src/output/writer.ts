/**
 * Relationship Set Writer
 *
 * Serializes a clustering result to relationship_sets.json. The file is
 * written to a temporary sibling and renamed over the target, so readers see
 * either the previous complete file or the new complete file.
 */

import {
  existsSync,
  mkdirSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { basename, dirname, join } from "node:path";
import { nanoid } from "nanoid";
import type { RelationshipSets, RelationshipSetsWire } from "@/types";

export function toWireFormat(sets: RelationshipSets): RelationshipSetsWire {
  const fileIndex: Record<string, string> = {};
  const keys = [...sets.fileIndex.keys()].sort((a, b) => a - b);
  for (const key of keys) {
    const path = sets.fileIndex.get(key);
    if (path !== undefined) {
      fileIndex[String(key)] = path;
    }
  }

  return {
    file_index: fileIndex,
    T_prime: sets.tPrime.map((members) => [...members]),
    L_prime: sets.lPrime.map((members) => [...members]),
    E_prime: sets.ePrime.map((members) => [...members]),
    thresholds: {
      time_seconds: sets.thresholds.timeThresholdSeconds,
      location_km: sets.thresholds.locationThresholdKm,
    },
    statistics: { ...sets.statistics },
  };
}

export function serializeRelationshipSets(sets: RelationshipSets): string {
  return `${JSON.stringify(toWireFormat(sets), null, 2)}\n`;
}

export function writeFileAtomic(targetPath: string, contents: string): void {
  const directory = dirname(targetPath);
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }

  // Same directory as the target so the rename never crosses filesystems
  const tempPath = join(directory, `.${basename(targetPath)}.${nanoid(8)}.tmp`);
  try {
    writeFileSync(tempPath, contents, "utf-8");
    renameSync(tempPath, targetPath);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw error;
  }
}

export function writeRelationshipSets(
  outputPath: string,
  sets: RelationshipSets,
): void {
  writeFileAtomic(outputPath, serializeRelationshipSets(sets));
}
