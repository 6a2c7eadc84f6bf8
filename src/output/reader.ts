import { existsSync, readFileSync } from "node:fs";
import { ClusteringError, errorMessage } from "@/errors";
import {
  type RelationshipSets,
  type RelationshipSetsWire,
  RelationshipSetsWireSchema,
} from "@/types";

export function fromWireFormat(wire: RelationshipSetsWire): RelationshipSets {
  const fileIndex = new Map<number, string>();
  for (const [key, path] of Object.entries(wire.file_index)) {
    fileIndex.set(Number.parseInt(key, 10), path);
  }

  const { statistics } = wire;
  return {
    fileIndex,
    tPrime: wire.T_prime,
    lPrime: wire.L_prime,
    ePrime: wire.E_prime,
    thresholds: {
      timeThresholdSeconds: wire.thresholds.time_seconds,
      locationThresholdKm: wire.thresholds.location_km,
    },
    statistics: {
      total_files: statistics.total_files,
      files_with_timestamp: statistics.files_with_timestamp,
      files_with_geotag: statistics.files_with_geotag,
      T_prime_pairs_detected: statistics.T_prime_pairs_detected,
      L_prime_pairs_detected: statistics.L_prime_pairs_detected,
      T_prime_sets: statistics.T_prime_sets,
      L_prime_sets: statistics.L_prime_sets,
      E_prime_sets: statistics.E_prime_sets,
    },
  };
}

/**
 * Load relationship_sets.json for a downstream stage. The file is treated as
 * read-only; `file_index` keys come back as integers.
 */
export function readRelationshipSets(path: string): RelationshipSets {
  if (!existsSync(path)) {
    throw new ClusteringError(
      `Relationship sets not found: ${path}`,
      "INPUT_NOT_FOUND",
      path,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ClusteringError(
      `Relationship sets are not valid JSON: ${errorMessage(error)}`,
      "INPUT_PARSE_ERROR",
      path,
      { cause: error },
    );
  }

  const parsed = RelationshipSetsWireSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ClusteringError(
      `Relationship sets have unexpected structure: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      "INPUT_PARSE_ERROR",
      path,
      { cause: parsed.error },
    );
  }

  return fromWireFormat(parsed.data);
}
