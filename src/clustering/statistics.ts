import type { ClusteringStatistics, FileRecord } from "@/types";
import type { ClusterExtraction } from "./extractor";

/** Diagnostic counts for a run; nothing downstream depends on them. */
export function collectStatistics(
  records: readonly FileRecord[],
  extraction: ClusterExtraction,
  ePrimeSets: number,
): ClusteringStatistics {
  let withTimestamp = 0;
  let withGeotag = 0;
  for (const record of records) {
    if (record.timestamp !== null) withTimestamp++;
    if (record.geotag !== null) withGeotag++;
  }

  return {
    total_files: records.length,
    files_with_timestamp: withTimestamp,
    files_with_geotag: withGeotag,
    T_prime_pairs_detected: extraction.timePairs,
    L_prime_pairs_detected: extraction.locationPairs,
    T_prime_sets: extraction.tPrime.length,
    L_prime_sets: extraction.lPrime.length,
    E_prime_sets: ePrimeSets,
  };
}
