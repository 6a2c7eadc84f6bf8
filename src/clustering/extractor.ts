/**
 * Cluster Extractor
 *
 * Scans every distinct pair of files once, unions time-adjacent pairs in one
 * disjoint-set forest and location-adjacent pairs in another, then reads the
 * T' and L' equivalence classes off the two forests. Classes are transitive
 * closures: A~B and B~C put A, B and C together even when A and C are not
 * adjacent themselves.
 *
 * The scan is quadratic in the number of files.
 */

import type {
  EquivalenceClass,
  FileRecord,
  ProgressReporter,
  ProximityThresholds,
} from "@/types";
import { locationEdge, timeEdge } from "./proximity";
import { UnionFind } from "./union-find";

export const PAIR_PROGRESS_INTERVAL = 100_000;

export interface ExtractOptions {
  onProgress?: ProgressReporter;
  /** Pairs between progress reports (default: 100 000) */
  progressInterval?: number;
}

export interface ClusterExtraction {
  tPrime: EquivalenceClass[];
  lPrime: EquivalenceClass[];
  /** Pairs that satisfied the time predicate */
  timePairs: number;
  /** Pairs that satisfied the location predicate */
  locationPairs: number;
}

export function pairCount(n: number): number {
  return (n * (n - 1)) / 2;
}

/**
 * @param records - resolved files; `records[i].key` must equal `i`
 */
export function extractClusters(
  records: readonly FileRecord[],
  thresholds: ProximityThresholds,
  options: ExtractOptions = {},
): ClusterExtraction {
  records.forEach((record, position) => {
    if (record.key !== position) {
      throw new RangeError(
        `Record at position ${position} has key ${record.key}; keys must be dense and ordered`,
      );
    }
  });

  const n = records.length;
  const timeUf = new UnionFind(n);
  const locUf = new UnionFind(n);
  const total = pairCount(n);
  const interval = Math.max(1, options.progressInterval ?? PAIR_PROGRESS_INTERVAL);

  let timePairs = 0;
  let locationPairs = 0;
  let processed = 0;

  for (let i = 0; i < n; i++) {
    const a = records[i];
    for (let j = i + 1; j < n; j++) {
      const b = records[j];

      if (timeEdge(a, b, thresholds)) {
        timeUf.union(a.key, b.key);
        timePairs++;
      }
      if (locationEdge(a, b, thresholds)) {
        locUf.union(a.key, b.key);
        locationPairs++;
      }

      processed++;
      if (options.onProgress && processed % interval === 0) {
        options.onProgress({ stage: "pairs", completed: processed, total });
      }
    }
  }

  options.onProgress?.({ stage: "pairs", completed: processed, total });

  return {
    tPrime: timeUf.classes(),
    lPrime: locUf.classes(),
    timePairs,
    locationPairs,
  };
}
