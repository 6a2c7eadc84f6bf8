/**
 * Relationship Clustering Engine
 *
 * Runs the in-memory part of a clustering pass over a metadata snapshot:
 * index files, resolve canonical metadata, extract T'/L', compose E' and
 * count. Data only flows forward through these steps.
 */

import { type Logger, silentLogger } from "@/logging";
import { resolveMetadata } from "@/metadata";
import type {
  FileRecord,
  MetadataDocument,
  ProgressReporter,
  ProximityThresholds,
  RelationshipSets,
} from "@/types";
import { composeEvents } from "./events";
import { extractClusters } from "./extractor";
import { activePaths, buildFileIndex, type FileIndex } from "./file-index";
import { collectStatistics } from "./statistics";

export interface EngineOptions {
  logger?: Logger;
  onProgress?: ProgressReporter;
  progressInterval?: number;
}

export interface FileRecords {
  index: FileIndex;
  records: FileRecord[];
}

export function buildFileRecords(document: MetadataDocument): FileRecords {
  const index = buildFileIndex(activePaths(document));
  const records = index.entries().map(([key, path]): FileRecord => {
    const { timestamp, geotag } = resolveMetadata(document[path]);
    return { key, path, timestamp, geotag };
  });
  return { index, records };
}

export function computeRelationshipSets(
  document: MetadataDocument,
  thresholds: ProximityThresholds,
  options: EngineOptions = {},
): RelationshipSets {
  const logger = options.logger ?? silentLogger;
  const report = options.onProgress;

  logger.info("Starting relationship extraction", {
    timeThresholdSeconds: thresholds.timeThresholdSeconds,
    locationThresholdKm: thresholds.locationThresholdKm,
  });

  const { index, records } = buildFileRecords(document);
  const skipped = Object.keys(document).length - index.size;
  report?.({ stage: "index", completed: index.size, total: index.size });
  logger.info(`Processing ${index.size} active files`, {
    markedForDeletion: skipped,
  });

  report?.({ stage: "resolve", completed: records.length, total: records.length });

  const extraction = extractClusters(records, thresholds, {
    onProgress: report,
    progressInterval: options.progressInterval,
  });

  const ePrime = composeEvents(extraction.tPrime, extraction.lPrime);
  report?.({ stage: "compose", completed: ePrime.length, total: ePrime.length });

  const statistics = collectStatistics(records, extraction, ePrime.length);
  logger.debug("Relationship extraction finished", { ...statistics });

  return {
    fileIndex: index.toMap(),
    tPrime: extraction.tPrime,
    lPrime: extraction.lPrime,
    ePrime,
    thresholds: { ...thresholds },
    statistics,
  };
}
