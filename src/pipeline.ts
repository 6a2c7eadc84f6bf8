/**
 * Clustering stage runner
 *
 * Load the metadata snapshot, compute relationship sets, write them. Any
 * failure aborts before the write, leaving an earlier relationship_sets.json
 * untouched so later stages can tell "not run yet" from "failed".
 */

import { computeRelationshipSets } from "./clustering";
import { getMetadataPath, getOutputPath } from "./config";
import { ClusteringError, errorMessage, isClusteringError } from "./errors";
import { type Logger, silentLogger } from "./logging";
import { loadMetadataDocument } from "./metadata";
import { writeRelationshipSets } from "./output";
import type {
  ClusteringConfig,
  ClusteringStatistics,
  ProgressReporter,
  RelationshipSets,
} from "./types";

export interface RunOptions {
  logger?: Logger;
  onProgress?: ProgressReporter;
}

export interface RunSummary {
  metadataPath: string;
  outputPath: string;
  statistics: ClusteringStatistics;
}

function logSummary(logger: Logger, statistics: ClusteringStatistics): void {
  logger.info("Auto clustering complete");
  logger.info(`Total files processed: ${statistics.total_files}`);
  logger.info(`Files with timestamp: ${statistics.files_with_timestamp}`);
  logger.info(`Files with geotag: ${statistics.files_with_geotag}`);
  logger.info(`T' sets (potential same-time): ${statistics.T_prime_sets}`);
  logger.info(`L' sets (potential same-location): ${statistics.L_prime_sets}`);
  logger.info(`E' sets (potential same-event): ${statistics.E_prime_sets}`);
}

export function runClustering(
  config: ClusteringConfig,
  options: RunOptions = {},
): RunSummary {
  const logger = options.logger ?? silentLogger;
  const metadataPath = getMetadataPath(config);
  const outputPath = getOutputPath(config);

  try {
    logger.info(`Loading metadata from ${metadataPath}`);
    const document = loadMetadataDocument(metadataPath);
    logger.info(`Loaded ${Object.keys(document).length} file entries`);

    let sets: RelationshipSets;
    try {
      sets = computeRelationshipSets(document, config.thresholds, {
        logger,
        onProgress: options.onProgress,
      });
    } catch (error) {
      throw new ClusteringError(
        `Relationship extraction failed: ${errorMessage(error)}`,
        "COMPUTE_ERROR",
        metadataPath,
        { cause: error },
      );
    }

    logger.info(`Saving relationship sets to ${outputPath}`);
    writeRelationshipSets(outputPath, sets);
    options.onProgress?.({ stage: "write", completed: 1, total: 1 });

    logSummary(logger, sets.statistics);
    return { metadataPath, outputPath, statistics: sets.statistics };
  } catch (error) {
    const failure = isClusteringError(error)
      ? error
      : new ClusteringError(
          `Auto clustering failed: ${errorMessage(error)}`,
          "COMPUTE_ERROR",
          outputPath,
          { cause: error },
        );

    logger.error(failure.message, {
      code: failure.code,
      path: failure.path,
      stack: failure.stack,
    });
    throw failure;
  }
}
