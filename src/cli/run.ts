import {
  defaultedThresholds,
  loadConfig,
  parseConfigJson,
  readConfigFile,
} from "@/config";
import { errorMessage, isClusteringError } from "@/errors";
import { createConsoleLogger, type Logger } from "@/logging";
import { runClustering } from "@/pipeline";
import type { ClusteringConfig, ClusteringProgress } from "@/types";
import { type CliOptions, parseArgs, USAGE, UsageError } from "./args";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  /** stderr line sink (default: console.error) */
  writeErr?: (line: string) => void;
}

function progressLogger(logger: Logger) {
  return (progress: ClusteringProgress) => {
    logger.debug(`${progress.stage}: ${progress.completed}/${progress.total}`);
  };
}

/** Run one clustering pass from CLI arguments and return the exit code. */
export function runCli(argv: readonly string[], io: CliIo = {}): number {
  const writeErr = io.writeErr ?? ((line: string) => console.error(line));

  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      writeErr(`[media-relate] ${error.message}`);
      writeErr(USAGE);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (options.help) {
    writeErr(USAGE);
    return EXIT_OK;
  }

  // Not configured yet: config errors go out at the default level
  let logger = createConsoleLogger({ write: writeErr });

  let payload: unknown;
  let config: ClusteringConfig;
  try {
    payload =
      options.configPath !== undefined
        ? readConfigFile(options.configPath)
        : parseConfigJson(options.configJson ?? "");
    config = loadConfig(payload);
  } catch (error) {
    logger.error(
      errorMessage(error),
      isClusteringError(error) ? { code: error.code } : undefined,
    );
    return EXIT_FAILURE;
  }

  logger = createConsoleLogger({ level: config.logLevel, write: writeErr });
  for (const field of defaultedThresholds(payload)) {
    logger.debug(`${field} not set, using default`);
  }

  try {
    runClustering(config, { logger, onProgress: progressLogger(logger) });
    return EXIT_OK;
  } catch (error) {
    // runClustering logs ClusteringErrors before rethrowing them
    if (!isClusteringError(error)) {
      logger.error(`Unexpected failure: ${errorMessage(error)}`);
    }
    return EXIT_FAILURE;
  }
}
