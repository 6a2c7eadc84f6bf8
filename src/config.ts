import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type { ZodIssue } from "zod";
import { ClusteringError, errorMessage } from "./errors";
import {
  type ClusteringConfig,
  ConfigPayloadSchema,
  type ProximityThresholds,
} from "./types";

export const METADATA_FILE = "Consolidate_Meta_Results.json";
export const OUTPUT_FILE = "relationship_sets.json";

/** 5 minutes for T', 100 meters for L' */
export const DEFAULT_THRESHOLDS: ProximityThresholds = {
  timeThresholdSeconds: 300,
  locationThresholdKm: 0.1,
};

function valueAt(root: unknown, path: readonly (string | number)[]): unknown {
  let current = root;
  for (const segment of path) {
    if (typeof current !== "object" || current === null) {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}

function toConfigError(raw: unknown, issue: ZodIssue): ClusteringError {
  const field = issue.path.join(".");
  if (valueAt(raw, issue.path) === undefined) {
    return new ClusteringError(
      `Missing required config field: ${field}`,
      "CONFIG_MISSING_FIELD",
    );
  }
  return new ClusteringError(
    `Invalid config field ${field}: ${issue.message}`,
    "CONFIG_INVALID",
  );
}

/**
 * Validate the configuration payload handed over by the pipeline.
 * Unknown keys are ignored; thresholds fall back to DEFAULT_THRESHOLDS.
 */
export function loadConfig(payload: unknown): ClusteringConfig {
  const parsed = ConfigPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    if (!issue) {
      throw new ClusteringError("Invalid config payload", "CONFIG_INVALID");
    }
    throw toConfigError(payload, issue);
  }

  const clustering = parsed.data.settings?.clustering;
  return {
    resultsDirectory: parsed.data.paths.resultsDirectory,
    thresholds: {
      timeThresholdSeconds:
        clustering?.timeThresholdSeconds ??
        DEFAULT_THRESHOLDS.timeThresholdSeconds,
      locationThresholdKm:
        clustering?.locationThresholdKm ??
        DEFAULT_THRESHOLDS.locationThresholdKm,
    },
    logLevel: parsed.data.settings?.logging?.level ?? "info",
  };
}

/**
 * Names of the threshold settings the payload left out and that were
 * defaulted by loadConfig.
 */
export function defaultedThresholds(payload: unknown): string[] {
  const clustering = valueAt(payload, ["settings", "clustering"]);
  const missing: string[] = [];
  for (const key of ["timeThresholdSeconds", "locationThresholdKm"]) {
    if (valueAt(clustering, [key]) === undefined) {
      missing.push(`settings.clustering.${key}`);
    }
  }
  return missing;
}

export function parseConfigJson(raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    throw new ClusteringError(
      `Config is not valid JSON: ${errorMessage(error)}`,
      "CONFIG_INVALID",
      undefined,
      { cause: error },
    );
  }
}

export function readConfigFile(configPath: string): unknown {
  if (!existsSync(configPath)) {
    throw new ClusteringError(
      `Config file not found: ${configPath}`,
      "INPUT_NOT_FOUND",
      configPath,
    );
  }
  return parseConfigJson(readFileSync(configPath, "utf-8"));
}

export function getMetadataPath(config: ClusteringConfig): string {
  return join(config.resultsDirectory, METADATA_FILE);
}

export function getOutputPath(config: ClusteringConfig): string {
  return join(config.resultsDirectory, OUTPUT_FILE);
}
