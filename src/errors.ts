export type ClusteringErrorCode =
  | "INPUT_NOT_FOUND"
  | "INPUT_PARSE_ERROR"
  | "CONFIG_MISSING_FIELD"
  | "CONFIG_INVALID"
  | "COMPUTE_ERROR";

/**
 * Failure of a clustering run. Every code is fatal for the stage: nothing is
 * written and any previous relationship_sets.json stays in place.
 */
export class ClusteringError extends Error {
  constructor(
    message: string,
    public readonly code: ClusteringErrorCode,
    public readonly path?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ClusteringError";
  }
}

export function isClusteringError(error: unknown): error is ClusteringError {
  return error instanceof ClusteringError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
