import { existsSync, readFileSync } from "node:fs";
import { ClusteringError, errorMessage } from "@/errors";
import { type MetadataDocument, MetadataDocumentSchema } from "@/types";

/**
 * Read and validate the consolidated metadata snapshot.
 *
 * @throws {ClusteringError} INPUT_NOT_FOUND when the file is absent,
 *   INPUT_PARSE_ERROR when it is not JSON or not a path -> metadata object
 */
export function loadMetadataDocument(metadataPath: string): MetadataDocument {
  if (!existsSync(metadataPath)) {
    throw new ClusteringError(
      `Metadata file not found: ${metadataPath}`,
      "INPUT_NOT_FOUND",
      metadataPath,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(metadataPath, "utf-8"));
  } catch (error) {
    throw new ClusteringError(
      `Metadata file is not valid JSON: ${errorMessage(error)}`,
      "INPUT_PARSE_ERROR",
      metadataPath,
      { cause: error },
    );
  }

  const parsed = MetadataDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? ` at ${issue.path.join(".") || "<root>"}` : "";
    throw new ClusteringError(
      `Metadata file has unexpected structure${where}: ${issue?.message ?? "invalid"}`,
      "INPUT_PARSE_ERROR",
      metadataPath,
      { cause: parsed.error },
    );
  }

  return parsed.data;
}
