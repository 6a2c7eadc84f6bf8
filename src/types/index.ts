import { z } from "zod";

// Metadata sources written by the consolidation stage
export const MetadataSourceSchema = z.enum([
  "exif",
  "ffprobe",
  "json",
  "filename",
  "propagated",
]);
export type MetadataSource = z.infer<typeof MetadataSourceSchema>;

export const GeotagSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
});
export type Geotag = z.infer<typeof GeotagSchema>;

/**
 * Geotag as found in the snapshot. Older consolidation runs wrote a
 * `[lat, lon]` pair instead of an object.
 */
export const RawGeotagSchema = z.union([
  GeotagSchema.passthrough(),
  z.tuple([z.number(), z.number()]),
]);
export type RawGeotag = z.infer<typeof RawGeotagSchema>;

/**
 * One extractor result. A value the resolver cannot use (a numeric
 * timestamp, a geotag without coordinates) reads as absent instead of
 * failing the whole snapshot.
 */
export const SourceEntrySchema = z
  .object({
    timestamp: z.string().nullish().catch(null),
    geotag: RawGeotagSchema.nullish().catch(null),
  })
  .passthrough();
export type SourceEntry = z.infer<typeof SourceEntrySchema>;

// Only entry [0] is consulted; unreadable entries and lists count as empty
const SourceListSchema = z.array(SourceEntrySchema.catch({})).nullish().catch(null);

export const FileMetadataSchema = z
  .object({
    exif: SourceListSchema,
    ffprobe: SourceListSchema,
    json: SourceListSchema,
    filename: SourceListSchema,
    propagated: SourceListSchema,
    marked_for_deletion: z.boolean().optional(),
  })
  .passthrough();
export type FileMetadata = z.infer<typeof FileMetadataSchema>;

// Consolidate_Meta_Results.json: file path -> per-source metadata
export const MetadataDocumentSchema = z.record(z.string(), FileMetadataSchema);
export type MetadataDocument = z.infer<typeof MetadataDocumentSchema>;

// Configuration payload (subset of the pipeline-wide config document)
export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const ClusteringSettingsSchema = z
  .object({
    timeThresholdSeconds: z.number().finite().nonnegative().optional(),
    locationThresholdKm: z.number().finite().nonnegative().optional(),
  })
  .passthrough();

export const ConfigPayloadSchema = z
  .object({
    paths: z
      .object({
        resultsDirectory: z.string().min(1),
      })
      .passthrough(),
    settings: z
      .object({
        clustering: ClusteringSettingsSchema.optional(),
        logging: z
          .object({
            level: LogLevelSchema.optional(),
          })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();
export type ConfigPayload = z.infer<typeof ConfigPayloadSchema>;

export interface ProximityThresholds {
  /** Maximum capture-time difference for a T' edge (inclusive) */
  timeThresholdSeconds: number;
  /** Maximum great-circle distance for an L' edge (inclusive) */
  locationThresholdKm: number;
}

export interface ClusteringConfig {
  resultsDirectory: string;
  thresholds: ProximityThresholds;
  logLevel: LogLevel;
}

// Clustering model
export interface FileRecord {
  key: number;
  path: string;
  timestamp: Date | null;
  geotag: Geotag | null;
}

/** Sorted, distinct file keys; always at least two members. */
export type EquivalenceClass = number[];

export interface ClusteringStatistics {
  total_files: number;
  files_with_timestamp: number;
  files_with_geotag: number;
  T_prime_pairs_detected: number;
  L_prime_pairs_detected: number;
  T_prime_sets: number;
  L_prime_sets: number;
  E_prime_sets: number;
}

export interface RelationshipSets {
  /** key -> path, keys dense from 0 */
  fileIndex: Map<number, string>;
  tPrime: EquivalenceClass[];
  lPrime: EquivalenceClass[];
  ePrime: EquivalenceClass[];
  thresholds: ProximityThresholds;
  statistics: ClusteringStatistics;
}

// relationship_sets.json
const KeyListSchema = z.array(z.array(z.number().int().nonnegative()));

export const RelationshipSetsWireSchema = z.object({
  file_index: z.record(z.string().regex(/^\d+$/), z.string()),
  T_prime: KeyListSchema,
  L_prime: KeyListSchema,
  E_prime: KeyListSchema,
  thresholds: z.object({
    time_seconds: z.number(),
    location_km: z.number(),
  }),
  statistics: z
    .object({
      total_files: z.number().int(),
      files_with_timestamp: z.number().int(),
      files_with_geotag: z.number().int(),
      T_prime_pairs_detected: z.number().int().default(0),
      L_prime_pairs_detected: z.number().int().default(0),
      T_prime_sets: z.number().int(),
      L_prime_sets: z.number().int(),
      E_prime_sets: z.number().int(),
    })
    .passthrough(),
});
export type RelationshipSetsWire = z.infer<typeof RelationshipSetsWireSchema>;

// Progress reporting
export type ClusteringStage =
  | "index"
  | "resolve"
  | "pairs"
  | "compose"
  | "write";

export interface ClusteringProgress {
  stage: ClusteringStage;
  completed: number;
  total: number;
}

export type ProgressReporter = (progress: ClusteringProgress) => void;
