import { z } from "zod";

/**
 * Shapes of persisted records. Parsing through these drops unknown fields
 * and rejects records written by an incompatible version.
 */

export const JobStateSchema = z.object({
  jobId: z.string().min(1),
  resourceId: z.string(),
  resourceUrl: z.string(),
  variantId: z.string().optional(),
  targetPath: z.string(),
  bytesCompleted: z.number().int().min(0),
  totalLength: z.number().int().min(0).optional(),
  etag: z.string().optional(),
  lastModified: z.string().optional(),
  status: z.enum(["pending", "in_progress", "completed", "failed"]),
  retryCount: z.number().int().min(0),
  lastSuccessAt: z.string(),
  errorMessage: z.string().optional(),
});

export const ExtractedFieldsSchema = z.object({
  required: z.record(z.string(), z.string()),
  optional: z.record(z.string(), z.string().nullable()),
});

export const ArtifactRecordSchema = z.object({
  versionId: z.string().min(1),
  sourceUrl: z.string(),
  extractedFields: ExtractedFieldsSchema,
  extractionVersion: z.string(),
  createdAt: z.string(),
  lastValidatedAt: z.string(),
  failureCount: z.number().int().min(0),
});
