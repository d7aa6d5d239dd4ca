/**
 * Fields pulled out of a versioned signing artifact. Required fields are
 * always present once a record exists; optional ones may be null.
 */
export interface ExtractedFields {
  required: Record<string, string>;
  optional: Record<string, string | null>;
}

export interface ArtifactRecord {
  /** SHA-256 of the artifact body. */
  versionId: string;
  sourceUrl: string;
  extractedFields: ExtractedFields;
  /** Bumped when the extraction rules change so old records can be told apart. */
  extractionVersion: string;
  createdAt: string;
  lastValidatedAt: string;
  failureCount: number;
}

export interface FieldRule {
  name: string;
  /** Regular expression sources, tried in order; capture group 1 wins over the whole match. */
  patterns: string[];
  required: boolean;
  flags?: string;
  /** Reported when a required field is missing. Never substituted for the real value. */
  defaultValue?: string;
}

export function artifactAgeMs(record: ArtifactRecord, now: number): number {
  return now - Date.parse(record.createdAt);
}

export function isArtifactExpired(
  record: ArtifactRecord,
  ttlMs: number,
  now: number = Date.now(),
): boolean {
  return artifactAgeMs(record, now) > ttlMs;
}
