import { stat } from "node:fs/promises";
import type { JobState } from "../../core/domain/entities/job-state.entity.js";
import type { ResumeInfo } from "../../core/domain/repositories/state-store.repository.js";

export const DEFAULT_PART_SUFFIX = ".part";

export function partialPathFor(
  targetPath: string,
  suffix: string = DEFAULT_PART_SUFFIX,
): string {
  return targetPath + suffix;
}

/** Size of the file at path, or null when it does not exist. */
export async function fileSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch (e) {
    if (isMissingFile(e)) return null;
    throw e;
  }
}

export function isMissingFile(e: unknown): boolean {
  return (
    typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT"
  );
}

/**
 * Resume position for a job. The checkpoint can lag behind the partial file
 * (bytes written after the last checkpoint), so the larger of the two wins.
 * Without a partial file there is nothing to append to and the offset is 0.
 */
export async function computeResumeInfo(
  job: JobState | null,
  partPath: string,
): Promise<ResumeInfo> {
  if (!job) return { offset: 0 };

  const actualSize = await fileSize(partPath);
  const offset =
    actualSize === null ? 0 : Math.max(actualSize, job.bytesCompleted);

  return { offset, etag: job.etag, lastModified: job.lastModified };
}
