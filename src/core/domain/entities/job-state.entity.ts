import type { ResourceDescriptor } from "./resource-descriptor.entity.js";

export type JobStatus = "pending" | "in_progress" | "completed" | "failed";

export const INCOMPLETE_JOB_STATUSES: readonly JobStatus[] = [
  "pending",
  "in_progress",
];

export interface JobState {
  jobId: string;
  resourceId: string;
  resourceUrl: string;
  variantId?: string;
  targetPath: string;
  bytesCompleted: number;
  totalLength?: number;
  etag?: string;
  lastModified?: string;
  status: JobStatus;
  /** Number of transfer invocations for this job that ended in an error. */
  retryCount: number;
  lastSuccessAt: string;
  errorMessage?: string;
}

export function createJobState(
  jobId: string,
  descriptor: ResourceDescriptor,
  targetPath: string,
  now: Date = new Date(),
): JobState {
  return {
    jobId,
    resourceId: descriptor.resourceId,
    resourceUrl: descriptor.url,
    variantId: descriptor.variantId,
    targetPath,
    bytesCompleted: 0,
    totalLength: descriptor.expectedLength,
    etag: descriptor.etag,
    lastModified: descriptor.lastModified,
    status: "pending",
    retryCount: 0,
    lastSuccessAt: now.toISOString(),
  };
}

export function isIncomplete(job: JobState): boolean {
  return INCOMPLETE_JOB_STATUSES.includes(job.status);
}

/** Rebuild the descriptor a job was started with, for resuming it later. */
export function descriptorFromJob(job: JobState): ResourceDescriptor {
  return {
    resourceId: job.resourceId,
    url: job.resourceUrl,
    variantId: job.variantId,
    expectedLength: job.totalLength,
    etag: job.etag,
    lastModified: job.lastModified,
  };
}
