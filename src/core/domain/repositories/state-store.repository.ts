import type { JobState } from "../entities/job-state.entity.js";
import type { ArtifactRecord } from "../entities/artifact-record.entity.js";

export interface ResumeInfo {
  offset: number;
  etag?: string;
  lastModified?: string;
}

export interface IJobStore {
  putJob(job: JobState): Promise<void>;
  /** Unknown ids resolve to null. */
  getJob(jobId: string): Promise<JobState | null>;
  deleteJob(jobId: string): Promise<void>;
  /** Checkpoint progress; marks the job in_progress. Unknown ids are logged and ignored. */
  updateProgress(
    jobId: string,
    bytesCompleted: number,
    etag?: string,
    lastModified?: string,
  ): Promise<void>;
  /** All persisted jobs, oldest checkpoint first. */
  listJobs(): Promise<JobState[]>;
  listIncompleteJobs(): Promise<JobState[]>;
  /** Offset is the larger of the checkpointed count and the partial file's size on disk. */
  resumeInfo(jobId: string, targetPath: string): Promise<ResumeInfo>;
}

export interface IArtifactStore {
  putArtifact(record: ArtifactRecord): Promise<void>;
  /** Records older than the store's TTL resolve to null. */
  getArtifact(versionId: string): Promise<ArtifactRecord | null>;
  /** Newest live record fetched from the given reference URL. */
  findArtifactBySourceUrl(sourceUrl: string): Promise<ArtifactRecord | null>;
  pruneArtifacts(maxAgeMs: number): Promise<number>;
}

/**
 * Composite durable store. Consumers can depend on only the
 * sub-interface they need.
 */
export interface IStateStore extends IJobStore, IArtifactStore {
  initialize(): Promise<void>;
  close(): Promise<void>;
}
