import { mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import type { JobState } from "../../core/domain/entities/job-state.entity.js";
import { isIncomplete } from "../../core/domain/entities/job-state.entity.js";
import type { ArtifactRecord } from "../../core/domain/entities/artifact-record.entity.js";
import { isArtifactExpired } from "../../core/domain/entities/artifact-record.entity.js";
import type {
  IStateStore,
  ResumeInfo,
} from "../../core/domain/repositories/state-store.repository.js";
import { errorMessage } from "../../core/domain/errors.js";
import { ArtifactRecordSchema, JobStateSchema } from "./record.schemas.js";
import type { StateStoreOptions } from "./sqlite-state-store.repository.js";
import {
  computeResumeInfo,
  isMissingFile,
  partialPathFor,
} from "../utils/resume.utils.js";

function fileNameFor(id: string): string {
  return `${encodeURIComponent(id)}.json`;
}

/**
 * One JSON file per record under `<dir>/jobs` and `<dir>/artifacts`.
 * Writes go to a temp file that is renamed over the target, so a crash
 * never leaves a torn record.
 */
export class JsonStateStore implements IStateStore {
  private readonly jobDir: string;
  private readonly artifactDir: string;
  private readonly now: () => Date;

  constructor(
    stateDir: string,
    private readonly options: StateStoreOptions,
  ) {
    this.jobDir = join(stateDir, "jobs");
    this.artifactDir = join(stateDir, "artifacts");
    this.now = options.now ?? (() => new Date());
  }

  async initialize(): Promise<void> {
    await mkdir(this.jobDir, { recursive: true });
    await mkdir(this.artifactDir, { recursive: true });
  }

  async close(): Promise<void> {
    // Nothing held open between calls.
  }

  // ─── Jobs ──────────────────────────────────────────────────────────────────

  async putJob(job: JobState): Promise<void> {
    await this.writeAtomic(join(this.jobDir, fileNameFor(job.jobId)), job);
  }

  async getJob(jobId: string): Promise<JobState | null> {
    return this.readRecord(join(this.jobDir, fileNameFor(jobId)), JobStateSchema);
  }

  async deleteJob(jobId: string): Promise<void> {
    await rm(join(this.jobDir, fileNameFor(jobId)), { force: true });
  }

  async updateProgress(
    jobId: string,
    bytesCompleted: number,
    etag?: string,
    lastModified?: string,
  ): Promise<void> {
    const job = await this.getJob(jobId);
    if (!job) {
      this.options.logger.log({
        level: "warn",
        component: "state",
        message: `Cannot update progress for unknown job ${jobId}`,
        jobId,
        kind: "state_inconsistency",
      });
      return;
    }

    await this.putJob({
      ...job,
      bytesCompleted,
      lastSuccessAt: this.now().toISOString(),
      etag: etag ?? job.etag,
      lastModified: lastModified ?? job.lastModified,
      status: "in_progress",
    });
  }

  async listJobs(): Promise<JobState[]> {
    const jobs: JobState[] = [];
    for (const name of await this.listJson(this.jobDir)) {
      const job = await this.readRecord(join(this.jobDir, name), JobStateSchema);
      if (job) jobs.push(job);
    }
    return jobs.sort((a, b) => a.lastSuccessAt.localeCompare(b.lastSuccessAt));
  }

  async listIncompleteJobs(): Promise<JobState[]> {
    return (await this.listJobs()).filter(isIncomplete);
  }

  async resumeInfo(jobId: string, targetPath: string): Promise<ResumeInfo> {
    const job = await this.getJob(jobId);
    return computeResumeInfo(
      job,
      partialPathFor(targetPath, this.options.partSuffix),
    );
  }

  // ─── Artifacts ─────────────────────────────────────────────────────────────

  async putArtifact(record: ArtifactRecord): Promise<void> {
    await this.writeAtomic(
      join(this.artifactDir, fileNameFor(record.versionId)),
      record,
    );
  }

  async getArtifact(versionId: string): Promise<ArtifactRecord | null> {
    const record = await this.readRecord(
      join(this.artifactDir, fileNameFor(versionId)),
      ArtifactRecordSchema,
    );
    return record ? this.liveArtifact(record) : null;
  }

  async findArtifactBySourceUrl(
    sourceUrl: string,
  ): Promise<ArtifactRecord | null> {
    let newest: ArtifactRecord | null = null;
    for (const record of await this.allArtifacts()) {
      if (record.sourceUrl !== sourceUrl) continue;
      if (!newest || record.createdAt > newest.createdAt) newest = record;
    }
    return newest ? this.liveArtifact(newest) : null;
  }

  async pruneArtifacts(maxAgeMs: number): Promise<number> {
    const cutoff = this.now().getTime() - maxAgeMs;
    let removed = 0;
    for (const record of await this.allArtifacts()) {
      if (Date.parse(record.createdAt) < cutoff) {
        await rm(join(this.artifactDir, fileNameFor(record.versionId)), {
          force: true,
        });
        removed++;
      }
    }
    if (removed > 0) {
      this.options.logger.log({
        level: "info",
        component: "state",
        message: `Pruned ${removed} artifact record(s)`,
      });
    }
    return removed;
  }

  // ─── Internal helpers ──────────────────────────────────────────────────────

  private async allArtifacts(): Promise<ArtifactRecord[]> {
    const records: ArtifactRecord[] = [];
    for (const name of await this.listJson(this.artifactDir)) {
      const record = await this.readRecord(
        join(this.artifactDir, name),
        ArtifactRecordSchema,
      );
      if (record) records.push(record);
    }
    return records;
  }

  private liveArtifact(record: ArtifactRecord): ArtifactRecord | null {
    if (
      isArtifactExpired(record, this.options.artifactTtlMs, this.now().getTime())
    ) {
      this.options.logger.log({
        level: "debug",
        component: "state",
        message: `Artifact ${record.versionId.slice(0, 12)} expired, will refresh`,
      });
      return null;
    }
    return record;
  }

  private async listJson(dir: string): Promise<string[]> {
    try {
      const names = await readdir(dir);
      return names.filter((n) => n.endsWith(".json"));
    } catch (e) {
      if (isMissingFile(e)) return [];
      throw e;
    }
  }

  private async writeAtomic(path: string, value: unknown): Promise<void> {
    const tmp = `${path}.${randomUUID().slice(0, 8)}.tmp`;
    await writeFile(tmp, JSON.stringify(value, null, 2), "utf-8");
    await rename(tmp, path);
  }

  /** Missing files read as null; unreadable ones are logged and read as null. */
  private async readRecord<T>(
    path: string,
    schema: { parse(data: unknown): T },
  ): Promise<T | null> {
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (e) {
      if (isMissingFile(e)) return null;
      throw e;
    }

    try {
      return schema.parse(JSON.parse(raw));
    } catch (e) {
      this.options.logger.log({
        level: "warn",
        component: "state",
        message: `Ignoring unreadable record ${path}: ${errorMessage(e)}`,
        kind: "state_inconsistency",
      });
      return null;
    }
  }
}
