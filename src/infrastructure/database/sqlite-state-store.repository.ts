import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type {
  JobState,
  JobStatus,
} from "../../core/domain/entities/job-state.entity.js";
import { INCOMPLETE_JOB_STATUSES } from "../../core/domain/entities/job-state.entity.js";
import type { ArtifactRecord } from "../../core/domain/entities/artifact-record.entity.js";
import { isArtifactExpired } from "../../core/domain/entities/artifact-record.entity.js";
import type {
  IStateStore,
  ResumeInfo,
} from "../../core/domain/repositories/state-store.repository.js";
import type { ILogger } from "../../core/domain/services/logger.service.js";
import { ExtractedFieldsSchema, JobStateSchema } from "./record.schemas.js";
import { computeResumeInfo, partialPathFor } from "../utils/resume.utils.js";

export interface StateStoreOptions {
  artifactTtlMs: number;
  partSuffix: string;
  logger: ILogger;
  now?: () => Date;
}

/** Typed row shape returned by better-sqlite3 for tbl_jobs */
interface JobRow {
  jobId: string;
  resourceId: string;
  resourceUrl: string;
  variantId: string | null;
  targetPath: string;
  bytesCompleted: number;
  totalLength: number | null;
  etag: string | null;
  lastModified: string | null;
  status: string;
  retryCount: number;
  lastSuccessAt: string;
  errorMessage: string | null;
}

/** Typed row shape returned by better-sqlite3 for tbl_artifacts */
interface ArtifactRow {
  versionId: string;
  sourceUrl: string;
  extractedFields: string;
  extractionVersion: string;
  createdAt: string;
  lastValidatedAt: string;
  failureCount: number;
}

function jobFromRow(row: JobRow): JobState {
  return JobStateSchema.parse({
    ...row,
    variantId: row.variantId ?? undefined,
    totalLength: row.totalLength ?? undefined,
    etag: row.etag ?? undefined,
    lastModified: row.lastModified ?? undefined,
    errorMessage: row.errorMessage ?? undefined,
  });
}

function artifactFromRow(row: ArtifactRow): ArtifactRecord {
  return {
    ...row,
    extractedFields: ExtractedFieldsSchema.parse(JSON.parse(row.extractedFields)),
  };
}

/**
 * SQLite-backed job and artifact store. Every write is a single statement
 * under synchronous=FULL, so a crash leaves either the old or the new row.
 */
export class SqliteStateStore implements IStateStore {
  private _db: Database.Database | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly dbPath: string,
    private readonly options: StateStoreOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  private getDb(): Database.Database {
    if (this._db) return this._db;
    if (this.dbPath !== ":memory:") {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }
    this._db = new Database(this.dbPath);
    this._db.pragma("journal_mode = DELETE");
    this._db.pragma("synchronous = FULL");
    this._db.pragma("busy_timeout = 5000");
    return this._db;
  }

  async initialize(): Promise<void> {
    const db = this.getDb();
    db.exec(`
      CREATE TABLE IF NOT EXISTS tbl_jobs (
        jobId          TEXT PRIMARY KEY,
        resourceId     TEXT    NOT NULL,
        resourceUrl    TEXT    NOT NULL,
        variantId      TEXT,
        targetPath     TEXT    NOT NULL,
        bytesCompleted INTEGER NOT NULL DEFAULT 0,
        totalLength    INTEGER,
        etag           TEXT,
        lastModified   TEXT,
        status         TEXT    NOT NULL DEFAULT 'pending',
        retryCount     INTEGER NOT NULL DEFAULT 0,
        lastSuccessAt  TEXT    NOT NULL,
        errorMessage   TEXT
      );

      CREATE TABLE IF NOT EXISTS tbl_artifacts (
        versionId         TEXT PRIMARY KEY,
        sourceUrl         TEXT    NOT NULL,
        extractedFields   TEXT    NOT NULL,
        extractionVersion TEXT    NOT NULL,
        createdAt         TEXT    NOT NULL,
        lastValidatedAt   TEXT    NOT NULL,
        failureCount      INTEGER NOT NULL DEFAULT 0
      );

      CREATE INDEX IF NOT EXISTS idx_jobs_status           ON tbl_jobs(status);
      CREATE INDEX IF NOT EXISTS idx_artifacts_sourceUrl   ON tbl_artifacts(sourceUrl);
      CREATE INDEX IF NOT EXISTS idx_artifacts_createdAt   ON tbl_artifacts(createdAt);
    `);
  }

  async close(): Promise<void> {
    if (this._db) {
      this._db.close();
      this._db = null;
    }
  }

  // ─── Jobs ──────────────────────────────────────────────────────────────────

  async putJob(job: JobState): Promise<void> {
    this.getDb()
      .prepare(
        `
      INSERT INTO tbl_jobs
        (jobId, resourceId, resourceUrl, variantId, targetPath, bytesCompleted,
         totalLength, etag, lastModified, status, retryCount, lastSuccessAt, errorMessage)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(jobId) DO UPDATE SET
        resourceId     = excluded.resourceId,
        resourceUrl    = excluded.resourceUrl,
        variantId      = excluded.variantId,
        targetPath     = excluded.targetPath,
        bytesCompleted = excluded.bytesCompleted,
        totalLength    = excluded.totalLength,
        etag           = excluded.etag,
        lastModified   = excluded.lastModified,
        status         = excluded.status,
        retryCount     = excluded.retryCount,
        lastSuccessAt  = excluded.lastSuccessAt,
        errorMessage   = excluded.errorMessage
    `,
      )
      .run(
        job.jobId,
        job.resourceId,
        job.resourceUrl,
        job.variantId ?? null,
        job.targetPath,
        job.bytesCompleted,
        job.totalLength ?? null,
        job.etag ?? null,
        job.lastModified ?? null,
        job.status,
        job.retryCount,
        job.lastSuccessAt,
        job.errorMessage ?? null,
      );
  }

  async getJob(jobId: string): Promise<JobState | null> {
    const row = this.getDb()
      .prepare<[string], JobRow>("SELECT * FROM tbl_jobs WHERE jobId = ?")
      .get(jobId);
    return row ? jobFromRow(row) : null;
  }

  async deleteJob(jobId: string): Promise<void> {
    this.getDb().prepare("DELETE FROM tbl_jobs WHERE jobId = ?").run(jobId);
  }

  async updateProgress(
    jobId: string,
    bytesCompleted: number,
    etag?: string,
    lastModified?: string,
  ): Promise<void> {
    const status: JobStatus = "in_progress";
    const result = this.getDb()
      .prepare(
        `
      UPDATE tbl_jobs SET
        bytesCompleted = ?,
        lastSuccessAt  = ?,
        etag           = COALESCE(?, etag),
        lastModified   = COALESCE(?, lastModified),
        status         = ?
      WHERE jobId = ?
    `,
      )
      .run(
        bytesCompleted,
        this.now().toISOString(),
        etag ?? null,
        lastModified ?? null,
        status,
        jobId,
      );

    if (result.changes === 0) {
      this.options.logger.log({
        level: "warn",
        component: "state",
        message: `Cannot update progress for unknown job ${jobId}`,
        jobId,
        kind: "state_inconsistency",
      });
    }
  }

  async listJobs(): Promise<JobState[]> {
    const rows = this.getDb()
      .prepare<[], JobRow>("SELECT * FROM tbl_jobs ORDER BY lastSuccessAt")
      .all();
    return rows.map(jobFromRow);
  }

  async listIncompleteJobs(): Promise<JobState[]> {
    const placeholders = INCOMPLETE_JOB_STATUSES.map(() => "?").join(", ");
    const rows = this.getDb()
      .prepare<string[], JobRow>(
        `SELECT * FROM tbl_jobs WHERE status IN (${placeholders}) ORDER BY lastSuccessAt`,
      )
      .all(...INCOMPLETE_JOB_STATUSES);
    return rows.map(jobFromRow);
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
    this.getDb()
      .prepare(
        `
      INSERT INTO tbl_artifacts
        (versionId, sourceUrl, extractedFields, extractionVersion, createdAt, lastValidatedAt, failureCount)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(versionId) DO UPDATE SET
        sourceUrl         = excluded.sourceUrl,
        extractedFields   = excluded.extractedFields,
        extractionVersion = excluded.extractionVersion,
        createdAt         = excluded.createdAt,
        lastValidatedAt   = excluded.lastValidatedAt,
        failureCount      = excluded.failureCount
    `,
      )
      .run(
        record.versionId,
        record.sourceUrl,
        JSON.stringify(record.extractedFields),
        record.extractionVersion,
        record.createdAt,
        record.lastValidatedAt,
        record.failureCount,
      );
  }

  async getArtifact(versionId: string): Promise<ArtifactRecord | null> {
    const row = this.getDb()
      .prepare<[string], ArtifactRow>(
        "SELECT * FROM tbl_artifacts WHERE versionId = ?",
      )
      .get(versionId);
    return row ? this.liveArtifact(artifactFromRow(row)) : null;
  }

  async findArtifactBySourceUrl(
    sourceUrl: string,
  ): Promise<ArtifactRecord | null> {
    const row = this.getDb()
      .prepare<[string], ArtifactRow>(
        "SELECT * FROM tbl_artifacts WHERE sourceUrl = ? ORDER BY createdAt DESC LIMIT 1",
      )
      .get(sourceUrl);
    return row ? this.liveArtifact(artifactFromRow(row)) : null;
  }

  async pruneArtifacts(maxAgeMs: number): Promise<number> {
    const cutoff = new Date(this.now().getTime() - maxAgeMs).toISOString();
    const result = this.getDb()
      .prepare("DELETE FROM tbl_artifacts WHERE createdAt < ?")
      .run(cutoff);
    if (result.changes > 0) {
      this.options.logger.log({
        level: "info",
        component: "state",
        message: `Pruned ${result.changes} artifact record(s) older than ${cutoff}`,
      });
    }
    return result.changes;
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
}
