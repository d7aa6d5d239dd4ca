import { mkdir, open, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import type { ResourceDescriptor } from "../domain/entities/resource-descriptor.entity.js";
import type { JobState } from "../domain/entities/job-state.entity.js";
import { createJobState } from "../domain/entities/job-state.entity.js";
import type {
  IJobStore,
  ResumeInfo,
} from "../domain/repositories/state-store.repository.js";
import type { ILogger } from "../domain/services/logger.service.js";
import type {
  ITransport,
  TransportResponse,
} from "../domain/services/transport.service.js";
import {
  HttpStatusError,
  TransferFailedError,
  errorMessage,
} from "../domain/errors.js";
import type { CircuitBreaker } from "../../infrastructure/resilience/circuit-breaker.js";
import type { RetryExecutor } from "../../infrastructure/resilience/retry-executor.js";
import { errorKindOf } from "../../infrastructure/resilience/failure-classifier.js";
import { fileSize, partialPathFor } from "../../infrastructure/utils/resume.utils.js";

export interface TransferOptions {
  partSuffix: string;
  /** Persist progress after this many chunks. */
  checkpointEveryChunks: number;
}

export interface TransferHooks {
  onProgress?: (bytes: number, total?: number) => void;
}

interface StreamPlan {
  response: TransportResponse;
  offset: number;
  total?: number;
}

const COMPONENT = "transfer";

/** "bytes 3000-9999/10000" → 10000 */
function totalFromContentRange(value: string | undefined): number | undefined {
  const match = value?.match(/\/(\d+)\s*$/);
  return match ? Number(match[1]) : undefined;
}

function contentLength(res: TransportResponse): number | undefined {
  const raw = res.headers["content-length"];
  if (raw === undefined) return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

/** ETag decides when both sides have one, Last-Modified otherwise. */
function validatorsChanged(info: ResumeInfo, res: TransportResponse): boolean {
  const etag = res.headers["etag"];
  if (info.etag && etag) return info.etag !== etag;
  const lastModified = res.headers["last-modified"];
  if (info.lastModified && lastModified) {
    return info.lastModified !== lastModified;
  }
  return false;
}

/**
 * Moves one resource to disk through a `.part` file, checkpointing progress
 * so an interrupted transfer continues from where it stopped.
 */
export class TransferResourceUseCase {
  constructor(
    private readonly transport: ITransport,
    private readonly store: IJobStore,
    private readonly retry: RetryExecutor,
    private readonly breaker: CircuitBreaker,
    private readonly logger: ILogger,
    private readonly options: TransferOptions,
  ) {}

  async execute(
    jobId: string,
    descriptor: ResourceDescriptor,
    targetPath: string,
    hooks: TransferHooks = {},
  ): Promise<string> {
    const partPath = partialPathFor(targetPath, this.options.partSuffix);

    try {
      if (!descriptor.url) {
        throw new Error(`Missing resource URL for ${descriptor.resourceId}`);
      }
      await this.prepareJob(jobId, descriptor, targetPath, partPath);
      await mkdir(dirname(targetPath), { recursive: true });

      const bytes = await this.retry.execute(
        () => this.moveBytes(jobId, descriptor, targetPath, partPath, hooks),
        { operationName: `transfer ${jobId}`, breaker: this.breaker },
      );

      return await this.finalize(jobId, targetPath, partPath, bytes);
    } catch (e) {
      const kind = errorKindOf(e);
      await this.recordFailure(jobId, kind, e);
      this.logger.log({
        level: "error",
        component: COMPONENT,
        jobId,
        kind,
        message: `Transfer failed: ${errorMessage(e)}`,
      });
      throw new TransferFailedError(kind, jobId, descriptor, e);
    }
  }

  private async prepareJob(
    jobId: string,
    descriptor: ResourceDescriptor,
    targetPath: string,
    partPath: string,
  ): Promise<JobState> {
    const existing = await this.store.getJob(jobId);

    if (!existing) {
      const job = createJobState(jobId, descriptor, targetPath);
      await this.store.putJob(job);
      this.logger.log({
        level: "info",
        component: COMPONENT,
        jobId,
        message: `Created job for ${descriptor.resourceId}`,
      });
      return job;
    }

    if (
      descriptor.variantId !== undefined &&
      existing.variantId !== descriptor.variantId
    ) {
      this.logger.log({
        level: "warn",
        component: COMPONENT,
        jobId,
        kind: "resource_changed",
        message: `Variant changed (${existing.variantId ?? "none"} -> ${descriptor.variantId}), restarting from zero`,
      });
      await rm(partPath, { force: true });
      const job = createJobState(jobId, descriptor, targetPath);
      await this.store.putJob({ ...job, retryCount: existing.retryCount });
      return job;
    }

    // Signed URLs rotate; keep the freshest one and any length we learn.
    const job: JobState = {
      ...existing,
      resourceUrl: descriptor.url,
      targetPath,
      totalLength: existing.totalLength ?? descriptor.expectedLength,
    };
    await this.store.putJob(job);
    this.logger.log({
      level: "info",
      component: COMPONENT,
      jobId,
      message: `Resuming job at ${existing.bytesCompleted} bytes`,
    });
    return job;
  }

  /** One attempt. Recomputes its offset so retries continue from the last checkpoint. */
  private async moveBytes(
    jobId: string,
    descriptor: ResourceDescriptor,
    targetPath: string,
    partPath: string,
    hooks: TransferHooks,
  ): Promise<number> {
    const info = await this.store.resumeInfo(jobId, targetPath);
    const job = await this.store.getJob(jobId);
    let offset = info.offset;

    const onDisk = (await fileSize(partPath)) ?? 0;
    if (offset > onDisk) {
      this.logger.log({
        level: "warn",
        component: COMPONENT,
        jobId,
        kind: "state_inconsistency",
        message: `Checkpoint at ${offset} bytes but partial file holds ${onDisk}, continuing from ${onDisk}`,
      });
      offset = onDisk;
    }

    const knownTotal = job?.totalLength ?? descriptor.expectedLength;
    if (knownTotal !== undefined && offset > 0) {
      if (offset === knownTotal) return offset;
      if (offset > knownTotal) {
        this.logger.log({
          level: "warn",
          component: COMPONENT,
          jobId,
          kind: "state_inconsistency",
          message: `Partial file (${offset} bytes) exceeds resource length ${knownTotal}, restarting from zero`,
        });
        offset = 0;
      }
    }

    const url = job?.resourceUrl ?? descriptor.url;
    const plan = await this.openStream(jobId, url, offset, info);
    if (!plan) {
      this.logger.log({
        level: "info",
        component: COMPONENT,
        jobId,
        message: `Partial file already complete at ${offset} bytes`,
      });
      return offset;
    }
    const total = plan.total ?? knownTotal;

    if (job && total !== undefined && job.totalLength !== total) {
      await this.store.putJob({ ...job, totalLength: total });
    }

    return this.writeStream(jobId, partPath, plan.response, plan.offset, total, hooks);
  }

  private async openStream(
    jobId: string,
    url: string,
    offset: number,
    info: ResumeInfo,
  ): Promise<StreamPlan | null> {
    if (offset === 0) return this.openFresh(url);

    const res = await this.transport.request({
      url,
      headers: { Range: `bytes=${offset}-` },
    });

    if (res.statusCode === 206) {
      if (!validatorsChanged(info, res)) {
        return {
          response: res,
          offset,
          total: totalFromContentRange(res.headers["content-range"]),
        };
      }
      this.logger.log({
        level: "warn",
        component: COMPONENT,
        jobId,
        kind: "resource_changed",
        message: "Validator mismatch, restarting from zero",
        data: { expectedEtag: info.etag, etag: res.headers["etag"] },
      });
      await res.discard();
      return this.openFresh(url);
    }

    await res.discard();
    // The partial file already holds the whole resource.
    if (
      res.statusCode === 416 &&
      totalFromContentRange(res.headers["content-range"]) === offset
    ) {
      return null;
    }
    throw new HttpStatusError(res.statusCode, `Range request failed for ${jobId}`);
  }

  private async openFresh(url: string): Promise<StreamPlan> {
    const res = await this.transport.request({ url });
    if (res.statusCode !== 200) {
      await res.discard();
      throw new HttpStatusError(res.statusCode, "Download request failed");
    }
    return { response: res, offset: 0, total: contentLength(res) };
  }

  private async writeStream(
    jobId: string,
    partPath: string,
    res: TransportResponse,
    offset: number,
    total: number | undefined,
    hooks: TransferHooks,
  ): Promise<number> {
    const etag = res.headers["etag"];
    const lastModified = res.headers["last-modified"];
    const every = Math.max(1, this.options.checkpointEveryChunks);

    let bytes = offset;
    let chunks = 0;
    const handle = await open(partPath, offset > 0 ? "a" : "w");
    try {
      for await (const chunk of res.body) {
        if (chunk.length === 0) continue;
        await handle.write(chunk);
        bytes += chunk.length;
        chunks++;
        hooks.onProgress?.(bytes, total);
        if (chunks % every === 0) {
          await this.store.updateProgress(jobId, bytes, etag, lastModified);
        }
      }
    } finally {
      await handle.close();
      await this.store.updateProgress(jobId, bytes, etag, lastModified);
    }

    if (total !== undefined && bytes < total) {
      throw new Error(
        `connection reset: transfer ended at ${bytes} of ${total} bytes`,
      );
    }
    return bytes;
  }

  private async finalize(
    jobId: string,
    targetPath: string,
    partPath: string,
    bytes: number,
  ): Promise<string> {
    if ((await fileSize(partPath)) === null) {
      throw new Error(`Part file not found: ${partPath}`);
    }
    await rm(targetPath, { force: true });
    await rename(partPath, targetPath);
    const size = (await stat(targetPath)).size;

    const job = await this.store.getJob(jobId);
    if (job) {
      await this.store.putJob({
        ...job,
        status: "completed",
        bytesCompleted: size,
        totalLength: size,
        lastSuccessAt: new Date().toISOString(),
        errorMessage: undefined,
      });
    }
    await this.store.deleteJob(jobId);

    this.logger.log({
      level: "info",
      component: COMPONENT,
      jobId,
      message: `Completed: ${targetPath} (${size} bytes)`,
      data: { bytesMoved: bytes },
    });
    return targetPath;
  }

  private async recordFailure(
    jobId: string,
    kind: TransferFailedError["kind"],
    cause: unknown,
  ): Promise<void> {
    const job = await this.store.getJob(jobId);
    if (!job) return;
    const fatal = kind === "terminal_request" || kind === "extraction_failure";
    await this.store.putJob({
      ...job,
      status: fatal ? "failed" : job.status,
      retryCount: job.retryCount + 1,
      errorMessage: errorMessage(cause),
    });
  }
}
