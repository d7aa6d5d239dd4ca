import PQueue from "p-queue";
import type { ResourceDescriptor } from "../domain/entities/resource-descriptor.entity.js";
import type { ILogger } from "../domain/services/logger.service.js";
import type { ErrorKind } from "../domain/errors.js";
import { TransferFailedError, errorMessage } from "../domain/errors.js";
import type { TransferResourceUseCase } from "./transfer-resource.use-case.js";

export interface TransferItem {
  jobId: string;
  descriptor: ResourceDescriptor;
  targetPath: string;
}

export type TransferOutcome =
  | { jobId: string; status: "completed"; path: string }
  | { jobId: string; status: "failed"; kind: ErrorKind; errorMessage: string }
  | { jobId: string; status: "skipped" };

export interface RunTransfersRequest {
  items: TransferItem[];
  concurrency?: number;
  requestsPerSecond?: number;
  /** Aborting clears queued transfers; ones already running finish. */
  signal?: AbortSignal;
  onProgress?: (jobId: string, bytes: number, total?: number) => void;
  onSettled?: (outcome: TransferOutcome, done: number, total: number) => void;
}

/** The part of a transfer the runner drives. */
export type TransferRunner = Pick<TransferResourceUseCase, "execute">;

interface QueueOptions {
  concurrency: number;
  intervalCap?: number;
  interval?: number;
}

/** Fractional rates below one request a second widen the interval instead. */
export function limiterOptions(
  concurrency: number,
  requestsPerSecond?: number,
): QueueOptions {
  const options: QueueOptions = { concurrency: Math.max(1, concurrency) };
  if (requestsPerSecond && requestsPerSecond > 0) {
    if (requestsPerSecond >= 1) {
      options.intervalCap = Math.floor(requestsPerSecond);
      options.interval = 1000;
    } else {
      options.intervalCap = 1;
      options.interval = Math.round(1000 / requestsPerSecond);
    }
  }
  return options;
}

export class RunTransfersUseCase {
  constructor(
    private readonly transfer: TransferRunner,
    private readonly logger: ILogger,
  ) {}

  async execute(request: RunTransfersRequest): Promise<TransferOutcome[]> {
    const { items, signal } = request;
    const queue = new PQueue(
      limiterOptions(request.concurrency ?? 3, request.requestsPerSecond),
    );
    const outcomes = new Map<string, TransferOutcome>();
    const total = items.length;
    let done = 0;

    const settle = (outcome: TransferOutcome) => {
      outcomes.set(outcome.jobId, outcome);
      done++;
      try {
        request.onSettled?.(outcome, done, total);
      } catch (e) {
        this.logger.log({
          level: "error",
          component: "runner",
          jobId: outcome.jobId,
          message: `onSettled callback failed: ${errorMessage(e)}`,
        });
      }
    };

    const onAbort = () => {
      this.logger.log({
        level: "warn",
        component: "runner",
        message: `Shutdown requested, dropping ${queue.size} queued transfer(s); ${queue.pending} in flight will finish`,
      });
      queue.clear();
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      for (const item of items) {
        if (signal?.aborted) break;
        void queue.add(async () => {
          if (signal?.aborted) return;
          settle(await this.runOne(item, request));
        });
      }
      await queue.onIdle();
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }

    return items.map(
      (item) =>
        outcomes.get(item.jobId) ?? { jobId: item.jobId, status: "skipped" },
    );
  }

  /** Never rejects: failures become outcomes. */
  private async runOne(
    item: TransferItem,
    request: RunTransfersRequest,
  ): Promise<TransferOutcome> {
    try {
      const path = await this.transfer.execute(
        item.jobId,
        item.descriptor,
        item.targetPath,
        {
          onProgress: (bytes, total) =>
            request.onProgress?.(item.jobId, bytes, total),
        },
      );
      return { jobId: item.jobId, status: "completed", path };
    } catch (e) {
      const kind: ErrorKind =
        e instanceof TransferFailedError ? e.kind : "terminal_request";
      return {
        jobId: item.jobId,
        status: "failed",
        kind,
        errorMessage: errorMessage(e),
      };
    }
  }
}
