import type { JobState } from "../domain/entities/job-state.entity.js";
import { descriptorFromJob } from "../domain/entities/job-state.entity.js";
import type { ResourceDescriptor } from "../domain/entities/resource-descriptor.entity.js";
import type { IJobStore } from "../domain/repositories/state-store.repository.js";
import type { ILogger } from "../domain/services/logger.service.js";
import { errorMessage } from "../domain/errors.js";
import type {
  RunTransfersRequest,
  RunTransfersUseCase,
  TransferOutcome,
} from "./run-transfers.use-case.js";

export interface ResumeIncompleteJobsRequest
  extends Omit<RunTransfersRequest, "items"> {
  /** Re-resolve a job's descriptor, e.g. when signed URLs have expired. */
  resolveDescriptor?: (job: JobState) => Promise<ResourceDescriptor>;
  /** Also retry jobs that ended in a terminal failure. */
  includeFailed?: boolean;
}

export class ResumeIncompleteJobsUseCase {
  constructor(
    private readonly store: IJobStore,
    private readonly runner: RunTransfersUseCase,
    private readonly logger: ILogger,
  ) {}

  async execute(
    request: ResumeIncompleteJobsRequest = {},
  ): Promise<TransferOutcome[]> {
    const { resolveDescriptor, includeFailed, ...runRequest } = request;
    const jobs = includeFailed
      ? (await this.store.listJobs()).filter((j) => j.status !== "completed")
      : await this.store.listIncompleteJobs();
    if (jobs.length === 0) {
      this.logger.log({
        level: "info",
        component: "resume",
        message: "No incomplete jobs to resume",
      });
      return [];
    }

    this.logger.log({
      level: "info",
      component: "resume",
      message: `Resuming ${jobs.length} ${includeFailed ? "unfinished" : "incomplete"} job(s)`,
    });

    const items: RunTransfersRequest["items"] = [];
    const unresolved: TransferOutcome[] = [];

    for (const job of jobs) {
      try {
        const descriptor = resolveDescriptor
          ? await resolveDescriptor(job)
          : descriptorFromJob(job);
        items.push({ jobId: job.jobId, descriptor, targetPath: job.targetPath });
      } catch (e) {
        this.logger.log({
          level: "error",
          component: "resume",
          jobId: job.jobId,
          message: `Could not resolve descriptor: ${errorMessage(e)}`,
        });
        unresolved.push({
          jobId: job.jobId,
          status: "failed",
          kind: "terminal_request",
          errorMessage: errorMessage(e),
        });
      }
    }

    const outcomes = await this.runner.execute({ ...runRequest, items });
    return [...unresolved, ...outcomes];
  }
}
