import type { Config } from "../core/domain/entities/config.entity.js";
import type { IStateStore } from "../core/domain/repositories/state-store.repository.js";
import type { ILogger } from "../core/domain/services/logger.service.js";
import type { ITransport } from "../core/domain/services/transport.service.js";
import { TransferResourceUseCase } from "../core/use-cases/transfer-resource.use-case.js";
import { RunTransfersUseCase } from "../core/use-cases/run-transfers.use-case.js";
import { ResumeIncompleteJobsUseCase } from "../core/use-cases/resume-incomplete-jobs.use-case.js";
import { createStateStore } from "./database/state-store.factory.js";
import {
  CircuitBreaker,
  breakerOptionsFromConfig,
} from "./resilience/circuit-breaker.js";
import { RetryExecutor } from "./resilience/retry-executor.js";
import { ArtifactCache } from "./services/artifact-cache.service.js";
import { ExtractionWorkerPool } from "./services/extraction-worker-pool.service.js";
import { JsonLogger } from "./services/json-logger.service.js";
import { RegexFieldExtractor } from "./services/regex-field-extractor.service.js";
import { UndiciTransport } from "./services/undici-transport.service.js";
import { requireArtifactSource } from "./utils/config.utils.js";

export interface RuntimeOverrides {
  logger?: ILogger;
  transport?: ITransport;
  store?: IStateStore;
}

/**
 * Wires one process's worth of collaborators. The artifact cache (and its
 * worker pool) is built on first use, since most commands never need it.
 */
export class Runtime {
  readonly logger: ILogger;
  readonly transport: ITransport;
  readonly store: IStateStore;
  readonly retry: RetryExecutor;
  readonly downloadBreaker: CircuitBreaker;
  readonly transfer: TransferResourceUseCase;
  readonly runTransfers: RunTransfersUseCase;
  readonly resumeJobs: ResumeIncompleteJobsUseCase;

  private cache: ArtifactCache | null = null;

  constructor(
    readonly config: Config,
    runId: string,
    overrides: RuntimeOverrides = {},
  ) {
    this.logger =
      overrides.logger ??
      new JsonLogger(config.logging.dir, config.logging.file, config.logging.echo);
    this.logger.init(runId);

    this.transport = overrides.transport ?? new UndiciTransport(config.transport);
    this.store =
      overrides.store ??
      createStateStore(config.state, {
        artifactTtlMs: config.artifact.ttlSeconds * 1000,
        partSuffix: config.transfer.partSuffix,
        logger: this.logger,
      });

    this.retry = new RetryExecutor(config.retry, this.logger);
    this.downloadBreaker = new CircuitBreaker(
      "download",
      breakerOptionsFromConfig(config.breaker),
      this.logger,
    );
    this.transfer = new TransferResourceUseCase(
      this.transport,
      this.store,
      this.retry,
      this.downloadBreaker,
      this.logger,
      {
        partSuffix: config.transfer.partSuffix,
        checkpointEveryChunks: config.transfer.checkpointEveryChunks,
      },
    );
    this.runTransfers = new RunTransfersUseCase(this.transfer, this.logger);
    this.resumeJobs = new ResumeIncompleteJobsUseCase(
      this.store,
      this.runTransfers,
      this.logger,
    );
  }

  async initialize(): Promise<void> {
    await this.store.initialize();
  }

  artifactCache(): ArtifactCache {
    if (this.cache) return this.cache;
    const { artifact } = this.config;
    const sourceUrl = requireArtifactSource(this.config);

    this.cache = new ArtifactCache(
      {
        transport: this.transport,
        store: this.store,
        extractor: new RegexFieldExtractor(),
        pool: new ExtractionWorkerPool({
          maxWorkers: artifact.maxWorkers,
          timeoutMs: artifact.extractionTimeoutMs,
        }),
        retry: this.retry,
        breaker: new CircuitBreaker(
          "artifact",
          breakerOptionsFromConfig(this.config.breaker),
          this.logger,
        ),
        logger: this.logger,
      },
      {
        sourceUrl,
        referencePatterns: artifact.referencePatterns,
        fields: artifact.fields,
        ttlMs: artifact.ttlSeconds * 1000,
        capacity: artifact.cacheSize,
        extractionVersion: artifact.extractionVersion,
      },
    );
    return this.cache;
  }

  async close(): Promise<void> {
    try {
      if (this.cache) await this.cache.close();
      await this.transport.close();
      await this.store.close();
    } finally {
      this.logger.close();
    }
  }
}
