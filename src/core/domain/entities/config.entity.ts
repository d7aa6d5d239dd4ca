import type { FieldRule } from "./artifact-record.entity.js";

export interface TransportConfig {
  timeoutMs: number;
  headers: Record<string, string>;
}

export interface RetryConfig {
  maxRetries: number;
  backoffBase: number;
  jitterMaxSeconds: number;
}

export interface BreakerConfig {
  failureThreshold: number;
  recoveryTimeoutSeconds: number;
  recoveryThreshold: number;
}

export interface TransferConfig {
  outputDir: string;
  partSuffix: string;
  /** Chunks written between two progress checkpoints. */
  checkpointEveryChunks: number;
  concurrency: number;
  requestsPerSecond?: number;
}

export type StateDriver = "sqlite" | "json";

export interface StateConfig {
  driver: StateDriver;
  dir: string;
  artifactMaxAgeHours: number;
}

export interface ArtifactConfig {
  sourceUrl: string;
  referencePatterns: string[];
  ttlSeconds: number;
  cacheSize: number;
  /** 0 runs extraction on the calling thread. */
  maxWorkers: number;
  extractionTimeoutMs: number;
  extractionVersion: string;
  fields: FieldRule[];
}

export interface LoggingConfig {
  dir: string;
  file: string;
  echo: boolean;
}

export interface Config {
  transport: TransportConfig;
  retry: RetryConfig;
  breaker: BreakerConfig;
  transfer: TransferConfig;
  state: StateConfig;
  artifact: ArtifactConfig;
  logging: LoggingConfig;
}
