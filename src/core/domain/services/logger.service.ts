import type { ErrorKind } from "../errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  component: string;
  message: string;
  jobId?: string;
  kind?: ErrorKind;
  data?: Record<string, unknown>;
}

export interface ILogger {
  init(runId: string): void;
  log(entry: LogEntry): void;
  close(): void;
}
