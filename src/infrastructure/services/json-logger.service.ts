import { createWriteStream, mkdirSync, existsSync, WriteStream } from "node:fs";
import { join } from "node:path";
import type {
  ILogger,
  LogEntry,
} from "../../core/domain/services/logger.service.js";

/**
 * JSON lines, one file per run. With echo on (the default when stdout is
 * piped) every entry is also written as a `LOG` line for the parent process.
 */
export class JsonLogger implements ILogger {
  private logStream: WriteStream | null = null;
  private runId = "";

  constructor(
    private logDir: string,
    private logNameTemplate: string,
    private echo: boolean = !process.stdout.isTTY,
  ) {}

  init(runId: string): void {
    this.runId = runId;
    if (!existsSync(this.logDir)) mkdirSync(this.logDir, { recursive: true });
    const filename =
      this.logNameTemplate.replace(/\.[^.]+$/, "") + `_${runId}.jsonl`;
    const path = join(this.logDir, filename);
    this.logStream = createWriteStream(path, { flags: "a" });
  }

  log(entry: LogEntry): void {
    if (this.logStream?.writable) {
      const full = {
        timestamp: new Date().toISOString(),
        runId: this.runId,
        ...entry,
      };
      this.logStream.write(JSON.stringify(full) + "\n");
    }
    if (this.echo) {
      const prefix = entry.jobId ? `[${entry.component}:${entry.jobId}]` : `[${entry.component}]`;
      process.stdout.write(`LOG\t${entry.level}\t${prefix} ${entry.message}\n`);
    }
  }

  close(): void {
    if (this.logStream) {
      this.logStream.end();
      this.logStream = null;
    }
  }
}
