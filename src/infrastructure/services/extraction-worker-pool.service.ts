import { Worker } from "node:worker_threads";
import PQueue from "p-queue";
import { z } from "zod";
import type { FieldRule } from "../../core/domain/entities/artifact-record.entity.js";
import type { IExtractionPool } from "../../core/domain/services/field-extractor.service.js";
import { RegexFieldExtractor } from "./regex-field-extractor.service.js";

/**
 * Evaluated inside the worker. Mirrors RegexFieldExtractor.extractAll so
 * inline and pooled extraction agree.
 */
const WORKER_SOURCE = `
const { parentPort, workerData } = require("node:worker_threads");
function firstMatch(text, patterns, flags) {
  for (const source of patterns) {
    const match = new RegExp(source, flags).exec(text);
    if (match) return match[1] !== undefined ? match[1] : match[0];
  }
  return null;
}
const out = {};
for (const rule of workerData.rules) {
  out[rule.name] = firstMatch(workerData.text, rule.patterns, rule.flags || "");
}
parentPort.postMessage(out);
`;

const WorkerResultSchema = z.record(z.string(), z.string().nullable());

export interface ExtractionPoolOptions {
  /** 0 runs extraction inline on the caller's thread. */
  maxWorkers: number;
  timeoutMs: number;
}

/**
 * Bounded pool for CPU-heavy pattern extraction over large documents.
 * At most maxWorkers worker threads run at once; excess requests queue.
 */
export class ExtractionWorkerPool implements IExtractionPool {
  private readonly queue: PQueue;
  private readonly inline = new RegexFieldExtractor();
  private readonly active = new Set<Worker>();
  private closed = false;

  constructor(private readonly options: ExtractionPoolOptions) {
    this.queue = new PQueue({ concurrency: Math.max(1, options.maxWorkers) });
  }

  async extractAll(
    text: string,
    rules: FieldRule[],
  ): Promise<Record<string, string | null>> {
    if (this.closed) throw new Error("Extraction pool is closed");
    if (this.options.maxWorkers === 0) {
      return this.inline.extractAll(text, rules);
    }
    return this.queue.add(() => this.runInWorker(text, rules), {
      throwOnTimeout: true,
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    this.queue.clear();
    await this.queue.onIdle();
    await Promise.all([...this.active].map((w) => w.terminate()));
  }

  private runInWorker(
    text: string,
    rules: FieldRule[],
  ): Promise<Record<string, string | null>> {
    return new Promise((resolve, reject) => {
      const worker = new Worker(WORKER_SOURCE, {
        eval: true,
        workerData: { text, rules },
      });
      this.active.add(worker);
      let settled = false;
      let timedOut = false;

      const timeoutError = () =>
        new Error(`Field extraction timed out after ${this.options.timeoutMs}ms`);

      const finish = (fn: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.active.delete(worker);
        fn();
      };

      const timer = setTimeout(() => {
        timedOut = true;
        worker.terminate().then(
          () => finish(() => reject(timeoutError())),
          (err: unknown) => finish(() => reject(err)),
        );
      }, this.options.timeoutMs);

      worker.once("message", (message: unknown) => {
        const parsed = WorkerResultSchema.safeParse(message);
        finish(() =>
          parsed.success
            ? resolve(parsed.data)
            : reject(new Error("Malformed extraction result from worker")),
        );
      });
      worker.once("error", (err) => finish(() => reject(err)));
      worker.once("exit", (code) =>
        finish(() =>
          reject(
            timedOut
              ? timeoutError()
              : new Error(`Extraction worker exited with code ${code}`),
          ),
        ),
      );
    });
  }
}
