#!/usr/bin/env node
/**
 * Resilient Extractor – CLI
 * Commands: download | batch | resume | jobs | artifact | prune
 */

import { InvalidArgumentError, program } from "commander";
import { basename, join } from "node:path";
import { loadConfig, getConfigPath } from "./infrastructure/utils/config.utils.js";
import { generateJobId, runId as newRunId } from "./infrastructure/utils/id.utils.js";
import { loadManifest } from "./infrastructure/utils/manifest.utils.js";
import { Runtime } from "./infrastructure/runtime.js";
import type {
  RunTransfersRequest,
  TransferItem,
  TransferOutcome,
} from "./core/use-cases/run-transfers.use-case.js";
import { errorMessage } from "./core/domain/errors.js";

const stdoutPiped = !process.stdout.isTTY;

// ─── Shared helpers ───────────────────────────────────────────────────────────

function parseCount(value: string): number {
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n) || n < 0) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return n;
}

function parseRate(value: string): number {
  const n = Number.parseFloat(value);
  if (Number.isNaN(n) || n <= 0) {
    throw new InvalidArgumentError("Not a positive number.");
  }
  return n;
}

/** SIGINT/SIGTERM stop queued transfers; running ones finish and checkpoint. */
function shutdownSignal(): AbortSignal {
  const controller = new AbortController();
  const onSignal = (sig: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      process.exit(sig === "SIGTERM" ? 143 : 130);
    }
    console.error(`\n${sig} received, finishing in-flight transfers...`);
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  return controller.signal;
}

async function withRuntime<T>(
  label: string,
  fn: (runtime: Runtime) => Promise<T>,
): Promise<T | undefined> {
  try {
    const config = loadConfig(program.opts<{ config?: string }>().config);
    const id = newRunId();
    const runtime = new Runtime(config, id);
    if (stdoutPiped) process.stdout.write(`RUN_ID\t${id}\n`);
    try {
      await runtime.initialize();
      return await fn(runtime);
    } finally {
      await runtime.close();
    }
  } catch (e) {
    console.error(`${label} failed:`, errorMessage(e));
    process.exitCode = 1;
    return undefined;
  }
}

function transferHooks(): Pick<RunTransfersRequest, "onProgress" | "onSettled"> {
  const lastReported = new Map<string, number>();
  return {
    onProgress: (jobId, bytes, total) => {
      if (!stdoutPiped) return;
      // One line per MiB is plenty for the parent process.
      const bucket = Math.floor(bytes / (1024 * 1024));
      if (lastReported.get(jobId) === bucket && bytes !== total) return;
      lastReported.set(jobId, bucket);
      process.stdout.write(`TRANSFER_PROGRESS\t${jobId}\t${bytes}\t${total ?? ""}\n`);
    },
    onSettled: (outcome, done, total) => {
      lastReported.delete(outcome.jobId);
      if (stdoutPiped) {
        process.stdout.write(`TRANSFER_DONE\t${outcome.jobId}\t${outcome.status}\t${done}\t${total}\n`);
      }
    },
  };
}

function printSummary(outcomes: TransferOutcome[]): void {
  const count = (status: TransferOutcome["status"]) =>
    outcomes.filter((o) => o.status === status).length;

  console.log("\nTransfer Summary");
  console.log("----------------");
  console.log(`Completed: ${count("completed")}`);
  console.log(`Failed:    ${count("failed")}`);
  console.log(`Skipped:   ${count("skipped")}\n`);

  for (const o of outcomes) {
    if (o.status === "completed") console.log(`  ✓ ${o.jobId} → ${o.path}`);
    else if (o.status === "failed") console.log(`  ✗ ${o.jobId} [${o.kind}] ${o.errorMessage}`);
    else console.log(`  - ${o.jobId} (not started)`);
  }

  if (count("failed") > 0) process.exitCode = 1;
}

async function runItems(
  runtime: Runtime,
  items: TransferItem[],
  opts: { concurrency?: number; rps?: number },
): Promise<void> {
  const { transfer } = runtime.config;
  const outcomes = await runtime.runTransfers.execute({
    items,
    concurrency: opts.concurrency ?? transfer.concurrency,
    requestsPerSecond: opts.rps ?? transfer.requestsPerSecond,
    signal: shutdownSignal(),
    ...transferHooks(),
  });
  printSummary(outcomes);
}

// ─── CLI ──────────────────────────────────────────────────────────────────────

program
  .name("resilient-extractor")
  .description("Resumable transfers and cached artifact extraction")
  .option("-c, --config <path>", "Config file path", getConfigPath());

interface DownloadOptions {
  resourceId?: string;
  jobId?: string;
  out?: string;
  expectedLength?: number;
}

program
  .command("download <url>")
  .description("Transfer one resource, resuming a previous job when --job-id is given")
  .option("--resource-id <id>", "Resource id (defaults to the URL's file name)")
  .option("--job-id <id>", "Resume or name this job")
  .option("-o, --out <path>", "Target file path")
  .option("--expected-length <bytes>", "Known resource length", parseCount)
  .action(async (url: string, opts: DownloadOptions) => {
    await withRuntime("Download", async (runtime) => {
      const resourceId =
        opts.resourceId ?? (basename(new URL(url).pathname) || "resource");
      const jobId = opts.jobId ?? generateJobId(resourceId);
      const targetPath =
        opts.out ?? join(runtime.config.transfer.outputDir, resourceId);

      console.log(`Job: ${jobId}`);
      await runItems(
        runtime,
        [
          {
            jobId,
            descriptor: { resourceId, url, expectedLength: opts.expectedLength },
            targetPath,
          },
        ],
        { concurrency: 1 },
      );
    });
  });

interface QueueCliOptions {
  concurrency?: number;
  rps?: number;
}

program
  .command("batch <manifest>")
  .description("Transfer every entry of a JSON manifest")
  .option("--concurrency <n>", "Parallel transfers", parseCount)
  .option("--rps <n>", "Transfers started per second", parseRate)
  .action(async (manifest: string, opts: QueueCliOptions) => {
    await withRuntime("Batch", async (runtime) => {
      const items = await loadManifest(manifest, runtime.config.transfer.outputDir);
      console.log(`Loaded ${items.length} transfer(s) from ${manifest}`);
      await runItems(runtime, items, opts);
    });
  });

interface ResumeCliOptions extends QueueCliOptions {
  includeFailed?: boolean;
}

program
  .command("resume")
  .description("Resume every incomplete job from its last checkpoint")
  .option("--include-failed", "Also retry jobs that failed terminally")
  .option("--concurrency <n>", "Parallel transfers", parseCount)
  .option("--rps <n>", "Transfers started per second", parseRate)
  .action(async (opts: ResumeCliOptions) => {
    await withRuntime("Resume", async (runtime) => {
      const { transfer } = runtime.config;
      const outcomes = await runtime.resumeJobs.execute({
        includeFailed: opts.includeFailed,
        concurrency: opts.concurrency ?? transfer.concurrency,
        requestsPerSecond: opts.rps ?? transfer.requestsPerSecond,
        signal: shutdownSignal(),
        ...transferHooks(),
      });
      if (outcomes.length === 0) {
        console.log("Nothing to resume.");
        return;
      }
      printSummary(outcomes);
    });
  });

program
  .command("jobs")
  .description("List persisted transfer jobs")
  .option("--all", "Include failed jobs")
  .action(async (opts: { all?: boolean }) => {
    await withRuntime("Jobs", async (runtime) => {
      const jobs = opts.all
        ? await runtime.store.listJobs()
        : await runtime.store.listIncompleteJobs();
      if (jobs.length === 0) {
        console.log("No jobs.");
        return;
      }
      for (const job of jobs) {
        const total = job.totalLength !== undefined ? `/${job.totalLength}` : "";
        const error = job.errorMessage ? `  (${job.errorMessage})` : "";
        console.log(
          `${job.jobId}\t${job.status}\t${job.bytesCompleted}${total}\tretries=${job.retryCount}\t${job.targetPath}${error}`,
        );
      }
    });
  });

program
  .command("artifact")
  .description("Synchronise the signing artifact and print its fields")
  .option("--force", "Refresh even if the cached artifact is still fresh")
  .action(async (opts: { force?: boolean }) => {
    await withRuntime("Artifact sync", async (runtime) => {
      const cache = runtime.artifactCache();
      const record = await cache.getCurrent(opts.force === true);
      const stats = cache.stats();

      console.log(`Version:   ${record.versionId}`);
      console.log(`Source:    ${record.sourceUrl}`);
      console.log(`Created:   ${record.createdAt}`);
      console.log(`Failures:  ${record.failureCount}`);
      for (const [name, value] of Object.entries(record.extractedFields.required)) {
        console.log(`  ${name} = ${value}`);
      }
      for (const [name, value] of Object.entries(record.extractedFields.optional)) {
        console.log(`  ${name} = ${value ?? "(not found)"}`);
      }
      if (stdoutPiped) {
        process.stdout.write(
          `ARTIFACT\t${record.versionId}\thits=${stats.hits},misses=${stats.misses}\n`,
        );
      }
    });
  });

program
  .command("prune")
  .description("Delete stored artifacts older than the given age")
  .option("--max-age-hours <n>", "Age limit in hours", parseRate)
  .action(async (opts: { maxAgeHours?: number }) => {
    await withRuntime("Prune", async (runtime) => {
      const hours = opts.maxAgeHours ?? runtime.config.state.artifactMaxAgeHours;
      const removed = await runtime.store.pruneArtifacts(hours * 3600 * 1000);
      console.log(`Pruned ${removed} artifact(s) older than ${hours}h.`);
    });
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(errorMessage(e));
  process.exit(1);
});
