import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { JsonLogger } from "../../src/infrastructure/services/json-logger.service.js";

describe("JsonLogger", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "extractor-logs-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("writes one JSON line per entry into a per-run file", async () => {
    const logger = new JsonLogger(join(dir, "logs"), "extractor.jsonl", false);
    logger.init("run_1");
    logger.log({ level: "info", component: "transfer", jobId: "j1", message: "started" });
    logger.log({
      level: "warn",
      component: "state",
      message: "drift",
      kind: "state_inconsistency",
      data: { offset: 3 },
    });
    logger.close();

    const path = join(dir, "logs", "extractor_run_1.jsonl");
    await vi.waitFor(async () => {
      const lines = (await readFile(path, "utf-8")).trim().split("\n");
      expect(lines).toHaveLength(2);
    });

    const lines = (await readFile(path, "utf-8")).trim().split("\n");
    const [first, second] = lines.map((l): unknown => JSON.parse(l));
    expect(first).toMatchObject({
      runId: "run_1",
      level: "info",
      component: "transfer",
      jobId: "j1",
      message: "started",
    });
    expect(second).toMatchObject({ kind: "state_inconsistency", data: { offset: 3 } });
  });

  it("echoes LOG lines for a parent process when asked", () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const logger = new JsonLogger(join(dir, "logs"), "extractor.jsonl", true);

    logger.log({ level: "info", component: "transfer", jobId: "j1", message: "hello" });
    logger.log({ level: "error", component: "artifact", message: "Sync failed" });

    expect(write.mock.calls.map((c) => c[0])).toEqual([
      "LOG\tinfo\t[transfer:j1] hello\n",
      "LOG\terror\t[artifact] Sync failed\n",
    ]);
  });
});
