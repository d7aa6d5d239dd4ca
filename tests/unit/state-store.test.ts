import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { IStateStore } from "../../src/core/domain/repositories/state-store.repository.js";
import type { ArtifactRecord } from "../../src/core/domain/entities/artifact-record.entity.js";
import { createJobState } from "../../src/core/domain/entities/job-state.entity.js";
import { SqliteStateStore } from "../../src/infrastructure/database/sqlite-state-store.repository.js";
import { JsonStateStore } from "../../src/infrastructure/database/json-state-store.repository.js";
import { createTestLogger, type TestLogger } from "../helpers/test-logger.js";

const HOUR = 3600 * 1000;
const NOW = new Date("2026-03-01T12:00:00.000Z");

type StoreFactory = (dir: string, logger: TestLogger) => IStateStore;

const drivers: Array<[string, StoreFactory]> = [
  [
    "sqlite",
    (dir, logger) =>
      new SqliteStateStore(join(dir, "state.sqlite"), {
        artifactTtlMs: HOUR,
        partSuffix: ".part",
        logger,
        now: () => NOW,
      }),
  ],
  [
    "json",
    (dir, logger) =>
      new JsonStateStore(join(dir, "state"), {
        artifactTtlMs: HOUR,
        partSuffix: ".part",
        logger,
        now: () => NOW,
      }),
  ],
];

function artifact(
  versionId: string,
  createdAt: string,
  sourceUrl = "https://cdn.test/player/abc/base.js",
): ArtifactRecord {
  return {
    versionId,
    sourceUrl,
    extractedFields: {
      required: { signatureTimestamp: "20123" },
      optional: { decipherFunction: null },
    },
    extractionVersion: "1",
    createdAt,
    lastValidatedAt: createdAt,
    failureCount: 0,
  };
}

describe.each(drivers)("%s state store", (_name, factory) => {
  let dir: string;
  let logger: TestLogger;
  let store: IStateStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "extractor-state-"));
    logger = createTestLogger();
    store = factory(dir, logger);
    await store.initialize();
  });

  afterEach(async () => {
    await store.close();
    await rm(dir, { recursive: true, force: true });
  });

  describe("jobs", () => {
    it("round-trips a job and returns null for unknown ids", async () => {
      const job = createJobState(
        "clip_1",
        { resourceId: "clip", url: "https://media.test/clip", variantId: "137", etag: '"v1"' },
        join(dir, "clip.mp4"),
        NOW,
      );
      await store.putJob(job);

      expect(await store.getJob("clip_1")).toEqual(job);
      expect(await store.getJob("missing")).toBeNull();
    });

    it("checkpoints progress, keeping validators when none are given", async () => {
      const job = createJobState(
        "clip_1",
        { resourceId: "clip", url: "https://media.test/clip", etag: '"v1"' },
        join(dir, "clip.mp4"),
        NOW,
      );
      await store.putJob(job);

      await store.updateProgress("clip_1", 4096);
      expect(await store.getJob("clip_1")).toMatchObject({
        bytesCompleted: 4096,
        etag: '"v1"',
        status: "in_progress",
      });

      await store.updateProgress("clip_1", 8192, '"v2"', "Sun, 01 Mar 2026 10:00:00 GMT");
      expect(await store.getJob("clip_1")).toMatchObject({
        bytesCompleted: 8192,
        etag: '"v2"',
        lastModified: "Sun, 01 Mar 2026 10:00:00 GMT",
      });
    });

    it("logs and ignores progress for an unknown job", async () => {
      await store.updateProgress("ghost", 10);
      expect(await store.getJob("ghost")).toBeNull();
      expect(logger.entries).toContainEqual(
        expect.objectContaining({
          kind: "state_inconsistency",
          message: "Cannot update progress for unknown job ghost",
        }),
      );
    });

    it("lists only pending and in-progress jobs as incomplete", async () => {
      const base = { resourceId: "r", url: "https://media.test/r" };
      await store.putJob({ ...createJobState("a", base, join(dir, "a"), NOW), status: "pending" });
      await store.putJob({ ...createJobState("b", base, join(dir, "b"), NOW), status: "in_progress" });
      await store.putJob({ ...createJobState("c", base, join(dir, "c"), NOW), status: "failed" });
      await store.putJob({ ...createJobState("d", base, join(dir, "d"), NOW), status: "completed" });

      const incomplete = (await store.listIncompleteJobs()).map((j) => j.jobId).sort();
      expect(incomplete).toEqual(["a", "b"]);
      expect((await store.listJobs()).map((j) => j.jobId).sort()).toEqual(["a", "b", "c", "d"]);
    });

    it("deletes jobs", async () => {
      await store.putJob(createJobState("a", { resourceId: "r", url: "https://media.test/r" }, join(dir, "a"), NOW));
      await store.deleteJob("a");
      expect(await store.getJob("a")).toBeNull();
    });
  });

  describe("resumeInfo", () => {
    const target = () => join(dir, "movie.mp4");

    it("is zero for an unknown job", async () => {
      expect(await store.resumeInfo("nope", target())).toEqual({ offset: 0 });
    });

    it("is zero when the partial file is gone", async () => {
      await store.putJob({
        ...createJobState("m", { resourceId: "m", url: "https://media.test/m", etag: '"e"' }, target(), NOW),
        bytesCompleted: 5000,
      });
      expect(await store.resumeInfo("m", target())).toEqual({ offset: 0, etag: '"e"' });
    });

    it("takes the partial file size when it is ahead of the checkpoint", async () => {
      await store.putJob({
        ...createJobState("m", { resourceId: "m", url: "https://media.test/m" }, target(), NOW),
        bytesCompleted: 2000,
      });
      await writeFile(target() + ".part", Buffer.alloc(3000));
      expect((await store.resumeInfo("m", target())).offset).toBe(3000);
    });

    it("takes the checkpoint when it is ahead of the partial file", async () => {
      await store.putJob({
        ...createJobState("m", { resourceId: "m", url: "https://media.test/m" }, target(), NOW),
        bytesCompleted: 4000,
      });
      await writeFile(target() + ".part", Buffer.alloc(3000));
      expect((await store.resumeInfo("m", target())).offset).toBe(4000);
    });
  });

  describe("artifacts", () => {
    it("stores and finds a live artifact by version and by source URL", async () => {
      const record = artifact("v-live", "2026-03-01T11:30:00.000Z");
      await store.putArtifact(record);

      expect(await store.getArtifact("v-live")).toEqual(record);
      expect(
        await store.findArtifactBySourceUrl("https://cdn.test/player/abc/base.js"),
      ).toEqual(record);
      expect(await store.findArtifactBySourceUrl("https://cdn.test/other.js")).toBeNull();
    });

    it("hides artifacts older than the TTL", async () => {
      await store.putArtifact(artifact("v-old", "2026-03-01T10:59:59.000Z"));
      expect(await store.getArtifact("v-old")).toBeNull();
      expect(
        await store.findArtifactBySourceUrl("https://cdn.test/player/abc/base.js"),
      ).toBeNull();
    });

    it("updates failure count on re-put", async () => {
      const record = artifact("v1", "2026-03-01T11:30:00.000Z");
      await store.putArtifact(record);
      await store.putArtifact({ ...record, failureCount: 2 });
      expect((await store.getArtifact("v1"))?.failureCount).toBe(2);
    });

    it("prunes artifacts older than the given age", async () => {
      await store.putArtifact(artifact("recent", "2026-03-01T11:00:00.000Z", "https://cdn.test/a.js"));
      await store.putArtifact(artifact("stale", "2026-02-28T11:00:00.000Z", "https://cdn.test/b.js"));

      expect(await store.pruneArtifacts(24 * HOUR)).toBe(1);
      expect(await store.getArtifact("recent")).not.toBeNull();
      expect(await store.pruneArtifacts(24 * HOUR)).toBe(0);
    });
  });
});
