import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { FieldRule } from "../../src/core/domain/entities/artifact-record.entity.js";
import { ExtractionFailureError } from "../../src/core/domain/errors.js";
import { SqliteStateStore } from "../../src/infrastructure/database/sqlite-state-store.repository.js";
import { CircuitBreaker } from "../../src/infrastructure/resilience/circuit-breaker.js";
import { RetryExecutor } from "../../src/infrastructure/resilience/retry-executor.js";
import { ArtifactCache } from "../../src/infrastructure/services/artifact-cache.service.js";
import { ExtractionWorkerPool } from "../../src/infrastructure/services/extraction-worker-pool.service.js";
import { RegexFieldExtractor } from "../../src/infrastructure/services/regex-field-extractor.service.js";
import { sha256Hex } from "../../src/infrastructure/utils/id.utils.js";
import { FakeTransport } from "../helpers/fake-transport.js";
import { createTestLogger, type TestLogger } from "../helpers/test-logger.js";

const SOURCE = "https://site.test/watch";
const TTL = 3600 * 1000;

const FIELDS: FieldRule[] = [
  {
    name: "signatureTimestamp",
    required: true,
    defaultValue: "19000",
    patterns: ['signatureTimestamp["\']?\\s*:\\s*(\\d+)'],
  },
  {
    name: "decipherFunction",
    required: false,
    patterns: ["signature=([a-zA-Z0-9$]+)\\("],
  },
];

/** A page embedding the artifact path JSON-escaped, as players do. */
function page(ref: string): string {
  return `<script>cfg={"jsUrl":"${ref.replace(/\//g, "\\/")}"}</script>`;
}

function artifactBody(sts: number): string {
  return `var cfg={signatureTimestamp:${sts}};a.sig=function(b){return signature=abc(b)}`;
}

describe("ArtifactCache", () => {
  let now: number;
  let logger: TestLogger;
  let transport: FakeTransport;
  let store: SqliteStateStore;
  let currentRef: string;

  function createCache(capacity = 10): ArtifactCache {
    return new ArtifactCache(
      {
        transport,
        store,
        extractor: new RegexFieldExtractor(),
        pool: new ExtractionWorkerPool({ maxWorkers: 0, timeoutMs: 1000 }),
        retry: new RetryExecutor(
          { maxRetries: 1, backoffBase: 2, jitterMaxSeconds: 0 },
          logger,
          vi.fn(async () => {}),
        ),
        breaker: new CircuitBreaker(
          "artifact",
          { failureThreshold: 5, recoveryTimeoutMs: 60_000, recoveryThreshold: 2 },
          logger,
          () => now,
        ),
        logger,
        now: () => now,
      },
      {
        sourceUrl: SOURCE,
        referencePatterns: ['"jsUrl"\\s*:\\s*"([^"]+\\.js)"'],
        fields: FIELDS,
        ttlMs: TTL,
        capacity,
        extractionVersion: "1",
      },
    );
  }

  beforeEach(async () => {
    now = Date.parse("2026-03-01T12:00:00.000Z");
    logger = createTestLogger();
    store = new SqliteStateStore(":memory:", {
      artifactTtlMs: TTL,
      partSuffix: ".part",
      logger,
      now: () => new Date(now),
    });
    await store.initialize();

    currentRef = "/s/player/aaa/base.js";
    transport = new FakeTransport()
      .route(SOURCE, () => ({ body: page(currentRef) }))
      .route("https://site.test/s/player/aaa/base.js", { body: artifactBody(20123) })
      .route("https://site.test/s/player/bbb/base.js", { body: artifactBody(20200) })
      .route("https://site.test/s/player/ccc/base.js", { body: artifactBody(20300) })
      .route("https://site.test/s/player/aaa-mirror/base.js", { body: artifactBody(20123) });
  });

  afterEach(async () => {
    await store.close();
  });

  it("synchronises, extracts fields and persists the record", async () => {
    const cache = createCache();
    const record = await cache.getCurrent();

    expect(record.versionId).toBe(sha256Hex(artifactBody(20123)));
    expect(record.sourceUrl).toBe("https://site.test/s/player/aaa/base.js");
    expect(record.extractedFields).toEqual({
      required: { signatureTimestamp: "20123" },
      optional: { decipherFunction: "abc" },
    });
    expect(record.failureCount).toBe(0);
    expect(record.createdAt).toBe("2026-03-01T12:00:00.000Z");
    expect(await store.getArtifact(record.versionId)).not.toBeNull();
    expect(cache.stats()).toMatchObject({
      size: 1,
      hits: 0,
      misses: 1,
      currentVersionId: record.versionId,
    });
  });

  it("serves the current artifact without network while fresh", async () => {
    const cache = createCache();
    await cache.getCurrent();
    now += TTL - 1;
    await cache.getCurrent();
    expect(transport.requests).toHaveLength(2);
  });

  it("shares one synchronisation between concurrent callers", async () => {
    const cache = createCache();
    const records = await Promise.all(
      Array.from({ length: 5 }, () => cache.getCurrent()),
    );
    expect(new Set(records.map((r) => r.versionId)).size).toBe(1);
    expect(transport.requestsFor(SOURCE)).toHaveLength(1);
  });

  it("reuses the in-memory record when the reference is unchanged", async () => {
    const cache = createCache();
    await cache.getCurrent();
    const refreshed = await cache.synchronize();

    expect(transport.requestsFor(SOURCE)).toHaveLength(2);
    expect(transport.requestsFor("https://site.test/s/player/aaa/base.js")).toHaveLength(1);
    expect(refreshed.versionId).toBe(sha256Hex(artifactBody(20123)));
    expect(cache.stats().hits).toBe(1);
  });

  it("consults the durable store before fetching the artifact body", async () => {
    await createCache().getCurrent();

    const restarted = createCache();
    const record = await restarted.getCurrent();

    expect(transport.requestsFor("https://site.test/s/player/aaa/base.js")).toHaveLength(1);
    expect(record.extractedFields.required).toEqual({ signatureTimestamp: "20123" });
    expect(restarted.stats()).toMatchObject({ hits: 1, misses: 0 });
  });

  it("recognises identical content served from a new URL", async () => {
    const cache = createCache();
    const first = await cache.getCurrent();

    currentRef = "/s/player/aaa-mirror/base.js";
    const second = await cache.getCurrent(true);

    expect(second.versionId).toBe(first.versionId);
    expect(cache.stats()).toMatchObject({ size: 1, misses: 1, hits: 1 });
  });

  it("evicts the oldest-created entry beyond capacity", async () => {
    const cache = createCache(2);
    const a = await cache.getCurrent();

    now += 1000;
    currentRef = "/s/player/bbb/base.js";
    const b = await cache.getCurrent(true);

    now += 1000;
    currentRef = "/s/player/ccc/base.js";
    const c = await cache.getCurrent(true);

    expect(cache.cachedVersionIds()).toEqual([b.versionId, c.versionId]);
    expect(cache.cachedVersionIds()).not.toContain(a.versionId);
    expect(c.extractedFields.required).toEqual({ signatureTimestamp: "20300" });
  });

  it("re-extracts once the TTL has passed", async () => {
    const cache = createCache();
    await cache.getCurrent();

    now += TTL + 1;
    const record = await cache.getCurrent();

    expect(transport.requestsFor("https://site.test/s/player/aaa/base.js")).toHaveLength(2);
    expect(record.createdAt).toBe(new Date(now).toISOString());
    expect(cache.stats().misses).toBe(2);
  });

  it("falls back to the current artifact when a refresh fails", async () => {
    const cache = createCache();
    const good = await cache.getCurrent();

    transport.route(SOURCE, { statusCode: 503 });
    const degraded = await cache.getCurrent(true);

    expect(degraded.versionId).toBe(good.versionId);
    expect(degraded.failureCount).toBe(1);
    // One attempt plus one retry.
    expect(transport.requestsFor(SOURCE)).toHaveLength(3);
    expect(logger.messages("artifact")).toContain(
      `Falling back to existing artifact v${good.versionId.slice(0, 12)}...`,
    );
  });

  it("propagates the failure when there is nothing to fall back to", async () => {
    transport.route(SOURCE, { statusCode: 404 });
    await expect(createCache().getCurrent()).rejects.toThrow(
      `Failed to fetch ${SOURCE}: HTTP 404 Not Found`,
    );
    expect(transport.requestsFor(SOURCE)).toHaveLength(1);
  });

  it("fails when the page carries no artifact reference", async () => {
    transport.route(SOURCE, { body: "<html>nothing here</html>" });
    await expect(createCache().getCurrent()).rejects.toBeInstanceOf(
      ExtractionFailureError,
    );
  });

  it("refuses to store a record without its required fields", async () => {
    transport.route("https://site.test/s/player/aaa/base.js", {
      body: "function nothing(){}",
    });
    const error = await createCache()
      .getCurrent()
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionFailureError);
    expect(error).toMatchObject({ field: "signatureTimestamp" });
    expect(
      await store.getArtifact(sha256Hex("function nothing(){}")),
    ).toBeNull();
  });
});
