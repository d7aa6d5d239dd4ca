import { Mutex } from "async-mutex";
import type {
  ArtifactRecord,
  ExtractedFields,
  FieldRule,
} from "../../core/domain/entities/artifact-record.entity.js";
import { isArtifactExpired } from "../../core/domain/entities/artifact-record.entity.js";
import type { IArtifactStore } from "../../core/domain/repositories/state-store.repository.js";
import type {
  IExtractionPool,
  IFieldExtractor,
} from "../../core/domain/services/field-extractor.service.js";
import type { ILogger } from "../../core/domain/services/logger.service.js";
import type { ITransport } from "../../core/domain/services/transport.service.js";
import {
  ExtractionFailureError,
  HttpStatusError,
  errorMessage,
} from "../../core/domain/errors.js";
import type { CircuitBreaker } from "../resilience/circuit-breaker.js";
import type { RetryExecutor } from "../resilience/retry-executor.js";
import { errorKindOf } from "../resilience/failure-classifier.js";
import { md5Hex, sha256Hex } from "../utils/id.utils.js";

export interface ArtifactCacheOptions {
  /** Page that references the current versioned artifact. */
  sourceUrl: string;
  referencePatterns: string[];
  fields: FieldRule[];
  ttlMs: number;
  capacity: number;
  extractionVersion: string;
}

export interface ArtifactCacheDeps {
  transport: ITransport;
  store: IArtifactStore;
  extractor: IFieldExtractor;
  pool: IExtractionPool;
  retry: RetryExecutor;
  breaker: CircuitBreaker;
  logger: ILogger;
  now?: () => number;
}

export interface CacheEntry {
  record: ArtifactRecord;
  lastAccessedAt: number;
  hits: number;
}

export interface ArtifactCacheStats {
  size: number;
  hits: number;
  misses: number;
  currentVersionId: string | null;
  lastRefreshAt: string | null;
}

const COMPONENT = "artifact";

/**
 * Two-tier (memory, then durable store) cache of version-correlated signing
 * artifacts. All mutation happens under one mutex per instance; readers
 * only ever see a complete current record.
 */
export class ArtifactCache {
  private readonly entries = new Map<string, CacheEntry>();
  /** Provisional (URL-derived) id to the content-hash id it resolved to. */
  private readonly aliases = new Map<string, string>();
  private readonly mutex = new Mutex();
  private readonly now: () => number;

  private current: ArtifactRecord | null = null;
  private lastRefresh: number | null = null;
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly deps: ArtifactCacheDeps,
    private readonly options: ArtifactCacheOptions,
  ) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Current artifact, synchronising only when there is none, it has aged
   * past the TTL, or a refresh is forced. Concurrent callers share one
   * synchronisation.
   */
  async getCurrent(forceRefresh = false): Promise<ArtifactRecord> {
    const fresh = this.freshCurrent();
    if (fresh && !forceRefresh) return fresh;

    return this.mutex.runExclusive(async () => {
      const settled = this.freshCurrent();
      if (settled && !forceRefresh) return settled;
      return this.synchronizeLocked();
    });
  }

  async synchronize(): Promise<ArtifactRecord> {
    return this.mutex.runExclusive(() => this.synchronizeLocked());
  }

  stats(): ArtifactCacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      currentVersionId: this.current?.versionId ?? null,
      lastRefreshAt:
        this.lastRefresh === null
          ? null
          : new Date(this.lastRefresh).toISOString(),
    };
  }

  /** Version ids held in memory, oldest first. */
  cachedVersionIds(): string[] {
    return [...this.entries.values()]
      .sort((a, b) => a.record.createdAt.localeCompare(b.record.createdAt))
      .map((e) => e.record.versionId);
  }

  async close(): Promise<void> {
    await this.mutex.runExclusive(() => this.deps.pool.close());
  }

  private freshCurrent(): ArtifactRecord | null {
    if (!this.current || this.lastRefresh === null) return null;
    if (this.now() - this.lastRefresh > this.options.ttlMs) return null;
    return this.current;
  }

  private async synchronizeLocked(): Promise<ArtifactRecord> {
    const { logger } = this.deps;
    logger.log({
      level: "info",
      component: COMPONENT,
      message: "Syncing artifact...",
    });

    try {
      const document = await this.fetchText(
        this.options.sourceUrl,
        "artifact_source",
      );
      const reference = this.resolveReference(document);
      const provisionalId = md5Hex(reference);

      const byReference = await this.lookupByReference(provisionalId, reference);
      if (byReference) return this.promote(byReference);

      logger.log({
        level: "info",
        component: COMPONENT,
        message: `Fetching artifact: ${reference}`,
      });
      const body = await this.fetchText(reference, "artifact_body");
      const versionId = sha256Hex(body);

      // Same content behind a new URL.
      const byContent = await this.lookupByVersion(versionId);
      if (byContent) {
        this.aliases.set(provisionalId, versionId);
        return this.promote(byContent);
      }

      this.misses++;
      const extractedFields = await this.extractFields(body);
      const createdAt = new Date(this.now()).toISOString();
      const record: ArtifactRecord = {
        versionId,
        sourceUrl: reference,
        extractedFields,
        extractionVersion: this.options.extractionVersion,
        createdAt,
        lastValidatedAt: createdAt,
        failureCount: 0,
      };

      this.insert(record, provisionalId);
      await this.deps.store.putArtifact(record);

      logger.log({
        level: "info",
        component: COMPONENT,
        message: `Synced successfully: v${versionId.slice(0, 12)}...`,
        data: { requiredFields: Object.keys(extractedFields.required) },
      });
      return this.promote(record);
    } catch (e) {
      logger.log({
        level: "error",
        component: COMPONENT,
        message: `Sync failed: ${errorMessage(e)}`,
        kind: errorKindOf(e),
      });
      if (!this.current) throw e;

      logger.log({
        level: "warn",
        component: COMPONENT,
        message: `Falling back to existing artifact v${this.current.versionId.slice(0, 12)}...`,
      });
      const degraded: ArtifactRecord = {
        ...this.current,
        failureCount: this.current.failureCount + 1,
      };
      this.replaceRecord(degraded);
      return degraded;
    }
  }

  private async fetchText(url: string, operationName: string): Promise<string> {
    return this.deps.retry.execute(
      async () => {
        const res = await this.deps.transport.request({ url });
        if (res.statusCode !== 200) {
          await res.discard();
          throw new HttpStatusError(res.statusCode, `Failed to fetch ${url}`);
        }
        return res.text();
      },
      { breaker: this.deps.breaker, operationName },
    );
  }

  private resolveReference(document: string): string {
    const match = this.deps.extractor.extract(
      document,
      this.options.referencePatterns,
    );
    if (!match) {
      throw new ExtractionFailureError(
        "reference",
        "Failed to extract artifact reference URL from source document",
      );
    }
    const path = match.replace(/\\\//g, "/");
    return new URL(path, this.options.sourceUrl).toString();
  }

  private async extractFields(body: string): Promise<ExtractedFields> {
    const values = await this.deps.pool.extractAll(body, this.options.fields);
    const required: Record<string, string> = {};
    const optional: Record<string, string | null> = {};

    for (const rule of this.options.fields) {
      const value = values[rule.name] ?? null;
      if (!rule.required) {
        optional[rule.name] = value;
        continue;
      }
      if (value === null) {
        this.deps.logger.log({
          level: "error",
          component: COMPONENT,
          message: `Required field "${rule.name}" not found${
            rule.defaultValue !== undefined
              ? ` (known default ${rule.defaultValue} not applied)`
              : ""
          }`,
          kind: "extraction_failure",
        });
        throw new ExtractionFailureError(
          rule.name,
          `Failed to extract required field "${rule.name}"`,
        );
      }
      required[rule.name] = value;
    }

    return { required, optional };
  }

  private async lookupByReference(
    provisionalId: string,
    reference: string,
  ): Promise<ArtifactRecord | null> {
    const aliased = this.aliases.get(provisionalId);
    if (aliased) {
      const entry = this.memoryHit(aliased);
      if (entry) return entry;
    }

    const stored = await this.deps.store.findArtifactBySourceUrl(reference);
    if (stored) {
      this.insert(stored, provisionalId);
      this.hits++;
      this.logCacheHit(stored, "disk");
      return stored;
    }
    return null;
  }

  private async lookupByVersion(versionId: string): Promise<ArtifactRecord | null> {
    const entry = this.memoryHit(versionId);
    if (entry) return entry;

    const stored = await this.deps.store.getArtifact(versionId);
    if (stored) {
      this.insert(stored);
      this.hits++;
      this.logCacheHit(stored, "disk");
      return stored;
    }
    return null;
  }

  private memoryHit(versionId: string): ArtifactRecord | null {
    const entry = this.entries.get(versionId);
    if (!entry) return null;

    if (isArtifactExpired(entry.record, this.options.ttlMs, this.now())) {
      this.remove(versionId);
      return null;
    }
    entry.hits++;
    entry.lastAccessedAt = this.now();
    this.hits++;
    this.logCacheHit(entry.record, "memory");
    return entry.record;
  }

  /** Oldest-created entry is evicted once capacity is exceeded. */
  private insert(record: ArtifactRecord, provisionalId?: string): void {
    this.entries.set(record.versionId, {
      record,
      lastAccessedAt: this.now(),
      hits: 0,
    });
    if (provisionalId) this.aliases.set(provisionalId, record.versionId);

    while (this.entries.size > this.options.capacity) {
      let oldest: CacheEntry | null = null;
      for (const entry of this.entries.values()) {
        if (!oldest || entry.record.createdAt < oldest.record.createdAt) {
          oldest = entry;
        }
      }
      if (!oldest) break;
      this.remove(oldest.record.versionId);
      this.deps.logger.log({
        level: "debug",
        component: COMPONENT,
        message: `Evicted artifact v${oldest.record.versionId.slice(0, 12)}...`,
      });
    }
  }

  private remove(versionId: string): void {
    this.entries.delete(versionId);
    for (const [alias, target] of this.aliases) {
      if (target === versionId) this.aliases.delete(alias);
    }
  }

  private replaceRecord(record: ArtifactRecord): void {
    const entry = this.entries.get(record.versionId);
    if (entry) entry.record = record;
    this.current = record;
  }

  private promote(record: ArtifactRecord): ArtifactRecord {
    const validated: ArtifactRecord = {
      ...record,
      lastValidatedAt: new Date(this.now()).toISOString(),
    };
    const entry = this.entries.get(validated.versionId);
    if (entry) entry.record = validated;
    this.current = validated;
    this.lastRefresh = this.now();
    return validated;
  }

  private logCacheHit(record: ArtifactRecord, tier: "memory" | "disk"): void {
    this.deps.logger.log({
      level: "info",
      component: COMPONENT,
      message: `Using cached artifact (${tier}): ${record.versionId.slice(0, 12)}...`,
    });
  }
}
