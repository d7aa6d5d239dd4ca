import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import type { IConfigService } from "../../core/domain/services/config.service.js";
import type { Config } from "../../core/domain/entities/config.entity.js";
import { errorMessage } from "../../core/domain/errors.js";

const FieldRuleSchema = z.object({
  name: z.string().min(1),
  patterns: z.array(z.string().min(1)).min(1),
  required: z.boolean().default(false),
  flags: z.string().optional(),
  defaultValue: z.string().optional(),
});

export const ConfigSchema = z.object({
  transport: z
    .object({
      timeoutMs: z.number().positive().default(30_000),
      headers: z.record(z.string(), z.string()).default({}),
    })
    .default({}),
  retry: z
    .object({
      maxRetries: z.number().int().min(0).default(3),
      backoffBase: z.number().positive().default(2),
      jitterMaxSeconds: z.number().min(0).default(1),
    })
    .default({}),
  breaker: z
    .object({
      failureThreshold: z.number().int().min(1).default(5),
      recoveryTimeoutSeconds: z.number().min(0).default(60),
      recoveryThreshold: z.number().int().min(1).default(2),
    })
    .default({}),
  transfer: z
    .object({
      outputDir: z.string().min(1).default("./downloads"),
      partSuffix: z.string().min(1).default(".part"),
      checkpointEveryChunks: z.number().int().min(1).default(10),
      concurrency: z.number().int().min(1).default(3),
      requestsPerSecond: z.number().positive().optional(),
    })
    .default({}),
  state: z
    .object({
      driver: z.enum(["sqlite", "json"]).default("sqlite"),
      dir: z.string().min(1).default("./.extractor_state"),
      artifactMaxAgeHours: z.number().positive().default(24),
    })
    .default({}),
  artifact: z
    .object({
      sourceUrl: z.string().default(""),
      referencePatterns: z.array(z.string().min(1)).default([]),
      ttlSeconds: z.number().positive().default(3600),
      cacheSize: z.number().int().min(1).default(10),
      maxWorkers: z.number().int().min(0).default(2),
      extractionTimeoutMs: z.number().positive().default(10_000),
      extractionVersion: z.string().default("2.0"),
      fields: z.array(FieldRuleSchema).default([]),
    })
    .default({}),
  logging: z
    .object({
      dir: z.string().min(1).default("./logs"),
      file: z.string().min(1).default("extractor.jsonl"),
      echo: z.boolean().default(false),
    })
    .default({}),
});

function substituteEnv(value: unknown): unknown {
  if (typeof value === "string" && value.startsWith("${") && value.endsWith("}")) {
    const key = value.slice(2, -1);
    return process.env[key] ?? value;
  }
  if (Array.isArray(value)) return value.map(substituteEnv);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v);
    return out;
  }
  return value;
}

export class ConfigService implements IConfigService {
  private config: Config;

  constructor(configPath?: string) {
    loadEnv();
    const resolvedPath =
      configPath ||
      process.env.CONFIG_PATH ||
      resolve(process.cwd(), "config", "config.yaml");
    this.config = this.loadConfig(resolvedPath);
  }

  private loadConfig(path: string): Config {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (e) {
      throw new Error(`Failed to load config from ${path}. ${errorMessage(e)}`, {
        cause: e,
      });
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(raw);
    } catch (e) {
      throw new Error(`Invalid YAML in ${path}. ${errorMessage(e)}`, { cause: e });
    }
    if (parsed === undefined || parsed === null) parsed = {};
    if (typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new Error(`Config at ${path} must be a YAML object.`);
    }

    const result = ConfigSchema.safeParse(substituteEnv(parsed));
    if (!result.success) {
      const missing = result.error.issues.map(
        (issue) => `${issue.path.join(".")} (${issue.message})`,
      );
      throw new Error(
        `Invalid config at ${path}. Missing or invalid: ${missing.join(", ")}.`,
      );
    }
    const config: Config = result.data;

    // Environment overrides
    if (process.env.EXTRACTOR_SOURCE_URL)
      config.artifact.sourceUrl = process.env.EXTRACTOR_SOURCE_URL;
    if (process.env.EXTRACTOR_STATE_DIR)
      config.state.dir = process.env.EXTRACTOR_STATE_DIR;
    if (process.env.EXTRACTOR_OUTPUT_DIR)
      config.transfer.outputDir = process.env.EXTRACTOR_OUTPUT_DIR;

    return config;
  }

  getConfig(): Config {
    return this.config;
  }
  getTransportConfig(): Config["transport"] {
    return this.config.transport;
  }
  getRetryConfig(): Config["retry"] {
    return this.config.retry;
  }
  getBreakerConfig(): Config["breaker"] {
    return this.config.breaker;
  }
  getTransferConfig(): Config["transfer"] {
    return this.config.transfer;
  }
  getStateConfig(): Config["state"] {
    return this.config.state;
  }
  getArtifactConfig(): Config["artifact"] {
    return this.config.artifact;
  }
  getLoggingConfig(): Config["logging"] {
    return this.config.logging;
  }
}
