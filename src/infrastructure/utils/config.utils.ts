import { ConfigService } from "../services/config.service.js";
import { resolve } from "node:path";
import type { Config } from "../../core/domain/entities/config.entity.js";

/**
 * Utility function to load application configuration.
 * Decouples the configuration loading from specific service instances.
 */
export function loadConfig(path?: string): Config {
  const service = new ConfigService(path);
  return service.getConfig();
}

/**
 * Resolves the configuration file path based on environment variables or default locations.
 */
export function getConfigPath(): string {
  return (
    process.env.CONFIG_PATH || resolve(process.cwd(), "config", "config.yaml")
  );
}

/** The artifact source must be configured before the cache can synchronise. */
export function requireArtifactSource(config: Config): string {
  const url = config.artifact.sourceUrl;
  if (!url || url.startsWith("${")) {
    throw new Error(
      "artifact.sourceUrl is not set (configure it or set EXTRACTOR_SOURCE_URL).",
    );
  }
  if (config.artifact.referencePatterns.length === 0) {
    throw new Error("artifact.referencePatterns must list at least one pattern.");
  }
  return url;
}
