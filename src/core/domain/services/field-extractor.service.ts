import type { FieldRule } from "../entities/artifact-record.entity.js";

export interface IFieldExtractor {
  /** First match of the first matching pattern, or undefined when none match. */
  extract(text: string, patterns: string[], flags?: string): string | undefined;
}

/** Runs a batch of field rules away from the caller's event loop. */
export interface IExtractionPool {
  extractAll(
    text: string,
    rules: FieldRule[],
  ): Promise<Record<string, string | null>>;
  close(): Promise<void>;
}
