import type { FieldRule } from "../../core/domain/entities/artifact-record.entity.js";
import type { IFieldExtractor } from "../../core/domain/services/field-extractor.service.js";

export class RegexFieldExtractor implements IFieldExtractor {
  extract(text: string, patterns: string[], flags = ""): string | undefined {
    for (const source of patterns) {
      const match = new RegExp(source, flags).exec(text);
      if (match) return match[1] ?? match[0];
    }
    return undefined;
  }

  extractAll(text: string, rules: FieldRule[]): Record<string, string | null> {
    const out: Record<string, string | null> = {};
    for (const rule of rules) {
      out[rule.name] = this.extract(text, rule.patterns, rule.flags) ?? null;
    }
    return out;
  }
}
