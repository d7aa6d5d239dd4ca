import { describe, it, expect } from "vitest";
import type { FieldRule } from "../../src/core/domain/entities/artifact-record.entity.js";
import { ExtractionWorkerPool } from "../../src/infrastructure/services/extraction-worker-pool.service.js";
import { RegexFieldExtractor } from "../../src/infrastructure/services/regex-field-extractor.service.js";

const TEXT = "var cfg={sts:20123};c.sig||Qx$(decodeURIComponent(s))";

const RULES: FieldRule[] = [
  { name: "signatureTimestamp", required: true, patterns: ["signatureTimestamp:(\\d+)", "sts:(\\d+)"] },
  { name: "decipherFunction", required: false, patterns: ["\\.sig\\|\\|([a-zA-Z0-9$]+)\\("] },
  { name: "nsig", required: false, patterns: ["nsig=(\\w+)"] },
  { name: "caseless", required: false, patterns: ["VAR CFG"], flags: "i" },
];

const EXPECTED = {
  signatureTimestamp: "20123",
  decipherFunction: "Qx$",
  nsig: null,
  caseless: "var cfg",
};

describe("RegexFieldExtractor", () => {
  it("returns capture group 1, falling back to the whole match", () => {
    const extractor = new RegexFieldExtractor();
    expect(extractor.extract(TEXT, ["sts:(\\d+)"])).toBe("20123");
    expect(extractor.extract(TEXT, ["sts:\\d+"])).toBe("sts:20123");
    expect(extractor.extract(TEXT, ["missing", "cfg=\\{(\\w+)"])).toBe("sts");
    expect(extractor.extract(TEXT, ["missing"])).toBeUndefined();
  });
});

describe("ExtractionWorkerPool", () => {
  it("extracts inline when no workers are configured", async () => {
    const pool = new ExtractionWorkerPool({ maxWorkers: 0, timeoutMs: 1000 });
    await expect(pool.extractAll(TEXT, RULES)).resolves.toEqual(EXPECTED);
    await pool.close();
  });

  it("agrees with inline extraction when run on worker threads", async () => {
    const pool = new ExtractionWorkerPool({ maxWorkers: 2, timeoutMs: 10_000 });
    try {
      const results = await Promise.all(
        Array.from({ length: 3 }, () => pool.extractAll(TEXT, RULES)),
      );
      for (const result of results) expect(result).toEqual(EXPECTED);
    } finally {
      await pool.close();
    }
  });

  it("refuses work after close", async () => {
    const pool = new ExtractionWorkerPool({ maxWorkers: 1, timeoutMs: 1000 });
    await pool.close();
    await expect(pool.extractAll(TEXT, RULES)).rejects.toThrow(
      "Extraction pool is closed",
    );
  });
});
