import { describe, it, expect } from "vitest";
import {
  classifyFailure,
  errorKindOf,
} from "../../src/infrastructure/resilience/failure-classifier.js";
import {
  BreakerOpenError,
  ExtractionFailureError,
  HttpStatusError,
} from "../../src/core/domain/errors.js";

describe("classifyFailure", () => {
  it.each([400, 401, 403, 404, 410])("treats HTTP %i as terminal", (code) => {
    expect(classifyFailure(new HttpStatusError(code, "fetch"))).toBe("terminal");
  });

  it.each([500, 502, 503, 504])("retries HTTP %i", (code) => {
    expect(classifyFailure(new HttpStatusError(code, "fetch"))).toBe("retryable");
  });

  it("retries 429 through its reason phrase", () => {
    expect(classifyFailure(new HttpStatusError(429, "fetch"))).toBe("retryable");
  });

  it("lets an explicit status code win over the message", () => {
    expect(classifyFailure(new Error("request timeout"), 404)).toBe("terminal");
  });

  it.each([
    "Connect Timeout Error",
    "socket hang up",
    "read ECONNRESET",
    "connect ECONNREFUSED 127.0.0.1:443",
    "Rate limited, slow down",
  ])("retries transient failure %j", (message) => {
    expect(classifyFailure(new Error(message))).toBe("retryable");
  });

  it("matches an error code carried on the cause", () => {
    const cause = Object.assign(new Error("other side closed"), {
      code: "UND_ERR_SOCKET",
    });
    expect(classifyFailure(new Error("fetch failed", { cause }))).toBe(
      "retryable",
    );
  });

  it("treats unknown failures as terminal", () => {
    expect(classifyFailure(new Error("unexpected token in JSON"))).toBe(
      "terminal",
    );
    expect(classifyFailure("boom")).toBe("terminal");
  });
});

describe("errorKindOf", () => {
  it("maps surfaced errors to kinds", () => {
    expect(errorKindOf(new BreakerOpenError("download"))).toBe("breaker_open");
    expect(errorKindOf(new ExtractionFailureError("sts", "missing"))).toBe(
      "extraction_failure",
    );
    expect(errorKindOf(new HttpStatusError(503, "x"))).toBe("transient_network");
    expect(errorKindOf(new HttpStatusError(403, "x"))).toBe("terminal_request");
  });
});
