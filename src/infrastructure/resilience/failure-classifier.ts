import {
  BreakerOpenError,
  ExtractionFailureError,
  HttpStatusError,
  type ErrorKind,
} from "../../core/domain/errors.js";

export type FailureClass = "retryable" | "terminal";

/** Permanent client errors: retrying cannot change the answer. */
export const TERMINAL_STATUS_CODES: ReadonlySet<number> = new Set([
  400, 401, 403, 404, 410,
]);

/** Substrings of transient network failures, matched against message and error code. */
export const TRANSIENT_MARKERS: readonly string[] = [
  "timeout",
  "timed out",
  "connection reset",
  "connection_reset",
  "econnreset",
  "connection refused",
  "connection_refused",
  "econnrefused",
  "network unreachable",
  "network_unreachable",
  "enetunreach",
  "socket hang up",
  "und_err_socket",
  "rate limited",
  "too many requests",
];

export function statusCodeOf(error: unknown): number | undefined {
  if (error instanceof HttpStatusError) return error.statusCode;
  if (
    typeof error === "object" &&
    error !== null &&
    "statusCode" in error &&
    typeof error.statusCode === "number"
  ) {
    return error.statusCode;
  }
  return undefined;
}

function describe(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  // Walk the cause chain; undici wraps the socket error one level down.
  for (let depth = 0; depth < 3 && current !== undefined; depth++) {
    if (current instanceof Error) {
      parts.push(current.message);
      if ("code" in current && typeof current.code === "string") {
        parts.push(current.code);
      }
      current = current.cause;
    } else {
      parts.push(String(current));
      current = undefined;
    }
  }
  return parts.join(" ").toLowerCase();
}

/**
 * Status codes decide first; otherwise known transient markers make an error
 * retryable. Anything unrecognised is terminal.
 */
export function classifyFailure(
  error: unknown,
  statusCode: number | undefined = statusCodeOf(error),
): FailureClass {
  if (statusCode !== undefined) {
    if (TERMINAL_STATUS_CODES.has(statusCode)) return "terminal";
    if (statusCode >= 500 && statusCode < 600) return "retryable";
  }
  const text = describe(error);
  return TRANSIENT_MARKERS.some((marker) => text.includes(marker))
    ? "retryable"
    : "terminal";
}

/** Map a surfaced failure onto the kind reported to the orchestrator. */
export function errorKindOf(error: unknown): ErrorKind {
  if (error instanceof BreakerOpenError) return "breaker_open";
  if (error instanceof ExtractionFailureError) return "extraction_failure";
  return classifyFailure(error) === "retryable"
    ? "transient_network"
    : "terminal_request";
}
