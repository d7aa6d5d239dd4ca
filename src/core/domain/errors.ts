import { STATUS_CODES } from "node:http";
import type { ResourceDescriptor } from "./entities/resource-descriptor.entity.js";

export type ErrorKind =
  | "breaker_open"
  | "transient_network"
  | "terminal_request"
  | "resource_changed"
  | "extraction_failure"
  | "state_inconsistency";

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** The operation was skipped because its breaker is open; it never ran. */
export class BreakerOpenError extends Error {
  constructor(readonly breakerName: string) {
    super(`Circuit breaker OPEN for ${breakerName}`);
    this.name = "BreakerOpenError";
  }
}

export class HttpStatusError extends Error {
  constructor(
    readonly statusCode: number,
    context: string,
  ) {
    const reason = STATUS_CODES[statusCode];
    super(`${context}: HTTP ${statusCode}${reason ? ` ${reason}` : ""}`);
    this.name = "HttpStatusError";
  }
}

/** A field the artifact cannot do without was not found in the fetched document. */
export class ExtractionFailureError extends Error {
  constructor(
    readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = "ExtractionFailureError";
  }
}

export class TransferFailedError extends Error {
  constructor(
    readonly kind: ErrorKind,
    readonly jobId: string,
    readonly descriptor: ResourceDescriptor,
    cause: unknown,
  ) {
    super(`Transfer ${jobId} failed (${kind}): ${errorMessage(cause)}`, {
      cause,
    });
    this.name = "TransferFailedError";
  }
}
