import { createHash, randomUUID } from "node:crypto";

export function md5Hex(value: string): string {
  return createHash("md5").update(value).digest("hex");
}

export function sha256Hex(value: string | Uint8Array): string {
  return createHash("sha256").update(value).digest("hex");
}

/** `<resourceId>_<8 hex chars>`, unique per transfer started. */
export function generateJobId(resourceId: string): string {
  return `${resourceId}_${randomUUID().replace(/-/g, "").slice(0, 8)}`;
}

export function runId(): string {
  const now = new Date();
  const pad = (n: number) => String(n).padStart(2, "0");
  const base =
    now.getFullYear() +
    pad(now.getMonth() + 1) +
    pad(now.getDate()) +
    "_" +
    pad(now.getHours()) +
    pad(now.getMinutes()) +
    pad(now.getSeconds());
  const rand = Math.random().toString(36).slice(2, 6);
  return "run_" + base + "_" + rand;
}
