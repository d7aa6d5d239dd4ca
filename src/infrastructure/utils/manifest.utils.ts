import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { TransferItem } from "../../core/use-cases/run-transfers.use-case.js";
import { errorMessage } from "../../core/domain/errors.js";
import { generateJobId } from "./id.utils.js";
import {
  descriptorFromVariant,
  selectBestVariant,
  variantFileName,
} from "./variant.utils.js";

const VariantSchema = z.object({
  variantId: z.string().min(1),
  url: z.string().url(),
  mimeType: z.string().min(1),
  bitrate: z.number().min(0),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  contentLength: z.number().int().min(0).optional(),
});

const ManifestEntrySchema = z
  .object({
    resourceId: z.string().min(1),
    jobId: z.string().min(1).optional(),
    url: z.string().url().optional(),
    variants: z.array(VariantSchema).min(1).optional(),
    preferCodec: z.string().optional(),
    expectedLength: z.number().int().min(0).optional(),
    etag: z.string().optional(),
    lastModified: z.string().optional(),
    fileName: z.string().min(1).optional(),
  })
  .refine((e) => e.url !== undefined || e.variants !== undefined, {
    message: "either url or variants is required",
  });

export const ManifestSchema = z.object({
  items: z.array(ManifestEntrySchema),
});

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

/** Turn one manifest entry into a transfer, picking the best variant when several are offered. */
export function transferItemFromEntry(
  entry: ManifestEntry,
  outputDir: string,
): TransferItem {
  const jobId = entry.jobId ?? generateJobId(entry.resourceId);

  if (entry.variants) {
    const variant = selectBestVariant(entry.variants, entry.preferCodec);
    return {
      jobId,
      descriptor: descriptorFromVariant(entry.resourceId, variant),
      targetPath: join(
        outputDir,
        entry.fileName ?? variantFileName(entry.resourceId, variant),
      ),
    };
  }

  if (!entry.url) {
    throw new Error(`Manifest entry ${entry.resourceId} has neither url nor variants`);
  }
  return {
    jobId,
    descriptor: {
      resourceId: entry.resourceId,
      url: entry.url,
      expectedLength: entry.expectedLength,
      etag: entry.etag,
      lastModified: entry.lastModified,
    },
    targetPath: join(outputDir, entry.fileName ?? entry.resourceId),
  };
}

export async function loadManifest(
  path: string,
  outputDir: string,
): Promise<TransferItem[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf-8"));
  } catch (e) {
    throw new Error(`Failed to read manifest ${path}. ${errorMessage(e)}`, {
      cause: e,
    });
  }

  const result = ManifestSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")} (${issue.message})`,
    );
    throw new Error(`Invalid manifest ${path}: ${issues.join(", ")}`);
  }
  return result.data.items.map((entry) => transferItemFromEntry(entry, outputDir));
}
