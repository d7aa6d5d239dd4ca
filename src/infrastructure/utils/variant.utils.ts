import type {
  ResourceDescriptor,
  StreamVariant,
} from "../../core/domain/entities/resource-descriptor.entity.js";

/**
 * Highest resolution video variant, bitrate breaking ties. A codec
 * preference narrows the candidates only when something matches it.
 */
export function selectBestVariant(
  variants: StreamVariant[],
  preferCodec?: string,
): StreamVariant {
  let candidates = variants.filter((v) => v.mimeType.includes("video"));
  if (candidates.length === 0) {
    throw new Error("No video variants found");
  }

  if (preferCodec) {
    const wanted = preferCodec.toLowerCase();
    const preferred = candidates.filter((v) =>
      v.mimeType.toLowerCase().includes(wanted),
    );
    if (preferred.length > 0) candidates = preferred;
  }

  return candidates.reduce((best, v) => {
    const bestHeight = best.height ?? 0;
    const height = v.height ?? 0;
    if (height !== bestHeight) return height > bestHeight ? v : best;
    return v.bitrate > best.bitrate ? v : best;
  });
}

function codecLabel(mimeType: string): string {
  return mimeType.includes("vp9") ? "vp9" : "h264";
}

function extensionOf(mimeType: string): string {
  const subtype = mimeType.split(";")[0]?.split("/")[1]?.trim();
  return subtype ? subtype : "mp4";
}

/** `<resourceId>_<height>p_<codec>.<ext>`, e.g. `clip_1080p_vp9.webm`. */
export function variantFileName(
  resourceId: string,
  variant: StreamVariant,
): string {
  const quality = variant.height ? `${variant.height}p` : "unknown";
  return `${resourceId}_${quality}_${codecLabel(variant.mimeType)}.${extensionOf(variant.mimeType)}`;
}

export function descriptorFromVariant(
  resourceId: string,
  variant: StreamVariant,
): ResourceDescriptor {
  return {
    resourceId,
    url: variant.url,
    variantId: variant.variantId,
    expectedLength: variant.contentLength,
  };
}
