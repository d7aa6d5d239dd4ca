/** What the orchestrator hands to a transfer: where the bytes live and what they should look like. */
export interface ResourceDescriptor {
  resourceId: string;
  url: string;
  /** Identifies the stream variant chosen for this job, so a resume never switches variants. */
  variantId?: string;
  expectedLength?: number;
  etag?: string;
  lastModified?: string;
}

export interface StreamVariant {
  variantId: string;
  url: string;
  mimeType: string;
  bitrate: number;
  width?: number;
  height?: number;
  contentLength?: number;
}
