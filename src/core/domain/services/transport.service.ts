export interface TransportRequest {
  url: string;
  method?: "GET" | "HEAD";
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface TransportResponse {
  statusCode: number;
  /** Lower-cased header names. */
  headers: Record<string, string | undefined>;
  body: AsyncIterable<Uint8Array>;
  text(): Promise<string>;
  /** Drain and drop the body so the connection can be reused. */
  discard(): Promise<void>;
}

export interface ITransport {
  request(request: TransportRequest): Promise<TransportResponse>;
  close(): Promise<void>;
}
