import { Agent, request } from "undici";
import type { TransportConfig } from "../../core/domain/entities/config.entity.js";
import type {
  ITransport,
  TransportRequest,
  TransportResponse,
} from "../../core/domain/services/transport.service.js";

type RawHeaders = Record<string, string | string[] | undefined>;

function normalizeHeaders(raw: RawHeaders): Record<string, string | undefined> {
  const headers: Record<string, string | undefined> = {};
  for (const [k, v] of Object.entries(raw)) {
    headers[k.toLowerCase()] = Array.isArray(v) ? v.join(", ") : v;
  }
  return headers;
}

async function* chunksOf(body: AsyncIterable<unknown>): AsyncIterable<Uint8Array> {
  for await (const chunk of body) {
    if (chunk instanceof Uint8Array) yield chunk;
    else if (typeof chunk === "string") yield Buffer.from(chunk);
  }
}

/**
 * HTTP transport on undici with its own connection pool. Node's default
 * fetch has a 10s connect limit; the agent here uses config.timeoutMs.
 */
export class UndiciTransport implements ITransport {
  private readonly dispatcher: Agent;

  constructor(private readonly config: TransportConfig) {
    this.dispatcher = new Agent({
      connectTimeout: config.timeoutMs,
      headersTimeout: config.timeoutMs,
      bodyTimeout: config.timeoutMs,
    });
  }

  async request(req: TransportRequest): Promise<TransportResponse> {
    const res = await request(req.url, {
      method: req.method ?? "GET",
      headers: { ...this.config.headers, ...req.headers },
      signal: req.signal,
      dispatcher: this.dispatcher,
      maxRedirections: 5,
    });

    return {
      statusCode: res.statusCode,
      headers: normalizeHeaders(res.headers),
      body: chunksOf(res.body),
      text: () => res.body.text(),
      discard: () => res.body.dump(),
    };
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}
