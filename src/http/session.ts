import { Agent as HttpAgent } from "node:http";
import { Agent as HttpsAgent } from "node:https";
import type { IncomingHttpHeaders } from "node:http";
import { gotScraping } from "got-scraping";
import { HttpStatusError, TransportError, describeError } from "../errors.js";

/**
 * Browser-like headers sent with every request
 */
export const DEFAULT_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  Accept:
    "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8",
  "Accept-Language": "de-DE,de;q=0.9,en;q=0.8",
  Connection: "keep-alive",
};

export interface FetchedResource {
  ok: true;
  url: string;
  /** URL after redirects */
  finalUrl: string;
  statusCode: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  /** Body with transport compression already undone */
  body: Buffer;
}

export interface FetchFailed {
  ok: false;
  url: string;
  error: HttpStatusError | TransportError;
}

export type FetchOutcome = FetchedResource | FetchFailed;

export interface SessionRequestOptions {
  timeoutMs?: number;
}

/**
 * A connection-reusing client owned by exactly one worker.
 */
export interface HttpSession {
  get(url: string, options?: SessionRequestOptions): Promise<FetchOutcome>;
  close(): void;
}

export type SessionFactory = () => HttpSession;

export interface SessionOptions {
  /** Default request timeout. Default: 60000 */
  timeoutMs?: number;
  headers?: Record<string, string>;
}

function normalizeHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) {
    if (!k) continue;
    if (typeof v === "string") out[k.toLowerCase()] = v;
    else if (Array.isArray(v)) out[k.toLowerCase()] = v.join(", ");
    else if (typeof v === "number") out[k.toLowerCase()] = String(v);
  }
  return out;
}

/**
 * got-scraping backed session with its own keep-alive agents.
 * Non-2xx responses and network failures come back as `{ ok: false }` outcomes instead of throwing.
 */
export class KeepAliveSession implements HttpSession {
  private readonly httpAgent = new HttpAgent({ keepAlive: true, maxSockets: 1 });
  private readonly httpsAgent = new HttpsAgent({ keepAlive: true, maxSockets: 1 });
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private closed = false;

  constructor(options: SessionOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.headers = { ...DEFAULT_HEADERS, ...(options.headers ?? {}) };
  }

  async get(url: string, options: SessionRequestOptions = {}): Promise<FetchOutcome> {
    if (this.closed) {
      return { ok: false, url, error: new TransportError(url, "session is closed") };
    }

    let res;
    try {
      res = await gotScraping({
        url,
        method: "GET",
        followRedirect: true,
        throwHttpErrors: false,
        decompress: true,
        http2: false,
        agent: { http: this.httpAgent, https: this.httpsAgent },
        headers: this.headers,
        timeout: { request: options.timeoutMs ?? this.timeoutMs },
        responseType: "buffer",
      });
    } catch (error: unknown) {
      return {
        ok: false,
        url,
        error: new TransportError(url, describeError(error), {
          cause: error instanceof Error ? error : undefined,
        }),
      };
    }

    if (res.statusCode < 200 || res.statusCode >= 300) {
      return {
        ok: false,
        url,
        error: new HttpStatusError(url, res.statusCode, res.statusMessage),
      };
    }

    return {
      ok: true,
      url,
      finalUrl: res.url,
      statusCode: res.statusCode,
      headers: normalizeHeaders(res.headers),
      body: res.body,
    };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}

export function createSessionFactory(options: SessionOptions = {}): SessionFactory {
  return () => new KeepAliveSession(options);
}

/**
 * Decode a response body using the charset from its Content-Type, falling back to UTF-8.
 */
export function decodeBody(body: Uint8Array, contentType?: string): string {
  const charset = /charset\s*=\s*"?([^";\s]+)/i.exec(contentType ?? "")?.[1];
  if (charset) {
    try {
      return new TextDecoder(charset, { fatal: false }).decode(body);
    } catch {
      // unknown label
    }
  }
  return new TextDecoder("utf-8", { fatal: false }).decode(body);
}
