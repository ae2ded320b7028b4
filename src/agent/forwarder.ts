import { request } from "undici";
import { errorMessage } from "../errors.ts";
import { isHopByHop } from "../http.ts";
import { createLogger } from "../log.ts";
import type { RequestEnvelope, ResponseMessage } from "../types.ts";

const log = createLogger("forwarder");

export const DEFAULT_LOCAL_URL = "http://127.0.0.1:8080";

const HTTP_METHODS = [
  "GET",
  "HEAD",
  "POST",
  "PUT",
  "DELETE",
  "OPTIONS",
  "TRACE",
  "PATCH",
] as const;
type HttpMethod = (typeof HTTP_METHODS)[number];
const KNOWN_METHODS: ReadonlySet<string> = new Set(HTTP_METHODS);

function isHttpMethod(method: string): method is HttpMethod {
  return KNOWN_METHODS.has(method);
}

const BODY_METHODS = new Set<string>(["POST", "PUT", "PATCH"]);
const STREAM_CONTENT_TYPES = ["multipart/x-mixed-replace", "text/event-stream"];

export interface LocalForwarderOptions {
  /** Base URL of the local service. */
  baseUrl?: string;
  /** Headers and body deadline for ordinary requests. */
  timeoutMs?: number;
  /** Idle deadline between chunks of a streaming response. */
  streamTimeoutMs?: number;
  /** Decides by path alone whether a response should be streamed. */
  isStreamPath?: (path: string) => boolean;
}

export type ForwardResult =
  | { kind: "response"; message: ResponseMessage }
  | {
    kind: "stream";
    id: string;
    status: number;
    headers: Record<string, string>;
    body: AsyncIterable<Uint8Array>;
  };

export function isDefaultStreamPath(path: string): boolean {
  const clean = path.split("?")[0] ?? path;
  return clean.endsWith("/api/stream");
}

export function isStreamContentType(contentType: string | undefined): boolean {
  if (!contentType) return false;
  const lower = contentType.toLowerCase();
  return STREAM_CONTENT_TYPES.some((t) => lower.startsWith(t));
}

const DROPPED_REQUEST_HEADERS = new Set(["host", "content-length", "accept-encoding"]);

// Bodies are relayed without content-encoding, so the local service is
// always asked for an identity-coded one.
function forwardableRequestHeaders(raw: Record<string, string>): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    const lower = key.toLowerCase();
    if (DROPPED_REQUEST_HEADERS.has(lower) || isHopByHop(lower)) continue;
    headers[lower] = value;
  }
  headers["accept-encoding"] = "identity";
  return headers;
}

export function flattenResponseHeaders(
  raw: Record<string, string | string[] | undefined>,
): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    const lower = key.toLowerCase();
    if (lower === "transfer-encoding" || lower === "connection") continue;
    headers[lower] = Array.isArray(value) ? value.join(", ") : value;
  }
  return headers;
}

export function unreachableResponse(id: string, err: unknown): ResponseMessage {
  return {
    type: "response",
    id,
    status: 502,
    headers: { "content-type": "text/plain" },
    body: new TextEncoder().encode(`Local service unreachable: ${errorMessage(err)}`),
  };
}

/**
 * Replays request envelopes against the local HTTP service. Redirects are
 * returned as-is; the relay rewrites `Location` for the browser.
 */
export class LocalForwarder {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly streamTimeoutMs: number;
  private readonly isStreamPath: (path: string) => boolean;

  constructor(opts: LocalForwarderOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? DEFAULT_LOCAL_URL).replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs ?? 25_000;
    this.streamTimeoutMs = opts.streamTimeoutMs ?? 300_000;
    this.isStreamPath = opts.isStreamPath ?? isDefaultStreamPath;
  }

  /**
   * Never rejects: connection failures become a 502 response. `signal`
   * aborts the local request, including a stream body being read.
   */
  async forward(envelope: RequestEnvelope, signal?: AbortSignal): Promise<ForwardResult> {
    const streamPath = this.isStreamPath(envelope.path);
    const method = envelope.method.toUpperCase();
    if (!isHttpMethod(method)) {
      return {
        kind: "response",
        message: {
          type: "response",
          id: envelope.id,
          status: 405,
          headers: { "content-type": "text/plain" },
          body: new TextEncoder().encode(`Method not allowed: ${envelope.method}`),
        },
      };
    }
    const sendBody = BODY_METHODS.has(method) && envelope.body.byteLength > 0;

    let res: Awaited<ReturnType<typeof request>>;
    try {
      res = await request(this.baseUrl + envelope.path, {
        method,
        headers: forwardableRequestHeaders(envelope.headers),
        body: sendBody ? Buffer.from(envelope.body) : undefined,
        headersTimeout: this.timeoutMs,
        bodyTimeout: streamPath ? this.streamTimeoutMs : this.timeoutMs,
        signal,
      });
    } catch (err) {
      log.debug("Local forward failed", { id: envelope.id, path: envelope.path, error: err });
      return { kind: "response", message: unreachableResponse(envelope.id, err) };
    }

    const headers = flattenResponseHeaders(res.headers);
    if (streamPath || isStreamContentType(headers["content-type"])) {
      return {
        kind: "stream",
        id: envelope.id,
        status: res.statusCode,
        headers,
        body: res.body,
      };
    }

    try {
      const body = new Uint8Array(await res.body.arrayBuffer());
      return {
        kind: "response",
        message: { type: "response", id: envelope.id, status: res.statusCode, headers, body },
      };
    } catch (err) {
      log.debug("Local body read failed", { id: envelope.id, path: envelope.path, error: err });
      return { kind: "response", message: unreachableResponse(envelope.id, err) };
    }
  }
}
