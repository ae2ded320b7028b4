export function jsonResponse(
  status: number,
  body: Record<string, unknown>,
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function htmlResponse(html: string, status = 200): Response {
  return new Response(html, {
    status,
    headers: { "content-type": "text/html; charset=utf-8" },
  });
}

export function textResponse(text: string, status: number): Response {
  return new Response(text, {
    status,
    headers: { "content-type": "text/plain; charset=utf-8" },
  });
}

/**
 * Stream-reads a request body with an early abort if maxBytes is exceeded.
 * Returns the bytes, or null if the body was too large.
 */
export async function readBody(
  req: Request,
  maxBytes: number,
): Promise<Uint8Array | null> {
  if (!req.body) return new Uint8Array(0);
  const reader = req.body.getReader();
  const chunks: Uint8Array[] = [];
  let totalBytes = 0;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      totalBytes += value.byteLength;
      if (totalBytes > maxBytes) {
        await reader.cancel();
        return null;
      }
      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }
  const merged = new Uint8Array(totalBytes);
  let offset = 0;
  for (const chunk of chunks) {
    merged.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return merged;
}

const HOP_BY_HOP_HEADERS = new Set([
  "transfer-encoding",
  "connection",
  "keep-alive",
  "upgrade",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
]);

// Recomputed by the relay's own HTTP layer when it writes the response.
const TRANSPORT_MANAGED_HEADERS = new Set([
  "content-length",
  "content-encoding",
]);

export function isHopByHop(name: string): boolean {
  return HOP_BY_HOP_HEADERS.has(name.toLowerCase());
}

export function sanitizeResponseHeaders(
  raw: Record<string, string>,
): Headers {
  const headers = new Headers();
  for (const [key, value] of Object.entries(raw)) {
    const lower = key.toLowerCase();
    if (HOP_BY_HOP_HEADERS.has(lower) || TRANSPORT_MANAGED_HEADERS.has(lower)) continue;
    headers.set(key, value);
  }
  return headers;
}

// accept-encoding goes too: content-encoding is dropped from responses, so
// bodies must come back identity-coded.
const STRIPPED_REQUEST_HEADERS = new Set([
  "host",
  "content-length",
  "accept-encoding",
  "x-forwarded-for",
  "x-forwarded-prefix",
]);

export function sanitizeRequestHeaders(
  req: Request,
): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of req.headers.entries()) {
    const lower = key.toLowerCase();
    if (STRIPPED_REQUEST_HEADERS.has(lower) || HOP_BY_HOP_HEADERS.has(lower)) continue;
    headers[lower] = value;
  }
  return headers;
}

// --- Path-prefix rewriting ---
//
// Agents are routed by path (/<identity>/...), so the agent's own
// root-relative URLs have to gain the prefix on the way out.

/** `/<identity>` as it appears in a URL path. */
export function agentPrefix(identity: string): string {
  return `/${encodeURIComponent(identity)}`;
}

export function prefixLocation(location: string, identity: string): string {
  const prefix = agentPrefix(identity);
  if (!location.startsWith("/") || location.startsWith("//")) return location;
  if (location === prefix || location.startsWith(`${prefix}/`)) return location;
  return `${prefix}${location}`;
}

// href="/...", src='/...', action="/...", fetch('/...'), location='/...',
// location.href="/...". Protocol-relative URLs (//host) are left alone.
const ROOT_RELATIVE_URL_RE =
  /(\b(?:href|src|action)=["']|\bfetch\(["']|\blocation(?:\.href)?=["'])\/(?!\/)/g;

export function rewriteHtml(html: string, identity: string): string {
  const prefix = `${agentPrefix(identity)}/`;
  return html.replace(
    ROOT_RELATIVE_URL_RE,
    (match: string, lead: string, offset: number) => {
      if (html.startsWith(prefix, offset + lead.length)) return match;
      return `${lead}${prefix}`;
    },
  );
}

const utf8 = new TextDecoder("utf-8", { fatal: true });
const encoder = new TextEncoder();

/** Applies `rewriteHtml` to an HTML body; non-UTF-8 bodies pass through. */
export function rewriteHtmlBody(body: Uint8Array, identity: string): Uint8Array {
  let html: string;
  try {
    html = utf8.decode(body);
  } catch {
    return body;
  }
  return encoder.encode(rewriteHtml(html, identity));
}

const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

export function statusAllowsBody(status: number): boolean {
  return !NULL_BODY_STATUSES.has(status);
}

/** Copies into a standalone ArrayBuffer, which every BodyInit accepts. */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}
