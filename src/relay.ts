import crypto from "node:crypto";
import type { RelayContext } from "./context.ts";
import {
  agentPrefix,
  htmlResponse,
  jsonResponse,
  prefixLocation,
  readBody,
  rewriteHtmlBody,
  sanitizeRequestHeaders,
  sanitizeResponseHeaders,
  statusAllowsBody,
  textResponse,
  toArrayBuffer,
} from "./http.ts";
import { createLogger } from "./log.ts";
import { offlinePage, renderPage } from "./pages.ts";
import type { AgentSession } from "./session.ts";
import { streamToBrowser } from "./streaming.ts";
import type { RequestEnvelope, ResponseMessage, StreamStartMessage } from "./types.ts";

const log = createLogger("relay");

async function offlineResponse(identity: string): Promise<Response> {
  return htmlResponse(await renderPage(offlinePage(identity)));
}

/**
 * Proxies one browser request to `identity`'s agent as `forwardPath`.
 *
 * Every outcome is a well-formed response: offline page when the agent has
 * no connection, 504 when it does not answer in time, 502 when its
 * connection drops first.
 */
export async function relayRequest(
  ctx: RelayContext,
  identity: string,
  forwardPath: string,
  req: Request,
  clientIp: string,
): Promise<Response> {
  const session = ctx.registry.lookup(identity);
  if (!session) {
    return offlineResponse(identity);
  }

  if (!ctx.limiters.requests.allow(identity)) {
    return jsonResponse(429, { error: "rate_limited" });
  }

  const { maxBodyBytes } = ctx.config;
  const contentLength = req.headers.get("content-length");
  if (contentLength && Number.parseInt(contentLength, 10) > maxBodyBytes) {
    return jsonResponse(413, { error: "body_too_large" });
  }
  const body = await readBody(req, maxBodyBytes);
  if (body === null) {
    return jsonResponse(413, { error: "body_too_large" });
  }

  ctx.stats.recordRequest();

  const headers = sanitizeRequestHeaders(req);
  headers["x-forwarded-for"] = clientIp;
  headers["x-forwarded-prefix"] = agentPrefix(identity);

  const envelope: RequestEnvelope = {
    type: "request",
    id: crypto.randomUUID(),
    method: req.method,
    path: forwardPath,
    headers,
    body,
  };

  return sendAndAwait(ctx, session, envelope, req.signal);
}

async function sendAndAwait(
  ctx: RelayContext,
  session: AgentSession,
  envelope: RequestEnvelope,
  signal: AbortSignal,
): Promise<Response> {
  const { id } = envelope;
  if (signal.aborted) {
    log.debug("Browser left before forwarding", { agent: session.identity, id });
    return textResponse("Client Closed Request", 499);
  }
  const outcome = session.pending.open(id, ctx.config.requestTimeoutMs);

  // An abandoned wait settles as cancelled; a late reply is then dropped.
  const onAbort = () => session.pending.cancel(id, "Browser disconnected");
  signal.addEventListener("abort", onAbort, { once: true });

  try {
    if (!(await session.send(envelope))) {
      session.pending.cancel(id, "Send failed");
      log.warn("Failed to send to agent", { agent: session.identity, id });
      return offlineResponse(session.identity);
    }

    const result = await outcome;
    switch (result.status) {
      case "timed_out":
        ctx.stats.recordTimeout();
        log.warn("Agent did not answer in time", {
          agent: session.identity,
          id,
          path: envelope.path,
          timeoutMs: ctx.config.requestTimeoutMs,
        });
        return textResponse("Gateway Timeout", 504);
      case "cancelled":
        return textResponse(result.reason, 502);
      case "resolved":
        if (result.value.type === "stream_start") {
          return startStream(ctx, session, result.value);
        }
        return buildResponse(session.identity, result.value);
    }
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}

function responseHeaders(identity: string, raw: Record<string, string>): Headers {
  const headers = sanitizeResponseHeaders(raw);
  const location = headers.get("location");
  if (location) {
    headers.set("location", prefixLocation(location, identity));
  }
  return headers;
}

export function buildResponse(identity: string, msg: ResponseMessage): Response {
  const headers = responseHeaders(identity, msg.headers);
  if (!statusAllowsBody(msg.status)) {
    return new Response(null, { status: msg.status, headers });
  }

  let body = msg.body;
  if (headers.get("content-type")?.includes("text/html")) {
    body = rewriteHtmlBody(body, identity);
  }
  return new Response(toArrayBuffer(body), { status: msg.status, headers });
}

function startStream(
  ctx: RelayContext,
  session: AgentSession,
  start: StreamStartMessage,
): Response {
  const handle = session.streamHandle(start.id);
  if (!handle) {
    // Torn down between the start message and this point.
    return textResponse("Agent disconnected", 502);
  }

  const headers = responseHeaders(session.identity, start.headers);
  if (!statusAllowsBody(start.status)) {
    // No body can be delivered, so the producer is told to stop.
    handle.finish(true);
    return new Response(null, { status: start.status, headers });
  }

  ctx.stats.recordStream();
  log.debug("Stream started", { agent: session.identity, id: start.id });
  return new Response(streamToBrowser(handle, ctx.config.streamChunkTimeoutMs), {
    status: start.status,
    headers,
  });
}
