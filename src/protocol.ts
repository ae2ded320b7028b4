/**
 * Control-connection wire format.
 *
 * Frames are JSON text messages. Bodies travel base64-encoded in `body_b64`;
 * streaming replies are told apart by their `stream` field and cancellation by
 * `cancel_stream`. Everything is decoded here, once, into the tagged variants
 * of `types.ts`; nothing past this module sees a raw frame.
 */

import { z, type ZodError } from "zod";
import { ProtocolError } from "./errors.ts";
import type { AgentMessage, RelayMessage } from "./types.ts";

const idSchema = z.string().min(1);
const headersSchema = z.record(z.string(), z.string()).default({});
const statusSchema = z.number().int().min(200).max(599);
const bodySchema = z.string().default("");

// --- Relay -> agent ---

const requestFrameSchema = z.object({
  id: idSchema,
  method: z.string().min(1),
  path: z.string().startsWith("/"),
  headers: headersSchema,
  body_b64: bodySchema,
});

const cancelStreamFrameSchema = z.object({
  cancel_stream: idSchema,
});

// --- Agent -> relay ---

const responseFrameSchema = z.object({
  id: idSchema,
  status: statusSchema,
  headers: headersSchema,
  body_b64: bodySchema,
});

const streamFrameSchema = z.discriminatedUnion("stream", [
  z.object({
    id: idSchema,
    stream: z.literal("start"),
    status: statusSchema,
    headers: headersSchema,
  }),
  z.object({
    id: idSchema,
    stream: z.literal("chunk"),
    body_b64: bodySchema,
  }),
  z.object({
    id: idSchema,
    stream: z.literal("end"),
  }),
]);

function describe(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

function parseObject(raw: string): object {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ProtocolError("invalid json", raw);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ProtocolError("expected a json object", raw);
  }
  return parsed;
}

function decodeBase64(value: string): Uint8Array {
  return value ? Buffer.from(value, "base64") : new Uint8Array(0);
}

function encodeBase64(value: Uint8Array): string {
  return value.byteLength > 0 ? Buffer.from(value).toString("base64") : "";
}

export function decodeAgentMessage(raw: string): AgentMessage {
  const frame = parseObject(raw);

  if ("stream" in frame) {
    const result = streamFrameSchema.safeParse(frame);
    if (!result.success) throw new ProtocolError(describe(result.error), raw);
    const data = result.data;
    switch (data.stream) {
      case "start":
        return { type: "stream_start", id: data.id, status: data.status, headers: data.headers };
      case "chunk":
        return { type: "stream_chunk", id: data.id, body: decodeBase64(data.body_b64) };
      case "end":
        return { type: "stream_end", id: data.id };
    }
  }

  const result = responseFrameSchema.safeParse(frame);
  if (!result.success) throw new ProtocolError(describe(result.error), raw);
  return {
    type: "response",
    id: result.data.id,
    status: result.data.status,
    headers: result.data.headers,
    body: decodeBase64(result.data.body_b64),
  };
}

export function encodeAgentMessage(msg: AgentMessage): string {
  switch (msg.type) {
    case "response":
      return JSON.stringify({
        id: msg.id,
        status: msg.status,
        headers: msg.headers,
        body_b64: encodeBase64(msg.body),
      });
    case "stream_start":
      return JSON.stringify({ id: msg.id, stream: "start", status: msg.status, headers: msg.headers });
    case "stream_chunk":
      return JSON.stringify({ id: msg.id, stream: "chunk", body_b64: encodeBase64(msg.body) });
    case "stream_end":
      return JSON.stringify({ id: msg.id, stream: "end" });
  }
}

export function decodeRelayMessage(raw: string): RelayMessage {
  const frame = parseObject(raw);

  if ("cancel_stream" in frame) {
    const result = cancelStreamFrameSchema.safeParse(frame);
    if (!result.success) throw new ProtocolError(describe(result.error), raw);
    return { type: "cancel_stream", id: result.data.cancel_stream };
  }

  const result = requestFrameSchema.safeParse(frame);
  if (!result.success) throw new ProtocolError(describe(result.error), raw);
  return {
    type: "request",
    id: result.data.id,
    method: result.data.method,
    path: result.data.path,
    headers: result.data.headers,
    body: decodeBase64(result.data.body_b64),
  };
}

export function encodeRelayMessage(msg: RelayMessage): string {
  switch (msg.type) {
    case "request":
      return JSON.stringify({
        id: msg.id,
        method: msg.method,
        path: msg.path,
        headers: msg.headers,
        body_b64: encodeBase64(msg.body),
      });
    case "cancel_stream":
      return JSON.stringify({ cancel_stream: msg.id });
  }
}
