import { expect, test } from "vitest";
import { ProtocolError } from "../src/errors.ts";
import {
  decodeAgentMessage,
  decodeRelayMessage,
  encodeAgentMessage,
  encodeRelayMessage,
} from "../src/protocol.ts";
import { text } from "./helpers.ts";

test("decodeAgentMessage - response with base64 body", () => {
  const msg = decodeAgentMessage(
    JSON.stringify({ id: "r1", status: 200, headers: { a: "b" }, body_b64: "eyJvayI6dHJ1ZX0=" }),
  );
  expect(msg.type).toBe("response");
  if (msg.type !== "response") return;
  expect(msg.status).toBe(200);
  expect(msg.headers).toEqual({ a: "b" });
  expect(new TextDecoder().decode(msg.body)).toBe('{"ok":true}');
});

test("decodeAgentMessage - headers and body default to empty", () => {
  const msg = decodeAgentMessage(JSON.stringify({ id: "r1", status: 204 }));
  expect(msg).toEqual({ type: "response", id: "r1", status: 204, headers: {}, body: new Uint8Array(0) });
});

test("decodeAgentMessage - stream variants", () => {
  expect(decodeAgentMessage('{"id":"s1","stream":"start","status":200,"headers":{}}')).toEqual({
    type: "stream_start",
    id: "s1",
    status: 200,
    headers: {},
  });
  const chunk = decodeAgentMessage('{"id":"s1","stream":"chunk","body_b64":"aGk="}');
  expect(chunk.type).toBe("stream_chunk");
  if (chunk.type === "stream_chunk") expect(Array.from(chunk.body)).toEqual([104, 105]);
  expect(decodeAgentMessage('{"id":"s1","stream":"end"}')).toEqual({ type: "stream_end", id: "s1" });
});

test("decodeAgentMessage - empty chunk is a chunk, not an end", () => {
  const msg = decodeAgentMessage('{"id":"s1","stream":"chunk","body_b64":""}');
  expect(msg.type).toBe("stream_chunk");
  if (msg.type === "stream_chunk") expect(msg.body.byteLength).toBe(0);
});

test("decodeAgentMessage - rejects malformed frames", () => {
  expect(() => decodeAgentMessage("not json")).toThrow(ProtocolError);
  expect(() => decodeAgentMessage("[1,2]")).toThrow(ProtocolError);
  expect(() => decodeAgentMessage('{"id":"x"}')).toThrow(ProtocolError);
  expect(() => decodeAgentMessage('{"id":"x","status":99}')).toThrow(ProtocolError);
  expect(() => decodeAgentMessage('{"id":"x","stream":"middle"}')).toThrow(ProtocolError);
  expect(() => decodeAgentMessage('{"id":"","status":200}')).toThrow(ProtocolError);
});

test("ProtocolError - keeps the raw frame", () => {
  try {
    decodeAgentMessage("oops");
    expect.unreachable();
  } catch (err) {
    expect(err).toBeInstanceOf(ProtocolError);
    if (err instanceof ProtocolError) {
      expect(err.raw).toBe("oops");
      expect(err.message).toBe("Malformed control message: invalid json");
    }
  }
});

test("encodeAgentMessage - wire field names", () => {
  expect(JSON.parse(encodeAgentMessage({ type: "response", id: "r1", status: 200, headers: {}, body: text("hi") })))
    .toEqual({ id: "r1", status: 200, headers: {}, body_b64: "aGk=" });
  expect(JSON.parse(encodeAgentMessage({ type: "stream_start", id: "s1", status: 200, headers: { x: "y" } })))
    .toEqual({ id: "s1", stream: "start", status: 200, headers: { x: "y" } });
  expect(JSON.parse(encodeAgentMessage({ type: "stream_chunk", id: "s1", body: text("hi") })))
    .toEqual({ id: "s1", stream: "chunk", body_b64: "aGk=" });
  expect(JSON.parse(encodeAgentMessage({ type: "stream_end", id: "s1" })))
    .toEqual({ id: "s1", stream: "end" });
});

test("relay messages - request and cancel_stream", () => {
  const wire = encodeRelayMessage({
    type: "request",
    id: "r1",
    method: "POST",
    path: "/api/x?y=1",
    headers: { "content-type": "text/plain" },
    body: text("hi"),
  });
  expect(JSON.parse(wire)).toEqual({
    id: "r1",
    method: "POST",
    path: "/api/x?y=1",
    headers: { "content-type": "text/plain" },
    body_b64: "aGk=",
  });

  const back = decodeRelayMessage(wire);
  expect(back.type).toBe("request");
  if (back.type === "request") expect(new TextDecoder().decode(back.body)).toBe("hi");

  expect(encodeRelayMessage({ type: "cancel_stream", id: "s1" })).toBe('{"cancel_stream":"s1"}');
  expect(decodeRelayMessage('{"cancel_stream":"s1"}')).toEqual({ type: "cancel_stream", id: "s1" });
});

test("decodeRelayMessage - path must be absolute", () => {
  expect(() => decodeRelayMessage('{"id":"r1","method":"GET","path":"status"}')).toThrow(ProtocolError);
});
