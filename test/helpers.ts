import fs from "node:fs";
import http from "node:http";
import os from "node:os";
import path from "node:path";
import { WebSocket } from "ws";
import { DEFAULT_RELAY_CONFIG, type RelayConfig } from "../src/config.ts";
import { decodeRelayMessage, encodeAgentMessage } from "../src/protocol.ts";
import { startRelayServer, type RelayServer } from "../src/server.ts";
import type { AgentMessage, ControlSocket, RelayMessage } from "../src/types.ts";

export const TEST_SECRET = "test-secret";

/** In-memory control socket that records what the relay writes. */
export class FakeSocket implements ControlSocket {
  readyState = 1;
  readonly sent: string[] = [];
  readonly closes: Array<{ code?: number; reason?: string }> = [];

  /** Plays the agent: called with every message the relay writes. */
  onSend: ((msg: RelayMessage) => void) | null = null;

  send(data: string, cb?: (err?: Error) => void): void {
    this.sent.push(data);
    this.onSend?.(decodeRelayMessage(data));
    cb?.();
  }

  close(code?: number, reason?: string): void {
    this.readyState = 3;
    this.closes.push({ code, reason });
  }

  messages(): RelayMessage[] {
    return this.sent.map(decodeRelayMessage);
  }
}

export function tempDir(prefix = "relay-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function testConfig(overrides: Partial<RelayConfig> = {}): RelayConfig {
  return {
    ...DEFAULT_RELAY_CONFIG,
    secret: TEST_SECRET,
    host: "127.0.0.1",
    port: 0,
    uploadDir: tempDir(),
    ...overrides,
  };
}

export async function startTestRelay(overrides: Partial<RelayConfig> = {}): Promise<RelayServer> {
  return startRelayServer(testConfig(overrides));
}

/** A hand-driven agent: raw `ws` client speaking the control protocol. */
export class TestAgent {
  readonly received: RelayMessage[] = [];
  private listeners: Array<(msg: RelayMessage) => void> = [];

  private constructor(readonly ws: WebSocket) {
    ws.on("message", (data) => {
      const msg = decodeRelayMessage(data.toString());
      this.received.push(msg);
      for (const listener of this.listeners) listener(msg);
    });
  }

  static connect(port: number, identity: string, secret = TEST_SECRET): Promise<TestAgent> {
    const ws = new WebSocket(`ws://127.0.0.1:${port}/ws/tunnel?bot=${encodeURIComponent(identity)}`, {
      headers: { Authorization: `Bearer ${secret}` },
    });
    return new Promise((resolve, reject) => {
      ws.once("open", () => resolve(new TestAgent(ws)));
      ws.once("error", reject);
    });
  }

  /** Calls `handler` for every request envelope from now on. */
  onRequest(handler: (msg: Extract<RelayMessage, { type: "request" }>) => void): void {
    this.listeners.push((msg) => {
      if (msg.type === "request") handler(msg);
    });
  }

  nextRequest(): Promise<Extract<RelayMessage, { type: "request" }>> {
    return new Promise((resolve) => {
      const listener = (msg: RelayMessage) => {
        if (msg.type !== "request") return;
        this.listeners = this.listeners.filter((l) => l !== listener);
        resolve(msg);
      };
      this.listeners.push(listener);
    });
  }

  send(msg: AgentMessage): void {
    this.ws.send(encodeAgentMessage(msg));
  }

  close(): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise((resolve) => {
      this.ws.once("close", () => resolve());
      this.ws.close();
    });
  }
}

export function text(body: string): Uint8Array {
  return new TextEncoder().encode(body);
}

export interface LocalService {
  url: string;
  port: number;
  close(): Promise<void>;
}

/** An in-process HTTP service standing in for the agent's dashboard. */
export async function startLocalService(handler: http.RequestListener): Promise<LocalService> {
  const server = http.createServer(handler);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : 0;
  return {
    url: `http://127.0.0.1:${port}`,
    port,
    close: () =>
      new Promise<void>((resolve) => {
        server.closeAllConnections();
        server.close(() => resolve());
      }),
  };
}

/** A port nothing listens on. */
export async function closedPort(): Promise<number> {
  const service = await startLocalService(() => {});
  await service.close();
  return service.port;
}

export async function collect(body: AsyncIterable<Uint8Array>): Promise<string> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of body) chunks.push(chunk);
  return Buffer.concat(chunks).toString("utf8");
}
