import { setTimeout as delay } from "node:timers/promises";
import { WebSocket } from "ws";
import { ProtocolError } from "../errors.ts";
import { createLogger } from "../log.ts";
import { decodeRelayMessage, encodeAgentMessage } from "../protocol.ts";
import type { AgentMessage, RelayMessage, RequestEnvelope, TunnelStatus } from "../types.ts";
import { type ForwardResult, LocalForwarder } from "./forwarder.ts";
import { TaskPool } from "./pool.ts";

const log = createLogger("tunnel-client");

const MAX_FRAME_BYTES = 16 * 1024 * 1024;

export interface TunnelClientOptions {
  /** ws:// or wss:// URL of the relay's control endpoint. */
  relayUrl: string;
  secret: string;
  identity: string;
  forwarder?: LocalForwarder;
  poolSize?: number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
  /** A connection that lasted this long resets the backoff to base. */
  stableAfterMs?: number;
  pingIntervalMs?: number;
  pongTimeoutMs?: number;
  chunkSize?: number;
  onStatus?: (status: TunnelStatus) => void;
}

type StreamResult = Extract<ForwardResult, { kind: "stream" }>;

/**
 * Reconnect delays: doubling from `baseMs` up to `maxMs`, back to `baseMs`
 * only after a connection that stayed up for `stableAfterMs`.
 */
export class Backoff {
  private current: number;

  constructor(
    private readonly baseMs: number,
    private readonly maxMs: number,
    private readonly stableAfterMs: number,
  ) {
    this.current = baseMs;
  }

  /** Delay before the next attempt; `uptime` is null when the last one never opened. */
  next(uptime: number | null): number {
    if (uptime !== null && uptime >= this.stableAfterMs) {
      this.current = this.baseMs;
    }
    const delay = this.current;
    this.current = Math.min(this.current * 2, this.maxMs);
    return delay;
  }
}

/**
 * Keeps one control connection to the relay open, reconnecting with
 * exponential backoff, and answers each request envelope through the local
 * forwarder.
 */
export class TunnelClient {
  private readonly forwarder: LocalForwarder;
  private readonly pool: TaskPool;
  private readonly pingIntervalMs: number;
  private readonly pongTimeoutMs: number;
  private readonly chunkSize: number;

  private _status: TunnelStatus = "disabled";
  private loop: Promise<void> | null = null;
  private stopController: AbortController | null = null;
  // request id -> abort for the local request (and its stream body)
  private readonly active = new Map<string, AbortController>();

  constructor(private readonly opts: TunnelClientOptions) {
    this.forwarder = opts.forwarder ?? new LocalForwarder();
    this.pool = new TaskPool(opts.poolSize ?? 4);
    this.pingIntervalMs = opts.pingIntervalMs ?? 30_000;
    this.pongTimeoutMs = opts.pongTimeoutMs ?? 10_000;
    this.chunkSize = opts.chunkSize ?? 64 * 1024;
  }

  get status(): TunnelStatus {
    return this._status;
  }

  /** Number of requests currently being served, streams included. */
  get activeRequests(): number {
    return this.active.size;
  }

  /** Starts the connect loop. A second call while running does nothing. */
  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.stopController = controller;
    this.loop = this.run(controller.signal).catch((err: unknown) => {
      log.error("Tunnel loop crashed", { error: err });
      this.loop = null;
      this.stopController = null;
      this.setStatus("disabled");
    });
  }

  /** Closes the connection, interrupts any backoff wait and settles in `disabled`. */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.stopController?.abort();
    await loop;
    this.loop = null;
    this.stopController = null;
  }

  private setStatus(status: TunnelStatus): void {
    if (this._status === status) return;
    this._status = status;
    this.opts.onStatus?.(status);
  }

  private async run(signal: AbortSignal): Promise<void> {
    const backoff = new Backoff(
      this.opts.backoffBaseMs ?? 5_000,
      this.opts.backoffMaxMs ?? 60_000,
      this.opts.stableAfterMs ?? 10_000,
    );

    while (!signal.aborted) {
      this.setStatus("connecting");
      const uptime = await this.connectOnce(signal);
      if (signal.aborted) break;

      this.setStatus("disconnected");
      const delayMs = backoff.next(uptime);
      log.info("Reconnecting", { delayMs });
      if (!(await sleep(delayMs, signal))) break;
    }

    this.setStatus("disabled");
    log.info("Tunnel stopped", { identity: this.opts.identity });
  }

  /**
   * One connection attempt, resolved when the socket closes. Yields how long
   * the connection was open, or null if it never opened.
   */
  private connectOnce(signal: AbortSignal): Promise<number | null> {
    const url = new URL(this.opts.relayUrl);
    url.searchParams.set("bot", this.opts.identity);

    return new Promise((resolve) => {
      const ws = new WebSocket(url, {
        headers: { Authorization: `Bearer ${this.opts.secret}` },
        maxPayload: MAX_FRAME_BYTES,
      });

      let openedAt: number | null = null;
      let pingTimer: ReturnType<typeof setInterval> | undefined;
      let pongTimer: ReturnType<typeof setTimeout> | undefined;

      const onAbort = () => ws.close(1000, "stopped");
      signal.addEventListener("abort", onAbort, { once: true });

      ws.on("open", () => {
        openedAt = Date.now();
        this.setStatus("connected");
        log.info("Tunnel connected", { identity: this.opts.identity });

        pingTimer = setInterval(() => {
          ws.ping();
          pongTimer ??= setTimeout(() => {
            log.warn("No pong from relay, dropping connection");
            ws.terminate();
          }, this.pongTimeoutMs);
        }, this.pingIntervalMs);
      });

      ws.on("pong", () => {
        clearTimeout(pongTimer);
        pongTimer = undefined;
      });

      ws.on("message", (data, isBinary) => {
        if (isBinary) {
          log.warn("Ignoring binary frame");
          return;
        }
        this.onMessage(ws, data.toString());
      });

      ws.on("error", (err) => {
        log.warn("Tunnel error", { error: err });
      });

      ws.on("close", (code, reason) => {
        clearInterval(pingTimer);
        clearTimeout(pongTimer);
        signal.removeEventListener("abort", onAbort);
        for (const controller of this.active.values()) controller.abort();

        const uptime = openedAt === null ? null : Date.now() - openedAt;
        if (openedAt !== null) {
          log.info("Tunnel disconnected", { code, reason: reason.toString(), uptimeMs: uptime });
        }
        resolve(uptime);
      });
    });
  }

  private onMessage(ws: WebSocket, raw: string): void {
    let msg: RelayMessage;
    try {
      msg = decodeRelayMessage(raw);
    } catch (err) {
      if (err instanceof ProtocolError) {
        log.warn("Dropping malformed message", { error: err });
        return;
      }
      throw err;
    }

    switch (msg.type) {
      case "cancel_stream": {
        const controller = this.active.get(msg.id);
        if (controller) {
          log.debug("Stream cancelled by relay", { id: msg.id });
          controller.abort();
        }
        break;
      }
      case "request":
        this.handleRequest(ws, msg).catch((err: unknown) => {
          log.error("Request handling failed", { id: msg.id, error: err });
        });
        break;
    }
  }

  private async handleRequest(ws: WebSocket, envelope: RequestEnvelope): Promise<void> {
    const controller = new AbortController();
    this.active.set(envelope.id, controller);
    try {
      // The pool slot covers the local round trip up to the response head.
      const result = await this.pool.run(() =>
        this.forwarder.forward(envelope, controller.signal)
      );
      if (result.kind === "response") {
        await send(ws, result.message);
        return;
      }
      await this.pumpStream(ws, result, controller);
    } finally {
      this.active.delete(envelope.id);
    }
  }

  private async pumpStream(
    ws: WebSocket,
    stream: StreamResult,
    controller: AbortController,
  ): Promise<void> {
    const { id } = stream;
    if (!(await send(ws, { type: "stream_start", id, status: stream.status, headers: stream.headers }))) {
      controller.abort();
      return;
    }

    try {
      pump: for await (const chunk of stream.body) {
        for (let offset = 0; offset < chunk.byteLength; offset += this.chunkSize) {
          const body = chunk.subarray(offset, offset + this.chunkSize);
          if (!(await send(ws, { type: "stream_chunk", id, body }))) {
            controller.abort();
            break pump;
          }
        }
      }
    } catch (err) {
      if (!controller.signal.aborted) {
        log.debug("Stream read error", { id, error: err });
      }
    }

    await send(ws, { type: "stream_end", id });
  }
}

function send(ws: WebSocket, msg: AgentMessage): Promise<boolean> {
  if (ws.readyState !== WebSocket.OPEN) return Promise.resolve(false);
  return new Promise((resolve) => {
    ws.send(encodeAgentMessage(msg), (err) => {
      if (err) log.debug("Send to relay failed", { id: msg.id, error: err });
      resolve(!err);
    });
  });
}

/** Resolves true after `ms`, or false as soon as `signal` aborts. */
async function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (signal.aborted) return false;
    throw err;
  }
}
