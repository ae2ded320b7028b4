import { ProtocolError } from "./errors.ts";
import { createLogger } from "./log.ts";
import { PendingTable } from "./pending.ts";
import { decodeAgentMessage, encodeRelayMessage } from "./protocol.ts";
import { ChunkQueue, type StreamHandle } from "./streaming.ts";
import type {
  AgentMessage,
  AgentReply,
  ControlSocket,
  RelayMessage,
  ResponseMessage,
  StreamChunkMessage,
  StreamEndMessage,
  StreamStartMessage,
} from "./types.ts";

const log = createLogger("session");

const WS_OPEN = 1;

/**
 * One agent's control connection and everything scoped to it: the requests
 * waiting for a reply and the streams currently being pumped to browsers.
 * Dropping the session drops all of it.
 */
export class AgentSession {
  readonly pending = new PendingTable<AgentReply>();
  readonly streams = new Map<string, ChunkQueue>();
  readonly connectedAt = Date.now();
  private closed = false;

  constructor(
    readonly identity: string,
    private readonly socket: ControlSocket,
    readonly remoteAddress: string = "unknown",
  ) {}

  get isOpen(): boolean {
    return !this.closed && this.socket.readyState === WS_OPEN;
  }

  /** Writes a message; resolves false if the socket is gone or the write fails. */
  send(msg: RelayMessage): Promise<boolean> {
    if (!this.isOpen) return Promise.resolve(false);
    return new Promise((resolve) => {
      try {
        this.socket.send(encodeRelayMessage(msg), (err) => {
          if (err) {
            log.warn("Send to agent failed", { agent: this.identity, error: err });
            resolve(false);
          } else {
            resolve(true);
          }
        });
      } catch (err) {
        log.warn("Send to agent failed", { agent: this.identity, error: err });
        resolve(false);
      }
    });
  }

  /** Entry point of the inbound message loop. Never throws. */
  handleMessage(raw: string): void {
    let msg: AgentMessage;
    try {
      msg = decodeAgentMessage(raw);
    } catch (err) {
      if (err instanceof ProtocolError) {
        log.warn("Dropping malformed message", { agent: this.identity, error: err });
        return;
      }
      throw err;
    }

    switch (msg.type) {
      case "response":
        this.handleResponse(msg);
        break;
      case "stream_start":
        this.handleStreamStart(msg);
        break;
      case "stream_chunk":
        this.handleStreamChunk(msg);
        break;
      case "stream_end":
        this.handleStreamEnd(msg);
        break;
    }
  }

  /** Browser-side view of an active stream, for `streamToBrowser`. */
  streamHandle(id: string): StreamHandle | undefined {
    const queue = this.streams.get(id);
    if (!queue) return undefined;
    return {
      id,
      queue,
      finish: (stopProducer) => this.finishStream(id, queue, stopProducer),
    };
  }

  /**
   * Cancels every pending request and ends every stream. Idempotent; the
   * first reason wins.
   */
  teardown(reason: string): void {
    if (this.closed) return;
    this.closed = true;
    const cancelled = this.pending.cancelAll(reason);
    for (const queue of this.streams.values()) queue.end();
    const streams = this.streams.size;
    this.streams.clear();
    if (cancelled > 0 || streams > 0) {
      log.info("Session torn down", { agent: this.identity, reason, cancelled, streams });
    }
  }

  close(code: number, reason: string): void {
    try {
      this.socket.close(code, reason);
    } catch (err) {
      log.debug("Close failed", { agent: this.identity, error: err });
    }
  }

  private handleResponse(msg: ResponseMessage): void {
    if (!this.pending.resolve(msg.id, msg)) {
      log.debug("Response for unknown id", { agent: this.identity, id: msg.id });
    }
  }

  private handleStreamStart(msg: StreamStartMessage): void {
    if (this.streams.has(msg.id)) {
      log.debug("Duplicate stream start ignored", { agent: this.identity, id: msg.id });
      return;
    }
    if (!this.pending.has(msg.id)) {
      log.debug("Stream start for unknown id, cancelling", { agent: this.identity, id: msg.id });
      void this.send({ type: "cancel_stream", id: msg.id });
      return;
    }
    // Queue first: chunks right behind the start must have somewhere to go.
    this.streams.set(msg.id, new ChunkQueue());
    this.pending.resolve(msg.id, msg);
  }

  private handleStreamChunk(msg: StreamChunkMessage): void {
    const queue = this.streams.get(msg.id);
    if (!queue) {
      log.debug("Chunk for unknown stream", { agent: this.identity, id: msg.id });
      return;
    }
    queue.push({ type: "chunk", data: msg.body });
  }

  private handleStreamEnd(msg: StreamEndMessage): void {
    const queue = this.streams.get(msg.id);
    if (!queue) {
      log.debug("End for unknown stream", { agent: this.identity, id: msg.id });
      return;
    }
    queue.end();
  }

  private finishStream(id: string, queue: ChunkQueue, stopProducer: boolean): void {
    if (this.streams.get(id) !== queue) return;
    this.streams.delete(id);
    // An ended queue means the agent already stopped; nothing to cancel.
    if (stopProducer && !queue.isEnded) {
      queue.end();
      void this.send({ type: "cancel_stream", id }).then((sent) => {
        if (!sent) log.debug("cancel_stream not delivered", { agent: this.identity, id });
      });
    }
  }
}
