// --- Relay -> agent messages ---

export interface RequestEnvelope {
  type: "request";
  id: string;
  method: string;
  path: string;
  headers: Record<string, string>;
  body: Uint8Array;
}

export interface CancelStreamMessage {
  type: "cancel_stream";
  id: string;
}

export type RelayMessage = RequestEnvelope | CancelStreamMessage;

// --- Agent -> relay messages ---

export interface ResponseMessage {
  type: "response";
  id: string;
  status: number;
  headers: Record<string, string>;
  body: Uint8Array;
}

export interface StreamStartMessage {
  type: "stream_start";
  id: string;
  status: number;
  headers: Record<string, string>;
}

export interface StreamChunkMessage {
  type: "stream_chunk";
  id: string;
  body: Uint8Array;
}

export interface StreamEndMessage {
  type: "stream_end";
  id: string;
}

export type AgentMessage =
  | ResponseMessage
  | StreamStartMessage
  | StreamChunkMessage
  | StreamEndMessage;

/** What a pending request settles with: a full reply or a stream hand-off. */
export type AgentReply = ResponseMessage | StreamStartMessage;

// --- Pending request tracking ---

export type PendingOutcome<T> =
  | { status: "resolved"; value: T }
  | { status: "timed_out" }
  | { status: "cancelled"; reason: string };

// --- Active stream items ---

export type StreamItem =
  | { type: "chunk"; data: Uint8Array }
  | { type: "end" };

// --- Control connection ---

/** The slice of a `ws` WebSocket the relay writes to. */
export interface ControlSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

// --- Agent-side tunnel state ---

export type TunnelStatus = "disabled" | "connecting" | "connected" | "disconnected";
