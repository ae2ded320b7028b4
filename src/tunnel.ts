import type { WebSocket } from "ws";
import type { RelayContext } from "./context.ts";
import { createLogger } from "./log.ts";
import { AgentSession } from "./session.ts";

const log = createLogger("tunnel");

const MAX_MISSED_PINGS = 3;

/**
 * Wires an accepted control connection into the registry: inbound text
 * frames go to the session, close unregisters it, and a keepalive ping
 * terminates connections that stop answering.
 */
export function attachControlConnection(
  ctx: RelayContext,
  ws: WebSocket,
  identity: string,
  remoteAddress: string,
): AgentSession {
  const session = new AgentSession(identity, ws, remoteAddress);
  ctx.registry.register(session);
  ctx.stats.recordTunnelConnect();

  let missedPings = 0;
  const keepaliveTimer = setInterval(() => {
    if (missedPings >= MAX_MISSED_PINGS) {
      log.warn("Keepalive timeout", { agent: identity, missedPings });
      clearInterval(keepaliveTimer);
      ws.terminate();
      return;
    }
    missedPings++;
    ws.ping();
  }, ctx.config.keepaliveIntervalMs);
  keepaliveTimer.unref();

  ws.on("pong", () => {
    missedPings = 0;
  });

  ws.on("message", (data, isBinary) => {
    if (isBinary) {
      log.warn("Ignoring binary frame", { agent: identity });
      return;
    }
    session.handleMessage(data.toString());
  });

  ws.on("close", (code, reason) => {
    clearInterval(keepaliveTimer);
    log.debug("Control connection closed", {
      agent: identity,
      code,
      reason: reason.toString(),
    });
    ctx.registry.unregister(identity, session);
  });

  ws.on("error", (err) => {
    log.error("Control connection error", { agent: identity, error: err });
  });

  return session;
}
