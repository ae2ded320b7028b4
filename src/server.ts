import http from "node:http";
import type { Duplex } from "node:stream";
import { getRequestListener } from "@hono/node-server";
import { WebSocketServer } from "ws";
import { authorizeConnect } from "./auth.ts";
import { TUNNEL_PATH, type RelayConfig } from "./config.ts";
import { createRelayContext, disposeRelayContext, type RelayContext } from "./context.ts";
import { createLogger } from "./log.ts";
import { createRelayApp } from "./router.ts";
import { attachControlConnection } from "./tunnel.ts";

const log = createLogger("server");

const MAX_FRAME_BYTES = 16 * 1024 * 1024;

export interface RelayServer {
  port: number;
  ctx: RelayContext;
  close(): Promise<void>;
}

function rejectUpgrade(socket: Duplex, status: number, reason: string, body: string): void {
  socket.once("finish", () => socket.destroy());
  socket.end(
    `HTTP/1.1 ${status} ${reason}\r\n` +
      "Content-Type: text/plain; charset=utf-8\r\n" +
      `Content-Length: ${Buffer.byteLength(body)}\r\n` +
      "Connection: close\r\n\r\n" +
      body,
  );
}

function remoteAddressOf(req: http.IncomingMessage): string {
  const forwarded = req.headers["x-forwarded-for"];
  const first = (Array.isArray(forwarded) ? forwarded[0] : forwarded)?.split(",")[0]?.trim();
  return first || req.socket.remoteAddress || "unknown";
}

/** Starts the relay's HTTP listener with the agent upgrade endpoint attached. */
export async function startRelayServer(config: RelayConfig): Promise<RelayServer> {
  const ctx = createRelayContext(config);
  const app = createRelayApp(ctx);

  const server = http.createServer(getRequestListener(app.fetch));
  const wss = new WebSocketServer({ noServer: true, maxPayload: MAX_FRAME_BYTES });

  server.on("upgrade", (req, socket, head) => {
    const url = new URL(req.url ?? "/", "http://relay.invalid");
    if (url.pathname !== TUNNEL_PATH) {
      rejectUpgrade(socket, 404, "Not Found", "Not Found");
      return;
    }

    const ip = remoteAddressOf(req);
    if (!ctx.limiters.tunnel.allow(ip)) {
      log.warn("Connect rate limited", { ip });
      rejectUpgrade(socket, 429, "Too Many Requests", "rate_limited");
      return;
    }

    const decision = authorizeConnect(
      {
        authorization: req.headers.authorization,
        secretParam: url.searchParams.get("secret"),
        identity: url.searchParams.get("bot"),
      },
      config.secret,
    );
    if (!decision.ok) {
      log.warn("Agent refused", { ip, status: decision.status, error: decision.error });
      rejectUpgrade(
        socket,
        decision.status,
        decision.status === 400 ? "Bad Request" : "Forbidden",
        decision.error,
      );
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      attachControlConnection(ctx, ws, decision.identity, ip);
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, config.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : config.port;
  log.info("Relay listening", { host: config.host, port });

  return {
    port,
    ctx,
    close: () =>
      new Promise<void>((resolve, reject) => {
        disposeRelayContext(ctx);
        wss.close();
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
