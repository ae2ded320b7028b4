import fs from "node:fs/promises";
import { getConnInfo } from "@hono/node-server/conninfo";
import { Hono, type Context, type MiddlewareHandler } from "hono";
import { bodyLimit } from "hono/body-limit";
import { isAuthorized } from "./auth.ts";
import { TUNNEL_PATH } from "./config.ts";
import type { RelayContext } from "./context.ts";
import { agentPrefix, textResponse, toArrayBuffer } from "./http.ts";
import { createLogger } from "./log.ts";
import { adminAgentPage, adminIndexPage, landingPage } from "./pages.ts";
import { relayRequest } from "./relay.ts";
import { receiveUpload, safeAgentName, safeFileName } from "./uploads.ts";

const log = createLogger("http");

export function getClientIp(c: Context): string {
  const forwarded = c.req.header("x-forwarded-for")?.split(",")[0]?.trim();
  if (forwarded) return forwarded;
  try {
    return getConnInfo(c).remote.address ?? "unknown";
  } catch {
    // No node socket behind the request (e.g. app.request() in tests).
    return "unknown";
  }
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    // Malformed escapes stay as sent and match no agent.
    return segment;
  }
}

/**
 * Splits `/<identity>/<rest>` into the decoded identity and the path to
 * forward, which keeps its encoding.
 */
export function splitAgentPath(pathname: string): { identity: string; rest: string | null } {
  const trimmed = pathname.replace(/^\/+/, "");
  const slash = trimmed.indexOf("/");
  if (slash === -1) return { identity: decodeSegment(trimmed), rest: null };
  return { identity: decodeSegment(trimmed.slice(0, slash)), rest: trimmed.slice(slash) };
}

export function createRelayApp(ctx: RelayContext): Hono {
  const app = new Hono();
  const { config, registry, uploads, limiters, stats } = ctx;

  const authorized = (c: Context) =>
    isAuthorized(c.req.header("authorization"), c.req.query("secret"), config.secret);

  app.onError((err, c) => {
    log.error("Unhandled error", { method: c.req.method, path: c.req.path, error: err });
    return c.json({ error: "internal_error" }, 500);
  });

  app.get("/", (c) => c.html(landingPage()));

  app.get("/health", (c) => c.json({ status: "ok", agents: registry.size }));

  app.get("/stats", (c) => {
    if (!limiters.stats.allow(getClientIp(c))) {
      return c.json({ error: "rate_limited" }, 429);
    }
    return c.json(stats.snapshot(registry));
  });

  // Upgrades never reach here; see server.ts.
  app.get(TUNNEL_PATH, (c) => c.json({ error: "websocket_required" }, 400));

  // --- Bug-report uploads ---

  app.post(
    "/_upload",
    bodyLimit({
      maxSize: config.maxUploadBytes,
      onError: (c) =>
        c.text(`Upload exceeds ${Math.floor(config.maxUploadBytes / (1024 * 1024))} MB limit`, 413),
    }),
    async (c) => {
      if (!authorized(c)) return c.text("Invalid secret", 403);
      const agent = safeAgentName(c.req.query("bot") ?? "");
      if (!agent) return c.text("Invalid bot name", 400);

      const result = await receiveUpload(uploads, agent, c.req.raw, config.maxUploadBytes);
      if (!result.ok) return c.text(result.error, result.status);
      return c.json({ status: "ok", size: result.file.bytes, file: result.file.name });
    },
  );

  // --- Admin ---

  const requireSecret: MiddlewareHandler = async (c, next) => {
    if (!authorized(c)) return c.text("Invalid secret", 403);
    await next();
  };
  app.use("/_admin", requireSecret);
  app.use("/_admin/*", requireSecret);

  const adminIndex = async (c: Context) => {
    const rows = (await uploads.agents()).map((a) => ({
      ...a,
      online: registry.isOnline(a.name),
    }));
    return c.html(adminIndexPage(rows, c.req.query("secret") ?? ""));
  };
  app.get("/_admin", adminIndex);
  app.get("/_admin/uploads", adminIndex);

  app.get("/_admin/uploads/:agent", async (c) => {
    const agent = safeAgentName(c.req.param("agent"));
    if (!agent) return c.text("Invalid bot name", 400);
    const files = await uploads.list(agent);
    if (files.length === 0) return c.text("No uploads for this bot", 404);
    return c.html(adminAgentPage(agent, files, c.req.query("secret") ?? ""));
  });

  app.delete("/_admin/uploads/:agent", async (c) => {
    const agent = safeAgentName(c.req.param("agent"));
    if (!agent) return c.text("Invalid bot name", 400);
    if ((await uploads.list(agent)).length === 0) return c.text("No uploads for this bot", 404);
    const deleted = await uploads.removeAll(agent);
    return c.json({ status: "ok", deleted });
  });

  app.get("/_admin/uploads/:agent/:file", async (c) => {
    const agent = safeAgentName(c.req.param("agent"));
    if (!agent) return c.text("Invalid bot name", 400);
    const file = safeFileName(c.req.param("file"));
    if (!file) return c.text("Invalid filename", 400);

    let data: Buffer;
    try {
      data = await fs.readFile(uploads.filePath(agent, file));
    } catch {
      return c.text("File not found", 404);
    }
    return c.body(toArrayBuffer(data), 200, {
      "content-type": "application/zip",
      "content-disposition": `attachment; filename="${file}"`,
    });
  });

  app.delete("/_admin/uploads/:agent/:file", async (c) => {
    const agent = safeAgentName(c.req.param("agent"));
    if (!agent) return c.text("Invalid bot name", 400);
    const file = safeFileName(c.req.param("file"));
    if (!file) return c.text("Invalid filename", 400);
    if (!(await uploads.remove(agent, file))) return c.text("File not found", 404);
    return c.json({ status: "ok", deleted: file });
  });

  // --- Agent routing: /<identity>/... ---

  app.all("*", (c) => {
    const url = new URL(c.req.url);
    const { identity, rest } = splitAgentPath(url.pathname);
    if (!identity) return textResponse("Not Found", 404);

    if (rest === null) {
      return c.redirect(`${agentPrefix(identity)}/${url.search}`, 302);
    }

    return relayRequest(ctx, identity, rest + url.search, c.req.raw, getClientIp(c));
  });

  return app;
}
