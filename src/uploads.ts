import { createWriteStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import busboy from "busboy";
import { createLogger } from "./log.ts";

const log = createLogger("uploads");

export interface StoredFile {
  name: string;
  bytes: number;
  modifiedAt: Date;
}

export interface AgentUploads {
  name: string;
  files: number;
  bytes: number;
}

/** Agent names become directory names; anything path-like is refused. */
export function safeAgentName(raw: string): string | null {
  const name = raw.trim();
  if (!name || name.includes("/") || name.includes("\\") || name.includes("..")) {
    return null;
  }
  return name;
}

export function safeFileName(raw: string): string | null {
  if (!raw || raw.includes("/") || raw.includes("\\") || raw.includes("..")) return null;
  if (!raw.endsWith(".zip")) return null;
  return raw;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** bugreport_YYYYMMDD_HHMMSS.zip in UTC. */
export function uploadFileName(at: Date): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `bugreport_${date}_${time}.zip`;
}

const WRITE_CHUNK_BYTES = 64 * 1024;

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Bug-report zips on disk, one directory per agent, newest `keepPerAgent`
 * kept.
 */
export class UploadStore {
  constructor(
    readonly dir: string,
    private readonly keepPerAgent: number,
  ) {}

  /**
   * Streams `source` to a new upload. The copy lands in a `.part` file and is
   * only renamed into place when `isComplete()` still holds once the source
   * ends; otherwise it is removed and null is returned.
   */
  async saveStream(
    agent: string,
    source: Readable,
    isComplete: () => boolean = () => true,
    at: Date = new Date(),
  ): Promise<StoredFile | null> {
    const agentDir = path.join(this.dir, agent);
    await fs.mkdir(agentDir, { recursive: true });
    const name = uploadFileName(at);
    const target = path.join(agentDir, name);
    const partial = `${target}.part`;

    try {
      await pipeline(source, createWriteStream(partial, { highWaterMark: WRITE_CHUNK_BYTES }));
    } catch (err) {
      await fs.rm(partial, { force: true });
      throw err;
    }
    if (!isComplete()) {
      await fs.rm(partial, { force: true });
      return null;
    }

    await fs.rename(partial, target);
    const { size } = await fs.stat(target);
    await this.prune(agent);
    log.info("Stored upload", { agent, file: name, bytes: size });
    return { name, bytes: size, modifiedAt: at };
  }

  /** Newest first. Empty when the agent has no uploads. */
  async list(agent: string): Promise<StoredFile[]> {
    const agentDir = path.join(this.dir, agent);
    let entries: string[];
    try {
      entries = await fs.readdir(agentDir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }

    const files: StoredFile[] = [];
    for (const name of entries) {
      if (!name.endsWith(".zip")) continue;
      const stat = await fs.stat(path.join(agentDir, name));
      if (!stat.isFile()) continue;
      files.push({ name, bytes: stat.size, modifiedAt: stat.mtime });
    }
    return files.sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime());
  }

  async agents(): Promise<AgentUploads[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }

    const result: AgentUploads[] = [];
    for (const name of entries.sort()) {
      const stat = await fs.stat(path.join(this.dir, name));
      if (!stat.isDirectory()) continue;
      const files = await this.list(name);
      if (files.length === 0) continue;
      result.push({
        name,
        files: files.length,
        bytes: files.reduce((sum, f) => sum + f.bytes, 0),
      });
    }
    return result;
  }

  filePath(agent: string, file: string): string {
    return path.join(this.dir, agent, file);
  }

  async remove(agent: string, file: string): Promise<boolean> {
    try {
      await fs.unlink(this.filePath(agent, file));
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
    log.info("Deleted upload", { agent, file });
    return true;
  }

  /** Deletes every zip for `agent`; returns how many were removed. */
  async removeAll(agent: string): Promise<number> {
    const files = await this.list(agent);
    for (const f of files) {
      await fs.unlink(this.filePath(agent, f.name));
    }
    try {
      await fs.rmdir(path.join(this.dir, agent));
    } catch (err) {
      log.debug("Upload directory kept", { agent, error: err });
    }
    log.info("Deleted all uploads", { agent, count: files.length });
    return files.length;
  }

  async prune(agent: string): Promise<number> {
    const files = await this.list(agent);
    const stale = files.slice(this.keepPerAgent);
    for (const f of stale) {
      await fs.unlink(this.filePath(agent, f.name));
      log.info("Pruned old upload", { agent, file: f.name });
    }
    return stale.length;
  }
}

export type UploadResult =
  | { ok: true; file: StoredFile }
  | { ok: false; status: 400 | 413; error: string };

type SaveOutcome = { ok: true; file: StoredFile | null } | { ok: false; error: unknown };

async function* bodyChunks(body: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) return;
      yield value;
    }
  } finally {
    reader.releaseLock();
  }
}

function createParser(contentType: string, maxBytes: number): ReturnType<typeof busboy> | null {
  try {
    return busboy({
      headers: { "content-type": contentType },
      limits: { files: 1, fileSize: maxBytes },
    });
  } catch (err) {
    // No usable boundary in the content type.
    log.debug("Unreadable multipart body", { error: err });
    return null;
  }
}

/**
 * Streams the `file` part of a multipart request into `store` without
 * holding the body in memory. Other parts are skipped. A body stream error
 * (such as a body limit) is rethrown after the partial file is removed.
 */
export async function receiveUpload(
  store: UploadStore,
  agent: string,
  req: Request,
  maxBytes: number,
): Promise<UploadResult> {
  const missing = { ok: false, status: 400, error: "Missing 'file' field" } as const;
  const contentType = req.headers.get("content-type") ?? "";
  if (!req.body || !contentType.toLowerCase().startsWith("multipart/form-data")) return missing;

  const parser = createParser(contentType, maxBytes);
  if (!parser) return missing;

  const upload: { saved: Promise<SaveOutcome> | null } = { saved: null };
  parser.on("file", (field, stream) => {
    if (field !== "file" || upload.saved) {
      stream.resume();
      return;
    }
    let truncated = false;
    stream.on("limit", () => {
      truncated = true;
    });
    upload.saved = store.saveStream(agent, stream, () => !truncated).then(
      (file): SaveOutcome => ({ ok: true, file }),
      (error: unknown): SaveOutcome => ({ ok: false, error }),
    );
  });

  try {
    await pipeline(Readable.from(bodyChunks(req.body)), parser);
  } catch (err) {
    if (upload.saved) await upload.saved;
    throw err;
  }

  const { saved } = upload;
  if (!saved) return missing;
  const outcome: SaveOutcome = await saved;
  if (!outcome.ok) throw outcome.error;
  if (!outcome.file) {
    return {
      ok: false,
      status: 413,
      error: `Upload exceeds ${Math.floor(maxBytes / (1024 * 1024))} MB limit`,
    };
  }
  return { ok: true, file: outcome.file };
}
