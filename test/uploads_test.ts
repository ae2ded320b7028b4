import fs from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { expect, test } from "vitest";
import {
  receiveUpload,
  safeAgentName,
  safeFileName,
  type StoredFile,
  UploadStore,
  uploadFileName,
} from "../src/uploads.ts";
import { tempDir, text } from "./helpers.ts";

async function saveText(store: UploadStore, agent: string, body: string, at: Date): Promise<StoredFile> {
  const stored = await store.saveStream(agent, Readable.from([text(body)]), () => true, at);
  if (!stored) throw new Error("upload was not stored");
  return stored;
}

function uploadRequest(form: FormData): Request {
  return new Request("http://relay.test/_upload?bot=agentA", { method: "POST", body: form });
}

test("safeAgentName - refuses path-like names", () => {
  expect(safeAgentName("agentA")).toBe("agentA");
  expect(safeAgentName("  agentA ")).toBe("agentA");
  expect(safeAgentName("")).toBeNull();
  expect(safeAgentName("   ")).toBeNull();
  expect(safeAgentName("a/b")).toBeNull();
  expect(safeAgentName("a\\b")).toBeNull();
  expect(safeAgentName("..")).toBeNull();
});

test("safeFileName - zip files only, no separators", () => {
  expect(safeFileName("bugreport_20260101_120000.zip")).toBe("bugreport_20260101_120000.zip");
  expect(safeFileName("notes.txt")).toBeNull();
  expect(safeFileName("../x.zip")).toBeNull();
  expect(safeFileName("a/x.zip")).toBeNull();
  expect(safeFileName("")).toBeNull();
});

test("uploadFileName - UTC timestamp", () => {
  expect(uploadFileName(new Date(Date.UTC(2026, 2, 4, 5, 6, 7)))).toBe("bugreport_20260304_050607.zip");
});

test("UploadStore - save, list and read back", async () => {
  const dir = tempDir();
  const store = new UploadStore(dir, 10);
  const at = new Date(Date.UTC(2026, 0, 2, 3, 4, 5));
  const stored = await saveText(store, "agentA", "zipdata", at);

  expect(stored).toEqual({ name: "bugreport_20260102_030405.zip", bytes: 7, modifiedAt: at });
  const onDisk = await fs.readFile(path.join(dir, "agentA", stored.name), "utf8");
  expect(onDisk).toBe("zipdata");
  expect((await store.list("agentA")).map((f) => f.name)).toEqual([stored.name]);
  expect(await store.agents()).toEqual([{ name: "agentA", files: 1, bytes: 7 }]);
});

test("UploadStore - keeps only the newest files", async () => {
  const dir = tempDir();
  const store = new UploadStore(dir, 2);
  for (let i = 0; i < 4; i++) {
    const at = new Date(Date.UTC(2026, 0, 1, 0, 0, i));
    const { name } = await saveText(store, "agentA", `r${i}`, at);
    await fs.utimes(path.join(dir, "agentA", name), at, at);
  }

  expect((await store.list("agentA")).map((f) => f.name)).toEqual([
    "bugreport_20260101_000003.zip",
    "bugreport_20260101_000002.zip",
  ]);
});

test("UploadStore - missing agent lists nothing", async () => {
  const store = new UploadStore(tempDir(), 10);
  expect(await store.list("nobody")).toEqual([]);
  expect(await new UploadStore(path.join(tempDir(), "absent"), 10).agents()).toEqual([]);
});

test("UploadStore - remove and removeAll", async () => {
  const store = new UploadStore(tempDir(), 10);
  const a = await saveText(store, "agentA", "a", new Date(Date.UTC(2026, 0, 1, 0, 0, 1)));
  await saveText(store, "agentA", "b", new Date(Date.UTC(2026, 0, 1, 0, 0, 2)));

  expect(await store.remove("agentA", a.name)).toBe(true);
  expect(await store.remove("agentA", a.name)).toBe(false);
  expect(await store.removeAll("agentA")).toBe(1);
  expect(await store.list("agentA")).toEqual([]);
  expect(await store.agents()).toEqual([]);
});

test("UploadStore - incomplete stream leaves nothing behind", async () => {
  const dir = tempDir();
  const store = new UploadStore(dir, 10);
  const stored = await store.saveStream("agentA", Readable.from([text("partial")]), () => false);
  expect(stored).toBeNull();
  expect(await fs.readdir(path.join(dir, "agentA"))).toEqual([]);
});

test("UploadStore - failing source removes the partial file", async () => {
  const dir = tempDir();
  const store = new UploadStore(dir, 10);
  async function* broken(): AsyncGenerator<Uint8Array> {
    yield text("half");
    throw new Error("connection reset");
  }
  await expect(store.saveStream("agentA", Readable.from(broken()))).rejects.toThrow("connection reset");
  expect(await fs.readdir(path.join(dir, "agentA"))).toEqual([]);
});

test("receiveUpload - streams the file part and skips other fields", async () => {
  const dir = tempDir();
  const store = new UploadStore(dir, 10);
  const form = new FormData();
  form.append("note", "crashed on start");
  form.append("file", new File(["zipdata"], "report.zip", { type: "application/zip" }));

  const result = await receiveUpload(store, "agentA", uploadRequest(form), 1024);
  expect(result.ok).toBe(true);
  if (!result.ok) return;
  expect(result.file.bytes).toBe(7);
  const onDisk = await fs.readFile(path.join(dir, "agentA", result.file.name), "utf8");
  expect(onDisk).toBe("zipdata");
});

test("receiveUpload - oversized file is refused and not kept", async () => {
  const dir = tempDir();
  const store = new UploadStore(dir, 10);
  const form = new FormData();
  form.append("file", new File(["x".repeat(64)], "big.zip"));

  const result = await receiveUpload(store, "agentA", uploadRequest(form), 16);
  expect(result).toEqual({ ok: false, status: 413, error: "Upload exceeds 0 MB limit" });
  expect(await store.list("agentA")).toEqual([]);
  expect(await fs.readdir(path.join(dir, "agentA"))).toEqual([]);
});

test("receiveUpload - non-multipart body has no file", async () => {
  const store = new UploadStore(tempDir(), 10);
  const req = new Request("http://relay.test/_upload", { method: "POST", body: "zipdata" });
  expect(await receiveUpload(store, "agentA", req, 1024)).toEqual({
    ok: false,
    status: 400,
    error: "Missing 'file' field",
  });
});
