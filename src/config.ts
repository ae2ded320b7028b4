import crypto from "node:crypto";
import path from "node:path";
import { z } from "zod";

export const TUNNEL_PATH = "/ws/tunnel";

export const RelayConfigSchema = z.object({
  /** Shared secret agents and admins present. Empty means every agent is refused. */
  secret: z.string(),
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  uploadDir: z.string().min(1),
  requestTimeoutMs: z.number().int().positive(),
  streamChunkTimeoutMs: z.number().int().positive(),
  requestsPerMinute: z.number().int().positive(),
  connectsPerMinute: z.number().int().positive(),
  maxBodyBytes: z.number().int().positive(),
  maxUploadBytes: z.number().int().positive(),
  maxUploadsPerAgent: z.number().int().positive(),
  keepaliveIntervalMs: z.number().int().positive(),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

export const DEFAULT_RELAY_CONFIG: RelayConfig = {
  secret: "",
  host: "0.0.0.0",
  port: 8080,
  uploadDir: path.resolve(process.cwd(), "uploads"),
  requestTimeoutMs: 30_000,
  streamChunkTimeoutMs: 10_000,
  requestsPerMinute: 600,
  connectsPerMinute: 20,
  maxBodyBytes: 10 * 1024 * 1024,
  maxUploadBytes: 150 * 1024 * 1024,
  maxUploadsPerAgent: 10,
  keepaliveIntervalMs: 30_000,
};

type Env = Record<string, string | undefined>;

function parseIntEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) return fallback;
  return value;
}

export function loadRelayConfig(env: Env = process.env): RelayConfig {
  const d = DEFAULT_RELAY_CONFIG;
  return RelayConfigSchema.parse({
    secret: env.RELAY_SECRET ?? d.secret,
    host: env.RELAY_HOST ?? d.host,
    port: parseIntEnv(env, "RELAY_PORT", d.port),
    uploadDir: env.UPLOAD_DIR ? path.resolve(env.UPLOAD_DIR) : d.uploadDir,
    requestTimeoutMs: parseIntEnv(env, "REQUEST_TIMEOUT_MS", d.requestTimeoutMs),
    streamChunkTimeoutMs: parseIntEnv(env, "STREAM_CHUNK_TIMEOUT_MS", d.streamChunkTimeoutMs),
    requestsPerMinute: parseIntEnv(env, "RELAY_REQUESTS_PER_MINUTE", d.requestsPerMinute),
    connectsPerMinute: parseIntEnv(env, "RELAY_CONNECTS_PER_MINUTE", d.connectsPerMinute),
    maxBodyBytes: d.maxBodyBytes,
    maxUploadBytes: d.maxUploadBytes,
    maxUploadsPerAgent: d.maxUploadsPerAgent,
    keepaliveIntervalMs: d.keepaliveIntervalMs,
  });
}

/** Stable 10-hex-char agent identity derived from a license key. */
export function deriveAgentIdentity(licenseKey: string): string {
  return crypto.createHash("sha256").update(licenseKey).digest("hex").slice(0, 10);
}
