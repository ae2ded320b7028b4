import type { RelayConfig } from "./config.ts";
import { createLimiters, destroyLimiters, type RelayLimiters } from "./rate_limit.ts";
import { AgentRegistry } from "./registry.ts";
import { RelayStats } from "./stats.ts";
import { UploadStore } from "./uploads.ts";

/** Everything a relay process owns, handed to each handler. */
export interface RelayContext {
  config: RelayConfig;
  registry: AgentRegistry;
  stats: RelayStats;
  limiters: RelayLimiters;
  uploads: UploadStore;
}

export function createRelayContext(config: RelayConfig): RelayContext {
  return {
    config,
    registry: new AgentRegistry(),
    stats: new RelayStats(),
    limiters: createLimiters(config),
    uploads: new UploadStore(config.uploadDir, config.maxUploadsPerAgent),
  };
}

export function disposeRelayContext(ctx: RelayContext): void {
  ctx.registry.closeAll();
  destroyLimiters(ctx.limiters);
}
