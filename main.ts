import { loadRelayConfig } from "./src/config.ts";
import { createLogger } from "./src/log.ts";
import { startRelayServer } from "./src/server.ts";

const log = createLogger("main");

const config = loadRelayConfig();
if (!config.secret) {
  log.error("RELAY_SECRET is not set; refusing to start");
  process.exit(1);
}

const relay = await startRelayServer(config);

let stopping = false;
async function shutdown(signal: string): Promise<void> {
  if (stopping) return;
  stopping = true;
  log.info("Shutting down", { signal });
  await relay.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      log.error("Shutdown failed", { error: err });
      process.exit(1);
    });
  });
}
