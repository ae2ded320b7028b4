/**
 * Agent CLI: keeps a tunnel from a relay to a local dashboard open.
 *
 * Usage:
 *   npm run agent -- --relay wss://relay.example.com/ws/tunnel \
 *     --secret <secret> --bot my-agent --local http://127.0.0.1:8080
 */

import { Command } from "commander";
import { DEFAULT_LOCAL_URL, LocalForwarder } from "../src/agent/forwarder.ts";
import { TunnelClient } from "../src/agent/tunnel_client.ts";
import { deriveAgentIdentity } from "../src/config.ts";
import { createLogger } from "../src/log.ts";

const log = createLogger("agent");

type AgentOptions = {
  relay: string;
  secret?: string;
  bot?: string;
  licenseKey?: string;
  local: string;
};

const program = new Command();

program
  .name("dashboard-agent")
  .description("Expose a local dashboard through a relay")
  .requiredOption("-r, --relay <url>", "Relay control endpoint (ws:// or wss://)")
  .option("-s, --secret <secret>", "Shared relay secret (default: $RELAY_SECRET)")
  .option("-b, --bot <name>", "Agent identity")
  .option("-k, --license-key <key>", "Derive the agent identity from a license key")
  .option("-l, --local <url>", "Local service base URL", DEFAULT_LOCAL_URL)
  .action(async () => {
    const opts = program.opts<AgentOptions>();
    const secret = opts.secret ?? process.env.RELAY_SECRET ?? "";
    if (!secret) {
      program.error("A relay secret is required (--secret or RELAY_SECRET)");
    }

    const identity = opts.bot ?? (opts.licenseKey ? deriveAgentIdentity(opts.licenseKey) : "");
    if (!identity) {
      program.error("An agent identity is required (--bot or --license-key)");
    }

    const client = new TunnelClient({
      relayUrl: opts.relay,
      secret,
      identity,
      forwarder: new LocalForwarder({ baseUrl: opts.local }),
      onStatus: (status) => log.info("Tunnel status", { status }),
    });

    const shutdown = async () => {
      await client.stop();
      process.exit(0);
    };
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.on(signal, () => {
        shutdown().catch((err: unknown) => {
          log.error("Shutdown failed", { error: err });
          process.exit(1);
        });
      });
    }

    log.info("Starting agent", { identity, relay: opts.relay, local: opts.local });
    client.start();
  });

await program.parseAsync();
