import { expect, test } from "vitest";
import { AgentRegistry } from "../src/registry.ts";
import { AgentSession } from "../src/session.ts";
import { RelayStats } from "../src/stats.ts";
import { FakeSocket } from "./helpers.ts";

test("RelayStats - starts at zero", () => {
  const stats = new RelayStats();
  expect(stats.snapshot(new AgentRegistry())).toEqual({
    uptime_seconds: 0,
    active_agents: 0,
    total_requests_relayed: 0,
    total_streams_relayed: 0,
    total_timeouts: 0,
    total_tunnel_connections: 0,
  });
});

test("RelayStats - counters increment independently", () => {
  const stats = new RelayStats();
  stats.recordRequest();
  stats.recordRequest();
  stats.recordStream();
  stats.recordTimeout();
  stats.recordTunnelConnect();
  stats.recordTunnelConnect();
  stats.recordTunnelConnect();

  const snap = stats.snapshot(new AgentRegistry());
  expect(snap.total_requests_relayed).toBe(2);
  expect(snap.total_streams_relayed).toBe(1);
  expect(snap.total_timeouts).toBe(1);
  expect(snap.total_tunnel_connections).toBe(3);
});

test("RelayStats - active_agents reflects the registry", () => {
  const registry = new AgentRegistry();
  registry.register(new AgentSession("a", new FakeSocket()));
  registry.register(new AgentSession("b", new FakeSocket()));
  expect(new RelayStats().snapshot(registry).active_agents).toBe(2);
});
