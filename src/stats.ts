import type { AgentRegistry } from "./registry.ts";

export interface StatsSnapshot {
  uptime_seconds: number;
  active_agents: number;
  total_requests_relayed: number;
  total_streams_relayed: number;
  total_timeouts: number;
  total_tunnel_connections: number;
}

export class RelayStats {
  private readonly startedAt = Date.now();
  private requests = 0;
  private streams = 0;
  private timeouts = 0;
  private tunnelConnections = 0;

  recordRequest(): void {
    this.requests++;
  }

  recordStream(): void {
    this.streams++;
  }

  recordTimeout(): void {
    this.timeouts++;
  }

  recordTunnelConnect(): void {
    this.tunnelConnections++;
  }

  snapshot(registry: AgentRegistry): StatsSnapshot {
    return {
      uptime_seconds: Math.floor((Date.now() - this.startedAt) / 1000),
      active_agents: registry.size,
      total_requests_relayed: this.requests,
      total_streams_relayed: this.streams,
      total_timeouts: this.timeouts,
      total_tunnel_connections: this.tunnelConnections,
    };
  }
}
