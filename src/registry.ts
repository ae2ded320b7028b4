import { createLogger } from "./log.ts";
import type { AgentSession } from "./session.ts";

const log = createLogger("registry");

export const CLOSE_REPLACED = 4000;
export const CLOSE_SHUTDOWN = 1001;

/** identity -> live session. At most one session per identity. */
export class AgentRegistry {
  private sessions = new Map<string, AgentSession>();

  /**
   * Installs `session` for its identity. An existing session is closed and
   * torn down first, so its pending requests never see the new connection.
   */
  register(session: AgentSession): AgentSession | undefined {
    const previous = this.sessions.get(session.identity);
    if (previous && previous !== session) {
      log.info("Replacing existing connection", { agent: session.identity });
      this.sessions.delete(session.identity);
      previous.teardown("Agent reconnected");
      previous.close(CLOSE_REPLACED, "replaced");
    }
    this.sessions.set(session.identity, session);
    log.info("Agent connected", { agent: session.identity, from: session.remoteAddress });
    return previous === session ? undefined : previous;
  }

  lookup(identity: string): AgentSession | undefined {
    const session = this.sessions.get(identity);
    return session?.isOpen ? session : undefined;
  }

  /**
   * Drops the mapping for `identity` and tears the session down. With
   * `session` given, a stale close (of a connection already replaced) only
   * tears down that session and leaves its successor registered.
   */
  unregister(identity: string, session?: AgentSession): void {
    const current = this.sessions.get(identity);
    const target = session ?? current;
    if (!target) return;

    if (current === target) {
      this.sessions.delete(identity);
      log.info("Agent disconnected", { agent: identity });
    }
    target.teardown("Agent disconnected");
  }

  isOnline(identity: string): boolean {
    return this.lookup(identity) !== undefined;
  }

  identities(): string[] {
    return [...this.sessions.keys()].sort();
  }

  get size(): number {
    return this.sessions.size;
  }

  closeAll(): void {
    for (const [identity, session] of this.sessions) {
      session.teardown("Relay shutting down");
      session.close(CLOSE_SHUTDOWN, "shutdown");
      this.sessions.delete(identity);
    }
  }
}
