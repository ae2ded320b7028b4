interface Counter {
  windowStart: number;
  current: number;
  previous: number;
}

/**
 * Sliding-window counter per key (client IP or agent identity). The count
 * from the previous window is weighted by how much of it still overlaps the
 * last `windowMs`, so a burst straddling a window edge is not let through
 * twice.
 */
export class RateLimiter {
  private readonly counters = new Map<string, Counter>();
  private readonly sweepTimer: ReturnType<typeof setInterval>;

  constructor(
    readonly limit: number,
    readonly windowMs: number,
  ) {
    this.sweepTimer = setInterval(() => this.sweep(), windowMs);
    this.sweepTimer.unref();
  }

  /** Keys currently tracked. */
  get size(): number {
    return this.counters.size;
  }

  allow(key: string, now: number = Date.now()): boolean {
    const counter = this.roll(key, now);
    const overlap = 1 - (now - counter.windowStart) / this.windowMs;
    if (counter.previous * overlap + counter.current >= this.limit) return false;
    counter.current++;
    return true;
  }

  /** Forgets keys with no hits in the last two windows. */
  sweep(now: number = Date.now()): void {
    for (const [key, counter] of this.counters) {
      if (now - counter.windowStart >= 2 * this.windowMs) this.counters.delete(key);
    }
  }

  destroy(): void {
    clearInterval(this.sweepTimer);
    this.counters.clear();
  }

  private roll(key: string, now: number): Counter {
    let counter = this.counters.get(key);
    if (!counter) {
      counter = { windowStart: now, current: 0, previous: 0 };
      this.counters.set(key, counter);
      return counter;
    }
    const elapsed = Math.floor((now - counter.windowStart) / this.windowMs);
    if (elapsed >= 1) {
      counter.previous = elapsed === 1 ? counter.current : 0;
      counter.current = 0;
      counter.windowStart += elapsed * this.windowMs;
    }
    return counter;
  }
}

export interface RelayLimiters {
  /** Control-connection attempts per source IP. */
  tunnel: RateLimiter;
  /** Proxied browser requests per agent identity. */
  requests: RateLimiter;
  /** /stats lookups per source IP. */
  stats: RateLimiter;
}

export function createLimiters(opts: {
  connectsPerMinute: number;
  requestsPerMinute: number;
}): RelayLimiters {
  return {
    tunnel: new RateLimiter(opts.connectsPerMinute, 60_000),
    requests: new RateLimiter(opts.requestsPerMinute, 60_000),
    stats: new RateLimiter(10, 60_000),
  };
}

export function destroyLimiters(limiters: RelayLimiters): void {
  limiters.tunnel.destroy();
  limiters.requests.destroy();
  limiters.stats.destroy();
}
