import { expect, test } from "vitest";
import { createLimiters, destroyLimiters, RateLimiter } from "../src/rate_limit.ts";

test("RateLimiter - allows up to the limit within a window", () => {
  const limiter = new RateLimiter(3, 1_000);
  expect(limiter.allow("a", 0)).toBe(true);
  expect(limiter.allow("a", 10)).toBe(true);
  expect(limiter.allow("a", 20)).toBe(true);
  expect(limiter.allow("a", 30)).toBe(false);
  limiter.destroy();
});

test("RateLimiter - separate keys are independent", () => {
  const limiter = new RateLimiter(1, 60_000);
  expect(limiter.allow("a")).toBe(true);
  expect(limiter.allow("a")).toBe(false);
  expect(limiter.allow("b")).toBe(true);
  expect(limiter.allow("b")).toBe(false);
  limiter.destroy();
});

test("RateLimiter - previous window still counts by its overlap", () => {
  const limiter = new RateLimiter(3, 1_000);
  for (const t of [0, 1, 2]) expect(limiter.allow("a", t)).toBe(true);

  // Half of the previous window overlaps: 3 * 0.5 = 1.5 already used.
  expect(limiter.allow("a", 1_500)).toBe(true);
  expect(limiter.allow("a", 1_500)).toBe(true);
  expect(limiter.allow("a", 1_500)).toBe(false);
  limiter.destroy();
});

test("RateLimiter - an idle window starts from zero", () => {
  const limiter = new RateLimiter(2, 1_000);
  expect(limiter.allow("a", 0)).toBe(true);
  expect(limiter.allow("a", 0)).toBe(true);
  expect(limiter.allow("a", 0)).toBe(false);

  expect(limiter.allow("a", 2_500)).toBe(true);
  expect(limiter.allow("a", 2_500)).toBe(true);
  expect(limiter.allow("a", 2_500)).toBe(false);
  limiter.destroy();
});

test("RateLimiter - sweep forgets quiet keys", () => {
  const limiter = new RateLimiter(5, 1_000);
  limiter.allow("quiet", 0);
  limiter.allow("busy", 0);
  limiter.allow("busy", 1_200);

  limiter.sweep(2_100);
  expect(limiter.size).toBe(1);
  expect(limiter.allow("busy", 2_100)).toBe(true);
  limiter.destroy();
});

test("createLimiters - applies configured per-minute limits", () => {
  const limiters = createLimiters({ connectsPerMinute: 2, requestsPerMinute: 1 });
  expect(limiters.tunnel.allow("ip")).toBe(true);
  expect(limiters.tunnel.allow("ip")).toBe(true);
  expect(limiters.tunnel.allow("ip")).toBe(false);
  expect(limiters.requests.allow("agentA")).toBe(true);
  expect(limiters.requests.allow("agentA")).toBe(false);
  for (let i = 0; i < 10; i++) expect(limiters.stats.allow("ip")).toBe(true);
  expect(limiters.stats.allow("ip")).toBe(false);
  destroyLimiters(limiters);
});
