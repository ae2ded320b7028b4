import { expect, test } from "vitest";
import {
  adminAgentPage,
  adminIndexPage,
  formatAge,
  formatSize,
  landingPage,
  offlinePage,
  renderPage,
} from "../src/pages.ts";

test("formatSize - bytes, kilobytes, megabytes", () => {
  expect(formatSize(500)).toBe("500 B");
  expect(formatSize(1536)).toBe("1.5 KB");
  expect(formatSize(3 * 1024 * 1024)).toBe("3.0 MB");
});

test("formatAge - minutes, hours, days", () => {
  const now = new Date(Date.UTC(2026, 0, 10, 12, 0, 0));
  expect(formatAge(new Date(now.getTime() - 10_000), now)).toBe("1m ago");
  expect(formatAge(new Date(now.getTime() - 5 * 60_000), now)).toBe("5m ago");
  expect(formatAge(new Date(now.getTime() - 3 * 3_600_000), now)).toBe("3h ago");
  expect(formatAge(new Date(now.getTime() - 2 * 86_400_000), now)).toBe("2d ago");
});

test("landingPage - title", async () => {
  expect(await renderPage(landingPage())).toContain("<title>Dashboard Relay</title>");
});

test("offlinePage - names the agent and refreshes", async () => {
  const page = await renderPage(offlinePage("agentB"));
  expect(page).toContain("<title>agentB - Offline</title>");
  expect(page).toContain(`<meta http-equiv="refresh" content="10">`);
  expect(page).toContain("This page will refresh when the agent reconnects.");
});

test("offlinePage - escapes the identity", async () => {
  const page = await renderPage(offlinePage("<b>x</b>"));
  expect(page).toContain("&lt;b&gt;x&lt;/b&gt;");
  expect(page).not.toContain("<b>x</b>");
});

test("adminIndexPage - empty state", async () => {
  expect(await renderPage(adminIndexPage([], "test-secret"))).toContain("No uploads yet.");
});

test("adminIndexPage - rows link with the secret", async () => {
  const page = await renderPage(
    adminIndexPage([{ name: "agentA", files: 2, bytes: 2048, online: true }], "test-secret"),
  );
  expect(page).toContain(`href="/_admin/uploads/agentA?secret=test-secret"`);
  expect(page).toContain(`<span class="dot online"></span>`);
  expect(page).toContain("agentA &mdash; 2 files, 2.0 KB");
  expect(page).toContain("Total: 2.0 KB");
});

test("adminAgentPage - download link and delete buttons", async () => {
  const now = new Date(Date.UTC(2026, 0, 10, 12, 0, 0));
  const page = await renderPage(
    adminAgentPage(
      "agentA",
      [{ name: "bugreport_20260110_110000.zip", bytes: 500, modifiedAt: new Date(Date.UTC(2026, 0, 10, 11, 0, 0)) }],
      "test-secret",
      now,
    ),
  );
  expect(page).toContain(
    `href="/_admin/uploads/agentA/bugreport_20260110_110000.zip?secret=test-secret"`,
  );
  expect(page).toContain("500 B &middot; 1h ago");
  expect(page).toContain(`data-file="bugreport_20260110_110000.zip"`);
  expect(page).toContain(`data-delete-all="agentA"`);
});
