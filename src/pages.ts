import { html, raw } from "hono/html";

export type Page = ReturnType<typeof html>;

const STYLE = `
body { background: #0c0c18; color: #e0e0f0; font-family: -apple-system, system-ui, sans-serif;
       display: flex; flex-direction: column; align-items: center; justify-content: center;
       min-height: 100vh; margin: 0; padding: 20px; box-sizing: border-box; }
h1 { font-size: 1.6em; margin-bottom: 0.3em; }
.agent-list { list-style: none; padding: 0; width: 100%; max-width: 400px; }
.agent-list li { margin: 8px 0; }
.agent-list a { display: flex; align-items: center; gap: 10px; padding: 14px 18px;
                background: #1a1a2e; border-radius: 12px; color: #e0e0f0;
                text-decoration: none; font-size: 1.1em; transition: background 0.15s; }
.agent-list a:hover { background: #252545; }
.dot { width: 10px; height: 10px; border-radius: 50%; flex-shrink: 0; display: inline-block; }
.dot.online { background: #4cff8e; box-shadow: 0 0 6px #4cff8e; }
.dot.offline { background: #555; }
.muted { color: #667; font-size: 0.85em; }
`;

const ADMIN_STYLE = `
body { justify-content: flex-start; padding-top: 40px; }
.card { background: #1a1a2e; border-radius: 12px; padding: 16px 20px; margin: 10px 0;
        width: 100%; max-width: 600px; }
.file-row { display: flex; align-items: center; justify-content: space-between;
            padding: 8px 0; border-bottom: 1px solid #252545; gap: 10px; }
.file-row:last-child { border-bottom: none; }
.file-info { flex: 1; min-width: 0; }
.file-name { font-size: 0.95em; word-break: break-all; }
.file-meta { color: #667; font-size: 0.8em; }
.btn { padding: 6px 14px; border-radius: 8px; border: none; cursor: pointer; font-size: 0.85em;
       text-decoration: none; display: inline-block; color: #e0e0f0; }
.btn-dl { background: #2a4a6e; }
.btn-del { background: #5a2a2a; }
.btn-back { background: #252545; margin-bottom: 12px; }
.total { color: #667; font-size: 0.85em; margin-top: 4px; }
`;

function layout(title: string, body: Page, extraHead: Page | string = ""): Page {
  return html`<!DOCTYPE html><html><head><meta charset="utf-8">
<meta name="viewport" content="width=device-width,initial-scale=1">
<title>${title}</title><style>${raw(STYLE)}</style>${extraHead}</head>
<body>${body}</body></html>`;
}

export function landingPage(): Page {
  return layout(
    "Dashboard Relay",
    html`<h1>Dashboard Relay</h1>
<p class="muted">Open your agent's dashboard to find its remote URL.</p>`,
  );
}

/** Shown instead of an error when the agent has no live connection. */
export function offlinePage(identity: string): Page {
  return layout(
    `${identity} - Offline`,
    html`<h1>${identity}</h1>
<p><span class="dot offline"></span> &nbsp;Offline</p>
<p class="muted">This page will refresh when the agent reconnects.</p>`,
    html`<meta http-equiv="refresh" content="10">`,
  );
}

// --- Admin ---

export interface AdminAgentRow {
  name: string;
  files: number;
  bytes: number;
  online: boolean;
}

export interface AdminFileRow {
  name: string;
  bytes: number;
  modifiedAt: Date;
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function formatAge(modifiedAt: Date, now: Date = new Date()): string {
  const seconds = Math.max(0, Math.floor((now.getTime() - modifiedAt.getTime()) / 1000));
  const days = Math.floor(seconds / 86_400);
  if (days > 0) return `${days}d ago`;
  if (seconds >= 3600) return `${Math.floor(seconds / 3600)}h ago`;
  return `${Math.max(1, Math.floor(seconds / 60))}m ago`;
}

function adminLayout(title: string, body: Page): Page {
  return layout(title, html`<h1>${title}</h1>${body}`, html`<style>${raw(ADMIN_STYLE)}</style>`);
}

function secretQuery(secret: string): string {
  return `?secret=${encodeURIComponent(secret)}`;
}

export function adminIndexPage(agents: AdminAgentRow[], secret: string): Page {
  if (agents.length === 0) {
    return adminLayout("Relay Admin", html`<p class="muted">No uploads yet.</p>`);
  }
  const q = secretQuery(secret);
  const total = agents.reduce((sum, a) => sum + a.bytes, 0);
  const rows = agents.map((a) =>
    html`<li><a href="/_admin/uploads/${encodeURIComponent(a.name)}${q}">
<span class="dot ${a.online ? "online" : "offline"}"></span>
${a.name} &mdash; ${a.files} file${a.files === 1 ? "" : "s"}, ${formatSize(a.bytes)}</a></li>`
  );
  return adminLayout(
    "Relay Admin",
    html`<ul class="agent-list">${rows}</ul><p class="total">Total: ${formatSize(total)}</p>`,
  );
}

const ADMIN_SCRIPT = `
function withSecret(url) { return url + location.search; }
document.querySelectorAll("[data-file]").forEach(function (btn) {
  btn.addEventListener("click", function () {
    var f = btn.dataset.file;
    if (!confirm("Delete " + f + "?")) return;
    fetch(withSecret(location.pathname + "/" + encodeURIComponent(f)), { method: "DELETE" })
      .then(function (r) { if (r.ok) btn.closest(".file-row").remove(); else alert("Delete failed: " + r.status); })
      .catch(function (e) { alert(e); });
  });
});
document.querySelectorAll("[data-delete-all]").forEach(function (btn) {
  btn.addEventListener("click", function () {
    if (!confirm("Delete ALL uploads for " + btn.dataset.deleteAll + "?")) return;
    fetch(withSecret(location.pathname), { method: "DELETE" })
      .then(function (r) { if (r.ok) location.href = withSecret("/_admin"); else alert("Failed: " + r.status); })
      .catch(function (e) { alert(e); });
  });
});
`;

export function adminAgentPage(
  agent: string,
  files: AdminFileRow[],
  secret: string,
  now: Date = new Date(),
): Page {
  const q = secretQuery(secret);
  const base = `/_admin/uploads/${encodeURIComponent(agent)}`;
  const rows = files.map((f) =>
    html`<div class="file-row"><div class="file-info">
<div class="file-name">${f.name}</div>
<div class="file-meta">${formatSize(f.bytes)} &middot; ${formatAge(f.modifiedAt, now)}</div></div>
<a class="btn btn-dl" href="${base}/${encodeURIComponent(f.name)}${q}">Download</a>
<button class="btn btn-del" data-file="${f.name}">Delete</button></div>`
  );
  return adminLayout(
    `${agent} - Uploads`,
    html`<a class="btn btn-back" href="/_admin${q}">&larr; All agents</a>
<div class="card"><h3 style="margin:0 0 10px">${agent}</h3>${rows}
<div style="margin-top:12px;text-align:right">
<button class="btn btn-del" data-delete-all="${agent}">Delete All</button></div></div>
<script>${raw(ADMIN_SCRIPT)}</script>`,
  );
}

export async function renderPage(page: Page): Promise<string> {
  return String(await page);
}
