/**
 * Component-scoped logger.
 *
 * Plain lines by default (`ts [LEVEL] [component] msg k=v`), one JSON object
 * per line when RELAY_LOG_JSON=1. RELAY_LOG_LEVEL filters (default INFO).
 * Both are read on every call so tests and the CLI can change them late.
 */

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_PRIORITY, value);
}

function currentLevel(): LogLevel {
  const raw = (process.env.RELAY_LOG_LEVEL ?? "INFO").toUpperCase();
  return isLogLevel(raw) ? raw : "INFO";
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (typeof value === "string") return value;
  return JSON.stringify(value);
}

function write(
  level: LogLevel,
  component: string,
  msg: string,
  extra?: Record<string, unknown>,
): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel()]) return;

  const ts = new Date().toISOString();
  let line: string;
  if (process.env.RELAY_LOG_JSON === "1") {
    const fields: Record<string, string> = {};
    for (const [k, v] of Object.entries(extra ?? {})) fields[k] = formatValue(v);
    line = JSON.stringify({ ts, level, component, msg, ...fields });
  } else {
    const suffix = Object.entries(extra ?? {})
      .map(([k, v]) => ` ${k}=${formatValue(v)}`)
      .join("");
    line = `${ts} [${level}] [${component}] ${msg}${suffix}`;
  }

  if (level === "ERROR" || level === "WARN") {
    process.stderr.write(line + "\n");
  } else {
    process.stdout.write(line + "\n");
  }
}

export function createLogger(component: string): Logger {
  return {
    debug: (msg, extra) => write("DEBUG", component, msg, extra),
    info: (msg, extra) => write("INFO", component, msg, extra),
    warn: (msg, extra) => write("WARN", component, msg, extra),
    error: (msg, extra) => write("ERROR", component, msg, extra),
  };
}
