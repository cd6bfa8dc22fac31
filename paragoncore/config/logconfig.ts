// paragoncore/config/logconfig.ts

export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLogLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.trim().toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") {
    return v;
  }
  return null;
}

// Per-scope defaults; LOG_SCOPE_<SCOPE> and LOG_LEVEL still win.
const PER_SCOPE_DEFAULTS: Record<string, LogLevel> = {
  SERVER: "info",
  PARAGON: "info",
  SESSIONS: "info",
  ADDON: "info",

  ENGINE: "info",
  MEDIATOR: "info",
  BONUS: "info",
  CATALOGUE: "info",
  MODULES: "info",

  DB: "info",
  REPO: "info",
};

function globalLevel(): LogLevel {
  return parseLogLevel(process.env.LOG_LEVEL) ?? "info";
}

/**
 * Resolve the effective level for a scope.
 *
 * Order: LOG_SCOPE_<SCOPE> env, then LOG_LEVEL env, then the defaults table.
 * Env is read on every call so tests and tools can flip levels at runtime.
 */
export function getScopeLevel(scope: string): LogLevel {
  const key = scope.toUpperCase();

  const fromEnv = parseLogLevel(process.env[`LOG_SCOPE_${key}`]);
  if (fromEnv) return fromEnv;

  const fromGlobal = parseLogLevel(process.env.LOG_LEVEL);
  if (fromGlobal) return fromGlobal;

  return PER_SCOPE_DEFAULTS[key] ?? globalLevel();
}

export function logEnabled(scope: string, level: LogLevel): boolean {
  const wantedIdx = ORDER.indexOf(getScopeLevel(scope));
  const levelIdx = ORDER.indexOf(level);
  return levelIdx >= wantedIdx;
}
