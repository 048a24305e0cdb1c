import "dotenv/config";
import path from "path";
import { SyncConfigSchema, type SyncConfig } from "./schema.js";

type Env = Record<string, string | undefined>;

function expandHome(p: string | undefined): string | undefined {
  if (!p) return p;
  return p.replace(
    /^~(?=$|\/|\\)/,
    process.env.HOME || process.env.USERPROFILE || "~",
  );
}

export function bool(v: string | undefined, def = false) {
  if (v === undefined) return def;
  return ["1", "true", "yes", "on"].includes(v.trim().toLowerCase());
}

export function splitCsv(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseDurationMs(value: string | undefined, fallbackMs: number) {
  if (!value) return fallbackMs;
  let s = value.toString().trim();
  if (!s.length) return fallbackMs;

  if (
    (s.startsWith("'") && s.endsWith("'")) ||
    (s.startsWith('"') && s.endsWith('"'))
  )
    s = s.slice(1, -1).trim();

  const m = s.match(/^([0-9]+(?:\.[0-9]+)?)\s*(ms|s|m|min|h)?$/i);
  if (!m) return fallbackMs;

  const num = Number(m[1]);
  if (!Number.isFinite(num) || num < 0) return fallbackMs;
  const unit = (m[2] || "").toLowerCase();
  if (unit === "ms") return Math.floor(num);
  if (unit === "m" || unit === "min") return Math.floor(num * 60 * 1000);
  if (unit === "h") return Math.floor(num * 60 * 60 * 1000);
  // bare numbers are seconds
  return Math.floor(num * 1000);
}

export const DEFAULT_LOCK_TIMEOUT_MS = 10_000;
export const DEFAULT_STALE_INDEX_LOCK_MS = 30 * 60 * 1000;
export const DEFAULT_TIME_ZONE = "Asia/Tehran";
export const DEFAULT_COMMIT_TEMPLATE = "✅ {timestamp} ✅";
export const DEFAULT_TRANSIENT_NETWORK_PATTERNS = [
  "getaddrinfo() thread failed to start",
];

/**
 * Resolves the environment into a validated {@link SyncConfig}. Called once at
 * the process boundary; the runner never reads the environment itself.
 */
export function loadSyncConfig(env: Env = process.env): SyncConfig {
  return SyncConfigSchema.parse({
    disabled: bool(env.SKIP_PUSH),
    credential: optionalString(env.GITHUB_TOKEN) ?? optionalString(env.github_token),
    identity: {
      name: optionalString(env.GIT_USER_NAME),
      email: optionalString(env.GIT_USER_EMAIL),
    },
    defaultIdentity: {
      name: "automation",
      email: "automation@example.com",
    },
    lockTimeoutMs: parseDurationMs(env.SYNC_LOCK_TIMEOUT, DEFAULT_LOCK_TIMEOUT_MS),
    lockPollIntervalMs: parseDurationMs(env.SYNC_LOCK_POLL_INTERVAL, 100) || 100,
    staleIndexLockMs: parseDurationMs(
      env.SYNC_STALE_INDEX_LOCK_AGE,
      DEFAULT_STALE_INDEX_LOCK_MS,
    ),
    timeZone: optionalString(env.SYNC_TIMEZONE) ?? DEFAULT_TIME_ZONE,
    commitMessageTemplate:
      optionalString(env.SYNC_COMMIT_TEMPLATE) ?? DEFAULT_COMMIT_TEMPLATE,
    fallbackBranch: optionalString(env.SYNC_FALLBACK_BRANCH) ?? "main",
    tokenUsername: optionalString(env.SYNC_TOKEN_USERNAME) ?? "x-access-token",
    transientNetworkPatterns: [
      ...DEFAULT_TRANSIENT_NETWORK_PATTERNS,
      ...splitCsv(env.SYNC_TRANSIENT_PATTERNS, []),
    ],
  });
}

const logLevelRaw = (process.env.LOG_LEVEL || "info").toLowerCase();
const logConsole = bool(process.env.LOG_CONSOLE, true);
const logFile = (() => {
  const custom = process.env.LOG_FILE;
  if (custom && custom.trim().length) return path.resolve(expandHome(custom.trim()) ?? custom);
  return "";
})();

const repoDir = path.resolve(
  expandHome(optionalString(process.env.SYNC_REPO_DIR)) ?? process.cwd(),
);

export const cfg = {
  repoDir,
  log: {
    level: logLevelRaw,
    file: logFile,
    console: logConsole,
  },
};
