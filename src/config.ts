import "dotenv/config";
import path from "path";

function expandHome(p: string | undefined): string | undefined {
  if (!p) return p;
  return p.replace(
    /^~(?=$|\/|\\)/,
    process.env.HOME || process.env.USERPROFILE || "~",
  );
}

function bool(v: string | undefined, def = false) {
  if (v === undefined) return def;
  return ["1", "true", "yes", "on"].includes(v.toLowerCase());
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
  if (m) {
    const num = Number(m[1]);
    if (!Number.isFinite(num) || num <= 0) return fallbackMs;
    const unit = (m[2] || "").toLowerCase();
    if (unit === "ms") return Math.floor(num);
    if (unit === "s") return Math.floor(num * 1000);
    if (unit === "m" || unit === "min") return Math.floor(num * 60 * 1000);
    if (unit === "h") return Math.floor(num * 60 * 60 * 1000);

    if (num > 1000) return Math.floor(num);
    return Math.floor(num * 1000);
  }

  return fallbackMs;
}

const logLevelRaw = (process.env.LOG_LEVEL || "info").toLowerCase();
const logConsole = bool(process.env.LOG_CONSOLE, true);
const logFile = (() => {
  const custom = process.env.LOG_FILE;
  if (custom && custom.trim().length) return path.resolve(expandHome(custom.trim()) ?? custom);
  return "";
})();

const sshKeyPath = (() => {
  const raw = process.env.GIT_SSH_KEY_PATH;
  if (!raw || !raw.trim().length) return "";
  return path.resolve(expandHome(raw.trim()) ?? raw);
})();

export const cfg = {
  publish: {
    configFile:
      (process.env.PUBLISH_CONFIG_FILE || ".push-filter.conf").trim() ||
      ".push-filter.conf",
    lockFileName: "filtered-push.lock",
    lockStaleMs: parseDurationMs(process.env.PUBLISH_LOCK_STALE_MS, 10 * 60 * 1000),
    defaultBranch: (process.env.GIT_DEFAULT_BRANCH || "main").trim() || "main",
  },

  git: {
    sshKeyPath,
  },

  log: {
    level: logLevelRaw,
    file: logFile,
    console: logConsole,
  },
};
