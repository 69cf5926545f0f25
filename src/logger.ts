import fs from "fs";
import path from "path";
import { cfg } from "./config.js";

type Level = "error" | "warn" | "info" | "debug" | "trace";

const LEVELS: Record<Level, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4
};

function isLevel(value: string): value is Level {
  return value in LEVELS;
}

const configuredLevel: Level = isLevel(cfg.log.level) ? cfg.log.level : "info";

const minLevel = LEVELS[configuredLevel];
const consoleEnabled = cfg.log.console;
const logFile = cfg.log.file;

let stream: fs.WriteStream | null = null;

function ensureStream() {
  if (!logFile) return null;
  if (stream) return stream;
  try {
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
  } catch (e) {
    console.error('[logger] failed to create log directory', e);
  }
  try {
    const header = `# filtered-push log (level=${configuredLevel}) started ${new Date().toISOString()}\n`;
    try {
      fs.appendFileSync(logFile, header);
    } catch (e) {
      console.error('[logger] failed to write log header', e);
    }
    stream = fs.createWriteStream(logFile, { flags: "a" });

    stream.on('error', (err) => {
      console.error('[logger] write stream error', err);
      try {
        stream?.end();
      } catch (e) {
        console.error('[logger] failed to close stream', e);
      }
      stream = null;
    });
  } catch (e) {
    console.error("[logger] failed to create log file stream", e);
    stream = null;
  }
  return stream;
}

export function getLogFilePath() {
  return logFile;
}

function serialize(value: unknown): unknown {
  if (value instanceof Error) {
    const base: Record<string, unknown> = {
      name: value.name,
      message: value.message,
      stack: value.stack
    };
    for (const [key, v] of Object.entries(value)) {
      if (v !== undefined) base[key] = serialize(v);
    }
    return base;
  }
  if (!value || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map(serialize);
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = serialize(v);
  }
  return out;
}

function write(level: Level, message: string, meta?: unknown) {
  if (LEVELS[level] > minLevel) return;
  const entry: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level,
    msg: message
  };
  if (meta !== undefined) entry.meta = serialize(meta);

  // stdout belongs to the operator-facing status lines
  if (consoleEnabled) {
    const consoleMethod = level === "warn" ? console.warn : console.error;
    if (entry.meta !== undefined) {
      consoleMethod(`[${level}] ${message}`, entry.meta);
    } else {
      consoleMethod(`[${level}] ${message}`);
    }
  }
  const s = ensureStream();
  if (s) {
    s.write(JSON.stringify(entry) + "\n");
  }
}

export const logger = {
  error(message: string, meta?: unknown) { write("error", message, meta); },
  warn(message: string, meta?: unknown) { write("warn", message, meta); },
  info(message: string, meta?: unknown) { write("info", message, meta); },
  debug(message: string, meta?: unknown) { write("debug", message, meta); },
  trace(message: string, meta?: unknown) { write("trace", message, meta); }
};

if (logFile) {
  ensureStream();
}
