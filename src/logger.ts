import fs from "fs";
import path from "path";
import { cfg } from "./config.js";

type Level = "error" | "warn" | "info" | "debug";

const LEVELS: Record<Level, number> = { error: 0, warn: 1, info: 2, debug: 3 };

function isLevel(value: string): value is Level {
  return value in LEVELS;
}

const minLevel = LEVELS[isLevel(cfg.log.level) ? cfg.log.level : "info"];

let stream: fs.WriteStream | null = null;
let streamFailed = false;

// Opened on first write so runs without LOG_FILE never touch the filesystem.
function fileSink(): fs.WriteStream | null {
  const file = cfg.log.file;
  if (!file || streamFailed) return null;
  if (stream) return stream;
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    stream = fs.createWriteStream(file, { flags: "a" });
    stream.on("error", (err) => {
      console.error("[logger] log file write failed", err);
      streamFailed = true;
      stream = null;
    });
  } catch (e) {
    console.error("[logger] cannot open log file", e);
    streamFailed = true;
  }
  return stream;
}

// Errors lose their message and stack under JSON.stringify.
function serialize(value: unknown): unknown {
  if (value instanceof Error) {
    const out: Record<string, unknown> = { name: value.name, message: value.message };
    for (const [key, v] of Object.entries(value)) {
      if (v !== undefined) out[key] = serialize(v);
    }
    return out;
  }
  if (Array.isArray(value)) return value.map(serialize);
  if (value && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, serialize(v)]));
  }
  return value;
}

function write(level: Level, message: string, meta?: unknown) {
  if (LEVELS[level] > minLevel) return;
  const data = meta === undefined ? undefined : serialize(meta);

  if (cfg.log.console) {
    const out = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
    if (data === undefined) out(`[${level}] ${message}`);
    else out(`[${level}] ${message}`, data);
  }
  fileSink()?.write(
    JSON.stringify({ ts: new Date().toISOString(), level, msg: message, meta: data }) + "\n",
  );
}

export const logger = {
  error(message: string, meta?: unknown) { write("error", message, meta); },
  warn(message: string, meta?: unknown) { write("warn", message, meta); },
  info(message: string, meta?: unknown) { write("info", message, meta); },
  debug(message: string, meta?: unknown) { write("debug", message, meta); },
};
