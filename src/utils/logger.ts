import { mkdirSync, existsSync, appendFileSync } from "fs";
import { join, dirname, resolve } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const DEFAULT_LOG_DIR = join(__dirname, "../../logs");

type LogLevel = "info" | "warn" | "error" | "debug";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

function logDir(): string {
  const override = process.env.MATCHER_LOG_DIR;
  return override ? resolve(override) : DEFAULT_LOG_DIR;
}

function ensureLogDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

function serialize(data: unknown): string {
  if (data instanceof Error) {
    return JSON.stringify({ name: data.name, message: data.message });
  }
  return JSON.stringify(data);
}

export function formatEntry(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.data !== undefined) {
    return `${base} ${serialize(entry.data)}`;
  }
  return base;
}

function log(level: LogLevel, message: string, data?: unknown): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    data,
  };

  const formatted = formatEntry(entry);

  // Console output
  switch (level) {
    case "error":
      console.error(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "debug":
      if (process.env.DEBUG) console.log(formatted);
      break;
    default:
      console.log(formatted);
  }

  // File output
  try {
    const dir = logDir();
    ensureLogDir(dir);
    const date = entry.timestamp.slice(0, 10);
    appendFileSync(join(dir, `matcher-${date}.log`), formatted + "\n");
  } catch (err) {
    // Logging must never fail a scoring call; surface it on stderr only
    console.error(`Could not write log file: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export const logger = {
  info: (msg: string, data?: unknown) => log("info", msg, data),
  warn: (msg: string, data?: unknown) => log("warn", msg, data),
  error: (msg: string, data?: unknown) => log("error", msg, data),
  debug: (msg: string, data?: unknown) => log("debug", msg, data),
};
