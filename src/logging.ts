import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
type LogFields = Record<string, string | number | boolean | null | undefined>;

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4
};

let sink: WriteStream | null = null;
let threshold: LogLevel = "info";

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || "").trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
}

export function defaultLogPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.REV_LOG_FILE) {
    return env.REV_LOG_FILE;
  }

  const dataHome = env.XDG_DATA_HOME || join(homedir(), ".local", "share");
  return join(dataHome, "rev", "rev.log");
}

function formatValue(value: string | number | boolean | null): string {
  if (typeof value === "string") {
    return /[\s="]/.test(value) ? JSON.stringify(value) : value;
  }

  return String(value);
}

export function formatLogLine(level: LogLevel, message: string, fields: LogFields = {}, at = new Date()): string {
  const pairs = Object.entries(fields)
    .filter((entry): entry is [string, string | number | boolean | null] => entry[1] !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);

  return [at.toISOString(), level.toUpperCase().padEnd(5), message, ...pairs].join(" ");
}

/**
 * Opens the log file and sets the level. Stdout belongs to the terminal UI,
 * so nothing is ever written there.
 */
export function initializeLogging(env: NodeJS.ProcessEnv = process.env): string {
  const path = defaultLogPath(env);
  mkdirSync(dirname(path), { recursive: true });
  sink?.end();
  sink = createWriteStream(path, { flags: "w" });
  threshold = parseLogLevel(env.REV_LOG_LEVEL);
  return path;
}

export function shutdownLogging(): void {
  sink?.end();
  sink = null;
}

function write(level: LogLevel, message: string, fields?: LogFields): void {
  if (!sink || LEVEL_RANK[level] > LEVEL_RANK[threshold]) {
    return;
  }

  sink.write(`${formatLogLine(level, message, fields)}\n`);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const log = {
  error: (message: string, fields?: LogFields): void => write("error", message, fields),
  warn: (message: string, fields?: LogFields): void => write("warn", message, fields),
  info: (message: string, fields?: LogFields): void => write("info", message, fields),
  debug: (message: string, fields?: LogFields): void => write("debug", message, fields),
  trace: (message: string, fields?: LogFields): void => write("trace", message, fields)
};
