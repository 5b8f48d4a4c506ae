import * as fs from "fs";
import * as path from "path";
import { inspect } from "util";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

interface LoggerOptions {
  level: LogLevel;
  file?: string;
}

let options: LoggerOptions = {
  level: process.env.DEBUG === "true" ? "debug" : "info",
};

/**
 * Set the level threshold and optional log file. Called once at startup,
 * before the first run.
 */
export function configureLogger(next: LoggerOptions): void {
  if (next.file) {
    fs.mkdirSync(path.dirname(path.resolve(next.file)), { recursive: true });
  }
  options = { ...next };
}

const timestamp = () => new Date().toISOString();

function formatData(data: unknown): string {
  if (data === undefined) return "";
  if (data instanceof Error) return ` ${data.stack ?? data.message}`;
  if (typeof data === "string") return ` ${data}`;
  return ` ${inspect(data, { depth: 4, breakLength: Infinity })}`;
}

function write(level: LogLevel, message: string, data?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[options.level]) return;

  const line = `[${timestamp()}] ${level.toUpperCase()}: ${message}${formatData(data)}`;
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }

  if (options.file) {
    try {
      fs.appendFileSync(options.file, `${line}\n`);
    } catch (error) {
      // Console output already happened; drop file output for the session
      console.error(`[${timestamp()}] ERROR: Failed to write log file`, error);
      options = { ...options, file: undefined };
    }
  }
}

export const logger = {
  info(message: string, data?: unknown) {
    write("info", message, data);
  },
  error(message: string, error?: unknown) {
    write("error", message, error);
  },
  warn(message: string, data?: unknown) {
    write("warn", message, data);
  },
  debug(message: string, data?: unknown) {
    write("debug", message, data);
  },
};
