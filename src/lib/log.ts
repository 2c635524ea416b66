/**
 * log.ts — Levelled, category-tagged diagnostics on stderr.
 *
 * stdout belongs to the terminal surface, so every diagnostic goes through
 * console.error. User-facing lines go to the StatusLog instead.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LOG_COLORS: Record<Exclude<LogLevel, "silent">, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};
const RESET = "\x1b[0m";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVEL_RANK, value);
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/** Run `fn` at `level`, then put the previous level back. */
export async function withLogLevel<T>(level: LogLevel, fn: () => Promise<T>): Promise<T> {
  const previous = threshold;
  threshold = level;
  try {
    return await fn();
  } finally {
    threshold = previous;
  }
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

function write(level: Exclude<LogLevel, "silent">, category: string, message: string, data?: Record<string, unknown>) {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  const timestamp = new Date().toISOString().split("T")[1].replace("Z", "");
  const prefix = `${LOG_COLORS[level]}[${timestamp}] [${level.toUpperCase()}] [${category}]${RESET}`;
  if (data) {
    console.error(`${prefix} ${message}`, JSON.stringify(data));
  } else {
    console.error(`${prefix} ${message}`);
  }
}

export function createLogger(category: string): Logger {
  return {
    debug: (message, data) => write("debug", category, message, data),
    info: (message, data) => write("info", category, message, data),
    warn: (message, data) => write("warn", category, message, data),
    error: (message, data) => write("error", category, message, data),
  };
}
