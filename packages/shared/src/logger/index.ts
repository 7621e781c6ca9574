/**
 * Structured logger with JSON output support.
 *
 * Features:
 * - JSON-structured log entries (when LOG_FORMAT=json)
 * - Log level filtering via LOG_LEVEL env var (default: warn, so a CLI built
 *   on the library keeps its stderr clean)
 * - prog and path fields for tracing a derivation
 * - Child loggers inherit context
 */

import { performance } from "node:perf_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogContext {
  /** Program name of the CLI being derived. */
  prog?: string;
  /** Tree key the entry concerns. */
  path?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string): Logger;
  /** Set persistent context fields (prog, path, etc.) */
  setContext(ctx: LogContext): void;
  /** Start a timer. Returns a stop function that logs elapsed time and returns duration in ms. */
  time(label: string): () => number;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

/** Resolve min log level from environment. */
function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = (process.env.LOG_LEVEL ?? "").toLowerCase();
  if (isLogLevel(env)) return env;
  return "warn";
}

/** Check if JSON output is requested. */
function isJsonFormat(): boolean {
  return process.env.LOG_FORMAT?.toLowerCase() === "json";
}

export function createLogger(
  name: string,
  minLevel?: LogLevel,
  parentContext?: LogContext,
): Logger {
  let context: LogContext = { ...parentContext };

  function log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    // Read per call: loggers are created at module load, before a CLI may set LOG_LEVEL.
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[resolveMinLevel(minLevel)]) return;

    const timestamp = new Date().toISOString();

    if (isJsonFormat()) {
      const entry: Record<string, unknown> = {
        timestamp,
        level,
        module: name,
        message,
      };
      if (context.prog) entry.prog = context.prog;
      if (context.path !== undefined) entry.path = context.path;
      if (data && Object.keys(data).length > 0) {
        Object.assign(entry, data);
      }
      console.error(JSON.stringify(entry));
    } else {
      const prefix = `[${timestamp}] [${level.toUpperCase()}] [${name}]`;
      if (data && Object.keys(data).length > 0) {
        const extra = JSON.stringify(data);
        console.error(`${prefix} ${message} ${extra}`);
      } else {
        console.error(`${prefix} ${message}`);
      }
    }
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    child: (childName) =>
      createLogger(`${name}:${childName}`, minLevel, {
        ...context,
      }),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
    time(label: string): () => number {
      const start = performance.now();
      return () => {
        const durationMs = Math.round((performance.now() - start) * 100) / 100;
        log("debug", `${label} completed`, { label, durationMs });
        return durationMs;
      };
    },
  };
}
