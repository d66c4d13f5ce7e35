/**
 * Leveled stderr logger.
 *
 * stdout carries the MCP stream in server mode, so every log line goes to
 * stderr through `console.error` with a `[switchboard:<scope>]` prefix.
 *
 * @module utils/logger
 */

import type { LogLevel } from "../config/schema.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

let currentLevel: LogLevel = "info";

export interface Logger {
  fatal(message: string, err?: unknown): void;
  error(message: string, err?: unknown): void;
  warn(message: string, err?: unknown): void;
  info(message: string): void;
  debug(message: string): void;
  trace(message: string): void;
}

/**
 * Sets the process-wide threshold. Messages above it are dropped.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel];
}

function formatError(err: unknown): string {
  if (err instanceof Error) {
    return currentLevel === "debug" || currentLevel === "trace"
      ? `${err.message}\n${err.stack ?? ""}`
      : err.message;
  }
  return String(err);
}

/**
 * Creates a logger bound to a scope name.
 *
 * @example
 * ```ts
 * const log = createLogger("catalog");
 * log.warn("cache file unreadable", err);
 * // [switchboard:catalog] cache file unreadable: EACCES ...
 * ```
 */
export function createLogger(scope: string): Logger {
  const prefix = `[switchboard:${scope}]`;

  const emit = (level: LogLevel, message: string, err?: unknown): void => {
    if (!isEnabled(level)) return;
    const suffix = err === undefined ? "" : `: ${formatError(err)}`;
    console.error(`${prefix} ${message}${suffix}`);
  };

  return {
    fatal: (message, err) => emit("fatal", message, err),
    error: (message, err) => emit("error", message, err),
    warn: (message, err) => emit("warn", message, err),
    info: (message) => emit("info", message),
    debug: (message) => emit("debug", message),
    trace: (message) => emit("trace", message),
  };
}
