/**
 * Micro-logger wrapper — minimal logging with level filtering
 *
 * Every level writes to stderr: stdout is reserved for command output
 * (one line per recommendation).
 */

import type { LogLevel, Logger } from "@/types";
import { LOG_LEVELS } from "@/constants";

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Resolve the active level from LOG_LEVEL, default 'info'.
 *
 * Read on every call so a .env loaded after import still applies.
 */
function currentLevelValue(): number {
  const raw = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return LOG_LEVELS[isLogLevel(raw) ? raw : "info"];
}

/**
 * Format meta object as JSON string
 */
function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta);
}

/**
 * Log message if level is enabled
 */
function log(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
): void {
  if (LOG_LEVELS[level] >= currentLevelValue()) {
    const timestamp = new Date().toISOString();
    const formattedMeta = formatMeta(meta);
    console.error(
      `[${timestamp}] [${level.toUpperCase()}] ${message}${formattedMeta}`,
    );
  }
}

export function debug(message: string, meta?: Record<string, unknown>): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: Record<string, unknown>): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: Record<string, unknown>): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: Record<string, unknown>): void {
  log("error", message, meta);
}

/**
 * Create a logger with bound context (meta merged into all calls)
 */
export function withContext(context: Record<string, unknown>): Logger {
  return {
    debug: (message: string, meta?: Record<string, unknown>) =>
      debug(message, { ...context, ...meta }),
    info: (message: string, meta?: Record<string, unknown>) =>
      info(message, { ...context, ...meta }),
    warn: (message: string, meta?: Record<string, unknown>) =>
      warn(message, { ...context, ...meta }),
    error: (message: string, meta?: Record<string, unknown>) =>
      error(message, { ...context, ...meta }),
  };
}

