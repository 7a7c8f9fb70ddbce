/**
 * Micro-logger — minimal leveled logging over console.*
 *
 * Level comes from setLogLevel() when set, otherwise from LOG_LEVEL (read
 * on each call). Unknown levels fall back to the default.
 */

import type { LogLevel, LogMeta, Logger } from "@/types";
import { LOG_LEVELS, DEFAULT_LOG_LEVEL } from "@/constants";

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

let configuredLevel: LogLevel | null = null;

/**
 * Pin the level (e.g. from AppConfig.logLevel); null goes back to LOG_LEVEL
 */
export function setLogLevel(level: LogLevel | null): void {
  configuredLevel = level;
}

function currentLevelValue(): number {
  if (configuredLevel) {
    return LOG_LEVELS[configuredLevel];
  }
  const raw = (process.env.LOG_LEVEL ?? "").toLowerCase();
  const level = isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
  return LOG_LEVELS[level];
}

/**
 * Format meta object as JSON string
 */
function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta);
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < currentLevelValue()) {
    return;
  }

  const timestamp = new Date().toISOString();
  const line = `[${timestamp}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;

  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

export function debug(message: string, meta?: LogMeta): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: LogMeta): void {
  log("error", message, meta);
}

/**
 * Create a logger with bound context (meta merged into all calls)
 */
export function withContext(context: LogMeta): Logger {
  return {
    debug: (message, meta) => debug(message, { ...context, ...meta }),
    info: (message, meta) => info(message, { ...context, ...meta }),
    warn: (message, meta) => warn(message, { ...context, ...meta }),
    error: (message, meta) => error(message, { ...context, ...meta }),
  };
}

/**
 * Shorten free text for log meta
 */
export function preview(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}
