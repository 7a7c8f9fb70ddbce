/**
 * Logger constants — log level priority mapping
 */

import type { LogLevel } from "@/types";

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Level used when LOG_LEVEL is unset or not one of LOG_LEVELS
 */
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

/**
 * Bullet/evidence text is truncated to this length in log meta
 */
export const LOG_TEXT_PREVIEW_LENGTH = 50;
