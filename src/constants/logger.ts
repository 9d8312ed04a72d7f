/**
 * Logger constants: log level priority mapping
 */

import type { LogLevel } from "@/types";

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const DEFAULT_LOG_LEVEL: LogLevel = "info";

/**
 * Error messages written to logs and run history are cut to this length
 */
export const MAX_LOGGED_ERROR_LENGTH = 500;
