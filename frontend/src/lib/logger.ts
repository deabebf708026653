/**
 * logger.ts: Leveled console logging, one scope per module.
 *
 *   const log = createLogger("api");
 *   log.info("GET /list_documents_info → 200");   // [api] GET /list_documents_info → 200
 */

import { config, type LogLevel } from "../config";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
}

export function createLogger(scope: string, level: LogLevel = config.logLevel): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[${scope}]`;

  function emit(at: LogLevel, message: string, details: unknown[]) {
    if (LEVEL_ORDER[at] < threshold) return;
    console[at](`${prefix} ${message}`, ...details);
  }

  return {
    debug: (message, ...details) => emit("debug", message, details),
    info: (message, ...details) => emit("info", message, details),
    warn: (message, ...details) => emit("warn", message, details),
    error: (message, ...details) => emit("error", message, details),
  };
}
