/**
 * Micro-logger: level-filtered console output
 * Format: [ISO timestamp] [LEVEL] message {json meta}
 */

import type { LogLevel, Logger } from "@/types";
import { LOG_LEVELS } from "@/constants";

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Resolve level from environment, default to 'info'
 */
function resolveLevel(raw: string | undefined): LogLevel {
  const value = (raw ?? "").trim().toLowerCase();
  return isLogLevel(value) ? value : "info";
}

const currentLevelValue = LOG_LEVELS[resolveLevel(process.env.LOG_LEVEL)];

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
  if (LOG_LEVELS[level] >= currentLevelValue) {
    const timestamp = new Date().toISOString();
    const formattedMeta = formatMeta(meta);
    const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${formattedMeta}`;

    switch (level) {
      case "debug":
      case "info":
        console.log(logMessage);
        break;
      case "warn":
        console.warn(logMessage);
        break;
      case "error":
        console.error(logMessage);
        break;
    }
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
