/**
 * Simple structured logger for the command line.
 * Writes to stderr so stdout only carries the report. LOG_FORMAT=json
 * switches to one JSON object per line for machine consumption.
 */

import { config } from "./env";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = "warn";

/**
 * Set the lowest level that is written.
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function formatLog(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta,
  };

  if (config.LOG_FORMAT === "json") {
    return JSON.stringify(entry);
  }

  const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
  return `[${entry.timestamp}] ${level.toUpperCase()} ${message}${metaStr}`;
}

function write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  console.error(formatLog(level, message, meta));
}

export const logger = {
  debug(message: string, meta?: Record<string, unknown>): void {
    write("debug", message, meta);
  },

  info(message: string, meta?: Record<string, unknown>): void {
    write("info", message, meta);
  },

  warn(message: string, meta?: Record<string, unknown>): void {
    write("warn", message, meta);
  },

  error(message: string, meta?: Record<string, unknown>): void {
    write("error", message, meta);
  },
};
