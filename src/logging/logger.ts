/**
 * Logging
 *
 * The engine never writes to stdout: callers may pipe the process output, so
 * every line goes to stderr. Library code receives a Logger instead of
 * importing a global one.
 */

import type { LogLevel } from "@/types";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export interface ConsoleLoggerOptions {
  /** Minimum level written (default: info) */
  level?: LogLevel;
  /** Tag printed in front of every line (default: media-relate) */
  prefix?: string;
  /** Line sink, replaced in tests (default: console.error) */
  write?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function formatLogLine(
  prefix: string,
  level: LogLevel,
  message: string,
  meta?: LogMeta,
): string {
  const head = `[${prefix}] ${level.toUpperCase()} ${message}`;
  if (!meta || Object.keys(meta).length === 0) {
    return head;
  }
  return `${head} ${JSON.stringify(meta)}`;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const prefix = options.prefix ?? "media-relate";
  const write = options.write ?? ((line: string) => console.error(line));

  const log = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (LEVEL_ORDER[level] < threshold) return;
    write(formatLogLine(prefix, level, message, meta));
  };

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
