// Logging - leveled lines on stderr

import type { Logger } from "./types.js";

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  /** Emit debug and info lines. Without it only warn and error are written. */
  verbose?: boolean;
  /** Output sink, defaults to stderr so stdout stays free for results. */
  write?: (line: string) => void;
  now?: () => Date;
}

/**
 * Create a logger writing `<ISO time> <LEVEL> <message>` lines.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const minPriority = LEVEL_PRIORITY[options.verbose ? "debug" : "warn"];
  const write = options.write ?? ((line: string) => console.error(line));
  const now = options.now ?? (() => new Date());

  const emit = (level: LogLevel, message: string): void => {
    if (LEVEL_PRIORITY[level] < minPriority) return;
    write(`${now().toISOString()} ${level.toUpperCase()} ${message}`);
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
