// src/logger.ts
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * JSON-line logger. Everything goes to stderr: stdout is reserved for the report.
 */
export function createLogger(opts: { level?: LogLevel } = {}): Logger {
  const min = LEVELS[opts.level ?? "info"];

  const log = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (LEVELS[level] < min) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(data && { data }),
    };
    if (level === "warn") console.warn(JSON.stringify(entry));
    else console.error(JSON.stringify(entry));
  };

  return {
    debug: (message, data) => log("debug", message, data),
    info: (message, data) => log("info", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, data) => log("error", message, data),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
