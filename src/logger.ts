/**
 * Structured logging for the relation framework.
 *
 * Level, output format and handler come from the global configuration at
 * the time a message is logged, so `configure()` affects loggers that were
 * created at module load.
 *
 * @module logger
 */

import { getConfig } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class RelationLogger {
  constructor(readonly module: string) {}

  /** Create a child logger with a sub-module suffix */
  child(subModule: string): RelationLogger {
    return new RelationLogger(`${this.module}:${subModule}`);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log("warn", message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log("error", message, {
      ...context,
      ...(error ? { error: { message: error.message, stack: error.stack } } : {}),
    });
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getConfig().logLevel];
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const { logHandler, logJson } = getConfig();
    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.module,
      ...(context ? { context } : {}),
    };

    if (logHandler) {
      logHandler(entry);
      return;
    }

    if (logJson) {
      const consoleFn =
        level === "error" ? console.error : level === "warn" ? console.warn : console.log;
      consoleFn(JSON.stringify(entry));
    }
  }
}

export function createLogger(module: string): RelationLogger {
  return new RelationLogger(module);
}

export const log = createLogger("relations");
