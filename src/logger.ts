// src/logger.ts

export type LogLevel = "debug" | "info" | "warn" | "error" | "none";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
};

export interface LogContext {
  component?: string;
  store?: string;
  name?: string;
  id?: number;
  owner?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
  error?: Error;
}

export type LogHandler = (entry: LogEntry) => void;

/**
 * Writes entries to the console as `<time> <LEVEL> [k=v ...] message`.
 */
export const consoleLogHandler: LogHandler = (entry: LogEntry) => {
  const { level, message, context, timestamp, error } = entry;
  const ctx = Object.entries(context)
    .filter(([_, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${v}`)
    .join(" ");

  const prefix = ctx ? `[${ctx}] ` : "";
  const formatted = `${timestamp.toISOString()} ${level.toUpperCase().padEnd(5)} ${prefix}${message}`;

  switch (level) {
    case "debug":
      console.debug(formatted);
      break;
    case "info":
      console.log(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "error":
      console.error(formatted);
      if (error) {
        console.error(error);
      }
      break;
  }
};

/**
 * Process-wide logger settings, shared by every registry.
 */
class LoggerConfig {
  level: LogLevel = "info";
  handler: LogHandler = consoleLogHandler;

  configure(options: { level?: LogLevel; handler?: LogHandler }): void {
    if (options.level !== undefined) {
      this.level = options.level;
    }
    if (options.handler !== undefined) {
      this.handler = options.handler;
    }
  }
}

export const loggerConfig = new LoggerConfig();

export class Logger {
  constructor(private readonly context: LogContext = {}) {}

  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.context, ...additionalContext });
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[loggerConfig.level];
  }

  private log(level: LogLevel, message: string, extra: LogContext = {}, error?: Error): void {
    if (!this.isEnabled(level)) {
      return;
    }

    loggerConfig.handler({
      level,
      message,
      context: { ...this.context, ...extra },
      timestamp: new Date(),
      error,
    });
  }

  debug(message: string, extra?: LogContext): void {
    this.log("debug", message, extra);
  }

  info(message: string, extra?: LogContext): void {
    this.log("info", message, extra);
  }

  warn(message: string, extra?: LogContext, error?: Error): void {
    this.log("warn", message, extra, error);
  }

  error(message: string, error?: Error, extra?: LogContext): void {
    this.log("error", message, extra, error);
  }
}

/**
 * Creates a logger tagged with a component and, optionally, a store location.
 */
export function createLogger(component: string, store?: string): Logger {
  return new Logger({ component, store });
}
