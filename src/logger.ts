/**
 * Leveled logger.
 *
 * Everything goes to stderr through console.error: stdout carries the MCP
 * JSON-RPC stream when the server runs on stdio.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(context: LogMeta): Logger;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  context?: LogMeta;
  sink?: LogSink;
}

export function formatEntry(
  level: LogLevel,
  message: string,
  meta: LogMeta,
): string {
  let output = `[gitfile-state] ${level.toUpperCase()} ${message}`;
  const extras = Object.entries(meta).filter(([, v]) => v !== undefined);
  if (extras.length > 0) {
    output += " " + extras.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(" ");
  }
  return output;
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly minLevel: LogLevel,
    private readonly context: LogMeta,
    private readonly sink: LogSink,
  ) {}

  child(context: LogMeta): Logger {
    return new ConsoleLogger(this.minLevel, { ...this.context, ...context }, this.sink);
  }

  debug(message: string, meta?: LogMeta): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.log("error", message, meta);
  }

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.minLevel]) return;
    this.sink(formatEntry(level, message, { ...this.context, ...meta }));
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new ConsoleLogger(
    options.level ?? "warn",
    options.context ?? {},
    options.sink ?? ((line) => console.error(line)),
  );
}
