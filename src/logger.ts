/**
 * Component loggers for the conformance harness.
 *
 * Messages go through a sink (the console by default) and are dropped below
 * the configured minimum level.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Minimum level setting; `silent` drops everything. */
export type LogThreshold = LogLevel | "silent";

export type LogSink = (
  level: LogLevel,
  component: string,
  message: string,
  context?: unknown,
) => void;

export interface Logger {
  debug(message: string, context?: unknown): void;
  info(message: string, context?: unknown): void;
  warn(message: string, context?: unknown): void;
  error(message: string, context?: unknown): void;
  child(sub: string): Logger;
}

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogThreshold(value: unknown): value is LogThreshold {
  return typeof value === "string" && Object.hasOwn(LEVEL_RANK, value);
}

export const consoleSink: LogSink = (level, component, message, context) => {
  const line = `[${component}] ${message}`;
  const args = context === undefined ? [line] : [line, context];
  switch (level) {
    case "debug":
      console.debug(...args);
      break;
    case "info":
      console.info(...args);
      break;
    case "warn":
      console.warn(...args);
      break;
    case "error":
      console.error(...args);
      break;
  }
};

export interface LoggerOptions {
  threshold?: LogThreshold;
  sink?: LogSink;
}

/**
 * Creates a logger for `component`. `child("x")` logs as `component:x`
 * with the same threshold and sink.
 */
export function createLogger(
  component: string,
  options: LoggerOptions = {},
): Logger {
  const threshold = options.threshold ?? "warn";
  const sink = options.sink ?? consoleSink;
  const log = (level: LogLevel, message: string, context?: unknown) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    sink(level, component, message, context);
  };
  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (sub) => createLogger(`${component}:${sub}`, options),
  };
}
