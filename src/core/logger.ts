/**
 * Leveled console logger. Lines carry a timestamp, level, `[component]`
 * prefix and, once bound, the run id.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Minimum level to output */
  level?: LogLevel;
  component?: string;
  runId?: string;
  /** Defaults to the console method for the level */
  sink?: LogSink;
  /** Omit timestamps (stable output for tests and piping) */
  timestamps?: boolean;
}

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(bindings: { component?: string; runId?: string }): Logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

export function formatLogEntry(
  level: LogLevel,
  message: string,
  opts: { component?: string; runId?: string; timestamps?: boolean },
  context?: Record<string, unknown>,
): string {
  const parts: string[] = [];
  if (opts.timestamps !== false) parts.push(`[${new Date().toISOString()}]`);
  parts.push(`[${level.toUpperCase().padEnd(5)}]`);
  if (opts.component) parts.push(`[${opts.component}]`);
  if (opts.runId) parts.push(`[${opts.runId}]`);
  parts.push(message);

  let entry = parts.join(" ");
  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }
  return entry;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const sink = options.sink ?? consoleSink;

  function log(at: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[at] < LOG_LEVEL_PRIORITY[level]) return;
    sink(at, formatLogEntry(at, message, options, context));
  }

  return {
    level,
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (bindings) => createLogger({ ...options, ...bindings }),
  };
}

/** Discards every line; used when no logger is passed. */
export const silentLogger: Logger = createLogger({ level: "error", sink: () => undefined });
