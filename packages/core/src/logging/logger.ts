/**
 * Structured logger
 *
 * Writes one JSON object per line to stderr. stdout is reserved for the
 * MCP stdio transport, so nothing here may use console.log.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogFields = Record<string, unknown>;

export type LogSink = (line: string) => void;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Logger writing to the same sink, tagged with a nested scope */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level: LogLevel;
  scope?: string;
  sink?: LogSink;
}

const stderrSink: LogSink = (line) => {
  console.error(line);
};

export function createLogger(options: LoggerOptions): Logger {
  const { level, scope } = options;
  const sink = options.sink ?? stderrSink;
  const threshold = LEVEL_ORDER[level];

  const write = (entryLevel: LogLevel, message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[entryLevel] < threshold) return;

    sink(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level: entryLevel.toUpperCase(),
        ...(scope ? { scope } : {}),
        message,
        ...fields,
      })
    );
  };

  return {
    level,
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
    child: (childScope) =>
      createLogger({
        level,
        sink,
        scope: scope ? `${scope}:${childScope}` : childScope,
      }),
  };
}
