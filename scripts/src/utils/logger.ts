export type LogLevel = "info" | "warn" | "error" | "debug";

export type LogSink = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

const ENV_LEVEL = process.env.LOG_LEVEL;
const DEFAULT_LEVEL: LogLevel = isLogLevel(ENV_LEVEL) ? ENV_LEVEL : "info";

// stdout is reserved for the report, diagnostics always go to stderr
const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export function createLogger(threshold: LogLevel = DEFAULT_LEVEL, sink: LogSink = stderrSink): Logger {
  const log = (level: LogLevel, message: string, meta: Record<string, unknown> = {}): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }
    const payload = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    sink(`[${level.toUpperCase()}] ${message}${payload}`);
  };

  return {
    debug: (message, meta = {}) => log("debug", message, meta),
    info: (message, meta = {}) => log("info", message, meta),
    warn: (message, meta = {}) => log("warn", message, meta),
    error: (message, meta = {}) => log("error", message, meta)
  };
}

export const logger = createLogger();
