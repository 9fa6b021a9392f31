type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
const currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  /** Logger that stamps `scope` on every line */
  child(scope: string): Logger;
}

function createLogger(base: Record<string, unknown>): Logger {
  const line = (level: LogLevel, msg: string, data?: Record<string, unknown>): string =>
    JSON.stringify({ level, msg, ...base, ...data });

  return {
    debug(msg, data) {
      if (shouldLog("debug")) console.debug(line("debug", msg, data));
    },
    info(msg, data) {
      if (shouldLog("info")) console.log(line("info", msg, data));
    },
    warn(msg, data) {
      if (shouldLog("warn")) console.warn(line("warn", msg, data));
    },
    error(msg, data) {
      if (shouldLog("error")) console.error(line("error", msg, data));
    },
    child(scope) {
      return createLogger({ ...base, scope });
    },
  };
}

export const logger: Logger = createLogger({});
