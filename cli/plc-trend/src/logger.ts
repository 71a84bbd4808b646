export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "debug" || v === "info" || v === "warn" || v === "error" ? v : fallback;
}

export function createLogger(scope: string, level: LogLevel = parseLogLevel(process.env.PLC_TREND_LOG_LEVEL)): Logger {
  const min = LEVELS[level];
  const prefix = `[${scope}]`;
  return {
    debug(message) {
      if (LEVELS.debug >= min) console.log(`${prefix} ${message}`);
    },
    info(message) {
      if (LEVELS.info >= min) console.log(`${prefix} ${message}`);
    },
    warn(message) {
      if (LEVELS.warn >= min) console.error(`${prefix} ${message}`);
    },
    error(message) {
      if (LEVELS.error >= min) console.error(`${prefix} ${message}`);
    },
  };
}
