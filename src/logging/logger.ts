export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || "").trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
}

export function createLogger(scope: string, threshold: LogLevel = parseLogLevel(process.env.APPLYGATE_LOG_LEVEL)): Logger {
  const prefix = `[${scope}]`;
  const emit = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }
    log(level.toUpperCase(), prefix, message);
  };
  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

function log(level: string, prefix: string, message: string): void {
  const timestamp = new Date().toISOString();
  process.stdout.write(`${timestamp} ${level} ${prefix} ${message}\n`);
}
