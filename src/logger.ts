export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }

  return "info";
}

let threshold: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function timestamp(): string {
  return new Date().toISOString();
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(scope?: string): Logger {
  const prefix = scope ? `[${scope}] ` : "";

  return {
    debug(message: string): void {
      if (enabled("debug")) {
        console.debug(`[${timestamp()}] DEBUG ${prefix}${message}`);
      }
    },
    info(message: string): void {
      if (enabled("info")) {
        console.log(`[${timestamp()}] INFO ${prefix}${message}`);
      }
    },
    warn(message: string): void {
      if (enabled("warn")) {
        console.warn(`[${timestamp()}] WARN ${prefix}${message}`);
      }
    },
    error(message: string): void {
      if (enabled("error")) {
        console.error(`[${timestamp()}] ERROR ${prefix}${message}`);
      }
    }
  };
}

export const logger = createLogger();
