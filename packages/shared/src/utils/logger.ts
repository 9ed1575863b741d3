export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function shouldLog(level: Exclude<LogLevel, "silent">): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatMessage(
  level: LogLevel,
  component: string,
  message: string
): string {
  const timestamp = new Date().toISOString();
  return `${timestamp} [${level.toUpperCase()}] [${component}] ${message}`;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

// stdout is reserved for command results (handles, job references)
function write(level: Exclude<LogLevel, "silent">, component: string, message: string, data: unknown): void {
  if (!shouldLog(level)) return;
  const line = formatMessage(level, component, message);
  if (data === undefined) {
    console.error(line);
  } else {
    console.error(line, data);
  }
}

export function createLogger(component: string): Logger {
  return {
    debug(message: string, data?: unknown) {
      write("debug", component, message, data);
    },
    info(message: string, data?: unknown) {
      write("info", component, message, data);
    },
    warn(message: string, data?: unknown) {
      write("warn", component, message, data);
    },
    error(message: string, data?: unknown) {
      write("error", component, message, data);
    },
  };
}
