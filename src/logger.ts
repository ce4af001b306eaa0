// Live Transcription Relay - Logging
// Console-backed logger shared by every component. Components receive a Logger
// through their constructor so tests can inject vi.fn() spies.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
}

/**
 * Creates a logger that prints `[LEVEL] [component] message` lines.
 * Lines below `minLevel` are dropped.
 */
export function createConsoleLogger(component: string, minLevel: LogLevel = "info"): Logger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  const prefix = (level: string) => `[${level}] [${component}]`;

  return {
    info: (msg, ...args) => {
      if (enabled("info")) console.log(`${prefix("INFO")} ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(`${prefix("WARN")} ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled("error")) console.error(`${prefix("ERROR")} ${msg}`, ...args);
    },
    debug: (msg, ...args) => {
      if (enabled("debug")) console.debug(`${prefix("DEBUG")} ${msg}`, ...args);
    },
  };
}

