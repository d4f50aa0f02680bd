// Doctor Voice Onboarding - Console logging
// Each component gets a tagged logger: "[LEVEL] [Component] message".

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

let minimumLevel: LogLevel = "info";

/** Sets the process-wide minimum level for loggers created by createLogger. */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function createLogger(component: string): Logger {
  const enabled = (level: LogLevel) => LEVEL_RANK[level] >= LEVEL_RANK[minimumLevel];
  const prefix = (level: LogLevel) => `[${level.toUpperCase()}] [${component}]`;

  return {
    debug: (msg, ...args) => {
      if (enabled("debug")) console.debug(`${prefix("debug")} ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled("info")) console.log(`${prefix("info")} ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(`${prefix("warn")} ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled("error")) console.error(`${prefix("error")} ${msg}`, ...args);
    },
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
