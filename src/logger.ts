// Interview Signal Engine - Logging
// Console logger producing "[LEVEL] [Component] message" lines. Components take
// an optional Logger so tests can inject silent vi.fn() loggers.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

const debugEnabled = () => process.env.LOG_LEVEL === "debug";

export function createConsoleLogger(component: string): Logger {
  const prefix = (level: string) => `[${level}] [${component}]`;
  return {
    info: (msg, ...args) => console.log(`${prefix("INFO")} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`${prefix("WARN")} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`${prefix("ERROR")} ${msg}`, ...args),
    debug: (msg, ...args) => {
      if (debugEnabled()) console.log(`${prefix("DEBUG")} ${msg}`, ...args);
    },
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
