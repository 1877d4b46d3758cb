import type { LogLevel } from "../types";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/** Console logger that prefixes lines with `[Scope]` and drops lines below `level` */
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const enabled = (at: Exclude<LogLevel, "silent">) => SEVERITY[at] >= SEVERITY[level];

  return {
    debug(message, ...details) {
      if (enabled("debug")) console.debug(`[${scope}] ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.info(`[${scope}] ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(`[${scope}] ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(`[${scope}] ${message}`, ...details);
    },
  };
}
