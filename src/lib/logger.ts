/**
 * Console logger with "[Context] message" prefixes.
 *
 * The level is process-wide; the stdio server sends everything to stderr
 * so stdout carries protocol messages only.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = "info";
let useStderr = false;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Route every level to stderr (for processes whose stdout is a protocol channel).
 */
export function logToStderr(enabled = true): void {
  useStderr = enabled;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(context: string): Logger {
  const prefix = `[${context}]`;

  return {
    debug(message, ...details) {
      if (!enabled("debug")) return;
      (useStderr ? console.error : console.debug)(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (!enabled("info")) return;
      (useStderr ? console.error : console.log)(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (!enabled("warn")) return;
      (useStderr ? console.error : console.warn)(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (!enabled("error")) return;
      console.error(`${prefix} ${message}`, ...details);
    },
  };
}
