/**
 * Console Logger
 *
 * Scoped console output with a configurable threshold. Every line is
 * prefixed with `[knowable:<scope>]`; the threshold is read from
 * `log.level` (or forced to "debug" by `debug: true`) on each call.
 */

import { config, type LogLevel } from "./config.js";

export interface Logger {
  readonly scope: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/**
 * The level currently in effect.
 */
export function currentLogLevel(): LogLevel {
  if (config.get("debug") === true) return "debug";
  const level = config.get("log.level");
  return isLogLevel(level) ? level : "warn";
}

/**
 * Whether a message at `level` would be written right now.
 */
export function isLevelEnabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLogLevel()];
}

export function createLogger(scope: string): Logger {
  const prefix = `[knowable:${scope}]`;

  return {
    scope,
    debug: (message, ...details) => {
      if (isLevelEnabled("debug")) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (isLevelEnabled("info")) console.info(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (isLevelEnabled("warn")) console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (isLevelEnabled("error")) console.error(`${prefix} ${message}`, ...details);
    },
  };
}
