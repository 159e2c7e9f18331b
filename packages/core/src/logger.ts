import pino from "pino";
import type { LogLevel } from "./config.js";

export type Logger = pino.Logger;

export interface LoggerOptions {
  readonly level?: LogLevel;
  /** Bound to every record as `name` */
  readonly name?: string;
}

/**
 * Create the root structured logger. Components derive children with
 * `logger.child({ component })`; tests pass `level: "silent"`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? "info",
    ...(options.name !== undefined ? { name: options.name } : {}),
  });
}
