/**
 * Scoped console logging.
 *
 * Lines are written as `[inkwell:<scope>] message`. Debug lines are dropped
 * unless the logger was created with `debug: true` or the `debug` setting is on.
 */

import { settings } from "./settings.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /** Receives every emitted line (default: console, by level) */
  writer?: (line: string, level: LogLevel) => void;
  /** Force debug output on or off, overriding the `debug` setting */
  debug?: boolean;
}

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** A logger for a nested scope, sharing writer and debug flag */
  child(scope: string): Logger;
}

function consoleWriter(line: string, level: LogLevel): void {
  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      return;
    case "warn":
      console.warn(line);
      return;
    case "error":
      console.error(line);
      return;
  }
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const writer = options.writer ?? consoleWriter;
  const debugEnabled = (): boolean => options.debug ?? settings.getBoolean("debug", false);
  const write = (level: LogLevel, message: string): void => writer(`[inkwell:${scope}] ${message}`, level);

  return {
    scope,
    debug(message) {
      if (debugEnabled()) write("debug", message);
    },
    info(message) {
      write("info", message);
    },
    warn(message) {
      write("warn", message);
    },
    error(message) {
      write("error", message);
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`, options);
    },
  };
}
