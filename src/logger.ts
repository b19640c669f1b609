/**
 * Package-wide logging
 *
 * Every component logs through a tagged console logger ("[ReadClient] ...").
 * setupLogging() sets one threshold for all of them and can mirror the
 * emitted lines into a log file.
 */
import { appendFileSync } from "node:fs";
import { describeError } from "./errors";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggingOptions {
  level?: LogLevel;
  /** Append every emitted line to this file as well */
  logFile?: string;
}

interface LoggingState {
  level: LogLevel;
  logFile: string | null;
}

const state: LoggingState = {
  level: "info",
  logFile: null,
};

export function setupLogging(options: LoggingOptions = {}): void {
  state.level = options.level ?? "info";
  state.logFile = options.logFile ?? null;
}

export function getLogLevel(): LogLevel {
  return state.level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Append a line to the log file. The first write that fails is reported on
 * the console and turns file mirroring off.
 */
function mirrorToFile(logFile: string, entry: string): void {
  try {
    appendFileSync(logFile, entry);
  } catch (error) {
    state.logFile = null;
    console.error(
      `[Logger] Cannot write log file ${logFile}: ${describeError(error)}`
    );
  }
}

export function createLogger(tag: string): Logger {
  const emit = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[state.level]) {
      return;
    }

    const line = `[${tag}] ${message}`;
    console[level](line);

    if (state.logFile) {
      mirrorToFile(
        state.logFile,
        `${new Date().toISOString()} ${level.toUpperCase()} ${line}\n`
      );
    }
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}
