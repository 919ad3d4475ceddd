/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.ts: The LOG facade for StationBase.
 */
import { initDebugFilter, isCategoryEnabled } from "./debugFilter.js";
import { format } from "node:util";
import { writeLogEntry } from "./fileLogger.js";

/**
 * Log levels understood by the output sinks.
 */
export type LogLevel = "debug" | "error" | "info" | "warn";

/* LOG takes printf-style arguments (%s, %d, %j, %o through util.format) and sends each message to one of two sinks. In console mode, used by --console and by
 * every CLI command, messages go to stdout or stderr in color. Otherwise they go to the server's log file, uncolored.
 */

const ANSI_RESET = "\x1b[0m";

const LEVEL_COLORS: Record<LogLevel, string> = {

  debug: "\x1b[36m",
  error: "\x1b[31m",
  info: "",
  warn: "\x1b[33m"
};

let useConsoleLogging = false;

/**
 * Switches between the console and the log file.
 * @param enabled - True for the console.
 */
export function setConsoleLogging(enabled: boolean): void {

  useConsoleLogging = enabled;
}

/**
 * @returns True when messages go to the console.
 */
export function isConsoleLogging(): boolean {

  return useConsoleLogging;
}

/**
 * Turns every debug category on or off. --debug uses this; STATIONBASE_DEBUG selects categories through initDebugFilter() instead.
 * @param enabled - True for every category.
 */
export function setDebugLogging(enabled: boolean): void {

  initDebugFilter(enabled ? "*" : "");
}

function emit(level: LogLevel, message: string, args: unknown[], category?: string): void {

  const text = (args.length > 0) ? format(message, ...args) : message;

  if(!useConsoleLogging) {

    writeLogEntry(level, text, category);

    return;
  }

  const color = LEVEL_COLORS[level];
  const line = color ? color + text + ANSI_RESET : text;

  /* eslint-disable no-console */
  switch(level) {

    case "error": {

      console.error(line);

      break;
    }

    case "warn": {

      console.warn(line);

      break;
    }

    default: {

      console.log(line);

      break;
    }
  }
  /* eslint-enable no-console */
}

export const LOG = {

  /**
   * Logs a debug message when its category is selected.
   * @param category - The debug category, e.g. "cache:pipeline". DEBUG_CATEGORIES lists them.
   * @param message - The format string.
   * @param args - Values for the format string.
   */
  debug: function(category: string, message: string, ...args: unknown[]): void {

    if(isCategoryEnabled(category)) {

      emit("debug", message, args, category);
    }
  },

  /**
   * Logs a failure that stopped an operation, such as an unwritable ledger or a store that can't be parsed.
   * @param message - The format string.
   * @param args - Values for the format string.
   */
  error: function(message: string, ...args: unknown[]): void {

    emit("error", message, args);
  },

  info: function(message: string, ...args: unknown[]): void {

    emit("info", message, args);
  },

  /**
   * Logs a problem the operation recovered from, such as a lineup request that timed out or a stale coverage manifest.
   * @param message - The format string.
   * @param args - Values for the format string.
   */
  warn: function(message: string, ...args: unknown[]): void {

    emit("warn", message, args);
  }
};
