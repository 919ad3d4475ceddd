/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * morganStream.ts: Morgan logging stream adapter for StationBase.
 */
import type { LogLevel } from "./logger.js";
import type { StreamOptions } from "morgan";
import df from "dateformat";
import { isConsoleLogging } from "./logger.js";
import { writeLogEntry } from "./fileLogger.js";

/* Morgan writes formatted request lines to a writable stream. This adapter routes them to the console or the file logger, following the current logging mode, so
 * request logs land next to application logs. The request format used by app.ts carries the status code after "responded", which we use to pick a log level:
 * server errors are logged as errors and client errors as warnings.
 */

// The request line format shared by every HTTP log level. HTTP_STATUS_PATTERN depends on the "responded :status" part.
export const MORGAN_FORMAT = ":method :url from :remote-addr responded :status in :response-time ms.";

const HTTP_STATUS_PATTERN = / responded (\d{3}) /;

/**
 * Maps a formatted morgan line to a log level using its status code.
 * @param line - The formatted request line.
 * @returns The log level for the line.
 */
export function levelForRequestLine(line: string): LogLevel {

  const match = HTTP_STATUS_PATTERN.exec(line);
  const status = match ? parseInt(match[1], 10) : 0;

  if(status >= 500) {

    return "error";
  }

  if(status >= 400) {

    return "warn";
  }

  return "info";
}

/**
 * Creates a Morgan stream options object that routes log output based on the logging mode. When console logging is active, output goes to stdout with a timestamp
 * prefix. When file logging is active, output goes to the file logger which adds its own timestamp.
 * @returns StreamOptions object for Morgan configuration.
 */
export function createMorganStream(): StreamOptions {

  return {

    write: (message: string): void => {

      // Remove trailing newline that Morgan adds since our loggers handle newlines.
      const trimmedMessage = message.trim();
      const level = levelForRequestLine(trimmedMessage);

      if(isConsoleLogging()) {

        const timestamp = df(new Date(), "yyyy/mm/dd HH:MM:ss.l");
        const line = [ "[", timestamp, "] ", trimmedMessage ].join("");

        /* eslint-disable no-console */
        if(level === "info") {

          console.log(line);
        } else {

          console.error(line);
        }
        /* eslint-enable no-console */
      } else {

        writeLogEntry(level, trimmedMessage);
      }
    }
  };
}
