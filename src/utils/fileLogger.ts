/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.ts: The server's log file for StationBase.
 */
import { formatError, isMissingFileError } from "./errors.js";
import type { LogLevel } from "./logger.js";
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/* Unless --console is given, the server logs to <data-dir>/stationbase.log (or --log-file). Lines are buffered and appended once a second. After every
 * SIZE_CHECK_INTERVAL lines the file's size is checked, and a file over LOG_MAX_SIZE is cut back to its newest half on a line boundary. The one-shot CLI commands
 * always log to the console and never open the file.
 */

const FLUSH_INTERVAL_MS = 1000;
const SIZE_CHECK_INTERVAL = 100;

// Matches the console-stamp format used in console mode.
const TIMESTAMP_FORMAT = "yyyy/mm/dd HH:MM:ss.l";

/**
 * Formats one log file line. Info lines carry no level tag, and debug lines carry their category.
 * @param level - The log level.
 * @param message - The formatted message.
 * @param timestamp - The formatted timestamp.
 * @param category - The debug category, if any.
 * @returns The line, newline included.
 */
export function formatLogLine(level: LogLevel, message: string, timestamp: string, category?: string): string {

  if(level === "info") {

    return "[" + timestamp + "] " + message + "\n";
  }

  const tag = category ? level.toUpperCase() + ":" + category : level.toUpperCase();

  return "[" + timestamp + "] [" + tag + "] " + message + "\n";
}

/**
 * Keeps the newest lines of a log that fit in a target size.
 * @param content - The log content.
 * @param targetSize - The most characters to keep.
 * @returns The content from the first line start at or after the cut point. Empty when no complete line fits.
 */
export function keepNewestLines(content: string, targetSize: number): string {

  if(content.length <= targetSize) {

    return content;
  }

  const newline = content.indexOf("\n", content.length - targetSize - 1);

  return (newline === -1) ? "" : content.slice(newline + 1);
}

/**
 * A size-capped, buffered log file.
 */
export class LogFile {

  public readonly file: string;

  private buffer: string[] = [];
  private linesSinceCheck = 0;
  private readonly maxSize: number;
  private pending: Nullable<Promise<void>> = null;
  private timer: Nullable<ReturnType<typeof setInterval>> = null;

  constructor(file: string, maxSize: number) {

    this.file = file;
    this.maxSize = maxSize;
  }

  /**
   * Creates the file and its directory when missing and starts the flush timer.
   */
  public async open(): Promise<void> {

    await fsPromises.mkdir(path.dirname(this.file), { recursive: true });
    await fsPromises.appendFile(this.file, "", "utf-8");

    this.timer = setInterval((): void => {

      void this.flush();
    }, FLUSH_INTERVAL_MS);

    this.timer.unref();
  }

  /**
   * Queues a line for the next flush.
   * @param line - The formatted line.
   */
  public write(line: string): void {

    this.buffer.push(line);
    this.linesSinceCheck++;
  }

  /**
   * Appends the buffered lines. Calls made while a flush is running wait for it instead of starting another. Write failures are reported on the console and the
   * lines are dropped.
   */
  public flush(): Promise<void> {

    if(!this.pending) {

      this.pending = this.appendBuffered().finally(() => {

        this.pending = null;
      });
    }

    return this.pending;
  }

  /**
   * Appends the buffered lines synchronously. Used from the process exit handler, where nothing asynchronous runs.
   */
  public flushSync(): void {

    if(this.buffer.length === 0) {

      return;
    }

    const content = this.buffer.join("");

    this.buffer = [];

    try {

      fs.appendFileSync(this.file, content, "utf-8");
    } catch(error) {

      // eslint-disable-next-line no-console
      console.error("Unable to write the final log lines to %s: %s.", this.file, formatError(error));
    }
  }

  /**
   * Cuts the file back to half the maximum size when it has grown past it.
   */
  public async trimIfNeeded(): Promise<void> {

    try {

      const stats = await fsPromises.stat(this.file);

      if(stats.size <= this.maxSize) {

        return;
      }

      const kept = keepNewestLines(await fsPromises.readFile(this.file, "utf-8"), Math.floor(this.maxSize / 2));
      const tempPath = this.file + ".tmp";

      await fsPromises.writeFile(tempPath, kept, "utf-8");
      await fsPromises.rename(tempPath, this.file);
    } catch(error) {

      // A missing file is recreated by the next append.
      if(!isMissingFileError(error)) {

        // eslint-disable-next-line no-console
        console.warn("Unable to trim log file %s: %s.", this.file, formatError(error));
      }
    }
  }

  /**
   * Stops the flush timer and writes what is left.
   */
  public close(): void {

    if(this.timer) {

      clearInterval(this.timer);
      this.timer = null;
    }

    this.flushSync();
  }

  private async appendBuffered(): Promise<void> {

    if(this.buffer.length === 0) {

      return;
    }

    const content = this.buffer.join("");

    this.buffer = [];

    try {

      await fsPromises.appendFile(this.file, content, "utf-8");
    } catch(error) {

      // eslint-disable-next-line no-console
      console.error("Unable to write to log file %s: %s.", this.file, formatError(error));

      return;
    }

    if(this.linesSinceCheck >= SIZE_CHECK_INTERVAL) {

      this.linesSinceCheck = 0;

      await this.trimIfNeeded();
    }
  }
}

// The server's log file. Null until the server opens it, and in every CLI command.
let activeLog: Nullable<LogFile> = null;

/**
 * Opens the server's log file. When it can't be opened, the problem is reported on the console and file logging stays off.
 * @param file - The log file path.
 * @param maxSize - The size at which the file is trimmed, from CONFIG.logging.maxSize.
 */
export async function initializeFileLogger(file: string, maxSize: number): Promise<void> {

  const log = new LogFile(file, maxSize);

  try {

    await log.open();
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Unable to open log file %s: %s. File logging is off.", file, formatError(error));

    return;
  }

  activeLog = log;
}

/**
 * Queues a line for the log file. Nothing happens while no log file is open.
 * @param level - The log level.
 * @param message - The formatted message.
 * @param category - The debug category, if any.
 */
export function writeLogEntry(level: LogLevel, message: string, category?: string): void {

  activeLog?.write(formatLogLine(level, message, df(new Date(), TIMESTAMP_FORMAT), category));
}

/**
 * Writes any buffered lines synchronously.
 */
export function flushLogBufferSync(): void {

  activeLog?.flushSync();
}

/**
 * Closes the log file.
 */
export function shutdownFileLogger(): void {

  activeLog?.close();
  activeLog = null;
}
