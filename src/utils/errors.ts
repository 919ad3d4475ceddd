/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Error formatting and named error types for StationBase.
 */

/* These utilities provide consistent error handling and formatting throughout the application. The formatError function extracts meaningful messages from various
 * error types. The named error classes mark the structural failures that callers (routes and the CLI) translate into remediation messages. Transient network and
 * parse failures never reach these classes; they are logged and counted as zero results where they happen.
 */

/**
 * Formats an error for logging by extracting the message if available, falling back to string conversion for non-Error objects. Trailing punctuation is stripped
 * to allow callers to add consistent punctuation in their log format strings.
 * @param error - The error to format.
 * @returns A string representation suitable for logging, without trailing punctuation.
 */
export function formatError(error: unknown): string {

  let message: string;

  if(error instanceof Error) {

    message = error.message;
  } else if(error && (typeof error === "object") && ("message" in error) && (typeof error.message === "string")) {

    message = error.message;
  } else {

    message = String(error);
  }

  // Strip trailing punctuation to prevent double punctuation when callers add their own.
  return message.replace(/[.!?]+$/, "");
}

/**
 * Checks whether a filesystem error reports a missing file or directory.
 * @param error - The error to check.
 * @returns True for ENOENT errors.
 */
export function isMissingFileError(error: unknown): boolean {

  return (error instanceof Error) && ("code" in error) && (error.code === "ENOENT");
}

/**
 * Raised when neither the base store nor the user store holds any station records.
 */
export class NoStationsAvailableError extends Error {

  constructor(message = "No station data is available. Run a caching pass or install the base station snapshot.") {

    super(message);

    this.name = "NoStationsAvailableError";
  }
}

/**
 * Raised when a caching run starts with an empty market list.
 */
export class NoMarketsConfiguredError extends Error {

  constructor(message = "No markets are configured. Add at least one market (country and postal code) before caching.") {

    super(message);

    this.name = "NoMarketsConfiguredError";
  }
}

/**
 * Raised when the processing ledger cannot be persisted. The failing file is available for diagnostics, and the underlying error is kept as the cause.
 */
export class LedgerWriteError extends Error {

  public readonly file: string;

  constructor(file: string, cause: unknown) {

    super("Unable to write the processing ledger file " + file + ": " + formatError(cause) + ".", { cause });

    this.name = "LedgerWriteError";

    this.file = file;
  }
}

/**
 * Raised when a caching run is requested while another run in the same process is still active.
 */
export class CachingInProgressError extends Error {

  constructor(message = "A caching run is already in progress.") {

    super(message);

    this.name = "CachingInProgressError";
  }
}
