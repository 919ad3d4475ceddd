/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * format.ts: Formatting utilities for StationBase.
 */

/**
 * Formats a duration in milliseconds as a human-readable string. The format varies based on duration length:
 * - Less than 60 seconds: "17s"
 * - Less than 1 hour: "6m 39s"
 * - 1 hour or more: "1h 23m"
 * @param ms - Duration in milliseconds.
 * @returns Formatted duration string.
 */
export function formatDuration(ms: number): string {

  const totalSeconds = Math.round(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if(hours > 0) {

    return [ String(hours), "h ", String(minutes), "m" ].join("");
  }

  if(minutes > 0) {

    return [ String(minutes), "m ", String(seconds), "s" ].join("");
  }

  return [ String(seconds), "s" ].join("");
}

/**
 * Formats a byte count with a binary unit suffix ("512 B", "1.5 KB", "2.0 MB").
 * @param bytes - The byte count.
 * @returns Formatted size string.
 */
export function formatBytes(bytes: number): string {

  if(bytes < 1024) {

    return [ String(bytes), " B" ].join("");
  }

  if(bytes < 1048576) {

    return [ (bytes / 1024).toFixed(1), " KB" ].join("");
  }

  return [ (bytes / 1048576).toFixed(1), " MB" ].join("");
}

/**
 * Formats an optional epoch millisecond timestamp for display.
 * @param ms - Milliseconds since the epoch, or 0/undefined when unknown.
 * @returns An ISO 8601 string, or "never" when the timestamp is unset.
 */
export function formatTimestamp(ms: number | undefined): string {

  if(!ms) {

    return "never";
  }

  return new Date(ms).toISOString();
}

/**
 * Splits a comma-separated list into trimmed, uppercased, non-empty entries. Used for country and resolution lists from configuration and query strings.
 * @param value - The raw list.
 * @returns The parsed entries in their original order.
 */
export function parseCodeList(value: string | undefined): string[] {

  if(!value) {

    return [];
  }

  return value.split(",").map((entry) => entry.trim().toUpperCase()).filter((entry) => entry.length > 0);
}

/**
 * Starts a millisecond stopwatch.
 * @returns A function giving the whole milliseconds elapsed since the call.
 */
export function startTimer(): () => number {

  const start = performance.now();

  return (): number => Math.round(performance.now() - start);
}
