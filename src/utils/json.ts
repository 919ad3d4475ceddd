/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * json.ts: Parsed JSON narrowing helpers for StationBase.
 */

/**
 * Narrows a parsed JSON value to a plain object.
 * @param value - The parsed value.
 * @returns True if the value is a non-null, non-array object.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {

  return (value !== null) && (typeof value === "object") && !Array.isArray(value);
}
