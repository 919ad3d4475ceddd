/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * utils.test.ts: Tests for the formatting and error helpers.
 */
import { MORGAN_FORMAT, levelForRequestLine } from "./morganStream.js";
import { describe, expect, it } from "vitest";
import { formatBytes, formatDuration, formatTimestamp, parseCodeList } from "./format.js";
import { formatError, isMissingFileError } from "./errors.js";
import { isPlainObject } from "./json.js";

describe("formatError", () => {

  it("strips trailing punctuation from every kind of error", () => {

    expect(formatError(new Error("Disk full."))).toBe("Disk full");
    expect(formatError({ message: "Bad gateway!?" })).toBe("Bad gateway");
    expect(formatError(42)).toBe("42");
  });

  it("recognizes missing file errors", () => {

    expect(isMissingFileError(Object.assign(new Error("no such file"), { code: "ENOENT" }))).toBe(true);
    expect(isMissingFileError(Object.assign(new Error("denied"), { code: "EACCES" }))).toBe(false);
    expect(isMissingFileError({ code: "ENOENT" })).toBe(false);
  });
});

describe("format helpers", () => {

  it("formats durations", () => {

    expect(formatDuration(17_400)).toBe("17s");
    expect(formatDuration(399_000)).toBe("6m 39s");
    expect(formatDuration(4_980_000)).toBe("1h 23m");
  });

  it("formats byte counts", () => {

    expect(formatBytes(512)).toBe("512 B");
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(2 * 1048576)).toBe("2.0 MB");
  });

  it("formats timestamps", () => {

    expect(formatTimestamp(0)).toBe("never");
    expect(formatTimestamp(Date.UTC(2026, 0, 2, 3, 4, 5))).toBe("2026-01-02T03:04:05.000Z");
  });

  it("parses code lists", () => {

    expect(parseCodeList(" usa, can ,,gbr")).toEqual([ "USA", "CAN", "GBR" ]);
    expect(parseCodeList("")).toEqual([]);
  });

  it("narrows plain objects", () => {

    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
  });
});

describe("levelForRequestLine", () => {

  it("picks the level from the response status", () => {

    expect(MORGAN_FORMAT).toContain("responded :status ");
    expect(levelForRequestLine("GET /search?q=abc from 127.0.0.1 responded 200 in 3.1 ms.")).toBe("info");
    expect(levelForRequestLine("GET /stations/1 from 127.0.0.1 responded 404 in 0.4 ms.")).toBe("warn");
    expect(levelForRequestLine("POST /cache from 127.0.0.1 responded 503 in 9.0 ms.")).toBe("error");
    expect(levelForRequestLine("garbled")).toBe("info");
  });
});
