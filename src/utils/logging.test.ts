/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logging.test.ts: Tests for debug category selection, the LOG facade, and the log file.
 */
import { DEBUG_CATEGORIES, categoryMatches, initDebugFilter, isCategoryEnabled, parseDebugPattern, unknownDebugEntries } from "./debugFilter.js";
import { LOG, setConsoleLogging, setDebugLogging } from "./logger.js";
import { LogFile, formatLogLine, keepNewestLines } from "./fileLogger.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const { promises: fsPromises } = fs;

afterEach(() => {

  initDebugFilter("");
  setConsoleLogging(false);
  vi.restoreAllMocks();
});

describe("debug patterns", () => {

  it("parses wildcards, inclusions, and exclusions", () => {

    expect(parseDebugPattern(" *, -cache:ledger ,,search")).toEqual({ exclude: [ "cache:ledger" ], include: [ "search" ], wildcard: true });
    expect(parseDebugPattern(" , ")).toBeNull();
  });

  it("selects a category and everything beneath it", () => {

    const pattern = parseDebugPattern("cache,-cache:enrich");

    expect(pattern).not.toBeNull();

    if(!pattern) {

      return;
    }

    expect(categoryMatches(pattern, "cache:ledger")).toBe(true);
    expect(categoryMatches(pattern, "cache:enrich")).toBe(false);
    expect(categoryMatches(pattern, "cachet")).toBe(false);
    expect(categoryMatches(pattern, "search")).toBe(false);
  });

  it("reports entries that match no known category", () => {

    const pattern = parseDebugPattern("cache,gide:http,-serch,config");

    expect(pattern && unknownDebugEntries(pattern)).toEqual([ "gide:http", "serch" ]);
    expect(initDebugFilter("cache:pipeline,bogus")).toEqual([ "bogus" ]);
    expect(isCategoryEnabled("cache:pipeline")).toBe(true);
    expect(isCategoryEnabled("guide:http")).toBe(false);
  });

  it("lists every category in name order", () => {

    const names = DEBUG_CATEGORIES.map(({ category }) => category);

    expect(names).toEqual([ ...names ].sort());
    expect(names).toContain("guide:http");
  });

  it("turns every category on and off with the debug switch", () => {

    setDebugLogging(true);

    expect(isCategoryEnabled("search")).toBe(true);

    setDebugLogging(false);

    expect(isCategoryEnabled("search")).toBe(false);
  });
});

describe("LOG in console mode", () => {

  beforeEach(() => {

    setConsoleLogging(true);
  });

  it("colors warnings and sends them to stderr", () => {

    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    LOG.warn("Skipped %s lineups.", 2);

    expect(warn).toHaveBeenCalledWith("\x1b[33mSkipped 2 lineups.\x1b[0m");
  });

  it("writes debug lines only for selected categories", () => {

    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    LOG.debug("cache:ledger", "Wrote %s lines.", 3);

    expect(log).not.toHaveBeenCalled();

    initDebugFilter("cache");
    LOG.debug("cache:ledger", "Wrote %s lines.", 3);
    LOG.debug("search", "Ignored.");

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("\x1b[36mWrote 3 lines.\x1b[0m");
  });
});

describe("log file", () => {

  let dataDir: string;

  beforeEach(async () => {

    dataDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "stationbase-log-"));
  });

  afterEach(async () => {

    await fsPromises.rm(dataDir, { force: true, recursive: true });
  });

  it("formats lines by level", () => {

    const timestamp = "2026/01/02 03:04:05.006";

    expect(formatLogLine("info", "Server started.", timestamp)).toBe("[2026/01/02 03:04:05.006] Server started.\n");
    expect(formatLogLine("warn", "Lineup skipped.", timestamp)).toBe("[2026/01/02 03:04:05.006] [WARN] Lineup skipped.\n");
    expect(formatLogLine("debug", "Merged.", timestamp, "cache:consolidate")).toBe("[2026/01/02 03:04:05.006] [DEBUG:cache:consolidate] Merged.\n");
  });

  it("keeps the newest whole lines", () => {

    const content = "aaa\nbbb\nccc\n";

    expect(keepNewestLines(content, 20)).toBe(content);
    expect(keepNewestLines(content, 8)).toBe("bbb\nccc\n");
    expect(keepNewestLines(content, 6)).toBe("ccc\n");
    expect(keepNewestLines(content, 2)).toBe("");
  });

  it("creates the file and appends buffered lines on flush and close", async () => {

    const file = path.join(dataDir, "logs", "stationbase.log");
    const log = new LogFile(file, 1000);

    await log.open();

    log.write("first\n");
    log.write("second\n");

    expect(await fsPromises.readFile(file, "utf-8")).toBe("");

    await log.flush();

    expect(await fsPromises.readFile(file, "utf-8")).toBe("first\nsecond\n");

    log.write("third\n");
    log.close();

    expect(await fsPromises.readFile(file, "utf-8")).toBe("first\nsecond\nthird\n");
  });

  it("cuts an oversized file back to its newest half", async () => {

    const file = path.join(dataDir, "stationbase.log");

    await fsPromises.writeFile(file, "aaa\nbbb\nccc\n", "utf-8");
    await new LogFile(file, 20).trimIfNeeded();

    expect(await fsPromises.readFile(file, "utf-8")).toBe("aaa\nbbb\nccc\n");

    await new LogFile(file, 10).trimIfNeeded();

    expect(await fsPromises.readFile(file, "utf-8")).toBe("ccc\n");
    expect(await fsPromises.readdir(dataDir)).toEqual([ "stationbase.log" ]);
  });
});
