/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.test.ts: Tests for HTTP request log filtering.
 */
import { describe, expect, it } from "vitest";
import { shouldSkipRequestLog } from "./app.js";

describe("shouldSkipRequestLog", () => {

  it("logs everything or nothing at the outer levels", () => {

    expect(shouldSkipRequestLog("none", "GET", "/search", 500)).toBe(true);
    expect(shouldSkipRequestLog("all", "GET", "/health", 200)).toBe(false);
  });

  it("logs only failures other than browser asset misses in errors mode", () => {

    expect(shouldSkipRequestLog("errors", "GET", "/search", 200)).toBe(true);
    expect(shouldSkipRequestLog("errors", "GET", "/stations/9", 404)).toBe(false);
    expect(shouldSkipRequestLog("errors", "GET", "/favicon.ico", 404)).toBe(true);
    expect(shouldSkipRequestLog("errors", "GET", "/favicon.ico", 500)).toBe(false);
  });

  it("drops successful polling in filtered mode", () => {

    expect(shouldSkipRequestLog("filtered", "GET", "/health", 200)).toBe(true);
    expect(shouldSkipRequestLog("filtered", "GET", "/status?verbose=1", 200)).toBe(true);
    expect(shouldSkipRequestLog("filtered", "GET", "/status", 503)).toBe(false);
    expect(shouldSkipRequestLog("filtered", "POST", "/health", 200)).toBe(false);
    expect(shouldSkipRequestLog("filtered", "GET", "/search?q=abc", 200)).toBe(false);
  });
});
