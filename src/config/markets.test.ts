/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * markets.test.ts: Tests for the configured market list.
 */
import { addMarket, loadMarkets, marketKey, normalizeMarket, removeMarket, uniqueMarkets, validateMarket } from "./markets.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const { promises: fsPromises } = fs;

describe("market normalization", () => {

  it("normalizes countries and postal codes", () => {

    expect(normalizeMarket(" gbr ", "sw1a 1aa")).toEqual({ country: "GBR", postalCode: "SW1A1AA" });
    expect(marketKey("usa", " 10001 ")).toBe("USA,10001");
  });

  it("collapses duplicates and drops empty entries", () => {

    expect(uniqueMarkets([ { country: "usa", postalCode: "10001" }, { country: "USA", postalCode: " 10001" }, { country: "", postalCode: "1" },
      { country: "CAN", postalCode: "m5v 2t6" } ])).toEqual([ { country: "USA", postalCode: "10001" }, { country: "CAN", postalCode: "M5V2T6" } ]);
  });

  it("validates country and postal code shapes", () => {

    expect(validateMarket("usa", "10001")).toBeNull();
    expect(validateMarket("US", "10001")).toBe("Country must be a three-letter code (e.g., USA, CAN, GBR), got: US");
    expect(validateMarket("USA", "1")).toBe("Postal code must be 2 to 10 letters, digits, or dashes, got: 1");
    expect(validateMarket("USA", "100#01")).toBe("Postal code must be 2 to 10 letters, digits, or dashes, got: 100#01");
  });
});

describe("market list file", () => {

  let dataDir: string;
  let marketsFile: string;

  beforeEach(async () => {

    dataDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "stationbase-markets-"));
    marketsFile = path.join(dataDir, "markets.json");
  });

  afterEach(async () => {

    await fsPromises.rm(dataDir, { force: true, recursive: true });
  });

  it("treats a missing or malformed file as empty", async () => {

    expect(await loadMarkets(marketsFile)).toEqual([]);

    await fsPromises.writeFile(marketsFile, "{ not json", "utf-8");

    expect(await loadMarkets(marketsFile)).toEqual([]);

    await fsPromises.writeFile(marketsFile, JSON.stringify({ country: "USA" }), "utf-8");

    expect(await loadMarkets(marketsFile)).toEqual([]);
  });

  it("reads older entries and skips malformed ones", async () => {

    await fsPromises.writeFile(marketsFile, JSON.stringify([ { country: "usa", zip: 10001 }, { country: "USA" }, "GBR", { country: "gbr", postalCode: "sw1a 1aa" } ]),
      "utf-8");

    expect(await loadMarkets(marketsFile)).toEqual([ { country: "USA", postalCode: "10001" }, { country: "GBR", postalCode: "SW1A1AA" } ]);
  });

  it("adds and removes markets", async () => {

    expect(await addMarket(marketsFile, "usa", "10001")).toEqual({ added: true, market: { country: "USA", postalCode: "10001" } });
    expect(await addMarket(marketsFile, "USA", " 10001")).toEqual({ added: false, market: { country: "USA", postalCode: "10001" } });
    expect(await addMarket(marketsFile, "can", "m5v 2t6")).toEqual({ added: true, market: { country: "CAN", postalCode: "M5V2T6" } });

    expect(JSON.parse(await fsPromises.readFile(marketsFile, "utf-8"))).toEqual([ { country: "USA", postalCode: "10001" }, { country: "CAN", postalCode: "M5V2T6" } ]);

    expect(await removeMarket(marketsFile, "usa", "10001")).toBe(true);
    expect(await removeMarket(marketsFile, "usa", "10001")).toBe(false);
    expect(await loadMarkets(marketsFile)).toEqual([{ country: "CAN", postalCode: "M5V2T6" }]);
  });
});
