/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * pipeline.test.ts: Tests for the incremental caching pipeline.
 */
import { CachingInProgressError, LedgerWriteError, NoMarketsConfiguredError } from "../utils/index.js";
import type { LineupSummary, Market, StationRecord } from "../types/index.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { applyLookup, isCachingActive, resolveLineupOrigin, runCaching } from "./pipeline.js";
import { readStations, writeStations } from "./store.js";
import type { CachingDeps } from "./pipeline.js";
import { CoverageManifest } from "./manifest.js";
import type { GuideDataSource } from "../guide/client.js";
import { ProcessingLedger } from "./ledger.js";
import type { StationPaths } from "../config/paths.js";
import { buildStationPaths } from "../config/paths.js";
import { createMemoryCacheStateStore } from "../config/index.js";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { resolveEffectiveStore } from "./consolidate.js";
import { stageLineup } from "./staging.js";

const { promises: fsPromises } = fs;

// An in-process guide source that serves canned lineups and stations and records every request.
class FakeGuide implements GuideDataSource {

  public readonly calls: string[] = [];
  public beforeStations: (lineupId: string) => Promise<void> = () => Promise.resolve();
  public gate: Promise<void> = Promise.resolve();
  public readonly lineups = new Map<string, LineupSummary[]>();
  public readonly lookups = new Map<string, StationRecord[]>();
  public readonly stations = new Map<string, StationRecord[]>();

  public async fetchLineups(country: string, postalCode: string): Promise<LineupSummary[]> {

    this.calls.push("lineups " + country + " " + postalCode);

    await this.gate;

    const lineups = this.lineups.get(country + " " + postalCode);

    if(!lineups) {

      throw new Error("Request to /tms/lineups returned HTTP 500.");
    }

    return lineups;
  }

  public async fetchStations(lineupId: string): Promise<StationRecord[]> {

    this.calls.push("stations " + lineupId);

    await this.beforeStations(lineupId);

    const stations = this.stations.get(lineupId);

    if(!stations) {

      throw new Error("Request to /dvr/guide/stations timed out after 10000ms.");
    }

    return stations;
  }

  public lookupCallSign(callSign: string): Promise<StationRecord[]> {

    this.calls.push("lookup " + callSign);

    return Promise.resolve(this.lookups.get(callSign) ?? []);
  }
}

const NEW_YORK: Market = { country: "USA", postalCode: "10001" };

describe("runCaching", () => {

  let dataDir: string;
  let paths: StationPaths;
  let guide: FakeGuide;

  // Builds fresh dependencies, reloading the ledger from disk the way a new run would.
  async function makeDeps(manifest: CoverageManifest = CoverageManifest.empty(), enrichment = false): Promise<CachingDeps> {

    return {

      cacheState: createMemoryCacheStateStore(),
      enrichment: { delay: 0, enabled: enrichment },
      guide,
      ledger: await ProcessingLedger.load(paths),
      manifest,
      paths
    };
  }

  beforeEach(async () => {

    dataDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "stationbase-pipeline-"));
    paths = buildStationPaths(dataDir);
    guide = new FakeGuide();

    guide.lineups.set("USA 10001", [ { lineupId: "USA-OTA10001", type: "OTA" }, { lineupId: "USA-NY31519-X", name: "Cable" } ]);
    guide.stations.set("USA-OTA10001", [ { callSign: "WABC", country: "UNK", name: "WABC", stationId: "1" }, { country: "UNK", name: "WNBC", stationId: "2" } ]);
    guide.stations.set("USA-NY31519-X", [ { country: "UNK", name: "WNBC-HD", stationId: "2" }, { country: "UNK", name: "NY1", stationId: "3" } ]);
  });

  afterEach(async () => {

    await fsPromises.rm(dataDir, { force: true, recursive: true });
  });

  it("fetches, de-duplicates, and merges a market's stations", async () => {

    const deps = await makeDeps();
    const summary = await runCaching([NEW_YORK], false, deps);

    expect(summary).toMatchObject({

      duplicatesRemoved: 1,
      lineupsDiscovered: 2,
      lineupsFetched: 2,
      marketsConfigured: 1,
      marketsProcessed: 1,
      stationsAdded: 3,
      stationsRaw: 4,
      stationsUpdated: 0,
      userStoreTotal: 3
    });

    const stored = await readStations(paths.userStationsFile);

    expect(stored.map((record) => record.stationId)).toEqual([ "3", "1", "2" ]);
    expect(stored[2]).toEqual({

      availableIn: ["USA"],
      country: "USA",
      lineupTracing: [{ country: "USA", lineupId: "USA-NY31519-X", lineupName: "Cable" }],
      name: "WNBC-HD",
      source: "user",
      stationId: "2"
    });
    expect(deps.ledger.marketEntries().map((entry) => entry.lineupsFound)).toEqual([2]);
    expect(deps.ledger.marketForLineup("USA-OTA10001")).toEqual(NEW_YORK);
    expect(await fsPromises.readdir(paths.stagingDir)).toEqual([]);
  });

  it("does nothing new when run again with the same markets", async () => {

    await runCaching([NEW_YORK], false, await makeDeps());

    guide.calls.length = 0;

    const deps = await makeDeps();
    const summary = await runCaching([NEW_YORK], false, deps);

    expect(guide.calls).toEqual([]);
    expect(summary.marketsAlreadyProcessed).toBe(1);
    expect(summary.stationsAdded).toBe(0);
    expect(summary.userStoreTotal).toBe(3);
    expect((await readStations(paths.userStationsFile)).length).toBe(3);
    expect((await fsPromises.readFile(paths.marketsLedgerFile, "utf-8")).trim().split("\n")).toHaveLength(1);
    expect((await fsPromises.readFile(paths.lineupsLedgerFile, "utf-8")).trim().split("\n")).toHaveLength(2);
  });

  it("records a market listed twice only once", async () => {

    const deps = await makeDeps();
    const summary = await runCaching([ NEW_YORK, { country: "usa", postalCode: " 10001 " } ], false, deps);

    expect(summary.marketsConfigured).toBe(1);
    expect(deps.ledger.marketEntries()).toHaveLength(1);
    expect(guide.calls.filter((call) => call.startsWith("lineups"))).toEqual(["lineups USA 10001"]);
  });

  it("skips markets the base store covers without touching the network", async () => {

    const manifest = CoverageManifest.fromJson({ markets: [{ country: "USA", zip: "10001" }] });
    const deps = await makeDeps(manifest);
    const summary = await runCaching([NEW_YORK], false, deps);

    expect(guide.calls).toEqual([]);
    expect(summary.marketsSkippedByManifest).toBe(1);
    expect(deps.ledger.marketEntries()).toMatchObject([{ country: "USA", lineupsFound: 0, postalCode: "10001" }]);
    expect(fs.existsSync(paths.userStationsFile)).toBe(false);
  });

  it("skips lineups the base store covers", async () => {

    const manifest = CoverageManifest.fromJson({ lineups: [{ lineup_id: "USA-OTA10001" }] });
    const deps = await makeDeps(manifest);
    const summary = await runCaching([NEW_YORK], false, deps);

    expect(guide.calls).toEqual([ "lineups USA 10001", "stations USA-NY31519-X" ]);
    expect(summary.lineupsSkippedByManifest).toBe(1);
    expect(deps.ledger.lineupEntries()).toMatchObject([ { lineupId: "USA-OTA10001", stationsFound: 0 }, { lineupId: "USA-NY31519-X", stationsFound: 2 } ]);
    expect(summary.marketsProcessed).toBe(1);
  });

  it("ignores the ledger and the manifest on a forced refresh", async () => {

    await runCaching([NEW_YORK], false, await makeDeps());

    guide.calls.length = 0;

    const manifest = CoverageManifest.fromJson({ markets: [{ country: "USA", zip: "10001" }] });
    const summary = await runCaching([NEW_YORK], true, await makeDeps(manifest));

    expect(guide.calls).toEqual([ "lineups USA 10001", "stations USA-OTA10001", "stations USA-NY31519-X" ]);
    expect(summary.stationsAdded).toBe(0);
    expect(summary.stationsUpdated).toBe(3);
    expect((await ProcessingLedger.load(paths)).marketEntries()).toHaveLength(1);
  });

  it("records failed markets with zero lineups", async () => {

    const deps = await makeDeps();
    const summary = await runCaching([{ country: "CAN", postalCode: "M5V2T6" }], false, deps);

    expect(summary.marketsFailed).toBe(1);
    expect(deps.ledger.marketEntries()).toMatchObject([{ country: "CAN", lineupsFound: 0, postalCode: "M5V2T6" }]);
  });

  it("records failed lineups and still completes the market", async () => {

    guide.stations.delete("USA-NY31519-X");

    const deps = await makeDeps();
    const summary = await runCaching([NEW_YORK], false, deps);

    expect(summary.lineupsFailed).toBe(1);
    expect(summary.lineupsFetched).toBe(1);
    expect(summary.stationsAdded).toBe(2);
    expect(deps.ledger.isLineupProcessed("USA-NY31519-X")).toBe(true);
    expect(deps.ledger.isMarketProcessed("USA", "10001")).toBe(true);
  });

  it("merges stations an interrupted run left staged", async () => {

    // The interrupted run staged and recorded the first lineup, but never reached the merge.
    const interrupted = await ProcessingLedger.load(paths);

    await stageLineup(paths.stagingDir, { country: "USA", lineupId: "USA-OTA10001", stations: [{ country: "UNK", name: "WABC", stationId: "1" }], type: "OTA" });
    await interrupted.recordLineup("USA-OTA10001", "USA", "10001", 1);

    const summary = await runCaching([NEW_YORK], false, await makeDeps());

    expect(guide.calls).toEqual([ "lineups USA 10001", "stations USA-NY31519-X" ]);
    expect(summary.lineupsSkippedByLedger).toBe(1);
    expect((await readStations(paths.userStationsFile)).map((record) => record.stationId)).toEqual([ "3", "1", "2" ]);
  });

  it("fills in nameless stations through call sign lookups", async () => {

    guide.stations.set("USA-OTA10001", [{ callSign: "KXYZ", country: "UNK", stationId: "9" }]);
    guide.lookups.set("KXYZ", [ { country: "UNK", name: "Other", stationId: "10" },
      { callSign: "KXYZ", country: "UNK", name: "KXYZ Channel 9", stationId: "9", videoQuality: "HDTV" } ]);

    const summary = await runCaching([NEW_YORK], false, await makeDeps(CoverageManifest.empty(), true));
    const stored = await readStations(paths.userStationsFile);

    expect(summary.enriched).toBe(1);
    expect(stored.find((record) => record.stationId === "9")).toMatchObject({ country: "USA", name: "KXYZ Channel 9", source: "user", videoQuality: "HDTV" });
  });

  it("makes the next search rebuild the combined view", async () => {

    const deps = await makeDeps();

    await writeStations(paths.baseStationsFile, [{ country: "USA", name: "Base Only", stationId: "100" }]);
    await writeStations(paths.userStationsFile, [{ country: "USA", name: "Old", stationId: "200" }]);
    await resolveEffectiveStore(deps);
    await runCaching([NEW_YORK], false, deps);

    expect(fs.existsSync(paths.combinedStationsFile)).toBe(false);

    const store = await resolveEffectiveStore(deps);

    expect(store.rebuilt).toBe(true);
    expect((await readStations(store.path)).length).toBe(5);
  });

  it("stops at a ledger write failure and keeps what was already recorded", async () => {

    // Replacing the lineup map with a directory makes the second lineup's record fail.
    guide.beforeStations = async (lineupId: string): Promise<void> => {

      if(lineupId === "USA-NY31519-X") {

        await fsPromises.rm(paths.lineupMapFile);
        await fsPromises.mkdir(paths.lineupMapFile);
      }
    };

    await expect(runCaching([NEW_YORK], false, await makeDeps())).rejects.toBeInstanceOf(LedgerWriteError);
    expect(isCachingActive()).toBe(false);

    const reloaded = await ProcessingLedger.load(paths);

    expect(reloaded.isLineupProcessed("USA-OTA10001")).toBe(true);
    expect(reloaded.isLineupProcessed("USA-NY31519-X")).toBe(false);
    expect(reloaded.isMarketProcessed("USA", "10001")).toBe(false);
    expect(fs.existsSync(paths.userStationsFile)).toBe(false);
    expect((await fsPromises.readdir(paths.stagingDir)).sort()).toEqual([ "USA-NY31519-X.json", "USA-OTA10001.json" ]);
  });

  it("refuses an empty market list", async () => {

    await expect(runCaching([], false, await makeDeps())).rejects.toBeInstanceOf(NoMarketsConfiguredError);
    await expect(runCaching([{ country: " ", postalCode: "" }], false, await makeDeps())).rejects.toBeInstanceOf(NoMarketsConfiguredError);
  });

  it("allows one run at a time", async () => {

    let release = (): void => undefined;

    guide.gate = new Promise<void>((resolve) => {

      release = (): void => resolve();
    });

    const deps = await makeDeps();
    const first = runCaching([NEW_YORK], false, deps);

    expect(isCachingActive()).toBe(true);
    await expect(runCaching([NEW_YORK], false, deps)).rejects.toBeInstanceOf(CachingInProgressError);

    release();

    await first;

    expect(isCachingActive()).toBe(false);
  });
});

describe("resolveLineupOrigin", () => {

  let dataDir: string;

  beforeEach(async () => {

    dataDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "stationbase-origin-"));
  });

  afterEach(async () => {

    await fsPromises.rm(dataDir, { force: true, recursive: true });
  });

  it("prefers the discovering market, then the ledger, then the lineup ID prefix", async () => {

    const ledger = await ProcessingLedger.load(buildStationPaths(dataDir));

    await ledger.recordLineup("GBR-1000193-DEFAULT", "GBR", "SW1A1AA", 4);

    const discovered = new Map([[ "USA-NY31519-X", NEW_YORK ]]);

    expect(resolveLineupOrigin("USA-NY31519-X", discovered, ledger)).toEqual(NEW_YORK);
    expect(resolveLineupOrigin("GBR-1000193-DEFAULT", discovered, ledger)).toEqual({ country: "GBR", postalCode: "SW1A1AA" });
    expect(resolveLineupOrigin("can-otam5v", discovered, ledger)).toEqual({ country: "CAN", postalCode: "" });
    expect(resolveLineupOrigin("X-1", discovered, ledger)).toEqual({ country: "UNK", postalCode: "" });
  });
});

describe("applyLookup", () => {

  it("copies descriptive fields and keeps the station's origin", () => {

    expect(applyLookup({ availableIn: ["USA"], callSign: "KXYZ", country: "USA", source: "user", stationId: "9" },
      { availableIn: ["CAN"], country: "CAN", language: "en", name: "KXYZ", network: "CBS", stationId: "9" })).toEqual({

      availableIn: ["USA"],
      callSign: "KXYZ",
      country: "USA",
      language: "en",
      name: "KXYZ",
      network: "CBS",
      source: "user",
      stationId: "9"
    });
  });
});
