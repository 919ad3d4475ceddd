/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * consolidate.test.ts: Tests for combined view construction.
 */
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { invalidateCombinedView, isFresh, rebuildCombinedView, resolveEffectiveStore } from "./consolidate.js";
import { readStations, writeStations } from "./store.js";
import type { ConsolidationDeps } from "./consolidate.js";
import { NoStationsAvailableError } from "../utils/index.js";
import { buildStationPaths } from "../config/paths.js";
import { createMemoryCacheStateStore } from "../config/index.js";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const { promises: fsPromises } = fs;

// Sets a file's modification time to a fixed number of seconds after a fixed epoch.
async function touch(file: string, seconds: number): Promise<void> {

  const time = new Date((1_700_000_000 + seconds) * 1000);

  await fsPromises.utimes(file, time, time);
}

describe("consolidation", () => {

  let dataDir: string;
  let deps: ConsolidationDeps;

  beforeEach(async () => {

    dataDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "stationbase-consolidate-"));
    deps = { cacheState: createMemoryCacheStateStore(), paths: buildStationPaths(dataDir) };
  });

  afterEach(async () => {

    await fsPromises.rm(dataDir, { force: true, recursive: true });
  });

  it("fails when neither store holds records", async () => {

    await fsPromises.writeFile(deps.paths.baseStationsFile, "[]");

    await expect(resolveEffectiveStore(deps)).rejects.toBeInstanceOf(NoStationsAvailableError);
  });

  it("searches the base store alone when the user store is empty", async () => {

    await writeStations(deps.paths.baseStationsFile, [{ country: "USA", name: "Alpha", stationId: "1" }]);

    const store = await resolveEffectiveStore(deps);

    expect(store).toEqual({ kind: "base", path: deps.paths.baseStationsFile, rebuilt: false });
    expect(await readStations(store.path)).toEqual([{ country: "USA", name: "Alpha", stationId: "1" }]);
  });

  it("searches the user store alone when the base store is missing", async () => {

    await writeStations(deps.paths.userStationsFile, [{ country: "USA", name: "Alpha", stationId: "1" }]);

    expect(await resolveEffectiveStore(deps)).toEqual({ kind: "user", path: deps.paths.userStationsFile, rebuilt: false });
  });

  it("lets user records replace base records with the same stationId", async () => {

    await writeStations(deps.paths.baseStationsFile, [ { country: "USA", name: "Alpha", stationId: "1" }, { country: "USA", name: "Bravo", stationId: "2" } ]);
    await writeStations(deps.paths.userStationsFile, [{ country: "USA", name: "Alpha HD", source: "user", stationId: "1" }]);

    const store = await resolveEffectiveStore(deps);

    expect(store).toEqual({ kind: "combined", path: deps.paths.combinedStationsFile, rebuilt: true });
    expect(await readStations(store.path)).toEqual([

      { country: "USA", name: "Alpha HD", source: "user", stationId: "1" },
      { country: "USA", name: "Bravo", stationId: "2" }
    ]);
  });

  it("gives every concurrent search the combined view while one rebuild runs", async () => {

    const base = Array.from({ length: 2000 }, (_, index) => ({ country: "USA", name: "Station " + String(index + 1), stationId: String(index + 1) }));

    await writeStations(deps.paths.baseStationsFile, base);
    await writeStations(deps.paths.userStationsFile, [{ country: "USA", name: "Station One HD", stationId: "1" }]);

    const stores = await Promise.all([ resolveEffectiveStore(deps), resolveEffectiveStore(deps), resolveEffectiveStore(deps), resolveEffectiveStore(deps) ]);

    expect(stores.map((store) => store.kind)).toEqual([ "combined", "combined", "combined", "combined" ]);

    const combined = await readStations(deps.paths.combinedStationsFile);

    expect(combined).toHaveLength(2000);
    expect(combined.find((record) => record.stationId === "1")?.name).toBe("Station One HD");
    expect((await fsPromises.readdir(dataDir)).filter((name) => name.endsWith(".tmp"))).toEqual([]);
  });

  it("reuses a fresh combined view", async () => {

    await writeStations(deps.paths.baseStationsFile, [{ country: "USA", name: "Alpha", stationId: "1" }]);
    await writeStations(deps.paths.userStationsFile, [{ country: "USA", name: "Bravo", stationId: "2" }]);

    expect((await resolveEffectiveStore(deps)).rebuilt).toBe(true);
    expect((await resolveEffectiveStore(deps)).rebuilt).toBe(false);
  });

  it("rebuilds after the user store changes", async () => {

    await writeStations(deps.paths.baseStationsFile, [{ country: "USA", name: "Alpha", stationId: "1" }]);
    await writeStations(deps.paths.userStationsFile, [{ country: "USA", name: "Bravo", stationId: "2" }]);
    await touch(deps.paths.baseStationsFile, 0);
    await touch(deps.paths.userStationsFile, 0);
    await resolveEffectiveStore(deps);
    await touch(deps.paths.combinedStationsFile, 100);

    await writeStations(deps.paths.userStationsFile, [ { country: "USA", name: "Bravo", stationId: "2" }, { country: "USA", name: "Charlie", stationId: "3" } ]);
    await touch(deps.paths.userStationsFile, 200);

    expect(await isFresh(deps)).toBe(false);

    const store = await resolveEffectiveStore(deps);

    expect(store.rebuilt).toBe(true);
    expect((await readStations(store.path)).map((record) => record.stationId)).toEqual([ "1", "2", "3" ]);
  });

  it("trusts the freshness token when the combined view's mtime was disturbed", async () => {

    await writeStations(deps.paths.baseStationsFile, [{ country: "USA", name: "Alpha", stationId: "1" }]);
    await writeStations(deps.paths.userStationsFile, [{ country: "USA", name: "Bravo", stationId: "2" }]);
    await touch(deps.paths.baseStationsFile, 100);
    await touch(deps.paths.userStationsFile, 100);
    await resolveEffectiveStore(deps);
    await touch(deps.paths.combinedStationsFile, 0);

    expect(await isFresh(deps)).toBe(true);

    await deps.cacheState.save({ baseTimestamp: 1, combinedTimestamp: 1, userTimestamp: 1 });

    expect(await isFresh(deps)).toBe(false);
  });

  it("falls back to the base store when the combined view cannot be built", async () => {

    await fsPromises.writeFile(deps.paths.baseStationsFile, "{ \"this is\": \"not a station list\" }");
    await writeStations(deps.paths.userStationsFile, [{ country: "USA", name: "Bravo", stationId: "2" }]);

    expect(await resolveEffectiveStore(deps)).toEqual({ kind: "base", path: deps.paths.baseStationsFile, rebuilt: false });
  });

  it("removes the combined view when a rebuild has nothing to combine", async () => {

    await writeStations(deps.paths.baseStationsFile, [{ country: "USA", name: "Alpha", stationId: "1" }]);
    await writeStations(deps.paths.combinedStationsFile, [{ country: "USA", name: "Alpha", stationId: "1" }]);
    await deps.cacheState.save({ baseTimestamp: 5, combinedTimestamp: 5, userTimestamp: 5 });

    expect(await rebuildCombinedView(deps)).toEqual({ kind: "base", path: deps.paths.baseStationsFile, rebuilt: false });
    expect(fs.existsSync(deps.paths.combinedStationsFile)).toBe(false);
    expect(deps.cacheState.load()).toEqual({ baseTimestamp: 0, combinedTimestamp: 0, userTimestamp: 0 });
  });

  it("rebuilds on request even when the view is fresh", async () => {

    await writeStations(deps.paths.baseStationsFile, [{ country: "USA", name: "Alpha", stationId: "1" }]);
    await writeStations(deps.paths.userStationsFile, [{ country: "USA", name: "Bravo", stationId: "2" }]);
    await resolveEffectiveStore(deps);

    expect(await rebuildCombinedView(deps)).toEqual({ kind: "combined", path: deps.paths.combinedStationsFile, rebuilt: true });
    expect(deps.cacheState.load().combinedTimestamp).toBeGreaterThan(0);
  });

  it("tolerates invalidating a view that does not exist", async () => {

    await invalidateCombinedView(deps);

    expect(deps.cacheState.load().combinedTimestamp).toBe(0);
  });
});
