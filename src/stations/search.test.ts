/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * search.test.ts: Tests for station search and filtering.
 */
import type { SearchConfig, StationRecord } from "../types/index.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { availableCountries, clearSearchCache, countryColumn, filterStations, findStationById, normalizePage, search, searchRecords, toFullRow,
  toTsvRow } from "./search.js";
import type { ConsolidationDeps } from "./consolidate.js";
import { buildStationPaths } from "../config/paths.js";
import { createMemoryCacheStateStore } from "../config/index.js";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { writeStations } from "./store.js";

const { promises: fsPromises } = fs;

const RECORDS: StationRecord[] = [

  { availableIn: [ "CAN", "USA" ], callSign: "ALPH", country: "USA", name: "Alpha One", stationId: "1", videoQuality: "HDTV" },
  { callSign: "XALPHA", country: "CAN", name: "Bravo", stationId: "2", videoQuality: "SDTV" },
  { country: "GBR", name: "alphabet kids", stationId: "3" },
  { callSign: "WCHR", country: "USA", name: "Charlie", stationId: "4", videoQuality: "UHDTV" }
];

function makeConfig(overrides: Partial<SearchConfig> = {}): SearchConfig {

  return { enabledCountries: [], enabledResolutions: [ "SDTV", "HDTV", "UHDTV" ], filterByCountry: false, filterByResolution: false, resultsPerPage: 10,
    ...overrides };
}

describe("filterStations", () => {

  it("matches the term against names and call signs without regard to case", () => {

    expect(filterStations(RECORDS, { term: "ALPHA" }, makeConfig()).map((record) => record.stationId)).toEqual([ "1", "2", "3" ]);
    expect(filterStations(RECORDS, { term: "  wchr " }, makeConfig()).map((record) => record.stationId)).toEqual(["4"]);
  });

  it("applies the configured resolution filter and drops records without a quality", () => {

    const config = makeConfig({ enabledResolutions: [ "HDTV", "UHDTV" ], filterByResolution: true });

    expect(filterStations(RECORDS, { term: "a" }, config).map((record) => record.stationId)).toEqual([ "1", "4" ]);
  });

  it("lets a query resolution replace the configured filter", () => {

    const config = makeConfig({ enabledResolutions: ["HDTV"], filterByResolution: true });

    expect(filterStations(RECORDS, { resolution: "sdtv", term: "alpha" }, config).map((record) => record.stationId)).toEqual(["2"]);
  });

  it("matches countries through availableIn", () => {

    const config = makeConfig({ enabledCountries: ["CAN"], filterByCountry: true });

    expect(filterStations(RECORDS, { term: "alpha" }, config).map((record) => record.stationId)).toEqual([ "1", "2" ]);
    expect(filterStations(RECORDS, { country: "gbr", term: "alpha" }, config).map((record) => record.stationId)).toEqual(["3"]);
  });
});

describe("searchRecords", () => {

  it("counts matches and pages through the same matches", () => {

    const config = makeConfig({ resultsPerPage: 2 });

    expect(searchRecords(RECORDS, { mode: "count", page: 1, term: "alpha" }, config)).toEqual({ mode: "count", total: 3 });

    const first = searchRecords(RECORDS, { mode: "tsv", page: 1, term: "alpha" }, config);
    const second = searchRecords(RECORDS, { mode: "tsv", page: 2, term: "alpha" }, config);

    expect(first).toEqual({ mode: "tsv", page: 1, rows: [ [ "1", "Alpha One", "ALPH", "CAN,USA" ], [ "2", "Bravo", "XALPHA", "CAN" ] ], total: 3 });
    expect(second).toEqual({ mode: "tsv", page: 2, rows: [[ "3", "alphabet kids", "", "GBR" ]], total: 3 });
  });

  it("keeps page sizes and the count in agreement", () => {

    for(const resultsPerPage of [ 1, 2, 3, 10 ]) {

      const config = makeConfig({ resultsPerPage });
      let rows = 0;

      for(let page = 1; page <= 4; page++) {

        const results = searchRecords(RECORDS, { mode: "full", page, term: "a" }, config);

        rows += (results.mode === "count") ? 0 : results.rows.length;
      }

      expect(rows).toBe(4);
    }
  });

  it("treats pages below one as the first page", () => {

    expect(normalizePage(0)).toBe(1);
    expect(normalizePage(-3)).toBe(1);
    expect(normalizePage(Number.NaN)).toBe(1);
    expect(normalizePage(2.7)).toBe(2);
  });
});

describe("result rows", () => {

  it("formats tsv and full rows", () => {

    expect(toTsvRow({ country: "USA", stationId: "9" })).toEqual([ "9", "", "", "USA" ]);
    expect(toFullRow({ callSign: "KXYZ", country: "USA", name: "KXYZ 9", stationId: "9" })).toEqual([ "KXYZ 9", "KXYZ", "Unknown", "9", "USA" ]);
    expect(countryColumn({ availableIn: ["USA"], country: "USA", stationId: "9" })).toBe("USA");
  });
});

describe("search", () => {

  let dataDir: string;
  let deps: ConsolidationDeps;

  beforeEach(async () => {

    clearSearchCache();
    dataDir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "stationbase-search-"));
    deps = { cacheState: createMemoryCacheStateStore(), paths: buildStationPaths(dataDir) };
  });

  afterEach(async () => {

    await fsPromises.rm(dataDir, { force: true, recursive: true });
  });

  it("searches the effective store", async () => {

    await writeStations(deps.paths.baseStationsFile, RECORDS);
    await writeStations(deps.paths.userStationsFile, [{ country: "USA", name: "Alpha One HD", stationId: "1" }]);

    const results = await search({ mode: "full", page: 1, term: "alpha one" }, makeConfig(), deps);

    expect(results).toEqual({ mode: "full", page: 1, rows: [[ "Alpha One HD", "", "Unknown", "1", "USA" ]], total: 1 });
    expect((await findStationById("4", deps))?.name).toBe("Charlie");
    expect(await findStationById("404", deps)).toBeUndefined();
    expect(await availableCountries(deps)).toEqual([ "CAN", "GBR", "USA" ]);
  });

  it("sees store changes once the file changes", async () => {

    await writeStations(deps.paths.baseStationsFile, RECORDS);

    expect(await search({ mode: "count", page: 1, term: "delta" }, makeConfig(), deps)).toEqual({ mode: "count", total: 0 });

    await writeStations(deps.paths.baseStationsFile, [ ...RECORDS, { country: "USA", name: "Delta", stationId: "5" } ]);
    await fsPromises.utimes(deps.paths.baseStationsFile, new Date(1_800_000_000_000), new Date(1_800_000_000_000));

    expect(await search({ mode: "count", page: 1, term: "delta" }, makeConfig(), deps)).toEqual({ mode: "count", total: 1 });
  });
});
