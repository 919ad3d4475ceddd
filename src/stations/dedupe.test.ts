/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * dedupe.test.ts: Tests for station de-duplication and user store merging.
 */
import { dedupeStations, mergeIntoUserStore } from "./dedupe.js";
import { describe, expect, it } from "vitest";
import type { StationRecord } from "../types/index.js";

describe("dedupeStations", () => {

  it("keeps the longest name and unions availableIn", () => {

    const records: StationRecord[] = [

      { availableIn: ["USA"], callSign: "CBC", country: "USA", stationId: "500" },
      { availableIn: ["CAN"], callSign: "CBC", country: "CAN", name: "CBC Toronto", stationId: "500" },
      { availableIn: ["USA"], country: "USA", name: "CBC", stationId: "500" }
    ];

    const result = dedupeStations(records);

    expect(result.duplicatesRemoved).toBe(2);
    expect(result.records).toEqual([{ availableIn: [ "CAN", "USA" ], callSign: "CBC", country: "CAN", name: "CBC Toronto", stationId: "500" }]);
  });

  it("keeps the first variant when names tie", () => {

    const result = dedupeStations([ { country: "USA", name: "WXYZ", stationId: "7" }, { country: "CAN", name: "ABCD", stationId: "7" } ]);

    expect(result.records).toEqual([{ availableIn: [ "CAN", "USA" ], country: "USA", name: "WXYZ", stationId: "7" }]);
  });

  it("sorts the unique records by name", () => {

    const result = dedupeStations([ { country: "USA", name: "Zeta", stationId: "1" }, { country: "USA", name: "Alpha", stationId: "2" } ]);

    expect(result.duplicatesRemoved).toBe(0);
    expect(result.records.map((record) => record.name)).toEqual([ "Alpha", "Zeta" ]);
  });
});

describe("mergeIntoUserStore", () => {

  it("lets the incoming record win while keeping the stored trace and countries", () => {

    const existing: StationRecord[] = [

      { availableIn: ["USA"], country: "USA", lineupTracing: [{ country: "USA", lineupId: "USA-OTA10001" }], name: "Old Name", stationId: "1" },
      { country: "USA", name: "Untouched", stationId: "2" }
    ];

    const incoming: StationRecord[] = [

      { availableIn: ["CAN"], country: "CAN", lineupTracing: [{ country: "CAN", lineupId: "CAN-OTAM5V" }], name: "New Name", stationId: "1" },
      { country: "CAN", name: "Added", stationId: "3" }
    ];

    const result = mergeIntoUserStore(existing, incoming);

    expect(result.added).toBe(1);
    expect(result.updated).toBe(1);
    expect(result.records).toEqual([

      { country: "CAN", name: "Added", stationId: "3" },
      { availableIn: [ "CAN", "USA" ], country: "CAN", lineupTracing: [{ country: "USA", lineupId: "USA-OTA10001" }], name: "New Name", stationId: "1" },
      { country: "USA", name: "Untouched", stationId: "2" }
    ]);
  });
});
