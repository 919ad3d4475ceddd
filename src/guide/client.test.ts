/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * client.test.ts: Tests for the guide-data HTTP client.
 */
import { GuideRequestError, HttpGuideClient, parseLineups } from "./client.js";
import { afterEach, describe, expect, it, vi } from "vitest";
import { inferCountryFromLineupId } from "./country.js";

const CONFIG = { lineupTimeout: 10000, lookupTimeout: 5000, serverUrl: "http://dvr.test:8089//", stationTimeout: 8000 };

function jsonResponse(body: unknown, status = 200): Response {

  return new Response(JSON.stringify(body), { headers: { "Content-Type": "application/json" }, status });
}

describe("HttpGuideClient", () => {

  afterEach(() => {

    vi.unstubAllGlobals();
  });

  it("requests a market's lineups and parses them", async () => {

    const fetchMock = vi.fn().mockResolvedValue(jsonResponse([ { lineupId: " USA-NY31519-X ", name: "Cable", type: "CAB" }, { name: "No ID" },
      { lineupId: "USA-OTA10001", location: "" } ]));

    vi.stubGlobal("fetch", fetchMock);

    const lineups = await new HttpGuideClient(CONFIG).fetchLineups("GBR", "SW1A 1AA");

    expect(lineups).toEqual([ { lineupId: "USA-NY31519-X", name: "Cable", type: "CAB" }, { lineupId: "USA-OTA10001" } ]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://dvr.test:8089/tms/lineups/GBR/SW1A%201AA");
  });

  it("normalizes a lineup's stations", async () => {

    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse([ { callSign: "WABC", stationId: 12345, videoQuality: { videoType: "HDTV" } }, { name: "x" } ])));

    expect(await new HttpGuideClient(CONFIG).fetchStations("USA-NY31519-X")).toEqual([{ callSign: "WABC", country: "UNK", stationId: "12345", videoQuality: "HDTV" }]);
  });

  it("reports HTTP errors with their status", async () => {

    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ error: "not found" }, 404)));

    const request = new HttpGuideClient(CONFIG).fetchStations("USA-MISSING");

    await expect(request).rejects.toBeInstanceOf(GuideRequestError);
    await expect(request).rejects.toMatchObject({ message: "Request to /dvr/guide/stations/USA-MISSING returned HTTP 404.", status: 404 });
  });

  it("reports timeouts", async () => {

    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" })));

    await expect(new HttpGuideClient(CONFIG).fetchLineups("USA", "10001")).rejects.toThrow("Request to /tms/lineups/USA/10001 timed out after 10000ms.");
  });

  it("reports transport failures", async () => {

    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

    await expect(new HttpGuideClient(CONFIG).lookupCallSign("WABC")).rejects.toThrow("Request to /tms/stations/WABC failed: fetch failed.");
  });

  it("rejects bodies that are not JSON or not lists", async () => {

    vi.stubGlobal("fetch", vi.fn().mockResolvedValueOnce(new Response("<html></html>", { status: 200 })).mockResolvedValueOnce(jsonResponse({ lineups: [] })));

    const client = new HttpGuideClient(CONFIG);

    await expect(client.fetchLineups("USA", "10001")).rejects.toThrow("Response from /tms/lineups/USA/10001 is not valid JSON.");
    await expect(client.fetchLineups("USA", "10001")).rejects.toThrow("Response from /tms/lineups/USA/10001 is not a lineup list.");
  });
});

describe("parseLineups", () => {

  it("returns null for anything but an array", () => {

    expect(parseLineups({ lineupId: "USA-1" })).toBeNull();
    expect(parseLineups([])).toEqual([]);
  });
});

describe("inferCountryFromLineupId", () => {

  it("reads the three-letter prefix", () => {

    expect(inferCountryFromLineupId("USA-NY31519-X")).toBe("USA");
    expect(inferCountryFromLineupId(" gbr-1000193-default")).toBe("GBR");
    expect(inferCountryFromLineupId("US-1")).toBeUndefined();
    expect(inferCountryFromLineupId("USAX")).toBeUndefined();
  });
});
