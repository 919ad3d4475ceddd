/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * client.ts: Channels DVR guide-data client for StationBase.
 */
import type { GuideConfig, LineupSummary, StationRecord } from "../types/index.js";
import { LOG, formatError, getUserAgent, isPlainObject, startTimer } from "../utils/index.js";
import { normalizeStations } from "../stations/store.js";

/*
 * GUIDE DATA SOURCE
 *
 * Station data comes from a Channels DVR server, which passes the Gracenote lineup and station endpoints through:
 *
 * - GET /tms/lineups/{country}/{postalCode}: the lineups available in a market.
 * - GET /dvr/guide/stations/{lineupId}: the stations carried by a lineup.
 * - GET /tms/stations/{callSign}: stations matching a call sign, used to fill in missing names.
 *
 * The caching pipeline talks to a GuideDataSource rather than to HTTP directly. Every method rejects with GuideRequestError on a transport failure, a timeout, a
 * non-2xx status, or a body of the wrong shape; the pipeline logs the failure and treats the unit as having zero results.
 */

/**
 * The guide-data operations the caching pipeline needs.
 */
export interface GuideDataSource {

  /**
   * Lists the lineups in a market.
   * @param country - The three-letter country code.
   * @param postalCode - The normalized postal code.
   * @returns The lineups in response order.
   */
  fetchLineups(country: string, postalCode: string): Promise<LineupSummary[]>;

  /**
   * Lists the stations in a lineup.
   * @param lineupId - The lineup identifier.
   * @returns The normalized stations.
   */
  fetchStations(lineupId: string): Promise<StationRecord[]>;

  /**
   * Looks up stations by call sign. Sources that cannot look up call signs leave this out, which disables enrichment.
   * @param callSign - The call sign.
   * @returns The normalized matches.
   */
  lookupCallSign?(callSign: string): Promise<StationRecord[]>;
}

/**
 * Raised when a guide request fails or returns an unusable body.
 */
export class GuideRequestError extends Error {

  public readonly path: string;
  public readonly status: number | undefined;

  constructor(path: string, message: string, options: { cause?: unknown; status?: number } = {}) {

    super(message, { cause: options.cause });

    this.name = "GuideRequestError";

    this.path = path;
    this.status = options.status;
  }
}

/**
 * Parses a lineup list body. Entries without a lineupId are dropped.
 * @param body - The parsed response body.
 * @returns The lineups, or null when the body is not an array.
 */
export function parseLineups(body: unknown): LineupSummary[] | null {

  if(!Array.isArray(body)) {

    return null;
  }

  const lineups: LineupSummary[] = [];

  for(const entry of body) {

    if(!isPlainObject(entry) || (typeof entry.lineupId !== "string") || (entry.lineupId.trim().length === 0)) {

      continue;
    }

    const lineup: LineupSummary = { lineupId: entry.lineupId.trim() };

    if((typeof entry.name === "string") && entry.name) {

      lineup.name = entry.name;
    }

    if((typeof entry.location === "string") && entry.location) {

      lineup.location = entry.location;
    }

    if((typeof entry.type === "string") && entry.type) {

      lineup.type = entry.type;
    }

    lineups.push(lineup);
  }

  return lineups;
}

/**
 * Guide-data source backed by a Channels DVR server's HTTP API.
 */
export class HttpGuideClient implements GuideDataSource {

  private readonly config: Pick<GuideConfig, "lineupTimeout" | "lookupTimeout" | "serverUrl" | "stationTimeout">;

  /**
   * @param config - The guide settings. Only the server URL and the timeouts are used.
   */
  constructor(config: Pick<GuideConfig, "lineupTimeout" | "lookupTimeout" | "serverUrl" | "stationTimeout">) {

    this.config = { ...config, serverUrl: config.serverUrl.replace(/\/+$/, "") };
  }

  // Requests a path and returns the parsed JSON body.
  private async getJson(path: string, timeout: number): Promise<unknown> {

    const url = this.config.serverUrl + path;
    const elapsed = startTimer();
    let response: Response;

    try {

      response = await fetch(url, {

        headers: { "Accept": "application/json", "User-Agent": getUserAgent() },
        signal: AbortSignal.timeout(timeout)
      });
    } catch(error) {

      const timedOut = (error instanceof Error) && ((error.name === "TimeoutError") || (error.name === "AbortError"));

      throw new GuideRequestError(path, timedOut ? "Request to " + path + " timed out after " + String(timeout) + "ms." :
        "Request to " + path + " failed: " + formatError(error) + ".", { cause: error });
    }

    LOG.debug("guide:http", "GET %s responded %s in %sms.", path, response.status, elapsed());

    if(!response.ok) {

      throw new GuideRequestError(path, "Request to " + path + " returned HTTP " + String(response.status) + ".", { status: response.status });
    }

    try {

      const body: unknown = await response.json();

      return body;
    } catch(error) {

      throw new GuideRequestError(path, "Response from " + path + " is not valid JSON.", { cause: error, status: response.status });
    }
  }

  public async fetchLineups(country: string, postalCode: string): Promise<LineupSummary[]> {

    const path = "/tms/lineups/" + encodeURIComponent(country) + "/" + encodeURIComponent(postalCode);
    const lineups = parseLineups(await this.getJson(path, this.config.lineupTimeout));

    if(!lineups) {

      throw new GuideRequestError(path, "Response from " + path + " is not a lineup list.");
    }

    return lineups;
  }

  public async fetchStations(lineupId: string): Promise<StationRecord[]> {

    const path = "/dvr/guide/stations/" + encodeURIComponent(lineupId);
    const body = await this.getJson(path, this.config.stationTimeout);

    if(!Array.isArray(body)) {

      throw new GuideRequestError(path, "Response from " + path + " is not a station list.");
    }

    return normalizeStations(body);
  }

  public async lookupCallSign(callSign: string): Promise<StationRecord[]> {

    const path = "/tms/stations/" + encodeURIComponent(callSign);
    const body = await this.getJson(path, this.config.lookupTimeout);

    if(!Array.isArray(body)) {

      throw new GuideRequestError(path, "Response from " + path + " is not a station list.");
    }

    return normalizeStations(body);
  }
}
