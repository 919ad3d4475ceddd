/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * manifest.ts: Base store coverage manifest reader for StationBase.
 */
import { LOG, formatError, isMissingFileError, isPlainObject } from "../utils/index.js";
import { marketKey, normalizeCountry } from "../config/markets.js";
import { fileMtime } from "./store.js";
import fs from "node:fs";

const { promises: fsPromises } = fs;

/*
 * COVERAGE MANIFEST
 *
 * The base store ships with a manifest listing every market and lineup that went into it. The caching pipeline consults the manifest before touching the network:
 * a covered market or lineup already has its stations in the base store, so fetching it again would only produce duplicates.
 *
 * The manifest is read-only. A missing or unreadable manifest covers nothing, which makes the pipeline fall back to fetching everything.
 *
 * Accepted shape:
 *
 *   {
 *     "created": "2025-01-01T00:00:00Z",
 *     "markets": [ { "country": "USA", "zip": "10001" } ],
 *     "lineups": [ { "lineup_id": "USA-NY31519-X" } ],
 *     "stats": { "total_stations": 1234 }
 *   }
 *
 * Markets may use "postalCode" instead of "zip", and lineups may use "lineupId" instead of "lineup_id".
 */

/**
 * Manifest contents reported by the status endpoint and CLI.
 */
export interface ManifestSummary {

  countries: string[];
  created?: string;
  lineups: number;
  loaded: boolean;
  markets: number;
  path: string;
  totalStations?: number;
}

export class CoverageManifest {

  private readonly countries: Set<string>;
  private readonly created: string | undefined;
  private readonly file: string;
  private readonly lineups: Set<string>;
  private readonly loaded: boolean;
  private readonly markets: Set<string>;
  private readonly totalStations: number | undefined;

  private constructor(file: string, loaded: boolean, markets: Set<string>, lineups: Set<string>, countries: Set<string>, created?: string,
    totalStations?: number) {

    this.countries = countries;
    this.created = created;
    this.file = file;
    this.lineups = lineups;
    this.loaded = loaded;
    this.markets = markets;
    this.totalStations = totalStations;
  }

  /**
   * Returns a manifest that covers nothing.
   * @param file - The path the manifest would have been read from.
   * @returns The empty manifest.
   */
  public static empty(file = ""): CoverageManifest {

    return new CoverageManifest(file, false, new Set(), new Set(), new Set());
  }

  /**
   * Builds a manifest from already parsed JSON. Malformed entries are skipped.
   * @param raw - The parsed manifest.
   * @param file - The path the manifest was read from.
   * @returns The manifest.
   */
  public static fromJson(raw: unknown, file = ""): CoverageManifest {

    if(!isPlainObject(raw)) {

      LOG.warn("Coverage manifest %s is not a JSON object. Ignoring it.", file);

      return CoverageManifest.empty(file);
    }

    const markets = new Set<string>();
    const countries = new Set<string>();
    const lineups = new Set<string>();

    if(Array.isArray(raw.markets)) {

      for(const entry of raw.markets) {

        if(!isPlainObject(entry)) {

          continue;
        }

        const country = entry.country;
        const postalCode = entry.postalCode ?? entry.zip;

        if((typeof country !== "string") || ((typeof postalCode !== "string") && (typeof postalCode !== "number"))) {

          continue;
        }

        markets.add(marketKey(country, String(postalCode)));
        countries.add(normalizeCountry(country));
      }
    }

    if(Array.isArray(raw.lineups)) {

      for(const entry of raw.lineups) {

        // Plain string entries are accepted as well.
        const lineupId = isPlainObject(entry) ? (entry.lineup_id ?? entry.lineupId) : entry;

        if((typeof lineupId === "string") && (lineupId.trim().length > 0)) {

          lineups.add(lineupId.trim());
        }
      }
    }

    const created = (typeof raw.created === "string") ? raw.created : undefined;
    const stats = raw.stats;
    const totalStations = (isPlainObject(stats) && (typeof stats.total_stations === "number")) ? stats.total_stations : undefined;

    return new CoverageManifest(file, true, markets, lineups, countries, created, totalStations);
  }

  /**
   * Loads the manifest from disk. A missing file yields an empty manifest silently. An unreadable or malformed file yields an empty manifest with a warning.
   * @param file - The manifest path.
   * @returns The manifest.
   */
  public static async load(file: string): Promise<CoverageManifest> {

    let content: string;

    try {

      content = await fsPromises.readFile(file, "utf-8");
    } catch(error) {

      if(!isMissingFileError(error)) {

        LOG.warn("Unable to read coverage manifest %s: %s.", file, formatError(error));
      }

      return CoverageManifest.empty(file);
    }

    let parsed: unknown;

    try {

      parsed = JSON.parse(content);
    } catch(error) {

      LOG.warn("Coverage manifest %s is not valid JSON: %s. Ignoring it.", file, formatError(error));

      return CoverageManifest.empty(file);
    }

    const manifest = CoverageManifest.fromJson(parsed, file);

    LOG.debug("cache:pipeline", "Loaded coverage manifest %s: %s markets, %s lineups.", file, manifest.markets.size, manifest.lineups.size);

    return manifest;
  }

  /**
   * Checks whether a market's stations are already in the base store.
   * @param country - The country code. Normalized before comparison.
   * @param postalCode - The postal code. Normalized before comparison.
   * @returns True if the manifest lists the market.
   */
  public isMarketCovered(country: string, postalCode: string): boolean {

    return this.markets.has(marketKey(country, postalCode));
  }

  /**
   * Checks whether a lineup's stations are already in the base store.
   * @param lineupId - The lineup identifier.
   * @returns True if the manifest lists the lineup.
   */
  public isLineupCovered(lineupId: string): boolean {

    return this.lineups.has(lineupId.trim());
  }

  /**
   * Returns the countries with at least one covered market.
   * @returns A copy of the country set.
   */
  public coveredCountries(): Set<string> {

    return new Set(this.countries);
  }

  /**
   * Summarizes the manifest.
   * @returns The summary.
   */
  public summary(): ManifestSummary {

    const summary: ManifestSummary = {

      countries: [...this.countries].sort(),
      lineups: this.lineups.size,
      loaded: this.loaded,
      markets: this.markets.size,
      path: this.file
    };

    if(this.created !== undefined) {

      summary.created = this.created;
    }

    if(this.totalStations !== undefined) {

      summary.totalStations = this.totalStations;
    }

    return summary;
  }

  /**
   * Checks whether the manifest predates the base store it describes. A stale manifest may under-report coverage. Callers warn about it and carry on.
   * @param baseStorePath - The base store path.
   * @returns True if both files exist and the manifest is older than the base store.
   */
  public async isStale(baseStorePath: string): Promise<boolean> {

    if(!this.loaded || !this.file) {

      return false;
    }

    const [ manifestTime, baseTime ] = await Promise.all([ fileMtime(this.file), fileMtime(baseStorePath) ]);

    return (manifestTime > 0) && (baseTime > 0) && (manifestTime < baseTime);
  }
}
