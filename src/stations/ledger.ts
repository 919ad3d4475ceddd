/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ledger.ts: Durable processing ledger for the caching pipeline.
 */
import { LOG, LedgerWriteError, formatError, isMissingFileError, isPlainObject } from "../utils/index.js";
import { marketKey, normalizeMarket, uniqueMarkets } from "../config/markets.js";
import type { Market } from "../types/index.js";
import type { StationPaths } from "../config/paths.js";
import fs from "node:fs";
import { writeFileAtomic } from "./store.js";

const { promises: fsPromises } = fs;

/*
 * PROCESSING LEDGER
 *
 * The ledger remembers which markets and lineups the caching pipeline has already handled, which makes a run resumable after an interruption and makes a repeated
 * run a no-op. It is made of three files in the data directory:
 *
 * - cached_markets.jsonl: one { country, postalCode, timestamp, lineupsFound } object per line.
 * - cached_lineups.jsonl: one { lineupId, timestamp, stationsFound } object per line.
 * - lineup_to_market.json: { [lineupId]: { country, postalCode } }, the market a lineup was first discovered in.
 *
 * Entries are held in Maps keyed by market key or lineup ID, so recording an existing key replaces its entry. Every record call rewrites the affected files in full
 * through a temp file and rename before it returns. Duplicate lines in a file written by an older version collapse on load, last line winning.
 */

/**
 * A processed market.
 */
export interface MarketLedgerEntry extends Market {

  lineupsFound: number;
  timestamp: string;
}

/**
 * A processed lineup.
 */
export interface LineupLedgerEntry {

  lineupId: string;
  stationsFound: number;
  timestamp: string;
}

/**
 * Ledger contents reported by the status endpoint and CLI.
 */
export interface LedgerSummary {

  lastUpdated?: string;
  lineups: number;
  markets: number;
  marketsByCountry: Record<string, number>;
  stationsFound: number;
}

/**
 * The files the ledger persists to.
 */
export type LedgerPaths = Pick<StationPaths, "lineupMapFile" | "lineupsLedgerFile" | "marketsLedgerFile">;

function countField(value: unknown): number {

  return ((typeof value === "number") && Number.isFinite(value) && (value >= 0)) ? Math.floor(value) : 0;
}

function timestampField(value: unknown): string {

  return (typeof value === "string") ? value : new Date(0).toISOString();
}

// Reads a newline-delimited JSON file. Lines that do not parse to an object are skipped with a warning.
async function readJsonLines(file: string): Promise<Record<string, unknown>[]> {

  let content: string;

  try {

    content = await fsPromises.readFile(file, "utf-8");
  } catch(error) {

    if(isMissingFileError(error)) {

      return [];
    }

    throw error;
  }

  const entries: Record<string, unknown>[] = [];
  let skipped = 0;

  for(const line of content.split("\n")) {

    if(line.trim().length === 0) {

      continue;
    }

    try {

      const parsed: unknown = JSON.parse(line);

      if(isPlainObject(parsed)) {

        entries.push(parsed);

        continue;
      }
    } catch(error) {

      LOG.debug("cache:ledger", "Unparseable line in %s: %s.", file, formatError(error));
    }

    skipped++;
  }

  if(skipped > 0) {

    LOG.warn("Skipped %s malformed %s in %s.", skipped, (skipped === 1) ? "line" : "lines", file);
  }

  return entries;
}

export class ProcessingLedger {

  private readonly lineupMarkets: Map<string, Market>;
  private readonly lineups: Map<string, LineupLedgerEntry>;
  private readonly markets: Map<string, MarketLedgerEntry>;
  private readonly paths: LedgerPaths;

  private constructor(paths: LedgerPaths) {

    this.lineupMarkets = new Map();
    this.lineups = new Map();
    this.markets = new Map();
    this.paths = paths;
  }

  /**
   * Loads the ledger from disk. Missing files start an empty ledger; nothing is written until the first record call.
   * @param paths - The ledger files.
   * @returns The loaded ledger.
   */
  public static async load(paths: LedgerPaths): Promise<ProcessingLedger> {

    const ledger = new ProcessingLedger(paths);

    for(const entry of await readJsonLines(paths.marketsLedgerFile)) {

      const country = entry.country;

      // Older ledgers used "zip" for the postal code.
      const postalCode = entry.postalCode ?? entry.zip;

      if((typeof country !== "string") || ((typeof postalCode !== "string") && (typeof postalCode !== "number"))) {

        continue;
      }

      const market = normalizeMarket(country, String(postalCode));

      ledger.markets.set(marketKey(market.country, market.postalCode), {

        ...market,
        lineupsFound: countField(entry.lineupsFound ?? entry.lineups_found),
        timestamp: timestampField(entry.timestamp)
      });
    }

    for(const entry of await readJsonLines(paths.lineupsLedgerFile)) {

      const lineupId = entry.lineupId ?? entry.lineup_id;

      if((typeof lineupId !== "string") || (lineupId.length === 0)) {

        continue;
      }

      ledger.lineups.set(lineupId, { lineupId, stationsFound: countField(entry.stationsFound ?? entry.stations_found), timestamp: timestampField(entry.timestamp) });
    }

    await ledger.loadLineupMap();

    LOG.debug("cache:ledger", "Loaded ledger: %s markets, %s lineups.", ledger.markets.size, ledger.lineups.size);

    return ledger;
  }

  private async loadLineupMap(): Promise<void> {

    let parsed: unknown;

    try {

      parsed = JSON.parse(await fsPromises.readFile(this.paths.lineupMapFile, "utf-8"));
    } catch(error) {

      if(!isMissingFileError(error)) {

        LOG.warn("Unable to read lineup map %s: %s. Starting with an empty map.", this.paths.lineupMapFile, formatError(error));
      }

      return;
    }

    if(!isPlainObject(parsed)) {

      LOG.warn("Lineup map %s is not a JSON object. Starting with an empty map.", this.paths.lineupMapFile);

      return;
    }

    for(const [ lineupId, value ] of Object.entries(parsed)) {

      if(!isPlainObject(value)) {

        continue;
      }

      const postalCode = value.postalCode ?? value.zip;

      if((typeof value.country === "string") && ((typeof postalCode === "string") || (typeof postalCode === "number"))) {

        this.lineupMarkets.set(lineupId, normalizeMarket(value.country, String(postalCode)));
      }
    }
  }

  /*
   * PERSISTENCE
   */

  private async persist(file: string, content: string): Promise<void> {

    try {

      await writeFileAtomic(file, content);
    } catch(error) {

      throw new LedgerWriteError(file, error);
    }
  }

  private async persistMarkets(): Promise<void> {

    const lines = [...this.markets.values()].map((entry) => JSON.stringify(entry) + "\n");

    await this.persist(this.paths.marketsLedgerFile, lines.join(""));
  }

  private async persistLineups(): Promise<void> {

    const lines = [...this.lineups.values()].map((entry) => JSON.stringify(entry) + "\n");

    await this.persist(this.paths.lineupsLedgerFile, lines.join(""));
  }

  private async persistLineupMap(): Promise<void> {

    await this.persist(this.paths.lineupMapFile, JSON.stringify(Object.fromEntries(this.lineupMarkets), null, 2) + "\n");
  }

  /*
   * RECORDING
   */

  /**
   * Records a market as processed, replacing any earlier entry for it. The market log is durable when this resolves.
   * @param country - The country code.
   * @param postalCode - The postal code.
   * @param lineupsFound - Number of lineups the market listed.
   * @throws LedgerWriteError when the market log cannot be written. The in-memory entry is rolled back.
   */
  public async recordMarket(country: string, postalCode: string, lineupsFound: number): Promise<void> {

    const market = normalizeMarket(country, postalCode);
    const key = marketKey(market.country, market.postalCode);
    const previous = this.markets.get(key);

    this.markets.set(key, { ...market, lineupsFound: countField(lineupsFound), timestamp: new Date().toISOString() });

    try {

      await this.persistMarkets();
    } catch(error) {

      if(previous) {

        this.markets.set(key, previous);
      } else {

        this.markets.delete(key);
      }

      throw error;
    }

    LOG.debug("cache:ledger", "Recorded market %s with %s lineups.", key, lineupsFound);
  }

  /**
   * Records a lineup as processed and remembers the market it came from. The lineup log and the lineup map are durable when this resolves.
   * @param lineupId - The lineup identifier.
   * @param country - The originating market's country.
   * @param postalCode - The originating market's postal code.
   * @param stationsFound - Number of stations the lineup returned.
   * @throws LedgerWriteError when either file cannot be written. The in-memory entries are rolled back.
   */
  public async recordLineup(lineupId: string, country: string, postalCode: string, stationsFound: number): Promise<void> {

    const previousLineup = this.lineups.get(lineupId);
    const previousMarket = this.lineupMarkets.get(lineupId);

    this.lineups.set(lineupId, { lineupId, stationsFound: countField(stationsFound), timestamp: new Date().toISOString() });
    this.lineupMarkets.set(lineupId, normalizeMarket(country, postalCode));

    // The map goes first. A lineup in the lineup log then always has its origin market on disk, and a failed map write leaves the log untouched.
    try {

      await this.persistLineupMap();
      await this.persistLineups();
    } catch(error) {

      if(previousLineup) {

        this.lineups.set(lineupId, previousLineup);
      } else {

        this.lineups.delete(lineupId);
      }

      if(previousMarket) {

        this.lineupMarkets.set(lineupId, previousMarket);
      } else {

        this.lineupMarkets.delete(lineupId);
      }

      throw error;
    }

    LOG.debug("cache:ledger", "Recorded lineup %s with %s stations.", lineupId, stationsFound);
  }

  /*
   * QUERIES
   */

  /**
   * Checks whether a market has been processed.
   * @param country - The country code.
   * @param postalCode - The postal code.
   * @returns True if the market log has an entry for the market.
   */
  public isMarketProcessed(country: string, postalCode: string): boolean {

    return this.markets.has(marketKey(country, postalCode));
  }

  /**
   * Checks whether a lineup has been processed.
   * @param lineupId - The lineup identifier.
   * @returns True if the lineup log has an entry for the lineup.
   */
  public isLineupProcessed(lineupId: string): boolean {

    return this.lineups.has(lineupId);
  }

  /**
   * Returns the configured markets that have not been processed yet.
   * @param configured - The configured markets. Normalized and de-duplicated first.
   * @returns The pending markets in configured order.
   */
  public unprocessedMarkets(configured: readonly Market[]): Market[] {

    return uniqueMarkets(configured).filter((market) => !this.isMarketProcessed(market.country, market.postalCode));
  }

  /**
   * Returns the market a lineup was first recorded under.
   * @param lineupId - The lineup identifier.
   * @returns The market, or undefined when the lineup is not in the map.
   */
  public marketForLineup(lineupId: string): Market | undefined {

    const market = this.lineupMarkets.get(lineupId);

    return market ? { ...market } : undefined;
  }

  /**
   * Returns the market log entries.
   * @returns Copies of the entries in recording order.
   */
  public marketEntries(): MarketLedgerEntry[] {

    return [...this.markets.values()].map((entry) => ({ ...entry }));
  }

  /**
   * Returns the lineup log entries.
   * @returns Copies of the entries in recording order.
   */
  public lineupEntries(): LineupLedgerEntry[] {

    return [...this.lineups.values()].map((entry) => ({ ...entry }));
  }

  /**
   * Summarizes the ledger.
   * @returns The summary.
   */
  public summary(): LedgerSummary {

    const marketsByCountry: Record<string, number> = {};
    let lastUpdated: string | undefined;
    let stationsFound = 0;

    for(const entry of this.markets.values()) {

      marketsByCountry[entry.country] = (marketsByCountry[entry.country] ?? 0) + 1;

      if(!lastUpdated || (entry.timestamp > lastUpdated)) {

        lastUpdated = entry.timestamp;
      }
    }

    for(const entry of this.lineups.values()) {

      stationsFound += entry.stationsFound;

      if(!lastUpdated || (entry.timestamp > lastUpdated)) {

        lastUpdated = entry.timestamp;
      }
    }

    const summary: LedgerSummary = { lineups: this.lineups.size, markets: this.markets.size, marketsByCountry, stationsFound };

    if(lastUpdated) {

      summary.lastUpdated = lastUpdated;
    }

    return summary;
  }

  /*
   * MAINTENANCE
   */

  /**
   * Forgets a processed market so the next run fetches it again. Lineups the market listed stay recorded, since other markets may share them; a forced run
   * refetches them.
   * @param country - The country code.
   * @param postalCode - The postal code.
   * @returns True if the market was in the ledger.
   */
  public async forgetMarket(country: string, postalCode: string): Promise<boolean> {

    const key = marketKey(country, postalCode);
    const previous = this.markets.get(key);

    if(!previous) {

      return false;
    }

    this.markets.delete(key);

    try {

      await this.persistMarkets();
    } catch(error) {

      this.markets.set(key, previous);

      throw error;
    }

    LOG.debug("cache:ledger", "Forgot market %s.", key);

    return true;
  }

  /**
   * Empties the ledger and removes its files.
   */
  public async clear(): Promise<void> {

    this.markets.clear();
    this.lineups.clear();
    this.lineupMarkets.clear();

    for(const file of [ this.paths.marketsLedgerFile, this.paths.lineupsLedgerFile, this.paths.lineupMapFile ]) {

      try {

        await fsPromises.unlink(file);
      } catch(error) {

        if(!isMissingFileError(error)) {

          throw new LedgerWriteError(file, error);
        }
      }
    }

    LOG.debug("cache:ledger", "Cleared the processing ledger.");
  }
}
