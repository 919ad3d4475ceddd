/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * markets.ts: Configured market list management for StationBase.
 */
import { LOG, formatError, isMissingFileError, isPlainObject } from "../utils/index.js";
import type { Market } from "../types/index.js";
import fs from "node:fs";
import path from "node:path";

const { promises: fsPromises } = fs;

/*
 * CONFIGURED MARKETS
 *
 * The markets the caching pipeline walks are stored in markets.json inside the data directory as an array of { country, postalCode } objects. Every market is
 * normalized on the way in and on the way out, so the file, the ledger, and the coverage manifest always agree on the key for a market.
 *
 * Normalization rules:
 *   - country: trimmed and uppercased ("usa " becomes "USA").
 *   - postalCode: every whitespace character removed and uppercased ("sw1a 1aa" becomes "SW1A1AA").
 */

/**
 * Normalizes a country code.
 * @param country - The raw country code.
 * @returns The trimmed, uppercased code.
 */
export function normalizeCountry(country: string): string {

  return country.trim().toUpperCase();
}

/**
 * Normalizes a postal code.
 * @param postalCode - The raw postal code.
 * @returns The postal code without whitespace, uppercased.
 */
export function normalizePostalCode(postalCode: string): string {

  return postalCode.replace(/\s+/g, "").toUpperCase();
}

/**
 * Normalizes both fields of a market.
 * @param country - The raw country code.
 * @param postalCode - The raw postal code.
 * @returns The normalized market.
 */
export function normalizeMarket(country: string, postalCode: string): Market {

  return { country: normalizeCountry(country), postalCode: normalizePostalCode(postalCode) };
}

/**
 * Builds the lookup key for a market. Inputs are normalized first, so callers may pass raw values.
 * @param country - The country code.
 * @param postalCode - The postal code.
 * @returns The key in "COUNTRY,POSTAL" form.
 */
export function marketKey(country: string, postalCode: string): string {

  return normalizeCountry(country) + "," + normalizePostalCode(postalCode);
}

/**
 * Normalizes a market list and collapses duplicates, keeping the first occurrence of each key. Entries with an empty country or postal code after normalization
 * are dropped.
 * @param markets - The raw markets.
 * @returns The normalized, unique markets in their original order.
 */
export function uniqueMarkets(markets: readonly Market[]): Market[] {

  const seen = new Set<string>();
  const result: Market[] = [];

  for(const raw of markets) {

    const market = normalizeMarket(raw.country, raw.postalCode);

    if(!market.country || !market.postalCode) {

      continue;
    }

    const key = marketKey(market.country, market.postalCode);

    if(seen.has(key)) {

      continue;
    }

    seen.add(key);
    result.push(market);
  }

  return result;
}

/**
 * Validates a market before it is added to the configured list. Country codes are three letters, matching the guide service's lineup endpoint.
 * @param country - The raw country code.
 * @param postalCode - The raw postal code.
 * @returns An error message, or null when the market is valid.
 */
export function validateMarket(country: string, postalCode: string): string | null {

  const market = normalizeMarket(country, postalCode);

  if(!/^[A-Z]{3}$/.test(market.country)) {

    return "Country must be a three-letter code (e.g., USA, CAN, GBR), got: " + country;
  }

  if(!/^[A-Z0-9-]{2,10}$/.test(market.postalCode)) {

    return "Postal code must be 2 to 10 letters, digits, or dashes, got: " + postalCode;
  }

  return null;
}

/**
 * Loads the configured markets. A missing file means no markets are configured. Malformed entries are skipped with a warning.
 * @param marketsFile - Path to markets.json.
 * @returns The normalized, unique configured markets.
 */
export async function loadMarkets(marketsFile: string): Promise<Market[]> {

  let content: string;

  try {

    content = await fsPromises.readFile(marketsFile, "utf-8");
  } catch(error) {

    if(isMissingFileError(error)) {

      return [];
    }

    throw error;
  }

  let parsed: unknown;

  try {

    parsed = JSON.parse(content);
  } catch(error) {

    LOG.warn("Invalid JSON in market list %s: %s. Treating it as empty.", marketsFile, formatError(error));

    return [];
  }

  if(!Array.isArray(parsed)) {

    LOG.warn("Market list %s is not an array. Treating it as empty.", marketsFile);

    return [];
  }

  const markets: Market[] = [];

  for(const entry of parsed) {

    if(!isPlainObject(entry)) {

      continue;
    }

    const country = entry.country;

    // Older market lists used "zip" for the postal code.
    const postalCode = entry.postalCode ?? entry.zip;

    if((typeof country !== "string") || ((typeof postalCode !== "string") && (typeof postalCode !== "number"))) {

      LOG.warn("Skipping malformed market entry in %s: %j.", marketsFile, entry);

      continue;
    }

    markets.push({ country, postalCode: String(postalCode) });
  }

  return uniqueMarkets(markets);
}

/**
 * Writes the configured markets, normalized and de-duplicated, through a temp file and rename.
 * @param marketsFile - Path to markets.json.
 * @param markets - The markets to write.
 */
export async function saveMarkets(marketsFile: string, markets: readonly Market[]): Promise<void> {

  await fsPromises.mkdir(path.dirname(marketsFile), { recursive: true });

  const tempPath = marketsFile + ".tmp";

  await fsPromises.writeFile(tempPath, JSON.stringify(uniqueMarkets(markets), null, 2) + "\n", "utf-8");
  await fsPromises.rename(tempPath, marketsFile);
}

/**
 * Adds a market to the configured list.
 * @param marketsFile - Path to markets.json.
 * @param country - The raw country code.
 * @param postalCode - The raw postal code.
 * @returns The normalized market and whether it was newly added (false when it was already configured).
 */
export async function addMarket(marketsFile: string, country: string, postalCode: string): Promise<{ added: boolean; market: Market }> {

  const market = normalizeMarket(country, postalCode);
  const markets = await loadMarkets(marketsFile);
  const key = marketKey(market.country, market.postalCode);

  if(markets.some((m) => marketKey(m.country, m.postalCode) === key)) {

    return { added: false, market };
  }

  markets.push(market);

  await saveMarkets(marketsFile, markets);

  LOG.debug("config", "Added market %s.", key);

  return { added: true, market };
}

/**
 * Removes a market from the configured list.
 * @param marketsFile - Path to markets.json.
 * @param country - The raw country code.
 * @param postalCode - The raw postal code.
 * @returns True if the market was configured and has been removed.
 */
export async function removeMarket(marketsFile: string, country: string, postalCode: string): Promise<boolean> {

  const key = marketKey(country, postalCode);
  const markets = await loadMarkets(marketsFile);
  const remaining = markets.filter((m) => marketKey(m.country, m.postalCode) !== key);

  if(remaining.length === markets.length) {

    return false;
  }

  await saveMarkets(marketsFile, remaining);

  LOG.debug("config", "Removed market %s.", key);

  return true;
}
