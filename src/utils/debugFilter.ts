/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.ts: Debug category selection for StationBase.
 */
import type { Nullable } from "../types/index.js";

/* STATIONBASE_DEBUG picks which LOG.debug() categories are written, and --debug turns them all on. A pattern is a comma-separated list of entries. An entry names
 * a category and every category beneath it, "*" selects everything, and a leading "-" excludes. Exclusions win over everything else.
 *
 *   STATIONBASE_DEBUG=cache                 Every cache:* category.
 *   STATIONBASE_DEBUG=guide:http,search     Guide requests and search only.
 *   STATIONBASE_DEBUG=*,-cache:ledger       Everything except ledger writes.
 */

/**
 * A debug category and what it covers. Listed by --help.
 */
export interface DebugCategory {

  readonly category: string;
  readonly description: string;
}

/**
 * Every category the code logs under, sorted by name.
 */
export const DEBUG_CATEGORIES: readonly DebugCategory[] = [

  { category: "cache:consolidate", description: "Combined view freshness checks, merges, invalidation." },
  { category: "cache:enrich", description: "Call sign lookups for stations without a name." },
  { category: "cache:ledger", description: "Market and lineup ledger upserts and rewrites." },
  { category: "cache:pipeline", description: "Market resolution, lineup fetches, staging, user store merge." },
  { category: "cache:store", description: "Store reads, atomic writes, backups." },
  { category: "config", description: "Configuration loading, cache state persistence, market list changes." },
  { category: "guide:http", description: "Guide-data requests and response shapes." },
  { category: "search", description: "Query filters, store selection, memoized record loads." }
];

/**
 * A parsed STATIONBASE_DEBUG value.
 */
export interface DebugPattern {

  exclude: string[];
  include: string[];
  wildcard: boolean;
}

// The active pattern. Null while debug output is off.
let activePattern: Nullable<DebugPattern> = null;

// An entry covers its own category and everything below it: "cache" covers "cache:ledger" but not "cachet".
function covers(entry: string, category: string): boolean {

  return (category === entry) || category.startsWith(entry + ":");
}

/**
 * Parses a debug pattern.
 * @param value - The comma-separated pattern.
 * @returns The pattern, or null when it selects nothing.
 */
export function parseDebugPattern(value: string): Nullable<DebugPattern> {

  const entries = value.split(",").map((entry) => entry.trim()).filter((entry) => entry.length > 0);

  if(entries.length === 0) {

    return null;
  }

  const pattern: DebugPattern = { exclude: [], include: [], wildcard: false };

  for(const entry of entries) {

    if(entry === "*") {

      pattern.wildcard = true;
    } else if(entry.startsWith("-")) {

      pattern.exclude.push(entry.slice(1));
    } else {

      pattern.include.push(entry);
    }
  }

  return pattern;
}

/**
 * Checks a category against a pattern.
 * @param pattern - The parsed pattern.
 * @param category - The category, e.g. "cache:ledger".
 * @returns True if debug output for the category is selected.
 */
export function categoryMatches(pattern: DebugPattern, category: string): boolean {

  if(pattern.exclude.some((entry) => covers(entry, category))) {

    return false;
  }

  return pattern.wildcard || pattern.include.some((entry) => covers(entry, category));
}

/**
 * Lists the entries of a pattern that cover none of the known categories.
 * @param pattern - The parsed pattern.
 * @returns The unknown entries, as written.
 */
export function unknownDebugEntries(pattern: DebugPattern): string[] {

  return [ ...pattern.include, ...pattern.exclude ].filter((entry) => !DEBUG_CATEGORIES.some(({ category }) => covers(entry, category)));
}

/**
 * Replaces the active debug pattern. An empty value turns debug output off.
 * @param value - The comma-separated pattern.
 * @returns The entries that match no known category, so the caller can point out a typo.
 */
export function initDebugFilter(value: string): string[] {

  activePattern = parseDebugPattern(value);

  return activePattern ? unknownDebugEntries(activePattern) : [];
}

/**
 * Checks a category against the active pattern.
 * @param category - The category.
 * @returns True if debug output for the category should be written.
 */
export function isCategoryEnabled(category: string): boolean {

  return (activePattern !== null) && categoryMatches(activePattern, category);
}
