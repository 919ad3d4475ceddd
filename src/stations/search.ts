/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * search.ts: Station search and filtering for StationBase.
 */
import type { FullRow, SearchConfig, SearchQuery, SearchResults, StationRecord, TsvRow } from "../types/index.js";
import { LOG, startTimer } from "../utils/index.js";
import { fileMtime, readStations } from "./store.js";
import type { ConsolidationDeps } from "./consolidate.js";
import { resolveEffectiveStore } from "./consolidate.js";

/*
 * STATION SEARCH
 *
 * Searches always read the effective store chosen by the consolidation engine. Parsed records are kept in memory keyed by path and mtime, so repeated searches
 * (paging through results, for example) parse the store once.
 *
 * A record matches when:
 *
 * - The term is a case-insensitive substring of its name or call sign.
 * - Its video quality passes the resolution filter. A resolution in the query replaces the configured filter for that call.
 * - Its country, or any country in availableIn, passes the country filter. A country in the query replaces the configured filter for that call.
 *
 * The search configuration is passed in explicitly and never read from the global configuration here.
 */

interface RecordCache {

  mtime: number;
  path: string;
  records: StationRecord[];
}

let recordCache: RecordCache | null = null;

/**
 * Drops the memoized records. The next search reads the store from disk.
 */
export function clearSearchCache(): void {

  recordCache = null;
}

// Reads a store, reusing the memoized records while the path and mtime are unchanged.
async function loadRecords(file: string): Promise<StationRecord[]> {

  const mtime = await fileMtime(file);

  if(recordCache && (recordCache.path === file) && (recordCache.mtime === mtime)) {

    return recordCache.records;
  }

  const elapsed = startTimer();
  const records = await readStations(file);

  recordCache = { mtime, path: file, records };

  LOG.debug("search", "Loaded %s records from %s in %sms.", records.length, file, elapsed());

  return records;
}

/**
 * Loads the records of the effective store.
 * @param deps - The consolidation dependencies.
 * @returns The records, sorted by name.
 * @throws NoStationsAvailableError when no store holds records.
 */
export async function loadEffectiveRecords(deps: ConsolidationDeps): Promise<StationRecord[]> {

  const store = await resolveEffectiveStore(deps);

  return loadRecords(store.path);
}

function matchesTerm(record: StationRecord, term: string): boolean {

  const needle = term.toLowerCase();

  for(const value of [ record.name, record.callSign ]) {

    if((value !== undefined) && ((value === term) || value.toLowerCase().includes(needle))) {

      return true;
    }
  }

  return false;
}

function matchesCountry(record: StationRecord, countries: readonly string[]): boolean {

  return countries.some((country) => (record.country === country) || (record.availableIn?.includes(country) ?? false));
}

function matchesResolution(record: StationRecord, resolutions: readonly string[]): boolean {

  return (record.videoQuality !== undefined) && resolutions.includes(record.videoQuality);
}

/**
 * Applies the term, resolution, and country filters.
 * @param records - The records to filter.
 * @param query - The search query.
 * @param config - The search configuration.
 * @returns The matching records in their original order.
 */
export function filterStations(records: readonly StationRecord[], query: Pick<SearchQuery, "country" | "resolution" | "term">,
  config: SearchConfig): StationRecord[] {

  const term = query.term.trim();
  const resolutionOverride = query.resolution?.trim().toUpperCase();
  const countryOverride = query.country?.trim().toUpperCase();
  let resolutions: string[] | null = null;
  let countries: string[] | null = null;

  if(resolutionOverride) {

    resolutions = [resolutionOverride];
  } else if(config.filterByResolution) {

    resolutions = config.enabledResolutions;
  }

  if(countryOverride) {

    countries = [countryOverride];
  } else if(config.filterByCountry) {

    countries = config.enabledCountries;
  }

  return records.filter((record) => matchesTerm(record, term) && (!resolutions || matchesResolution(record, resolutions)) &&
    (!countries || matchesCountry(record, countries)));
}

/**
 * Returns the country column for a result row: every country the station is available in when there are several, its country otherwise.
 * @param record - The station.
 * @returns The country text.
 */
export function countryColumn(record: StationRecord): string {

  return ((record.availableIn?.length ?? 0) > 1) ? (record.availableIn ?? []).join(",") : record.country;
}

/**
 * Formats a record as a tsv row: stationId, name, call sign, country.
 * @param record - The station.
 * @returns The row.
 */
export function toTsvRow(record: StationRecord): TsvRow {

  return [ record.stationId, record.name ?? "", record.callSign ?? "", countryColumn(record) ];
}

/**
 * Formats a record as a full row: name, call sign, video quality, stationId, country.
 * @param record - The station.
 * @returns The row.
 */
export function toFullRow(record: StationRecord): FullRow {

  return [ record.name ?? "", record.callSign ?? "", record.videoQuality ?? "Unknown", record.stationId, countryColumn(record) ];
}

/**
 * Normalizes a requested page number. Anything below 1, or not a number, is page 1.
 * @param page - The requested page.
 * @returns The page number.
 */
export function normalizePage(page: number): number {

  return (Number.isFinite(page) && (page >= 1)) ? Math.floor(page) : 1;
}

/**
 * Filters records and shapes them into results.
 * @param records - The records to search.
 * @param query - The search query.
 * @param config - The search configuration.
 * @returns The results.
 */
export function searchRecords(records: readonly StationRecord[], query: SearchQuery, config: SearchConfig): SearchResults {

  const matches = filterStations(records, query, config);

  if(query.mode === "count") {

    return { mode: "count", total: matches.length };
  }

  const page = normalizePage(query.page);
  const pageSize = Math.max(1, config.resultsPerPage);
  const slice = matches.slice((page - 1) * pageSize, page * pageSize);

  if(query.mode === "tsv") {

    return { mode: "tsv", page, rows: slice.map(toTsvRow), total: matches.length };
  }

  return { mode: "full", page, rows: slice.map(toFullRow), total: matches.length };
}

/**
 * Searches the effective store.
 * @param query - The search query.
 * @param config - The search configuration.
 * @param deps - The consolidation dependencies.
 * @returns The results.
 * @throws NoStationsAvailableError when no store holds records.
 */
export async function search(query: SearchQuery, config: SearchConfig, deps: ConsolidationDeps): Promise<SearchResults> {

  const elapsed = startTimer();
  const results = searchRecords(await loadEffectiveRecords(deps), query, config);

  LOG.debug("search", "Search for \"%s\" (%s, page %s) matched %s records in %sms.", query.term, query.mode, query.page, results.total, elapsed());

  return results;
}

/**
 * Finds a station in the effective store.
 * @param stationId - The station identifier.
 * @param deps - The consolidation dependencies.
 * @returns The station, or undefined when it is not in the store.
 * @throws NoStationsAvailableError when no store holds records.
 */
export async function findStationById(stationId: string, deps: ConsolidationDeps): Promise<StationRecord | undefined> {

  return (await loadEffectiveRecords(deps)).find((record) => record.stationId === stationId);
}

/**
 * Lists every country that appears in the effective store.
 * @param deps - The consolidation dependencies.
 * @returns The sorted country codes.
 * @throws NoStationsAvailableError when no store holds records.
 */
export async function availableCountries(deps: ConsolidationDeps): Promise<string[]> {

  const countries = new Set<string>();

  for(const record of await loadEffectiveRecords(deps)) {

    countries.add(record.country);

    for(const country of record.availableIn ?? []) {

      countries.add(country);
    }
  }

  return [...countries].sort();
}
