/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Type definitions for StationBase.
 */

/**
 * A utility type that represents a value that can be null.
 * @typeParam T - The type that can be nullable.
 */
export type Nullable<T> = T | null;

/*
 * CONFIGURATION TYPES
 *
 * These interfaces define the structure of the application configuration. The Config interface is the root configuration object, with nested interfaces for each
 * functional area. Values come from hard-coded defaults, the user config file, and environment variables, and are validated at startup.
 */

/**
 * Guide-data provider settings. StationBase talks to a Channels DVR server, which proxies lineup and station lookups to the Gracenote guide service.
 */
export interface GuideConfig {

  // Whether stations that have a call sign but no name get a secondary lookup by call sign during caching. Environment variable: ENRICHMENT_ENABLED.
  enrichment: boolean;

  // Pause in milliseconds between call sign lookups, keeping the enrichment phase from flooding the server. Environment variable: ENRICHMENT_DELAY. Default: 50ms.
  enrichmentDelay: number;

  // Timeout in milliseconds for a market lineup request. Environment variable: LINEUP_TIMEOUT. Default: 10000ms.
  lineupTimeout: number;

  // Timeout in milliseconds for a call sign lookup. Environment variable: LOOKUP_TIMEOUT. Default: 5000ms.
  lookupTimeout: number;

  // Base URL of the Channels DVR server (e.g., "http://192.168.1.10:8089"). Environment variable: CHANNELS_URL.
  serverUrl: string;

  // Timeout in milliseconds for a lineup station list request. Environment variable: STATION_TIMEOUT. Default: 10000ms.
  stationTimeout: number;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {

  // HTTP request logging level. "none" disables, "errors" logs 4xx/5xx only, "filtered" skips high-frequency endpoints, "all" logs everything.
  httpLogLevel: "all" | "errors" | "filtered" | "none";

  // Maximum log file size in bytes. When exceeded, the file is trimmed to half this size. Environment variable: LOG_MAX_SIZE. Default: 1048576 (1MB).
  maxSize: number;
}

/**
 * Filesystem overrides. When a value is null, the file lives inside the data directory.
 */
export interface PathsConfig {

  // Absolute path to the distributed base station snapshot. The coverage manifest is expected beside it. Environment variable: STATIONBASE_BASE_FILE.
  baseStationsFile: Nullable<string>;

  // Absolute path to the log file. Environment variable: STATIONBASE_LOG_FILE.
  logFile: Nullable<string>;
}

/**
 * Search defaults applied when a query does not carry its own country or resolution override.
 */
export interface SearchSettings {

  // Comma-separated country codes a result must match when filterByCountry is enabled. Environment variable: ENABLED_COUNTRIES.
  enabledCountries: string;

  // Comma-separated video qualities a result must match when filterByResolution is enabled. Environment variable: ENABLED_RESOLUTIONS.
  enabledResolutions: string;

  // Restrict results to enabledCountries. Environment variable: FILTER_BY_COUNTRY.
  filterByCountry: boolean;

  // Restrict results to enabledResolutions. Environment variable: FILTER_BY_RESOLUTION.
  filterByResolution: boolean;

  // Rows per result page. Environment variable: RESULTS_PER_PAGE. Default: 10.
  resultsPerPage: number;
}

/**
 * HTTP server binding.
 */
export interface ServerConfig {

  // Bind address. Environment variable: HOST. Default: 0.0.0.0.
  host: string;

  // TCP port. Environment variable: PORT. Default: 8970.
  port: number;
}

/**
 * Freshness token for the combined view. Timestamps are file modification times in milliseconds, recorded when the combined view was last written. A zero
 * combinedTimestamp means no combined view has been recorded.
 */
export interface CombinedCacheState {

  baseTimestamp: number;
  combinedTimestamp: number;
  userTimestamp: number;
}

/**
 * Root configuration object.
 */
export interface Config {

  cacheState: CombinedCacheState;
  guide: GuideConfig;
  logging: LoggingConfig;
  paths: PathsConfig;
  search: SearchSettings;
  server: ServerConfig;
}

/*
 * STATION TYPES
 *
 * A station record is the atomic entity of every store. Records are keyed by stationId, the Gracenote station identifier shared across lineups and countries.
 */

/**
 * Video quality classes reported by the guide service.
 */
export type VideoQuality = "HDTV" | "SDTV" | "UHDTV";

/**
 * All recognized video quality values, in ascending order.
 */
export const VIDEO_QUALITIES: readonly VideoQuality[] = [ "SDTV", "HDTV", "UHDTV" ];

/**
 * Provenance marker for a record. Informational only; never used for precedence decisions.
 */
export type StationSource = "api" | "base" | "user";

/**
 * The lineup a record was first discovered in.
 */
export interface LineupTrace {

  country: string;
  lineupId: string;
  lineupName?: string;
  location?: string;
  type?: string;
}

/**
 * A television station.
 */
export interface StationRecord {

  // Countries the station has been found in, sorted and without duplicates.
  availableIn?: string[];

  callSign?: string;

  // Three-letter country code, "UNK" when unknown.
  country: string;

  description?: string;
  language?: string;

  // The primary lineup trace. Holds at most one entry.
  lineupTracing?: LineupTrace[];

  logoURI?: string;
  name?: string;
  network?: string;
  source?: StationSource;
  stationId: string;
  videoQuality?: VideoQuality;
}

/**
 * A geographic query unit. Both fields are normalized before they are persisted or compared.
 */
export interface Market {

  country: string;
  postalCode: string;
}

/**
 * A lineup as returned by the guide service for a market.
 */
export interface LineupSummary {

  lineupId: string;
  location?: string;
  name?: string;
  type?: string;
}

/*
 * SEARCH TYPES
 */

/**
 * Output shape of a search. "count" returns the total number of matches, "tsv" returns flat rows for table output, and "full" returns the detailed row layout.
 */
export type SearchMode = "count" | "full" | "tsv";

/**
 * Row layout for "tsv" mode: stationId, name, callSign, country.
 */
export type TsvRow = [ string, string, string, string ];

/**
 * Row layout for "full" mode: name, callSign, videoQuality, stationId, country.
 */
export type FullRow = [ string, string, string, string, string ];

/**
 * A single search request.
 */
export interface SearchQuery {

  // Country override. When set, it replaces the configured country filter for this call.
  country?: string;

  mode: SearchMode;

  // 1-based page number. Ignored in count mode.
  page: number;

  // Resolution override. When set, it replaces the configured resolution filter for this call.
  resolution?: string;

  term: string;
}

/**
 * Search filter settings passed explicitly into the search engine.
 */
export interface SearchConfig {

  enabledCountries: string[];
  enabledResolutions: string[];
  filterByCountry: boolean;
  filterByResolution: boolean;
  resultsPerPage: number;
}

/**
 * Search results, discriminated by mode.
 */
export type SearchResults = { mode: "count"; total: number } | { mode: "full"; page: number; rows: FullRow[]; total: number } |
  { mode: "tsv"; page: number; rows: TsvRow[]; total: number };
