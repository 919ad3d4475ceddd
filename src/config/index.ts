/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Configuration management for StationBase.
 */
import type { CombinedCacheState, Config, Nullable, SearchConfig } from "../types/index.js";
import { DEFAULTS, cloneConfig, filterDefaults, loadUserConfig, mergeConfiguration, saveUserConfig } from "./userConfig.js";
import { LOG, parseCodeList } from "../utils/index.js";
import { VIDEO_QUALITIES } from "../types/index.js";

/*
 * CONFIGURATION
 *
 * The CONFIG object centralizes all tunable parameters for the application. Configuration uses a layered approach with the following priority (highest to lowest):
 *
 * 1. CLI flags (applied by the entry point through applyCliOverrides())
 * 2. Environment variables (SCREAMING_SNAKE_CASE naming)
 * 3. User config file (<data-dir>/config.json)
 * 4. Hard-coded defaults (defined in userConfig.ts)
 *
 * The settings are organized by functional area:
 *
 * - server: Network binding for the HTTP API (port, host)
 * - guide: Channels DVR server URL, request timeouts, and enrichment pacing
 * - search: Result page size and the default country and resolution filters
 * - paths: Base store and log file overrides
 * - logging: HTTP request logging and log file size
 *
 * Configuration is initialized at startup via initializeConfiguration(), which loads the user config file, merges with defaults, and applies environment
 * overrides. validateConfiguration() then checks every value and reports all problems at once.
 */

// The CONFIG object is initialized during startup. It starts as a copy of DEFAULTS and is replaced by the merged configuration.
export let CONFIG: Config = cloneConfig(DEFAULTS);

/**
 * Indicates whether a user config file parse error occurred during initialization. The status endpoint reports this.
 */
export let configParseError = false;

/**
 * The parse error message if configParseError is true.
 */
export let configParseErrorMessage: string | undefined;

/**
 * Initializes the configuration by loading the user config file, merging with defaults, and applying environment variable overrides. This must be called at startup
 * before any code accesses CONFIG.
 */
export async function initializeConfiguration(): Promise<void> {

  const result = await loadUserConfig();

  configParseError = result.parseError;
  configParseErrorMessage = result.parseErrorMessage;

  CONFIG = mergeConfiguration(result.config);

  LOG.debug("config", "Configuration initialized from defaults, user config, and environment variables.");
}

/**
 * CLI flag values that override the merged configuration.
 */
export interface CliOverrides {

  logFile?: string;
  port?: number;
}

/**
 * Applies CLI flag values on top of the merged configuration.
 * @param overrides - The parsed CLI flags.
 */
export function applyCliOverrides(overrides: CliOverrides): void {

  if(overrides.port !== undefined) {

    CONFIG.server.port = overrides.port;
  }

  if(overrides.logFile !== undefined) {

    CONFIG.paths.logFile = overrides.logFile;
  }
}

/*
 * SEARCH CONFIGURATION
 *
 * The search engine never reads CONFIG. Callers build an explicit SearchConfig, which keeps search results reproducible in tests and in the CLI.
 */

/**
 * Builds the search configuration from a configuration object.
 * @param config - The configuration. Defaults to CONFIG.
 * @returns The explicit search configuration.
 */
export function getSearchConfig(config: Config = CONFIG): SearchConfig {

  return {

    enabledCountries: parseCodeList(config.search.enabledCountries),
    enabledResolutions: parseCodeList(config.search.enabledResolutions),
    filterByCountry: config.search.filterByCountry,
    filterByResolution: config.search.filterByResolution,
    resultsPerPage: config.search.resultsPerPage
  };
}

/*
 * CACHE STATE PERSISTENCE
 *
 * The combined view freshness token lives in config.json under "cacheState". Writes go through the raw user config (not CONFIG), so environment overrides never
 * leak into the file.
 */

/**
 * Persistence for the combined view freshness token. The consolidation engine depends on this interface rather than on the config file directly.
 */
export interface CacheStateStore {

  load(): CombinedCacheState;
  save(state: CombinedCacheState): Promise<void>;
}

/**
 * Returns the freshness token store backed by CONFIG and config.json.
 * @returns The token store.
 */
export function getConfigCacheStateStore(): CacheStateStore {

  return {

    load: (): CombinedCacheState => ({ ...CONFIG.cacheState }),

    save: async (state: CombinedCacheState): Promise<void> => {

      CONFIG.cacheState = { ...state };

      const result = await loadUserConfig();

      // Leave a file we could not parse untouched. The token then only lives in memory until the file is fixed.
      if(result.parseError) {

        LOG.warn("Not saving cache state because the configuration file could not be parsed.");

        return;
      }

      await saveUserConfig(filterDefaults({ ...result.config, cacheState: state }));

      LOG.debug("config", "Saved cache state: combined %s, base %s, user %s.", state.combinedTimestamp, state.baseTimestamp, state.userTimestamp);
    }
  };
}

/**
 * Returns an in-memory freshness token store. Used by tests and by one-shot commands that run against a throwaway data directory.
 * @param initial - The initial token.
 * @returns The token store.
 */
export function createMemoryCacheStateStore(initial: CombinedCacheState = { ...DEFAULTS.cacheState }): CacheStateStore {

  let current = { ...initial };

  return {

    load: (): CombinedCacheState => ({ ...current }),

    save: (state: CombinedCacheState): Promise<void> => {

      current = { ...state };

      return Promise.resolve();
    }
  };
}

/*
 * CONFIGURATION VALIDATION
 *
 * Before starting the server or running a command, we validate all configuration values to catch errors early. All problems are collected and reported together.
 */

/**
 * Validates that a configuration value is a positive integer within an optional range. It returns an error message if validation fails, allowing the caller to
 * collect all errors before reporting them.
 * @param name - The configuration name for error messages, typically the environment variable name.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validatePositiveInt(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if(!Number.isInteger(value) || (value < 1)) {

    return [ name, " must be a positive integer, got: ", String(value) ].join("");
  }

  return validateRange(name, value, min, max);
}

/**
 * Validates that a configuration value is a non-negative integer within an optional range.
 * @param name - The configuration name for error messages.
 * @param value - The value to validate.
 * @param min - Optional minimum allowed value (inclusive).
 * @param max - Optional maximum allowed value (inclusive).
 * @returns Error message if invalid, null if valid.
 */
export function validateNonNegativeInt(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if(!Number.isInteger(value) || (value < 0)) {

    return [ name, " must be a non-negative integer, got: ", String(value) ].join("");
  }

  return validateRange(name, value, min, max);
}

function validateRange(name: string, value: number, min?: number, max?: number): Nullable<string> {

  if((min !== undefined) && (value < min)) {

    return [ name, " must be at least ", String(min), ", got: ", String(value) ].join("");
  }

  if((max !== undefined) && (value > max)) {

    return [ name, " must be at most ", String(max), ", got: ", String(value) ].join("");
  }

  return null;
}

/**
 * Validates a configuration object and throws an error listing every invalid value.
 * @param config - The configuration to validate. Defaults to CONFIG.
 * @throws If any configuration value is invalid.
 */
export function validateConfiguration(config: Config = CONFIG): void {

  const errors: string[] = [];
  const collect = (error: Nullable<string>): void => {

    if(error) {

      errors.push(error);
    }
  };

  // Port must be within the valid TCP port range (1-65535).
  collect(validatePositiveInt("PORT", config.server.port, 1, 65535));

  // Guide server URL must be an absolute http(s) URL.
  try {

    const url = new URL(config.guide.serverUrl);

    if((url.protocol !== "http:") && (url.protocol !== "https:")) {

      errors.push("CHANNELS_URL must use http or https, got: " + config.guide.serverUrl);
    }
  } catch {

    errors.push("CHANNELS_URL must be an absolute URL, got: " + config.guide.serverUrl);
  }

  collect(validatePositiveInt("LINEUP_TIMEOUT", config.guide.lineupTimeout, 1000, 120000));
  collect(validatePositiveInt("STATION_TIMEOUT", config.guide.stationTimeout, 1000, 120000));
  collect(validatePositiveInt("LOOKUP_TIMEOUT", config.guide.lookupTimeout, 500, 120000));
  collect(validateNonNegativeInt("ENRICHMENT_DELAY", config.guide.enrichmentDelay, 0, 10000));
  collect(validatePositiveInt("RESULTS_PER_PAGE", config.search.resultsPerPage, 1, 1000));

  // Minimum size (10KB) keeps meaningful log content. Maximum (100MB) bounds disk usage.
  collect(validatePositiveInt("LOG_MAX_SIZE", config.logging.maxSize, 10240, 104857600));

  const unknownResolutions = parseCodeList(config.search.enabledResolutions).filter((r) => !VIDEO_QUALITIES.some((q) => q === r));

  if(unknownResolutions.length > 0) {

    errors.push("ENABLED_RESOLUTIONS contains unknown values: " + unknownResolutions.join(", ") + ". Valid values are " + VIDEO_QUALITIES.join(", ") + ".");
  }

  const badCountries = parseCodeList(config.search.enabledCountries).filter((c) => !/^[A-Z]{3}$/.test(c));

  if(badCountries.length > 0) {

    errors.push("ENABLED_COUNTRIES must list three-letter country codes, got: " + badCountries.join(", "));
  }

  if(config.search.filterByCountry && (parseCodeList(config.search.enabledCountries).length === 0)) {

    LOG.warn("Country filtering is enabled but no countries are listed. Searches will return no results until ENABLED_COUNTRIES is set.");
  }

  if(errors.length > 0) {

    throw new Error([ "Configuration validation failed:\n  ", errors.join("\n  ") ].join(""));
  }
}

/**
 * Displays the active configuration at startup. We log only the most commonly adjusted values to keep output concise.
 */
export function displayConfiguration(): void {

  LOG.info("Starting StationBase with configuration:");
  LOG.info("  Server: %s:%s", CONFIG.server.host, CONFIG.server.port);
  LOG.info("  Channels DVR: %s", CONFIG.guide.serverUrl);
  LOG.info("  Timeouts: lineups %sms, stations %sms, lookups %sms", CONFIG.guide.lineupTimeout, CONFIG.guide.stationTimeout, CONFIG.guide.lookupTimeout);
  LOG.info("  Enrichment: %s", CONFIG.guide.enrichment ? "enabled (" + String(CONFIG.guide.enrichmentDelay) + "ms between lookups)" : "disabled");
  LOG.info("  Results per page: %s", CONFIG.search.resultsPerPage);
  LOG.info("  Resolution filter: %s", CONFIG.search.filterByResolution ? CONFIG.search.enabledResolutions : "off");
  LOG.info("  Country filter: %s", CONFIG.search.filterByCountry ? CONFIG.search.enabledCountries : "off");

  if(configParseError) {

    LOG.warn("The configuration file could not be parsed (%s). Defaults are in use.", configParseErrorMessage ?? "unknown error");
  }
}
