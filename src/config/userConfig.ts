/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.ts: User configuration file management for StationBase.
 */
import type { CombinedCacheState, Config, Nullable } from "../types/index.js";
import { LOG, formatError, isMissingFileError, isPlainObject } from "../utils/index.js";
import fs from "node:fs";
import { getConfigFilePath } from "./paths.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/*
 * USER CONFIGURATION FILE
 *
 * StationBase stores user configuration in config.json inside the data directory (~/.stationbase by default). The configuration system uses a layered approach:
 *
 * 1. Hard-coded defaults (defined in DEFAULTS)
 * 2. User config file (<data-dir>/config.json)
 * 3. Environment variables
 * 4. CLI flags (highest priority, applied by the entry point)
 *
 * The same file also carries the combined view freshness token under "cacheState". That field is written by the consolidation engine, not by the user, and is
 * preserved across saves.
 */

/*
 * SETTING METADATA
 *
 * Each configurable setting has metadata describing its type, valid range, environment variable name, and human-readable description. This metadata drives
 * environment overrides, the --list-env output, and validation.
 */

/**
 * Metadata describing a single configuration setting. Default values are not stored here. Use getNestedValue(DEFAULTS, setting.path) to get the default value for
 * a setting.
 */
export interface SettingMetadata {

  // Human-readable description.
  description: string;

  // Environment variable that can override this setting, or null if not overridable.
  envVar: string | null;

  // Human-readable label.
  label: string;

  // Maximum allowed value for numeric settings.
  max?: number;

  // Minimum allowed value for numeric settings.
  min?: number;

  // Dot-separated path to the setting (e.g., "guide.serverUrl").
  path: string;

  // Data type for parsing and validation.
  type: "boolean" | "host" | "integer" | "path" | "port" | "string" | "url";

  // Valid values for string type settings.
  validValues?: string[];

  // Unit of measurement (e.g., "ms", "bytes").
  unit?: string;
}

/**
 * Metadata for all configurable settings, organized by category.
 */
export const CONFIG_METADATA: Record<string, SettingMetadata[]> = {

  guide: [
    {

      description: "Base URL of the Channels DVR server that proxies guide-data lookups. Include the scheme and port.",
      envVar: "CHANNELS_URL",
      label: "Channels DVR URL",
      path: "guide.serverUrl",
      type: "url"
    },
    {

      description: "Timeout for a market lineup request. A timeout counts as an empty response.",
      envVar: "LINEUP_TIMEOUT",
      label: "Lineup Timeout",
      max: 120000,
      min: 1000,
      path: "guide.lineupTimeout",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Timeout for a lineup station list request. A timeout counts as an empty response.",
      envVar: "STATION_TIMEOUT",
      label: "Station Timeout",
      max: 120000,
      min: 1000,
      path: "guide.stationTimeout",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Timeout for a call sign lookup during enrichment.",
      envVar: "LOOKUP_TIMEOUT",
      label: "Lookup Timeout",
      max: 120000,
      min: 500,
      path: "guide.lookupTimeout",
      type: "integer",
      unit: "ms"
    },
    {

      description: "Look up stations that have a call sign but no name by their call sign after caching.",
      envVar: "ENRICHMENT_ENABLED",
      label: "Enrichment",
      path: "guide.enrichment",
      type: "boolean"
    },
    {

      description: "Pause between call sign lookups during enrichment.",
      envVar: "ENRICHMENT_DELAY",
      label: "Enrichment Delay",
      max: 10000,
      min: 0,
      path: "guide.enrichmentDelay",
      type: "integer",
      unit: "ms"
    }
  ],

  logging: [
    {

      description: "HTTP request logging level. \"none\" disables logging, \"errors\" logs only 4xx/5xx responses, \"filtered\" skips the health endpoint when " +
        "it succeeds, \"all\" logs everything.",
      envVar: "HTTP_LOG_LEVEL",
      label: "HTTP Log Level",
      path: "logging.httpLogLevel",
      type: "string",
      validValues: [ "none", "errors", "filtered", "all" ]
    },
    {

      description: "Maximum log file size in bytes. When exceeded, the file is trimmed to half this size keeping the most recent logs.",
      envVar: "LOG_MAX_SIZE",
      label: "Max Log Size",
      max: 104857600,
      min: 10240,
      path: "logging.maxSize",
      type: "integer",
      unit: "bytes"
    }
  ],

  paths: [
    {

      description: "Absolute path to the distributed base station snapshot. The coverage manifest is read from the same directory.",
      envVar: "STATIONBASE_BASE_FILE",
      label: "Base Station File",
      path: "paths.baseStationsFile",
      type: "path"
    },
    {

      description: "Absolute path to the log file.",
      envVar: "STATIONBASE_LOG_FILE",
      label: "Log File",
      path: "paths.logFile",
      type: "path"
    }
  ],

  search: [
    {

      description: "Number of rows returned per search page.",
      envVar: "RESULTS_PER_PAGE",
      label: "Results Per Page",
      max: 1000,
      min: 1,
      path: "search.resultsPerPage",
      type: "integer"
    },
    {

      description: "Only return stations whose video quality is listed in the enabled resolutions.",
      envVar: "FILTER_BY_RESOLUTION",
      label: "Filter By Resolution",
      path: "search.filterByResolution",
      type: "boolean"
    },
    {

      description: "Comma-separated video qualities allowed when resolution filtering is on (SDTV, HDTV, UHDTV).",
      envVar: "ENABLED_RESOLUTIONS",
      label: "Enabled Resolutions",
      path: "search.enabledResolutions",
      type: "string"
    },
    {

      description: "Only return stations found in one of the enabled countries.",
      envVar: "FILTER_BY_COUNTRY",
      label: "Filter By Country",
      path: "search.filterByCountry",
      type: "boolean"
    },
    {

      description: "Comma-separated three-letter country codes allowed when country filtering is on (e.g., USA,CAN).",
      envVar: "ENABLED_COUNTRIES",
      label: "Enabled Countries",
      path: "search.enabledCountries",
      type: "string"
    }
  ],

  server: [
    {

      description: "TCP port for the HTTP API.",
      envVar: "PORT",
      label: "Server Port",
      max: 65535,
      min: 1,
      path: "server.port",
      type: "port"
    },
    {

      description: "Address the HTTP API binds to. Use 0.0.0.0 for all interfaces or 127.0.0.1 for local access only.",
      envVar: "HOST",
      label: "Bind Address",
      path: "server.host",
      type: "host"
    }
  ]
};

/*
 * USER CONFIG TYPES
 *
 * The user config file stores partial configuration, only the settings that differ from defaults. All fields are optional because missing fields use defaults.
 */

/**
 * Partial guide configuration for user config file.
 */
export interface UserGuideConfig {

  enrichment?: boolean;
  enrichmentDelay?: number;
  lineupTimeout?: number;
  lookupTimeout?: number;
  serverUrl?: string;
  stationTimeout?: number;
}

/**
 * Partial logging configuration for user config file.
 */
export interface UserLoggingConfig {

  httpLogLevel?: string;
  maxSize?: number;
}

/**
 * Partial paths configuration for user config file.
 */
export interface UserPathsConfig {

  baseStationsFile?: Nullable<string>;
  logFile?: Nullable<string>;
}

/**
 * Partial search configuration for user config file.
 */
export interface UserSearchConfig {

  enabledCountries?: string;
  enabledResolutions?: string;
  filterByCountry?: boolean;
  filterByResolution?: boolean;
  resultsPerPage?: number;
}

/**
 * Partial server configuration for user config file.
 */
export interface UserServerConfig {

  host?: string;
  port?: number;
}

/**
 * User configuration with all fields optional. This is the structure of the config.json file.
 */
export interface UserConfig {

  cacheState?: Partial<CombinedCacheState>;
  guide?: UserGuideConfig;
  logging?: UserLoggingConfig;
  paths?: UserPathsConfig;
  search?: UserSearchConfig;
  server?: UserServerConfig;
}

/**
 * Result of loading user config, includes a parse error flag for status reporting.
 */
export interface UserConfigLoadResult {

  // The loaded configuration (empty object if file missing or parse error).
  config: UserConfig;

  // True if the config file exists but contains invalid JSON.
  parseError: boolean;

  // Error message if parseError is true.
  parseErrorMessage?: string;
}

/*
 * CONFIG FILE OPERATIONS
 *
 * These functions handle reading and writing the config file.
 */

/**
 * Loads user configuration from the config file. Returns an empty config if the file doesn't exist, and sets parseError if the file exists but contains invalid
 * JSON or a non-object value.
 * @param configFilePath - Path to the config file. Defaults to the data directory config file.
 * @returns The loaded configuration with parse status.
 */
export async function loadUserConfig(configFilePath = getConfigFilePath()): Promise<UserConfigLoadResult> {

  let content: string;

  try {

    content = await fsPromises.readFile(configFilePath, "utf-8");
  } catch(error) {

    // File doesn't exist. This is normal, use defaults.
    if(isMissingFileError(error)) {

      return { config: {}, parseError: false };
    }

    LOG.warn("Failed to read configuration file %s: %s. Using defaults.", configFilePath, formatError(error));

    return { config: {}, parseError: false };
  }

  try {

    const parsed: unknown = JSON.parse(content);

    if(!isPlainObject(parsed)) {

      throw new Error("the top-level value must be an object");
    }

    return { config: toUserConfig(parsed), parseError: false };
  } catch(parseError) {

    const message = formatError(parseError);

    LOG.warn("Invalid JSON in configuration file %s: %s. Using defaults.", configFilePath, message);

    return { config: {}, parseError: true, parseErrorMessage: message };
  }
}

/**
 * Returns a named section of a parsed config file, or an empty object when the section is missing or malformed.
 * @param raw - The parsed config file.
 * @param name - The section name.
 * @returns The section.
 */
function sectionOf(raw: Record<string, unknown>, name: string): Record<string, unknown> {

  const value = raw[name];

  return isPlainObject(value) ? value : {};
}

function booleanField(section: Record<string, unknown>, key: string): boolean | undefined {

  const value = section[key];

  return (typeof value === "boolean") ? value : undefined;
}

function numberField(section: Record<string, unknown>, key: string): number | undefined {

  const value = section[key];

  return ((typeof value === "number") && Number.isFinite(value)) ? value : undefined;
}

function stringField(section: Record<string, unknown>, key: string): string | undefined {

  const value = section[key];

  return (typeof value === "string") ? value : undefined;
}

function pathField(section: Record<string, unknown>, key: string): Nullable<string> | undefined {

  const value = section[key];

  return ((value === null) || (typeof value === "string")) ? value : undefined;
}

/**
 * Copies the known fields of a parsed config file into a UserConfig. Each field is type-checked, so a hand-edited file with a wrong type falls back to the default
 * for that setting instead of poisoning the merged configuration. Fields that are missing or malformed are left undefined.
 * @param raw - The parsed config file.
 * @returns The typed user configuration.
 */
export function toUserConfig(raw: Record<string, unknown>): UserConfig {

  const guide = sectionOf(raw, "guide");
  const logging = sectionOf(raw, "logging");
  const paths = sectionOf(raw, "paths");
  const search = sectionOf(raw, "search");
  const server = sectionOf(raw, "server");
  const state = sectionOf(raw, "cacheState");

  return {

    cacheState: {

      baseTimestamp: numberField(state, "baseTimestamp"),
      combinedTimestamp: numberField(state, "combinedTimestamp"),
      userTimestamp: numberField(state, "userTimestamp")
    },

    guide: {

      enrichment: booleanField(guide, "enrichment"),
      enrichmentDelay: numberField(guide, "enrichmentDelay"),
      lineupTimeout: numberField(guide, "lineupTimeout"),
      lookupTimeout: numberField(guide, "lookupTimeout"),
      serverUrl: stringField(guide, "serverUrl"),
      stationTimeout: numberField(guide, "stationTimeout")
    },

    logging: {

      httpLogLevel: stringField(logging, "httpLogLevel"),
      maxSize: numberField(logging, "maxSize")
    },

    paths: {

      baseStationsFile: pathField(paths, "baseStationsFile"),
      logFile: pathField(paths, "logFile")
    },

    search: {

      enabledCountries: stringField(search, "enabledCountries"),
      enabledResolutions: stringField(search, "enabledResolutions"),
      filterByCountry: booleanField(search, "filterByCountry"),
      filterByResolution: booleanField(search, "filterByResolution"),
      resultsPerPage: numberField(search, "resultsPerPage")
    },

    server: {

      host: stringField(server, "host"),
      port: numberField(server, "port")
    }
  };
}

/**
 * Saves user configuration to the config file. Creates the data directory if it doesn't exist. The write goes to a temp file that is renamed into place.
 * @param config - The configuration to save, usually the output of filterDefaults().
 * @param configFilePath - Path to the config file. Defaults to the data directory config file.
 * @throws If the file cannot be written.
 */
export async function saveUserConfig(config: Record<string, unknown>, configFilePath = getConfigFilePath()): Promise<void> {

  await fsPromises.mkdir(path.dirname(configFilePath), { recursive: true });

  const content = JSON.stringify(config, null, 2);
  const tempPath = configFilePath + ".tmp";

  await fsPromises.writeFile(tempPath, content + "\n", "utf-8");
  await fsPromises.rename(tempPath, configFilePath);

  LOG.debug("config", "Configuration saved to %s.", configFilePath);
}

/*
 * CONFIGURATION MERGING
 *
 * These functions merge defaults, user config, and environment overrides into the final CONFIG object.
 */

/**
 * Hard-coded default configuration values. These are the baseline values used when neither user config nor environment variables provide a value.
 */
export const DEFAULTS: Config = {

  cacheState: {

    baseTimestamp: 0,
    combinedTimestamp: 0,
    userTimestamp: 0
  },

  guide: {

    enrichment: true,
    enrichmentDelay: 50,
    lineupTimeout: 10000,
    lookupTimeout: 5000,
    serverUrl: "http://localhost:8089",
    stationTimeout: 10000
  },

  logging: {

    httpLogLevel: "errors",
    maxSize: 1048576
  },

  paths: {

    baseStationsFile: null,
    logFile: null
  },

  search: {

    enabledCountries: "",
    enabledResolutions: "SDTV,HDTV,UHDTV",
    filterByCountry: false,
    filterByResolution: false,
    resultsPerPage: 10
  },

  server: {

    host: "0.0.0.0",
    port: 8970
  }
};

/**
 * Returns a deep copy of a configuration object.
 * @param config - The configuration to copy.
 * @returns An independent copy.
 */
export function cloneConfig(config: Config): Config {

  return structuredClone(config);
}

/**
 * Parses an environment variable value according to the setting type.
 * @param value - The raw environment variable value.
 * @param type - The expected type of the setting.
 * @returns The parsed value, or undefined if parsing fails.
 */
export function parseEnvValue(value: string, type: SettingMetadata["type"]): Nullable<boolean | number | string> | undefined {

  switch(type) {

    case "boolean": {

      // Accept common truthy values for environment variables.
      const lower = value.toLowerCase();

      return (lower === "true") || (lower === "1") || (lower === "yes");
    }

    case "integer":
    case "port": {

      const num = parseInt(value, 10);

      return Number.isNaN(num) ? undefined : num;
    }

    case "path": {

      // An empty path restores the data directory default.
      return (value.length > 0) ? value : null;
    }

    default: {

      return value;
    }
  }
}

/**
 * Gets a value from a nested object using a dot-separated path.
 * @param obj - The object to read from.
 * @param settingPath - Dot-separated path (e.g., "guide.serverUrl").
 * @returns The value at the path, or undefined if not found.
 */
export function getNestedValue(obj: unknown, settingPath: string): unknown {

  const parts = settingPath.split(".");
  let current: unknown = obj;

  for(const part of parts) {

    if(!isPlainObject(current)) {

      return undefined;
    }

    current = current[part];
  }

  return current;
}

/**
 * Sets a value in a nested object using a dot-separated path, creating intermediate objects as needed.
 * @param obj - The object to modify.
 * @param settingPath - Dot-separated path (e.g., "guide.serverUrl").
 * @param value - The value to set.
 */
export function setNestedValue(obj: Record<string, unknown>, settingPath: string, value: unknown): void {

  const parts = settingPath.split(".");
  let current = obj;

  for(let i = 0; i < (parts.length - 1); i++) {

    const part = parts[i];
    const existing = current[part];
    let next: Record<string, unknown>;

    if(!isPlainObject(existing)) {

      next = {};
      current[part] = next;
    } else {

      next = existing;
    }

    current = next;
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Applies every setting found in a source object onto a configuration. The source is one of the layers (user config or parsed environment variables).
 * @param config - The configuration being built.
 * @param source - The layer to apply.
 */
function applyLayer(config: Config, source: unknown): void {

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const value = getNestedValue(source, setting.path);

      if(value === undefined) {

        continue;
      }

      assignSetting(config, setting.path, value);
    }
  }
}

/**
 * Assigns a validated value to a known configuration path. Values of the wrong type are ignored, leaving the lower layer's value in place.
 * @param config - The configuration being built.
 * @param settingPath - The dot-separated setting path.
 * @param value - The value to assign.
 */
function assignSetting(config: Config, settingPath: string, value: unknown): void {

  const [ section, key ] = settingPath.split(".");

  switch(section) {

    case "guide": {

      if((key === "serverUrl") && (typeof value === "string")) {

        config.guide.serverUrl = value;
      } else if((key === "enrichment") && (typeof value === "boolean")) {

        config.guide.enrichment = value;
      } else if(((key === "enrichmentDelay") || (key === "lineupTimeout") || (key === "lookupTimeout") || (key === "stationTimeout")) &&
        (typeof value === "number")) {

        config.guide[key] = value;
      }

      break;
    }

    case "logging": {

      if((key === "httpLogLevel") && isHttpLogLevel(value)) {

        config.logging.httpLogLevel = value;
      } else if((key === "maxSize") && (typeof value === "number")) {

        config.logging.maxSize = value;
      }

      break;
    }

    case "paths": {

      if(((key === "baseStationsFile") || (key === "logFile")) && ((value === null) || (typeof value === "string"))) {

        config.paths[key] = value;
      }

      break;
    }

    case "search": {

      if(((key === "enabledCountries") || (key === "enabledResolutions")) && (typeof value === "string")) {

        config.search[key] = value;
      } else if(((key === "filterByCountry") || (key === "filterByResolution")) && (typeof value === "boolean")) {

        config.search[key] = value;
      } else if((key === "resultsPerPage") && (typeof value === "number")) {

        config.search.resultsPerPage = value;
      }

      break;
    }

    case "server": {

      if((key === "host") && (typeof value === "string")) {

        config.server.host = value;
      } else if((key === "port") && (typeof value === "number")) {

        config.server.port = value;
      }

      break;
    }

    default: {

      break;
    }
  }
}

/**
 * Checks whether a value is a recognized HTTP log level.
 * @param value - The value to check.
 * @returns True for "all", "errors", "filtered", or "none".
 */
function isHttpLogLevel(value: unknown): value is Config["logging"]["httpLogLevel"] {

  return (value === "all") || (value === "errors") || (value === "filtered") || (value === "none");
}

/**
 * Merges user configuration with defaults and environment overrides to produce the final configuration. Priority: env vars > user config > defaults.
 * @param userConfig - User configuration from the config file.
 * @param env - The environment to read overrides from. Defaults to process.env.
 * @returns The merged configuration.
 */
export function mergeConfiguration(userConfig: UserConfig, env: NodeJS.ProcessEnv = process.env): Config {

  const config = cloneConfig(DEFAULTS);

  // Apply user config values.
  applyLayer(config, userConfig);

  /* NON-CONFIG_METADATA FIELDS. The freshness token is stored in the user config file but is not a user setting. When adding a new field here, also add the
   * matching preservation logic in filterDefaults() below.
   */
  const state = userConfig.cacheState;

  if(state) {

    config.cacheState = {

      baseTimestamp: state.baseTimestamp ?? config.cacheState.baseTimestamp,
      combinedTimestamp: state.combinedTimestamp ?? config.cacheState.combinedTimestamp,
      userTimestamp: state.userTimestamp ?? config.cacheState.userTimestamp
    };
  }

  // Apply environment variable overrides (highest priority).
  const envLayer: Record<string, unknown> = {};

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const envValue = setting.envVar ? env[setting.envVar] : undefined;

      if(envValue !== undefined) {

        const parsedValue = parseEnvValue(envValue, setting.type);

        if(parsedValue !== undefined) {

          setNestedValue(envLayer, setting.path, parsedValue);
        }
      }
    }
  }

  applyLayer(config, envLayer);

  return config;
}

/*
 * DEFAULT VALUE FILTERING
 *
 * When saving user configuration, we only persist values that differ from defaults. This keeps the config file small and lets users pick up new defaults for
 * settings they never changed.
 */

/**
 * Recursively removes empty objects from a nested object structure.
 * @param obj - The object to clean.
 * @returns A new object with empty nested objects removed.
 */
function removeEmptyObjects(obj: Record<string, unknown>): Record<string, unknown> {

  const result: Record<string, unknown> = {};

  for(const key of Object.keys(obj)) {

    const value = obj[key];

    if(isPlainObject(value)) {

      const cleaned = removeEmptyObjects(value);

      if(Object.keys(cleaned).length > 0) {

        result[key] = cleaned;
      }
    } else {

      result[key] = value;
    }
  }

  return result;
}

/**
 * Checks if two values are equal for the purpose of default comparison. Handles null, undefined, and type coercion consistently.
 * @param value - The value to check.
 * @param defaultValue - The default value to compare against.
 * @returns True if the values are considered equal.
 */
export function isEqualToDefault(value: unknown, defaultValue: unknown): boolean {

  if((value === null) || (value === undefined)) {

    return (defaultValue === null) || (defaultValue === undefined);
  }

  if((defaultValue === null) || (defaultValue === undefined)) {

    return false;
  }

  return String(value) === String(defaultValue);
}

/**
 * Filters a configuration object down to the values that differ from the defaults, ready to be written to config.json.
 * @param config - The configuration to filter.
 * @returns A new configuration object containing only non-default values.
 */
export function filterDefaults(config: UserConfig | Config): Record<string, unknown> {

  const filtered: Record<string, unknown> = {};

  for(const settings of Object.values(CONFIG_METADATA)) {

    for(const setting of settings) {

      const value = getNestedValue(config, setting.path);

      if(value === undefined) {

        continue;
      }

      if(!isEqualToDefault(value, getNestedValue(DEFAULTS, setting.path))) {

        setNestedValue(filtered, setting.path, value);
      }
    }
  }

  /* NON-CONFIG_METADATA FIELDS. Counterpart to the same section in mergeConfiguration() above. A zero combinedTimestamp means no token, so it is dropped.
   */
  const cacheState = config.cacheState;

  if(cacheState?.combinedTimestamp && (cacheState.combinedTimestamp > 0)) {

    filtered.cacheState = {

      baseTimestamp: cacheState.baseTimestamp ?? 0,
      combinedTimestamp: cacheState.combinedTimestamp,
      userTimestamp: cacheState.userTimestamp ?? 0
    };
  }

  return removeEmptyObjects(filtered);
}
