/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * paths.ts: Centralized filesystem path resolution for StationBase.
 */
import type { Config } from "../types/index.js";
import os from "node:os";
import path from "node:path";

/* This module is the single source of truth for all filesystem paths used by StationBase. All other modules import path getters from here instead of computing
 * paths independently. The data directory is resolved once at startup via initializeDataDir(), before config.json is loaded. The data directory determines where
 * config.json lives, so it cannot be set through config.json itself.
 *
 * Resolution priority for the data directory (highest to lowest):
 *   1. CLI flag (--data-dir)
 *   2. Environment variable (STATIONBASE_DATA_DIR)
 *   3. Default (~/.stationbase)
 *
 * The station subsystem never calls the getters directly. It receives a StationPaths object, which lets tests point it at a temporary directory.
 */

// The resolved data directory, initialized once at startup. All path getters depend on this value.
let resolvedDataDir: string | undefined;

/**
 * Every file and directory the station subsystem reads or writes.
 */
export interface StationPaths {

  backupDir: string;
  baseManifestFile: string;
  baseStationsFile: string;
  combinedStationsFile: string;
  dataDir: string;
  lineupMapFile: string;
  lineupsLedgerFile: string;
  marketsFile: string;
  marketsLedgerFile: string;
  stagingDir: string;
  userStationsFile: string;
}

/**
 * Initializes the data directory from the CLI flag, environment variable, or default. Must be called at startup before any config loading or path resolution. May
 * be called a second time with a CLI flag to override the initial resolution.
 * @param cliDataDir - Optional data directory from the --data-dir CLI flag.
 */
export function initializeDataDir(cliDataDir?: string): void {

  const envDataDir = process.env.STATIONBASE_DATA_DIR;

  if(cliDataDir) {

    // CLI flag is already validated by requireAbsolutePath() in index.ts.
    resolvedDataDir = cliDataDir;
  } else if(envDataDir) {

    if(!path.isAbsolute(envDataDir)) {

      // eslint-disable-next-line no-console
      console.error("Error: STATIONBASE_DATA_DIR must be an absolute path, got: " + envDataDir);

      process.exit(1);
    }

    resolvedDataDir = envDataDir;
  } else {

    resolvedDataDir = path.join(os.homedir(), ".stationbase");
  }
}

/**
 * Returns the resolved data directory. Throws if called before initializeDataDir().
 * @returns The absolute path to the data directory.
 */
export function getDataDir(): string {

  if(!resolvedDataDir) {

    throw new Error("Data directory not initialized. Call initializeDataDir() first.");
  }

  return resolvedDataDir;
}

/**
 * Returns the path to the user configuration file.
 * @returns The absolute path to config.json inside the data directory.
 */
export function getConfigFilePath(): string {

  return path.join(getDataDir(), "config.json");
}

/**
 * Returns the log file path. When config.paths.logFile is set, that absolute path is used directly. Otherwise, the default location inside the data directory is used.
 * @param config - The application configuration.
 * @returns The absolute path to the log file.
 */
export function getLogFilePath(config: Config): string {

  return config.paths.logFile ?? path.join(getDataDir(), "stationbase.log");
}

/**
 * Builds the station subsystem layout for a data directory. The coverage manifest always sits beside the base store, so relocating the base store relocates the
 * manifest with it.
 * @param dataDir - The data directory.
 * @param baseStationsFile - Optional absolute path overriding the base store location.
 * @returns The resolved layout.
 */
export function buildStationPaths(dataDir: string, baseStationsFile?: string | null): StationPaths {

  const baseFile = baseStationsFile ?? path.join(dataDir, "all_stations_base.json");
  const parsed = path.parse(baseFile);

  return {

    backupDir: path.join(dataDir, "backups"),
    baseManifestFile: path.join(parsed.dir, parsed.name + "_manifest" + parsed.ext),
    baseStationsFile: baseFile,
    combinedStationsFile: path.join(dataDir, "all_stations_combined.json"),
    dataDir,
    lineupMapFile: path.join(dataDir, "lineup_to_market.json"),
    lineupsLedgerFile: path.join(dataDir, "cached_lineups.jsonl"),
    marketsFile: path.join(dataDir, "markets.json"),
    marketsLedgerFile: path.join(dataDir, "cached_markets.jsonl"),
    stagingDir: path.join(dataDir, "staging"),
    userStationsFile: path.join(dataDir, "all_stations_user.json")
  };
}

/**
 * Returns the station subsystem layout for the running process.
 * @param config - The application configuration.
 * @returns The resolved layout.
 */
export function getStationPaths(config: Config): StationPaths {

  return buildStationPaths(getDataDir(), config.paths.baseStationsFile);
}
