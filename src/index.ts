#!/usr/bin/env node
/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Entry point for StationBase.
 */
import { CONFIG_METADATA, DEFAULTS, getNestedValue } from "./config/userConfig.js";
import { DEBUG_CATEGORIES, LOG, formatError, getPackageVersion, initDebugFilter, setDebugLogging } from "./utils/index.js";
import { handleCacheCommand, handleMarketsCommand, handleRebuildCommand, handleSearchCommand, handleStatusCommand } from "./cli/commands.js";
import { initializeEnvironment, startServer } from "./app.js";
import type { ParsedArgs } from "./cli/args.js";
import { createStationRuntime } from "./stations/index.js";
import { flushLogBufferSync } from "./utils/fileLogger.js";
import { initializeDataDir } from "./config/paths.js";
import { parseCliArgs } from "./cli/args.js";

/* These handlers catch unhandled promise rejections and uncaught exceptions so a stray error in one request does not take the server down. The handlers log the
 * error and allow the process to continue.
 */

process.on("unhandledRejection", (reason: unknown): void => {

  LOG.error("Unhandled promise rejection: %s.", formatError(reason));
});

process.on("uncaughtException", (error: Error): void => {

  LOG.error("Uncaught exception: %s.", formatError(error));
});

/**
 * Prints usage information to the console.
 */
function printUsage(): void {

  /* eslint-disable no-console */
  console.log("Usage: stationbase [command] [options]");
  console.log("");
  console.log("Commands:");
  console.log("  serve                           Start the HTTP server (default)");
  console.log("  cache [--force]                 Fetch stations for every configured market into the user store");
  console.log("  search <term> [flags]           Search the station database");
  console.log("                                  Flags: --page N, --count, --tsv, --country C, --resolution R");
  console.log("  status                          Show the state of the stores, the ledger, and the coverage manifest");
  console.log("  rebuild                         Rebuild the combined search view");
  console.log("  markets <list|add|remove>       Manage configured markets");
  console.log("                                  Run 'stationbase markets' for details");
  console.log("");
  console.log("Options:");
  console.log("  -c, --console                   Log to console instead of file (for Docker or debugging)");
  console.log("  -d, --debug                     Enable debug logging (verbose output for troubleshooting)");
  console.log("  -h, --help                      Show this help message");
  console.log("  -p, --port <port>               Set server port (default: " + String(DEFAULTS.server.port) + ")");
  console.log("  -v, --version                   Show version number");
  console.log("  --data-dir <path>               Set data directory (default: ~/.stationbase)");
  console.log("  --list-env                      List all environment variables");
  console.log("  --log-file <path>               Set log file path (default: <data-dir>/stationbase.log)");
  console.log("");
  console.log("Common Environment Variables:");
  console.log("  CHANNELS_URL                    Guide server URL (default: " + DEFAULTS.guide.serverUrl + ")");
  console.log("  PORT                            HTTP server port");
  console.log("  RESULTS_PER_PAGE                Search results per page");
  console.log("  STATIONBASE_DATA_DIR            Data directory path (default: ~/.stationbase)");
  console.log("  STATIONBASE_DEBUG               Debug category filter (e.g., 'cache', 'guide:http', '*,-search')");
  console.log("");
  console.log("Debug Categories (for STATIONBASE_DEBUG):");

  for(const { category, description } of DEBUG_CATEGORIES) {

    console.log("  " + category.padEnd(32) + description);
  }

  console.log("");
  console.log("  Run 'stationbase --list-env' for a complete list of all environment variables.");
  /* eslint-enable no-console */
}

/**
 * Prints a complete listing of all environment variables organized by category. Generated from CONFIG_METADATA so it always matches the settings.
 */
function printEnvironmentVariables(): void {

  /* eslint-disable no-console */

  // Server first, since it is the most commonly configured, then the rest alphabetically.
  const categoryOrder: { displayName: string; key: string }[] = [
    { displayName: "Server", key: "server" },
    { displayName: "Guide", key: "guide" },
    { displayName: "Logging", key: "logging" },
    { displayName: "Paths", key: "paths" },
    { displayName: "Search", key: "search" }
  ];

  // Defaults for null path settings, which resolve at runtime rather than from DEFAULTS.
  const dynamicDefaults: Record<string, string> = {

    "paths.baseStationsFile": "<data-dir>/all_stations_base.json",
    "paths.logFile": "<data-dir>/stationbase.log"
  };

  console.log("StationBase Environment Variables");
  console.log("");
  console.log("All settings can also be configured in config.json inside the data directory.");
  console.log("Priority: CLI flags > environment variables > config.json > defaults.");

  for(const category of categoryOrder) {

    const envSettings = (CONFIG_METADATA[category.key] ?? []).filter((setting) => setting.envVar !== null);

    if(envSettings.length === 0) {

      continue;
    }

    console.log("");
    console.log(category.displayName + ":");

    let first = true;

    for(const setting of envSettings) {

      if(!setting.envVar) {

        continue;
      }

      if(!first) {

        console.log("");
      }

      first = false;

      console.log("  " + setting.envVar);

      // First sentence only.
      const periodSpace = setting.description.indexOf(". ");

      console.log("    " + ((periodSpace !== -1) ? setting.description.slice(0, periodSpace + 1) : setting.description));

      const dynamicDefault = dynamicDefaults[setting.path];
      let defaultStr: string;

      if(dynamicDefault) {

        defaultStr = dynamicDefault;
      } else {

        const defaultValue = getNestedValue(DEFAULTS, setting.path);

        defaultStr = ((typeof defaultValue === "string") && !defaultValue) ? "(empty)" : String(defaultValue);

        if((typeof defaultValue === "number") && setting.unit) {

          defaultStr = defaultStr + " (" + setting.unit + ")";
        }
      }

      console.log("    Default: " + defaultStr);
    }
  }

  // STATIONBASE_DATA_DIR is resolved before config.json is loaded, so it cannot live in config.json. STATIONBASE_DEBUG is read by the entry point only.
  console.log("");
  console.log("Special:");
  console.log("  STATIONBASE_DATA_DIR");
  console.log("    Data directory path. Must be an absolute path.");
  console.log("    Default: ~/.stationbase");
  console.log("");
  console.log("  STATIONBASE_DEBUG");
  console.log("    Debug category filter (e.g., 'cache', 'guide:http', '*,-search').");
  console.log("    Default: (disabled)");

  /* eslint-enable no-console */
}

/**
 * Runs a one-shot command after initializing the environment.
 * @param args - The parsed arguments.
 * @returns Exit code.
 */
async function runCommand(args: ParsedArgs): Promise<number> {

  await initializeEnvironment(args.consoleLogging, { logFile: args.logFile, port: args.port });

  const runtime = createStationRuntime();

  switch(args.command) {

    case "cache": {

      return handleCacheCommand(runtime, args.commandArgs);
    }

    case "markets": {

      return handleMarketsCommand(runtime, args.commandArgs);
    }

    case "rebuild": {

      return handleRebuildCommand(runtime);
    }

    case "search": {

      return handleSearchCommand(runtime, args.commandArgs);
    }

    case "status": {

      return handleStatusCommand(runtime);
    }

    default: {

      return 1;
    }
  }
}

const parsed = parseCliArgs(process.argv.slice(2));

if(typeof parsed === "string") {

  // eslint-disable-next-line no-console
  console.error("Error: " + parsed);
  printUsage();

  process.exit(1);
}

if(parsed.help) {

  printUsage();

  process.exit(0);
}

if(parsed.version) {

  // eslint-disable-next-line no-console
  console.log("StationBase v" + getPackageVersion());

  process.exit(0);
}

if(parsed.listEnv) {

  printEnvironmentVariables();

  process.exit(0);
}

// Resolve the data directory before anything touches a path. The CLI flag takes precedence over STATIONBASE_DATA_DIR.
initializeDataDir(parsed.dataDir);

// STATIONBASE_DEBUG takes precedence over --debug, since it allows category selection.
const debugEnv = process.env.STATIONBASE_DEBUG;

if(debugEnv) {

  const unknown = initDebugFilter(debugEnv);

  if(unknown.length > 0) {

    // eslint-disable-next-line no-console
    console.error("STATIONBASE_DEBUG names unknown categories: " + unknown.join(", ") + ". Run 'stationbase --help' for the list.");
  }
} else if(parsed.debugLogging) {

  setDebugLogging(true);
}

/* The 'exit' event runs synchronously, so only synchronous work is safe here. Buffered log entries from a fatal startup error or a finished command are flushed to
 * disk before the process terminates.
 */
process.on("exit", (): void => {

  flushLogBufferSync();
});

if(parsed.command === "serve") {

  startServer({ consoleLogging: parsed.consoleLogging, logFile: parsed.logFile, port: parsed.port }).catch((error: unknown): void => {

    LOG.error("Fatal startup error occurred: %s.", formatError(error));

    process.exit(1);
  });
} else {

  runCommand(parsed).then((exitCode) => {

    process.exit(exitCode);
  }).catch((error: unknown) => {

    // eslint-disable-next-line no-console
    console.error("Command failed: " + formatError(error));

    process.exit(1);
  });
}
