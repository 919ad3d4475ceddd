/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * commands.ts: Command handlers for the StationBase CLI.
 */
import { CachingInProgressError, LedgerWriteError, NoMarketsConfiguredError, NoStationsAvailableError, formatError } from "../utils/index.js";
import { ProcessingLedger, cacheConfiguredMarkets, getStatusReport, rebuildCombinedView, removeConfiguredMarket, search } from "../stations/index.js";
import { addMarket, loadMarkets, validateMarket } from "../config/markets.js";
import { formatCachingSummary, formatSearchResults, formatStatusReport, parseSearchArgs } from "./format.js";
import type { StationRuntime } from "../stations/index.js";

/*
 * CLI COMMAND HANDLERS
 *
 * These handlers implement the one-shot commands: cache, search, status, rebuild, and markets. Each handler prints its output directly to the console and returns
 * an exit code. The named errors are translated into remediation messages here; anything else is printed as is.
 */

/**
 * Prints a message to stdout.
 * @param message - The message to print.
 */
function print(message: string): void {

  // eslint-disable-next-line no-console
  console.log(message);
}

/**
 * Prints an error message to stderr.
 * @param message - The error message to print.
 */
function printError(message: string): void {

  // eslint-disable-next-line no-console
  console.error(message);
}

/**
 * Returns the remediation hint for a named error.
 * @param error - The error.
 * @returns The hint, or undefined for errors without one.
 */
export function remediationFor(error: unknown): string | undefined {

  if(error instanceof NoStationsAvailableError) {

    return "Add a market with 'stationbase markets add <country> <postal>' and run 'stationbase cache', or install the base station snapshot.";
  }

  if(error instanceof NoMarketsConfiguredError) {

    return "Add a market with 'stationbase markets add <country> <postal>', for example 'stationbase markets add USA 10001'.";
  }

  if(error instanceof CachingInProgressError) {

    return "Wait for the current run to finish.";
  }

  if(error instanceof LedgerWriteError) {

    return "Check that the data directory is writable, then run 'stationbase cache' again to resume.";
  }

  return undefined;
}

// Prints an error with its remediation hint and returns the failure exit code.
function fail(error: unknown): number {

  printError("Error: " + formatError(error) + ".");

  const hint = remediationFor(error);

  if(hint) {

    printError(hint);
  }

  return 1;
}

/**
 * Handles `stationbase cache [--force]`.
 * @param runtime - The station runtime.
 * @param args - The arguments after the command.
 * @returns Exit code.
 */
export async function handleCacheCommand(runtime: StationRuntime, args: readonly string[]): Promise<number> {

  const force = args.includes("--force");

  print("Caching configured markets" + (force ? " (forced refresh)" : "") + "...");

  try {

    const summary = await cacheConfiguredMarkets(runtime, force);

    for(const line of formatCachingSummary(summary)) {

      print(line);
    }

    return 0;
  } catch(error) {

    return fail(error);
  }
}

/**
 * Handles `stationbase search <term> [--page N] [--count|--tsv] [--country C] [--resolution R]`.
 * @param runtime - The station runtime.
 * @param args - The arguments after the command.
 * @returns Exit code.
 */
export async function handleSearchCommand(runtime: StationRuntime, args: readonly string[]): Promise<number> {

  const query = parseSearchArgs(args);

  if(typeof query === "string") {

    printError("Error: " + query);

    return 1;
  }

  try {

    for(const line of formatSearchResults(await search(query, runtime.searchConfig, runtime), runtime.searchConfig.resultsPerPage)) {

      print(line);
    }

    return 0;
  } catch(error) {

    return fail(error);
  }
}

/**
 * Handles `stationbase status`.
 * @param runtime - The station runtime.
 * @returns Exit code.
 */
export async function handleStatusCommand(runtime: StationRuntime): Promise<number> {

  try {

    for(const line of formatStatusReport(await getStatusReport(runtime))) {

      print(line);
    }

    return 0;
  } catch(error) {

    return fail(error);
  }
}

/**
 * Handles `stationbase rebuild`.
 * @param runtime - The station runtime.
 * @returns Exit code.
 */
export async function handleRebuildCommand(runtime: StationRuntime): Promise<number> {

  try {

    const store = await rebuildCombinedView(runtime);

    print("Searching the " + store.kind + " store: " + store.path);

    return 0;
  } catch(error) {

    return fail(error);
  }
}

/**
 * Prints usage information for the markets subcommand.
 */
export function printMarketsUsage(): void {

  print("Usage: stationbase markets <command>");
  print("");
  print("Commands:");
  print("  list                      List configured markets and whether each has been processed");
  print("  add <country> <postal>    Add a market (e.g., 'add USA 10001', 'add GBR \"SW1A 1AA\"')");
  print("  remove <country> <postal> Remove a market and forget it in the processing ledger");
}

/**
 * Handles `stationbase markets list|add|remove`.
 * @param runtime - The station runtime.
 * @param args - The arguments after the command.
 * @returns Exit code.
 */
export async function handleMarketsCommand(runtime: StationRuntime, args: readonly string[]): Promise<number> {

  const [ action, country, ...postalParts ]: readonly (string | undefined)[] = args;
  const postalCode = postalParts.join(" ");

  try {

    switch(action ?? "list") {

      case "list": {

        const [ markets, ledger ] = await Promise.all([ loadMarkets(runtime.paths.marketsFile), ProcessingLedger.load(runtime.paths) ]);

        if(markets.length === 0) {

          print("No markets configured.");

          return 0;
        }

        for(const market of markets) {

          print(market.country + "\t" + market.postalCode + "\t" + (ledger.isMarketProcessed(market.country, market.postalCode) ? "processed" : "pending"));
        }

        return 0;
      }

      case "add": {

        if(!country || !postalCode) {

          printMarketsUsage();

          return 1;
        }

        const problem = validateMarket(country, postalCode);

        if(problem) {

          printError("Error: " + problem);

          return 1;
        }

        const result = await addMarket(runtime.paths.marketsFile, country, postalCode);

        print(result.added ? "Added market " + result.market.country + " " + result.market.postalCode + "." :
          "Market " + result.market.country + " " + result.market.postalCode + " is already configured.");

        return 0;
      }

      case "remove": {

        if(!country || !postalCode) {

          printMarketsUsage();

          return 1;
        }

        if(!(await removeConfiguredMarket(runtime, country, postalCode)).removed) {

          printError("Error: market " + country + " " + postalCode + " is not configured.");

          return 1;
        }

        print("Removed market " + country.toUpperCase() + " " + postalCode + ".");

        return 0;
      }

      default: {

        printMarketsUsage();

        return 1;
      }
    }
  } catch(error) {

    return fail(error);
  }
}
