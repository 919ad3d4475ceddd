/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * format.ts: Text output formatting for StationBase CLI commands.
 */
import type { CachingSummary, StatusReport } from "../stations/index.js";
import type { SearchMode, SearchQuery, SearchResults } from "../types/index.js";
import { formatBytes, formatDuration, formatTimestamp } from "../utils/index.js";

const FULL_HEADERS = [ "Name", "Call Sign", "Quality", "Station ID", "Country" ];

/**
 * Lays out rows as a table with space-padded columns. Trailing whitespace is trimmed from every line.
 * @param headers - The column headers.
 * @param rows - The rows.
 * @returns The table lines, headers first, then a dashed separator, then the rows.
 */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {

  const widths = headers.map((header, column) => Math.max(header.length, ...rows.map((row) => (row[column] ?? "").length)));
  const line = (cells: readonly string[]): string => cells.map((cell, column) => cell.padEnd(widths[column] ?? 0)).join("  ").trimEnd();

  return [ line(headers), line(widths.map((width) => "-".repeat(width))), ...rows.map(line) ];
}

/**
 * Renders search results for the terminal. Count mode prints the number alone, tsv mode prints tab-separated rows, and full mode prints a table followed by a page
 * footer.
 * @param results - The search results.
 * @param pageSize - The configured page size, used to compute the page count.
 * @returns The output lines.
 */
export function formatSearchResults(results: SearchResults, pageSize: number): string[] {

  switch(results.mode) {

    case "count": {

      return [String(results.total)];
    }

    case "tsv": {

      return results.rows.map((row) => row.join("\t"));
    }

    default: {

      if(results.total === 0) {

        return ["No stations found."];
      }

      const pages = Math.max(1, Math.ceil(results.total / Math.max(1, pageSize)));

      return [ ...formatTable(FULL_HEADERS, results.rows), "", "Page " + String(results.page) + " of " + String(pages) + " (" + String(results.total) +
        ((results.total === 1) ? " station)" : " stations)") ];
    }
  }
}

/**
 * Parses the arguments of the search command: a term followed by optional flags.
 * @param args - The arguments after "search".
 * @returns The search query, or an error message.
 */
export function parseSearchArgs(args: readonly string[]): SearchQuery | string {

  const terms: string[] = [];
  let mode: SearchMode = "full";
  let page = 1;
  let country: string | undefined;
  let resolution: string | undefined;

  for(let i = 0; i < args.length; i++) {

    const arg = args[i];

    switch(arg) {

      case "--count": {

        mode = "count";

        break;
      }

      case "--tsv": {

        mode = "tsv";

        break;
      }

      case "--page": {

        const value = Number.parseInt(args[++i] ?? "", 10);

        if(Number.isNaN(value)) {

          return "--page requires a number.";
        }

        page = value;

        break;
      }

      case "--country": {

        country = args[++i];

        if(!country) {

          return "--country requires a country code.";
        }

        break;
      }

      case "--resolution": {

        resolution = args[++i];

        if(!resolution) {

          return "--resolution requires SDTV, HDTV, or UHDTV.";
        }

        break;
      }

      default: {

        if(arg.startsWith("-")) {

          return "Unknown search option: " + arg;
        }

        terms.push(arg);
      }
    }
  }

  const term = terms.join(" ").trim();

  if(!term) {

    return "A search term is required.";
  }

  const query: SearchQuery = { mode, page, term };

  if(country) {

    query.country = country.toUpperCase();
  }

  if(resolution) {

    query.resolution = resolution.toUpperCase();
  }

  return query;
}

/**
 * Renders a caching run summary.
 * @param summary - The run summary.
 * @returns The output lines.
 */
export function formatCachingSummary(summary: CachingSummary): string[] {

  return [

    "Caching finished in " + formatDuration(summary.elapsedMs) + ".",
    "",
    "Markets:  " + String(summary.marketsConfigured) + " configured, " + String(summary.marketsProcessed) + " processed, " + String(summary.marketsSkippedByManifest) +
      " covered by the base store, " + String(summary.marketsAlreadyProcessed) + " already processed, " + String(summary.marketsFailed) + " failed",
    "Lineups:  " + String(summary.lineupsDiscovered) + " discovered, " + String(summary.lineupsFetched) + " fetched, " + String(summary.lineupsSkippedByLedger) +
      " already processed, " + String(summary.lineupsSkippedByManifest) + " covered by the base store, " + String(summary.lineupsFailed) + " failed",
    "Stations: " + String(summary.stationsRaw) + " fetched, " + String(summary.duplicatesRemoved) + " duplicates removed, " + String(summary.enriched) + " enriched, " +
      String(summary.stationsAdded) + " added, " + String(summary.stationsUpdated) + " updated",
    "User store: " + String(summary.userStoreTotal) + " stations"
  ];
}

/**
 * Renders a status report.
 * @param report - The status report.
 * @returns The output lines.
 */
export function formatStatusReport(report: StatusReport): string[] {

  const lines: string[] = ["Stores:"];

  for(const [ label, store ] of [ [ "Base", report.stores.base ], [ "User", report.stores.user ], [ "Combined", report.stores.combined ] ] as const) {

    lines.push("  " + (label + ":").padEnd(10) + (store.exists ? String(store.records) + " stations, " + formatBytes(store.size) + ", modified " +
      formatTimestamp(store.modified) : "not present"));
  }

  lines.push("  Searching: " + (report.effectiveStore ? report.effectiveStore.kind + " (" + report.effectiveStore.path + ")" :
    (report.stores.base.empty && report.stores.user.empty) ? "nothing, no station data" : "combined view, rebuilt on the next search"));

  lines.push("", "Ledger:");
  lines.push("  Markets processed: " + String(report.ledger.markets) + " of " + String(report.marketsConfigured) + " configured");
  lines.push("  Lineups processed: " + String(report.ledger.lineups));
  lines.push("  Last updated: " + (report.ledger.lastUpdated ?? "never"));

  lines.push("", "Coverage manifest:");

  if(report.manifest.loaded) {

    lines.push("  " + String(report.manifest.markets) + " markets, " + String(report.manifest.lineups) + " lineups, countries: " +
      (report.manifest.countries.join(", ") || "none"));

    if(report.manifest.stale) {

      lines.push("  Warning: the manifest is older than the base store.");
    }
  } else {

    lines.push("  Not present. Every market is fetched from the guide server.");
  }

  if(report.cachingActive) {

    lines.push("", "A caching run is in progress.");
  }

  return lines;
}
