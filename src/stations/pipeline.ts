/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * pipeline.ts: Incremental station caching pipeline for StationBase.
 */
import type { LineupSummary, Market, StationRecord } from "../types/index.js";
import { CachingInProgressError, LOG, NoMarketsConfiguredError, delay, formatDuration, formatError, startTimer } from "../utils/index.js";
import { backupUserStore, readStations, writeStations } from "./store.js";
import { dedupeStations, mergeIntoUserStore } from "./dedupe.js";
import { readStagedLineups, removeStagedFiles, stageLineup, tagStagedStations } from "./staging.js";
import type { StagedLineup } from "./staging.js";
import type { CacheStateStore } from "../config/index.js";
import type { CoverageManifest } from "./manifest.js";
import type { GuideDataSource } from "../guide/client.js";
import type { ProcessingLedger } from "./ledger.js";
import type { StationPaths } from "../config/paths.js";
import { inferCountryFromLineupId } from "../guide/country.js";
import { invalidateCombinedView } from "./consolidate.js";
import { uniqueMarkets } from "../config/markets.js";

/*
 * INCREMENTAL CACHING
 *
 * A caching run turns the configured markets into station records in the user store. It works in phases:
 *
 * 1. Market resolution. Markets already in the ledger or covered by the base store manifest are skipped without a network call. Every other market has its lineups
 *    requested. A market whose request fails, or returns no lineups, is recorded with zero lineups.
 * 2. Lineup de-duplication. Markets share lineups, so lineup IDs are collected into a unique set in discovery order.
 * 3. Station fetch. Each lineup not already in the ledger or manifest has its stations requested and written to a staging file, then the lineup is recorded. A
 *    market is recorded once every lineup it listed has been handled, so a market never reads as processed while its stations are unstaged.
 * 4. Tagging. Staged stations, including any left by an interrupted run, are tagged with their lineup's country and trace.
 * 5. De-duplication by stationId.
 * 6. Optional enrichment of nameless stations through call sign lookups.
 * 7. Merge into the user store, after backing it up.
 * 8. Cleanup of the staging files and invalidation of the combined view.
 *
 * Network failures never abort a run; they are logged and counted. A LedgerWriteError does abort it, leaving everything recorded so far in place for the next run.
 * Only one run may be active per process.
 */

/**
 * Everything a caching run reads from and writes to.
 */
export interface CachingDeps {

  cacheState: CacheStateStore;
  enrichment: { delay: number; enabled: boolean };
  guide: GuideDataSource;
  ledger: ProcessingLedger;
  manifest: CoverageManifest;
  paths: StationPaths;
}

/**
 * Counts reported at the end of a caching run.
 */
export interface CachingSummary {

  duplicatesRemoved: number;
  elapsedMs: number;
  enriched: number;
  lineupsDiscovered: number;
  lineupsFailed: number;
  lineupsFetched: number;
  lineupsSkippedByLedger: number;
  lineupsSkippedByManifest: number;
  marketsAlreadyProcessed: number;
  marketsConfigured: number;
  marketsFailed: number;
  marketsProcessed: number;
  marketsSkippedByManifest: number;
  stationsAdded: number;
  stationsDeduplicated: number;
  stationsRaw: number;
  stationsUpdated: number;
  userStoreTotal: number;
}

// A market whose lineups were listed in this run, waiting for those lineups to be handled.
interface PendingMarket {

  lineupIds: string[];
  market: Market;
  recorded: boolean;
}

// Set while a run is active.
let cachingActive = false;

/**
 * Reports whether a caching run is active in this process.
 * @returns True while runCaching() is running.
 */
export function isCachingActive(): boolean {

  return cachingActive;
}

function emptySummary(marketsConfigured: number): CachingSummary {

  return {

    duplicatesRemoved: 0,
    elapsedMs: 0,
    enriched: 0,
    lineupsDiscovered: 0,
    lineupsFailed: 0,
    lineupsFetched: 0,
    lineupsSkippedByLedger: 0,
    lineupsSkippedByManifest: 0,
    marketsAlreadyProcessed: 0,
    marketsConfigured,
    marketsFailed: 0,
    marketsProcessed: 0,
    marketsSkippedByManifest: 0,
    stationsAdded: 0,
    stationsDeduplicated: 0,
    stationsRaw: 0,
    stationsUpdated: 0,
    userStoreTotal: 0
  };
}

/**
 * Resolves the market a lineup belongs to. The market whose lineup list first contained it wins. Otherwise the ledger's lineup map is consulted, then the lineup
 * ID's country prefix, then "UNK".
 * @param lineupId - The lineup identifier.
 * @param discovered - Lineups discovered in this run, mapped to the first market that listed them.
 * @param ledger - The processing ledger.
 * @returns The originating market. The postal code is empty when only the country could be inferred.
 */
export function resolveLineupOrigin(lineupId: string, discovered: ReadonlyMap<string, Market>, ledger: ProcessingLedger): Market {

  const market = discovered.get(lineupId) ?? ledger.marketForLineup(lineupId);

  if(market) {

    return market;
  }

  return { country: inferCountryFromLineupId(lineupId) ?? "UNK", postalCode: "" };
}

/**
 * Fills in a station from a call sign lookup match. Descriptive fields the match carries replace the station's; the station's origin (country, availableIn,
 * lineup trace, source) is kept.
 * @param station - The station being enriched.
 * @param match - The lookup entry with the same stationId.
 * @returns The enriched station.
 */
export function applyLookup(station: StationRecord, match: StationRecord): StationRecord {

  const enriched: StationRecord = { ...station };

  for(const key of [ "callSign", "description", "language", "logoURI", "name", "network" ] as const) {

    const value = match[key];

    if(value !== undefined) {

      enriched[key] = value;
    }
  }

  if(match.videoQuality !== undefined) {

    enriched.videoQuality = match.videoQuality;
  }

  return enriched;
}

// Looks up nameless stations by call sign. Returns the enriched records and how many lookups produced a match.
async function enrichStations(records: StationRecord[], deps: CachingDeps): Promise<{ enriched: number; records: StationRecord[] }> {

  const lookup = deps.guide.lookupCallSign?.bind(deps.guide);

  if(!deps.enrichment.enabled || !lookup) {

    return { enriched: 0, records };
  }

  const result: StationRecord[] = [];
  let enriched = 0;
  let lookups = 0;

  for(const record of records) {

    if(!record.callSign || record.name) {

      result.push(record);

      continue;
    }

    if(lookups > 0) {

      await delay(deps.enrichment.delay);
    }

    lookups++;

    try {

      const match = (await lookup(record.callSign)).find((entry) => entry.stationId === record.stationId);

      if(match) {

        result.push(applyLookup(record, match));
        enriched++;

        continue;
      }
    } catch(error) {

      LOG.debug("cache:enrich", "Call sign lookup for %s failed: %s.", record.callSign, formatError(error));
    }

    result.push(record);
  }

  LOG.debug("cache:enrich", "Enriched %s of %s stations through %s call sign lookups.", enriched, records.length, lookups);

  return { enriched, records: result };
}

/**
 * Runs the caching pipeline over the configured markets.
 * @param configuredMarkets - The configured markets. Normalized and de-duplicated before use.
 * @param forceRefresh - When true, the ledger and manifest are ignored and every market and lineup is fetched again.
 * @param deps - The pipeline dependencies.
 * @returns The run summary.
 * @throws CachingInProgressError when another run is active, NoMarketsConfiguredError when no market is configured, or LedgerWriteError when the ledger cannot be
 * written.
 */
export async function runCaching(configuredMarkets: readonly Market[], forceRefresh: boolean, deps: CachingDeps): Promise<CachingSummary> {

  if(cachingActive) {

    throw new CachingInProgressError();
  }

  const markets = uniqueMarkets(configuredMarkets);

  if(markets.length === 0) {

    throw new NoMarketsConfiguredError();
  }

  cachingActive = true;

  try {

    return await executeRun(markets, forceRefresh, deps);
  } finally {

    cachingActive = false;
  }
}

async function executeRun(markets: Market[], forceRefresh: boolean, deps: CachingDeps): Promise<CachingSummary> {

  const elapsed = startTimer();
  const summary = emptySummary(markets.length);
  const { guide, ledger, manifest } = deps;

  LOG.info("Caching %s %s%s.", markets.length, (markets.length === 1) ? "market" : "markets", forceRefresh ? " (forced refresh)" : "");

  if(await manifest.isStale(deps.paths.baseStationsFile)) {

    LOG.warn("The coverage manifest is older than the base station store. Some covered markets may be fetched again.");
  }

  // Phase 1: market resolution.
  const lineupDetails = new Map<string, { lineup: LineupSummary; market: Market }>();
  const pending: PendingMarket[] = [];

  for(const market of markets) {

    const { country, postalCode } = market;

    if(!forceRefresh && ledger.isMarketProcessed(country, postalCode)) {

      summary.marketsAlreadyProcessed++;

      continue;
    }

    if(!forceRefresh && manifest.isMarketCovered(country, postalCode)) {

      await ledger.recordMarket(country, postalCode, 0);
      summary.marketsSkippedByManifest++;

      LOG.debug("cache:pipeline", "Market %s/%s is covered by the base store.", country, postalCode);

      continue;
    }

    let lineups: LineupSummary[];

    try {

      lineups = await guide.fetchLineups(country, postalCode);
    } catch(error) {

      LOG.warn("Unable to list lineups for %s/%s: %s.", country, postalCode, formatError(error));

      await ledger.recordMarket(country, postalCode, 0);
      summary.marketsFailed++;

      continue;
    }

    if(lineups.length === 0) {

      LOG.warn("No lineups found for %s/%s. Check that the postal code is valid.", country, postalCode);

      await ledger.recordMarket(country, postalCode, 0);
      summary.marketsFailed++;

      continue;
    }

    pending.push({ lineupIds: lineups.map((lineup) => lineup.lineupId), market, recorded: false });

    // The lineup summaries travel with the first market that listed each lineup.
    for(const lineup of lineups) {

      if(!lineupDetails.has(lineup.lineupId)) {

        lineupDetails.set(lineup.lineupId, { lineup, market });
      }
    }
  }

  // Phase 2: lineup de-duplication. Map insertion order is discovery order.
  summary.lineupsDiscovered = lineupDetails.size;

  const discovered = new Map([...lineupDetails].map(([ lineupId, entry ]) => [ lineupId, entry.market ]));
  const handled = new Set<string>();

  // Records every pending market whose lineups have all been handled.
  const recordCompletedMarkets = async (): Promise<void> => {

    for(const entry of pending) {

      if(entry.recorded || !entry.lineupIds.every((lineupId) => handled.has(lineupId))) {

        continue;
      }

      await ledger.recordMarket(entry.market.country, entry.market.postalCode, entry.lineupIds.length);

      entry.recorded = true;
      summary.marketsProcessed++;
    }
  };

  // Phase 3: station fetch.
  for(const [ lineupId, { lineup } ] of lineupDetails) {

    const origin = resolveLineupOrigin(lineupId, discovered, ledger);

    if(!forceRefresh && ledger.isLineupProcessed(lineupId)) {

      summary.lineupsSkippedByLedger++;
    } else if(!forceRefresh && manifest.isLineupCovered(lineupId)) {

      await ledger.recordLineup(lineupId, origin.country, origin.postalCode, 0);
      summary.lineupsSkippedByManifest++;
    } else {

      let stations: StationRecord[] | null = null;

      try {

        stations = await guide.fetchStations(lineupId);
      } catch(error) {

        LOG.warn("Unable to fetch stations for lineup %s: %s.", lineupId, formatError(error));
      }

      if(stations) {

        if(stations.length > 0) {

          const stagedLineup: StagedLineup = { country: origin.country, lineupId, stations };

          if(lineup.name) {

            stagedLineup.lineupName = lineup.name;
          }

          if(lineup.location) {

            stagedLineup.location = lineup.location;
          }

          if(lineup.type) {

            stagedLineup.type = lineup.type;
          }

          await stageLineup(deps.paths.stagingDir, stagedLineup);
        }

        summary.lineupsFetched++;
      } else {

        summary.lineupsFailed++;
      }

      await ledger.recordLineup(lineupId, origin.country, origin.postalCode, stations?.length ?? 0);

      LOG.debug("cache:pipeline", "Lineup %s (%s): %s stations.", lineupId, origin.country, stations?.length ?? 0);
    }

    handled.add(lineupId);

    await recordCompletedMarkets();
  }

  // Phase 4: tagging, including anything an interrupted run left staged.
  const staged = await readStagedLineups(deps.paths.stagingDir);
  const tagged = staged.flatMap((entry) => tagStagedStations(entry.lineup));

  summary.stationsRaw = tagged.length;

  // Phase 5: de-duplication.
  const deduplicated = dedupeStations(tagged);

  summary.duplicatesRemoved = deduplicated.duplicatesRemoved;
  summary.stationsDeduplicated = deduplicated.records.length;

  // Phase 6: enrichment.
  const enrichment = await enrichStations(deduplicated.records, deps);

  summary.enriched = enrichment.enriched;

  // Phase 7: merge into the user store.
  const existing = await readStations(deps.paths.userStationsFile);

  summary.userStoreTotal = existing.length;

  if(enrichment.records.length > 0) {

    const merged = mergeIntoUserStore(existing, enrichment.records);

    await backupUserStore(deps.paths);
    await writeStations(deps.paths.userStationsFile, merged.records);

    summary.stationsAdded = merged.added;
    summary.stationsUpdated = merged.updated;
    summary.userStoreTotal = merged.records.length;

    // Phase 8: the combined view no longer reflects the user store.
    await invalidateCombinedView(deps);
  }

  await removeStagedFiles(staged.map((entry) => entry.file));

  summary.elapsedMs = elapsed();

  LOG.info("Caching finished in %s: %s markets processed, %s lineups fetched, %s stations added, %s updated. The user store holds %s stations.",
    formatDuration(summary.elapsedMs), summary.marketsProcessed, summary.lineupsFetched, summary.stationsAdded, summary.stationsUpdated, summary.userStoreTotal);

  return summary;
}
