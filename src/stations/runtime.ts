/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * runtime.ts: Wiring between the configuration and the station subsystem.
 */
import type { CacheStateStore } from "../config/index.js";
import { CONFIG, getConfigCacheStateStore, getSearchConfig } from "../config/index.js";
import type { CachingDeps, CachingSummary } from "./pipeline.js";
import type { CombinedCacheState, Config, Nullable, SearchConfig } from "../types/index.js";
import { isCachingActive, runCaching } from "./pipeline.js";
import { CoverageManifest } from "./manifest.js";
import type { EffectiveStore } from "./consolidate.js";
import type { GuideDataSource } from "../guide/client.js";
import { HttpGuideClient } from "../guide/client.js";
import type { LedgerSummary } from "./ledger.js";
import type { ManifestSummary } from "./manifest.js";
import { ProcessingLedger } from "./ledger.js";
import type { StationPaths } from "../config/paths.js";
import type { StoreStatus } from "./store.js";
import { getStationPaths } from "../config/paths.js";
import { getStoreStatus } from "./store.js";
import { isFresh } from "./consolidate.js";
import { loadMarkets, removeMarket } from "../config/markets.js";
import { CachingInProgressError, LOG } from "../utils/index.js";

/*
 * STATION RUNTIME
 *
 * The station modules take every dependency as an argument. This module builds those dependencies from the active configuration once, so the HTTP routes and the
 * CLI commands share the same wiring. The ledger and the manifest are loaded fresh for each caching run, since another command may have changed them on disk.
 */

/**
 * The long-lived dependencies of the station subsystem.
 */
export interface StationRuntime {

  cacheState: CacheStateStore;
  enrichment: { delay: number; enabled: boolean };
  guide: GuideDataSource;
  paths: StationPaths;
  searchConfig: SearchConfig;
}

/**
 * Everything the status endpoint and the status command report.
 */
export interface StatusReport {

  cacheState: CombinedCacheState;
  cachingActive: boolean;
  combinedFresh: boolean;
  effectiveStore: Nullable<EffectiveStore>;
  ledger: LedgerSummary;
  manifest: ManifestSummary & { stale: boolean };
  marketsConfigured: number;
  stores: StoreStatus;
}

/**
 * Builds the station runtime from a configuration.
 * @param config - The configuration. Defaults to CONFIG.
 * @param overrides - Replacement dependencies, used by tests to point the runtime at a temporary directory or a fake guide source.
 * @returns The runtime.
 */
export function createStationRuntime(config: Config = CONFIG, overrides: Partial<StationRuntime> = {}): StationRuntime {

  return {

    cacheState: overrides.cacheState ?? getConfigCacheStateStore(),
    enrichment: overrides.enrichment ?? { delay: config.guide.enrichmentDelay, enabled: config.guide.enrichment },
    guide: overrides.guide ?? new HttpGuideClient(config.guide),
    paths: overrides.paths ?? getStationPaths(config),
    searchConfig: overrides.searchConfig ?? getSearchConfig(config)
  };
}

/**
 * Loads the ledger and the manifest and combines them with the runtime into pipeline dependencies.
 * @param runtime - The station runtime.
 * @returns The pipeline dependencies.
 */
export async function prepareCachingDeps(runtime: StationRuntime): Promise<CachingDeps> {

  const [ ledger, manifest ] = await Promise.all([ ProcessingLedger.load(runtime.paths), CoverageManifest.load(runtime.paths.baseManifestFile) ]);

  return { cacheState: runtime.cacheState, enrichment: runtime.enrichment, guide: runtime.guide, ledger, manifest, paths: runtime.paths };
}

/**
 * Runs the caching pipeline over the markets in markets.json.
 * @param runtime - The station runtime.
 * @param forceRefresh - Whether to ignore the ledger and the manifest.
 * @returns The run summary.
 */
export async function cacheConfiguredMarkets(runtime: StationRuntime, forceRefresh: boolean): Promise<CachingSummary> {

  const markets = await loadMarkets(runtime.paths.marketsFile);

  return runCaching(markets, forceRefresh, await prepareCachingDeps(runtime));
}

/**
 * Removes a configured market and forgets it in the processing ledger, so adding it back fetches it again. A running pipeline rewrites the ledger from its own
 * copy, so both edits are refused while a run is active.
 * @param runtime - The station runtime.
 * @param country - The raw country code.
 * @param postalCode - The raw postal code.
 * @returns Whether the market was configured, and whether the ledger had processed it.
 * @throws CachingInProgressError while a caching run is active.
 */
export async function removeConfiguredMarket(runtime: StationRuntime, country: string, postalCode: string): Promise<{ forgotten: boolean; removed: boolean }> {

  if(isCachingActive()) {

    throw new CachingInProgressError();
  }

  if(!(await removeMarket(runtime.paths.marketsFile, country, postalCode))) {

    return { forgotten: false, removed: false };
  }

  const forgotten = await (await ProcessingLedger.load(runtime.paths)).forgetMarket(country, postalCode);

  return { forgotten, removed: true };
}

/**
 * Forgets every processed market and lineup, so the next run fetches everything again.
 * @param runtime - The station runtime.
 * @throws CachingInProgressError while a caching run is active.
 */
export async function clearProcessingLedger(runtime: StationRuntime): Promise<void> {

  if(isCachingActive()) {

    throw new CachingInProgressError();
  }

  await (await ProcessingLedger.load(runtime.paths)).clear();

  LOG.info("Cleared the processing ledger.");
}

/**
 * Gathers the state of the stores, the ledger, and the manifest.
 * @param runtime - The station runtime.
 * @returns The status report.
 */
export async function getStatusReport(runtime: StationRuntime): Promise<StatusReport> {

  const [ stores, ledger, manifest, markets, combinedFresh ] = await Promise.all([ getStoreStatus(runtime.paths), ProcessingLedger.load(runtime.paths),
    CoverageManifest.load(runtime.paths.baseManifestFile), loadMarkets(runtime.paths.marketsFile), isFresh(runtime) ]);

  let effectiveStore: Nullable<EffectiveStore> = null;

  // Reporting never builds anything, so a stale combined view reports no effective store until the next search or rebuild.
  if(!stores.user.empty && !stores.base.empty) {

    effectiveStore = combinedFresh ? { kind: "combined", path: runtime.paths.combinedStationsFile, rebuilt: false } : null;
  } else if(!stores.user.empty) {

    effectiveStore = { kind: "user", path: runtime.paths.userStationsFile, rebuilt: false };
  } else if(!stores.base.empty) {

    effectiveStore = { kind: "base", path: runtime.paths.baseStationsFile, rebuilt: false };
  }

  return {

    cacheState: runtime.cacheState.load(),
    cachingActive: isCachingActive(),
    combinedFresh,
    effectiveStore,
    ledger: ledger.summary(),
    manifest: { ...manifest.summary(), stale: await manifest.isStale(runtime.paths.baseStationsFile) },
    marketsConfigured: markets.length,
    stores
  };
}
