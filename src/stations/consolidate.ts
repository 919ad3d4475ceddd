/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * consolidate.ts: Combined view construction for StationBase.
 */
import { LOG, NoStationsAvailableError, formatError, isMissingFileError, startTimer } from "../utils/index.js";
import { fileMtime, isStoreEmpty, readStations, sortByName, writeStations } from "./store.js";
import type { CacheStateStore } from "../config/index.js";
import type { StationPaths } from "../config/paths.js";
import fs from "node:fs";

const { promises: fsPromises } = fs;

// Builds in flight, keyed by combined view path. Concurrent searches on a stale view wait on the same build.
const pendingBuilds = new Map<string, Promise<number>>();

/*
 * CACHE CONSOLIDATION
 *
 * Searches run against a single file, the effective store. Which file that is depends on which stores hold records:
 *
 * - Only the base store: the base store.
 * - Only the user store: the user store.
 * - Both: the combined view, where a user record replaces the base record with the same stationId.
 * - Neither: NoStationsAvailableError.
 *
 * Building the combined view reads and rewrites every record, so it is reused while it is fresh. The view is fresh when its mtime is newer than both source mtimes,
 * or when the freshness token saved with the last build matches the current source mtimes exactly. The second test covers a view whose mtime was disturbed by a
 * copy or restore.
 */

/**
 * Which file searches should read.
 */
export interface EffectiveStore {

  kind: "base" | "combined" | "user";
  path: string;
  rebuilt: boolean;
}

/**
 * Dependencies of the consolidation engine.
 */
export interface ConsolidationDeps {

  cacheState: CacheStateStore;
  paths: Pick<StationPaths, "baseStationsFile" | "combinedStationsFile" | "userStationsFile">;
}

/**
 * Checks whether the combined view on disk can be used as is.
 * @param deps - The consolidation dependencies.
 * @returns True if the combined view exists and is fresh.
 */
export async function isFresh(deps: ConsolidationDeps): Promise<boolean> {

  const [ combinedTime, baseTime, userTime ] = await Promise.all([ fileMtime(deps.paths.combinedStationsFile), fileMtime(deps.paths.baseStationsFile),
    fileMtime(deps.paths.userStationsFile) ]);

  if((combinedTime === 0) || (await isStoreEmpty(deps.paths.combinedStationsFile))) {

    return false;
  }

  if((combinedTime > baseTime) && (combinedTime > userTime)) {

    return true;
  }

  const token = deps.cacheState.load();

  return (token.combinedTimestamp > 0) && (token.baseTimestamp === baseTime) && (token.userTimestamp === userTime);
}

// Merges the base and user stores into the combined view and saves the freshness token. Returns the number of records written.
async function buildCombinedView(deps: ConsolidationDeps): Promise<number> {

  const elapsed = startTimer();

  // Source mtimes are captured before reading, so a store that changes mid-build leaves a token that no longer matches.
  const [ baseTime, userTime ] = await Promise.all([ fileMtime(deps.paths.baseStationsFile), fileMtime(deps.paths.userStationsFile) ]);
  const [ base, user ] = await Promise.all([ readStations(deps.paths.baseStationsFile), readStations(deps.paths.userStationsFile) ]);
  const userIds = new Set(user.map((record) => record.stationId));
  const combined = sortByName([ ...base.filter((record) => !userIds.has(record.stationId)), ...user ]);

  await writeStations(deps.paths.combinedStationsFile, combined);

  await deps.cacheState.save({ baseTimestamp: baseTime, combinedTimestamp: await fileMtime(deps.paths.combinedStationsFile), userTimestamp: userTime });

  LOG.debug("cache:consolidate", "Built the combined view from %s base and %s user records: %s records in %sms.", base.length, user.length, combined.length,
    elapsed());

  return combined.length;
}

// Starts a combined view build, or joins the one already running for the same view.
function sharedBuild(deps: ConsolidationDeps): Promise<number> {

  const key = deps.paths.combinedStationsFile;
  const pending = pendingBuilds.get(key);

  if(pending) {

    LOG.debug("cache:consolidate", "Waiting on the combined view build already in progress.");

    return pending;
  }

  const build = buildCombinedView(deps).finally(() => pendingBuilds.delete(key));

  pendingBuilds.set(key, build);

  return build;
}

/**
 * Resolves the store searches should read, rebuilding the combined view when it is stale. Callers that find the view stale while a build is running wait for that
 * build. A failed rebuild is logged and falls back to the base store.
 * @param deps - The consolidation dependencies.
 * @returns The effective store.
 * @throws NoStationsAvailableError when both stores are empty.
 */
export async function resolveEffectiveStore(deps: ConsolidationDeps): Promise<EffectiveStore> {

  const [ baseEmpty, userEmpty ] = await Promise.all([ isStoreEmpty(deps.paths.baseStationsFile), isStoreEmpty(deps.paths.userStationsFile) ]);

  if(userEmpty) {

    if(baseEmpty) {

      throw new NoStationsAvailableError();
    }

    return { kind: "base", path: deps.paths.baseStationsFile, rebuilt: false };
  }

  if(baseEmpty) {

    return { kind: "user", path: deps.paths.userStationsFile, rebuilt: false };
  }

  if(await isFresh(deps)) {

    return { kind: "combined", path: deps.paths.combinedStationsFile, rebuilt: false };
  }

  try {

    await sharedBuild(deps);
  } catch(error) {

    LOG.error("Unable to build the combined station view: %s. Searching the base store only.", formatError(error));

    return { kind: "base", path: deps.paths.baseStationsFile, rebuilt: false };
  }

  return { kind: "combined", path: deps.paths.combinedStationsFile, rebuilt: true };
}

/**
 * Rebuilds the combined view regardless of freshness. When only one store holds records there is nothing to combine; any old combined view is removed and the
 * populated store is returned.
 * @param deps - The consolidation dependencies.
 * @returns The effective store.
 * @throws NoStationsAvailableError when both stores are empty, or the underlying error when the rebuild fails.
 */
export async function rebuildCombinedView(deps: ConsolidationDeps): Promise<EffectiveStore> {

  const [ baseEmpty, userEmpty ] = await Promise.all([ isStoreEmpty(deps.paths.baseStationsFile), isStoreEmpty(deps.paths.userStationsFile) ]);

  if(baseEmpty || userEmpty) {

    await invalidateCombinedView(deps);

    return resolveEffectiveStore(deps);
  }

  const records = await sharedBuild(deps);

  LOG.info("Rebuilt the combined station view with %s records.", records);

  return { kind: "combined", path: deps.paths.combinedStationsFile, rebuilt: true };
}

/**
 * Deletes the combined view and clears the freshness token. The next resolveEffectiveStore() call rebuilds the view.
 * @param deps - The consolidation dependencies.
 */
export async function invalidateCombinedView(deps: ConsolidationDeps): Promise<void> {

  try {

    await fsPromises.unlink(deps.paths.combinedStationsFile);
  } catch(error) {

    if(!isMissingFileError(error)) {

      throw error;
    }
  }

  await deps.cacheState.save({ baseTimestamp: 0, combinedTimestamp: 0, userTimestamp: 0 });

  LOG.debug("cache:consolidate", "Invalidated the combined view.");
}
