/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * cache.ts: Caching and consolidation routes for StationBase.
 */
import type { JsonResponder } from "./errors.js";
import { cacheConfiguredMarkets, clearProcessingLedger, clearSearchCache, rebuildCombinedView } from "../stations/index.js";
import type { Express } from "express";
import type { StationRuntime } from "../stations/index.js";
import { isPlainObject } from "../utils/index.js";
import { sendError } from "./errors.js";

/* POST /cache runs the caching pipeline and responds with its summary once the run ends. Runs can take minutes for large market lists; a second request while one
 * is active is refused with 409. POST /cache/rebuild rebuilds the combined view, and DELETE /cache/ledger forgets every processed market and lineup so the next
 * run fetches everything again. The ledger can't be cleared while a run is active.
 */

/**
 * Handles POST /cache. A JSON body of { "force": true } ignores the ledger and the manifest.
 * @param runtime - The station runtime.
 * @returns The request handler.
 */
export function handleCacheRun(runtime: StationRuntime): (req: { body?: unknown }, res: JsonResponder) => Promise<void> {

  return async (req, res): Promise<void> => {

    const body = req.body;
    const force = isPlainObject(body) && (body.force === true);

    try {

      res.json(await cacheConfiguredMarkets(runtime, force));
    } catch(error) {

      sendError(res, error);
    }
  };
}

/**
 * Handles POST /cache/rebuild.
 * @param runtime - The station runtime.
 * @returns The request handler.
 */
export function handleCacheRebuild(runtime: StationRuntime): (req: unknown, res: JsonResponder) => Promise<void> {

  return async (_req, res): Promise<void> => {

    try {

      const store = await rebuildCombinedView(runtime);

      clearSearchCache();

      res.json(store);
    } catch(error) {

      sendError(res, error);
    }
  };
}

/**
 * Handles DELETE /cache/ledger.
 * @param runtime - The station runtime.
 * @returns The request handler.
 */
export function handleLedgerClear(runtime: StationRuntime): (req: unknown, res: JsonResponder) => Promise<void> {

  return async (_req, res): Promise<void> => {

    try {

      await clearProcessingLedger(runtime);

      res.json({ cleared: true });
    } catch(error) {

      sendError(res, error);
    }
  };
}

/**
 * Creates the caching endpoints.
 * @param app - The Express application.
 * @param runtime - The station runtime.
 */
export function setupCacheEndpoints(app: Express, runtime: StationRuntime): void {

  app.post("/cache", handleCacheRun(runtime));
  app.post("/cache/rebuild", handleCacheRebuild(runtime));
  app.delete("/cache/ledger", handleLedgerClear(runtime));
}
