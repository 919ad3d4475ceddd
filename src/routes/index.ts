/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Route aggregator for StationBase.
 */
import type { Express } from "express";
import type { StationRuntime } from "../stations/index.js";
import { setupCacheEndpoints } from "./cache.js";
import { setupHealthEndpoint } from "./health.js";
import { setupMarketsEndpoints } from "./markets.js";
import { setupSearchEndpoints } from "./search.js";
import { setupStationsEndpoint } from "./stations.js";
import { setupStatusEndpoint } from "./status.js";

/*
 * ROUTE SETUP
 *
 * This module aggregates all route setup functions and provides a single function to configure all HTTP endpoints on the Express application.
 */

/**
 * Configures all HTTP endpoints on the Express application.
 * @param app - The Express application.
 * @param runtime - The station runtime shared by every route.
 */
export function setupRoutes(app: Express, runtime: StationRuntime): void {

  setupCacheEndpoints(app, runtime);
  setupHealthEndpoint(app);
  setupMarketsEndpoints(app, runtime);
  setupSearchEndpoints(app, runtime);
  setupStationsEndpoint(app, runtime);
  setupStatusEndpoint(app, runtime);
}

export { handleCacheRebuild, handleCacheRun, handleLedgerClear } from "./cache.js";
export { handleCountries, handleSearch, parseSearchQuery } from "./search.js";
export { handleMarketAdd, handleMarketList, handleMarketRemove } from "./markets.js";
export { sendError, toErrorResponse } from "./errors.js";
export type { JsonResponder } from "./errors.js";
