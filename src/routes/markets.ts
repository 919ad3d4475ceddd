/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * markets.ts: Configured market routes for StationBase.
 */
import { ProcessingLedger, removeConfiguredMarket } from "../stations/index.js";
import { addMarket, loadMarkets, validateMarket } from "../config/markets.js";
import type { Express } from "express";
import type { JsonResponder } from "./errors.js";
import type { StationRuntime } from "../stations/index.js";
import { isPlainObject } from "../utils/index.js";
import { sendError } from "./errors.js";

/* The configured markets drive the caching pipeline. Listing them also reports whether each one has been processed, so an operator can see what the next
 * POST /cache will fetch. Removing a market forgets it in the processing ledger as well, so adding it back fetches it again.
 */

/**
 * Handles GET /markets.
 * @param runtime - The station runtime.
 * @returns The request handler.
 */
export function handleMarketList(runtime: StationRuntime): (req: unknown, res: JsonResponder) => Promise<void> {

  return async (_req, res): Promise<void> => {

    try {

      const [ markets, ledger ] = await Promise.all([ loadMarkets(runtime.paths.marketsFile), ProcessingLedger.load(runtime.paths) ]);

      res.json({

        count: markets.length,
        markets: markets.map((market) => ({ ...market, processed: ledger.isMarketProcessed(market.country, market.postalCode) }))
      });
    } catch(error) {

      sendError(res, error);
    }
  };
}

/**
 * Handles POST /markets with a JSON body of { country, postalCode }. Older clients send "zip" in place of "postalCode".
 * @param runtime - The station runtime.
 * @returns The request handler.
 */
export function handleMarketAdd(runtime: StationRuntime): (req: { body?: unknown }, res: JsonResponder) => Promise<void> {

  return async (req, res): Promise<void> => {

    const body = req.body;
    const country = isPlainObject(body) ? body.country : undefined;
    const postalCode = isPlainObject(body) ? (body.postalCode ?? body.zip) : undefined;

    if((typeof country !== "string") || ((typeof postalCode !== "string") && (typeof postalCode !== "number"))) {

      res.status(400).json({ error: "The request body must be a JSON object with country and postalCode." });

      return;
    }

    const problem = validateMarket(country, String(postalCode));

    if(problem) {

      res.status(400).json({ error: problem });

      return;
    }

    try {

      const result = await addMarket(runtime.paths.marketsFile, country, String(postalCode));

      res.status(result.added ? 201 : 200).json(result);
    } catch(error) {

      sendError(res, error);
    }
  };
}

/**
 * Handles DELETE /markets/:country/:postalCode.
 * @param runtime - The station runtime.
 * @returns The request handler.
 */
export function handleMarketRemove(runtime: StationRuntime): (req: { params: { country: string; postalCode: string } }, res: JsonResponder) => Promise<void> {

  return async (req, res): Promise<void> => {

    try {

      const result = await removeConfiguredMarket(runtime, req.params.country, req.params.postalCode);

      if(!result.removed) {

        res.status(404).json({ error: "Market not configured." });

        return;
      }

      res.json(result);
    } catch(error) {

      sendError(res, error);
    }
  };
}

/**
 * Creates the market listing and editing endpoints.
 * @param app - The Express application.
 * @param runtime - The station runtime.
 */
export function setupMarketsEndpoints(app: Express, runtime: StationRuntime): void {

  app.get("/markets", handleMarketList(runtime));
  app.post("/markets", handleMarketAdd(runtime));
  app.delete("/markets/:country/:postalCode", handleMarketRemove(runtime));
}
