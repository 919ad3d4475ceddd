/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * stations.ts: Station lookup route for StationBase.
 */
import type { Express, Request, Response } from "express";
import type { StationRuntime } from "../stations/index.js";
import { findStationById } from "../stations/index.js";
import { sendError } from "./errors.js";

/* The channel-manager integration resolves a search result to its full record through this endpoint.
 */

/**
 * Creates an endpoint returning a single station record.
 * @param app - The Express application.
 * @param runtime - The station runtime.
 */
export function setupStationsEndpoint(app: Express, runtime: StationRuntime): void {

  app.get("/stations/:stationId", async (req: Request<{ stationId: string }>, res: Response): Promise<void> => {

    try {

      const station = await findStationById(req.params.stationId, runtime);

      if(!station) {

        res.status(404).json({ error: "Station not found." });

        return;
      }

      res.json(station);
    } catch(error) {

      sendError(res, error);
    }
  });
}
