/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * status.ts: Station database status route for StationBase.
 */
import type { Express, Request, Response } from "express";
import { configParseError, configParseErrorMessage } from "../config/index.js";
import type { StationRuntime } from "../stations/index.js";
import { getStatusReport } from "../stations/index.js";
import { sendError } from "./errors.js";

/**
 * Creates an endpoint reporting the store breakdown, the ledger and manifest summaries, and combined view freshness.
 * @param app - The Express application.
 * @param runtime - The station runtime.
 */
export function setupStatusEndpoint(app: Express, runtime: StationRuntime): void {

  app.get("/status", async (_req: Request, res: Response): Promise<void> => {

    try {

      const report = await getStatusReport(runtime);

      res.json({ ...report, configParseError: configParseError ? (configParseErrorMessage ?? "unknown error") : null });
    } catch(error) {

      sendError(res, error);
    }
  });
}
