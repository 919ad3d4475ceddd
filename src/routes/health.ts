/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * health.ts: Health check route for StationBase.
 */
import type { Express, Request, Response } from "express";
import { getPackageVersion } from "../utils/index.js";
import { isCachingActive } from "../stations/index.js";

/* The health endpoint is a liveness check for monitoring systems. It never touches the station stores; GET /status reports on those.
 */

/**
 * Creates a health check endpoint.
 * @param app - The Express application.
 */
export function setupHealthEndpoint(app: Express): void {

  app.get("/health", (_req: Request, res: Response): void => {

    const memoryUsage = process.memoryUsage();

    res.json({

      cachingActive: isCachingActive(),
      memory: {

        heapTotal: memoryUsage.heapTotal,
        heapUsed: memoryUsage.heapUsed,
        rss: memoryUsage.rss
      },
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: getPackageVersion()
    });
  });
}
