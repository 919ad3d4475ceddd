/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * search.ts: Station search routes for StationBase.
 */
import type { Express } from "express";
import type { JsonResponder } from "./errors.js";
import type { SearchMode, SearchQuery } from "../types/index.js";
import { availableCountries, search } from "../stations/index.js";
import type { StationRuntime } from "../stations/index.js";
import { sendError } from "./errors.js";

/* GET /search takes the term in "q" along with optional "page", "mode" (count, tsv, or full), "country", and "resolution" parameters. Country and resolution
 * replace the configured filters for that request only.
 */

const SEARCH_MODES: readonly SearchMode[] = [ "count", "full", "tsv" ];

/**
 * Parses search query string parameters.
 * @param params - The query string parameters.
 * @returns The search query, or an error message when a parameter is invalid.
 */
export function parseSearchQuery(params: Record<string, unknown>): SearchQuery | string {

  const term = params.q;

  if((typeof term !== "string") || (term.trim().length === 0)) {

    return "The q parameter is required.";
  }

  const query: SearchQuery = { mode: "full", page: 1, term: term.trim() };

  if(params.mode !== undefined) {

    const mode = SEARCH_MODES.find((entry) => entry === params.mode);

    if(!mode) {

      return "The mode parameter must be one of: " + SEARCH_MODES.join(", ") + ".";
    }

    query.mode = mode;
  }

  if(typeof params.page === "string") {

    const page = Number.parseInt(params.page, 10);

    if(Number.isNaN(page)) {

      return "The page parameter must be a number.";
    }

    query.page = page;
  }

  if((typeof params.country === "string") && params.country.trim()) {

    query.country = params.country.trim().toUpperCase();
  }

  if((typeof params.resolution === "string") && params.resolution.trim()) {

    query.resolution = params.resolution.trim().toUpperCase();
  }

  return query;
}

/**
 * Handles GET /search.
 * @param runtime - The station runtime.
 * @returns The request handler.
 */
export function handleSearch(runtime: StationRuntime): (req: { query: Record<string, unknown> }, res: JsonResponder) => Promise<void> {

  return async (req, res): Promise<void> => {

    const query = parseSearchQuery(req.query);

    if(typeof query === "string") {

      res.status(400).json({ error: query });

      return;
    }

    try {

      res.json(await search(query, runtime.searchConfig, runtime));
    } catch(error) {

      sendError(res, error);
    }
  };
}

/**
 * Handles GET /countries.
 * @param runtime - The station runtime.
 * @returns The request handler.
 */
export function handleCountries(runtime: StationRuntime): (req: unknown, res: JsonResponder) => Promise<void> {

  return async (_req, res): Promise<void> => {

    try {

      const countries = await availableCountries(runtime);

      res.json({ count: countries.length, countries });
    } catch(error) {

      sendError(res, error);
    }
  };
}

/**
 * Creates the search endpoints.
 * @param app - The Express application.
 * @param runtime - The station runtime.
 */
export function setupSearchEndpoints(app: Express, runtime: StationRuntime): void {

  app.get("/search", handleSearch(runtime));
  app.get("/countries", handleCountries(runtime));
}
