/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * errors.ts: Error responses for StationBase routes.
 */
import { CachingInProgressError, LOG, LedgerWriteError, NoMarketsConfiguredError, NoStationsAvailableError, formatError } from "../utils/index.js";

/**
 * The part of an Express response the route handlers use. Handlers take this rather than Response so they can be called directly.
 */
export interface JsonResponder {

  json(body: unknown): unknown;
  status(code: number): JsonResponder;
}

/**
 * An HTTP status and JSON body describing a failure.
 */
export interface ErrorResponse {

  body: { error: string; remediation?: string };
  status: number;
}

/**
 * Maps an error to the response a route sends. The named errors carry remediation text; anything else is an internal error.
 * @param error - The error.
 * @returns The response.
 */
export function toErrorResponse(error: unknown): ErrorResponse {

  if(error instanceof NoStationsAvailableError) {

    return {

      body: { error: error.message, remediation: "Add markets with POST /markets and run POST /cache, or install the base station snapshot in the data directory." },
      status: 503
    };
  }

  if(error instanceof NoMarketsConfiguredError) {

    return { body: { error: error.message, remediation: "Add a market with POST /markets { \"country\": \"USA\", \"postalCode\": \"10001\" }." }, status: 400 };
  }

  if(error instanceof CachingInProgressError) {

    return { body: { error: error.message, remediation: "Wait for the current run to finish. GET /status reports when it is done." }, status: 409 };
  }

  if(error instanceof LedgerWriteError) {

    return { body: { error: error.message, remediation: "Check that the data directory is writable, then run POST /cache again to resume." }, status: 500 };
  }

  return { body: { error: "Internal server error: " + formatError(error) + "." }, status: 500 };
}

/**
 * Sends the response for an error, logging anything that is not one of the named errors.
 * @param res - The Express response.
 * @param error - The error.
 */
export function sendError(res: JsonResponder, error: unknown): void {

  const response = toErrorResponse(error);

  if(response.status === 500) {

    LOG.error("Request failed: %s.", formatError(error));
  }

  res.status(response.status).json(response.body);
}
