/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.ts: Express application builder for StationBase.
 */
import { CONFIG, applyCliOverrides, displayConfiguration, initializeConfiguration, validateConfiguration } from "./config/index.js";
import type { CliOverrides } from "./config/index.js";
import type { Express, NextFunction, Request, Response } from "express";
import { LOG, MORGAN_FORMAT, createMorganStream, formatError, setConsoleLogging } from "./utils/index.js";
import { initializeFileLogger, shutdownFileLogger } from "./utils/fileLogger.js";
import type { LoggingConfig } from "./types/index.js";
import type { Nullable } from "./types/index.js";
import type { Server } from "http";
import type { StationRuntime } from "./stations/index.js";
import consoleStamp from "console-stamp";
import { createStationRuntime } from "./stations/index.js";
import express from "express";
import { getLogFilePath } from "./config/paths.js";
import morgan from "morgan";
import { setupRoutes } from "./routes/index.js";

/*
 * LOGGING MODE
 *
 * The logging mode is set at startup based on the --console CLI flag. When console logging is enabled, timestamps are added via console-stamp and output goes to
 * stdout/stderr. When file logging is used (the default), output goes to <data-dir>/stationbase.log.
 */

// Track whether console logging is enabled, set during initializeEnvironment().
let usingConsoleLogging = false;

/*
 * APPLICATION STATE
 *
 * The HTTP server instance is stored globally so it can be closed during graceful shutdown.
 */

let server: Nullable<Server> = null;

/*
 * GRACEFUL SHUTDOWN
 */

/**
 * Sets up signal handlers for graceful shutdown. When SIGINT or SIGTERM is received, we close the HTTP server and flush the file logger before exiting. A caching
 * run interrupted this way resumes from the processing ledger on its next start.
 */
function setupGracefulShutdown(): void {

  let shutdownInProgress = false;

  function shutdown(): void {

    // Prevent multiple shutdown attempts if multiple signals are received.
    if(shutdownInProgress) {

      return;
    }

    shutdownInProgress = true;

    LOG.info("Shutting down.");

    try {

      if(server) {

        server.close((): void => {

          LOG.info("HTTP server closed successfully.");
        });
      }
    } catch(error) {

      LOG.error("Error closing server during shutdown: %s.", formatError(error));
    }

    // Shut down file logger if in use.
    if(!usingConsoleLogging) {

      shutdownFileLogger();
    }

    process.exit(0);
  }

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

/*
 * HTTP REQUEST LOGGING
 *
 * Morgan output goes through morganStream, which handles timestamp formatting consistently for both console and file logging modes. The httpLogLevel setting picks
 * which requests are logged:
 *
 * - "all": every request.
 * - "errors": 4xx and 5xx responses, except 404s for assets browsers request on their own.
 * - "filtered": errors, state-changing requests, and everything except successful polling of /health and /status.
 * - "none": nothing.
 */

// Patterns for browser-initiated asset requests that return 404. These are noise from browsers automatically requesting files that don't exist.
const BROWSER_ASSET_PATTERNS = [ "/apple-touch-icon", "/favicon", "/robots.txt", "/site.webmanifest" ];

// High-frequency endpoints skipped in filtered mode when successful.
const POLLING_PATTERNS = [ "/health", "/status" ];

/**
 * Decides whether a request is left out of the HTTP log.
 * @param level - The HTTP log level.
 * @param method - The request method.
 * @param url - The request URL.
 * @param statusCode - The response status.
 * @returns True if the request should not be logged.
 */
export function shouldSkipRequestLog(level: LoggingConfig["httpLogLevel"], method: string, url: string, statusCode: number): boolean {

  switch(level) {

    case "none": {

      return true;
    }

    case "all": {

      return false;
    }

    case "errors": {

      if(statusCode < 400) {

        return true;
      }

      return (statusCode === 404) && BROWSER_ASSET_PATTERNS.some((pattern) => url.startsWith(pattern));
    }

    case "filtered": {

      if((statusCode >= 400) || (method !== "GET")) {

        return false;
      }

      return POLLING_PATTERNS.some((pattern) => url.startsWith(pattern));
    }

    default: {

      return false;
    }
  }
}

/*
 * APPLICATION BUILDER
 *
 * The buildApp function creates and configures the Express application with all middleware and routes. This is separated from the server startup to allow for
 * testing and flexibility in deployment.
 */

/**
 * Creates and configures the Express application with all middleware and routes.
 * @param runtime - The station runtime the routes use.
 * @param logging - The HTTP logging settings. Defaults to CONFIG.logging.
 * @returns The configured Express application.
 */
export function buildApp(runtime: StationRuntime, logging: LoggingConfig = CONFIG.logging): Express {

  const app = express();

  app.use(express.json());

  if(logging.httpLogLevel !== "none") {

    app.use(morgan(MORGAN_FORMAT, {

      skip: (req, res): boolean => shouldSkipRequestLog(logging.httpLogLevel, req.method, req.originalUrl || req.url, res.statusCode),
      stream: createMorganStream()
    }));
  }

  // Set up all HTTP endpoints.
  setupRoutes(app, runtime);

  // Global error handler. Express error handlers require 4 parameters even if unused. Malformed JSON bodies arrive here with a 400 status from express.json().
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction): void => {

    if(("status" in err) && (err.status === 400)) {

      res.status(400).json({ error: "The request body is not valid JSON." });

      return;
    }

    LOG.error("Unhandled error in request: %s.", formatError(err));

    if(!res.headersSent) {

      res.status(500).json({ error: "Internal server error." });
    }
  });

  return app;
}

/*
 * STARTUP
 */

/**
 * Sets the logging mode, loads and validates the configuration, and starts the file logger. Every command runs this before touching the station subsystem.
 * @param useConsoleLogging - Whether to log to console instead of file.
 * @param overrides - CLI flag values applied on top of the merged configuration.
 * @param showConfiguration - Whether to log the active configuration.
 */
export async function initializeEnvironment(useConsoleLogging: boolean, overrides: CliOverrides = {}, showConfiguration = false): Promise<void> {

  // Set logging mode early before any log calls.
  usingConsoleLogging = useConsoleLogging;
  setConsoleLogging(useConsoleLogging);

  // Apply console-stamp for timestamps only when using console logging.
  if(useConsoleLogging) {

    consoleStamp(console, { format: ":date(yyyy/mm/dd HH:MM:ss.l)" });
  }

  // Initialize configuration from file and environment variables, then validate.
  try {

    await initializeConfiguration();
    applyCliOverrides(overrides);
    validateConfiguration();
  } catch(error) {

    LOG.error(formatError(error));

    process.exit(1);
  }

  // Initialize file logger if not using console logging.
  if(!useConsoleLogging) {

    await initializeFileLogger(getLogFilePath(CONFIG), CONFIG.logging.maxSize);
  }

  if(showConfiguration) {

    displayConfiguration();
  }
}

/**
 * Options for starting the HTTP server.
 */
export interface ServerOptions extends CliOverrides {

  consoleLogging: boolean;
}

/**
 * Initializes and starts the HTTP server.
 * @param options - The logging mode and CLI overrides.
 */
export async function startServer(options: ServerOptions): Promise<void> {

  await initializeEnvironment(options.consoleLogging, { logFile: options.logFile, port: options.port }, true);

  setupGracefulShutdown();

  const app = buildApp(createStationRuntime());

  server = app.listen(CONFIG.server.port, CONFIG.server.host, (): void => {

    LOG.info("StationBase is now listening on %s:%s.", CONFIG.server.host, CONFIG.server.port);
  });

  server.on("error", (error: Error): void => {

    LOG.error("HTTP server error: %s.", formatError(error));
  });
}
