/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.ts: Express application builder for Stillwatch.
 */
import { CONFIG, displayConfiguration, getLogFilePath, initializeConfiguration, validateConfiguration } from "./config/index.js";
import { DetectionCache, FFmpegRunner, FrozenScreenDetector } from "./detection/index.js";
import type { Express, NextFunction, Request, Response } from "express";
import { LOG, createMorganStream, formatError, isFFmpegAvailable, resolveFFmpegPath, setConsoleLogging } from "./utils/index.js";
import { initializeFileLogger, shutdownFileLogger } from "./utils/fileLogger.js";
import type { AppServices } from "./routes/index.js";
import type { HttpLogLevel, Nullable } from "./types/index.js";
import type { Server } from "node:http";
import consoleStamp from "console-stamp";
import express from "express";
import morgan from "morgan";
import { setupRoutes } from "./routes/index.js";

/*
 * LOGGING MODE
 *
 * The logging mode is set at startup based on the --console CLI flag. When console logging is enabled, timestamps are added via console-stamp and output goes to
 * stdout/stderr. When file logging is used (the default), output goes to ~/.stillwatch/stillwatch.log.
 */

// Track whether console logging is enabled, set during startServer().
let usingConsoleLogging = false;

/*
 * APPLICATION STATE
 *
 * The HTTP server instance is stored globally so it can be closed during graceful shutdown.
 */

let server: Nullable<Server> = null;

/*
 * GRACEFUL SHUTDOWN
 *
 * On SIGINT or SIGTERM we stop accepting connections and flush the file logger. Probes still running are children of this process and die with it.
 */

/**
 * Sets up signal handlers for graceful shutdown.
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

    if(!usingConsoleLogging) {

      shutdownFileLogger();
    }

    process.exit(0);
  }

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

/*
 * APPLICATION BUILDER
 *
 * The buildApp function creates and configures the Express application with all middleware and routes. It is separated from server startup so tests can build
 * the application around stub services without binding a port.
 */

// Monitoring systems poll these endpoints constantly. The "filtered" log level skips them when they succeed.
const POLLING_PATTERNS = [ "/cache", "/health" ];

/**
 * Returns the morgan skip predicate for a log level, or null when nothing should be logged.
 * @param level - The configured HTTP log level.
 * @returns The predicate, or null for "none".
 */
function createMorganSkip(level: HttpLogLevel): Nullable<(req: Request, res: Response) => boolean> {

  switch(level) {

    case "none": {

      return null;
    }

    case "errors": {

      return (_req, res): boolean => res.statusCode < 400;
    }

    case "filtered": {

      return (req, res): boolean => {

        // Always log errors.
        if(res.statusCode >= 400) {

          return false;
        }

        const url = req.originalUrl || req.url;

        return POLLING_PATTERNS.some((pattern) => url.startsWith(pattern));
      };
    }

    default: {

      return (): boolean => false;
    }
  }
}

/**
 * Extracts the 4xx status the JSON body parser attaches to errors caused by the request itself, such as malformed JSON or an oversized body.
 * @param err - The error passed to the error handler.
 * @returns The status, or null for errors that are ours.
 */
function clientErrorStatus(err: unknown): Nullable<number> {

  if((typeof err !== "object") || (err === null) || !("status" in err)) {

    return null;
  }

  const { status } = err;

  return ((typeof status === "number") && (status >= 400) && (status < 500)) ? status : null;
}

/**
 * Creates and configures the Express application with all middleware and routes.
 * @param services - The detection cache and FFmpeg availability check the routes use.
 * @param httpLogLevel - HTTP request logging level. Defaults to the configured level.
 * @returns The configured Express application.
 */
export function buildApp(services: AppServices, httpLogLevel: HttpLogLevel = CONFIG.logging.httpLogLevel): Express {

  const app = express();

  app.use(express.json());

  // Morgan output goes through morganStream, which formats timestamps consistently for both console and file logging modes.
  const skip = createMorganSkip(httpLogLevel);

  if(skip) {

    app.use(morgan(":method :url from :remote-addr responded :status in :response-time ms.", { skip, stream: createMorganStream() }));
  }

  // Set up all HTTP endpoints.
  setupRoutes(app, services);

  // Global error handler. Express error handlers require 4 parameters even if unused.
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction): void => {

    const status = clientErrorStatus(err);

    if(status) {

      LOG.warn("Rejected request with an invalid body: %s.", formatError(err));

      if(!res.headersSent) {

        res.status(status).json({ error: "Invalid request body." });
      }

      return;
    }

    LOG.error("Unhandled error in request: %s.", formatError(err));

    if(!res.headersSent) {

      res.status(500).json({ error: "Internal server error" });
    }
  });

  return app;
}

/*
 * SERVER STARTUP
 *
 * The startServer function initializes and starts the HTTP server. It validates configuration, locates FFmpeg, wires the detector to its cache and starts the
 * Express application.
 */

/**
 * Options for startServer(), parsed from the command line by the entry point.
 */
export interface StartOptions {

  consoleLogging: boolean;
  logFile?: string;
  port?: number;
}

/**
 * Initializes and starts the HTTP server.
 * @param options - Logging mode and CLI overrides.
 */
export async function startServer(options: StartOptions): Promise<void> {

  // Set logging mode early before any log calls.
  usingConsoleLogging = options.consoleLogging;
  setConsoleLogging(options.consoleLogging);

  // Apply console-stamp for timestamps only when using console logging.
  if(options.consoleLogging) {

    consoleStamp.default(console, { format: ":date(yyyy/mm/dd HH:MM:ss.l)" });
  }

  // Initialize configuration from file, environment variables and command line, then validate.
  try {

    await initializeConfiguration({ logFile: options.logFile, port: options.port });
    validateConfiguration();
  } catch(error) {

    LOG.error(formatError(error));

    process.exit(1);
  }

  // Initialize file logger if not using console logging.
  if(!options.consoleLogging) {

    await initializeFileLogger(getLogFilePath(CONFIG), CONFIG.logging.maxSize);
  }

  displayConfiguration();
  setupGracefulShutdown();

  // Without FFmpeg every check ends in a detection error. We keep serving so /health can report the problem.
  const ffmpegPath = await resolveFFmpegPath(CONFIG.detection.ffmpegPath);

  if(ffmpegPath) {

    LOG.info("Using FFmpeg at: %s", ffmpegPath);
  } else {

    LOG.error("FFmpeg is not available. Install FFmpeg or set FFMPEG_PATH to its location.");
  }

  const detector = new FrozenScreenDetector({

    minFrames: CONFIG.detection.minFrames,
    runner: new FFmpegRunner(),
    sampleDuration: CONFIG.detection.sampleDuration,
    timeout: CONFIG.detection.timeout
  });

  const services: AppServices = {

    cache: new DetectionCache(detector, CONFIG.detection.cacheSize),
    ffmpegAvailable: async (): Promise<boolean> => isFFmpegAvailable(CONFIG.detection.ffmpegPath)
  };

  const app = buildApp(services);

  server = app.listen(CONFIG.server.port, CONFIG.server.host, (): void => {

    LOG.info("Stillwatch is now listening on %s:%s.", CONFIG.server.host, CONFIG.server.port);
  });
}
