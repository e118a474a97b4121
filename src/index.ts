#!/usr/bin/env node
/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.ts: Entry point for Stillwatch.
 */
import { CONFIG_METADATA, DEFAULTS, getNestedValue, initializeDataDir } from "./config/index.js";
import { DEBUG_CATEGORIES, LOG, formatError, getPackageVersion, initDebugFilter, setDebugLogging } from "./utils/index.js";
import type { Config } from "./types/index.js";
import { flushLogBufferSync } from "./utils/fileLogger.js";
import path from "node:path";
import { startServer } from "./app.js";

/* These handlers catch unhandled promise rejections and uncaught exceptions to prevent the process from crashing. A monitoring endpoint that dies on one bad
 * request stops answering for every stream it watches, so the handlers log the error and allow the process to continue.
 */

process.on("unhandledRejection", (reason: unknown): void => {

  LOG.error("Unhandled promise rejection: %s.", formatError(reason));
});

process.on("uncaughtException", (error: Error): void => {

  LOG.error("Uncaught exception: %s.", formatError(error));
});

/**
 * Prints usage information to the console.
 */
function printUsage(): void {

  /* eslint-disable no-console */
  console.log("Usage: stillwatch [options]");
  console.log("");
  console.log("Options:");
  console.log("  -c, --console                   Log to console instead of file (for Docker or debugging)");
  console.log("  -d, --debug                     Enable debug logging (verbose output for troubleshooting)");
  console.log("  -h, --help                      Show this help message");
  console.log("  -p, --port <port>               Set server port (default: " + String(DEFAULTS.server.port) + ")");
  console.log("  -v, --version                   Show version number");
  console.log("  --data-dir <path>               Set data directory (default: ~/.stillwatch)");
  console.log("  --list-env                      List all environment variables");
  console.log("  --log-file <path>               Set log file path (default: <data-dir>/stillwatch.log)");
  console.log("");
  console.log("Common Environment Variables:");
  console.log("  DETECTION_TIMEOUT               Seconds before a probe is killed (default: " + String(DEFAULTS.detection.timeout) + ")");
  console.log("  FFMPEG_PATH                     Path to the FFmpeg executable");
  console.log("  MIN_FRAMES                      Changed frames required for a moving picture (default: " + String(DEFAULTS.detection.minFrames) + ")");
  console.log("  PORT                            HTTP server port");
  console.log("  SAMPLE_DURATION                 Seconds of stream sampled per check (default: " + String(DEFAULTS.detection.sampleDuration) + ")");
  console.log("  STILLWATCH_DATA_DIR             Data directory path (default: ~/.stillwatch)");
  console.log("  STILLWATCH_DEBUG                Debug category filter (e.g., 'detection', 'detection:probe', '*,-detection:cache')");
  console.log("");
  console.log("  Run 'stillwatch --list-env' for a complete list of all environment variables.");
  /* eslint-enable no-console */
}

/**
 * Prints a complete listing of all environment variables organized by category. Output is generated from CONFIG_METADATA so it always matches the settings the
 * configuration layer reads.
 */
function printEnvironmentVariables(): void {

  /* eslint-disable no-console */

  // Server first (most commonly configured), then alphabetical.
  const categoryOrder: { displayName: string; key: keyof Config }[] = [
    { displayName: "Server", key: "server" },
    { displayName: "Detection", key: "detection" },
    { displayName: "Logging", key: "logging" },
    { displayName: "Paths", key: "paths" }
  ];

  // Null path settings resolve at runtime rather than from DEFAULTS.
  const dynamicDefaults: Record<string, string> = {

    "detection.ffmpegPath": "ffmpeg on the system PATH",
    "paths.logFile": "<data-dir>/stillwatch.log"
  };

  console.log("Stillwatch Environment Variables");
  console.log("");
  console.log("All settings can also be configured in <data-dir>/config.json.");
  console.log("Priority: CLI flags > environment variables > config.json > defaults.");

  for(const category of categoryOrder) {

    console.log("");
    console.log(category.displayName + ":");

    let first = true;

    for(const setting of CONFIG_METADATA[category.key]) {

      if(!setting.envVar) {

        continue;
      }

      if(!first) {

        console.log("");
      }

      first = false;

      console.log("  " + setting.envVar);

      // Only the first sentence of the description.
      const desc = setting.description;
      const periodSpace = desc.indexOf(". ");

      console.log("    " + ((periodSpace !== -1) ? desc.slice(0, periodSpace + 1) : desc));

      let defaultStr = dynamicDefaults[setting.path];

      if(!defaultStr) {

        const defaultValue = getNestedValue(DEFAULTS, setting.path);

        defaultStr = String(defaultValue);

        if((typeof defaultValue === "number") && setting.unit) {

          defaultStr = defaultStr + " (" + setting.unit + ")";
        }
      }

      console.log("    Default: " + defaultStr);
    }
  }

  // STILLWATCH_DATA_DIR is resolved before config.json is loaded, so it cannot live in config.json. STILLWATCH_DEBUG is parsed here in the entry point.
  console.log("");
  console.log("Special:");
  console.log("  STILLWATCH_DATA_DIR");
  console.log("    Data directory path. Must be an absolute path.");
  console.log("    Default: ~/.stillwatch");
  console.log("");
  console.log("  STILLWATCH_DEBUG");
  console.log("    Debug category filter. Known categories:");

  for(const entry of DEBUG_CATEGORIES) {

    console.log("      " + entry.category.padEnd(18) + entry.description);
  }

  console.log("    Default: (disabled)");

  /* eslint-enable no-console */
}

/**
 * Result of parsing command-line arguments. CLI flags have the highest priority in the configuration merge order.
 */
export interface ParsedArgs {

  consoleLogging: boolean;
  dataDir?: string;
  debugLogging: boolean;
  listEnv: boolean;
  logFile?: string;
  port?: number;
}

/**
 * Validates that a path argument is present and absolute. Prints an error and exits otherwise.
 * @param flag - The CLI flag name for the error message.
 * @param value - The path value to validate.
 * @returns The validated path.
 */
function requireAbsolutePath(flag: string, value: string | undefined): string {

  if(!value) {

    // eslint-disable-next-line no-console
    console.error("Error: " + flag + " requires a path argument.");

    process.exit(1);
  }

  if(!path.isAbsolute(value)) {

    // eslint-disable-next-line no-console
    console.error("Error: " + flag + " requires an absolute path, got: " + value);

    process.exit(1);
  }

  return value;
}

/**
 * Parses command-line arguments into a structured result. Values are stored in ParsedArgs rather than written directly to CONFIG, so that the configuration merge
 * can apply CLI overrides at the correct priority level (CLI > env > config.json > defaults).
 * @returns Parsed argument flags and values.
 */
function parseArgs(): ParsedArgs {

  const args = process.argv.slice(2);
  const parsed: ParsedArgs = { consoleLogging: false, debugLogging: false, listEnv: false };

  for(let i = 0; i < args.length; i++) {

    const arg = args[i];

    switch(arg) {

      case "-c":
      case "--console": {

        parsed.consoleLogging = true;

        break;
      }

      case "-d":
      case "--debug": {

        parsed.debugLogging = true;

        break;
      }

      case "-h":
      case "--help": {

        printUsage();

        process.exit(0);
      }

      // eslint-disable-next-line no-fallthrough
      case "-p":
      case "--port": {

        const port = parseInt(args[++i] ?? "", 10);

        if(!isNaN(port)) {

          parsed.port = port;
        }

        break;
      }

      case "-v":
      case "--version": {

        // eslint-disable-next-line no-console
        console.log("Stillwatch v" + getPackageVersion());

        process.exit(0);
      }

      // eslint-disable-next-line no-fallthrough
      case "--data-dir": {

        parsed.dataDir = requireAbsolutePath("--data-dir", args[++i]);

        break;
      }

      case "--list-env": {

        parsed.listEnv = true;

        break;
      }

      case "--log-file": {

        parsed.logFile = requireAbsolutePath("--log-file", args[++i]);

        break;
      }

      default: {

        break;
      }
    }
  }

  return parsed;
}

const parsedArgs = parseArgs();

if(parsedArgs.listEnv) {

  printEnvironmentVariables();

  process.exit(0);
}

/* The main entry point resolves the data directory, enables debug output, and starts the server. If startup fails, we exit with a non-zero code to signal the
 * failure to process managers.
 */

try {

  initializeDataDir(parsedArgs.dataDir);
} catch(error) {

  // eslint-disable-next-line no-console
  console.error("Error: " + formatError(error));

  process.exit(1);
}

// STILLWATCH_DEBUG takes precedence over the --debug CLI flag, allowing fine-grained category selection.
const debugEnv = process.env.STILLWATCH_DEBUG;

if(debugEnv) {

  initDebugFilter(debugEnv);
} else if(parsedArgs.debugLogging) {

  setDebugLogging(true);
}

// The 'exit' event runs synchronously. Buffered log entries from a failed startup must reach disk before the process terminates.
process.on("exit", (): void => {

  flushLogBufferSync();
});

startServer({ consoleLogging: parsedArgs.consoleLogging, logFile: parsedArgs.logFile, port: parsedArgs.port }).catch((error: unknown): void => {

  LOG.error("Fatal startup error occurred: %s.", formatError(error));

  process.exit(1);
});
