/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.ts: Logging utilities with color-coded output for Stillwatch.
 */
import { initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";
import { format } from "node:util";
import { getCheckId } from "./checkContext.js";
import { writeLogEntry } from "./fileLogger.js";

/* Terminal color codes for log output formatting. Warnings appear in yellow and errors in red. The reset code restores the default color after each colored message
 * to prevent color bleeding into subsequent output.
 */

const ANSI_COLORS = {

  cyan: "\x1b[36m",
  red: "\x1b[31m",
  reset: "\x1b[0m",
  yellow: "\x1b[33m"
};

/**
 * Log levels understood by the logger and the file logger.
 */
export type LogLevel = "debug" | "error" | "info" | "warn";

/* The logger can operate in two modes: console mode (output to stdout/stderr with colors) or file mode (output to the configured log file). By default, file mode
 * is used. Console mode is enabled via the --console CLI flag for container deployments or interactive debugging.
 */

// Flag indicating whether to use console logging instead of file logging.
let useConsoleLogging = false;

/**
 * Sets the logging mode. When true, logs go to console with colors. When false, logs go to the file logger.
 * @param enabled - True to enable console logging, false for file logging.
 */
export function setConsoleLogging(enabled: boolean): void {

  useConsoleLogging = enabled;
}

/**
 * Returns whether console logging is currently enabled.
 * @returns True if using console logging, false if using file logging.
 */
export function isConsoleLogging(): boolean {

  return useConsoleLogging;
}

/**
 * Enables or disables debug logging. When called with true, initializes the debug filter with wildcard (*) to enable all categories.
 * @param enabled - True to enable all debug logging, false to disable.
 */
export function setDebugLogging(enabled: boolean): void {

  initDebugFilter(enabled ? "*" : "");
}

/* The LOG object provides a centralized logging interface with color-coded output and printf-style format strings. All methods accept a format string followed by
 * optional arguments, using Node's util.format() for interpolation.
 *
 * Check context is automatically detected via AsyncLocalStorage. When running within a check context (established by runWithCheckContext()), log messages are
 * prefixed with the check ID so the lines of concurrent checks can be told apart.
 */

/**
 * Core logging implementation shared by all log levels. Handles check ID prefixing and output routing.
 * @param level - The log level.
 * @param color - ANSI color code for console output (empty string for no color).
 * @param message - The format string.
 * @param args - Format arguments.
 * @param explicitCheckId - Optional explicit check ID (used by the withCheckId helper).
 * @param categoryTag - Optional debug category tag for category-filtered debug messages.
 */
function logWithLevel(level: LogLevel, color: string, message: string, args: unknown[], explicitCheckId?: string, categoryTag?: string): void {

  const checkId = explicitCheckId ?? getCheckId();
  const formatted = args.length > 0 ? format(message, ...args) : message;

  if(!useConsoleLogging) {

    writeLogEntry(level, checkId ? [ "[", checkId, "] ", formatted ].join("") : formatted, color || undefined, categoryTag);

    return;
  }

  /* eslint-disable no-console */
  let consoleMethod;

  switch(level) {

    case "error": {

      consoleMethod = console.error;

      break;
    }

    case "warn": {

      consoleMethod = console.warn;

      break;
    }

    default: {

      consoleMethod = console.log;

      break;
    }
  }
  /* eslint-enable no-console */

  if(checkId && color) {

    consoleMethod("%s[%s] %s%s", color, checkId, formatted, ANSI_COLORS.reset);
  } else if(checkId) {

    consoleMethod("[%s] %s", checkId, formatted);
  } else if(color) {

    consoleMethod("%s%s%s", color, formatted, ANSI_COLORS.reset);
  } else {

    consoleMethod(formatted);
  }
}

/**
 * Bound logger interface returned by LOG.withCheckId(). Provides the same logging methods but with a fixed check ID.
 */
export interface BoundLogger {

  debug: (category: string, message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
}

export const LOG = {

  /**
   * Logs a debug message in cyan, filtered by category. Debug messages are only output when the category is enabled via STILLWATCH_DEBUG or the --debug CLI flag.
   * @param category - The debug category (e.g., "detection:probe").
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  debug: function(category: string, message: string, ...args: unknown[]): void {

    if(!isAnyDebugEnabled() || !isCategoryEnabled(category)) {

      return;
    }

    logWithLevel("debug", ANSI_COLORS.cyan, message, args, undefined, category);
  },

  /**
   * Logs an error message in red. Use this for failures that prevent normal operation, such as startup errors or unhandled request errors.
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  error: function(message: string, ...args: unknown[]): void {

    logWithLevel("error", ANSI_COLORS.red, message, args);
  },

  /**
   * Logs an informational message in the default terminal color.
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  info: function(message: string, ...args: unknown[]): void {

    logWithLevel("info", "", message, args);
  },

  /**
   * Logs a warning message in yellow. Use this for problems that do not stop the service, such as a stream FFmpeg could not analyze.
   * @param message - The format string (supports %s, %d, %j, %o).
   * @param args - Values to interpolate into the format string.
   */
  warn: function(message: string, ...args: unknown[]): void {

    logWithLevel("warn", ANSI_COLORS.yellow, message, args);
  },

  /**
   * Creates a bound logger with a fixed check ID, for logging about a check from outside its async context.
   * @param checkId - The check ID to include in all log messages.
   * @returns A logger object with debug, error, warn, and info methods that include the specified check ID.
   */
  withCheckId: function(checkId: string): BoundLogger {

    return {

      debug: (category: string, message: string, ...args: unknown[]): void => {

        if(isAnyDebugEnabled() && isCategoryEnabled(category)) {

          logWithLevel("debug", ANSI_COLORS.cyan, message, args, checkId, category);
        }
      },
      error: (message: string, ...args: unknown[]): void => { logWithLevel("error", ANSI_COLORS.red, message, args, checkId); },
      info: (message: string, ...args: unknown[]): void => { logWithLevel("info", "", message, args, checkId); },
      warn: (message: string, ...args: unknown[]): void => { logWithLevel("warn", ANSI_COLORS.yellow, message, args, checkId); }
    };
  }
};
