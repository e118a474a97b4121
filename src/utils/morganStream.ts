/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * morganStream.ts: Morgan logging stream adapter for Stillwatch.
 */
import type { StreamOptions } from "morgan";
import df from "dateformat";
import { isConsoleLogging } from "./logger.js";
import { writeLogEntry } from "./fileLogger.js";

/* Morgan writes each request line to a stream. This adapter sends those lines wherever application logs currently go: stdout with a timestamp in console mode, the
 * file logger (which stamps its own entries) otherwise.
 */

/**
 * Creates a Morgan stream options object that routes log output based on the logging mode.
 * @returns StreamOptions object for Morgan configuration.
 */
export function createMorganStream(): StreamOptions {

  return {

    write: (message: string): void => {

      // Morgan terminates each line with a newline; both sinks add their own.
      const trimmedMessage = message.trim();

      if(!isConsoleLogging()) {

        writeLogEntry("info", trimmedMessage);

        return;
      }

      // eslint-disable-next-line no-console
      console.log([ "[", df(new Date(), "yyyy/mm/dd HH:MM:ss.l"), "] ", trimmedMessage ].join(""));
    }
  };
}
