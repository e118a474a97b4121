/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * fileLogger.ts: Buffered file logging with size-based trimming for Stillwatch.
 */
import type { Nullable } from "../types/index.js";
import df from "dateformat";
import fs from "node:fs";
import { isAnyDebugEnabled } from "./debugFilter.js";
import path from "node:path";

const { promises: fsPromises } = fs;

/* Log entries are collected in a buffer and appended to the log file once a second. Every SIZE_CHECK_FREQUENCY writes the real file size is checked, and when it
 * exceeds the configured maximum the file is cut down to half that size, keeping the most recent complete lines. Trimming writes a temp file and renames it over
 * the log so a crash mid-trim never loses the log. Timestamps use the same format console-stamp produces in console mode: yyyy/mm/dd HH:MM:ss.l
 */

const ANSI_RESET = "\x1b[0m";

// Interval in milliseconds between buffer flushes.
const FLUSH_INTERVAL_MS = 1000;

// Number of writes between file size checks.
const SIZE_CHECK_FREQUENCY = 100;

// Duration in milliseconds to stop writing after a write error before retrying.
const ERROR_RETRY_DELAY_MS = 60000;

interface FileLoggerState {

  disabledAt: number;
  filePath: Nullable<string>;
  flushTimer: Nullable<ReturnType<typeof setInterval>>;
  maxSize: number;
  writeBuffer: string[];
  writeCount: number;
}

const state: FileLoggerState = {

  disabledAt: 0,
  filePath: null,
  flushTimer: null,
  maxSize: 1048576,
  writeBuffer: [],
  writeCount: 0
};

/**
 * Initializes the file logger, creating the log file and its directory if needed. Failure falls back to console-only error reporting; the service keeps running.
 * @param logPath - Absolute path to the log file.
 * @param maxSize - Maximum log file size in bytes.
 */
export async function initializeFileLogger(logPath: string, maxSize: number): Promise<void> {

  try {

    await fsPromises.mkdir(path.dirname(logPath), { recursive: true });
    await fsPromises.appendFile(logPath, "", "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to initialize file logger: %s. File logging disabled.", (error instanceof Error) ? error.message : String(error));

    return;
  }

  state.filePath = logPath;
  state.maxSize = maxSize;

  state.flushTimer = setInterval((): void => {

    void flushLogBuffer();
  }, FLUSH_INTERVAL_MS);

  // The flush timer must not keep the process alive on its own.
  state.flushTimer.unref();
}

/**
 * Formats a log line and adds it to the write buffer. Does nothing until the file logger has been initialized.
 * @param level - Log level ("info", "warn", "error", "debug").
 * @param message - The formatted log message.
 * @param color - Optional ANSI color code applied to the level prefix and message.
 * @param categoryTag - Optional debug category tag, appended to the level prefix as [DEBUG:category].
 */
export function writeLogEntry(level: string, message: string, color?: string, categoryTag?: string): void {

  if(!state.filePath) {

    return;
  }

  if(state.disabledAt) {

    if((Date.now() - state.disabledAt) < ERROR_RETRY_DELAY_MS) {

      return;
    }

    state.disabledAt = 0;
  }

  const timestamp = df(new Date(), "yyyy/mm/dd HH:MM:ss.l");
  const levelTag = categoryTag ? [ level.toUpperCase(), ":", categoryTag ].join("") : level.toUpperCase();
  const levelPrefix = (level === "info") ? "" : [ "[", levelTag, "] " ].join("");

  state.writeBuffer.push([ "[", timestamp, "] ", color ?? "", levelPrefix, message, color ? ANSI_RESET : "", "\n" ].join(""));

  if((++state.writeCount % SIZE_CHECK_FREQUENCY) === 0) {

    void checkAndTrimFile();
  }
}

/**
 * Flushes the write buffer to disk asynchronously. Called periodically by the flush timer.
 */
export async function flushLogBuffer(): Promise<void> {

  if(!state.filePath || (state.writeBuffer.length === 0)) {

    return;
  }

  const content = state.writeBuffer.join("");

  state.writeBuffer = [];

  try {

    await fsPromises.appendFile(state.filePath, content, "utf-8");
  } catch(error) {

    state.disabledAt = Date.now();

    // eslint-disable-next-line no-console
    console.error("Failed to write to log file: %s. File logging disabled for %s seconds.",
      (error instanceof Error) ? error.message : String(error), ERROR_RETRY_DELAY_MS / 1000);
  }
}

/**
 * Flushes the write buffer to disk synchronously. Used on process exit, where only synchronous work runs.
 */
export function flushLogBufferSync(): void {

  if(!state.filePath || (state.writeBuffer.length === 0)) {

    return;
  }

  const content = state.writeBuffer.join("");

  state.writeBuffer = [];

  try {

    fs.appendFileSync(state.filePath, content, "utf-8");
  } catch(error) {

    // eslint-disable-next-line no-console
    console.error("Failed to write final log entries: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Checks the actual file size and trims the file when it exceeds the maximum. Trimming is skipped while debug logging is active so a debug session is kept whole.
 */
async function checkAndTrimFile(): Promise<void> {

  const filePath = state.filePath;

  if(!filePath) {

    return;
  }

  try {

    const stats = await fsPromises.stat(filePath);

    if((stats.size <= state.maxSize) || isAnyDebugEnabled()) {

      return;
    }

    const content = await fsPromises.readFile(filePath, "utf-8");
    const cutPosition = content.length - Math.floor(state.maxSize / 2);

    if(cutPosition <= 0) {

      return;
    }

    // Keep complete lines only.
    const newline = content.indexOf("\n", cutPosition);
    const trimmed = content.substring((newline === -1) ? cutPosition : (newline + 1));
    const tempPath = filePath + ".tmp";

    await fsPromises.writeFile(tempPath, trimmed, "utf-8");
    await fsPromises.rename(tempPath, filePath);
  } catch(error) {

    // eslint-disable-next-line no-console
    console.warn("Error trimming log file: %s.", (error instanceof Error) ? error.message : String(error));
  }
}

/**
 * Shuts down the file logger, flushing any remaining buffer synchronously.
 */
export function shutdownFileLogger(): void {

  if(state.flushTimer) {

    clearInterval(state.flushTimer);
    state.flushTimer = null;
  }

  flushLogBufferSync();

  state.filePath = null;
}
