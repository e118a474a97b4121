/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * paths.ts: Data directory, config file and log file locations for Stillwatch.
 */
import type { Config, Nullable } from "../types/index.js";
import os from "node:os";
import path from "node:path";

/* Stillwatch keeps two files on disk: config.json and, unless --console is given, stillwatch.log. Both live in the data directory by default. config.json is
 * read from that directory, so the directory has to be settled from the command line and the environment before any configuration is loaded. --data-dir beats
 * STILLWATCH_DATA_DIR, which beats ~/.stillwatch.
 */

const DATA_DIR_NAME = ".stillwatch";

let dataDir: Nullable<string> = null;

/**
 * Picks the data directory without touching module state.
 * @param cliDataDir - Value of --data-dir. The entry point has already rejected relative paths.
 * @param env - Environment to read STILLWATCH_DATA_DIR from.
 * @returns The absolute data directory.
 * @throws If STILLWATCH_DATA_DIR is relative.
 */
export function resolveDataDir(cliDataDir: string | undefined, env: NodeJS.ProcessEnv = process.env): string {

  if(cliDataDir) {

    return cliDataDir;
  }

  const fromEnv = env.STILLWATCH_DATA_DIR;

  if(!fromEnv) {

    return path.join(os.homedir(), DATA_DIR_NAME);
  }

  if(!path.isAbsolute(fromEnv)) {

    throw new Error("STILLWATCH_DATA_DIR must be an absolute path, got: " + fromEnv);
  }

  return fromEnv;
}

/**
 * Settles the data directory for the rest of the run.
 * @param cliDataDir - Value of --data-dir, if given.
 */
export function initializeDataDir(cliDataDir?: string): void {

  dataDir = resolveDataDir(cliDataDir);
}

/**
 * @returns The data directory chosen by initializeDataDir().
 */
export function getDataDir(): string {

  if(dataDir === null) {

    throw new Error("The data directory is read before initializeDataDir() has run.");
  }

  return dataDir;
}

/**
 * @returns Where config.json is read from.
 */
export function getConfigFilePath(): string {

  return path.join(getDataDir(), "config.json");
}

/**
 * Where the file logger writes. An explicit paths.logFile (--log-file, STILLWATCH_LOG_FILE or config.json) wins over the data directory.
 * @param config - The merged configuration.
 * @returns The log file path.
 */
export function getLogFilePath(config: Config): string {

  return config.paths.logFile ?? path.join(getDataDir(), "stillwatch.log");
}
