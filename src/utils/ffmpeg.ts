/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ffmpeg.ts: FFmpeg executable resolution for Stillwatch.
 */
import { LOG } from "./logger.js";
import type { Nullable } from "../types/index.js";
import { existsSync } from "node:fs";
import { spawn } from "node:child_process";

/*
 * FFMPEG PATH RESOLUTION
 *
 * Every check runs FFmpeg, so we locate it at startup. We check in order of preference:
 * 1. The configured path (detection.ffmpegPath / FFMPEG_PATH), when set and present on disk
 * 2. System PATH (standard installation via package manager or manual install)
 *
 * A path that works is cached. A failed lookup is not, so /health finds FFmpeg once it is installed without a restart.
 */

// The FFmpeg path found by the last successful lookup.
let cachedFFmpegPath: Nullable<string> = null;

/**
 * Checks if FFmpeg exists at a specific path by attempting to run it.
 * @param pathToCheck - Full path to the FFmpeg executable, or a bare command name looked up on PATH.
 * @returns Promise resolving to true if FFmpeg runs successfully at this path.
 */
async function checkFFmpegAtPath(pathToCheck: string): Promise<boolean> {

  return new Promise((resolve) => {

    const ffmpeg = spawn(pathToCheck, ["-version"], {

      stdio: [ "ignore", "ignore", "ignore" ]
    });

    ffmpeg.on("error", () => {

      resolve(false);
    });

    ffmpeg.on("exit", (code) => {

      resolve(code === 0);
    });
  });
}

/**
 * Resolves the FFmpeg executable path. Checks the configured path first, then the system PATH. Only a successful lookup is cached.
 * @param configuredPath - Path from the configuration, or null to rely on the system PATH.
 * @returns Promise resolving to the FFmpeg path if found, or undefined if not available.
 */
export async function resolveFFmpegPath(configuredPath: Nullable<string> = null): Promise<string | undefined> {

  if(cachedFFmpegPath) {

    return cachedFFmpegPath;
  }

  if(configuredPath) {

    if(existsSync(configuredPath) && (await checkFFmpegAtPath(configuredPath))) {

      cachedFFmpegPath = configuredPath;

      return cachedFFmpegPath;
    }

    LOG.warn("Configured FFmpeg path %s is not usable. Falling back to the system PATH.", configuredPath);
  }

  if(await checkFFmpegAtPath("ffmpeg")) {

    cachedFFmpegPath = "ffmpeg";

    return cachedFFmpegPath;
  }

  LOG.debug("ffmpeg", "FFmpeg was not found on the system PATH.");

  return undefined;
}

/**
 * Returns the FFmpeg command to spawn. Falls back to "ffmpeg" until a lookup has succeeded, letting spawn surface the error as a check error.
 * @returns The FFmpeg executable path or command name.
 */
export function getFFmpegCommand(): string {

  return cachedFFmpegPath ?? "ffmpeg";
}

/**
 * Checks if FFmpeg is available on the system. Until FFmpeg is found, every call looks again.
 * @param configuredPath - Path from the configuration, or null to rely on the system PATH.
 * @returns Promise resolving to true if FFmpeg is available, false otherwise.
 */
export async function isFFmpegAvailable(configuredPath: Nullable<string> = null): Promise<boolean> {

  const ffmpegPath = await resolveFFmpegPath(configuredPath);

  return ffmpegPath !== undefined;
}
